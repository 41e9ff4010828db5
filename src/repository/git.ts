/**
 * Git-backed acquisition: clone on first use, pull on later ones, and
 * keep submodules in step either way.
 */

import { execFileSync } from "node:child_process";
import { existsSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { AcquisitionError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";

export interface GitOptions {
  /** Clone and update submodules recursively (default true) */
  recurseSubmodules?: boolean;
  /** Shallow clone depth */
  depth?: number;
}

function git(args: string[], url: string, cwd?: string): void {
  try {
    execFileSync("git", args, { cwd, stdio: "pipe" });
  } catch (err) {
    throw new AcquisitionError(url, `git ${args[0]} failed: ${errorMessage(err)}`, { cause: err });
  }
}

export function isGitCheckout(path: string): boolean {
  return existsSync(join(path, ".git"));
}

export function cloneArgs(url: string, path: string, options: GitOptions = {}): string[] {
  const args = ["clone"];
  if (options.recurseSubmodules ?? true) args.push("--recurse-submodules");
  if (options.depth !== undefined) args.push("--depth", String(options.depth));
  args.push(url, path);
  return args;
}

/** Fetch `url` into `path`, or refresh it when `path` is already a checkout. */
export async function acquireWithGit(url: string, path: string, options: GitOptions = {}): Promise<void> {
  if (isGitCheckout(path)) {
    logger.info(`[repository] Updating ${url} in ${path}...`);
    git(["pull", "--ff-only"], url, path);
    if (options.recurseSubmodules ?? true) {
      git(["submodule", "update", "--init", "--recursive"], url, path);
    }
    return;
  }

  if (existsSync(path)) {
    throw new AcquisitionError(url, `${path} exists and is not a git checkout`);
  }
  try {
    mkdirSync(dirname(path), { recursive: true });
  } catch (err) {
    throw new AcquisitionError(url, `cannot create ${dirname(path)}: ${errorMessage(err)}`, { cause: err });
  }
  logger.info(`[repository] Cloning ${url} into ${path}...`);
  git(cloneArgs(url, path, options), url);
}
