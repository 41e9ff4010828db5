import { join, resolve } from "node:path";
import { REPOS_DIR } from "../paths.js";
import type { RepositorySource } from "../types.js";

const SAFE_NAME = /^[a-zA-Z0-9._-]+$/;

export function assertSafeName(value: string, label: string): void {
  if (!SAFE_NAME.test(value) || value === "." || value === "..") {
    throw new Error(`Invalid ${label}: ${value}`);
  }
}

/** Expand `github:owner/repo` shorthand; other URLs are returned trimmed. */
export function normalizeRepositoryUrl(url: string): string {
  const trimmed = url.trim();
  if (!trimmed.startsWith("github:")) return trimmed;

  const parts = trimmed.slice("github:".length).split("/");
  if (parts.length !== 2) throw new Error("GitHub source must be github:owner/repo");
  assertSafeName(parts[0], "GitHub owner");
  assertSafeName(parts[1], "GitHub repo");
  return `https://github.com/${parts[0]}/${parts[1]}`;
}

/**
 * Default index key for a URL: its last path segment without `.git`.
 * Handles https URLs, scp-like ssh (`git@host:owner/repo.git`) and the
 * github: shorthand.
 */
export function repositoryNameFromUrl(url: string): string {
  const normalized = normalizeRepositoryUrl(url).replace(/\/+$/, "");
  const lastSegment = normalized.split(/[/:]/).pop() ?? "";
  const name = lastSegment.replace(/\.git$/, "");
  assertSafeName(name, "repository name");
  return name;
}

/** Resolve where a repository lives on disk: `<reposDir>/<name>`. */
export function parseRepositorySource(name: string, url: string, reposDir: string = REPOS_DIR): RepositorySource {
  assertSafeName(name, "repository name");
  return {
    name,
    url: normalizeRepositoryUrl(url),
    path: join(resolve(reposDir), name),
  };
}
