import { basename, resolve } from "node:path";
import { logger } from "../logger.js";
import type { PluginLanguage } from "../types.js";
import { inferLanguage } from "./markers.js";
import { listDirectory, type WalkEntry } from "./walker.js";

export interface DetectedPlugin {
  name: string;
  path: string;
  language: PluginLanguage;
}

function isCandidateFile(entry: WalkEntry): boolean {
  return entry.kind === "file" || entry.kind === "symlink";
}

/**
 * Scan the immediate files of a plugin directory and guess its language.
 *
 * Name and path come from the directory itself, whatever files it holds.
 * With several marker files the last one in sorted order decides.
 */
export async function detectPlugin(pluginDir: string): Promise<DetectedPlugin> {
  const path = resolve(pluginDir);
  const entries = await listDirectory(path, 1);
  const language = inferLanguage(entries.filter(isCandidateFile).map((e) => e.name));

  logger.debug(`[indexer] possible plugin language for ${path}: ${language}`);
  return { name: basename(path), path, language };
}
