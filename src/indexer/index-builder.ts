/**
 * Turns a repository checkout into an ordered list of plugin records.
 *
 * Layout: root → one level of plugin directories → each plugin's own
 * files. Directories are processed one at a time in sorted order and the
 * first error aborts the pass, so callers only ever see a complete index.
 */

import { stat } from "node:fs/promises";
import { resolve } from "node:path";
import { errorMessage, FilesystemError } from "../errors.js";
import { logger } from "../logger.js";
import type { LanguagePrecedence, Plugin, PluginConfig, PluginLanguage } from "../types.js";
import { loadPluginConfig } from "./config-loader.js";
import type { ConfigParser } from "./config-schema.js";
import { detectPlugin } from "./detector.js";
import { parseLanguageName } from "./markers.js";
import { type WalkEntry, walkDirectory } from "./walker.js";

export interface IndexOptions {
  /** Defaults to "config" */
  languagePrecedence?: LanguagePrecedence;
  /** Replaces the default YAML parser */
  parseConfig?: ConfigParser;
}

export function resolveLanguage(
  detected: PluginLanguage,
  config: PluginConfig | undefined,
  precedence: LanguagePrecedence,
): PluginLanguage {
  if (precedence === "detected") return detected;
  return parseLanguageName(config?.plugin?.lang) ?? detected;
}

export function createPlugin(name: string, path: string, language: PluginLanguage, config?: PluginConfig): Plugin {
  return Object.freeze(config === undefined ? { name, path, language } : { name, path, language, config });
}

export async function indexPlugin(pluginDir: string, options: IndexOptions = {}): Promise<Plugin> {
  const detected = await detectPlugin(pluginDir);
  const config = await loadPluginConfig(detected.path, options.parseConfig);
  const language = resolveLanguage(detected.language, config, options.languagePrecedence ?? "config");

  logger.debug(`[indexer] new plugin: ${detected.name} ${detected.path} (${language})`);
  return createPlugin(detected.name, detected.path, language, config);
}

/** Directories count as plugins, and so do symlinks that point at one. */
async function isPluginDirectory(entry: WalkEntry): Promise<boolean> {
  if (entry.kind === "directory") return true;
  if (entry.kind !== "symlink") return false;
  try {
    return (await stat(entry.path)).isDirectory();
  } catch (err) {
    throw new FilesystemError(entry.path, errorMessage(err), { cause: err });
  }
}

/** Index every non-hidden immediate subdirectory of `root`. */
export async function indexRepository(root: string, options: IndexOptions = {}): Promise<Plugin[]> {
  const plugins: Plugin[] = [];

  for await (const entry of walkDirectory(resolve(root), 1)) {
    if (!(await isPluginDirectory(entry))) continue;
    plugins.push(await indexPlugin(entry.path, options));
  }

  logger.debug(`[indexer] indexed ${plugins.length} plugin(s) under ${root}`);
  return plugins;
}
