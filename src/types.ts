/**
 * Core data model shared by the indexer and the repository variants.
 */

import type { PluginConfig } from "./indexer/config-schema.js";

export type { PluginConfig } from "./indexer/config-schema.js";

export const PLUGIN_LANGUAGES = ["python", "go", "rust", "dart", "javascript", "typescript", "unknown"] as const;

export type PluginLanguage = (typeof PLUGIN_LANGUAGES)[number];

/**
 * One discovered plugin. Records are frozen once built and only replaced
 * by a full re-index.
 */
export interface Plugin {
  /** Name of the plugin directory */
  readonly name: string;
  /** Absolute path of the plugin directory */
  readonly path: string;
  readonly language: PluginLanguage;
  /** Present only when a reckless.yaml / reckless.yml was found and parsed */
  readonly config?: PluginConfig;
}

/** Identity of a repository: index key, remote location and checkout path. */
export interface RepositorySource {
  name: string;
  url: string;
  path: string;
}

export type RepositoryState = "uninitialized" | "indexed";

/**
 * Which value decides `Plugin.language` when a configuration declares one.
 *
 * - `config`: a recognised `plugin.lang` overrides detection
 * - `detected`: marker-file detection always wins
 */
export type LanguagePrecedence = "config" | "detected";
