export { ConfigManager, configSchema, defaultConfig } from "./core/config.js";
export type { RecklessConfig, RepositoryEntry } from "./core/config.js";
export {
  AcquisitionError,
  ConfigParseError,
  FilesystemError,
  isRecklessError,
  RecklessError,
} from "./errors.js";
export type { RecklessErrorKind } from "./errors.js";
export { CONFIG_FILENAMES, loadPluginConfig } from "./indexer/config-loader.js";
export { parsePluginConfig, pluginConfigSchema } from "./indexer/config-schema.js";
export type { ConfigParser } from "./indexer/config-schema.js";
export { detectPlugin } from "./indexer/detector.js";
export type { DetectedPlugin } from "./indexer/detector.js";
export { indexPlugin, indexRepository, resolveLanguage } from "./indexer/index-builder.js";
export type { IndexOptions } from "./indexer/index-builder.js";
export { inferLanguage, languageForMarker, MARKER_TABLE, parseLanguageName } from "./indexer/markers.js";
export { listDirectory, walkDirectory } from "./indexer/walker.js";
export type { EntryKind, WalkEntry } from "./indexer/walker.js";
export { logger } from "./logger.js";
export { acquireWithGit } from "./repository/git.js";
export type { GitOptions } from "./repository/git.js";
export { GithubRepository } from "./repository/github.js";
export type { GithubRepositoryOptions } from "./repository/github.js";
export { LocalRepository } from "./repository/local.js";
export { RepositoryRegistry } from "./repository/registry.js";
export type { PluginMatch } from "./repository/registry.js";
export { IndexedRepository } from "./repository/repository.js";
export type { Repository } from "./repository/repository.js";
export { normalizeRepositoryUrl, parseRepositorySource, repositoryNameFromUrl } from "./repository/source.js";
export { PLUGIN_LANGUAGES } from "./types.js";
export type {
  LanguagePrecedence,
  Plugin,
  PluginConfig,
  PluginLanguage,
  RepositorySource,
  RepositoryState,
} from "./types.js";
