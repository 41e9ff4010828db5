/**
 * Marker files: filenames whose presence implies a plugin's language.
 */

import type { PluginLanguage } from "../types.js";

/** Exact, case-sensitive filename → language. */
export const MARKER_TABLE: ReadonlyMap<string, PluginLanguage> = new Map([
  ["requirements.txt", "python"],
  ["go.mod", "go"],
  ["cargo.toml", "rust"],
  ["pubspec.yaml", "dart"],
  ["package.json", "javascript"],
  ["tsconfig.json", "typescript"],
]);

export function languageForMarker(fileName: string): PluginLanguage | undefined {
  return MARKER_TABLE.get(fileName);
}

/**
 * Fold file names into a language. Every marker overwrites the running
 * result, so the LAST marker in the given order wins; no marker at all
 * gives "unknown".
 */
export function inferLanguage(fileNames: Iterable<string>): PluginLanguage {
  let language: PluginLanguage = "unknown";
  for (const fileName of fileNames) {
    language = languageForMarker(fileName) ?? language;
  }
  return language;
}

const LANGUAGE_ALIASES: ReadonlyMap<string, PluginLanguage> = new Map([
  ["python", "python"],
  ["py", "python"],
  ["go", "go"],
  ["golang", "go"],
  ["rust", "rust"],
  ["dart", "dart"],
  ["javascript", "javascript"],
  ["js", "javascript"],
  ["typescript", "typescript"],
  ["ts", "typescript"],
]);

/** Map a configuration's free-form `lang` value onto a known language. */
export function parseLanguageName(value: string | undefined): PluginLanguage | undefined {
  if (!value) return undefined;
  return LANGUAGE_ALIASES.get(value.trim().toLowerCase());
}
