/**
 * Per-plugin configuration discovery.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { ConfigParseError, errorCode, errorMessage, FilesystemError } from "../errors.js";
import { logger } from "../logger.js";
import { type ConfigParser, type PluginConfig, parsePluginConfig } from "./config-schema.js";

/** Checked in this order; a later existing file replaces an earlier one. */
export const CONFIG_FILENAMES = ["reckless.yaml", "reckless.yml"] as const;

const utf8 = new TextDecoder("utf-8", { fatal: true });

async function readIfExists(filePath: string): Promise<string | undefined> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (err) {
    if (errorCode(err) === "ENOENT") return undefined;
    throw new FilesystemError(filePath, errorMessage(err), { cause: err });
  }
  try {
    return utf8.decode(bytes);
  } catch (err) {
    throw new FilesystemError(filePath, "file is not valid UTF-8", { cause: err });
  }
}

/**
 * Load the plugin configuration from `pluginDir`.
 *
 * Returns undefined when neither file exists. A file that exists but does
 * not parse throws ConfigParseError; it is never skipped.
 */
export async function loadPluginConfig(
  pluginDir: string,
  parse: ConfigParser = parsePluginConfig,
): Promise<PluginConfig | undefined> {
  let config: PluginConfig | undefined;

  for (const fileName of CONFIG_FILENAMES) {
    const filePath = join(pluginDir, fileName);
    const text = await readIfExists(filePath);
    if (text === undefined) continue;

    logger.debug(`[indexer] found plugin configuration: ${filePath}`);
    try {
      config = parse(text);
    } catch (err) {
      throw new ConfigParseError(filePath, errorMessage(err), { cause: err });
    }
  }

  return config;
}
