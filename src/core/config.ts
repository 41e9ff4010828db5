/**
 * Configuration management for reckless-index
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { errorCode, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { CONFIG_FILE, REPOS_DIR } from "../paths.js";

const repositoryEntrySchema = z.object({
  name: z.string().regex(/^[a-zA-Z0-9._-]+$/, "Must be alphanumeric with dots, hyphens or underscores"),
  url: z.string().min(1),
});

const languagePrecedenceSchema = z.enum(["config", "detected"]);

export const configSchema = z.object({
  reposDir: z.string().min(1).default(REPOS_DIR),
  languagePrecedence: languagePrecedenceSchema.default("config"),
  git: z
    .object({
      recurseSubmodules: z.boolean().default(true),
      depth: z.number().int().positive().optional(),
    })
    .default({}),
  repositories: z.array(repositoryEntrySchema).default([]),
});

export type RecklessConfig = z.infer<typeof configSchema>;
export type RepositoryEntry = z.infer<typeof repositoryEntrySchema>;

export function defaultConfig(): RecklessConfig {
  return configSchema.parse({});
}

export class ConfigManager {
  private config: RecklessConfig = defaultConfig();

  constructor(private readonly configFile: string = CONFIG_FILE) {}

  /**
   * Read the config file, falling back to defaults when it does not exist.
   * A file that exists but is unreadable or invalid throws.
   */
  async load(): Promise<RecklessConfig> {
    let raw: string | undefined;
    try {
      raw = await readFile(this.configFile, "utf-8");
    } catch (err) {
      if (errorCode(err) !== "ENOENT") {
        throw new Error(`Failed to read config ${this.configFile}: ${errorMessage(err)}`, { cause: err });
      }
      logger.debug(`[config] ${this.configFile} not found, using defaults`);
    }

    this.config = raw === undefined ? defaultConfig() : this.parse(raw);
    this.applyEnvironmentOverrides();
    return this.get();
  }

  private parse(raw: string): RecklessConfig {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new Error(`Invalid JSON in config ${this.configFile}: ${errorMessage(err)}`, { cause: err });
    }
    const result = configSchema.safeParse(data);
    if (!result.success) {
      throw new Error(`Invalid config ${this.configFile}: ${result.error.message}`);
    }
    return result.data;
  }

  /** Environment variables take precedence over config file values. */
  private applyEnvironmentOverrides(): void {
    if (process.env.RECKLESS_REPOS_DIR) {
      this.config.reposDir = process.env.RECKLESS_REPOS_DIR;
    }
    const precedence = process.env.RECKLESS_LANGUAGE_PRECEDENCE;
    if (precedence) {
      const parsed = languagePrecedenceSchema.safeParse(precedence);
      if (parsed.success) {
        this.config.languagePrecedence = parsed.data;
      } else {
        logger.warn(`[config] ignoring RECKLESS_LANGUAGE_PRECEDENCE=${precedence}`);
      }
    }
  }

  async save(): Promise<void> {
    try {
      await mkdir(dirname(this.configFile), { recursive: true });
      await writeFile(this.configFile, JSON.stringify(this.config, null, 2));
    } catch (err) {
      throw new Error(`Failed to save config: ${errorMessage(err)}`, { cause: err });
    }
  }

  get(): RecklessConfig {
    return structuredClone(this.config);
  }

  addRepository(entry: RepositoryEntry): void {
    const parsed = repositoryEntrySchema.parse(entry);
    this.config.repositories = this.config.repositories.filter((r) => r.name !== parsed.name);
    this.config.repositories.push(parsed);
  }

  removeRepository(name: string): boolean {
    const before = this.config.repositories.length;
    this.config.repositories = this.config.repositories.filter((r) => r.name !== name);
    return this.config.repositories.length !== before;
  }

  reset(): void {
    this.config = defaultConfig();
  }
}
