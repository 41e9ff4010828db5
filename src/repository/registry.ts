/**
 * Repositories keyed by name, the key downstream tooling uses to find
 * plugins.
 */

import type { RecklessConfig } from "../core/config.js";
import { logger } from "../logger.js";
import type { Plugin } from "../types.js";
import { GithubRepository } from "./github.js";
import type { Repository } from "./repository.js";
import { parseRepositorySource } from "./source.js";

export interface PluginMatch {
  repository: Repository;
  plugin: Plugin;
}

export class RepositoryRegistry {
  private readonly repositories = new Map<string, Repository>();

  /** One git-backed repository per configured entry, in config order. */
  static fromConfig(config: RecklessConfig): RepositoryRegistry {
    const registry = new RepositoryRegistry();
    for (const entry of config.repositories) {
      const source = parseRepositorySource(entry.name, entry.url, config.reposDir);
      registry.add(
        new GithubRepository(source, {
          languagePrecedence: config.languagePrecedence,
          git: config.git,
        }),
      );
    }
    return registry;
  }

  add(repository: Repository): void {
    const { name } = repository.source;
    if (this.repositories.has(name)) {
      throw new Error(`Repository already registered: ${name}`);
    }
    this.repositories.set(name, repository);
  }

  remove(name: string): boolean {
    return this.repositories.delete(name);
  }

  get(name: string): Repository | undefined {
    return this.repositories.get(name);
  }

  list(): Repository[] {
    return Array.from(this.repositories.values());
  }

  /** Initialise every repository in order; the first failure stops the run. */
  async initAll(): Promise<void> {
    for (const repository of this.repositories.values()) {
      await repository.init();
    }
    logger.info(`[repository] ${this.repositories.size} repositor${this.repositories.size === 1 ? "y" : "ies"} ready`);
  }

  /** First plugin named `name`, searching repositories in registration order. */
  findPlugin(name: string): PluginMatch | undefined {
    for (const repository of this.repositories.values()) {
      const plugin = repository.getPluginByName(name);
      if (plugin) return { repository, plugin };
    }
    return undefined;
  }
}
