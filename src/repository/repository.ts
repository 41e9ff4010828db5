/**
 * Repository façade.
 *
 * A repository is Uninitialized until `init()` succeeds, then Indexed.
 * Variants differ only in how the checkout is acquired; indexing is
 * shared. `init()` builds the new index off to the side and swaps it in
 * only on success, so a failed re-init leaves the previous index intact.
 *
 * Concurrent `init()` calls on one instance are not guarded against;
 * callers must serialise them.
 */

import { errorMessage } from "../errors.js";
import { type IndexOptions, indexRepository } from "../indexer/index-builder.js";
import { logger } from "../logger.js";
import type { Plugin, RepositorySource, RepositoryState } from "../types.js";

export interface Repository {
  readonly source: RepositorySource;
  readonly state: RepositoryState;
  init(): Promise<void>;
  list(): Plugin[];
  getPluginByName(name: string): Plugin | undefined;
}

export abstract class IndexedRepository implements Repository {
  private plugins: Plugin[] = [];
  private currentState: RepositoryState = "uninitialized";

  constructor(
    public readonly source: RepositorySource,
    protected readonly indexOptions: IndexOptions = {},
  ) {
    logger.debug(`[repository] creating repository: ${source.name} ${source.url}`);
  }

  get name(): string {
    return this.source.name;
  }

  get state(): RepositoryState {
    return this.currentState;
  }

  /** Make the repository contents available at `source.path`. */
  protected abstract acquire(): Promise<void>;

  async init(): Promise<void> {
    const { name, url, path } = this.source;
    logger.info(`[repository] Initializing ${name}: ${url} > ${path}`);

    try {
      await this.acquire();
      const plugins = await indexRepository(path, this.indexOptions);
      this.plugins = plugins;
      this.currentState = "indexed";
      logger.info(`[repository] ${name}: indexed ${plugins.length} plugin(s)`);
    } catch (err) {
      logger.error(`[repository] ${name}: ${errorMessage(err)}`);
      throw err;
    }
  }

  list(): Plugin[] {
    return [...this.plugins];
  }

  /** First plugin (in index order) whose name matches exactly. */
  getPluginByName(name: string): Plugin | undefined {
    return this.plugins.find((plugin) => plugin.name === name);
  }
}
