import type { IndexOptions } from "../indexer/index-builder.js";
import type { RepositorySource } from "../types.js";
import { acquireWithGit, type GitOptions } from "./git.js";
import { IndexedRepository } from "./repository.js";
import { parseRepositorySource, repositoryNameFromUrl } from "./source.js";

export interface GithubRepositoryOptions extends IndexOptions {
  git?: GitOptions;
}

/** A repository fetched with git (GitHub or any other git remote). */
export class GithubRepository extends IndexedRepository {
  private readonly gitOptions: GitOptions;

  constructor(source: RepositorySource, options: GithubRepositoryOptions = {}) {
    const { git, ...indexOptions } = options;
    super(source, indexOptions);
    this.gitOptions = git ?? {};
  }

  /** Build from a URL, deriving the name from it unless one is given. */
  static fromUrl(
    url: string,
    reposDir?: string,
    options: GithubRepositoryOptions & { name?: string } = {},
  ): GithubRepository {
    const { name, ...rest } = options;
    return new GithubRepository(parseRepositorySource(name ?? repositoryNameFromUrl(url), url, reposDir), rest);
  }

  protected async acquire(): Promise<void> {
    await acquireWithGit(this.source.url, this.source.path, this.gitOptions);
  }
}
