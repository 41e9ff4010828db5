import { stat } from "node:fs/promises";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { AcquisitionError, errorMessage } from "../errors.js";
import type { IndexOptions } from "../indexer/index-builder.js";
import { IndexedRepository } from "./repository.js";

/**
 * A repository that is already on disk. Acquisition only checks that the
 * directory is there.
 */
export class LocalRepository extends IndexedRepository {
  constructor(name: string, path: string, options: IndexOptions = {}) {
    const absolute = resolve(path);
    super({ name, url: pathToFileURL(absolute).href, path: absolute }, options);
  }

  protected async acquire(): Promise<void> {
    const { url, path } = this.source;
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(path)).isDirectory();
    } catch (err) {
      throw new AcquisitionError(url, errorMessage(err), { cause: err });
    }
    if (!isDirectory) {
      throw new AcquisitionError(url, `${path} is not a directory`);
    }
  }
}
