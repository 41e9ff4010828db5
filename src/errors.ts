/**
 * Error taxonomy for acquisition and indexing.
 *
 * Every failure aborts the whole `init` / index pass; the `kind`
 * discriminator lets callers report each case with its own message.
 */

export type RecklessErrorKind = "acquisition" | "filesystem" | "config-parse";

export class RecklessError extends Error {
  constructor(
    message: string,
    public readonly kind: RecklessErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RecklessError";
  }
}

/** The repository could not be fetched (network, auth, path conflict). */
export class AcquisitionError extends RecklessError {
  constructor(
    public readonly url: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Repository acquisition failed for ${url}: ${detail}`, "acquisition", options);
    this.name = "AcquisitionError";
  }
}

/** A directory could not be enumerated or a file could not be read. */
export class FilesystemError extends RecklessError {
  constructor(
    public readonly path: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Filesystem error at ${path}: ${detail}`, "filesystem", options);
    this.name = "FilesystemError";
  }
}

/** A configuration file exists but does not parse. */
export class ConfigParseError extends RecklessError {
  constructor(
    public readonly path: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Invalid plugin configuration ${path}: ${detail}`, "config-parse", options);
    this.name = "ConfigParseError";
  }
}

export function isRecklessError(value: unknown): value is RecklessError {
  return value instanceof RecklessError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node system errors carry a string `code` such as ENOENT. */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
