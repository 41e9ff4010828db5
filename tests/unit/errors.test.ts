import { describe, expect, it } from "vitest";
import {
  AcquisitionError,
  ConfigParseError,
  errorCode,
  FilesystemError,
  isRecklessError,
  RecklessError,
} from "../../src/errors.js";
import { resolveLogLevel } from "../../src/logger.js";

describe("error taxonomy", () => {
  it("gives each kind its own message and discriminator", () => {
    const cause = new Error("boom");
    const errors = [
      new AcquisitionError("https://x/y.git", "boom", { cause }),
      new FilesystemError("/tmp/x", "boom", { cause }),
      new ConfigParseError("/tmp/x/reckless.yaml", "boom", { cause }),
    ];

    expect(errors.map((e) => [e.name, e.kind, e.message])).toEqual([
      ["AcquisitionError", "acquisition", "Repository acquisition failed for https://x/y.git: boom"],
      ["FilesystemError", "filesystem", "Filesystem error at /tmp/x: boom"],
      ["ConfigParseError", "config-parse", "Invalid plugin configuration /tmp/x/reckless.yaml: boom"],
    ]);
    for (const error of errors) {
      expect(error).toBeInstanceOf(RecklessError);
      expect(error.cause).toBe(cause);
    }
  });

  it("recognises its own errors only", () => {
    expect(isRecklessError(new FilesystemError("/", "x"))).toBe(true);
    expect(isRecklessError(new Error("x"))).toBe(false);
    expect(isRecklessError("x")).toBe(false);
  });

  it("reads Node error codes", () => {
    expect(errorCode(Object.assign(new Error("missing"), { code: "ENOENT" }))).toBe("ENOENT");
    expect(errorCode(new Error("plain"))).toBeUndefined();
    expect(errorCode({ code: "ENOENT" })).toBeUndefined();
  });
});

describe("resolveLogLevel", () => {
  it("accepts known levels case-insensitively", () => {
    expect(resolveLogLevel("DEBUG")).toBe("debug");
    expect(resolveLogLevel(" warn ")).toBe("warn");
  });

  it("defaults to info", () => {
    expect(resolveLogLevel(undefined)).toBe("info");
    expect(resolveLogLevel("verbose")).toBe("info");
  });
});
