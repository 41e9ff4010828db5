import { symlinkSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { ConfigParseError, FilesystemError } from "../../src/errors.js";
import { indexPlugin, indexRepository, resolveLanguage } from "../../src/indexer/index-builder.js";
import { makeTmpDir, removeTmpDir, writeTree } from "../mocks/fs-tree.js";

describe("indexRepository", () => {
  let root: string;

  beforeEach(() => {
    root = makeTmpDir();
  });

  afterEach(() => {
    removeTmpDir(root);
  });

  it("returns an empty index for an empty root", async () => {
    expect(await indexRepository(root)).toEqual([]);
  });

  it("returns an empty index when every child is hidden", async () => {
    writeTree(root, { ".git/HEAD": "ref", ".github/workflows/ci.yml": "on: push" });
    expect(await indexRepository(root)).toEqual([]);
  });

  it("indexes each visible top-level directory in sorted order", async () => {
    writeTree(root, {
      "alpha/go.mod": "module alpha",
      ".hidden/package.json": "{}",
      "beta/": "",
    });

    expect(await indexRepository(root)).toEqual([
      { name: "alpha", path: join(root, "alpha"), language: "go" },
      { name: "beta", path: join(root, "beta"), language: "unknown" },
    ]);
  });

  it("ignores regular files at the root", async () => {
    writeTree(root, { "README.md": "# plugins", "LICENSE": "MIT", "one/requirements.txt": "" });
    const plugins = await indexRepository(root);
    expect(plugins.map((p) => p.name)).toEqual(["one"]);
  });

  it("indexes symlinks that point at directories", async () => {
    const outside = makeTmpDir("reckless-linked-");
    try {
      writeTree(outside, { "go.mod": "module linked", "notes.txt": "" });
      writeTree(root, { "alpha/": "" });
      symlinkSync(outside, join(root, "linked"));
      symlinkSync(join(outside, "notes.txt"), join(root, "notes.txt"));

      expect(await indexRepository(root)).toEqual([
        { name: "alpha", path: join(root, "alpha"), language: "unknown" },
        { name: "linked", path: join(root, "linked"), language: "go" },
      ]);
    } finally {
      removeTmpDir(outside);
    }
  });

  it("aborts with FilesystemError on a dangling symlink", async () => {
    const target = join(root, "gone");
    symlinkSync(target, join(root, "dangling"));
    const error = await indexRepository(root).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(FilesystemError);
    expect(error).toMatchObject({ path: join(root, "dangling") });
  });

  it("attaches the parsed configuration", async () => {
    writeTree(root, {
      "summary/requirements.txt": "pyln-client",
      "summary/reckless.yaml": "plugin:\n  name: summary\n  main: summary.py\n",
    });
    const [plugin] = await indexRepository(root);
    expect(plugin.config).toEqual({ plugin: { name: "summary", main: "summary.py" } });
    expect(plugin.language).toBe("python");
  });

  it("produces equal but independent indexes on repeated runs", async () => {
    writeTree(root, { "a/go.mod": "", "b/reckless.yml": "plugin:\n  lang: dart\n" });
    const first = await indexRepository(root);
    const second = await indexRepository(root);
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
    expect(second[0]).not.toBe(first[0]);
  });

  it("freezes plugin records", async () => {
    writeTree(root, { "a/": "" });
    const [plugin] = await indexRepository(root);
    expect(Object.isFrozen(plugin)).toBe(true);
  });

  it("aborts the whole pass on a broken configuration", async () => {
    writeTree(root, {
      "a/go.mod": "",
      "b/reckless.yaml": "plugin: [oops\n",
      "c/package.json": "{}",
    });
    await expect(indexRepository(root)).rejects.toBeInstanceOf(ConfigParseError);
  });

  it("aborts with FilesystemError when the root is missing", async () => {
    await expect(indexRepository(join(root, "missing"))).rejects.toBeInstanceOf(FilesystemError);
  });

  describe("language precedence", () => {
    beforeEach(() => {
      writeTree(root, {
        "gamma/package.json": "{}",
        "gamma/reckless.yaml": "plugin:\n  lang: python\n",
      });
    });

    it("lets a configured language win by default", async () => {
      const plugin = await indexPlugin(join(root, "gamma"));
      expect(plugin.language).toBe("python");
    });

    it("keeps the detected language under the detected policy", async () => {
      const plugin = await indexPlugin(join(root, "gamma"), { languagePrecedence: "detected" });
      expect(plugin.language).toBe("javascript");
      expect(plugin.config).toEqual({ plugin: { lang: "python" } });
    });
  });
});

describe("resolveLanguage", () => {
  it("falls back to detection when the configured language is unknown", () => {
    expect(resolveLanguage("go", { plugin: { lang: "cobol" } }, "config")).toBe("go");
  });

  it("falls back to detection without configuration", () => {
    expect(resolveLanguage("rust", undefined, "config")).toBe("rust");
  });

  it("uses a recognised configured language", () => {
    expect(resolveLanguage("unknown", { plugin: { lang: "TypeScript" } }, "config")).toBe("typescript");
  });

  it("ignores configuration under the detected policy", () => {
    expect(resolveLanguage("unknown", { plugin: { lang: "go" } }, "detected")).toBe("unknown");
  });
});
