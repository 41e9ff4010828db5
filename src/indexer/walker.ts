/**
 * Directory enumeration shared by plugin discovery and marker scanning.
 *
 * Hidden entries (leading dot) are skipped and never descended into.
 * Siblings are yielded in code-unit order of their names so that every
 * "last match wins" fold downstream is stable across platforms.
 */

import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { errorMessage, FilesystemError } from "../errors.js";

export type EntryKind = "file" | "directory" | "symlink" | "other";

export interface WalkEntry {
  name: string;
  path: string;
  /** 1 for immediate children of the root */
  depth: number;
  kind: EntryKind;
}

export function isHidden(name: string): boolean {
  return name.startsWith(".");
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function entryKind(dirent: Dirent): EntryKind {
  if (dirent.isDirectory()) return "directory";
  if (dirent.isFile()) return "file";
  if (dirent.isSymbolicLink()) return "symlink";
  return "other";
}

async function readEntries(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err) {
    throw new FilesystemError(dir, errorMessage(err), { cause: err });
  }
}

/**
 * Lazily walk `root` down to `maxDepth` levels, pre-order. The root
 * itself is not yielded. Any unreadable directory throws a
 * FilesystemError and ends the walk.
 */
export async function* walkDirectory(root: string, maxDepth = 1): AsyncGenerator<WalkEntry> {
  if (maxDepth < 1) return;
  yield* walkLevel(root, 1, maxDepth);
}

async function* walkLevel(dir: string, depth: number, maxDepth: number): AsyncGenerator<WalkEntry> {
  const dirents = (await readEntries(dir))
    .filter((d) => !isHidden(d.name))
    .sort((a, b) => compareNames(a.name, b.name));

  for (const dirent of dirents) {
    const entry: WalkEntry = {
      name: dirent.name,
      path: join(dir, dirent.name),
      depth,
      kind: entryKind(dirent),
    };
    yield entry;
    if (entry.kind === "directory" && depth < maxDepth) {
      yield* walkLevel(entry.path, depth + 1, maxDepth);
    }
  }
}

/** Collect a walk into an array. */
export async function listDirectory(root: string, maxDepth = 1): Promise<WalkEntry[]> {
  const entries: WalkEntry[] = [];
  for await (const entry of walkDirectory(root, maxDepth)) {
    entries.push(entry);
  }
  return entries;
}
