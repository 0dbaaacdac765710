import fs from "node:fs/promises";
import * as fss from "node:fs";
import path from "node:path";
import type { DirEntry, EntryKind } from "./types.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export async function ensureDir(p: string) {
  await fs.mkdir(p, { recursive: true });
}

// Follows symlinks. null when nothing (or a dangling link) is there.
export function entryKind(p: string): EntryKind | null {
  const st = fss.statSync(p, { throwIfNoEntry: false });
  if (!st) return null;
  if (st.isDirectory()) return "directory";
  if (st.isFile()) return "file";
  return "other";
}

/**
 * Lazily read the immediate children of `dir`. Symlinks are reported as the
 * kind of their target; dangling ones are left out. Errors opening or reading
 * the directory are thrown to the caller.
 */
export function* readEntries(dir: string): Generator<DirEntry, void, undefined> {
  const handle = fss.opendirSync(dir);
  try {
    let entry: fss.Dirent | null;
    while ((entry = handle.readSync()) !== null) {
      const full = path.join(dir, entry.name);
      let kind: EntryKind | null;
      if (entry.isSymbolicLink()) kind = entryKind(full);
      else if (entry.isDirectory()) kind = "directory";
      else if (entry.isFile()) kind = "file";
      else kind = "other";
      if (kind) yield { name: entry.name, path: full, kind };
    }
  } finally {
    handle.closeSync();
  }
}

export function toPosix(p: string) {
  return p.split(path.sep).join("/");
}

export function relativePosix(root: string, p: string) {
  return toPosix(path.relative(root, p));
}

// True when `p` is `dir` itself or lies somewhere below it.
export function isInside(dir: string, p: string) {
  const rel = path.relative(path.resolve(dir), path.resolve(p));
  return rel === "" || (rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel));
}

export async function copyFileInto(src: string, destDir: string, relPath: string) {
  const target = path.join(destDir, relPath);
  await ensureDir(path.dirname(target));
  await fs.copyFile(src, target);
  return target;
}
