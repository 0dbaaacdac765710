import path from "node:path";
import { DirectoryNotFoundError, InvalidArgumentError } from "./errors.js";
import { classifyFilters, splitFilters } from "./filters.js";
import { anyMatch, hasWildcards, toSegmentRegex } from "./regex.js";
import type { FolderRoute, MatchedFile } from "./types.js";
import { entryKind, readEntries } from "./utils.js";

/**
 * Resolve `filters` against the directory tree under `root` and return every
 * matching file once.
 *
 * @throws InvalidArgumentError when `filters` is not a list of strings or `root` is blank
 * @throws DirectoryNotFoundError when `root` is not an existing directory
 */
export function resolveFiles(filters: readonly string[], root: string): MatchedFile[] {
  return Array.from(iterateFiles(filters, root));
}

/**
 * Same as {@link resolveFiles}, but yields matches as the tree is walked.
 * Arguments are validated when this is called, before the first `next()`.
 */
export function iterateFiles(filters: readonly string[], root: string): IterableIterator<MatchedFile> {
  const dir = validateArguments(filters, root);
  return uniqueByPath(filesUnder(filters, dir));
}

function validateArguments(filters: unknown, root: unknown): string {
  if (!Array.isArray(filters)) {
    throw new InvalidArgumentError("filters", "filters must be an array of strings");
  }
  if (filters.some((f) => typeof f !== "string")) {
    throw new InvalidArgumentError("filters", "every filter must be a string");
  }
  if (typeof root !== "string" || root.trim() === "") {
    throw new InvalidArgumentError("root", "root must be a non-blank path");
  }
  const dir = path.resolve(root);
  if (entryKind(dir) !== "directory") throw new DirectoryNotFoundError(dir);
  return dir;
}

function* uniqueByPath(files: Iterable<MatchedFile>): Generator<MatchedFile, void, undefined> {
  const seen = new Set<string>();
  for (const f of files) {
    if (seen.has(f.path)) continue;
    seen.add(f.path);
    yield f;
  }
}

// One directory-resolution call: file filters first, then folder recursion.
function* filesUnder(filters: readonly string[], dir: string): Generator<MatchedFile, void, undefined> {
  if (!filters.length) return;
  const { includedFiles, excludedFiles, includedFolders, folderRoutes } = classifyFilters(splitFilters(filters));

  for (const filter of includedFiles) {
    yield* filesByFileFilter(dir, filter, excludedFiles);
  }
  for (const selector of includedFolders) {
    yield* filesByFolderFilter(dir, selector, folderRoutes);
  }
}

export function rewrittenFiltersFor(dirName: string, routes: readonly FolderRoute[]): string[] {
  return routes.filter((r) => r.regex.test(dirName)).map((r) => r.filter);
}

export function* filesByFolderFilter(
  root: string,
  selector: string,
  routes: readonly FolderRoute[],
): Generator<MatchedFile, void, undefined> {
  if (!hasWildcards(selector)) {
    const dir = path.join(root, selector);
    if (entryKind(dir) !== "directory") return;
    yield* filesUnder(rewrittenFiltersFor(path.basename(dir), routes), dir);
    return;
  }

  const regex = toSegmentRegex(selector);
  for (const entry of readEntries(root)) {
    if (entry.kind !== "directory" || !regex.test(entry.name)) continue;
    yield* filesUnder(rewrittenFiltersFor(entry.name, routes), entry.path);
  }
}

export function* filesByFileFilter(
  root: string,
  filter: string,
  exclusions: readonly RegExp[],
): Generator<MatchedFile, void, undefined> {
  if (!hasWildcards(filter)) {
    const file = path.join(root, filter);
    const name = path.basename(file);
    if (entryKind(file) === "file" && !anyMatch(exclusions, name)) yield { path: file, name };
    return;
  }

  const regex = toSegmentRegex(filter);
  for (const entry of readEntries(root)) {
    if (entry.kind !== "file") continue;
    if (regex.test(entry.name) && !anyMatch(exclusions, entry.name)) {
      yield { path: entry.path, name: entry.name };
    }
  }
}
