import { toSegmentRegex } from "./regex.js";
import type { ClassifiedFilters, DecomposedFilter, FolderRoute } from "./types.js";

export const RECURSIVE = "**";

/**
 * Split raw filters into segments, stripping the leading `!`.
 *
 * A filter starting with `**` is emitted twice: as written (matches at any
 * nested depth through folder recursion) and without the `**` (matches in the
 * current directory). Filters with no segments at all (`""`, `"!"`, `"/"`) are
 * skipped.
 */
export function splitFilters(filters: readonly string[]): DecomposedFilter[] {
  const out: DecomposedFilter[] = [];
  for (const raw of filters) {
    const excludes = raw.startsWith("!");
    const body = excludes ? raw.slice(1) : raw;
    const segments = body.split("/").filter(Boolean);
    if (!segments.length) continue;
    out.push({ segments, excludes });
    if (segments[0] === RECURSIVE && segments.length > 1) {
      out.push({ segments: segments.slice(1), excludes });
    }
  }
  return out;
}

/**
 * Partition decomposed filters into the file-level and folder-level views used
 * by one directory-resolution call.
 *
 * Every folder filter, inclusive or not, becomes a route; only inclusive
 * selectors decide which subdirectories get walked.
 */
export function classifyFilters(decomposed: readonly DecomposedFilter[]): ClassifiedFilters {
  const fileFilters = new Set<string>();
  const includedFolders = new Set<string>();
  const folderRoutes: FolderRoute[] = [];

  for (const { segments, excludes } of decomposed) {
    const selector = segments[0];
    const negation = excludes ? "!" : "";
    if (segments.length === 1) {
      fileFilters.add(negation + selector);
      continue;
    }
    // `**` stays in the rewritten filter so the recursion keeps descending
    const joinStart = selector === RECURSIVE ? 0 : 1;
    const rewritten = `${negation}/${segments.slice(joinStart).join("/")}`;
    folderRoutes.push({ regex: toSegmentRegex(selector), filter: rewritten });
    if (!excludes) includedFolders.add(selector);
  }

  // a segment reached through `/` that starts with `!` still excludes
  const serialized = Array.from(fileFilters);
  return {
    includedFiles: serialized.filter((f) => !f.startsWith("!")),
    excludedFiles: serialized.filter((f) => f.startsWith("!")).map((f) => toSegmentRegex(f)),
    includedFolders: Array.from(includedFolders),
    folderRoutes,
  };
}
