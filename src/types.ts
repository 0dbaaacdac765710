// A raw filter split into its `/`-separated segments. `segments` is never empty.
export type DecomposedFilter = {
  segments: readonly string[];
  excludes: boolean;
};

// Routes a matched subdirectory to the filter that applies inside it.
export type FolderRoute = {
  regex: RegExp;
  // rewritten filter, `/`-anchored, `!`-prefixed when it excludes
  filter: string;
};

export type ClassifiedFilters = {
  includedFiles: string[];
  excludedFiles: RegExp[];
  includedFolders: string[];
  folderRoutes: FolderRoute[];
};

export type MatchedFile = {
  // absolute
  path: string;
  name: string;
};

export type EntryKind = "file" | "directory" | "other";

export type DirEntry = {
  name: string;
  path: string;
  kind: EntryKind;
};

export type WildfilterConfig = {
  root?: string;
  filters: string[];
  // file the config was read from, absent when no file was found
  source?: string;
};
