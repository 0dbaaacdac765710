export { resolveFiles, iterateFiles } from "./resolve.js";
export { splitFilters, classifyFilters } from "./filters.js";
export { toSegmentRegex, hasWildcards } from "./regex.js";
export { loadConfig, parseConfig, readFiltersFile, parseFilterLines } from "./config.js";
export { FilterError, InvalidArgumentError, DirectoryNotFoundError, ConfigError } from "./errors.js";
export type { MatchedFile, DecomposedFilter, FolderRoute, ClassifiedFilters, WildfilterConfig } from "./types.js";
