import { describe, it, expect } from "vitest";
import { classifyFilters, splitFilters } from "../filters.js";
import { rewrittenFiltersFor } from "../resolve.js";

describe("splitFilters", () => {
  it("drops empty components and the cosmetic leading slash", () => {
    expect(splitFilters(["/a//b/"])).toEqual([{ segments: ["a", "b"], excludes: false }]);
  });

  it("strips ! and marks the filter as excluding", () => {
    expect(splitFilters(["!test_0.txt"])).toEqual([{ segments: ["test_0.txt"], excludes: true }]);
  });

  it("adds a depth-stripped copy of a leading **", () => {
    expect(splitFilters(["!**/x.txt"])).toEqual([
      { segments: ["**", "x.txt"], excludes: true },
      { segments: ["x.txt"], excludes: true },
    ]);
  });

  it("keeps a lone ** as a single-segment filter", () => {
    expect(splitFilters(["**"])).toEqual([{ segments: ["**"], excludes: false }]);
  });

  it("skips filters without segments", () => {
    expect(splitFilters(["", "!", "/", "!//"])).toEqual([]);
  });

  it("only expands ** in first position", () => {
    expect(splitFilters(["a/**/x"])).toEqual([{ segments: ["a", "**", "x"], excludes: false }]);
  });
});

describe("classifyFilters", () => {
  const classified = classifyFilters(
    splitFilters(["*.txt", "!test_0.txt", "src/*.ts", "!src/gen.ts", "**/index.html"]),
  );

  it("partitions single-segment filters into included names and exclusion regexes", () => {
    expect(classified.includedFiles).toEqual(["*.txt", "index.html"]);
    expect(classified.excludedFiles).toHaveLength(1);
    expect(classified.excludedFiles[0].test("test_0.txt")).toBe(true);
    expect(classified.excludedFiles[0].test("test_1.txt")).toBe(false);
  });

  it("selects folders from inclusive folder filters only", () => {
    expect(classified.includedFolders).toEqual(["src", "**"]);
  });

  it("rewrites folder filters, keeping ** and the exclusion marker", () => {
    expect(classified.folderRoutes.map((r) => r.filter)).toEqual(["/*.ts", "!/gen.ts", "/**/index.html"]);
  });

  it("deduplicates file filters and folder selectors", () => {
    const c = classifyFilters(splitFilters(["a.txt", "a.txt", "/a.txt", "d/x", "d/y"]));
    expect(c.includedFiles).toEqual(["a.txt"]);
    expect(c.includedFolders).toEqual(["d"]);
    expect(c.folderRoutes.map((r) => r.filter)).toEqual(["/x", "/y"]);
  });

  it("treats a file segment starting with ! as an exclusion even behind a slash", () => {
    const c = classifyFilters(splitFilters(["*.txt", "/!a.txt"]));
    expect(c.includedFiles).toEqual(["*.txt"]);
    expect(c.excludedFiles).toHaveLength(1);
    expect(c.excludedFiles[0].test("a.txt")).toBe(true);
  });

  it("keeps a lone ** out of the folder filters", () => {
    const c = classifyFilters(splitFilters(["**"]));
    expect(c.includedFiles).toEqual(["**"]);
    expect(c.folderRoutes).toEqual([]);
  });
});

describe("rewrittenFiltersFor", () => {
  const { folderRoutes } = classifyFilters(splitFilters(["src/*.ts", "!src/gen.ts", "**/index.html", "lib?/*.js"]));

  it("collects every route whose selector matches, in order", () => {
    expect(rewrittenFiltersFor("src", folderRoutes)).toEqual(["/*.ts", "!/gen.ts", "/**/index.html"]);
    expect(rewrittenFiltersFor("lib2", folderRoutes)).toEqual(["/**/index.html", "/*.js"]);
  });

  it("returns nothing when no selector matches", () => {
    expect(rewrittenFiltersFor("src", [])).toEqual([]);
  });
});
