import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { MatchedFile } from "../types.js";
import { relativePosix } from "../utils.js";

// Create a temp directory holding `files` (posix relative path -> content).
// A trailing `/` creates an empty directory instead.
export async function makeTree(files: string[] | Record<string, string>): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "wildfilter-test-"));
  const entries = Array.isArray(files) ? files.map((f) => [f, f] as const) : Object.entries(files);
  for (const [rel, content] of entries) {
    const abs = path.join(root, ...rel.split("/"));
    if (rel.endsWith("/")) {
      await fs.mkdir(abs, { recursive: true });
      continue;
    }
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content, "utf8");
  }
  return root;
}

export async function removeTree(root: string) {
  await fs.rm(root, { recursive: true, force: true });
}

export function rel(root: string, files: MatchedFile[]): string[] {
  return files.map((f) => relativePosix(root, f.path)).sort();
}
