import path from "node:path";
import * as fss from "node:fs";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { loadConfig, readFiltersFile } from "./config.js";
import { resolveFiles } from "./resolve.js";
import { copyFileInto, isInside, isRecord, relativePosix } from "./utils.js";

type CommonOptions = { root?: string; filtersFile?: string; verbose?: boolean };
type ListOptions = CommonOptions & { absolute?: boolean; json?: boolean };
type CopyOptions = CommonOptions & { dryRun?: boolean; silent?: boolean };

export type ProgramOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

type Listed = { path: string; relativePath: string };

// Resolve package version without JSON import attributes
function readVersion(): string {
  const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
  if (!fss.existsSync(pkgPath)) return "0.0.0";
  const pkg: unknown = JSON.parse(fss.readFileSync(pkgPath, "utf8"));
  const version = isRecord(pkg) ? pkg.version : undefined;
  return typeof version === "string" ? version : "0.0.0";
}

function debug(on: boolean | undefined, msg: string) {
  if (on) console.error(`wildfilter: ${msg}`);
}

function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

function byRelativePath(a: Listed, b: Listed) {
  return a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  // config filters, then --filters-file, then positional filters
  async function prepare(positional: string[], opts: CommonOptions) {
    const config = await loadConfig(cwd, env);
    const fromFile = opts.filtersFile ? await readFiltersFile(path.resolve(cwd, opts.filtersFile)) : [];
    const filters = [...config.filters, ...fromFile, ...positional];
    if (!filters.length) {
      throw new Error("no filters given (pass them as arguments, with --filters-file, or in a config file)");
    }
    const root = opts.root ? path.resolve(cwd, opts.root) : (config.root ?? cwd);
    if (config.source) debug(opts.verbose, `config ${config.source}`);
    debug(opts.verbose, `root ${root}`);
    debug(opts.verbose, `filters ${JSON.stringify(filters)}`);
    return { root, filters };
  }

  function listMatches(filters: string[], root: string): Listed[] {
    return resolveFiles(filters, root)
      .map((f) => ({ path: f.path, relativePath: relativePosix(root, f.path) }))
      .sort(byRelativePath);
  }

  const program = new Command();
  program
    .name("wildfilter")
    .description("Select files under a directory with gitignore-style wildcard filters")
    .version(readVersion());

  program
    .command("list")
    .description("Print the files matched by the filters")
    .argument("[filters...]", "filters such as '*.txt', 'src/**/*.ts', '!test_*'")
    .option("-r, --root <dir>", "root directory (default: config root, else cwd)")
    .option("-f, --filters-file <file>", "read additional filters from a file")
    .option("--absolute", "print absolute paths")
    .option("--json", "print a JSON array of { path, relativePath }")
    .option("--verbose", "log the effective root and filters to stderr")
    .action(async (positional: string[], opts: ListOptions) => {
      try {
        const { root, filters } = await prepare(positional, opts);
        const files = listMatches(filters, root);
        debug(opts.verbose, `${files.length} file(s) matched`);
        if (opts.json) {
          console.log(JSON.stringify(files, null, 2));
          return;
        }
        for (const f of files) console.log(opts.absolute ? f.path : f.relativePath);
      } catch (e) {
        console.error(`✖ list failed: ${errorMessage(e)}`);
        process.exitCode = 1;
      }
    });

  program
    .command("copy")
    .description("Copy the matched files into <dest>, keeping their layout relative to the root")
    .argument("<dest>", "destination directory (must not be inside the root)")
    .argument("[filters...]", "filters")
    .option("-r, --root <dir>", "root directory (default: config root, else cwd)")
    .option("-f, --filters-file <file>", "read additional filters from a file")
    .option("--dry-run", "print the copy plan without touching the filesystem")
    .option("--silent", "suppress output on success (errors still shown)")
    .option("--verbose", "log the effective root and filters to stderr")
    .action(async (destArg: string, positional: string[], opts: CopyOptions) => {
      try {
        const { root, filters } = await prepare(positional, opts);
        const dest = path.resolve(cwd, destArg);
        if (isInside(root, dest)) throw new Error(`destination ${dest} is inside root ${root}`);

        const files = listMatches(filters, root);
        for (const f of files) {
          if (opts.dryRun) {
            console.log(`${f.relativePath} -> ${path.join(dest, f.relativePath)}`);
            continue;
          }
          await copyFileInto(f.path, dest, f.relativePath);
          debug(opts.verbose, `copied ${f.relativePath}`);
        }
        if (!opts.silent) {
          console.log(`${opts.dryRun ? "Would copy" : "Copied"} ${files.length} file(s) to ${dest}`);
        }
      } catch (e) {
        console.error(`✖ copy failed: ${errorMessage(e)}`);
        process.exitCode = 1;
      }
    });

  program
    .command("check")
    .description("Tell whether a file (relative to the root) is matched by the filters")
    .argument("<file>", "file path relative to the root")
    .argument("[filters...]", "filters")
    .option("-r, --root <dir>", "root directory (default: config root, else cwd)")
    .option("-f, --filters-file <file>", "read additional filters from a file")
    .option("--verbose", "log the effective root and filters to stderr")
    .action(async (fileArg: string, positional: string[], opts: CommonOptions) => {
      try {
        const { root, filters } = await prepare(positional, opts);
        const target = path.resolve(root, fileArg);
        const hit = resolveFiles(filters, root).some((f) => f.path === target);
        console.log(hit ? "match" : "no match");
        if (!hit) process.exitCode = 2;
      } catch (e) {
        console.error(`✖ check failed: ${errorMessage(e)}`);
        process.exitCode = 1;
      }
    });

  return program;
}
