import path from "node:path";
import fs from "node:fs/promises";
import * as fss from "node:fs";
import YAML from "yaml";
import { ConfigError } from "./errors.js";
import type { WildfilterConfig } from "./types.js";
import { isRecord } from "./utils.js";

export const CONFIG_ENV = "WILDFILTER_CONFIG";
export const CONFIG_FILENAMES = [".wildfilter.yml", ".wildfilter.yaml"];

function stringList(v: unknown, key: string, source: string): string[] {
  if (!Array.isArray(v)) throw new ConfigError(`'${key}' must be a list of strings`, source);
  const out: string[] = [];
  for (const item of v) {
    if (typeof item !== "string") throw new ConfigError(`'${key}' must be a list of strings`, source);
    out.push(item);
  }
  return out;
}

export function resolveConfigPath(cwd = process.cwd(), env: NodeJS.ProcessEnv = process.env): string | null {
  const fromEnv = (env[CONFIG_ENV] || "").trim();
  if (fromEnv) return path.resolve(cwd, fromEnv);
  for (const name of CONFIG_FILENAMES) {
    const p = path.join(cwd, name);
    if (fss.existsSync(p)) return p;
  }
  return null;
}

/**
 * Validate a parsed config document. `root` is resolved against the directory
 * holding the config file.
 */
export function parseConfig(doc: unknown, source: string): WildfilterConfig {
  if (doc == null) return { filters: [], source };
  if (!isRecord(doc)) throw new ConfigError("expected a mapping with 'root' and/or 'filters'", source);

  const config: WildfilterConfig = { filters: [], source };
  if (doc.filters != null) config.filters = stringList(doc.filters, "filters", source);
  const root = doc.root;
  if (root != null) {
    if (typeof root !== "string" || !root.trim()) {
      throw new ConfigError("'root' must be a non-empty string", source);
    }
    config.root = path.resolve(path.dirname(source), root);
  }
  return config;
}

export async function loadConfig(cwd = process.cwd(), env: NodeJS.ProcessEnv = process.env): Promise<WildfilterConfig> {
  const p = resolveConfigPath(cwd, env);
  if (!p) return { filters: [] };
  if (!fss.existsSync(p)) throw new ConfigError("config file not found", p);
  const raw = await fs.readFile(p, "utf8");
  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (e) {
    throw new ConfigError(`invalid YAML (${e instanceof Error ? e.message : String(e)})`, p);
  }
  return parseConfig(doc, p);
}

// One filter per line; blank lines and `#` comments are skipped.
export function parseFilterLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l && !l.startsWith("#"));
}

export async function readFiltersFile(file: string): Promise<string[]> {
  const raw = await fs.readFile(file, "utf8");
  if (!/\.ya?ml$/i.test(file)) return parseFilterLines(raw);

  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (e) {
    throw new ConfigError(`invalid YAML (${e instanceof Error ? e.message : String(e)})`, file);
  }
  if (doc == null) return [];
  if (Array.isArray(doc)) return stringList(doc, "filters", file);
  if (isRecord(doc)) return doc.filters == null ? [] : stringList(doc.filters, "filters", file);
  throw new ConfigError("expected a list of filters", file);
}
