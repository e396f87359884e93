/**
 * Structured data file loading (JSON / YAML).
 */

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { extname, join } from "node:path";
import yaml from "yaml";

/** Suffixes whose content is parsed before hashing or inspection. */
export const DATA_SUFFIXES: ReadonlySet<string> = new Set([
  ".json",
  ".yaml",
  ".yml",
]);

export function isDataFile(path: string): boolean {
  return DATA_SUFFIXES.has(extname(path).toLowerCase());
}

/**
 * Parse a `.json`, `.yaml` or `.yml` file.
 *
 * Throws on unsupported suffixes and on parse errors.
 */
export function loadDataFile(path: string): unknown {
  const suffix = extname(path).toLowerCase();
  const content = readFileSync(path, "utf8");
  if (suffix === ".json") {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  }
  if (suffix === ".yaml" || suffix === ".yml") {
    const parsed: unknown = yaml.parse(content);
    return parsed;
  }
  throw new Error(`Unsupported data file suffix: ${suffix || "(none)"}`);
}

/**
 * Recursively list the regular files under `dir`, sorted by path.
 * A missing directory yields an empty list.
 */
export function listFilesRecursive(dir: string): string[] {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) return [];
  const files: string[] = [];
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
  );
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listFilesRecursive(full));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files.sort();
}

/** Data files under `dir`, recursively, sorted. */
export function listDataFiles(dir: string): string[] {
  return listFilesRecursive(dir).filter(isDataFile);
}
