/**
 * Per-file-type fingerprint extraction.
 *
 * Dispatch is by suffix:
 *   .json .yaml .yml   structured document → items
 *   .jsonl             one JSON value per non-blank line
 *   .txt .md           paragraphs plus the whole document
 * Other suffixes yield nothing.
 */

import { extname } from "node:path";
import yaml from "yaml";
import type { Fingerprinter } from "./fingerprint.js";

/**
 * Candidate list keys, in priority order. The first one holding a list
 * wins; later keys are ignored even when they also hold lists.
 */
export const LIST_KEYS = [
  "items",
  "examples",
  "prompts",
  "test_cases",
  "records",
] as const;

export const SUPPORTED_SUFFIXES: ReadonlySet<string> = new Set([
  ".json",
  ".yaml",
  ".yml",
  ".jsonl",
  ".txt",
  ".md",
]);

export function isSupportedFile(path: string): boolean {
  return SUPPORTED_SUFFIXES.has(extname(path));
}

/** The test items a structured document carries. */
export function extractItems(data: unknown): unknown[] {
  if (data === null || data === undefined) return [];
  if (Array.isArray(data)) {
    const items: unknown[] = data;
    return items;
  }
  if (typeof data === "object") {
    for (const key of LIST_KEYS) {
      const value: unknown = Reflect.get(data, key);
      if (Array.isArray(value)) {
        const items: unknown[] = value;
        return items;
      }
    }
  }
  return [data];
}

function collect(values: Iterable<unknown>, fp: Fingerprinter): string[] {
  const out: string[] = [];
  for (const value of values) {
    const fingerprint = fp.value(value);
    if (fingerprint !== null) out.push(fingerprint);
  }
  return out;
}

export function fingerprintStructured(data: unknown, fp: Fingerprinter): string[] {
  return collect(extractItems(data), fp);
}

export function fingerprintJsonLines(text: string, fp: Fingerprinter): string[] {
  const values: unknown[] = [];
  for (const line of text.split(/\r\n|\r|\n/)) {
    if (line.trim() === "") continue;
    try {
      values.push(JSON.parse(line));
    } catch {
      values.push(line);
    }
  }
  return collect(values, fp);
}

export function fingerprintTextDocument(text: string, fp: Fingerprinter): string[] {
  const normalized = text.replace(/\r\n?/g, "\n");
  const out: string[] = [];
  for (const paragraph of normalized.split(/\n\s*\n/)) {
    const fingerprint = fp.textBlock(paragraph);
    if (fingerprint !== null) out.push(fingerprint);
  }
  const whole = fp.textBlock(normalized);
  if (whole !== null) out.push(whole);
  return out;
}

/**
 * Fingerprints for a file's content, chosen by the file's suffix.
 * Throws on structured documents that fail to parse.
 */
export function fingerprintFileContent(
  path: string,
  content: string,
  fp: Fingerprinter,
): string[] {
  switch (extname(path)) {
    case ".json":
      return fingerprintStructured(JSON.parse(content), fp);
    case ".yaml":
    case ".yml":
      return fingerprintStructured(yaml.parse(content), fp);
    case ".jsonl":
      return fingerprintJsonLines(content, fp);
    case ".txt":
    case ".md":
      return fingerprintTextDocument(content, fp);
    default:
      return [];
  }
}
