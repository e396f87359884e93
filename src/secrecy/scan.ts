/**
 * Corpus scanning over protected directories.
 *
 * Each file is fingerprinted independently into a local result; results are
 * merged once at the end into the global fingerprint set and the
 * fingerprint → files index. A file that cannot be read or parsed becomes a
 * soft error and the walk continues. Callers must treat a non-empty error
 * list as an inconclusive audit.
 */

import { readFileSync } from "node:fs";
import { join, relative, sep } from "node:path";
import { listFilesRecursive } from "../audit/data-file.js";
import { silentLogger, type Logger } from "../runtime/logger.js";
import { isSupportedFile, fingerprintFileContent } from "./extract.js";
import {
  createFingerprinter,
  type FingerprintOptions,
  type Fingerprinter,
} from "./fingerprint.js";
import type { HashingScheme } from "./scheme.js";

export const DEFAULT_PROTECTED_PATHS: readonly string[] = [
  "training/data/",
  "training/corpora/",
  "culture/chronicle/training_data/",
  "prompts/",
  "prompt_libraries/",
];

export interface FileScanResult {
  /** Path relative to the scan root, `/`-separated. */
  file: string;
  fingerprints: string[];
  error: string | null;
}

export interface ScanResult {
  fingerprints: Set<string>;
  /** fingerprint → files that produced it */
  sources: Map<string, Set<string>>;
  scannedFiles: string[];
  errors: string[];
}

export interface ScanOptions extends FingerprintOptions {
  /** Directories relative to the root. Defaults to DEFAULT_PROTECTED_PATHS. */
  paths?: readonly string[];
  logger?: Logger;
}

function toPosix(path: string): string {
  return path.split(sep).join("/");
}

export function scanFile(
  root: string,
  absolutePath: string,
  fp: Fingerprinter,
): FileScanResult {
  const file = toPosix(relative(root, absolutePath));
  try {
    const content = readFileSync(absolutePath, "utf8");
    return { file, fingerprints: fingerprintFileContent(absolutePath, content, fp), error: null };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { file, fingerprints: [], error: `${file}: ${message}` };
  }
}

export function mergeScanResults(results: readonly FileScanResult[]): ScanResult {
  const merged: ScanResult = {
    fingerprints: new Set(),
    sources: new Map(),
    scannedFiles: [],
    errors: [],
  };
  for (const result of results) {
    merged.scannedFiles.push(result.file);
    if (result.error !== null) merged.errors.push(result.error);
    for (const fingerprint of result.fingerprints) {
      merged.fingerprints.add(fingerprint);
      let files = merged.sources.get(fingerprint);
      if (files === undefined) {
        files = new Set();
        merged.sources.set(fingerprint, files);
      }
      files.add(result.file);
    }
  }
  return merged;
}

/**
 * Walk the protected directories under `root` and fingerprint every
 * supported file.
 *
 * Throws FingerprintError up front when the scheme needs an HMAC key that
 * the provider does not have. Missing directories are skipped.
 */
export function scanProtectedPaths(
  root: string,
  scheme: HashingScheme,
  options: ScanOptions = {},
): ScanResult {
  const logger = options.logger ?? silentLogger;
  const fp = createFingerprinter(scheme, options);
  const paths = options.paths ?? DEFAULT_PROTECTED_PATHS;

  const results: FileScanResult[] = [];
  for (const relPath of paths) {
    const files = listFilesRecursive(join(root, relPath)).filter(isSupportedFile);
    for (const file of files) {
      const result = scanFile(root, file, fp);
      if (result.error !== null) {
        logger.warn("Protected file could not be scanned", { error: result.error });
      }
      results.push(result);
    }
  }

  const merged = mergeScanResults(results);
  logger.debug("Protected path scan complete", {
    files: merged.scannedFiles.length,
    fingerprints: merged.fingerprints.size,
    errors: merged.errors.length,
  });
  return merged;
}
