/**
 * SHA-256 content identity for structured artifacts and files.
 *
 * Hash strings have the form `<algorithm>:<lowercase-hex>`. Comparisons
 * accept a bare hex digest on either side; output is always prefixed.
 */

import { createHash } from "node:crypto";
import { closeSync, openSync, readSync } from "node:fs";
import { canonicalBytes } from "./canonical.js";
import { isDataFile, loadDataFile } from "./data-file.js";

/** `"<algorithm>:<hex>"`, e.g. `sha256:e3b0…`. */
export type HashValue = string;

export type HashAlgorithm = "sha256" | "hmacsha256";

export const SHA256_PREFIX = "sha256:";

const FILE_CHUNK_BYTES = 8192;

const PREFIX_RE = /^[a-z0-9_-]+:/i;

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

/** SHA-256 hex digest of a UTF-8 string. */
export function sha256Hex(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

/** SHA-256 hex digest of raw bytes. */
export function sha256Bytes(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

// ---------------------------------------------------------------------------
// Content identity
// ---------------------------------------------------------------------------

/**
 * Provenance hash of a JSON-like value: SHA-256 over its ASCII-escaped
 * canonical form.
 *
 * Throws NotSerializableError for values without a canonical form.
 */
export function contentHash(value: unknown): HashValue {
  return SHA256_PREFIX + sha256Bytes(canonicalBytes(value, "ascii"));
}

/**
 * Hash a file.
 *
 * Structured data files (.json/.yaml/.yml) are parsed and hashed by content,
 * so whitespace and key order never change their identity. Everything else
 * is streamed through SHA-256 in fixed-size chunks.
 */
export function fileHash(path: string): HashValue {
  if (isDataFile(path)) {
    return contentHash(loadDataFile(path));
  }
  return SHA256_PREFIX + rawFileDigest(path);
}

function rawFileDigest(path: string): string {
  const hash = createHash("sha256");
  const buf = Buffer.alloc(FILE_CHUNK_BYTES);
  const fd = openSync(path, "r");
  try {
    let read = readSync(fd, buf, 0, FILE_CHUNK_BYTES, null);
    while (read > 0) {
      hash.update(buf.subarray(0, read));
      read = readSync(fd, buf, 0, FILE_CHUNK_BYTES, null);
    }
  } finally {
    closeSync(fd);
  }
  return hash.digest("hex");
}

// ---------------------------------------------------------------------------
// Comparison
// ---------------------------------------------------------------------------

/** Strip an optional `algo:` prefix. Absent or empty input yields "". */
export function normalizeHash(value: string | null | undefined): string {
  if (!value) return "";
  return value.replace(PREFIX_RE, "");
}

/**
 * Compare a claimed hash against a computed one.
 *
 * Returns false when either side is absent or empty; never vacuously true.
 */
export function verifyHash(
  expected: string | null | undefined,
  actual: string | null | undefined,
): boolean {
  const a = normalizeHash(expected);
  const b = normalizeHash(actual);
  if (a === "" || b === "") return false;
  return a === b;
}
