/**
 * Secret hash registry: the declared fingerprints of secret evaluation
 * suites, and the leak check against a corpus scan.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { sha256Hex, SHA256_PREFIX } from "../audit/hashing.js";
import { formatIssues } from "../runtime/validation.js";
import { FingerprintError } from "./errors.js";
import type { ScanResult } from "./scan.js";
import { HashingScheme } from "./scheme.js";

const REQUIRED_FIELDS = [
  "registry_version",
  "hashing_scheme",
  "suite_registry_hash",
  "suites",
] as const;

export const SecretSuiteEntrySchema = z
  .object({
    suite_id: z.string().min(1),
    test_case_fingerprints: z.array(z.string()).default([]),
    suite_fingerprint_root: z.string().optional(),
    n_test_cases: z.number().int().nonnegative().optional(),
  })
  .passthrough();

export const SecretHashRegistrySchema = z
  .object({
    registry_version: z.union([z.string(), z.number()]),
    hashing_scheme: z.record(z.string(), z.unknown()),
    generated_at: z.string().optional(),
    suite_registry_hash: z.string(),
    suites: z.array(SecretSuiteEntrySchema),
  })
  .passthrough();

export type SecretSuiteEntry = z.infer<typeof SecretSuiteEntrySchema>;
export type SecretHashRegistry = z.infer<typeof SecretHashRegistrySchema>;

export interface LoadedSecretRegistry {
  registry: SecretHashRegistry;
  scheme: HashingScheme;
}

/** Validate an already-parsed registry document. */
export function parseSecretHashRegistry(data: unknown): LoadedSecretRegistry {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new FingerprintError(
      "Secret hash registry must be an object",
      "REGISTRY_INVALID",
    );
  }
  for (const field of REQUIRED_FIELDS) {
    if (!(field in data)) {
      throw new FingerprintError(
        `Secret hash registry missing '${field}'`,
        "REGISTRY_INVALID",
        { field },
      );
    }
  }
  const parsed = SecretHashRegistrySchema.safeParse(data);
  if (!parsed.success) {
    throw new FingerprintError(
      `Secret hash registry is invalid: ${formatIssues(parsed.error)}`,
      "REGISTRY_INVALID",
    );
  }
  return {
    registry: parsed.data,
    scheme: HashingScheme.from(parsed.data.hashing_scheme),
  };
}

export function loadSecretHashRegistry(path: string): LoadedSecretRegistry {
  if (!existsSync(path)) {
    throw new FingerprintError(
      `Secret hash registry not found: ${path}`,
      "REGISTRY_MISSING",
      { path },
    );
  }
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new FingerprintError(
      `Secret hash registry is not valid JSON: ${String(error)}`,
      "REGISTRY_INVALID",
      { path },
    );
  }
  return parseSecretHashRegistry(data);
}

// ---------------------------------------------------------------------------
// Index and leak detection
// ---------------------------------------------------------------------------

export interface SecretFingerprintIndex {
  fingerprints: Set<string>;
  /** fingerprint → suite ids declaring it */
  suites: Map<string, Set<string>>;
}

export function buildSecretFingerprintIndex(
  registry: Pick<SecretHashRegistry, "suites">,
): SecretFingerprintIndex {
  const index: SecretFingerprintIndex = { fingerprints: new Set(), suites: new Map() };
  for (const suite of registry.suites) {
    for (const fingerprint of suite.test_case_fingerprints) {
      index.fingerprints.add(fingerprint);
      let ids = index.suites.get(fingerprint);
      if (ids === undefined) {
        ids = new Set();
        index.suites.set(fingerprint, ids);
      }
      ids.add(suite.suite_id);
    }
  }
  return index;
}

/** `sha256:` over the sorted fingerprints joined by newlines. */
export function computeSuiteFingerprintRoot(fingerprints: Iterable<string>): string {
  return SHA256_PREFIX + sha256Hex([...fingerprints].sort().join("\n"));
}

export interface Leak {
  fingerprint: string;
  suiteIds: string[];
  files: string[];
}

/** Declared secret fingerprints that also appear in the scanned corpus. */
export function detectLeaks(
  secret: SecretFingerprintIndex,
  scan: Pick<ScanResult, "fingerprints" | "sources">,
): Leak[] {
  const leaks: Leak[] = [];
  const collisions = [...secret.fingerprints]
    .filter((fp) => scan.fingerprints.has(fp))
    .sort();
  for (const fingerprint of collisions) {
    leaks.push({
      fingerprint,
      suiteIds: [...(secret.suites.get(fingerprint) ?? [])].sort(),
      files: [...(scan.sources.get(fingerprint) ?? [])].sort(),
    });
  }
  return leaks;
}

export type ScanCertification = "clean" | "leak_detected" | "inconclusive";

/**
 * Certify a scan. Only a scan with no leak and no error is clean; errors
 * without a collision are inconclusive, never clean.
 */
export function certifyScan(
  leaks: readonly Leak[],
  errors: readonly string[],
): ScanCertification {
  if (leaks.length > 0) return "leak_detected";
  if (errors.length > 0) return "inconclusive";
  return "clean";
}
