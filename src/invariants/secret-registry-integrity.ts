/**
 * SECRET_REGISTRY_INTEGRITY: the secret hash registry is bound to the
 * current suite registry and every entry is internally consistent.
 */

import { join } from "node:path";
import { verifyHash } from "../audit/hashing.js";
import {
  computeSuiteFingerprintRoot,
  loadSecretHashRegistry,
  type LoadedSecretRegistry,
} from "../secrecy/registry.js";
import {
  getSecretSuites,
  loadSuiteRegistry,
  SECRET_HASH_REGISTRY_PATH,
  type SuiteRegistry,
} from "./repo.js";
import {
  describeError,
  failResult,
  type FailureRecord,
  type Invariant,
  type InvariantCheck,
  type InvariantContext,
} from "./types.js";

const NAME = "SECRET_REGISTRY_INTEGRITY";

export const SUPPORTED_SCHEMES: ReadonlySet<string> = new Set(["sha256-v1", "hmac-sha256-v1"]);

/** Integrity failures of a loaded secret registry against the suite registry. */
export function checkSecretRegistry(
  loaded: LoadedSecretRegistry,
  suiteRegistry: SuiteRegistry,
  secretSuiteIds: Iterable<string>,
): FailureRecord[] {
  const failures: FailureRecord[] = [];
  const { registry, scheme } = loaded;

  if (!SUPPORTED_SCHEMES.has(scheme.schemeId)) {
    failures.push({ reason: `Unsupported hashing scheme '${scheme.schemeId}'` });
  }

  if (!verifyHash(registry.suite_registry_hash, suiteRegistry.hash)) {
    failures.push({
      reason: "suite_registry_hash mismatch",
      expected: suiteRegistry.hash,
      found: registry.suite_registry_hash,
    });
  }

  const entries = new Map(registry.suites.map((entry) => [entry.suite_id, entry]));
  for (const suiteId of secretSuiteIds) {
    if (!entries.has(suiteId)) {
      failures.push({ suite_id: suiteId, reason: "Secret suite missing from hash registry" });
    }
  }

  for (const [suiteId, entry] of entries) {
    const fingerprints = entry.test_case_fingerprints;
    if (new Set(fingerprints).size !== fingerprints.length) {
      failures.push({ suite_id: suiteId, reason: "Duplicate fingerprints in registry entry" });
    }
    if (entry.n_test_cases !== undefined && entry.n_test_cases !== fingerprints.length) {
      failures.push({ suite_id: suiteId, reason: "n_test_cases does not match fingerprint count" });
    }
    if (entry.suite_fingerprint_root !== computeSuiteFingerprintRoot(fingerprints)) {
      failures.push({ suite_id: suiteId, reason: "suite_fingerprint_root mismatch" });
    }
  }

  return failures;
}

export const secretRegistryIntegrityInvariant: Invariant = {
  name: NAME,
  check(ctx: InvariantContext): InvariantCheck {
    let suiteRegistry: SuiteRegistry;
    try {
      suiteRegistry = loadSuiteRegistry(ctx.repoRoot);
    } catch (error) {
      return { name: NAME, result: "FAIL", message: describeError(error) };
    }

    const secretSuites = getSecretSuites(suiteRegistry.data);
    if (secretSuites.size === 0) {
      return { name: NAME, result: "SKIP", message: "No secret suites defined" };
    }

    let loaded: LoadedSecretRegistry;
    try {
      loaded = loadSecretHashRegistry(join(ctx.repoRoot, SECRET_HASH_REGISTRY_PATH));
    } catch (error) {
      return { name: NAME, result: "FAIL", message: describeError(error) };
    }

    const failures = checkSecretRegistry(loaded, suiteRegistry, secretSuites.keys());
    if (failures.length > 0) {
      return failResult(NAME, failures, "registry integrity issue");
    }
    return { name: NAME, result: "PASS", message: "Secret hash registry integrity verified" };
  },
};
