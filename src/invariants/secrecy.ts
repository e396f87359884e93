/**
 * SECRECY: no fingerprint of a secret evaluation suite may appear in a
 * protected corpus (training data, chronicles, prompt libraries).
 *
 * The audit fails closed: a load or scan error, a missing registry entry
 * or a soft per-file scan error all fail the check.
 */

import { join } from "node:path";
import { fileHash, verifyHash } from "../audit/hashing.js";
import {
  buildSecretFingerprintIndex,
  certifyScan,
  detectLeaks,
  loadSecretHashRegistry,
  type Leak,
  type LoadedSecretRegistry,
  type ScanCertification,
} from "../secrecy/registry.js";
import { scanProtectedPaths, type ScanResult } from "../secrecy/scan.js";
import {
  getSecretSuites,
  loadSuiteRegistry,
  SECRET_HASH_REGISTRY_PATH,
  type SuiteRegistry,
} from "./repo.js";
import {
  describeError,
  type Invariant,
  type InvariantCheck,
  type InvariantContext,
} from "./types.js";

const NAME = "SECRECY";

export type SecrecyAuditStatus = "pass" | "fail" | "skip";

export interface SecrecyAudit {
  status: SecrecyAuditStatus;
  message: string;
  suiteRegistryHash?: string;
  secretRegistryHash?: string;
  hashingScheme?: { schemeId: string; digestPrefix: string };
  secretSuiteIds: string[];
  missingSecretSuites: string[];
  secretFingerprintCount: number;
  scannedFingerprintCount: number;
  scannedFilesCount: number;
  certification?: ScanCertification;
  leaks: Leak[];
  errors: string[];
}

function emptyAudit(status: SecrecyAuditStatus, message: string): SecrecyAudit {
  return {
    status,
    message,
    secretSuiteIds: [],
    missingSecretSuites: [],
    secretFingerprintCount: 0,
    scannedFingerprintCount: 0,
    scannedFilesCount: 0,
    leaks: [],
    errors: [],
  };
}

function failure(message: string, partial: Partial<SecrecyAudit> = {}): SecrecyAudit {
  return { ...emptyAudit("fail", message), ...partial, errors: [message] };
}

export function buildSecrecyAudit(ctx: InvariantContext): SecrecyAudit {
  let suiteRegistry: SuiteRegistry;
  try {
    suiteRegistry = loadSuiteRegistry(ctx.repoRoot);
  } catch (error) {
    return failure(describeError(error));
  }
  const suiteRegistryHash = suiteRegistry.hash;

  const secretSuites = getSecretSuites(suiteRegistry.data);
  if (secretSuites.size === 0) {
    return { ...emptyAudit("skip", "No secret suites defined"), suiteRegistryHash };
  }
  const secretSuiteIds = [...secretSuites.keys()].sort();

  const registryPath = join(ctx.repoRoot, SECRET_HASH_REGISTRY_PATH);
  let loaded: LoadedSecretRegistry;
  let secretRegistryHash: string;
  try {
    loaded = loadSecretHashRegistry(registryPath);
    secretRegistryHash = fileHash(registryPath);
  } catch (error) {
    return failure(describeError(error), { suiteRegistryHash, secretSuiteIds });
  }
  const { registry, scheme } = loaded;

  const declared = new Set(registry.suites.map((suite) => suite.suite_id));
  const missingSecretSuites = secretSuiteIds.filter((id) => !declared.has(id));

  const errors: string[] = [];
  if (!verifyHash(registry.suite_registry_hash, suiteRegistryHash)) {
    errors.push("suite_registry_hash mismatch");
  }

  const index = buildSecretFingerprintIndex(registry);

  let scan: ScanResult;
  try {
    scan = scanProtectedPaths(ctx.repoRoot, scheme, {
      paths: ctx.protectedPaths,
      keys: ctx.keys,
      defaultKeyName: ctx.hmacKeyName,
      logger: ctx.logger,
    });
  } catch (error) {
    return failure(describeError(error), {
      suiteRegistryHash,
      secretRegistryHash,
      secretSuiteIds,
    });
  }
  errors.push(...scan.errors);

  const leaks = detectLeaks(index, scan);
  const passed = leaks.length === 0 && errors.length === 0 && missingSecretSuites.length === 0;

  return {
    status: passed ? "pass" : "fail",
    message: passed ? "Secrecy hash check passed" : "Secrecy hash check failed",
    suiteRegistryHash,
    secretRegistryHash,
    hashingScheme: { schemeId: scheme.schemeId, digestPrefix: scheme.digestPrefix },
    secretSuiteIds,
    missingSecretSuites,
    secretFingerprintCount: index.fingerprints.size,
    scannedFingerprintCount: scan.fingerprints.size,
    scannedFilesCount: scan.scannedFiles.length,
    certification: certifyScan(leaks, scan.errors),
    leaks,
    errors,
  };
}

export const secrecyInvariant: Invariant = {
  name: NAME,
  check(ctx: InvariantContext): InvariantCheck {
    const audit = buildSecrecyAudit(ctx);
    const details: Record<string, unknown> = { ...audit };
    switch (audit.status) {
      case "skip":
        return { name: NAME, result: "SKIP", message: audit.message, details };
      case "fail":
        return { name: NAME, result: "FAIL", message: audit.message, details };
      case "pass":
        return {
          name: NAME,
          result: "PASS",
          message: "Secret suite fingerprints not found in protected artifacts",
          details,
        };
    }
  },
};
