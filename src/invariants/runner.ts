/**
 * Runs invariant checks against a repository and aggregates the outcome.
 */

import { resolve } from "node:path";
import type { EvidenceGateConfig } from "../runtime/config.js";
import { silentLogger, type Logger } from "../runtime/logger.js";
import { DEFAULT_HMAC_KEY_NAME } from "../secrecy/fingerprint.js";
import { envKeyProvider, type KeyProvider } from "../secrecy/keys.js";
import { DEFAULT_PROTECTED_PATHS } from "../secrecy/scan.js";
import { budgetSolvencyInvariant } from "./budget-solvency.js";
import { secrecyInvariant } from "./secrecy.js";
import { secretRegistryIntegrityInvariant } from "./secret-registry-integrity.js";
import { tamperEvidenceInvariant } from "./tamper-evidence.js";
import {
  describeError,
  type Invariant,
  type InvariantCheck,
  type InvariantContext,
} from "./types.js";

export const DEFAULT_INVARIANTS: readonly Invariant[] = [
  secretRegistryIntegrityInvariant,
  secrecyInvariant,
  budgetSolvencyInvariant,
  tamperEvidenceInvariant,
];

export interface RunOptions {
  invariants?: readonly Invariant[];
  config?: Partial<Pick<EvidenceGateConfig, "protectedPaths" | "hmacKeyName">>;
  keys?: KeyProvider;
  logger?: Logger;
}

export interface RunReport {
  allPassed: boolean;
  results: InvariantCheck[];
}

function runOne(invariant: Invariant, ctx: InvariantContext): InvariantCheck {
  try {
    return invariant.check(ctx);
  } catch (error) {
    return { name: invariant.name, result: "FAIL", message: describeError(error) };
  }
}

/**
 * Run each invariant in order. A check that throws is reported as FAIL.
 * `allPassed` is false iff some result is FAIL; WARN and SKIP do not fail
 * the run.
 */
export function runInvariants(repoRoot: string, options: RunOptions = {}): RunReport {
  const logger = options.logger ?? silentLogger;
  const ctx: InvariantContext = {
    repoRoot: resolve(repoRoot),
    protectedPaths: options.config?.protectedPaths ?? DEFAULT_PROTECTED_PATHS,
    keys: options.keys ?? envKeyProvider(),
    hmacKeyName: options.config?.hmacKeyName ?? DEFAULT_HMAC_KEY_NAME,
    logger,
  };

  const results: InvariantCheck[] = [];
  for (const invariant of options.invariants ?? DEFAULT_INVARIANTS) {
    const result = runOne(invariant, ctx);
    if (result.result === "FAIL") {
      logger.warn(`${result.name}: ${result.result}`, { message: result.message });
    } else {
      logger.info(`${result.name}: ${result.result}`, { message: result.message });
    }
    results.push(result);
  }

  return {
    allPassed: results.every((r) => r.result !== "FAIL"),
    results,
  };
}
