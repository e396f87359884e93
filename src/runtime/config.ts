/**
 * Runtime configuration for invariant runs.
 *
 * Environment overrides:
 *   EVIDENCE_GATE_REPO_ROOT         repository to check (default: cwd)
 *   EVIDENCE_GATE_PROTECTED_PATHS   comma-separated protected directories
 *   EVIDENCE_GATE_HMAC_KEY_NAME     key lookup name for schemes without key_id
 *   EVIDENCE_GATE_LOG_LEVEL         debug | info | warn | error | silent
 */

import { resolve } from "node:path";
import { DEFAULT_PROTECTED_PATHS } from "../secrecy/scan.js";
import { DEFAULT_HMAC_KEY_NAME } from "../secrecy/fingerprint.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export interface EvidenceGateConfig {
  repoRoot: string;
  protectedPaths: string[];
  hmacKeyName: string;
  logLevel: LogLevel;
}

export type Env = Readonly<Record<string, string | undefined>>;

export function resolveConfig(env: Env = process.env): EvidenceGateConfig {
  const repoRoot = resolve(env["EVIDENCE_GATE_REPO_ROOT"] ?? process.cwd());

  const rawPaths = env["EVIDENCE_GATE_PROTECTED_PATHS"];
  const protectedPaths =
    rawPaths !== undefined && rawPaths.trim() !== ""
      ? rawPaths
          .split(",")
          .map((p) => p.trim())
          .filter((p) => p.length > 0)
      : [...DEFAULT_PROTECTED_PATHS];

  const hmacKeyName = env["EVIDENCE_GATE_HMAC_KEY_NAME"]?.trim() || DEFAULT_HMAC_KEY_NAME;

  const rawLevel = env["EVIDENCE_GATE_LOG_LEVEL"]?.trim().toLowerCase() ?? "info";
  if (!isLogLevel(rawLevel)) {
    throw new Error(
      `Invalid EVIDENCE_GATE_LOG_LEVEL '${rawLevel}' (expected debug, info, warn, error or silent)`,
    );
  }

  return { repoRoot, protectedPaths, hmacKeyName, logLevel: rawLevel };
}
