/**
 * Repository layout and artifact loaders shared by the invariant checks.
 *
 * Loaders skip files that fail to parse unless noted; the checks decide
 * what an absent artifact means.
 */

import { existsSync, readdirSync } from "node:fs";
import { extname, join, relative, sep } from "node:path";
import { listDataFiles, loadDataFile } from "../audit/data-file.js";
import { contentHash, fileHash } from "../audit/hashing.js";
import { ContextLattice } from "../lattice/lattice.js";
import { LatticeError } from "../lattice/errors.js";
import { silentLogger, type Logger } from "../runtime/logger.js";

export const LATTICE_DIR = "contracts/context_lattice";
export const LATTICE_SCHEMA_PATH = "schemas/ContextLattice.schema.json";
export const SAFETY_CONTRACTS_DIR = "contracts/safety_contracts";
export const RISK_FITS_DIR = "control_plane/governor/risk_fits";
export const OVERSIGHT_PLANS_DIR = "control_plane/governor/oversight_plans";
export const AARS_DIR = "aars";
export const LINEAGE_DIR = "lineage";
export const KEYS_DIR = "control_plane/keys";
export const SUITE_REGISTRY_PATH = "control_plane/evals/suites/registry.json";
export const SECRET_HASH_REGISTRY_PATH =
  "control_plane/evals/suites/hash_registries/secret_suite_hashes_v1.json";

export function repoRelative(repoRoot: string, path: string): string {
  return relative(repoRoot, path).split(sep).join("/");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function tryLoad(path: string, logger: Logger): unknown {
  try {
    return loadDataFile(path);
  } catch (error) {
    logger.warn("Skipping unparseable artifact", { path, error: String(error) });
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Context lattice
// ---------------------------------------------------------------------------

export interface LoadedLattice {
  lattice: ContextLattice;
  path: string;
}

/**
 * Load the repository's lattice: the first `.yaml`, then `.yml`, then
 * `.json` file (each group sorted by name) validated against the lattice
 * schema. A missing schema fails the load.
 */
export function loadRepoLattice(repoRoot: string): LoadedLattice {
  const dir = join(repoRoot, LATTICE_DIR);
  if (!existsSync(dir)) {
    throw new LatticeError("Context lattice directory not found", "FILE_NOT_FOUND", {
      path: dir,
    });
  }
  const names = readdirSync(dir).sort();
  const ordered = [".yaml", ".yml", ".json"].flatMap((suffix) =>
    names.filter((n) => extname(n) === suffix),
  );
  const first = ordered[0];
  if (first === undefined) {
    throw new LatticeError("No context lattice files found", "FILE_NOT_FOUND", {
      path: dir,
    });
  }
  const path = join(dir, first);
  return {
    lattice: ContextLattice.load(path, {
      schemaPath: join(repoRoot, LATTICE_SCHEMA_PATH),
    }),
    path,
  };
}

// ---------------------------------------------------------------------------
// Tolerances, fits, plans
// ---------------------------------------------------------------------------

export interface Tolerance {
  file: string;
  hazardId: string | undefined;
  severityId: string | undefined;
  contextClass: string | undefined;
  tau: unknown;
}

export interface RiskFit {
  file: string;
  hazardId: string | undefined;
  severityId: string | undefined;
  contextClass: string | undefined;
  data: Record<string, unknown>;
}

export interface OversightPlan {
  file: string;
  planId: string | undefined;
  contextClass: string;
  channelAllocations: unknown;
}

export function loadTolerances(
  repoRoot: string,
  logger: Logger = silentLogger,
): Tolerance[] {
  const tolerances: Tolerance[] = [];
  for (const path of listDataFiles(join(repoRoot, SAFETY_CONTRACTS_DIR))) {
    const data = tryLoad(path, logger);
    if (!isRecord(data) || !Array.isArray(data["tolerances"])) continue;
    const entries: unknown[] = data["tolerances"];
    for (const tol of entries) {
      if (!isRecord(tol)) continue;
      tolerances.push({
        file: repoRelative(repoRoot, path),
        hazardId: optionalString(tol["hazard_id"]),
        severityId: optionalString(tol["severity_id"]),
        contextClass: optionalString(tol["context_class"]),
        tau: tol["tau"],
      });
    }
  }
  return tolerances;
}

export function loadRiskFits(
  repoRoot: string,
  logger: Logger = silentLogger,
): RiskFit[] {
  const fits: RiskFit[] = [];
  for (const path of listDataFiles(join(repoRoot, RISK_FITS_DIR))) {
    if (extname(path) !== ".json") continue;
    const data = tryLoad(path, logger);
    const entries: unknown[] = Array.isArray(data) ? data : [data];
    for (const fit of entries) {
      if (!isRecord(fit)) continue;
      fits.push({
        file: repoRelative(repoRoot, path),
        hazardId: optionalString(fit["hazard_id"]),
        severityId: optionalString(fit["severity_id"]),
        contextClass: optionalString(fit["context_class"]),
        data: fit,
      });
    }
  }
  return fits;
}

/** Plan entries of a plan document: a list, `plans_by_context`, `plans` or a single plan. */
export function extractPlanEntries(data: unknown): unknown[] {
  if (Array.isArray(data)) {
    const entries: unknown[] = data;
    return entries;
  }
  if (isRecord(data)) {
    for (const key of ["plans_by_context", "plans"]) {
      if (key in data) {
        const value = data[key];
        return Array.isArray(value) ? value : [];
      }
    }
    if ("context_class" in data) return [data];
  }
  return [];
}

export function loadOversightPlans(
  repoRoot: string,
  logger: Logger = silentLogger,
): OversightPlan[] {
  const plans: OversightPlan[] = [];
  for (const path of listDataFiles(join(repoRoot, OVERSIGHT_PLANS_DIR))) {
    for (const entry of extractPlanEntries(tryLoad(path, logger))) {
      if (!isRecord(entry)) continue;
      const contextClass = optionalString(entry["context_class"]);
      if (contextClass === undefined) continue;
      plans.push({
        file: repoRelative(repoRoot, path),
        planId: optionalString(entry["plan_id"]),
        contextClass,
        channelAllocations: entry["channel_allocations"] ?? {},
      });
    }
  }
  return plans;
}

// ---------------------------------------------------------------------------
// AARs, lineage, keys
// ---------------------------------------------------------------------------

export interface LoadedDocument {
  file: string;
  data: Record<string, unknown>;
}

export function loadAars(repoRoot: string): LoadedDocument[] {
  const aars: LoadedDocument[] = [];
  for (const path of listDataFiles(join(repoRoot, AARS_DIR))) {
    if (extname(path) !== ".json") continue;
    const data = loadDataFile(path);
    if (isRecord(data)) aars.push({ file: repoRelative(repoRoot, path), data });
  }
  return aars;
}

/** Sorted content hashes of every lineage ledger entry. */
export function loadLineageEntryHashes(repoRoot: string): string[] {
  const hashes: string[] = [];
  for (const path of listDataFiles(join(repoRoot, LINEAGE_DIR))) {
    const data = loadDataFile(path);
    if (isRecord(data)) hashes.push(contentHash(data));
  }
  return hashes.sort();
}

/** The first data file under the keys directory that carries a `keys` list. */
export function loadKeyRegistry(repoRoot: string): LoadedDocument | undefined {
  for (const path of listDataFiles(join(repoRoot, KEYS_DIR))) {
    const data = loadDataFile(path);
    if (isRecord(data) && "keys" in data) {
      return { file: repoRelative(repoRoot, path), data };
    }
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Suite registry
// ---------------------------------------------------------------------------

export interface SuiteRegistry {
  data: Record<string, unknown>;
  hash: string;
}

/** Throws when the registry is absent or not an object. */
export function loadSuiteRegistry(repoRoot: string): SuiteRegistry {
  const path = join(repoRoot, SUITE_REGISTRY_PATH);
  if (!existsSync(path)) {
    throw new Error("Suite registry not found");
  }
  const data = loadDataFile(path);
  if (!isRecord(data)) {
    throw new Error("Suite registry must be an object");
  }
  return { data, hash: fileHash(path) };
}

/** Suites whose `secrecy_level` is `secret`, by suite id. */
export function getSecretSuites(
  registry: Record<string, unknown>,
): Map<string, Record<string, unknown>> {
  const secret = new Map<string, Record<string, unknown>>();
  const suites = registry["suites"];
  if (!Array.isArray(suites)) return secret;
  const entries: unknown[] = suites;
  for (const suite of entries) {
    if (!isRecord(suite) || suite["secrecy_level"] !== "secret") continue;
    const id = optionalString(suite["suite_id"]);
    if (id !== undefined) secret.set(id, suite);
  }
  return secret;
}
