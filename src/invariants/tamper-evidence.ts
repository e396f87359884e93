/**
 * TAMPER_EVIDENCE: Merkle roots claimed by after-action reports recompute,
 * and approvals signed with `key:<id>` name an active key.
 */

import { verifyHash } from "../audit/hashing.js";
import { artifactMerkleRoot, merkleRoot } from "../audit/merkle.js";
import {
  loadAars,
  loadKeyRegistry,
  loadLineageEntryHashes,
  type LoadedDocument,
} from "./repo.js";
import {
  describeError,
  failResult,
  type FailureRecord,
  type Invariant,
  type InvariantCheck,
  type InvariantContext,
} from "./types.js";

const NAME = "TAMPER_EVIDENCE";
const KEY_REF_PREFIX = "key:";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function field(record: unknown, key: string): unknown {
  return isRecord(record) ? record[key] : undefined;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/** Ids of keys in the registry that are not revoked. */
export function activeKeyIds(registry: Record<string, unknown>): Set<string> {
  const ids = new Set<string>();
  for (const key of records(registry["keys"])) {
    if (Boolean(key["revoked"])) continue;
    const id = nonEmptyString(key["key_id"]);
    if (id !== undefined) ids.add(id);
  }
  return ids;
}

/**
 * Tamper-evidence failures for one report. `ledgerRoot` is the Merkle root
 * of the lineage ledger ("" when there are no entries); `keyIds` is empty
 * when no key registry exists, which disables the signature check.
 */
export function checkAar(
  aar: LoadedDocument,
  ledgerRoot: string,
  keyIds: ReadonlySet<string>,
): FailureRecord[] {
  const failures: FailureRecord[] = [];
  const { file, data } = aar;

  const claimedMerkle = nonEmptyString(field(data["provenance"], "merkle_root"));
  if (claimedMerkle !== undefined) {
    const artifacts = records(field(data["risk_modeling"], "risk_fit_artifacts"));
    const computed = artifacts.length > 0 ? artifactMerkleRoot(artifacts, "fit_hash") : "";
    if (computed !== "" && !verifyHash(claimedMerkle, computed)) {
      failures.push({ file, reason: "provenance.merkle_root mismatch" });
    }
  }

  const claimedLedger = nonEmptyString(field(data["lineage_references"], "ledger_root_hash"));
  if (claimedLedger !== undefined) {
    if (ledgerRoot === "") {
      failures.push({ file, reason: "ledger_root_hash claimed but no lineage entries found" });
    } else if (!verifyHash(claimedLedger, ledgerRoot)) {
      failures.push({ file, reason: "ledger_root_hash mismatch" });
    }
  }

  if (keyIds.size > 0) {
    for (const approval of records(field(data["governance"], "approvals"))) {
      const signature = nonEmptyString(approval["signature"]);
      if (signature === undefined || !signature.startsWith(KEY_REF_PREFIX)) continue;
      const keyRef = signature.slice(KEY_REF_PREFIX.length);
      if (!keyIds.has(keyRef)) {
        failures.push({ file, reason: `Approval references unknown key: ${keyRef}` });
      }
    }
  }

  return failures;
}

export const tamperEvidenceInvariant: Invariant = {
  name: NAME,
  check(ctx: InvariantContext): InvariantCheck {
    let aars: LoadedDocument[];
    let keyRegistry: LoadedDocument | undefined;
    let lineageHashes: string[];
    try {
      aars = loadAars(ctx.repoRoot);
      keyRegistry = loadKeyRegistry(ctx.repoRoot);
      lineageHashes = loadLineageEntryHashes(ctx.repoRoot);
    } catch (error) {
      return { name: NAME, result: "FAIL", message: describeError(error) };
    }

    if (aars.length === 0 && keyRegistry === undefined) {
      return { name: NAME, result: "SKIP", message: "No AARs or key registry found" };
    }

    const keyIds = keyRegistry === undefined ? new Set<string>() : activeKeyIds(keyRegistry.data);
    const ledgerRoot = merkleRoot(lineageHashes);
    const failures = aars.flatMap((aar) => checkAar(aar, ledgerRoot, keyIds));
    if (failures.length > 0) {
      return failResult(NAME, failures, "tamper evidence issue");
    }

    const checked: string[] = [];
    if (aars.length > 0) checked.push(`${aars.length} AAR(s)`);
    if (keyRegistry !== undefined) checked.push(`${keyIds.size} active key(s)`);
    return {
      name: NAME,
      result: "PASS",
      message: `Verified tamper evidence for ${checked.join(", ")}`,
    };
  },
};
