/**
 * Merkle roots and inclusion proofs for tamper evidence.
 *
 * Internal nodes hash the concatenation of their children's hex strings
 * (not the decoded bytes). Odd levels duplicate their last node.
 * Trees are rebuilt on every call; nothing is persisted.
 */

import { normalizeHash, sha256Hex, SHA256_PREFIX } from "./hashing.js";

export type ProofPosition = "left" | "right";

export interface MerkleProofStep {
  hash: string;
  /** Side of the sibling relative to the running hash. */
  position: ProofPosition | (string & {});
}

function parent(left: string, right: string): string {
  return sha256Hex(left + right);
}

function nextLevel(level: readonly string[]): string[] {
  const next: string[] = [];
  for (let i = 0; i < level.length; i += 2) {
    const left = level[i] ?? "";
    const right = level[i + 1] ?? left;
    next.push(parent(left, right));
  }
  return next;
}

/**
 * Merkle root of an ordered list of leaf hashes.
 *
 * Returns "" for no leaves. Order-sensitive: permuting the leaves generally
 * changes the root.
 */
export function merkleRoot(leaves: readonly string[]): string {
  if (leaves.length === 0) return "";
  let level = leaves.map(normalizeHash);
  while (level.length > 1) {
    level = nextLevel(level);
  }
  return SHA256_PREFIX + (level[0] ?? "");
}

/**
 * Inclusion proof for the leaf at `index`, bottom-up.
 */
export function buildMerkleProof(
  leaves: readonly string[],
  index: number,
): MerkleProofStep[] {
  if (!Number.isInteger(index) || index < 0 || index >= leaves.length) {
    throw new RangeError(
      `Leaf index ${index} out of range for ${leaves.length} leaves`,
    );
  }
  const proof: MerkleProofStep[] = [];
  let level = leaves.map(normalizeHash);
  let pos = index;
  while (level.length > 1) {
    const isRight = pos % 2 === 1;
    const siblingIndex = isRight ? pos - 1 : pos + 1;
    const sibling = level[siblingIndex] ?? level[pos] ?? "";
    proof.push({
      hash: SHA256_PREFIX + sibling,
      position: isRight ? "left" : "right",
    });
    level = nextLevel(level);
    pos = Math.floor(pos / 2);
  }
  return proof;
}

/**
 * Check that `leaf` plus `proof` reconstructs `root`.
 *
 * Never throws: empty inputs, malformed steps and unknown positions all
 * yield false.
 */
export function verifyMerkleInclusion(
  leaf: string | null | undefined,
  proof: readonly MerkleProofStep[] | null | undefined,
  root: string | null | undefined,
): boolean {
  if (!leaf || !root || !Array.isArray(proof)) return false;

  let current = normalizeHash(leaf);
  for (const step of proof) {
    if (typeof step !== "object" || step === null) return false;
    if (typeof step.hash !== "string") return false;
    const sibling = normalizeHash(step.hash);
    if (sibling === "") return false;
    if (step.position === "left") {
      current = parent(sibling, current);
    } else if (step.position === "right") {
      current = parent(current, sibling);
    } else {
      return false;
    }
  }
  return normalizeHash(root) === current;
}

/**
 * Order-independent root over the `hashField` values of a set of artifacts.
 *
 * Artifacts lacking the field (or with an empty / non-string value) are
 * skipped. The collected hashes are sorted before building the tree.
 */
export function artifactMerkleRoot(
  artifacts: ReadonlyArray<Readonly<Record<string, unknown>>>,
  hashField = "hash",
): string {
  const hashes: string[] = [];
  for (const artifact of artifacts) {
    const value = artifact[hashField];
    if (typeof value === "string" && value.length > 0) {
      hashes.push(value);
    }
  }
  if (hashes.length === 0) return "";
  hashes.sort();
  return merkleRoot(hashes);
}
