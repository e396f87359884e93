export {
  canonicalJson,
  canonicalBytes,
  NotSerializableError,
  type CanonicalPolicy,
} from "./canonical.js";

export {
  sha256Hex,
  sha256Bytes,
  contentHash,
  fileHash,
  normalizeHash,
  verifyHash,
  SHA256_PREFIX,
  type HashValue,
  type HashAlgorithm,
} from "./hashing.js";

export {
  merkleRoot,
  buildMerkleProof,
  verifyMerkleInclusion,
  artifactMerkleRoot,
  type MerkleProofStep,
  type ProofPosition,
} from "./merkle.js";

export {
  DATA_SUFFIXES,
  isDataFile,
  loadDataFile,
  listFilesRecursive,
  listDataFiles,
} from "./data-file.js";
