export { FingerprintError, type FingerprintErrorCode } from "./errors.js";

export {
  HashingScheme,
  HashingSchemeSchema,
  type HashingSchemeInput,
} from "./scheme.js";

export {
  envKeyProvider,
  staticKeyProvider,
  noKeys,
  type KeyProvider,
} from "./keys.js";

export {
  DEFAULT_HMAC_KEY_NAME,
  createFingerprinter,
  fingerprintItem,
  fingerprintTextBlock,
  normalizeText,
  type Fingerprinter,
  type FingerprintOptions,
} from "./fingerprint.js";

export {
  LIST_KEYS,
  SUPPORTED_SUFFIXES,
  isSupportedFile,
  extractItems,
  fingerprintStructured,
  fingerprintJsonLines,
  fingerprintTextDocument,
  fingerprintFileContent,
} from "./extract.js";

export {
  DEFAULT_PROTECTED_PATHS,
  scanFile,
  mergeScanResults,
  scanProtectedPaths,
  type FileScanResult,
  type ScanResult,
  type ScanOptions,
} from "./scan.js";

export {
  SecretHashRegistrySchema,
  SecretSuiteEntrySchema,
  parseSecretHashRegistry,
  loadSecretHashRegistry,
  buildSecretFingerprintIndex,
  computeSuiteFingerprintRoot,
  detectLeaks,
  certifyScan,
  type SecretHashRegistry,
  type SecretSuiteEntry,
  type LoadedSecretRegistry,
  type SecretFingerprintIndex,
  type Leak,
  type ScanCertification,
} from "./registry.js";
