export {
  describeError,
  failResult,
  type FailureRecord,
  type Invariant,
  type InvariantCheck,
  type InvariantContext,
  type InvariantResult,
} from "./types.js";

export {
  LATTICE_DIR,
  LATTICE_SCHEMA_PATH,
  SAFETY_CONTRACTS_DIR,
  RISK_FITS_DIR,
  OVERSIGHT_PLANS_DIR,
  AARS_DIR,
  LINEAGE_DIR,
  KEYS_DIR,
  SUITE_REGISTRY_PATH,
  SECRET_HASH_REGISTRY_PATH,
  loadRepoLattice,
  loadTolerances,
  loadRiskFits,
  loadOversightPlans,
  extractPlanEntries,
  loadAars,
  loadLineageEntryHashes,
  loadKeyRegistry,
  loadSuiteRegistry,
  getSecretSuites,
  type LoadedLattice,
  type Tolerance,
  type RiskFit,
  type OversightPlan,
  type LoadedDocument,
  type SuiteRegistry,
} from "./repo.js";

export {
  getNumeric,
  computeFitRisk,
  evaluateBudgetSolvency,
  budgetSolvencyInvariant,
  type SolvencyEvaluation,
  type SolvencyReport,
} from "./budget-solvency.js";

export { activeKeyIds, checkAar, tamperEvidenceInvariant } from "./tamper-evidence.js";

export {
  SUPPORTED_SCHEMES,
  checkSecretRegistry,
  secretRegistryIntegrityInvariant,
} from "./secret-registry-integrity.js";

export {
  buildSecrecyAudit,
  secrecyInvariant,
  type SecrecyAudit,
  type SecrecyAuditStatus,
} from "./secrecy.js";

export {
  DEFAULT_INVARIANTS,
  runInvariants,
  type RunOptions,
  type RunReport,
} from "./runner.js";
