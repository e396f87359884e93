export * from "./audit/index.js";
export * from "./lattice/index.js";
export * from "./secrecy/index.js";
export * from "./invariants/index.js";

export { resolveConfig, type EvidenceGateConfig, type Env } from "./runtime/config.js";
export {
  createConsoleLogger,
  silentLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from "./runtime/logger.js";
export { formatIssues } from "./runtime/validation.js";
