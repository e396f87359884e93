/**
 * Invariant check result types.
 */

import type { Logger } from "../runtime/logger.js";
import type { KeyProvider } from "../secrecy/keys.js";

export type InvariantResult = "PASS" | "FAIL" | "WARN" | "SKIP";

export interface InvariantCheck {
  name: string;
  result: InvariantResult;
  message: string;
  details?: Record<string, unknown>;
}

export interface InvariantContext {
  repoRoot: string;
  /** Protected corpus directories, relative to repoRoot. */
  protectedPaths: readonly string[];
  keys: KeyProvider;
  /** Key lookup name for hashing schemes without `key_id`. */
  hmacKeyName: string;
  logger: Logger;
}

export interface Invariant {
  readonly name: string;
  check(ctx: InvariantContext): InvariantCheck;
}

/** One entry of a check's `details.failures`. */
export type FailureRecord = Record<string, string>;

export function failResult(
  name: string,
  failures: readonly FailureRecord[],
  noun: string,
): InvariantCheck {
  return {
    name,
    result: "FAIL",
    message: `${failures.length} ${noun}(s) detected`,
    details: { failures },
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
