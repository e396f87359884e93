/**
 * Context lattice error types.
 *
 * Lattice errors are always surfaced; coverage math never falls back to a
 * default.
 */

export type LatticeErrorCode =
  | "FILE_NOT_FOUND"
  | "SCHEMA_UNAVAILABLE"
  | "SCHEMA_INVALID"
  | "MALFORMED_DOCUMENT"
  | "INVALID_DIMENSION"
  | "UNKNOWN_VALUE"
  | "CONTEXT_MISSING_DIMENSIONS"
  | "CONTEXT_UNKNOWN_DIMENSIONS"
  | "EMPTY_INPUT"
  | "UNKNOWN_CONTEXT"
  | "DIMENSION_MISMATCH";

export class LatticeError extends Error {
  public readonly code: LatticeErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: LatticeErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "LatticeError";
    this.code = code;
    this.details = details ?? {};
  }
}
