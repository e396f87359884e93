/**
 * Secrecy fingerprinting error types.
 *
 * Every FingerprintError fails the audit closed: an audit that cannot run
 * is a failed audit, never "no leak".
 */

export type FingerprintErrorCode =
  | "INVALID_SCHEME"
  | "REGISTRY_MISSING"
  | "REGISTRY_INVALID"
  | "HMAC_KEY_MISSING"
  | "NOT_SERIALIZABLE";

export class FingerprintError extends Error {
  public readonly code: FingerprintErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: FingerprintErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "FingerprintError";
    this.code = code;
    this.details = details ?? {};
  }
}
