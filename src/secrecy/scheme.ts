/**
 * Hashing scheme declaration for secrecy fingerprints.
 */

import { z } from "zod";
import { formatIssues } from "../runtime/validation.js";
import { FingerprintError } from "./errors.js";

export const HashingSchemeSchema = z.preprocess(
  (raw) => {
    // Older registries spell the field `normalization`.
    if (
      typeof raw === "object" &&
      raw !== null &&
      !("normalization_id" in raw) &&
      "normalization" in raw
    ) {
      return { ...raw, normalization_id: raw.normalization };
    }
    return raw;
  },
  z
    .object({
      scheme_id: z.string().min(1),
      normalization_id: z.string().min(1),
      digest_prefix: z.string(),
      key_id: z.string().min(1).nullish(),
    })
    .passthrough(),
);

export type HashingSchemeInput = z.input<typeof HashingSchemeSchema>;

export class HashingScheme {
  readonly schemeId: string;
  readonly normalizationId: string;
  readonly digestPrefix: string;
  readonly keyId: string | undefined;

  constructor(
    schemeId: string,
    normalizationId: string,
    digestPrefix: string,
    keyId?: string,
  ) {
    this.schemeId = schemeId;
    this.normalizationId = normalizationId;
    this.digestPrefix = digestPrefix;
    this.keyId = keyId;
  }

  /**
   * Parse a `hashing_scheme` object. Requires `scheme_id`,
   * `normalization_id` and `digest_prefix`.
   */
  static from(payload: unknown): HashingScheme {
    if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
      throw new FingerprintError("hashing_scheme must be an object", "INVALID_SCHEME");
    }
    const parsed = HashingSchemeSchema.safeParse(payload);
    if (!parsed.success) {
      throw new FingerprintError(
        `hashing_scheme is invalid: ${formatIssues(parsed.error)}`,
        "INVALID_SCHEME",
      );
    }
    const s = parsed.data;
    return new HashingScheme(
      s.scheme_id,
      s.normalization_id,
      s.digest_prefix,
      s.key_id ?? undefined,
    );
  }

  usesHmac(): boolean {
    return (
      this.schemeId.startsWith("hmac") ||
      this.digestPrefix.startsWith("hmacsha256:")
    );
  }

  /**
   * Name to look the HMAC key up under: the part of `key_id` after its
   * first `:`, the whole `key_id` when it has none, or `fallback`.
   */
  keyLookupName(fallback: string): string {
    const keyId = this.keyId ?? fallback;
    const colon = keyId.indexOf(":");
    return colon === -1 ? keyId : keyId.slice(colon + 1);
  }

  toJSON(): Record<string, string> {
    const out: Record<string, string> = {
      scheme_id: this.schemeId,
      normalization_id: this.normalizationId,
      digest_prefix: this.digestPrefix,
    };
    if (this.keyId !== undefined) out["key_id"] = this.keyId;
    return out;
  }
}
