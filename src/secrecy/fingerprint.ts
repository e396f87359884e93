/**
 * Content fingerprints for secret evaluation items.
 *
 * A fingerprint is `digest_prefix + hex(digest)` where the digest is plain
 * SHA-256 or, for HMAC schemes, HMAC-SHA256 under a key resolved through a
 * KeyProvider. Items are canonicalized with the unicode-preserving policy;
 * text blocks are normalized (LF line endings, trimmed) and hashed as UTF-8.
 *
 * Structured items are parsed with JSON.parse / yaml, so integers beyond
 * Number.MAX_SAFE_INTEGER are rounded before hashing: items differing only
 * in such an integer share a fingerprint.
 */

import { createHash, createHmac } from "node:crypto";
import { canonicalBytes, NotSerializableError } from "../audit/canonical.js";
import { FingerprintError } from "./errors.js";
import { noKeys, type KeyProvider } from "./keys.js";
import type { HashingScheme } from "./scheme.js";

/** Key lookup name used when a scheme carries no `key_id`. */
export const DEFAULT_HMAC_KEY_NAME = "SECRECY_HMAC_KEY";

export interface FingerprintOptions {
  keys?: KeyProvider;
  /** Lookup name for schemes without `key_id`. */
  defaultKeyName?: string;
}

export interface Fingerprinter {
  readonly scheme: HashingScheme;
  digest(payload: Buffer): string;
  /** Canonical (unicode) serialization, then digest. */
  item(value: unknown): string;
  /** Normalized text digest, or null when the text is blank. */
  textBlock(text: string): string | null;
  /** Strings as text blocks, everything else as items. */
  value(value: unknown): string | null;
}

export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, "\n").trim();
}

function resolveHmacKey(
  scheme: HashingScheme,
  options: FingerprintOptions,
): Buffer {
  const name = scheme.keyLookupName(options.defaultKeyName ?? DEFAULT_HMAC_KEY_NAME);
  const key = (options.keys ?? noKeys).getKey(name);
  if (key === undefined || key.length === 0) {
    throw new FingerprintError(
      "HMAC key missing for secrecy fingerprinting",
      "HMAC_KEY_MISSING",
      { keyName: name, schemeId: scheme.schemeId },
    );
  }
  return typeof key === "string" ? Buffer.from(key, "utf8") : key;
}

/**
 * Bind a scheme to its key. For HMAC schemes the key is resolved here, so a
 * missing key fails before any content is touched.
 */
export function createFingerprinter(
  scheme: HashingScheme,
  options: FingerprintOptions = {},
): Fingerprinter {
  const hmacKey = scheme.usesHmac() ? resolveHmacKey(scheme, options) : null;

  const digest = (payload: Buffer): string => {
    const hex =
      hmacKey !== null
        ? createHmac("sha256", hmacKey).update(payload).digest("hex")
        : createHash("sha256").update(payload).digest("hex");
    return scheme.digestPrefix + hex;
  };

  const item = (value: unknown): string => {
    let payload: Buffer;
    try {
      payload = canonicalBytes(value, "unicode");
    } catch (error) {
      if (error instanceof NotSerializableError) {
        throw new FingerprintError(
          `Item is not JSON-serializable: ${error.message}`,
          "NOT_SERIALIZABLE",
          error.details,
        );
      }
      throw error;
    }
    return digest(payload);
  };

  const textBlock = (text: string): string | null => {
    const normalized = normalizeText(text);
    if (normalized === "") return null;
    return digest(Buffer.from(normalized, "utf8"));
  };

  return {
    scheme,
    digest,
    item,
    textBlock,
    value: (value) => (typeof value === "string" ? textBlock(value) : item(value)),
  };
}

export function fingerprintItem(
  value: unknown,
  scheme: HashingScheme,
  options: FingerprintOptions = {},
): string {
  return createFingerprinter(scheme, options).item(value);
}

export function fingerprintTextBlock(
  text: string,
  scheme: HashingScheme,
  options: FingerprintOptions = {},
): string | null {
  return createFingerprinter(scheme, options).textBlock(text);
}
