/**
 * Canonical JSON serialization.
 *
 * Guarantees:
 *   1. Keys sorted lexicographically (UTF-16 code unit order) at every level.
 *   2. No insignificant whitespace.
 *   3. `undefined` object members are omitted; `undefined` anywhere else is
 *      rejected.
 *   4. Dates serialized as ISO 8601 UTC strings.
 *   5. Arrays preserve element order.
 *   6. Output is deterministic: identical logical input → byte-identical output.
 *
 * Two escaping policies exist and are never mixed:
 *   - "ascii"   every non-ASCII code unit becomes `\uXXXX` (provenance hashes).
 *   - "unicode" non-ASCII characters are emitted as-is (secrecy fingerprints).
 */

export type CanonicalPolicy = "ascii" | "unicode";

export class NotSerializableError extends Error {
  public readonly code = "NOT_SERIALIZABLE" as const;
  public readonly details: Record<string, unknown>;

  constructor(message: string, path: string) {
    super(message);
    this.name = "NotSerializableError";
    this.details = { path };
  }
}

export function canonicalJson(
  value: unknown,
  policy: CanonicalPolicy = "ascii",
): string {
  return serialize(value, policy, "$", new Set<object>());
}

/** UTF-8 bytes of {@link canonicalJson}. */
export function canonicalBytes(
  value: unknown,
  policy: CanonicalPolicy = "ascii",
): Buffer {
  return Buffer.from(canonicalJson(value, policy), "utf8");
}

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

const NON_ASCII_RE = /[\u0080-\uffff]/g;

function encodeString(s: string, policy: CanonicalPolicy): string {
  const quoted = JSON.stringify(s);
  if (policy === "unicode") return quoted;
  return quoted.replace(
    NON_ASCII_RE,
    (ch) => "\\u" + ch.charCodeAt(0).toString(16).padStart(4, "0"),
  );
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function serialize(
  value: unknown,
  policy: CanonicalPolicy,
  path: string,
  seen: Set<object>,
): string {
  if (value === null) return "null";

  switch (typeof value) {
    case "string":
      return encodeString(value, policy);
    case "boolean":
      return value ? "true" : "false";
    case "number":
      if (!Number.isFinite(value)) {
        throw new NotSerializableError(
          `Non-finite number at ${path} has no canonical form`,
          path,
        );
      }
      return JSON.stringify(value);
    case "object":
      break;
    default:
      throw new NotSerializableError(
        `Value of type ${typeof value} at ${path} is not JSON-serializable`,
        path,
      );
  }

  if (value instanceof Date) {
    return encodeString(value.toISOString(), policy);
  }

  if (seen.has(value)) {
    throw new NotSerializableError(`Cycle detected at ${path}`, path);
  }
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      const parts: string[] = [];
      value.forEach((element: unknown, i) => {
        parts.push(serialize(element, policy, `${path}[${i}]`, seen));
      });
      return `[${parts.join(",")}]`;
    }

    if (!isPlainObject(value)) {
      const kind = value.constructor?.name ?? "object";
      throw new NotSerializableError(
        `${kind} at ${path} has no canonical ordering`,
        path,
      );
    }

    const parts: string[] = [];
    for (const key of Object.keys(value).sort()) {
      const member = value[key];
      if (member === undefined) continue;
      parts.push(
        `${encodeString(key, policy)}:${serialize(member, policy, `${path}.${key}`, seen)}`,
      );
    }
    return `{${parts.join(",")}}`;
  } finally {
    seen.delete(value);
  }
}
