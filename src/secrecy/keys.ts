/**
 * HMAC key providers.
 *
 * The fingerprint engine never reads process state on its own; callers pass
 * a provider, which makes the key source explicit and injectable in tests.
 */

export interface KeyProvider {
  /** Key material for `name`, or undefined when there is none. */
  getKey(name: string): string | Buffer | undefined;
}

/** Keys from an environment map (process.env by default). */
export function envKeyProvider(
  env: Readonly<Record<string, string | undefined>> = process.env,
): KeyProvider {
  return {
    getKey: (name) => env[name],
  };
}

/** Fixed in-memory keys. */
export function staticKeyProvider(
  keys: Readonly<Record<string, string | Buffer>>,
): KeyProvider {
  const table = new Map(Object.entries(keys));
  return {
    getKey: (name) => table.get(name),
  };
}

/** Provider that knows no keys. */
export const noKeys: KeyProvider = {
  getKey: () => undefined,
};
