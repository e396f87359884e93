import { describe, it, expect, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { FingerprintError } from "../src/secrecy/errors.js";
import {
  buildSecretFingerprintIndex,
  certifyScan,
  computeSuiteFingerprintRoot,
  detectLeaks,
  loadSecretHashRegistry,
  parseSecretHashRegistry,
} from "../src/secrecy/registry.js";
import { scanProtectedPaths } from "../src/secrecy/scan.js";

const FP_X = "sha256:b463c1524601cb7b657e0717a90054c840bcac0c7070b12567297b3343f7a3b6";

const SCHEME = {
  scheme_id: "sha256-v1",
  normalization_id: "json-canonical-v1",
  digest_prefix: "sha256:",
};

function registryDoc(fingerprints: string[]): Record<string, unknown> {
  return {
    registry_version: "1.0",
    hashing_scheme: SCHEME,
    suite_registry_hash: "sha256:placeholder",
    suites: [{ suite_id: "secret-suite", test_case_fingerprints: fingerprints }],
  };
}

function fingerprintCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof FingerprintError ? error.code : "not-a-fingerprint-error";
  }
  return undefined;
}

describe("secret hash registry", () => {
  let root: string | undefined;

  afterEach(() => {
    if (root) rmSync(root, { recursive: true, force: true });
    root = undefined;
  });

  function write(rel: string, content: string): string {
    root ??= mkdtempSync(join(tmpdir(), "evidence-gate-registry-"));
    const path = join(root, rel);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
    return path;
  }

  it("loads a registry and its scheme", () => {
    const path = write("registry.json", JSON.stringify(registryDoc([FP_X])));
    const { registry, scheme } = loadSecretHashRegistry(path);
    expect(scheme.schemeId).toBe("sha256-v1");
    expect(registry.suites[0]?.test_case_fingerprints).toEqual([FP_X]);
  });

  it("reports a missing file as REGISTRY_MISSING", () => {
    expect(fingerprintCode(() => loadSecretHashRegistry(join(tmpdir(), "no-such-registry.json")))).toBe(
      "REGISTRY_MISSING",
    );
  });

  it("reports invalid JSON and missing fields as REGISTRY_INVALID", () => {
    const broken = write("broken.json", "{");
    expect(fingerprintCode(() => loadSecretHashRegistry(broken))).toBe("REGISTRY_INVALID");

    const doc = registryDoc([]);
    delete doc["suite_registry_hash"];
    expect(() => parseSecretHashRegistry(doc)).toThrow("Secret hash registry missing 'suite_registry_hash'");
    expect(fingerprintCode(() => parseSecretHashRegistry([]))).toBe("REGISTRY_INVALID");
  });

  it("surfaces an invalid hashing scheme", () => {
    expect(fingerprintCode(() => parseSecretHashRegistry({ ...registryDoc([]), hashing_scheme: {} }))).toBe(
      "INVALID_SCHEME",
    );
  });

  // ----- leak detection (declared ∩ scanned) -----

  it("reports a declared fingerprint found in a protected file", () => {
    write("prompts/suite_copy.json", '[{"prompt":"X"}]');
    const { registry, scheme } = parseSecretHashRegistry(registryDoc([FP_X]));
    const scan = scanProtectedPaths(root ?? "", scheme);

    const leaks = detectLeaks(buildSecretFingerprintIndex(registry), scan);

    expect(leaks).toEqual([
      { fingerprint: FP_X, suiteIds: ["secret-suite"], files: ["prompts/suite_copy.json"] },
    ]);
    expect(certifyScan(leaks, scan.errors)).toBe("leak_detected");
  });

  it("reports no leak when the corpus holds different items", () => {
    write("prompts/other.json", '{"prompt":"Y"}');
    const { registry, scheme } = parseSecretHashRegistry(registryDoc([FP_X]));
    const scan = scanProtectedPaths(root ?? "", scheme);

    const leaks = detectLeaks(buildSecretFingerprintIndex(registry), scan);

    expect(leaks).toEqual([]);
    expect(certifyScan(leaks, scan.errors)).toBe("clean");
  });

  it("never certifies a scan with errors as clean", () => {
    write("prompts/broken.json", "{");
    const { registry, scheme } = parseSecretHashRegistry(registryDoc([FP_X]));
    const scan = scanProtectedPaths(root ?? "", scheme);
    const leaks = detectLeaks(buildSecretFingerprintIndex(registry), scan);

    expect(leaks).toEqual([]);
    expect(certifyScan(leaks, scan.errors)).toBe("inconclusive");
  });
});

describe("buildSecretFingerprintIndex", () => {
  it("maps each fingerprint to every suite declaring it", () => {
    const index = buildSecretFingerprintIndex({
      suites: [
        { suite_id: "s1", test_case_fingerprints: ["f1", "f2"] },
        { suite_id: "s2", test_case_fingerprints: ["f2"] },
      ],
    });
    expect([...index.fingerprints].sort()).toEqual(["f1", "f2"]);
    expect([...(index.suites.get("f2") ?? [])]).toEqual(["s1", "s2"]);
  });
});

describe("computeSuiteFingerprintRoot", () => {
  it("hashes the sorted fingerprints joined by newlines", () => {
    expect(computeSuiteFingerprintRoot([FP_X])).toBe(
      "sha256:e1d18e8c00ee3a7c0cf8391bc01b56a2febe83ceb017128692feb9fbf975effb",
    );
    expect(computeSuiteFingerprintRoot(["sha256:b", "sha256:a"])).toBe(
      "sha256:1e8e6cd4f15dd04cef3446ed78c0e5ad20782d551738076d207d1dfc74ada9a5",
    );
  });

  it("is order-independent", () => {
    expect(computeSuiteFingerprintRoot(["c", "a", "b"])).toBe(computeSuiteFingerprintRoot(["b", "c", "a"]));
  });

  it("hashes the empty string for no fingerprints", () => {
    expect(computeSuiteFingerprintRoot([])).toBe(
      "sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });
});
