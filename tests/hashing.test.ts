import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  contentHash,
  fileHash,
  normalizeHash,
  sha256Bytes,
  sha256Hex,
  verifyHash,
} from "../src/audit/hashing.js";
import { NotSerializableError } from "../src/audit/canonical.js";

// ===================================================================
// primitives
// ===================================================================

describe("sha256Hex", () => {
  it("produces correct digest for empty string", () => {
    expect(sha256Hex("")).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  it("produces correct digest for 'hello'", () => {
    expect(sha256Hex("hello")).toBe(
      "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824",
    );
  });

  it("agrees with sha256Bytes for the same UTF-8 content", () => {
    expect(sha256Bytes(Buffer.from("hello", "utf8"))).toBe(sha256Hex("hello"));
  });
});

// ===================================================================
// contentHash
// ===================================================================

describe("contentHash", () => {
  it("hashes the canonical form with a sha256: prefix", () => {
    expect(contentHash({ b: [1, 2], a: 1 })).toBe(
      "sha256:8baa73198470c7bb4c3ce142a8fd651affc0310d878bb9bd159e37a573fb4874",
    );
  });

  it("is independent of key insertion order", () => {
    expect(contentHash({ x: 1, y: { b: 2, a: 1 } })).toBe(
      contentHash({ y: { a: 1, b: 2 }, x: 1 }),
    );
  });

  it("uses the ASCII-escaped form", () => {
    expect(contentHash({ name: "café" })).toBe(
      "sha256:9db11f5f5dc2b3898bb358a2e545b3c96e9052c61e2b4f4de41acded22ef5128",
    );
  });

  it("propagates NotSerializableError", () => {
    expect(() => contentHash({ bad: Number.NaN })).toThrow(NotSerializableError);
  });
});

// ===================================================================
// fileHash
// ===================================================================

describe("fileHash", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  function tempDir(): string {
    dir = mkdtempSync(join(tmpdir(), "evidence-gate-hash-"));
    return dir;
  }

  it("hashes JSON files by content", () => {
    const root = tempDir();
    const path = join(root, "data.json");
    writeFileSync(path, '{\n  "b": [1, 2],\n  "a": 1\n}\n');
    expect(fileHash(path)).toBe(contentHash({ a: 1, b: [1, 2] }));
  });

  it("gives a YAML file the same hash as equivalent JSON", () => {
    const root = tempDir();
    const jsonPath = join(root, "doc.json");
    const yamlPath = join(root, "doc.yaml");
    writeFileSync(jsonPath, '{"a": 1, "b": [1, 2]}');
    writeFileSync(yamlPath, "b:\n  - 1\n  - 2\na: 1\n");
    expect(fileHash(yamlPath)).toBe(fileHash(jsonPath));
  });

  it("hashes other files by their raw bytes", () => {
    const root = tempDir();
    const path = join(root, "notes.txt");
    writeFileSync(path, "plain text\n");
    expect(fileHash(path)).toBe(
      "sha256:c30a92f9ef889c07c781a7cf99f5b71415d4d1289e84473d1b9e6f01feffc62d",
    );
  });

  it("streams raw files larger than one chunk", () => {
    const root = tempDir();
    const path = join(root, "big.bin");
    const content = Buffer.alloc(20_000, 7);
    writeFileSync(path, content);
    expect(fileHash(path)).toBe(`sha256:${sha256Bytes(content)}`);
  });
});

// ===================================================================
// normalizeHash / verifyHash
// ===================================================================

describe("normalizeHash", () => {
  it("strips an algorithm prefix", () => {
    expect(normalizeHash("sha256:abc123")).toBe("abc123");
    expect(normalizeHash("hmac-sha256:abc123")).toBe("abc123");
  });

  it("leaves bare digests alone", () => {
    expect(normalizeHash("abc123")).toBe("abc123");
  });

  it("maps absent input to the empty string", () => {
    expect(normalizeHash(undefined)).toBe("");
    expect(normalizeHash(null)).toBe("");
    expect(normalizeHash("")).toBe("");
  });
});

describe("verifyHash", () => {
  it("accepts a prefixed and a bare form of the same digest", () => {
    expect(verifyHash("sha256:abc123", "abc123")).toBe(true);
    expect(verifyHash("abc123", "sha256:abc123")).toBe(true);
  });

  it("rejects different digests", () => {
    expect(verifyHash("sha256:abc123", "sha256:abc124")).toBe(false);
  });

  it("is never vacuously true", () => {
    expect(verifyHash("", "")).toBe(false);
    expect(verifyHash(undefined, "sha256:abc")).toBe(false);
    expect(verifyHash("sha256:abc", null)).toBe(false);
    expect(verifyHash("sha256:", "sha256:")).toBe(false);
  });
});
