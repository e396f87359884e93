import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { ContextLattice } from "../src/lattice/lattice.js";
import { LatticeError } from "../src/lattice/errors.js";

const SCHEMA_PATH = fileURLToPath(new URL("../schemas/ContextLattice.schema.json", import.meta.url));

const LATTICE_YAML = `
version: "1.0"
dimensions:
  tool_access:
    type: set
    atoms: [web, email, shell]
    top: "*"
  autonomy:
    type: ordered_enum
    order: [supervised, assisted, autonomous]
    bottom: supervised
  network:
    type: boolean
contexts:
  any:
    tool_access: "*"
    autonomy: "*"
    network: true
  web_only:
    tool_access: [web]
    autonomy: assisted
    network: true
  email_only:
    tool_access: [email]
    autonomy: supervised
    network: false
  offline:
    tool_access: []
    autonomy: supervised
    network: false
metadata:
  rfc_reference: RFC-0007
`;

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof LatticeError ? error.code : "not-a-lattice-error";
  }
  return undefined;
}

describe("ContextLattice", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  function writeTemp(name: string, content: string): string {
    dir ??= mkdtempSync(join(tmpdir(), "evidence-gate-lattice-"));
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  }

  function loadDefault(): ContextLattice {
    return ContextLattice.load(writeTemp("lattice.yaml", LATTICE_YAML), { schemaPath: SCHEMA_PATH });
  }

  // ----- loading -----

  it("loads a YAML document validated against the schema", () => {
    const lattice = loadDefault();
    expect(lattice.version).toBe("1.0");
    expect(lattice.dimensionNames()).toEqual(["tool_access", "autonomy", "network"]);
    expect(lattice.contextIds()).toEqual(["any", "web_only", "email_only", "offline"]);
    expect(lattice.metadata?.rfc_reference).toBe("RFC-0007");
  });

  it("loads JSON documents and stringifies numeric versions", () => {
    const path = writeTemp(
      "lattice.json",
      JSON.stringify({
        version: 2,
        dimensions: { flag: { type: "boolean" } },
        contexts: { on: { flag: true } },
      }),
    );
    expect(ContextLattice.load(path).version).toBe("2");
  });

  it("fails with FILE_NOT_FOUND for a missing file", () => {
    expect(codeOf(() => ContextLattice.load(join(tmpdir(), "no-such-lattice.yaml")))).toBe("FILE_NOT_FOUND");
  });

  it("fails with MALFORMED_DOCUMENT for unparseable content", () => {
    const path = writeTemp("broken.json", "{ not json");
    expect(codeOf(() => ContextLattice.load(path))).toBe("MALFORMED_DOCUMENT");
  });

  it("fails closed when the schema file is unavailable", () => {
    const path = writeTemp("lattice.yaml", LATTICE_YAML);
    expect(codeOf(() => ContextLattice.load(path, { schemaPath: join(tmpdir(), "missing.schema.json") }))).toBe(
      "SCHEMA_UNAVAILABLE",
    );
    const notObject = writeTemp("list.schema.json", "[]");
    expect(codeOf(() => ContextLattice.load(path, { schemaPath: notObject }))).toBe("SCHEMA_UNAVAILABLE");
  });

  it("fails with SCHEMA_INVALID when the document violates the schema", () => {
    const path = writeTemp("lattice.json", JSON.stringify({ version: "1", dimensions: {} }));
    expect(codeOf(() => ContextLattice.load(path, { schemaPath: SCHEMA_PATH }))).toBe("SCHEMA_INVALID");
  });

  it("requires a version", () => {
    expect(() =>
      ContextLattice.fromDocument({ dimensions: { f: { type: "boolean" } }, contexts: { c: { f: true } } }),
    ).toThrow("Lattice is missing version");
  });

  it("rejects unknown dimension types", () => {
    expect(
      codeOf(() =>
        ContextLattice.fromDocument({
          version: "1",
          dimensions: { f: { type: "range" } },
          contexts: { c: { f: 1 } },
        }),
      ),
    ).toBe("INVALID_DIMENSION");
  });

  it("reports missing dimensions before unknown ones", () => {
    const doc = {
      version: "1",
      dimensions: { a: { type: "boolean" }, b: { type: "boolean" } },
      contexts: { c: { a: true, z: false } },
    };
    try {
      ContextLattice.fromDocument(doc);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LatticeError);
      if (error instanceof LatticeError) {
        expect(error.code).toBe("CONTEXT_MISSING_DIMENSIONS");
        expect(error.details).toEqual({ context: "c", missing: ["b"] });
      }
    }
  });

  it("rejects contexts naming dimensions the lattice lacks", () => {
    const doc = {
      version: "1",
      dimensions: { a: { type: "boolean" } },
      contexts: { c: { a: true, z: false } },
    };
    expect(codeOf(() => ContextLattice.fromDocument(doc))).toBe("CONTEXT_UNKNOWN_DIMENSIONS");
  });

  it("rejects a context value outside its dimension", () => {
    const doc = {
      version: "1",
      dimensions: { tools: { type: "set", atoms: ["web"] } },
      contexts: { c: { tools: ["ftp"] } },
    };
    expect(codeOf(() => ContextLattice.fromDocument(doc))).toBe("UNKNOWN_VALUE");
  });

  // ----- resolution and order -----

  it("resolves contexts and rejects unknown ids", () => {
    const lattice = loadDefault();
    expect(lattice.has("web_only")).toBe(true);
    expect(lattice.describe(lattice.resolve("web_only"))).toEqual({
      tool_access: ["web"],
      autonomy: "assisted",
      network: true,
    });
    expect(codeOf(() => lattice.resolve("nowhere"))).toBe("UNKNOWN_CONTEXT");
  });

  it("covers(sup, sub) holds when sup is at least as permissive as sub", () => {
    const lattice = loadDefault();
    expect(lattice.covers("any", "web_only")).toBe(true);
    expect(lattice.covers("web_only", "any")).toBe(false);
    expect(lattice.covers("web_only", "offline")).toBe(true);
    expect(lattice.covers("web_only", "email_only")).toBe(false);
    expect(lattice.leq("offline", "any")).toBe(true);
  });

  it("is reflexive and transitive over declared contexts", () => {
    const lattice = loadDefault();
    const ids = lattice.contextIds();
    for (const a of ids) {
      expect(lattice.leq(a, a)).toBe(true);
      for (const b of ids) {
        for (const c of ids) {
          if (lattice.leq(a, b) && lattice.leq(b, c)) expect(lattice.leq(a, c)).toBe(true);
        }
      }
    }
  });

  it("joins and meets contexts dimension by dimension", () => {
    const lattice = loadDefault();
    const joined = lattice.join(["web_only", "email_only"]);
    expect(joined.id).toBeNull();
    expect(lattice.describe(joined)).toEqual({
      tool_access: ["email", "web"],
      autonomy: "assisted",
      network: true,
    });
    expect(lattice.describe(lattice.meet(["any", "web_only"]))).toEqual({
      tool_access: ["web"],
      autonomy: "assisted",
      network: true,
    });
    expect(lattice.describe(lattice.join(["any", "offline"]))).toEqual({
      tool_access: "*",
      autonomy: "*",
      network: true,
    });
  });

  it("rejects empty joins and meets", () => {
    const lattice = loadDefault();
    expect(codeOf(() => lattice.join([]))).toBe("EMPTY_INPUT");
    expect(codeOf(() => lattice.meet([]))).toBe("EMPTY_INPUT");
  });
});

describe("end-to-end coverage", () => {
  it("a wildcard context covers a narrower one but not the reverse", () => {
    const lattice = ContextLattice.fromDocument({
      version: "1",
      dimensions: { tool_access: { type: "set", atoms: ["web", "email"], top: "*" } },
      contexts: { any: { tool_access: "*" }, web_only: { tool_access: ["web"] } },
    });
    expect(lattice.covers("any", "web_only")).toBe(true);
    expect(lattice.covers("web_only", "any")).toBe(false);
  });
});
