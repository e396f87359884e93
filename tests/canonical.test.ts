import { describe, it, expect } from "vitest";
import {
  canonicalBytes,
  canonicalJson,
  NotSerializableError,
} from "../src/audit/canonical.js";

describe("canonicalJson", () => {
  // ----- key ordering -----

  it("sorts keys at every level", () => {
    expect(canonicalJson({ b: { z: 1, a: 2 }, a: 1 })).toBe(
      '{"a":1,"b":{"a":2,"z":1}}',
    );
  });

  it("orders integer-like keys lexicographically, not numerically", () => {
    expect(canonicalJson({ "10": "x", "2": "y", "1": "z" })).toBe(
      '{"1":"z","10":"x","2":"y"}',
    );
  });

  it("key insertion order does not affect output", () => {
    const a: Record<string, number> = {};
    a["z"] = 1;
    a["a"] = 2;
    const b: Record<string, number> = {};
    b["a"] = 2;
    b["z"] = 1;
    expect(canonicalJson(a)).toBe(canonicalJson(b));
  });

  // ----- arrays -----

  it("preserves array element order", () => {
    expect(canonicalJson({ items: [3, 1, 2] })).toBe('{"items":[3,1,2]}');
  });

  it("sorts keys inside objects within arrays", () => {
    expect(canonicalJson([{ b: 2, a: 1 }])).toBe('[{"a":1,"b":2}]');
  });

  // ----- primitives -----

  it("serialises top-level primitives", () => {
    expect(canonicalJson("hello")).toBe('"hello"');
    expect(canonicalJson(42)).toBe("42");
    expect(canonicalJson(0.5)).toBe("0.5");
    expect(canonicalJson(true)).toBe("true");
    expect(canonicalJson(null)).toBe("null");
  });

  it("handles empty objects and arrays", () => {
    expect(canonicalJson({})).toBe("{}");
    expect(canonicalJson([])).toBe("[]");
  });

  it("omits undefined object members", () => {
    expect(canonicalJson({ a: 1, b: undefined, c: { x: undefined } })).toBe(
      '{"a":1,"c":{}}',
    );
  });

  it("converts Date objects to ISO 8601 strings", () => {
    const date = new Date("2026-02-09T12:00:00.000Z");
    expect(canonicalJson({ ts: date })).toBe('{"ts":"2026-02-09T12:00:00.000Z"}');
  });

  // ----- escaping policies -----

  it("escapes non-ASCII as lowercase \\u sequences under the ascii policy", () => {
    expect(canonicalJson({ name: "café" })).toBe('{"name":"caf\\u00e9"}');
    expect(canonicalJson("日本")).toBe('"\\u65e5\\u672c"');
  });

  it("escapes non-ASCII keys too", () => {
    expect(canonicalJson({ "é": 1 })).toBe('{"\\u00e9":1}');
  });

  it("emits non-ASCII characters as-is under the unicode policy", () => {
    expect(canonicalJson({ name: "café" }, "unicode")).toBe('{"name":"café"}');
  });

  it("policies agree on pure-ASCII input", () => {
    const value = { q: "what is 2+2?", a: ["4"] };
    expect(canonicalJson(value, "ascii")).toBe(canonicalJson(value, "unicode"));
  });

  it("escapes quotes and control characters the same way under both policies", () => {
    expect(canonicalJson('a"b\n', "ascii")).toBe('"a\\"b\\n"');
    expect(canonicalJson('a"b\n', "unicode")).toBe('"a\\"b\\n"');
  });

  // ----- rejection -----

  it("rejects non-finite numbers", () => {
    expect(() => canonicalJson({ a: Number.NaN })).toThrow(NotSerializableError);
    expect(() => canonicalJson([Number.POSITIVE_INFINITY])).toThrow(NotSerializableError);
  });

  it("rejects undefined outside object members", () => {
    expect(() => canonicalJson([undefined])).toThrow(NotSerializableError);
    expect(() => canonicalJson(undefined)).toThrow(NotSerializableError);
  });

  it("rejects functions, symbols and bigints", () => {
    expect(() => canonicalJson({ f: () => 1 })).toThrow(NotSerializableError);
    expect(() => canonicalJson({ s: Symbol("x") })).toThrow(NotSerializableError);
    expect(() => canonicalJson({ n: 10n })).toThrow(NotSerializableError);
  });

  it("rejects maps, sets and class instances", () => {
    class Point {
      x = 1;
    }
    expect(() => canonicalJson(new Map())).toThrow(NotSerializableError);
    expect(() => canonicalJson({ s: new Set([1]) })).toThrow(NotSerializableError);
    expect(() => canonicalJson(new Point())).toThrow(NotSerializableError);
  });

  it("reports the path of the offending value", () => {
    try {
      canonicalJson({ a: [1, { b: Number.NaN }] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(NotSerializableError);
      if (error instanceof NotSerializableError) {
        expect(error.code).toBe("NOT_SERIALIZABLE");
        expect(error.details).toEqual({ path: "$.a[1].b" });
      }
    }
  });

  it("rejects cycles but accepts shared references", () => {
    const cyclic: Record<string, unknown> = {};
    cyclic["self"] = cyclic;
    expect(() => canonicalJson(cyclic)).toThrow(/Cycle detected at \$\.self/);

    const shared = { v: 1 };
    expect(canonicalJson({ a: shared, b: shared })).toBe('{"a":{"v":1},"b":{"v":1}}');
  });
});

describe("canonicalBytes", () => {
  it("is the UTF-8 encoding of the canonical string", () => {
    expect(canonicalBytes({ name: "café" }, "unicode").equals(Buffer.from('{"name":"café"}', "utf8"))).toBe(true);
    expect(canonicalBytes({ name: "café" }).toString("utf8")).toBe('{"name":"caf\\u00e9"}');
  });
});
