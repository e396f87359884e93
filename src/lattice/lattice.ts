/**
 * Context lattice: a product order over operating contexts.
 *
 * A context is at most as permissive as another (`leq`) iff it is so on
 * every dimension. `covers(sup, sub)` reads "sup is at least as permissive
 * as sub" and is the relation every coverage policy is phrased in.
 *
 * Loaded once per check run and never mutated afterwards.
 */

import { existsSync, readFileSync } from "node:fs";
import { Ajv, type SchemaObject, type ValidateFunction } from "ajv";
import type { ZodError } from "zod";
import { loadDataFile } from "../audit/data-file.js";
import {
  createBooleanDimension,
  createOrderedEnumDimension,
  createSetDimension,
  dimensionJoin,
  dimensionLeq,
  dimensionMeet,
  normalizeValue,
  valueToRaw,
  type Dimension,
  type DimensionValue,
  type RawDimensionValue,
} from "./dimension.js";
import { formatIssues } from "../runtime/validation.js";
import {
  BooleanDimensionSpecSchema,
  LatticeDocumentSchema,
  OrderedEnumDimensionSpecSchema,
  SetDimensionSpecSchema,
  type LatticeMetadata,
} from "./document.js";
import { LatticeError } from "./errors.js";

export interface ContextDescriptor {
  /** Context id for declared contexts; null for computed joins and meets. */
  readonly id: string | null;
  readonly values: ReadonlyMap<string, DimensionValue>;
}

export interface LoadLatticeOptions {
  /** JSON Schema the document must satisfy. Unreadable schema fails closed. */
  schemaPath?: string;
}

// ---------------------------------------------------------------------------
// Document → dimensions / contexts
// ---------------------------------------------------------------------------

type SpecParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: ZodError };

function specOrThrow<T>(name: string, result: SpecParseResult<T>): T {
  if (!result.success) {
    throw new LatticeError(
      `Dimension '${name}' is malformed: ${formatIssues(result.error)}`,
      "INVALID_DIMENSION",
      { dimension: name },
    );
  }
  return result.data;
}

function buildDimension(name: string, spec: Record<string, unknown>): Dimension {
  const type = spec["type"];
  switch (type) {
    case "set": {
      const s = specOrThrow(name, SetDimensionSpecSchema.safeParse(spec));
      return createSetDimension(name, s.atoms, s.top, s.bottom);
    }
    case "ordered_enum": {
      const s = specOrThrow(name, OrderedEnumDimensionSpecSchema.safeParse(spec));
      return createOrderedEnumDimension(name, s.order, s.top, s.bottom);
    }
    case "boolean": {
      const s = specOrThrow(name, BooleanDimensionSpecSchema.safeParse(spec));
      return createBooleanDimension(name, s.top, s.bottom);
    }
    default:
      throw new LatticeError(
        `Unknown dimension type '${String(type)}' for '${name}'`,
        "INVALID_DIMENSION",
        { dimension: name },
      );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return isRecord(value);
}

function buildContext(
  id: string,
  raw: unknown,
  dimensions: ReadonlyMap<string, Dimension>,
): ContextDescriptor {
  if (!isRecord(raw)) {
    throw new LatticeError(
      `Context '${id}' must be an object`,
      "MALFORMED_DOCUMENT",
      { context: id },
    );
  }
  const keys = new Set(Object.keys(raw));
  const missing = [...dimensions.keys()].filter((d) => !keys.has(d)).sort();
  const extra = [...keys].filter((k) => !dimensions.has(k)).sort();
  if (missing.length > 0) {
    throw new LatticeError(
      `Context '${id}' missing dimensions: ${JSON.stringify(missing)}`,
      "CONTEXT_MISSING_DIMENSIONS",
      { context: id, missing },
    );
  }
  if (extra.length > 0) {
    throw new LatticeError(
      `Context '${id}' has unknown dimensions: ${JSON.stringify(extra)}`,
      "CONTEXT_UNKNOWN_DIMENSIONS",
      { context: id, extra },
    );
  }
  const values = new Map<string, DimensionValue>();
  for (const [name, dim] of dimensions) {
    values.set(name, normalizeValue(dim, raw[name]));
  }
  return { id, values };
}

// ---------------------------------------------------------------------------
// Lattice
// ---------------------------------------------------------------------------

export class ContextLattice {
  readonly version: string;
  readonly metadata: LatticeMetadata | undefined;
  private readonly dimensions: ReadonlyMap<string, Dimension>;
  private readonly contexts: ReadonlyMap<string, ContextDescriptor>;

  private constructor(
    version: string,
    dimensions: ReadonlyMap<string, Dimension>,
    contexts: ReadonlyMap<string, ContextDescriptor>,
    metadata: LatticeMetadata | undefined,
  ) {
    this.version = version;
    this.dimensions = dimensions;
    this.contexts = contexts;
    this.metadata = metadata;
  }

  /**
   * Read a YAML or JSON lattice document, optionally validating it against
   * a JSON Schema first.
   */
  static load(path: string, options: LoadLatticeOptions = {}): ContextLattice {
    if (!existsSync(path)) {
      throw new LatticeError(`Lattice file not found: ${path}`, "FILE_NOT_FOUND", {
        path,
      });
    }
    let data: unknown;
    try {
      data = loadDataFile(path);
    } catch (error) {
      throw new LatticeError(
        `Failed to parse lattice ${path}: ${String(error)}`,
        "MALFORMED_DOCUMENT",
        { path },
      );
    }
    if (options.schemaPath !== undefined) {
      validateAgainstSchema(data, options.schemaPath);
    }
    return ContextLattice.fromDocument(data);
  }

  /** Build a lattice from an already-parsed document. */
  static fromDocument(data: unknown): ContextLattice {
    const parsed = LatticeDocumentSchema.safeParse(data);
    if (!parsed.success) {
      throw new LatticeError(
        `Malformed lattice document: ${formatIssues(parsed.error)}`,
        "MALFORMED_DOCUMENT",
      );
    }
    const doc = parsed.data;

    const dimensions = new Map<string, Dimension>();
    for (const [name, spec] of Object.entries(doc.dimensions)) {
      dimensions.set(name, buildDimension(name, spec));
    }
    if (dimensions.size === 0) {
      throw new LatticeError(
        "Lattice must define at least one dimension",
        "MALFORMED_DOCUMENT",
      );
    }

    const contexts = new Map<string, ContextDescriptor>();
    for (const [id, raw] of Object.entries(doc.contexts)) {
      contexts.set(id, buildContext(id, raw, dimensions));
    }
    if (contexts.size === 0) {
      throw new LatticeError(
        "Lattice must define at least one context",
        "MALFORMED_DOCUMENT",
      );
    }

    return new ContextLattice(doc.version, dimensions, contexts, doc.metadata);
  }

  // -----------------------------------------------------------------------
  // Lookup
  // -----------------------------------------------------------------------

  dimensionNames(): string[] {
    return [...this.dimensions.keys()];
  }

  contextIds(): string[] {
    return [...this.contexts.keys()];
  }

  has(contextId: string): boolean {
    return this.contexts.has(contextId);
  }

  resolve(contextId: string): ContextDescriptor {
    const ctx = this.contexts.get(contextId);
    if (ctx === undefined) {
      throw new LatticeError(
        `Unknown context id '${contextId}'`,
        "UNKNOWN_CONTEXT",
        { context: contextId },
      );
    }
    return ctx;
  }

  // -----------------------------------------------------------------------
  // Order
  // -----------------------------------------------------------------------

  /** True iff `right` is at least as permissive as `left` on every dimension. */
  leq(leftId: string, rightId: string): boolean {
    const left = this.resolve(leftId);
    const right = this.resolve(rightId);
    for (const [name, dim] of this.dimensions) {
      if (!dimensionLeq(dim, valueOf(left, name), valueOf(right, name))) {
        return false;
      }
    }
    return true;
  }

  /** `sup` is at least as permissive as `sub` across every dimension. */
  covers(supId: string, subId: string): boolean {
    return this.leq(subId, supId);
  }

  join(contextIds: readonly string[]): ContextDescriptor {
    return this.combine(contextIds, "join");
  }

  meet(contextIds: readonly string[]): ContextDescriptor {
    return this.combine(contextIds, "meet");
  }

  /** Document form of a descriptor, keyed by dimension name. */
  describe(descriptor: ContextDescriptor): Record<string, RawDimensionValue> {
    const out: Record<string, RawDimensionValue> = {};
    for (const [name, dim] of this.dimensions) {
      out[name] = valueToRaw(dim, valueOf(descriptor, name));
    }
    return out;
  }

  private combine(
    contextIds: readonly string[],
    op: "join" | "meet",
  ): ContextDescriptor {
    if (contextIds.length === 0) {
      throw new LatticeError(
        `${op} requires at least one context id`,
        "EMPTY_INPUT",
      );
    }
    const resolved = contextIds.map((id) => this.resolve(id));
    const values = new Map<string, DimensionValue>();
    for (const [name, dim] of this.dimensions) {
      const column = resolved.map((ctx) => valueOf(ctx, name));
      values.set(
        name,
        op === "join" ? dimensionJoin(dim, column) : dimensionMeet(dim, column),
      );
    }
    return { id: null, values };
  }
}

function valueOf(ctx: ContextDescriptor, dimension: string): DimensionValue {
  const value = ctx.values.get(dimension);
  if (value === undefined) {
    throw new LatticeError(
      `Context '${ctx.id ?? "(computed)"}' has no value for dimension '${dimension}'`,
      "CONTEXT_MISSING_DIMENSIONS",
      { context: ctx.id, missing: [dimension] },
    );
  }
  return value;
}

// ---------------------------------------------------------------------------
// JSON Schema validation
// ---------------------------------------------------------------------------

function validateAgainstSchema(data: unknown, schemaPath: string): void {
  let schema: unknown;
  try {
    schema = JSON.parse(readFileSync(schemaPath, "utf8"));
  } catch (error) {
    throw new LatticeError(
      `Schema file not readable: ${schemaPath}: ${String(error)}`,
      "SCHEMA_UNAVAILABLE",
      { schemaPath },
    );
  }
  if (!isSchemaObject(schema)) {
    throw new LatticeError(
      `Schema file is not a JSON object: ${schemaPath}`,
      "SCHEMA_UNAVAILABLE",
      { schemaPath },
    );
  }

  const ajv = new Ajv({ allErrors: true, strict: false });
  let validate: ValidateFunction;
  try {
    validate = ajv.compile(schema);
  } catch (error) {
    throw new LatticeError(
      `Schema file is not a valid JSON Schema: ${schemaPath}: ${String(error)}`,
      "SCHEMA_UNAVAILABLE",
      { schemaPath },
    );
  }
  if (!validate(data)) {
    throw new LatticeError(
      `Lattice schema validation failed: ${ajv.errorsText(validate.errors)}`,
      "SCHEMA_INVALID",
      { schemaPath },
    );
  }
}
