/**
 * Dimension algebra for the context lattice.
 *
 * A dimension is one axis of context variation. The three kinds form a
 * closed union dispatched by `type`; every value carries the kind and the
 * name of the dimension it was normalized against, so a value from one
 * dimension is never compared against another's.
 *
 * TOP ("any / all") is a variant of each dimension's own value type and is
 * strictly more permissive than every ordinary value.
 */

import { LatticeError } from "./errors.js";

// ---------------------------------------------------------------------------
// Dimensions
// ---------------------------------------------------------------------------

export const SET_TOP_SYMBOL = "*";

export interface SetDimension {
  readonly type: "set";
  readonly name: string;
  readonly atoms: ReadonlySet<string>;
  readonly top: typeof SET_TOP_SYMBOL;
  readonly bottom: readonly string[];
}

export interface OrderedEnumDimension {
  readonly type: "ordered_enum";
  readonly name: string;
  readonly order: readonly string[];
  /** `"*"` or one of `order`; a raw value equal to it normalizes to TOP. */
  readonly top: string;
  readonly bottom: string;
  readonly rank: ReadonlyMap<string, number>;
}

export interface BooleanDimension {
  readonly type: "boolean";
  readonly name: string;
  /** The more permissive constant. */
  readonly top: boolean;
  readonly bottom: boolean;
}

export type Dimension = SetDimension | OrderedEnumDimension | BooleanDimension;

export type DimensionType = Dimension["type"];

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

export type SetValue =
  | { readonly type: "set"; readonly dimension: string; readonly kind: "top" }
  | {
      readonly type: "set";
      readonly dimension: string;
      readonly kind: "atoms";
      /** Sorted, de-duplicated. */
      readonly atoms: readonly string[];
    };

export type OrderedEnumValue =
  | {
      readonly type: "ordered_enum";
      readonly dimension: string;
      readonly kind: "top";
    }
  | {
      readonly type: "ordered_enum";
      readonly dimension: string;
      readonly kind: "token";
      readonly token: string;
    };

export interface BooleanValue {
  readonly type: "boolean";
  readonly dimension: string;
  readonly kind: "bool";
  readonly value: boolean;
}

export type DimensionValue = SetValue | OrderedEnumValue | BooleanValue;

/** Document form of a value: `"*"`, a list of atoms, a token or a boolean. */
export type RawDimensionValue = string | readonly string[] | boolean;

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function invalid(name: string, message: string): LatticeError {
  return new LatticeError(message, "INVALID_DIMENSION", { dimension: name });
}

export function createSetDimension(
  name: string,
  atoms: readonly string[],
  top: string = SET_TOP_SYMBOL,
  bottom: readonly string[] = [],
): SetDimension {
  const atomSet = new Set(atoms);
  if (atomSet.size === 0) {
    throw invalid(name, `Set dimension '${name}' must define atoms`);
  }
  if (top !== SET_TOP_SYMBOL) {
    throw invalid(name, `Set dimension '${name}' must use '*' for top`);
  }
  const unknown = bottom.filter((a) => !atomSet.has(a));
  if (unknown.length > 0) {
    throw invalid(
      name,
      `Set dimension '${name}' bottom has unknown atoms: ${JSON.stringify([...unknown].sort())}`,
    );
  }
  return { type: "set", name, atoms: atomSet, top: SET_TOP_SYMBOL, bottom };
}

export function createOrderedEnumDimension(
  name: string,
  order: readonly string[],
  top: string,
  bottom: string | undefined,
): OrderedEnumDimension {
  if (order.length === 0) {
    throw invalid(name, `Ordered enum '${name}' must define order`);
  }
  const rank = new Map<string, number>();
  order.forEach((token, i) => {
    if (rank.has(token)) {
      throw invalid(name, `Ordered enum '${name}' repeats token '${token}'`);
    }
    rank.set(token, i);
  });
  if (top !== SET_TOP_SYMBOL && !rank.has(top)) {
    throw invalid(name, `Ordered enum '${name}' top must be '*' or in order`);
  }
  if (bottom === undefined || !rank.has(bottom)) {
    throw invalid(name, `Ordered enum '${name}' bottom must be in order`);
  }
  return { type: "ordered_enum", name, order, top, bottom, rank };
}

export function createBooleanDimension(
  name: string,
  top: unknown = true,
  bottom: unknown = false,
): BooleanDimension {
  if (typeof top !== "boolean" || typeof bottom !== "boolean") {
    throw invalid(name, `Boolean dimension '${name}' top/bottom must be boolean`);
  }
  if (top === bottom) {
    throw invalid(name, `Boolean dimension '${name}' top and bottom must differ`);
  }
  return { type: "boolean", name, top, bottom };
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

function unknownValue(dim: Dimension, message: string): LatticeError {
  return new LatticeError(message, "UNKNOWN_VALUE", { dimension: dim.name });
}

/**
 * Validate a raw document value against the dimension's universe and
 * return its normalized form.
 */
export function normalizeValue(dim: Dimension, raw: unknown): DimensionValue {
  switch (dim.type) {
    case "set": {
      if (raw === dim.top) {
        return { type: "set", dimension: dim.name, kind: "top" };
      }
      if (!Array.isArray(raw)) {
        throw unknownValue(dim, `Set dimension '${dim.name}' expects list or '*'`);
      }
      const items: unknown[] = raw;
      const atoms = new Set<string>();
      const unknown: string[] = [];
      for (const item of items) {
        if (typeof item === "string" && dim.atoms.has(item)) {
          atoms.add(item);
        } else {
          unknown.push(String(item));
        }
      }
      if (unknown.length > 0) {
        throw unknownValue(
          dim,
          `Set dimension '${dim.name}' has unknown atoms: ${JSON.stringify(unknown.sort())}`,
        );
      }
      return {
        type: "set",
        dimension: dim.name,
        kind: "atoms",
        atoms: [...atoms].sort(),
      };
    }
    case "ordered_enum": {
      if (raw === dim.top) {
        return { type: "ordered_enum", dimension: dim.name, kind: "top" };
      }
      if (typeof raw !== "string" || !dim.rank.has(raw)) {
        throw unknownValue(
          dim,
          `Ordered enum '${dim.name}' has unknown value '${String(raw)}'`,
        );
      }
      return { type: "ordered_enum", dimension: dim.name, kind: "token", token: raw };
    }
    case "boolean": {
      if (typeof raw !== "boolean") {
        throw unknownValue(dim, `Boolean dimension '${dim.name}' expects boolean value`);
      }
      return { type: "boolean", dimension: dim.name, kind: "bool", value: raw };
    }
  }
}

/** Inverse of {@link normalizeValue}. */
export function valueToRaw(dim: Dimension, value: DimensionValue): RawDimensionValue {
  switch (dim.type) {
    case "set": {
      const v = asSetValue(dim, value);
      return v.kind === "top" ? dim.top : v.atoms;
    }
    case "ordered_enum": {
      const v = asEnumValue(dim, value);
      return v.kind === "top" ? dim.top : v.token;
    }
    case "boolean":
      return asBooleanValue(dim, value).value;
  }
}

// ---------------------------------------------------------------------------
// Ownership checks
// ---------------------------------------------------------------------------

function mismatch(dim: Dimension, value: DimensionValue): LatticeError {
  return new LatticeError(
    `Value of ${value.type} dimension '${value.dimension}' used with ${dim.type} dimension '${dim.name}'`,
    "DIMENSION_MISMATCH",
    { dimension: dim.name, valueDimension: value.dimension },
  );
}

function asSetValue(dim: SetDimension, value: DimensionValue): SetValue {
  if (value.type !== "set" || value.dimension !== dim.name) throw mismatch(dim, value);
  return value;
}

function asEnumValue(dim: OrderedEnumDimension, value: DimensionValue): OrderedEnumValue {
  if (value.type !== "ordered_enum" || value.dimension !== dim.name) {
    throw mismatch(dim, value);
  }
  return value;
}

function asBooleanValue(dim: BooleanDimension, value: DimensionValue): BooleanValue {
  if (value.type !== "boolean" || value.dimension !== dim.name) throw mismatch(dim, value);
  return value;
}

function requireValues(
  dim: Dimension,
  values: readonly DimensionValue[],
  op: "join" | "meet",
): void {
  if (values.length === 0) {
    throw new LatticeError(
      `Dimension '${dim.name}' ${op} requires values`,
      "EMPTY_INPUT",
      { dimension: dim.name },
    );
  }
}

function enumRank(dim: OrderedEnumDimension, token: string): number {
  const r = dim.rank.get(token);
  if (r === undefined) {
    throw unknownValue(dim, `Ordered enum '${dim.name}' has unknown value '${token}'`);
  }
  return r;
}

// ---------------------------------------------------------------------------
// Order, join, meet
// ---------------------------------------------------------------------------

/** `a ≤ b`: b is at least as permissive as a. */
export function dimensionLeq(
  dim: Dimension,
  a: DimensionValue,
  b: DimensionValue,
): boolean {
  switch (dim.type) {
    case "set": {
      const x = asSetValue(dim, a);
      const y = asSetValue(dim, b);
      if (x.kind === "top") return y.kind === "top";
      if (y.kind === "top") return true;
      const superset = new Set(y.atoms);
      return x.atoms.every((atom) => superset.has(atom));
    }
    case "ordered_enum": {
      const x = asEnumValue(dim, a);
      const y = asEnumValue(dim, b);
      if (x.kind === "top") return y.kind === "top";
      if (y.kind === "top") return true;
      return enumRank(dim, x.token) <= enumRank(dim, y.token);
    }
    case "boolean": {
      const x = asBooleanValue(dim, a);
      const y = asBooleanValue(dim, b);
      return x.value === dim.bottom || y.value === dim.top;
    }
  }
}

/** Least upper bound. Throws LatticeError on empty input. */
export function dimensionJoin(
  dim: Dimension,
  values: readonly DimensionValue[],
): DimensionValue {
  requireValues(dim, values, "join");
  switch (dim.type) {
    case "set": {
      const vals = values.map((v) => asSetValue(dim, v));
      const union = new Set<string>();
      for (const v of vals) {
        if (v.kind === "top") return v;
        v.atoms.forEach((atom) => union.add(atom));
      }
      return { type: "set", dimension: dim.name, kind: "atoms", atoms: [...union].sort() };
    }
    case "ordered_enum": {
      const vals = values.map((v) => asEnumValue(dim, v));
      let best: OrderedEnumValue | undefined;
      for (const v of vals) {
        if (v.kind === "top") return v;
        if (best === undefined || (best.kind === "token" && enumRank(dim, v.token) > enumRank(dim, best.token))) {
          best = v;
        }
      }
      return best ?? { type: "ordered_enum", dimension: dim.name, kind: "top" };
    }
    case "boolean": {
      const vals = values.map((v) => asBooleanValue(dim, v));
      const value = vals.some((v) => v.value === dim.top) ? dim.top : dim.bottom;
      return { type: "boolean", dimension: dim.name, kind: "bool", value };
    }
  }
}

/**
 * Greatest lower bound. TOP members place no constraint: they are dropped
 * unless every input is TOP. Throws LatticeError on empty input.
 */
export function dimensionMeet(
  dim: Dimension,
  values: readonly DimensionValue[],
): DimensionValue {
  requireValues(dim, values, "meet");
  switch (dim.type) {
    case "set": {
      const vals = values.map((v) => asSetValue(dim, v));
      let intersection: Set<string> | undefined;
      for (const v of vals) {
        if (v.kind === "top") continue;
        intersection =
          intersection === undefined
            ? new Set(v.atoms)
            : new Set(v.atoms.filter((atom) => intersection?.has(atom)));
      }
      if (intersection === undefined) {
        return { type: "set", dimension: dim.name, kind: "top" };
      }
      return {
        type: "set",
        dimension: dim.name,
        kind: "atoms",
        atoms: [...intersection].sort(),
      };
    }
    case "ordered_enum": {
      const vals = values.map((v) => asEnumValue(dim, v));
      let lowest: OrderedEnumValue | undefined;
      for (const v of vals) {
        if (v.kind === "top") continue;
        if (lowest === undefined || (lowest.kind === "token" && enumRank(dim, v.token) < enumRank(dim, lowest.token))) {
          lowest = v;
        }
      }
      return lowest ?? { type: "ordered_enum", dimension: dim.name, kind: "top" };
    }
    case "boolean": {
      const vals = values.map((v) => asBooleanValue(dim, v));
      const value = vals.some((v) => v.value === dim.bottom) ? dim.bottom : dim.top;
      return { type: "boolean", dimension: dim.name, kind: "bool", value };
    }
  }
}

/** Structural equality of two values of the same dimension. */
export function valuesEqual(
  dim: Dimension,
  a: DimensionValue,
  b: DimensionValue,
): boolean {
  return dimensionLeq(dim, a, b) && dimensionLeq(dim, b, a);
}
