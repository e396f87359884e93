export {
  ContextLattice,
  type ContextDescriptor,
  type LoadLatticeOptions,
} from "./lattice.js";

export {
  SET_TOP_SYMBOL,
  createSetDimension,
  createOrderedEnumDimension,
  createBooleanDimension,
  normalizeValue,
  valueToRaw,
  valuesEqual,
  dimensionLeq,
  dimensionJoin,
  dimensionMeet,
  type Dimension,
  type DimensionType,
  type DimensionValue,
  type RawDimensionValue,
  type SetDimension,
  type OrderedEnumDimension,
  type BooleanDimension,
  type SetValue,
  type OrderedEnumValue,
  type BooleanValue,
} from "./dimension.js";

export {
  LatticeDocumentSchema,
  LatticeMetadataSchema,
  type LatticeDocument,
  type LatticeMetadata,
} from "./document.js";

export { LatticeError, type LatticeErrorCode } from "./errors.js";
