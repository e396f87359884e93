/**
 * Zod schemas for the context lattice document.
 *
 * Object levels use .passthrough() so fields added by later document
 * revisions survive a load. Semantic checks (atoms non-empty, bottom in
 * order, …) live in the dimension constructors, not here.
 */

import { z } from "zod";

const stringList = z.array(z.string());

export const SetDimensionSpecSchema = z
  .object({
    type: z.literal("set"),
    atoms: stringList.default([]),
    top: z.string().default("*"),
    bottom: stringList.default([]),
  })
  .passthrough();

export const OrderedEnumDimensionSpecSchema = z
  .object({
    type: z.literal("ordered_enum"),
    order: stringList.default([]),
    top: z.string().default("*"),
    bottom: z.string().optional(),
  })
  .passthrough();

export const BooleanDimensionSpecSchema = z
  .object({
    type: z.literal("boolean"),
    top: z.unknown().default(true),
    bottom: z.unknown().default(false),
  })
  .passthrough();

const ApprovalSchema = z
  .object({
    role: z.string().optional(),
    signature: z.string().optional(),
    timestamp: z.string().optional(),
  })
  .passthrough();

export const LatticeMetadataSchema = z
  .object({
    rfc_reference: z.string().optional(),
    approvals: z.array(ApprovalSchema).optional(),
  })
  .passthrough();

export const LatticeDocumentSchema = z
  .object({
    version: z
      .union([z.string().min(1), z.number()], {
        required_error: "Lattice is missing version",
      })
      .transform((v) => String(v)),
    dimensions: z
      .record(z.string(), z.record(z.string(), z.unknown()))
      .default({}),
    contexts: z.record(z.string(), z.unknown()).default({}),
    metadata: LatticeMetadataSchema.optional(),
  })
  .passthrough();

export type LatticeDocument = z.infer<typeof LatticeDocumentSchema>;
export type LatticeMetadata = z.infer<typeof LatticeMetadataSchema>;
