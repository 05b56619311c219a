// =============================================================================
// Operation Schema — requests the decision-maker may issue each iteration
// =============================================================================

import { z } from "zod";
import { GuidanceSchema } from "./guidance.schema.js";
import { PatchOperationSchema } from "./patch.schema.js";

export const OperationNameSchema = z.enum([
  "inspect_keys",
  "read_value",
  "search_pointer",
  "apply_patches",
  "finalize_guidance",
]);

export type OperationName = z.infer<typeof OperationNameSchema>;

const SourceSchema = z
  .enum(["document", "schema"])
  .default("document")
  .describe('"document" (JSON being built) or "schema" (target schema)');

export const InspectKeysArgsSchema = z.object({
  source: SourceSchema,
  path: z
    .string()
    .default("")
    .describe('JSON Pointer to inspect; "" for the root, "/items" for an array, "/items/0" for its first element'),
});

export const ReadValueArgsSchema = z.object({
  source: SourceSchema,
  path: z.string().describe("JSON Pointer of the value to read"),
  maxStringLength: z.number().int().min(0).default(160).describe("Strings longer than this are cut"),
  maxDepth: z.number().int().min(0).default(6).describe("Containers deeper than this are replaced by a placeholder"),
  maxArrayItems: z.number().int().min(0).default(50).describe("Maximum array items returned"),
  maxObjectKeys: z.number().int().min(0).default(50).describe("Maximum object keys returned"),
});

export const SearchPointerArgsSchema = z.object({
  source: SourceSchema,
  query: z.string().describe("Text to look for"),
  target: z.enum(["key", "value"]).default("value").describe("Match object keys or scalar values"),
  fuzzy: z.boolean().default(false).describe("Rank by string similarity instead of exact equality"),
  caseSensitive: z.boolean().default(true).describe("Exact mode only"),
  limit: z.number().int().min(0).default(20).describe("Maximum number of matches"),
  maxValueLength: z.number().int().min(0).default(120).describe("Matched values longer than this are cut"),
});

/** Patches stay untyped here: each raw operation is checked by the validator so errors carry its index. */
export const ApplyPatchesArgsSchema = z.object({
  patches: z.array(z.unknown()).default([]),
});

/** Declared to the model; richer than what the executor requires. */
export const ApplyPatchesToolInputSchema = z.object({
  patches: z
    .array(PatchOperationSchema)
    .describe('RFC 6902 operations applied atomically, in order. To append to an array the path must end with "/-".'),
});

export const FinalizeGuidanceArgsSchema = GuidanceSchema;

export interface OperationRequest {
  /** Correlates the request with its result in the turn history. */
  id: string;
  name: string;
  args: unknown;
}

export interface OperationDescriptor {
  name: OperationName;
  description: string;
}

export const OPERATION_DESCRIPTORS: ReadonlyArray<OperationDescriptor> = [
  {
    name: "inspect_keys",
    description:
      "Returns the keys of an object or the length of an array at a path in the document or the schema. " +
      "Use it to check array lengths before appending and to verify that parent containers exist.",
  },
  {
    name: "read_value",
    description:
      "Returns the value at a path, truncated to the given limits. Read specific indices rather than whole arrays.",
  },
  {
    name: "search_pointer",
    description:
      "Searches keys or values and returns the JSON Pointers of matches. Mandatory before appending a new list item, " +
      "to avoid duplicates.",
  },
  {
    name: "apply_patches",
    description:
      "Applies a batch of JSON Patch operations atomically. The batch is rejected as a whole with the index of the " +
      "offending operation and the exact fix when any operation is invalid.",
  },
  {
    name: "finalize_guidance",
    description:
      "Finalizes the current chunk and records the guidance handed to the next chunk. Call it exactly once, last.",
  },
];
