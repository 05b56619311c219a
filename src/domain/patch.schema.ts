// =============================================================================
// Patch Schema — RFC 6902 operations as received from the decision-maker
// =============================================================================

import { z } from "zod";
import { isJsonValue, type JsonValue } from "./json.js";

// Checked in place: a rebuilt record would drop own "__proto__" keys.
export const JsonValueSchema = z
  .custom<JsonValue>(isJsonValue, { message: "Expected a JSON value (no undefined, functions or non-finite numbers)" })
  .describe("Any JSON value");

const PathSchema = z.string().describe("JSON Pointer (RFC 6901) starting with '/'");

export const AddOperationSchema = z.object({
  op: z.literal("add"),
  path: PathSchema,
  value: JsonValueSchema,
});

export const ReplaceOperationSchema = z.object({
  op: z.literal("replace"),
  path: PathSchema,
  value: JsonValueSchema,
});

export const RemoveOperationSchema = z.object({
  op: z.literal("remove"),
  path: PathSchema,
});

export const MoveOperationSchema = z.object({
  op: z.literal("move"),
  from: PathSchema,
  path: PathSchema,
});

export const CopyOperationSchema = z.object({
  op: z.literal("copy"),
  from: PathSchema,
  path: PathSchema,
});

export const TestOperationSchema = z.object({
  op: z.literal("test"),
  path: PathSchema,
  value: JsonValueSchema,
});

export const PatchOperationSchema = z.discriminatedUnion("op", [
  AddOperationSchema,
  ReplaceOperationSchema,
  RemoveOperationSchema,
  MoveOperationSchema,
  CopyOperationSchema,
  TestOperationSchema,
]);

export type AddOperation = z.infer<typeof AddOperationSchema>;
export type ReplaceOperation = z.infer<typeof ReplaceOperationSchema>;
export type RemoveOperation = z.infer<typeof RemoveOperationSchema>;
export type MoveOperation = z.infer<typeof MoveOperationSchema>;
export type CopyOperation = z.infer<typeof CopyOperationSchema>;
export type TestOperation = z.infer<typeof TestOperationSchema>;
export type PatchOperation = z.infer<typeof PatchOperationSchema>;

/** Describes a zod failure on one raw operation in a single line. */
export function describeOperationIssue(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? `"${issue.path.join(".")}"` : "operation";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}
