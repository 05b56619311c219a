// =============================================================================
// Guidance Schema — cross-chunk continuity record
// =============================================================================

import { z } from "zod";

export const GuidanceSchema = z.object({
  lastPath: z
    .string()
    .default("")
    .describe('Last JSON Pointer written to, e.g. "/sections/1/items/-"'),
  sectionsSnapshot: z
    .string()
    .default("")
    .describe('Compact map of the document: section names with item counts and status, e.g. "[0]INTRO(2items) [1]STAFF(5items,open)"'),
  itemsAdded: z
    .string()
    .default("")
    .describe('Items added in this chunk with their key values, e.g. "2 items→STAFF: name=Ada, name=Linus"'),
  openSection: z
    .string()
    .default("")
    .describe('Section still being built, e.g. "STAFF @ /sections/1 — incomplete"'),
  textExcerpt: z
    .string()
    .default("")
    .describe("Text fragment from the end of the chunk that continues in the next one"),
  nextExpectations: z
    .string()
    .default("")
    .describe("What the next chunk most likely contains"),
  pendingData: z
    .string()
    .default("")
    .describe("Partial or unresolved data that the next chunk may clarify"),
  extractedEntitiesCount: z
    .number()
    .int()
    .min(0)
    .default(0)
    .describe("Number of entities extracted in this chunk"),
});

export type GuidanceInput = z.input<typeof GuidanceSchema>;
export type Guidance = Readonly<z.output<typeof GuidanceSchema>>;

export const EMPTY_GUIDANCE: Guidance = Object.freeze(GuidanceSchema.parse({}));

/** Builds the immutable Guidance value swapped in at a chunk boundary. */
export function createGuidance(input: GuidanceInput): Guidance {
  return Object.freeze(GuidanceSchema.parse(input));
}

export function isEmptyGuidance(guidance: Guidance): boolean {
  return (
    guidance.extractedEntitiesCount === 0 &&
    guidance.lastPath === "" &&
    guidance.sectionsSnapshot === "" &&
    guidance.itemsAdded === "" &&
    guidance.openSection === "" &&
    guidance.textExcerpt === "" &&
    guidance.nextExpectations === "" &&
    guidance.pendingData === ""
  );
}
