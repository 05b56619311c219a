// =============================================================================
// Turn prompt — system and user messages for one decision-maker iteration
// =============================================================================

import { isEmptyGuidance } from "../domain/guidance.schema.js";
import type { TurnContext } from "../ports/decision-maker.port.js";
import { renderCompact } from "../view/compact-renderer.js";

export interface TurnPromptOptions {
  /** Character budget of the rendered previous guidance (default: 6000). */
  guidanceLimit?: number;
}

export interface TurnPrompt {
  system: string;
  user: string;
}

function objectives(hasSchema: boolean): string {
  const structure = hasSchema
    ? "2. Follow the TargetSchema strictly: its keys, nesting and types."
    : "2. No schema was provided. Infer the most natural JSON structure for the content, with short descriptive keys.";
  return `<Objectives>
1. Extract every meaningful fact of the TextChunk into the JSON document.
${structure}
3. Keep what previous chunks extracted: only add new data, never rewrite existing arrays.
4. Finish the chunk with a single finalize_guidance call.
</Objectives>`;
}

const PATCH_RULES = `<PatchRules>
Create structure:   {"op":"add","path":"/items","value":[]}
Append to an array: {"op":"add","path":"/items/-","value":{...}}
Fix one value:      {"op":"replace","path":"/items/0/name","value":"..."}
Remove a wrong item: {"op":"remove","path":"/items/3"}
Never "add" or "replace" at an existing array path: it destroys the items already there. "/-" appends.
A rejected batch changes nothing; its errors name the offending operation and how to fix it.
</PatchRules>`;

function constraints(hasSchema: boolean): string {
  const schemaLine = hasSchema
    ? '\n- If the TargetSchema looks truncated, explore it with source "schema" in inspect_keys, read_value or search_pointer.'
    : "";
  return `<Constraints>
- Inspect before writing: one round of inspect_keys is usually enough.
- Search before appending a list item, to avoid duplicates.
- Put all operations of the chunk in as few apply_patches calls as possible.
- finalize_guidance must be the only call of its turn.${schemaLine}
</Constraints>`;
}

const GUIDANCE_PROTOCOL = `<GuidanceProtocol>
The guidance is the only thing the next chunk sees besides the document. Fill it densely:
- lastPath: the last pointer written.
- sectionsSnapshot: compact map of the document's sections, e.g. "[0]OVERVIEW(8flds) [1]FINANCIALS(building)".
- itemsAdded: what this chunk added, with key values.
- openSection: what is still being built and what is missing.
- textExcerpt: the last 150-200 characters of the chunk.
- nextExpectations: what the next chunk probably contains.
- pendingData: unresolved values and forward references.
- extractedEntitiesCount: number of fields, rows or items added.
</GuidanceProtocol>`;

export function buildSystemPrompt(turn: TurnContext, options: TurnPromptOptions = {}): string {
  const hasSchema = turn.schemaView !== undefined;
  const guidance = isEmptyGuidance(turn.guidance) ? "null" : renderCompact(turn.guidance, options.guidanceLimit ?? 6000);
  return `<SystemPrompt>
<Role>
You build a JSON document from text, one chunk at a time, through tool calls.
Each chunk takes a few iterations: inspect the document, write with apply_patches, then finalize_guidance.
</Role>

${objectives(hasSchema)}

${PATCH_RULES}

${constraints(hasSchema)}

${GUIDANCE_PROTOCOL}

<TargetSchema>
${turn.schemaView ?? "null"}
</TargetSchema>

<PreviousGuidance>
${guidance}
</PreviousGuidance>

<Document>
${turn.documentView}
</Document>
</SystemPrompt>`;
}

export function buildUserMessage(turn: TurnContext): string {
  const notes: string[] = [];
  if (turn.retryAttempt) {
    notes.push(
      `[RETRY ATTEMPT ${turn.retryAttempt.attempt}/${turn.retryAttempt.maxAttempts}: the previous attempt on this chunk ` +
        "ran out of iterations. Finalize with finalize_guidance sooner this time.]",
    );
  }
  if (turn.trimmedRounds > 0) {
    notes.push(
      `[CONTEXT TRIMMED: ${turn.trimmedRounds} previous iteration(s) removed to free context space. All successful ` +
        "patches are already applied to the document. Use inspect_keys to check the current document state before " +
        "continuing extraction.]",
    );
  }
  notes.push(`[Iteration ${turn.iteration} of at most ${turn.maxIterations}]`);

  return `<TextChunk index="${turn.chunk.index + 1}" total="${turn.chunkCount}">
${turn.chunk.text}
</TextChunk>

${notes.join("\n")}`;
}

export function buildTurnPrompt(turn: TurnContext, options: TurnPromptOptions = {}): TurnPrompt {
  return { system: buildSystemPrompt(turn, options), user: buildUserMessage(turn) };
}
