// =============================================================================
// AiSdkDecisionMaker — proposes operations through an AI SDK language model
// =============================================================================

import { generateText, tool, type LanguageModel, type ModelMessage, type ToolSet } from "ai";
import { DecisionMakerUnavailableError } from "../../errors.js";
import {
  ApplyPatchesToolInputSchema,
  FinalizeGuidanceArgsSchema,
  InspectKeysArgsSchema,
  OPERATION_DESCRIPTORS,
  ReadValueArgsSchema,
  SearchPointerArgsSchema,
  type OperationName,
} from "../../domain/operation.schema.js";
import type { DecisionMakerPort, HistoryRound, Proposal, TurnContext } from "../../ports/decision-maker.port.js";
import { buildTurnPrompt, type TurnPromptOptions } from "../../prompts/turn-prompt.js";

export interface AiSdkDecisionMakerOptions extends TurnPromptOptions {
  model: LanguageModel;
  temperature?: number;
  /** Retries of the underlying provider call (default: 2). */
  maxRetries?: number;
}

function describe(name: OperationName): string {
  return OPERATION_DESCRIPTORS.find((d) => d.name === name)?.description ?? name;
}

/** The operations as tools without `execute`: calls come back to the controller. */
export function createOperationTools(): ToolSet {
  return {
    inspect_keys: tool({ description: describe("inspect_keys"), inputSchema: InspectKeysArgsSchema }),
    read_value: tool({ description: describe("read_value"), inputSchema: ReadValueArgsSchema }),
    search_pointer: tool({ description: describe("search_pointer"), inputSchema: SearchPointerArgsSchema }),
    apply_patches: tool({ description: describe("apply_patches"), inputSchema: ApplyPatchesToolInputSchema }),
    finalize_guidance: tool({ description: describe("finalize_guidance"), inputSchema: FinalizeGuidanceArgsSchema }),
  };
}

/** Each history round as the assistant's tool calls followed by their results. */
export function historyToMessages(history: ReadonlyArray<HistoryRound>): ModelMessage[] {
  const messages: ModelMessage[] = [];
  for (const round of history) {
    if (round.entries.length === 0) continue;
    messages.push({
      role: "assistant",
      content: round.entries.map(({ request }) => ({
        type: "tool-call" as const,
        toolCallId: request.id,
        toolName: request.name,
        input: request.args,
      })),
    });
    messages.push({
      role: "tool",
      content: round.entries.map(({ request, result }) => ({
        type: "tool-result" as const,
        toolCallId: request.id,
        toolName: request.name,
        output: { type: "text" as const, value: JSON.stringify(result.output) },
      })),
    });
  }
  return messages;
}

export class AiSdkDecisionMaker implements DecisionMakerPort {
  private readonly model: LanguageModel;
  private readonly tools: ToolSet;
  private readonly temperature?: number;
  private readonly maxRetries: number;
  private readonly promptOptions: TurnPromptOptions;

  constructor(options: AiSdkDecisionMakerOptions) {
    this.model = options.model;
    this.tools = createOperationTools();
    this.temperature = options.temperature;
    this.maxRetries = options.maxRetries ?? 2;
    this.promptOptions = { guidanceLimit: options.guidanceLimit };
  }

  async propose(turn: TurnContext, options: { signal: AbortSignal }): Promise<Proposal> {
    const prompt = buildTurnPrompt(turn, this.promptOptions);
    const messages: ModelMessage[] = [{ role: "user", content: prompt.user }, ...historyToMessages(turn.history)];

    try {
      const result = await generateText({
        model: this.model,
        system: prompt.system,
        messages,
        tools: this.tools,
        toolChoice: "required",
        temperature: this.temperature,
        maxRetries: this.maxRetries,
        abortSignal: options.signal,
      });
      const inputTokens = result.usage.inputTokens ?? 0;
      const outputTokens = result.usage.outputTokens ?? 0;
      return {
        requests: result.toolCalls.map((call) => ({ id: call.toolCallId, name: call.toolName, args: call.input })),
        usage: { inputTokens, outputTokens, totalTokens: result.usage.totalTokens ?? inputTokens + outputTokens },
      };
    } catch (err) {
      if (options.signal.aborted) throw err;
      const cause = err instanceof Error ? err : new Error(String(err));
      throw new DecisionMakerUnavailableError(`Language model call failed: ${cause.message}`, cause);
    }
  }
}
