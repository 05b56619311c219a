// =============================================================================
// Truncator — size-bounded views of JSON values
// =============================================================================

import { isJsonObject, leadingText, type JsonObject, type JsonValue } from "../domain/json.js";

export const ELLIPSIS = "…";

export interface ViewBudget {
  /** Upper bound on the serialized view; limits are halved until it fits. */
  maxChars?: number;
  maxStringLength: number;
  maxArrayItems: number;
  maxObjectKeys: number;
  maxDepth: number;
}

export interface ViewResult {
  value: JsonValue;
  truncated: boolean;
  notes: string[];
}

export const DEFAULT_VIEW_BUDGET: Readonly<ViewBudget> = Object.freeze({
  maxStringLength: 160,
  maxArrayItems: 50,
  maxObjectKeys: 50,
  maxDepth: 6,
});

const FLOORS = { maxStringLength: 16, maxArrayItems: 1, maxObjectKeys: 1, maxDepth: 1 } as const;

type Limits = Omit<ViewBudget, "maxChars">;

class ViewBuilder {
  truncated = false;
  private readonly notes = new Set<string>();

  constructor(private readonly limits: Limits) {}

  getNotes(): string[] {
    return [...this.notes];
  }

  private note(text: string): void {
    this.truncated = true;
    this.notes.add(text);
  }

  build(value: JsonValue, depth: number): JsonValue {
    if (typeof value === "string") {
      if (value.length <= this.limits.maxStringLength) return value;
      this.note(`String truncated to maxStringLength=${this.limits.maxStringLength}`);
      return leadingText(value, this.limits.maxStringLength) + ELLIPSIS;
    }
    if (Array.isArray(value)) {
      if (depth >= this.limits.maxDepth) {
        this.note(`Max depth reached (maxDepth=${this.limits.maxDepth})`);
        return `[array: ${value.length} items]`;
      }
      const kept = value.slice(0, this.limits.maxArrayItems).map((item) => this.build(item, depth + 1));
      const rest = value.length - kept.length;
      if (rest > 0) {
        this.note(`Array truncated to maxArrayItems=${this.limits.maxArrayItems}`);
        kept.push(`${ELLIPSIS} ${rest} more items`);
      }
      return kept;
    }
    if (isJsonObject(value)) {
      const keys = Object.keys(value);
      if (depth >= this.limits.maxDepth) {
        this.note(`Max depth reached (maxDepth=${this.limits.maxDepth})`);
        return `[object: ${keys.length} keys]`;
      }
      const out: JsonObject = {};
      for (const key of keys.slice(0, this.limits.maxObjectKeys)) {
        Object.defineProperty(out, key, {
          value: this.build(value[key], depth + 1),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      const rest = keys.length - Math.min(keys.length, this.limits.maxObjectKeys);
      if (rest > 0) {
        this.note(`Object truncated to maxObjectKeys=${this.limits.maxObjectKeys}`);
        out[ELLIPSIS] = `${rest} more keys`;
      }
      return out;
    }
    return value;
  }
}

function halve(current: number, floor: number): number {
  return Math.min(current, Math.max(floor, Math.floor(current / 2)));
}

function tighten(limits: Limits): Limits {
  return {
    maxStringLength: halve(limits.maxStringLength, FLOORS.maxStringLength),
    maxArrayItems: halve(limits.maxArrayItems, FLOORS.maxArrayItems),
    maxObjectKeys: halve(limits.maxObjectKeys, FLOORS.maxObjectKeys),
    maxDepth: halve(limits.maxDepth, FLOORS.maxDepth),
  };
}

function sameLimits(a: Limits, b: Limits): boolean {
  return (
    a.maxStringLength === b.maxStringLength &&
    a.maxArrayItems === b.maxArrayItems &&
    a.maxObjectKeys === b.maxObjectKeys &&
    a.maxDepth === b.maxDepth
  );
}

function buildView(value: JsonValue, limits: Limits): ViewResult {
  const builder = new ViewBuilder(limits);
  const viewed = builder.build(value, 0);
  return { value: viewed, truncated: builder.truncated, notes: builder.getNotes() };
}

/**
 * Returns a bounded copy of `value`. Strings, arrays and objects over their
 * limits are cut with explicit markers; containers at `maxDepth` collapse to
 * a placeholder. With `maxChars`, the limits are halved (down to fixed floors)
 * until the serialized view fits.
 */
export function view(value: JsonValue, budget: ViewBudget = DEFAULT_VIEW_BUDGET): ViewResult {
  const { maxChars, ...initial } = budget;
  let limits: Limits = initial;
  let result = buildView(value, limits);
  if (maxChars === undefined) return result;

  while (JSON.stringify(result.value).length > maxChars) {
    const next = tighten(limits);
    if (sameLimits(next, limits)) break;
    limits = next;
    result = buildView(value, limits);
  }
  return result;
}
