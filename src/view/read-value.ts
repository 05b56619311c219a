// =============================================================================
// readValue — resolve a pointer and return a bounded view of the value
// =============================================================================

import { InvalidPointerError, PointerNotFoundError } from "../errors.js";
import { isJsonObject, jsonTypeOf, type JsonType, type JsonValue } from "../domain/json.js";
import { readPointer, resolve } from "../pointer/json-pointer.js";
import { DEFAULT_VIEW_BUDGET, view } from "./truncator.js";

export interface ReadLimits {
  maxStringLength: number;
  maxDepth: number;
  maxArrayItems: number;
  maxObjectKeys: number;
}

export interface ReadStats {
  type: JsonType;
  length?: number;
  originalLength?: number;
  returnedLength?: number;
  originalKeyCount?: number;
  returnedKeyCount?: number;
}

export type ReadResult =
  | {
      found: true;
      path: string;
      valueType: JsonType;
      value: JsonValue;
      truncated: boolean;
      notes: string[];
      stats: ReadStats;
      limits: ReadLimits;
    }
  | { found: false; path: string; error: string };

function statsOf(value: JsonValue, limits: ReadLimits): ReadStats {
  const type = jsonTypeOf(value);
  if (typeof value === "string") {
    return value.length > limits.maxStringLength ? { type, originalLength: value.length } : { type, length: value.length };
  }
  if (Array.isArray(value)) {
    return { type, originalLength: value.length, returnedLength: Math.min(value.length, limits.maxArrayItems) };
  }
  if (isJsonObject(value)) {
    const count = Object.keys(value).length;
    return { type, originalKeyCount: count, returnedKeyCount: Math.min(count, limits.maxObjectKeys) };
  }
  return { type };
}

export function readValue(source: JsonValue, pointer: string, limits: Partial<ReadLimits> = {}): ReadResult {
  const effective: ReadLimits = {
    maxStringLength: limits.maxStringLength ?? DEFAULT_VIEW_BUDGET.maxStringLength,
    maxDepth: limits.maxDepth ?? DEFAULT_VIEW_BUDGET.maxDepth,
    maxArrayItems: limits.maxArrayItems ?? DEFAULT_VIEW_BUDGET.maxArrayItems,
    maxObjectKeys: limits.maxObjectKeys ?? DEFAULT_VIEW_BUDGET.maxObjectKeys,
  };

  let value: JsonValue;
  try {
    value = resolve(source, readPointer(pointer));
  } catch (err) {
    if (err instanceof PointerNotFoundError || err instanceof InvalidPointerError) {
      return { found: false, path: pointer, error: err.message };
    }
    throw err;
  }

  const viewed = view(value, effective);
  return {
    found: true,
    path: pointer,
    valueType: jsonTypeOf(value),
    value: viewed.value,
    truncated: viewed.truncated,
    notes: viewed.notes,
    stats: statsOf(value, effective),
    limits: effective,
  };
}
