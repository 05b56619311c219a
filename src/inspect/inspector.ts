// =============================================================================
// Inspector — shallow structural summary at a pointer
// =============================================================================

import { InvalidPointerError } from "../errors.js";
import {
  isContainer,
  isJsonObject,
  jsonTypeOf,
  leadingText,
  scalarTypeOf,
  type JsonPrimitive,
  type JsonType,
  type JsonValue,
  type ScalarType,
} from "../domain/json.js";
import { appendToken, isArrayIndexToken, parsePointer, readPointer } from "../pointer/json-pointer.js";

export interface InspectOptions {
  maxKeys?: number;
  maxArrayItems?: number;
  maxStringLength?: number;
  includeValue?: boolean;
}

export interface MemberPreview {
  type: JsonType;
  valuePreview?: JsonPrimitive;
}

export interface ItemPreview extends MemberPreview {
  index: number;
}

export type InspectSummary =
  | { type: ScalarType; valuePreview?: JsonPrimitive }
  | { type: "array"; length: number; previewCount: number; truncated: boolean; itemsPreview: ItemPreview[] }
  | {
      type: "object";
      count: number;
      previewCount: number;
      truncated: boolean;
      keysPreview: string[];
      shallowPreview: Record<string, MemberPreview>;
    };

export type InspectResult =
  | ({ ok: true; found: true; pointer: string; resolvedPointer: string } & InspectSummary)
  | {
      ok: true;
      found: false;
      pointer: string;
      atPointer: string;
      message: string;
      containerType?: "array" | "object";
      containerLength?: number;
      availableKeysPreview?: string[];
      availableKeysTruncated?: boolean;
      encounteredType?: JsonType;
    }
  | { ok: false; found: false; pointer: string; error: string; note: string };

interface ResolvedOptions {
  maxKeys: number;
  maxArrayItems: number;
  maxStringLength: number;
  includeValue: boolean;
}

function resolveOptions(options: InspectOptions): ResolvedOptions {
  return {
    maxKeys: Math.max(0, options.maxKeys ?? 50),
    maxArrayItems: Math.max(0, options.maxArrayItems ?? 20),
    maxStringLength: Math.max(0, options.maxStringLength ?? 300),
    includeValue: options.includeValue ?? true,
  };
}

function previewPrimitive(value: JsonPrimitive, opts: ResolvedOptions): JsonPrimitive {
  if (typeof value !== "string" || value.length <= opts.maxStringLength) return value;
  return `${leadingText(value, opts.maxStringLength)}…(truncated, len=${value.length})`;
}

function previewMember(value: JsonValue, opts: ResolvedOptions): MemberPreview {
  const type = jsonTypeOf(value);
  if (isContainer(value) || !opts.includeValue) return { type };
  return { type, valuePreview: previewPrimitive(value, opts) };
}

function summarize(value: JsonValue, opts: ResolvedOptions): InspectSummary {
  if (Array.isArray(value)) {
    const take = Math.min(value.length, opts.maxArrayItems);
    return {
      type: "array",
      length: value.length,
      previewCount: take,
      truncated: take < value.length,
      itemsPreview: value.slice(0, take).map((item, index) => ({ index, ...previewMember(item, opts) })),
    };
  }
  if (isJsonObject(value)) {
    const keys = Object.keys(value);
    const take = Math.min(keys.length, opts.maxKeys);
    const keysPreview = keys.slice(0, take);
    const shallowPreview: Record<string, MemberPreview> = {};
    for (const key of keysPreview) {
      Object.defineProperty(shallowPreview, key, {
        value: previewMember(value[key], opts),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return { type: "object", count: keys.length, previewCount: take, truncated: take < keys.length, keysPreview, shallowPreview };
  }
  const type = scalarTypeOf(value);
  return opts.includeValue ? { type, valuePreview: previewPrimitive(value, opts) } : { type };
}

/**
 * Summarizes the node at `pointer`: key previews for objects, item previews
 * for arrays, a value preview for scalars. `""` and `"/"` address the root.
 */
export function inspect(source: JsonValue, pointer: string, options: InspectOptions = {}): InspectResult {
  const opts = resolveOptions(options);

  let tokens: string[];
  try {
    tokens = parsePointer(readPointer(pointer));
  } catch (err) {
    if (err instanceof InvalidPointerError) {
      return { ok: false, found: false, pointer, error: err.message, note: 'Pass "" or "/" to inspect the root.' };
    }
    throw err;
  }

  let current = source;
  let walked = "";
  for (const token of tokens) {
    const next = appendToken(walked, token);
    if (Array.isArray(current)) {
      if (!isArrayIndexToken(token)) {
        return {
          ok: true,
          found: false,
          pointer,
          atPointer: next,
          message: `Expected a numeric index for array, but received token '${token}'.`,
          containerType: "array",
          containerLength: current.length,
        };
      }
      const index = Number(token);
      if (index >= current.length) {
        return {
          ok: true,
          found: false,
          pointer,
          atPointer: next,
          message: `The index is out of range: ${index} (len=${current.length}).`,
          containerType: "array",
          containerLength: current.length,
        };
      }
      current = current[index];
    } else if (isJsonObject(current)) {
      if (!Object.prototype.hasOwnProperty.call(current, token)) {
        const keys = Object.keys(current);
        const take = Math.min(keys.length, opts.maxKeys);
        return {
          ok: true,
          found: false,
          pointer,
          atPointer: next,
          message: `The key was not found: '${token}'.`,
          containerType: "object",
          availableKeysPreview: keys.slice(0, take),
          availableKeysTruncated: take < keys.length,
        };
      }
      current = current[token];
    } else {
      const type = jsonTypeOf(current);
      return {
        ok: true,
        found: false,
        pointer,
        atPointer: walked,
        message: `It's not possible to navigate inside a value of type '${type}'.`,
        encounteredType: type,
      };
    }
    walked = next;
  }

  return { ok: true, found: true, pointer, resolvedPointer: walked, ...summarize(current, opts) };
}
