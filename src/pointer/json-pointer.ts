// =============================================================================
// JSON Pointer engine (RFC 6901) — resolve, add, replace, remove
//
// All mutating operations are copy-on-write: only the containers along the
// pointer are copied, the input document is never modified.
// =============================================================================

import { InvalidPointerError, PointerNotFoundError } from "../errors.js";
import { isContainer, jsonTypeOf, type JsonArray, type JsonObject, type JsonValue } from "../domain/json.js";

type Container = JsonArray | JsonObject;

const ARRAY_INDEX = /^(0|[1-9][0-9]*)$/;

export const APPEND_TOKEN = "-";

export function decodeToken(token: string): string {
  return token.replace(/~1/g, "/").replace(/~0/g, "~");
}

export function encodeToken(token: string): string {
  return token.replace(/~/g, "~0").replace(/\//g, "~1");
}

/**
 * Splits a pointer into decoded reference tokens. Only `""` addresses the
 * root; `"/"` is the member whose key is the empty string.
 */
export function parsePointer(pointer: string): string[] {
  if (pointer === "") return [];
  if (!pointer.startsWith("/")) {
    throw new InvalidPointerError(
      pointer,
      `Invalid JSON Pointer "${pointer}": must start with "/". Did you mean "/${pointer}"?`,
    );
  }
  return pointer.slice(1).split("/").map(decodeToken);
}

export function formatPointer(tokens: ReadonlyArray<string>): string {
  return tokens.map((t) => `/${encodeToken(t)}`).join("");
}

export function appendToken(base: string, token: string | number): string {
  return `${base}/${encodeToken(String(token))}`;
}

/** Read-side leniency: `"/"` stands for the root in read and inspect requests. */
export function readPointer(pointer: string): string {
  return pointer === "/" ? "" : pointer;
}

export function parentPointer(pointer: string): string {
  return formatPointer(parsePointer(pointer).slice(0, -1));
}

export function isArrayIndexToken(token: string): boolean {
  return ARRAY_INDEX.test(token);
}

function parseIndex(pointer: string, token: string): number {
  if (!ARRAY_INDEX.test(token)) {
    throw new InvalidPointerError(
      pointer,
      `Invalid array index "${token}" in "${pointer}": use "0", a positive integer without leading zeros, or "-" to append`,
    );
  }
  return Number(token);
}

function hasKey(obj: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

function setKey(obj: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(obj, key, { value, enumerable: true, writable: true, configurable: true });
}

function copyObject(obj: JsonObject): JsonObject {
  const copy: JsonObject = {};
  for (const key of Object.keys(obj)) setKey(copy, key, obj[key]);
  return copy;
}

function step(node: JsonValue, token: string, pointer: string, walked: string): JsonValue {
  if (Array.isArray(node)) {
    if (token === APPEND_TOKEN) {
      throw new PointerNotFoundError(pointer, `"${pointer}": "-" addresses the position after the last element of ${walked || "/"} and holds no value`);
    }
    const index = parseIndex(pointer, token);
    if (index >= node.length) {
      throw new PointerNotFoundError(
        pointer,
        `"${pointer}": index ${index} is out of range for the array at ${walked || "/"} (length ${node.length})`,
      );
    }
    return node[index];
  }
  if (isContainer(node)) {
    if (!hasKey(node, token)) {
      throw new PointerNotFoundError(pointer, `"${pointer}": key "${token}" not found at ${walked || "/"}`);
    }
    return node[token];
  }
  throw new PointerNotFoundError(pointer, `"${pointer}": cannot traverse into a ${jsonTypeOf(node)} at ${walked || "/"}`);
}

/** Returns the value at `pointer` or throws {@link PointerNotFoundError}. */
export function resolve(doc: JsonValue, pointer: string): JsonValue {
  const tokens = parsePointer(pointer);
  let current = doc;
  let walked = "";
  for (const token of tokens) {
    current = step(current, token, pointer, walked);
    walked = appendToken(walked, token);
  }
  return current;
}

export type ResolveResult = { found: true; value: JsonValue } | { found: false };

export function tryResolve(doc: JsonValue, pointer: string): ResolveResult {
  try {
    return { found: true, value: resolve(doc, pointer) };
  } catch (err) {
    if (err instanceof PointerNotFoundError || err instanceof InvalidPointerError) return { found: false };
    throw err;
  }
}

function updateIn(
  node: JsonValue,
  tokens: ReadonlyArray<string>,
  depth: number,
  pointer: string,
  edit: (parent: Container, token: string) => void,
): JsonValue {
  const walked = formatPointer(tokens.slice(0, depth));
  if (!isContainer(node)) {
    throw new PointerNotFoundError(pointer, `"${pointer}": parent at ${walked || "/"} is a ${jsonTypeOf(node)}, not an object or array`);
  }
  const token = tokens[depth];
  const copy: Container = Array.isArray(node) ? [...node] : copyObject(node);
  if (depth === tokens.length - 1) {
    edit(copy, token);
    return copy;
  }
  const child = step(node, token, pointer, walked);
  const updated = updateIn(child, tokens, depth + 1, pointer, edit);
  if (Array.isArray(copy)) copy[Number(token)] = updated;
  else setKey(copy, token, updated);
  return copy;
}

/**
 * RFC 6902 "add". Intermediate containers must exist. On an object parent the
 * key is created or overwritten; on an array parent the value is inserted at
 * an index in `0..length`, or appended with `-`. The root pointer replaces
 * the whole document.
 */
export function add(doc: JsonValue, pointer: string, value: JsonValue): JsonValue {
  const tokens = parsePointer(pointer);
  if (tokens.length === 0) return value;
  return updateIn(doc, tokens, 0, pointer, (parent, token) => {
    if (Array.isArray(parent)) {
      if (token === APPEND_TOKEN) {
        parent.push(value);
        return;
      }
      const index = parseIndex(pointer, token);
      if (index > parent.length) {
        throw new PointerNotFoundError(
          pointer,
          `"${pointer}": index ${index} is out of range for insertion (array length ${parent.length}, valid 0..${parent.length} or "-")`,
        );
      }
      parent.splice(index, 0, value);
      return;
    }
    setKey(parent, token, value);
  });
}

/** Alias of {@link add}: sets the value at `pointer` under add semantics. */
export const set = add;

/** RFC 6902 "replace". The target must exist. */
export function replace(doc: JsonValue, pointer: string, value: JsonValue): JsonValue {
  const tokens = parsePointer(pointer);
  if (tokens.length === 0) return value;
  resolve(doc, pointer);
  return updateIn(doc, tokens, 0, pointer, (parent, token) => {
    if (Array.isArray(parent)) parent[Number(token)] = value;
    else setKey(parent, token, value);
  });
}

/** RFC 6902 "remove". The target must exist; the root cannot be removed. */
export function remove(doc: JsonValue, pointer: string): JsonValue {
  const tokens = parsePointer(pointer);
  if (tokens.length === 0) {
    throw new InvalidPointerError(pointer, "Removing the root would leave the document undefined");
  }
  resolve(doc, pointer);
  return updateIn(doc, tokens, 0, pointer, (parent, token) => {
    if (Array.isArray(parent)) parent.splice(Number(token), 1);
    else delete parent[token];
  });
}
