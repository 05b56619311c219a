// =============================================================================
// Schema locations — which subschemas govern a document path
//
// A location set is a list of alternatives; an alternative is a list of
// schema pointers that must all accept the value. `anyOf`/`oneOf` branches
// add alternatives, `$ref` and `allOf` add pointers to every alternative.
// An empty alternative accepts anything; no alternatives means the path is
// not allowed by the schema.
// =============================================================================

import { isJsonObject, type JsonObject, type JsonValue } from "../domain/json.js";
import { appendToken, isArrayIndexToken, tryResolve } from "../pointer/json-pointer.js";

export type SchemaAlternative = ReadonlyArray<string>;
export type ContainerKind = "array" | "object";

export const MAX_ALTERNATIVES = 16;

function schemaAt(root: JsonValue, pointer: string): JsonValue | undefined {
  const found = tryResolve(root, pointer);
  return found.found ? found.value : undefined;
}

/** Local `$ref` ("#", "#/definitions/x") as a pointer into the root; undefined otherwise. */
export function refPointer(ref: JsonValue | undefined): string | undefined {
  if (typeof ref !== "string" || !ref.startsWith("#")) return undefined;
  const fragment = ref.slice(1);
  if (fragment !== "" && !fragment.startsWith("/")) return undefined;
  return fragment
    .split("/")
    .map((part) => decodeURIComponent(part))
    .join("/");
}

function product(left: SchemaAlternative[], right: SchemaAlternative[]): SchemaAlternative[] {
  const out: SchemaAlternative[] = [];
  for (const a of left) {
    for (const b of right) {
      out.push([...new Set([...a, ...b])]);
      if (out.length >= MAX_ALTERNATIVES) return out;
    }
  }
  return out;
}

function ownChild(node: JsonObject, pointer: string, token: string, kind: ContainerKind): string[] | null {
  if (kind === "array") {
    const prefix = node["prefixItems"];
    if (Array.isArray(prefix) && isArrayIndexToken(token) && Number(token) < prefix.length) {
      return [appendToken(appendToken(pointer, "prefixItems"), token)];
    }
    const items = node["items"];
    if (items === undefined) return [];
    if (items === false) return null;
    return [appendToken(pointer, "items")];
  }

  const matched: string[] = [];
  const properties = node["properties"];
  if (isJsonObject(properties) && Object.prototype.hasOwnProperty.call(properties, token)) {
    matched.push(appendToken(appendToken(pointer, "properties"), token));
  }
  const patterns = node["patternProperties"];
  if (isJsonObject(patterns)) {
    for (const pattern of Object.keys(patterns)) {
      if (new RegExp(pattern, "u").test(token)) {
        matched.push(appendToken(appendToken(pointer, "patternProperties"), pattern));
      }
    }
  }
  if (matched.length > 0) return matched;
  const additional = node["additionalProperties"];
  if (additional === undefined) return [];
  if (additional === false) return null;
  return [appendToken(pointer, "additionalProperties")];
}

function childOf(
  root: JsonValue,
  pointer: string,
  token: string,
  kind: ContainerKind,
  visiting: ReadonlySet<string>,
): SchemaAlternative[] {
  const node = schemaAt(root, pointer);
  if (node === false) return [];
  if (!isJsonObject(node) || visiting.has(pointer)) return [[]];
  const guard = new Set(visiting).add(pointer);

  const own = ownChild(node, pointer, token, kind);
  if (own === null) return [];
  let result: SchemaAlternative[] = [own];

  const ref = refPointer(node["$ref"]);
  if (ref !== undefined) result = product(result, childOf(root, ref, token, kind, guard));

  const allOf = node["allOf"];
  if (Array.isArray(allOf)) {
    allOf.forEach((_, i) => {
      result = product(result, childOf(root, appendToken(appendToken(pointer, "allOf"), i), token, kind, guard));
    });
  }

  for (const keyword of ["anyOf", "oneOf"]) {
    const branches = node[keyword];
    if (!Array.isArray(branches)) continue;
    const union = branches.flatMap((_, i) =>
      childOf(root, appendToken(appendToken(pointer, keyword), i), token, kind, guard),
    );
    result = product(result, union);
  }
  return result.slice(0, MAX_ALTERNATIVES);
}

/**
 * Alternatives governing the value at `tokens`. `kinds[i]` is the container
 * type in the document at depth `i` (the parent of `tokens[i]`).
 */
export function locateSchemas(
  schema: JsonValue,
  tokens: ReadonlyArray<string>,
  kinds: ReadonlyArray<ContainerKind>,
): SchemaAlternative[] {
  let alternatives: SchemaAlternative[] = [[""]];
  tokens.forEach((token, depth) => {
    const next: SchemaAlternative[] = [];
    for (const alternative of alternatives) {
      let combined: SchemaAlternative[] = [[]];
      for (const pointer of alternative) {
        combined = product(combined, childOf(schema, pointer, token, kinds[depth], new Set()));
        if (combined.length === 0) break;
      }
      next.push(...combined);
    }
    alternatives = next.slice(0, MAX_ALTERNATIVES);
  });
  return alternatives;
}

/** Follows `$ref` chains and collects the node with its `allOf` members. */
function expand(root: JsonValue, pointer: string, seen: Set<string> = new Set()): JsonObject[] {
  if (seen.has(pointer)) return [];
  seen.add(pointer);
  const node = schemaAt(root, pointer);
  if (!isJsonObject(node)) return [];
  const out = [node];
  const ref = refPointer(node["$ref"]);
  if (ref !== undefined) out.push(...expand(root, ref, seen));
  const allOf = node["allOf"];
  if (Array.isArray(allOf)) {
    allOf.forEach((_, i) => out.push(...expand(root, appendToken(appendToken(pointer, "allOf"), i), seen)));
  }
  return out;
}

export function requiredKeys(schema: JsonValue, pointer: string): Set<string> {
  const keys = new Set<string>();
  for (const node of expand(schema, pointer)) {
    const required = node["required"];
    if (Array.isArray(required)) {
      for (const key of required) if (typeof key === "string") keys.add(key);
    }
  }
  return keys;
}

/** The declared `type` at a location, following `$ref`; undefined when absent or a list. */
export function declaredType(schema: JsonValue, pointer: string): string | undefined {
  for (const node of expand(schema, pointer)) {
    const type = node["type"];
    if (typeof type === "string") return type;
  }
  return undefined;
}

export function declaredPropertyNames(schema: JsonValue, pointer: string): string[] {
  const names = new Set<string>();
  for (const node of expand(schema, pointer)) {
    const properties = node["properties"];
    if (isJsonObject(properties)) for (const key of Object.keys(properties)) names.add(key);
  }
  return [...names];
}

/**
 * Starting document for a schema: an empty array for an array root, otherwise
 * an object holding an empty container for each required top-level property
 * declared as an array or object.
 */
export function buildBaseDocument(schema: JsonValue): JsonValue {
  if (declaredType(schema, "") === "array") return [];
  const base: JsonObject = {};
  for (const key of requiredKeys(schema, "")) {
    const [first] = locateSchemas(schema, [key], ["object"]);
    if (first === undefined) continue;
    const type = first.map((pointer) => declaredType(schema, pointer)).find((t) => t !== undefined);
    if (type === "array") base[key] = [];
    else if (type === "object") base[key] = {};
  }
  return base;
}
