// =============================================================================
// Compact renderer — fits a JSON value into a character limit
//
// Three shrinking passes, in order, until the rendering fits:
//   1. long strings are shortened (binary search on the kept length);
//   2. the middle of the deepest arrays is elided;
//   3. the middle of the deepest objects is elided.
// The output is indented text, not JSON: removed content shows as `...`,
// `[...]` or `{...}`.
// =============================================================================

import { isJsonObject, leadingText, type JsonPrimitive, type JsonValue } from "../domain/json.js";

const ELIDED = Symbol("elided");

type Elided = typeof ELIDED;
type DraftEntry = readonly [string, Draft] | Elided;

interface DraftArray {
  kind: "array";
  items: ReadonlyArray<Draft>;
}

interface DraftObject {
  kind: "object";
  entries: ReadonlyArray<DraftEntry>;
}

type Draft = JsonPrimitive | Elided | DraftArray | DraftObject;

export interface CompactRenderOptions {
  indentation?: number;
  /** Strings at or below this length are never shortened. */
  minStringLength?: number;
  /** Arrays or objects with this many real members or fewer collapse entirely. */
  minMembersForCollapse?: number;
}

const ELLIPSIS = "...";

interface DraftNode {
  draft: Draft;
  depth: number;
  path: number[];
}

function toDraft(value: JsonValue): Draft {
  if (Array.isArray(value)) return { kind: "array", items: value.map(toDraft) };
  if (isJsonObject(value)) {
    return { kind: "object", entries: Object.keys(value).map((key) => [key, toDraft(value[key])] as const) };
  }
  return value;
}

function isDraftContainer(draft: Draft): draft is DraftArray | DraftObject {
  return typeof draft === "object" && draft !== null;
}

function setIn(draft: Draft, path: ReadonlyArray<number>, value: Draft): Draft {
  if (path.length === 0) return value;
  if (!isDraftContainer(draft)) return draft;
  const [head, ...tail] = path;
  if (draft.kind === "array") {
    const items = [...draft.items];
    items[head] = setIn(items[head], tail, value);
    return { kind: "array", items };
  }
  const entries = [...draft.entries];
  const entry = entries[head];
  if (entry !== ELIDED) entries[head] = [entry[0], setIn(entry[1], tail, value)];
  return { kind: "object", entries };
}

function collect(draft: Draft, depth: number, path: number[], out: DraftNode[]): void {
  if (draft === ELIDED) return;
  if (typeof draft === "string") {
    out.push({ draft, depth, path });
    return;
  }
  if (!isDraftContainer(draft)) return;
  if (draft.kind === "array") {
    out.push({ draft, depth, path });
    draft.items.forEach((item, i) => collect(item, depth + 1, [...path, i], out));
    return;
  }
  if (draft.entries.length === 1 && draft.entries[0] === ELIDED) return;
  out.push({ draft, depth, path });
  draft.entries.forEach((entry, i) => {
    if (entry !== ELIDED) collect(entry[1], depth + 1, [...path, i], out);
  });
}

function collapseMembers<T>(members: ReadonlyArray<T | Elided>, minMembers: number): Array<T | Elided> {
  const index = members.indexOf(ELIDED);
  if (index === -1) {
    const next = [...members];
    next[Math.floor(members.length / 2)] = ELIDED;
    return next;
  }
  if (members.length - 1 <= minMembers) return [ELIDED];
  const left = index;
  const right = members.length - 1 - index;
  const next = [...members];
  next.splice(left > right ? index - 1 : index + 1, 1);
  return next;
}

export class CompactRenderer {
  private readonly indentation: number;
  private readonly minStringLength: number;
  private readonly minMembers: number;

  constructor(options: CompactRenderOptions = {}) {
    this.indentation = options.indentation ?? 4;
    this.minStringLength = options.minStringLength ?? 23;
    this.minMembers = options.minMembersForCollapse ?? 2;
  }

  render(value: JsonValue, limit: number): string {
    const fitted = this.fit(toDraft(value), limit);
    return this.stringify(fitted, 0).replace(/\.\.\.,\n/g, "...\n");
  }

  private stringify(draft: Draft, level: number): string {
    if (draft === ELIDED) return ELLIPSIS;
    if (!isDraftContainer(draft)) return JSON.stringify(draft);

    const unit = " ".repeat(this.indentation);
    const indent = unit.repeat(level);
    if (draft.kind === "array") {
      if (draft.items.length === 0) return "[]";
      if (draft.items.length === 1 && draft.items[0] === ELIDED) return "[...]";
      const lines = draft.items.map((item) => `${indent}${unit}${this.stringify(item, level + 1)}`);
      return `[\n${lines.join(",\n")}\n${indent}]`;
    }
    if (draft.entries.length === 0) return "{}";
    if (draft.entries.length === 1 && draft.entries[0] === ELIDED) return "{...}";
    const lines = draft.entries.map((entry) =>
      entry === ELIDED
        ? `${indent}${unit}${ELLIPSIS}`
        : `${indent}${unit}${JSON.stringify(entry[0])}: ${this.stringify(entry[1], level + 1)}`,
    );
    return `{\n${lines.join(",\n")}\n${indent}}`;
  }

  private size(draft: Draft): number {
    return this.stringify(draft, 0).length;
  }

  private fit(initial: Draft, limit: number): Draft {
    let draft = initial;
    while (this.size(draft) > limit) {
      const nodes: DraftNode[] = [];
      collect(draft, 0, [], nodes);

      const strings = nodes.filter(
        (n): n is DraftNode & { draft: string } => typeof n.draft === "string" && n.draft.length > this.minStringLength,
      );
      if (strings.length > 0) {
        const shorten = (maxLength: number): Draft =>
          strings
            .filter((n) => n.draft.length > maxLength)
            .reduce<Draft>(
              (acc, n) => setIn(acc, n.path, leadingText(n.draft, maxLength - ELLIPSIS.length) + ELLIPSIS),
              draft,
            );

        const base = shorten(this.minStringLength);
        if (this.size(base) > limit) {
          draft = base;
          continue;
        }
        let low = this.minStringLength;
        let high = Math.max(...strings.map((n) => n.draft.length));
        let best = base;
        while (low <= high) {
          const mid = Math.floor((low + high) / 2);
          const attempt = shorten(mid);
          if (this.size(attempt) <= limit) {
            best = attempt;
            low = mid + 1;
          } else {
            high = mid - 1;
          }
        }
        return best;
      }

      const collapsed = this.collapseDeepest(draft, nodes, "array") ?? this.collapseDeepest(draft, nodes, "object");
      if (collapsed === undefined) return draft;
      draft = collapsed;
    }
    return draft;
  }

  private collapseDeepest(draft: Draft, nodes: DraftNode[], kind: "array" | "object"): Draft | undefined {
    const candidates = nodes
      .map((n): { node: DraftNode; container: Draft } => ({ node: n, container: n.draft }))
      .filter(
        (c): c is { node: DraftNode; container: DraftArray | DraftObject } =>
          isDraftContainer(c.container) && c.container.kind === kind && memberCount(c.container) > 1,
      )
      .sort((a, b) => b.node.depth - a.node.depth || memberCount(b.container) - memberCount(a.container));
    if (candidates.length === 0) return undefined;

    const deepest = candidates[0].node.depth;
    let next = draft;
    for (const { node, container } of candidates) {
      if (node.depth !== deepest) break;
      const replacement: Draft =
        container.kind === "array"
          ? { kind: "array", items: collapseMembers(container.items, this.minMembers) }
          : { kind: "object", entries: collapseMembers(container.entries, this.minMembers) };
      next = setIn(next, node.path, replacement);
    }
    return next;
  }
}

function memberCount(container: DraftArray | DraftObject): number {
  return container.kind === "array" ? container.items.length : container.entries.length;
}

const defaultRenderer = new CompactRenderer();

/** Renders `value` as indented text no longer than `limit` characters where possible. */
export function renderCompact(value: JsonValue, limit: number): string {
  return defaultRenderer.render(value, limit);
}
