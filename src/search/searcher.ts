// =============================================================================
// Searcher — find keys or scalar values and return their pointers
// =============================================================================

import { isJsonObject, leadingText, type JsonPrimitive, type JsonValue } from "../domain/json.js";
import { appendToken } from "../pointer/json-pointer.js";

export type SearchTarget = "key" | "value";
export type SearchMode = "exact" | "fuzzy";

export interface SearchOptions {
  target?: SearchTarget;
  mode?: SearchMode;
  /** Exact mode only; fuzzy matching always ignores case and accents. */
  caseSensitive?: boolean;
  limit?: number;
  maxValueLength?: number;
}

export interface SearchMatch {
  pointer: string;
  kind: SearchTarget;
  matchedText: string;
  score: number;
}

export interface SearchResult {
  matches: SearchMatch[];
  count: number;
  truncated: boolean;
}

/** Fuzzy candidates longer than this only match by equality or containment. */
const MAX_EDIT_DISTANCE_LENGTH = 64;

export function normalizeForMatch(text: string): string {
  return text.normalize("NFD").replace(/\p{Mn}/gu, "").toLowerCase().trim();
}

export function levenshtein(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  let cur = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    cur[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      cur[j] = Math.min(prev[j] + 1, cur[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, cur] = [cur, prev];
  }
  return prev[b.length];
}

/** Similarity in (0, 1], or 0 when the strings do not match. */
export function fuzzyScore(candidate: string, query: string): number {
  const a = normalizeForMatch(candidate);
  const b = normalizeForMatch(query);
  if (a === b) return 1;
  const shorter = Math.min(a.length, b.length);
  const longer = Math.max(a.length, b.length);
  if (shorter > 0 && (a.includes(b) || b.includes(a))) return 0.9 * (shorter / longer);
  if (shorter === 0 || longer > MAX_EDIT_DISTANCE_LENGTH) return 0;
  const threshold = Math.min(3, Math.max(1, Math.ceil(shorter * 0.34)));
  const distance = levenshtein(a, b);
  return distance <= threshold ? 1 - distance / longer : 0;
}

function scalarText(value: JsonPrimitive): string {
  return value === null ? "null" : String(value);
}

function clip(text: string, max: number): string {
  return text.length > max ? `${leadingText(text, max)}…` : text;
}

interface Candidate {
  pointer: string;
  kind: SearchTarget;
  text: string;
}

function* candidates(node: JsonValue, pointer: string, target: SearchTarget): Generator<Candidate> {
  if (Array.isArray(node)) {
    for (let i = 0; i < node.length; i++) {
      const child = appendToken(pointer, i);
      const item = node[i];
      if (target === "value" && (item === null || typeof item !== "object")) {
        yield { pointer: child, kind: "value", text: scalarText(item) };
      }
      yield* candidates(item, child, target);
    }
    return;
  }
  if (!isJsonObject(node)) return;
  for (const key of Object.keys(node)) {
    const child = appendToken(pointer, key);
    const value = node[key];
    if (target === "key") yield { pointer: child, kind: "key", text: key };
    else if (value === null || typeof value !== "object") {
      yield { pointer: child, kind: "value", text: scalarText(value) };
    }
    yield* candidates(value, child, target);
  }
}

/**
 * Exact mode returns matches in document order with score 1. Fuzzy mode ranks
 * by similarity, ties broken by pointer; the limit applies after ranking.
 */
export function search(source: JsonValue, query: string, options: SearchOptions = {}): SearchResult {
  const target = options.target ?? "value";
  const mode = options.mode ?? "exact";
  const caseSensitive = options.caseSensitive ?? true;
  const limit = Math.max(0, options.limit ?? 20);
  const maxValueLength = Math.max(0, options.maxValueLength ?? 120);

  const found: SearchMatch[] = [];
  const wanted = caseSensitive ? query : query.toLowerCase();
  for (const candidate of candidates(source, "", target)) {
    let score: number;
    if (mode === "fuzzy") {
      score = fuzzyScore(candidate.text, query);
    } else {
      score = (caseSensitive ? candidate.text : candidate.text.toLowerCase()) === wanted ? 1 : 0;
    }
    if (score > 0) {
      found.push({ pointer: candidate.pointer, kind: candidate.kind, matchedText: clip(candidate.text, maxValueLength), score });
    }
    if (mode === "exact" && found.length > limit) break;
  }

  if (mode === "fuzzy") {
    found.sort((a, b) => b.score - a.score || (a.pointer < b.pointer ? -1 : a.pointer > b.pointer ? 1 : 0));
  }
  const matches = found.slice(0, limit);
  return { matches, count: matches.length, truncated: found.length > limit };
}
