/**
 * Recursive fixed-size text splitting, offset preserving.
 *
 * Each chunk is cut at the highest-priority separator that still fits the
 * size limit and starts `chunkOverlap` characters (snapped to a separator)
 * before the previous cut. Dropping each chunk's overlap and joining the rest
 * reproduces the input exactly.
 */

import { ConfigurationError } from "../errors.js";
import { createChunk, type Chunk } from "../domain/chunk.js";

export interface TextSplitterOptions {
  /** Maximum chunk size in characters (default: 8000). */
  chunkSize?: number;
  /** Characters repeated from the previous chunk (default: 400). */
  chunkOverlap?: number;
  /** Separators to cut after, in priority order; "" cuts anywhere. */
  separators?: string[];
}

export const DEFAULT_SEPARATORS = ["\n\n", "\n", ". ", " ", ""];

export class TextSplitter {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly separators: string[];

  constructor(options: TextSplitterOptions = {}) {
    this.chunkSize = options.chunkSize ?? 8000;
    this.chunkOverlap = options.chunkOverlap ?? 400;
    this.separators = (options.separators ?? DEFAULT_SEPARATORS).filter((s) => s !== "");
    if (!Number.isInteger(this.chunkSize) || this.chunkSize <= 0) {
      throw new ConfigurationError("must be a positive integer", "chunkSize");
    }
    if (!Number.isInteger(this.chunkOverlap) || this.chunkOverlap < 0 || this.chunkOverlap >= this.chunkSize) {
      throw new ConfigurationError("must be a non-negative integer smaller than chunkSize", "chunkOverlap");
    }
  }

  split(text: string): Chunk[] {
    const chunks: Chunk[] = [];
    let pos = 0;
    while (pos < text.length) {
      const previous = chunks[chunks.length - 1];
      const start = previous === undefined ? 0 : this.overlapStart(text, previous.start, pos);
      const end = this.cutPoint(text, start, pos);
      chunks.push(createChunk(text, chunks.length, start, end, pos - start, "recursive"));
      pos = end;
    }
    return chunks;
  }

  /** Last separator boundary in `(pos, start + chunkSize]`, by separator priority. */
  private cutPoint(text: string, start: number, pos: number): number {
    const limit = start + this.chunkSize;
    if (limit >= text.length) return text.length;
    for (const separator of this.separators) {
      const at = text.lastIndexOf(separator, limit - separator.length);
      const cut = at + separator.length;
      if (at !== -1 && cut > pos) return cut;
    }
    return limit;
  }

  /**
   * Start of the overlap: the first boundary in `[pos - chunkOverlap, pos)` of
   * the highest-priority separator found there, inside the previous chunk.
   */
  private overlapStart(text: string, previousStart: number, pos: number): number {
    const earliest = Math.max(previousStart, pos - this.chunkOverlap);
    if (earliest >= pos) return pos;
    for (const separator of this.separators) {
      const at = text.indexOf(separator, Math.max(previousStart, earliest - separator.length));
      if (at !== -1 && at + separator.length >= earliest && at + separator.length < pos) return at + separator.length;
    }
    return earliest;
  }
}

/**
 * Convenience function to split text into chunks.
 */
export function splitText(text: string, options?: TextSplitterOptions): Chunk[] {
  return new TextSplitter(options).split(text);
}
