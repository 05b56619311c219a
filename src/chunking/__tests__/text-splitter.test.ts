import { describe, it, expect } from "vitest";
import { TextSplitter, splitText } from "../text-splitter.js";
import { ConfigurationError } from "../../errors.js";
import type { Chunk } from "../../domain/chunk.js";

function rejoin(chunks: Chunk[]): string {
  return chunks.map((chunk) => chunk.text.slice(chunk.overlap)).join("");
}

describe("TextSplitter", () => {
  it("keeps short text in one chunk", () => {
    expect(splitText("short text", { chunkSize: 100, chunkOverlap: 10 })).toEqual([
      { index: 0, text: "short text", start: 0, end: 10, overlap: 0, strategy: "recursive" },
    ]);
  });

  it("returns no chunks for empty text", () => {
    expect(splitText("")).toEqual([]);
  });

  it("cuts after separators and overlaps from a word boundary", () => {
    const chunks = splitText("aaaa bbbb cccc dddd", { chunkSize: 10, chunkOverlap: 5 });
    expect(chunks.map((c) => [c.text, c.start, c.end, c.overlap])).toEqual([
      ["aaaa bbbb ", 0, 10, 0],
      ["bbbb cccc ", 5, 15, 5],
      ["cccc dddd", 10, 19, 5],
    ]);
  });

  it("prefers sentence boundaries over spaces", () => {
    const chunks = splitText("Alpha beta. Gamma delta. Epsilon zeta eta. Theta.", { chunkSize: 20, chunkOverlap: 8 });
    expect(chunks.map((c) => c.text)).toEqual([
      "Alpha beta. ",
      "beta. Gamma delta. ",
      "delta. Epsilon zeta ",
      "zeta eta. Theta.",
    ]);
  });

  it("starts the overlap at a line break rather than a nearer space", () => {
    const chunks = splitText("Red fox ran far.\nBlue jay sang all day long", { chunkSize: 20, chunkOverlap: 12 });
    expect(chunks.map((c) => [c.text, c.start, c.overlap])).toEqual([
      ["Red fox ran far.\n", 0, 0],
      ["ran far.\nBlue jay ", 8, 9],
      ["Blue jay sang all ", 17, 9],
      ["sang all day long", 26, 9],
    ]);
  });

  it("cuts anywhere when no separator fits", () => {
    const chunks = splitText("abcdefghijklmnopqrstuvwxyz", { chunkSize: 10, chunkOverlap: 3 });
    expect(chunks.map((c) => c.text)).toEqual(["abcdefghij", "hijklmnopq", "opqrstuvwx", "vwxyz"]);
  });

  it("reproduces the input once overlaps are dropped", () => {
    const text = "First paragraph here.\n\nSecond one, a little longer. It has two sentences.\nThird line\n\nEnd.";
    for (const [chunkSize, chunkOverlap] of [
      [12, 0],
      [20, 7],
      [33, 10],
    ]) {
      const chunks = splitText(text, { chunkSize, chunkOverlap });
      expect(rejoin(chunks)).toBe(text);
      for (const chunk of chunks) expect(chunk.text.length).toBeLessThanOrEqual(chunkSize);
    }
  });

  it("rejects invalid sizes", () => {
    expect(() => new TextSplitter({ chunkSize: 0 })).toThrow(ConfigurationError);
    expect(() => new TextSplitter({ chunkSize: 10, chunkOverlap: 10 })).toThrow(
      'Invalid "chunkOverlap": must be a non-negative integer smaller than chunkSize',
    );
  });
});
