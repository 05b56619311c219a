import { describe, it, expect } from "vitest";
import { SemanticChunker, breakpointThreshold, mergeSmallGroups, splitSentences } from "../semantic-chunker.js";
import { InMemoryEmbeddingAdapter } from "../../adapters/embedding/inmemory.adapter.js";
import { createMemoryLogger, createRunLogger } from "../../logging/logger.js";

const TEXT = "Cats purr softly. Cats nap often. Cars need fuel. Cars honk loudly.";

const topicEmbeddings = () =>
  new InMemoryEmbeddingAdapter({ embedFn: (text) => (text.startsWith("Cats") ? [1, 0] : [0, 1]) });

function setup() {
  const sink = createMemoryLogger();
  return { sink, log: createRunLogger(sink, "run-1") };
}

describe("helpers", () => {
  it("splits sentences contiguously", () => {
    expect(splitSentences(TEXT)).toEqual([
      { start: 0, end: 18 },
      { start: 18, end: 34 },
      { start: 34, end: 50 },
      { start: 50, end: 67 },
    ]);
    expect(splitSentences("no terminator")).toEqual([{ start: 0, end: 13 }]);
  });

  it("computes breakpoint thresholds", () => {
    expect(breakpointThreshold([0, 1, 0], "percentile", 95)).toBeCloseTo(0.9);
    expect(breakpointThreshold([1, 3], "standard_deviation", 2)).toBe(4);
    expect(breakpointThreshold([1, 2, 3, 4, 5], "interquartile", 1)).toBe(5);
  });

  it("merges groups smaller than the minimum into their predecessor", () => {
    expect(
      mergeSmallGroups(
        [
          { start: 0, end: 10 },
          { start: 10, end: 12 },
          { start: 12, end: 30 },
          { start: 30, end: 31 },
        ],
        5,
      ),
    ).toEqual([
      { start: 0, end: 10 },
      { start: 10, end: 31 },
    ]);
  });
});

describe("SemanticChunker", () => {
  it("cuts where consecutive sentences drift apart", async () => {
    const embeddings = topicEmbeddings();
    const chunker = new SemanticChunker({ embeddings, bufferSize: 0, minChunkSize: 10 });
    const chunks = await chunker.chunk(TEXT);
    expect(chunks).toEqual([
      { index: 0, text: "Cats purr softly. Cats nap often. ", start: 0, end: 34, overlap: 0, strategy: "semantic" },
      { index: 1, text: "Cars need fuel. Cars honk loudly.", start: 34, end: 67, overlap: 0, strategy: "semantic" },
    ]);
    expect(embeddings.calls).toEqual([["Cats purr softly.", "Cats nap often.", "Cars need fuel.", "Cars honk loudly."]]);
  });

  it("embeds each sentence with its neighbours", async () => {
    const embeddings = topicEmbeddings();
    await new SemanticChunker({ embeddings, minChunkSize: 10 }).chunk(TEXT);
    expect(embeddings.calls[0][0]).toBe("Cats purr softly. Cats nap often.");
    expect(embeddings.calls[0][1]).toBe("Cats purr softly. Cats nap often. Cars need fuel.");
  });

  it("keeps text shorter than the minimum chunk size whole", async () => {
    const chunks = await new SemanticChunker({ embeddings: topicEmbeddings() }).chunk(TEXT);
    expect(chunks).toEqual([{ index: 0, text: TEXT, start: 0, end: 67, overlap: 0, strategy: "semantic" }]);
    expect(await new SemanticChunker().chunk("tiny")).toMatchObject([{ strategy: "recursive" }]);
  });

  it("returns no chunks for blank text", async () => {
    expect(await new SemanticChunker().chunk("  \n ")).toEqual([]);
  });

  it("falls back to the recursive splitter without an embedding provider", async () => {
    const { sink, log } = setup();
    const chunks = await new SemanticChunker({ minChunkSize: 10, chunkSize: 40, chunkOverlap: 0 }).chunk(TEXT, log);
    expect(chunks.map((c) => c.text)).toEqual(["Cats purr softly. Cats nap often. ", "Cars need fuel. Cars honk loudly."]);
    expect(chunks.every((c) => c.strategy === "recursive")).toBe(true);
    expect(sink.entries).toEqual([
      {
        timestamp: expect.any(Number),
        level: "warn",
        event: "chunking:fallback",
        runId: "run-1",
        chunkIndex: undefined,
        data: { reason: "no embedding provider configured" },
      },
    ]);
  });

  it("falls back when semantic chunking is disabled", async () => {
    const { sink, log } = setup();
    const embeddings = topicEmbeddings();
    await new SemanticChunker({ embeddings, semantic: false, minChunkSize: 10 }).chunk(TEXT, log);
    expect(sink.entries.map((e) => e.data)).toEqual([{ reason: "semantic chunking disabled" }]);
    expect(embeddings.calls).toEqual([]);
  });

  it("falls back for a single sentence", async () => {
    const { sink, log } = setup();
    const chunks = await new SemanticChunker({ embeddings: topicEmbeddings(), minChunkSize: 5 }).chunk(
      "one long sentence without a break",
      log,
    );
    expect(chunks).toHaveLength(1);
    expect(sink.entries.map((e) => e.data)).toEqual([{ reason: "text has a single sentence" }]);
  });

  it("falls back when embedding fails", async () => {
    const { sink, log } = setup();
    const embeddings = new InMemoryEmbeddingAdapter({
      embedFn: () => {
        throw new Error("quota exceeded");
      },
    });
    const chunks = await new SemanticChunker({ embeddings, minChunkSize: 10 }).chunk(TEXT, log);
    expect(chunks.map((c) => c.strategy)).toEqual(["recursive"]);
    expect(sink.entries.map((e) => e.data)).toEqual([
      { reason: "embedding failed", error: { name: "Error", message: "quota exceeded" } },
    ]);
  });
});
