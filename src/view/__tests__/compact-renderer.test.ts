import { describe, it, expect } from "vitest";
import { CompactRenderer, renderCompact } from "../compact-renderer.js";

describe("renderCompact", () => {
  it("renders small values as indented JSON", () => {
    expect(renderCompact({ name: "Ada", age: 36 }, 1000)).toBe('{\n    "name": "Ada",\n    "age": 36\n}');
    expect(renderCompact([], 1000)).toBe("[]");
    expect(renderCompact({}, 1000)).toBe("{}");
    expect(renderCompact("plain", 1000)).toBe('"plain"');
  });

  it("elides the middle of an array, keeping both ends", () => {
    expect(renderCompact([1, 2, 3, 4, 5], 30)).toBe("[\n    1,\n    ...\n    5\n]");
  });

  it("collapses an array entirely when nothing else fits", () => {
    expect(renderCompact([1, 2, 3, 4, 5], 20)).toBe("[...]");
  });

  it("shortens long strings to the longest length that fits", () => {
    const rendered = renderCompact({ text: "a".repeat(100) }, 60);
    expect(rendered).toBe('{\n    "text": "' + "a".repeat(39) + '..."\n}');
    expect(rendered.length).toBeLessThanOrEqual(60);
  });

  it("keeps surrogate pairs whole when shortening strings", () => {
    expect(renderCompact("😀".repeat(20), 30)).toBe(`"${"😀".repeat(12)}..."`);
  });

  it("does not shorten strings at or below the minimum length", () => {
    const short = "b".repeat(23);
    expect(renderCompact([short, short, short], 40)).toBe(`[...]`);
  });

  it("honours a custom indentation", () => {
    const renderer = new CompactRenderer({ indentation: 2 });
    expect(renderer.render({ a: [1] }, 1000)).toBe('{\n  "a": [\n    1\n  ]\n}');
  });
});
