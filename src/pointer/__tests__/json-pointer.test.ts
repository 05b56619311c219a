import { describe, it, expect } from "vitest";
import {
  add,
  appendToken,
  decodeToken,
  encodeToken,
  formatPointer,
  parentPointer,
  parsePointer,
  readPointer,
  remove,
  replace,
  resolve,
  set,
  tryResolve,
} from "../json-pointer.js";
import { InvalidPointerError, PointerNotFoundError } from "../../errors.js";
import { isJsonObject, type JsonValue } from "../../domain/json.js";

const doc: JsonValue = {
  company: "Acme",
  employees: [{ name: "Ada" }, { name: "Linus" }],
  "a/b": { "m~n": 1 },
};

function keysOf(value: JsonValue): string[] {
  return isJsonObject(value) ? Object.keys(value) : [];
}

describe("parsePointer / formatPointer", () => {
  it("treats only the empty string as the root", () => {
    expect(parsePointer("")).toEqual([]);
    expect(parsePointer("/")).toEqual([""]);
    expect(parsePointer("//x")).toEqual(["", "x"]);
  });

  it("resolves '/' to the member with the empty key", () => {
    expect(resolve({ "": 1, a: 2 }, "/")).toBe(1);
    expect(add({ a: 1 }, "/", 5)).toEqual({ a: 1, "": 5 });
  });

  it("maps '/' to the root only for reads", () => {
    expect(readPointer("/")).toBe("");
    expect(readPointer("//")).toBe("//");
    expect(readPointer("/a")).toBe("/a");
  });

  it("decodes ~1 and ~0 in that order", () => {
    expect(parsePointer("/a~1b/m~0n")).toEqual(["a/b", "m~n"]);
    expect(decodeToken("~01")).toBe("~1");
    expect(encodeToken("~1")).toBe("~01");
  });

  it("formats tokens back into a pointer", () => {
    expect(formatPointer(["a/b", "m~n"])).toBe("/a~1b/m~0n");
    expect(formatPointer(parsePointer("/employees/0/name"))).toBe("/employees/0/name");
  });

  it("rejects pointers without a leading slash", () => {
    expect(() => parsePointer("employees")).toThrow(InvalidPointerError);
    expect(() => parsePointer("employees")).toThrow('Did you mean "/employees"?');
  });

  it("builds child and parent pointers", () => {
    expect(appendToken("", "items")).toBe("/items");
    expect(appendToken("/", 3)).toBe("//3");
    expect(appendToken("/", "x")).toBe("//x");
    expect(appendToken("/x", "a/b")).toBe("/x/a~1b");
    expect(parentPointer("/employees/1/name")).toBe("/employees/1");
    expect(parentPointer("/employees")).toBe("");
  });
});

describe("resolve", () => {
  it("walks objects and arrays", () => {
    expect(resolve(doc, "/employees/1/name")).toBe("Linus");
    expect(resolve(doc, "/a~1b/m~0n")).toBe(1);
    expect(resolve(doc, "")).toBe(doc);
  });

  it("reports missing keys and out-of-range indices", () => {
    expect(() => resolve(doc, "/missing")).toThrow(PointerNotFoundError);
    expect(() => resolve(doc, "/employees/2")).toThrow(
      '"/employees/2": index 2 is out of range for the array at /employees (length 2)',
    );
  });

  it("rejects leading zeros in array indices", () => {
    expect(() => resolve(doc, "/employees/01")).toThrow(InvalidPointerError);
  });

  it("cannot traverse into scalars", () => {
    expect(() => resolve(doc, "/company/x")).toThrow('"/company/x": cannot traverse into a string at /company');
  });

  it("tryResolve never throws for pointer problems", () => {
    expect(tryResolve(doc, "/employees/0")).toEqual({ found: true, value: { name: "Ada" } });
    expect(tryResolve(doc, "/nope")).toEqual({ found: false });
    expect(tryResolve(doc, "nope")).toEqual({ found: false });
  });
});

describe("add / replace / remove", () => {
  it("exposes set as add", () => {
    expect(set).toBe(add);
  });

  it("appends with '-' and inserts at an index without touching the input", () => {
    const appended = add(doc, "/employees/-", { name: "Grace" });
    const inserted = add(doc, "/employees/0", { name: "Alan" });
    expect(resolve(appended, "/employees")).toEqual([{ name: "Ada" }, { name: "Linus" }, { name: "Grace" }]);
    expect(resolve(inserted, "/employees/0/name")).toBe("Alan");
    expect(resolve(doc, "/employees")).toEqual([{ name: "Ada" }, { name: "Linus" }]);
  });

  it("shares untouched subtrees with the input", () => {
    const next = add(doc, "/founded", 1999);
    expect(resolve(next, "/employees")).toBe(resolve(doc, "/employees"));
    expect(next).not.toBe(doc);
  });

  it("rejects insertion past the end of an array", () => {
    expect(() => add(doc, "/employees/3", {})).toThrow(PointerNotFoundError);
  });

  it("requires intermediate containers", () => {
    expect(() => add(doc, "/address/city", "Turin")).toThrow(PointerNotFoundError);
  });

  it("replaces existing values only", () => {
    expect(resolve(replace(doc, "/company", "Acme Corp."), "/company")).toBe("Acme Corp.");
    expect(() => replace(doc, "/ceo", "x")).toThrow(PointerNotFoundError);
  });

  it("removes array items and object keys", () => {
    expect(resolve(remove(doc, "/employees/0"), "/employees")).toEqual([{ name: "Linus" }]);
    expect(keysOf(remove(doc, "/company"))).toEqual(["employees", "a/b"]);
  });

  it("refuses to remove the root", () => {
    expect(() => remove(doc, "")).toThrow(InvalidPointerError);
  });

  it("treats __proto__ as an ordinary key", () => {
    const next = add({}, "/__proto__", { polluted: true });
    expect(keysOf(next)).toEqual(["__proto__"]);
    expect(Object.prototype.hasOwnProperty.call(Object.prototype, "polluted")).toBe(false);
  });

  it("add at the root replaces the document", () => {
    expect(add(doc, "", [1])).toEqual([1]);
  });

  it("restores a removed value when it is added back at the same path", () => {
    for (const pointer of ["/company", "/employees", "/employees/0", "/employees/1/name", "/a~1b/m~0n"]) {
      const value = resolve(doc, pointer);
      const restored = add(remove(doc, pointer), pointer, value);
      expect(restored).toEqual(doc);
      expect(resolve(restored, pointer)).toEqual(value);
    }
  });
});
