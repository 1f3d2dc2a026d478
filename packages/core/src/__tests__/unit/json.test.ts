import { describe, expect, it } from "vitest";
import { cloneJson, isJsonObject, jsonEquals, stableStringify } from "../../json.js";

describe("stableStringify", () => {
  it("should sort object keys at every depth", () => {
    expect(stableStringify({ b: 1, a: { d: [2, { z: true, y: null }], c: "x" } })).toBe(
      '{"a":{"c":"x","d":[2,{"y":null,"z":true}]},"b":1}',
    );
  });

  it("should serialize primitives like JSON.stringify", () => {
    expect(stableStringify("hi")).toBe('"hi"');
    expect(stableStringify(3)).toBe("3");
    expect(stableStringify(null)).toBe("null");
  });
});

describe("jsonEquals", () => {
  it("should ignore key order", () => {
    expect(jsonEquals({ action: "approve-x", n: 1 }, { n: 1, action: "approve-x" })).toBe(true);
  });

  it("should respect array order and values", () => {
    expect(jsonEquals([1, 2], [2, 1])).toBe(false);
    expect(jsonEquals({ action: "approve-x" }, { action: "approve-y" })).toBe(false);
  });
});

describe("cloneJson", () => {
  it("should return an independent copy", () => {
    const original = { nested: { list: [1, 2] } };
    const copy = cloneJson(original);
    copy.nested.list.push(3);

    expect(original.nested.list).toEqual([1, 2]);
  });
});

describe("isJsonObject", () => {
  it("should accept plain JSON objects", () => {
    expect(isJsonObject({ a: [1, "b", null, { c: false }] })).toBe(true);
  });

  it("should reject arrays, primitives and non-JSON members", () => {
    expect(isJsonObject([1])).toBe(false);
    expect(isJsonObject("x")).toBe(false);
    expect(isJsonObject({ f: () => 1 })).toBe(false);
    expect(isJsonObject({ n: Number.NaN })).toBe(false);
  });
});
