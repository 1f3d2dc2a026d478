import { describe, expect, it } from "vitest";
import {
  ALPHABET,
  formatPairingCode,
  generatePairingCode,
  isWellFormedCode,
  normalizePairingCode,
} from "../code-generator.js";

describe("generatePairingCode", () => {
  it("should produce eight symbols by default", () => {
    const { code, formatted } = generatePairingCode();

    expect(code).toHaveLength(8);
    expect(formatted).toBe(`${code.slice(0, 4)}-${code.slice(4)}`);
  });

  it("should draw only from the alphabet", () => {
    const drawn = Array.from({ length: 50 }, () => generatePairingCode(12).code).join("");

    expect([...drawn].filter((symbol) => !ALPHABET.includes(symbol))).toEqual([]);
  });

  it("should split an odd length with the shorter half first", () => {
    const { code, formatted } = generatePairingCode(5);

    expect(formatted).toBe(`${code.slice(0, 2)}-${code.slice(2)}`);
  });
});

describe("formatPairingCode", () => {
  it("should join the halves with a dash", () => {
    expect(formatPairingCode("K7PD3WQA")).toBe("K7PD-3WQA");
  });
});

describe("normalizePairingCode", () => {
  it("should upper-case and drop dashes", () => {
    expect(normalizePairingCode("k7pd-3wqa")).toBe("K7PD3WQA");
  });

  it("should drop surrounding and inner whitespace", () => {
    expect(normalizePairingCode("  K7PD 3WQA \n")).toBe("K7PD3WQA");
  });
});

describe("isWellFormedCode", () => {
  it("should accept alphabet symbols", () => {
    expect(isWellFormedCode("K7PD3WQA")).toBe(true);
  });

  it("should reject look-alike symbols and the empty string", () => {
    expect(isWellFormedCode("K7PD3WQ0")).toBe(false);
    expect(isWellFormedCode("IOIO")).toBe(false);
    expect(isWellFormedCode("")).toBe(false);
  });
});
