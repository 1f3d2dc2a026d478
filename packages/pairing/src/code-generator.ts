import { randomBytes } from "node:crypto";

/**
 * Symbols a pairing code may contain. Digits 0 and 1 and letters O and I are
 * left out since they read alike. The length is 32, a divisor of 256.
 */
export const ALPHABET = "ABCDEFGHJKLMNPQRSTUVWXYZ23456789";

const ALPHABET_SET: ReadonlySet<string> = new Set(ALPHABET);

export interface GeneratedCode {
  /** Stored form, e.g. "K7PD3WQA". */
  readonly code: string;
  /** Display form, e.g. "K7PD-3WQA". */
  readonly formatted: string;
}

export type CodeGenerator = (length: number) => GeneratedCode;

export function generatePairingCode(length = 8): GeneratedCode {
  const symbols = Array.from(randomBytes(length), (byte) => ALPHABET.charAt(byte % ALPHABET.length));
  const code = symbols.join("");
  return { code, formatted: formatPairingCode(code) };
}

/** Splits the code in two halves joined by a dash. */
export function formatPairingCode(code: string): string {
  const half = Math.floor(code.length / 2);
  return [code.slice(0, half), code.slice(half)].join("-");
}

/** Maps user input to the stored form: whitespace and dashes dropped, upper case. */
export function normalizePairingCode(input: string): string {
  return input.replace(/[\s-]+/g, "").toUpperCase();
}

export function isWellFormedCode(normalized: string): boolean {
  return normalized.length > 0 && [...normalized].every((symbol) => ALPHABET_SET.has(symbol));
}
