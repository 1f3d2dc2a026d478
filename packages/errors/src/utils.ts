import { MeridianError } from "./base.js";
import { InternalError } from "./bases.js";
import { ERROR_CATALOG, type ErrorCode } from "./catalog.js";

const UNKNOWN_MESSAGE = "An unknown error occurred";

export function isValidErrorCode(code: string): code is ErrorCode {
  return Object.hasOwn(ERROR_CATALOG, code);
}

export function getAllErrorCodes(): ErrorCode[] {
  return Object.keys(ERROR_CATALOG).filter(isValidErrorCode);
}

/**
 * Coerce any thrown value to a MeridianError. Foreign errors become
 * INTERNAL_ERROR and keep their original name in metadata.
 */
export function wrapError(error: unknown, traceId?: string): MeridianError {
  if (error instanceof MeridianError) return error;
  if (!(error instanceof Error)) {
    const message = typeof error === "string" ? error : UNKNOWN_MESSAGE;
    return new InternalError(message, undefined, traceId);
  }
  return new InternalError({
    code: "INTERNAL_ERROR",
    message: error.message,
    metadata: { originalName: error.name },
    traceId,
    cause: error,
  });
}

/** Message for log lines; never throws. */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : UNKNOWN_MESSAGE;
}

/**
 * Catalog lint used by the tests: codes are UPPER_SNAKE_CASE, carry their
 * domain as prefix and map to a real HTTP status.
 */
export function validateCatalog(): { valid: boolean; errors: string[] } {
  const errors = getAllErrorCodes().flatMap((code) => {
    const { domain, httpStatus } = ERROR_CATALOG[code];
    const prefix = domain === "config" ? "CONFIGURATION" : domain.toUpperCase();
    const found: string[] = [];
    if (!/^[A-Z][A-Z0-9_]*$/.test(code)) {
      found.push(`Code '${code}' is not in UPPER_SNAKE_CASE format`);
    }
    if (httpStatus < 100 || httpStatus >= 600) {
      found.push(`Code '${code}' has invalid HTTP status ${httpStatus}`);
    }
    if (!code.startsWith(prefix)) {
      found.push(`Code '${code}' does not start with its domain '${domain}'`);
    }
    return found;
  });
  return { valid: errors.length === 0, errors };
}
