import { MeridianError } from "./base.js";
import type { BaseErrorType } from "./catalog.js";

const TRANSIENT_TYPES: ReadonlySet<BaseErrorType> = new Set([
  "ExternalError",
  "TimeoutError",
  "RateLimitError",
]);

/**
 * Classify by behavioral type. Matches on `_tag`, so domain errors count
 * alongside the generic classes of the same type.
 */
export function isErrorOfType<T extends BaseErrorType>(
  error: unknown,
  type: T,
): error is MeridianError & { readonly _tag: T } {
  return error instanceof MeridianError && error._tag === type;
}

/** Client-caused conditions the hub answers without logging a failure. */
export function isExpectedError(error: unknown): boolean {
  return error instanceof MeridianError && error.isExpected;
}

/**
 * Whether a retry may succeed. Unclassified throwables (driver or socket
 * errors) count as transient.
 */
export function isTransientError(error: unknown): boolean {
  return !(error instanceof MeridianError) || TRANSIENT_TYPES.has(error._tag);
}
