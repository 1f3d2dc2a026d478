import { backoffDelay, type RetryPolicy, type Sleep } from "@meridian/core";
import { getErrorMessage, isTransientError } from "@meridian/errors";

export type Attempted<T> =
  | { readonly ok: true; readonly value: T; readonly attempts: number }
  | { readonly ok: false; readonly error: unknown; readonly attempts: number };

export interface AttemptOptions {
  readonly policy: RetryPolicy;
  readonly sleep: Sleep;
  /** Log tag, e.g. "Delivery". */
  readonly tag: string;
  /** What is being attempted, for the retry log line. */
  readonly operation: string;
}

/**
 * Run `fn`, retrying transient failures with bounded exponential backoff.
 * Permanent failures end the loop at once. Never throws on `fn`'s behalf:
 * the last error comes back in the result.
 */
export async function attemptWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: AttemptOptions,
): Promise<Attempted<T>> {
  const { policy } = options;
  for (let attempt = 1; ; attempt++) {
    try {
      return { ok: true, value: await fn(attempt), attempts: attempt };
    } catch (error) {
      if (!isTransientError(error) || attempt >= policy.maxAttempts) {
        return { ok: false, error, attempts: attempt };
      }
      const delay = backoffDelay(policy, attempt);
      console.warn(
        `[${options.tag}] ${options.operation} failed (attempt ${attempt}/${policy.maxAttempts}), retrying in ${delay}ms: ${getErrorMessage(error)}`,
      );
      await options.sleep(delay);
    }
  }
}
