/**
 * Time sources every service takes as a dependency. Services fall back to
 * `defaultClock` and `defaultSleep` when none is given.
 */

export interface Clock {
  readonly now: () => number;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultClock: Clock = {
  now: () => Date.now(),
};

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export function isoNow(clock: Clock): string {
  return new Date(clock.now()).toISOString();
}
