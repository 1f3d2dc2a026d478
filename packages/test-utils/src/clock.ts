import type { Clock, Sleep } from "@meridian/core";

export interface FakeClock extends Clock {
  advance(ms: number): void;
  set(ms: number): void;
}

export function createFakeClock(start = Date.parse("2026-01-01T00:00:00.000Z")): FakeClock {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
    set(ms: number) {
      current = ms;
    },
  };
}

export interface RecordingSleep extends Sleep {
  readonly delays: number[];
}

/**
 * Sleep that resolves on the next microtask and records the requested delays,
 * advancing a fake clock by the same amount when one is given.
 */
export function createRecordingSleep(clock?: FakeClock): RecordingSleep {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
    clock?.advance(ms);
  };
  return Object.assign(sleep, { delays });
}
