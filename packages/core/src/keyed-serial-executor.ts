// ---------------------------------------------------------------------------
// KeyedSerialExecutor
// ---------------------------------------------------------------------------

/**
 * Runs tasks one at a time per key, in submission order; different keys run
 * concurrently.
 *
 * A failed task does not stall its key: the next task starts once the
 * previous one settles either way. Chains are dropped once a key goes idle,
 * so memory is bounded by the number of keys with work in flight.
 */
export class KeyedSerialExecutor {
  // key → tail of that key's chain
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  /** Keys with queued or running work. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
