/**
 * Tracks fire-and-forget work so it can be awaited on shutdown and in tests.
 *
 * Failures never reach the caller that started the task: they go to the
 * task's `onError` handler, which is expected to log them.
 */
export class BackgroundTasks {
  private readonly tasks = new Set<Promise<void>>();

  get size(): number {
    return this.tasks.size;
  }

  run(work: () => Promise<unknown>, onError: (error: unknown) => void): void {
    const task: Promise<void> = Promise.resolve()
      .then(work)
      .then(() => undefined, onError)
      .finally(() => {
        this.tasks.delete(task);
      });
    this.tasks.add(task);
  }

  /** Resolves once every task, including ones started while draining, has settled. */
  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all(this.tasks);
    }
  }
}
