/**
 * In-process mutual exclusion keyed by string.
 * Tasks sharing a key run one at a time in arrival order; different keys run freely.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);

    // the queue only tracks completion; the caller gets the outcome through `run`
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return run;
  }

  /** Keys with queued or running work */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
