/**
 * Per-key mutual exclusion built on promise chaining.
 *
 * Work submitted under the same key runs strictly one after another in
 * submission order; work under different keys runs independently. A failing
 * task never poisons the chain for the tasks queued behind it.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const tail = this.tails.get(key) ?? Promise.resolve();
    const runPromise = tail.then(task, task);

    const nextTail = runPromise.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, nextTail);

    // Drop the entry once this task is the last one queued for the key.
    void nextTail.then(() => {
      if (this.tails.get(key) === nextTail) {
        this.tails.delete(key);
      }
    });

    return runPromise;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
