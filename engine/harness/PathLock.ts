/**
 * SheetOps Harness - Path Lock
 *
 * Serialises async work per key. Tasks on the same key run one after
 * another in submission order; tasks on different keys run independently.
 */

export class PathLock {
  private tails = new Map<string, Promise<void>>();

  /**
   * Number of keys with queued or running work
   */
  get size(): number {
    return this.tails.size;
  }

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The chain continues whether this task settles or fails
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    return result.finally(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
  }
}
