/**
 * KeyedMutex - Serializes async work per key
 *
 * Tasks for the same key run one at a time in arrival order; tasks for
 * different keys never wait on each other. A task holds exactly one key.
 */
export class KeyedMutex {
  private readonly tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(() => task());
    // The chain only tracks completion; the caller receives the failure.
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with queued or running work */
  get size(): number {
    return this.tails.size;
  }
}
