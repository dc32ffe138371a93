/**
 * Per-key mutual exclusion built on promise chains.
 * Work for the same key runs one at a time in arrival order; different keys
 * never wait on each other.
 */
export class KeyedLock {
  private readonly locks = new Map<string, Promise<void>>();

  async withLock<T>(key: string, work: () => Promise<T> | T): Promise<T> {
    const previous = this.locks.get(key) || Promise.resolve();
    let releaseCurrent: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      releaseCurrent = resolve;
    });
    const lockChain = previous.then(() => current);
    this.locks.set(key, lockChain);

    await previous;
    try {
      return await work();
    } finally {
      releaseCurrent();
      if (this.locks.get(key) === lockChain) {
        this.locks.delete(key);
      }
    }
  }

  /**
   * Number of keys with queued or running work
   */
  pending(): number {
    return this.locks.size;
  }
}
