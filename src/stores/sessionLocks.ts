/**
 * Per-session mutual exclusion.
 *
 * Each session id has its own promise chain: work queued for a session runs
 * only after everything queued before it for the same session has settled.
 * Different sessions never wait on each other.
 */
export class SessionLocks {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(sessionId: string, work: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(sessionId, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
    }
  }
}
