/**
 * Mutual exclusion for a shared Telegram session
 *
 * A GramJS client is one MTProto connection; two history iterations over it
 * at once interleave their requests. Holders queue in FIFO order.
 *
 * @module telegram/session-lock
 */

/**
 * Releases a held lock. Calling it more than once has no further effect.
 */
export type ReleaseFn = () => void;

export class SessionLock {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /**
   * Wait for the lock
   *
   * @returns A function that releases the lock
   */
  acquire(): Promise<ReleaseFn> {
    const previous = this.tail;
    let releaseCurrent: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      releaseCurrent = resolve;
    });
    this.tail = previous.then(() => current);
    this.holders += 1;

    let released = false;
    const release: ReleaseFn = () => {
      if (released) {
        return;
      }
      released = true;
      this.holders -= 1;
      releaseCurrent();
    };

    return previous.then(() => release);
  }

  /**
   * Number of callers holding or waiting for the lock
   */
  get pending(): number {
    return this.holders;
  }
}
