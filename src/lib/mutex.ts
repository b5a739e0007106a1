/**
 * NewsRelay — Mutex
 *
 * Promise-chain mutual exclusion for in-process async critical sections.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  get locked(): boolean {
    return this.held;
  }

  /**
   * Run `task` once every previously queued task has settled.
   */
  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    this.held = true;
    try {
      return await task();
    } finally {
      this.held = false;
      release();
    }
  }
}
