import { LinkedList } from './list';

export type Release = () => void;

/**
 * FIFO mutual exclusion for async tasks. Not reentrant: a task that awaits `acquire()`
 * while already holding the lock waits forever.
 */
export class Mutex {
  private locked = false;
  private readonly waiters = new LinkedList<() => void>();

  /** true while some task holds the lock */
  get isLocked() {
    return this.locked;
  }

  /** The number of tasks waiting for the lock */
  get waitingCount() {
    return this.waiters.length;
  }

  /**
   * Wait for the lock.
   * @returns a release function; calling it more than once has no further effect
   */
  acquire(): Promise<Release> {
    return new Promise<Release>(resolve => {
      const grant = () => resolve(this.releaser());

      if (this.locked) {
        this.waiters.push(grant);
      } else {
        this.locked = true;
        grant();
      }
    });
  }

  /** Run `fn` holding the lock; the lock is released however `fn` ends */
  async runExclusive<R>(fn: () => R | Promise<R>): Promise<R> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) { return; }
      released = true;

      // hand the lock straight to the oldest waiter so nobody can cut in
      if (this.waiters.length) {
        this.waiters.shift()();
      } else {
        this.locked = false;
      }
    };
  }
}
