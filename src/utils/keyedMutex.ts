import { LockTimeoutError } from "../errors/marketplace.errors";

export type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
}

/**
 * KEYED MUTEX
 *
 * One FIFO critical section per key (shipment id, driver id). Work on
 * different keys never waits on each other; there is no global lock.
 *
 * Waiting is bounded: a caller that cannot enter within `timeoutMs` gets a
 * LockTimeoutError instead of queueing forever.
 */
export class KeyedMutex {
  private readonly held = new Set<string>();
  private readonly queues = new Map<string, Waiter[]>();

  constructor(
    private readonly name: string,
    private readonly timeoutMs: number = 5000
  ) {}

  /**
   * Run `work` while holding the lock for `key`
   */
  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await work();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  /**
   * Number of callers waiting on `key` (excludes the holder)
   */
  queueLength(key: string): number {
    return this.queues.get(key)?.length ?? 0;
  }

  /**
   * Take the lock for `key` and keep it until the returned release runs.
   * For holders whose critical section outlives one callback.
   */
  acquire(key: string): Promise<Release> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return Promise.resolve(this.releaser(key));
    }

    return new Promise<Release>((resolve, reject) => {
      const queue = this.queues.get(key) ?? [];
      this.queues.set(key, queue);

      const waiter: Waiter = {
        grant: (release) => {
          clearTimeout(timer);
          resolve(release);
        },
      };

      const timer = setTimeout(() => {
        const index = queue.indexOf(waiter);
        if (index >= 0) {
          queue.splice(index, 1);
        }
        reject(new LockTimeoutError(`${this.name}:${key}`, this.timeoutMs));
      }, this.timeoutMs);

      queue.push(waiter);
    });
  }

  private releaser(key: string): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const queue = this.queues.get(key);
      const next = queue?.shift();
      if (next) {
        // Ownership passes straight to the next waiter; `held` stays set
        next.grant(this.releaser(key));
        return;
      }

      this.queues.delete(key);
      this.held.delete(key);
    };
  }
}
