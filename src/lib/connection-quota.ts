import { logger } from './logger';
import { ResourceExhaustedError, ValidationError } from './errors';
import { TIMEOUTS } from './timeout';

/**
 * Counting semaphore over outbound connections.
 *
 * One instance is shared by every worker of a run, so the number of
 * simultaneous page fetches, DNS lookups and SMTP sessions stays bounded
 * no matter how many users are processed at once.
 */

export type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
  fail: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export interface QuotaStats {
  capacity: number;
  inUse: number;
  waiting: number;
  granted: number;
}

export class ConnectionQuota {
  private inUse = 0;
  private granted = 0;
  private readonly waiters: Waiter[] = [];

  constructor(
    public readonly capacity: number,
    private readonly acquireTimeoutMs: number = TIMEOUTS.QUOTA_ACQUIRE
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ValidationError(`Connection quota needs a positive capacity, got ${capacity}`);
    }
  }

  /**
   * Wait for a slot. Rejects with ResourceExhaustedError when none frees up
   * within the acquire timeout.
   */
  acquire(): Promise<Release> {
    if (this.inUse < this.capacity) {
      this.inUse++;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = {
        grant: resolve,
        fail: reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          logger.error(
            { capacity: this.capacity, waiting: this.waiters.length, waitedMs: this.acquireTimeoutMs },
            'No outbound connection slot available'
          );
          waiter.fail(new ResourceExhaustedError(
            `No outbound connection slot freed up within ${this.acquireTimeoutMs}ms`,
            this.acquireTimeoutMs
          ));
        }, this.acquireTimeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Run an operation while holding a slot; the slot is released on every path
   */
  async run<T>(operation: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await operation();
    } finally {
      release();
    }
  }

  stats(): QuotaStats {
    return {
      capacity: this.capacity,
      inUse: this.inUse,
      waiting: this.waiters.length,
      granted: this.granted,
    };
  }

  private createRelease(): Release {
    this.granted++;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff();
    };
  }

  // The freed slot goes straight to the oldest waiter, if any
  private handOff(): void {
    const next = this.waiters.shift();
    if (next) {
      clearTimeout(next.timer);
      next.grant(this.createRelease());
      return;
    }
    this.inUse--;
  }
}
