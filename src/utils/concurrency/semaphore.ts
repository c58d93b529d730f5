/**
 * Semaphore
 *
 * Counting gate that bounds how many tasks run at once. Waiters are served
 * in FIFO order and a permit is handed over directly to the next waiter on
 * release, so the in-use count never exceeds the capacity.
 *
 * A capacity of 0 disables the limit.
 *
 * @example
 * ```typescript
 * const gate = new Semaphore({ capacity: 4, name: 'FivetranGate' });
 *
 * const response = await gate.withPermit(() => fetch(url), signal, url);
 * ```
 */

import { createServiceLogger } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { RequestCancelledError } from '../../clients/http/errors.js';

export interface SemaphoreOptions {
  /**
   * Maximum number of permits held at once (0 = unbounded)
   */
  capacity: number;

  /**
   * Optional name for logging purposes
   * @default 'Semaphore'
   */
  name?: string;
}

export class Semaphore {
  private readonly capacity: number;
  private readonly logger: ServiceLogger;
  private readonly waiters: Array<() => void> = [];
  private inUse = 0;

  constructor(options: SemaphoreOptions | number) {
    const { capacity, name } =
      typeof options === 'number' ? { capacity: options, name: undefined } : options;

    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Semaphore capacity must be a non-negative integer, got ${capacity}`);
    }

    this.capacity = capacity;
    this.logger = createServiceLogger(name || 'Semaphore');
  }

  /**
   * Whether a limit applies at all
   */
  get isBounded(): boolean {
    return this.capacity > 0;
  }

  /**
   * Acquire a permit, suspending while none is free
   *
   * @param url - Request the permit is for; carried by RequestCancelledError
   * @returns A release function; calling it more than once has no effect
   * @throws RequestCancelledError if the signal fires before a permit is granted
   */
  async acquire(signal?: AbortSignal, url?: string): Promise<() => void> {
    if (signal?.aborted) {
      throw new RequestCancelledError(url, signal.reason);
    }

    if (!this.isBounded || this.inUse < this.capacity) {
      this.inUse++;
      return this.createRelease();
    }

    this.logger.debug(
      { inUse: this.inUse, capacity: this.capacity, queued: this.waiters.length + 1 },
      'Waiting for a free permit'
    );

    await new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(new RequestCancelledError(url, signal?.reason));
      };

      const waiter = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };

      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });

    // The releasing holder transferred its permit; inUse already counts us
    return this.createRelease();
  }

  /**
   * Run `task` while holding a permit; the permit is released on every exit path
   */
  async withPermit<T>(task: () => Promise<T>, signal?: AbortSignal, url?: string): Promise<T> {
    const release = await this.acquire(signal, url);
    try {
      return await task();
    } finally {
      release();
    }
  }

  /**
   * Current gate usage
   */
  getStats(): { capacity: number; inUse: number; waiting: number } {
    return {
      capacity: this.capacity,
      inUse: this.inUse,
      waiting: this.waiters.length,
    };
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.inUse--;
      }
    };
  }
}
