/**
 * BackoffWindow
 *
 * Sole owner of the shared "do not send before" deadline of one dispatcher.
 * Every caller reads and moves the deadline through this object only.
 *
 * Policies for a rate-limit signal that arrives while a window is active:
 * - 'overwrite' (default): the new deadline replaces the old one, even when
 *   it is earlier. A shrink is logged at warn level.
 * - 'max': the later of the two deadlines wins.
 */

import { createServiceLogger } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';

export type BackoffPolicy = 'overwrite' | 'max';

export interface BackoffWindowOptions {
  /**
   * @default 'overwrite'
   */
  policy?: BackoffPolicy;

  /**
   * Clock source in epoch milliseconds
   * @default Date.now
   */
  now?: () => number;

  /**
   * Optional name for logging purposes
   * @default 'BackoffWindow'
   */
  name?: string;
}

export class BackoffWindow {
  private deadline = 0;
  private readonly policy: BackoffPolicy;
  private readonly now: () => number;
  private readonly logger: ServiceLogger;

  constructor(options: BackoffWindowOptions = {}) {
    this.policy = options.policy ?? 'overwrite';
    this.now = options.now ?? (() => Date.now());
    this.logger = createServiceLogger(options.name || 'BackoffWindow');
  }

  /**
   * Milliseconds until requests may be sent again (0 when no window is active)
   */
  remainingMs(): number {
    return Math.max(0, this.deadline - this.now());
  }

  /**
   * Whether a backoff window is currently active
   */
  isActive(): boolean {
    return this.remainingMs() > 0;
  }

  /**
   * Epoch milliseconds before which no request should be sent
   */
  getDeadline(): number {
    return this.deadline;
  }

  /**
   * Open (or move) the window so it ends `delayMs` from now
   *
   * @returns The deadline in effect after applying the policy
   */
  backOff(delayMs: number): number {
    const now = this.now();
    const requested = now + Math.max(0, delayMs);

    if (this.policy === 'max') {
      this.deadline = Math.max(this.deadline, requested);
      return this.deadline;
    }

    if (this.deadline > requested) {
      this.logger.warn(
        { previousDeadline: this.deadline, newDeadline: requested, shrinkMs: this.deadline - requested },
        'Backoff window shortened by a later rate-limit response'
      );
    }
    this.deadline = requested;
    return this.deadline;
  }

  /**
   * Close the window immediately
   */
  reset(): void {
    this.deadline = 0;
  }
}
