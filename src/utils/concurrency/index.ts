/**
 * Concurrency Module
 *
 * Bounded concurrency gate and cooperative cancellation helpers.
 */

export { Semaphore } from './semaphore.js';
export type { SemaphoreOptions } from './semaphore.js';
export {
  sleep,
  throwIfCancelled,
  raceWithSignal,
  createLinkedAbortController,
} from './abort.js';
