/**
 * Async Module
 *
 * - AsyncMutex: mutual exclusion for the opportunity ledger
 * - withTimeout / mapConcurrent
 *
 * @module async
 */

export { AsyncMutex } from './async-mutex';
export type { MutexStats } from './async-mutex';

export {
  TimeoutError,
  withTimeout,
  mapConcurrent
} from './async-utils';
