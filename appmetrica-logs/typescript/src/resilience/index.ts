/**
 * Resilience components - public exports.
 */

export { calculateBackoffDelay, sleep } from './backoff.js';

export {
  PREPARING_STATUSES,
  type PollingHooks,
  PollingExecutor,
  createPollingExecutor,
} from './polling.js';
