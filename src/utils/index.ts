/**
 * Epoch Sync Utils Module
 *
 * Shared utilities and helpers.
 */

export {
  logger,
  getLogger,
  setLogger,
  resetLogger,
  disableLogging,
  createNamespacedLogger,
} from './logger';

export type { Logger } from './logger';

export { delay, DelayAbortedError } from './delay';
