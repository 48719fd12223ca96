import type { EpochOutput } from '../core/types';

/**
 * Sink for completed epochs.
 *
 * Called exactly once per completed epoch. A rejection fails that emission
 * only; it is never retried.
 */
export interface OutputEmitter {
  emit(output: EpochOutput): Promise<void>;
}
