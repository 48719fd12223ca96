/**
 * Output value rule
 *
 * Two operating modes:
 * - aggregator: the node has peers; the output is the folded aggregate,
 *   rescaled by the base value when the mode is `'Correct'`
 * - standalone source: no peers; the output is derived from the epoch
 *   number so that a value is still produced every epoch
 */

import type { EpochNumber, OutputMode } from '../core/types';
import { roundTo } from './fold';

export const RESCALE_MODE = 'Correct';

export interface OutputInputs {
  peerCount: number;
  aggregate: number;
  epoch: EpochNumber;
  baseValue: number;
  mode: OutputMode;
}

export function computeEpochOutput({
  peerCount,
  aggregate,
  epoch,
  baseValue,
  mode,
}: OutputInputs): number {
  if (peerCount > 0) {
    return mode === RESCALE_MODE ? roundTo(aggregate * baseValue, 3) : aggregate;
  }

  return roundTo((baseValue * epoch) / 1000, 3);
}
