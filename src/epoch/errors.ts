/**
 * Epoch Error Classes
 *
 * `EpochSequenceError` is a broken driver contract and is thrown.
 * `EpochEmissionError` is reported through the coordinator's events.
 */

import type { EpochNumber } from '../core/types';

export class EpochSequenceError extends Error {
  constructor(
    message: string,
    public readonly requestedEpoch: EpochNumber | null,
    public readonly lastCompletedEpoch: EpochNumber | null
  ) {
    super(message);
    this.name = 'EpochSequenceError';
    Object.setPrototypeOf(this, EpochSequenceError.prototype);
  }
}

export class EpochEmissionError extends Error {
  constructor(
    public readonly epoch: EpochNumber,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
    super(`Failed to emit output for epoch ${epoch}: ${detail}`, { cause });
    this.name = 'EpochEmissionError';
    Object.setPrototypeOf(this, EpochEmissionError.prototype);
  }
}
