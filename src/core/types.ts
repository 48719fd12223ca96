/**
 * Epoch Sync Core Types
 *
 * Shared type definitions for the epoch synchronization state machine
 * and the collaborators around it.
 */

/**
 * Identifier of one synchronization round. Non-negative integer.
 */
export type EpochNumber = number;

/**
 * Identifier of a peer node whose input is expected every epoch
 */
export type PeerId = string;

/**
 * Per-epoch lifecycle of the coordinator
 */
export type EpochPhase = 'awaiting-start' | 'collecting' | 'complete';

/**
 * One inbound contribution from a peer
 */
export interface PeerInput {
  peerId: PeerId;
  epoch: EpochNumber;
  value: number;
  messageId: string;
}

/**
 * Why an input was dropped instead of folded
 */
export type IgnoreReason =
  | 'not-collecting'
  | 'epoch-mismatch'
  | 'unknown-peer'
  | 'duplicate-peer'
  | 'invalid-value';

/**
 * Result of offering an input to the coordinator
 */
export type InputOutcome =
  | { accepted: true }
  | { accepted: false; reason: IgnoreReason };

/**
 * The value emitted for a completed epoch
 */
export interface EpochOutput {
  epoch: EpochNumber;
  causalIds: string[];
  value: number;
}

/**
 * Output rescaling mode. Only `'Correct'` rescales the aggregate;
 * every other string leaves it unchanged.
 */
export type OutputMode = 'Correct' | (string & {});

/**
 * Read-only view of the coordinator state
 */
export interface EpochSnapshot {
  phase: EpochPhase;
  currentEpoch: EpochNumber | null;
  lastCompletedEpoch: EpochNumber | null;
  reportedPeers: PeerId[];
  pendingPeers: PeerId[];
  aggregate: number;
  causalIds: string[];
}
