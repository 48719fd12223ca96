export type {
  EpochNumber,
  PeerId,
  EpochPhase,
  PeerInput,
  IgnoreReason,
  InputOutcome,
  EpochOutput,
  OutputMode,
  EpochSnapshot,
} from './types';
