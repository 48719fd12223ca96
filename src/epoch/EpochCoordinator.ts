/**
 * Epoch Coordinator
 *
 * Single authority for "have we heard enough to finish this epoch, and what
 * is the result". Collects exactly one input per configured peer for the
 * current epoch, folds accepted inputs into a running aggregate, detects
 * completion and hands the computed output to an OutputEmitter.
 *
 * Lifecycle per epoch:
 *   awaiting-start -> collecting -> complete -> (emit) -> awaiting-start
 *
 * Inputs that cannot be folded (wrong epoch, unknown peer, duplicate peer,
 * non-finite value) are dropped and reported through `input-ignored`.
 * A broken driver contract (non-increasing epoch, overlapping epochs) throws
 * EpochSequenceError.
 */

import { EventEmitter } from 'eventemitter3';
import { createNamespacedLogger, type Logger } from '../utils/logger';
import { delay } from '../utils/delay';
import { ConfigValidationError } from '../config/errors';
import type {
  EpochNumber,
  EpochOutput,
  EpochPhase,
  EpochSnapshot,
  IgnoreReason,
  InputOutcome,
  OutputMode,
  PeerId,
  PeerInput,
} from '../core/types';
import { EpochEmissionError, EpochSequenceError } from './errors';
import {
  resolveFoldOperator,
  roundTo,
  type FoldOperator,
  type FoldOperatorName,
} from './fold';
import { computeEpochOutput } from './output';
import type { OutputEmitter } from './OutputEmitter';

export interface EpochCoordinatorOptions {
  peers: Iterable<PeerId>;
  baseValue: number;
  emitter: OutputEmitter;
  mode?: OutputMode;
  /** Seconds between completion and emission */
  outputDelay?: number;
  fold?: FoldOperator | FoldOperatorName;
  logger?: Logger;
}

export interface EpochCoordinatorEvents {
  'epoch-started': (epoch: EpochNumber) => void;
  'input-accepted': (input: PeerInput, aggregate: number) => void;
  'input-ignored': (input: PeerInput, reason: IgnoreReason) => void;
  'epoch-complete': (output: EpochOutput) => void;
  'output-emitted': (output: EpochOutput) => void;
  'emission-failed': (error: EpochEmissionError) => void;
  'epoch-reset': (epoch: EpochNumber | null) => void;
}

// ============================================================================
// Epoch Coordinator
// ============================================================================

export class EpochCoordinator extends EventEmitter<EpochCoordinatorEvents> {
  private readonly peers: ReadonlySet<PeerId>;
  private readonly baseValue: number;
  private readonly mode: OutputMode;
  private readonly outputDelayMs: number;
  private readonly fold: FoldOperator;
  private readonly emitter: OutputEmitter;
  private readonly logger: Logger;

  private phase: EpochPhase = 'awaiting-start';
  private currentEpoch: EpochNumber | null = null;
  private lastCompletedEpoch: EpochNumber | null = null;
  private reportedPeers: Set<PeerId> = new Set();
  private aggregate: number;
  private causalIds: string[] = [];

  private pendingCompletion: Promise<void> | null = null;
  private readonly shutdownController = new AbortController();

  constructor(options: EpochCoordinatorOptions) {
    super();

    if (!Number.isFinite(options.baseValue)) {
      throw new ConfigValidationError(
        'Base value must be a finite number',
        'baseValue',
        options.baseValue,
      );
    }

    const outputDelay = options.outputDelay ?? 0;
    if (!Number.isFinite(outputDelay) || outputDelay < 0) {
      throw new ConfigValidationError(
        'Output delay must be a non-negative number of seconds',
        'outputDelay',
        outputDelay,
      );
    }

    this.peers = new Set(options.peers);
    this.baseValue = options.baseValue;
    this.mode = options.mode ?? '';
    this.outputDelayMs = outputDelay * 1000;
    this.fold = resolveFoldOperator(options.fold);
    this.emitter = options.emitter;
    this.logger = options.logger ?? createNamespacedLogger('EpochCoordinator');
    this.aggregate = this.fold.seed;

    this.logger.debug('Initialized', {
      peers: [...this.peers],
      baseValue: this.baseValue,
      mode: this.mode,
      outputDelay,
      fold: this.fold.name,
    });
  }

  /**
   * Open a new epoch. `triggerMessageId` identifies the message that opened
   * it and becomes the first causal id of the epoch's output.
   */
  onEpochStart(epoch: EpochNumber, triggerMessageId?: string): void {
    if (this.shutdownController.signal.aborted) {
      throw new EpochSequenceError(
        `Cannot start epoch ${epoch}: coordinator has been shut down`,
        epoch,
        this.lastCompletedEpoch,
      );
    }

    if (!Number.isSafeInteger(epoch) || epoch < 0) {
      throw new EpochSequenceError(
        `Epoch must be a non-negative integer, got ${epoch}`,
        epoch,
        this.lastCompletedEpoch,
      );
    }

    if (this.phase !== 'awaiting-start') {
      throw new EpochSequenceError(
        `Cannot start epoch ${epoch} while epoch ${this.currentEpoch} is ${this.phase}`,
        epoch,
        this.lastCompletedEpoch,
      );
    }

    if (this.lastCompletedEpoch !== null && epoch <= this.lastCompletedEpoch) {
      throw new EpochSequenceError(
        `Epoch ${epoch} does not follow completed epoch ${this.lastCompletedEpoch}`,
        epoch,
        this.lastCompletedEpoch,
      );
    }

    this.clearEpochState();
    this.currentEpoch = epoch;
    this.phase = 'collecting';
    if (triggerMessageId !== undefined) {
      this.causalIds.push(triggerMessageId);
    }

    this.logger.debug('Epoch started', { epoch, expectedPeers: this.peers.size });
    this.emit('epoch-started', epoch);

    if (!this.evaluateCompletion()) {
      this.logger.debug(`Waiting for input messages before processing epoch ${epoch}`);
    }
  }

  /**
   * Offer one peer input. Never throws for bad input; the outcome says
   * whether it was folded.
   */
  onPeerInput(
    peerId: PeerId,
    epoch: EpochNumber,
    value: number,
    messageId: string,
  ): InputOutcome {
    const input: PeerInput = { peerId, epoch, value, messageId };
    const reason = this.rejectionReason(input);

    if (reason !== null) {
      this.logIgnored(input, reason);
      this.emit('input-ignored', input, reason);
      return { accepted: false, reason };
    }

    this.reportedPeers.add(peerId);
    this.aggregate = roundTo(this.fold.combine(this.aggregate, value), 3);
    this.causalIds.push(messageId);

    this.logger.debug(`Received input from ${peerId}`, {
      epoch,
      aggregate: this.aggregate,
      reported: this.reportedPeers.size,
      expected: this.peers.size,
    });
    this.emit('input-accepted', input, this.aggregate);

    if (!this.evaluateCompletion()) {
      this.logger.debug(`Waiting for other input messages before processing epoch ${epoch}`);
    }

    return { accepted: true };
  }

  /**
   * Every configured peer has reported exactly once for the open epoch
   */
  isEpochComplete(): boolean {
    if (this.phase === 'awaiting-start' || this.reportedPeers.size !== this.peers.size) {
      return false;
    }

    for (const peer of this.peers) {
      if (!this.reportedPeers.has(peer)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Output value for the current state
   */
  computeOutput(): number {
    if (this.currentEpoch === null) {
      throw new EpochSequenceError('No epoch has been started', null, this.lastCompletedEpoch);
    }

    return computeEpochOutput({
      peerCount: this.peers.size,
      aggregate: this.aggregate,
      epoch: this.currentEpoch,
      baseValue: this.baseValue,
      mode: this.mode,
    });
  }

  /**
   * Clear every epoch-scoped field. Safe to call any number of times.
   */
  resetForNextEpoch(): void {
    const wasOpen = this.phase !== 'awaiting-start';
    this.clearEpochState();
    this.phase = 'awaiting-start';

    if (wasOpen) {
      this.logger.debug('Epoch reset', { epoch: this.currentEpoch });
      this.emit('epoch-reset', this.currentEpoch);
    }
  }

  /**
   * Resolves once no completion is waiting to be emitted
   */
  async whenIdle(): Promise<void> {
    while (this.pendingCompletion) {
      await this.pendingCompletion;
    }
  }

  /**
   * Cancel a pending emission and discard the open epoch
   */
  shutdown(): void {
    if (this.shutdownController.signal.aborted) {
      return;
    }

    this.shutdownController.abort();
    this.resetForNextEpoch();
    this.logger.debug('Shut down', { lastCompletedEpoch: this.lastCompletedEpoch });
  }

  isShutdown(): boolean {
    return this.shutdownController.signal.aborted;
  }

  getPhase(): EpochPhase {
    return this.phase;
  }

  getPeers(): PeerId[] {
    return [...this.peers];
  }

  getSnapshot(): EpochSnapshot {
    return {
      phase: this.phase,
      currentEpoch: this.currentEpoch,
      lastCompletedEpoch: this.lastCompletedEpoch,
      reportedPeers: [...this.reportedPeers],
      pendingPeers: [...this.peers].filter((peer) => !this.reportedPeers.has(peer)),
      aggregate: this.aggregate,
      causalIds: [...this.causalIds],
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private rejectionReason(input: PeerInput): IgnoreReason | null {
    if (this.phase !== 'collecting') {
      return 'not-collecting';
    }
    if (input.epoch !== this.currentEpoch) {
      return 'epoch-mismatch';
    }
    if (!this.peers.has(input.peerId)) {
      return 'unknown-peer';
    }
    if (this.reportedPeers.has(input.peerId)) {
      return 'duplicate-peer';
    }
    if (!Number.isFinite(input.value)) {
      return 'invalid-value';
    }
    return null;
  }

  private logIgnored(input: PeerInput, reason: IgnoreReason): void {
    const context = {
      peerId: input.peerId,
      epoch: input.epoch,
      currentEpoch: this.currentEpoch,
      messageId: input.messageId,
    };

    switch (reason) {
      case 'duplicate-peer':
        this.logger.info(`Ignoring new input from ${input.peerId}`, context);
        break;
      case 'invalid-value':
        this.logger.warn(`Ignoring non-finite input from ${input.peerId}`, context);
        break;
      default:
        this.logger.debug(`Ignoring input from ${input.peerId} (${reason})`, context);
    }
  }

  /**
   * Runs synchronously after the mutation that may close the epoch, so the
   * output always reflects every folded input.
   */
  private evaluateCompletion(): boolean {
    if (this.phase !== 'collecting' || this.currentEpoch === null || !this.isEpochComplete()) {
      return false;
    }

    const epoch = this.currentEpoch;
    this.phase = 'complete';
    this.lastCompletedEpoch = epoch;

    const output: EpochOutput = {
      epoch,
      causalIds: [...this.causalIds],
      value: this.computeOutput(),
    };

    this.logger.debug('Epoch complete', { epoch, value: output.value });
    this.emit('epoch-complete', output);

    const completion: Promise<void> = this.deliver(output)
      .catch((error: unknown) => {
        this.logger.error('Completion listener failed', {
          epoch,
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        if (this.pendingCompletion === completion) {
          this.pendingCompletion = null;
        }
      });
    this.pendingCompletion = completion;

    return true;
  }

  private async deliver(output: EpochOutput): Promise<void> {
    try {
      await delay(this.outputDelayMs, this.shutdownController.signal);
    } catch (error) {
      this.logger.debug('Emission cancelled', {
        epoch: output.epoch,
        reason: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    let failure: EpochEmissionError | null = null;
    try {
      await this.emitter.emit(output);
    } catch (error) {
      failure = new EpochEmissionError(output.epoch, error);
      this.logger.error(failure.message);
    }

    this.resetForNextEpoch();

    if (failure) {
      this.emit('emission-failed', failure);
    } else {
      this.emit('output-emitted', output);
    }
  }

  private clearEpochState(): void {
    this.reportedPeers.clear();
    this.aggregate = this.fold.seed;
    this.causalIds = [];
  }
}
