/**
 * Transport Adapter
 *
 * Classifies inbound wire messages into the coordinator's two entry points.
 * Anything that is not an epoch signal or a peer result from an input
 * topic is logged and dropped here, before it reaches the core.
 */

import type { EpochNumber, InputOutcome } from '../core/types';
import type { EpochCoordinator } from '../epoch/EpochCoordinator';
import { decodeMessage } from '../messages/codec';
import type { WireMessage } from '../messages/schemas';
import { createNamespacedLogger, type Logger } from '../utils/logger';

export type EpochInputSink = Pick<
  EpochCoordinator,
  'onEpochStart' | 'onPeerInput' | 'getSnapshot'
>;

export type DispatchResult =
  | { kind: 'epoch-start'; epoch: EpochNumber }
  | { kind: 'peer-input'; outcome: InputOutcome }
  | { kind: 'simulation-stopped' }
  | {
      kind: 'dropped';
      reason: 'undecodable' | 'unhandled-type' | 'unexpected-topic' | 'repeated-epoch';
    };

export interface TransportAdapterOptions {
  sink: EpochInputSink;
  inputTopics: Iterable<string>;
  onSimulationStopped: () => void | Promise<void>;
  logger?: Logger;
}

export class TransportAdapter {
  private readonly sink: EpochInputSink;
  private readonly inputTopics: ReadonlySet<string>;
  private readonly onSimulationStopped: () => void | Promise<void>;
  private readonly logger: Logger;

  constructor(options: TransportAdapterOptions) {
    this.sink = options.sink;
    this.inputTopics = new Set(options.inputTopics);
    this.onSimulationStopped = options.onSimulationStopped;
    this.logger = options.logger ?? createNamespacedLogger('TransportAdapter');
  }

  /**
   * Decode and dispatch one payload. EpochSequenceError from the sink is
   * not caught: a broken epoch sequence is the caller's to handle.
   */
  async handle(payload: Uint8Array | string, topic: string): Promise<DispatchResult> {
    const message = decodeMessage(payload);
    if (!message) {
      this.logger.warn(`Dropping undecodable message from ${topic}`);
      return { kind: 'dropped', reason: 'undecodable' };
    }

    return this.dispatch(message, topic);
  }

  async dispatch(message: WireMessage, topic: string): Promise<DispatchResult> {
    switch (message.Type) {
      case 'Epoch':
        if (this.isRepeatedEpoch(message.EpochNumber)) {
          this.logger.debug(`Ignoring repeated signal for epoch ${message.EpochNumber}`, {
            messageId: message.MessageId,
          });
          return { kind: 'dropped', reason: 'repeated-epoch' };
        }
        this.sink.onEpochStart(message.EpochNumber, message.MessageId);
        return { kind: 'epoch-start', epoch: message.EpochNumber };

      case 'Complex':
        if (!this.inputTopics.has(topic)) {
          this.logger.debug(`Ignoring Complex message on ${topic}`, {
            source: message.SourceProcessId,
          });
          return { kind: 'dropped', reason: 'unexpected-topic' };
        }
        return {
          kind: 'peer-input',
          outcome: this.sink.onPeerInput(
            message.SourceProcessId,
            message.EpochNumber,
            message.ComplexValue,
            message.MessageId,
          ),
        };

      case 'SimState':
        if (message.SimulationState === 'stopped') {
          this.logger.info('Simulation stopped', { source: message.SourceProcessId });
          await this.onSimulationStopped();
          return { kind: 'simulation-stopped' };
        }
        return { kind: 'dropped', reason: 'unhandled-type' };

      case 'Status':
        this.logger.debug(`Received unhandled ${message.Type} message from ${topic}`);
        return { kind: 'dropped', reason: 'unhandled-type' };
    }
  }

  /**
   * A retransmitted signal for the open epoch or the last completed one.
   * Any other out-of-order epoch still reaches the sink and fails there.
   */
  private isRepeatedEpoch(epoch: EpochNumber): boolean {
    const { phase, currentEpoch, lastCompletedEpoch } = this.sink.getSnapshot();
    return (
      (phase !== 'awaiting-start' && epoch === currentEpoch) || epoch === lastCompletedEpoch
    );
  }
}
