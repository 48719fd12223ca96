/**
 * Simulation Component
 *
 * One participant process: subscribes to the epoch, simulation state and
 * peer topics, drives an EpochCoordinator through a TransportAdapter, and
 * reports to the simulation manager with Status messages.
 *
 * - every emitted output is followed by a `ready` status for its epoch
 * - a failed emission yields one `error` status and the component keeps running
 * - a broken epoch sequence yields an `error` status and stops the component
 */

import { EventEmitter } from 'eventemitter3';
import { loadComponentConfig, type ComponentConfig, type Environment } from '../config';
import type { EpochNumber } from '../core/types';
import { EpochCoordinator } from '../epoch/EpochCoordinator';
import { EpochSequenceError } from '../epoch/errors';
import { encodeMessage } from '../messages/codec';
import { MessageFactory } from '../messages/MessageFactory';
import type { StatusMessage } from '../messages/schemas';
import type { MessageBus, Subscription } from '../transport/MessageBus';
import { TransportAdapter } from '../transport/TransportAdapter';
import { createNamespacedLogger, type Logger } from '../utils/logger';
import { BusOutputEmitter } from './BusOutputEmitter';
import {
  EPOCH_TOPIC,
  SIMSTATE_TOPIC,
  STATUS_ERROR_TOPIC,
  STATUS_READY_TOPIC,
  componentTopic,
} from './topics';

export const EMISSION_ERROR_DESCRIPTION = 'Internal error when creating complex message.';

export type ComponentState = 'created' | 'running' | 'stopped';

export interface SimulationComponentEvents {
  started: () => void;
  stopped: () => void;
  'status-sent': (message: StatusMessage) => void;
}

export interface SimulationComponentOptions {
  config: ComponentConfig;
  bus: MessageBus;
  logger?: Logger;
  clock?: () => Date;
}

// ============================================================================
// Simulation Component
// ============================================================================

export class SimulationComponent extends EventEmitter<SimulationComponentEvents> {
  readonly coordinator: EpochCoordinator;
  private readonly config: ComponentConfig;
  private readonly bus: MessageBus;
  private readonly factory: MessageFactory;
  private readonly adapter: TransportAdapter;
  private readonly outputTopic: string;
  private readonly inputTopics: string[];
  private readonly logger: Logger;

  private state: ComponentState = 'created';
  private subscription: Subscription | null = null;
  private latestEpoch: EpochNumber = 0;
  private tasks: Set<Promise<void>> = new Set();

  constructor(options: SimulationComponentOptions) {
    super();

    const { config, bus } = options;
    this.config = config;
    this.bus = bus;
    this.logger = options.logger ?? createNamespacedLogger(config.componentName);
    this.factory = new MessageFactory(config.simulationId, config.componentName, options.clock);
    this.outputTopic = componentTopic(config.topicBase, config.componentName);
    this.inputTopics = config.inputComponents.map((peer) =>
      componentTopic(config.topicBase, peer),
    );

    this.coordinator = new EpochCoordinator({
      peers: config.inputComponents,
      baseValue: config.baseValue,
      mode: config.mode,
      outputDelay: config.outputDelay,
      fold: config.fold,
      emitter: new BusOutputEmitter(this.factory, bus, this.outputTopic),
      logger: this.logger,
    });

    this.adapter = new TransportAdapter({
      sink: this.coordinator,
      inputTopics: this.inputTopics,
      onSimulationStopped: () => this.stop(),
      logger: this.logger,
    });

    this.coordinator.on('epoch-started', (epoch) => {
      this.latestEpoch = epoch;
    });
    // A stopped component sends no further status, even for an emission already in flight
    this.coordinator.on('output-emitted', (output) => {
      if (this.state !== 'stopped') {
        this.track(this.sendStatus('ready', output.epoch, output.causalIds));
      }
    });
    this.coordinator.on('emission-failed', (error) => {
      if (this.state !== 'stopped') {
        this.track(this.sendStatus('error', error.epoch, [], EMISSION_ERROR_DESCRIPTION));
      }
    });
  }

  /**
   * Start listening to the message bus
   */
  async start(): Promise<void> {
    if (this.state !== 'created') {
      throw new Error(`Cannot start component in state ${this.state}`);
    }

    this.subscription = await this.bus.subscribe(
      [EPOCH_TOPIC, SIMSTATE_TOPIC, ...this.inputTopics],
      (payload, topic) => this.onMessage(payload, topic),
    );
    this.state = 'running';

    this.logger.info('Component started', {
      simulationId: this.config.simulationId,
      inputs: this.inputTopics,
      output: this.outputTopic,
    });
    this.emit('started');
  }

  /**
   * Stop listening and discard any epoch in flight. Idempotent.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return;
    }

    this.state = 'stopped';
    this.coordinator.shutdown();

    const subscription = this.subscription;
    this.subscription = null;
    await subscription?.unsubscribe();

    this.logger.info('Component stopped', { latestEpoch: this.latestEpoch });
    this.emit('stopped');
  }

  /**
   * Resolves once pending emissions and status reports have settled
   */
  async whenIdle(): Promise<void> {
    await this.coordinator.whenIdle();
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  isStopped(): boolean {
    return this.state === 'stopped';
  }

  getState(): ComponentState {
    return this.state;
  }

  getOutputTopic(): string {
    return this.outputTopic;
  }

  getInputTopics(): string[] {
    return [...this.inputTopics];
  }

  private async onMessage(payload: Uint8Array, topic: string): Promise<void> {
    if (this.state !== 'running') {
      return;
    }

    try {
      await this.adapter.handle(payload, topic);
    } catch (error) {
      if (error instanceof EpochSequenceError) {
        this.logger.error(`${error.name}: ${error.message}`);
        await this.sendStatus('error', this.latestEpoch, [], error.message);
        await this.stop();
        return;
      }

      this.logger.error('Failed to handle message', {
        topic,
        error: error instanceof Error ? error.message : String(error),
      });
      await this.sendStatus('error', this.latestEpoch, [], 'Internal error when handling message.');
    }
  }

  private async sendStatus(
    value: StatusMessage['Value'],
    epoch: EpochNumber,
    triggeringMessageIds: string[],
    description?: string,
  ): Promise<void> {
    const message = this.factory.createStatusMessage({
      epoch,
      triggeringMessageIds,
      value,
      description,
    });

    await this.bus.publish(
      value === 'ready' ? STATUS_READY_TOPIC : STATUS_ERROR_TOPIC,
      encodeMessage(message),
    );
    this.emit('status-sent', message);
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((error: unknown) => {
        this.logger.error('Failed to send status', {
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        this.tasks.delete(tracked);
      });
    this.tasks.add(tracked);
  }
}

/**
 * Build a component from environment variables
 */
export function createComponent(
  env: Environment,
  bus: MessageBus,
  options: Omit<SimulationComponentOptions, 'config' | 'bus'> = {},
): SimulationComponent {
  return new SimulationComponent({ config: loadComponentConfig(env), bus, ...options });
}
