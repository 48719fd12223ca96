/**
 * Message Factory
 *
 * Builds validated wire messages for one simulation process. Message ids
 * are `<source process id>-<counter>`, unique within the process.
 */

import type { z } from 'zod';
import type { EpochNumber } from '../core/types';
import { MessageValidationError } from './errors';
import {
  ComplexMessageSchema,
  EpochMessageSchema,
  SimStateMessageSchema,
  StatusMessageSchema,
  type ComplexMessage,
  type EpochMessage,
  type SimStateMessage,
  type StatusMessage,
} from './schemas';

export interface MessageContext {
  epoch: EpochNumber;
  triggeringMessageIds: string[];
}

export class MessageFactory {
  private counter = 0;

  constructor(
    private readonly simulationId: string,
    private readonly sourceProcessId: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  getSourceProcessId(): string {
    return this.sourceProcessId;
  }

  nextMessageId(): string {
    this.counter += 1;
    return `${this.sourceProcessId}-${this.counter}`;
  }

  createComplexMessage(context: MessageContext & { value: number }): ComplexMessage {
    return this.validate(ComplexMessageSchema, {
      Type: 'Complex',
      ...this.baseFields(context),
      ComplexValue: context.value,
    });
  }

  createStatusMessage(
    context: MessageContext & { value: StatusMessage['Value']; description?: string },
  ): StatusMessage {
    return this.validate(StatusMessageSchema, {
      Type: 'Status',
      ...this.baseFields(context),
      Value: context.value,
      ...(context.description !== undefined ? { Description: context.description } : {}),
    });
  }

  createEpochMessage(
    context: MessageContext & { startTime: string; endTime: string },
  ): EpochMessage {
    return this.validate(EpochMessageSchema, {
      Type: 'Epoch',
      ...this.baseFields(context),
      StartTime: context.startTime,
      EndTime: context.endTime,
    });
  }

  createSimStateMessage(
    context: MessageContext & { state: SimStateMessage['SimulationState'] },
  ): SimStateMessage {
    return this.validate(SimStateMessageSchema, {
      Type: 'SimState',
      ...this.baseFields(context),
      SimulationState: context.state,
    });
  }

  private baseFields(context: MessageContext) {
    return {
      SimulationId: this.simulationId,
      SourceProcessId: this.sourceProcessId,
      MessageId: this.nextMessageId(),
      EpochNumber: context.epoch,
      TriggeringMessageIds: [...context.triggeringMessageIds],
      Timestamp: this.clock().toISOString(),
    };
  }

  private validate<S extends z.ZodTypeAny>(schema: S, candidate: unknown): z.infer<S> {
    const result = schema.safeParse(candidate);
    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      );
      const type =
        typeof candidate === 'object' && candidate !== null && 'Type' in candidate
          ? String(candidate.Type)
          : 'unknown';
      throw new MessageValidationError(
        `Invalid ${type} message: ${issues.join('; ')}`,
        type,
        issues,
      );
    }
    return result.data;
  }
}
