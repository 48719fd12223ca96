import { z } from 'zod';

/**
 * Zod schemas for simulation platform messages.
 * Attribute names follow the platform's JSON wire format.
 */

// =============================================================================
// Base Schema
// =============================================================================

const MessageIdSchema = z.string().min(1, 'Message id cannot be empty');

const BaseMessageShape = {
  SimulationId: z.string().min(1, 'Simulation id is required'),
  SourceProcessId: z.string().min(1, 'Source process id is required'),
  MessageId: MessageIdSchema,
  EpochNumber: z.number().int().nonnegative(),
  TriggeringMessageIds: z.array(MessageIdSchema),
  Timestamp: z.string().datetime(),
};

// =============================================================================
// Message Types
// =============================================================================

export const SimStateMessageSchema = z.object({
  Type: z.literal('SimState'),
  ...BaseMessageShape,
  SimulationState: z.enum(['running', 'stopped']),
});

export const EpochMessageSchema = z.object({
  Type: z.literal('Epoch'),
  ...BaseMessageShape,
  StartTime: z.string().datetime(),
  EndTime: z.string().datetime(),
});

export const StatusMessageSchema = z.object({
  Type: z.literal('Status'),
  ...BaseMessageShape,
  Value: z.enum(['ready', 'error']),
  Description: z.string().optional(),
});

/** Result message carrying one node's output value for an epoch */
export const ComplexMessageSchema = z.object({
  Type: z.literal('Complex'),
  ...BaseMessageShape,
  ComplexValue: z.number().finite(),
});

export const WireMessageSchema = z.discriminatedUnion('Type', [
  SimStateMessageSchema,
  EpochMessageSchema,
  StatusMessageSchema,
  ComplexMessageSchema,
]);

export type SimStateMessage = z.infer<typeof SimStateMessageSchema>;
export type EpochMessage = z.infer<typeof EpochMessageSchema>;
export type StatusMessage = z.infer<typeof StatusMessageSchema>;
export type ComplexMessage = z.infer<typeof ComplexMessageSchema>;
export type WireMessage = z.infer<typeof WireMessageSchema>;
export type MessageType = WireMessage['Type'];
