/**
 * Messages Module
 *
 * Wire message schemas, construction and JSON encoding.
 */
export {
  SimStateMessageSchema,
  EpochMessageSchema,
  StatusMessageSchema,
  ComplexMessageSchema,
  WireMessageSchema,
} from './schemas';
export type {
  SimStateMessage,
  EpochMessage,
  StatusMessage,
  ComplexMessage,
  WireMessage,
  MessageType,
} from './schemas';
export { MessageFactory } from './MessageFactory';
export type { MessageContext } from './MessageFactory';
export { MessageValidationError } from './errors';
export { encodeMessage, decodeMessage } from './codec';
