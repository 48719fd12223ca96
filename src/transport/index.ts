/**
 * Transport Module
 *
 * Message bus contract, an in-process bus, and the adapter that feeds
 * inbound messages to the epoch coordinator.
 */
export type { MessageBus, MessageHandler, Subscription } from './MessageBus';
export { InMemoryMessageBus } from './InMemoryMessageBus';
export type { PublishedMessage, InMemoryMessageBusEvents } from './InMemoryMessageBus';
export { TransportAdapter } from './TransportAdapter';
export type {
  EpochInputSink,
  DispatchResult,
  TransportAdapterOptions,
} from './TransportAdapter';
