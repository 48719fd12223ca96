/**
 * Message bus contract
 *
 * Delivery is at-most-once and unordered across topics; consumers must
 * tolerate duplicates and stale messages.
 */

export type MessageHandler = (payload: Uint8Array, topic: string) => void | Promise<void>;

export interface Subscription {
  readonly topics: readonly string[];
  unsubscribe(): Promise<void>;
}

export interface MessageBus {
  publish(topic: string, payload: Uint8Array): Promise<void>;
  subscribe(topics: readonly string[], handler: MessageHandler): Promise<Subscription>;
}
