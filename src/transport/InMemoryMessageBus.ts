/**
 * In-Memory Message Bus
 *
 * In-process MessageBus with exact topic matching. Messages are delivered
 * one at a time, in publish order, after the publishing call returns.
 * Every published message is kept for the life of the bus so tests can
 * inspect the traffic; it is not meant for long-running processes.
 */

import { EventEmitter } from 'eventemitter3';
import { createNamespacedLogger, type Logger } from '../utils/logger';
import type { MessageBus, MessageHandler, Subscription } from './MessageBus';

export interface PublishedMessage {
  topic: string;
  payload: Uint8Array;
}

export interface InMemoryMessageBusEvents {
  published: (message: PublishedMessage) => void;
}

interface RegisteredSubscription {
  id: number;
  topics: ReadonlySet<string>;
  handler: MessageHandler;
}

export class InMemoryMessageBus
  extends EventEmitter<InMemoryMessageBusEvents>
  implements MessageBus
{
  private subscriptions: Map<number, RegisteredSubscription> = new Map();
  private queue: PublishedMessage[] = [];
  private history: PublishedMessage[] = [];
  private draining: Promise<void> | null = null;
  private nextSubscriptionId = 1;
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    super();
    this.logger = options.logger ?? createNamespacedLogger('InMemoryMessageBus');
  }

  async publish(topic: string, payload: Uint8Array): Promise<void> {
    const message: PublishedMessage = { topic, payload: payload.slice() };
    this.history.push(message);
    this.queue.push(message);
    this.emit('published', message);
    this.scheduleDrain();
  }

  async subscribe(
    topics: readonly string[],
    handler: MessageHandler,
  ): Promise<Subscription> {
    const id = this.nextSubscriptionId++;
    this.subscriptions.set(id, { id, topics: new Set(topics), handler });

    this.logger.debug('Subscribed', { id, topics });

    return {
      topics: [...topics],
      unsubscribe: async () => {
        this.subscriptions.delete(id);
        this.logger.debug('Unsubscribed', { id });
      },
    };
  }

  /**
   * Resolves once every queued message has been delivered
   */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /**
   * Messages published so far, optionally only those on one topic
   */
  getPublished(topic?: string): PublishedMessage[] {
    return topic === undefined
      ? [...this.history]
      : this.history.filter((message) => message.topic === topic);
  }

  getSubscriberCount(): number {
    return this.subscriptions.size;
  }

  private scheduleDrain(): void {
    if (this.draining) {
      return;
    }

    const draining: Promise<void> = this.drain().finally(() => {
      if (this.draining === draining) {
        this.draining = null;
      }
      if (this.queue.length > 0) {
        this.scheduleDrain();
      }
    });
    this.draining = draining;
  }

  private async drain(): Promise<void> {
    // Deliver on a later turn than the publisher's
    await new Promise<void>((resolve) => setImmediate(resolve));

    for (let message = this.queue.shift(); message; message = this.queue.shift()) {
      const { topic, payload } = message;
      const recipients = [...this.subscriptions.values()].filter((sub) =>
        sub.topics.has(topic),
      );

      for (const recipient of recipients) {
        try {
          await recipient.handler(payload, topic);
        } catch (error) {
          this.logger.error('Subscriber failed', {
            topic,
            subscription: recipient.id,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }
  }
}
