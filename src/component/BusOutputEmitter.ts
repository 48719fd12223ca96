import type { EpochOutput } from '../core/types';
import type { OutputEmitter } from '../epoch/OutputEmitter';
import { encodeMessage } from '../messages/codec';
import type { MessageFactory } from '../messages/MessageFactory';
import type { MessageBus } from '../transport/MessageBus';

/**
 * Publishes each epoch output as a Complex message on the component's
 * output topic. Construction or publish failures reject.
 */
export class BusOutputEmitter implements OutputEmitter {
  constructor(
    private readonly factory: MessageFactory,
    private readonly bus: MessageBus,
    private readonly topic: string,
  ) {}

  async emit(output: EpochOutput): Promise<void> {
    const message = this.factory.createComplexMessage({
      epoch: output.epoch,
      triggeringMessageIds: output.causalIds,
      value: output.value,
    });

    await this.bus.publish(this.topic, encodeMessage(message));
  }
}
