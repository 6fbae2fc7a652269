import { ServiceBusClient, type ServiceBusReceivedMessage } from '@azure/service-bus';
import { errorMessage, nullLogger, type Logger, type ServiceBusConfig } from '@persistor/shared';
import type { Delivery, MessageSource, ReceiveOptions } from './types.js';

/** Fields of a received Service Bus message the persistor reads. */
export interface ServiceBusMessageLike {
  body: unknown;
  applicationProperties?: Record<string, unknown>;
}

/** Receiver surface used by the pull source (peek-lock mode). */
export interface ServiceBusReceiverLike<M extends ServiceBusMessageLike> {
  receiveMessages(maxMessageCount: number, options: ReceiveOptions): Promise<M[]>;
  completeMessage(message: M): Promise<void>;
  abandonMessage(message: M): Promise<void>;
  close(): Promise<void>;
}

export interface ServiceBusPullSourceOptions {
  logger?: Logger;
  /** Closes whatever owns the receiver (the client) after the receiver itself */
  onClose?: () => Promise<void>;
}

/**
 * Pull source over a peek-lock Service Bus receiver. Acknowledge completes
 * messages; release abandons them so they are redelivered.
 */
export class ServiceBusPullSource<M extends ServiceBusMessageLike = ServiceBusReceivedMessage>
  implements MessageSource
{
  private readonly received = new WeakMap<Delivery, M>();
  private readonly log: Logger;

  constructor(
    private readonly receiver: ServiceBusReceiverLike<M>,
    private readonly options: ServiceBusPullSourceOptions = {},
  ) {
    this.log = (options.logger ?? nullLogger).child({ component: 'service-bus-source' });
  }

  async receive(maxCount: number, options: ReceiveOptions): Promise<Delivery[]> {
    if (options.abortSignal?.aborted) return [];

    let messages: M[];
    try {
      messages = await this.receiver.receiveMessages(maxCount, options);
    } catch (error) {
      // The SDK rejects with an AbortError once the signal fires
      if (options.abortSignal?.aborted) return [];
      throw error;
    }

    return messages.map((raw) => {
      const delivery: Delivery = {
        message: {
          kind: 'service-bus',
          body: raw.body,
          applicationProperties: raw.applicationProperties,
        },
      };
      this.received.set(delivery, raw);
      return delivery;
    });
  }

  async acknowledge(deliveries: readonly Delivery[]): Promise<number> {
    const results = await this.settle(deliveries, (raw) => this.receiver.completeMessage(raw));
    const failed = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');

    if (failed.length > 0) {
      this.log.warn('Some stored messages could not be completed and will be redelivered', {
        failed: failed.length,
        total: deliveries.length,
        error: errorMessage(failed[0]?.reason),
      });
    }
    return results.length - failed.length;
  }

  async release(deliveries: readonly Delivery[]): Promise<void> {
    const results = await this.settle(deliveries, (raw) => this.receiver.abandonMessage(raw));
    const failed = results.filter((result) => result.status === 'rejected').length;

    if (failed > 0) {
      // Locks expire on their own; the broker redelivers either way
      this.log.warn('Could not abandon messages', { failed, total: deliveries.length });
    }
  }

  async close(): Promise<void> {
    await this.receiver.close();
    await this.options.onClose?.();
  }

  private async settle(
    deliveries: readonly Delivery[],
    action: (raw: M) => Promise<void>,
  ): Promise<PromiseSettledResult<void>[]> {
    const owned: M[] = [];
    for (const delivery of deliveries) {
      const raw = this.received.get(delivery);
      if (raw) {
        owned.push(raw);
        this.received.delete(delivery);
      }
    }
    return Promise.allSettled(owned.map((raw) => action(raw)));
  }
}

/**
 * Open a peek-lock receiver on the configured queue or topic subscription.
 */
export function createServiceBusPullSource(config: ServiceBusConfig, logger?: Logger): ServiceBusPullSource {
  const client = new ServiceBusClient(config.connectionString);
  const receiver =
    config.entity.type === 'QUEUE'
      ? client.createReceiver(config.entity.queueName, { receiveMode: 'peekLock' })
      : client.createReceiver(config.entity.topicName, config.entity.subscriptionName, {
          receiveMode: 'peekLock',
        });

  return new ServiceBusPullSource(receiver, { logger, onClose: () => client.close() });
}
