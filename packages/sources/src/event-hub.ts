import { EventHubConsumerClient, earliestEventPosition } from '@azure/event-hubs';
import { BlobCheckpointStore } from '@azure/eventhubs-checkpointstore-blob';
import { BlobServiceClient } from '@azure/storage-blob';
import { errorMessage, nullLogger, type EventHubConfig, type Logger } from '@persistor/shared';
import type { Delivery, MessageSource, ReceiveOptions } from './types.js';

/** One received event and the way to record it as the partition's checkpoint. */
export interface HubEvent {
  body: unknown;
  properties?: Record<string, unknown>;
  checkpoint(): Promise<void>;
}

/** Where the subscription hands its partition batches. */
export interface HubEventSink {
  /** Resolves once every event of the batch has been taken by a receive call. */
  deliver(partitionId: string, events: HubEvent[]): Promise<void>;
  fail(error: Error, partitionId?: string): void;
}

export interface HubSubscription {
  close(): Promise<void>;
}

export interface EventHubPullSourceOptions {
  subscribe(sink: HubEventSink): HubSubscription;
  closeClient?: () => Promise<void>;
  /** Acknowledged events per partition between checkpoint writes */
  checkpointRate: number;
  logger?: Logger;
}

interface QueuedEvent {
  delivery: Delivery;
  onTaken?: () => void;
}

interface PartitionProgress {
  pending: number;
  latest?: HubEvent;
}

/**
 * Pull source over an Event Hubs subscription. Partition batches are queued
 * until a receive call takes them, which holds the subscription back.
 * A partition is idle once it hands over an empty batch (no events within the
 * wait time); the current receive ends with nothing only when every partition
 * heard from so far is idle.
 */
export class EventHubPullSource implements MessageSource {
  private readonly log: Logger;
  private readonly owned = new WeakMap<Delivery, { partitionId: string; event: HubEvent }>();
  private readonly progress = new Map<string, PartitionProgress>();
  private queue: QueuedEvent[] = [];
  private subscription?: HubSubscription;
  private wake?: () => void;
  /** Idle flag per partition that has delivered at least once */
  private readonly partitionIdle = new Map<string, boolean>();
  private closed = false;

  constructor(private readonly options: EventHubPullSourceOptions) {
    this.log = (options.logger ?? nullLogger).child({ component: 'event-hub-source' });
  }

  async receive(maxCount: number, options: ReceiveOptions): Promise<Delivery[]> {
    if (this.closed || options.abortSignal?.aborted) return [];
    this.ensureSubscribed();

    if (this.queue.length === 0 && !this.allIdle()) {
      await this.waitForEvents(options.maxWaitTimeInMs, options.abortSignal);
    }

    if (this.queue.length === 0) {
      // The idle signal is consumed by the receive that reports it
      for (const partitionId of this.partitionIdle.keys()) this.partitionIdle.set(partitionId, false);
      return [];
    }

    const taken = this.queue.splice(0, maxCount);
    for (const item of taken) item.onTaken?.();
    return taken.map((item) => item.delivery);
  }

  async acknowledge(deliveries: readonly Delivery[]): Promise<number> {
    let acknowledged = 0;
    for (const delivery of deliveries) {
      const entry = this.owned.get(delivery);
      if (!entry) continue;
      this.owned.delete(delivery);

      const progress = this.progress.get(entry.partitionId) ?? { pending: 0 };
      progress.pending += 1;
      progress.latest = entry.event;
      this.progress.set(entry.partitionId, progress);
      acknowledged += 1;
    }

    await this.writeCheckpoints(this.options.checkpointRate);
    return acknowledged;
  }

  async release(deliveries: readonly Delivery[]): Promise<void> {
    // Not checkpointed, so the next run reads them again
    for (const delivery of deliveries) this.owned.delete(delivery);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const item of this.queue) item.onTaken?.();
    this.queue = [];
    this.wake?.();

    await this.writeCheckpoints(1);
    await this.subscription?.close();
    await this.options.closeClient?.();
  }

  private ensureSubscribed(): void {
    if (this.subscription) return;
    this.subscription = this.options.subscribe({
      deliver: (partitionId, events) => this.enqueue(partitionId, events),
      fail: (error, partitionId) => {
        this.log.error('Event Hub subscription error', error, { partitionId });
      },
    });
  }

  private enqueue(partitionId: string, events: HubEvent[]): Promise<void> {
    if (this.closed) return Promise.resolve();

    if (events.length === 0) {
      this.partitionIdle.set(partitionId, true);
      if (this.queue.length === 0 && this.allIdle()) this.wake?.();
      return Promise.resolve();
    }

    this.partitionIdle.set(partitionId, false);
    return new Promise<void>((resolve) => {
      events.forEach((event, index) => {
        const delivery: Delivery = {
          message: { kind: 'event-hub', body: event.body, properties: event.properties },
        };
        this.owned.set(delivery, { partitionId, event });
        this.queue.push({ delivery, onTaken: index === events.length - 1 ? resolve : undefined });
      });
      this.wake?.();
    });
  }

  private allIdle(): boolean {
    if (this.partitionIdle.size === 0) return false;
    for (const idle of this.partitionIdle.values()) {
      if (!idle) return false;
    }
    return true;
  }

  private waitForEvents(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        this.wake = undefined;
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal?.addEventListener('abort', done, { once: true });
      this.wake = done;
    });
  }

  private async writeCheckpoints(threshold: number): Promise<void> {
    for (const [partitionId, progress] of this.progress) {
      if (!progress.latest || progress.pending < threshold) continue;
      try {
        await progress.latest.checkpoint();
        this.log.debug('Checkpoint updated', { partitionId, events: progress.pending });
        progress.pending = 0;
      } catch (error) {
        this.log.warn('Checkpoint update failed', { partitionId, error: errorMessage(error) });
      }
    }
  }
}

/**
 * Subscribe to every partition of the configured hub from its last checkpoint,
 * with checkpoints kept in blob storage.
 */
export function createEventHubPullSource(config: EventHubConfig, logger?: Logger): EventHubPullSource {
  const checkpointContainer = BlobServiceClient.fromConnectionString(
    config.checkpoint.connectionString,
  ).getContainerClient(config.checkpoint.container);
  const client = new EventHubConsumerClient(
    config.consumerGroup,
    config.connectionString,
    config.eventHubName,
    new BlobCheckpointStore(checkpointContainer),
  );

  return new EventHubPullSource({
    checkpointRate: config.checkpoint.updateRate,
    logger,
    closeClient: () => client.close(),
    subscribe: (sink) =>
      client.subscribe(
        {
          processEvents: async (events, context) => {
            await sink.deliver(
              context.partitionId,
              events.map((event) => ({
                body: event.body,
                properties: event.properties,
                checkpoint: () => context.updateCheckpoint(event),
              })),
            );
          },
          processError: async (error, context) => {
            sink.fail(error, context.partitionId);
          },
        },
        {
          startPosition: earliestEventPosition,
          maxBatchSize: config.maxBatchSize,
          maxWaitTimeInSeconds: config.idleTimeoutSeconds,
          prefetchCount: config.prefetch,
        },
      ),
  });
}
