import type { PushPersistor } from '@persistor/engine';
import { NotifyCategory, StoreFailure, reportError, type Logger } from '@persistor/shared';

interface BrokerMessage {
  body: unknown;
  applicationProperties?: Record<string, unknown>;
}

interface HubEventData {
  body: unknown;
  properties?: Record<string, unknown>;
}

interface HubPartition<E> {
  partitionId: string;
  updateCheckpoint(event: E): Promise<void>;
}

/**
 * Service Bus subscription handlers. A rejected `processMessage` makes the
 * SDK abandon the message so it is redelivered.
 */
export function serviceBusHandlers(persistor: Pick<PushPersistor, 'persist'>, logger: Logger) {
  return {
    processMessage: async (message: BrokerMessage): Promise<void> => {
      await persistor.persist({
        kind: 'service-bus',
        body: message.body,
        applicationProperties: message.applicationProperties,
      });
    },
    processError: async (args: { error: Error; errorSource: string; entityPath: string }): Promise<void> => {
      reportError(
        logger,
        'pusher',
        'Service Bus subscription error',
        args.error,
        { errorSource: args.errorSource, entityPath: args.entityPath },
        NotifyCategory.RECEIVER_ERROR,
      );
    },
  };
}

/**
 * Event Hubs subscription handlers. A partition batch is stored as one blob
 * and checkpointed at its last event once stored. A batch that cannot be
 * stored rejects, which makes the SDK stop the partition and read it again
 * from its last checkpoint; until the partition is initialized again, later
 * batches on it are neither stored nor checkpointed.
 */
export function eventHubHandlers(persistor: Pick<PushPersistor, 'persist'>, logger: Logger) {
  const stalled = new Set<string>();

  return {
    processInitialize: async (context: { partitionId: string }): Promise<void> => {
      stalled.delete(context.partitionId);
    },
    processEvents: async <E extends HubEventData>(events: E[], context: HubPartition<E>): Promise<void> => {
      const last = events[events.length - 1];
      if (!last) return;

      if (stalled.has(context.partitionId)) {
        logger.warn('Partition waits to be read again from its checkpoint, batch skipped', {
          partitionId: context.partitionId,
          count: events.length,
        });
        return;
      }

      try {
        await persistor.persist(
          events.map((event) => ({ kind: 'event-hub' as const, body: event.body, properties: event.properties })),
        );
      } catch (error) {
        stalled.add(context.partitionId);
        throw error;
      }
      await context.updateCheckpoint(last);
    },
    processError: async (error: Error, context: { partitionId: string }): Promise<void> => {
      if (error instanceof StoreFailure) {
        reportError(logger, 'pusher', 'Event batch could not be stored', error, { partitionId: context.partitionId });
        return;
      }
      reportError(
        logger,
        'pusher',
        'Event Hub subscription error',
        error,
        { partitionId: context.partitionId },
        NotifyCategory.RECEIVER_ERROR,
      );
    },
  };
}
