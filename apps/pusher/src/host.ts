import { EventHubConsumerClient, earliestEventPosition } from '@azure/event-hubs';
import { BlobCheckpointStore } from '@azure/eventhubs-checkpointstore-blob';
import { ServiceBusClient } from '@azure/service-bus';
import { BlobServiceClient } from '@azure/storage-blob';
import type { PushPersistor } from '@persistor/engine';
import type { EventHubConfig, Logger, ServiceBusConfig } from '@persistor/shared';
import { eventHubHandlers, serviceBusHandlers } from './handlers.js';

export interface PushHost {
  close(): Promise<void>;
}

/** Subscribe to the configured queue or topic subscription. */
export function startServiceBusHost(config: ServiceBusConfig, persistor: PushPersistor, logger: Logger): PushHost {
  const client = new ServiceBusClient(config.connectionString);
  const receiver =
    config.entity.type === 'QUEUE'
      ? client.createReceiver(config.entity.queueName, { receiveMode: 'peekLock' })
      : client.createReceiver(config.entity.topicName, config.entity.subscriptionName, { receiveMode: 'peekLock' });

  const handlers = serviceBusHandlers(persistor, logger);
  const subscription = receiver.subscribe(
    {
      processMessage: (message) => handlers.processMessage(message),
      processError: (args) => handlers.processError(args),
    },
    { autoCompleteMessages: true, maxConcurrentCalls: 1 },
  );

  logger.info('Service Bus push host started', { entity: config.entity });

  return {
    close: async () => {
      await subscription.close();
      await receiver.close();
      await client.close();
    },
  };
}

/** Subscribe to every partition of the configured hub, checkpointing in blob storage. */
export function startEventHubHost(config: EventHubConfig, persistor: PushPersistor, logger: Logger): PushHost {
  const checkpointContainer = BlobServiceClient.fromConnectionString(
    config.checkpoint.connectionString,
  ).getContainerClient(config.checkpoint.container);
  const client = new EventHubConsumerClient(
    config.consumerGroup,
    config.connectionString,
    config.eventHubName,
    new BlobCheckpointStore(checkpointContainer),
  );

  const handlers = eventHubHandlers(persistor, logger);
  const subscription = client.subscribe(
    {
      processInitialize: (context) => handlers.processInitialize(context),
      processEvents: (events, context) => handlers.processEvents(events, context),
      processError: (error, context) => handlers.processError(error, context),
    },
    {
      startPosition: earliestEventPosition,
      maxBatchSize: config.maxBatchSize,
      maxWaitTimeInSeconds: config.idleTimeoutSeconds,
      prefetchCount: config.prefetch,
    },
  );

  logger.info('Event Hub push host started', { eventHubName: config.eventHubName });

  return {
    close: async () => {
      await subscription.close();
      await client.close();
    },
  };
}
