import { Orchestrator } from '@persistor/engine';
import {
  ConfigurationError,
  resolveStoreKey,
  type Logger,
  type PersistorConfig,
} from '@persistor/shared';
import { createEventHubPullSource, createServiceBusPullSource, type MessageSource } from '@persistor/sources';
import { AzureBlobStore, type BlobStore } from '@persistor/storage';

export interface PullSettings {
  storeKey: string;
  /** Deliveries requested per receive call */
  receiveBatchSize: number;
  receiveWaitMs: number;
  /** Prefetch the batch size cap is computed against */
  prefetch: number;
  defaultReceiveDurationMs?: number;
}

const seconds = (value: number | undefined) => (value !== undefined ? value * 1000 : undefined);

/** Receive settings for a pull service configuration. */
export function pullSettings(config: PersistorConfig): PullSettings {
  const storeKey = resolveStoreKey(config);

  if (config.serviceType === 'SERVICE_BUS_PULL') {
    return {
      storeKey,
      receiveBatchSize: config.serviceBus.prefetch,
      receiveWaitMs: config.serviceBus.receiveWaitMs,
      prefetch: config.serviceBus.prefetch,
      defaultReceiveDurationMs: seconds(config.serviceBus.receiveDurationSeconds),
    };
  }
  if (config.serviceType === 'EVENT_HUB_PULL') {
    return {
      storeKey,
      receiveBatchSize: config.eventHub.maxBatchSize,
      receiveWaitMs: config.eventHub.idleTimeoutSeconds * 1000,
      prefetch: config.eventHub.prefetch,
      defaultReceiveDurationMs: seconds(config.eventHub.receiveDurationSeconds),
    };
  }
  throw new ConfigurationError('The puller needs SERVICE_TYPE SERVICE_BUS_PULL or EVENT_HUB_PULL');
}

/** Opens one dedicated receiver per pull task. */
export function sourceFactory(config: PersistorConfig, logger: Logger): (taskId: string) => MessageSource {
  if (config.serviceType === 'SERVICE_BUS_PULL') {
    return (taskId) => createServiceBusPullSource(config.serviceBus, logger.child({ taskId }));
  }
  if (config.serviceType === 'EVENT_HUB_PULL') {
    return (taskId) => createEventHubPullSource(config.eventHub, logger.child({ taskId }));
  }
  throw new ConfigurationError('The puller needs SERVICE_TYPE SERVICE_BUS_PULL or EVENT_HUB_PULL');
}

export function createOrchestrator(
  config: PersistorConfig,
  store: BlobStore,
  openSource: (taskId: string) => MessageSource,
  logger: Logger,
): { orchestrator: Orchestrator; settings: PullSettings } {
  const settings = pullSettings(config);
  const orchestrator = new Orchestrator({
    openSource,
    store,
    storeKey: settings.storeKey,
    append: config.storage.append,
    timedAppend: config.storage.timedAppend,
    includeMetadata: config.storage.getMetadata,
    receiveBatchSize: settings.receiveBatchSize,
    receiveWaitMs: settings.receiveWaitMs,
    defaultReceiveDurationMs: settings.defaultReceiveDurationMs,
    logger,
    service: 'puller',
  });
  return { orchestrator, settings };
}

export async function createBlobStore(config: PersistorConfig): Promise<AzureBlobStore> {
  const store = AzureBlobStore.fromConnectionString(config.storage.connectionString, config.storage.container);
  await store.ensureContainer();
  return store;
}
