if (process.env.NODE_ENV !== 'production') {
  const { config } = await import('dotenv');
  const { fileURLToPath } = await import('node:url');
  const { dirname, resolve } = await import('node:path');

  const __dirname = dirname(fileURLToPath(import.meta.url));
  const rootDir = resolve(__dirname, '../../..');

  config({ path: resolve(rootDir, '.env.local') });
  config({ path: resolve(rootDir, '.env') });
}

import { PushPersistor } from '@persistor/engine';
import { startServer } from '@persistor/http';
import {
  ConfigurationError,
  NotifyCategory,
  capErrorMessage,
  createServiceLogger,
  errorMessage,
  loadConfig,
  notify,
  optionalIntEnv,
  resolveStoreKey,
} from '@persistor/shared';
import { AzureBlobStore } from '@persistor/storage';
import { createApp } from './app.js';
import { startEventHubHost, startServiceBusHost, type PushHost } from './host.js';

const logger = createServiceLogger('pusher', { component: 'server' });

async function main(): Promise<void> {
  const config = loadConfig();
  if (config.serviceType !== 'PUSH') {
    throw new ConfigurationError('The pusher needs SERVICE_TYPE PUSH');
  }

  const store = AzureBlobStore.fromConnectionString(config.storage.connectionString, config.storage.container);
  await store.ensureContainer();

  const persistor = new PushPersistor({
    store,
    storeKey: resolveStoreKey(config),
    append: config.storage.append,
    includeMetadata: config.storage.getMetadata,
    logger,
  });

  const host: PushHost =
    config.pushSource === 'SERVICE_BUS'
      ? startServiceBusHost(config.serviceBus, persistor, logger)
      : startEventHubHost(config.eventHub, persistor, logger);

  // Event Grid deliveries are keyed by STORE_KEY, else by the topic's subscription id
  const eventGrid = new PushPersistor({
    store,
    storeKey: config.storage.storeKey,
    append: config.storage.append,
    includeMetadata: config.storage.getMetadata,
    logger,
  });

  const app = createApp({ eventGrid, logger });
  startServer(app, { port: optionalIntEnv('PORT', 7073), logger, onShutdown: () => host.close() });
}

main().catch(async (error: unknown) => {
  logger.fatal('Pusher failed to start', error);
  await notify({
    category: NotifyCategory.CONFIGURATION_ERROR,
    title: 'pusher: failed to start',
    message: capErrorMessage(errorMessage(error)),
    error,
  });
  process.exit(1);
});
