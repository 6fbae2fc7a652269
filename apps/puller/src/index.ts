if (process.env.NODE_ENV !== 'production') {
  const { config } = await import('dotenv');
  const { fileURLToPath } = await import('node:url');
  const { dirname, resolve } = await import('node:path');

  const __dirname = dirname(fileURLToPath(import.meta.url));
  const rootDir = resolve(__dirname, '../../..');

  config({ path: resolve(rootDir, '.env.local') });
  config({ path: resolve(rootDir, '.env') });
}

import { startServer } from '@persistor/http';
import {
  NotifyCategory,
  capErrorMessage,
  createServiceLogger,
  errorMessage,
  loadConfig,
  notify,
  optionalIntEnv,
} from '@persistor/shared';
import { createApp } from './app.js';
import { createBlobStore, createOrchestrator, sourceFactory } from './runtime.js';

const logger = createServiceLogger('puller', { component: 'server' });

async function main(): Promise<void> {
  const config = loadConfig();
  const store = await createBlobStore(config);
  const { orchestrator, settings } = createOrchestrator(config, store, sourceFactory(config, logger), logger);

  logger.info('Puller configured', {
    serviceType: config.serviceType,
    storeKey: settings.storeKey,
    append: config.storage.append,
    timedAppend: config.storage.timedAppend,
  });

  const app = createApp({ runner: orchestrator, prefetch: settings.prefetch, logger });
  startServer(app, { port: optionalIntEnv('PORT', 7071), logger });
}

main().catch(async (error: unknown) => {
  logger.fatal('Puller failed to start', error);
  await notify({
    category: NotifyCategory.CONFIGURATION_ERROR,
    title: 'puller: failed to start',
    message: capErrorMessage(errorMessage(error)),
    error,
  });
  process.exit(1);
});
