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
  INVOKER_DEFAULT_DELAY_MS,
  INVOKER_DEFAULT_TIMEOUT_MS,
  createServiceLogger,
  optionalIntEnv,
} from '@persistor/shared';
import { createApp } from './app.js';
import { Invoker } from './invoker.js';

const logger = createServiceLogger('invoker', { component: 'server' });

// A missing target URL is answered per request with INVOKER_ERROR
const invoker = new Invoker({
  targetUrl: process.env.INVOKER_TARGET_URL,
  delayMs: optionalIntEnv('INVOKER_DELAY_MS', INVOKER_DEFAULT_DELAY_MS),
  timeoutMs: optionalIntEnv('INVOKER_TIMEOUT_MS', INVOKER_DEFAULT_TIMEOUT_MS),
  logger,
});

startServer(createApp({ invoker, logger }), { port: optionalIntEnv('PORT', 7072), logger });
