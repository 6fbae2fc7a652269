import express from 'express';
import { z } from 'zod';
import { createErrorHandler, requestLogger } from '@persistor/http';
import { MAX_TASK_COUNT, type Logger } from '@persistor/shared';
import type { Invoker } from './invoker.js';

const invokeQuerySchema = z.object({
  N: z.coerce.number().int().positive(),
  N_per_func: z.coerce.number().int().min(1).max(MAX_TASK_COUNT).default(1),
  batch_store_size: z.coerce.number().int().positive().optional(),
});

export interface InvokerAppDeps {
  invoker: Pick<Invoker, 'invoke'>;
  logger: Logger;
}

export function createApp(deps: InvokerAppDeps): express.Express {
  const app = express();

  app.use(requestLogger(deps.logger));

  app.get('/health', (_req, res) => {
    res.status(200).send('OK');
  });

  app.get('/api/invoke', async (req, res, next) => {
    try {
      const query = invokeQuerySchema.parse(req.query);
      const responses = await deps.invoker.invoke({
        count: query.N,
        tasksPerCall: query.N_per_func,
        batchStoreSize: query.batch_store_size,
      });
      res.json(responses);
    } catch (error) {
      next(error);
    }
  });

  app.use(createErrorHandler('invoker'));

  return app;
}
