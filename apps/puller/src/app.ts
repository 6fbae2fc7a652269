import express from 'express';
import type { PullRunOptions, PullRunResult } from '@persistor/engine';
import { createErrorHandler, requestLogger } from '@persistor/http';
import type { Logger } from '@persistor/shared';
import { persistQuerySchema } from './query.js';

export interface PullRunner {
  run(options: PullRunOptions): Promise<PullRunResult>;
}

export interface PullerAppDeps {
  runner: PullRunner;
  /** Receiver prefetch, used to cap the batch size */
  prefetch: number;
  logger: Logger;
}

export function createApp(deps: PullerAppDeps): express.Express {
  const app = express();
  const querySchema = persistQuerySchema(deps.prefetch);

  app.use(requestLogger(deps.logger));

  app.get('/health', (_req, res) => {
    res.status(200).send('OK');
  });

  // Runs one pull run and answers with the number of stored messages
  app.get('/api/persist', async (req, res, next) => {
    try {
      const query = querySchema.parse(req.query);
      const result = await deps.runner.run({
        taskCount: query.N,
        batchSize: query.batch_store_size,
        receiveDurationMs: query.receive_duration !== undefined ? query.receive_duration * 1000 : undefined,
      });

      req.log.info('Pull run completed', {
        runId: result.runId,
        processed: result.processed,
        failedTasks: result.failedTasks,
        timedOut: result.timedOut,
      });
      res.type('text/plain').send(String(result.processed));
    } catch (error) {
      next(error);
    }
  });

  app.use(createErrorHandler('puller'));

  return app;
}
