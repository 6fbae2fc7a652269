import express from 'express';
import type { PushPersistor } from '@persistor/engine';
import { createErrorHandler, requestLogger } from '@persistor/http';
import type { Logger } from '@persistor/shared';
import { eventGridBodySchema, toSourceMessage, validationCode } from './event-grid.js';

export interface PusherAppDeps {
  /** Stores Event Grid deliveries */
  eventGrid: Pick<PushPersistor, 'persist'>;
  logger: Logger;
}

export function createApp(deps: PusherAppDeps): express.Express {
  const app = express();

  app.use(requestLogger(deps.logger));
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.status(200).send('OK');
  });

  // Event Grid webhook; a non-2xx answer makes Event Grid retry the delivery
  app.post('/api/eventgrid', async (req, res, next) => {
    try {
      const events = eventGridBodySchema.parse(req.body);

      const code = validationCode(events);
      if (code !== undefined) {
        req.log.info('Event Grid subscription validated');
        res.json({ validationResponse: code });
        return;
      }

      const answer = await deps.eventGrid.persist(events.map(toSourceMessage));
      res.type('text/plain').send(answer);
    } catch (error) {
      next(error);
    }
  });

  app.use(createErrorHandler('pusher'));

  return app;
}
