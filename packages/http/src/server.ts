import type { Express } from 'express';
import type { Logger } from '@persistor/shared';

export interface StartServerOptions {
  port: number;
  logger: Logger;
  /** Runs after the HTTP server stopped accepting connections */
  onShutdown?: () => Promise<void>;
  shutdownTimeoutMs?: number;
}

/**
 * Listen on `port` and close cleanly on SIGTERM/SIGINT.
 */
export function startServer(app: Express, options: StartServerOptions): void {
  const { logger, port } = options;

  const server = app.listen(port, () => {
    logger.info('server_started', { port, nodeEnv: process.env.NODE_ENV ?? 'development' });
  });

  const gracefulShutdown = (signal: string) => {
    logger.info('server_shutdown_initiated', { signal });

    server.close((err) => {
      if (err) {
        logger.error('server_shutdown_error', err);
        process.exit(1);
      }

      const finish = options.onShutdown ? options.onShutdown() : Promise.resolve();
      finish
        .then(() => {
          logger.info('server_shutdown_complete');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('server_shutdown_error', error);
          process.exit(1);
        });
    });

    setTimeout(() => {
      logger.warn('server_shutdown_forced', {
        reason: `Shutdown timeout exceeded ${options.shutdownTimeoutMs ?? 10_000}ms`,
      });
      process.exit(1);
    }, options.shutdownTimeoutMs ?? 10_000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}
