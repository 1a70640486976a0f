import { createServer } from 'http';
import { getEnv } from './config/env.js';
import { createContainer } from './container.js';
import { createApp, API_PREFIX } from './app.js';
import { logger } from './utils/logger.js';

const SHUTDOWN_TIMEOUT_MS = 10000;

async function startServer(): Promise<void> {
  const startupStartTime = Date.now();
  const env = getEnv();
  const container = createContainer(env);
  const app = createApp(container);
  const httpServer = createServer(app);

  let shuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) {
      logger.warn('Shutdown already in progress, forcing exit');
      process.exit(1);
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    const forceExit = setTimeout(() => {
      logger.error({ timeoutMs: SHUTDOWN_TIMEOUT_MS }, 'Shutdown timed out, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => (error ? reject(error) : resolve()));
    });
    await container.close();
    process.exit(0);
  }

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      gracefulShutdown(signal).catch((error: unknown) => {
        logger.error({ error }, `Error in ${signal} handler - forcing exit`);
        process.exit(1);
      });
    });
  }

  httpServer.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      logger.fatal({ port: env.PORT, error: error.message }, 'Port already in use');
      process.exit(1);
    } else {
      logger.error({ error }, 'HTTP server error');
    }
  });

  httpServer.on('listening', () => {
    logger.info(
      {
        port: env.PORT,
        api: `http://localhost:${env.PORT}${API_PREFIX}`,
        startupDurationMs: Date.now() - startupStartTime,
      },
      'Server started successfully and listening'
    );
  });

  logger.info({ port: env.PORT }, 'Starting Express server');
  httpServer.listen(env.PORT, '0.0.0.0');
}

process.on('unhandledRejection', (reason: unknown) => {
  logger.error({ reason: reason instanceof Error ? reason : { reason: String(reason) } }, 'Unhandled promise rejection');
});

startServer().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
});
