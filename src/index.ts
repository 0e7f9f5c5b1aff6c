import { createServer } from 'http';
import type { WebSocketServer } from 'ws';
import { env, validateEnv } from '@/shared/config';
import { logger, toError } from '@/shared/utils';
import { initializeSocketServer, shutdownSocketServer, getSocketStats } from '@/modules/socket';
import { createContainer } from './container';
import { createApp } from './app';

async function main(): Promise<void> {
  validateEnv();

  const container = await createContainer();

  let wss: WebSocketServer | undefined;
  const app = createApp(container.controller, () => (wss ? getSocketStats(wss).totalConnections : 0));
  const httpServer = createServer(app);
  wss = initializeSocketServer(httpServer, container.controller);
  const socketServer = wss;

  let shuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, starting graceful shutdown`);

    try {
      // Stop accepting new connections
      const httpClosed = new Promise<void>((resolve) => {
        httpServer.close(() => {
          logger.info('HTTP server closed');
          resolve();
        });
      });

      await shutdownSocketServer(socketServer);
      await container.close();
      await httpClosed;

      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error('Error during graceful shutdown', toError(error));
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception', error);
    void gracefulShutdown('UNCAUGHT_EXCEPTION');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled rejection', { reason: String(reason) });
    void gracefulShutdown('UNHANDLED_REJECTION');
  });

  httpServer.listen(env.PORT, () => {
    logger.info('Voiceloop backend server started', {
      port: env.PORT,
      environment: env.NODE_ENV,
      frontendUrl: env.FRONTEND_URL,
      websocketPath: '/ws',
    });
  });
}

main().catch((error: unknown) => {
  logger.error('Startup failed', toError(error));
  process.exit(1);
});
