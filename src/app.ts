/**
 * HTTP application
 * Express app serving the health endpoint; the voice socket attaches to the same server
 */

import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import { env } from '@/shared/config';
import { logger, toError } from '@/shared/utils';
import type { ConversationController, ConversationStats } from '@/modules/conversation';

export interface HealthReport extends ConversationStats {
  status: 'ok' | 'degraded';
  uptime: number;
  connections: number;
}

export async function buildHealthReport(
  controller: ConversationController,
  connections: number
): Promise<HealthReport> {
  const stats = await controller.getStats();
  return {
    status: 'ok',
    uptime: process.uptime(),
    connections,
    ...stats,
  };
}

/**
 * @param countConnections - open socket count, read on each request
 */
export function createApp(controller: ConversationController, countConnections: () => number): Express {
  const app = express();

  app.use(cors({ origin: env.FRONTEND_URL }));
  app.use(express.json());

  app.get('/health', (_req, res) => {
    buildHealthReport(controller, countConnections())
      .then((report) => res.json(report))
      .catch((error: unknown) => {
        logger.error('Health check failed', { error: toError(error) });
        res.status(503).json({ status: 'degraded', uptime: process.uptime() });
      });
  });

  return app;
}
