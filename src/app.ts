import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { config } from '@config/env.config.js';

import { ConversationService } from '@services/conversation/conversation.service.js';
import { LeaveService } from '@services/leave/leave.service.js';

import { connectRedis, disconnectRedis } from '@infra/redis/redis.client.js';
import { getStores } from '@infra/stores.js';

import { logger } from '@utils/logger.js';

import { createApiRouter, type ApiServices } from './api/index.js';
import { errorMiddleware } from './middleware/index.js';

export function createApp(services: ApiServices): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  app.use('/', createApiRouter(services));
  app.use(errorMiddleware);
  return app;
}

function registerShutdownSignals(): void {
  const handler = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, '[app] shutting down');
    try {
      if (config.STORE_DRIVER === 'redis') await disconnectRedis();
    } finally {
      process.exit(0);
    }
  };
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
}

async function bootstrap() {
  if (config.STORE_DRIVER === 'redis') {
    await connectRedis();
  }
  registerShutdownSignals();

  const stores = getStores();
  const leave = new LeaveService(stores);
  const conversation = new ConversationService(stores, leave);
  const app = createApp({ leave, conversation });

  app.listen(config.PORT, () => {
    logger.info({ port: config.PORT, store: config.STORE_DRIVER }, '[app] listening');
  });
}

if (config.NODE_ENV !== 'test') {
  bootstrap().catch((err: unknown) => {
    logger.fatal({ err }, '[app] fatal bootstrap error');
    process.exit(1);
  });
}
