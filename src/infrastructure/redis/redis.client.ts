import { createClient } from 'redis';

import { config } from '@config/env.config.js';

import { logger } from '@utils/logger.js';

export type RedisClient = ReturnType<typeof createClient>;

const log = logger.child({ component: 'redis' });

export const redis: RedisClient = createClient({
  url: config.REDIS_URL,
});

redis.on('error', (err: Error) => {
  log.error({ err: err.message }, '[redis] error');
});

redis.on('connect', () => {
  log.info('[redis] connected');
});

redis.on('end', () => {
  log.info('[redis] connection closed');
});

export async function connectRedis(client: RedisClient = redis): Promise<void> {
  if (!client.isOpen) {
    await client.connect();
  }
}

export async function disconnectRedis(client: RedisClient = redis): Promise<void> {
  if (client.isOpen) {
    await client.quit();
  }
}
