import { loadSeed } from '../src/config/data.loader.js';
import { RedisBalanceRepository } from '../src/core/repositories/balance.repo.js';
import { connectRedis, disconnectRedis, redis } from '../src/infrastructure/redis/redis.client.js';
import { seedLedger } from '../src/infrastructure/seed.js';
import { logger } from '../src/utils/logger.js';

async function main() {
  await connectRedis();
  const written = await seedLedger(new RedisBalanceRepository(redis), loadSeed());
  logger.info({ written }, '[seed] done');
}

main()
  .catch((err: unknown) => {
    logger.error({ err }, '[seed] failed');
    process.exitCode = 1;
  })
  .finally(() => disconnectRedis());
