import { config } from '@config/env.config.js';

export const redisConfig = {
  // Kept past the inactivity timeout so an expired session is still found and reported as expired.
  sessionTtlSeconds: config.SESSION_TTL_MINUTES * 60 * 2,
  prefixes: {
    conversation: 'conv',
    balance: 'balance',
    leave: 'leave',
  },
} as const;
