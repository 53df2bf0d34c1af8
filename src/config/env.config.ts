import 'dotenv/config';
import { fileURLToPath } from 'url';

import { z } from 'zod';

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const StoreDriver = z.enum(['memory', 'redis']);

const DEFAULT_CONFIG_DIR = fileURLToPath(new URL('../../config', import.meta.url));

const toNumber = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number());

export const ConfigSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    PORT: toNumber(3000),
    LOG_LEVEL: LogLevel.default('info'),

    TIMEZONE: z.string().default('Asia/Kolkata'),

    STORE_DRIVER: StoreDriver.default('memory'),
    REDIS_URL: z.string().optional(),

    CONFIG_DIR: z.string().default(DEFAULT_CONFIG_DIR),

    SESSION_TTL_MINUTES: toNumber(30).pipe(z.number().int().positive()),
    SESSION_WRITE_RETRIES: toNumber(3).pipe(z.number().int().min(0)),
    INTENT_MIN_CONFIDENCE: toNumber(0.6).pipe(z.number().min(0).max(1)),
    COMMIT_MAX_RETRIES: toNumber(3).pipe(z.number().int().min(0)),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.STORE_DRIVER === 'redis' && !cfg.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['REDIS_URL'],
        message: 'REDIS_URL is required when STORE_DRIVER=redis',
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

function loadEnv(): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
    const message = [
      'Invalid environment configuration:',
      issues,
      'Update your .env or environment variables and try again.',
    ].join('\n');
    throw new Error(message);
  }
  return Object.freeze(parsed.data);
}

export const config: Readonly<AppConfig> = loadEnv();
