import type { Request, Response } from 'express';

import { config } from '@config/env.config.js';

import { readCounters } from '@utils/metrics.js';

export const healthHandler = (_req: Request, res: Response): void => {
  res.status(200).json({ status: 'ok', store: config.STORE_DRIVER });
};

export const metricsHandler = (_req: Request, res: Response): void => {
  res.status(200).json({ counters: readCounters() });
};
