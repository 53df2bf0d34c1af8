import { randomUUID } from 'crypto';

import type { NextFunction, Request, Response } from 'express';

import { BaseError } from '@core/errors/base-error.js';

import { logger } from '@utils/logger.js';

interface ErrorPayload {
  message: string;
  code: string;
  traceId: string;
  data?: unknown;
}

function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export const errorMiddleware = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  const traceId = randomUUID();
  const known = err instanceof BaseError;
  const badJson = !known && isBodyParseError(err);
  const status = known ? err.status : badJson ? 400 : 500;

  const payload: ErrorPayload = {
    message: status >= 500 && !known ? 'Internal server error' : err.message,
    code: known ? err.code : badJson ? 'BAD_REQUEST' : 'INTERNAL',
    traceId,
  };

  if (known && err.data !== undefined) {
    try {
      payload.data = JSON.parse(JSON.stringify(err.data));
    } catch {
      payload.data = String(err.data);
    }
  }

  if (status >= 500) {
    logger.error({ err, traceId, path: req.path }, '[http] unhandled error');
  } else {
    logger.info({ code: payload.code, status, traceId, path: req.path }, '[http] request failed');
  }

  res.status(status).json(payload);
};
