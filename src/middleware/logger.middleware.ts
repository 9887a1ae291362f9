import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import { componentLogger } from '../config/logger';

const logger = componentLogger('http');

const levelFor = (statusCode: number): 'error' | 'warn' | 'info' =>
  statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';

/**
 * Tags each request with an id (taken from `X-Request-Id` when the caller
 * sends one) and logs its outcome once the response is flushed.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startedAt = process.hrtime.bigint();
  const requestId = req.get('x-request-id') ?? randomUUID();
  const log = logger.child({ requestId });

  res.setHeader('X-Request-Id', requestId);
  log.debug('Request received', { method: req.method, path: req.path, ip: req.ip });

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;

    log.log(levelFor(res.statusCode), `${req.method} ${req.originalUrl} ${res.statusCode}`, {
      durationMs: Math.round(durationMs),
    });
  });

  next();
};
