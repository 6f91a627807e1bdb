import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction } from 'express';

export const CORRELATION_HEADER = 'x-correlation-id';

const correlationIds = new WeakMap<Request, string>();

/**
 * Correlation id assigned to `req` by the correlationId middleware
 */
export function getCorrelationId(req: Request): string | undefined {
  return correlationIds.get(req);
}

/**
 * Tags every request with a correlation id (taken from the caller when given) and logs its duration
 */
export function correlationId(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers[CORRELATION_HEADER];
  const id = typeof incoming === 'string' && incoming.trim() !== '' ? incoming.trim() : randomUUID();

  correlationIds.set(req, id);
  res.setHeader(CORRELATION_HEADER, id);

  const start = process.hrtime.bigint();
  res.on('finish', () => {
    const duration = Number(process.hrtime.bigint() - start) / 1_000_000;
    console.log(`${req.method} ${req.originalUrl} ${res.statusCode} - ${duration.toFixed(2)} ms`);
  });

  next();
}
