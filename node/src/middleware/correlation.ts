import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';

export function attachCorrelationId(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.header('x-correlation-id');
  const correlationId = headerId && headerId.length <= 128 ? headerId : randomUUID();

  res.locals.correlationId = correlationId;
  res.setHeader('x-correlation-id', correlationId);
  next();
}

export function getCorrelationId(res: Response): string | undefined {
  const id: unknown = res.locals.correlationId;
  return typeof id === 'string' ? id : undefined;
}
