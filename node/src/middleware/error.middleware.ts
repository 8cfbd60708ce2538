import type { Request, Response, NextFunction } from 'express';
import { logger } from '@/services/logger';
import { RetrievalError } from '@/utils/errors';
import { createErrorResponse } from '@/utils/errorResponse';
import { getCorrelationId } from '@/middleware/correlation';

export function notFoundMiddleware(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse(`Route ${req.method} ${req.path} not found`, undefined, 'not_found'));
}

export function errorMiddleware(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const correlationId = getCorrelationId(res);

  if (err instanceof RetrievalError) {
    logger.error('request:retrieval_failed', { path: req.path, stage: err.stage, error: err.message, correlationId });
    if (res.headersSent) return;
    res.status(502).json(createErrorResponse('Funding search is temporarily unavailable', undefined, 'retrieval_failed'));
    return;
  }

  logger.error('request:unhandled_error', {
    path: req.path,
    error: err instanceof Error ? err.message : String(err),
    correlationId,
  });
  if (res.headersSent) return;
  res.status(500).json(createErrorResponse('Internal Server Error', undefined, 'internal_error'));
}
