// node/src/routes/funding.ts — conversational funding search over HTTP
import express, { type NextFunction, type Request, type Response } from 'express';
import { randomUUID } from 'node:crypto';
import type { AppDeps } from '@/services/pipeline-deps';
import { runFundingTurn, resetSession } from '@/services/orchestrator';
import { emptySessionContext } from '@/memory/sessionContext';
import { validateFundingQuery, validateSessionRequest } from '@/routes/funding.validation';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';
import { getCorrelationId } from '@/middleware/correlation';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';

export function createFundingRouter(getDeps: () => Promise<AppDeps>): express.Router {
  const router = express.Router();

  router.post('/query', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateFundingQuery(req.body);
    if (!validation.success) {
      logger.warn('POST /api/funding/query validation failed', { errors: validation.error });
      res.status(400).json(createErrorResponse('Invalid request', validation.error, 'bad_request'));
      return;
    }
    const body = validation.data;

    try {
      const { pipeline, sessions } = await getDeps();
      const sessionId = body.sessionId ?? randomUUID();

      let context = emptySessionContext();
      try {
        context = (await sessions.get(sessionId)) ?? context;
      } catch (err) {
        logger.warn('session:get_failed', { sessionId, error: errorMessage(err) });
      }

      logger.info('flow:request_context', {
        sessionId,
        mode: body.mode,
        hasSelection: context.lastSelection !== null,
        correlationId: getCorrelationId(res),
      });

      const turn = await runFundingTurn(body.message, context, pipeline, {
        location: body.location,
        domain: body.domain,
        fundingNeed: body.fundingNeed,
        mode: body.mode,
        wanted: body.wanted,
      });

      if (turn.context !== context) {
        await sessions.set(sessionId, turn.context);
      } else {
        await sessions.refreshTTL(sessionId);
      }

      res.json(createSuccessResponse({ sessionId, result: turn.result }));
    } catch (err) {
      next(err);
    }
  });

  router.post('/reset', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateSessionRequest(req.body);
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid request', validation.error, 'bad_request'));
      return;
    }

    try {
      const { sessions } = await getDeps();
      await sessions.delete(validation.data.sessionId);
      res.json(createSuccessResponse({ sessionId: validation.data.sessionId, context: resetSession() }));
    } catch (err) {
      next(err);
    }
  });

  router.get('/session/:sessionId', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateSessionRequest({ sessionId: req.params.sessionId });
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid request', validation.error, 'bad_request'));
      return;
    }

    try {
      const { sessions } = await getDeps();
      const context = await sessions.get(validation.data.sessionId);
      if (!context) {
        res.status(404).json(createErrorResponse('Session not found', undefined, 'not_found'));
        return;
      }
      res.json(
        createSuccessResponse({
          sessionId: validation.data.sessionId,
          lastQuery: context.lastQuery,
          shortlistSize: context.lastShortlist.length,
          selection: context.lastSelection,
          updatedAt: context.updatedAt,
        }),
      );
    } catch (err) {
      next(err);
    }
  });

  return router;
}
