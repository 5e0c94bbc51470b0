import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { TutorService } from '../core/tutorService';
import { AppError } from '../shared/errors/app-error';

const askSchema = z.object({
  query: z.string().trim().min(1).max(4000),
  session_id: z.string().min(1).max(128).optional(),
  context: z.string().max(8000).optional(),
  user_id: z.string().max(128).optional(),
});

const routeSchema = z.object({
  query: z.string().trim().min(1).max(4000),
  context: z.string().max(8000).optional(),
});

const handlerAskSchema = z.object({
  query: z.string().trim().min(1).max(4000),
  context: z.string().max(8000).optional(),
});

function sendValidationError(res: Response, error: z.ZodError): void {
  res.status(400).json({ error: 'Validation error', details: error.issues });
}

export function createTutorRouter(service: TutorService): Router {
  const router = Router();

  router.post('/ask', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = askSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const { query, session_id, context, user_id } = parsed.data;
      const result = await service.process({ text: query, sessionId: session_id, context, userId: user_id });
      res.json({
        answer: result.content,
        handler_used: result.handlerUsed,
        confidence: result.confidence,
        sources: result.sources,
        execution_time_ms: result.executionTimeMs,
        session_id: result.sessionId,
        metadata: result.metadata,
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/route', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = routeSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const decision = await service.previewRoute(parsed.data.query, parsed.data.context);
      res.json({ query: parsed.data.query, decision, would_delegate: decision.action === 'delegate' });
    } catch (error) {
      next(error);
    }
  });

  router.get('/handlers', (_req: Request, res: Response) => {
    res.json({ handlers: service.listHandlers() });
  });

  router.post('/handlers/:key/ask', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = handlerAskSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const result = await service.askHandler(req.params.key, parsed.data.query, parsed.data.context);
      if (!result) {
        throw new AppError('HANDLER_NOT_FOUND', `Unknown handler: ${req.params.key}`);
      }
      res.json({
        answer: result.content,
        confidence: result.confidence,
        sources: result.sources,
        execution_time_ms: result.executionTimeMs,
        metadata: result.metadata,
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/sessions/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const info = await service.getSessionInfo(req.params.id);
      res.json(info);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/sessions/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const cleared = await service.clearSession(req.params.id);
      if (!cleared) {
        throw new AppError('SESSION_NOT_FOUND', `Unknown session: ${req.params.id}`);
      }
      res.json({ cleared: true, session_id: req.params.id });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
