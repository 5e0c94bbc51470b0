import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { TutorService } from '../core/tutorService';
import { AppError, ErrorCode } from '../shared/errors/app-error';
import { childLogger } from '../shared/logging/logger';
import { createTutorRouter } from './tutor.routes';

const log = childLogger({ module: 'http' });

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  INVALID_REQUEST: 400,
  HANDLER_NOT_FOUND: 404,
  SESSION_NOT_FOUND: 404,
  TIMEOUT: 504,
  EXTERNAL_CALL_FAILED: 502,
};

export interface AppOptions {
  service: TutorService;
  sessionBackend: string;
  /** Reports whether the session cache answers; omitted for the in-memory backend. */
  cacheHealthCheck?: () => Promise<boolean>;
}

export function createApp({ service, sessionBackend, cacheHealthCheck }: AppOptions): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '64kb' }));

  app.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'Study router is running', handlers: service.listHandlers().map((h) => h.key) });
  });

  app.get('/health', async (_req: Request, res: Response) => {
    const cacheHealthy = cacheHealthCheck ? await cacheHealthCheck() : undefined;
    res.json({
      status: cacheHealthy === false ? 'degraded' : 'ok',
      session_backend: sessionBackend,
      ...(cacheHealthy === undefined ? {} : { cache_healthy: cacheHealthy }),
      uptime_seconds: Math.round(process.uptime()),
    });
  });

  app.use(createTutorRouter(service));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    if (error instanceof AppError) {
      const status = STATUS_BY_CODE[error.code];
      if (status !== undefined && status < 500) {
        res.status(status).json({ error: error.message, code: error.code });
        return;
      }
      log.error({ err: error, code: error.code, path: req.path }, 'Request failed');
      res.status(status ?? 500).json({ error: 'Internal server error', code: error.code });
      return;
    }

    log.error({ err: error, path: req.path }, 'Unhandled request error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
