import type { Server } from 'node:http';
import { HandlerRegistry } from '../core/handlers/handlerRegistry';
import { createLLMClient } from '../core/llm';
import { CoordinatorHandler } from '../core/orchestration/coordinator';
import { ShutdownResource, registerShutdownHooks } from '../core/runtime/shutdown';
import { CacheSessionBackend } from '../core/session/cacheSessionBackend';
import { InMemorySessionBackend } from '../core/session/inMemorySessionBackend';
import { RedisKeyValueCache, createRedisClient } from '../core/session/redisKeyValueCache';
import { SessionBackend } from '../core/session/session-types';
import { SessionStore } from '../core/session/sessionStore';
import { TutorService } from '../core/tutorService';
import { createApp } from '../http/app';
import { AppConfig, config } from '../shared/config/env';
import { AppError } from '../shared/errors/app-error';
import { logger } from '../shared/logging/logger';

export interface AppContainer {
  service: TutorService;
  sessionBackend: SessionBackend;
  cache?: RedisKeyValueCache;
}

/** Wire the service graph from configuration without opening any socket. */
export function buildContainer(cfg: AppConfig = config): AppContainer {
  const chatClient = createLLMClient({ chatModel: cfg.CHAT_MODEL });
  const routerClient = createLLMClient({ chatModel: cfg.ROUTER_MODEL });

  const registry = new HandlerRegistry(chatClient, { threshold: cfg.ROUTING_CONFIDENCE_THRESHOLD });
  const coordinator = new CoordinatorHandler({ registry, chatClient, routerClient });

  let cache: RedisKeyValueCache | undefined;
  let sessionBackend: SessionBackend = new InMemorySessionBackend();
  if (cfg.SESSION_BACKEND === 'redis' && cfg.REDIS_URL) {
    cache = new RedisKeyValueCache(createRedisClient(cfg.REDIS_URL));
    sessionBackend = new CacheSessionBackend(cache, {
      ttlSeconds: cfg.SESSION_EXPIRY_SEC,
      timeoutMs: cfg.SESSION_CACHE_TIMEOUT_MS,
    });
  }

  const sessions = new SessionStore({
    backend: sessionBackend,
    maxHistory: cfg.SESSION_MAX_HISTORY,
    expiryMs: cfg.SESSION_EXPIRY_SEC * 1000,
  });

  return { service: new TutorService({ coordinator, registry, sessions }), sessionBackend, cache };
}

function startSessionSweep(service: TutorService, intervalSec: number): NodeJS.Timeout {
  const timer = setInterval(() => {
    service.cleanupExpiredSessions().catch((error: unknown) => {
      logger.warn({ err: error }, 'Session sweep failed');
    });
  }, intervalSec * 1000);
  timer.unref();
  return timer;
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

export async function bootstrapApp(): Promise<Server> {
  try {
    const { service, sessionBackend, cache } = buildContainer();

    if (!config.LLM_API_KEY) {
      logger.warn('No LLM API key found. Requests go out unauthenticated.');
    }

    const app = createApp({
      service,
      sessionBackend: sessionBackend.kind,
      cacheHealthCheck: cache ? () => cache.healthCheck() : undefined,
    });

    const server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(config.PORT, () => resolve(listening));
      listening.once('error', reject);
    });
    logger.info({ port: config.PORT, sessionBackend: sessionBackend.kind }, 'HTTP server listening');

    const sweepTimer = startSessionSweep(service, config.SESSION_SWEEP_INTERVAL_SEC);

    const resources: ShutdownResource[] = [
      { name: 'session-sweep', close: () => clearInterval(sweepTimer) },
      { name: 'http-server', close: () => closeServer(server) },
    ];
    if (cache) {
      resources.push({ name: 'redis', close: () => cache.close() });
    }
    registerShutdownHooks({ resources });

    return server;
  } catch (error) {
    throw new AppError('BOOTSTRAP_FAILED', 'Application bootstrap failed', error);
  }
}
