import { randomUUID } from 'node:crypto';
import { childLogger } from '../shared/logging/logger';
import { Handler, HandlerResult, HandlerSummary } from './handlers/handler-types';
import { HandlerRegistry } from './handlers/handlerRegistry';
import { CoordinatorHandler } from './orchestration/coordinator';
import { RoutingDecision } from './orchestration/routingFunctions';
import { SessionInfo } from './session/session-types';
import { SessionStore } from './session/sessionStore';

const log = childLogger({ module: 'tutor-service' });

export interface ProcessRequest {
  text: string;
  context?: string;
  userId?: string;
  sessionId?: string;
}

export interface ProcessResponse {
  content: string;
  confidence: number;
  handlerUsed: string;
  sources: readonly string[];
  executionTimeMs: number;
  metadata: Readonly<Record<string, unknown>>;
  sessionId: string;
}

export interface TutorServiceDeps {
  coordinator: CoordinatorHandler;
  registry: HandlerRegistry;
  sessions: SessionStore;
}

function handlerNameOf(result: HandlerResult, fallback: string): string {
  const name = result.metadata.handler;
  return typeof name === 'string' ? name : fallback;
}

/** Entry point for a student turn: session history in, coordinator result out, turn recorded. */
export class TutorService {
  private readonly coordinator: CoordinatorHandler;
  private readonly registry: HandlerRegistry;
  private readonly sessions: SessionStore;

  constructor(deps: TutorServiceDeps) {
    this.coordinator = deps.coordinator;
    this.registry = deps.registry;
    this.sessions = deps.sessions;
  }

  async process(request: ProcessRequest): Promise<ProcessResponse> {
    const sessionId = request.sessionId || randomUUID();
    const history = await this.sessions.getContext(sessionId);
    const context = this.mergeContext(history, request.context);

    const result = await this.coordinator.handle({
      text: request.text,
      context,
      userId: request.userId,
      sessionId,
    });

    const handlerUsed = handlerNameOf(result, this.coordinator.name);
    await this.sessions.addInteraction(sessionId, request.text, result.content, handlerUsed);
    log.info({ sessionId, handlerUsed, confidence: result.confidence }, 'Query processed');

    return {
      content: result.content,
      confidence: result.confidence,
      handlerUsed,
      sources: result.sources,
      executionTimeMs: result.executionTimeMs,
      metadata: result.metadata,
      sessionId,
    };
  }

  getHandler(key: string): Handler | undefined {
    return this.registry.get(key);
  }

  listHandlers(): HandlerSummary[] {
    return this.registry.list();
  }

  /** Send a query straight to one specialist, skipping routing and session history. */
  async askHandler(key: string, text: string, context?: string): Promise<HandlerResult | undefined> {
    const handler = this.registry.get(key);
    if (!handler) return undefined;
    return handler.handle({ text, context });
  }

  previewRoute(text: string, context?: string): Promise<RoutingDecision> {
    return this.coordinator.previewRoute(text, context);
  }

  getSessionInfo(sessionId: string): Promise<SessionInfo> {
    return this.sessions.getSessionInfo(sessionId);
  }

  clearSession(sessionId: string): Promise<boolean> {
    return this.sessions.clearSession(sessionId);
  }

  cleanupExpiredSessions(): Promise<number> {
    return this.sessions.cleanupExpired();
  }

  private mergeContext(history: string, extra?: string): string | undefined {
    const parts: string[] = [];
    if (history) parts.push(`Previous conversation:\n${history}`);
    if (extra) parts.push(`Additional context: ${extra}`);
    return parts.length > 0 ? parts.join('\n\n') : undefined;
  }
}
