import { childLogger } from '../../shared/logging/logger';
import { SessionBackend, SessionInfo, SessionRecord } from './session-types';

const log = childLogger({ module: 'session-store' });

export interface SessionStoreOptions {
  backend: SessionBackend;
  maxHistory: number;
  expiryMs: number;
}

/**
 * Bounded per-session turn history with inactivity expiry.
 *
 * Reads and writes are separate backend calls; two concurrent turns on one session may lose one of them.
 */
export class SessionStore {
  private readonly backend: SessionBackend;
  private readonly maxHistory: number;
  private readonly expiryMs: number;

  constructor(opts: SessionStoreOptions) {
    if (!Number.isInteger(opts.maxHistory) || opts.maxHistory < 1) {
      throw new RangeError('maxHistory must be a positive integer');
    }
    this.backend = opts.backend;
    this.maxHistory = opts.maxHistory;
    this.expiryMs = opts.expiryMs;
  }

  get backendKind(): string {
    return this.backend.kind;
  }

  /** Prior turns rendered for a prompt; empty for a missing, unknown or expired session. */
  async getContext(sessionId?: string): Promise<string> {
    if (!sessionId) return '';

    const record = await this.load(sessionId);
    if (!record || record.turns.length === 0) return '';

    return record.turns.map((turn) => `User: ${turn.query}\nAI: ${turn.response}`).join('\n');
  }

  async addInteraction(sessionId: string | undefined, query: string, response: string, handlerName: string): Promise<void> {
    if (!sessionId) return;

    const now = Date.now();
    const existing = await this.load(sessionId);
    const record: SessionRecord = existing ?? { id: sessionId, turns: [], lastActivity: now, handlersUsed: [] };

    const turns = [...record.turns, { query, response, handlerName, createdAt: now }].slice(-this.maxHistory);
    const handlersUsed = record.handlersUsed.includes(handlerName)
      ? record.handlersUsed
      : [...record.handlersUsed, handlerName];

    await this.backend.put({ id: sessionId, turns, lastActivity: now, handlersUsed });
  }

  async getSessionInfo(sessionId: string): Promise<SessionInfo> {
    if (!sessionId) return { exists: false };

    const record = await this.load(sessionId);
    if (!record) return { exists: false };

    const first = record.turns[0];
    return {
      exists: true,
      turnCount: record.turns.length,
      handlersUsed: [...record.handlersUsed],
      durationSeconds: first ? (Date.now() - first.createdAt) / 1000 : 0,
      lastActivity: new Date(record.lastActivity).toISOString(),
    };
  }

  /** Empty a session's history, keeping the session itself; `false` when there is no live session. */
  async clearSession(sessionId: string): Promise<boolean> {
    const record = await this.load(sessionId);
    if (!record) return false;

    await this.backend.put({ ...record, turns: [] });
    return true;
  }

  async cleanupExpired(): Promise<number> {
    const removed = await this.backend.sweep(Date.now() - this.expiryMs);
    if (removed > 0) {
      log.info({ removed }, 'Cleaned up expired sessions');
    }
    return removed;
  }

  private async load(sessionId: string): Promise<SessionRecord | undefined> {
    const record = await this.backend.get(sessionId);
    if (!record) return undefined;

    if (Date.now() - record.lastActivity > this.expiryMs) {
      log.info({ sessionId }, 'Session expired, clearing history');
      await this.backend.delete(sessionId);
      return undefined;
    }
    return record;
  }
}
