import { withTimeout } from '../../shared/async/resilience';
import { AppError } from '../../shared/errors/app-error';
import { childLogger } from '../../shared/logging/logger';
import { InMemorySessionBackend } from './inMemorySessionBackend';
import { KeyValueCache, SessionBackend, SessionRecord, sessionRecordSchema } from './session-types';

const log = childLogger({ module: 'session-cache' });

export interface CacheSessionBackendOptions {
  ttlSeconds: number;
  timeoutMs: number;
  keyPrefix?: string;
  /** Used whenever the cache errors or times out. */
  fallback?: InMemorySessionBackend;
}

/**
 * Session records stored as JSON in an external cache, one key per session, expiring with the session.
 *
 * Cache failures are logged and the call is served from the in-memory fallback instead.
 */
export class CacheSessionBackend implements SessionBackend {
  readonly kind = 'cache';
  private readonly ttlSeconds: number;
  private readonly timeoutMs: number;
  private readonly keyPrefix: string;
  private readonly fallback: InMemorySessionBackend;

  constructor(
    private readonly cache: KeyValueCache,
    opts: CacheSessionBackendOptions,
  ) {
    this.ttlSeconds = opts.ttlSeconds;
    this.timeoutMs = opts.timeoutMs;
    this.keyPrefix = opts.keyPrefix ?? 'session:';
    this.fallback = opts.fallback ?? new InMemorySessionBackend();
  }

  async get(id: string): Promise<SessionRecord | undefined> {
    let raw: string | null;
    try {
      raw = await this.guard(this.cache.get(this.keyFor(id)), 'get');
    } catch (error) {
      log.warn({ err: error, sessionId: id }, 'Session cache read failed, using in-memory fallback');
      return this.fallback.get(id);
    }
    if (raw === null) return undefined;

    return this.decode(id, raw);
  }

  async put(record: SessionRecord): Promise<void> {
    try {
      await this.guard(this.cache.set(this.keyFor(record.id), JSON.stringify(record), this.ttlSeconds), 'set');
    } catch (error) {
      log.warn({ err: error, sessionId: record.id }, 'Session cache write failed, using in-memory fallback');
      await this.fallback.put(record);
    }
  }

  async delete(id: string): Promise<void> {
    await this.fallback.delete(id);
    try {
      await this.guard(this.cache.delete(this.keyFor(id)), 'delete');
    } catch (error) {
      log.warn({ err: error, sessionId: id }, 'Session cache delete failed');
    }
  }

  /** Cached keys expire on their own; only the fallback needs sweeping. */
  async sweep(cutoff: number): Promise<number> {
    return this.fallback.sweep(cutoff);
  }

  private keyFor(id: string): string {
    return `${this.keyPrefix}${id}`;
  }

  private async guard<T>(operation: Promise<T>, name: string): Promise<T> {
    try {
      return await withTimeout(operation, this.timeoutMs, `session cache ${name}`);
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new AppError('SESSION_BACKEND_FAILED', `Session cache ${name} failed`, error);
    }
  }

  private decode(id: string, raw: string): SessionRecord | undefined {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      log.warn({ err: error, sessionId: id }, 'Discarding unreadable cached session');
      return undefined;
    }

    const parsed = sessionRecordSchema.safeParse(data);
    if (!parsed.success) {
      log.warn({ sessionId: id, issues: parsed.error.issues }, 'Discarding malformed cached session');
      return undefined;
    }
    return parsed.data;
  }
}
