import { z } from 'zod';

export const turnSchema = z.object({
  query: z.string(),
  response: z.string(),
  handlerName: z.string(),
  /** Epoch milliseconds. */
  createdAt: z.number(),
});

export const sessionRecordSchema = z.object({
  id: z.string(),
  turns: z.array(turnSchema),
  /** Epoch milliseconds of the last recorded turn. */
  lastActivity: z.number(),
  handlersUsed: z.array(z.string()),
});

export type Turn = z.infer<typeof turnSchema>;
export type SessionRecord = z.infer<typeof sessionRecordSchema>;

/** Where session records live. Implementations never reject on storage errors they can recover from. */
export interface SessionBackend {
  readonly kind: string;
  get(id: string): Promise<SessionRecord | undefined>;
  put(record: SessionRecord): Promise<void>;
  delete(id: string): Promise<void>;
  /** Remove records whose last activity is before `cutoff`; returns how many went. */
  sweep(cutoff: number): Promise<number>;
}

/** Minimal string cache with per-key TTL. */
export interface KeyValueCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

export type SessionInfo =
  | { exists: false }
  | {
      exists: true;
      turnCount: number;
      handlersUsed: string[];
      durationSeconds: number;
      lastActivity: string;
    };
