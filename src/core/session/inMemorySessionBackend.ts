import { SessionBackend, SessionRecord } from './session-types';

export class InMemorySessionBackend implements SessionBackend {
  readonly kind = 'memory';
  private readonly sessions = new Map<string, SessionRecord>();

  async get(id: string): Promise<SessionRecord | undefined> {
    return this.sessions.get(id);
  }

  async put(record: SessionRecord): Promise<void> {
    this.sessions.set(record.id, record);
  }

  async delete(id: string): Promise<void> {
    this.sessions.delete(id);
  }

  async sweep(cutoff: number): Promise<number> {
    let removed = 0;
    for (const [id, record] of this.sessions) {
      if (record.lastActivity < cutoff) {
        this.sessions.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
