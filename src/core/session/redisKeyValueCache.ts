import Redis from 'ioredis';
import { childLogger } from '../../shared/logging/logger';
import { KeyValueCache } from './session-types';

const log = childLogger({ module: 'redis' });

/** The ioredis commands the session cache uses. */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<unknown>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

export function createRedisClient(url: string): Redis {
  const client = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    retryStrategy(times) {
      return Math.min(times * 50, 2000);
    },
  });

  client.on('connect', () => {
    log.info('Redis connected');
  });
  client.on('error', (err: Error) => {
    log.error({ err }, 'Redis error');
  });
  client.on('reconnecting', () => {
    log.warn('Redis reconnecting');
  });

  return client;
}

export class RedisKeyValueCache implements KeyValueCache {
  constructor(private readonly client: RedisCommands) {}

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.setex(key, ttlSeconds, value);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async healthCheck(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      log.warn({ err: error }, 'Redis ping failed');
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
    log.info('Redis connection closed');
  }
}
