/**
 * Stores behind the output cache: Redis when a connection string is
 * configured, process memory otherwise.
 */

import Redis, { RedisOptions } from 'ioredis';
import { z } from 'zod';
import { CacheConfig } from '../config';
import { Logger, defaultLogger } from '../utils/logger';
import { MemoryCache } from './memory-cache';

export interface CachedResponse {
  status: number;
  contentType?: string;
  body: string;
  storedAt: number;
}

export interface OutputCacheStore {
  readonly kind: 'memory' | 'redis';
  get(key: string): Promise<CachedResponse | undefined>;
  set(key: string, value: CachedResponse, ttl: number): Promise<void>;
  evict(key: string): Promise<void>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

const cachedResponseSchema = z.object({
  status: z.number().int(),
  contentType: z.string().optional(),
  body: z.string(),
  storedAt: z.number()
});

export class MemoryOutputCacheStore implements OutputCacheStore {
  readonly kind = 'memory';
  private cache: MemoryCache<CachedResponse>;

  constructor(maxItems: number = 1000) {
    this.cache = new MemoryCache<CachedResponse>({ maxItems });
  }

  async get(key: string): Promise<CachedResponse | undefined> {
    return this.cache.get(key);
  }

  async set(key: string, value: CachedResponse, ttl: number): Promise<void> {
    this.cache.set(key, value, ttl);
  }

  async evict(key: string): Promise<void> {
    this.cache.delete(key);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.cache.dispose();
  }
}

/**
 * The part of the ioredis client the store uses
 */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', milliseconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

export class RedisOutputCacheStore implements OutputCacheStore {
  readonly kind = 'redis';
  private logger: Logger;

  constructor(private readonly client: RedisClientLike, logger?: Logger) {
    this.logger = logger || defaultLogger.createSubLogger('output-cache.redis');
  }

  async get(key: string): Promise<CachedResponse | undefined> {
    const raw = await this.client.get(key);
    if (raw === null) {
      return undefined;
    }

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      this.logger.warn('Discarding unreadable cache entry', { key }, 'get');
      await this.client.del(key);
      return undefined;
    }

    const parsed = cachedResponseSchema.safeParse(value);
    if (!parsed.success) {
      this.logger.warn('Discarding malformed cache entry', { key }, 'get');
      await this.client.del(key);
      return undefined;
    }
    return parsed.data;
  }

  async set(key: string, value: CachedResponse, ttl: number): Promise<void> {
    await this.client.set(key, JSON.stringify(value), 'PX', ttl);
  }

  async evict(key: string): Promise<void> {
    await this.client.del(key);
  }

  async ping(): Promise<boolean> {
    return (await this.client.ping()) === 'PONG';
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

/**
 * Accepts `redis://` URLs and the `host:port[,password=...][,ssl=true]` form
 * the app host injects.
 */
export function parseRedisConnectionString(connectionString: string): RedisOptions {
  if (/^rediss?:\/\//i.test(connectionString)) {
    const url = new URL(connectionString);
    return {
      host: url.hostname,
      port: url.port ? Number(url.port) : 6379,
      username: url.username ? decodeURIComponent(url.username) : undefined,
      password: url.password ? decodeURIComponent(url.password) : undefined,
      db: url.pathname.length > 1 ? Number(url.pathname.slice(1)) : undefined,
      tls: url.protocol === 'rediss:' ? {} : undefined
    };
  }

  const [endpoint, ...settings] = connectionString.split(',').map(part => part.trim());
  const separator = endpoint.lastIndexOf(':');
  const options: RedisOptions = separator > 0
    ? { host: endpoint.slice(0, separator), port: Number(endpoint.slice(separator + 1)) }
    : { host: endpoint, port: 6379 };

  for (const setting of settings) {
    const [name, ...rest] = setting.split('=');
    const value = rest.join('=');
    switch (name.trim().toLowerCase()) {
      case 'password':
        options.password = value;
        break;
      case 'user':
        options.username = value;
        break;
      case 'ssl':
        if (value.toLowerCase() === 'true') {
          options.tls = {};
        }
        break;
    }
  }

  return options;
}

export function createOutputCacheStore(config: CacheConfig, logger?: Logger): OutputCacheStore {
  if (!config.connectionString) {
    return new MemoryOutputCacheStore(config.maxItems);
  }

  const client = new Redis({
    ...parseRedisConnectionString(config.connectionString),
    maxRetriesPerRequest: 1
  });
  const storeLogger = logger || defaultLogger.createSubLogger('output-cache.redis');
  client.on('error', (error: Error) => {
    storeLogger.warn('Redis connection error', { error: error.message });
  });
  return new RedisOutputCacheStore(client, storeLogger);
}
