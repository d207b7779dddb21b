/**
 * Output cache middleware: stores successful GET responses per route policy
 * and answers repeats from the store. Responses marked `Cache-Control: no-store`
 * are passed through unstored.
 */

import { Request, RequestHandler, Response } from 'express';
import { Logger, defaultLogger } from '../utils/logger';
import { CacheMetrics } from './cache-metrics';
import { CachedResponse, OutputCacheStore } from './output-cache-store';

export interface OutputCachePolicy {
  /** Part of the cache key and the `cache.name` metric attribute */
  name: string;

  /** Time to live (milliseconds) */
  expire: number;

  /** Route parameters that each get their own entry */
  varyByRouteValues?: string[];

  /** Whether the query string is part of the key */
  varyByQuery?: boolean;
}

export interface OutputCacheOptions {
  store: OutputCacheStore;
  keyPrefix: string;
  metrics?: CacheMetrics;
  logger?: Logger;
}

export const OUTPUT_CACHE_HEADER = 'X-Output-Cache';

export function outputCacheKey(req: Request, policy: OutputCachePolicy, keyPrefix: string): string {
  let key = `${keyPrefix}${policy.name}:${req.path}`;

  for (const name of policy.varyByRouteValues ?? []) {
    key += `|${name}=${req.params[name] ?? ''}`;
  }

  if (policy.varyByQuery) {
    const queryIndex = req.originalUrl.indexOf('?');
    if (queryIndex >= 0) {
      const params = new URLSearchParams(req.originalUrl.slice(queryIndex + 1));
      params.sort();
      key += `?${params.toString()}`;
    }
  }

  return key;
}

function isStorable(res: Response): boolean {
  const cacheControl = res.getHeader('Cache-Control');
  const directives = Array.isArray(cacheControl) ? cacheControl.join(',') : String(cacheControl ?? '');
  return res.statusCode === 200 && !/(^|,)\s*no-store\s*(,|$)/i.test(directives);
}

export class OutputCache {
  private logger: Logger;

  constructor(private readonly options: OutputCacheOptions) {
    this.logger = options.logger || defaultLogger.createSubLogger('output-cache');
  }

  /**
   * Middleware caching the route it is attached to under the given policy
   */
  policy(policy: OutputCachePolicy): RequestHandler {
    return (req, res, next) => {
      if (req.method !== 'GET' && req.method !== 'HEAD') {
        next();
        return;
      }

      const key = outputCacheKey(req, policy, this.options.keyPrefix);

      this.lookup(key).then((cached) => {
        if (cached) {
          this.options.metrics?.hit(policy.name);
          this.replay(res, cached);
          return;
        }

        this.options.metrics?.miss(policy.name);
        res.setHeader(OUTPUT_CACHE_HEADER, 'MISS');
        this.capture(res, key, policy);
        next();
      }, next);
    };
  }

  async evict(key: string): Promise<void> {
    await this.options.store.evict(key);
  }

  /**
   * A store that cannot be read counts as a miss
   */
  private async lookup(key: string): Promise<CachedResponse | undefined> {
    try {
      return await this.options.store.get(key);
    } catch (error) {
      this.logger.warn('Output cache read failed', {
        key,
        error: error instanceof Error ? error.message : String(error)
      }, 'lookup');
      return undefined;
    }
  }

  private replay(res: Response, cached: CachedResponse): void {
    res.status(cached.status);
    if (cached.contentType) {
      res.setHeader('Content-Type', cached.contentType);
    }
    res.setHeader(OUTPUT_CACHE_HEADER, 'HIT');
    res.setHeader('Age', Math.max(0, Math.floor((Date.now() - cached.storedAt) / 1000)).toString());
    res.send(cached.body);
  }

  private capture(res: Response, key: string, policy: OutputCachePolicy): void {
    const originalSend = res.send.bind(res);

    res.send = (body?: unknown): Response => {
      res.send = originalSend;

      if (isStorable(res) && (typeof body === 'string' || Buffer.isBuffer(body))) {
        const contentType = res.getHeader('Content-Type');
        const entry: CachedResponse = {
          status: res.statusCode,
          contentType: typeof contentType === 'string' ? contentType : undefined,
          body: typeof body === 'string' ? body : body.toString('utf8'),
          storedAt: Date.now()
        };

        this.options.store.set(key, entry, policy.expire).catch((error: unknown) => {
          this.logger.warn('Output cache write failed', {
            key,
            error: error instanceof Error ? error.message : String(error)
          }, 'capture');
        });
      }

      return originalSend(body);
    };
  }
}
