import { Counter, Meter } from '@opentelemetry/api';

export interface CacheMetrics {
  hit(cacheName: string): void;
  miss(cacheName: string): void;
}

/**
 * `cache_hits_total` and `cache_misses_total`, labelled by cache name
 */
export function createCacheMetrics(meter: Meter): CacheMetrics {
  const hits: Counter = meter.createCounter('cache_hits_total', {
    description: 'Cache lookups answered from the cache'
  });
  const misses: Counter = meter.createCounter('cache_misses_total', {
    description: 'Cache lookups that had to compute the value'
  });

  return {
    hit: (cacheName) => hits.add(1, { 'cache.name': cacheName }),
    miss: (cacheName) => misses.add(1, { 'cache.name': cacheName })
  };
}
