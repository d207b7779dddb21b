/**
 * Zone and forecast retrieval behind the API endpoints
 */

import { SpanStatusCode, Tracer } from '@opentelemetry/api';
import { CacheMetrics } from '../cache/cache-metrics';
import { MemoryCache } from '../cache/memory-cache';
import { ZoneStore } from '../db/repositories/zone.repository';
import { Logger, createApiLogger } from '../utils/logger';
import {
  InjectedFailureError,
  WeatherHubError,
  WeatherHubErrorType,
  toError
} from '../utils/error-handler';
import { ForecastSource } from './nws-client';
import { NwsMetrics } from './nws-metrics';
import { Forecast, Zone } from './types';
import { mapForecasts, normalizeZoneId } from './zones';
import { readZonesFile } from './zones-file';

export const ZONES_CACHE_KEY = 'zones';

export interface NwsManagerOptions {
  zonesFilePath: string;
  /** Absolute expiration of the cached zone list (milliseconds) */
  zonesCacheTtl: number;
  /** Every Nth forecast call throws; 0 disables */
  failureInjectionInterval: number;
  forecastSource: ForecastSource;
  metrics: NwsMetrics;
  cacheMetrics: CacheMetrics;
  tracer: Tracer;
  /** Zones are mirrored here after each load when set */
  zoneStore?: ZoneStore;
  zonesCache?: MemoryCache<Zone[]>;
  logger?: Logger;
}

export class NwsManager {
  private logger: Logger;
  private zonesCache: MemoryCache<Zone[]>;
  private forecastRequestCount = 0;

  constructor(private readonly options: NwsManagerOptions) {
    this.logger = options.logger || createApiLogger('nws-manager');
    this.zonesCache = options.zonesCache || new MemoryCache<Zone[]>({ maxItems: 1, cleanupInterval: 0 });
  }

  /**
   * Zone list, cached for `zonesCacheTtl` after each load
   */
  async getZones(): Promise<Zone[]> {
    const { value, hit } = await this.zonesCache.getOrCreate(
      ZONES_CACHE_KEY,
      () => this.loadZones(),
      this.options.zonesCacheTtl
    );

    if (hit) {
      this.options.cacheMetrics.hit(ZONES_CACHE_KEY);
    } else {
      this.options.cacheMetrics.miss(ZONES_CACHE_KEY);
    }
    return value;
  }

  /**
   * Forecast periods for a zone, in the order the weather service lists them
   */
  async getForecastByZone(zoneId: string): Promise<Forecast[]> {
    const key = normalizeZoneId(zoneId);

    return this.options.tracer.startActiveSpan('GetForecastByZone', {
      attributes: { 'zone.id': key }
    }, async (span) => {
      const started = process.hrtime.bigint();
      this.options.metrics.recordRequest(key);

      try {
        this.forecastRequestCount++;
        const interval = this.options.failureInjectionInterval;
        if (interval > 0 && this.forecastRequestCount % interval === 0) {
          throw new InjectedFailureError(
            `Simulated failure on forecast request ${this.forecastRequestCount}`,
            'getForecastByZone',
            { zoneId: key }
          );
        }

        const forecasts = mapForecasts(await this.options.forecastSource.getZoneForecast(key));
        span.setAttribute('forecast.periods', forecasts.length);
        return forecasts;
      } catch (caught) {
        const error = toError(caught);
        const errorType = error instanceof WeatherHubError ? error.context.errorType : WeatherHubErrorType.UNKNOWN_ERROR;

        this.options.metrics.recordFailure(errorType, key);
        span.recordException(error);
        span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
        this.logger.error(`Failed to get forecast for ${key}`, error, { errorType }, 'getForecastByZone');
        throw error;
      } finally {
        this.options.metrics.recordDuration(Number(process.hrtime.bigint() - started) / 1e9, key);
        span.end();
      }
    });
  }

  /**
   * Forecast calls made so far, failed ones included
   */
  getForecastRequestCount(): number {
    return this.forecastRequestCount;
  }

  invalidateZones(): void {
    this.zonesCache.delete(ZONES_CACHE_KEY);
  }

  private async loadZones(): Promise<Zone[]> {
    const zones = await readZonesFile(this.options.zonesFilePath, this.logger);
    this.logger.info(`Loaded ${zones.length} zones`, { path: this.options.zonesFilePath }, 'loadZones');

    const store = this.options.zoneStore;
    if (store && zones.length > 0) {
      try {
        const written = await store.upsertMany(zones);
        this.logger.debug(`Persisted ${written} zones`, undefined, 'loadZones');
      } catch (caught) {
        const error = toError(caught);
        this.logger.error('Failed to persist zones', error, undefined, 'loadZones');
        throw new WeatherHubError(
          `Failed to persist zones: ${error.message}`,
          WeatherHubErrorType.DATABASE_ERROR,
          'loadZones'
        );
      }
    }

    return zones;
  }
}
