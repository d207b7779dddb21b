/**
 * Weather Hub public surface
 */

export * from './nws/types';
export { NwsClient, ForecastSource } from './nws/nws-client';
export { NwsManager, NwsManagerOptions } from './nws/nws-manager';
export { createNwsMetrics, NWS_METER_NAME } from './nws/nws-metrics';
export { readZonesFile } from './nws/zones-file';
export { selectZones, mapForecasts, normalizeZoneId } from './nws/zones';

export { ConfigManager, AppConfig } from './config';

export { MemoryCache } from './cache/memory-cache';
export { OutputCache, OUTPUT_CACHE_HEADER } from './cache/output-cache';
export {
  OutputCacheStore,
  MemoryOutputCacheStore,
  RedisOutputCacheStore,
  createOutputCacheStore
} from './cache/output-cache-store';

export { ZoneRepository, ZoneStore } from './db/repositories/zone.repository';
export { openSqlClient } from './db/connection';

export { createTelemetry, HealthCheckRegistry } from './service-defaults';
export { HttpService } from './service-defaults/http-service';

export { createApiServer, ApiServer } from './api';
export { createWebServer, WebServer, WeatherApiClient } from './web';

export { DistributedApplicationBuilder, DistributedApplication } from './apphost/distributed-application';
export { buildTopology, createAppHost } from './apphost/program';

export * from './utils/error-handler';
export { Logger, LogLevel, defaultLogger } from './utils/logger';
