/**
 * API composition: builds the weather API service from configuration
 */

import { AppConfig } from '../config';
import { createCacheMetrics } from '../cache/cache-metrics';
import { OutputCache } from '../cache/output-cache';
import { OutputCacheStore, createOutputCacheStore } from '../cache/output-cache-store';
import { openSqlClient } from '../db/connection';
import { ZoneRepository } from '../db/repositories/zone.repository';
import { SqlClient } from '../db/sql-client';
import { ForecastSource, NwsClient } from '../nws/nws-client';
import { NwsManager } from '../nws/nws-manager';
import { NWS_METER_NAME, createNwsMetrics } from '../nws/nws-metrics';
import { HealthCheckRegistry, Telemetry, createTelemetry } from '../service-defaults';
import { Logger, createApiLogger } from '../utils/logger';
import { ApiServer } from './api-server';

export { ApiServer } from './api-server';

export interface ApiDependencies {
  telemetry: Telemetry;
  forecastSource: ForecastSource;
  outputCacheStore: OutputCacheStore;
  /** Used when persistence is enabled instead of opening the configured database */
  sqlClient: SqlClient;
  logger: Logger;
}

export async function createApiServer(
  config: AppConfig,
  overrides: Partial<ApiDependencies> = {}
): Promise<ApiServer> {
  const logger = overrides.logger || createApiLogger();
  logger.setLevel(config.logLevel);
  const disposables: Array<() => Promise<void>> = [];

  const telemetry = overrides.telemetry || createTelemetry(config.telemetry);
  if (!overrides.telemetry) {
    disposables.push(() => telemetry.shutdown());
  }

  const store = overrides.outputCacheStore || createOutputCacheStore(config.cache, logger.createSubLogger('output-cache'));
  if (!overrides.outputCacheStore) {
    disposables.unshift(() => store.close());
  }

  const healthChecks = new HealthCheckRegistry();
  healthChecks.register('cache', async () => ({
    healthy: await store.ping(),
    message: `${store.kind} output cache`
  }));

  let repository: ZoneRepository | undefined;
  if (config.database.enabled) {
    const sqlClient = overrides.sqlClient || await openSqlClient(config.database);
    repository = new ZoneRepository(sqlClient);
    if (!overrides.sqlClient) {
      const owned = repository;
      disposables.unshift(() => owned.close());
    }
    await repository.ensureSchema();

    const zoneRepository = repository;
    healthChecks.register('database', async () => ({
      healthy: await zoneRepository.ping(),
      message: `${sqlClient.dialect} zone store`
    }));
  }

  const meter = telemetry.getMeter(NWS_METER_NAME);
  const cacheMetrics = createCacheMetrics(meter);

  const manager = new NwsManager({
    zonesFilePath: config.api.zonesFilePath,
    zonesCacheTtl: config.api.zonesCacheTtl,
    failureInjectionInterval: config.api.failureInjectionInterval,
    forecastSource: overrides.forecastSource || new NwsClient(config.nws, logger.createSubLogger('nws-client')),
    metrics: createNwsMetrics(meter),
    cacheMetrics,
    tracer: telemetry.getTracer(NWS_METER_NAME),
    zoneStore: repository,
    logger: logger.createSubLogger('nws-manager')
  });

  const outputCache = new OutputCache({
    store,
    keyPrefix: `${config.cache.keyPrefix}api:`,
    metrics: cacheMetrics,
    logger: logger.createSubLogger('output-cache')
  });

  return new ApiServer({
    name: 'api',
    host: config.api.host,
    port: config.api.port,
    telemetry,
    health: config.health,
    healthChecks,
    logger,
    disposables,
    manager,
    outputCache,
    zonesOutputCacheTtl: config.api.zonesOutputCacheTtl,
    forecastOutputCacheTtl: config.api.forecastOutputCacheTtl
  });
}
