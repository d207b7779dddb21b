/**
 * Web composition: builds the MyWeatherHub front end from configuration
 */

import { AppConfig } from '../config';
import { createCacheMetrics } from '../cache/cache-metrics';
import { OutputCache } from '../cache/output-cache';
import { OutputCacheStore, createOutputCacheStore } from '../cache/output-cache-store';
import { HealthCheckRegistry, Telemetry, createTelemetry } from '../service-defaults';
import { Logger, createWebLogger } from '../utils/logger';
import { WeatherApi, WeatherApiClient } from './api-client';
import { TemplateRenderer } from './template-renderer';
import { WebServer } from './web-server';

export { WebServer } from './web-server';
export { WeatherApi, WeatherApiClient } from './api-client';

export interface WebDependencies {
  telemetry: Telemetry;
  api: WeatherApi;
  outputCacheStore: OutputCacheStore;
  renderer: TemplateRenderer;
  logger: Logger;
}

export function createWebServer(
  config: AppConfig,
  overrides: Partial<WebDependencies> = {}
): WebServer {
  const logger = overrides.logger || createWebLogger();
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

  const healthChecks = new HealthCheckRegistry().register('cache', async () => ({
    healthy: await store.ping(),
    message: `${store.kind} output cache`
  }));

  const outputCache = new OutputCache({
    store,
    keyPrefix: `${config.cache.keyPrefix}web:`,
    metrics: createCacheMetrics(telemetry.getMeter('MyWeatherHub')),
    logger: logger.createSubLogger('output-cache')
  });

  return new WebServer({
    name: 'myweatherhub',
    host: config.web.host,
    port: config.web.port,
    telemetry,
    health: config.health,
    healthChecks,
    logger,
    disposables,
    api: overrides.api || new WeatherApiClient({ baseUrl: config.web.apiUrl, timeout: config.web.requestTimeout }),
    outputCache,
    renderer: overrides.renderer || new TemplateRenderer(),
    pageSize: config.web.pageSize,
    outputCacheTtl: config.web.outputCacheTtl
  });
}
