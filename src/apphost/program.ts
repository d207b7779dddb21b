/**
 * Default app host topology and the in-process project launcher
 */

import { createApiServer } from '../api';
import { ConfigManager } from '../config';
import { createWebServer } from '../web';
import { Logger, createAppHostLogger } from '../utils/logger';
import { WeatherHubError, WeatherHubErrorType } from '../utils/error-handler';
import { ContainerRuntime, DockerComposeRuntime } from './container-runtime';
import {
  DistributedApplication,
  DistributedApplicationBuilder,
  ProjectEnvironment,
  ProjectKind,
  RunningProject
} from './distributed-application';

export interface AppHostOptions {
  postgresPassword?: string;
  runtime?: ContainerRuntime;
  logger?: Logger;
}

/**
 * cache (Redis with Commander), postgres/weatherdb, api, myweatherhub
 */
export function buildTopology(postgresPassword = 'postgres'): DistributedApplicationBuilder {
  const builder = new DistributedApplicationBuilder('weather-hub');

  const cache = builder.addRedis('cache').withRedisCommander();
  const weatherDb = builder.addPostgres('postgres', { password: postgresPassword }).addDatabase('weatherdb');

  const api = builder.addProject('api', 'api')
    .withReference(cache)
    .withReference(weatherDb);

  builder.addProject('myweatherhub', 'web')
    .withReference(api)
    .withReference(cache)
    .withExternalHttpEndpoints();

  return builder;
}

/**
 * Start a project in this process with only its injected environment on top of ours
 */
export async function launchProject(kind: ProjectKind, env: ProjectEnvironment): Promise<RunningProject> {
  const configManager = new ConfigManager({ env: { ...process.env, ...env } });

  const errors = configManager.validate();
  if (errors.length > 0) {
    throw new WeatherHubError(
      `Invalid configuration for ${kind}: ${errors.join('; ')}`,
      WeatherHubErrorType.CONFIGURATION_ERROR,
      'launchProject'
    );
  }

  const config = configManager.getConfig();
  const server = kind === 'api' ? await createApiServer(config) : createWebServer(config);
  await server.start();

  return {
    url: server.getUrl(),
    stop: () => server.stop()
  };
}

export function createAppHost(options: AppHostOptions = {}): DistributedApplication {
  const logger = options.logger || createAppHostLogger();
  const password = options.postgresPassword ?? process.env.POSTGRES_PASSWORD ?? 'postgres';

  return buildTopology(password).build(
    options.runtime || new DockerComposeRuntime(logger.createSubLogger('containers')),
    launchProject,
    logger
  );
}
