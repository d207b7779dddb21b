/**
 * Actions behind the weather-hub command line
 */

import fs from 'fs/promises';
import chalk from 'chalk';
import { createApiServer } from '../api';
import { DistributedApplication } from '../apphost/distributed-application';
import { AppConfig, ConfigManager } from '../config';
import { openSqlClient } from '../db/connection';
import { ZoneRepository } from '../db/repositories/zone.repository';
import { readZonesFile } from '../nws/zones-file';
import { HttpService } from '../service-defaults/http-service';
import { createWebServer } from '../web';
import { defaultLogger } from '../utils/logger';
import { WeatherHubError, WeatherHubErrorType } from '../utils/error-handler';

export interface Output {
  log(message: string): void;
  error(message: string): void;
}

export const consoleOutput: Output = {
  log: (message) => console.log(message),
  error: (message) => console.error(message)
};

export function loadConfig(configPath?: string): AppConfig {
  const configManager = new ConfigManager({ configPath });
  const errors = configManager.validate();
  if (errors.length > 0) {
    throw new WeatherHubError(
      `Invalid configuration: ${errors.join('; ')}`,
      WeatherHubErrorType.CONFIGURATION_ERROR,
      'loadConfig'
    );
  }
  return configManager.getConfig();
}

/**
 * Resolve once SIGINT or SIGTERM arrives
 */
export function waitForShutdown(): Promise<string> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

async function serveUntilShutdown(server: HttpService, output: Output): Promise<void> {
  await server.start();
  output.log(chalk.green(`✓ Listening on ${server.getUrl()}`));

  const signal = await waitForShutdown();
  output.log(chalk.blue(`Received ${signal}, shutting down...`));
  await server.stop();
}

export async function runApi(config: AppConfig, output: Output = consoleOutput): Promise<void> {
  await serveUntilShutdown(await createApiServer(config), output);
}

export async function runWeb(config: AppConfig, output: Output = consoleOutput): Promise<void> {
  await serveUntilShutdown(createWebServer(config), output);
}

export async function runAppHost(app: DistributedApplication, output: Output = consoleOutput): Promise<void> {
  output.log(chalk.blue(`Starting ${app.name}...`));
  await app.run();

  for (const project of app.getProjects()) {
    const marker = project.isExternal() ? chalk.green('external') : chalk.gray('internal');
    output.log(`  ${chalk.bold(project.name)} ${project.getUrl()} (${marker})`);
  }

  const signal = await waitForShutdown();
  output.log(chalk.blue(`Received ${signal}, stopping ${app.name}...`));
  await app.stop();
  output.log(chalk.green('✓ Stopped'));
}

export async function writeManifest(app: DistributedApplication, outputFile: string | undefined, output: Output = consoleOutput): Promise<void> {
  const yamlText = app.manifestYaml();
  if (!outputFile) {
    output.log(yamlText);
    return;
  }

  await fs.writeFile(outputFile, yamlText, 'utf8');
  output.log(chalk.green(`✓ Manifest written to ${outputFile}`));
}

/**
 * Create the zones table and fill it from the zones file
 */
export async function initDatabase(config: AppConfig, output: Output = consoleOutput): Promise<number> {
  const client = await openSqlClient(config.database);
  const repository = new ZoneRepository(client);
  try {
    await repository.ensureSchema();

    const zones = await readZonesFile(config.api.zonesFilePath, defaultLogger.createSubLogger('db'));
    const written = await repository.upsertMany(zones);
    output.log(chalk.green(`✓ ${client.dialect} database ready, ${written} zones written`));
    return written;
  } finally {
    await repository.close();
  }
}

export async function listZones(config: AppConfig, state: string | undefined, output: Output = consoleOutput): Promise<number> {
  const client = await openSqlClient(config.database);
  const repository = new ZoneRepository(client);
  try {
    await repository.ensureSchema();

    const wanted = state?.toUpperCase();
    const zones = (await repository.findAll()).filter(zone => !wanted || zone.state === wanted);

    for (const zone of zones) {
      output.log(`${chalk.bold(zone.key)}  ${zone.name} (${zone.state})  ${chalk.gray(`${zone.observationStations.length} stations`)}`);
    }
    output.log(chalk.blue(`${zones.length} zones`));
    return zones.length;
  } finally {
    await repository.close();
  }
}
