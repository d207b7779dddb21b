#!/usr/bin/env node

/**
 * weather-hub command line
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createAppHost } from '../apphost/program';
import {
  consoleOutput,
  initDatabase,
  listZones,
  loadConfig,
  runApi,
  runAppHost,
  runWeb,
  writeManifest
} from './commands';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('weather-hub')
    .description('Weather zones and forecasts: API, front end and app host')
    .version('1.0.0')
    .option('-c, --config <file>', 'YAML configuration file');

  const configPath = (): string | undefined => program.opts<{ config?: string }>().config;

  program
    .command('api')
    .description('Run the weather API')
    .action(async () => {
      await runApi(loadConfig(configPath()));
    });

  program
    .command('web')
    .description('Run the MyWeatherHub front end')
    .action(async () => {
      await runWeb(loadConfig(configPath()));
    });

  const apphost = program
    .command('apphost')
    .description('Orchestrate containers and projects');

  apphost
    .command('run')
    .description('Start the containers, the API and the front end')
    .action(async () => {
      await runAppHost(createAppHost());
    });

  apphost
    .command('manifest')
    .description('Print the docker compose manifest for the containers')
    .option('-o, --output <file>', 'Write the manifest to a file')
    .action(async (options: { output?: string }) => {
      await writeManifest(createAppHost(), options.output);
    });

  const db = program
    .command('db')
    .description('Zone persistence');

  db
    .command('init')
    .description('Create the zones table and load the zones file into it')
    .action(async () => {
      const config = loadConfig(configPath());
      await initDatabase({ ...config, database: { ...config.database, enabled: true } });
    });

  db
    .command('zones')
    .description('List persisted zones')
    .option('-s, --state <state>', 'Only zones in this state')
    .action(async (options: { state?: string }) => {
      await listZones(loadConfig(configPath()), options.state);
    });

  return program;
}

if (require.main === module) {
  createProgram().parseAsync(process.argv).catch((error: unknown) => {
    consoleOutput.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
}
