/**
 * Container runtime used by the app host to provision backing services
 */

import { spawn } from 'child_process';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { Logger } from '../utils/logger';

export interface ComposeHealthcheck {
  test: string[];
  interval: string;
  timeout: string;
  retries: number;
}

export interface ComposeService {
  image: string;
  ports?: string[];
  environment?: Record<string, string>;
  depends_on?: string[];
  healthcheck?: ComposeHealthcheck;
}

export interface ComposeFile {
  name: string;
  services: Record<string, ComposeService>;
}

export interface ContainerRuntime {
  up(compose: ComposeFile): Promise<void>;
  down(compose: ComposeFile): Promise<void>;
}

export interface DockerComposeRuntimeOptions {
  /** Executable; `docker` runs `docker compose ...` */
  command: string;
  timeout: number; // milliseconds
  workDirectory: string;
}

export function serializeCompose(compose: ComposeFile): string {
  return yaml.dump(compose, { noRefs: true, lineWidth: -1 });
}

/**
 * Runs `docker compose` against a generated compose file
 */
export class DockerComposeRuntime implements ContainerRuntime {
  private options: DockerComposeRuntimeOptions;

  constructor(private logger: Logger, options: Partial<DockerComposeRuntimeOptions> = {}) {
    this.options = {
      command: 'docker',
      timeout: 300000,
      workDirectory: path.join(os.tmpdir(), 'weather-hub'),
      ...options
    };
  }

  async up(compose: ComposeFile): Promise<void> {
    const file = await this.writeComposeFile(compose);
    this.logger.info('Starting containers', { project: compose.name, services: Object.keys(compose.services) });
    await this.execute(['compose', '-p', compose.name, '-f', file, 'up', '-d', '--wait']);
  }

  async down(compose: ComposeFile): Promise<void> {
    const file = await this.writeComposeFile(compose);
    this.logger.info('Stopping containers', { project: compose.name });
    await this.execute(['compose', '-p', compose.name, '-f', file, 'down']);
  }

  private async writeComposeFile(compose: ComposeFile): Promise<string> {
    await fs.mkdir(this.options.workDirectory, { recursive: true });
    const file = path.join(this.options.workDirectory, `${compose.name}.compose.yaml`);
    await fs.writeFile(file, serializeCompose(compose), 'utf8');
    return file;
  }

  private execute(args: string[]): Promise<string> {
    const command = `${this.options.command} ${args.join(' ')}`;

    return new Promise((resolve, reject) => {
      const child = spawn(this.options.command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

      let output = '';
      let errorOutput = '';

      child.stdout.on('data', (data: Buffer) => {
        output += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        errorOutput += data.toString();
      });

      const timeoutId = setTimeout(() => {
        child.kill('SIGTERM');
        reject(new Error(`Command timed out after ${this.options.timeout}ms: ${command}`));
      }, this.options.timeout);

      child.on('close', (code) => {
        clearTimeout(timeoutId);

        if (code === 0) {
          this.logger.debug('Command finished', { command });
          resolve(output);
        } else {
          reject(new Error(`Command failed with exit code ${code}: ${command}\n${errorOutput}`));
        }
      });

      child.on('error', (err) => {
        clearTimeout(timeoutId);
        reject(err);
      });
    });
  }
}
