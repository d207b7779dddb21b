/**
 * Lifecycle shared by the API and web services
 */

import { Server } from 'http';
import express, { Application } from 'express';
import { HealthConfig } from '../config';
import { Logger } from '../utils/logger';
import { ErrorHandler } from '../utils/error-handler';
import { HealthCheckRegistry } from './health';
import { Telemetry } from './telemetry';
import {
  addServiceDefaults,
  mapDefaultEndpoints,
  problemDetailsErrorHandler,
  problemDetailsNotFound
} from './index';

export interface HttpServiceOptions {
  name: string;
  host: string;
  port: number;
  telemetry: Telemetry;
  health: HealthConfig;
  healthChecks?: HealthCheckRegistry;
  logger: Logger;
  /** Released after the server closes, in order */
  disposables?: Array<() => Promise<void>>;
}

export abstract class HttpService {
  protected readonly app: Application;
  protected readonly logger: Logger;
  protected readonly healthChecks: HealthCheckRegistry;
  protected readonly errorHandler: ErrorHandler;
  private server: Server | null = null;
  private routesInstalled = false;

  constructor(protected readonly options: HttpServiceOptions) {
    this.logger = options.logger;
    this.healthChecks = options.healthChecks || new HealthCheckRegistry();
    this.errorHandler = new ErrorHandler(this.logger.createSubLogger('errors'));
    this.app = express();
  }

  protected abstract setupRoutes(app: Application): void;

  /**
   * Routes go in on first use so subclasses finish constructing first
   */
  private installRoutes(): void {
    if (this.routesInstalled) {
      return;
    }
    this.routesInstalled = true;

    const defaults = {
      telemetry: this.options.telemetry,
      health: this.options.health,
      healthChecks: this.healthChecks,
      logger: this.logger
    };

    addServiceDefaults(this.app, defaults);
    this.setupRoutes(this.app);
    mapDefaultEndpoints(this.app, defaults);

    this.app.use(problemDetailsNotFound());
    this.app.use(problemDetailsErrorHandler(this.errorHandler));
  }

  async start(): Promise<void> {
    this.installRoutes();

    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.options.port, this.options.host, () => {
        this.logger.info(`${this.options.name} listening on ${this.getUrl()}`);
        resolve();
      });

      server.on('error', (error: Error) => {
        this.logger.error(`Failed to start ${this.options.name}`, error);
        reject(error);
      });

      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;

    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error?: Error) => (error ? reject(error) : resolve()));
      });
      this.logger.info(`${this.options.name} stopped`);
    }

    for (const dispose of this.options.disposables ?? []) {
      await dispose();
    }
  }

  getApp(): Application {
    this.installRoutes();
    return this.app;
  }

  /**
   * Port actually bound; differs from the configured one when that was 0
   */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.options.port;
  }

  getUrl(): string {
    const host = this.options.host === '0.0.0.0' ? 'localhost' : this.options.host;
    return `http://${host}:${this.getPort()}`;
  }
}
