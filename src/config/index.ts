/**
 * Configuration Management Module
 *
 * Built-in defaults, then an optional YAML file, then environment variables
 * (including the connection strings and service endpoints the app host injects).
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { EnvLoader, EnvReader, EnvSource } from './env';
import { LogLevel, parseLogLevel, defaultLogger } from '../utils/logger';

export type Environment = 'development' | 'staging' | 'production';

export type DatabaseClient = 'postgres' | 'sqlite';

export interface NwsConfig {
  baseUrl: string;
  userAgent: string;
  timeout: number; // milliseconds
}

export interface ApiConfig {
  host: string;
  port: number;
  zonesFilePath: string;
  zonesCacheTtl: number; // milliseconds
  zonesOutputCacheTtl: number; // milliseconds
  forecastOutputCacheTtl: number; // milliseconds
  /** Every Nth forecast request fails on purpose; 0 disables */
  failureInjectionInterval: number;
}

export interface WebConfig {
  host: string;
  port: number;
  apiUrl: string;
  pageSize: number;
  outputCacheTtl: number; // milliseconds
  requestTimeout: number; // milliseconds
}

export interface CacheConfig {
  /** Redis connection string; the in-memory store is used without one */
  connectionString?: string;
  keyPrefix: string;
  maxItems: number;
}

export interface DatabaseConfig {
  enabled: boolean;
  client: DatabaseClient;
  connectionString?: string;
  filename: string;
}

export interface TelemetryConfig {
  serviceName: string;
  otlpEndpoint?: string;
  prometheusEnabled: boolean;
  exportIntervalMillis: number;
}

export interface HealthConfig {
  enabled: boolean;
}

export interface AppConfig {
  environment: Environment;
  logLevel: LogLevel;
  nws: NwsConfig;
  api: ApiConfig;
  web: WebConfig;
  cache: CacheConfig;
  database: DatabaseConfig;
  telemetry: TelemetryConfig;
  health: HealthConfig;
}

const environmentSchema = z.enum(['development', 'staging', 'production']);

const fileConfigSchema = z.object({
  environment: environmentSchema.optional(),
  logLevel: z.nativeEnum(LogLevel).optional(),
  nws: z.object({
    baseUrl: z.string().url(),
    userAgent: z.string().min(1),
    timeout: z.number().int().positive()
  }).partial().optional(),
  api: z.object({
    host: z.string(),
    port: z.number().int(),
    zonesFilePath: z.string(),
    zonesCacheTtl: z.number().int().positive(),
    zonesOutputCacheTtl: z.number().int().positive(),
    forecastOutputCacheTtl: z.number().int().positive(),
    failureInjectionInterval: z.number().int().nonnegative()
  }).partial().optional(),
  web: z.object({
    host: z.string(),
    port: z.number().int(),
    apiUrl: z.string().url(),
    pageSize: z.number().int().positive(),
    outputCacheTtl: z.number().int().positive(),
    requestTimeout: z.number().int().positive()
  }).partial().optional(),
  cache: z.object({
    connectionString: z.string(),
    keyPrefix: z.string(),
    maxItems: z.number().int().positive()
  }).partial().optional(),
  database: z.object({
    enabled: z.boolean(),
    client: z.enum(['postgres', 'sqlite']),
    connectionString: z.string(),
    filename: z.string()
  }).partial().optional(),
  telemetry: z.object({
    serviceName: z.string().min(1),
    otlpEndpoint: z.string().url(),
    prometheusEnabled: z.boolean(),
    exportIntervalMillis: z.number().int().positive()
  }).partial().optional(),
  health: z.object({
    enabled: z.boolean()
  }).partial().optional()
}).strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export interface ConfigManagerOptions {
  /** YAML file to read; defaults to `WEATHER_HUB_CONFIG` or `./config/weather-hub.yaml` */
  configPath?: string;
  /** Environment to read overrides from; defaults to `process.env` */
  env?: EnvSource;
  /** Service name used when `OTEL_SERVICE_NAME` is not set */
  serviceName?: string;
}

const logger = defaultLogger.createSubLogger('config');

export class ConfigManager {
  private config: AppConfig;
  private readonly configPath: string;
  private readonly env: EnvReader;
  private readonly serviceName: string;

  constructor(options: ConfigManagerOptions = {}) {
    if (!options.env) {
      EnvLoader.initialize();
    }
    this.env = new EnvReader(options.env ?? process.env);
    this.configPath = options.configPath
      || this.env.get('WEATHER_HUB_CONFIG')
      || path.join(process.cwd(), 'config', 'weather-hub.yaml');
    this.serviceName = options.serviceName || 'weather-hub';
    this.config = this.loadDefaultConfig();
    this.loadConfig();
  }

  getConfig(): AppConfig {
    return { ...this.config };
  }

  getNwsConfig(): NwsConfig {
    return { ...this.config.nws };
  }

  getApiConfig(): ApiConfig {
    return { ...this.config.api };
  }

  getWebConfig(): WebConfig {
    return { ...this.config.web };
  }

  getCacheConfig(): CacheConfig {
    return { ...this.config.cache };
  }

  getDatabaseConfig(): DatabaseConfig {
    return { ...this.config.database };
  }

  getTelemetryConfig(): TelemetryConfig {
    return { ...this.config.telemetry };
  }

  getHealthConfig(): HealthConfig {
    return { ...this.config.health };
  }

  updateConfig(updates: FileConfig): void {
    this.config = mergeConfig(this.config, updates);
  }

  reload(): void {
    this.config = this.loadDefaultConfig();
    this.loadConfig();
  }

  private loadConfig(): void {
    try {
      const fileConfig = this.loadFileConfig();
      if (fileConfig) {
        this.config = mergeConfig(this.config, fileConfig);
      }
    } catch (error) {
      logger.warn('Failed to load configuration file', {
        path: this.configPath,
        error: error instanceof Error ? error.message : String(error)
      });
    }

    this.applyEnvironmentOverrides();
  }

  private loadFileConfig(): FileConfig | null {
    if (!fs.existsSync(this.configPath)) {
      return null;
    }

    const raw = yaml.load(fs.readFileSync(this.configPath, 'utf8'));
    if (raw === undefined || raw === null) {
      return null;
    }

    const parsed = fileConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Invalid configuration file: ${issues.join('; ')}`);
    }
    return parsed.data;
  }

  private applyEnvironmentOverrides(): void {
    const env = this.env;

    const environment = environmentSchema.safeParse(env.get('NODE_ENV'));
    if (environment.success) {
      this.config.environment = environment.data;
      this.config.health.enabled = environment.data === 'development';
    }

    if (env.get('LOG_LEVEL')) {
      this.config.logLevel = parseLogLevel(env.get('LOG_LEVEL'), this.config.logLevel);
    }

    // Weather service
    this.config.nws.baseUrl = env.get('NWS_BASE_URL', this.config.nws.baseUrl) ?? this.config.nws.baseUrl;
    this.config.nws.userAgent = env.get('NWS_USER_AGENT', this.config.nws.userAgent) ?? this.config.nws.userAgent;

    // Ports: PORT is what the app host hands to each project
    const port = env.getNumber('PORT');
    this.config.api.port = env.getNumber('API_PORT', port ?? this.config.api.port) ?? this.config.api.port;
    this.config.web.port = env.getNumber('WEB_PORT', port ?? this.config.web.port) ?? this.config.web.port;

    this.config.api.zonesFilePath = env.get('ZONES_FILE', this.config.api.zonesFilePath) ?? this.config.api.zonesFilePath;
    this.config.api.failureInjectionInterval = env.getNumber(
      'FAILURE_INJECTION_INTERVAL',
      this.config.api.failureInjectionInterval
    ) ?? this.config.api.failureInjectionInterval;

    // Service discovery
    const apiEndpoint = env.getServiceEndpoint('api');
    if (apiEndpoint) {
      this.config.web.apiUrl = apiEndpoint;
    }

    // Output cache
    const cacheConnection = env.getConnectionString('cache');
    if (cacheConnection) {
      this.config.cache.connectionString = cacheConnection;
    }

    // Database
    const databaseConnection = env.getConnectionString('weatherdb');
    if (databaseConnection) {
      this.config.database.connectionString = databaseConnection;
      this.config.database.client = 'postgres';
      this.config.database.enabled = true;
    }
    const client = env.get('DATABASE_CLIENT');
    if (client === 'postgres' || client === 'sqlite') {
      this.config.database.client = client;
    }
    this.config.database.enabled = env.getBoolean('DATABASE_ENABLED', this.config.database.enabled) ?? this.config.database.enabled;
    this.config.database.filename = env.get('DATABASE_FILE', this.config.database.filename) ?? this.config.database.filename;

    // Telemetry
    this.config.telemetry.serviceName = env.get('OTEL_SERVICE_NAME', this.config.telemetry.serviceName) ?? this.config.telemetry.serviceName;
    const otlpEndpoint = env.get('OTEL_EXPORTER_OTLP_ENDPOINT');
    if (otlpEndpoint) {
      this.config.telemetry.otlpEndpoint = otlpEndpoint;
    }
    this.config.telemetry.prometheusEnabled = env.getBoolean(
      'PROMETHEUS_ENABLED',
      this.config.telemetry.prometheusEnabled
    ) ?? this.config.telemetry.prometheusEnabled;

    this.config.health.enabled = env.getBoolean('HEALTH_ENDPOINTS_ENABLED', this.config.health.enabled) ?? this.config.health.enabled;
  }

  private loadDefaultConfig(): AppConfig {
    return {
      environment: 'development',
      logLevel: LogLevel.INFO,
      nws: {
        baseUrl: 'https://api.weather.gov/',
        userAgent: 'weather-hub demo (contact@example.com)',
        timeout: 10000
      },
      api: {
        host: '0.0.0.0',
        port: 5000,
        zonesFilePath: path.join(process.cwd(), 'data', 'zones.json'),
        zonesCacheTtl: 3600000, // 1 hour
        zonesOutputCacheTtl: 3600000, // 1 hour
        forecastOutputCacheTtl: 900000, // 15 minutes
        failureInjectionInterval: 5
      },
      web: {
        host: '0.0.0.0',
        port: 5001,
        apiUrl: 'http://localhost:5000',
        pageSize: 10,
        outputCacheTtl: 5000,
        requestTimeout: 15000
      },
      cache: {
        keyPrefix: 'weather-hub:',
        maxItems: 1000
      },
      database: {
        enabled: false,
        client: 'sqlite',
        filename: path.join(process.cwd(), 'data', 'weather-hub.db')
      },
      telemetry: {
        serviceName: this.serviceName,
        prometheusEnabled: true,
        exportIntervalMillis: 15000
      },
      health: {
        enabled: true
      }
    };
  }

  validate(): string[] {
    const errors: string[] = [];
    const { api, web, nws, database, telemetry } = this.config;

    for (const [name, port] of [['API', api.port], ['Web', web.port]] as const) {
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        errors.push(`${name} port must be an integer between 0 and 65535`);
      }
    }

    if (!Number.isInteger(api.failureInjectionInterval) || api.failureInjectionInterval < 0) {
      errors.push('Failure injection interval must be a non-negative integer');
    }

    if (!isUrl(nws.baseUrl)) {
      errors.push('NWS base URL must be an absolute URL');
    }

    if (!isUrl(web.apiUrl)) {
      errors.push('API URL must be an absolute URL');
    }

    if (web.pageSize < 1) {
      errors.push('Page size must be at least 1');
    }

    if (database.enabled && database.client === 'postgres' && !database.connectionString) {
      errors.push('Database connection string is required when PostgreSQL persistence is enabled');
    }

    if (telemetry.otlpEndpoint && !isUrl(telemetry.otlpEndpoint)) {
      errors.push('OTLP endpoint must be an absolute URL');
    }

    return errors;
  }
}

function isUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Merge a partial configuration into a complete one, section by section
 */
export function mergeConfig(base: AppConfig, updates: FileConfig): AppConfig {
  return {
    environment: updates.environment ?? base.environment,
    logLevel: updates.logLevel ?? base.logLevel,
    nws: { ...base.nws, ...updates.nws },
    api: { ...base.api, ...updates.api },
    web: { ...base.web, ...updates.web },
    cache: { ...base.cache, ...updates.cache },
    database: { ...base.database, ...updates.database },
    telemetry: { ...base.telemetry, ...updates.telemetry },
    health: { ...base.health, ...updates.health }
  };
}
