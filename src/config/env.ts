import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

export type EnvSource = Record<string, string | undefined>;

/**
 * Loads `.env` files into `process.env` once per process
 */
export class EnvLoader {
  private static initialized = false;

  public static initialize(cwd: string = process.cwd()): void {
    if (this.initialized) {
      return;
    }

    // First file found wins; variables already set are never overwritten
    const envPaths = [path.join(cwd, '.env.local'), path.join(cwd, '.env')];

    for (const envPath of envPaths) {
      if (fs.existsSync(envPath)) {
        dotenv.config({ path: envPath });
        break;
      }
    }

    this.initialized = true;
  }
}

/**
 * Typed reads over an environment map
 */
export class EnvReader {
  constructor(private readonly source: EnvSource = process.env) {}

  get(key: string, defaultValue?: string): string | undefined {
    const value = this.source[key];
    return value === undefined || value === '' ? defaultValue : value;
  }

  getNumber(key: string, defaultValue?: number): number | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    const num = parseFloat(value);
    return isNaN(num) ? defaultValue : num;
  }

  getBoolean(key: string, defaultValue?: boolean): boolean | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    const lowerValue = value.toLowerCase();
    return lowerValue === 'true' || lowerValue === '1' || lowerValue === 'yes';
  }

  getArray(key: string, defaultValue?: string[]): string[] | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  }

  /**
   * Connection string injected by the app host, e.g. `ConnectionStrings__cache`
   */
  getConnectionString(name: string): string | undefined {
    return this.get(`ConnectionStrings__${name}`);
  }

  /**
   * Endpoint of another service injected by the app host.
   * `services__{name}__https__0` is preferred over `services__{name}__http__0`.
   */
  getServiceEndpoint(name: string): string | undefined {
    return this.get(`services__${name}__https__0`) ?? this.get(`services__${name}__http__0`);
  }

  validateRequired(requiredKeys: string[]): void {
    const missingKeys = requiredKeys.filter(key => this.get(key) === undefined);

    if (missingKeys.length > 0) {
      throw new Error(`Missing required environment variables: ${missingKeys.join(', ')}`);
    }
  }
}
