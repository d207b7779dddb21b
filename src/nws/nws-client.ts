/**
 * HTTP client for the National Weather Service API
 */

import axios, { AxiosAdapter, AxiosInstance, isAxiosError } from 'axios';
import { NwsConfig } from '../config';
import { Logger, createApiLogger } from '../utils/logger';
import { NwsUpstreamError } from '../utils/error-handler';
import { ForecastResponse, forecastResponseSchema } from './schemas';

export interface ForecastSource {
  getZoneForecast(zoneId: string): Promise<ForecastResponse>;
}

export interface NwsClientOptions extends NwsConfig {
  /** Replaces the HTTP transport, used by tests */
  adapter?: AxiosAdapter;
}

export class NwsClient implements ForecastSource {
  private logger: Logger;
  private http: AxiosInstance;

  constructor(options: NwsClientOptions, logger?: Logger) {
    this.logger = logger || createApiLogger('nws-client');
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeout,
      adapter: options.adapter,
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'application/geo+json'
      }
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    this.http.interceptors.response.use(
      (response) => {
        this.logger.debug(`Request successful: ${response.config.url}`, {
          status: response.status
        }, 'request');
        return response;
      },
      (error: unknown) => {
        if (isAxiosError(error)) {
          this.logger.warn(`Request failed: ${error.config?.url}`, {
            status: error.response?.status,
            code: error.code
          }, 'request');
        }
        return Promise.reject(error);
      }
    );
  }

  /**
   * GET zones/forecast/{zoneId}/forecast
   */
  async getZoneForecast(zoneId: string): Promise<ForecastResponse> {
    const url = `zones/forecast/${encodeURIComponent(zoneId)}/forecast`;

    let body: unknown;
    try {
      const response = await this.http.get<unknown>(url);
      body = response.data;
    } catch (error) {
      if (isAxiosError(error)) {
        throw new NwsUpstreamError(
          `Forecast request for ${zoneId} failed: ${error.message}`,
          error.response?.status,
          'getZoneForecast',
          { zoneId, code: error.code }
        );
      }
      throw error;
    }

    const parsed = forecastResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new NwsUpstreamError(
        `Unexpected forecast document for ${zoneId}`,
        undefined,
        'getZoneForecast',
        { zoneId, issues: parsed.error.issues.length }
      );
    }
    return parsed.data;
  }
}
