/**
 * Client the web front end uses to reach the weather API
 */

import axios, { AxiosAdapter, AxiosInstance, isAxiosError } from 'axios';
import { z } from 'zod';
import { Forecast, Zone } from '../nws/types';
import { WeatherHubError, WeatherHubErrorType } from '../utils/error-handler';

const zoneSchema = z.object({
  key: z.string(),
  name: z.string(),
  state: z.string(),
  observationStations: z.array(z.string()).default([])
});

const forecastSchema = z.object({
  number: z.number(),
  name: z.string(),
  temperature: z.number().nullable().default(null),
  temperatureUnit: z.string().nullable().default(null),
  windSpeed: z.string().nullable().default(null),
  windDirection: z.string().nullable().default(null),
  detailedForecast: z.string()
});

export interface WeatherApi {
  getZones(): Promise<Zone[]>;
  getForecastByZone(zoneKey: string): Promise<Forecast[]>;
}

export interface WeatherApiClientOptions {
  baseUrl: string;
  timeout: number;
  adapter?: AxiosAdapter;
}

export class WeatherApiClient implements WeatherApi {
  private http: AxiosInstance;

  constructor(options: WeatherApiClientOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeout,
      adapter: options.adapter,
      headers: { Accept: 'application/json' }
    });
  }

  async getZones(): Promise<Zone[]> {
    return z.array(zoneSchema).parse(await this.fetch('/zones', 'getZones'));
  }

  async getForecastByZone(zoneKey: string): Promise<Forecast[]> {
    const path = `/forecast/${encodeURIComponent(zoneKey)}`;
    return z.array(forecastSchema).parse(await this.fetch(path, 'getForecastByZone'));
  }

  private async fetch(path: string, operation: string): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(path);
      return response.data;
    } catch (error) {
      if (isAxiosError(error)) {
        throw new WeatherHubError(
          `Weather API request ${path} failed: ${error.message}`,
          WeatherHubErrorType.UPSTREAM_ERROR,
          operation,
          { status: error.response?.status }
        );
      }
      throw error;
    }
  }
}
