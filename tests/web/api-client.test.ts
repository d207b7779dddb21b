import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { ZodError } from 'zod';
import { WeatherApiClient } from '../../src/web/api-client';
import { WeatherHubError, WeatherHubErrorType } from '../../src/utils/error-handler';

function respond(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse {
  return { data, status, statusText: String(status), headers: {}, config };
}

describe('WeatherApiClient', () => {
  it('should fetch zones from the API', async () => {
    const urls: Array<string | undefined> = [];
    const adapter: AxiosAdapter = async (config) => {
      urls.push(config.url);
      return respond(config, 200, [{ key: 'WAZ558', name: 'Seattle Metro Test', state: 'WA' }]);
    };
    const client = new WeatherApiClient({ baseUrl: 'http://api.test', timeout: 1000, adapter });

    const zones = await client.getZones();

    expect(urls).toEqual(['/zones']);
    expect(zones).toEqual([{ key: 'WAZ558', name: 'Seattle Metro Test', state: 'WA', observationStations: [] }]);
  });

  it('should fetch a forecast with the zone in the path', async () => {
    const urls: Array<string | undefined> = [];
    const adapter: AxiosAdapter = async (config) => {
      urls.push(config.url);
      return respond(config, 200, [{ number: 1, name: 'Tonight', temperature: 50, detailedForecast: 'Clear.' }]);
    };
    const client = new WeatherApiClient({ baseUrl: 'http://api.test', timeout: 1000, adapter });

    const forecasts = await client.getForecastByZone('WAZ558');

    expect(urls).toEqual(['/forecast/WAZ558']);
    expect(forecasts).toEqual([{
      number: 1,
      name: 'Tonight',
      temperature: 50,
      temperatureUnit: null,
      windSpeed: null,
      windDirection: null,
      detailedForecast: 'Clear.'
    }]);
  });

  it('should report failed requests as upstream errors with the status', async () => {
    const adapter: AxiosAdapter = async (config) => {
      throw new AxiosError('Request failed with status code 500', 'ERR_BAD_RESPONSE', config, undefined, respond(config, 500, {}));
    };
    const client = new WeatherApiClient({ baseUrl: 'http://api.test', timeout: 1000, adapter });

    const error = await client.getForecastByZone('WAZ558').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(WeatherHubError);
    if (error instanceof WeatherHubError) {
      expect(error.context.errorType).toBe(WeatherHubErrorType.UPSTREAM_ERROR);
      expect(error.context.details).toEqual({ status: 500 });
    }
  });

  it('should reject bodies of the wrong shape', async () => {
    const adapter: AxiosAdapter = async (config) => respond(config, 200, { zones: [] });
    const client = new WeatherApiClient({ baseUrl: 'http://api.test', timeout: 1000, adapter });

    await expect(client.getZones()).rejects.toBeInstanceOf(ZodError);
  });
});
