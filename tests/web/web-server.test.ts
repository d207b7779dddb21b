import request from 'supertest';
import { MemoryOutputCacheStore } from '../../src/cache/output-cache-store';
import { Forecast, Zone } from '../../src/nws/types';
import { WebServer, WeatherApi, createWebServer } from '../../src/web';
import { TestTelemetry, createTestTelemetry, silentLogger, testConfig } from '../support';

class StubWeatherApi implements WeatherApi {
  zoneCalls = 0;
  forecastCalls: string[] = [];
  zonesFailure: Error | null = null;
  forecastFailure: Error | null = null;

  constructor(private readonly zones: Zone[]) {}

  async getZones(): Promise<Zone[]> {
    this.zoneCalls++;
    if (this.zonesFailure) {
      throw this.zonesFailure;
    }
    return this.zones;
  }

  async getForecastByZone(zoneKey: string): Promise<Forecast[]> {
    this.forecastCalls.push(zoneKey);
    if (this.forecastFailure) {
      throw this.forecastFailure;
    }
    return [{
      number: 1,
      name: 'Tonight',
      temperature: 52,
      temperatureUnit: 'F',
      windSpeed: '5 mph',
      windDirection: 'SW',
      detailedForecast: 'Patchy fog after midnight.'
    }];
  }
}

function makeZones(count: number): Zone[] {
  return Array.from({ length: count }, (_, index) => {
    const number = String(index + 1).padStart(3, '0');
    return {
      key: `${index % 2 === 0 ? 'WA' : 'CA'}Z${number}`,
      name: `Test Zone ${number}`,
      state: index % 2 === 0 ? 'WA' : 'CA',
      observationStations: [`KT${number}`]
    };
  });
}

describe('Web server', () => {
  let test: TestTelemetry;
  let api: StubWeatherApi;
  let store: MemoryOutputCacheStore;
  let server: WebServer;

  beforeEach(() => {
    test = createTestTelemetry();
    api = new StubWeatherApi(makeZones(12));
    store = new MemoryOutputCacheStore();
    server = createWebServer(testConfig(), {
      telemetry: test.telemetry,
      api,
      outputCacheStore: store,
      logger: silentLogger()
    });
  });

  afterEach(async () => {
    await server.stop();
    await store.close();
    await test.telemetry.shutdown();
  });

  it('should render the MyWeatherHub home page', async () => {
    const response = await request(server.getApp()).get('/').expect(200);

    expect(response.headers['content-type']).toMatch(/text\/html/);
    expect(response.text).toContain('<title>MyWeatherHub</title>');
    expect(response.text).toContain('<h1>MyWeatherHub</h1>');
    expect(response.text).toContain('<td>Test Zone 001</td>');
    expect(response.text).toContain('<span>Page 1 of 2 (12 zones)</span>');
  });

  it('should page through the zones', async () => {
    const response = await request(server.getApp()).get('/?page=2').expect(200);

    expect(response.text).toContain('<td>Test Zone 011</td>');
    expect(response.text).not.toContain('<td>Test Zone 001</td>');
    expect(response.text).toContain('<a href="/">Previous</a>');
  });

  it('should filter the zones by state', async () => {
    const response = await request(server.getApp()).get('/?state=ca').expect(200);

    expect(response.text).toContain('<td>Test Zone 002</td>');
    expect(response.text).not.toContain('<td>Test Zone 001</td>');
    expect(response.text).toContain('value="ca"');
    expect(response.text).toContain('<span>Page 1 of 1 (6 zones)</span>');
  });

  it('should show the forecast for the selected zone', async () => {
    const response = await request(server.getApp()).get('/?zone=caz002').expect(200);

    expect(api.forecastCalls).toEqual(['CAZ002']);
    expect(response.text).toContain('<h2>Test Zone 002, CA (CAZ002)</h2>');
    expect(response.text).toContain('<td>Tonight</td><td>52°F</td><td>5 mph SW</td><td>Patchy fog after midnight.</td>');
  });

  it('should say so when the forecast cannot be loaded', async () => {
    api.forecastFailure = new Error('Simulated failure on forecast request 5');

    const response = await request(server.getApp()).get('/?zone=WAZ001').expect(200);

    expect(response.text).toContain(
      '<p class="error">The forecast for Test Zone 001, WA (WAZ001) is unavailable right now. Please try again.</p>'
    );
  });

  it('should still render when the zones cannot be loaded', async () => {
    api.zonesFailure = new Error('connect ECONNREFUSED');

    const response = await request(server.getApp()).get('/').expect(200);

    expect(response.text).toContain('<h1>MyWeatherHub</h1>');
    expect(response.text).toContain('<p class="error">Zones are unavailable right now. Please try again later.</p>');
    expect(response.text).toContain('No zones match the filter.');
  });

  it('should not keep a page showing a failure in the output cache', async () => {
    api.forecastFailure = new Error('Simulated failure on forecast request 5');
    const failed = await request(server.getApp()).get('/?zone=WAZ001').expect(200);
    api.forecastFailure = null;

    const retried = await request(server.getApp()).get('/?zone=WAZ001').expect(200);

    expect(failed.headers['cache-control']).toBe('no-store');
    expect(retried.headers['x-output-cache']).toBe('MISS');
    expect(retried.text).toContain('<td>Tonight</td><td>52°F</td><td>5 mph SW</td><td>Patchy fog after midnight.</td>');
    expect(api.forecastCalls).toEqual(['WAZ001', 'WAZ001']);
  });

  it('should escape filter values echoed into the page', async () => {
    const response = await request(server.getApp()).get('/?name=%22%3E%3Cscript%3E').expect(200);

    expect(response.text).toContain('value="&quot;&gt;&lt;script&gt;"');
    expect(response.text).not.toContain('"><script>');
  });

  it('should answer the same query from the output cache', async () => {
    await request(server.getApp()).get('/?state=WA').expect(200);
    const repeat = await request(server.getApp()).get('/?state=WA').expect(200);
    await request(server.getApp()).get('/?state=CA').expect(200);

    expect(repeat.headers['x-output-cache']).toBe('HIT');
    expect(api.zoneCalls).toBe(2);
  });
});
