import fs from 'fs';
import os from 'os';
import path from 'path';
import { ValidationError, WeatherHubError, WeatherHubErrorType } from '../../src/utils/error-handler';
import { zonesResponseSchema, forecastResponseSchema } from '../../src/nws/schemas';
import { mapForecasts, normalizeZoneId, selectZones } from '../../src/nws/zones';
import { readZonesFile } from '../../src/nws/zones-file';
import { FIXTURE_ZONES_FILE, capturingLogger, silentLogger } from '../support';

describe('selectZones', () => {
  const response = zonesResponseSchema.parse(JSON.parse(fs.readFileSync(FIXTURE_ZONES_FILE, 'utf8')));

  it('should drop zones without observation stations and keep the first of each key', () => {
    const zones = selectZones(response);

    expect(zones.map(zone => zone.key)).toEqual(['WAZ558', 'CAZ041', 'AKZ101']);
    expect(zones[0].name).toBe('Seattle Metro Test');
  });

  it('should map a missing state to an empty string', () => {
    const zone = selectZones(response).find(candidate => candidate.key === 'AKZ101');

    expect(zone).toEqual({
      key: 'AKZ101',
      name: 'North Test',
      state: '',
      observationStations: ['https://api.weather.gov/stations/KTS5']
    });
  });
});

describe('mapForecasts', () => {
  it('should keep the period order and fill missing values with null', () => {
    const response = forecastResponseSchema.parse({
      properties: {
        periods: [
          { number: 1, name: 'Tonight', temperature: 48, temperatureUnit: 'F', windSpeed: '5 mph', windDirection: 'S', detailedForecast: 'Clear.' },
          { number: 2, name: 'Saturday' }
        ]
      }
    });

    expect(mapForecasts(response)).toEqual([
      {
        number: 1,
        name: 'Tonight',
        temperature: 48,
        temperatureUnit: 'F',
        windSpeed: '5 mph',
        windDirection: 'S',
        detailedForecast: 'Clear.'
      },
      {
        number: 2,
        name: 'Saturday',
        temperature: null,
        temperatureUnit: null,
        windSpeed: null,
        windDirection: null,
        detailedForecast: ''
      }
    ]);
  });
});

describe('normalizeZoneId', () => {
  it('should trim and upper-case zone ids', () => {
    expect(normalizeZoneId(' waz558 ')).toBe('WAZ558');
    expect(normalizeZoneId('wac033')).toBe('WAC033');
  });

  it('should reject ids that are not zone ids', () => {
    expect(() => normalizeZoneId('WA558')).toThrow(ValidationError);
    expect(() => normalizeZoneId('../zones')).toThrow('Invalid zone id: ../zones');
    expect(() => normalizeZoneId('')).toThrow(ValidationError);
  });
});

describe('readZonesFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'weather-hub-zones-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read and select zones from a feature collection', async () => {
    const zones = await readZonesFile(FIXTURE_ZONES_FILE, silentLogger());

    expect(zones).toHaveLength(3);
  });

  it('should select the bundled zones', async () => {
    const zones = await readZonesFile(path.join(__dirname, '..', '..', 'data', 'zones.json'), silentLogger());
    const keys = zones.map(zone => zone.key);

    expect(zones.length).toBeGreaterThan(0);
    expect(new Set(keys).size).toBe(keys.length);
    expect(zones.every(zone => zone.observationStations.length > 0)).toBe(true);
  });

  it('should warn and return no zones when the file is missing', async () => {
    const { logger, entries } = capturingLogger();

    await expect(readZonesFile(path.join(tempDir, 'none.json'), logger)).resolves.toEqual([]);
    expect(entries[0].message).toBe('Zones file not found');
  });

  it('should reject files that are not zone collections', async () => {
    const notJson = path.join(tempDir, 'broken.json');
    const wrongShape = path.join(tempDir, 'wrong.json');
    fs.writeFileSync(notJson, '{ features: ');
    fs.writeFileSync(wrongShape, JSON.stringify({ features: [{ properties: { name: 'no id' } }] }));

    const parseError = await readZonesFile(notJson, silentLogger()).catch((error: unknown) => error);
    const shapeError = await readZonesFile(wrongShape, silentLogger()).catch((error: unknown) => error);

    expect(parseError).toBeInstanceOf(WeatherHubError);
    expect(shapeError).toBeInstanceOf(WeatherHubError);
    if (shapeError instanceof WeatherHubError) {
      expect(shapeError.context.errorType).toBe(WeatherHubErrorType.CONFIGURATION_ERROR);
      expect(shapeError.message).toBe('Zones file is not a zone feature collection');
    }
  });
});
