import { Forecast, Zone } from './types';
import { ForecastPeriod, ForecastResponse, ZoneFeature, ZonesResponse } from './schemas';
import { ValidationError } from '../utils/error-handler';

const ZONE_ID_PATTERN = /^[A-Z]{2}[CZ]\d{3}$/;

export function hasObservationStations(feature: ZoneFeature): boolean {
  return (feature.properties.observationStations?.length ?? 0) > 0;
}

export function toZone(feature: ZoneFeature): Zone {
  const { id, name, state, observationStations } = feature.properties;
  return {
    key: id,
    name,
    state: state ?? '',
    observationStations: observationStations ?? []
  };
}

/**
 * Zones that have observation stations, first occurrence of each key kept,
 * in document order
 */
export function selectZones(response: ZonesResponse): Zone[] {
  const seen = new Set<string>();
  const zones: Zone[] = [];

  for (const feature of response.features) {
    if (!hasObservationStations(feature)) {
      continue;
    }

    const zone = toZone(feature);
    if (seen.has(zone.key)) {
      continue;
    }

    seen.add(zone.key);
    zones.push(zone);
  }

  return zones;
}

export function toForecast(period: ForecastPeriod): Forecast {
  return {
    number: period.number,
    name: period.name,
    temperature: period.temperature ?? null,
    temperatureUnit: period.temperatureUnit ?? null,
    windSpeed: period.windSpeed ?? null,
    windDirection: period.windDirection ?? null,
    detailedForecast: period.detailedForecast
  };
}

export function mapForecasts(response: ForecastResponse): Forecast[] {
  return response.properties.periods.map(toForecast);
}

/**
 * Upper-case a zone id and check it looks like `WAZ558` or `WAC033`
 */
export function normalizeZoneId(zoneId: string): string {
  const normalized = zoneId.trim().toUpperCase();
  if (!ZONE_ID_PATTERN.test(normalized)) {
    throw new ValidationError(`Invalid zone id: ${zoneId}`, 'normalizeZoneId', { zoneId });
  }
  return normalized;
}
