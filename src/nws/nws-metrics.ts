import { Meter } from '@opentelemetry/api';

/** Meter the forecast instruments are registered under */
export const NWS_METER_NAME = 'NwsManagerMetrics';

export interface NwsMetrics {
  recordRequest(zoneId: string): void;
  recordDuration(seconds: number, zoneId: string): void;
  recordFailure(errorType: string, zoneId: string): void;
}

export function createNwsMetrics(meter: Meter): NwsMetrics {
  const requests = meter.createCounter('forecast_requests_total', {
    description: 'Forecast requests received'
  });
  const duration = meter.createHistogram('forecast_request_duration_seconds', {
    description: 'Time spent retrieving a forecast',
    unit: 's'
  });
  const failures = meter.createCounter('failed_requests_total', {
    description: 'Forecast requests that failed'
  });

  return {
    recordRequest: (zoneId) => requests.add(1, { 'zone.id': zoneId }),
    recordDuration: (seconds, zoneId) => duration.record(seconds, { 'zone.id': zoneId }),
    recordFailure: (errorType, zoneId) => failures.add(1, { 'error.type': errorType, 'zone.id': zoneId })
  };
}
