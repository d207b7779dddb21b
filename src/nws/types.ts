/**
 * Zone and forecast records served by the hub
 */

export interface Zone {
  /** NWS zone id, e.g. `WAZ558` */
  key: string;
  name: string;
  state: string;
  observationStations: string[];
}

export interface Forecast {
  number: number;
  /** Period name, e.g. `Tonight` */
  name: string;
  temperature: number | null;
  temperatureUnit: string | null;
  windSpeed: string | null;
  windDirection: string | null;
  /** Narrative text */
  detailedForecast: string;
}
