/**
 * Shapes of the National Weather Service documents we read.
 * Unknown fields are ignored; only what the hub maps is required.
 */

import { z } from 'zod';

export const zoneFeatureSchema = z.object({
  properties: z.object({
    id: z.string().min(1),
    name: z.string(),
    state: z.string().nullish(),
    type: z.string().optional(),
    observationStations: z.array(z.string()).nullish()
  })
});

export const zonesResponseSchema = z.object({
  type: z.literal('FeatureCollection').optional(),
  features: z.array(zoneFeatureSchema)
});

export const forecastPeriodSchema = z.object({
  number: z.number().int(),
  name: z.string(),
  temperature: z.number().nullish(),
  temperatureUnit: z.string().nullish(),
  windSpeed: z.string().nullish(),
  windDirection: z.string().nullish(),
  detailedForecast: z.string().default('')
});

export const forecastResponseSchema = z.object({
  properties: z.object({
    updated: z.string().optional(),
    periods: z.array(forecastPeriodSchema)
  })
});

export type ZoneFeature = z.infer<typeof zoneFeatureSchema>;
export type ZonesResponse = z.infer<typeof zonesResponseSchema>;
export type ForecastPeriod = z.infer<typeof forecastPeriodSchema>;
export type ForecastResponse = z.infer<typeof forecastResponseSchema>;
