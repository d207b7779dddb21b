/**
 * OpenAPI description served at `/openapi/v1.json`
 */

const problemResponse = {
  content: {
    'application/problem+json': {
      schema: { $ref: '#/components/schemas/ProblemDetails' }
    }
  }
};

export function buildOpenApiDocument(version: string) {
  return {
    openapi: '3.0.3',
    info: { title: 'Weather Hub API', version },
    paths: {
      '/zones': {
        get: {
          operationId: 'GetZones',
          summary: 'Forecast zones that have observation stations',
          responses: {
            '200': {
              description: 'Zones',
              content: {
                'application/json': {
                  schema: { type: 'array', items: { $ref: '#/components/schemas/Zone' } }
                }
              }
            }
          }
        }
      },
      '/forecast/{zoneId}': {
        get: {
          operationId: 'GetForecastByZone',
          summary: 'Forecast periods for a zone',
          parameters: [
            { name: 'zoneId', in: 'path', required: true, schema: { type: 'string', example: 'WAZ558' } }
          ],
          responses: {
            '200': {
              description: 'Forecast periods in source order',
              content: {
                'application/json': {
                  schema: { type: 'array', items: { $ref: '#/components/schemas/Forecast' } }
                }
              }
            },
            '400': { description: 'Malformed zone id', ...problemResponse },
            '404': { description: 'The weather service has no forecast for the zone', ...problemResponse },
            '500': { description: 'Forecast retrieval failed', ...problemResponse }
          }
        }
      }
    },
    components: {
      schemas: {
        Zone: {
          type: 'object',
          required: ['key', 'name', 'state', 'observationStations'],
          properties: {
            key: { type: 'string' },
            name: { type: 'string' },
            state: { type: 'string' },
            observationStations: { type: 'array', items: { type: 'string' } }
          }
        },
        Forecast: {
          type: 'object',
          required: ['number', 'name', 'detailedForecast'],
          properties: {
            number: { type: 'integer' },
            name: { type: 'string' },
            temperature: { type: 'number', nullable: true },
            temperatureUnit: { type: 'string', nullable: true },
            windSpeed: { type: 'string', nullable: true },
            windDirection: { type: 'string', nullable: true },
            detailedForecast: { type: 'string' }
          }
        },
        ProblemDetails: {
          type: 'object',
          properties: {
            type: { type: 'string' },
            title: { type: 'string' },
            status: { type: 'integer' },
            detail: { type: 'string' },
            instance: { type: 'string' }
          }
        }
      }
    }
  };
}
