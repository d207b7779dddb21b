/**
 * Weather API: zones and forecasts, output cached
 */

import { Application, Request, Response } from 'express';
import { OutputCache } from '../cache/output-cache';
import { NwsManager } from '../nws/nws-manager';
import { asyncHandler } from '../service-defaults';
import { HttpService, HttpServiceOptions } from '../service-defaults/http-service';
import { buildOpenApiDocument } from './openapi';

export interface ApiServerOptions extends HttpServiceOptions {
  manager: NwsManager;
  outputCache: OutputCache;
  zonesOutputCacheTtl: number;
  forecastOutputCacheTtl: number;
  version?: string;
}

export class ApiServer extends HttpService {
  private readonly manager: NwsManager;
  private readonly outputCache: OutputCache;

  constructor(private readonly apiOptions: ApiServerOptions) {
    super(apiOptions);
    this.manager = apiOptions.manager;
    this.outputCache = apiOptions.outputCache;
  }

  protected setupRoutes(app: Application): void {
    app.get(
      '/zones',
      this.outputCache.policy({ name: 'zones', expire: this.apiOptions.zonesOutputCacheTtl }),
      asyncHandler(this.getZones.bind(this))
    );

    app.get(
      '/forecast/:zoneId',
      this.outputCache.policy({
        name: 'forecast',
        expire: this.apiOptions.forecastOutputCacheTtl,
        varyByRouteValues: ['zoneId']
      }),
      asyncHandler(this.getForecastByZone.bind(this))
    );

    app.get('/openapi/v1.json', (req, res) => {
      res.json(buildOpenApiDocument(this.apiOptions.version ?? '1.0.0'));
    });
  }

  /**
   * GET /zones
   */
  private async getZones(req: Request, res: Response): Promise<void> {
    const zones = await this.manager.getZones();
    res.json(zones);
  }

  /**
   * GET /forecast/:zoneId
   */
  private async getForecastByZone(req: Request, res: Response): Promise<void> {
    const forecasts = await this.manager.getForecastByZone(req.params.zoneId);
    res.json(forecasts);
  }
}
