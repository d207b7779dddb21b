/**
 * MyWeatherHub front end: zone list with filtering and paging, forecast for the selected zone
 */

import { Application, Request, Response } from 'express';
import { OutputCache } from '../cache/output-cache';
import { asyncHandler } from '../service-defaults';
import { HttpService, HttpServiceOptions } from '../service-defaults/http-service';
import { Zone } from '../nws/types';
import { toError } from '../utils/error-handler';
import { WeatherApi } from './api-client';
import {
  filterZones,
  paginate,
  parseHomeQuery,
  HomeQuery,
  renderForecastTable,
  renderMessage,
  renderPager,
  renderZoneRows
} from './home-page';
import { TemplateRenderer } from './template-renderer';

export interface WebServerOptions extends HttpServiceOptions {
  api: WeatherApi;
  outputCache: OutputCache;
  renderer: TemplateRenderer;
  pageSize: number;
  outputCacheTtl: number;
}

export class WebServer extends HttpService {
  constructor(private readonly webOptions: WebServerOptions) {
    super(webOptions);
  }

  protected setupRoutes(app: Application): void {
    app.get(
      '/',
      this.webOptions.outputCache.policy({ name: 'home', expire: this.webOptions.outputCacheTtl, varyByQuery: true }),
      asyncHandler(this.home.bind(this))
    );
  }

  /**
   * GET /
   */
  private async home(req: Request, res: Response): Promise<void> {
    const query = parseHomeQuery(req.query);

    let zones: Zone[] = [];
    let message = '';
    try {
      zones = await this.webOptions.api.getZones();
    } catch (error) {
      this.logger.error('Failed to load zones', toError(error), undefined, 'home');
      message = renderMessage('Zones are unavailable right now. Please try again later.');
    }

    const page = paginate(filterZones(zones, query), query.page, this.webOptions.pageSize);
    const forecast = await this.renderForecast(zones, query);

    const html = await this.webOptions.renderer.render('home.html', {
      title: 'MyWeatherHub',
      nameFilter: query.name,
      stateFilter: query.state,
      message,
      zoneRows: renderZoneRows(page.items, query),
      pager: renderPager(page, query),
      forecastSection: forecast.html
    });

    // A page showing a failure is not kept in the output cache
    if (message || forecast.failed) {
      res.set('Cache-Control', 'no-store');
    }
    res.type('html').send(html);
  }

  private async renderForecast(zones: Zone[], query: HomeQuery): Promise<{ html: string; failed: boolean }> {
    if (!query.zone) {
      return { html: '', failed: false };
    }

    const zone = zones.find(candidate => candidate.key === query.zone);
    const title = zone ? `${zone.name}, ${zone.state} (${zone.key})` : query.zone;

    try {
      const forecasts = await this.webOptions.api.getForecastByZone(query.zone);
      return { html: renderForecastTable(title, forecasts), failed: false };
    } catch (error) {
      this.logger.warn('Failed to load forecast', { zone: query.zone, error: toError(error).message }, 'home');
      return {
        html: renderMessage(`The forecast for ${title} is unavailable right now. Please try again.`),
        failed: true
      };
    }
  }
}
