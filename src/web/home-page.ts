/**
 * Filtering, paging and table fragments for the home page
 */

import { Request } from 'express';
import { Forecast, Zone } from '../nws/types';
import { escapeHtml } from './template-renderer';

export interface HomeQuery {
  name: string;
  state: string;
  page: number;
  zone?: string;
}

export interface Page<T> {
  items: T[];
  page: number;
  totalPages: number;
  totalItems: number;
}

function firstString(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0];
  }
  return '';
}

export function parseHomeQuery(query: Request['query']): HomeQuery {
  const page = parseInt(firstString(query.page), 10);
  const zone = firstString(query.zone).trim();

  return {
    name: firstString(query.name).trim(),
    state: firstString(query.state).trim(),
    page: Number.isFinite(page) && page > 0 ? page : 1,
    zone: zone.length > 0 ? zone.toUpperCase() : undefined
  };
}

/**
 * Case-insensitive substring match on name and state
 */
export function filterZones(zones: Zone[], filter: Pick<HomeQuery, 'name' | 'state'>): Zone[] {
  const name = filter.name.toLowerCase();
  const state = filter.state.toLowerCase();

  return zones.filter(zone =>
    (name === '' || zone.name.toLowerCase().includes(name)) &&
    (state === '' || zone.state.toLowerCase().includes(state))
  );
}

/**
 * Pages are 1-based; a page past the end is clamped to the last one
 */
export function paginate<T>(items: T[], page: number, pageSize: number): Page<T> {
  const totalPages = Math.max(1, Math.ceil(items.length / pageSize));
  const current = Math.min(Math.max(1, page), totalPages);
  const start = (current - 1) * pageSize;

  return {
    items: items.slice(start, start + pageSize),
    page: current,
    totalPages,
    totalItems: items.length
  };
}

export function homeUrl(query: HomeQuery, changes: Partial<HomeQuery>): string {
  const next = { ...query, ...changes };
  const params = new URLSearchParams();

  if (next.name) params.set('name', next.name);
  if (next.state) params.set('state', next.state);
  if (next.page > 1) params.set('page', String(next.page));
  if (next.zone) params.set('zone', next.zone);

  const search = params.toString();
  return search ? `/?${search}` : '/';
}

export function renderZoneRows(zones: Zone[], query: HomeQuery): string {
  if (zones.length === 0) {
    return '<tr><td colspan="3">No zones match the filter.</td></tr>';
  }

  return zones.map(zone => {
    const selected = zone.key === query.zone ? ' class="selected"' : '';
    const link = escapeHtml(homeUrl(query, { zone: zone.key }));
    return `<tr${selected}><td><a href="${link}">${escapeHtml(zone.key)}</a></td>` +
      `<td>${escapeHtml(zone.name)}</td><td>${escapeHtml(zone.state)}</td></tr>`;
  }).join('\n');
}

export function renderPager(page: Page<Zone>, query: HomeQuery): string {
  const previous = page.page > 1
    ? `<a href="${escapeHtml(homeUrl(query, { page: page.page - 1 }))}">Previous</a>`
    : '<span>Previous</span>';
  const next = page.page < page.totalPages
    ? `<a href="${escapeHtml(homeUrl(query, { page: page.page + 1 }))}">Next</a>`
    : '<span>Next</span>';

  return `${previous} <span>Page ${page.page} of ${page.totalPages} (${page.totalItems} zones)</span> ${next}`;
}

function formatTemperature(forecast: Forecast): string {
  if (forecast.temperature === null) {
    return '';
  }
  return `${forecast.temperature}°${forecast.temperatureUnit ?? ''}`;
}

function formatWind(forecast: Forecast): string {
  return [forecast.windSpeed, forecast.windDirection].filter(part => part).join(' ');
}

export function renderForecastTable(title: string, forecasts: Forecast[]): string {
  const rows = forecasts.map(forecast =>
    `<tr><td>${escapeHtml(forecast.name)}</td><td>${escapeHtml(formatTemperature(forecast))}</td>` +
    `<td>${escapeHtml(formatWind(forecast))}</td><td>${escapeHtml(forecast.detailedForecast)}</td></tr>`
  ).join('\n');

  return `<h2>${escapeHtml(title)}</h2>
<table class="forecast">
<thead><tr><th>Period</th><th>Temperature</th><th>Wind</th><th>Forecast</th></tr></thead>
<tbody>
${rows}
</tbody>
</table>`;
}

export function renderMessage(message: string): string {
  return `<p class="error">${escapeHtml(message)}</p>`;
}
