import {
  filterZones,
  homeUrl,
  paginate,
  parseHomeQuery,
  renderForecastTable,
  renderMessage,
  renderPager,
  renderZoneRows
} from '../../src/web/home-page';
import { Zone } from '../../src/nws/types';

const zones: Zone[] = [
  { key: 'WAZ558', name: 'Seattle Metro Test', state: 'WA', observationStations: ['KTS1'] },
  { key: 'CAZ041', name: 'Bay Test', state: 'CA', observationStations: ['KTS2'] },
  { key: 'WAZ001', name: 'Cedar & Pine', state: 'WA', observationStations: ['KTS3'] }
];

describe('parseHomeQuery', () => {
  it('should read filters, page and zone', () => {
    expect(parseHomeQuery({ name: ' bay ', state: 'ca', page: '3', zone: 'waz558' })).toEqual({
      name: 'bay',
      state: 'ca',
      page: 3,
      zone: 'WAZ558'
    });
  });

  it('should default missing and invalid values', () => {
    expect(parseHomeQuery({ page: '-2' })).toEqual({ name: '', state: '', page: 1, zone: undefined });
    expect(parseHomeQuery({ page: 'two', zone: '' })).toEqual({ name: '', state: '', page: 1, zone: undefined });
  });

  it('should take the first of repeated parameters', () => {
    expect(parseHomeQuery({ state: ['WA', 'CA'] }).state).toBe('WA');
  });
});

describe('filterZones', () => {
  it('should match name and state case-insensitively', () => {
    expect(filterZones(zones, { name: 'TEST', state: '' }).map(zone => zone.key)).toEqual(['WAZ558', 'CAZ041']);
    expect(filterZones(zones, { name: '', state: 'wa' }).map(zone => zone.key)).toEqual(['WAZ558', 'WAZ001']);
    expect(filterZones(zones, { name: 'cedar', state: 'wa' }).map(zone => zone.key)).toEqual(['WAZ001']);
  });

  it('should return every zone without filters', () => {
    expect(filterZones(zones, { name: '', state: '' })).toHaveLength(3);
  });
});

describe('paginate', () => {
  const items = Array.from({ length: 23 }, (_, index) => index);

  it('should slice the requested page', () => {
    expect(paginate(items, 3, 10)).toEqual({ items: [20, 21, 22], page: 3, totalPages: 3, totalItems: 23 });
  });

  it('should clamp pages past the end', () => {
    expect(paginate(items, 9, 10).page).toBe(3);
  });

  it('should report one page for an empty list', () => {
    expect(paginate([], 1, 10)).toEqual({ items: [], page: 1, totalPages: 1, totalItems: 0 });
  });
});

describe('homeUrl', () => {
  it('should keep the current filters and apply changes', () => {
    const query = { name: '', state: 'WA', page: 2, zone: undefined };

    expect(homeUrl(query, { zone: 'WAZ558' })).toBe('/?state=WA&page=2&zone=WAZ558');
    expect(homeUrl(query, { page: 1, state: '' })).toBe('/');
  });
});

describe('renderZoneRows', () => {
  it('should link each zone and mark the selected one', () => {
    const html = renderZoneRows(zones.slice(2), { name: '', state: 'WA', page: 2, zone: 'WAZ001' });

    expect(html).toBe(
      '<tr class="selected"><td><a href="/?state=WA&amp;page=2&amp;zone=WAZ001">WAZ001</a></td>' +
      '<td>Cedar &amp; Pine</td><td>WA</td></tr>'
    );
  });

  it('should say when nothing matches', () => {
    expect(renderZoneRows([], { name: 'x', state: '', page: 1 })).toBe(
      '<tr><td colspan="3">No zones match the filter.</td></tr>'
    );
  });
});

describe('renderPager', () => {
  it('should link only to pages that exist', () => {
    const query = { name: '', state: '', page: 1 };

    expect(renderPager(paginate(zones, 1, 2), query)).toBe(
      '<span>Previous</span> <span>Page 1 of 2 (3 zones)</span> <a href="/?page=2">Next</a>'
    );
  });
});

describe('renderForecastTable', () => {
  it('should render a row per period', () => {
    const html = renderForecastTable('Bay Test, CA (CAZ041)', [
      {
        number: 1,
        name: 'Tonight',
        temperature: 52,
        temperatureUnit: 'F',
        windSpeed: '5 mph',
        windDirection: 'SW',
        detailedForecast: 'Fog <late>.'
      },
      {
        number: 2,
        name: 'Monday',
        temperature: null,
        temperatureUnit: null,
        windSpeed: null,
        windDirection: 'N',
        detailedForecast: ''
      }
    ]);

    expect(html).toContain('<h2>Bay Test, CA (CAZ041)</h2>');
    expect(html).toContain('<tr><td>Tonight</td><td>52°F</td><td>5 mph SW</td><td>Fog &lt;late&gt;.</td></tr>');
    expect(html).toContain('<tr><td>Monday</td><td></td><td>N</td><td></td></tr>');
  });
});

describe('renderMessage', () => {
  it('should escape the message', () => {
    expect(renderMessage('a < b')).toBe('<p class="error">a &lt; b</p>');
  });
});
