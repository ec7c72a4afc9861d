import { isCityViewError } from '../lib/errors';
import { getTheme } from '../lib/themes';
import type { CityView } from '../render/poster-canvas';
import { CityCatalog } from '../services/city-catalog';
import { newCity } from '../services/city-resolver';
import { emptyMapLayers } from '../services/map-data';

export const CITY_ROWS = [
  { name: 'Springfield', country: 'Alpha', lat: 10, long: 20, population: 300000 },
  { name: 'Springfield', country: 'Beta', lat: -10.12345, long: 30.9876, population: 150000 },
  { name: 'Rivertown', country: 'Alpha', lat: 5, long: 5, population: 500000 },
];

export function testCatalog(): CityCatalog {
  return new CityCatalog({ rows: CITY_ROWS });
}

/** Two nodes and a primary road between them, as Overpass returns them. */
export const OVERPASS_RESPONSE = {
  version: 0.6,
  elements: [
    { type: 'node', id: 1, lat: 0, lon: 0 },
    { type: 'node', id: 2, lat: 0.001, lon: 0.002 },
    { type: 'way', id: 10, nodes: [1, 2], tags: { highway: 'primary', name: 'Main Street' } },
  ],
};

export function jsonResponse(body: unknown, init: ResponseInit = { status: 200 }): Response {
  return new Response(JSON.stringify(body), init);
}

/** Code of the CityViewError thrown by `fn`, if any. */
export function thrownCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isCityViewError(error) ? error.code : `not a CityViewError: ${String(error)}`;
  }
  return undefined;
}

export function testView(overrides: Partial<CityView> = {}): CityView {
  return {
    city: newCity('Testville', 'Gamma', 0, 0),
    theme: getTheme('vintage'),
    border: 'circle',
    radius: 1000,
    layers: emptyMapLayers(),
    legend: true,
    ...overrides,
  };
}
