import { CityViewError } from './lib/errors';
import { ProgressTracker } from './lib/progress';
import { getTheme } from './lib/themes';
import { BORDER_SHAPES, type BorderShape, type Theme } from './lib/types';
import type { CityView } from './render/poster-canvas';
import type { CityCatalog } from './services/city-catalog';
import { getCity } from './services/city-resolver';
import type { CityChooser, CityInput } from './services/city-types';
import { mapDataService, type MapDataSource } from './services/map-data';

export const DEFAULT_RADIUS = 5000;

export interface CityviewOptions {
  /** Theme name, `'random'`, or a ready-made theme. */
  theme?: string | Theme;
  border?: BorderShape;
  /** Metres from the centre to the edge of the map at zoom 1. */
  radius?: number;
  /** Values above 1 show a smaller area. */
  zoom?: number;
  legend?: boolean;
  /** Seeds the random city and the random theme. */
  seed?: number;
  minPopulation?: number;
  choose?: CityChooser;
  catalog?: CityCatalog;
  source?: MapDataSource;
  verbose?: boolean;
}

export function isBorderShape(value: string): value is BorderShape {
  return BORDER_SHAPES.some((shape) => shape === value);
}

/**
 * Map radius in metres for a base radius and a zoom level
 */
export function effectiveRadius(radius = DEFAULT_RADIUS, zoom = 1): number {
  if (!Number.isFinite(radius) || radius <= 0) {
    throw new CityViewError('INVALID_FIELD', `radius must be a positive number of metres, got ${radius}`);
  }
  if (!Number.isFinite(zoom) || zoom <= 0) {
    throw new CityViewError('INVALID_FIELD', `zoom must be a positive number, got ${zoom}`);
  }
  return radius / zoom;
}

/**
 * Resolve a city and a theme and gather the map layers around it.
 * Resolves to `null` when the user declines to pick between namesakes.
 */
export async function cityview(name: CityInput, options: CityviewOptions = {}): Promise<CityView | null> {
  const { border = 'circle', legend = true, verbose = true, seed } = options;
  const source = options.source ?? mapDataService;
  const progress = new ProgressTracker(4, verbose);

  if (!isBorderShape(border)) {
    throw new CityViewError('INVALID_FIELD', `Unknown border '${String(border)}'. Available borders: ${BORDER_SHAPES.join(', ')}.`);
  }
  const radius = effectiveRadius(options.radius, options.zoom);
  const theme = typeof options.theme === 'object' ? options.theme : getTheme(options.theme ?? 'vintage', seed);

  const city = await getCity(name, {
    seed,
    minPopulation: options.minPopulation,
    choose: options.choose,
    catalog: options.catalog,
  });
  if (!city) {
    return null;
  }
  progress.tick(`City: ${city.name}, ${city.country}`);
  progress.tick(`Theme: ${theme.name}`);

  const { layers, fromCache } = await source.getMapData(city, radius);
  progress.tick(fromCache ? 'Map data restored from cache' : 'Map data downloaded');

  progress.tick('Ready to draw');
  return { city, theme, border, radius, layers, legend };
}
