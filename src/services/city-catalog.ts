/**
 * City Catalog
 * Loads the city reference table (bundled, or a file named by the
 * environment), validates it and indexes it by name
 */

import { readFile } from 'node:fs/promises';
import bundledCities from '../data/cities.json';
import { env } from '../config/env';
import { CityViewError, errorMessage } from '../lib/errors';
import { catalogCitySchema, type CatalogCity, type CityCatalogState } from './city-types';

export interface CityCatalogOptions {
  /** JSON file holding an array of `{ name, country, lat, long, population }` rows. */
  file?: string;
  /** Rows to use instead of any file; mostly for tests and embedding. */
  rows?: unknown[];
}

export class CityCatalog {
  private memoryCache: CityCatalogState | null = null;
  private loadingPromise: Promise<CityCatalogState> | null = null;

  constructor(private readonly options: CityCatalogOptions = {}) {}

  /**
   * Load the table (once; concurrent callers share the same load)
   */
  async loadData(): Promise<CityCatalogState> {
    if (this.memoryCache) {
      return this.memoryCache;
    }

    if (this.loadingPromise) {
      return this.loadingPromise;
    }

    this.loadingPromise = (async () => {
      try {
        const { rows, source } = await this._readRows();
        const cities = this._normalizeCities(rows, source);
        const state: CityCatalogState = {
          cities,
          citiesByName: this._buildIndex(cities),
          source,
          loadedAt: Date.now(),
        };
        this.memoryCache = state;
        return state;
      } finally {
        this.loadingPromise = null;
      }
    })();

    return this.loadingPromise;
  }

  /**
   * Drop the in-memory table and read it again
   */
  async refreshData(): Promise<CityCatalogState> {
    this.clearCache();
    return this.loadData();
  }

  clearCache(): void {
    this.memoryCache = null;
    this.loadingPromise = null;
  }

  async getCities(): Promise<CatalogCity[]> {
    const data = await this.loadData();
    return data.cities;
  }

  /**
   * Exact (case-sensitive) name matches, in table order
   */
  async findByName(name: string): Promise<CatalogCity[]> {
    const data = await this.loadData();
    return data.citiesByName.get(name) ?? [];
  }

  /**
   * Cities whose name contains `match`, ignoring case
   */
  async listCities(match = ''): Promise<CatalogCity[]> {
    const cities = await this.getCities();
    const needle = match.trim().toLowerCase();
    if (!needle) return cities;
    return cities.filter((c) => c.name.toLowerCase().includes(needle));
  }

  private _buildIndex(cities: CatalogCity[]): Map<string, CatalogCity[]> {
    const citiesByName = new Map<string, CatalogCity[]>();
    for (const city of cities) {
      const group = citiesByName.get(city.name);
      if (group) {
        group.push(city);
      } else {
        citiesByName.set(city.name, [city]);
      }
    }
    return citiesByName;
  }

  private async _readRows(): Promise<{ rows: unknown[]; source: string }> {
    if (this.options.rows) {
      return { rows: this.options.rows, source: 'inline' };
    }

    const file = this.options.file ?? env.citiesFile;
    if (!file) {
      return { rows: bundledCities, source: 'bundled' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(file, 'utf8'));
    } catch (error) {
      throw new CityViewError('INVALID_FIELD', `Could not read the city table at ${file}: ${errorMessage(error)}`, error);
    }
    if (!Array.isArray(parsed)) {
      throw new CityViewError('INVALID_FIELD', `The city table at ${file} must be a JSON array`);
    }
    console.log(`[CityCatalog] ✓ Read ${parsed.length} rows from ${file}`);
    return { rows: parsed, source: file };
  }

  /**
   * Validate every row; the first bad one aborts the load with its position
   */
  private _normalizeCities(rows: unknown[], source: string): CatalogCity[] {
    return rows.map((row, index) => {
      const result = catalogCitySchema.safeParse(row);
      if (!result.success) {
        const issue = result.error.issues[0];
        const field = issue?.path.join('.') || 'row';
        throw new CityViewError(
          'INVALID_FIELD',
          `Row ${index + 1} of the city table (${source}) has an invalid '${field}': ${issue?.message ?? 'invalid value'}`,
          result.error,
        );
      }
      return result.data;
    });
  }
}

// Shared instance backed by the bundled table (or CITYVIEWS_CITIES_FILE)
export const cityCatalog = new CityCatalog();
