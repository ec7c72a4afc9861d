/**
 * City Resolver
 * Turns a name, a caller-supplied record, or nothing at all into one city
 */

import { CityViewError } from '../lib/errors';
import { pickIndex } from '../lib/random';
import { cityCatalog, type CityCatalog } from './city-catalog';
import { cityRecordSchema, type CatalogCity, type CityChooser, type CityInput, type CityRecord } from './city-types';

export const DEFAULT_MIN_POPULATION = 200000;

const REQUIRED_FIELDS = ['name', 'country', 'lat', 'long'] as const;

export interface GetCityOptions {
  /** Seed for the random pick when no name is given. */
  seed?: number;
  minPopulation?: number;
  /** Asked when several cities share the name; without it an ambiguous name is an error. */
  choose?: CityChooser;
  catalog?: CityCatalog;
}

/**
 * Resolve the city to draw.
 * Resolves to `null` only when the user declines to pick between namesakes.
 */
export async function getCity(name: CityInput, options: GetCityOptions = {}): Promise<CityRecord | null> {
  const catalog = options.catalog ?? cityCatalog;

  if (name === null || name === undefined) {
    return randomCity(options.seed, options.minPopulation, catalog);
  }

  if (typeof name !== 'string') {
    return validateCityRecord(name);
  }

  const matches = await catalog.findByName(name);
  return resolveConflicts(name, matches, options.choose);
}

/**
 * A city above the population threshold, picked uniformly.
 */
export async function randomCity(
  seed?: number,
  minPopulation: number = DEFAULT_MIN_POPULATION,
  catalog: CityCatalog = cityCatalog,
): Promise<CatalogCity> {
  const cities = await catalog.getCities();
  const candidates = cities.filter((c) => c.population > minPopulation);
  if (candidates.length === 0) {
    throw new CityViewError('CITY_NOT_FOUND', `There is no city with more than ${minPopulation} inhabitants in the available data.`);
  }
  return candidates[pickIndex(candidates.length, seed)];
}

export function formatCityChoice(city: CityRecord): string {
  return `${city.name}, ${city.country} | Lat: ${round3(city.lat)} | Long: ${round3(city.long)}`;
}

export async function resolveConflicts<T extends CityRecord>(
  name: string,
  matches: T[],
  choose?: CityChooser,
): Promise<T | null> {
  if (matches.length === 0) {
    throw new CityViewError(
      'CITY_NOT_FOUND',
      `There is no city called '${name}' in the available data.\nUse newCity() to draw it from its lat/long coordinates.`,
      undefined,
      { name },
    );
  }
  if (matches.length === 1) {
    return matches[0];
  }

  const choices = matches.map(formatCityChoice);
  if (!choose) {
    throw new CityViewError(
      'AMBIGUOUS_CITY',
      `More than one city is called '${name}':\n${choices.map((c) => `  ${c}`).join('\n')}\nPass the city as a record or narrow it down by country.`,
      undefined,
      { name, choices },
    );
  }

  const selection = await choose(choices, 'More than one city matched to this name, which one to pick?');
  if (selection === null) {
    return null;
  }
  if (!Number.isInteger(selection) || selection < 0 || selection >= matches.length) {
    throw new CityViewError('INVALID_FIELD', `Selection ${selection} is not one of the ${matches.length} choices.`);
  }
  return matches[selection];
}

/**
 * Build a city the table does not know about.
 */
export function newCity(name: string, country: string, lat: number, long: number, population?: number): CityRecord {
  return validateCityRecord({ name, country, lat, long, population });
}

/**
 * Check a loosely-typed record field by field, so the first missing one is named.
 */
export function validateCityRecord(input: Record<string, unknown>): CityRecord {
  for (const field of REQUIRED_FIELDS) {
    if (!(field in input) || input[field] === undefined) {
      throw new CityViewError('MISSING_FIELD', `input record is missing '${field}' field`, undefined, { field });
    }
  }

  const result = cityRecordSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'record';
    throw new CityViewError(
      'INVALID_FIELD',
      `input record has an invalid '${field}' field: ${issue?.message ?? 'invalid value'}`,
      result.error,
      { field },
    );
  }
  return result.data;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
