/**
 * City Data Types
 * Rows of the bundled city table and the shapes callers may pass in
 */

import { z } from 'zod';

export const cityRecordSchema = z.object({
  name: z.string().min(1),
  country: z.string().min(1),
  lat: z.number().min(-90).max(90),
  long: z.number().min(-180).max(180),
  population: z.number().int().nonnegative().optional(),
});

export type CityRecord = z.infer<typeof cityRecordSchema>;

/** A row of the bundled table always carries a population. */
export const catalogCitySchema = cityRecordSchema.required({ population: true });

export type CatalogCity = z.infer<typeof catalogCitySchema>;

/**
 * What `getCity` accepts: a name to look up, a ready-made record (possibly
 * parsed from untrusted JSON), or nothing for a random pick.
 */
export type CityInput = string | Record<string, unknown> | null | undefined;

/**
 * Picks one of several cities sharing a name.
 * Resolves to the zero-based index of the choice, or `null` when the user declines.
 */
export type CityChooser = (choices: string[], title: string) => Promise<number | null>;

export interface CityCatalogState {
  cities: CatalogCity[];
  citiesByName: Map<string, CatalogCity[]>;
  source: string;
  loadedAt: number;
}
