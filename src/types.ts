// Nominatim search result, reduced to the fields we read
export interface NominatimResult {
    lat: string;
    lon: string;
    display_name: string;
    address?: {
        city?: string;
        town?: string;
        village?: string;
        country?: string;
    };
    [key: string]: unknown;
}

export type Point = [number, number]; // [lat, lon]

export interface BoundingBox {
    south: number;
    west: number;
    north: number;
    east: number;
}

/**
 * Overpass tag filter: `true` matches any value, an array matches one of the values.
 */
export type TagFilter = Record<string, string | boolean | string[]>;
