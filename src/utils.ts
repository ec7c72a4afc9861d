import type { Feature, FeatureCollection, Geometry, Position } from 'geojson';
import osmtogeojson from 'osmtogeojson';
import { z } from 'zod';
import { env } from './config/env';
import { CityViewError, errorMessage } from './lib/errors';
import { newCity } from './services/city-resolver';
import type { CityRecord } from './services/city-types';
import type { BoundingBox, NominatimResult, Point, TagFilter } from './types';

const METERS_PER_DEGREE = 111320;

// ~1 m at the equator
export const SIMPLIFY_TOLERANCE = 0.00001;

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const nominatimResultsSchema = z.array(
    z.object({
        lat: z.string(),
        lon: z.string(),
        display_name: z.string(),
    }).passthrough()
);

const overpassResponseSchema = z.object({
    elements: z.array(z.record(z.unknown())),
}).passthrough();

export interface RequestOptions {
    /** Pause before the request; the public OSM services ask for no more than one request per second. */
    delayMs?: number;
}

/**
 * Geocode a city that is not in the bundled table.
 */
export async function lookupCity(name: string, country: string, options: RequestOptions = {}): Promise<CityRecord> {
    const { delayMs = 1000 } = options;
    console.log(`[geocode] Looking up ${name}, ${country}...`);
    await sleep(delayMs);

    let results: NominatimResult[];
    try {
        const url = `${env.nominatimBaseUrl}/search?q=${encodeURIComponent(`${name}, ${country}`)}&format=json&addressdetails=1&limit=1`;
        const response = await fetch(url, {
            headers: {
                'User-Agent': env.userAgent,
            },
        });

        if (!response.ok) {
            throw new Error(`Nominatim error: ${response.status} ${response.statusText}`);
        }

        results = nominatimResultsSchema.parse(await response.json());
    } catch (error: unknown) {
        throw new CityViewError('GEOCODING_FAILED', `Geocoding failed for ${name}, ${country}: ${errorMessage(error)}`, error);
    }

    const location = results[0];
    if (!location) {
        throw new CityViewError('GEOCODING_FAILED', `Could not find coordinates for ${name}, ${country}`);
    }

    const city = newCity(name, country, parseFloat(location.lat), parseFloat(location.lon));
    console.log(`[geocode] ✓ Found: ${location.display_name} (${city.lat}, ${city.long})`);
    return city;
}

/**
 * Box of `dist` metres around a point, on a locally flat earth.
 */
export function boundingBox(point: Point, dist: number): BoundingBox {
    const [lat, lon] = point;
    const latRad = lat * (Math.PI / 180);
    const deltaLat = dist / METERS_PER_DEGREE;
    const deltaLon = dist / (METERS_PER_DEGREE * Math.cos(latRad));

    return {
        south: lat - deltaLat,
        west: lon - deltaLon,
        north: lat + deltaLat,
        east: lon + deltaLon,
    };
}

export function tagFilter(key: string, value: string | boolean | string[]): string {
    if (value === true) {
        return `["${key}"]`;
    }
    if (Array.isArray(value)) {
        return `["${key}"~"^(${value.join('|')})$"]`;
    }
    return `["${key}"="${value}"]`;
}

/**
 * Overpass QL union of one statement per tag, all within the box.
 */
export function buildOverpassQuery(bbox: BoundingBox, tags: TagFilter, element: 'nwr' | 'way' = 'nwr'): string {
    const { south, west, north, east } = bbox;
    if (![south, west, north, east].every(Number.isFinite)) {
        throw new RangeError(`Invalid bounding box: ${south},${west},${north},${east}`);
    }

    const area = `(${south},${west},${north},${east})`;
    const statements = Object.entries(tags)
        .filter(([, value]) => value !== false)
        .map(([key, value]) => `${element}${tagFilter(key, value)}${area};`)
        .join('\n      ');

    return `
    [out:json][timeout:300];
    (
      ${statements}
    );
    out body;
    >;
    out skel qt;
  `;
}

/**
 * Douglas-Peucker line simplification
 */
export function simplifyPoints(points: Position[], tolerance: number): Position[] {
    if (points.length <= 2) return points;

    let maxDist = 0;
    let index = 0;
    const end = points.length - 1;

    for (let i = 1; i < end; i++) {
        const d = getSqSegDist(points[i], points[0], points[end]);
        if (d > maxDist) {
            index = i;
            maxDist = d;
        }
    }

    if (maxDist > tolerance * tolerance) {
        const res1 = simplifyPoints(points.slice(0, index + 1), tolerance);
        const res2 = simplifyPoints(points.slice(index), tolerance);
        return res1.slice(0, res1.length - 1).concat(res2);
    }
    return [points[0], points[end]];
}

function getSqSegDist(p: Position, p1: Position, p2: Position): number {
    let x = p1[0];
    let y = p1[1];
    let dx = p2[0] - x;
    let dy = p2[1] - y;
    if (dx !== 0 || dy !== 0) {
        const t = ((p[0] - x) * dx + (p[1] - y) * dy) / (dx * dx + dy * dy);
        if (t > 1) {
            x = p2[0];
            y = p2[1];
        } else if (t > 0) {
            x += dx * t;
            y += dy * t;
        }
    }
    dx = p[0] - x;
    dy = p[1] - y;
    return dx * dx + dy * dy;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A tag of an osmtogeojson feature, whether its properties are flat or nest the tags.
 */
export function tagValue(properties: unknown, key: string): string | undefined {
    if (!isRecord(properties)) return undefined;
    const nested = properties.tags;
    const value = isRecord(nested) && key in nested ? nested[key] : properties[key];
    return typeof value === 'string' ? value : undefined;
}

function simplifyGeometry(geometry: Geometry, tolerance: number): Geometry {
    switch (geometry.type) {
        case 'LineString':
            return { ...geometry, coordinates: simplifyPoints(geometry.coordinates, tolerance) };
        case 'MultiLineString':
            return { ...geometry, coordinates: geometry.coordinates.map((line) => simplifyPoints(line, tolerance)) };
        case 'Polygon':
            return { ...geometry, coordinates: geometry.coordinates.map((ring) => simplifyPoints(ring, tolerance)) };
        case 'MultiPolygon':
            return {
                ...geometry,
                coordinates: geometry.coordinates.map((poly) => poly.map((ring) => simplifyPoints(ring, tolerance))),
            };
        default:
            return geometry;
    }
}

export interface CleanOptions {
    keepProperties?: string[];
    tolerance?: number;
    /** Geometry types to keep; everything else is dropped. */
    geometryTypes?: Geometry['type'][];
}

/**
 * Keep only the tags we draw with, drop unwanted geometry types and thin the vertices
 */
export function cleanGeoJSON(geojson: FeatureCollection, options: CleanOptions = {}): FeatureCollection {
    const { keepProperties = [], tolerance = 0, geometryTypes } = options;

    const features: Feature[] = [];
    for (const feature of geojson.features) {
        const { geometry } = feature;
        if (!geometry) continue;
        if (geometryTypes && !geometryTypes.includes(geometry.type)) continue;

        const properties: Record<string, string> = {};
        for (const key of keepProperties) {
            const value = tagValue(feature.properties, key);
            if (value !== undefined) {
                properties[key] = value;
            }
        }

        features.push({
            type: 'Feature',
            ...(feature.id !== undefined ? { id: feature.id } : {}),
            geometry: tolerance > 0 ? simplifyGeometry(geometry, tolerance) : geometry,
            properties,
        });
    }

    return { type: 'FeatureCollection', features };
}

/**
 * Run an Overpass query and convert the answer to GeoJSON
 */
export async function fetchOverpass(query: string): Promise<FeatureCollection> {
    const url = `${env.overpassBaseUrl}?data=${encodeURIComponent(query)}`;
    const response = await fetch(url, {
        headers: {
            'User-Agent': env.userAgent,
        },
    });

    if (!response.ok) {
        throw new Error(`Overpass API error: ${response.status} ${response.statusText}`);
    }

    const osmData = overpassResponseSchema.parse(await response.json());
    return osmtogeojson(osmData);
}

export interface FeatureRequest extends RequestOptions {
    element?: 'nwr' | 'way';
    clean?: CleanOptions;
}

/**
 * Fetch the features matching any of `tags` within `dist` metres of `point`.
 * Resolves to null (after logging) when the request fails.
 */
export async function fetchFeatures(
    point: Point,
    dist: number,
    tags: TagFilter,
    name: string,
    request: FeatureRequest = {}
): Promise<FeatureCollection | null> {
    const { delayMs = 300, element = 'nwr', clean = {} } = request;
    const query = buildOverpassQuery(boundingBox(point, dist), tags, element);

    try {
        await sleep(delayMs);
        console.log(`[overpass] Fetching ${name} features...`);
        const geojson = await fetchOverpass(query);
        const cleaned = cleanGeoJSON(geojson, { tolerance: SIMPLIFY_TOLERANCE, ...clean });
        console.log(`[overpass] ✓ ${name}: ${cleaned.features.length} features`);
        return cleaned;
    } catch (error) {
        console.error(`[overpass] Error while fetching ${name}: ${errorMessage(error)}`);
        return null;
    }
}
