/**
 * Map data service: memory cache in front of the on-disk cache in front of Overpass
 */

import type { FeatureCollection, Geometry } from 'geojson';
import { FileCache } from '../db';
import { CityViewError } from '../lib/errors';
import type { TagFilter } from '../types';
import { fetchFeatures, type RequestOptions } from '../utils';
import type { CityRecord } from './city-types';

export const LAYER_NAMES = ['streets', 'rails', 'water', 'waterlines', 'landuse', 'buildings'] as const;

export type LayerName = (typeof LAYER_NAMES)[number];

export type MapLayers = Record<LayerName, FeatureCollection>;

export interface MapData {
    layers: MapLayers;
    fromCache: boolean;
}

/** Anything that can supply the layers around a city. */
export interface MapDataSource {
    getMapData(city: CityRecord, radius: number): Promise<MapData>;
}

interface LayerQuery {
    tags: TagFilter;
    element: 'nwr' | 'way';
    keep: string[];
    geometryTypes: Geometry['type'][];
}

const LINES: Geometry['type'][] = ['LineString', 'MultiLineString'];
const AREAS: Geometry['type'][] = ['Polygon', 'MultiPolygon'];

export const LAYER_QUERIES: Record<LayerName, LayerQuery> = {
    streets: {
        tags: { highway: true, aeroway: ['runway'] },
        element: 'way',
        keep: ['highway', 'aeroway'],
        geometryTypes: LINES,
    },
    rails: {
        tags: { railway: ['rail', 'light_rail', 'subway', 'tram', 'narrow_gauge'] },
        element: 'way',
        keep: ['railway'],
        geometryTypes: LINES,
    },
    water: {
        tags: { natural: ['water', 'wetland', 'bay'], waterway: ['riverbank', 'dock'] },
        element: 'nwr',
        keep: ['natural', 'waterway'],
        geometryTypes: AREAS,
    },
    waterlines: {
        tags: { waterway: ['river', 'canal', 'stream'] },
        element: 'way',
        keep: ['waterway'],
        geometryTypes: LINES,
    },
    landuse: {
        tags: {
            leisure: ['park', 'garden', 'playground'],
            landuse: ['grass', 'forest', 'park', 'meadow', 'cemetery'],
            natural: ['wood'],
        },
        element: 'nwr',
        keep: ['leisure', 'landuse', 'natural'],
        geometryTypes: AREAS,
    },
    buildings: {
        tags: { building: true },
        element: 'nwr',
        keep: ['building'],
        geometryTypes: AREAS,
    },
};

export function emptyMapLayers(): MapLayers {
    const empty = (): FeatureCollection => ({ type: 'FeatureCollection', features: [] });
    return {
        streets: empty(),
        rails: empty(),
        water: empty(),
        waterlines: empty(),
        landuse: empty(),
        buildings: empty(),
    };
}

/**
 * Cache key for the layers around a city. Namesakes in one country differ by their coordinates.
 */
export function mapDataKey(city: CityRecord, radius: number): string {
    const position = `${city.lat.toFixed(5)},${city.long.toFixed(5)}`;
    return `map_data:${city.country}:${city.name}:${position}:${radius}`;
}

/** New collections and feature arrays over the same features. */
function copyLayers(layers: MapLayers): MapLayers {
    const copy = (collection: FeatureCollection): FeatureCollection => ({ ...collection, features: [...collection.features] });
    return {
        streets: copy(layers.streets),
        rails: copy(layers.rails),
        water: copy(layers.water),
        waterlines: copy(layers.waterlines),
        landuse: copy(layers.landuse),
        buildings: copy(layers.buildings),
    };
}

function isFeatureCollection(value: unknown): value is FeatureCollection {
    return (
        typeof value === 'object' &&
        value !== null &&
        'type' in value &&
        value.type === 'FeatureCollection' &&
        'features' in value &&
        Array.isArray(value.features)
    );
}

export interface MapDataServiceOptions {
    cache?: FileCache;
    request?: RequestOptions;
}

export class MapDataService implements MapDataSource {
    private memoryCache = new Map<string, MapLayers>();
    private readonly cache: FileCache;
    private readonly request: RequestOptions;

    constructor(options: MapDataServiceOptions = {}) {
        this.cache = options.cache ?? new FileCache();
        this.request = options.request ?? {};
    }

    async getMapData(city: CityRecord, radius: number): Promise<MapData> {
        const cacheKey = mapDataKey(city, radius);

        // 1. memory
        const cached = this.memoryCache.get(cacheKey);
        if (cached) {
            console.log(`[MapDataService] Memory hit: ${city.name}`);
            return { layers: copyLayers(cached), fromCache: true };
        }

        // 2. disk
        const stored = await this.readCache(cacheKey);
        if (stored) {
            console.log(`[MapDataService] Cache hit: ${city.name}, ${city.country}`);
            this.memoryCache.set(cacheKey, stored);
            return { layers: copyLayers(stored), fromCache: true };
        }

        // 3. network
        console.log(`[MapDataService] Cache miss: ${city.name}. Fetching from OSM...`);
        const point: [number, number] = [city.lat, city.long];
        const fetched = await Promise.all(
            LAYER_NAMES.map((layer) => {
                const query = LAYER_QUERIES[layer];
                return fetchFeatures(point, radius, query.tags, layer, {
                    ...this.request,
                    element: query.element,
                    clean: { keepProperties: query.keep, geometryTypes: query.geometryTypes },
                });
            })
        );

        const layers: Partial<MapLayers> = {};
        const missing: LayerName[] = [];
        LAYER_NAMES.forEach((layer, i) => {
            const collection = fetched[i];
            if (collection) {
                layers[layer] = collection;
            } else {
                missing.push(layer);
            }
        });

        const complete = toMapLayers(layers);
        if (!complete) {
            throw new CityViewError(
                'MAP_DATA_UNAVAILABLE',
                `Failed to fetch map data for ${city.name}, ${city.country}: ${missing.join(', ')}`,
                undefined,
                { missing }
            );
        }

        await this.writeCache(cacheKey, complete);
        this.memoryCache.set(cacheKey, complete);
        return { layers: copyLayers(complete), fromCache: false };
    }

    clearMemory(): void {
        this.memoryCache.clear();
    }

    private async readCache(cacheKey: string): Promise<MapLayers | null> {
        const layers: Partial<MapLayers> = {};
        for (const layer of LAYER_NAMES) {
            const value = await this.cache.get(`${cacheKey}:${layer}`);
            if (!isFeatureCollection(value)) return null;
            layers[layer] = value;
        }
        return toMapLayers(layers);
    }

    private async writeCache(cacheKey: string, layers: MapLayers): Promise<void> {
        try {
            await Promise.all(LAYER_NAMES.map((layer) => this.cache.put(`${cacheKey}:${layer}`, layers[layer])));
        } catch (error) {
            console.warn(`[MapDataService] Could not write cache ${this.cache.dir}:`, error);
        }
    }
}

function toMapLayers(layers: Partial<MapLayers>): MapLayers | null {
    const { streets, rails, water, waterlines, landuse, buildings } = layers;
    if (!streets || !rails || !water || !waterlines || !landuse || !buildings) return null;
    return { streets, rails, water, waterlines, landuse, buildings };
}

export const mapDataService = new MapDataService();
