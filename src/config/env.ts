import os from 'node:os';
import path from 'node:path';

// Every setting can be overridden from the environment; the defaults target the public OSM services.
const overpassBaseUrl = process.env.CITYVIEWS_OVERPASS_URL ?? 'https://overpass-api.de/api/interpreter';
const nominatimBaseUrl = process.env.CITYVIEWS_NOMINATIM_URL ?? 'https://nominatim.openstreetmap.org';
// Nominatim and Overpass both reject requests without an identifying User-Agent.
const userAgent = process.env.CITYVIEWS_USER_AGENT ?? 'cityviews';
const cacheDir = process.env.CITYVIEWS_CACHE_DIR ?? path.join(os.homedir(), '.cache', 'cityviews');
const cacheDays = readNumber('CITYVIEWS_CACHE_DAYS', 7);
const fontDir = process.env.CITYVIEWS_FONT_DIR ?? '';
const citiesFile = process.env.CITYVIEWS_CITIES_FILE ?? '';

export const env = Object.freeze({
  overpassBaseUrl,
  nominatimBaseUrl,
  userAgent,
  cacheDir,
  cacheTtlMs: cacheDays * 24 * 60 * 60 * 1000,
  fontDir,
  citiesFile,
});

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    console.warn(`[config] Ignoring ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}
