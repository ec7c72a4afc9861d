/**
 * Vibrant Colors
 * Palette extraction by k-means clustering of image pixels. Images are decoded
 * through @napi-rs/canvas, so anything it can load (PNG, JPEG, WebP, ...) works.
 */

import { createCanvas, loadImage } from '@napi-rs/canvas';
import { seededRandom } from './random';

export interface RGB {
  r: number;
  g: number;
  b: number;
}

/** h in degrees, s and l in percent */
export interface HSL {
  h: number;
  s: number;
  l: number;
}

export interface FormattedColor {
  hex: string;
  rgb: string;
  r: number;
  g: number;
  b: number;
}

export const TONES = ['vibrant', 'darkVibrant', 'lightVibrant', 'muted', 'darkMuted', 'lightMuted'] as const;

export type Tone = (typeof TONES)[number];

export type ColorSwatch = Record<Tone, RGB>;

export type VibrantColors = Record<Tone, FormattedColor>;

export interface KmeansOptions {
  k?: number;
  maxIterations?: number;
  /** Seeds the choice of initial centroids; unseeded runs use Math.random. */
  seed?: number;
}

export interface VibrantOptions extends KmeansOptions {
  /** Every n-th pixel is sampled. */
  sampleStep?: number;
}

export function rgbToHsl(r: number, g: number, b: number): HSL {
  const rn = r / 255;
  const gn = g / 255;
  const bn = b / 255;
  const max = Math.max(rn, gn, bn);
  const min = Math.min(rn, gn, bn);
  const l = (max + min) / 2;

  if (max === min) {
    return { h: 0, s: 0, l: l * 100 };
  }

  const d = max - min;
  const s = l > 0.5 ? d / (2 - max - min) : d / (max + min);
  let h: number;
  if (max === rn) {
    h = (gn - bn) / d + (gn < bn ? 6 : 0);
  } else if (max === gn) {
    h = (bn - rn) / d + 2;
  } else {
    h = (rn - gn) / d + 4;
  }
  return { h: (h / 6) * 360, s: s * 100, l: l * 100 };
}

export function hslToRgb(h: number, s: number, l: number): RGB {
  const hn = h / 360;
  const sn = s / 100;
  const ln = l / 100;

  if (sn === 0) {
    const v = Math.round(ln * 255);
    return { r: v, g: v, b: v };
  }

  const q = ln < 0.5 ? ln * (1 + sn) : ln + sn - ln * sn;
  const p = 2 * ln - q;
  const channel = (offset: number): number => {
    let t = hn + offset;
    if (t < 0) t += 1;
    if (t > 1) t -= 1;
    if (t < 1 / 6) return p + (q - p) * 6 * t;
    if (t < 1 / 2) return q;
    if (t < 2 / 3) return p + (q - p) * (2 / 3 - t) * 6;
    return p;
  };

  return {
    r: Math.round(channel(1 / 3) * 255),
    g: Math.round(channel(0) * 255),
    b: Math.round(channel(-1 / 3) * 255),
  };
}

export function colorDistance(c1: RGB, c2: RGB): number {
  return Math.hypot(c1.r - c2.r, c1.g - c2.g, c1.b - c2.b);
}

function mean(cluster: RGB[]): RGB {
  const sum = cluster.reduce((acc, c) => ({ r: acc.r + c.r, g: acc.g + c.g, b: acc.b + c.b }), { r: 0, g: 0, b: 0 });
  return {
    r: Math.round(sum.r / cluster.length),
    g: Math.round(sum.g / cluster.length),
    b: Math.round(sum.b / cluster.length),
  };
}

/**
 * Cluster centroids, largest cluster first. Empty clusters are dropped.
 */
export function kmeans(colors: RGB[], options: KmeansOptions = {}): RGB[] {
  const { k = 16, maxIterations = 10, seed } = options;
  if (colors.length === 0) {
    return [];
  }

  const random = seed === undefined ? () => Math.random() : seededRandom(seed);
  let centroids: RGB[] = [];
  for (let i = 0; i < k && i < colors.length; i++) {
    centroids.push({ ...colors[Math.floor(random(i) * colors.length)] });
  }

  let clusters: RGB[][] = [];
  for (let iter = 0; iter < maxIterations; iter++) {
    clusters = centroids.map(() => []);
    for (const color of colors) {
      let best = 0;
      let bestDist = Infinity;
      centroids.forEach((centroid, i) => {
        const dist = colorDistance(color, centroid);
        if (dist < bestDist) {
          bestDist = dist;
          best = i;
        }
      });
      clusters[best].push(color);
    }
    clusters = clusters.filter((cluster) => cluster.length > 0);
    centroids = clusters.map(mean);
  }

  return centroids
    .map((centroid, i) => ({ centroid, size: clusters[i]?.length ?? 0 }))
    .sort((a, b) => b.size - a.size)
    .map(({ centroid }) => centroid);
}

/**
 * The six tone variants of one color: lightness +/-25, saturation -30 for the muted ones.
 */
export function generateSwatch(rgb: RGB): ColorSwatch {
  const { h, s, l } = rgbToHsl(rgb.r, rgb.g, rgb.b);
  const darker = Math.max(0, l - 25);
  const lighter = Math.min(100, l + 25);
  const desaturated = Math.max(0, s - 30);

  return {
    vibrant: rgb,
    darkVibrant: hslToRgb(h, s, darker),
    lightVibrant: hslToRgb(h, s, lighter),
    muted: hslToRgb(h, desaturated, l),
    darkMuted: hslToRgb(h, desaturated, darker),
    lightMuted: hslToRgb(h, desaturated, lighter),
  };
}

export function rgbToHex(rgb: RGB): string {
  return `#${[rgb.r, rgb.g, rgb.b].map((x) => x.toString(16).padStart(2, '0')).join('').toUpperCase()}`;
}

export function rgbToString(rgb: RGB): string {
  return `rgb(${rgb.r}, ${rgb.g}, ${rgb.b})`;
}

/**
 * How well a color fits the given tone slot
 */
export function scoreColor(rgb: RGB, tone: Tone): number {
  const { s, l } = rgbToHsl(rgb.r, rgb.g, rgb.b);
  const saturation = tone.endsWith('uted') ? 100 - s : s;

  switch (tone) {
    case 'vibrant':
    case 'muted':
      return (saturation * (100 - Math.abs(l - 50))) / 100;
    case 'darkVibrant':
    case 'darkMuted':
      return saturation * (l < 50 ? l : 100 - l);
    case 'lightVibrant':
    case 'lightMuted':
      return saturation * (l > 50 ? l : 100 - l);
  }
}

function selectBest(swatches: ColorSwatch[], tone: Tone): RGB {
  let best: RGB = { r: 0, g: 0, b: 0 };
  let bestScore = -Infinity;
  for (const swatch of swatches) {
    const score = scoreColor(swatch[tone], tone);
    if (score > bestScore) {
      best = swatch[tone];
      bestScore = score;
    }
  }
  return best;
}

export function formatColor(rgb: RGB): FormattedColor {
  return { hex: rgbToHex(rgb), rgb: rgbToString(rgb), r: rgb.r, g: rgb.g, b: rgb.b };
}

/**
 * Pick the best color for every tone from the swatches of the dominant colors.
 */
export function paletteFromColors(mainColors: RGB[]): VibrantColors {
  const swatches = mainColors.slice(0, 5).map(generateSwatch);
  return {
    vibrant: formatColor(selectBest(swatches, 'vibrant')),
    darkVibrant: formatColor(selectBest(swatches, 'darkVibrant')),
    lightVibrant: formatColor(selectBest(swatches, 'lightVibrant')),
    muted: formatColor(selectBest(swatches, 'muted')),
    darkMuted: formatColor(selectBest(swatches, 'darkMuted')),
    lightMuted: formatColor(selectBest(swatches, 'lightMuted')),
  };
}

/**
 * Opaque pixels of an RGBA buffer, every `step`-th one.
 */
export function samplePixels(data: Uint8ClampedArray | Uint8Array, step = 4): RGB[] {
  const colors: RGB[] = [];
  for (let i = 0; i + 3 < data.length; i += 4 * step) {
    if (data[i + 3] > 200) {
      colors.push({ r: data[i], g: data[i + 1], b: data[i + 2] });
    }
  }
  return colors;
}

/**
 * Extract the vibrant palette of an image file (path or URL) or an encoded image buffer.
 */
export async function getVibrant(source: string | Buffer, options: VibrantOptions = {}): Promise<VibrantColors> {
  const { sampleStep = 4, ...kmeansOptions } = options;

  const image = await loadImage(source);
  const canvas = createCanvas(image.width, image.height);
  const ctx = canvas.getContext('2d');
  ctx.drawImage(image, 0, 0);

  const { data } = ctx.getImageData(0, 0, image.width, image.height);
  const mainColors = kmeans(samplePixels(data, sampleStep), kmeansOptions);
  return paletteFromColors(mainColors);
}
