import { createCanvas } from '@napi-rs/canvas';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import sharp from 'sharp';
import { CityViewError } from './lib/errors';
import { drawPoster, registerFonts, type CityView, type TextSizes } from './render/poster-canvas';

const MM_PER_INCH = 25.4;

// Portrait [width, height] in millimetres
export const PAPER_SIZES = {
  A0: [841, 1189],
  A1: [594, 841],
  A2: [420, 594],
  A3: [297, 420],
  A4: [210, 297],
  A5: [148, 210],
  A6: [105, 148],
  A7: [74, 105],
  A8: [52, 74],
  A9: [37, 52],
  A10: [26, 37],
  B0: [1000, 1414],
  B1: [707, 1000],
  B2: [500, 707],
  B3: [353, 500],
  B4: [250, 353],
  B5: [176, 250],
  B6: [125, 176],
  B7: [88, 125],
  B8: [62, 88],
  B9: [44, 62],
  B10: [31, 44],
  C4: [229, 324],
  C5: [162, 229],
  C6: [114, 162],
  Letter: [216, 279],
  Legal: [216, 356],
  Tabloid: [279, 432],
  Postcard: [100, 148],
  'Double Postcard': [148, 200],
  'Square Postcard': [120, 120],
} as const satisfies Record<string, readonly [number, number]>;

export type PaperSize = keyof typeof PAPER_SIZES;

export const PAPER_SIZE_NAMES = Object.keys(PAPER_SIZES).filter(isPaperSize);

export const EXPORT_FORMATS = ['png', 'jpeg', 'tiff'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export type Orientation = 'portrait' | 'landscape';

/** Legend sizes in points at a scale factor of 1, before the per-element multipliers. */
export const BASE_TEXT_POINTS: TextSizes = {
  title: 40,
  subtitle: 14,
  caption: 10,
};

export const TEXT_REL_SIZES: TextSizes = {
  title: 1.2,
  subtitle: 1.1,
  caption: 1,
};

export function isPaperSize(name: string): name is PaperSize {
  return Object.prototype.hasOwnProperty.call(PAPER_SIZES, name);
}

export function isExportFormat(format: string): format is ExportFormat {
  return EXPORT_FORMATS.some((f) => f === format);
}

/**
 * Paper size by name, ignoring case ("a4" finds A4)
 */
export function findPaperSize(name: string): PaperSize {
  if (isPaperSize(name)) return name;
  const lower = name.trim().toLowerCase();
  const match = PAPER_SIZE_NAMES.find((size) => size.toLowerCase() === lower);
  if (!match) {
    throw new CityViewError(
      'UNSUPPORTED_PAPER_SIZE',
      `Unsupported paper size '${name}'. Available sizes: ${PAPER_SIZE_NAMES.join(', ')}.`,
      undefined,
      { paperSize: name },
    );
  }
  return match;
}

export function validateFormat(format: string): ExportFormat {
  if (!isExportFormat(format)) {
    throw new CityViewError(
      'UNSUPPORTED_FORMAT',
      `Unsupported format. Available formats: ${EXPORT_FORMATS.join(', ')}.`,
      undefined,
      { format },
    );
  }
  return format;
}

function requirePositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new CityViewError('INVALID_EXPORT_OPTION', `'${name}' must be a positive number, got ${value}`, undefined, {
      option: name,
    });
  }
  return value;
}

export function mmToPixels(mm: number, dpi: number): number {
  return Math.round((mm * dpi) / MM_PER_INCH);
}

export interface DimensionOptions {
  paperSize?: string;
  orientation?: Orientation;
  dpi?: number;
  keepSquare?: boolean;
}

export interface ExportDimensions {
  paperSize: PaperSize;
  widthMm: number;
  heightMm: number;
  width: number;
  height: number;
}

/**
 * Pixel size of the output for a paper size, orientation and resolution.
 * Landscape swaps the sides; a square output uses the shorter side for both.
 */
export function computeExportDimensions(options: DimensionOptions = {}): ExportDimensions {
  const { orientation = 'portrait', dpi = 300, keepSquare = true } = options;
  const paperSize = findPaperSize(options.paperSize ?? 'A4');
  if (orientation !== 'portrait' && orientation !== 'landscape') {
    throw new CityViewError('INVALID_EXPORT_OPTION', `Unknown orientation '${String(orientation)}'. Use portrait or landscape.`);
  }
  requirePositive('dpi', dpi);

  const [portraitWidth, portraitHeight] = PAPER_SIZES[paperSize];
  let widthMm: number = orientation === 'landscape' ? portraitHeight : portraitWidth;
  let heightMm: number = orientation === 'landscape' ? portraitWidth : portraitHeight;
  if (keepSquare) {
    widthMm = heightMm = Math.min(widthMm, heightMm);
  }

  return {
    paperSize,
    widthMm,
    heightMm,
    width: mmToPixels(widthMm, dpi),
    height: mmToPixels(heightMm, dpi),
  };
}

/**
 * Legend font sizes in pixels: base points × per-element multiplier × scale factor, at `dpi`.
 */
export function scaleTextSizes(dpi: number, scaleFactor = 1, fontScale = 1): TextSizes {
  const toPixels = (key: keyof TextSizes) => BASE_TEXT_POINTS[key] * TEXT_REL_SIZES[key] * scaleFactor * fontScale * (dpi / 72);
  return {
    title: toPixels('title'),
    subtitle: toPixels('subtitle'),
    caption: toPixels('caption'),
  };
}

export interface ExportOptions extends DimensionOptions {
  format?: string;
  /** Multiplies every legend text size. */
  scaleFactor?: number;
  verbose?: boolean;
}

export interface ExportResult {
  path: string;
  width: number;
  height: number;
  dpi: number;
  format: ExportFormat;
}

export function outputPath(filename: string, format: ExportFormat): string {
  return filename.endsWith(`.${format}`) ? filename : `${filename}.${format}`;
}

/**
 * Draw the view at print resolution and write it as `<filename>.<format>`.
 */
export async function exportPoster(view: CityView, filename: string, options: ExportOptions = {}): Promise<ExportResult> {
  const { dpi = 300, scaleFactor = 1, verbose = true } = options;
  const format = validateFormat(options.format ?? 'png');
  const { width, height } = computeExportDimensions({ ...options, dpi });
  requirePositive('scaleFactor', scaleFactor);

  registerFonts();
  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext('2d');
  drawPoster(ctx, view, {
    width,
    height,
    dpi,
    textSizes: scaleTextSizes(dpi, scaleFactor, view.theme.font.scale),
  });
  const { data } = ctx.getImageData(0, 0, width, height);

  const file = outputPath(filename, format);
  await mkdir(path.dirname(file), { recursive: true });

  let image = sharp(data, { raw: { width, height, channels: 4 } }).withMetadata({ density: dpi });
  if (format === 'jpeg') {
    image = image.removeAlpha();
  }
  await image.toFormat(format).toFile(file);

  if (verbose) {
    console.log(`✓ Poster exported: ${file} (${width}×${height} px, ${dpi} dpi)`);
  }
  return { path: file, width, height, dpi, format };
}
