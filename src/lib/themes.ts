import { createCanvas, type SKRSContext2D } from '@napi-rs/canvas';
import { z } from 'zod';
import { CityViewError } from './errors';
import { pickIndex } from './random';
import type { Theme, ThemeColors, ThemeFont, ThemeSize } from './types';
import { getVibrant, type VibrantColors } from './vibrant';

const PALETTES = {
  vintage: {
    background: '#fff7d8',
    water: '#9ebfaa',
    landuse: ['#fff7d8'],
    contours: '#32130f',
    streets: '#32130f',
    rails: ['#32130f', '#fff7d8'],
    buildings: ['#facc87', '#f39848', '#f8c98c', '#f58762'],
    text: '#32130f',
    waterlines: '#9ebfaa',
  },
  modern: {
    background: '#e6ddd6',
    water: '#656c7c',
    landuse: ['#7c9c6b'],
    contours: '#e6ddd6',
    streets: '#fafafa',
    rails: ['#fafafa', '#e6ddd6'],
    buildings: ['#eb3e20'],
    text: '#000000',
    waterlines: '#656c7c',
  },
  bright: {
    background: '#eeefc9',
    water: '#9ddffb',
    landuse: ['#f2f4cb', '#d0f1bf', '#64b96a'],
    contours: '#eeefc9',
    streets: '#2f3737',
    rails: ['#2f3737', '#eeefc9'],
    buildings: ['#8e76a4', '#a193b1', '#db9b33', '#e8c51e', '#ed6c2e'],
    text: '#2f3737',
    waterlines: '#9ddffb',
  },
  delftware: {
    background: '#fafafa',
    water: '#fafafa',
    landuse: ['#7ebaee', '#8da8d7', '#3259a6', '#0c133f', '#080e1c'],
    contours: '#fafafa',
    streets: '#1f305e',
    rails: ['#1f305e', '#fafafa'],
    buildings: ['#7ebaee', '#8da8d7', '#3259a6', '#0c133f', '#080e1c'],
    text: '#000000',
    waterlines: '#fafafa',
  },
  comic: {
    background: '#ffffff',
    water: '#607ba4',
    landuse: ['#4b9475'],
    contours: '#222222',
    streets: '#222222',
    rails: ['#222222', '#ffffff'],
    buildings: ['#f4d749', '#daa520', '#a63c44'],
    text: '#222222',
    waterlines: '#607ba4',
  },
  rouge: {
    background: '#a25543',
    water: '#f2deb8',
    landuse: ['#a25543'],
    contours: '#f2deb8',
    streets: '#f2deb8',
    rails: ['#f2deb8', '#a25543'],
    buildings: ['#f2deb8'],
    text: '#f2deb8',
    waterlines: '#f2deb8',
  },
  original: {
    background: '#fdf9f5',
    water: '#fdf9f5',
    landuse: ['#fdf9f5'],
    contours: '#32130f',
    streets: '#32130f',
    rails: ['#32130f'],
    buildings: ['#fdf9f5'],
    text: '#32130f',
    waterlines: '#32130f',
  },
  midearth: {
    background: '#b8a580',
    water: '#c3c9b6',
    landuse: ['#b8a580'],
    contours: '#53402a',
    streets: '#221c18',
    rails: ['#221c18'],
    buildings: ['#53402a'],
    text: '#221c18',
    waterlines: '#c3c9b6',
    textshadow: '#f7f3ea',
  },
  batik: {
    background: '#161417',
    water: '#214040',
    landuse: ['#ece3d9', '#9e5426', '#5d473c', '#c0b28a'],
    contours: '#1d1d23',
    streets: '#d7c5b8',
    rails: ['#d7c5b8'],
    buildings: ['#ece3d9', '#9e5426', '#5d473c', '#c0b28a'],
    text: '#d7c5b8',
    waterlines: '#214040',
  },
  vice: {
    background: '#ffffff',
    water: '#a3bff4',
    landuse: ['#6ece92'],
    contours: '#000000',
    streets: '#e282af',
    rails: ['#e282af'],
    buildings: ['#fff01f'],
    text: '#ffffff',
    waterlines: '#a3bff4',
    textshadow: '#e282af',
  },
  // Palettes in the style of prettymaps
  default: {
    background: '#f4f4f4',
    water: '#9ed0e6',
    landuse: ['#a7c4a0', '#ddecdc', '#b5e3c6'],
    contours: '#cccccc',
    streets: '#ffffff',
    rails: ['#b5b5b5', '#e0e0e0'],
    buildings: ['#cccccc', '#e5e5e5'],
    text: '#333333',
    waterlines: '#99c4de',
  },
  macao: {
    background: '#ece2d0',
    water: '#b8d7e6',
    landuse: ['#b4d4c3', '#e6e6a1', '#f8c8dc'],
    contours: '#f3b3a5',
    streets: '#e8d4c3',
    rails: ['#c2c1c1', '#f5d3b1'],
    buildings: ['#f0e3ca', '#edd7b1', '#d9bc8c'],
    text: '#4b4b4b',
    waterlines: '#9fc0d4',
  },
  minimal: {
    background: '#f8f8f8',
    water: '#e0e0e0',
    landuse: ['#f0f0f0'],
    contours: '#c0c0c0',
    streets: '#a0a0a0',
    rails: ['#b0b0b0', '#d0d0d0'],
    buildings: ['#d0d0d0', '#b0b0b0', '#808080'],
    text: '#2f2f2f',
    waterlines: '#a9a9a9',
  },
  tijuca: {
    background: '#1e1f26',
    water: '#2e5c77',
    landuse: ['#517875', '#a3bf80', '#d4d4a8'],
    contours: '#3c3c3c',
    streets: '#f5e9da',
    rails: ['#f1f1f1', '#333333'],
    buildings: ['#3a3a3a', '#6c6c6c', '#9e9e9e'],
    text: '#ffffff',
    waterlines: '#336e87',
  },
  oslo: {
    background: '#ebf4fa',
    water: '#c0d6df',
    landuse: ['#9bc2b3', '#b4e197', '#f9f871'],
    contours: '#a3a3a3',
    streets: '#d9d9d9',
    rails: ['#bfbfbf', '#dadada'],
    buildings: ['#898989', '#b3b3b3', '#d6d6d6'],
    text: '#505050',
    waterlines: '#aacce1',
  },
  tokyo: {
    background: '#faf3f2',
    water: '#a8d3e6',
    landuse: ['#bce2e8', '#ffe4cc', '#f7cacd'],
    contours: '#e7e7e7',
    streets: '#ffffff',
    rails: ['#dfdfdf', '#efefef'],
    buildings: ['#ffceb4', '#f28d89', '#bbe3d5'],
    text: '#333333',
    waterlines: '#90c7da',
  },
  paris: {
    background: '#f5f3f1',
    water: '#b4d0de',
    landuse: ['#e8d3d0', '#c2afae', '#be97ad'],
    contours: '#d3d3d3',
    streets: '#fafafa',
    rails: ['#d6d6d6', '#e9e9e9'],
    buildings: ['#e0c6bf', '#ceb0a5', '#b89f91'],
    text: '#494949',
    waterlines: '#acc8da',
  },
  dark: {
    background: '#0a1931',
    water: '#185adb',
    landuse: ['#0a1931'],
    contours: '#ffc947',
    streets: '#ffc947',
    rails: ['#ffc947', '#0a1931'],
    buildings: ['#feddbe'],
    text: '#ffc947',
    waterlines: '#185adb',
  },
  light: {
    background: '#ffffff',
    water: '#cedce9',
    landuse: ['#ffffff'],
    contours: '#ffffff',
    streets: '#4b4b4b',
    rails: ['#4b4b4b', '#ffffff'],
    buildings: ['#ffffff'],
    text: '#4b4b4b',
    waterlines: '#cedce9',
  },
} satisfies Record<string, ThemeColors>;

export type ThemeName = keyof typeof PALETTES;

const FONTS: Record<ThemeName, ThemeFont> = {
  vintage: { family: 'Fredericka the Great', face: 'plain', scale: 1 },
  modern: { family: 'Imbue', face: 'plain', scale: 1 },
  bright: { family: 'Damion', face: 'plain', scale: 1 },
  delftware: { family: 'Dancing Script', face: 'bold', scale: 1 },
  comic: { family: 'Rampart One', face: 'plain', scale: 1 },
  rouge: { family: 'Oswald', face: 'bold', scale: 1 },
  original: { family: 'Caveat', face: 'bold', scale: 1 },
  midearth: { family: 'American Uncial Regular', face: 'plain', scale: 1 },
  batik: { family: 'Walter Turncoat', face: 'plain', scale: 1 },
  vice: { family: 'Rage', face: 'bold', scale: 1 },
  default: { family: 'Ubuntu Mono', face: 'plain', scale: 1 },
  macao: { family: 'Ubuntu Mono', face: 'plain', scale: 1 },
  minimal: { family: 'Caveat', face: 'plain', scale: 1 },
  tijuca: { family: 'Libre Baskerville', face: 'plain', scale: 1 },
  oslo: { family: 'Libre Baskerville', face: 'plain', scale: 1 },
  tokyo: { family: 'Ubuntu Mono', face: 'plain', scale: 1 },
  paris: { family: 'Ubuntu Mono', face: 'plain', scale: 1 },
  dark: { family: 'Ubuntu Mono', face: 'plain', scale: 1 },
  light: { family: 'Ubuntu Mono', face: 'plain', scale: 1 },
};

// Line weights shared by every theme, in plotting line-width units
export const THEME_SIZE: ThemeSize = {
  borders: {
    contours: 0.15,
    water: 0.4,
    canal: 0.5,
    river: 0.6,
  },
  streets: {
    path: 0.2,
    residential: 0.3,
    structure: 0.35,
    tertiary: 0.4,
    secondary: 0.5,
    primary: 0.6,
    motorway: 0.8,
    rails: 0.65,
    runway: 3,
  },
};

const THEME_NAMES: ThemeName[] = Object.keys(PALETTES).filter(isThemeName);

export function listThemes(): ThemeName[] {
  return [...THEME_NAMES];
}

export function isThemeName(name: string): name is ThemeName {
  return Object.prototype.hasOwnProperty.call(PALETTES, name);
}

/**
 * Look up a named theme. `'random'` picks one, reproducibly when seeded.
 */
export function getTheme(name: string, seed?: number): Theme {
  const themeName = name === 'random' ? THEME_NAMES[pickIndex(THEME_NAMES.length, seed)] : name;
  if (!isThemeName(themeName)) {
    throw new CityViewError(
      'UNKNOWN_THEME',
      `Unknown theme '${name}'. Available themes: ${THEME_NAMES.join(', ')}, random.`,
      undefined,
      { name },
    );
  }
  return buildTheme(themeName);
}

function buildTheme(name: ThemeName): Theme {
  const palette: ThemeColors = PALETTES[name];
  return {
    name,
    colors: {
      ...palette,
      landuse: [...palette.landuse],
      rails: [...palette.rails],
      buildings: [...palette.buildings],
    },
    font: { ...FONTS[name] },
    size: {
      borders: { ...THEME_SIZE.borders },
      streets: { ...THEME_SIZE.streets },
    },
  };
}

let colorProbe: SKRSContext2D | null = null;

/**
 * Whether the canvas accepts `value` as a CSS color.
 * An invalid color leaves fillStyle untouched, so probing from two different
 * starting colors tells the cases apart.
 */
export function isColor(value: string): boolean {
  if (!colorProbe) {
    colorProbe = createCanvas(1, 1).getContext('2d');
  }
  const ctx = colorProbe;
  try {
    ctx.fillStyle = '#000000';
    ctx.fillStyle = value;
    const fromBlack = ctx.fillStyle;
    ctx.fillStyle = '#ffffff';
    ctx.fillStyle = value;
    return ctx.fillStyle === fromBlack;
  } catch {
    return false;
  }
}

const colorList = z.union([z.string(), z.array(z.string()).min(1)]).transform((v) => (Array.isArray(v) ? v : [v]));

const customThemeSchema = z.object({
  name: z.string().min(1).optional(),
  base: z.string().optional(),
  colors: z
    .object({
      background: z.string(),
      water: z.string(),
      landuse: colorList,
      contours: z.string(),
      streets: z.string(),
      rails: colorList,
      buildings: colorList,
      text: z.string(),
      waterlines: z.string(),
      textshadow: z.string(),
    })
    .partial()
    .optional(),
  font: z
    .object({
      family: z.string().min(1),
      face: z.enum(['plain', 'bold', 'italic', 'bold.italic']),
      scale: z.number().positive(),
    })
    .partial()
    .optional(),
  size: z
    .object({
      borders: z.object({
        contours: z.number().nonnegative(),
        water: z.number().nonnegative(),
        canal: z.number().nonnegative(),
        river: z.number().nonnegative(),
      }).partial(),
      streets: z.object({
        path: z.number().nonnegative(),
        residential: z.number().nonnegative(),
        structure: z.number().nonnegative(),
        tertiary: z.number().nonnegative(),
        secondary: z.number().nonnegative(),
        primary: z.number().nonnegative(),
        motorway: z.number().nonnegative(),
        rails: z.number().nonnegative(),
        runway: z.number().nonnegative(),
      }).partial(),
    })
    .partial()
    .optional(),
});

export type CustomThemeInput = z.input<typeof customThemeSchema>;

/**
 * A theme assembled from a partial description laid over a named base theme (`vintage` by default).
 */
export function customTheme(input: unknown): Theme {
  const result = customThemeSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new CityViewError(
      'INVALID_THEME',
      `Invalid theme field '${issue?.path.join('.') || 'theme'}': ${issue?.message ?? 'invalid value'}`,
      result.error,
    );
  }

  const parsed = result.data;
  const base = getTheme(parsed.base ?? 'vintage');
  const theme: Theme = {
    name: parsed.name ?? 'custom',
    colors: { ...base.colors, ...parsed.colors },
    font: { ...base.font, ...parsed.font },
    size: {
      borders: { ...base.size.borders, ...parsed.size?.borders },
      streets: { ...base.size.streets, ...parsed.size?.streets },
    },
  };

  for (const [field, value] of Object.entries(theme.colors)) {
    const values: unknown[] = Array.isArray(value) ? value : [value];
    for (const color of values) {
      if (typeof color === 'string' && !isColor(color)) {
        throw new CityViewError('INVALID_THEME', `Theme color 'colors.${field}' is not a valid color: '${color}'`, undefined, {
          field,
          color,
        });
      }
    }
  }
  return theme;
}

/**
 * Map an extracted palette onto the theme slots: light tones for the paper, dark ones for ink.
 */
export function themeFromPalette(palette: VibrantColors, base: Theme = getTheme('vintage')): Theme {
  return {
    name: 'image',
    colors: {
      background: palette.lightMuted.hex,
      water: palette.muted.hex,
      landuse: [palette.lightVibrant.hex, palette.muted.hex],
      contours: palette.darkMuted.hex,
      streets: palette.darkVibrant.hex,
      rails: [palette.darkVibrant.hex, palette.lightMuted.hex],
      buildings: [palette.vibrant.hex, palette.darkVibrant.hex, palette.lightVibrant.hex],
      text: palette.darkMuted.hex,
      waterlines: palette.muted.hex,
    },
    font: { ...base.font },
    size: {
      borders: { ...base.size.borders },
      streets: { ...base.size.streets },
    },
  };
}

export async function themeFromImage(source: string | Buffer, base?: Theme): Promise<Theme> {
  const palette = await getVibrant(source);
  console.log(`[themes] ✓ Palette extracted: ${palette.vibrant.hex}, ${palette.darkMuted.hex}, ${palette.lightMuted.hex}`);
  return themeFromPalette(palette, base);
}
