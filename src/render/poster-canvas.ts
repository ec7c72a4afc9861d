import { createCanvas, GlobalFonts, type Canvas, type SKRSContext2D } from '@napi-rs/canvas';
import type { Feature, FeatureCollection, Geometry, Position } from 'geojson';
import { env } from '../config/env';
import { coordinateSeed, seededRandom } from '../lib/random';
import type { BorderShape, StreetClass, Theme, ThemeFont } from '../lib/types';
import type { CityRecord } from '../services/city-types';
import type { MapLayers } from '../services/map-data';
import { tagValue } from '../utils';

const METERS_PER_DEGREE = 111320;

/** Share of the shorter canvas side taken by the map. */
export const MAP_SCALE = 0.9;

/** Everything needed to draw one poster. */
export interface CityView {
  city: CityRecord;
  theme: Theme;
  border: BorderShape;
  /** Half the side of the map square, in metres. */
  radius: number;
  layers: MapLayers;
  legend: boolean;
}

/** Legend font sizes in pixels. */
export interface TextSizes {
  title: number;
  subtitle: number;
  caption: number;
}

export interface RenderOptions {
  width: number;
  height: number;
  dpi: number;
  textSizes: TextSizes;
}

export interface MapFrame {
  cx: number;
  cy: number;
  /** Side of the map square in pixels. */
  side: number;
}

export type Projector = (position: Position) => [number, number];

// Drawn thinnest first so the major roads end up on top
const STREET_ORDER: StreetClass[] = ['path', 'residential', 'structure', 'tertiary', 'secondary', 'primary', 'motorway'];

const HIGHWAY_CLASSES: Record<string, StreetClass> = {
  motorway: 'motorway',
  motorway_link: 'motorway',
  trunk: 'motorway',
  trunk_link: 'motorway',
  primary: 'primary',
  primary_link: 'primary',
  secondary: 'secondary',
  secondary_link: 'secondary',
  tertiary: 'tertiary',
  tertiary_link: 'tertiary',
  residential: 'residential',
  living_street: 'residential',
  unclassified: 'residential',
  service: 'structure',
  busway: 'structure',
  raceway: 'structure',
  footway: 'path',
  path: 'path',
  cycleway: 'path',
  steps: 'path',
  track: 'path',
  pedestrian: 'path',
};

export function streetClass(highway: string | undefined): StreetClass | null {
  if (highway === undefined) return null;
  return HIGHWAY_CLASSES[highway] ?? null;
}

/**
 * Pixels per line-width unit. One unit is 72.27 / 25.4 points, so a unit comes out as a millimetre on paper.
 */
export function lineUnit(dpi: number): number {
  return dpi / 25.4;
}

export function mapFrame(width: number, height: number): MapFrame {
  return { cx: width / 2, cy: height / 2, side: Math.min(width, height) * MAP_SCALE };
}

/**
 * Local equirectangular projection: `radius` metres from the city land on the edge of the map square.
 */
export function createProjector(city: CityRecord, radius: number, frame: MapFrame): Projector {
  const cosLat = Math.cos((city.lat * Math.PI) / 180);
  const pxPerMeter = frame.side / 2 / radius;
  return ([lon, lat]) => [
    frame.cx + (lon - city.long) * cosLat * METERS_PER_DEGREE * pxPerMeter,
    frame.cy - (lat - city.lat) * METERS_PER_DEGREE * pxPerMeter,
  ];
}

const POLYGON_SIDES: Partial<Record<BorderShape, number>> = {
  rhombus: 4,
  hexagon: 6,
  octagon: 8,
  decagon: 10,
};

/**
 * Vertices of the border polygon, first vertex at the top.
 */
export function borderVertices(shape: BorderShape, frame: MapFrame): [number, number][] {
  const r = frame.side / 2;
  if (shape === 'square' || shape === 'none') {
    return [
      [frame.cx - r, frame.cy - r],
      [frame.cx + r, frame.cy - r],
      [frame.cx + r, frame.cy + r],
      [frame.cx - r, frame.cy + r],
    ];
  }
  const sides = POLYGON_SIDES[shape];
  if (sides === undefined) return [];
  return Array.from({ length: sides }, (_, i) => {
    const angle = -Math.PI / 2 + (2 * Math.PI * i) / sides;
    return [frame.cx + r * Math.cos(angle), frame.cy + r * Math.sin(angle)];
  });
}

function traceBorder(ctx: SKRSContext2D, shape: BorderShape, frame: MapFrame): void {
  ctx.beginPath();
  if (shape === 'circle') {
    ctx.arc(frame.cx, frame.cy, frame.side / 2, 0, Math.PI * 2);
    ctx.closePath();
    return;
  }
  borderVertices(shape, frame).forEach(([x, y], i) => (i === 0 ? ctx.moveTo(x, y) : ctx.lineTo(x, y)));
  ctx.closePath();
}

function traceLine(ctx: SKRSContext2D, line: Position[], project: Projector, close: boolean): void {
  line.forEach((position, i) => {
    const [x, y] = project(position);
    if (i === 0) {
      ctx.moveTo(x, y);
    } else {
      ctx.lineTo(x, y);
    }
  });
  if (close) ctx.closePath();
}

/**
 * Add a geometry to the current path. Points are skipped.
 */
export function traceGeometry(ctx: SKRSContext2D, geometry: Geometry, project: Projector): void {
  switch (geometry.type) {
    case 'LineString':
      traceLine(ctx, geometry.coordinates, project, false);
      break;
    case 'MultiLineString':
      geometry.coordinates.forEach((line) => traceLine(ctx, line, project, false));
      break;
    case 'Polygon':
      geometry.coordinates.forEach((ring) => traceLine(ctx, ring, project, true));
      break;
    case 'MultiPolygon':
      geometry.coordinates.forEach((polygon) => polygon.forEach((ring) => traceLine(ctx, ring, project, true)));
      break;
    case 'GeometryCollection':
      geometry.geometries.forEach((g) => traceGeometry(ctx, g, project));
      break;
    default:
      break;
  }
}

function strokeFeatures(ctx: SKRSContext2D, features: Feature[], project: Projector, color: string, width: number): void {
  if (features.length === 0 || width <= 0) return;
  ctx.beginPath();
  for (const feature of features) {
    if (feature.geometry) traceGeometry(ctx, feature.geometry, project);
  }
  ctx.strokeStyle = color;
  ctx.lineWidth = width;
  ctx.stroke();
}

/**
 * Fill every polygon with one color of the list, picked per feature from `random`, and outline it.
 */
function fillFeatures(
  ctx: SKRSContext2D,
  collection: FeatureCollection,
  project: Projector,
  colors: string[],
  outline: { color: string; width: number },
  random: (n: number) => number,
  offset: number
): void {
  collection.features.forEach((feature, i) => {
    if (!feature.geometry || colors.length === 0) return;
    const color = colors[Math.min(colors.length - 1, Math.floor(random(offset + i) * colors.length))];
    ctx.beginPath();
    traceGeometry(ctx, feature.geometry, project);
    ctx.fillStyle = color;
    ctx.fill('evenodd');
    if (outline.width > 0) {
      ctx.strokeStyle = outline.color;
      ctx.lineWidth = outline.width;
      ctx.stroke();
    }
  });
}

export function fontString(font: ThemeFont, px: number): string {
  const style = font.face === 'italic' || font.face === 'bold.italic' ? 'italic ' : '';
  const weight = font.face === 'bold' || font.face === 'bold.italic' ? 'bold ' : '';
  return `${style}${weight}${px}px "${font.family}", serif`;
}

export function formatCoordinates(lat: number, long: number): string {
  const ns = lat >= 0 ? 'N' : 'S';
  const ew = long >= 0 ? 'E' : 'W';
  return `${Math.abs(lat).toFixed(3)}°${ns} / ${Math.abs(long).toFixed(3)}°${ew}`;
}

/** Share of the map side the legend may take across and up. */
const LEGEND_MAX_WIDTH = 0.8;
const LEGEND_MAX_HEIGHT = 0.35;

/**
 * Factor (at most 1) that shrinks the legend until its widest line and its stacked
 * height fit inside a map of `side` pixels. `widths` are the lines measured at full size.
 */
export function legendScale(sizes: TextSizes, widths: number[], side: number): number {
  const height = sizes.title + sizes.subtitle * 1.6 + sizes.caption * 1.8 + side * 0.06;
  const widest = Math.max(0, ...widths);
  const byWidth = widest > 0 ? (side * LEGEND_MAX_WIDTH) / widest : 1;
  const byHeight = height > 0 ? (side * LEGEND_MAX_HEIGHT) / height : 1;
  return Math.min(1, byWidth, byHeight);
}

function drawLegend(ctx: SKRSContext2D, view: CityView, frame: MapFrame, fullSizes: TextSizes): void {
  const { colors, font } = view.theme;
  const shadow = colors.textshadow ?? colors.background;
  const texts = [view.city.name, view.city.country, formatCoordinates(view.city.lat, view.city.long)];
  const widths = texts.map((text, i) => {
    ctx.font = fontString(font, [fullSizes.title, fullSizes.subtitle, fullSizes.caption][i]);
    return ctx.measureText(text).width;
  });
  const k = legendScale(fullSizes, widths, frame.side);
  const sizes: TextSizes = { title: fullSizes.title * k, subtitle: fullSizes.subtitle * k, caption: fullSizes.caption * k };

  const bottom = frame.cy + frame.side / 2;
  const captionY = bottom - frame.side * 0.06;
  const subtitleY = captionY - sizes.caption * 1.8;
  const titleY = subtitleY - sizes.subtitle * 1.6;

  const lines: [string, number, number][] = [
    [texts[0], sizes.title, titleY],
    [texts[1], sizes.subtitle, subtitleY],
    [texts[2], sizes.caption, captionY],
  ];

  ctx.save();
  // never outside the map square
  ctx.beginPath();
  ctx.rect(frame.cx - frame.side / 2, frame.cy - frame.side / 2, frame.side, frame.side);
  ctx.clip();
  ctx.textAlign = 'center';
  ctx.textBaseline = 'alphabetic';
  ctx.lineJoin = 'round';
  for (const [text, px, y] of lines) {
    ctx.font = fontString(font, px);
    ctx.strokeStyle = shadow;
    ctx.lineWidth = px * 0.15;
    ctx.strokeText(text, frame.cx, y);
    ctx.fillStyle = colors.text;
    ctx.fillText(text, frame.cx, y);
  }
  ctx.restore();
}

/**
 * Draw the poster onto an existing context of `options.width` × `options.height` pixels.
 */
export function drawPoster(ctx: SKRSContext2D, view: CityView, options: RenderOptions): void {
  const { width, height, dpi, textSizes } = options;
  const { colors, size } = view.theme;
  const frame = mapFrame(width, height);
  const project = createProjector(view.city, view.radius, frame);
  const unit = lineUnit(dpi);
  // Same city, same colors
  const random = seededRandom(coordinateSeed(view.city.lat, view.city.long));
  const outline = { color: colors.contours, width: size.borders.contours * unit };

  ctx.fillStyle = colors.background;
  ctx.fillRect(0, 0, width, height);

  ctx.save();
  traceBorder(ctx, view.border, frame);
  ctx.clip();
  ctx.lineCap = 'round';
  ctx.lineJoin = 'round';

  const { streets, rails, water, waterlines, landuse, buildings } = view.layers;

  fillFeatures(ctx, landuse, project, colors.landuse, outline, random, 0);
  fillFeatures(ctx, water, project, [colors.water], outline, random, 0);

  for (const [waterway, lineWidth] of [
    ['river', size.borders.river],
    ['canal', size.borders.canal],
  ] as const) {
    const lines = waterlines.features.filter((f) => tagValue(f.properties, 'waterway') === waterway);
    strokeFeatures(ctx, lines, project, colors.waterlines, lineWidth * unit);
  }
  const otherWaterlines = waterlines.features.filter((f) => {
    const waterway = tagValue(f.properties, 'waterway');
    return waterway !== 'river' && waterway !== 'canal';
  });
  strokeFeatures(ctx, otherWaterlines, project, colors.waterlines, size.borders.water * unit);

  fillFeatures(ctx, buildings, project, colors.buildings, outline, random, 50000);

  for (const cls of STREET_ORDER) {
    const features = streets.features.filter((f) => streetClass(tagValue(f.properties, 'highway')) === cls);
    strokeFeatures(ctx, features, project, colors.streets, size.streets[cls] * unit);
  }

  const [railColor, dashColor] = colors.rails;
  const railWidth = size.streets.rails * unit;
  strokeFeatures(ctx, rails.features, project, railColor ?? colors.streets, railWidth);
  if (dashColor !== undefined && rails.features.length > 0) {
    ctx.setLineDash([railWidth * 3, railWidth * 3]);
    ctx.lineCap = 'butt';
    strokeFeatures(ctx, rails.features, project, dashColor, railWidth * 0.6);
    ctx.setLineDash([]);
    ctx.lineCap = 'round';
  }

  const runways = streets.features.filter((f) => tagValue(f.properties, 'aeroway') === 'runway');
  ctx.lineCap = 'butt';
  strokeFeatures(ctx, runways, project, colors.streets, size.streets.runway * unit);
  ctx.restore();

  if (view.border !== 'none') {
    traceBorder(ctx, view.border, frame);
    ctx.strokeStyle = colors.streets;
    ctx.lineWidth = size.streets.motorway * unit * 1.5;
    ctx.stroke();
  }

  if (view.legend) {
    drawLegend(ctx, view, frame, textSizes);
  }
}

let fontsLoaded = false;

/**
 * Register the font files of `dir` (CITYVIEWS_FONT_DIR by default) with the canvas, once.
 */
export function registerFonts(dir: string = env.fontDir): number {
  if (fontsLoaded || dir === '') return 0;
  fontsLoaded = true;
  const count = GlobalFonts.loadFontsFromDir(dir);
  console.log(`[render] ✓ Registered ${count} fonts from ${dir}`);
  return count;
}

export function renderPoster(view: CityView, options: RenderOptions): Canvas {
  registerFonts();
  const canvas = createCanvas(options.width, options.height);
  drawPoster(canvas.getContext('2d'), view, options);
  return canvas;
}
