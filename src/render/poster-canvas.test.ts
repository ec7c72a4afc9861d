import { createCanvas } from '@napi-rs/canvas';
import type { FeatureCollection } from 'geojson';
import { describe, expect, it } from 'vitest';
import { emptyMapLayers } from '../services/map-data';
import { testView } from '../test/fixtures';
import {
  borderVertices,
  createProjector,
  drawPoster,
  fontString,
  formatCoordinates,
  legendScale,
  lineUnit,
  mapFrame,
  renderPoster,
  streetClass,
  type CityView,
} from './poster-canvas';

const TEXT_SIZES = { title: 12, subtitle: 8, caption: 6 };

function pixel(view: CityView, x: number, y: number, size = 100): number[] {
  const canvas = createCanvas(size, size);
  const ctx = canvas.getContext('2d');
  drawPoster(ctx, view, { width: size, height: size, dpi: 72, textSizes: TEXT_SIZES });
  return Array.from(ctx.getImageData(x, y, 1, 1).data);
}

// A square of water two degrees wide around (0, 0)
const LAKE: FeatureCollection = {
  type: 'FeatureCollection',
  features: [
    {
      type: 'Feature',
      geometry: {
        type: 'Polygon',
        coordinates: [
          [
            [-1, -1],
            [1, -1],
            [1, 1],
            [-1, 1],
            [-1, -1],
          ],
        ],
      },
      properties: { natural: 'water' },
    },
  ],
};

describe('streetClass', () => {
  it.each([
    ['motorway_link', 'motorway'],
    ['trunk', 'motorway'],
    ['primary', 'primary'],
    ['living_street', 'residential'],
    ['unclassified', 'residential'],
    ['service', 'structure'],
    ['steps', 'path'],
  ])('draws %s as %s', (highway, cls) => {
    expect(streetClass(highway)).toBe(cls);
  });

  it('skips roads that are not built', () => {
    expect(streetClass('proposed')).toBeNull();
    expect(streetClass(undefined)).toBeNull();
  });
});

describe('geometry', () => {
  it('turns line units into pixels at the resolution', () => {
    expect(lineUnit(254)).toBe(10);
  });

  it('centres a square map in the canvas', () => {
    expect(mapFrame(1000, 500)).toEqual({ cx: 500, cy: 250, side: 450 });
  });

  it('projects the radius onto the edge of the map', () => {
    const city = testView().city;
    const project = createProjector(city, 1000, { cx: 100, cy: 100, side: 200 });

    expect(project([0, 0])).toEqual([100, 100]);
    const [east] = project([1000 / 111320, 0]);
    const [, north] = project([0, 1000 / 111320]);
    expect(east).toBeCloseTo(200, 8);
    expect(north).toBeCloseTo(0, 8);
  });

  it('puts the first border vertex at the top', () => {
    const frame = { cx: 0, cy: 0, side: 2 };
    const rhombus = borderVertices('rhombus', frame);

    expect(rhombus).toHaveLength(4);
    expect(rhombus[0][0]).toBeCloseTo(0, 10);
    expect(rhombus[0][1]).toBeCloseTo(-1, 10);
    expect(borderVertices('decagon', frame)).toHaveLength(10);
    expect(borderVertices('square', frame)[0]).toEqual([-1, -1]);
    expect(borderVertices('circle', frame)).toEqual([]);
  });
});

describe('legend text', () => {
  it('writes coordinates with hemispheres', () => {
    expect(formatCoordinates(48.8566, 2.3522)).toBe('48.857°N / 2.352°E');
    expect(formatCoordinates(-33.8688, 151.2093)).toBe('33.869°S / 151.209°E');
    expect(formatCoordinates(40.7128, -74.006)).toBe('40.713°N / 74.006°W');
  });

  it('builds a canvas font from the theme font', () => {
    expect(fontString({ family: 'Caveat', face: 'bold.italic', scale: 1 }, 12)).toBe('italic bold 12px "Caveat", serif');
    expect(fontString({ family: 'Oswald', face: 'bold', scale: 1 }, 9)).toBe('bold 9px "Oswald", serif');
    expect(fontString({ family: 'Imbue', face: 'plain', scale: 1 }, 20)).toBe('20px "Imbue", serif');
  });
});

describe('legendScale', () => {
  it('keeps the sizes when the legend fits', () => {
    expect(legendScale({ title: 10, subtitle: 5, caption: 5 }, [50, 20, 30], 100)).toBe(1);
  });

  it('shrinks to the widest line', () => {
    expect(legendScale({ title: 10, subtitle: 5, caption: 5 }, [160, 20, 30], 100)).toBeCloseTo(0.5, 10);
  });

  it('shrinks to the stacked height', () => {
    // 40 + 10 * 1.6 + 10 * 1.8 + 100 * 0.06 = 80 against 35
    expect(legendScale({ title: 40, subtitle: 10, caption: 10 }, [10], 100)).toBeCloseTo(0.4375, 10);
  });
});

describe('drawPoster', () => {
  it('fills the paper with the background color', () => {
    expect(pixel(testView({ legend: false }), 1, 1)).toEqual([0xff, 0xf7, 0xd8, 255]);
  });

  it('keeps a large legend inside the map', () => {
    const canvas = createCanvas(74, 74);
    const ctx = canvas.getContext('2d');
    drawPoster(ctx, testView(), { width: 74, height: 74, dpi: 72, textSizes: { title: 48, subtitle: 15.4, caption: 10 } });

    expect(Array.from(ctx.getImageData(0, 0, 1, 1).data)).toEqual([0xff, 0xf7, 0xd8, 255]);
    expect(Array.from(ctx.getImageData(73, 73, 1, 1).data)).toEqual([0xff, 0xf7, 0xd8, 255]);
  });

  it('fills water inside the border', () => {
    const view = testView({ border: 'square', legend: false, layers: { ...emptyMapLayers(), water: LAKE } });

    expect(pixel(view, 50, 50)).toEqual([0x9e, 0xbf, 0xaa, 255]);
  });

  it('clips the map to the border', () => {
    const view = testView({ border: 'circle', legend: false, layers: { ...emptyMapLayers(), water: LAKE } });

    // inside the square frame but outside the circle
    expect(pixel(view, 8, 8)).toEqual([0xff, 0xf7, 0xd8, 255]);
  });

  it('draws the same picture twice', async () => {
    const view = testView({ layers: { ...emptyMapLayers(), water: LAKE } });
    const options = { width: 64, height: 64, dpi: 72, textSizes: TEXT_SIZES };

    const a = await renderPoster(view, options).encode('png');
    const b = await renderPoster(view, options).encode('png');

    expect(a.equals(b)).toBe(true);
  });
});
