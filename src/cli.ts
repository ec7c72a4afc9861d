import { createInterface } from 'node:readline/promises';
import { parseArgs } from 'node:util';
import { cityview, isBorderShape } from './cityview';
import { exportPoster, validateFormat, type Orientation } from './export';
import { CityViewError } from './lib/errors';
import { listThemes } from './lib/themes';
import { BORDER_SHAPES, type BorderShape } from './lib/types';
import { cityCatalog, type CityCatalog } from './services/city-catalog';
import { formatCityChoice, resolveConflicts, validateCityRecord } from './services/city-resolver';
import type { CityChooser, CityInput } from './services/city-types';
import type { MapDataSource } from './services/map-data';
import { lookupCity } from './utils';

export const USAGE = `Usage: cityviews [city] [options]

Draws a postcard map of a city. Without a city name a random one is picked.

City:
  --country <name>        narrow a name shared by several cities
  --lat <deg> --long <deg> draw a place that is not in the city table
  --geocode               look the city up online when it is not in the table
  --seed <n>              reproducible random city and theme

Look:
  --theme <name>          one of --list-themes, or random (default vintage)
  --border <shape>        none, circle, square, rhombus, hexagon, octagon, decagon (default circle)
  --radius <m>            metres from the centre to the edge (default 5000)
  --zoom <n>              divides the radius (default 1)
  --no-legend             leave out the name and coordinates

Output:
  --paper <size>          paper size (default A4)
  --orientation <o>       portrait or landscape (default portrait)
  --no-square             use the whole page instead of a square
  --format <f>            png, jpeg or tiff (default png)
  --dpi <n>               resolution (default 300)
  --scale <n>             text scale factor (default 1)
  --output <file>         file name without extension (default: the city name)

Other:
  --list-themes           print the theme names
  --list-cities           print the cities whose name contains [city]
  --quiet                 no progress output
  --help                  this text
`;

const OPTIONS = {
  country: { type: 'string' },
  lat: { type: 'string' },
  long: { type: 'string' },
  geocode: { type: 'boolean', default: false },
  seed: { type: 'string' },
  theme: { type: 'string', default: 'vintage' },
  border: { type: 'string', default: 'circle' },
  radius: { type: 'string' },
  zoom: { type: 'string' },
  'no-legend': { type: 'boolean', default: false },
  paper: { type: 'string', default: 'A4' },
  orientation: { type: 'string', default: 'portrait' },
  'no-square': { type: 'boolean', default: false },
  format: { type: 'string', default: 'png' },
  dpi: { type: 'string' },
  scale: { type: 'string' },
  output: { type: 'string' },
  'list-themes': { type: 'boolean', default: false },
  'list-cities': { type: 'boolean', default: false },
  quiet: { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

export interface CliIO {
  write: (line: string) => void;
  choose: CityChooser;
  catalog: CityCatalog;
  source?: MapDataSource;
}

function parseNumber(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new CityViewError('INVALID_FIELD', `--${flag} expects a number, got '${raw}'`);
  }
  return value;
}

function parseOrientation(raw: string): Orientation {
  if (raw === 'portrait' || raw === 'landscape') return raw;
  throw new CityViewError('INVALID_EXPORT_OPTION', `Unknown orientation '${raw}'. Use portrait or landscape.`);
}

/**
 * Turn a typed answer into a zero-based choice. Empty input or 0 declines.
 */
export function parseSelection(answer: string, count: number): number | null {
  const trimmed = answer.trim();
  if (trimmed === '' || trimmed === '0') return null;
  const value = Number(trimmed);
  if (!Number.isInteger(value) || value < 1 || value > count) {
    throw new CityViewError('INVALID_FIELD', `Selection '${trimmed}' is not a number between 1 and ${count}.`);
  }
  return value - 1;
}

/**
 * Numbered menu on the terminal
 */
export function terminalChooser(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout): CityChooser {
  return async (choices, title) => {
    const rl = createInterface({ input, output });
    try {
      output.write(`${title}\n\n`);
      choices.forEach((choice, i) => output.write(`${i + 1}: ${choice}\n`));
      const answer = await rl.question('\nSelection (0 to cancel): ');
      return parseSelection(answer, choices.length);
    } finally {
      rl.close();
    }
  };
}

interface CityArgs {
  country?: string;
  lat?: string;
  long?: string;
  geocode?: boolean;
}

/**
 * Pick the city argument: explicit coordinates, a country filter, or a plain name.
 * Resolves to null when the user declines the menu.
 */
async function cityInput(
  name: string | undefined,
  args: CityArgs,
  catalog: CityCatalog,
  choose: CityChooser,
): Promise<{ city: CityInput } | null> {
  const lat = parseNumber('lat', args.lat);
  const long = parseNumber('long', args.long);

  if (lat !== undefined || long !== undefined) {
    return {
      city: validateCityRecord({ name, country: args.country, lat, long }),
    };
  }
  if (name === undefined) return { city: undefined };

  const matches = await catalog.findByName(name);
  const { country } = args;
  if (country !== undefined) {
    const inCountry = matches.filter((c) => c.country.toLowerCase() === country.toLowerCase());
    if (inCountry.length > 0) {
      const picked = await resolveConflicts(name, inCountry, choose);
      return picked ? { city: picked } : null;
    }
    if (args.geocode) return { city: await lookupCity(name, country) };
  }
  if (matches.length === 0 && args.geocode) {
    return { city: await lookupCity(name, country ?? '') };
  }
  return { city: name };
}

export async function main(argv: string[], io: Partial<CliIO> = {}): Promise<void> {
  const write = io.write ?? ((line: string) => console.log(line));
  const catalog = io.catalog ?? cityCatalog;
  const { values, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  const name = positionals.length > 0 ? positionals.join(' ') : undefined;

  if (values.help) {
    write(USAGE);
    return;
  }
  if (values['list-themes']) {
    listThemes().forEach((theme) => write(theme));
    return;
  }
  if (values['list-cities']) {
    const cities = await catalog.listCities(name ?? '');
    cities.forEach((city) => write(formatCityChoice(city)));
    return;
  }

  const format = validateFormat(values.format ?? 'png');
  const orientation = parseOrientation(values.orientation ?? 'portrait');
  const border = borderOption(values.border ?? 'circle');
  const verbose = !values.quiet;
  const choose = io.choose ?? terminalChooser();

  const selected = await cityInput(
    name,
    { country: values.country, lat: values.lat, long: values.long, geocode: values.geocode },
    catalog,
    choose,
  );
  const view = selected
    ? await cityview(selected.city, {
        theme: values.theme ?? 'vintage',
        border,
        radius: parseNumber('radius', values.radius),
        zoom: parseNumber('zoom', values.zoom),
        legend: !values['no-legend'],
        seed: parseNumber('seed', values.seed),
        choose,
        catalog,
        source: io.source,
        verbose,
      })
    : null;
  if (!view) {
    write('No city selected.');
    return;
  }

  await exportPoster(view, values.output ?? view.city.name, {
    paperSize: values.paper ?? 'A4',
    orientation,
    format,
    dpi: parseNumber('dpi', values.dpi),
    keepSquare: !values['no-square'],
    scaleFactor: parseNumber('scale', values.scale),
    verbose,
  });
}

function borderOption(raw: string): BorderShape {
  if (isBorderShape(raw)) return raw;
  throw new CityViewError('INVALID_FIELD', `Unknown border '${raw}'. Available borders: ${BORDER_SHAPES.join(', ')}.`);
}
