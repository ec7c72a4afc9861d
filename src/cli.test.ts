import { access, mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { PassThrough } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { USAGE, main, parseSelection, terminalChooser } from './cli';
import { emptyMapLayers, type MapDataSource } from './services/map-data';
import { testCatalog, thrownCode } from './test/fixtures';

describe('parseSelection', () => {
  it('turns a menu number into an index', () => {
    expect(parseSelection('2', 3)).toBe(1);
    expect(parseSelection(' 1 ', 3)).toBe(0);
  });

  it('declines on an empty answer or 0', () => {
    expect(parseSelection('', 3)).toBeNull();
    expect(parseSelection('0', 3)).toBeNull();
  });

  it('rejects answers outside the menu', () => {
    expect(thrownCode(() => parseSelection('4', 3))).toBe('INVALID_FIELD');
    expect(thrownCode(() => parseSelection('two', 3))).toBe('INVALID_FIELD');
  });
});

describe('terminalChooser', () => {
  it('prints the menu and reads the answer', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    let printed = '';
    output.on('data', (chunk: Buffer) => {
      printed += chunk.toString();
    });
    const choose = terminalChooser(input, output);

    const pending = choose(['First, Alpha', 'Second, Beta'], 'Which one?');
    input.write('2\n');

    expect(await pending).toBe(1);
    expect(printed).toContain('Which one?\n\n1: First, Alpha\n2: Second, Beta\n');
  });
});

describe('main', () => {
  let dir: string;
  let lines: string[];
  const write = (line: string) => {
    lines.push(line);
  };
  const catalog = testCatalog();

  function fakeSource() {
    const getMapData = vi.fn<MapDataSource['getMapData']>().mockResolvedValue({ layers: emptyMapLayers(), fromCache: false });
    const source: MapDataSource = { getMapData };
    return { source, getMapData };
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'cityviews-cli-'));
    lines = [];
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('prints the usage', async () => {
    await main(['--help'], { write });

    expect(lines).toEqual([USAGE]);
  });

  it('lists the themes', async () => {
    await main(['--list-themes'], { write });

    expect(lines).toHaveLength(19);
    expect(lines[0]).toBe('vintage');
  });

  it('lists the cities matching a name', async () => {
    await main(['--list-cities', 'spring'], { write, catalog });

    expect(lines).toEqual(['Springfield, Alpha | Lat: 10 | Long: 20', 'Springfield, Beta | Lat: -10.123 | Long: 30.988']);
  });

  it('exports a poster of the named city', async () => {
    const { source, getMapData } = fakeSource();
    const output = path.join(dir, 'rivertown');

    await main(['Rivertown', '--paper', 'A10', '--dpi', '72', '--output', output, '--quiet'], { write, catalog, source });

    await expect(access(`${output}.png`)).resolves.toBeUndefined();
    expect(getMapData).toHaveBeenCalledWith(expect.objectContaining({ name: 'Rivertown' }), 5000);
  });

  it('narrows namesakes by country', async () => {
    const { source, getMapData } = fakeSource();
    const choose = vi.fn();

    await main(['Springfield', '--country', 'beta', '--paper', 'A10', '--dpi', '72', '--output', path.join(dir, 'sf'), '--quiet'], {
      write,
      catalog,
      source,
      choose,
    });

    expect(choose).not.toHaveBeenCalled();
    expect(getMapData).toHaveBeenCalledWith(expect.objectContaining({ country: 'Beta' }), 5000);
  });

  it('draws a place from its coordinates', async () => {
    const { source, getMapData } = fakeSource();

    await main(
      ['Base Camp', '--country', 'Nepal', '--lat=28.0', '--long=86.85', '--radius', '2000', '--zoom', '2', '--paper', 'A10', '--dpi', '72', '--output', path.join(dir, 'camp'), '--quiet'],
      { write, catalog, source },
    );

    expect(getMapData).toHaveBeenCalledWith({ name: 'Base Camp', country: 'Nepal', lat: 28, long: 86.85 }, 1000);
  });

  it('stops when the user declines the menu', async () => {
    const { source, getMapData } = fakeSource();

    await main(['Springfield', '--quiet'], { write, catalog, source, choose: async () => null });

    expect(lines).toEqual(['No city selected.']);
    expect(getMapData).not.toHaveBeenCalled();
  });

  it('rejects an unknown format before fetching', async () => {
    const { source, getMapData } = fakeSource();

    await expect(main(['Rivertown', '--format', 'gif'], { write, catalog, source })).rejects.toThrow(
      'Unsupported format. Available formats: png, jpeg, tiff.',
    );
    expect(getMapData).not.toHaveBeenCalled();
  });

  it('rejects an unknown border', async () => {
    await expect(main(['Rivertown', '--border', 'star'], { write, catalog })).rejects.toMatchObject({ code: 'INVALID_FIELD' });
  });

  it('needs a whole record for a place given by coordinates', async () => {
    await expect(main(['Somewhere', '--country', 'Gamma', '--lat=1'], { write, catalog })).rejects.toThrow(
      "input record is missing 'long' field",
    );
    await expect(main(['--lat=1', '--long=2'], { write, catalog })).rejects.toThrow("input record is missing 'name' field");
  });
});
