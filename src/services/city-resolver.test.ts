import { describe, expect, it, vi } from 'vitest';
import { CityViewError } from '../lib/errors';
import { testCatalog } from '../test/fixtures';
import { formatCityChoice, getCity, newCity, randomCity, resolveConflicts, validateCityRecord } from './city-resolver';

const catalog = testCatalog();

describe('getCity', () => {
  it('returns the single city with that name', async () => {
    const city = await getCity('Rivertown', { catalog });

    expect(city).toEqual({ name: 'Rivertown', country: 'Alpha', lat: 5, long: 5, population: 500000 });
  });

  it('names the city it cannot find', async () => {
    const promise = getCity('Atlantis', { catalog });

    await expect(promise).rejects.toBeInstanceOf(CityViewError);
    await expect(getCity('Atlantis', { catalog })).rejects.toMatchObject({ code: 'CITY_NOT_FOUND' });
    await expect(getCity('Atlantis', { catalog })).rejects.toThrow("There is no city called 'Atlantis' in the available data.");
  });

  it('refuses to guess between namesakes without a chooser', async () => {
    await expect(getCity('Springfield', { catalog })).rejects.toThrow(
      "More than one city is called 'Springfield':\n" +
        '  Springfield, Alpha | Lat: 10 | Long: 20\n' +
        '  Springfield, Beta | Lat: -10.123 | Long: 30.988\n' +
        'Pass the city as a record or narrow it down by country.',
    );
  });

  it('asks the chooser which namesake to draw', async () => {
    const choose = vi.fn().mockResolvedValue(1);

    const city = await getCity('Springfield', { catalog, choose });

    expect(city?.country).toBe('Beta');
    expect(choose).toHaveBeenCalledWith(
      ['Springfield, Alpha | Lat: 10 | Long: 20', 'Springfield, Beta | Lat: -10.123 | Long: 30.988'],
      'More than one city matched to this name, which one to pick?',
    );
  });

  it('returns null when the choice is declined', async () => {
    const city = await getCity('Springfield', { catalog, choose: vi.fn().mockResolvedValue(null) });

    expect(city).toBeNull();
  });

  it('rejects a choice outside the menu', async () => {
    await expect(getCity('Springfield', { catalog, choose: vi.fn().mockResolvedValue(2) })).rejects.toMatchObject({
      code: 'INVALID_FIELD',
    });
  });

  it('takes a record as the city', async () => {
    const city = await getCity({ name: 'Elsewhere', country: 'Gamma', lat: 1.5, long: -2.5 }, { catalog });

    expect(city).toEqual({ name: 'Elsewhere', country: 'Gamma', lat: 1.5, long: -2.5 });
  });

  it('picks a random city when no name is given', async () => {
    const a = await getCity(undefined, { catalog, seed: 11 });
    const b = await getCity(null, { catalog, seed: 11 });

    expect(a).toEqual(b);
  });
});

describe('validateCityRecord', () => {
  it.each([
    [{ country: 'Gamma', lat: 1, long: 2 }, 'name'],
    [{ name: 'Elsewhere', lat: 1, long: 2 }, 'country'],
    [{ name: 'Elsewhere', country: 'Gamma', long: 2 }, 'lat'],
    [{ name: 'Elsewhere', country: 'Gamma', lat: 1 }, 'long'],
  ])('names the missing field of %o', (record, field) => {
    expect(() => validateCityRecord(record)).toThrow(`input record is missing '${field}' field`);
  });

  it('reports the first missing field in order', () => {
    expect(() => validateCityRecord({ lat: 1 })).toThrow("input record is missing 'name' field");
  });

  it('rejects a field of the wrong type', () => {
    expect(() => validateCityRecord({ name: 'Elsewhere', country: 'Gamma', lat: 'north', long: 2 })).toThrow(
      "input record has an invalid 'lat' field",
    );
  });
});

describe('randomCity', () => {
  it('is deterministic for a seed', async () => {
    const first = await randomCity(7, undefined, catalog);
    const second = await randomCity(7, undefined, catalog);

    expect(first).toEqual(second);
    expect(first.population).toBeGreaterThan(200000);
  });

  it('only picks cities strictly above the threshold', async () => {
    for (let seed = 0; seed < 5; seed++) {
      const city = await randomCity(seed, 300000, catalog);
      expect(city.name).toBe('Rivertown');
    }
  });

  it('fails when no city is large enough', async () => {
    await expect(randomCity(1, 1000000, catalog)).rejects.toMatchObject({ code: 'CITY_NOT_FOUND' });
  });
});

describe('resolveConflicts', () => {
  it('returns the only match without asking', async () => {
    const choose = vi.fn();
    const only = newCity('Solo', 'Gamma', 0, 0);

    expect(await resolveConflicts('Solo', [only], choose)).toBe(only);
    expect(choose).not.toHaveBeenCalled();
  });
});

describe('formatCityChoice', () => {
  it('rounds coordinates to three decimals', () => {
    expect(formatCityChoice(newCity('Paris', 'France', 48.8566, 2.3522))).toBe('Paris, France | Lat: 48.857 | Long: 2.352');
  });
});

describe('newCity', () => {
  it('rejects coordinates off the globe', () => {
    expect(() => newCity('Nowhere', 'Gamma', 91, 0)).toThrow("input record has an invalid 'lat' field");
    expect(() => newCity('Nowhere', 'Gamma', 0, 181)).toThrow("input record has an invalid 'long' field");
  });
});
