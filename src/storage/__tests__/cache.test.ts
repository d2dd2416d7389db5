import { describe, it, expect, vi, afterEach } from 'vitest';
import { addDays, addHours, parseISO } from 'date-fns';
import { CacheManager } from '../cache.ts';
import { MemoryCacheStore } from '../memory-store.ts';
import { makeSeries } from '../../__tests__/helpers.ts';

afterEach(() => {
  vi.restoreAllMocks();
});

const WRITTEN_AT = '2024-06-01T12:00:00.000Z';

function cacheAt(store = new MemoryCacheStore()) {
  let now = parseISO(WRITTEN_AT);
  const cache = new CacheManager(store, () => now);
  return {
    cache,
    store,
    advance: (hours: number) => {
      now = addHours(now, hours);
    },
  };
}

describe('CacheManager', () => {
  it('returns what was stored while it is fresh', async () => {
    const { cache } = cacheAt();
    const series = makeSeries([10, 11, 12], { identifier: 'VFIAX', isAdjusted: true });

    await cache.put('VFIAX', 'historical', series, 'Yahoo Finance (ticker)');
    const entry = await cache.get('VFIAX', 'historical');

    expect(entry?.timestamp).toBe(WRITTEN_AT);
    expect(entry?.source).toBe('Yahoo Finance (ticker)');
    expect(entry?.data).toEqual(series);
  });

  it('expires price data after 24 hours but keeps it readable', async () => {
    const { cache, advance } = cacheAt();
    await cache.put('VFIAX', 'historical', makeSeries([10, 11]), 'Test Source');

    advance(24);
    expect(await cache.get('VFIAX', 'historical')).not.toBeNull();

    advance(1);
    expect(await cache.get('VFIAX', 'historical')).toBeNull();
    expect((await cache.peek('VFIAX', 'historical'))?.source).toBe('Test Source');
  });

  it('keeps descriptions for a week', async () => {
    const { cache, advance } = cacheAt();
    await cache.put('VFIAX', 'description', 'An index fund.', 'Wikipedia');

    advance(6 * 24);
    expect((await cache.get('VFIAX', 'description'))?.data).toBe('An index fund.');

    advance(2 * 24);
    expect(await cache.get('VFIAX', 'description')).toBeNull();
  });

  it('stores the validation report alongside the data', async () => {
    const { cache } = cacheAt();
    const validation = {
      valid: true,
      checks: {
        total_return: { passed: true, message: 'OK' },
        consistency: { passed: true, message: 'OK', warnings: ['2024-01-02: 12.00%'] },
        completeness: { passed: true, message: 'OK' },
      },
    };

    await cache.put('X', 'historical', makeSeries([1, 2]), 'Test Source', validation);

    expect((await cache.get('X', 'historical'))?.validation).toEqual(validation);
  });

  it('treats corrupt entries as misses', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { cache, store } = cacheAt();
    await store.write({ identifier: 'BAD', kind: 'historical' }, '{"data": ');
    await store.write(
      { identifier: 'WRONG', kind: 'composition' },
      JSON.stringify({ data: { sectors: 'none' }, timestamp: WRITTEN_AT, source: 'x' })
    );

    expect(await cache.get('BAD', 'historical')).toBeNull();
    expect(await cache.get('WRONG', 'composition')).toBeNull();
    expect(warn).toHaveBeenCalledWith('Cache entry BAD_historical unreadable, ignoring: not valid JSON');
  });

  it('treats a series that breaks record invariants as a miss', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { cache, store } = cacheAt();
    const entry = (records: unknown[]) =>
      JSON.stringify({
        data: { identifier: 'X', records, isAdjusted: false, sourceName: 'Test Source' },
        timestamp: WRITTEN_AT,
        source: 'Test Source',
      });

    const cases: Record<string, unknown[]> = {
      NEGATIVE: [{ date: '2024-01-02', price: -5 }],
      ZERO: [{ date: '2024-01-02', price: 0 }],
      NEGATIVEDIV: [{ date: '2024-01-02', price: 10, dividend: -1 }],
      UNORDERED: [
        { date: '2024-01-03', price: 10 },
        { date: '2024-01-02', price: 10 },
      ],
      REPEATED: [
        { date: '2024-01-02', price: 10 },
        { date: '2024-01-02', price: 11 },
      ],
      BADDATE: [{ date: 'not-a-date', price: 10 }],
    };
    for (const [identifier, records] of Object.entries(cases)) {
      await store.write({ identifier, kind: 'historical' }, entry(records));
    }

    for (const identifier of Object.keys(cases)) {
      expect(await cache.get(identifier, 'historical')).toBeNull();
    }
    expect(warn).toHaveBeenCalledTimes(6);
  });

  it('backfills the adjusted flag of older entries from their source', async () => {
    const { cache, store } = cacheAt();
    const legacy = (source: string) =>
      JSON.stringify({
        data: {
          identifier: 'LEGACY',
          records: [
            { date: '2024-01-02', price: 10, dividend: 0.2 },
            { date: '2024-01-03', price: 10.1 },
          ],
        },
        timestamp: WRITTEN_AT,
        source,
      });

    await store.write({ identifier: 'FROMEOD', kind: 'historical' }, legacy('EOD Historical Data'));
    await store.write({ identifier: 'FROMYAHOO', kind: 'historical' }, legacy('Yahoo Finance (ticker)'));

    const eod = await cache.get('FROMEOD', 'historical');
    const yahoo = await cache.get('FROMYAHOO', 'historical');

    expect(eod?.data.isAdjusted).toBe(true);
    expect(eod?.data.records[0]).toEqual({ date: '2024-01-02', price: 10, dividend: 0, capitalGain: 0 });
    expect(eod?.data.sourceName).toBe('EOD Historical Data');
    expect(eod?.data.fetchedAt).toBe(WRITTEN_AT);
    expect(yahoo?.data.isAdjusted).toBe(false);
    expect(yahoo?.data.records[0]).toEqual({ date: '2024-01-02', price: 10, dividend: 0.2, capitalGain: 0 });
  });

  it('lists entries with their age, sorted', async () => {
    const { cache, advance } = cacheAt();
    await cache.put('ZZZ', 'historical', makeSeries([1, 2]), 'Test Source');
    await cache.put('AAA', 'historical', makeSeries([1, 2]), 'Test Source');
    await cache.put('AAA', 'description', 'Text', 'Wikipedia');

    advance(30);
    const listing = await cache.list();

    expect(listing.map((l) => `${l.identifier}/${l.kind}`)).toEqual([
      'AAA/description',
      'AAA/historical',
      'ZZZ/historical',
    ]);
    expect(listing[0]).toEqual({
      identifier: 'AAA',
      kind: 'description',
      source: 'Wikipedia',
      timestamp: WRITTEN_AT,
      ageMs: 30 * 60 * 60 * 1000,
      expired: false,
    });
    expect(listing[1]?.expired).toBe(true);
  });

  it('measures entry age against its clock', () => {
    const { cache, advance } = cacheAt();
    advance(2);

    expect(cache.ageMs(WRITTEN_AT)).toBe(2 * 60 * 60 * 1000);
  });

  it('removes entries', async () => {
    const { cache } = cacheAt();
    await cache.put('X', 'description', 'Text', 'Wikipedia');
    await cache.remove('X', 'description');

    expect(await cache.peek('X', 'description')).toBeNull();
  });

  it('uses the injected clock for timestamps', async () => {
    const store = new MemoryCacheStore();
    const cache = new CacheManager(store, () => addDays(parseISO(WRITTEN_AT), 1));

    await cache.put('X', 'description', 'Text', 'Wikipedia');

    expect((await cache.peek('X', 'description'))?.timestamp).toBe('2024-06-02T12:00:00.000Z');
  });
});
