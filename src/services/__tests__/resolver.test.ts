import { describe, it, expect, vi, afterEach } from 'vitest';
import { SourceResolver } from '../resolver.ts';
import type { PriceSource, SourceCapability } from '../resolver.ts';
import { SourceUnavailableError } from '../../errors.ts';
import { makeQuotes } from '../../__tests__/helpers.ts';
import type { DateRange, Instrument, RawHistory } from '../../types/index.ts';

afterEach(() => {
  vi.restoreAllMocks();
});

const instrument: Instrument = {
  identifier: 'LU0097089360',
  isin: 'LU0097089360',
  countryCode: 'LU',
};
const range: DateRange = { start: '2024-01-01', end: '2024-12-31' };

class FakeSource implements PriceSource {
  readonly capability: SourceCapability = 'market-data';
  calls = 0;

  constructor(
    readonly name: string,
    private readonly behaviour: () => RawHistory | null
  ) {}

  async fetch(): Promise<RawHistory | null> {
    this.calls++;
    return this.behaviour();
  }
}

const history = (count: number): RawHistory => ({
  symbol: 'SYM',
  quotes: makeQuotes(count),
  vendorAdjusted: false,
});

describe('SourceResolver', () => {
  it('falls through failing sources to the first usable history', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const sources = [
      new FakeSource('one', () => {
        throw new SourceUnavailableError('one', 'HTTP 500');
      }),
      new FakeSource('two', () => null),
      new FakeSource('three', () => history(0)),
      new FakeSource('four', () => {
        throw new Error('socket hang up');
      }),
      new FakeSource('five', () => history(15)),
    ];
    const resolver = new SourceResolver(sources);

    const result = await resolver.resolve(instrument, range);

    expect(result?.sourceName).toBe('five');
    expect(result?.quotes).toHaveLength(15);
    expect(sources.map((s) => s.calls)).toEqual([1, 1, 1, 1, 1]);
  });

  it('stops at the first acceptable source', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const first = new FakeSource('first', () => history(20));
    const second = new FakeSource('second', () => history(20));

    const result = await new SourceResolver([first, second]).resolve(instrument, range);

    expect(result?.sourceName).toBe('first');
    expect(second.calls).toBe(0);
  });

  it('returns null when every source is exhausted', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const resolver = new SourceResolver([
      new FakeSource('a', () => {
        throw new Error('boom');
      }),
      new FakeSource('b', () => null),
    ]);

    await expect(resolver.resolve(instrument, range)).resolves.toBeNull();
    expect(warn).toHaveBeenLastCalledWith('No data found for LU0097089360 from any source');
  });

  it('requires more than ten usable records', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const ten = new SourceResolver([new FakeSource('ten', () => history(10))]);
    const eleven = new SourceResolver([new FakeSource('eleven', () => history(11))]);

    await expect(ten.resolve(instrument, range)).resolves.toBeNull();
    expect((await eleven.resolve(instrument, range))?.sourceName).toBe('eleven');
  });

  it('lists source names in priority order', () => {
    const resolver = new SourceResolver([
      new FakeSource('a', () => null),
      new FakeSource('b', () => null),
    ]);

    expect(resolver.sourceNames).toEqual(['a', 'b']);
  });
});
