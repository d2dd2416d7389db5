import { describe, it, expect } from 'vitest';
import {
  YahooExchangeSuffixSource,
  YahooFinanceClient,
  YahooIdentifierSource,
  YahooNationalSuffixSource,
  YahooTickerSource,
} from '../yahoo.ts';
import { RateLimiter } from '../../rate-limiter.ts';
import { SourceUnavailableError } from '../../../errors.ts';
import { stubHttp } from '../../../__tests__/helpers.ts';
import type { StubReply, StubRequest } from '../../../__tests__/helpers.ts';
import type { DateRange } from '../../../types/index.ts';

const range: DateRange = { start: '2024-01-01', end: '2024-12-31' };
// 2024-01-02 09:30 New York
const FIRST_SESSION = 1704205800;
const DAY = 86400;

function chart(symbol: string, count: number) {
  return {
    chart: {
      result: [
        {
          meta: { symbol, gmtoffset: -18000 },
          timestamp: Array.from({ length: count }, (_, i) => FIRST_SESSION + i * DAY),
          indicators: {
            quote: [{ close: Array.from({ length: count }, (_, i) => 50 + i) }],
          },
        },
      ],
      error: null,
    },
  };
}

function client(handler: (request: StubRequest) => StubReply) {
  const stub = stubHttp(handler);
  return { yahoo: new YahooFinanceClient(new RateLimiter(0), { http: stub.http }), ...stub };
}

describe('YahooFinanceClient.fetchChart', () => {
  it('maps timestamps to exchange-local dates and attaches distributions', async () => {
    const { yahoo, requests } = client(() => ({
      data: {
        chart: {
          result: [
            {
              meta: { symbol: 'VFIAX', gmtoffset: -18000 },
              timestamp: [FIRST_SESSION, FIRST_SESSION + DAY, FIRST_SESSION + 2 * DAY],
              events: {
                dividends: {
                  [String(FIRST_SESSION + 2 * DAY)]: { amount: 0.25, date: FIRST_SESSION + 2 * DAY },
                },
              },
              indicators: {
                quote: [{ close: [10, null, 10.2] }],
                adjclose: [{ adjclose: [9.5, null, 10.1] }],
              },
            },
          ],
          error: null,
        },
      },
    }));

    const history = await yahoo.fetchChart('VFIAX', range);

    expect(requests[0]?.url).toBe('/v8/finance/chart/VFIAX');
    expect(requests[0]?.params.interval).toBe('1d');
    expect(requests[0]?.params.events).toBe('div,splits,capitalGains');
    expect(history).toEqual({
      symbol: 'VFIAX',
      vendorAdjusted: false,
      quotes: [
        { date: '2024-01-02', close: 10, adjClose: 9.5, dividend: 0, capitalGain: 0 },
        { date: '2024-01-04', close: 10.2, adjClose: 10.1, dividend: 0.25, capitalGain: 0 },
      ],
    });
  });

  it('returns null when the symbol has no chart', async () => {
    const { yahoo } = client(() => ({
      data: { chart: { result: null, error: { code: 'Not Found', description: 'No data found' } } },
    }));

    await expect(yahoo.fetchChart('NOPE', range)).resolves.toBeNull();
  });

  it('reports HTTP failures as an unavailable source', async () => {
    const { yahoo } = client(() => ({ status: 429, data: 'Too Many Requests' }));

    await expect(yahoo.fetchChart('VFIAX', range)).rejects.toThrow(
      new SourceUnavailableError('Yahoo Finance', 'rate limited')
    );
  });
});

describe('Yahoo sources', () => {
  it('tries exchange suffixes in order and stops at the first hit', async () => {
    const { yahoo, requests } = client((request) =>
      request.url.endsWith('.DE')
        ? { data: chart('ABC.DE', 15) }
        : { status: 404, data: {} }
    );
    const source = new YahooExchangeSuffixSource(yahoo, ['L', 'PA', 'DE', 'MI']);

    const history = await source.fetch({ identifier: 'ABC', ticker: 'ABC' }, range);

    expect(requests.map((r) => r.url)).toEqual([
      '/v8/finance/chart/ABC.L',
      '/v8/finance/chart/ABC.PA',
      '/v8/finance/chart/ABC.DE',
    ]);
    expect(history?.symbol).toBe('ABC.DE');
    expect(history?.quotes).toHaveLength(15);
  });

  it('throws when every listing errors', async () => {
    const { yahoo } = client(() => ({ status: 404, data: {} }));
    const source = new YahooExchangeSuffixSource(yahoo, ['L', 'PA']);

    await expect(source.fetch({ identifier: 'ABC' }, range)).rejects.toBeInstanceOf(
      SourceUnavailableError
    );
  });

  it('treats a short history as a miss', async () => {
    const { yahoo } = client(() => ({ data: chart('VFIAX', 5) }));
    const source = new YahooTickerSource(yahoo);

    await expect(source.fetch({ identifier: 'VFIAX', ticker: 'VFIAX' }, range)).resolves.toBeNull();
  });

  it('skips sources that have nothing to try', async () => {
    const { yahoo, requests } = client(() => ({ data: chart('X', 15) }));

    await expect(new YahooTickerSource(yahoo).fetch({ identifier: 'LU0097089360' }, range)).resolves.toBeNull();
    await expect(
      new YahooIdentifierSource(yahoo).fetch({ identifier: 'VFIAX', ticker: 'VFIAX' }, range)
    ).resolves.toBeNull();
    await expect(
      new YahooExchangeSuffixSource(yahoo, ['L']).fetch({ identifier: '^GSPC', ticker: '^GSPC' }, range)
    ).resolves.toBeNull();
    expect(requests).toHaveLength(0);
  });

  it('uses the national suffix for Irish ISINs', async () => {
    const { yahoo, requests } = client(() => ({ data: chart('IE00B4L5Y983.IR', 12) }));
    const source = new YahooNationalSuffixSource(yahoo, { IE: 'IR' });

    const history = await source.fetch(
      { identifier: 'IE00B4L5Y983', isin: 'IE00B4L5Y983', countryCode: 'IE' },
      range
    );

    expect(requests.map((r) => r.url)).toEqual(['/v8/finance/chart/IE00B4L5Y983.IR']);
    expect(history?.quotes).toHaveLength(12);
  });
});
