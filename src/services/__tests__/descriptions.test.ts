import { describe, it, expect, vi, afterEach } from 'vitest';
import { DescriptionService, truncateDescription } from '../descriptions.ts';
import { YahooFinanceClient } from '../sources/yahoo.ts';
import { RateLimiter, RateLimiters } from '../rate-limiter.ts';
import { stubHttp } from '../../__tests__/helpers.ts';
import type { StubReply, StubRequest } from '../../__tests__/helpers.ts';

afterEach(() => {
  vi.restoreAllMocks();
});

function service(
  handler: (request: StubRequest) => StubReply,
  keys: { alphaVantage?: string; fmp?: string } = {}
) {
  const stub = stubHttp(handler);
  const limiter = new RateLimiter(0);
  const yahoo = new YahooFinanceClient(limiter, { http: stub.http });
  return {
    descriptions: new DescriptionService(yahoo, keys, {
      http: stub.http,
      limiters: new RateLimiters(0),
    }),
    requests: stub.requests,
  };
}

const noProfile: StubReply = {
  data: { quoteSummary: { result: [{ assetProfile: {} }], error: null } },
};

const fund = { identifier: 'VFIAX', ticker: 'VFIAX', name: 'Vanguard 500 Index Fund' };

describe('truncateDescription', () => {
  it('leaves short text alone apart from whitespace', () => {
    expect(truncateDescription('  An   index\nfund. ')).toBe('An index fund.');
  });

  it('cuts at the last sentence when it is late enough', () => {
    const text = `${'a'.repeat(800)}. ${'b'.repeat(300)}`;
    expect(truncateDescription(text)).toBe(`${'a'.repeat(800)}.`);
  });

  it('falls back to a word boundary, then a hard cut', () => {
    expect(truncateDescription('word '.repeat(250))).toBe(`${'word '.repeat(199)}word...`);
    expect(truncateDescription('x'.repeat(1200))).toBe(`${'x'.repeat(1000)}...`);
  });
});

describe('DescriptionService', () => {
  it('uses the Yahoo asset profile first', async () => {
    const { descriptions, requests } = service(() => ({
      data: {
        quoteSummary: {
          result: [{ assetProfile: { longBusinessSummary: 'Tracks the S&P 500.' } }],
          error: null,
        },
      },
    }));

    expect(await descriptions.describe(fund)).toEqual({
      description: 'Tracks the S&P 500.',
      source: 'Yahoo Finance',
    });
    expect(requests.map((r) => r.url)).toEqual(['/v10/finance/quoteSummary/VFIAX']);
  });

  it('shares a provider limiter and leaves other providers alone', async () => {
    const stub = stubHttp((request) => {
      if (request.url.startsWith('https://en.wikipedia.org')) {
        return { data: { type: 'standard', extract: 'Wiki text.' } };
      }
      return request.url === 'https://www.alphavantage.co/query' ? { data: {} } : noProfile;
    });
    const sleep = vi.fn(async (_ms: number) => {});
    const limiters = new RateLimiters(1000, sleep, () => 5000);
    const yahoo = new YahooFinanceClient(new RateLimiter(0), { http: stub.http });
    const descriptions = new DescriptionService(
      yahoo,
      { alphaVantage: 'test-secret' },
      { http: stub.http, limiters }
    );

    // a price request to Alpha Vantage just went out
    await limiters.for('Alpha Vantage').wait();

    expect(await descriptions.describe(fund)).toEqual({
      description: 'Wiki text.',
      source: 'Wikipedia',
    });
    expect(sleep.mock.calls).toEqual([[1000]]);
  });

  it('tries keyed providers before Wikipedia', async () => {
    const { descriptions, requests } = service(
      (request) =>
        request.url === 'https://www.alphavantage.co/query'
          ? { data: { Symbol: 'VFIAX', Description: 'Overview text.' } }
          : noProfile,
      { alphaVantage: 'test-secret', fmp: 'test-secret' }
    );

    expect(await descriptions.describe(fund)).toEqual({
      description: 'Overview text.',
      source: 'Alpha Vantage',
    });
    expect(requests[1]?.params).toEqual({
      function: 'OVERVIEW',
      symbol: 'VFIAX',
      apikey: 'test-secret',
    });
    expect(requests).toHaveLength(2);
  });

  it('falls back to the Wikipedia summary of the name', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { descriptions, requests } = service((request) =>
      request.url.startsWith('https://en.wikipedia.org/')
        ? { data: { type: 'standard', extract: 'A mutual fund.' } }
        : { status: 500, data: 'error' }
    );

    expect(await descriptions.describe(fund)).toEqual({
      description: 'A mutual fund.',
      source: 'Wikipedia',
    });
    expect(requests[1]?.url).toBe(
      'https://en.wikipedia.org/api/rest_v1/page/summary/Vanguard_500_Index_Fund'
    );
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('ignores disambiguation pages', async () => {
    const { descriptions } = service((request) =>
      request.url.startsWith('https://en.wikipedia.org/')
        ? { data: { type: 'disambiguation', extract: 'May refer to...' } }
        : noProfile
    );

    expect(await descriptions.describe(fund)).toBeNull();
  });
});
