import axios, { AxiosError } from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { addDays, format, isWeekend, parseISO } from 'date-fns';
import type { DailyRecord, PriceSeries, RawQuote } from '../types/index.ts';

/** Consecutive weekdays starting at (or after) `start`. */
export function tradingDays(start: string, count: number): string[] {
  const days: string[] = [];
  let current = parseISO(start);
  while (days.length < count) {
    if (!isWeekend(current)) days.push(format(current, 'yyyy-MM-dd'));
    current = addDays(current, 1);
  }
  return days;
}

export function makeRecords(
  prices: number[],
  options: { start?: string; distributions?: Record<number, number> } = {}
): DailyRecord[] {
  const dates = tradingDays(options.start ?? '2024-01-01', prices.length);
  return prices.map((price, idx) => ({
    date: dates[idx] ?? '',
    price,
    dividend: options.distributions?.[idx] ?? 0,
    capitalGain: 0,
  }));
}

export function makeSeries(
  prices: number[],
  options: {
    identifier?: string;
    isAdjusted?: boolean;
    start?: string;
    distributions?: Record<number, number>;
  } = {}
): PriceSeries {
  return {
    identifier: options.identifier ?? 'TEST',
    records: makeRecords(prices, options),
    isAdjusted: options.isAdjusted ?? false,
    sourceName: 'Test Source',
    fetchedAt: '2024-06-01T00:00:00.000Z',
  };
}

export function makeQuotes(count: number, start = '2024-01-01', base = 100): RawQuote[] {
  return tradingDays(start, count).map((date, idx) => ({
    date,
    close: base + (idx % 5) + idx * 0.1,
    dividend: 0,
    capitalGain: 0,
  }));
}

export interface StubRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  data: unknown;
}

export interface StubReply {
  status?: number;
  data: unknown;
}

/**
 * Axios instance whose requests are answered in process by `handler`.
 */
export function stubHttp(handler: (request: StubRequest) => StubReply): {
  http: AxiosInstance;
  requests: StubRequest[];
} {
  const requests: StubRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const request: StubRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: `${config.baseURL ?? ''}${config.url ?? ''}`,
      params: config.params ?? {},
      data: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
    };
    requests.push(request);

    const reply = handler(request);
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status ?? 200,
      statusText: '',
      headers: {},
      config,
    };
    if (response.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${response.status}`,
        AxiosError.ERR_BAD_REQUEST,
        config,
        undefined,
        response
      );
    }
    return response;
  };

  return { http: axios.create({ adapter }), requests };
}
