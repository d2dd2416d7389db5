import type { AxiosInstance } from "axios";
import { getUnixTime, parseISO, addDays } from "date-fns";
import { z } from "zod";
import type {
  DateRange,
  Instrument,
  RawHistory,
  RawQuote,
} from "../../types/index.ts";
import { MIN_RECORDS } from "../resolver.ts";
import type { PriceSource, SourceCapability } from "../resolver.ts";
import { RateLimiter } from "../rate-limiter.ts";
import { BROWSER_HEADERS, createHttpClient, toSourceError } from "./http.ts";
import { VENDORS } from "./vendors.ts";

const NullableNumbers = z.array(z.number().nullable());

const EventSchema = z.object({ amount: z.number(), date: z.number() });

const ChartResultSchema = z.object({
  meta: z
    .object({
      symbol: z.string().optional(),
      gmtoffset: z.number().optional(),
    })
    .passthrough(),
  timestamp: z.array(z.number()).optional(),
  events: z
    .object({
      dividends: z.record(EventSchema).optional(),
      capitalGains: z.record(EventSchema).optional(),
    })
    .passthrough()
    .optional(),
  indicators: z.object({
    quote: z.array(z.object({ close: NullableNumbers.optional() }).passthrough()),
    adjclose: z.array(z.object({ adjclose: NullableNumbers.optional() })).optional(),
  }),
});

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(ChartResultSchema).nullable(),
    error: z
      .object({ code: z.string().optional(), description: z.string().optional() })
      .nullable()
      .optional(),
  }),
});

const QuoteSummaryResponseSchema = z.object({
  quoteSummary: z.object({
    result: z.array(z.record(z.unknown())).nullable(),
  }),
});

function toTradingDate(timestamp: number, gmtOffset: number): string {
  return new Date((timestamp + gmtOffset) * 1000).toISOString().slice(0, 10);
}

/**
 * Thin client over Yahoo Finance's public chart and quote-summary endpoints.
 * All calls go through one rate limiter.
 */
export class YahooFinanceClient {
  private http: AxiosInstance;

  constructor(
    private readonly limiter: RateLimiter = new RateLimiter(1000),
    options: { http?: AxiosInstance; timeoutMs?: number } = {}
  ) {
    this.http =
      options.http ??
      createHttpClient({
        baseURL: "https://query1.finance.yahoo.com",
        timeoutMs: options.timeoutMs,
        headers: { "User-Agent": BROWSER_HEADERS["User-Agent"] },
      });
  }

  async fetchChart(symbol: string, range: DateRange): Promise<RawHistory | null> {
    await this.limiter.wait();

    let payload: unknown;
    try {
      const response = await this.http.get(
        `/v8/finance/chart/${encodeURIComponent(symbol)}`,
        {
          params: {
            interval: "1d",
            period1: getUnixTime(parseISO(range.start)),
            // period2 is exclusive
            period2: getUnixTime(addDays(parseISO(range.end), 1)),
            events: "div,splits,capitalGains",
            includeAdjustedClose: "true",
          },
        }
      );
      payload = response.data;
    } catch (error) {
      throw toSourceError(VENDORS.yahoo, error);
    }

    const parsed = ChartResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`Unexpected chart response for ${symbol}`);
    }

    const result = parsed.data.chart.result?.[0];
    if (!result || !result.timestamp) return null;

    const gmtOffset = result.meta.gmtoffset ?? 0;
    const closes = result.indicators.quote[0]?.close ?? [];
    const adjCloses = result.indicators.adjclose?.[0]?.adjclose ?? [];

    const dividends = new Map<string, number>();
    for (const event of Object.values(result.events?.dividends ?? {})) {
      const date = toTradingDate(event.date, gmtOffset);
      dividends.set(date, (dividends.get(date) ?? 0) + event.amount);
    }
    const capitalGains = new Map<string, number>();
    for (const event of Object.values(result.events?.capitalGains ?? {})) {
      const date = toTradingDate(event.date, gmtOffset);
      capitalGains.set(date, (capitalGains.get(date) ?? 0) + event.amount);
    }

    const quotes: RawQuote[] = [];
    result.timestamp.forEach((ts, idx) => {
      const close = closes[idx];
      if (close === null || close === undefined || !Number.isFinite(close)) return;
      const date = toTradingDate(ts, gmtOffset);
      const adjClose = adjCloses[idx];
      quotes.push({
        date,
        close,
        adjClose: adjClose ?? undefined,
        dividend: dividends.get(date) ?? 0,
        capitalGain: capitalGains.get(date) ?? 0,
      });
    });

    return {
      symbol: result.meta.symbol ?? symbol,
      quotes,
      vendorAdjusted: false,
    };
  }

  /**
   * Raw quote-summary modules for a symbol (assetProfile, topHoldings, ...).
   */
  async fetchQuoteSummary(
    symbol: string,
    modules: string[]
  ): Promise<Record<string, unknown> | null> {
    await this.limiter.wait();

    try {
      const response = await this.http.get(
        `/v10/finance/quoteSummary/${encodeURIComponent(symbol)}`,
        { params: { modules: modules.join(",") } }
      );
      const parsed = QuoteSummaryResponseSchema.safeParse(response.data);
      if (!parsed.success) return null;
      return parsed.data.quoteSummary.result?.[0] ?? null;
    } catch (error) {
      throw toSourceError(VENDORS.yahoo, error);
    }
  }
}

abstract class YahooSymbolSource implements PriceSource {
  abstract readonly name: string;
  readonly capability: SourceCapability = "market-data";

  constructor(protected readonly client: YahooFinanceClient) {}

  protected abstract symbolsFor(instrument: Instrument): string[];

  async fetch(instrument: Instrument, range: DateRange): Promise<RawHistory | null> {
    const symbols = this.symbolsFor(instrument);
    let failures = 0;
    let lastError: unknown;

    for (const symbol of symbols) {
      try {
        const history = await this.client.fetchChart(symbol, range);
        if (history && history.quotes.length > MIN_RECORDS) {
          return history;
        }
      } catch (error) {
        failures++;
        lastError = error;
      }
    }

    // Every listing errored: report it instead of a plain miss
    if (symbols.length > 0 && failures === symbols.length) throw lastError;
    return null;
  }
}

/** Known ticker: from the ISIN mapping, a lookup, or the identifier itself. */
export class YahooTickerSource extends YahooSymbolSource {
  readonly name = `${VENDORS.yahoo} (ticker)`;

  protected symbolsFor(instrument: Instrument): string[] {
    return instrument.ticker ? [instrument.ticker] : [];
  }
}

/** Identifier combined with each known exchange suffix, in order. */
export class YahooExchangeSuffixSource extends YahooSymbolSource {
  readonly name = `${VENDORS.yahoo} (exchange suffix)`;

  constructor(
    client: YahooFinanceClient,
    private readonly suffixes: string[]
  ) {
    super(client);
  }

  protected symbolsFor(instrument: Instrument): string[] {
    const base = instrument.identifier;
    if (base.includes(".") || base.startsWith("^")) return [];
    return this.suffixes.map((suffix) => `${base}.${suffix}`);
  }
}

/** Identifier used verbatim as a symbol. */
export class YahooIdentifierSource extends YahooSymbolSource {
  readonly name = `${VENDORS.yahoo} (identifier)`;

  protected symbolsFor(instrument: Instrument): string[] {
    // Already tried by the ticker source
    if (instrument.ticker === instrument.identifier) return [];
    return [instrument.identifier];
  }
}

/** Country-specific listing suffix for ISIN prefixes such as IE -> .IR */
export class YahooNationalSuffixSource extends YahooSymbolSource {
  readonly name = `${VENDORS.yahoo} (national suffix)`;

  constructor(
    client: YahooFinanceClient,
    private readonly prefixSuffixes: Record<string, string>
  ) {
    super(client);
  }

  protected symbolsFor(instrument: Instrument): string[] {
    if (!instrument.isin || !instrument.countryCode) return [];
    const suffix = this.prefixSuffixes[instrument.countryCode];
    return suffix ? [`${instrument.isin}.${suffix}`] : [];
  }
}
