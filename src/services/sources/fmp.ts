import type { AxiosInstance } from "axios";
import { z } from "zod";
import type { DateRange, Instrument, RawHistory, RawQuote } from "../../types/index.ts";
import type { PriceSource, SourceCapability } from "../resolver.ts";
import { RateLimiter } from "../rate-limiter.ts";
import { createHttpClient, toSourceError } from "./http.ts";
import { VENDORS } from "./vendors.ts";

const HistoricalResponseSchema = z.object({
  symbol: z.string().optional(),
  historical: z
    .array(
      z.object({
        date: z.string(),
        close: z.number(),
        adjClose: z.number().optional(),
      })
    )
    .optional(),
});

/**
 * Financial Modeling Prep daily history. adjClose embeds reinvested
 * distributions, so the series is taken as adjusted when every row has one.
 */
export class FinancialModelingPrepSource implements PriceSource {
  readonly name = VENDORS.fmp;
  readonly capability: SourceCapability = "total-return-api";
  private http: AxiosInstance;

  constructor(
    private readonly apiKey: string,
    private readonly limiter: RateLimiter = new RateLimiter(1000),
    options: { http?: AxiosInstance; timeoutMs?: number } = {}
  ) {
    this.http =
      options.http ??
      createHttpClient({
        baseURL: "https://financialmodelingprep.com/api/v3",
        timeoutMs: options.timeoutMs,
      });
  }

  async fetch(instrument: Instrument, range: DateRange): Promise<RawHistory | null> {
    const symbol = instrument.isin ?? instrument.ticker ?? instrument.identifier;
    await this.limiter.wait();

    let data: unknown;
    try {
      const response = await this.http.get(
        `/historical-price-full/${encodeURIComponent(symbol)}`,
        { params: { apikey: this.apiKey, from: range.start, to: range.end } }
      );
      data = response.data;
    } catch (error) {
      throw toSourceError(this.name, error);
    }

    const parsed = HistoricalResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Invalid response for ${symbol}`);
    }

    const historical = parsed.data.historical ?? [];
    if (historical.length === 0) return null;

    const quotes: RawQuote[] = historical.map((item) => ({
      date: item.date,
      close: item.close,
      adjClose: item.adjClose,
      dividend: 0,
      capitalGain: 0,
    }));

    return {
      symbol: parsed.data.symbol ?? symbol,
      quotes,
      vendorAdjusted: quotes.every((q) => q.adjClose !== undefined),
    };
  }
}
