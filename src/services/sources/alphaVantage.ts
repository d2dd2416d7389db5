import type { AxiosInstance } from "axios";
import { z } from "zod";
import type { DateRange, Instrument, RawHistory, RawQuote } from "../../types/index.ts";
import { SourceUnavailableError } from "../../errors.ts";
import type { PriceSource, SourceCapability } from "../resolver.ts";
import { RateLimiter } from "../rate-limiter.ts";
import { createHttpClient, toSourceError } from "./http.ts";
import { VENDORS } from "./vendors.ts";

const DailyAdjustedSchema = z.object({
  "Time Series (Daily)": z
    .record(
      z.object({
        "4. close": z.coerce.number(),
        "5. adjusted close": z.coerce.number().optional(),
      })
    )
    .optional(),
  "Error Message": z.string().optional(),
  Note: z.string().optional(),
  Information: z.string().optional(),
});

/**
 * Alpha Vantage TIME_SERIES_DAILY_ADJUSTED. Works on tickers only, and the
 * adjusted endpoint needs a premium key; a free key gets an "Information"
 * reply which is reported as unavailable.
 */
export class AlphaVantageSource implements PriceSource {
  readonly name = VENDORS.alphaVantage;
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
        baseURL: "https://www.alphavantage.co",
        timeoutMs: options.timeoutMs,
      });
  }

  async fetch(instrument: Instrument, range: DateRange): Promise<RawHistory | null> {
    const symbol = instrument.ticker;
    if (!symbol) return null;

    await this.limiter.wait();

    let data: unknown;
    try {
      const response = await this.http.get("/query", {
        params: {
          function: "TIME_SERIES_DAILY_ADJUSTED",
          symbol,
          apikey: this.apiKey,
          outputsize: "full",
        },
      });
      data = response.data;
    } catch (error) {
      throw toSourceError(this.name, error);
    }

    const parsed = DailyAdjustedSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Invalid response for ${symbol}`);
    }

    const body = parsed.data;
    const notice = body["Error Message"] ?? body.Note ?? body.Information;
    if (notice) {
      throw new SourceUnavailableError(this.name, notice);
    }

    const quotes: RawQuote[] = Object.entries(body["Time Series (Daily)"] ?? {})
      .filter(([date]) => date >= range.start && date <= range.end)
      .map(([date, values]) => ({
        date,
        close: values["4. close"],
        adjClose: values["5. adjusted close"],
        dividend: 0,
        capitalGain: 0,
      }));

    if (quotes.length === 0) return null;
    return {
      symbol,
      quotes,
      vendorAdjusted: quotes.every((q) => q.adjClose !== undefined),
    };
  }
}
