import type { AxiosInstance } from "axios";
import { z } from "zod";
import type { DateRange, Instrument, RawHistory, RawQuote } from "../../types/index.ts";
import type { PriceSource, SourceCapability } from "../resolver.ts";
import { RateLimiter } from "../rate-limiter.ts";
import { createHttpClient, toSourceError } from "./http.ts";
import { VENDORS } from "./vendors.ts";

const EodRowSchema = z.object({
  date: z.string(),
  close: z.coerce.number(),
  adjusted_close: z.coerce.number().optional(),
});

export class EODHistoricalSource implements PriceSource {
  readonly name = VENDORS.eodhd;
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
        baseURL: "https://eodhistoricaldata.com/api",
        timeoutMs: options.timeoutMs,
      });
  }

  async fetch(instrument: Instrument, range: DateRange): Promise<RawHistory | null> {
    // EOD accepts ISINs directly for many funds
    const symbol = instrument.isin ?? instrument.ticker ?? instrument.identifier;
    await this.limiter.wait();

    let data: unknown;
    try {
      const response = await this.http.get(`/eod/${encodeURIComponent(symbol)}`, {
        params: {
          api_token: this.apiKey,
          fmt: "json",
          period: "d",
          from: range.start,
          to: range.end,
        },
      });
      data = response.data;
    } catch (error) {
      throw toSourceError(this.name, error);
    }

    if (!Array.isArray(data)) {
      throw new Error(`Invalid response for ${symbol}`);
    }

    const rows = data.flatMap((row: unknown) => {
      const parsed = EodRowSchema.safeParse(row);
      return parsed.success ? [parsed.data] : [];
    });
    if (rows.length === 0) return null;

    const hasAdjusted = rows.every((row) => row.adjusted_close !== undefined);
    const quotes: RawQuote[] = rows.map((row) => ({
      date: row.date,
      close: row.close,
      adjClose: row.adjusted_close,
      // EOD does not report distributions on this endpoint
      dividend: 0,
      capitalGain: 0,
    }));

    return { symbol, quotes, vendorAdjusted: hasAdjusted };
  }
}
