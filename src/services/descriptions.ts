import type { AxiosInstance } from "axios";
import { z } from "zod";
import type { Instrument } from "../types/index.ts";
import { errorMessage } from "../errors.ts";
import { RateLimiters } from "./rate-limiter.ts";
import { createHttpClient, toSourceError } from "./sources/http.ts";
import { VENDORS } from "./sources/vendors.ts";
import type { YahooFinanceClient } from "./sources/yahoo.ts";

const MAX_DESCRIPTION_LENGTH = 1000;
const WIKIPEDIA = "Wikipedia";

export interface DescriptionResult {
  description: string;
  source: string;
}

/**
 * Cuts a long text to about MAX_DESCRIPTION_LENGTH characters, preferring the
 * end of a sentence, then a word boundary.
 */
export function truncateDescription(
  text: string,
  maxLength: number = MAX_DESCRIPTION_LENGTH
): string {
  const clean = text.replace(/\s+/g, " ").trim();
  if (clean.length <= maxLength) return clean;

  const truncated = clean.slice(0, maxLength);
  const lastPeriod = truncated.lastIndexOf(".");
  if (lastPeriod > maxLength * 0.7) {
    return clean.slice(0, lastPeriod + 1);
  }
  const lastSpace = truncated.lastIndexOf(" ");
  if (lastSpace > maxLength * 0.9) {
    return `${clean.slice(0, lastSpace)}...`;
  }
  return `${truncated}...`;
}

const AssetProfileSchema = z.object({
  assetProfile: z
    .object({ longBusinessSummary: z.string().optional() })
    .passthrough()
    .optional(),
});

const AlphaVantageOverviewSchema = z
  .object({ Description: z.string().optional() })
  .passthrough();

const FmpProfileSchema = z.array(
  z.object({ description: z.string().nullish() }).passthrough()
);

const WikipediaSummarySchema = z
  .object({ type: z.string().optional(), extract: z.string().optional() })
  .passthrough();

type DescriptionLookup = {
  source: string;
  fetch: (instrument: Instrument) => Promise<string | null>;
};

/**
 * Free-text description of an instrument from the first provider that has
 * one: Yahoo asset profile, Alpha Vantage overview, FMP profile, Wikipedia.
 */
export class DescriptionService {
  private http: AxiosInstance;
  private lookups: DescriptionLookup[];

  constructor(
    private readonly yahoo: YahooFinanceClient,
    keys: { alphaVantage?: string; fmp?: string } = {},
    options: { http?: AxiosInstance; timeoutMs?: number; limiters?: RateLimiters } = {}
  ) {
    this.http = options.http ?? createHttpClient({ timeoutMs: options.timeoutMs });
    const limiters = options.limiters ?? new RateLimiters();

    this.lookups = [
      { source: VENDORS.yahoo, fetch: (i) => this.fromYahoo(i) },
    ];
    const { alphaVantage, fmp } = keys;
    if (alphaVantage) {
      this.lookups.push({
        source: VENDORS.alphaVantage,
        fetch: async (i) => {
          await limiters.for(VENDORS.alphaVantage).wait();
          return this.fromAlphaVantage(i, alphaVantage);
        },
      });
    }
    if (fmp) {
      this.lookups.push({
        source: VENDORS.fmp,
        fetch: async (i) => {
          await limiters.for(VENDORS.fmp).wait();
          return this.fromFmp(i, fmp);
        },
      });
    }
    this.lookups.push({
      source: WIKIPEDIA,
      fetch: async (i) => {
        await limiters.for(WIKIPEDIA).wait();
        return this.fromWikipedia(i);
      },
    });
  }

  async describe(instrument: Instrument): Promise<DescriptionResult | null> {
    for (const lookup of this.lookups) {
      try {
        const text = await lookup.fetch(instrument);
        if (text && text.trim().length > 0) {
          return { description: truncateDescription(text), source: lookup.source };
        }
      } catch (error) {
        console.warn(
          `  ${lookup.source} description failed for ${instrument.identifier}: ${errorMessage(error)}`
        );
      }
    }
    return null;
  }

  private async fromYahoo(instrument: Instrument): Promise<string | null> {
    if (!instrument.ticker) return null;
    const summary = await this.yahoo.fetchQuoteSummary(instrument.ticker, [
      "assetProfile",
    ]);
    const parsed = AssetProfileSchema.safeParse(summary ?? {});
    return parsed.success
      ? parsed.data.assetProfile?.longBusinessSummary ?? null
      : null;
  }

  private async fromAlphaVantage(
    instrument: Instrument,
    apiKey: string
  ): Promise<string | null> {
    if (!instrument.ticker) return null;
    const data = await this.get("https://www.alphavantage.co/query", VENDORS.alphaVantage, {
      function: "OVERVIEW",
      symbol: instrument.ticker,
      apikey: apiKey,
    });
    const parsed = AlphaVantageOverviewSchema.safeParse(data);
    return parsed.success ? parsed.data.Description ?? null : null;
  }

  private async fromFmp(instrument: Instrument, apiKey: string): Promise<string | null> {
    if (!instrument.ticker) return null;
    const data = await this.get(
      `https://financialmodelingprep.com/api/v3/profile/${encodeURIComponent(instrument.ticker)}`,
      VENDORS.fmp,
      { apikey: apiKey }
    );
    const parsed = FmpProfileSchema.safeParse(data);
    return parsed.success ? parsed.data[0]?.description ?? null : null;
  }

  private async fromWikipedia(instrument: Instrument): Promise<string | null> {
    const title = instrument.name ?? instrument.ticker;
    if (!title) return null;
    const data = await this.get(
      `https://en.wikipedia.org/api/rest_v1/page/summary/${encodeURIComponent(
        title.replace(/ /g, "_")
      )}`,
      WIKIPEDIA
    );
    const parsed = WikipediaSummarySchema.safeParse(data);
    if (!parsed.success || parsed.data.type === "disambiguation") return null;
    return parsed.data.extract ?? null;
  }

  private async get(
    url: string,
    source: string,
    params?: Record<string, string>
  ): Promise<unknown> {
    try {
      const response = await this.http.get(url, { params });
      return response.data;
    } catch (error) {
      throw toSourceError(source, error);
    }
  }
}
