import type { AxiosInstance } from "axios";
import * as cheerio from "cheerio";
import { format, isValid, parse } from "date-fns";
import type { DateRange, Instrument, RawHistory, RawQuote } from "../../types/index.ts";
import type { PriceSource, SourceCapability } from "../resolver.ts";
import { RateLimiter } from "../rate-limiter.ts";
import { BROWSER_HEADERS, createHttpClient, toSourceError } from "./http.ts";
import { VENDORS } from "./vendors.ts";

export interface ScraperProfile {
  name: string;
  url: (isin: string) => string;
  dateFormats: string[];
  decimalSeparator: "," | ".";
  acceptLanguage: string;
}

export const SCRAPER_PROFILES: ScraperProfile[] = [
  {
    name: VENDORS.morningstar,
    url: (isin) =>
      `https://www.morningstar.it/it/funds/snapshot/snapshot.aspx?id=${isin}`,
    dateFormats: ["dd/MM/yyyy", "yyyy-MM-dd"],
    decimalSeparator: ",",
    acceptLanguage: "it-IT,it;q=0.9,en-US;q=0.8,en;q=0.7",
  },
  {
    name: VENDORS.finanzen,
    url: (isin) => `https://www.finanzen.net/fonds/historisch/${isin}`,
    dateFormats: ["dd.MM.yyyy", "yyyy-MM-dd"],
    decimalSeparator: ",",
    acceptLanguage: "de-DE,de;q=0.9,en-US;q=0.8,en;q=0.7",
  },
  {
    name: VENDORS.justEtf,
    url: (isin) => `https://www.justetf.com/it/etf-profile.html?isin=${isin}`,
    dateFormats: ["dd/MM/yy", "dd/MM/yyyy", "yyyy-MM-dd"],
    decimalSeparator: ",",
    acceptLanguage: "it-IT,it;q=0.9,en-US;q=0.8",
  },
];

export function parseLocaleNumber(
  text: string,
  decimalSeparator: "," | "."
): number | null {
  let cleaned = text.replace(/[\s ]|EUR|USD|CHF|GBP|€|\$|£|%/g, "");
  if (decimalSeparator === ",") {
    cleaned = cleaned.replace(/\./g, "").replace(",", ".");
  } else {
    cleaned = cleaned.replace(/,/g, "");
  }
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return null;
  return Number(cleaned);
}

export function parseLocaleDate(text: string, formats: string[]): string | null {
  const trimmed = text.trim();
  for (const fmt of formats) {
    const parsed = parse(trimmed, fmt, new Date());
    if (isValid(parsed)) {
      return format(parsed, "yyyy-MM-dd");
    }
  }
  return null;
}

/**
 * Pulls a date/price history out of any table on the page whose rows start
 * with a date followed by a numeric cell. Pages without such a table yield an
 * empty list.
 */
export function parseHistoryTable(
  html: string,
  profile: Pick<ScraperProfile, "dateFormats" | "decimalSeparator">
): RawQuote[] {
  const $ = cheerio.load(html);
  const quotes: RawQuote[] = [];

  $("table tr").each((_, row) => {
    const cells = $(row)
      .find("td")
      .map((__, cell) => $(cell).text().trim())
      .get();

    const [first, ...rest] = cells;
    if (first === undefined) return;

    const date = parseLocaleDate(first, profile.dateFormats);
    if (!date) return;

    for (const cell of rest) {
      const price = parseLocaleNumber(cell, profile.decimalSeparator);
      if (price !== null && price > 0) {
        quotes.push({ date, close: price, dividend: 0, capitalGain: 0 });
        break;
      }
    }
  });

  return quotes;
}

/**
 * Best-effort scrape of a finance portal's fund page. Portal layouts change
 * often; a page that cannot be parsed is a miss, not an error.
 */
export class PortalScraperSource implements PriceSource {
  readonly name: string;
  readonly capability: SourceCapability = "web-scrape";
  private http: AxiosInstance;

  constructor(
    private readonly profile: ScraperProfile,
    private readonly limiter: RateLimiter = new RateLimiter(1000),
    options: { http?: AxiosInstance; timeoutMs?: number } = {}
  ) {
    this.name = profile.name;
    this.http =
      options.http ??
      createHttpClient({
        timeoutMs: options.timeoutMs,
        headers: {
          ...BROWSER_HEADERS,
          "Accept-Language": profile.acceptLanguage,
        },
      });
  }

  async fetch(instrument: Instrument, range: DateRange): Promise<RawHistory | null> {
    if (!instrument.isin) return null;

    await this.limiter.wait();

    let html: string;
    try {
      const response = await this.http.get<string>(this.profile.url(instrument.isin), {
        responseType: "text",
      });
      html = String(response.data);
    } catch (error) {
      throw toSourceError(this.name, error);
    }

    const title = cheerio.load(html)("title").text().toLowerCase();
    if (title.includes("not found") || title.includes("404")) {
      return null;
    }

    const quotes = parseHistoryTable(html, this.profile).filter(
      (q) => q.date >= range.start && q.date <= range.end
    );
    if (quotes.length === 0) return null;

    return { symbol: instrument.isin, quotes, vendorAdjusted: false };
  }
}
