import type {
  DailyRecord,
  Instrument,
  PriceSeries,
  RawQuote,
  ResolvedHistory,
} from "../types/index.ts";
import { reconstructAdjustedPrices } from "./total-return.ts";

export type InstrumentClass =
  | { kind: "domestic-adjusted-fund"; ticker: string }
  | { kind: "foreign-or-equity-or-etf" };

// Domestic mutual fund tickers: five letters ending in X (VFIAX, PRHSX)
const FUND_TICKER_PATTERN = /^[A-Z]{4}X$/;

/**
 * Decides whether an instrument is a domestic mutual fund, whose provider
 * prices should be taken as total-return adjusted. A bare ticker carries no
 * country code and is taken as listed in the home market.
 */
export function classifyInstrument(
  instrument: Instrument,
  homeMarket: string = "US",
  symbol?: string
): InstrumentClass {
  const country = instrument.countryCode ?? homeMarket;
  const ticker = instrument.ticker ?? symbol;

  if (
    country === homeMarket &&
    ticker !== undefined &&
    FUND_TICKER_PATTERN.test(ticker)
  ) {
    return { kind: "domestic-adjusted-fund", ticker };
  }

  return { kind: "foreign-or-equity-or-etf" };
}

/**
 * Builds a PriceSeries. Adjusted series never carry distributions: they are
 * already folded into the price, so they are zeroed here.
 */
export function createPriceSeries(params: {
  identifier: string;
  symbol?: string;
  records: DailyRecord[];
  isAdjusted: boolean;
  sourceName: string;
  fetchedAt?: string;
}): PriceSeries {
  const records = params.isAdjusted
    ? params.records.map((r) => ({ ...r, dividend: 0, capitalGain: 0 }))
    : params.records;

  return {
    identifier: params.identifier,
    symbol: params.symbol,
    records,
    isAdjusted: params.isAdjusted,
    sourceName: params.sourceName,
    fetchedAt: params.fetchedAt ?? new Date().toISOString(),
  };
}

/**
 * Orders quotes by date, keeps the last quote seen for a duplicated date and
 * drops quotes without a usable close.
 */
export function normalizeQuotes(quotes: RawQuote[]): RawQuote[] {
  const byDate = new Map<string, RawQuote>();
  for (const quote of quotes) {
    if (!Number.isFinite(quote.close) || quote.close <= 0) continue;
    byDate.set(quote.date, {
      ...quote,
      dividend: quote.dividend > 0 ? quote.dividend : 0,
      capitalGain: quote.capitalGain > 0 ? quote.capitalGain : 0,
    });
  }
  return [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
}

function hasAdjustedClose(quote: RawQuote): quote is RawQuote & { adjClose: number } {
  return (
    quote.adjClose !== undefined &&
    Number.isFinite(quote.adjClose) &&
    quote.adjClose > 0
  );
}

export interface AdjustmentOptions {
  homeMarket?: string;
  exDistributionThreshold?: number;
}

export function buildPriceSeries(
  instrument: Instrument,
  history: ResolvedHistory,
  options: AdjustmentOptions = {}
): PriceSeries {
  const quotes = normalizeQuotes(history.quotes);
  const base = {
    identifier: instrument.identifier,
    symbol: history.symbol,
    sourceName: history.sourceName,
  };

  if (history.vendorAdjusted) {
    if (quotes.length > 0 && quotes.every(hasAdjustedClose)) {
      return createPriceSeries({
        ...base,
        isAdjusted: true,
        records: quotes.map((q: RawQuote) => ({
          date: q.date,
          price: hasAdjustedClose(q) ? q.adjClose : q.close,
          dividend: 0,
          capitalGain: 0,
        })),
      });
    }
    // Mixing adjusted and raw closes would fake a price jump
    console.warn(
      `  ${history.sourceName} returned quotes without an adjusted close for ${instrument.identifier}, classifying instead`
    );
  }

  const rawRecords: DailyRecord[] = quotes.map((q) => ({
    date: q.date,
    price: q.close,
    dividend: q.dividend,
    capitalGain: q.capitalGain,
  }));

  const classification = classifyInstrument(
    instrument,
    options.homeMarket,
    history.symbol
  );

  switch (classification.kind) {
    case "domestic-adjusted-fund": {
      if (quotes.length > 0 && quotes.every(hasAdjustedClose)) {
        return createPriceSeries({
          ...base,
          isAdjusted: true,
          records: quotes.map((q: RawQuote) => ({
            date: q.date,
            price: hasAdjustedClose(q) ? q.adjClose : q.close,
            dividend: 0,
            capitalGain: 0,
          })),
        });
      }

      // No native adjusted close: rebuild it from the distributions
      const adjusted = reconstructAdjustedPrices(rawRecords, {
        exDistributionThreshold: options.exDistributionThreshold,
      });
      return createPriceSeries({
        ...base,
        isAdjusted: true,
        records: adjusted.map((point) => ({
          date: point.date,
          price: point.value,
          dividend: 0,
          capitalGain: 0,
        })),
      });
    }
    case "foreign-or-equity-or-etf":
      return createPriceSeries({ ...base, isAdjusted: false, records: rawRecords });
  }
}
