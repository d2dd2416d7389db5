export interface DailyRecord {
  date: string; // YYYY-MM-DD format

  // Close as reported by the source (raw or adjusted, see PriceSeries.isAdjusted)
  price: number;

  // Distributions paid on that day
  dividend: number;
  capitalGain: number;
}

export interface PriceSeries {
  identifier: string;
  symbol?: string; // provider symbol that produced the data
  records: DailyRecord[];
  isAdjusted: boolean; // price already embeds reinvested distributions
  sourceName: string;
  fetchedAt: string;
}

// Quote as returned by a provider, before classification
export interface RawQuote {
  date: string;
  close: number;
  adjClose?: number;
  dividend: number;
  capitalGain: number;
}

export interface RawHistory {
  symbol: string;
  quotes: RawQuote[];
  vendorAdjusted: boolean; // vendor always returns total-return adjusted prices
}

export interface ResolvedHistory extends RawHistory {
  sourceName: string;
}

export interface DateRange {
  start: string;
  end: string;
}

export interface Instrument {
  identifier: string; // as supplied by the caller, upper-cased
  isin?: string;
  ticker?: string;
  countryCode?: string;
  name?: string;
}

export interface TotalReturnPoint {
  date: string;
  value: number;
}

export type ValidationCheckName = "total_return" | "consistency" | "completeness";

export interface CheckResult {
  passed: boolean;
  message: string;
  warnings?: string[];
}

export interface ValidationReport {
  valid: boolean;
  checks: Record<ValidationCheckName, CheckResult>;
}

export interface ComparisonColumn {
  name: string;
  values: Array<number | null>;
}

export interface ComparisonTable {
  commonStartDate: string;
  baseValue: number;
  dates: string[];
  columns: ComparisonColumn[];
}

export interface InstrumentMetrics {
  totalReturn: number | null;
  annualizedReturn: number | null;
  volatility: number | null;
  sharpeRatio: number | null;
  maxDrawdown: number | null;
  beta?: number;
  benchmark?: string;
}

export interface InstrumentReport {
  identifier: string;
  name: string;
  sourceName: string;
  metrics: InstrumentMetrics;
  validation?: ValidationReport;
}

export interface ComparisonReport {
  table: ComparisonTable | null; // null when no instrument had data
  instruments: InstrumentReport[];
  missing: string[];
}

export interface Holding {
  symbol?: string;
  name: string;
  weight: number; // percent
}

export interface FundComposition {
  sectors: Record<string, number>; // percent by sector
  topHoldings: Holding[];
  dataSource: string | null;
}

export interface Config {
  sources: {
    eodhd?: { apiKey: string };
    fmp?: { apiKey: string };
    alphaVantage?: { apiKey: string };
    openFigi?: { apiKey: string; enabled: boolean };
    yahoo: { enabled: boolean };
    scrapers: { enabled: boolean };
    rateLimitMs: number;
    exchangeSuffixes: string[];
    prefixSuffixes: Record<string, string>;
  };
  storage: {
    cacheDir: string;
  };
  analysis: {
    years: number;
    baseValue: number;
    homeMarket: string;
    exDistributionThreshold: number;
  };
  benchmarks: {
    domestic: BenchmarkDefinition;
    regional: BenchmarkDefinition;
  };
  tickers: Record<string, string>; // ISIN -> ticker
  http: {
    timeoutMs: number;
  };
}

export interface BenchmarkDefinition {
  ticker: string;
  name: string;
}
