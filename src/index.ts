import type { AxiosInstance } from "axios";
import { format, subYears } from "date-fns";
import { buildPriceSeries } from "./services/adjustment.ts";
import { selectBenchmark } from "./services/benchmark.ts";
import { fetchComposition, emptyComposition } from "./services/composition.ts";
import { parsePriceCsv } from "./services/csv-import.ts";
import { DescriptionService } from "./services/descriptions.ts";
import type { DescriptionResult } from "./services/descriptions.ts";
import { parseIdentifier } from "./services/identifier.ts";
import { computeBeta, computeMetrics } from "./services/metrics.ts";
import { buildComparisonTable, rebaseSeries } from "./services/normalizer.ts";
import { OpenFigiClient } from "./services/openfigi.ts";
import { RateLimiters } from "./services/rate-limiter.ts";
import { SourceResolver } from "./services/resolver.ts";
import type { PriceSource } from "./services/resolver.ts";
import {
  VENDORS,
  YahooFinanceClient,
  buildDefaultSources,
} from "./services/sources/index.ts";
import { computeTotalReturn } from "./services/total-return.ts";
import { validateSeries } from "./services/validator.ts";
import { CacheManager } from "./storage/cache.ts";
import type { CacheStore } from "./storage/cache.ts";
import { FileCacheStore } from "./storage/file-store.ts";
import { errorMessage } from "./errors.ts";
import type {
  BenchmarkDefinition,
  ComparisonReport,
  Config,
  DateRange,
  FundComposition,
  Instrument,
  InstrumentReport,
  PriceSeries,
  TotalReturnPoint,
  ValidationReport,
} from "./types/index.ts";

export interface FundLensOptions {
  sources?: PriceSource[]; // replaces the default source chain
  store?: CacheStore;
  http?: AxiosInstance;
  now?: () => Date;
}

export interface HistoryOptions {
  years?: number;
  force?: boolean; // skip the cache
}

export interface HistoryResult {
  instrument: Instrument;
  series: PriceSeries;
  validation?: ValidationReport;
  fromCache: boolean;
}

export interface CompareOptions {
  startDate?: string;
  years?: number;
  force?: boolean;
}

export class FundLens {
  readonly cache: CacheManager;
  private resolver: SourceResolver;
  private yahoo: YahooFinanceClient;
  private descriptions: DescriptionService;
  private figi: OpenFigiClient | null;
  private instruments = new Map<string, Instrument>();
  private now: () => Date;

  constructor(
    private readonly config: Config,
    options: FundLensOptions = {}
  ) {
    const { sources: settings } = config;
    const httpOptions = { http: options.http, timeoutMs: config.http.timeoutMs };

    const limiters = new RateLimiters(settings.rateLimitMs);

    this.now = options.now ?? (() => new Date());
    this.yahoo = new YahooFinanceClient(limiters.for(VENDORS.yahoo), httpOptions);
    this.resolver = new SourceResolver(
      options.sources ??
        buildDefaultSources(config, this.yahoo, limiters, options.http)
    );
    this.cache = new CacheManager(
      options.store ?? new FileCacheStore(config.storage.cacheDir),
      this.now
    );
    this.descriptions = new DescriptionService(
      this.yahoo,
      { alphaVantage: settings.alphaVantage?.apiKey, fmp: settings.fmp?.apiKey },
      { ...httpOptions, limiters }
    );
    this.figi = settings.openFigi?.enabled
      ? new OpenFigiClient(
          settings.openFigi.apiKey || undefined,
          limiters.for("OpenFIGI"),
          httpOptions
        )
      : null;
  }

  get sourceNames(): string[] {
    return this.resolver.sourceNames;
  }

  /**
   * Parses an identifier and, for an ISIN without a configured ticker, asks
   * OpenFIGI for a name and a US ticker.
   */
  async resolveInstrument(raw: string): Promise<Instrument> {
    const parsed = parseIdentifier(raw, this.config.tickers);
    const known = this.instruments.get(parsed.identifier);
    if (known) return known;

    let instrument = parsed;
    if (parsed.isin && this.figi) {
      const metadata = await this.figi.lookup(parsed.isin);
      if (metadata) {
        instrument = {
          ...parsed,
          ticker: parsed.ticker ?? metadata.ticker,
          name: metadata.name,
        };
      }
    }

    this.instruments.set(instrument.identifier, instrument);
    return instrument;
  }

  // Cache lookups only need the parsed identifier, not OpenFIGI metadata
  private knownInstrument(raw: string): Instrument {
    const parsed = parseIdentifier(raw, this.config.tickers);
    return this.instruments.get(parsed.identifier) ?? parsed;
  }

  private dateRange(years: number): DateRange {
    const end = this.now();
    return {
      start: format(subYears(end, years), "yyyy-MM-dd"),
      end: format(end, "yyyy-MM-dd"),
    };
  }

  /**
   * History for one identifier: a fresh cache entry if there is one,
   * otherwise resolved from the sources, classified, validated and cached.
   * Null when no source has data.
   */
  async getHistory(
    raw: string,
    options: HistoryOptions = {}
  ): Promise<HistoryResult | null> {
    const known = this.knownInstrument(raw);
    const range = this.dateRange(options.years ?? this.config.analysis.years);

    if (!options.force) {
      const cached = await this.cache.get(known.identifier, "historical");
      if (cached) {
        console.log(`  ${known.identifier}: using cached data (${cached.source})`);
        return {
          instrument: known,
          series: withinRange(cached.data, range),
          validation: cached.validation,
          fromCache: true,
        };
      }
    }

    const instrument = await this.resolveInstrument(raw);
    console.log(`Fetching ${instrument.identifier} from ${range.start} to ${range.end}...`);
    const history = await this.resolver.resolve(instrument, range);
    if (!history) return null;

    const series = buildPriceSeries(instrument, history, {
      homeMarket: this.config.analysis.homeMarket,
      exDistributionThreshold: this.config.analysis.exDistributionThreshold,
    });
    const validation = validateSeries(series, {
      exDistributionThreshold: this.config.analysis.exDistributionThreshold,
    });

    await this.cache.put(
      instrument.identifier,
      "historical",
      series,
      series.sourceName,
      validation
    );

    return { instrument, series, validation, fromCache: false };
  }

  async getBenchmark(
    benchmark: BenchmarkDefinition,
    options: HistoryOptions = {}
  ): Promise<PriceSeries | null> {
    const instrument = parseIdentifier(benchmark.ticker);
    const range = this.dateRange(options.years ?? this.config.analysis.years);

    if (!options.force) {
      const cached = await this.cache.get(instrument.identifier, "benchmark");
      if (cached) return withinRange(cached.data, range);
    }

    console.log(`Fetching benchmark ${benchmark.name} (${benchmark.ticker})...`);
    const history = await this.resolver.resolve(instrument, range);
    if (!history) return null;

    const series = buildPriceSeries(instrument, history, {
      homeMarket: this.config.analysis.homeMarket,
      exDistributionThreshold: this.config.analysis.exDistributionThreshold,
    });
    await this.cache.put(instrument.identifier, "benchmark", series, series.sourceName);
    return series;
  }

  async getDescription(raw: string): Promise<DescriptionResult | null> {
    const cached = await this.cache.get(this.knownInstrument(raw).identifier, "description");
    if (cached) return { description: cached.data, source: cached.source };

    const instrument = await this.resolveInstrument(raw);
    const result = await this.descriptions.describe(instrument);
    if (result) {
      await this.cache.put(
        instrument.identifier,
        "description",
        result.description,
        result.source
      );
    }
    return result;
  }

  async getComposition(raw: string): Promise<FundComposition> {
    const cached = await this.cache.get(this.knownInstrument(raw).identifier, "composition");
    if (cached) return cached.data;

    const instrument = await this.resolveInstrument(raw);
    let composition: FundComposition;
    try {
      composition = await fetchComposition(this.yahoo, instrument);
    } catch (error) {
      console.warn(
        `  Composition unavailable for ${instrument.identifier}: ${errorMessage(error)}`
      );
      return emptyComposition();
    }

    await this.cache.put(
      instrument.identifier,
      "composition",
      composition,
      composition.dataSource ?? "none"
    );
    return composition;
  }

  /**
   * Total-return comparison of many instruments, re-based to a common start,
   * with metrics and beta against each instrument's benchmark. Instruments
   * are processed one at a time; one failing is reported under `missing`.
   */
  async compare(
    identifiers: string[],
    options: CompareOptions = {}
  ): Promise<ComparisonReport> {
    const { baseValue, exDistributionThreshold } = this.config.analysis;
    const loaded: Array<HistoryResult & { points: TotalReturnPoint[] }> = [];
    const missing: string[] = [];

    for (const raw of identifiers) {
      try {
        const result = await this.getHistory(raw, {
          years: options.years,
          force: options.force,
        });
        if (!result || result.series.records.length === 0) {
          missing.push(raw.trim().toUpperCase());
          continue;
        }
        loaded.push({
          ...result,
          points: computeTotalReturn(result.series, { exDistributionThreshold }),
        });
      } catch (error) {
        console.error(`${raw}: Failed - ${errorMessage(error)}`);
        missing.push(raw.trim().toUpperCase());
      }
    }

    const table = buildComparisonTable(
      loaded.map((item) => ({ name: item.instrument.identifier, points: item.points })),
      { startDate: options.startDate, baseValue }
    );
    if (!table) {
      return { table: null, instruments: [], missing };
    }

    const benchmarkPoints = new Map<string, TotalReturnPoint[] | null>();
    const instruments: InstrumentReport[] = [];

    for (const item of loaded) {
      const rebased = rebaseSeries(item.points, table.commonStartDate, baseValue);
      const metrics = computeMetrics(rebased);

      const benchmark = selectBenchmark(item.instrument, this.config.benchmarks);
      const reference = await this.benchmarkPoints(benchmark, options, benchmarkPoints);
      if (reference) {
        const beta = computeBeta(
          rebased,
          rebaseSeries(reference, table.commonStartDate, baseValue)
        );
        if (beta !== null) {
          metrics.beta = beta;
          metrics.benchmark = benchmark.name;
        }
      }

      instruments.push({
        identifier: item.instrument.identifier,
        name: item.instrument.name ?? item.instrument.identifier,
        sourceName: item.series.sourceName,
        metrics,
        validation: item.validation,
      });
    }

    return { table, instruments, missing };
  }

  private async benchmarkPoints(
    benchmark: BenchmarkDefinition,
    options: CompareOptions,
    memo: Map<string, TotalReturnPoint[] | null>
  ): Promise<TotalReturnPoint[] | null> {
    const memoized = memo.get(benchmark.ticker);
    if (memoized !== undefined) return memoized;

    let points: TotalReturnPoint[] | null = null;
    try {
      const series = await this.getBenchmark(benchmark, {
        years: options.years,
        force: options.force,
      });
      points = series
        ? computeTotalReturn(series, {
            exDistributionThreshold: this.config.analysis.exDistributionThreshold,
          })
        : null;
    } catch (error) {
      console.warn(`  Benchmark ${benchmark.ticker} unavailable: ${errorMessage(error)}`);
    }
    memo.set(benchmark.ticker, points);
    return points;
  }

  /**
   * Stores a locally supplied CSV history as the instrument's historical
   * entry. An adjusted-close column, or `adjusted`, marks it adjusted.
   */
  async importCsv(
    raw: string,
    content: string,
    options: { adjusted?: boolean } = {}
  ): Promise<{ series: PriceSeries; validation: ValidationReport }> {
    const instrument = parseIdentifier(raw, this.config.tickers);
    const csv = parsePriceCsv(content);
    const adjusted = options.adjusted || csv.adjusted;

    const series = buildPriceSeries(
      instrument,
      {
        symbol: instrument.identifier,
        // the price column already is the adjusted close
        quotes: adjusted
          ? csv.quotes.map((q) => ({ ...q, adjClose: q.close }))
          : csv.quotes,
        vendorAdjusted: adjusted,
        sourceName: VENDORS.csv,
      },
      {
        homeMarket: this.config.analysis.homeMarket,
        exDistributionThreshold: this.config.analysis.exDistributionThreshold,
      }
    );
    const validation = validateSeries(series, {
      exDistributionThreshold: this.config.analysis.exDistributionThreshold,
    });

    await this.cache.put(
      instrument.identifier,
      "historical",
      series,
      VENDORS.csv,
      validation
    );
    return { series, validation };
  }
}

function withinRange(series: PriceSeries, range: DateRange): PriceSeries {
  return {
    ...series,
    records: series.records.filter((r) => r.date >= range.start && r.date <= range.end),
  };
}

export { loadConfig, DEFAULT_CONFIG_PATH } from "./config.ts";
export type { ConfigOverrides } from "./config.ts";
export { SourceUnavailableError, DataCorruptError, ConfigError } from "./errors.ts";
export { parseIdentifier } from "./services/identifier.ts";
export { classifyInstrument, buildPriceSeries, createPriceSeries } from "./services/adjustment.ts";
export { computeTotalReturn, reconstructAdjustedPrices } from "./services/total-return.ts";
export { validateSeries } from "./services/validator.ts";
export { buildComparisonTable, rebaseSeries } from "./services/normalizer.ts";
export { computeMetrics, computeBeta, compareSources } from "./services/metrics.ts";
export { selectBenchmark } from "./services/benchmark.ts";
export { SourceResolver } from "./services/resolver.ts";
export type { PriceSource, SourceCapability } from "./services/resolver.ts";
export { CacheManager } from "./storage/cache.ts";
export type { CacheStore, CacheKind, CacheEntry } from "./storage/cache.ts";
export { FileCacheStore } from "./storage/file-store.ts";
export { MemoryCacheStore } from "./storage/memory-store.ts";
export type * from "./types/index.ts";
