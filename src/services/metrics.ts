import { differenceInCalendarDays, parseISO } from "date-fns";
import type {
  DailyRecord,
  InstrumentMetrics,
  TotalReturnPoint,
} from "../types/index.ts";

const TRADING_DAYS_PER_YEAR = 252;
const DAYS_PER_YEAR = 365.25;
export const MIN_BETA_OBSERVATIONS = 30;

const round2 = (value: number) => Math.round(value * 100) / 100;

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function dailyReturns(values: number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < values.length; i++) {
    const prev = values[i - 1];
    const curr = values[i];
    if (prev === undefined || curr === undefined || prev === 0) continue;
    returns.push((curr - prev) / prev);
  }
  return returns;
}

function sampleCovariance(a: number[], b: number[]): number {
  const meanA = mean(a);
  const meanB = mean(b);
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += ((a[i] ?? meanA) - meanA) * ((b[i] ?? meanB) - meanB);
  }
  return sum / (a.length - 1);
}

function correlation(a: number[], b: number[]): number | null {
  if (a.length < 2) return null;
  const denominator = Math.sqrt(sampleCovariance(a, a) * sampleCovariance(b, b));
  return denominator > 0 ? sampleCovariance(a, b) / denominator : null;
}

/**
 * Performance figures over a (re-based) total-return series. Percentages are
 * rounded to two decimals; a figure that cannot be computed is null.
 */
export function computeMetrics(points: TotalReturnPoint[]): InstrumentMetrics {
  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last || first.value <= 0) {
    return {
      totalReturn: null,
      annualizedReturn: null,
      volatility: null,
      sharpeRatio: null,
      maxDrawdown: null,
    };
  }

  const values = points.map((p) => p.value);
  const totalReturn = ((last.value - first.value) / first.value) * 100;

  let annualizedReturn: number | null = null;
  const years =
    differenceInCalendarDays(parseISO(last.date), parseISO(first.date)) /
    DAYS_PER_YEAR;
  if (points.length > 1 && years > 0) {
    annualizedReturn = (Math.pow(last.value / first.value, 1 / years) - 1) * 100;
  }

  let volatility: number | null = null;
  const returns = dailyReturns(values);
  if (returns.length > 0) {
    const avg = mean(returns);
    const variance = mean(returns.map((r) => (r - avg) ** 2));
    volatility = Math.sqrt(variance) * Math.sqrt(TRADING_DAYS_PER_YEAR) * 100;
  }

  const sharpeRatio =
    annualizedReturn !== null && volatility !== null && volatility > 0
      ? annualizedReturn / volatility
      : null;

  let runningMax = values[0] ?? first.value;
  let maxDrawdown = 0;
  for (const value of values) {
    runningMax = Math.max(runningMax, value);
    maxDrawdown = Math.min(maxDrawdown, ((value - runningMax) / runningMax) * 100);
  }

  return {
    totalReturn: round2(totalReturn),
    annualizedReturn: annualizedReturn === null ? null : round2(annualizedReturn),
    volatility: volatility === null ? null : round2(volatility),
    sharpeRatio: sharpeRatio === null ? null : round2(sharpeRatio),
    maxDrawdown: round2(maxDrawdown),
  };
}

/**
 * Beta = cov(instrument, benchmark) / var(benchmark) over daily returns of
 * the dates both series share. Null below minObservations aligned returns.
 */
export function computeBeta(
  instrument: TotalReturnPoint[],
  benchmark: TotalReturnPoint[],
  minObservations: number = MIN_BETA_OBSERVATIONS
): number | null {
  const benchmarkByDate = new Map(benchmark.map((p) => [p.date, p.value]));
  const instrumentValues: number[] = [];
  const benchmarkValues: number[] = [];

  for (const point of [...instrument].sort((a, b) => a.date.localeCompare(b.date))) {
    const other = benchmarkByDate.get(point.date);
    if (other === undefined) continue;
    instrumentValues.push(point.value);
    benchmarkValues.push(other);
  }

  const instrumentReturns = dailyReturns(instrumentValues);
  const benchmarkReturns = dailyReturns(benchmarkValues);
  if (
    instrumentReturns.length < minObservations ||
    instrumentReturns.length !== benchmarkReturns.length
  ) {
    return null;
  }

  const variance = sampleCovariance(benchmarkReturns, benchmarkReturns);
  if (!(variance > 0)) return null;

  const beta = sampleCovariance(instrumentReturns, benchmarkReturns) / variance;
  return Number.isFinite(beta) ? round2(beta) : null;
}

export interface SourceComparison {
  commonDates: number;
  dateRange: { start: string; end: string };
  maxAbsoluteDiff: number;
  meanAbsoluteDiff: number;
  maxRelativeDiffPct: number;
  meanRelativeDiffPct: number;
  correlation: number | null;
}

/**
 * Compares the prices two sources report on their common dates. Null when
 * they share no date.
 */
export function compareSources(
  first: Pick<DailyRecord, "date" | "price">[],
  second: Pick<DailyRecord, "date" | "price">[]
): SourceComparison | null {
  const secondByDate = new Map(second.map((r) => [r.date, r.price]));
  const dates: string[] = [];
  const pricesA: number[] = [];
  const pricesB: number[] = [];

  for (const record of [...first].sort((a, b) => a.date.localeCompare(b.date))) {
    const other = secondByDate.get(record.date);
    if (other === undefined) continue;
    dates.push(record.date);
    pricesA.push(record.price);
    pricesB.push(other);
  }

  const start = dates[0];
  const end = dates[dates.length - 1];
  if (start === undefined || end === undefined) return null;

  const absolute = pricesA.map((a, i) => Math.abs(a - (pricesB[i] ?? a)));
  const relative = absolute.map((diff, i) => (diff / (pricesA[i] ?? 1)) * 100);

  return {
    commonDates: dates.length,
    dateRange: { start, end },
    maxAbsoluteDiff: Math.max(...absolute),
    meanAbsoluteDiff: mean(absolute),
    maxRelativeDiffPct: Math.max(...relative),
    meanRelativeDiffPct: mean(relative),
    correlation: correlation(pricesA, pricesB),
  };
}
