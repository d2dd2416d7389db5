import type { DailyRecord, PriceSeries, TotalReturnPoint } from "../types/index.ts";

// A distribution day only counts as ex-distribution when the close fell by more than this
export const DEFAULT_EX_DISTRIBUTION_THRESHOLD = -0.01;

export interface TotalReturnOptions {
  exDistributionThreshold?: number;
}

type PricedDay = Pick<DailyRecord, "date" | "price" | "dividend" | "capitalGain">;

/**
 * Daily growth factor for an unadjusted close. A distribution is added back
 * only when the close dropped past the threshold; otherwise the close is
 * assumed to already reflect it (or the distribution is provider noise).
 */
export function distributionMultiplier(
  prev: number,
  curr: number,
  distribution: number,
  threshold: number = DEFAULT_EX_DISTRIBUTION_THRESHOLD
): number {
  if (!(prev > 0) || !Number.isFinite(curr)) return 1;

  if (distribution > 0) {
    const change = (curr - prev) / prev;
    if (change < threshold) {
      return (curr + distribution) / prev;
    }
  }

  return curr / prev;
}

function cumulate(
  days: PricedDay[],
  multiplier: (prev: PricedDay, curr: PricedDay) => number
): TotalReturnPoint[] {
  const points: TotalReturnPoint[] = [];
  let previous: PricedDay | undefined;
  let value = 0;

  for (const day of days) {
    value = previous ? value * multiplier(previous, day) : day.price;
    points.push({ date: day.date, value });
    previous = day;
  }

  return points;
}

/**
 * Rebuilds an adjusted close from raw closes and distributions, seeded at the
 * first raw close.
 */
export function reconstructAdjustedPrices(
  days: PricedDay[],
  options: TotalReturnOptions = {}
): TotalReturnPoint[] {
  const threshold =
    options.exDistributionThreshold ?? DEFAULT_EX_DISTRIBUTION_THRESHOLD;

  return cumulate(days, (prev, curr) =>
    distributionMultiplier(
      prev.price,
      curr.price,
      curr.dividend + curr.capitalGain,
      threshold
    )
  );
}

export function hasDistributions(records: PricedDay[]): boolean {
  return records.some((r) => r.dividend > 0 || r.capitalGain > 0);
}

export function priceReturnRatio(records: PricedDay[]): number | null {
  const first = records[0];
  const last = records[records.length - 1];
  if (!first || !last || first.price <= 0) return null;
  return last.price / first.price;
}

export function totalReturnRatio(points: TotalReturnPoint[]): number | null {
  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last || first.value <= 0) return null;
  return last.value / first.value;
}

/**
 * Cumulative total-return series for a price series. Adjusted prices already
 * embed distributions, so only price ratios are chained; unadjusted prices
 * get distributions added back on ex-distribution days.
 */
export function computeTotalReturn(
  series: Pick<PriceSeries, "records" | "isAdjusted" | "identifier">,
  options: TotalReturnOptions = {}
): TotalReturnPoint[] {
  if (series.isAdjusted) {
    return cumulate(series.records, (prev, curr) =>
      prev.price > 0 ? curr.price / prev.price : 1
    );
  }

  const points = reconstructAdjustedPrices(series.records, options);

  if (points.length > 1 && hasDistributions(series.records)) {
    const priceRatio = priceReturnRatio(series.records);
    const totalRatio = totalReturnRatio(points);
    if (priceRatio !== null && totalRatio !== null && totalRatio < priceRatio) {
      console.warn(
        `${series.identifier}: total return (${totalRatio.toFixed(
          4
        )}) below price return (${priceRatio.toFixed(4)}); check the source data`
      );
    }
  }

  return points;
}
