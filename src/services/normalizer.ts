import type {
  ComparisonColumn,
  ComparisonTable,
  TotalReturnPoint,
} from "../types/index.ts";

export interface ComparisonInput {
  name: string;
  points: TotalReturnPoint[];
}

export interface ComparisonOptions {
  startDate?: string; // overrides the derived common start
  baseValue?: number;
}

export const DEFAULT_BASE_VALUE = 100;

function usablePoints(points: TotalReturnPoint[]): TotalReturnPoint[] {
  return points
    .filter((p) => Number.isFinite(p.value) && p.value > 0)
    .sort((a, b) => a.date.localeCompare(b.date));
}

/**
 * Latest of the first available dates, so every instrument has real data
 * from the first day of the comparison.
 */
export function findCommonStartDate(inputs: ComparisonInput[]): string | null {
  let latest: string | null = null;
  for (const input of inputs) {
    const first = usablePoints(input.points)[0];
    if (first && (latest === null || first.date > latest)) {
      latest = first.date;
    }
  }
  return latest;
}

/**
 * Drops points before startDate and rescales the rest so the first kept
 * point is exactly baseValue.
 */
export function rebaseSeries(
  points: TotalReturnPoint[],
  startDate: string,
  baseValue: number = DEFAULT_BASE_VALUE
): TotalReturnPoint[] {
  const kept = usablePoints(points).filter((p) => p.date >= startDate);
  const anchor = kept[0];
  if (!anchor) return [];

  const scale = baseValue / anchor.value;
  return kept.map((p, idx) => ({
    date: p.date,
    // exact base on the anchor, no floating-point drift
    value: idx === 0 ? baseValue : p.value * scale,
  }));
}

/**
 * Aligns many total-return series on one date axis, each re-based to the
 * base value at the common start and forward-filled after its first
 * observation (never backward).
 */
export function buildComparisonTable(
  inputs: ComparisonInput[],
  options: ComparisonOptions = {}
): ComparisonTable | null {
  const baseValue = options.baseValue ?? DEFAULT_BASE_VALUE;
  const commonStartDate = options.startDate ?? findCommonStartDate(inputs);
  if (commonStartDate === null) return null;

  const rebased = inputs.map((input) => ({
    name: input.name,
    points: rebaseSeries(input.points, commonStartDate, baseValue),
  }));

  const dateSet = new Set<string>();
  for (const series of rebased) {
    for (const point of series.points) dateSet.add(point.date);
  }
  const dates = [...dateSet].sort();

  const columns: ComparisonColumn[] = rebased.map((series) => {
    const byDate = new Map(series.points.map((p) => [p.date, p.value]));
    let last: number | null = null;
    const values = dates.map((date) => {
      const observed = byDate.get(date);
      if (observed !== undefined) last = observed;
      return last;
    });
    return { name: series.name, values };
  });

  return { commonStartDate, baseValue, dates, columns };
}
