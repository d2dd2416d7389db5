import { differenceInCalendarDays, parseISO } from "date-fns";
import type {
  CheckResult,
  PriceSeries,
  ValidationReport,
} from "../types/index.ts";
import {
  hasDistributions,
  priceReturnRatio,
  reconstructAdjustedPrices,
  totalReturnRatio,
} from "./total-return.ts";
import type { TotalReturnOptions } from "./total-return.ts";

export interface ValidatorOptions extends TotalReturnOptions {
  maxDailyChange?: number;
  suspiciousDailyChange?: number;
  maxGapDays?: number;
}

const DEFAULTS = {
  maxDailyChange: 0.2,
  suspiciousDailyChange: 0.1,
  maxGapDays: 5,
};

const pct = (ratio: number) => `${(ratio * 100).toFixed(2)}%`;

export function checkTotalReturn(
  series: Pick<PriceSeries, "records" | "isAdjusted">,
  options: TotalReturnOptions = {}
): CheckResult {
  const priceRatio = priceReturnRatio(series.records);
  if (series.records.length < 2 || priceRatio === null) {
    return { passed: false, message: "Not enough data to compute returns" };
  }

  if (series.isAdjusted) {
    return {
      passed: true,
      message: `OK - adjusted prices (price return ${pct(priceRatio - 1)})`,
    };
  }

  if (!hasDistributions(series.records)) {
    return {
      passed: true,
      message: `OK - no distributions (price return ${pct(priceRatio - 1)})`,
    };
  }

  const totalRatio = totalReturnRatio(
    reconstructAdjustedPrices(series.records, options)
  );
  if (totalRatio === null || totalRatio < priceRatio) {
    return {
      passed: false,
      message: `Total return ${
        totalRatio === null ? "n/a" : pct(totalRatio - 1)
      } below price return ${pct(priceRatio - 1)}`,
    };
  }

  return {
    passed: true,
    message: `OK - total return ${pct(totalRatio - 1)} >= price return ${pct(
      priceRatio - 1
    )}`,
  };
}

export function checkConsistency(
  series: Pick<PriceSeries, "records">,
  options: Pick<ValidatorOptions, "maxDailyChange" | "suspiciousDailyChange"> = {}
): CheckResult {
  const maxDailyChange = options.maxDailyChange ?? DEFAULTS.maxDailyChange;
  const suspicious = options.suspiciousDailyChange ?? DEFAULTS.suspiciousDailyChange;
  const { records } = series;

  if (records.length < 2) {
    return { passed: false, message: "Not enough data" };
  }

  let maxChange = 0;
  const jumps: string[] = [];

  for (let i = 1; i < records.length; i++) {
    const prev = records[i - 1];
    const curr = records[i];
    if (!prev || !curr || prev.price <= 0) continue;

    const change = (curr.price - prev.price) / prev.price;
    maxChange = Math.max(maxChange, Math.abs(change));
    if (Math.abs(change) > suspicious) {
      jumps.push(`${curr.date}: ${pct(change)}`);
    }
  }

  if (maxChange > maxDailyChange) {
    return {
      passed: false,
      message: `Abnormal jump of ${pct(maxChange)} (max allowed ${pct(
        maxDailyChange
      )}). Dates: ${jumps.slice(0, 5).join(", ")}`,
    };
  }

  if (jumps.length > 0) {
    return {
      passed: true,
      message: `OK - max daily change ${pct(maxChange)}`,
      warnings: jumps,
    };
  }

  return { passed: true, message: `OK - max daily change ${pct(maxChange)}` };
}

export function checkCompleteness(
  series: Pick<PriceSeries, "records">,
  options: Pick<ValidatorOptions, "maxGapDays"> = {}
): CheckResult {
  const maxGapDays = options.maxGapDays ?? DEFAULTS.maxGapDays;
  const { records } = series;

  if (records.length === 0) {
    return { passed: false, message: "No data" };
  }

  let maxGap = 0;
  for (let i = 1; i < records.length; i++) {
    const prev = records[i - 1];
    const curr = records[i];
    if (!prev || !curr) continue;
    maxGap = Math.max(
      maxGap,
      differenceInCalendarDays(parseISO(curr.date), parseISO(prev.date))
    );
  }

  if (maxGap > maxGapDays) {
    return {
      passed: false,
      message: `Gap too large: ${maxGap} days (max allowed ${maxGapDays})`,
    };
  }

  return { passed: true, message: `OK - max gap ${maxGap} days` };
}

/**
 * Runs every check over a series. The report is advisory: failures are
 * logged and the caller keeps using the data.
 */
export function validateSeries(
  series: PriceSeries,
  options: ValidatorOptions = {}
): ValidationReport {
  const checks = {
    total_return: checkTotalReturn(series, options),
    consistency: checkConsistency(series, options),
    completeness: checkCompleteness(series, options),
  };

  for (const [name, result] of Object.entries(checks)) {
    if (!result.passed) {
      console.warn(`  ⚠ ${series.identifier} ${name}: ${result.message}`);
    } else if (result.warnings?.length) {
      console.warn(
        `  ⚠ ${series.identifier} ${name}: suspicious jumps (>${pct(
          options.suspiciousDailyChange ?? DEFAULTS.suspiciousDailyChange
        )}) ${result.warnings.slice(0, 3).join(", ")}`
      );
    }
  }

  return {
    valid:
      checks.total_return.passed &&
      checks.consistency.passed &&
      checks.completeness.passed,
    checks,
  };
}
