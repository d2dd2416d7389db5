import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  computeTotalReturn,
  distributionMultiplier,
  priceReturnRatio,
  reconstructAdjustedPrices,
  totalReturnRatio,
} from '../total-return.ts';
import { createPriceSeries } from '../adjustment.ts';
import { makeRecords, makeSeries } from '../../__tests__/helpers.ts';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('distributionMultiplier', () => {
  it('adds the distribution back on an ex-distribution drop', () => {
    expect(distributionMultiplier(100, 98, 1)).toBeCloseTo(0.99, 10);
  });

  it('ignores a distribution when the price did not drop past the threshold', () => {
    expect(distributionMultiplier(100, 99.5, 1)).toBeCloseTo(0.995, 10);
    expect(distributionMultiplier(100, 101, 1)).toBeCloseTo(1.01, 10);
  });

  it('uses the plain price ratio without a distribution', () => {
    expect(distributionMultiplier(100, 97, 0)).toBeCloseTo(0.97, 10);
  });

  it('honours a custom threshold', () => {
    expect(distributionMultiplier(100, 99.5, 1, -0.004)).toBeCloseTo(1.005, 10);
  });

  it('returns 1 for a non-positive previous price', () => {
    expect(distributionMultiplier(0, 10, 1)).toBe(1);
  });
});

describe('reconstructAdjustedPrices', () => {
  it('seeds at the first raw price and chains the multipliers', () => {
    const points = reconstructAdjustedPrices(
      makeRecords([100, 98, 99], { distributions: { 1: 1 } })
    );

    expect(points.map((p) => p.date)).toEqual(['2024-01-01', '2024-01-02', '2024-01-03']);
    expect(points[0]?.value).toBe(100);
    expect(points[1]?.value).toBeCloseTo(99, 10);
    expect(points[2]?.value).toBeCloseTo((99 * 99) / 98, 10);
  });

  it('returns an empty series for no data', () => {
    expect(reconstructAdjustedPrices([])).toEqual([]);
  });
});

describe('computeTotalReturn', () => {
  it('chains price ratios only for adjusted series', () => {
    const series = makeSeries([50, 55, 60.5], { isAdjusted: true });
    const points = computeTotalReturn(series);

    expect(points).toHaveLength(3);
    expect(points[0]?.value).toBe(50);
    expect(points[1]?.value).toBeCloseTo(55, 10);
    expect(points[2]?.value).toBeCloseTo(60.5, 10);
  });

  it('never adds distributions to an adjusted series', () => {
    const series = createPriceSeries({
      identifier: 'ADJ',
      records: makeRecords([100, 98, 99], { distributions: { 1: 1 } }),
      isAdjusted: true,
      sourceName: 'Test Source',
    });

    expect(series.records.every((r) => r.dividend === 0 && r.capitalGain === 0)).toBe(true);
    expect(totalReturnRatio(computeTotalReturn(series))).toBeCloseTo(0.99, 10);
  });

  it('adds distributions for unadjusted series', () => {
    const series = makeSeries([100, 98, 99], { distributions: { 1: 1 } });
    const points = computeTotalReturn(series);

    expect(totalReturnRatio(points)).toBeCloseTo((99 * 99) / 98 / 100, 10);
    expect(priceReturnRatio(series.records)).toBeCloseTo(0.99, 10);
  });

  it('keeps total return at or above price return when distributions are paid', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const series = makeSeries([100, 97, 98, 96, 97, 99], {
      distributions: { 1: 2, 3: 1.5, 4: 0.2 },
    });

    const total = totalReturnRatio(computeTotalReturn(series));
    const price = priceReturnRatio(series.records);

    expect(total).not.toBeNull();
    expect(price).not.toBeNull();
    expect(total ?? 0).toBeGreaterThanOrEqual(price ?? Infinity);
    expect(warn).not.toHaveBeenCalled();
  });
});

describe('two-year comparison of an adjusted and an unadjusted instrument', () => {
  const days = 504;

  it('matches price return for the adjusted one and beats it for the distributing one', () => {
    const dailyA = Math.pow(1.1, 1 / 252);
    const pricesA = Array.from({ length: days }, (_, i) => 100 * Math.pow(dailyA, i));
    const seriesA = makeSeries(pricesA, { identifier: 'A', isAdjusted: true });

    // Quarterly 0.5% distributions, paid on days the price also dipped 1%
    const dailyB = Math.pow(1.08, 1 / 252);
    const pricesB: number[] = [100];
    const distributions: Record<number, number> = {};
    for (let i = 1; i < days; i++) {
      const prev = pricesB[i - 1] ?? 100;
      if (i % 63 === 0) {
        const dividend = prev * 0.005;
        distributions[i] = dividend;
        pricesB.push((prev * dailyB - dividend) * 0.99);
      } else {
        pricesB.push(prev * dailyB);
      }
    }
    const seriesB = makeSeries(pricesB, { identifier: 'B', distributions });

    const totalA = totalReturnRatio(computeTotalReturn(seriesA)) ?? 0;
    const priceA = priceReturnRatio(seriesA.records) ?? 0;
    expect(Math.abs(totalA / priceA - 1)).toBeLessThan(0.001);

    const totalB = totalReturnRatio(computeTotalReturn(seriesB)) ?? 0;
    const priceB = priceReturnRatio(seriesB.records) ?? 0;
    expect(totalB).toBeGreaterThan(priceB);
  });
});
