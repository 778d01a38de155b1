/**
 * Packages ratio and growth series into the fixed-shape metrics response.
 *
 * Sentinel policy is null-fill: anything not computable is null, so a
 * genuine 0% is never confused with "no data".
 */

import type { GrowthSeries, MetricValue, MetricsResponse, RatioSeries } from '../core/types.js';

/**
 * Force an array to exactly `length` entries of number | null.
 * A missing or wrong-length array is replaced wholesale by nulls; elements
 * that are not finite numbers become null.
 */
export function toMetricArray(values: readonly unknown[] | undefined | null, length: number): MetricValue[] {
  if (!Array.isArray(values) || values.length !== length) {
    return new Array<MetricValue>(length).fill(null);
  }
  return values.map(v => (typeof v === 'number' && Number.isFinite(v) ? v : null));
}

export function assembleMetricsResponse(
  companyName: string,
  targetYears: readonly string[],
  ratios: Partial<RatioSeries>,
  growth: Partial<GrowthSeries>
): MetricsResponse {
  const n = targetYears.length;

  return {
    companyName,
    financialMetrics: {
      operatingMargin: toMetricArray(ratios.operatingMargin, n),
      netMargin: toMetricArray(ratios.netMargin, n),
      roe: toMetricArray(ratios.roe, n),
      roa: toMetricArray(ratios.roa, n),
      years: [...targetYears],
    },
    growthData: {
      revenueGrowth: toMetricArray(growth.revenueGrowth, n),
      netIncomeGrowth: toMetricArray(growth.netIncomeGrowth, n),
      years: [...targetYears],
    },
    debtLiquidityData: {
      debtRatio: toMetricArray(ratios.debtRatio, n),
      currentRatio: toMetricArray(ratios.currentRatio, n),
      years: [...targetYears],
    },
  };
}

export function emptyMetricsResponse(companyName: string): MetricsResponse {
  return assembleMetricsResponse(companyName, [], {}, {});
}
