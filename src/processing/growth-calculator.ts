import { extractValues } from './account-definitions.js';
import { GROWTH_DEFINITIONS } from './ratio-definitions.js';
import type { FiscalYear, GrowthSeries, MetricValue, YearBucket } from '../core/types.js';

/**
 * Year-over-year growth in percent: (current - previous) / |previous| × 100.
 * Returns null when previous is 0 or either value is not finite.
 */
export function calculateGrowthRate(current: number, previous: number): MetricValue {
  if (previous === 0 || !Number.isFinite(current) || !Number.isFinite(previous)) return null;
  return ((current - previous) / Math.abs(previous)) * 100;
}

/**
 * Revenue and net-income growth across the target window.
 *
 * targetYears is newest-first, so the year before targetYears[i] sits at
 * targetYears[i + 1]. The oldest year has nothing to compare against and is
 * always null.
 */
export function computeGrowth(bucket: YearBucket, targetYears: readonly FiscalYear[]): GrowthSeries {
  const series: GrowthSeries = { revenueGrowth: [], netIncomeGrowth: [] };
  const values = targetYears.map(year => extractValues(bucket.get(year), 'growth'));

  for (let i = 0; i < targetYears.length; i++) {
    const current = values[i];
    const previous = i + 1 < values.length ? values[i + 1] : undefined;

    for (const definition of GROWTH_DEFINITIONS) {
      series[definition.id].push(
        previous === undefined ? null : calculateGrowthRate(current[definition.field], previous[definition.field])
      );
    }
  }

  return series;
}
