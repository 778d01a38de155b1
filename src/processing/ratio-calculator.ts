import { extractValues, type ExtractedValues } from './account-definitions.js';
import { RATIO_DEFINITIONS, type RatioDefinition } from './ratio-definitions.js';
import type { FiscalYear, MetricValue, RatioSeries, YearBucket } from '../core/types.js';

/**
 * Divide, or return null when the quotient is not computable
 * (zero denominator, non-finite operand).
 */
export function safeDivide(numerator: number, denominator: number): number | null {
  if (denominator === 0 || !Number.isFinite(numerator) || !Number.isFinite(denominator)) {
    return null;
  }
  return numerator / denominator;
}

/** numerator / denominator × 100; null when the division is undefined */
export function percentOf(numerator: number, denominator: number): number | null {
  const quotient = safeDivide(numerator, denominator);
  return quotient === null ? null : quotient * 100;
}

export function calculateRatio(definition: RatioDefinition, values: ExtractedValues): MetricValue {
  return percentOf(values[definition.numerator], values[definition.denominator]);
}

/**
 * Compute the six ratios for each target year. Every array has
 * targetYears.length entries, in targetYears order.
 */
export function computeRatios(bucket: YearBucket, targetYears: readonly FiscalYear[]): RatioSeries {
  const series: RatioSeries = {
    operatingMargin: [],
    netMargin: [],
    roe: [],
    roa: [],
    debtRatio: [],
    currentRatio: [],
  };

  for (const year of targetYears) {
    const values = extractValues(bucket.get(year), 'ratio');
    for (const definition of RATIO_DEFINITIONS) {
      series[definition.id].push(calculateRatio(definition, values));
    }
  }

  return series;
}
