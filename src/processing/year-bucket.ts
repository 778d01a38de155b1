import { createLogger } from '../core/logger.js';
import { normalizeAmount } from './amount.js';
import { toFiscalYear } from '../core/types.js';
import type { FiscalYear, PeriodAmounts, YearBucket } from '../core/types.js';

const log = createLogger('year-bucket');

/** Fields of a line item the bucketizer reads; stored and raw rows both fit */
export interface BucketableRow {
  fiscalYear: string;
  accountName: string;
  currentAmount: string | number | null;
  priorAmount: string | number | null;
  priorPriorAmount: string | number | null;
}

export const DEFAULT_TARGET_YEARS = 3;

/**
 * Group flat rows into fiscalYear -> accountName -> amounts.
 * A later row with the same (year, account) replaces the earlier one.
 */
export function bucketize(rows: readonly BucketableRow[]): YearBucket {
  const bucket = new Map<FiscalYear, Map<string, PeriodAmounts>>();

  for (const row of rows) {
    const year = toFiscalYear(row.fiscalYear);
    if (!year) {
      log.debug('Skipping row with invalid fiscal year', { fiscalYear: row.fiscalYear, account: row.accountName });
      continue;
    }

    let slice = bucket.get(year);
    if (!slice) {
      slice = new Map();
      bucket.set(year, slice);
    }

    slice.set(row.accountName, {
      current: normalizeAmount(row.currentAmount),
      prior: normalizeAmount(row.priorAmount),
      priorPrior: normalizeAmount(row.priorPriorAmount),
    });
  }

  return bucket;
}

/**
 * Most recent fiscal years in the bucket, newest first.
 * Fewer than `limit` years available: all of them, no padding.
 */
export function selectTargetYears(bucket: YearBucket, limit: number = DEFAULT_TARGET_YEARS): FiscalYear[] {
  // 4-digit strings: lexicographic order is numeric order
  return Array.from(bucket.keys())
    .sort((a, b) => (a < b ? 1 : a > b ? -1 : 0))
    .slice(0, Math.max(0, limit));
}
