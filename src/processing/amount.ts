import { createLogger } from '../core/logger.js';

const log = createLogger('amount');

/**
 * Parse a DART amount string ("1,234,567", "-52,000", " 300 ") into a number.
 *
 * One-way and lossy: null, empty or unparseable input becomes 0. Unparseable
 * non-empty strings are logged, never thrown.
 */
export function normalizeAmount(raw: string | number | null | undefined): number {
  if (raw === null || raw === undefined) return 0;

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : 0;
  }

  const cleaned = raw.replace(/,/g, '').replace(/\s/g, '');
  if (cleaned === '' || cleaned === '-') return 0;

  // Number() also accepts hex, binary and "Infinity"; only plain decimals are amounts
  if (!/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(cleaned)) {
    log.warn('Unparseable amount, using 0', { raw });
    return 0;
  }

  const parsed = Number(cleaned);
  if (!Number.isFinite(parsed)) {
    log.warn('Non-finite amount, using 0', { raw });
    return 0;
  }
  return parsed;
}
