/**
 * Shared formatting utilities for terminal output renderers.
 */

import chalk from 'chalk';
import type { MetricValue } from '../core/types.js';

/** Pad a string to a minimum length, accounting for ANSI escape sequences */
export function padRight(str: string, len: number): string {
  const padding = Math.max(0, len - displayWidth(str));
  return str + ' '.repeat(padding);
}

/**
 * Terminal column width: ANSI codes take none, Hangul and other wide
 * characters take two.
 */
export function displayWidth(str: string): number {
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  let width = 0;
  for (const ch of stripped) {
    width += /[ᄀ-ᅟ⺀-꓏가-힣豈-﫿＀-｠￠-￦]/.test(ch) ? 2 : 1;
  }
  return width;
}

/** KRW amounts in 조 (10^12) and 억 (10^8) units */
export function formatKrw(value: number): string {
  const abs = Math.abs(value);
  const sign = value < 0 ? '-' : '';

  if (abs >= 1e12) return `${sign}${(abs / 1e12).toFixed(2)}조`;
  if (abs >= 1e8) return `${sign}${(abs / 1e8).toFixed(1)}억`;
  return `${sign}${abs.toLocaleString('en-US')}`;
}

/** Ratio value with one decimal, or N/A when not computable */
export function formatPercent(value: MetricValue): string {
  return value === null ? 'N/A' : `${value.toFixed(1)}%`;
}

/** Signed, colored growth percentage */
export function formatGrowth(value: MetricValue): string {
  if (value === null) return chalk.dim('N/A');
  const str = (value >= 0 ? '+' : '') + value.toFixed(1) + '%';
  if (value > 0) return chalk.green(str);
  if (value < 0) return chalk.red(str);
  return str;
}

/** Generate a Unicode sparkline from a series of values; nulls are skipped */
export function sparkline(values: readonly MetricValue[]): string {
  const present = values.filter((v): v is number => v !== null);
  if (present.length < 2) return '';
  const blocks = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'];
  const min = Math.min(...present);
  const max = Math.max(...present);
  const range = max - min;
  if (range === 0) return blocks[4].repeat(present.length);

  return present.map(v => {
    const idx = Math.round(((v - min) / range) * (blocks.length - 1));
    return blocks[idx];
  }).join('');
}
