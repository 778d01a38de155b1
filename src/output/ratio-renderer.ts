import chalk from 'chalk';
import { formatGrowth, formatPercent, padRight, sparkline } from './format-utils.js';
import { GROWTH_DEFINITIONS, RATIO_DEFINITIONS, type RatioId } from '../processing/ratio-definitions.js';
import type { MetricValue, MetricsResponse } from '../core/types.js';

const LABEL_WIDTH = 32;
const VALUE_WIDTH = 12;

function ratioSeries(response: MetricsResponse, id: RatioId): MetricValue[] {
  switch (id) {
    case 'operatingMargin':
    case 'netMargin':
    case 'roe':
    case 'roa':
      return response.financialMetrics[id];
    case 'debtRatio':
    case 'currentRatio':
      return response.debtLiquidityData[id];
  }
}

function row(label: string, cells: string[]): string {
  return `  ${padRight(label, LABEL_WIDTH)}${cells.map(c => padRight(c, VALUE_WIDTH)).join('')}`.trimEnd();
}

export function renderRatioTable(response: MetricsResponse): string {
  const years = response.financialMetrics.years;
  const lines: string[] = [];

  const header = `${response.companyName} — Financial Ratios (Last ${years.length} Fiscal Years)`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));

  if (years.length === 0) {
    lines.push('');
    lines.push(chalk.yellow('  No stored financial statements. Run: dart-fin-ratios crawl ' + response.companyName));
    return lines.join('\n');
  }

  lines.push('');
  lines.push(chalk.underline(row('Ratio', years.map(y => `FY${y}`))));

  let group = '';
  for (const def of RATIO_DEFINITIONS) {
    if (def.group !== group) {
      group = def.group;
      lines.push(chalk.dim(`  ${group[0].toUpperCase()}${group.slice(1)}`));
    }
    lines.push(row(`${def.display_name} (${def.korean_name})`, ratioSeries(response, def.id).map(formatPercent)));
  }

  lines.push(chalk.dim('  Growth'));
  for (const def of GROWTH_DEFINITIONS) {
    lines.push(row(def.display_name, response.growthData[def.id].map(formatGrowth)));
  }

  // Sparkline runs oldest to newest
  const margins = [...response.financialMetrics.operatingMargin].reverse();
  const spark = sparkline(margins);
  if (spark) {
    lines.push('');
    lines.push(`  Operating margin trend: ${spark}`);
  }

  lines.push('');
  lines.push(chalk.dim('  N/A: not computable (zero or missing denominator, or no prior year)'));

  return lines.join('\n');
}

export function renderRatioJson(response: MetricsResponse): string {
  return JSON.stringify(response, null, 2);
}
