import chalk from 'chalk';
import { padRight } from './format-utils.js';
import type { BatchResult, CrawlOutcome } from '../core/acquisition.js';
import type { EngineError } from '../core/types.js';

export function renderCrawlOutcome(outcome: CrawlOutcome): string {
  const { company, status, items } = outcome;
  const years = Array.from(new Set(items.map(i => i.fiscalYear))).sort().reverse();
  const verb = status === 'stored' ? chalk.green('Stored') : chalk.cyan('Already stored');

  return `${verb} ${items.length} line items for ${chalk.bold(company.corpName)} `
    + `(${company.corpCode}) — FY${years.join(', FY')}`;
}

export function renderEngineError(error: EngineError): string {
  const lines = [chalk.red(error.message)];
  if (error.suggestions && error.suggestions.length > 0) {
    lines.push(error.type === 'company_ambiguous' ? 'Candidates:' : 'Did you mean:');
    for (const s of error.suggestions) {
      lines.push(`  ${chalk.cyan(padRight(s.stockCode || '-', 8))} ${s.corpName} ${chalk.dim(s.corpCode)}`);
    }
  }
  return lines.join('\n');
}

export function renderBatchResult(result: BatchResult): string {
  const lines: string[] = [];

  for (const entry of result.results) {
    if (entry.success) {
      const detail = entry.status === 'stored' ? 'stored' : 'already stored';
      lines.push(`  ${chalk.green('✓')} ${padRight(entry.companyName, 20)} ${entry.itemCount} items (${detail})`);
    } else {
      lines.push(`  ${chalk.red('✗')} ${padRight(entry.companyName, 20)} ${entry.error?.message ?? 'failed'}`);
    }
  }

  lines.push('');
  lines.push(`  ${result.succeeded}/${result.total} companies succeeded, ${result.failed} failed`);
  return lines.join('\n');
}
