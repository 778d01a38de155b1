import chalk from 'chalk';
import { formatKrw, padRight } from './format-utils.js';
import type { StatementsView } from '../core/ratio-engine.js';
import type { PeriodAmounts } from '../core/types.js';

const ACCOUNT_WIDTH = 36;
const AMOUNT_WIDTH = 16;

const SECTIONS = [
  ['balanceSheet', '재무상태표 (Balance Sheet)'],
  ['incomeStatement', '손익계산서 (Income Statement)'],
  ['cashFlow', '현금흐름표 (Cash Flow)'],
] as const;

function renderSection(title: string, accounts: Record<string, PeriodAmounts>): string[] {
  const entries = Object.entries(accounts);
  if (entries.length === 0) return [];

  const lines = [
    `  ${chalk.bold(title)}`,
    chalk.underline(`    ${padRight('계정', ACCOUNT_WIDTH)}${padRight('당기', AMOUNT_WIDTH)}${padRight('전기', AMOUNT_WIDTH)}전전기`),
  ];
  for (const [account, amounts] of entries) {
    lines.push(
      `    ${padRight(account, ACCOUNT_WIDTH)}`
      + padRight(formatKrw(amounts.current), AMOUNT_WIDTH)
      + padRight(formatKrw(amounts.prior), AMOUNT_WIDTH)
      + formatKrw(amounts.priorPrior)
    );
  }
  lines.push('');
  return lines;
}

export function renderStatements(view: StatementsView): string {
  const { company } = view;
  const lines: string[] = [];

  const header = `${company.corpName} (${company.stockCode || company.corpCode}) — Financial Statements`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));

  for (const year of view.years) {
    lines.push('');
    lines.push(chalk.cyan(`FY${year.fiscalYear}`));
    for (const [key, title] of SECTIONS) {
      lines.push(...renderSection(title, year[key]));
    }
  }

  if (view.summary.length > 0) {
    lines.push(chalk.dim('  -- Stored ' + '-'.repeat(40)));
    for (const s of view.summary) {
      lines.push(chalk.dim(`  FY${s.fiscalYear} ${s.statementName}: ${s.itemCount} items`));
    }
  }

  return lines.join('\n');
}

export function renderStatementsJson(view: StatementsView): string {
  return JSON.stringify({
    company: view.company,
    years: view.years,
    summary: view.summary,
  }, null, 2);
}
