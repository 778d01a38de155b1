#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { createContainer, type Container } from './core/container.js';
import { executeRatioCore, getStatements, deleteStatements } from './core/ratio-engine.js';
import { ACCOUNT_DEFINITIONS } from './processing/account-definitions.js';
import { RATIO_DEFINITIONS } from './processing/ratio-definitions.js';
import { renderRatioTable, renderRatioJson } from './output/ratio-renderer.js';
import { renderStatements, renderStatementsJson } from './output/statement-renderer.js';
import { renderBatchResult, renderCrawlOutcome, renderEngineError } from './output/crawl-renderer.js';
import { padRight } from './output/format-utils.js';
import { errorMessage } from './core/errors.js';

/**
 * Build the container, run one command against it, close it.
 * Exits non-zero on any error.
 */
async function withContainer(run: (c: Container) => Promise<boolean> | boolean): Promise<void> {
  let container: Container | null = null;
  let ok = false;
  try {
    container = createContainer();
    ok = await run(container);
  } catch (err) {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
  } finally {
    container?.close();
  }
  if (!ok) process.exit(1);
}

const program = new Command();

program
  .name('dart-fin-ratios')
  .description('Financial statements and ratios for Korean listed companies from DART filings')
  .version('0.3.0');

program
  .command('ratios')
  .alias('r')
  .description('Show profitability, leverage, liquidity and growth ratios for a stored company')
  .argument('<company...>', 'Company name as registered with DART (e.g., 삼성전자)')
  .option('-j, --json', 'Output as JSON instead of table')
  .action(async (companyParts: string[], options: { json?: boolean }) => {
    await withContainer(({ store }) => {
      const result = executeRatioCore(store, companyParts.join(' '));
      if (!result.success) {
        console.error(renderEngineError(result.error));
        return false;
      }
      if (options.json) {
        console.log(renderRatioJson(result.result));
      } else {
        console.log('');
        console.log(renderRatioTable(result.result));
        console.log('');
      }
      return true;
    });
  });

program
  .command('crawl')
  .description('Fetch and store annual statements for one company')
  .argument('<company...>', 'Company name, stock code or corp code')
  .option('-y, --year <year>', 'Fiscal year (default: last year, falling back up to 2 years)')
  .option('-j, --json', 'Output as JSON')
  .action(async (companyParts: string[], options: { year?: string; json?: boolean }) => {
    await withContainer(async ({ acquisition }) => {
      const result = await acquisition.crawlCompany(companyParts.join(' '), options.year);
      if (!result.success) {
        console.error(renderEngineError(result.error));
        return false;
      }
      console.log(options.json ? JSON.stringify(result.result, null, 2) : renderCrawlOutcome(result.result));
      return true;
    });
  });

program
  .command('crawl-all')
  .description('Crawl every company in the batch universe (BATCH_COMPANIES)')
  .option('-y, --year <year>', 'Fiscal year')
  .option('-j, --json', 'Output as JSON')
  .action(async (options: { year?: string; json?: boolean }) => {
    await withContainer(async ({ acquisition, config }) => {
      const result = await acquisition.crawlAll(config.batch.companies, options.year);
      console.log(options.json ? JSON.stringify(result, null, 2) : renderBatchResult(result));
      return result.failed === 0;
    });
  });

program
  .command('statements')
  .alias('fs')
  .description('Show stored financial statements for a company')
  .argument('<company...>', 'Company name')
  .option('-y, --year <year>', 'Only this fiscal year')
  .option('-j, --json', 'Output as JSON')
  .action(async (companyParts: string[], options: { year?: string; json?: boolean }) => {
    await withContainer(({ store }) => {
      const result = getStatements(store, companyParts.join(' '), options.year);
      if (!result.success) {
        console.error(renderEngineError(result.error));
        return false;
      }
      console.log(options.json ? renderStatementsJson(result.result) : renderStatements(result.result));
      return true;
    });
  });

program
  .command('delete')
  .description('Delete one fiscal year of stored statements for a company')
  .argument('<company...>', 'Company name')
  .requiredOption('-y, --year <year>', 'Fiscal year to delete')
  .action(async (companyParts: string[], options: { year: string }) => {
    await withContainer(({ store }) => {
      const result = deleteStatements(store, companyParts.join(' '), options.year);
      if (!result.success) {
        console.error(renderEngineError(result.error));
        return false;
      }
      const { company, fiscalYear, deleted } = result.result;
      console.log(chalk.green(`Deleted ${deleted} line items for ${company.corpName} FY${fiscalYear}`));
      return true;
    });
  });

program
  .command('accounts')
  .description('List the accounts and ratios the ratio pipeline reads')
  .action(() => {
    console.log(chalk.bold('\nAccounts\n'));
    for (const a of ACCOUNT_DEFINITIONS) {
      console.log(`  ${chalk.cyan(padRight(a.field, 20))} ${padRight(a.accountName, 12)} ${chalk.dim(`${a.statement_type}  ${a.display_name}`)}`);
    }
    console.log(chalk.bold('\nRatios\n'));
    for (const r of RATIO_DEFINITIONS) {
      console.log(`  ${chalk.cyan(padRight(r.id, 20))} ${r.display_name} (${r.korean_name})`);
      console.log(`  ${''.padEnd(20)} ${chalk.dim(`${r.numerator} ÷ ${r.denominator} × 100`)}`);
    }
    console.log('');
  });

program
  .command('db')
  .description('Show store statistics')
  .action(async () => {
    await withContainer(({ store, config }) => {
      const stats = store.getStats();
      console.log(`\n  Location:       ${config.dbPath}`);
      console.log(`  Companies:      ${stats.companies}`);
      console.log(`  Line items:     ${stats.lineItems}`);
      console.log(`  Fiscal years:   ${stats.fiscalYears.join(', ') || '-'}`);
      console.log(`  DART directory: ${stats.directoryEntries} entries`
        + (stats.directoryRefreshedAt ? chalk.dim(` (refreshed ${stats.directoryRefreshedAt})`) : ''));
      console.log('');
      return true;
    });
  });

program
  .command('schedule')
  .description('Run the daily batch crawl in the foreground (BATCH_SCHEDULE, default 03:00)')
  .option('--now', 'Also run one batch immediately')
  .action(async (options: { now?: boolean }) => {
    let container: Container;
    try {
      container = createContainer();
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exit(1);
    }

    const { scheduler } = container;
    const stop = () => {
      container.close();
      process.exit(0);
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);

    scheduler.start();
    console.log(chalk.green(`Scheduler running. Next batch: ${scheduler.nextRunAt()?.toLocaleString() ?? '-'}`));
    console.log(chalk.dim('Press Ctrl+C to stop'));

    if (options.now) {
      const result = await scheduler.runNow();
      if (result) console.log(renderBatchResult(result));
    }
  });

await program.parseAsync();
