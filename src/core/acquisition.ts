import { createLogger, type Logger } from './logger.js';
import { errorMessage, PersistenceError } from './errors.js';
import { toFiscalYear } from './types.js';
import { dedupeLineItems, sortForPersistence } from '../processing/dedup.js';
import { normalizeAmount } from '../processing/amount.js';
import type { FetchedStatements, FilingSource } from './dart-client.js';
import type { CompanyResolver } from './resolver.js';
import type { FinancialStore } from './store.js';
import type {
  CompanyIdentity,
  EngineError,
  EngineResult,
  FiscalYear,
  LineItemRecord,
  RawLineItem,
  StoredLineItem,
} from './types.js';

/**
 * Acquisition pipeline: resolve -> check existing -> fetch -> dedupe ->
 * persist (one transaction) -> re-read.
 *
 * Expected failures come back as `{ success: false }` results; nothing here
 * throws for an unknown company, an empty filing or a failed write.
 */

/** existing: already stored, no DART call made. stored: fetched and written now */
export type CrawlStatus = 'existing' | 'stored';

export interface CrawlOutcome {
  company: CompanyIdentity;
  /** The fiscal year the rows belong to; null when several stored years were returned */
  fiscalYear: string | null;
  status: CrawlStatus;
  items: StoredLineItem[];
}

export type CrawlResult = EngineResult<CrawlOutcome>;

export interface BatchEntry {
  companyName: string;
  success: boolean;
  status?: CrawlStatus;
  fiscalYear?: string | null;
  itemCount: number;
  error?: EngineError;
}

export interface BatchResult {
  startedAt: string;
  finishedAt: string;
  results: BatchEntry[];
  total: number;
  succeeded: number;
  failed: number;
}

/** Years of stored data that count as "already have it" when no year is asked for */
const EXISTING_WINDOW_YEARS = 3;

export function toLineItemRecord(item: RawLineItem, company: CompanyIdentity): LineItemRecord {
  return {
    corpCode: company.corpCode,
    corpName: company.corpName,
    stockCode: company.stockCode,
    accountName: item.accountName,
    statementType: item.statementType,
    statementName: item.statementName,
    fiscalYear: item.fiscalYear,
    currentAmount: normalizeAmount(item.currentAmount),
    priorAmount: normalizeAmount(item.priorAmount),
    priorPriorAmount: normalizeAmount(item.priorPriorAmount),
    currentPeriodName: item.currentPeriodName,
    priorPeriodName: item.priorPeriodName,
    priorPriorPeriodName: item.priorPriorPeriodName,
    order: item.order,
    filingId: item.filingId,
    reportCode: item.reportCode,
    currency: item.currency,
  };
}

function failure(error: EngineError): { success: false; error: EngineError } {
  return { success: false, error };
}

export interface AcquisitionDeps {
  source: FilingSource;
  store: FinancialStore;
  resolver: CompanyResolver;
  now?: () => Date;
  logger?: Logger;
}

export class AcquisitionOrchestrator {
  private readonly source: FilingSource;
  private readonly store: FinancialStore;
  private readonly resolver: CompanyResolver;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(deps: AcquisitionDeps) {
    this.source = deps.source;
    this.store = deps.store;
    this.resolver = deps.resolver;
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? createLogger('acquisition');
  }

  async crawlCompany(companyName: string, year?: string | number): Promise<CrawlResult> {
    const name = companyName.trim();
    if (name === '') {
      return failure({ type: 'validation', message: 'Company name is required' });
    }

    let fiscalYear: FiscalYear | undefined;
    if (year !== undefined) {
      const parsed = toFiscalYear(year);
      if (!parsed) {
        return failure({ type: 'validation', message: `Invalid fiscal year: "${year}". Use a 4-digit year.` });
      }
      fiscalYear = parsed;
    }

    // 1. Resolve
    let company: CompanyIdentity;
    try {
      const resolved = await this.resolver.resolve(name);
      if (resolved.status === 'ambiguous') {
        return failure({
          type: 'company_ambiguous',
          message: `"${name}" matches several DART companies. Use the corp code or stock code.`,
          suggestions: resolved.candidates,
        });
      }
      if (resolved.status === 'not_found') {
        return failure({
          type: 'company_not_found',
          message: `Could not find company: "${name}"`,
          suggestions: resolved.suggestions,
        });
      }
      company = resolved.company;
    } catch (err) {
      this.log.warn('Company resolution failed', { company: name, error: errorMessage(err) });
      return failure({ type: 'api_error', message: `Could not resolve "${name}": ${errorMessage(err)}` });
    }

    // 2. Check existing
    const existing = fiscalYear === undefined
      ? this.store.getRecentLineItems(company.corpCode, EXISTING_WINDOW_YEARS)
      : this.store.getLineItems(company.corpCode, fiscalYear);
    if (existing.length > 0) {
      this.log.debug('Using stored line items', { corpCode: company.corpCode, year: fiscalYear, rows: existing.length });
      return {
        success: true,
        result: { company, fiscalYear: fiscalYear ?? null, status: 'existing', items: existing },
      };
    }

    // 3. Fetch
    let fetched: FetchedStatements;
    try {
      fetched = await this.source.fetchStatements(company.corpCode, fiscalYear);
    } catch (err) {
      this.log.warn('Filing fetch failed', { corpCode: company.corpCode, error: errorMessage(err) });
      return failure({ type: 'api_error', message: errorMessage(err) });
    }

    if (fetched.items.length === 0) {
      const requested = fiscalYear ?? fetched.year;
      this.log.info('No filings found', { corpCode: company.corpCode, year: requested, reason: fetched.reason });
      return failure({
        type: 'no_data',
        message: `No annual financial statements on DART for ${company.corpName} (${requested})`
          + (fetched.reason ? `: ${fetched.reason}` : ''),
      });
    }

    // 4. Dedupe + persist
    const records = sortForPersistence(dedupeLineItems(fetched.items)).map(item => toLineItemRecord(item, company));
    try {
      this.store.upsertCompany(company);
      this.store.upsertLineItems(records);
    } catch (err) {
      return failure({
        type: 'persistence_error',
        message: err instanceof PersistenceError ? err.message : `Failed to store line items: ${errorMessage(err)}`,
      });
    }

    // 5. Re-read what is actually stored
    const stored = this.store.getLineItems(company.corpCode, fetched.year);
    this.log.info('Stored financial statements', {
      corpCode: company.corpCode,
      year: fetched.year,
      fetched: fetched.items.length,
      stored: stored.length,
    });

    return {
      success: true,
      result: { company, fiscalYear: fetched.year, status: 'stored', items: stored },
    };
  }

  /**
   * Crawl every company in turn. One company failing never stops the batch.
   */
  async crawlAll(companyNames: readonly string[], year?: string | number): Promise<BatchResult> {
    const startedAt = this.now().toISOString();
    const results: BatchEntry[] = [];

    for (const companyName of companyNames) {
      let entry: BatchEntry;
      try {
        const outcome = await this.crawlCompany(companyName, year);
        entry = outcome.success
          ? {
              companyName,
              success: true,
              status: outcome.result.status,
              fiscalYear: outcome.result.fiscalYear,
              itemCount: outcome.result.items.length,
            }
          : { companyName, success: false, itemCount: 0, error: outcome.error };
      } catch (err) {
        entry = {
          companyName,
          success: false,
          itemCount: 0,
          error: { type: 'api_error', message: errorMessage(err) },
        };
      }

      if (!entry.success) {
        this.log.warn('Batch crawl failed for company', { company: companyName, error: entry.error?.message });
      }
      results.push(entry);
    }

    const succeeded = results.filter(r => r.success).length;
    const summary: BatchResult = {
      startedAt,
      finishedAt: this.now().toISOString(),
      results,
      total: results.length,
      succeeded,
      failed: results.length - succeeded,
    };

    this.log.info('Batch crawl finished', { total: summary.total, succeeded, failed: summary.failed });
    return summary;
  }
}
