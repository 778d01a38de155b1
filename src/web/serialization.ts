/**
 * Shared serialization helpers for the web API layer.
 * Converts engine results to JSON-safe objects and maps error types to HTTP status codes.
 */

import type { ZodError } from 'zod';
import type { BatchResult, CrawlOutcome } from '../core/acquisition.js';
import type { StatementsView } from '../core/ratio-engine.js';
import type { CompanyIdentity, EngineErrorType, StoredLineItem } from '../core/types.js';

// ── Error Mapping ─────────────────────────────────────────────────────

const ERROR_STATUS_MAP: Record<EngineErrorType, number> = {
  validation: 400,
  company_ambiguous: 400,
  company_not_found: 404,
  no_data: 404,
  persistence_error: 500,
  api_error: 502,
};

export function errorToHttpStatus(errorType: EngineErrorType): number {
  return ERROR_STATUS_MAP[errorType];
}

/** 400 body for a request that failed schema validation */
export function validationError(error: ZodError) {
  const message = error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return { error: { type: 'validation' as const, message } };
}

// ── Result Serializers ────────────────────────────────────────────────

export function serializeCompany(c: CompanyIdentity) {
  return { corp_code: c.corpCode, corp_name: c.corpName, stock_code: c.stockCode };
}

export function serializeLineItem(item: StoredLineItem) {
  return {
    fiscal_year: item.fiscalYear,
    statement_type: item.statementType,
    statement_name: item.statementName,
    account_name: item.accountName,
    amounts: {
      current: { period: item.currentPeriodName, value: item.currentAmount },
      prior: { period: item.priorPeriodName, value: item.priorAmount },
      prior_prior: { period: item.priorPriorPeriodName, value: item.priorPriorAmount },
    },
    order: item.order,
    currency: item.currency,
    filing: { receipt_no: item.filingId, report_code: item.reportCode },
    updated_at: item.updatedAt,
  };
}

export function serializeCrawlOutcome(r: CrawlOutcome) {
  return {
    company: serializeCompany(r.company),
    fiscal_year: r.fiscalYear,
    status: r.status,
    item_count: r.items.length,
    items: r.items.map(serializeLineItem),
  };
}

export function serializeBatchResult(r: BatchResult) {
  return {
    started_at: r.startedAt,
    finished_at: r.finishedAt,
    summary: { total: r.total, succeeded: r.succeeded, failed: r.failed },
    results: r.results.map(entry => ({
      company_name: entry.companyName,
      success: entry.success,
      status: entry.status ?? null,
      fiscal_year: entry.fiscalYear ?? null,
      item_count: entry.itemCount,
      error: entry.error ?? null,
    })),
  };
}

export function serializeStatementsView(v: StatementsView) {
  return {
    company: serializeCompany(v.company),
    years: v.years.map(y => ({
      fiscal_year: y.fiscalYear,
      balance_sheet: y.balanceSheet,
      income_statement: y.incomeStatement,
      cash_flow: y.cashFlow,
    })),
    summary: v.summary.map(s => ({
      fiscal_year: s.fiscalYear,
      statement_type: s.statementType,
      statement_name: s.statementName,
      item_count: s.itemCount,
    })),
  };
}
