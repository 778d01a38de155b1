import { bucketize, selectTargetYears, DEFAULT_TARGET_YEARS } from '../processing/year-bucket.js';
import { computeRatios } from '../processing/ratio-calculator.js';
import { computeGrowth } from '../processing/growth-calculator.js';
import { assembleMetricsResponse, emptyMetricsResponse } from '../processing/response-assembler.js';
import { formatStatements, type FormattedYear } from '../processing/statement-formatter.js';
import { isRatioAccount } from '../processing/account-definitions.js';
import { toFiscalYear } from './types.js';
import type { FinancialStore, StatementSummaryRow } from './store.js';
import type { CompanyIdentity, EngineResult, MetricsResponse } from './types.js';

/**
 * Read-side engine functions shared by the CLI, web API and MCP server.
 * Each reads only from the store and returns a result union.
 */

function lookupCompany(
  store: FinancialStore,
  companyName: string
): EngineResult<CompanyIdentity> {
  const name = companyName.trim();
  if (name === '') {
    return { success: false, error: { type: 'validation', message: 'Company name is required' } };
  }
  const company = store.findCompanyByName(name) ?? store.findCompanyByCode(name);
  if (!company) {
    return {
      success: false,
      error: {
        type: 'company_not_found',
        message: `No stored data for "${name}". Crawl it first: dart-fin-ratios crawl ${name}`,
      },
    };
  }
  return { success: true, result: company };
}

/**
 * The ratio pipeline: stored rows -> year bucket -> target years ->
 * ratios and growth -> fixed-shape response.
 *
 * A known company with no stored rows gets a well-formed empty response.
 */
export function executeRatioCore(
  store: FinancialStore,
  companyName: string,
  years: number = DEFAULT_TARGET_YEARS
): EngineResult<MetricsResponse> {
  const lookup = lookupCompany(store, companyName);
  if (!lookup.success) return lookup;
  const company = lookup.result;

  const rows = store.getRecentLineItems(company.corpCode, years);
  if (rows.length === 0) {
    return { success: true, result: emptyMetricsResponse(company.corpName) };
  }

  const bucket = bucketize(rows.filter(isRatioAccount));
  const targetYears = selectTargetYears(bucket, years);

  return {
    success: true,
    result: assembleMetricsResponse(
      company.corpName,
      targetYears,
      computeRatios(bucket, targetYears),
      computeGrowth(bucket, targetYears)
    ),
  };
}

export interface StatementsView {
  company: CompanyIdentity;
  years: FormattedYear[];
  summary: StatementSummaryRow[];
}

/** Stored statements of one company, grouped per fiscal year */
export function getStatements(
  store: FinancialStore,
  companyName: string,
  year?: string
): EngineResult<StatementsView> {
  const lookup = lookupCompany(store, companyName);
  if (!lookup.success) return lookup;
  const company = lookup.result;

  let fiscalYear: string | undefined;
  if (year !== undefined) {
    const parsed = toFiscalYear(year);
    if (!parsed) {
      return { success: false, error: { type: 'validation', message: `Invalid fiscal year: "${year}"` } };
    }
    fiscalYear = parsed;
  }

  const rows = store.getLineItems(company.corpCode, fiscalYear);
  if (rows.length === 0) {
    return {
      success: false,
      error: {
        type: 'no_data',
        message: `No stored statements for ${company.corpName}${fiscalYear ? ` (${fiscalYear})` : ''}`,
      },
    };
  }

  return {
    success: true,
    result: { company, years: formatStatements(rows), summary: store.getStatementSummary(company.corpCode) },
  };
}

/** Administrative delete of one company-year */
export function deleteStatements(
  store: FinancialStore,
  companyName: string,
  year: string
): EngineResult<{ company: CompanyIdentity; fiscalYear: string; deleted: number }> {
  const lookup = lookupCompany(store, companyName);
  if (!lookup.success) return lookup;

  const fiscalYear = toFiscalYear(year);
  if (!fiscalYear) {
    return { success: false, error: { type: 'validation', message: `Invalid fiscal year: "${year}"` } };
  }

  const deleted = store.deleteByYear(lookup.result.corpCode, fiscalYear);
  return { success: true, result: { company: lookup.result, fiscalYear, deleted } };
}
