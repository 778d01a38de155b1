/**
 * Core data model for dart-fin-ratios.
 *
 * Design principles:
 * - Raw line items are immutable once fetched from DART
 * - Stored amounts are normalized numbers; the ratio pipeline never sees null
 * - Year buckets are derived per request and never persisted
 * - "Not computable" is null, never zero
 */

/** DART sj_div values kept by the acquisition pipeline */
export type StatementType = 'BS' | 'IS' | 'CF';

export const STATEMENT_NAMES: Record<StatementType, string> = {
  BS: '재무상태표',
  IS: '손익계산서',
  CF: '현금흐름표',
};

/** A 4-digit fiscal year string, validated by isFiscalYear() */
export type FiscalYear = string & { readonly __brand: 'FiscalYear' };

export function isFiscalYear(value: string): value is FiscalYear {
  return /^\d{4}$/.test(value);
}

export function toFiscalYear(value: string | number): FiscalYear | null {
  const str = String(value).trim();
  return isFiscalYear(str) ? str : null;
}

/** One financial-statement line as returned by the filing source */
export interface RawLineItem {
  accountName: string;
  statementType: StatementType;
  statementName: string;
  fiscalYear: string;
  currentAmount: string | null;
  priorAmount: string | null;
  priorPriorAmount: string | null;
  currentPeriodName: string;
  priorPeriodName: string;
  priorPriorPeriodName: string;
  order: number;
  filingId: string;
  reportCode: string;
  currency: string;
}

export interface CompanyIdentity {
  corpCode: string;
  corpName: string;
  stockCode: string;
}

/** A persisted line item. Amounts were normalized at acquisition time. */
export interface StoredLineItem extends CompanyIdentity {
  accountName: string;
  statementType: StatementType;
  statementName: string;
  fiscalYear: string;
  currentAmount: number;
  priorAmount: number;
  priorPriorAmount: number;
  currentPeriodName: string;
  priorPeriodName: string;
  priorPriorPeriodName: string;
  order: number;
  filingId: string;
  reportCode: string;
  currency: string;
  updatedAt: string;
}

/** A row ready to be upserted: everything but the store-managed timestamp */
export type LineItemRecord = Omit<StoredLineItem, 'updatedAt'>;

export interface PeriodAmounts {
  current: number;
  prior: number;
  priorPrior: number;
}

/** accountName -> amounts for a single fiscal year */
export type YearSlice = ReadonlyMap<string, PeriodAmounts>;

/** fiscalYear -> accountName -> amounts */
export type YearBucket = ReadonlyMap<FiscalYear, YearSlice>;

/** A ratio or growth value; null means not computable */
export type MetricValue = number | null;

export interface RatioSeries {
  operatingMargin: MetricValue[];
  netMargin: MetricValue[];
  roe: MetricValue[];
  roa: MetricValue[];
  debtRatio: MetricValue[];
  currentRatio: MetricValue[];
}

export interface GrowthSeries {
  revenueGrowth: MetricValue[];
  netIncomeGrowth: MetricValue[];
}

export interface MetricsResponse {
  companyName: string;
  financialMetrics: {
    operatingMargin: MetricValue[];
    netMargin: MetricValue[];
    roe: MetricValue[];
    roa: MetricValue[];
    years: string[];
  };
  growthData: {
    revenueGrowth: MetricValue[];
    netIncomeGrowth: MetricValue[];
    years: string[];
  };
  debtLiquidityData: {
    debtRatio: MetricValue[];
    currentRatio: MetricValue[];
    years: string[];
  };
}

/** Failure categories shared by every engine entry point */
export type EngineErrorType =
  | 'company_not_found'
  | 'company_ambiguous'
  | 'no_data'
  | 'persistence_error'
  | 'api_error'
  | 'validation';

export interface EngineError {
  type: EngineErrorType;
  message: string;
  suggestions?: CompanyIdentity[];
}

export type EngineResult<T> =
  | { success: true; result: T }
  | { success: false; error: EngineError };
