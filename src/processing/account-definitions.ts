import type { StatementType, YearSlice } from '../core/types.js';

/**
 * The closed account vocabulary.
 *
 * Every ratio and growth figure is derived from these eight DART account
 * names (account_nm), matched exactly against the current-period amount
 * (thstrm_amount). There is no dynamic account discovery: a name that is
 * not listed here is never read by the ratio pipeline.
 */

export const ACCOUNT_DEFINITIONS = [
  { field: 'totalAssets', accountName: '자산총계', display_name: 'Total Assets', statement_type: 'BS' },
  { field: 'totalLiabilities', accountName: '부채총계', display_name: 'Total Liabilities', statement_type: 'BS' },
  { field: 'currentAssets', accountName: '유동자산', display_name: 'Current Assets', statement_type: 'BS' },
  { field: 'currentLiabilities', accountName: '유동부채', display_name: 'Current Liabilities', statement_type: 'BS' },
  { field: 'totalEquity', accountName: '자본총계', display_name: 'Total Equity', statement_type: 'BS' },
  { field: 'revenue', accountName: '매출액', display_name: 'Revenue', statement_type: 'IS' },
  { field: 'operatingProfit', accountName: '영업이익', display_name: 'Operating Profit', statement_type: 'IS' },
  { field: 'netIncome', accountName: '당기순이익', display_name: 'Net Income', statement_type: 'IS' },
] as const satisfies ReadonlyArray<{
  field: string;
  accountName: string;
  display_name: string;
  statement_type: StatementType;
}>;

export type AccountDefinition = typeof ACCOUNT_DEFINITIONS[number];
export type AccountField = AccountDefinition['field'];
export type AccountName = AccountDefinition['accountName'];

export type ExtractedValues = Record<AccountField, number>;

/** Fields the growth calculator needs */
export type GrowthValues = Pick<ExtractedValues, 'revenue' | 'netIncome'>;

export type ExtractionMode = 'all' | 'ratio' | 'growth';

export const ACCOUNT_NAMES: readonly AccountName[] = ACCOUNT_DEFINITIONS.map(a => a.accountName);

/**
 * True when a row is one of the vocabulary lines in its own statement.
 * The cash flow statement repeats 당기순이익; only the IS line counts.
 */
export function isRatioAccount(row: { accountName: string; statementType: StatementType }): boolean {
  return ACCOUNT_DEFINITIONS.some(a => a.accountName === row.accountName && a.statement_type === row.statementType);
}

/**
 * Pull the eight named quantities out of one year's slice.
 * Missing accounts read as 0.
 */
export function extractValues(slice: YearSlice | undefined, mode: 'growth'): GrowthValues;
export function extractValues(slice: YearSlice | undefined, mode?: 'all' | 'ratio'): ExtractedValues;
export function extractValues(slice: YearSlice | undefined, mode: ExtractionMode = 'all'): ExtractedValues | GrowthValues {
  const read = (accountName: AccountName): number => slice?.get(accountName)?.current ?? 0;

  if (mode === 'growth') {
    return {
      revenue: read('매출액'),
      netIncome: read('당기순이익'),
    };
  }

  return {
    totalAssets: read('자산총계'),
    totalLiabilities: read('부채총계'),
    currentAssets: read('유동자산'),
    currentLiabilities: read('유동부채'),
    totalEquity: read('자본총계'),
    revenue: read('매출액'),
    operatingProfit: read('영업이익'),
    netIncome: read('당기순이익'),
  };
}
