import { toFiscalYear } from '../src/core/types.js';
import type { FetchedStatements, FilingSource } from '../src/core/dart-client.js';
import type { CompanyIdentity, FiscalYear, RawLineItem, StatementType } from '../src/core/types.js';

export const SAMSUNG = { corpCode: '00126380', corpName: '삼성전자', stockCode: '005930' };
export const SK_HYNIX = { corpCode: '00164779', corpName: 'SK하이닉스', stockCode: '000660' };

export function rawItem(
  accountName: string,
  statementType: StatementType,
  overrides: Partial<RawLineItem> = {}
): RawLineItem {
  const fiscalYear = overrides.fiscalYear ?? '2023';
  const y = Number(fiscalYear);
  return {
    accountName,
    statementType,
    statementName: { BS: '재무상태표', IS: '손익계산서', CF: '현금흐름표' }[statementType],
    fiscalYear,
    currentAmount: '100',
    priorAmount: '90',
    priorPriorAmount: '80',
    currentPeriodName: `${y}년`,
    priorPeriodName: `${y - 1}년`,
    priorPriorPeriodName: `${y - 2}년`,
    order: 1,
    filingId: '20240312000736',
    reportCode: '11011',
    currency: 'KRW',
    ...overrides,
  };
}

/** The eight ratio accounts for one year, current amounts only */
export function yearRows(
  fiscalYear: string,
  amounts: {
    totalAssets: number;
    totalLiabilities: number;
    currentAssets: number;
    currentLiabilities: number;
    totalEquity: number;
    revenue: number;
    operatingProfit: number;
    netIncome: number;
  }
): RawLineItem[] {
  const bs: Array<[string, number]> = [
    ['유동자산', amounts.currentAssets],
    ['자산총계', amounts.totalAssets],
    ['유동부채', amounts.currentLiabilities],
    ['부채총계', amounts.totalLiabilities],
    ['자본총계', amounts.totalEquity],
  ];
  const is: Array<[string, number]> = [
    ['매출액', amounts.revenue],
    ['영업이익', amounts.operatingProfit],
    ['당기순이익', amounts.netIncome],
  ];
  return [
    ...bs.map(([name, value], i) => rawItem(name, 'BS', { fiscalYear, currentAmount: String(value), order: i + 1 })),
    ...is.map(([name, value], i) => rawItem(name, 'IS', { fiscalYear, currentAmount: String(value), order: i + 1 })),
  ];
}

/** In-process filing source: canned statements per corp code, plus a directory */
export class FakeFilingSource implements FilingSource {
  readonly fetchCalls: Array<{ corpCode: string; year?: string }> = [];
  listCalls = 0;
  directory: CompanyIdentity[] = [SAMSUNG, SK_HYNIX];
  statements = new Map<string, FetchedStatements>();
  failWith: Error | null = null;

  async fetchStatements(corpCode: string, year?: FiscalYear): Promise<FetchedStatements> {
    this.fetchCalls.push({ corpCode, year });
    if (this.failWith) throw this.failWith;
    const canned = this.statements.get(corpCode);
    if (canned) return canned;
    return { year: year ?? fiscalYear('2023'), items: [], reason: 'DART status 013: 조회된 데이타가 없습니다.' };
  }

  async listCompanies(): Promise<CompanyIdentity[]> {
    this.listCalls++;
    return this.directory;
  }
}

export function fiscalYear(value: string): FiscalYear {
  const year = toFiscalYear(value);
  if (!year) throw new Error(`Not a fiscal year: ${value}`);
  return year;
}
