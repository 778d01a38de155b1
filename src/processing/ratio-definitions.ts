/**
 * Derived financial ratio definitions.
 *
 * Each ratio divides one extracted account value by another for the same
 * fiscal year and scales the quotient to a percentage.
 */

import type { GrowthSeries, RatioSeries } from '../core/types.js';
import type { AccountField } from './account-definitions.js';

export type RatioId = keyof RatioSeries;
export type GrowthId = keyof GrowthSeries;

export interface RatioDefinition {
  id: RatioId;
  display_name: string;
  korean_name: string;
  description: string;
  numerator: AccountField;
  denominator: AccountField;
  group: 'profitability' | 'leverage' | 'liquidity';
}

export interface GrowthDefinition {
  id: GrowthId;
  display_name: string;
  korean_name: string;
  description: string;
  field: 'revenue' | 'netIncome';
}

export const RATIO_DEFINITIONS: readonly RatioDefinition[] = [
  {
    id: 'operatingMargin',
    display_name: 'Operating Margin',
    korean_name: '영업이익률',
    description: 'Operating profit as a percentage of revenue',
    numerator: 'operatingProfit',
    denominator: 'revenue',
    group: 'profitability',
  },
  {
    id: 'netMargin',
    display_name: 'Net Margin',
    korean_name: '순이익률',
    description: 'Net income as a percentage of revenue',
    numerator: 'netIncome',
    denominator: 'revenue',
    group: 'profitability',
  },
  {
    id: 'roe',
    display_name: 'ROE',
    korean_name: '자기자본이익률',
    description: 'Net income as a percentage of total equity',
    numerator: 'netIncome',
    denominator: 'totalEquity',
    group: 'profitability',
  },
  {
    id: 'roa',
    display_name: 'ROA',
    korean_name: '총자산이익률',
    description: 'Net income as a percentage of total assets',
    numerator: 'netIncome',
    denominator: 'totalAssets',
    group: 'profitability',
  },
  {
    id: 'debtRatio',
    display_name: 'Debt Ratio',
    korean_name: '부채비율',
    description: 'Total liabilities as a percentage of total equity',
    numerator: 'totalLiabilities',
    denominator: 'totalEquity',
    group: 'leverage',
  },
  {
    id: 'currentRatio',
    display_name: 'Current Ratio',
    korean_name: '유동비율',
    description: 'Current assets as a percentage of current liabilities',
    numerator: 'currentAssets',
    denominator: 'currentLiabilities',
    group: 'liquidity',
  },
];

export const GROWTH_DEFINITIONS: readonly GrowthDefinition[] = [
  {
    id: 'revenueGrowth',
    display_name: 'Revenue Growth',
    korean_name: '매출액 증가율',
    description: 'Year-over-year change in revenue',
    field: 'revenue',
  },
  {
    id: 'netIncomeGrowth',
    display_name: 'Net Income Growth',
    korean_name: '당기순이익 증가율',
    description: 'Year-over-year change in net income',
    field: 'netIncome',
  },
];
