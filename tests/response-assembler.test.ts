import { describe, it, expect } from 'vitest';
import { toMetricArray, assembleMetricsResponse, emptyMetricsResponse } from '../src/processing/response-assembler.js';
import { bucketize, selectTargetYears } from '../src/processing/year-bucket.js';
import { computeRatios } from '../src/processing/ratio-calculator.js';
import { computeGrowth } from '../src/processing/growth-calculator.js';
import { yearRows } from './fixtures.js';

describe('toMetricArray', () => {
  it('passes a correctly sized numeric array through', () => {
    expect(toMetricArray([1, 2.5, -3], 3)).toEqual([1, 2.5, -3]);
  });

  it('replaces a wrong-length array with nulls', () => {
    expect(toMetricArray([1, 2], 3)).toEqual([null, null, null]);
  });

  it('replaces a missing array with nulls', () => {
    expect(toMetricArray(undefined, 2)).toEqual([null, null]);
    expect(toMetricArray(null, 1)).toEqual([null]);
  });

  it('turns non-finite and non-numeric elements into null', () => {
    expect(toMetricArray([Number.NaN, Number.POSITIVE_INFINITY, '5', 0], 4)).toEqual([null, null, null, 0]);
  });
});

describe('assembleMetricsResponse', () => {
  it('shares the years array across all three groups', () => {
    const response = assembleMetricsResponse('삼성전자', ['2023', '2022'], {}, {});
    expect(response.companyName).toBe('삼성전자');
    expect(response.financialMetrics.years).toEqual(['2023', '2022']);
    expect(response.growthData.years).toEqual(['2023', '2022']);
    expect(response.debtLiquidityData.years).toEqual(['2023', '2022']);
    expect(response.financialMetrics.roe).toEqual([null, null]);
  });

  it('does not alias the caller’s years array', () => {
    const years = ['2023'];
    const response = assembleMetricsResponse('X', years, {}, {});
    years.push('2022');
    expect(response.financialMetrics.years).toEqual(['2023']);
  });

  it('produces the empty shape for a company with no data', () => {
    expect(emptyMetricsResponse('빈회사')).toEqual({
      companyName: '빈회사',
      financialMetrics: { operatingMargin: [], netMargin: [], roe: [], roa: [], years: [] },
      growthData: { revenueGrowth: [], netIncomeGrowth: [], years: [] },
      debtLiquidityData: { debtRatio: [], currentRatio: [], years: [] },
    });
  });
});

describe('ratio pipeline', () => {
  it('turns three years of rows into the full metrics response', () => {
    const base = {
      totalAssets: 2000,
      totalLiabilities: 800,
      currentAssets: 600,
      currentLiabilities: 300,
      totalEquity: 1000,
      revenue: 1000,
      operatingProfit: 100,
      netIncome: 50,
    };
    const rows = [
      ...yearRows('2021', { ...base, revenue: 0, netIncome: 20 }),
      ...yearRows('2023', base),
      ...yearRows('2022', { ...base, revenue: 800, operatingProfit: 80, netIncome: 40 }),
    ];

    const bucket = bucketize(rows);
    const years = selectTargetYears(bucket);
    const response = assembleMetricsResponse('삼성전자', years, computeRatios(bucket, years), computeGrowth(bucket, years));

    expect(response.financialMetrics.years).toEqual(['2023', '2022', '2021']);
    expect(response.financialMetrics.operatingMargin).toEqual([expect.closeTo(10, 6), expect.closeTo(10, 6), null]);
    expect(response.financialMetrics.netMargin).toEqual([expect.closeTo(5, 6), expect.closeTo(5, 6), null]);
    expect(response.financialMetrics.roe).toEqual([expect.closeTo(5, 6), expect.closeTo(4, 6), expect.closeTo(2, 6)]);
    expect(response.growthData.revenueGrowth).toEqual([25, null, null]);
    expect(response.growthData.netIncomeGrowth).toEqual([25, 100, null]);
    expect(response.debtLiquidityData.debtRatio).toEqual([expect.closeTo(80, 6), expect.closeTo(80, 6), expect.closeTo(80, 6)]);
    expect(response.debtLiquidityData.currentRatio).toEqual([expect.closeTo(200, 6), expect.closeTo(200, 6), expect.closeTo(200, 6)]);
  });

  it('limits the window to the three newest years', () => {
    const base = {
      totalAssets: 1, totalLiabilities: 1, currentAssets: 1, currentLiabilities: 1,
      totalEquity: 1, revenue: 1, operatingProfit: 1, netIncome: 1,
    };
    const rows = ['2019', '2020', '2021', '2022'].flatMap(y => yearRows(y, base));
    const bucket = bucketize(rows);
    const years = selectTargetYears(bucket);
    const response = assembleMetricsResponse('X', years, computeRatios(bucket, years), computeGrowth(bucket, years));

    expect(response.growthData.years).toEqual(['2022', '2021', '2020']);
    // 2020 compares against nothing even though 2019 is stored
    expect(response.growthData.revenueGrowth).toEqual([0, 0, null]);
  });
});
