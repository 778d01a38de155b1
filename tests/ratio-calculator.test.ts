import { describe, it, expect } from 'vitest';
import { safeDivide, percentOf, calculateRatio, computeRatios } from '../src/processing/ratio-calculator.js';
import { extractValues, isRatioAccount, ACCOUNT_DEFINITIONS, ACCOUNT_NAMES, type AccountField } from '../src/processing/account-definitions.js';
import { RATIO_DEFINITIONS, GROWTH_DEFINITIONS } from '../src/processing/ratio-definitions.js';
import { bucketize, selectTargetYears } from '../src/processing/year-bucket.js';
import { yearRows } from './fixtures.js';

const BASE = {
  totalAssets: 2000,
  totalLiabilities: 800,
  currentAssets: 600,
  currentLiabilities: 300,
  totalEquity: 1000,
  revenue: 1000,
  operatingProfit: 100,
  netIncome: 50,
};

describe('account definitions', () => {
  it('lists exactly the eight DART account names', () => {
    expect(ACCOUNT_NAMES).toEqual(['자산총계', '부채총계', '유동자산', '유동부채', '자본총계', '매출액', '영업이익', '당기순이익']);
  });

  it('matches a row only within the statement its account belongs to', () => {
    expect(isRatioAccount({ accountName: '당기순이익', statementType: 'IS' })).toBe(true);
    expect(isRatioAccount({ accountName: '당기순이익', statementType: 'CF' })).toBe(false);
    expect(isRatioAccount({ accountName: '자산총계', statementType: 'BS' })).toBe(true);
    expect(isRatioAccount({ accountName: '자산총계', statementType: 'IS' })).toBe(false);
    expect(isRatioAccount({ accountName: '매출원가', statementType: 'IS' })).toBe(false);
  });

  it('covers every field a ratio or growth definition reads', () => {
    const fields = new Set<AccountField>();
    for (const r of RATIO_DEFINITIONS) {
      fields.add(r.numerator);
      fields.add(r.denominator);
    }
    for (const g of GROWTH_DEFINITIONS) fields.add(g.field);
    const defined = new Set<AccountField>(ACCOUNT_DEFINITIONS.map(a => a.field));
    for (const field of fields) {
      expect(defined.has(field)).toBe(true);
    }
  });
});

describe('extractValues', () => {
  it('reads current amounts of the named accounts', () => {
    const bucket = bucketize(yearRows('2023', BASE));
    const [year] = selectTargetYears(bucket);
    expect(extractValues(bucket.get(year))).toEqual(BASE);
  });

  it('reads missing accounts and a missing slice as 0', () => {
    expect(extractValues(undefined, 'growth')).toEqual({ revenue: 0, netIncome: 0 });
    expect(extractValues(new Map(), 'ratio').totalAssets).toBe(0);
  });
});

describe('safeDivide / percentOf', () => {
  it('divides normally', () => {
    expect(safeDivide(10, 4)).toBe(2.5);
    expect(percentOf(1, 4)).toBe(25);
  });

  it('returns null for a zero denominator', () => {
    expect(safeDivide(10, 0)).toBeNull();
    expect(percentOf(0, 0)).toBeNull();
  });

  it('returns null for non-finite operands', () => {
    expect(safeDivide(Number.NaN, 1)).toBeNull();
    expect(safeDivide(1, Number.POSITIVE_INFINITY)).toBeNull();
  });

  it('keeps negative results', () => {
    expect(percentOf(-50, 200)).toBe(-25);
  });
});

describe('calculateRatio', () => {
  it('scales numerator over denominator to percent', () => {
    const definition = RATIO_DEFINITIONS.find(r => r.id === 'currentRatio');
    expect(definition).toBeDefined();
    if (!definition) return;
    expect(calculateRatio(definition, BASE)).toBe(200);
  });
});

describe('computeRatios', () => {
  it('computes all six ratios for each target year in order', () => {
    const bucket = bucketize([
      ...yearRows('2023', BASE),
      ...yearRows('2022', { ...BASE, revenue: 0, totalEquity: 0 }),
    ]);
    const ratios = computeRatios(bucket, selectTargetYears(bucket));

    expect(ratios.operatingMargin).toEqual([expect.closeTo(10, 6), null]);
    expect(ratios.netMargin).toEqual([expect.closeTo(5, 6), null]);
    expect(ratios.roe).toEqual([expect.closeTo(5, 6), null]);
    expect(ratios.roa).toEqual([expect.closeTo(2.5, 6), expect.closeTo(2.5, 6)]);
    expect(ratios.debtRatio).toEqual([expect.closeTo(80, 6), null]);
    expect(ratios.currentRatio).toEqual([expect.closeTo(200, 6), expect.closeTo(200, 6)]);
  });

  it('returns null for ROA and current ratio when their denominators are zero', () => {
    const bucket = bucketize(yearRows('2021', { ...BASE, totalAssets: 0, currentLiabilities: 0 }));
    const ratios = computeRatios(bucket, selectTargetYears(bucket));

    expect(ratios.roa).toEqual([null]);
    expect(ratios.currentRatio).toEqual([null]);
    expect(ratios.operatingMargin).toEqual([expect.closeTo(10, 6)]);
    expect(ratios.debtRatio).toEqual([expect.closeTo(80, 6)]);
  });

  it('returns empty arrays for no target years', () => {
    const ratios = computeRatios(new Map(), []);
    expect(ratios.operatingMargin).toEqual([]);
    expect(ratios.currentRatio).toEqual([]);
  });
});
