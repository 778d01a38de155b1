import type { PeriodAmounts, StatementType, StoredLineItem } from '../core/types.js';

/**
 * Regroups stored line items into one block per fiscal year, split by
 * statement, for display. Years are newest first; accounts keep their
 * DART display order.
 */

export interface FormattedYear {
  fiscalYear: string;
  balanceSheet: Record<string, PeriodAmounts>;
  incomeStatement: Record<string, PeriodAmounts>;
  cashFlow: Record<string, PeriodAmounts>;
}

const SECTION: Record<StatementType, keyof Omit<FormattedYear, 'fiscalYear'>> = {
  BS: 'balanceSheet',
  IS: 'incomeStatement',
  CF: 'cashFlow',
};

export function formatStatements(rows: readonly StoredLineItem[]): FormattedYear[] {
  const byYear = new Map<string, FormattedYear>();
  const ordered = [...rows].sort((a, b) => a.order - b.order);

  for (const row of ordered) {
    let year = byYear.get(row.fiscalYear);
    if (!year) {
      year = { fiscalYear: row.fiscalYear, balanceSheet: {}, incomeStatement: {}, cashFlow: {} };
      byYear.set(row.fiscalYear, year);
    }
    year[SECTION[row.statementType]][row.accountName] = {
      current: row.currentAmount,
      prior: row.priorAmount,
      priorPrior: row.priorPriorAmount,
    };
  }

  return Array.from(byYear.values()).sort((a, b) => b.fiscalYear.localeCompare(a.fiscalYear));
}
