import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { PersistenceError, errorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { ACCOUNT_NAMES } from '../processing/account-definitions.js';
import type { DirectoryCache } from './dart-client.js';
import type { CompanyIdentity, LineItemRecord, StatementType, StoredLineItem } from './types.js';

/**
 * SQLite store for companies, financial line items and the cached DART
 * company directory.
 *
 * One connection per store; better-sqlite3 is synchronous, so every
 * statement and transaction completes before the next request runs and
 * reads always see prior writes.
 */

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS companies (
    corp_code TEXT PRIMARY KEY,
    corp_name TEXT NOT NULL,
    stock_code TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_companies_name ON companies(corp_name);

  CREATE TABLE IF NOT EXISTS financials (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    corp_code TEXT NOT NULL,
    corp_name TEXT NOT NULL,
    stock_code TEXT NOT NULL DEFAULT '',
    fiscal_year TEXT NOT NULL,
    statement_type TEXT NOT NULL CHECK (statement_type IN ('BS', 'IS', 'CF')),
    statement_name TEXT NOT NULL,
    account_name TEXT NOT NULL,
    current_amount REAL NOT NULL DEFAULT 0,
    prior_amount REAL NOT NULL DEFAULT 0,
    prior_prior_amount REAL NOT NULL DEFAULT 0,
    current_period_name TEXT NOT NULL DEFAULT '',
    prior_period_name TEXT NOT NULL DEFAULT '',
    prior_prior_period_name TEXT NOT NULL DEFAULT '',
    ord INTEGER NOT NULL DEFAULT 0,
    filing_id TEXT NOT NULL DEFAULT '',
    report_code TEXT NOT NULL DEFAULT '',
    currency TEXT NOT NULL DEFAULT 'KRW',
    updated_at TEXT NOT NULL,
    UNIQUE (corp_code, fiscal_year, statement_type, account_name)
  );
  CREATE INDEX IF NOT EXISTS idx_financials_company_year ON financials(corp_code, fiscal_year);

  CREATE TABLE IF NOT EXISTS corp_directory (
    corp_code TEXT PRIMARY KEY,
    corp_name TEXT NOT NULL,
    stock_code TEXT NOT NULL DEFAULT ''
  );
  CREATE INDEX IF NOT EXISTS idx_corp_directory_name ON corp_directory(corp_name);

  CREATE TABLE IF NOT EXISTS store_meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
`;

const STATEMENT_RANK_SQL = `CASE statement_type WHEN 'BS' THEN 0 WHEN 'IS' THEN 1 ELSE 2 END`;

interface CompanyRow {
  corp_code: string;
  corp_name: string;
  stock_code: string;
}

interface FinancialRow extends CompanyRow {
  fiscal_year: string;
  statement_type: StatementType;
  statement_name: string;
  account_name: string;
  current_amount: number;
  prior_amount: number;
  prior_prior_amount: number;
  current_period_name: string;
  prior_period_name: string;
  prior_prior_period_name: string;
  ord: number;
  filing_id: string;
  report_code: string;
  currency: string;
  updated_at: string;
}

export interface StatementSummaryRow {
  fiscalYear: string;
  statementType: StatementType;
  statementName: string;
  itemCount: number;
}

export interface KeyFinancialItem {
  corpCode: string;
  corpName: string;
  fiscalYear: string;
  accountName: string;
  currentAmount: number;
}

export interface StoreStats {
  companies: number;
  lineItems: number;
  fiscalYears: string[];
  directoryEntries: number;
  directoryRefreshedAt: string | null;
}

export interface FinancialStoreOptions {
  /** File path, or ':memory:' */
  path: string;
  now?: () => Date;
  logger?: Logger;
}

function toIdentity(row: CompanyRow): CompanyIdentity {
  return { corpCode: row.corp_code, corpName: row.corp_name, stockCode: row.stock_code };
}

function toStoredLineItem(row: FinancialRow): StoredLineItem {
  return {
    corpCode: row.corp_code,
    corpName: row.corp_name,
    stockCode: row.stock_code,
    accountName: row.account_name,
    statementType: row.statement_type,
    statementName: row.statement_name,
    fiscalYear: row.fiscal_year,
    currentAmount: row.current_amount,
    priorAmount: row.prior_amount,
    priorPriorAmount: row.prior_prior_amount,
    currentPeriodName: row.current_period_name,
    priorPeriodName: row.prior_period_name,
    priorPriorPeriodName: row.prior_prior_period_name,
    order: row.ord,
    filingId: row.filing_id,
    reportCode: row.report_code,
    currency: row.currency,
    updatedAt: row.updated_at,
  };
}

export class FinancialStore implements DirectoryCache {
  private readonly db: Database.Database;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(options: FinancialStoreOptions) {
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger('store');

    if (options.path !== ':memory:') {
      mkdirSync(dirname(options.path), { recursive: true });
    }

    this.db = new Database(options.path);
    if (options.path !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('busy_timeout = 3000');
    this.db.exec(SCHEMA);
  }

  // ── Companies ──────────────────────────────────────────────────────────

  upsertCompany(company: CompanyIdentity): void {
    const ts = this.now().toISOString();
    this.db.prepare(`
      INSERT INTO companies (corp_code, corp_name, stock_code, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(corp_code) DO UPDATE SET
        corp_name = excluded.corp_name,
        stock_code = excluded.stock_code,
        updated_at = excluded.updated_at
    `).run(company.corpCode, company.corpName, company.stockCode, ts, ts);
  }

  /** Exact name match; listed companies win over unlisted ones with the same name */
  findCompanyByName(corpName: string): CompanyIdentity | null {
    const row = this.db.prepare<[string], CompanyRow>(`
      SELECT corp_code, corp_name, stock_code FROM companies
      WHERE corp_name = ?
      ORDER BY stock_code DESC
      LIMIT 1
    `).get(corpName.trim());
    return row ? toIdentity(row) : null;
  }

  findCompanyByCode(corpCode: string): CompanyIdentity | null {
    const row = this.db.prepare<[string], CompanyRow>(
      'SELECT corp_code, corp_name, stock_code FROM companies WHERE corp_code = ?'
    ).get(corpCode);
    return row ? toIdentity(row) : null;
  }

  listCompanies(): CompanyIdentity[] {
    return this.db.prepare<[], CompanyRow>(
      'SELECT corp_code, corp_name, stock_code FROM companies ORDER BY corp_name'
    ).all().map(toIdentity);
  }

  // ── Line items ─────────────────────────────────────────────────────────

  /**
   * Insert or overwrite line items by (corp_code, fiscal_year, statement_type,
   * account_name) in one transaction. Any failure rolls back the whole batch.
   */
  upsertLineItems(items: readonly LineItemRecord[]): number {
    const ts = this.now().toISOString();
    const statement = this.db.prepare(`
      INSERT INTO financials (
        corp_code, corp_name, stock_code, fiscal_year, statement_type, statement_name,
        account_name, current_amount, prior_amount, prior_prior_amount,
        current_period_name, prior_period_name, prior_prior_period_name,
        ord, filing_id, report_code, currency, updated_at
      ) VALUES (
        @corpCode, @corpName, @stockCode, @fiscalYear, @statementType, @statementName,
        @accountName, @currentAmount, @priorAmount, @priorPriorAmount,
        @currentPeriodName, @priorPeriodName, @priorPriorPeriodName,
        @order, @filingId, @reportCode, @currency, @updatedAt
      )
      ON CONFLICT(corp_code, fiscal_year, statement_type, account_name) DO UPDATE SET
        corp_name = excluded.corp_name,
        stock_code = excluded.stock_code,
        statement_name = excluded.statement_name,
        current_amount = excluded.current_amount,
        prior_amount = excluded.prior_amount,
        prior_prior_amount = excluded.prior_prior_amount,
        current_period_name = excluded.current_period_name,
        prior_period_name = excluded.prior_period_name,
        prior_prior_period_name = excluded.prior_prior_period_name,
        ord = excluded.ord,
        filing_id = excluded.filing_id,
        report_code = excluded.report_code,
        currency = excluded.currency,
        updated_at = excluded.updated_at
    `);

    const writeAll = this.db.transaction((batch: readonly LineItemRecord[]) => {
      for (const item of batch) {
        statement.run({ ...item, updatedAt: ts });
      }
      return batch.length;
    });

    try {
      return writeAll(items);
    } catch (err) {
      this.log.error('Line item upsert rolled back', { items: items.length, error: errorMessage(err) });
      throw new PersistenceError(`Failed to store ${items.length} line items: ${errorMessage(err)}`, err);
    }
  }

  /** Line items of one company, newest year first, in statement and display order */
  getLineItems(corpCode: string, fiscalYear?: string): StoredLineItem[] {
    const rows = fiscalYear === undefined
      ? this.db.prepare<[string], FinancialRow>(`
          SELECT * FROM financials WHERE corp_code = ?
          ORDER BY fiscal_year DESC, ${STATEMENT_RANK_SQL}, ord
        `).all(corpCode)
      : this.db.prepare<[string, string], FinancialRow>(`
          SELECT * FROM financials WHERE corp_code = ? AND fiscal_year = ?
          ORDER BY ${STATEMENT_RANK_SQL}, ord
        `).all(corpCode, fiscalYear);
    return rows.map(toStoredLineItem);
  }

  /** Most recent N distinct fiscal years stored for a company, newest first */
  getRecentYears(corpCode: string, limit: number = 3): string[] {
    return this.db.prepare<[string, number], { fiscal_year: string }>(`
      SELECT DISTINCT fiscal_year FROM financials
      WHERE corp_code = ?
      ORDER BY fiscal_year DESC
      LIMIT ?
    `).all(corpCode, limit).map(row => row.fiscal_year);
  }

  /** Line items of the most recent N fiscal years */
  getRecentLineItems(corpCode: string, years: number = 3): StoredLineItem[] {
    const recent = this.getRecentYears(corpCode, years);
    return recent.flatMap(year => this.getLineItems(corpCode, year));
  }

  /** Administrative delete of one company-year; returns the number of rows removed */
  deleteByYear(corpCode: string, fiscalYear: string): number {
    const result = this.db.prepare(
      'DELETE FROM financials WHERE corp_code = ? AND fiscal_year = ?'
    ).run(corpCode, fiscalYear);
    this.log.info('Deleted line items', { corpCode, fiscalYear, rows: result.changes });
    return result.changes;
  }

  getStatementSummary(corpCode: string): StatementSummaryRow[] {
    return this.db.prepare<[string], {
      fiscal_year: string;
      statement_type: StatementType;
      statement_name: string;
      item_count: number;
    }>(`
      SELECT fiscal_year, statement_type, MIN(statement_name) AS statement_name, COUNT(*) AS item_count
      FROM financials
      WHERE corp_code = ?
      GROUP BY fiscal_year, statement_type
      ORDER BY fiscal_year DESC, ${STATEMENT_RANK_SQL}
    `).all(corpCode).map(row => ({
      fiscalYear: row.fiscal_year,
      statementType: row.statement_type,
      statementName: row.statement_name,
      itemCount: row.item_count,
    }));
  }

  /** Current amounts of the ratio accounts across all stored companies */
  getKeyFinancialItems(fiscalYear?: string): KeyFinancialItem[] {
    const placeholders = ACCOUNT_NAMES.map(() => '?').join(', ');
    const yearClause = fiscalYear === undefined ? '' : 'AND fiscal_year = ?';
    const params: string[] = [...ACCOUNT_NAMES];
    if (fiscalYear !== undefined) params.push(fiscalYear);

    return this.db.prepare<string[], {
      corp_code: string;
      corp_name: string;
      fiscal_year: string;
      account_name: string;
      current_amount: number;
    }>(`
      SELECT corp_code, corp_name, fiscal_year, account_name, current_amount
      FROM financials
      WHERE account_name IN (${placeholders}) ${yearClause}
      ORDER BY corp_name, fiscal_year DESC, ${STATEMENT_RANK_SQL}, ord
    `).all(...params).map(row => ({
      corpCode: row.corp_code,
      corpName: row.corp_name,
      fiscalYear: row.fiscal_year,
      accountName: row.account_name,
      currentAmount: row.current_amount,
    }));
  }

  // ── Company directory cache ────────────────────────────────────────────

  /** The cached directory, or null when it is empty or older than maxAgeMs */
  getDirectory(maxAgeMs: number, now: Date = this.now()): CompanyIdentity[] | null {
    const refreshedAt = this.getMeta('corp_directory_refreshed_at');
    if (!refreshedAt) return null;
    if (now.getTime() - new Date(refreshedAt).getTime() > maxAgeMs) return null;

    const rows = this.db.prepare<[], CompanyRow>(
      'SELECT corp_code, corp_name, stock_code FROM corp_directory'
    ).all();
    return rows.length > 0 ? rows.map(toIdentity) : null;
  }

  replaceDirectory(entries: readonly CompanyIdentity[], now: Date = this.now()): void {
    const insert = this.db.prepare(
      'INSERT OR REPLACE INTO corp_directory (corp_code, corp_name, stock_code) VALUES (?, ?, ?)'
    );
    const replace = this.db.transaction((list: readonly CompanyIdentity[]) => {
      this.db.exec('DELETE FROM corp_directory');
      for (const entry of list) {
        insert.run(entry.corpCode, entry.corpName, entry.stockCode);
      }
      this.setMeta('corp_directory_refreshed_at', now.toISOString());
    });

    try {
      replace(entries);
    } catch (err) {
      throw new PersistenceError(`Failed to cache company directory: ${errorMessage(err)}`, err);
    }
  }

  // ── Misc ───────────────────────────────────────────────────────────────

  getStats(): StoreStats {
    const count = (sql: string): number =>
      this.db.prepare<[], { n: number }>(sql).get()?.n ?? 0;

    return {
      companies: count('SELECT COUNT(*) AS n FROM companies'),
      lineItems: count('SELECT COUNT(*) AS n FROM financials'),
      fiscalYears: this.db.prepare<[], { fiscal_year: string }>(
        'SELECT DISTINCT fiscal_year FROM financials ORDER BY fiscal_year DESC'
      ).all().map(row => row.fiscal_year),
      directoryEntries: count('SELECT COUNT(*) AS n FROM corp_directory'),
      directoryRefreshedAt: this.getMeta('corp_directory_refreshed_at'),
    };
  }

  close(): void {
    this.db.close();
  }

  private getMeta(key: string): string | null {
    const row = this.db.prepare<[string], { value: string }>(
      'SELECT value FROM store_meta WHERE key = ?'
    ).get(key);
    return row?.value ?? null;
  }

  private setMeta(key: string, value: string): void {
    this.db.prepare(
      'INSERT INTO store_meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
    ).run(key, value);
  }
}
