import { unzipSync, strFromU8, type Unzipped } from 'fflate';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { RateLimiter } from './rate-limiter.js';
import { createLogger, type Logger } from './logger.js';
import {
  ConfigError,
  DartApiError,
  DartStatusError,
  DataParseError,
  RateLimitError,
  errorMessage,
} from './errors.js';
import { STATEMENT_NAMES, toFiscalYear } from './types.js';
import type { CompanyIdentity, FiscalYear, RawLineItem, StatementType } from './types.js';

/**
 * DART OpenAPI client.
 *
 * Uses:
 * - corpCode.xml            company directory (ZIP around CORPCODE.xml)
 * - fnlttSinglAcnt.json     summary balance sheet and income statement
 * - fnlttSinglAcntAll.json  full consolidated statements, read for cash flow
 *
 * Requests share one rate limiter. HTTP 5xx, 429 and network failures are
 * retried with exponential backoff; a non-000 DART status means "no data".
 */

export const DART_BASE_URL = 'https://opendart.fss.or.kr/api';

/** Annual business report */
export const ANNUAL_REPORT_CODE = '11011';

/** How far back an unpinned fetch walks when the default year has no filing */
export const MAX_FALLBACK_YEARS = 2;

const MAX_RETRIES = 3;

/** Status DART returns when the query matched nothing */
const NO_DATA_STATUS = '013';

export interface FetchedStatements {
  /** The fiscal year the items belong to (after any fallback) */
  year: FiscalYear;
  items: RawLineItem[];
  /** Why items is empty, when it is */
  reason?: string;
}

/** What the acquisition pipeline needs from a filings provider */
export interface FilingSource {
  fetchStatements(corpCode: string, year?: FiscalYear): Promise<FetchedStatements>;
  listCompanies(): Promise<CompanyIdentity[]>;
}

/** Persistent copy of the company directory, so corpCode.xml is not downloaded per lookup */
export interface DirectoryCache {
  getDirectory(maxAgeMs: number, now?: Date): CompanyIdentity[] | null;
  replaceDirectory(entries: readonly CompanyIdentity[], now?: Date): void;
}

export interface DartClientOptions {
  apiKey: string | null;
  baseUrl?: string;
  rateLimiter?: RateLimiter;
  timeoutMs?: number;
  /** Base delay of the exponential backoff; 0 disables waiting */
  retryBaseMs?: number;
  directory?: DirectoryCache;
  directoryTtlHours?: number;
  fetch?: typeof fetch;
  now?: () => Date;
  logger?: Logger;
}

const dartRowSchema = z.object({
  rcept_no: z.string().optional(),
  reprt_code: z.string().optional(),
  bsns_year: z.string().optional(),
  sj_div: z.string().optional(),
  sj_nm: z.string().optional(),
  fs_div: z.string().optional(),
  account_nm: z.string(),
  thstrm_nm: z.string().optional(),
  thstrm_amount: z.string().nullish(),
  frmtrm_nm: z.string().optional(),
  frmtrm_amount: z.string().nullish(),
  bfefrmtrm_nm: z.string().optional(),
  bfefrmtrm_amount: z.string().nullish(),
  ord: z.union([z.string(), z.number()]).optional(),
  currency: z.string().optional(),
});

type DartRow = z.infer<typeof dartRowSchema>;

const envelopeSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  list: z.array(z.unknown()).optional(),
});

const corpEntrySchema = z.object({
  corp_code: z.string(),
  corp_name: z.string(),
  stock_code: z.string().optional(),
});

const corpDirectorySchema = z.object({
  result: z.object({
    list: z.array(corpEntrySchema).default([]),
  }),
});

/** The most recent fiscal year whose annual report can exist: last calendar year */
export function defaultFiscalYear(now: Date): FiscalYear {
  return shiftYear(String(now.getFullYear()), 1);
}

export function shiftYear(year: string, yearsBack: number): FiscalYear {
  const shifted = toFiscalYear(Number(year) - yearsBack);
  if (!shifted) throw new RangeError(`Fiscal year out of range: ${year} - ${yearsBack}`);
  return shifted;
}

function blankToNull(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function parseOrder(ord: string | number | undefined, fallback: number): number {
  const n = typeof ord === 'number' ? ord : Number(ord);
  return ord !== undefined && ord !== '' && Number.isInteger(n) ? n : fallback;
}

/** Map one DART row to a line item; statementType comes from sj_div */
export function toLineItem(row: DartRow, statementType: StatementType, year: FiscalYear, index: number): RawLineItem {
  const fiscalYear = toFiscalYear(row.bsns_year ?? '') ?? year;
  const y = Number(fiscalYear);

  return {
    accountName: row.account_nm.trim(),
    statementType,
    statementName: blankToNull(row.sj_nm) ?? STATEMENT_NAMES[statementType],
    fiscalYear,
    currentAmount: blankToNull(row.thstrm_amount),
    priorAmount: blankToNull(row.frmtrm_amount),
    priorPriorAmount: blankToNull(row.bfefrmtrm_amount),
    currentPeriodName: blankToNull(row.thstrm_nm) ?? `${y}년`,
    priorPeriodName: blankToNull(row.frmtrm_nm) ?? `${y - 1}년`,
    priorPriorPeriodName: blankToNull(row.bfefrmtrm_nm) ?? `${y - 2}년`,
    order: parseOrder(row.ord, index + 1),
    filingId: row.rcept_no ?? '',
    reportCode: row.reprt_code ?? ANNUAL_REPORT_CODE,
    currency: blankToNull(row.currency) ?? 'KRW',
  };
}

/**
 * Unpack the corpCode.xml archive into company identities.
 * Codes stay strings: corp_code carries leading zeros.
 */
export function parseCorpDirectory(archive: Uint8Array, source: string = 'corpCode.xml'): CompanyIdentity[] {
  let files: Unzipped;
  try {
    files = unzipSync(archive);
  } catch (err) {
    throw new DataParseError(`Failed to unzip company directory: ${errorMessage(err)}`, source);
  }

  const entry = Object.keys(files).find(name => name.toUpperCase() === 'CORPCODE.XML');
  if (!entry) {
    throw new DataParseError('Company directory archive has no CORPCODE.xml', source);
  }

  const parser = new XMLParser({
    parseTagValue: false,
    isArray: (tagName: string) => tagName === 'list',
  });

  let document: unknown;
  try {
    document = parser.parse(strFromU8(files[entry]));
  } catch (err) {
    throw new DataParseError(`Failed to parse CORPCODE.xml: ${errorMessage(err)}`, source);
  }

  const parsed = corpDirectorySchema.safeParse(document);
  if (!parsed.success) {
    throw new DataParseError('CORPCODE.xml does not have the expected <result><list> shape', source);
  }

  return parsed.data.result.list.map(item => ({
    corpCode: item.corp_code.trim(),
    corpName: item.corp_name.trim(),
    stockCode: (item.stock_code ?? '').trim(),
  }));
}

export class DartClient implements FilingSource {
  private readonly apiKey: string | null;
  private readonly baseUrl: string;
  private readonly rateLimiter: RateLimiter;
  private readonly timeoutMs: number;
  private readonly retryBaseMs: number;
  private readonly directory: DirectoryCache | undefined;
  private readonly directoryTtlMs: number;
  private readonly fetchImpl: typeof fetch | undefined;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(options: DartClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DART_BASE_URL).replace(/\/+$/, '');
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.retryBaseMs = options.retryBaseMs ?? 1000;
    this.directory = options.directory;
    this.directoryTtlMs = (options.directoryTtlHours ?? 168) * 3_600_000;
    this.fetchImpl = options.fetch;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger('dart');
  }

  /**
   * Annual BS/IS/CF line items for one company.
   *
   * With no year, starts from last calendar year and walks back up to
   * MAX_FALLBACK_YEARS years until a filing turns up. A pinned year is
   * fetched once. Upstream failures come back as an empty result with a reason.
   */
  async fetchStatements(corpCode: string, year?: FiscalYear): Promise<FetchedStatements> {
    this.requireKey();

    const start = year ?? defaultFiscalYear(this.now());
    const attempts = year === undefined ? MAX_FALLBACK_YEARS + 1 : 1;
    let reason = `No annual report filed for ${start}`;

    for (let i = 0; i < attempts; i++) {
      const target = shiftYear(start, i);
      const result = await this.fetchYear(corpCode, target);
      if (result.items.length > 0) {
        return { year: target, items: result.items };
      }
      reason = result.reason ?? reason;
      if (i + 1 < attempts) {
        this.log.info('No filing for year, trying the previous year', { corpCode, year: target });
      }
    }

    return { year: start, items: [], reason };
  }

  /** Full DART company directory, from the cache while it is fresh */
  async listCompanies(): Promise<CompanyIdentity[]> {
    this.requireKey();

    const cached = this.directory?.getDirectory(this.directoryTtlMs, this.now());
    if (cached) return cached;

    const url = this.buildUrl('/corpCode.xml', {});
    const response = await this.send(url);
    const companies = parseCorpDirectory(new Uint8Array(await response.arrayBuffer()), url.pathname);

    this.log.info('Company directory downloaded', { entries: companies.length });
    this.directory?.replaceDirectory(companies, this.now());
    return companies;
  }

  private async fetchYear(corpCode: string, year: FiscalYear): Promise<{ items: RawLineItem[]; reason?: string }> {
    const params = { corp_code: corpCode, bsns_year: year, reprt_code: ANNUAL_REPORT_CODE };

    let summary: DartRow[];
    try {
      summary = await this.requestList('/fnlttSinglAcnt.json', params);
    } catch (err) {
      this.logFetchFailure('summary statements', err, corpCode, year);
      return { items: [], reason: errorMessage(err) };
    }

    // Consolidated figures when filed, separate statements otherwise
    const consolidated = summary.filter(row => row.fs_div === 'CFS');
    const chosen = consolidated.length > 0 ? consolidated : summary.filter(row => row.fs_div !== 'CFS');

    const items: RawLineItem[] = [];
    chosen.forEach((row, index) => {
      if (row.sj_div === 'BS' || row.sj_div === 'IS') {
        items.push(toLineItem(row, row.sj_div, year, index));
      }
    });

    if (items.length === 0) {
      return { items, reason: `No balance sheet or income statement rows for ${year}` };
    }

    items.push(...(await this.fetchCashFlow(corpCode, year)));
    return { items };
  }

  /** Cash-flow rows are optional: a failure here keeps the BS/IS rows */
  private async fetchCashFlow(corpCode: string, year: FiscalYear): Promise<RawLineItem[]> {
    try {
      const rows = await this.requestList('/fnlttSinglAcntAll.json', {
        corp_code: corpCode,
        bsns_year: year,
        reprt_code: ANNUAL_REPORT_CODE,
        fs_div: 'CFS',
      });
      const items: RawLineItem[] = [];
      rows.forEach((row, index) => {
        if (row.sj_div === 'CF') {
          items.push(toLineItem(row, 'CF', year, index));
        }
      });
      return items;
    } catch (err) {
      this.logFetchFailure('cash flow statement', err, corpCode, year);
      return [];
    }
  }

  private logFetchFailure(what: string, err: unknown, corpCode: string, year: FiscalYear): void {
    if (err instanceof DartStatusError && err.dartStatus === NO_DATA_STATUS) {
      this.log.info(`No ${what} on DART`, { corpCode, year });
      return;
    }
    this.log.warn(`Fetching ${what} failed`, { corpCode, year, error: errorMessage(err) });
  }

  private async requestList(endpoint: string, params: Record<string, string>): Promise<DartRow[]> {
    const url = this.buildUrl(endpoint, params);
    const response = await this.send(url);

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new DataParseError(`DART returned a non-JSON body for ${endpoint}`, url.pathname);
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new DataParseError(`Unexpected DART response shape for ${endpoint}`, url.pathname);
    }
    if (envelope.data.status !== '000') {
      throw new DartStatusError(url.pathname, envelope.data.status, envelope.data.message ?? '');
    }

    const rows: DartRow[] = [];
    for (const item of envelope.data.list ?? []) {
      const row = dartRowSchema.safeParse(item);
      if (row.success) {
        rows.push(row.data);
      } else {
        this.log.debug('Skipping malformed DART row', { endpoint });
      }
    }
    return rows;
  }

  private buildUrl(endpoint: string, params: Record<string, string>): URL {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    url.searchParams.set('crtfc_key', this.apiKey ?? '');
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  private async send(url: URL): Promise<Response> {
    // Never log or report the key
    const where = url.pathname;
    const doFetch = this.fetchImpl ?? globalThis.fetch;
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
      if (attempt > 0) {
        this.log.warn('Retrying DART request', { endpoint: where, attempt, error: lastError?.message });
        await sleep(this.backoffMs(attempt - 1));
      }
      await this.rateLimiter.acquire();

      let response: Response;
      try {
        response = await doFetch(url, {
          headers: { Accept: 'application/json' },
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        lastError = new DartApiError(`Network error fetching ${where}: ${errorMessage(err)}`, 0, where);
        continue;
      }

      if (response.ok) return response;

      if (response.status === 429) {
        lastError = new RateLimitError(where);
        continue;
      }

      if (response.status >= 500) {
        lastError = new DartApiError(`DART server error: ${response.status}`, response.status, where);
        continue;
      }

      throw new DartApiError(`DART API error: ${response.status} ${response.statusText}`, response.status, where);
    }

    throw lastError ?? new DartApiError(`Failed after ${MAX_RETRIES} attempts`, 0, where);
  }

  /** Exponential backoff with jitter: base, 2×base, ... */
  private backoffMs(attempt: number): number {
    if (this.retryBaseMs <= 0) return 0;
    return this.retryBaseMs * Math.pow(2, attempt) + Math.random() * (this.retryBaseMs / 2);
  }

  private requireKey(): void {
    if (!this.apiKey) {
      throw new ConfigError(['DART_API_KEY: required to call the DART OpenAPI']);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
