import { createLogger, type Logger } from './logger.js';
import type { FilingSource } from './dart-client.js';
import type { FinancialStore } from './store.js';
import type { CompanyIdentity } from './types.js';

/**
 * Company resolver: name, stock code or corp code -> DART identity.
 *
 * Resolution order:
 * 1. Companies already in the store (exact name, then corp code)
 * 2. DART directory: exact name, listed companies first
 * 3. DART directory: 6-digit stock code or 8-digit corp code
 * 4. DART directory: substring of the name (a single hit is taken)
 *
 * Identities found in the directory are saved to the store, so the next
 * lookup never leaves the process.
 */

type Unresolved =
  | { status: 'ambiguous'; candidates: CompanyIdentity[] }
  | { status: 'not_found'; suggestions: CompanyIdentity[] };

export type DirectoryMatch = { status: 'found'; company: CompanyIdentity } | Unresolved;

export type ResolveResult =
  | { status: 'found'; company: CompanyIdentity; source: 'store' | 'directory' }
  | Unresolved;

const MAX_SUGGESTIONS = 5;

const isListed = (c: CompanyIdentity): boolean => c.stockCode !== '';

export class CompanyResolver {
  private readonly log: Logger;

  constructor(
    private readonly store: FinancialStore,
    private readonly source: Pick<FilingSource, 'listCompanies'>,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger('resolver');
  }

  async resolve(query: string): Promise<ResolveResult> {
    const name = query.trim();
    if (name === '') return { status: 'not_found', suggestions: [] };

    const stored = this.store.findCompanyByName(name) ?? this.store.findCompanyByCode(name);
    if (stored) return { status: 'found', company: stored, source: 'store' };

    const directory = await this.source.listCompanies();
    const result = matchDirectory(directory, name);

    if (result.status === 'found') {
      this.store.upsertCompany(result.company);
      this.log.info('Resolved company from DART directory', { query: name, corpCode: result.company.corpCode });
      return { ...result, source: 'directory' };
    }
    return result;
  }
}

/** Pure matching over a directory snapshot */
export function matchDirectory(directory: readonly CompanyIdentity[], query: string): DirectoryMatch {
  const name = query.trim();

  const exact = directory.filter(c => c.corpName === name);
  if (exact.length > 0) {
    const listed = exact.filter(isListed);
    const pool = listed.length > 0 ? listed : exact;
    if (pool.length === 1) return { status: 'found', company: pool[0] };
    return { status: 'ambiguous', candidates: pool.slice(0, MAX_SUGGESTIONS) };
  }

  if (/^\d{6}$/.test(name) || /^\d{8}$/.test(name)) {
    const byCode = directory.find(c => c.stockCode === name || c.corpCode === name);
    if (byCode) return { status: 'found', company: byCode };
  }

  const lower = name.toLowerCase();
  const partial = directory
    .filter(c => c.corpName.toLowerCase().includes(lower))
    .sort((a, b) => Number(isListed(b)) - Number(isListed(a)) || a.corpName.length - b.corpName.length);

  if (partial.length === 1) return { status: 'found', company: partial[0] };
  return { status: 'not_found', suggestions: partial.slice(0, MAX_SUGGESTIONS) };
}
