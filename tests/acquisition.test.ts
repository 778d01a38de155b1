import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AcquisitionOrchestrator, toLineItemRecord } from '../src/core/acquisition.js';
import { CompanyResolver } from '../src/core/resolver.js';
import { FinancialStore } from '../src/core/store.js';
import { DartApiError, PersistenceError } from '../src/core/errors.js';
import { FakeFilingSource, fiscalYear, rawItem, SAMSUNG, SK_HYNIX } from './fixtures.js';

const NOW = new Date('2024-06-01T00:00:00.000Z');

describe('AcquisitionOrchestrator', () => {
  let store: FinancialStore;
  let source: FakeFilingSource;
  let orchestrator: AcquisitionOrchestrator;

  beforeEach(() => {
    store = new FinancialStore({ path: ':memory:', now: () => NOW });
    source = new FakeFilingSource();
    orchestrator = new AcquisitionOrchestrator({
      source,
      store,
      resolver: new CompanyResolver(store, source),
      now: () => NOW,
    });
    source.statements.set(SAMSUNG.corpCode, {
      year: fiscalYear('2023'),
      items: [
        rawItem('매출액', 'IS', { order: 1, currentAmount: '258,935,494' }),
        rawItem('영업활동현금흐름', 'CF', { order: 1 }),
        rawItem('자산총계', 'BS', { order: 9, currentAmount: '999' }),
        rawItem('자산총계', 'BS', { order: 4, currentAmount: '455,905,980' }),
      ],
    });
  });

  afterEach(() => {
    store.close();
  });

  describe('crawlCompany', () => {
    it('fetches, dedupes and stores, then returns the stored rows', async () => {
      const result = await orchestrator.crawlCompany('삼성전자');

      expect(result.success).toBe(true);
      if (!result.success) return;
      const { company, fiscalYear: year, status, items } = result.result;
      expect(company).toEqual(SAMSUNG);
      expect(year).toBe('2023');
      expect(status).toBe('stored');
      expect(items.map(i => `${i.statementType}:${i.accountName}:${i.currentAmount}`)).toEqual([
        'BS:자산총계:455905980',
        'IS:매출액:258935494',
        'CF:영업활동현금흐름:100',
      ]);
      expect(store.findCompanyByCode(SAMSUNG.corpCode)).toEqual(SAMSUNG);
      expect(source.fetchCalls).toEqual([{ corpCode: '00126380', year: undefined }]);
    });

    it('returns stored rows without calling DART the second time', async () => {
      await orchestrator.crawlCompany('삼성전자');
      const again = await orchestrator.crawlCompany('삼성전자');

      expect(again.success).toBe(true);
      if (!again.success) return;
      expect(again.result.status).toBe('existing');
      expect(again.result.fiscalYear).toBeNull();
      expect(again.result.items).toHaveLength(3);
      expect(source.fetchCalls).toHaveLength(1);
    });

    it('checks a pinned year on its own', async () => {
      store.upsertCompany(SAMSUNG);
      store.upsertLineItems([toLineItemRecord(rawItem('매출액', 'IS', { fiscalYear: '2023' }), SAMSUNG)]);

      const existing = await orchestrator.crawlCompany('삼성전자', '2023');
      expect(existing.success && existing.result.status).toBe('existing');
      expect(existing.success && existing.result.fiscalYear).toBe('2023');

      source.statements.set(SAMSUNG.corpCode, {
        year: fiscalYear('2021'),
        items: [rawItem('매출액', 'IS', { fiscalYear: '2021' })],
      });
      const fetched = await orchestrator.crawlCompany('삼성전자', 2021);
      expect(fetched.success && fetched.result.status).toBe('stored');
      expect(source.fetchCalls).toEqual([{ corpCode: '00126380', year: '2021' }]);
    });

    it('rejects an empty name and a malformed year', async () => {
      expect(await orchestrator.crawlCompany('  ')).toEqual({
        success: false,
        error: { type: 'validation', message: 'Company name is required' },
      });
      expect(await orchestrator.crawlCompany('삼성전자', '23')).toEqual({
        success: false,
        error: { type: 'validation', message: 'Invalid fiscal year: "23". Use a 4-digit year.' },
      });
      expect(source.fetchCalls).toHaveLength(0);
    });

    it('reports an unknown company with suggestions', async () => {
      source.directory = [SAMSUNG, { corpCode: '00126362', corpName: '삼성SDI', stockCode: '006400' }];
      const result = await orchestrator.crawlCompany('삼성');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.type).toBe('company_not_found');
      expect(result.error.message).toBe('Could not find company: "삼성"');
      expect(result.error.suggestions?.map(s => s.corpName)).toEqual(['삼성전자', '삼성SDI']);
    });

    it('reports an ambiguous name with candidates', async () => {
      source.directory = [
        { corpCode: '00200001', corpName: '한빛', stockCode: '' },
        { corpCode: '00200002', corpName: '한빛', stockCode: '' },
      ];
      const result = await orchestrator.crawlCompany('한빛');
      expect(!result.success && result.error.type).toBe('company_ambiguous');
      expect(!result.success && result.error.suggestions).toHaveLength(2);
    });

    it('maps a directory failure to api_error', async () => {
      vi.spyOn(source, 'listCompanies').mockRejectedValue(new DartApiError('DART server error: 503', 503, '/api/corpCode.xml'));
      const result = await orchestrator.crawlCompany('삼성전자');
      expect(result).toEqual({
        success: false,
        error: { type: 'api_error', message: 'Could not resolve "삼성전자": DART server error: 503' },
      });
    });

    it('maps a fetch failure to api_error', async () => {
      source.failWith = new Error('socket hang up');
      const result = await orchestrator.crawlCompany('삼성전자');
      expect(result).toEqual({ success: false, error: { type: 'api_error', message: 'socket hang up' } });
    });

    it('reports an empty filing as no_data with the reason', async () => {
      const result = await orchestrator.crawlCompany('SK하이닉스');
      expect(result).toEqual({
        success: false,
        error: {
          type: 'no_data',
          message: 'No annual financial statements on DART for SK하이닉스 (2023): DART status 013: 조회된 데이타가 없습니다.',
        },
      });
      expect(store.getLineItems(SK_HYNIX.corpCode)).toEqual([]);
    });

    it('maps a failed write to persistence_error', async () => {
      vi.spyOn(store, 'upsertLineItems').mockImplementation(() => {
        throw new PersistenceError('Failed to store 3 line items: disk I/O error');
      });
      const result = await orchestrator.crawlCompany('삼성전자');
      expect(result).toEqual({
        success: false,
        error: { type: 'persistence_error', message: 'Failed to store 3 line items: disk I/O error' },
      });
    });
  });

  describe('crawlAll', () => {
    it('crawls each company and isolates failures', async () => {
      const result = await orchestrator.crawlAll(['삼성전자', '없는회사', 'SK하이닉스']);

      expect(result.startedAt).toBe(NOW.toISOString());
      expect(result.finishedAt).toBe(NOW.toISOString());
      expect(result.total).toBe(3);
      expect(result.succeeded).toBe(1);
      expect(result.failed).toBe(2);
      expect(result.results.map(r => [r.companyName, r.success, r.error?.type ?? r.status])).toEqual([
        ['삼성전자', true, 'stored'],
        ['없는회사', false, 'company_not_found'],
        ['SK하이닉스', false, 'no_data'],
      ]);
      expect(result.results[0].itemCount).toBe(3);
    });

    it('keeps going when a crawl throws unexpectedly', async () => {
      store.upsertCompany(SAMSUNG);
      vi.spyOn(store, 'getRecentLineItems').mockImplementationOnce(() => {
        throw new Error('database is locked');
      });

      const result = await orchestrator.crawlAll(['삼성전자', '삼성전자']);
      expect(result.results[0]).toEqual({
        companyName: '삼성전자',
        success: false,
        itemCount: 0,
        error: { type: 'api_error', message: 'database is locked' },
      });
      expect(result.results[1].success).toBe(true);
    });

    it('returns an empty summary for no companies', async () => {
      const result = await orchestrator.crawlAll([]);
      expect(result).toMatchObject({ total: 0, succeeded: 0, failed: 0, results: [] });
    });
  });
});
