/**
 * MCP (Model Context Protocol) tools over the same engine the CLI and web API use.
 *
 * Tools:
 *   - get_financial_ratios: ratio and growth arrays for a stored company
 *   - crawl_financial_statements: fetch and store a company's annual statements from DART
 *   - get_financial_statements: stored statements grouped by fiscal year
 *   - list_accounts: the account vocabulary and ratio formulas
 *
 * Resources:
 *   - dart-fin-ratios://accounts: account and ratio definitions
 *   - dart-fin-ratios://db/stats: store statistics
 *
 * Prompts:
 *   - analyze_company: crawl then interpret a company's ratios
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { executeRatioCore, getStatements } from '../core/ratio-engine.js';
import { ACCOUNT_DEFINITIONS } from '../processing/account-definitions.js';
import { GROWTH_DEFINITIONS, RATIO_DEFINITIONS } from '../processing/ratio-definitions.js';
import { serializeCrawlOutcome, serializeStatementsView } from '../web/serialization.js';
import type { Container } from '../core/container.js';
import type { EngineError } from '../core/types.js';

export type McpDeps = Pick<Container, 'store' | 'acquisition'>;

function errorText(error: EngineError): string {
  let text = error.message;
  if (error.suggestions?.length) {
    text += '\n\nDid you mean:\n' + error.suggestions.map(s => `  ${s.corpName} (${s.stockCode || s.corpCode})`).join('\n');
  }
  return text;
}

function definitions() {
  return {
    accounts: ACCOUNT_DEFINITIONS.map(a => ({
      field: a.field,
      account_name: a.accountName,
      display_name: a.display_name,
      statement_type: a.statement_type,
    })),
    ratios: RATIO_DEFINITIONS.map(r => ({
      id: r.id,
      display_name: r.display_name,
      korean_name: r.korean_name,
      formula: `${r.numerator} / ${r.denominator} * 100`,
    })),
    growth: GROWTH_DEFINITIONS.map(g => ({
      id: g.id,
      display_name: g.display_name,
      formula: `(${g.field}[year] - ${g.field}[year-1]) / |${g.field}[year-1]| * 100`,
    })),
  };
}

export function buildMcpServer(deps: McpDeps): McpServer {
  const server = new McpServer(
    { name: 'dart-fin-ratios', version: '0.3.0' },
    { capabilities: { tools: {}, resources: {}, prompts: {} } }
  );

  // ── Tools ────────────────────────────────────────────────────────────

  server.tool(
    'get_financial_ratios',
    'Operating margin, net margin, ROE, ROA, debt ratio, current ratio and revenue/net income growth (percent) for the last 3 stored fiscal years of a Korean company. Values are null when not computable. Arrays are newest year first.',
    {
      company: z.string().min(1).describe('Company name as registered with DART (e.g., 삼성전자)'),
    },
    async ({ company }) => {
      const result = executeRatioCore(deps.store, company);
      if (!result.success) {
        return { content: [{ type: 'text', text: errorText(result.error) }], isError: true };
      }
      return { content: [{ type: 'text', text: JSON.stringify(result.result, null, 2) }] };
    }
  );

  server.tool(
    'crawl_financial_statements',
    'Fetch annual balance sheet, income statement and cash flow line items for a company from DART and store them. Returns stored rows without calling DART when the year is already stored.',
    {
      company: z.string().min(1).describe('Company name, 6-digit stock code or 8-digit DART corp code'),
      year: z.number().int().min(2000).max(2100).optional().describe('Fiscal year (default: last year, falling back up to 2 years)'),
    },
    async ({ company, year }) => {
      const result = await deps.acquisition.crawlCompany(company, year);
      if (!result.success) {
        return { content: [{ type: 'text', text: errorText(result.error) }], isError: true };
      }
      const { items, ...summary } = serializeCrawlOutcome(result.result);
      return {
        content: [{
          type: 'text',
          text: JSON.stringify({ ...summary, accounts: items.map(i => `${i.statement_type} ${i.account_name}`) }, null, 2),
        }],
      };
    }
  );

  server.tool(
    'get_financial_statements',
    'Stored financial statements of a company grouped by fiscal year (current, prior and prior-prior period amounts in KRW).',
    {
      company: z.string().min(1).describe('Company name as registered with DART'),
      year: z.number().int().min(2000).max(2100).optional().describe('Only this fiscal year'),
    },
    async ({ company, year }) => {
      const result = getStatements(deps.store, company, year === undefined ? undefined : String(year));
      if (!result.success) {
        return { content: [{ type: 'text', text: errorText(result.error) }], isError: true };
      }
      return { content: [{ type: 'text', text: JSON.stringify(serializeStatementsView(result.result), null, 2) }] };
    }
  );

  server.tool(
    'list_accounts',
    'List the DART account names the ratio pipeline reads and the formula of every ratio.',
    {},
    async () => ({ content: [{ type: 'text', text: JSON.stringify(definitions(), null, 2) }] })
  );

  // ── Resources ────────────────────────────────────────────────────────

  server.resource(
    'accounts',
    'dart-fin-ratios://accounts',
    { description: 'Account vocabulary, ratio and growth definitions', mimeType: 'application/json' },
    async (uri) => ({
      contents: [{ uri: uri.href, mimeType: 'application/json', text: JSON.stringify(definitions(), null, 2) }],
    })
  );

  server.resource(
    'db-stats',
    'dart-fin-ratios://db/stats',
    { description: 'Stored companies, line items and fiscal years', mimeType: 'application/json' },
    async (uri) => ({
      contents: [{ uri: uri.href, mimeType: 'application/json', text: JSON.stringify(deps.store.getStats(), null, 2) }],
    })
  );

  // ── Prompts ──────────────────────────────────────────────────────────

  server.prompt(
    'analyze_company',
    'Financial health review of a Korean listed company from DART filings',
    { company: z.string().describe('Company name (e.g., 삼성전자)') },
    async ({ company }) => ({
      messages: [{
        role: 'user' as const,
        content: {
          type: 'text' as const,
          text: `Review the financial health of ${company} using DART filings:

1. Call crawl_financial_statements for ${company} so the latest annual report is stored.
2. Call get_financial_ratios for ${company}.
3. Profitability: comment on operating and net margin levels and direction, and ROE versus ROA.
4. Stability: debt ratio (above 200% is high for most industries) and current ratio (below 100% is a liquidity warning).
5. Growth: revenue and net income growth; note where a null means the figure is not computable.
6. Summarize strengths and risks in a few sentences.`,
        },
      }],
    })
  );

  return server;
}
