import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

/**
 * Runtime configuration, read once from the environment.
 */

export const DEFAULT_DATA_DIR = join(homedir(), '.dart-fin-ratios');
export const DEFAULT_DB_PATH = join(DEFAULT_DATA_DIR, 'financials.db');

/** Companies crawled by the daily batch when BATCH_COMPANIES is unset */
export const DEFAULT_BATCH_COMPANIES = [
  '삼성전자',
  'SK하이닉스',
  'LG에너지솔루션',
  '삼성바이오로직스',
  '현대자동차',
  '기아',
  '셀트리온',
  'POSCO홀딩스',
  'NAVER',
  '카카오',
];

const csvList = z
  .string()
  .transform(s => s.split(',').map(part => part.trim()).filter(Boolean))
  .pipe(z.array(z.string()).min(1, 'must name at least one company'));

const envBoolean = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

const scheduleTime = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'must be HH:MM (24h)')
  .transform(s => {
    const [hour, minute] = s.split(':').map(Number);
    return { hour, minute };
  });

const envSchema = z.object({
  DART_API_KEY: z.string().min(1).optional(),
  DART_BASE_URL: z.string().url().default('https://opendart.fss.or.kr/api'),
  DART_REQUESTS_PER_SECOND: z.coerce.number().positive().max(100).default(5),
  DART_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  DART_FIN_DB: z.string().min(1).default(DEFAULT_DB_PATH),
  PORT: z.coerce.number().int().min(1).max(65535).default(3005),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  BATCH_COMPANIES: csvList.optional(),
  BATCH_SCHEDULE: scheduleTime.default('03:00'),
  BATCH_ENABLED: envBoolean.default('false'),
  CORP_DIRECTORY_TTL_HOURS: z.coerce.number().positive().default(168),
});

export interface AppConfig {
  dart: {
    apiKey: string | null;
    baseUrl: string;
    requestsPerSecond: number;
    timeoutMs: number;
    corpDirectoryTtlHours: number;
  };
  dbPath: string;
  server: { port: number; host: string };
  logLevel: LogLevel;
  batch: {
    companies: string[];
    enabled: boolean;
    hour: number;
    minute: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings behave like unset variables
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  return Object.freeze({
    dart: {
      apiKey: e.DART_API_KEY ?? null,
      baseUrl: e.DART_BASE_URL.replace(/\/+$/, ''),
      requestsPerSecond: e.DART_REQUESTS_PER_SECOND,
      timeoutMs: e.DART_TIMEOUT_MS,
      corpDirectoryTtlHours: e.CORP_DIRECTORY_TTL_HOURS,
    },
    dbPath: e.DART_FIN_DB,
    server: { port: e.PORT, host: e.HOST },
    logLevel: e.LOG_LEVEL,
    batch: {
      companies: e.BATCH_COMPANIES ?? [...DEFAULT_BATCH_COMPANIES],
      enabled: e.BATCH_ENABLED,
      hour: e.BATCH_SCHEDULE.hour,
      minute: e.BATCH_SCHEDULE.minute,
    },
  });
}
