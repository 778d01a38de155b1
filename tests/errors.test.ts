import { describe, it, expect } from 'vitest';
import {
  DartApiError,
  DartStatusError,
  RateLimitError,
  DataParseError,
  PersistenceError,
  ConfigError,
  errorMessage,
} from '../src/core/errors.js';

describe('Custom Error Types', () => {
  it('DartApiError has statusCode and url', () => {
    const err = new DartApiError('test', 500, '/api/fnlttSinglAcnt.json');
    expect(err.statusCode).toBe(500);
    expect(err.url).toBe('/api/fnlttSinglAcnt.json');
    expect(err.dartStatus).toBeUndefined();
    expect(err.name).toBe('DartApiError');
    expect(err instanceof Error).toBe(true);
  });

  it('DartStatusError carries the DART status code', () => {
    const err = new DartStatusError('/api/fnlttSinglAcnt.json', '013', '조회된 데이타가 없습니다.');
    expect(err.dartStatus).toBe('013');
    expect(err.statusCode).toBe(200);
    expect(err.message).toBe('DART status 013: 조회된 데이타가 없습니다.');
    expect(err instanceof DartApiError).toBe(true);
  });

  it('DartStatusError falls back when DART sends no message', () => {
    expect(new DartStatusError('/x', '020', '').message).toBe('DART status 020: unknown error');
  });

  it('RateLimitError is a 429 DartApiError', () => {
    const err = new RateLimitError('/api/corpCode.xml');
    expect(err.statusCode).toBe(429);
    expect(err instanceof DartApiError).toBe(true);
  });

  it('DataParseError has source', () => {
    const err = new DataParseError('bad json', '/api/list.json');
    expect(err.source).toBe('/api/list.json');
    expect(err.name).toBe('DataParseError');
  });

  it('PersistenceError keeps the underlying cause', () => {
    const cause = new Error('SQLITE_BUSY');
    const err = new PersistenceError('write failed', cause);
    expect(err.cause).toBe(cause);
    expect(err.name).toBe('PersistenceError');
  });

  it('ConfigError lists every issue', () => {
    const err = new ConfigError(['PORT: too big', 'LOG_LEVEL: invalid']);
    expect(err.issues).toHaveLength(2);
    expect(err.message).toBe('Invalid configuration:\n  PORT: too big\n  LOG_LEVEL: invalid');
  });

  it('errorMessage handles non-Error values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
