import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../../../src/config/index.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      endpoint: 'http://127.0.0.1:8000',
      statementPath: '/v1/statement',
      timeoutMs: 30000,
      batchSize: 100_000,
      logLevel: 'info',
    });
  });

  it('should read and coerce every variable', () => {
    const config = loadConfig({
      STREAMLOAD_ENDPOINT: 'http://query.internal:8080',
      STREAMLOAD_STATEMENT_PATH: '/api/statement',
      STREAMLOAD_TIMEOUT_MS: '5000',
      STREAMLOAD_BATCH_SIZE: '250',
      LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      endpoint: 'http://query.internal:8080',
      statementPath: '/api/statement',
      timeoutMs: 5000,
      batchSize: 250,
      logLevel: 'debug',
    });
  });

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ STREAMLOAD_ENDPOINT: '', LOG_LEVEL: '' }).endpoint).toBe('http://127.0.0.1:8000');
  });

  it('should name the offending variable', () => {
    expect(() => loadConfig({ STREAMLOAD_BATCH_SIZE: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ STREAMLOAD_BATCH_SIZE: '0' })).toThrow('[config] invalid STREAMLOAD_BATCH_SIZE: ');
    expect(() => loadConfig({ STREAMLOAD_ENDPOINT: 'not a url' })).toThrow('[config] invalid STREAMLOAD_ENDPOINT: ');
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow('[config] invalid LOG_LEVEL: ');
  });
});
