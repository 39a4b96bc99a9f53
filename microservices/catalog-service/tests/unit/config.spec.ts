import { test, expect } from '@playwright/test';
import { loadConfig } from '../../src/config';

test.describe('loadConfig', () => {
  test('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: 'development',
      port: 8000,
      host: '0.0.0.0',
      database: { url: undefined, name: undefined },
      logging: { level: 'info', lokiHost: undefined, environment: 'development' },
      tracing: { endpoint: undefined },
    });
  });

  test('reads the database settings', () => {
    const config = loadConfig({ DATABASE_URL: 'mongodb://localhost:27017', DATABASE_NAME: 'topgames', PORT: '3000' });

    expect(config.database).toEqual({ url: 'mongodb://localhost:27017', name: 'topgames' });
    expect(config.port).toBe(3000);
  });

  test('treats empty values as unset', () => {
    const config = loadConfig({ DATABASE_URL: '', DATABASE_NAME: '', LOKI_HOST: '' });

    expect(config.database.url).toBeUndefined();
    expect(config.database.name).toBeUndefined();
    expect(config.logging.lokiHost).toBeUndefined();
  });

  test('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow();
    expect(() => loadConfig({ OTEL_EXPORTER_OTLP_ENDPOINT: 'not a url' })).toThrow();
  });
});
