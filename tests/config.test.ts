import { describe, it, expect } from 'vitest';
import { DEFAULT_CARDS_DIR, DEFAULT_SIGNALS_DIR, loadConfig } from '../src/core/config.js';
import { LogLevel } from '../src/core/logger.js';

describe('loadConfig', () => {
  it('returns defaults for an empty environment', () => {
    const result = loadConfig({});
    expect(result).toEqual({
      ok: true,
      value: {
        transport: {
          port: 8080,
          host: '127.0.0.1',
          basePath: '',
          corsOrigins: [],
          maxSseSubscribers: 100,
          maxBodyBytes: 1_048_576,
        },
        logLevel: LogLevel.INFO,
        store: { kind: 'memory' },
        cardsDir: DEFAULT_CARDS_DIR,
        signalsDir: DEFAULT_SIGNALS_DIR,
        unitTimeoutMs: 30_000,
        rateLimits: { read: 1000, write: 100, compute: 50 },
      },
    });
  });

  it('reads FABRIC_* variables', () => {
    const result = loadConfig({
      FABRIC_PORT: '0',
      FABRIC_HOST: '0.0.0.0',
      FABRIC_BASE_PATH: '/api/v1',
      FABRIC_CORS_ORIGINS: 'https://a.test, https://b.test,',
      FABRIC_LOG_LEVEL: 'WARN',
      FABRIC_STORE: 'sqlite:/tmp/fabric.db',
      FABRIC_UNIT_TIMEOUT_MS: '500',
      FABRIC_RATE_LIMIT_COMPUTE: '5',
      FABRIC_CARDS_DIR: '  ',
    });
    if (!result.ok) throw new Error(result.error);
    const config = result.value;
    expect(config.transport.port).toBe(0);
    expect(config.transport.host).toBe('0.0.0.0');
    expect(config.transport.basePath).toBe('/api/v1');
    expect(config.transport.corsOrigins).toEqual(['https://a.test', 'https://b.test']);
    expect(config.logLevel).toBe(LogLevel.WARN);
    expect(config.store).toEqual({ kind: 'sqlite', path: '/tmp/fabric.db' });
    expect(config.unitTimeoutMs).toBe(500);
    expect(config.rateLimits).toEqual({ read: 1000, write: 100, compute: 5 });
    expect(config.cardsDir).toBe(DEFAULT_CARDS_DIR);
  });

  it('rejects a non-numeric port', () => {
    const result = loadConfig({ FABRIC_PORT: 'eighty' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toContain('Invalid configuration: input/port must be integer');
  });

  it('rejects an unknown log level', () => {
    const result = loadConfig({ FABRIC_LOG_LEVEL: 'verbose' });
    expect(result.ok).toBe(false);
  });

  it('rejects a base path without a leading slash', () => {
    expect(loadConfig({ FABRIC_BASE_PATH: 'api' }).ok).toBe(false);
  });

  it('rejects an unknown store', () => {
    expect(loadConfig({ FABRIC_STORE: 'postgres' })).toEqual({
      ok: false,
      error: "Invalid configuration: FABRIC_STORE must be 'memory' or 'sqlite:<path>', got 'postgres'",
    });
    expect(loadConfig({ FABRIC_STORE: 'sqlite:' }).ok).toBe(false);
  });
});
