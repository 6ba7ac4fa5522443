/**
 * Service configuration from `FABRIC_*` environment variables.
 */

import { fileURLToPath } from 'node:url';
import type { TransportConfig } from '../transport/types.js';
import { DEFAULT_TRANSPORT_CONFIG } from '../transport/types.js';
import type { RateLimits } from '../transport/rate-limiter.js';
import { DEFAULT_RATE_LIMITS } from '../transport/rate-limiter.js';
import { DEFAULT_UNIT_TIMEOUT_MS } from '../mcop/intent-gateway.js';
import { LogLevel, parseLogLevel } from './logger.js';
import type { Result } from './types.js';
import { compileSchema, validate } from './validation.js';

export type StoreConfig = { kind: 'memory' } | { kind: 'sqlite'; path: string };

export interface FabricConfig {
  transport: TransportConfig;
  logLevel: LogLevel;
  store: StoreConfig;
  cardsDir: string;
  signalsDir: string;
  unitTimeoutMs: number;
  rateLimits: RateLimits;
}

export const DEFAULT_CARDS_DIR = fileURLToPath(new URL('../../registry_cards', import.meta.url));
export const DEFAULT_SIGNALS_DIR = fileURLToPath(new URL('../../feedback_signals', import.meta.url));

interface RawConfig {
  port: number;
  host: string;
  basePath: string;
  corsOrigins: string[];
  maxSseSubscribers: number;
  maxBodyBytes: number;
  logLevel: string;
  store: string;
  cardsDir: string;
  signalsDir: string;
  unitTimeoutMs: number;
  rateLimitRead: number;
  rateLimitWrite: number;
  rateLimitCompute: number;
}

const positiveInt = { type: 'integer', minimum: 1 } as const;

const checkRaw = compileSchema<RawConfig>({
  type: 'object',
  properties: {
    port: { type: 'integer', minimum: 0, maximum: 65535, default: DEFAULT_TRANSPORT_CONFIG.port },
    host: { type: 'string', minLength: 1, default: DEFAULT_TRANSPORT_CONFIG.host },
    basePath: { type: 'string', pattern: '^(/[A-Za-z0-9._~-]+)*$', default: DEFAULT_TRANSPORT_CONFIG.basePath },
    corsOrigins: { type: 'array', items: { type: 'string', minLength: 1 }, default: [] },
    maxSseSubscribers: { ...positiveInt, default: DEFAULT_TRANSPORT_CONFIG.maxSseSubscribers },
    maxBodyBytes: { ...positiveInt, default: DEFAULT_TRANSPORT_CONFIG.maxBodyBytes },
    logLevel: { enum: ['debug', 'info', 'warn', 'error', 'silent'], default: 'info' },
    store: { type: 'string', minLength: 1, default: 'memory' },
    cardsDir: { type: 'string', minLength: 1, default: DEFAULT_CARDS_DIR },
    signalsDir: { type: 'string', minLength: 1, default: DEFAULT_SIGNALS_DIR },
    unitTimeoutMs: { ...positiveInt, default: DEFAULT_UNIT_TIMEOUT_MS },
    rateLimitRead: { ...positiveInt, default: DEFAULT_RATE_LIMITS.read },
    rateLimitWrite: { ...positiveInt, default: DEFAULT_RATE_LIMITS.write },
    rateLimitCompute: { ...positiveInt, default: DEFAULT_RATE_LIMITS.compute },
  },
  additionalProperties: false,
});

type Env = Record<string, string | undefined>;

const NUMERIC_VARS: ReadonlyArray<[string, keyof RawConfig]> = [
  ['FABRIC_PORT', 'port'],
  ['FABRIC_MAX_SSE_SUBSCRIBERS', 'maxSseSubscribers'],
  ['FABRIC_MAX_BODY_BYTES', 'maxBodyBytes'],
  ['FABRIC_UNIT_TIMEOUT_MS', 'unitTimeoutMs'],
  ['FABRIC_RATE_LIMIT_READ', 'rateLimitRead'],
  ['FABRIC_RATE_LIMIT_WRITE', 'rateLimitWrite'],
  ['FABRIC_RATE_LIMIT_COMPUTE', 'rateLimitCompute'],
];

const STRING_VARS: ReadonlyArray<[string, keyof RawConfig]> = [
  ['FABRIC_HOST', 'host'],
  ['FABRIC_BASE_PATH', 'basePath'],
  ['FABRIC_LOG_LEVEL', 'logLevel'],
  ['FABRIC_STORE', 'store'],
  ['FABRIC_CARDS_DIR', 'cardsDir'],
  ['FABRIC_SIGNALS_DIR', 'signalsDir'],
];

/**
 * Read configuration from `env`. Unset or empty variables take their defaults.
 *
 * `FABRIC_STORE` is `memory` or `sqlite:<path>`; `FABRIC_CORS_ORIGINS` is a
 * comma-separated list.
 */
export function loadConfig(env: Env = process.env): Result<FabricConfig, string> {
  const raw: Record<string, unknown> = {};

  for (const [name, key] of NUMERIC_VARS) {
    const value = present(env[name]);
    if (value !== undefined) raw[key] = Number(value);
  }
  for (const [name, key] of STRING_VARS) {
    const value = present(env[name]);
    if (value !== undefined) raw[key] = key === 'logLevel' ? value.toLowerCase() : value;
  }
  const cors = present(env['FABRIC_CORS_ORIGINS']);
  if (cors !== undefined) {
    raw['corsOrigins'] = cors.split(',').map((o) => o.trim()).filter((o) => o !== '');
  }

  const parsed = validate(checkRaw, raw);
  if (!parsed.ok) return { ok: false, error: `Invalid configuration: ${parsed.error}` };
  const config = parsed.value;

  const store = parseStore(config.store);
  if (!store) {
    return { ok: false, error: `Invalid configuration: FABRIC_STORE must be 'memory' or 'sqlite:<path>', got '${config.store}'` };
  }

  return {
    ok: true,
    value: {
      transport: {
        port: config.port,
        host: config.host,
        basePath: config.basePath,
        corsOrigins: config.corsOrigins,
        maxSseSubscribers: config.maxSseSubscribers,
        maxBodyBytes: config.maxBodyBytes,
      },
      logLevel: parseLogLevel(config.logLevel) ?? LogLevel.INFO,
      store,
      cardsDir: config.cardsDir,
      signalsDir: config.signalsDir,
      unitTimeoutMs: config.unitTimeoutMs,
      rateLimits: {
        read: config.rateLimitRead,
        write: config.rateLimitWrite,
        compute: config.rateLimitCompute,
      },
    },
  };
}

function present(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function parseStore(value: string): StoreConfig | null {
  if (value === 'memory') return { kind: 'memory' };
  if (value.startsWith('sqlite:')) {
    const path = value.slice('sqlite:'.length);
    return path === '' ? null : { kind: 'sqlite', path };
  }
  return null;
}
