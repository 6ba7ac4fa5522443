import { describe, it, expect } from 'vitest';
import { FabricError, PortFailure, envelopeCodeFor, errorMessage, isPortFailure, statusForCode } from '../src/core/errors.js';
import { canonicalEquals, canonicalize, hashCanonical, sha256HexOfText } from '../src/core/hashing.js';
import { isJsonObject, isJsonValue, normalizeDomain, succeed, fail, toJsonValue } from '../src/core/types.js';
import { compileSchema, validate, validateAgainst } from '../src/core/validation.js';

describe('FabricError', () => {
  it('renders the error envelope with its status', () => {
    const err = new FabricError('DATA_NOT_FOUND', 'Execution not found: e-1', { execution_id: 'e-1' });
    expect(err.status).toBe(404);
    expect(err.toEnvelope()).toEqual({
      error: { code: 'DATA_NOT_FOUND', message: 'Execution not found: e-1', details: { execution_id: 'e-1' } },
    });
  });

  it('maps every envelope code to an HTTP status', () => {
    expect(statusForCode('ACCESS_DENIED')).toBe(403);
    expect(statusForCode('VALIDATION_FAILED')).toBe(400);
    expect(statusForCode('EXECUTION_FAILED')).toBe(500);
    expect(statusForCode('TIMEOUT')).toBe(504);
    expect(statusForCode('RATE_LIMITED')).toBe(429);
  });
});

describe('envelopeCodeFor', () => {
  it.each([
    ['ASSET_NOT_FOUND', 'DATA_NOT_FOUND'],
    ['STAGING_NOT_FOUND', 'DATA_NOT_FOUND'],
    ['AUTHORIZATION_DENIED', 'ACCESS_DENIED'],
    ['CREDENTIAL_UNAVAILABLE', 'ACCESS_DENIED'],
    ['CONNECTION_TIMEOUT', 'TIMEOUT'],
    ['UNIT_TIMEOUT', 'TIMEOUT'],
    ['INVALID_INPUT', 'VALIDATION_FAILED'],
    ['SCHEMA_MISMATCH', 'VALIDATION_FAILED'],
    ['WRITE_FAILED', 'EXECUTION_FAILED'],
    ['UNIT_ERROR', 'EXECUTION_FAILED'],
  ])('%s → %s', (unitCode, envelope) => {
    expect(envelopeCodeFor(unitCode)).toBe(envelope);
  });
});

describe('PortFailure', () => {
  it('narrows by kind', () => {
    const err = new PortFailure('unreachable', 'env down', 'env-2');
    expect(isPortFailure(err)).toBe(true);
    expect(isPortFailure(err, 'unreachable', 'timeout')).toBe(true);
    expect(isPortFailure(err, 'not_found')).toBe(false);
    expect(isPortFailure(new Error('x'))).toBe(false);
    expect(err.subject).toBe('env-2');
  });

  it('errorMessage handles non-errors', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('JSON helpers', () => {
  it('normalizes the domain alias', () => {
    expect(normalizeDomain('data_fabric')).toBe('data-fabric');
    expect(normalizeDomain(' Data-Fabric ')).toBe('data-fabric');
  });

  it('recognizes JSON values', () => {
    expect(isJsonValue({ a: [1, 'x', null, true] })).toBe(true);
    expect(isJsonValue({ a: Number.NaN })).toBe(false);
    expect(isJsonValue({ a: undefined })).toBe(false);
    expect(isJsonObject([1])).toBe(false);
  });

  it('toJsonValue drops undefined fields and non-JSON values', () => {
    expect(toJsonValue({ a: 1, b: undefined, c: new Date(0) })).toEqual({ a: 1, c: '1970-01-01T00:00:00.000Z' });
    expect(toJsonValue(undefined)).toBeNull();
    expect(toJsonValue(() => 1)).toBeNull();
  });

  it('builds unit outcomes', () => {
    expect(succeed({ rows: 1 })).toEqual({ ok: true, value: { rows: 1 }, flags: {} });
    expect(succeed(1, { truncated: true }, 'cut')).toEqual({ ok: true, value: 1, flags: { truncated: true }, warning: 'cut' });
    expect(fail('WRITE_FAILED', 'disk')).toEqual({ ok: false, code: 'WRITE_FAILED', message: 'disk', flags: {} });
  });
});

describe('hashing', () => {
  it('hashes text with SHA-256', () => {
    expect(sha256HexOfText('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('canonicalizes key order', () => {
    expect(canonicalize({ b: 1, a: [2, { d: 3, c: 4 }] })).toBe('{"a":[2,{"c":4,"d":3}],"b":1}');
    expect(canonicalEquals({ x: 1, y: 2 }, { y: 2, x: 1 })).toBe(true);
    expect(canonicalEquals(undefined, null)).toBe(false);
    expect(hashCanonical({ a: 1, b: 2 })).toBe(hashCanonical({ b: 2, a: 1 }));
  });
});

describe('validation', () => {
  const check = compileSchema<{ name: string; mode: string }>({
    type: 'object',
    required: ['name'],
    properties: { name: { type: 'string' }, mode: { type: 'string', default: 'append' } },
  });

  it('applies defaults', () => {
    const result = validate(check, { name: 'orders' });
    expect(result).toEqual({ ok: true, value: { name: 'orders', mode: 'append' } });
  });

  it('describes errors against the input', () => {
    const result = validate(check, {});
    expect(result).toEqual({ ok: false, error: "input must have required property 'name'" });
  });

  it('validates against ad-hoc schemas', () => {
    expect(validateAgainst({ type: 'integer' }, 3).ok).toBe(true);
    expect(validateAgainst({ type: 'integer' }, 'x')).toEqual({ ok: false, error: 'input must be integer' });
  });
});
