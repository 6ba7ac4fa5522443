/**
 * Error types: envelope errors for the HTTP surface and port failures for execution units.
 */

import type { ErrorCode, ErrorEnvelope } from './types.js';

// ── Envelope Errors ──

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  DATA_NOT_FOUND: 404,
  ACCESS_DENIED: 403,
  VALIDATION_FAILED: 400,
  EXECUTION_FAILED: 500,
  TIMEOUT: 504,
  RATE_LIMITED: 429,
};

/** Error carrying an envelope code, rendered as `{error: {code, message, details}}`. */
export class FabricError extends Error {
  readonly status: number;

  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'FabricError';
    this.status = STATUS_BY_CODE[code];
  }

  toEnvelope(): ErrorEnvelope {
    return { error: { code: this.code, message: this.message, details: this.details } };
  }
}

export function statusForCode(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

// ── Port Failures ──

export type PortFailureKind =
  | 'unavailable'
  | 'not_found'
  | 'access_denied'
  | 'conflict'
  | 'timeout'
  | 'auth'
  | 'network'
  | 'read'
  | 'write'
  | 'format'
  | 'quota'
  | 'exhausted'
  | 'invalid'
  | 'schema_mismatch'
  | 'inference'
  | 'unreachable';

/**
 * Expected failure raised by a port implementation.
 * Execution units translate the kind into their own error codes; any other
 * thrown error escapes the unit.
 */
export class PortFailure extends Error {
  constructor(
    readonly kind: PortFailureKind,
    message: string,
    /** What the failure is about, such as an environment id for `unreachable` */
    readonly subject?: string,
  ) {
    super(message);
    this.name = 'PortFailure';
  }
}

export function isPortFailure(err: unknown, ...kinds: PortFailureKind[]): err is PortFailure {
  if (!(err instanceof PortFailure)) return false;
  return kinds.length === 0 || kinds.includes(err.kind);
}

// ── Unit Code Mapping ──

const ACCESS_CODES = new Set(['ACCESS_DENIED', 'AUTHORIZATION_DENIED', 'CREDENTIAL_UNAVAILABLE']);

const VALIDATION_CODES = new Set([
  'INVALID_INPUT',
  'INVALID_DECLARATION',
  'INVALID_DATASET',
  'INVALID_AGGREGATION',
  'DUPLICATE_CONFLICT',
  'NAME_CONFLICT',
  'KEY_MISMATCH',
  'FORMAT_ERROR',
  'SCHEMA_MISMATCH',
  'SCHEMA_INVALID',
  'SCHEMA_VIOLATION',
  'SCHEMA_UNAVAILABLE',
  'TTL_INVALID',
  'RULES_INVALID',
  'EMPTY_SELECTION',
  'SAMPLE_NOT_IN_TASK',
  'ENTITY_KEY_MISSING',
  'NO_COMMON_ANCESTOR',
  'CHECKSUM_MISMATCH',
]);

/** Map an execution unit error code onto the envelope code reported to callers. */
export function envelopeCodeFor(unitCode: string): ErrorCode {
  if (unitCode.endsWith('_NOT_FOUND')) return 'DATA_NOT_FOUND';
  if (ACCESS_CODES.has(unitCode)) return 'ACCESS_DENIED';
  if (unitCode.endsWith('_TIMEOUT')) return 'TIMEOUT';
  if (VALIDATION_CODES.has(unitCode)) return 'VALIDATION_FAILED';
  return 'EXECUTION_FAILED';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
