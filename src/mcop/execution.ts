/**
 * Execution records: the persisted state of one intent's run.
 */

import type { ErrorCode, JsonObject, JsonValue, TenantContext, UnitFlags } from '../core/types.js';
import { compileSchema, validate } from '../core/validation.js';
import type { Result } from '../core/types.js';
import { UNIT_NAMES } from '../units/types.js';
import type { UnitName } from '../units/types.js';

export type ExecutionStatus = 'accepted' | 'running' | 'succeeded' | 'failed';
export type StepStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped';

export const TERMINAL_STATUSES: readonly ExecutionStatus[] = ['succeeded', 'failed'];

export interface StepError {
  /** The unit's own error code */
  code: string;
  envelopeCode: ErrorCode;
  message: string;
}

export interface StepRecord {
  index: number;
  unit: UnitName;
  status: StepStatus;
  startedAt: string | null;
  completedAt: string | null;
  durationMs: number | null;
  result: JsonValue;
  error: StepError | null;
  flags: UnitFlags;
  warning: string | null;
}

export interface ExecutionError {
  code: ErrorCode;
  message: string;
  details: JsonObject;
}

export interface Execution {
  executionId: string;
  intentId: string;
  intent: string;
  domain: string;
  traceId: string;
  tenant: TenantContext;
  status: ExecutionStatus;
  steps: StepRecord[];
  error: ExecutionError | null;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}

export interface ExecutionFilter {
  organizationId?: string;
  workspaceId?: string;
  status?: ExecutionStatus;
  intent?: string;
  /** Most recent first; defaults to 100 */
  limit?: number;
}

export interface ExecutionStore {
  save(execution: Execution): Promise<void>;
  get(executionId: string): Promise<Execution | null>;
  list(filter?: ExecutionFilter): Promise<Execution[]>;
  close(): void;
}

export function isTerminal(status: ExecutionStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

// ── Stored Form ──

const ERROR_CODES: readonly ErrorCode[] = [
  'DATA_NOT_FOUND',
  'ACCESS_DENIED',
  'VALIDATION_FAILED',
  'EXECUTION_FAILED',
  'TIMEOUT',
  'RATE_LIMITED',
];

const nullableString = { type: ['string', 'null'] } as const;

const checkExecution = compileSchema<Execution>({
  type: 'object',
  required: [
    'executionId',
    'intentId',
    'intent',
    'domain',
    'traceId',
    'tenant',
    'status',
    'steps',
    'error',
    'createdAt',
    'updatedAt',
    'completedAt',
  ],
  properties: {
    executionId: { type: 'string' },
    intentId: { type: 'string' },
    intent: { type: 'string' },
    domain: { type: 'string' },
    traceId: { type: 'string' },
    tenant: {
      type: 'object',
      required: ['organizationId', 'workspaceId', 'userId'],
      properties: {
        organizationId: { type: 'string' },
        workspaceId: { type: 'string' },
        userId: { type: 'string' },
      },
    },
    status: { enum: ['accepted', 'running', 'succeeded', 'failed'] },
    steps: {
      type: 'array',
      items: {
        type: 'object',
        required: ['index', 'unit', 'status', 'startedAt', 'completedAt', 'durationMs', 'result', 'error', 'flags', 'warning'],
        properties: {
          index: { type: 'integer', minimum: 0 },
          unit: { enum: UNIT_NAMES },
          status: { enum: ['pending', 'running', 'succeeded', 'failed', 'skipped'] },
          startedAt: nullableString,
          completedAt: nullableString,
          durationMs: { type: ['number', 'null'] },
          error: {
            oneOf: [
              { type: 'null' },
              {
                type: 'object',
                required: ['code', 'envelopeCode', 'message'],
                properties: {
                  code: { type: 'string' },
                  envelopeCode: { enum: ERROR_CODES },
                  message: { type: 'string' },
                },
              },
            ],
          },
          flags: {
            type: 'object',
            properties: {
              truncated: { type: 'boolean' },
              lowConfidence: { type: 'boolean' },
              inconclusive: { type: 'boolean' },
              staleSignals: { type: 'boolean' },
            },
            additionalProperties: false,
          },
          warning: nullableString,
        },
      },
    },
    error: {
      oneOf: [
        { type: 'null' },
        {
          type: 'object',
          required: ['code', 'message', 'details'],
          properties: {
            code: { enum: ERROR_CODES },
            message: { type: 'string' },
            details: { type: 'object' },
          },
        },
      ],
    },
    createdAt: { type: 'string' },
    updatedAt: { type: 'string' },
    completedAt: nullableString,
  },
});

/** Parse a stored execution document. */
export function parseExecution(json: string): Result<Execution, string> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch {
    return { ok: false, error: 'Stored execution is not valid JSON' };
  }
  return validate(checkExecution, data);
}

/** Deep copy, so callers never share a record with the store. */
export function cloneExecution(execution: Execution): Execution {
  return structuredClone(execution);
}
