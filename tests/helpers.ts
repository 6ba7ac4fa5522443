import type { TenantContext, UnitFlags, UnitOutcome } from '../src/core/types.js';
import { utf8ToBytes } from '@noble/hashes/utils.js';
import type { Execution } from '../src/mcop/execution.js';

export const TENANT: TenantContext = { organizationId: 'acme', workspaceId: 'analytics', userId: 'u-1' };
export const OTHER_TENANT: TenantContext = { organizationId: 'globex', workspaceId: 'analytics', userId: 'u-9' };

export const REQUIRED_TAGS = {
  data_classification: 'internal',
  business_domain: 'sales',
  environment: 'production',
  owner_team: 'orders',
};

/** Unwrap a successful unit outcome or fail the test with the unit's error. */
export function expectOk<T>(outcome: UnitOutcome<T>): { value: T; flags: UnitFlags; warning?: string } {
  if (!outcome.ok) {
    throw new Error(`Expected success, got ${outcome.code}: ${outcome.message}`);
  }
  return outcome;
}

export function expectFail<T>(outcome: UnitOutcome<T>): { code: string; message: string; flags: UnitFlags } {
  if (outcome.ok) {
    throw new Error('Expected failure, got success');
  }
  return outcome;
}

export function byteLength(value: unknown): number {
  return utf8ToBytes(JSON.stringify(value)).length;
}

/** A finished single-step execution record. */
export function makeExecution(id: string, overrides: Partial<Execution> = {}): Execution {
  return {
    executionId: id,
    intentId: `intent-${id}`,
    intent: 'ProfileData',
    domain: 'data-fabric',
    traceId: `trace-${id}`,
    tenant: { organizationId: 'acme', workspaceId: 'analytics', userId: 'u-1' },
    status: 'succeeded',
    steps: [
      {
        index: 0,
        unit: 'DataProfiler',
        status: 'succeeded',
        startedAt: '2026-01-01T00:00:00.000Z',
        completedAt: '2026-01-01T00:00:01.000Z',
        durationMs: 1000,
        result: { rowCount: 3 },
        error: null,
        flags: { lowConfidence: true },
        warning: null,
      },
    ],
    error: null,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:01.000Z',
    completedAt: '2026-01-01T00:00:01.000Z',
    ...overrides,
  };
}
