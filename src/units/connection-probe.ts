/**
 * ConnectionProbe: tests reachability and authentication of a data source.
 * Probe failures after credentials resolve are reported as unhealthy results, not errors.
 */

import { isPortFailure } from '../core/errors.js';
import { fail, succeed } from '../core/types.js';
import type { HealthStatus } from '../core/types.js';
import { stringMap } from '../core/validation.js';
import type { ConnectionTestReport } from './ports.js';
import type { ConnectionProbeInput, ConnectionProbeResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

/** Latency at or above this is reported as degraded */
export const DEGRADED_LATENCY_MS = 1000;

function unhealthy(latencyMs: number, errorDetails: string): ConnectionProbeResult {
  return { healthStatus: 'unhealthy', latencyMs, errorDetails, probedAt: nowIso() };
}

export const connectionProbe = defineUnit<ConnectionProbeInput, ConnectionProbeResult, 'credentials' | 'connections'>({
  name: 'ConnectionProbe',
  inputSchema: {
    type: 'object',
    required: ['connectionRef', 'credentialRef'],
    properties: {
      connectionRef: { type: 'string', minLength: 1 },
      credentialRef: { type: 'string', minLength: 1 },
      timeoutSeconds: { type: 'integer', minimum: 1, maximum: 300, default: 30 },
      connectionConfig: { ...stringMap, default: {} },
    },
  },

  async execute(input, tenant, ports) {
    let credentials: Record<string, string>;
    try {
      credentials = await ports.credentials.resolve(input.credentialRef, tenant);
    } catch (err) {
      if (isPortFailure(err)) {
        return fail('CREDENTIAL_UNAVAILABLE', 'Cannot resolve credential reference');
      }
      throw err;
    }

    let report: ConnectionTestReport;
    try {
      report = await ports.connections.testConnection(
        { ref: input.connectionRef, ...input.connectionConfig },
        credentials,
        input.timeoutSeconds,
        tenant,
      );
    } catch (err) {
      if (isPortFailure(err, 'timeout')) {
        return succeed(unhealthy(input.timeoutSeconds * 1000, 'Connection timeout'));
      }
      if (isPortFailure(err, 'auth', 'access_denied')) {
        return succeed(unhealthy(0, `Authentication failed: ${err.message}`));
      }
      if (isPortFailure(err, 'network', 'unreachable', 'unavailable')) {
        return succeed(unhealthy(0, `Network error: ${err.message}`));
      }
      throw err;
    }

    let healthStatus: HealthStatus = 'unhealthy';
    if (report.success) {
      healthStatus = report.latencyMs < DEGRADED_LATENCY_MS ? 'healthy' : 'degraded';
    }

    return succeed({
      healthStatus,
      latencyMs: report.latencyMs,
      errorDetails: report.error,
      probedAt: nowIso(),
    });
  },
});
