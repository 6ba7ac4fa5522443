/**
 * Data Fabric HTTP Client: connects to FabricHttpServer instances.
 */

import { CircuitBreaker, type CircuitBreakerConfig } from '../core/circuit-breaker.js';
import { FabricError, errorMessage } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { globalMetrics } from '../core/metrics.js';
import type { ErrorCode, JsonObject, Result, TenantContext } from '../core/types.js';
import { FABRIC_DOMAIN } from '../core/types.js';
import type { Validator } from '../core/validation.js';
import { validate } from '../core/validation.js';
import type { CapabilityFilter } from '../mcop/capability-registry.js';
import { isTerminal } from '../mcop/execution.js';
import { HUB_EVENT_KINDS, type SignalFilter } from '../observability/signal-hub.js';
import { SSEReader } from './sse.js';
import type { CapabilityWire, ExecutionWire, IntentAcceptedWire, SignalEventWire } from './types.js';
import {
  checkCapabilities,
  checkErrorEnvelope,
  checkExecutionWire,
  checkIntentAccepted,
  checkSignalEvent,
  tenantToWire,
} from './wire.js';

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

const DEFAULT_RETRY: RetryConfig = { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 5000 };

const ERROR_CODES: readonly ErrorCode[] = [
  'DATA_NOT_FOUND',
  'ACCESS_DENIED',
  'VALIDATION_FAILED',
  'EXECUTION_FAILED',
  'TIMEOUT',
  'RATE_LIMITED',
];

export interface FabricClientOptions {
  /** Default tenant for submissions and the X-Tenant-Id header */
  tenant?: TenantContext;
  retry?: Partial<RetryConfig>;
  breaker?: Partial<CircuitBreakerConfig>;
}

export interface SubmitOptions {
  tenant?: TenantContext;
  traceId?: string;
  domain?: string;
}

export interface HealthResponse {
  status: string;
  version: string;
  uptime_ms: number;
  running_executions: number;
}

export class FabricHttpClient {
  private retryConfig: RetryConfig;
  private circuitBreaker: CircuitBreaker;
  private tenant: TenantContext | null;
  private logger = createLogger('FabricHttpClient');

  constructor(
    private baseUrl: string,
    options: FabricClientOptions = {},
  ) {
    this.retryConfig = { ...DEFAULT_RETRY, ...options.retry };
    this.circuitBreaker = new CircuitBreaker('fabric-http', { halfOpenMaxAttempts: 2, ...options.breaker });
    this.tenant = options.tenant ?? null;
  }

  getCircuitBreaker(): CircuitBreaker {
    return this.circuitBreaker;
  }

  async health(): Promise<HealthResponse> {
    return this.circuitBreaker.execute(async () => {
      const resp = await this.fetchWithRetry('/health', { method: 'GET' });
      if (!resp.ok) throw new Error(`Health check failed: ${resp.status}`);
      const body: unknown = await resp.json();
      if (typeof body !== 'object' || body === null || !('status' in body) || !('version' in body)) {
        throw new Error('Malformed health response');
      }
      return {
        status: String(body.status),
        version: String(body.version),
        uptime_ms: 'uptime_ms' in body ? Number(body.uptime_ms) : 0,
        running_executions: 'running_executions' in body ? Number(body.running_executions) : 0,
      };
    });
  }

  async capabilities(filter: CapabilityFilter = {}): Promise<CapabilityWire[]> {
    const query = new URLSearchParams();
    if (filter.domain) query.set('domain', filter.domain);
    if (filter.tag) query.set('tag', filter.tag);
    if (filter.capabilityType) query.set('capability_type', filter.capabilityType);
    if (filter.intent) query.set('intent', filter.intent);
    const qs = query.toString();

    const body = await this.request('GET', `/registry/capabilities${qs ? `?${qs}` : ''}`, checkCapabilities);
    return body.capabilities;
  }

  /** Submit an intent; rejects with a FabricError carrying the server's envelope code. */
  async submitIntent(intent: string, inputs: JsonObject, options: SubmitOptions = {}): Promise<IntentAcceptedWire> {
    const tenant = options.tenant ?? this.tenant;
    if (!tenant) throw new FabricError('VALIDATION_FAILED', 'A tenant context is required to submit intents');

    const envelope: Record<string, unknown> = {
      domain: options.domain ?? FABRIC_DOMAIN,
      intent,
      inputs,
      tenant_context: tenantToWire(tenant),
    };
    if (options.traceId) envelope['trace_id'] = options.traceId;

    const accepted = await this.request('POST', '/mcop/intents', checkIntentAccepted, envelope, tenant);
    globalMetrics.counter('client_intents_submitted_total', { intent });
    return accepted;
  }

  /** Null when the execution does not exist or belongs to another tenant. */
  async getExecution(executionId: string): Promise<ExecutionWire | null> {
    try {
      return await this.request('GET', `/mcop/executions/${encodeURIComponent(executionId)}`, checkExecutionWire);
    } catch (err) {
      if (err instanceof FabricError && err.code === 'DATA_NOT_FOUND') return null;
      throw err;
    }
  }

  /** Poll until the execution reaches a terminal status. */
  async waitForExecution(executionId: string, opts: { timeoutMs?: number; pollMs?: number } = {}): Promise<ExecutionWire> {
    const timeoutMs = opts.timeoutMs ?? 10_000;
    const pollMs = opts.pollMs ?? 50;
    const deadline = Date.now() + timeoutMs;

    while (Date.now() < deadline) {
      const execution = await this.getExecution(executionId);
      if (execution && isTerminal(execution.status)) return execution;
      await sleep(pollMs);
    }
    throw new FabricError('TIMEOUT', `Execution ${executionId} did not finish within ${timeoutMs} ms`);
  }

  /** Stream hub events matching `filter` until the server closes or `signal` aborts. */
  async *subscribeSignals(filter: SignalFilter = {}, opts: { signal?: AbortSignal } = {}): AsyncGenerator<SignalEventWire> {
    const query = new URLSearchParams();
    if (filter.domain) query.set('domain', filter.domain);
    if (filter.signalTypes && filter.signalTypes.length > 0) query.set('signal_types', filter.signalTypes.join(','));
    if (filter.tenantFilter?.organizationId) {
      const ws = filter.tenantFilter.workspaceId;
      query.set('tenant_filter', ws ? `${filter.tenantFilter.organizationId}/${ws}` : filter.tenantFilter.organizationId);
    }
    const qs = query.toString();

    const init: RequestInit = { method: 'GET', headers: this.headers(this.tenant) };
    if (opts.signal) init.signal = opts.signal;
    const resp = await fetch(`${this.baseUrl}/observability/signals${qs ? `?${qs}` : ''}`, init);
    if (!resp.ok || !resp.body) {
      throw await this.toError(resp);
    }

    const reader = new SSEReader(resp.body);
    try {
      for await (const event of reader.events()) {
        if (!HUB_EVENT_KINDS.some((kind) => kind === event.event)) continue;
        let data: unknown;
        try {
          data = JSON.parse(event.data);
        } catch {
          this.logger.warn('Skipping unparseable signal event', { event: event.event });
          continue;
        }
        const parsed = validate(checkSignalEvent, data);
        if (!parsed.ok) {
          this.logger.warn('Skipping malformed signal event', { error: parsed.error });
          continue;
        }
        yield parsed.value;
      }
    } catch (err) {
      if (opts.signal?.aborted) return;
      throw err;
    }
  }

  // ── Internals ──

  private async request<T>(
    method: string,
    path: string,
    check: Validator<T>,
    body?: unknown,
    tenant: TenantContext | null = this.tenant,
  ): Promise<T> {
    // 4xx responses do not count as breaker failures.
    const outcome = await this.circuitBreaker.execute(async (): Promise<Result<T, FabricError>> => {
      const init: RequestInit = { method, headers: this.headers(tenant) };
      if (body !== undefined) init.body = JSON.stringify(body);

      const resp = await this.fetchWithRetry(path, init);
      if (!resp.ok) {
        const error = await this.toError(resp);
        if (resp.status < 500) return { ok: false, error };
        throw error;
      }

      const parsed = validate(check, await resp.json());
      if (!parsed.ok) throw new Error(`Malformed response from ${path}: ${parsed.error}`);
      return { ok: true, value: parsed.value };
    });
    if (!outcome.ok) throw outcome.error;
    return outcome.value;
  }

  private headers(tenant: TenantContext | null): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json', Accept: 'application/json' };
    if (tenant) headers['X-Tenant-Id'] = tenant.organizationId;
    return headers;
  }

  private async toError(resp: Response): Promise<FabricError> {
    let body: unknown = null;
    try {
      body = await resp.json();
    } catch (err) {
      this.logger.debug('Error response had no JSON body', { status: resp.status, error: errorMessage(err) });
    }
    const parsed = validate(checkErrorEnvelope, body);
    if (parsed.ok) {
      const code = ERROR_CODES.find((c) => c === parsed.value.error.code) ?? 'EXECUTION_FAILED';
      return new FabricError(code, parsed.value.error.message, parsed.value.error.details ?? {});
    }
    return new FabricError('EXECUTION_FAILED', `HTTP ${resp.status}`);
  }

  /** Only network failures are retried; any HTTP response is returned as is. */
  private async fetchWithRetry(path: string, init: RequestInit): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    let lastError: Error | undefined;
    for (let attempt = 0; attempt <= this.retryConfig.maxRetries; attempt++) {
      try {
        return await fetch(url, init);
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        if (attempt < this.retryConfig.maxRetries) {
          await sleep(Math.min(this.retryConfig.baseDelayMs * 2 ** attempt, this.retryConfig.maxDelayMs));
        }
      }
    }
    throw lastError ?? new Error('Request failed');
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
