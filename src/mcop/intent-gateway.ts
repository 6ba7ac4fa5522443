/**
 * Intent gateway: accepts an intent, records an execution and runs the
 * intent's steps one after another in the background.
 *
 * It is a step runner, not a scheduler: no placement, no retries, no
 * parallel steps. A failed step stops the execution and the rest are skipped.
 */

import { randomUUID } from 'node:crypto';
import { FabricError, envelopeCodeFor, errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { MetricsCollector } from '../core/metrics.js';
import { globalMetrics } from '../core/metrics.js';
import type { JsonObject, JsonValue, TenantContext, UnitOutcome } from '../core/types.js';
import { FABRIC_DOMAIN, fail, isJsonObject, normalizeDomain, toJsonValue } from '../core/types.js';
import { compileSchema } from '../core/validation.js';
import type { SignalHub, TraceEventType } from '../observability/signal-hub.js';
import type { FeedbackSignalEmitter } from '../observability/signal-emitter.js';
import { UNIT_RUNNERS } from '../units/index.js';
import type { FabricPorts } from '../units/ports.js';
import type { LocalityResult, UnitName } from '../units/types.js';
import type { UnitRunner } from '../units/unit.js';
import type { AccessPolicy } from './access-policy.js';
import { allowAllPolicy } from './access-policy.js';
import type { DataFabricCapabilityProvider } from './capability-provider.js';
import type { Execution, ExecutionFilter, ExecutionStatus, ExecutionStore, StepRecord } from './execution.js';
import type { IntentDefinition, IntentStep } from './intent-handler.js';
import { DataFabricIntentHandler } from './intent-handler.js';

export const DEFAULT_UNIT_TIMEOUT_MS = 30_000;

export interface IntentRequest {
  domain: string;
  intent: string;
  inputs: JsonObject;
  tenant: TenantContext;
  traceId?: string;
}

export interface IntentAccepted {
  intentId: string;
  status: ExecutionStatus;
  executionId: string;
  traceId: string;
}

export interface IntentGatewayOptions {
  ports: FabricPorts;
  store: ExecutionStore;
  handler?: DataFabricIntentHandler;
  units?: Readonly<Record<UnitName, UnitRunner>>;
  policy?: AccessPolicy;
  emitter?: FeedbackSignalEmitter | null;
  hub?: SignalHub | null;
  provider?: DataFabricCapabilityProvider | null;
  unitTimeoutMs?: number;
  logger?: Logger;
  metrics?: MetricsCollector;
}

interface StepContext {
  executionId: string;
  intentId: string;
}

const checkLocality = compileSchema<LocalityResult>({
  type: 'object',
  required: ['signals'],
  properties: {
    signals: {
      type: 'array',
      items: {
        type: 'object',
        required: ['environmentId', 'localityType', 'transferCostEstimate', 'confidence'],
        properties: {
          environmentId: { type: 'string' },
          localityType: { enum: ['local', 'cached', 'remote', 'unavailable'] },
          transferCostEstimate: { type: 'number' },
          confidence: { type: 'number' },
        },
      },
    },
  },
});

/** A step's input: `inputs[inputKey]` with missing bound fields filled in. */
export function buildStepInput(
  step: IntentStep,
  inputs: JsonObject,
  results: readonly JsonValue[],
  context: StepContext,
): JsonValue {
  const base: JsonValue | undefined = step.inputKey === null ? inputs : inputs[step.inputKey];
  if (base !== undefined && !isJsonObject(base)) return base;

  const input: JsonObject = { ...(base ?? {}) };
  for (const binding of step.bindings) {
    if (input[binding.target] !== undefined) continue;
    let value: JsonValue | undefined;
    if ('step' in binding.from) {
      const earlier = results[binding.from.step];
      value = isJsonObject(earlier) ? earlier[binding.from.field] : undefined;
    } else {
      value = context[binding.from.context];
    }
    if (value !== undefined) input[binding.target] = value;
  }
  return input;
}

function pendingStep(index: number, unit: UnitName): StepRecord {
  return {
    index,
    unit,
    status: 'pending',
    startedAt: null,
    completedAt: null,
    durationMs: null,
    result: null,
    error: null,
    flags: {},
    warning: null,
  };
}

export class IntentGateway {
  private ports: FabricPorts;
  private store: ExecutionStore;
  private handler: DataFabricIntentHandler;
  private units: Readonly<Record<UnitName, UnitRunner>>;
  private policy: AccessPolicy;
  private emitter: FeedbackSignalEmitter | null;
  private hub: SignalHub | null;
  private provider: DataFabricCapabilityProvider | null;
  private unitTimeoutMs: number;
  private log: Logger;
  private metrics: MetricsCollector;
  private inflight = new Set<Promise<void>>();

  constructor(options: IntentGatewayOptions) {
    this.ports = options.ports;
    this.store = options.store;
    this.handler = options.handler ?? new DataFabricIntentHandler();
    this.units = options.units ?? UNIT_RUNNERS;
    this.policy = options.policy ?? allowAllPolicy;
    this.emitter = options.emitter ?? null;
    this.hub = options.hub ?? null;
    this.provider = options.provider ?? null;
    this.unitTimeoutMs = options.unitTimeoutMs ?? DEFAULT_UNIT_TIMEOUT_MS;
    this.log = options.logger ?? createLogger('intent-gateway');
    this.metrics = options.metrics ?? globalMetrics;
  }

  /** Accept an intent. Rejections throw FabricError; accepted intents run in the background. */
  async submit(request: IntentRequest): Promise<IntentAccepted> {
    const traceId = request.traceId ?? randomUUID();
    const intentId = randomUUID();
    const executionId = randomUUID();
    const log = this.log.child({ traceId, intentId, executionId, organizationId: request.tenant.organizationId });

    if (normalizeDomain(request.domain) !== FABRIC_DOMAIN) {
      throw new FabricError('VALIDATION_FAILED', `Unsupported domain: ${request.domain}`, { domain: request.domain });
    }

    const definition = this.handler.getDefinition(request.intent);
    if (!definition) {
      throw new FabricError('VALIDATION_FAILED', `Unsupported intent type: ${request.intent}`, { intent: request.intent });
    }

    const access = this.policy.evaluate(request.intent, request.inputs, request.tenant);
    if (access.decision === 'deny') {
      log.warn('Intent denied', { intent: request.intent, reason: access.reason });
      this.metrics.counter('fabric_intents_denied_total', { intent: definition.intent });
      throw new FabricError('ACCESS_DENIED', access.reason, { intent: request.intent });
    }

    const decomposition = await this.handler.handleIntent(intentId, definition.intent);
    if (!decomposition.success) {
      throw new FabricError('EXECUTION_FAILED', decomposition.error, { intent: request.intent });
    }

    const now = new Date().toISOString();
    const execution: Execution = {
      executionId,
      intentId,
      intent: definition.intent,
      domain: FABRIC_DOMAIN,
      traceId,
      tenant: { ...request.tenant },
      status: 'accepted',
      steps: definition.steps.map((s, i) => pendingStep(i, s.unit)),
      error: null,
      createdAt: now,
      updatedAt: now,
      completedAt: null,
    };
    await this.store.save(execution);

    log.info('Intent received', { intent: definition.intent, units: execution.steps.map((s) => s.unit) });
    this.metrics.counter('fabric_intents_total', { intent: definition.intent });
    this.trace('intent_received', execution, { unitCount: execution.steps.length });

    const started = Date.now();
    const task: Promise<void> = this.run(execution, request.inputs, definition, log, started)
      .catch((err: unknown) => this.abort(execution, err, log, started))
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);

    return { intentId, status: 'accepted', executionId, traceId };
  }

  async getExecution(executionId: string): Promise<Execution | null> {
    return this.store.get(executionId);
  }

  async listExecutions(filter: ExecutionFilter = {}): Promise<Execution[]> {
    return this.store.list(filter);
  }

  /** Resolves once every execution started so far has finished. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(Array.from(this.inflight));
    }
  }

  get runningCount(): number {
    return this.inflight.size;
  }

  // ── Execution ──

  private async run(execution: Execution, inputs: JsonObject, definition: IntentDefinition, log: Logger, started: number): Promise<void> {
    const context: StepContext = { executionId: execution.executionId, intentId: execution.intentId };
    const results: JsonValue[] = [];

    await this.update(execution, { status: 'running' });
    this.trace('execution_started', execution, { unitCount: definition.steps.length });

    for (const [index, step] of definition.steps.entries()) {
      const record = execution.steps[index];
      const input = buildStepInput(step, inputs, results, context);

      record.status = 'running';
      record.startedAt = new Date().toISOString();
      await this.update(execution, {});

      const stepStarted = Date.now();
      const outcome = await this.invoke(this.units[step.unit], input, execution.tenant, log);
      record.durationMs = Date.now() - stepStarted;
      record.completedAt = new Date().toISOString();
      record.flags = outcome.flags;

      if (outcome.ok) {
        record.status = 'succeeded';
        record.result = toJsonValue(outcome.value);
        record.warning = outcome.warning ?? null;
      } else {
        record.status = 'failed';
        record.result = outcome.value === undefined ? null : toJsonValue(outcome.value);
        record.error = { code: outcome.code, envelopeCode: envelopeCodeFor(outcome.code), message: outcome.message };
      }
      results[index] = record.result;

      this.metrics.counter('fabric_steps_total', { unit: step.unit, status: record.status });
      this.metrics.histogram('fabric_step_duration_ms', record.durationMs, { unit: step.unit });
      log.debug('Step finished', { unit: step.unit, status: record.status, durationMs: record.durationMs });

      await this.emitSignals(execution, record);
      if (outcome.ok && step.unit === 'LocalitySignalGenerator') {
        await this.forwardLocality(execution, input, record.result);
      }

      if (record.error) {
        execution.error = {
          code: record.error.envelopeCode,
          message: record.error.message,
          details: { unit: step.unit, unitCode: record.error.code, step: index },
        };
        this.skipAfter(execution, index);
        break;
      }

      const halt = step.haltWhen;
      if (halt && isJsonObject(record.result) && record.result[halt.field] === halt.equals) {
        log.info('Execution halted', { unit: step.unit, field: halt.field, value: halt.equals });
        this.skipAfter(execution, index);
        break;
      }

      await this.update(execution, {});
    }

    const status: ExecutionStatus = execution.error ? 'failed' : 'succeeded';
    const completedAt = new Date().toISOString();
    await this.update(execution, { status, completedAt });
    this.completed(execution, status, started, log);
  }

  /** A store or emitter failure mid-run still leaves a terminal record and a completion trace. */
  private async abort(execution: Execution, err: unknown, log: Logger, started: number): Promise<void> {
    const message = errorMessage(err);
    log.error('Execution aborted', { error: message });
    for (const step of execution.steps) {
      if (step.status === 'pending' || step.status === 'running') step.status = 'skipped';
    }
    execution.error = { code: 'EXECUTION_FAILED', message: `Execution aborted: ${message}`, details: { reason: message } };
    try {
      await this.update(execution, { status: 'failed', completedAt: new Date().toISOString() });
    } catch (saveErr) {
      log.error('Failed to record aborted execution', { error: errorMessage(saveErr) });
    }
    this.completed(execution, 'failed', started, log);
  }

  private completed(execution: Execution, status: ExecutionStatus, started: number, log: Logger): void {
    const durationMs = Date.now() - started;
    this.metrics.counter('fabric_executions_total', { intent: execution.intent, status });
    this.metrics.histogram('fabric_execution_duration_ms', durationMs, { intent: execution.intent });
    log.info('Execution completed', { status, durationMs, errorCode: execution.error?.code ?? null });
    this.trace('execution_completed', execution, {
      status,
      durationMs,
      errorCode: execution.error?.code ?? null,
    });
  }

  private async invoke(runner: UnitRunner, input: JsonValue, tenant: TenantContext, log: Logger): Promise<UnitOutcome<unknown>> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<UnitOutcome<unknown>>((resolve) => {
      timer = setTimeout(() => {
        resolve(fail('UNIT_TIMEOUT', `${runner.name} did not finish within ${this.unitTimeoutMs} ms`));
      }, this.unitTimeoutMs);
    });

    try {
      return await Promise.race([runner.invoke(input, tenant, this.ports), timeout]);
    } catch (err) {
      log.error('Execution unit threw', { unit: runner.name, error: errorMessage(err) });
      return fail('UNIT_ERROR', `${runner.name} failed: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timer);
    }
  }

  private async emitSignals(execution: Execution, record: StepRecord): Promise<void> {
    if (!this.emitter) return;
    const values: JsonObject = {
      ...(isJsonObject(record.result) ? record.result : {}),
      executionUnit: record.unit,
      success: record.status === 'succeeded',
      durationMs: record.durationMs ?? 0,
      ...(record.error ? { errorCode: record.error.code } : {}),
    };
    const emitted = await this.emitter.emitForExecutionUnit(
      record.unit,
      execution.intentId,
      execution.tenant,
      values,
      record.status === 'succeeded',
    );
    for (const result of emitted) {
      if (!result.success) {
        this.log.warn('Feedback signal not delivered', { signal: result.signalName, error: result.error });
      }
    }
  }

  private async forwardLocality(execution: Execution, input: JsonValue, result: JsonValue): Promise<void> {
    if (!this.provider || !checkLocality(result) || !isJsonObject(input)) return;
    const assetRef = input['assetRef'];
    if (typeof assetRef !== 'string') return;
    const accepted = await this.provider.provideLocalitySignals(execution.intentId, assetRef, result.signals);
    if (!accepted) {
      this.log.warn('Scheduler rejected locality signals', { intentId: execution.intentId, assetRef });
    }
  }

  private skipAfter(execution: Execution, index: number): void {
    for (const later of execution.steps.slice(index + 1)) later.status = 'skipped';
  }

  private async update(execution: Execution, changes: Partial<Pick<Execution, 'status' | 'completedAt'>>): Promise<void> {
    Object.assign(execution, changes);
    execution.updatedAt = new Date().toISOString();
    await this.store.save(execution);
  }

  private trace(type: TraceEventType, execution: Execution, extra: JsonObject): void {
    this.hub?.publishTrace(type, execution.tenant, {
      executionId: execution.executionId,
      intentId: execution.intentId,
      intent: execution.intent,
      traceId: execution.traceId,
      ...extra,
    });
  }
}
