/**
 * Feedback signal emitter: validates payloads against their definitions and
 * hands them to the observability spine.
 */

import { randomUUID } from 'node:crypto';
import { CircuitBreaker } from '../core/circuit-breaker.js';
import { errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { MetricsCollector } from '../core/metrics.js';
import { globalMetrics } from '../core/metrics.js';
import type { JsonObject, TenantContext } from '../core/types.js';
import { FABRIC_DOMAIN } from '../core/types.js';
import { validateAgainst } from '../core/validation.js';
import type { FeedbackSignalRegistry, SignalType } from './signal-registry.js';

/** Where signals go. `SignalHub` is the in-process implementation. */
export interface ObservabilitySpine {
  emitMetric(name: string, value: JsonObject, tenant: TenantContext, timestamp: string): Promise<boolean>;
  emitOutcome(name: string, value: JsonObject, tenant: TenantContext, timestamp: string): Promise<boolean>;
  emitAdvisor(
    name: string,
    value: JsonObject,
    tenant: TenantContext,
    intendedConsumer: string,
    timestamp: string,
  ): Promise<boolean>;
}

export interface EmissionResult {
  signalName: string;
  signalType: SignalType;
  success: boolean;
  emissionId: string;
  timestamp: string;
  error: string | null;
}

export interface EmissionCount {
  total: number;
  successful: number;
  failed: number;
  metrics: number;
  outcomes: number;
  advisors: number;
}

export interface SignalEmitterOptions {
  breaker?: CircuitBreaker;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Most recent emissions kept for `getEmissions()`. Default 1000. */
  maxEntries?: number;
}

function emptyCount(): EmissionCount {
  return { total: 0, successful: 0, failed: 0, metrics: 0, outcomes: 0, advisors: 0 };
}

export class FeedbackSignalEmitter {
  private emissions: EmissionResult[] = [];
  private counts = emptyCount();
  private maxEntries: number;
  private breaker: CircuitBreaker;
  private log: Logger;
  private metrics: MetricsCollector;

  constructor(
    private registry: FeedbackSignalRegistry,
    private spine: ObservabilitySpine | null = null,
    options: SignalEmitterOptions = {},
  ) {
    this.breaker = options.breaker ?? new CircuitBreaker('observability-spine');
    this.log = options.logger ?? createLogger('signal-emitter');
    this.metrics = options.metrics ?? globalMetrics;
    this.maxEntries = options.maxEntries ?? 1000;
  }

  emitMetric(name: string, intentId: string, tenant: TenantContext, values: JsonObject): Promise<EmissionResult> {
    return this.emit('metric', name, intentId, tenant, values, null);
  }

  emitOutcome(name: string, intentId: string, tenant: TenantContext, values: JsonObject): Promise<EmissionResult> {
    return this.emit('outcome', name, intentId, tenant, values, null);
  }

  emitAdvisor(
    name: string,
    intentId: string,
    tenant: TenantContext,
    values: JsonObject,
    intendedConsumer: string,
  ): Promise<EmissionResult> {
    return this.emit('advisor', name, intentId, tenant, values, intendedConsumer);
  }

  /** Emit every signal triggered by a unit's completion, honouring each trigger condition. */
  async emitForExecutionUnit(
    unitName: string,
    intentId: string,
    tenant: TenantContext,
    executionResult: JsonObject,
    success: boolean,
  ): Promise<EmissionResult[]> {
    const results: EmissionResult[] = [];
    for (const signal of this.registry.getSignalsForExecutionUnit(unitName)) {
      const condition = signal.emissionTrigger.condition;
      if (condition === 'on_success' && !success) continue;
      if (condition === 'on_failure' && success) continue;

      switch (signal.signalType) {
        case 'metric':
          results.push(await this.emitMetric(signal.name, intentId, tenant, executionResult));
          break;
        case 'outcome':
          results.push(await this.emitOutcome(signal.name, intentId, tenant, executionResult));
          break;
        case 'advisor': {
          const consumer = signal.intendedConsumers[0]?.consumer ?? 'unknown';
          results.push(await this.emitAdvisor(signal.name, intentId, tenant, executionResult, consumer));
          break;
        }
      }
    }
    return results;
  }

  getEmissions(): EmissionResult[] {
    return [...this.emissions];
  }

  /** Totals since construction or the last `clearEmissions()`, including entries no longer retained. */
  getEmissionCount(): EmissionCount {
    return { ...this.counts };
  }

  clearEmissions(): void {
    this.emissions = [];
    this.counts = emptyCount();
  }

  private async emit(
    signalType: SignalType,
    name: string,
    intentId: string,
    tenant: TenantContext,
    values: JsonObject,
    intendedConsumer: string | null,
  ): Promise<EmissionResult> {
    const timestamp = new Date().toISOString();
    const definition = this.registry.getSignal(name);
    if (!definition || definition.signalType !== signalType) {
      // Unknown signals are reported to the caller but never recorded
      return { signalName: name, signalType, success: false, emissionId: randomUUID(), timestamp, error: `Unknown ${signalType}: ${name}` };
    }

    const payload: JsonObject = { intentId, domain: FABRIC_DOMAIN, ...values };
    const base = { signalName: name, signalType, emissionId: randomUUID(), timestamp };

    const check = validateAgainst(definition.schema, payload);
    if (!check.ok) {
      return this.record({ ...base, success: false, error: `Payload rejected: ${check.error}` });
    }

    const spine = this.spine;
    if (!spine) {
      return this.record({ ...base, success: true, error: null });
    }

    try {
      const delivered = await this.breaker.execute(() => {
        switch (signalType) {
          case 'metric':
            return spine.emitMetric(name, payload, tenant, timestamp);
          case 'outcome':
            return spine.emitOutcome(name, payload, tenant, timestamp);
          case 'advisor':
            return spine.emitAdvisor(name, payload, tenant, intendedConsumer ?? 'unknown', timestamp);
        }
      });
      return this.record({ ...base, success: delivered, error: null });
    } catch (err) {
      this.log.warn('Signal emission failed', { signal: name, error: errorMessage(err) });
      return this.record({ ...base, success: false, error: errorMessage(err) });
    }
  }

  private record(result: EmissionResult): EmissionResult {
    this.emissions.push(result);
    if (this.emissions.length > this.maxEntries) this.emissions.shift();

    this.counts.total += 1;
    if (result.success) this.counts.successful += 1;
    else this.counts.failed += 1;
    switch (result.signalType) {
      case 'metric':
        this.counts.metrics += 1;
        break;
      case 'outcome':
        this.counts.outcomes += 1;
        break;
      case 'advisor':
        this.counts.advisors += 1;
        break;
    }

    this.metrics.counter('fabric_signals_emitted_total', {
      type: result.signalType,
      outcome: result.success ? 'success' : 'failure',
    });
    return result;
  }
}
