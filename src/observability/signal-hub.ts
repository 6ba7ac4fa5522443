/**
 * In-process observability spine: fans feedback signals and trace events out
 * to subscribers.
 */

import { randomUUID } from 'node:crypto';
import { errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { JsonObject, TenantContext } from '../core/types.js';
import { FABRIC_DOMAIN, normalizeDomain } from '../core/types.js';
import type { ObservabilitySpine } from './signal-emitter.js';
import type { SignalType } from './signal-registry.js';

export type TraceEventType = 'intent_received' | 'execution_started' | 'execution_completed';
export type HubEventKind = SignalType | 'trace';

export const HUB_EVENT_KINDS: readonly HubEventKind[] = ['metric', 'outcome', 'advisor', 'trace'];

export interface HubEvent {
  eventId: string;
  kind: HubEventKind;
  /** Signal name, or the trace event type */
  name: string;
  domain: string;
  tenant: TenantContext;
  payload: JsonObject;
  intendedConsumer: string | null;
  timestamp: string;
}

export interface SignalFilter {
  domain?: string;
  signalTypes?: HubEventKind[];
  tenantFilter?: { organizationId?: string; workspaceId?: string };
}

export type HubListener = (event: HubEvent) => void;

export function matchesFilter(event: HubEvent, filter: SignalFilter): boolean {
  if (filter.domain !== undefined && normalizeDomain(filter.domain) !== normalizeDomain(event.domain)) return false;
  if (filter.signalTypes && filter.signalTypes.length > 0 && !filter.signalTypes.includes(event.kind)) return false;
  const tenant = filter.tenantFilter;
  if (tenant?.organizationId !== undefined && tenant.organizationId !== event.tenant.organizationId) return false;
  if (tenant?.workspaceId !== undefined && tenant.workspaceId !== event.tenant.workspaceId) return false;
  return true;
}

interface Subscription {
  filter: SignalFilter;
  listener: HubListener;
}

export class SignalHub implements ObservabilitySpine {
  private subscriptions = new Map<number, Subscription>();
  private nextId = 1;
  private recent: HubEvent[] = [];
  private log: Logger;

  constructor(
    private historySize = 200,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('signal-hub');
  }

  /** Returns an unsubscribe function. */
  subscribe(filter: SignalFilter, listener: HubListener): () => void {
    const id = this.nextId++;
    this.subscriptions.set(id, { filter, listener });
    return () => {
      this.subscriptions.delete(id);
    };
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  publish(event: Omit<HubEvent, 'eventId' | 'timestamp'> & { timestamp?: string }): HubEvent {
    const full: HubEvent = { ...event, eventId: randomUUID(), timestamp: event.timestamp ?? new Date().toISOString() };
    this.recent.push(full);
    if (this.recent.length > this.historySize) this.recent.shift();

    for (const { filter, listener } of this.subscriptions.values()) {
      if (!matchesFilter(full, filter)) continue;
      try {
        listener(full);
      } catch (err) {
        this.log.warn('Signal subscriber threw', { eventId: full.eventId, error: errorMessage(err) });
      }
    }
    return full;
  }

  publishTrace(type: TraceEventType, tenant: TenantContext, payload: JsonObject): HubEvent {
    return this.publish({ kind: 'trace', name: type, domain: FABRIC_DOMAIN, tenant, payload, intendedConsumer: null });
  }

  /** Recent events matching the filter, oldest first. */
  history(filter: SignalFilter = {}, limit = this.historySize): HubEvent[] {
    return this.recent.filter((e) => matchesFilter(e, filter)).slice(-limit);
  }

  // ── ObservabilitySpine ──

  async emitMetric(name: string, value: JsonObject, tenant: TenantContext, timestamp: string): Promise<boolean> {
    this.publish({ kind: 'metric', name, domain: domainOf(value), tenant, payload: value, intendedConsumer: null, timestamp });
    return true;
  }

  async emitOutcome(name: string, value: JsonObject, tenant: TenantContext, timestamp: string): Promise<boolean> {
    this.publish({ kind: 'outcome', name, domain: domainOf(value), tenant, payload: value, intendedConsumer: null, timestamp });
    return true;
  }

  async emitAdvisor(
    name: string,
    value: JsonObject,
    tenant: TenantContext,
    intendedConsumer: string,
    timestamp: string,
  ): Promise<boolean> {
    this.publish({ kind: 'advisor', name, domain: domainOf(value), tenant, payload: value, intendedConsumer, timestamp });
    return true;
  }
}

function domainOf(payload: JsonObject): string {
  const domain = payload['domain'];
  return typeof domain === 'string' ? domain : FABRIC_DOMAIN;
}
