/**
 * Conversions between internal records and their snake_case wire form.
 */

import type { TenantContext } from '../core/types.js';
import { compileSchema, nonEmptyString, validate } from '../core/validation.js';
import type { Result } from '../core/types.js';
import type { Execution } from '../mcop/execution.js';
import type { RegisteredCapability } from '../mcop/capability-registry.js';
import type { IntentRequest } from '../mcop/intent-gateway.js';
import type { HubEvent } from '../observability/signal-hub.js';
import type { DriftEvent } from '../policies/drift-control.js';
import type {
  CapabilityWire,
  DriftEventWire,
  ExecutionWire,
  IntentAcceptedWire,
  IntentEnvelope,
  SignalEventWire,
  WireTenantContext,
} from './types.js';

export function tenantToWire(tenant: TenantContext): WireTenantContext {
  return {
    organization_id: tenant.organizationId,
    workspace_id: tenant.workspaceId,
    user_id: tenant.userId,
  };
}

export function tenantFromWire(tenant: WireTenantContext): TenantContext {
  return {
    organizationId: tenant.organization_id,
    workspaceId: tenant.workspace_id,
    userId: tenant.user_id,
  };
}

// ── Intent Envelope ──

const wireTenantSchema = {
  type: 'object',
  required: ['organization_id', 'workspace_id', 'user_id'],
  properties: {
    organization_id: nonEmptyString,
    workspace_id: nonEmptyString,
    user_id: nonEmptyString,
  },
} as const;

const checkEnvelope = compileSchema<IntentEnvelope>({
  type: 'object',
  required: ['domain', 'intent', 'tenant_context'],
  properties: {
    domain: nonEmptyString,
    intent: nonEmptyString,
    inputs: { type: 'object', default: {} },
    tenant_context: wireTenantSchema,
    trace_id: nonEmptyString,
  },
});

export function parseIntentEnvelope(body: unknown): Result<IntentRequest, string> {
  const parsed = validate(checkEnvelope, body);
  if (!parsed.ok) return parsed;
  const envelope = parsed.value;
  const request: IntentRequest = {
    domain: envelope.domain,
    intent: envelope.intent,
    inputs: envelope.inputs,
    tenant: tenantFromWire(envelope.tenant_context),
  };
  if (envelope.trace_id !== undefined) request.traceId = envelope.trace_id;
  return { ok: true, value: request };
}

// ── Outbound ──

export function executionToWire(execution: Execution): ExecutionWire {
  return {
    execution_id: execution.executionId,
    intent_id: execution.intentId,
    intent: execution.intent,
    domain: execution.domain,
    trace_id: execution.traceId,
    tenant_context: tenantToWire(execution.tenant),
    status: execution.status,
    steps: execution.steps.map((s) => ({
      index: s.index,
      unit: s.unit,
      status: s.status,
      started_at: s.startedAt,
      completed_at: s.completedAt,
      duration_ms: s.durationMs,
      result: s.result,
      error: s.error ? { code: s.error.code, envelope_code: s.error.envelopeCode, message: s.error.message } : null,
      flags: s.flags,
      warning: s.warning,
    })),
    error: execution.error,
    created_at: execution.createdAt,
    updated_at: execution.updatedAt,
    completed_at: execution.completedAt,
  };
}

export function capabilityToWire(card: RegisteredCapability): CapabilityWire {
  return {
    card_id: card.cardId,
    name: card.name,
    version: card.version,
    domain: card.domain,
    capability: { type: card.capabilityType, tags: card.tags, description: card.description },
    input_contract: card.inputContract,
    output_contract: card.outputContract,
    consumer_intents: card.consumerIntents,
    metadata: card.metadata,
  };
}

export function signalToWire(event: HubEvent): SignalEventWire {
  return {
    event_id: event.eventId,
    signal_type: event.kind,
    name: event.name,
    domain: event.domain,
    tenant_context: tenantToWire(event.tenant),
    payload: event.payload,
    intended_consumer: event.intendedConsumer,
    timestamp: event.timestamp,
  };
}

export function driftEventToWire(event: DriftEvent): DriftEventWire {
  return {
    event_id: event.eventId,
    drift_type: event.driftType,
    severity: event.severity,
    asset_id: event.assetId,
    asset_name: event.assetName,
    namespace: event.namespace,
    description: event.driftDescription,
    previous_state: event.previousState,
    current_state: event.currentState,
    detected_at: event.detectedAt,
    status: event.status,
  };
}

// ── Inbound (client side) ──

export const checkIntentAccepted = compileSchema<IntentAcceptedWire>({
  type: 'object',
  required: ['intent_id', 'status', 'execution_id', 'trace_id'],
  properties: {
    intent_id: { type: 'string' },
    status: { enum: ['accepted', 'running', 'succeeded', 'failed'] },
    execution_id: { type: 'string' },
    trace_id: { type: 'string' },
  },
});

export const checkExecutionWire = compileSchema<ExecutionWire>({
  type: 'object',
  required: ['execution_id', 'intent_id', 'status', 'steps', 'tenant_context'],
  properties: {
    execution_id: { type: 'string' },
    intent_id: { type: 'string' },
    status: { enum: ['accepted', 'running', 'succeeded', 'failed'] },
    steps: { type: 'array', items: { type: 'object', required: ['unit', 'status'] } },
    tenant_context: wireTenantSchema,
  },
});

export const checkCapabilities = compileSchema<{ capabilities: CapabilityWire[] }>({
  type: 'object',
  required: ['capabilities'],
  properties: {
    capabilities: {
      type: 'array',
      items: { type: 'object', required: ['card_id', 'name', 'version', 'domain', 'capability'] },
    },
  },
});

export const checkSignalEvent = compileSchema<SignalEventWire>({
  type: 'object',
  required: ['event_id', 'signal_type', 'name', 'domain', 'tenant_context', 'payload', 'timestamp'],
  properties: {
    signal_type: { enum: ['metric', 'outcome', 'advisor', 'trace'] },
    payload: { type: 'object' },
  },
});

export const checkErrorEnvelope = compileSchema<{ error: { code: string; message: string; details?: Record<string, unknown> } }>({
  type: 'object',
  required: ['error'],
  properties: {
    error: {
      type: 'object',
      required: ['code', 'message'],
      properties: { code: { type: 'string' }, message: { type: 'string' }, details: { type: 'object' } },
    },
  },
});
