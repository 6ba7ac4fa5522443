/**
 * Transport types: server configuration, SSE frames and the snake_case wire shapes.
 */

import type { ErrorCode, JsonObject, JsonValue, UnitFlags } from '../core/types.js';
import type { ExecutionStatus, StepStatus } from '../mcop/execution.js';
import type { HubEventKind } from '../observability/signal-hub.js';

export interface TransportConfig {
  port: number;
  host: string;
  /** Prefix for every route, e.g. `/api`; empty for none */
  basePath: string;
  /** First entry is sent as Access-Control-Allow-Origin; empty means `*` */
  corsOrigins: string[];
  maxSseSubscribers: number;
  maxBodyBytes: number;
}

export const DEFAULT_TRANSPORT_CONFIG: TransportConfig = {
  port: 8080,
  host: '127.0.0.1',
  basePath: '',
  corsOrigins: [],
  maxSseSubscribers: 100,
  maxBodyBytes: 1_048_576,
};

export interface SSEEvent {
  event: string;
  data: string;
  id?: string;
  retry?: number;
}

// ── Wire Shapes ──

export interface WireTenantContext {
  organization_id: string;
  workspace_id: string;
  user_id: string;
}

export interface IntentEnvelope {
  domain: string;
  intent: string;
  inputs: JsonObject;
  tenant_context: WireTenantContext;
  trace_id?: string;
}

export interface IntentAcceptedWire {
  intent_id: string;
  status: ExecutionStatus;
  execution_id: string;
  trace_id: string;
}

export interface StepWire {
  index: number;
  unit: string;
  status: StepStatus;
  started_at: string | null;
  completed_at: string | null;
  duration_ms: number | null;
  result: JsonValue;
  error: { code: string; envelope_code: ErrorCode; message: string } | null;
  flags: UnitFlags;
  warning: string | null;
}

export interface ExecutionWire {
  execution_id: string;
  intent_id: string;
  intent: string;
  domain: string;
  trace_id: string;
  tenant_context: WireTenantContext;
  status: ExecutionStatus;
  steps: StepWire[];
  error: { code: ErrorCode; message: string; details: JsonObject } | null;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
}

export interface CapabilityWire {
  card_id: string;
  name: string;
  version: string;
  domain: string;
  capability: { type: string; tags: string[]; description: string };
  input_contract: JsonObject;
  output_contract: JsonObject;
  consumer_intents: string[];
  metadata: JsonObject;
}

export interface CapabilitiesResponse {
  domain: string | null;
  count: number;
  capabilities: CapabilityWire[];
}

export interface SignalEventWire {
  event_id: string;
  signal_type: HubEventKind;
  name: string;
  domain: string;
  tenant_context: WireTenantContext;
  payload: JsonObject;
  intended_consumer: string | null;
  timestamp: string;
}

export interface DriftEventWire {
  event_id: string;
  drift_type: string;
  severity: string;
  asset_id: string;
  asset_name: string;
  namespace: string;
  description: string;
  previous_state: JsonObject;
  current_state: JsonObject;
  detected_at: string;
  status: string;
}
