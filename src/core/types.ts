/**
 * Data Fabric Core Types
 */

// ── Result Type ──

/** Result type for operations that can fail */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ── Domain ──

export const FABRIC_DOMAIN = 'data-fabric';

/** Accepts `data_fabric` as an alias of the canonical domain name. */
export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/_/g, '-');
}

// ── Enumerations ──

export type AssetType = 'dataset' | 'feature_set' | 'label_set';
export type DataFormat = 'parquet' | 'delta' | 'iceberg' | 'csv' | 'json' | 'avro';
export type DataClassification = 'public' | 'internal' | 'confidential' | 'restricted' | 'pii';
export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';
export type WriteMode = 'append' | 'overwrite';
export type JoinType = 'inner' | 'left' | 'right' | 'full';
export type StoreType = 'offline' | 'online';
export type ValidationMode = 'exact' | 'compatible' | 'subset';
export type ConsistencyMode = 'eventual' | 'strong';
export type MergeResult = 'success' | 'conflict';
export type GateResult = 'pass' | 'fail' | 'inconclusive';
export type LocalityType = 'local' | 'cached' | 'remote' | 'unavailable';

export const ASSET_TYPES: readonly AssetType[] = ['dataset', 'feature_set', 'label_set'];
export const DATA_FORMATS: readonly DataFormat[] = ['parquet', 'delta', 'iceberg', 'csv', 'json', 'avro'];
export const DATA_CLASSIFICATIONS: readonly DataClassification[] = ['public', 'internal', 'confidential', 'restricted', 'pii'];
export const WRITE_MODES: readonly WriteMode[] = ['append', 'overwrite'];
export const JOIN_TYPES: readonly JoinType[] = ['inner', 'left', 'right', 'full'];
export const STORE_TYPES: readonly StoreType[] = ['offline', 'online'];
export const VALIDATION_MODES: readonly ValidationMode[] = ['exact', 'compatible', 'subset'];
export const CONSISTENCY_MODES: readonly ConsistencyMode[] = ['eventual', 'strong'];

// ── Tenancy ──

export interface TenantContext {
  organizationId: string;
  workspaceId: string;
  userId: string;
}

// ── JSON Values ──

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return isRecord(value) && isJsonValue(value);
}

/** JSON round trip: drops undefined fields; anything that is not JSON becomes null. */
export function toJsonValue(value: unknown): JsonValue {
  const text = JSON.stringify(value);
  if (text === undefined) return null;
  const parsed: unknown = JSON.parse(text);
  return isJsonValue(parsed) ? parsed : null;
}

// ── Execution Unit Outcome ──

export interface UnitFlags {
  /** Output was cut to a size limit (schema fields) */
  truncated?: boolean;
  /** Profile computed over too few rows to trust */
  lowConfidence?: boolean;
  /** Result could not be decided; a retry may resolve it */
  inconclusive?: boolean;
  /** Locality signals may be out of date */
  staleSignals?: boolean;
}

/** Outcome of a single execution unit run */
export type UnitOutcome<T> =
  | { ok: true; value: T; flags: UnitFlags; warning?: string }
  | { ok: false; code: string; message: string; flags: UnitFlags; value?: T };

export function succeed<T>(value: T, flags: UnitFlags = {}, warning?: string): UnitOutcome<T> {
  return warning === undefined ? { ok: true, value, flags } : { ok: true, value, flags, warning };
}

export function fail<T>(code: string, message: string, flags: UnitFlags = {}): UnitOutcome<T> {
  return { ok: false, code, message, flags };
}

// ── Envelope Error Codes ──

export type ErrorCode =
  | 'DATA_NOT_FOUND'
  | 'ACCESS_DENIED'
  | 'VALIDATION_FAILED'
  | 'EXECUTION_FAILED'
  | 'TIMEOUT'
  | 'RATE_LIMITED';

export interface ErrorEnvelope {
  error: {
    code: ErrorCode;
    message: string;
    details: Record<string, unknown>;
  };
}
