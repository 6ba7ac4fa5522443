/**
 * Data Fabric: execution units, capability registry, intent gateway and
 * feedback signals behind an HTTP control-plane surface.
 *
 * @packageDocumentation
 */

// ── Core Types ──
export type {
  Result,
  TenantContext,
  JsonValue,
  JsonObject,
  UnitFlags,
  UnitOutcome,
  ErrorCode,
  ErrorEnvelope,
  AssetType,
  DataFormat,
  DataClassification,
  HealthStatus,
  WriteMode,
  JoinType,
  StoreType,
  ValidationMode,
  ConsistencyMode,
  MergeResult,
  GateResult,
  LocalityType,
} from './core/types.js';
export { FABRIC_DOMAIN, normalizeDomain, succeed, fail } from './core/types.js';

// ── Errors ──
export { FabricError, PortFailure, isPortFailure, envelopeCodeFor } from './core/errors.js';
export type { PortFailureKind } from './core/errors.js';

// ── Logging / Metrics / Config ──
export { createLogger, LogLevel, setGlobalLogLevel, setLogOutput, resetLogOutput } from './core/logger.js';
export type { Logger, LogEntry } from './core/logger.js';
export { MetricsCollector, globalMetrics } from './core/metrics.js';
export { CircuitBreaker, CircuitOpenError } from './core/circuit-breaker.js';
export { loadConfig } from './core/config.js';
export type { FabricConfig, StoreConfig } from './core/config.js';

// ── Execution Units ──
export { UNIT_RUNNERS, getUnit } from './units/index.js';
export { UNIT_NAMES, isUnitName } from './units/types.js';
export type { UnitName } from './units/types.js';
export type { UnitRunner, ExecutionUnit } from './units/unit.js';
export type { FabricPorts } from './units/ports.js';

// ── Catalog ──
export { CatalogNamespaceManager, createCatalogEntry, fullyQualifiedName, isolationScope, validateNamespace } from './catalog/namespacing.js';
export type { CatalogEntry, NamespaceConfig, IsolationMode } from './catalog/namespacing.js';
export { TagSchema, createStandardTagSchema, STANDARD_TAG_DEFINITIONS } from './catalog/tagging.js';
export type { TagDefinition, TagValidation } from './catalog/tagging.js';
export { DriftDetector, createDriftPolicy, createStandardDriftDetector, STANDARD_DRIFT_POLICIES } from './policies/drift-control.js';
export type { DriftEvent, DriftPolicy, DriftType, DriftSeverity } from './policies/drift-control.js';

// ── Local Adapters ──
export { LocalFabric, createLocalFabric } from './local/fabric.js';
export type { LocalFabricOptions, ConnectionSpec, SourceSpec } from './local/fabric.js';

// ── Control Plane ──
export { CapabilityRegistry } from './mcop/capability-registry.js';
export type { CapabilityFilter, RegisteredCapability, RegistryClient } from './mcop/capability-registry.js';
export { RegistryCardLoader, parseCard } from './mcop/registry-loader.js';
export type { RegistryCard } from './mcop/registry-loader.js';
export { DataFabricCapabilityProvider } from './mcop/capability-provider.js';
export type { CapabilityProfile, McopScheduler } from './mcop/capability-provider.js';
export { DataFabricIntentHandler, INTENT_DEFINITIONS, INTENT_NAMES } from './mcop/intent-handler.js';
export type { IntentName, IntentDefinition, IntentEngine, RateClass } from './mcop/intent-handler.js';
export { IntentGateway } from './mcop/intent-gateway.js';
export type { IntentRequest, IntentAccepted } from './mcop/intent-gateway.js';
export { CatalogAccessPolicy, IntentAuditLog, allowAllPolicy } from './mcop/access-policy.js';
export type { AccessPolicy, AccessDecision, AuditEntry } from './mcop/access-policy.js';
export type { Execution, ExecutionStore, ExecutionStatus, StepRecord } from './mcop/execution.js';

// ── Observability ──
export { FeedbackSignalRegistry } from './observability/signal-registry.js';
export type { SignalDefinition, SignalType } from './observability/signal-registry.js';
export { FeedbackSignalEmitter } from './observability/signal-emitter.js';
export type { ObservabilitySpine, EmissionResult } from './observability/signal-emitter.js';
export { SignalHub } from './observability/signal-hub.js';
export type { HubEvent, SignalFilter } from './observability/signal-hub.js';

// ── Storage ──
export { MemoryExecutionStore } from './storage/memory.js';
export { SqliteExecutionStore } from './storage/sqlite.js';

// ── Transport ──
export { FabricHttpServer } from './transport/http-server.js';
export { FabricHttpClient } from './transport/http-client.js';
export { TenantRateLimiter, RateLimiter } from './transport/rate-limiter.js';
export { SSEWriter, SSEReader } from './transport/sse.js';
export type { TransportConfig } from './transport/types.js';

// ── Runtime ──
export { createRuntime } from './runtime.js';
export type { FabricRuntime, RuntimeOptions } from './runtime.js';
