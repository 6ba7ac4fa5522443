/**
 * Ports: the services execution units call.
 *
 * Implementations signal expected failures by throwing PortFailure; the unit
 * that made the call decides which error code the caller sees.
 */

import type {
  AssetType,
  ConsistencyMode,
  DataFormat,
  JoinType,
  JsonObject,
  JsonValue,
  LocalityType,
  Result,
  StoreType,
  TenantContext,
  ValidationMode,
  WriteMode,
} from '../core/types.js';
import type { ColumnStatistics, MergeConflict, QualityViolation, SchemaDiscrepancy } from './types.js';

// ── Catalog ──

export interface AssetCardRequest {
  assetId: string;
  assetType: AssetType;
  name: string;
  version: string;
  metadata: JsonObject;
}

export interface AssetRecord {
  assetId: string;
  assetType: AssetType;
  name: string;
  version: string;
  cardRef: string;
  metadata: JsonObject;
  storageLocations: string[];
  organizationId: string;
  workspaceId: string;
  registeredAt: string;
}

export interface AssetCatalog {
  /** Create a catalog card; resolves to the card reference. */
  createCard(tenant: TenantContext, card: AssetCardRequest): Promise<string>;
  /** Look up by asset id or card reference. */
  getAsset(assetRef: string, tenant: TenantContext): Promise<AssetRecord | null>;
}

// ── Connections & Sources ──

export interface CredentialResolver {
  resolve(credentialRef: string, tenant: TenantContext): Promise<Record<string, string>>;
}

export interface ConnectionTestReport {
  success: boolean;
  latencyMs: number;
  error: string | null;
}

export interface ConnectionDriver {
  testConnection(
    connectionConfig: Record<string, string>,
    credentials: Record<string, string>,
    timeoutSeconds: number,
    tenant: TenantContext,
  ): Promise<ConnectionTestReport>;
}

export interface RawField {
  name: string;
  type: string;
  nullable?: boolean;
}

export interface RawSchema {
  fields: RawField[];
  keys: string[];
  rowCount: number;
  samples: Record<string, JsonValue[]>;
}

export interface SchemaReader {
  readSchema(connectionRef: string, sourcePath: string, sampleSize: number, tenant: TenantContext): Promise<RawSchema>;
}

export interface SourceBatch {
  data: Uint8Array;
  rowCount: number;
  watermark: string | null;
}

export interface SourceReader {
  readData(
    connectionRef: string,
    queryOrPath: string,
    offset: number,
    limit: number,
    tenant: TenantContext,
  ): Promise<SourceBatch>;
}

// ── Staging & Datasets ──

export interface StagedData {
  data: Uint8Array;
  format: DataFormat;
}

export interface StagingArea {
  read(stagingRef: string, tenant: TenantContext): Promise<StagedData>;
  /** Resolves to the number of bytes written. */
  write(stagingRef: string, data: Uint8Array, format: DataFormat, tenant: TenantContext): Promise<number>;
}

export interface DatasetWriteReceipt {
  bytesWritten: number;
  rowsWritten: number;
  location: string;
}

export interface DatasetState {
  content: Uint8Array;
  changeset: Record<string, number>;
}

export interface DatasetStore {
  read(datasetRef: string, tenant: TenantContext): Promise<Uint8Array>;
  write(
    datasetRef: string,
    data: Uint8Array,
    mode: WriteMode,
    partitionSpec: JsonObject | null,
    tenant: TenantContext,
  ): Promise<DatasetWriteReceipt>;
  /** Current content plus a change summary relative to `parentCommitRef`. */
  readState(datasetRef: string, parentCommitRef: string | null, tenant: TenantContext): Promise<DatasetState>;
}

// ── Engines ──

export interface TransformOutput {
  data: Uint8Array;
  rowsIn: number;
  rowsOut: number;
}

export interface TransformEngine {
  apply(input: Uint8Array, definition: JsonObject, parameters: JsonObject): Promise<TransformOutput>;
}

export interface JoinOutput {
  data: Uint8Array;
  rowsOutput: number;
  matchedCount: number;
  unmatchedLeft: number;
  unmatchedRight: number;
}

export interface JoinEngine {
  join(left: Uint8Array, right: Uint8Array, keys: string[], joinType: JoinType): Promise<JoinOutput>;
}

export interface AggregationOutput {
  data: Uint8Array;
  groupCount: number;
}

export interface AggregationEngine {
  aggregate(input: Uint8Array, groupBy: string[], aggregations: Record<string, string>): Promise<AggregationOutput>;
}

export interface FeatureSpec {
  name: string;
  column: string;
  aggregation: string;
}

export interface FeatureDefinition {
  name: string;
  timestampColumn: string;
  features: FeatureSpec[];
}

export interface FeatureDefinitionResolver {
  resolve(definitionRef: string, tenant: TenantContext): Promise<FeatureDefinition>;
}

export interface FeatureOutput {
  data: Uint8Array;
  entityCount: number;
  featureCount: number;
}

export interface FeatureEngine {
  compute(
    source: Uint8Array,
    definition: FeatureDefinition,
    entityKeyColumns: string[],
    window: { start: string; end: string },
  ): Promise<FeatureOutput>;
}

export interface RawFeatureValue {
  entityKey: JsonObject;
  featureName: string;
  value: JsonValue;
  isMissing?: boolean;
  stalenessSeconds?: number;
}

export interface FeatureStoreReceipt {
  entitiesWritten: number;
  storeLocation: string;
}

export interface FeatureStore {
  write(
    featureSetRef: string,
    data: Uint8Array,
    storeType: StoreType,
    ttlSeconds: number,
    tenant: TenantContext,
  ): Promise<FeatureStoreReceipt>;
  read(
    featureSetRef: string,
    entityKeys: JsonObject[],
    featureNames: string[],
    pointInTime: string | null,
    storeType: StoreType,
    tenant: TenantContext,
  ): Promise<RawFeatureValue[]>;
}

export interface RawProfile {
  columnStats: ColumnStatistics[];
  qualityScores: Record<string, number>;
  patterns: string[];
  lowConfidence: boolean;
}

export interface ProfileEngine {
  profile(data: Uint8Array, sampleSize: number, depth: string): Promise<RawProfile>;
}

export interface ExpectedField {
  name: string;
  type: string;
  nullable?: boolean;
}

export interface ExpectedSchema {
  fields: ExpectedField[];
}

export interface SchemaResolver {
  resolve(schemaRef: string, tenant: TenantContext): Promise<ExpectedSchema>;
}

export interface SchemaCheck {
  valid: boolean;
  discrepancies: SchemaDiscrepancy[];
}

export interface ValidationEngine {
  validate(data: Uint8Array, schema: ExpectedSchema, mode: ValidationMode): Promise<SchemaCheck>;
}

export interface QualityRule {
  name: string;
  metric: string;
  column?: string;
}

export interface QualityRulesResolver {
  resolve(rulesRef: string, tenant: TenantContext): Promise<QualityRule[]>;
}

export interface QualityEvaluation {
  passed: boolean;
  metricValues: Record<string, number>;
  violations: QualityViolation[];
}

export interface QualityEngine {
  evaluate(data: Uint8Array, rules: QualityRule[], thresholds: Record<string, number>): Promise<QualityEvaluation>;
}

// ── Versioning ──

export interface CommitRecord {
  commitId: string;
  datasetRef: string;
  parentCommitRef: string | null;
  contentHash: string;
  changeset: Record<string, number>;
  message: string;
  authorRef: string;
  committedAt: string;
}

export interface NewCommit {
  datasetRef: string;
  parentCommitRef: string | null;
  content: Uint8Array;
  contentHash: string;
  changeset: Record<string, number>;
  message: string;
  authorRef: string;
}

export interface CommitStore {
  get(commitRef: string, tenant: TenantContext): Promise<CommitRecord | null>;
  /** Resolves to the new commit id. */
  create(commit: NewCommit, tenant: TenantContext): Promise<string>;
  getContent(commitRef: string, tenant: TenantContext): Promise<Uint8Array>;
}

export interface BranchRegistry {
  exists(datasetRef: string, branchName: string, tenant: TenantContext): Promise<boolean>;
  /** Resolves to the new branch id. */
  create(datasetRef: string, branchName: string, headCommitRef: string, tenant: TenantContext): Promise<string>;
}

export interface MergeOutput {
  success: boolean;
  conflicts: MergeConflict[];
  merged: JsonObject | null;
}

export interface MergeEngine {
  merge(source: Uint8Array, target: Uint8Array, ancestor: Uint8Array): Promise<MergeOutput>;
}

// ── Replication & Locality ──

export interface LocationStorage {
  read(locationRef: string, tenant: TenantContext): Promise<Uint8Array>;
  /** Resolves to the target's confirmation token. */
  write(locationRef: string, data: Uint8Array, consistency: ConsistencyMode, tenant: TenantContext): Promise<string>;
}

export interface EnvironmentDiscovery {
  getEnvironments(tenant: TenantContext): Promise<string[]>;
}

export interface RawLocalitySignal {
  environmentId: string;
  localityType: LocalityType;
  transferCost: number;
  confidence: number;
}

export interface LocalityProber {
  probe(storageLocations: string[], environments: string[]): Promise<RawLocalitySignal[]>;
}

// ── Labeling ──

export interface LabelSchemas {
  validateSchema(schemaRef: string, tenant: TenantContext): Promise<Result<void, string>>;
  validateLabel(labelValue: JsonValue, schemaRef: string, tenant: TenantContext): Promise<Result<void, string>>;
}

export interface SampleSelector {
  select(datasetRef: string, criteria: JsonObject, tenant: TenantContext): Promise<string[]>;
}

export interface LabelTaskRecord {
  taskId: string;
  datasetRef: string;
  schemaRef: string;
  sampleIds: string[];
  qualityRequirements: Record<string, number>;
  status: string;
  createdAt: string;
}

export interface NewLabelTask {
  datasetRef: string;
  schemaRef: string;
  sampleIds: string[];
  qualityRequirements: Record<string, number>;
}

export interface LabelTaskRegistry {
  create(task: NewLabelTask, tenant: TenantContext): Promise<string>;
  get(taskRef: string, tenant: TenantContext): Promise<LabelTaskRecord | null>;
}

export interface NewAnnotation {
  taskRef: string;
  sampleId: string;
  labelValue: JsonValue;
  annotatorRef: string;
}

export interface AnnotationStore {
  store(annotation: NewAnnotation, tenant: TenantContext): Promise<string>;
}

// ── Lineage ──

export interface NewLineageEdge {
  sourceAssetRef: string;
  targetAssetRef: string;
  relationshipType: string;
  executionRef: string;
}

export interface LineageStore {
  createEdge(edge: NewLineageEdge, tenant: TenantContext): Promise<string>;
}

// ── Aggregate ──

/** Every port a unit may depend on; each unit picks the subset it needs. */
export interface FabricPorts {
  catalog: AssetCatalog;
  credentials: CredentialResolver;
  connections: ConnectionDriver;
  schemaReader: SchemaReader;
  sources: SourceReader;
  staging: StagingArea;
  datasets: DatasetStore;
  transforms: TransformEngine;
  joins: JoinEngine;
  aggregations: AggregationEngine;
  featureDefinitions: FeatureDefinitionResolver;
  featureEngine: FeatureEngine;
  featureStore: FeatureStore;
  profiler: ProfileEngine;
  schemaRegistry: SchemaResolver;
  schemaValidation: ValidationEngine;
  qualityRules: QualityRulesResolver;
  quality: QualityEngine;
  commits: CommitStore;
  branches: BranchRegistry;
  merges: MergeEngine;
  locations: LocationStorage;
  environments: EnvironmentDiscovery;
  locality: LocalityProber;
  labelSchemas: LabelSchemas;
  samples: SampleSelector;
  labelTasks: LabelTaskRegistry;
  annotations: AnnotationStore;
  lineage: LineageStore;
}
