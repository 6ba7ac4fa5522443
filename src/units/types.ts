/**
 * Execution unit contracts: unit names, inputs and results.
 */

import type {
  AssetType,
  ConsistencyMode,
  DataClassification,
  DataFormat,
  GateResult,
  HealthStatus,
  JoinType,
  JsonObject,
  JsonValue,
  LocalityType,
  MergeResult,
  StoreType,
  ValidationMode,
  WriteMode,
} from '../core/types.js';

export const UNIT_NAMES = [
  'DataAssetRegistrar',
  'ConnectionProbe',
  'SchemaIntrospector',
  'DataExtractor',
  'DataWriter',
  'TransformExecutor',
  'DataJoiner',
  'AggregationComputer',
  'FeatureComputer',
  'FeatureStoreWriter',
  'FeatureRetriever',
  'DataProfiler',
  'SchemaValidator',
  'DataCommitter',
  'BranchCreator',
  'MergeComputer',
  'DataReplicator',
  'LocalitySignalGenerator',
  'LabelTaskCreator',
  'LabelRecorder',
  'LineageEdgeWriter',
  'QualityGateEvaluator',
] as const;

export type UnitName = (typeof UNIT_NAMES)[number];

export function isUnitName(value: string): value is UnitName {
  return UNIT_NAMES.some((name) => name === value);
}

// ── Registration ──

export interface AssetDeclaration {
  assetType: AssetType;
  name: string;
  version: string;
  schemaDeclaration: JsonObject;
  storageLocationRef: string;
  classification: DataClassification;
  dataFormat: DataFormat;
  ownerRef: string;
  tags?: Record<string, string>;
}

export interface RegistrationResult {
  assetId: string;
  cardRef: string;
  registeredAt: string;
}

// ── Connections ──

export interface ConnectionProbeInput {
  connectionRef: string;
  credentialRef: string;
  timeoutSeconds: number;
  connectionConfig: Record<string, string>;
}

export interface ConnectionProbeResult {
  healthStatus: HealthStatus;
  latencyMs: number;
  errorDetails: string | null;
  probedAt: string;
}

export interface SchemaIntrospectionInput {
  connectionRef: string;
  sourcePath: string;
  sampleSize: number;
}

export interface FieldDefinition {
  name: string;
  dataType: string;
  nullable: boolean;
  isKey: boolean;
}

export interface SchemaIntrospectionResult {
  fields: FieldDefinition[];
  primaryKeys: string[];
  rowCountEstimate: number;
  sampleValues: Record<string, JsonValue[]>;
  introspectedAt: string;
}

// ── Ingestion ──

export interface DataExtractionInput {
  sourceConnectionRef: string;
  sourceQueryOrPath: string;
  extractionOffset: number;
  extractionLimit: number;
  outputFormat: DataFormat;
  targetStagingRef: string;
}

export interface DataExtractionResult {
  bytesExtracted: number;
  rowsExtracted: number;
  stagingRef: string;
  watermarkValue: string | null;
  extractedAt: string;
}

export interface DataWriteInput {
  stagingRef: string;
  targetDatasetRef: string;
  writeMode: WriteMode;
  partitionSpec?: JsonObject | null;
}

export interface DataWriteResult {
  bytesWritten: number;
  rowsWritten: number;
  targetLocation: string;
  writtenAt: string;
}

// ── Transformation ──

export interface TransformInput {
  inputDataRef: string;
  transformationDefinition: JsonObject;
  parameters: JsonObject;
  outputStagingRef: string;
}

export interface TransformResult {
  rowsProcessed: number;
  rowsOutput: number;
  outputStagingRef: string;
  transformationHash: string;
  transformedAt: string;
}

export interface JoinInput {
  leftInputRef: string;
  rightInputRef: string;
  joinKeys: string[];
  joinType: JoinType;
  outputStagingRef: string;
}

export interface JoinResult {
  rowsOutput: number;
  matchedCount: number;
  unmatchedLeft: number;
  unmatchedRight: number;
  outputStagingRef: string;
  joinedAt: string;
}

export interface AggregationInput {
  inputDataRef: string;
  groupByColumns: string[];
  aggregations: Record<string, string>;
  outputStagingRef: string;
}

export interface AggregationResult {
  groupsComputed: number;
  outputStagingRef: string;
  aggregatedAt: string;
}

// ── Features ──

export interface FeatureComputeInput {
  sourceDataRef: string;
  featureDefinitionRef: string;
  entityKeyColumns: string[];
  timeStart: string;
  timeEnd: string;
  outputStagingRef: string;
}

export interface FeatureComputeResult {
  entitiesComputed: number;
  featureValuesCount: number;
  outputStagingRef: string;
  computedAt: string;
}

export interface FeatureStoreWriteInput {
  stagingRef: string;
  featureSetRef: string;
  storeType: StoreType;
  ttlSeconds: number;
}

export interface FeatureStoreWriteResult {
  entitiesWritten: number;
  storeLocation: string;
  writtenAt: string;
}

export interface FeatureRetrieveInput {
  featureSetRef: string;
  entityKeys: JsonObject[];
  featureNames: string[];
  pointInTime?: string | null;
  storePreference: StoreType;
}

export interface FeatureValue {
  entityKey: JsonObject;
  featureName: string;
  value: JsonValue;
  isMissing: boolean;
  stalenessSeconds: number;
}

export interface FeatureRetrieveResult {
  values: FeatureValue[];
  retrievedAt: string;
}

// ── Quality ──

export interface ProfileInput {
  datasetRef: string;
  sampleSize: number;
  profilingDepth: string;
}

export interface ColumnStatistics {
  columnName: string;
  nullCount: number;
  distinctCount: number;
  minValue: JsonValue;
  maxValue: JsonValue;
  meanValue: number | null;
}

export interface ProfileResult {
  columnStats: ColumnStatistics[];
  qualityScores: Record<string, number>;
  detectedPatterns: string[];
  profiledAt: string;
}

export interface SchemaValidationInput {
  datasetRef: string;
  expectedSchemaRef: string;
  validationMode: ValidationMode;
}

export interface SchemaDiscrepancy {
  fieldName: string;
  expectedType: string;
  actualType: string;
  issue: string;
}

export interface SchemaValidationResult {
  isValid: boolean;
  discrepancies: SchemaDiscrepancy[];
  validatedAt: string;
}

export interface QualityGateInput {
  datasetRef: string;
  qualityRulesRef: string;
  thresholds: Record<string, number>;
}

export interface QualityViolation {
  ruleName: string;
  expected: number;
  actual: number;
}

export interface QualityGateResult {
  result: GateResult;
  metricValues: Record<string, number>;
  violations: QualityViolation[];
  evaluatedAt: string;
}

// ── Versioning ──

export interface CommitInput {
  datasetRef: string;
  parentCommitRef?: string | null;
  commitMessage: string;
  authorRef: string;
}

export interface CommitResult {
  commitId: string;
  contentHash: string;
  changesetSummary: Record<string, number>;
  committedAt: string;
}

export interface BranchInput {
  datasetRef: string;
  sourceCommitRef: string;
  branchName: string;
}

export interface BranchResult {
  branchId: string;
  headCommitRef: string;
  createdAt: string;
}

export interface MergeInput {
  sourceCommitRef: string;
  targetCommitRef: string;
  commonAncestorRef: string;
}

export interface MergeConflict {
  path: string;
  sourceValue: JsonValue;
  targetValue: JsonValue;
}

export interface MergeComputeResult {
  result: MergeResult;
  conflicts: MergeConflict[];
  mergedChangeset: JsonObject | null;
  computedAt: string;
}

// ── Locality ──

export interface ReplicationInput {
  sourceLocationRef: string;
  targetLocationRef: string;
  consistencyMode: ConsistencyMode;
}

export interface ReplicationResult {
  bytesReplicated: number;
  targetConfirmed: string;
  checksumMatch: boolean;
  replicatedAt: string;
}

export interface LocalityInput {
  assetRef: string;
}

export interface LocalitySignal {
  environmentId: string;
  localityType: LocalityType;
  transferCostEstimate: number;
  confidence: number;
}

export interface LocalityResult {
  signals: LocalitySignal[];
  signalFreshness: string;
}

// ── Labeling & Lineage ──

export interface LabelTaskInput {
  sourceDatasetRef: string;
  sampleCriteria: JsonObject;
  labelSchemaRef: string;
  qualityRequirements: Record<string, number>;
}

export interface LabelTaskResult {
  taskId: string;
  sampleCount: number;
  status: 'pending';
  createdAt: string;
}

export interface LabelRecordInput {
  taskRef: string;
  sampleId: string;
  labelValue: JsonValue;
  annotatorRef: string;
}

export interface LabelRecordResult {
  annotationId: string;
  recordedAt: string;
}

export interface LineageEdgeInput {
  sourceAssetRef: string;
  targetAssetRef: string;
  relationshipType: string;
  executionRef: string;
}

export interface LineageEdgeResult {
  edgeId: string;
  createdAt: string;
}
