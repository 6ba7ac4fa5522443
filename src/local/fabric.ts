/**
 * Local Fabric: every port backed by in-process maps and the row engine.
 *
 * Data is scoped by tenant (`org/workspace`), so one tenant never sees
 * another's staging objects, datasets, commits or tasks. Seeding helpers
 * (registerConnection, putDataset, stage, ...) set up sources and fixtures.
 */

import { randomUUID } from 'node:crypto';
import { PortFailure, errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import { canonicalEquals } from '../core/hashing.js';
import type { DataFormat, JsonObject, JsonValue, Result, StoreType, TenantContext, WriteMode } from '../core/types.js';
import type { SchemaObject } from '../core/validation.js';
import { compileSchema, validateAgainst } from '../core/validation.js';
import { CatalogNamespaceManager } from '../catalog/namespacing.js';
import type { NamespaceConfig } from '../catalog/namespacing.js';
import { createStandardTagSchema } from '../catalog/tagging.js';
import type { TagSchema } from '../catalog/tagging.js';
import { createStandardDriftDetector } from '../policies/drift-control.js';
import type { DriftDetector } from '../policies/drift-control.js';
import type {
  CommitRecord,
  ConnectionTestReport,
  DatasetState,
  DatasetWriteReceipt,
  ExpectedSchema,
  FabricPorts,
  FeatureDefinition,
  FeatureStoreReceipt,
  LabelTaskRecord,
  NewAnnotation,
  NewLineageEdge,
  QualityRule,
  RawFeatureValue,
  RawLocalitySignal,
  RawSchema,
  SourceBatch,
  StagedData,
} from '../units/ports.js';
import { LocalCatalog } from './catalog.js';
import { RowEngine } from './row-engine.js';
import type { RowEngineOptions } from './row-engine.js';
import { columnsOf, decodeRows, encodeRows, rowKey, typeOf } from './rows.js';
import type { Row } from './rows.js';

export interface LocalFabricOptions {
  namespaceConfig?: NamespaceConfig;
  /** null disables tag validation */
  tagSchema?: TagSchema | null;
  drift?: DriftDetector;
  engine?: Partial<RowEngineOptions>;
  /** Execution environments reported to locality probing */
  environments?: string[];
  /** Total staging bytes per tenant before writes fail with a quota error */
  stagingQuotaBytes?: number;
  now?: () => number;
  logger?: Logger;
}

export interface ConnectionSpec {
  latencyMs?: number;
  reachable?: boolean;
  /** When set, credentials must carry this value under `secret` */
  secret?: string;
}

export interface SourceSpec {
  rows: Row[];
  /** Column whose largest value becomes the extraction watermark */
  watermarkColumn?: string;
}

interface StoredFeatureRow {
  row: Row;
  writtenAt: number;
  expiresAt: number;
}

interface StoredAnnotation extends NewAnnotation {
  annotationId: string;
  recordedAt: string;
}

interface StoredEdge extends NewLineageEdge {
  edgeId: string;
  createdAt: string;
}

interface StoredCommit {
  record: CommitRecord;
  content: Uint8Array;
}

function scopeOf(tenant: TenantContext): string {
  return `${tenant.organizationId}/${tenant.workspaceId}`;
}

function scoped(tenant: TenantContext, ref: string): string {
  return `${scopeOf(tenant)}::${ref}`;
}

function requireFound<T>(value: T | undefined, what: string, ref: string): T {
  if (value === undefined) throw new PortFailure('not_found', `${what} not found: ${ref}`);
  return value;
}

/** Row-level change summary of `after` relative to `before`, matched by row key. */
export function summarizeChanges(before: Row[], after: Row[]): Record<string, number> {
  const previous = new Map(before.map((row, i) => [rowKey(row, i), row]));
  const current = new Map(after.map((row, i) => [rowKey(row, i), row]));
  let added = 0;
  let modified = 0;
  for (const [key, row] of current) {
    const old = previous.get(key);
    if (old === undefined) added += 1;
    else if (!canonicalEquals(old, row)) modified += 1;
  }
  const removed = [...previous.keys()].filter((key) => !current.has(key)).length;
  return { added, removed, modified };
}

export class LocalFabric {
  readonly engine: RowEngine;
  readonly namespaces: CatalogNamespaceManager;
  readonly drift: DriftDetector;
  readonly catalog: LocalCatalog;
  readonly ports: FabricPorts;

  private readonly now: () => number;
  private readonly log: Logger;
  private readonly environmentIds: string[];
  private readonly stagingQuotaBytes: number;

  private connections = new Map<string, ConnectionSpec>();
  private credentials = new Map<string, Record<string, string>>();
  private sources = new Map<string, SourceSpec>();
  private staging = new Map<string, StagedData>();
  private datasets = new Map<string, Uint8Array>();
  private featureDefinitions = new Map<string, FeatureDefinition>();
  private featureRows = new Map<string, StoredFeatureRow[]>();
  private expectedSchemas = new Map<string, ExpectedSchema>();
  private qualityRules = new Map<string, QualityRule[]>();
  private commits = new Map<string, StoredCommit>();
  private branches = new Map<string, string>();
  private locations = new Map<string, Uint8Array>();
  private locationHomes = new Map<string, string>();
  private unreachable = new Set<string>();
  private labelSchemas = new Map<string, SchemaObject>();
  private labelTasks = new Map<string, LabelTaskRecord>();
  private annotationLog = new Map<string, StoredAnnotation[]>();
  private lineageLog = new Map<string, StoredEdge[]>();
  private featureStoreAvailable = true;

  constructor(options: LocalFabricOptions = {}) {
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger('local-fabric');
    this.environmentIds = options.environments ?? ['env-local'];
    this.stagingQuotaBytes = options.stagingQuotaBytes ?? Number.POSITIVE_INFINITY;
    this.engine = new RowEngine(options.engine);
    this.namespaces = new CatalogNamespaceManager(options.namespaceConfig);
    this.drift = options.drift ?? createStandardDriftDetector();
    const tagSchema = options.tagSchema === undefined ? createStandardTagSchema() : options.tagSchema;
    this.catalog = new LocalCatalog(this.namespaces, tagSchema, this.drift, this.log.child({ component: 'catalog' }));
    this.ports = this.buildPorts();
  }

  // ── Seeding ──

  registerConnection(tenant: TenantContext, connectionRef: string, spec: ConnectionSpec = {}): void {
    this.connections.set(scoped(tenant, connectionRef), spec);
  }

  registerCredential(tenant: TenantContext, credentialRef: string, values: Record<string, string>): void {
    this.credentials.set(scoped(tenant, credentialRef), values);
  }

  registerSource(tenant: TenantContext, connectionRef: string, path: string, spec: SourceSpec): void {
    this.sources.set(scoped(tenant, `${connectionRef}|${path}`), spec);
  }

  stage(tenant: TenantContext, stagingRef: string, rows: Row[], format: DataFormat = 'json'): void {
    this.staging.set(scoped(tenant, stagingRef), { data: encodeRows(rows), format });
  }

  stagedRows(tenant: TenantContext, stagingRef: string): Row[] {
    const staged = requireFound(this.staging.get(scoped(tenant, stagingRef)), 'Staging object', stagingRef);
    return decodeRows(staged.data);
  }

  putDataset(tenant: TenantContext, datasetRef: string, rows: Row[]): void {
    this.datasets.set(scoped(tenant, datasetRef), encodeRows(rows));
  }

  /** Store raw bytes as a dataset, for exercising malformed content. */
  putDatasetBytes(tenant: TenantContext, datasetRef: string, data: Uint8Array): void {
    this.datasets.set(scoped(tenant, datasetRef), data);
  }

  datasetRows(tenant: TenantContext, datasetRef: string): Row[] {
    return decodeRows(requireFound(this.datasets.get(scoped(tenant, datasetRef)), 'Dataset', datasetRef));
  }

  registerFeatureDefinition(tenant: TenantContext, definitionRef: string, definition: FeatureDefinition): void {
    this.featureDefinitions.set(scoped(tenant, definitionRef), definition);
  }

  registerExpectedSchema(tenant: TenantContext, schemaRef: string, schema: ExpectedSchema): void {
    this.expectedSchemas.set(scoped(tenant, schemaRef), schema);
  }

  registerQualityRules(tenant: TenantContext, rulesRef: string, rules: QualityRule[]): void {
    this.qualityRules.set(scoped(tenant, rulesRef), rules);
  }

  registerLocation(tenant: TenantContext, locationRef: string, data: Uint8Array, homeEnvironment?: string): void {
    this.locations.set(scoped(tenant, locationRef), data);
    if (homeEnvironment !== undefined) this.locationHomes.set(locationRef, homeEnvironment);
  }

  locationBytes(tenant: TenantContext, locationRef: string): Uint8Array | undefined {
    return this.locations.get(scoped(tenant, locationRef));
  }

  markUnreachable(locationRef: string): void {
    this.unreachable.add(locationRef);
  }

  registerLabelSchema(tenant: TenantContext, schemaRef: string, schema: SchemaObject): void {
    this.labelSchemas.set(scoped(tenant, schemaRef), schema);
  }

  setFeatureStoreAvailable(available: boolean): void {
    this.featureStoreAvailable = available;
  }

  annotations(tenant: TenantContext, taskRef: string): StoredAnnotation[] {
    return [...(this.annotationLog.get(scoped(tenant, taskRef)) ?? [])];
  }

  lineageEdges(tenant: TenantContext): StoredEdge[] {
    return [...(this.lineageLog.get(scopeOf(tenant)) ?? [])];
  }

  commitRecord(tenant: TenantContext, commitRef: string): CommitRecord | null {
    return this.commits.get(scoped(tenant, commitRef))?.record ?? null;
  }

  // ── Ports ──

  private stagingBytes(tenant: TenantContext): number {
    const prefix = `${scopeOf(tenant)}::`;
    let total = 0;
    for (const [key, staged] of this.staging) {
      if (key.startsWith(prefix)) total += staged.data.length;
    }
    return total;
  }

  private buildPorts(): FabricPorts {
    const engine = this.engine;

    return {
      catalog: this.catalog,

      credentials: {
        resolve: async (credentialRef, tenant) =>
          requireFound(this.credentials.get(scoped(tenant, credentialRef)), 'Credential', credentialRef),
      },

      connections: {
        testConnection: async (config, credentials, timeoutSeconds, tenant): Promise<ConnectionTestReport> => {
          const ref = config['ref'] ?? '';
          const spec = this.connections.get(scoped(tenant, ref));
          if (!spec) return { success: false, latencyMs: 0, error: `Unknown connection: ${ref}` };
          if (spec.secret !== undefined && credentials['secret'] !== spec.secret) {
            throw new PortFailure('auth', 'credentials rejected');
          }
          if (spec.reachable === false) throw new PortFailure('network', `host for ${ref} is unreachable`);
          const latencyMs = spec.latencyMs ?? 5;
          if (latencyMs > timeoutSeconds * 1000) throw new PortFailure('timeout', `no response from ${ref}`);
          return { success: true, latencyMs, error: null };
        },
      },

      schemaReader: {
        readSchema: async (connectionRef, sourcePath, sampleSize, tenant): Promise<RawSchema> => {
          const rows = this.sourceFor(tenant, connectionRef, sourcePath).rows;
          const fields = columnsOf(rows).map((name) => {
            const types = rows.map((row) => typeOf(row[name]));
            const known = types.find((t) => t !== 'null') ?? 'null';
            return { name, type: known, nullable: types.includes('null') };
          });
          const ids = rows.map((row) => row['id']);
          const keys =
            rows.length > 0 && ids.every((id) => id !== undefined && id !== null) && new Set(ids).size === rows.length
              ? ['id']
              : [];
          const samples: Record<string, JsonValue[]> = {};
          for (const field of fields) {
            samples[field.name] = rows.slice(0, sampleSize).map((row) => row[field.name] ?? null);
          }
          return { fields, keys, rowCount: rows.length, samples };
        },
      },

      sources: {
        readData: async (connectionRef, queryOrPath, offset, limit, tenant): Promise<SourceBatch> => {
          const source = this.sourceFor(tenant, connectionRef, queryOrPath);
          const slice = source.rows.slice(offset, offset + limit);
          let watermark: string | null = null;
          const column = source.watermarkColumn;
          if (column !== undefined) {
            const marks = slice.map((row) => row[column]).filter((v): v is string | number => typeof v === 'string' || typeof v === 'number');
            const sorted = marks.map(String).sort();
            watermark = sorted[sorted.length - 1] ?? null;
          }
          return { data: encodeRows(slice), rowCount: slice.length, watermark };
        },
      },

      staging: {
        read: async (stagingRef, tenant) =>
          requireFound(this.staging.get(scoped(tenant, stagingRef)), 'Staging object', stagingRef),
        write: async (stagingRef, data, format, tenant) => {
          const existing = this.staging.get(scoped(tenant, stagingRef))?.data.length ?? 0;
          if (this.stagingBytes(tenant) - existing + data.length > this.stagingQuotaBytes) {
            throw new PortFailure('quota', `staging quota of ${this.stagingQuotaBytes} bytes exceeded`);
          }
          this.staging.set(scoped(tenant, stagingRef), { data, format });
          return data.length;
        },
      },

      datasets: {
        read: async (datasetRef, tenant) =>
          requireFound(this.datasets.get(scoped(tenant, datasetRef)), 'Dataset', datasetRef),
        write: async (datasetRef, data, mode, _partitionSpec, tenant) =>
          this.writeDataset(datasetRef, data, mode, tenant),
        readState: async (datasetRef, parentCommitRef, tenant): Promise<DatasetState> => {
          const content = requireFound(this.datasets.get(scoped(tenant, datasetRef)), 'Dataset', datasetRef);
          const parent = parentCommitRef === null ? undefined : this.commits.get(scoped(tenant, parentCommitRef));
          const before = parent ? decodeRows(parent.content) : [];
          return { content, changeset: summarizeChanges(before, decodeRows(content)) };
        },
      },

      transforms: engine,
      joins: engine,
      aggregations: engine,

      featureDefinitions: {
        resolve: async (definitionRef, tenant) =>
          requireFound(this.featureDefinitions.get(scoped(tenant, definitionRef)), 'Feature definition', definitionRef),
      },

      featureEngine: engine,

      featureStore: {
        write: async (featureSetRef, data, storeType, ttlSeconds, tenant): Promise<FeatureStoreReceipt> => {
          this.requireFeatureStore();
          const rows = decodeRows(data);
          const key = scoped(tenant, `${storeType}|${featureSetRef}`);
          const writtenAt = this.now();
          const stored = this.featureRows.get(key) ?? [];
          for (const row of rows) stored.push({ row, writtenAt, expiresAt: writtenAt + ttlSeconds * 1000 });
          this.featureRows.set(key, stored);
          return { entitiesWritten: rows.length, storeLocation: `${storeType}://${featureSetRef}` };
        },
        read: async (featureSetRef, entityKeys, featureNames, pointInTime, storeType, tenant) =>
          this.readFeatures(featureSetRef, entityKeys, featureNames, pointInTime, storeType, tenant),
      },

      profiler: engine,

      schemaRegistry: {
        resolve: async (schemaRef, tenant) =>
          requireFound(this.expectedSchemas.get(scoped(tenant, schemaRef)), 'Schema', schemaRef),
      },

      schemaValidation: engine,

      qualityRules: {
        resolve: async (rulesRef, tenant) =>
          requireFound(this.qualityRules.get(scoped(tenant, rulesRef)), 'Quality rules', rulesRef),
      },

      quality: engine,

      commits: {
        get: async (commitRef, tenant) => this.commits.get(scoped(tenant, commitRef))?.record ?? null,
        create: async (commit, tenant) => {
          const commitId = randomUUID();
          const record: CommitRecord = {
            commitId,
            datasetRef: commit.datasetRef,
            parentCommitRef: commit.parentCommitRef,
            contentHash: commit.contentHash,
            changeset: commit.changeset,
            message: commit.message,
            authorRef: commit.authorRef,
            committedAt: new Date(this.now()).toISOString(),
          };
          this.commits.set(scoped(tenant, commitId), { record, content: commit.content });
          return commitId;
        },
        getContent: async (commitRef, tenant) =>
          requireFound(this.commits.get(scoped(tenant, commitRef)), 'Commit', commitRef).content,
      },

      branches: {
        exists: async (datasetRef, branchName, tenant) => this.branches.has(scoped(tenant, `${datasetRef}|${branchName}`)),
        create: async (datasetRef, branchName, headCommitRef, tenant) => {
          const key = scoped(tenant, `${datasetRef}|${branchName}`);
          if (this.branches.has(key)) throw new PortFailure('conflict', `Branch already exists: ${branchName}`);
          const branchId = randomUUID();
          this.branches.set(key, headCommitRef);
          return branchId;
        },
      },

      merges: engine,

      locations: {
        read: async (locationRef, tenant) => {
          if (this.unreachable.has(locationRef)) throw new PortFailure('network', `${locationRef} is unreachable`);
          return requireFound(this.locations.get(scoped(tenant, locationRef)), 'Location', locationRef);
        },
        write: async (locationRef, data, consistency, tenant) => {
          if (this.unreachable.has(locationRef)) throw new PortFailure('network', `${locationRef} is unreachable`);
          this.locations.set(scoped(tenant, locationRef), Uint8Array.from(data));
          return `${consistency}:${locationRef}`;
        },
      },

      environments: {
        getEnvironments: async () => [...this.environmentIds],
      },

      locality: {
        probe: async (storageLocations, environments) => this.probeLocality(storageLocations, environments),
      },

      labelSchemas: {
        validateSchema: async (schemaRef, tenant) => this.checkLabelSchema(schemaRef, tenant),
        validateLabel: async (labelValue, schemaRef, tenant): Promise<Result<void, string>> => {
          const schema = this.labelSchemas.get(scoped(tenant, schemaRef));
          if (!schema) return { ok: false, error: `Label schema not found: ${schemaRef}` };
          return validateAgainst(schema, labelValue);
        },
      },

      samples: {
        select: async (datasetRef, criteria, tenant) => this.selectSamples(datasetRef, criteria, tenant),
      },

      labelTasks: {
        create: async (task, tenant) => {
          const taskId = randomUUID();
          this.labelTasks.set(scoped(tenant, taskId), {
            taskId,
            ...task,
            status: 'pending',
            createdAt: new Date(this.now()).toISOString(),
          });
          return taskId;
        },
        get: async (taskRef, tenant) => this.labelTasks.get(scoped(tenant, taskRef)) ?? null,
      },

      annotations: {
        store: async (annotation, tenant) => {
          const annotationId = randomUUID();
          const key = scoped(tenant, annotation.taskRef);
          const list = this.annotationLog.get(key) ?? [];
          list.push({ ...annotation, annotationId, recordedAt: new Date(this.now()).toISOString() });
          this.annotationLog.set(key, list);
          return annotationId;
        },
      },

      lineage: {
        createEdge: async (edge, tenant) => {
          const edgeId = randomUUID();
          const key = scopeOf(tenant);
          const list = this.lineageLog.get(key) ?? [];
          list.push({ ...edge, edgeId, createdAt: new Date(this.now()).toISOString() });
          this.lineageLog.set(key, list);
          return edgeId;
        },
      },
    };
  }

  private sourceFor(tenant: TenantContext, connectionRef: string, path: string): SourceSpec {
    const connection = this.connections.get(scoped(tenant, connectionRef));
    if (!connection) throw new PortFailure('unavailable', `Connection not registered: ${connectionRef}`);
    if (connection.reachable === false) throw new PortFailure('network', `${connectionRef} is unreachable`);
    return requireFound(this.sources.get(scoped(tenant, `${connectionRef}|${path}`)), 'Source', path);
  }

  private writeDataset(datasetRef: string, data: Uint8Array, mode: WriteMode, tenant: TenantContext): DatasetWriteReceipt {
    const incoming = decodeRows(data);
    const key = scoped(tenant, datasetRef);
    const existing = this.datasets.get(key);

    let rows = incoming;
    if (mode === 'append' && existing !== undefined) {
      const current = decodeRows(existing);
      const before = columnsOf(current);
      const after = columnsOf(incoming);
      if (current.length > 0 && incoming.length > 0 && !canonicalEquals([...before].sort(), [...after].sort())) {
        throw new PortFailure('schema_mismatch', `columns [${after.join(', ')}] do not match [${before.join(', ')}]`);
      }
      rows = [...current, ...incoming];
    }

    this.datasets.set(key, encodeRows(rows));
    return { bytesWritten: data.length, rowsWritten: incoming.length, location: `memory://${scopeOf(tenant)}/${datasetRef}` };
  }

  private requireFeatureStore(): void {
    if (!this.featureStoreAvailable) throw new PortFailure('unavailable', 'feature store offline');
  }

  private readFeatures(
    featureSetRef: string,
    entityKeys: JsonObject[],
    featureNames: string[],
    pointInTime: string | null,
    storeType: StoreType,
    tenant: TenantContext,
  ): RawFeatureValue[] {
    this.requireFeatureStore();
    const now = this.now();
    const asOf = pointInTime === null ? now : Date.parse(pointInTime);
    const stored = (this.featureRows.get(scoped(tenant, `${storeType}|${featureSetRef}`)) ?? []).filter(
      (entry) => entry.writtenAt <= asOf && entry.expiresAt > asOf,
    );

    const values: RawFeatureValue[] = [];
    for (const entityKey of entityKeys) {
      const matches = stored.filter((entry) =>
        Object.entries(entityKey).every(([column, value]) => canonicalEquals(entry.row[column] ?? null, value)),
      );
      const latest = matches.at(-1);
      for (const featureName of featureNames) {
        const value = latest?.row[featureName];
        if (latest === undefined || value === undefined) {
          values.push({ entityKey, featureName, value: null, isMissing: true });
        } else {
          values.push({
            entityKey,
            featureName,
            value,
            stalenessSeconds: Math.floor((asOf - latest.writtenAt) / 1000),
          });
        }
      }
    }
    return values;
  }

  private probeLocality(storageLocations: string[], environments: string[]): RawLocalitySignal[] {
    const blocked = storageLocations.find((location) => this.unreachable.has(location));
    if (blocked !== undefined) {
      throw new PortFailure('unreachable', `Location unreachable: ${blocked}`, this.locationHomes.get(blocked));
    }

    return environments.map((environmentId): RawLocalitySignal => {
      const homes = storageLocations.map((location) => this.locationHomes.get(location));
      if (homes.includes(environmentId)) {
        return { environmentId, localityType: 'local', transferCost: 0, confidence: 1 };
      }
      const known = homes.some((home) => home !== undefined);
      return { environmentId, localityType: 'remote', transferCost: 1, confidence: known ? 0.9 : 0.4 };
    });
  }

  private checkLabelSchema(schemaRef: string, tenant: TenantContext): Result<void, string> {
    const schema = this.labelSchemas.get(scoped(tenant, schemaRef));
    if (!schema) return { ok: false, error: `Label schema not found: ${schemaRef}` };
    try {
      compileSchema(schema);
      return { ok: true, value: undefined };
    } catch (err) {
      this.log.warn('Label schema does not compile', { schemaRef });
      return { ok: false, error: errorMessage(err) };
    }
  }

  private async selectSamples(datasetRef: string, criteria: JsonObject, tenant: TenantContext): Promise<string[]> {
    const asset = await this.catalog.getAsset(datasetRef, tenant);
    const location = asset?.storageLocations[0] ?? datasetRef;
    const data = this.datasets.get(scoped(tenant, location));
    if (data === undefined) return [];

    const { limit, ...filters } = criteria;
    const picked = decodeRows(data)
      .map((row, index) => ({ row, id: rowKey(row, index) }))
      .filter(({ row }) => Object.entries(filters).every(([column, value]) => canonicalEquals(row[column] ?? null, value)))
      .map(({ id }) => id);
    return typeof limit === 'number' ? picked.slice(0, limit) : picked;
  }
}

export function createLocalFabric(options: LocalFabricOptions = {}): LocalFabric {
  return new LocalFabric(options);
}
