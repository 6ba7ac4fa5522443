import { describe, it, expect, beforeEach } from 'vitest';
import { utf8ToBytes } from '@noble/hashes/utils.js';
import { PortFailure } from '../src/core/errors.js';
import { createLocalFabric, type LocalFabric } from '../src/local/fabric.js';
import { UNIT_NAMES } from '../src/units/types.js';
import { UNIT_RUNNERS, getUnit } from '../src/units/index.js';
import { dataAssetRegistrar } from '../src/units/data-asset-registrar.js';
import { localitySignalGenerator } from '../src/units/locality-signal-generator.js';
import { labelTaskCreator } from '../src/units/label-task-creator.js';
import { labelRecorder } from '../src/units/label-recorder.js';
import { lineageEdgeWriter } from '../src/units/lineage-edge-writer.js';
import { REQUIRED_TAGS, TENANT, expectFail, expectOk } from './helpers.js';

let fabric: LocalFabric;

beforeEach(() => {
  fabric = createLocalFabric({ environments: ['env-eu', 'env-us'] });
});

async function register(name: string, storageLocationRef: string): Promise<string> {
  const { value } = expectOk(
    await dataAssetRegistrar.execute(
      {
        assetType: 'dataset',
        name,
        version: '1.0.0',
        schemaDeclaration: {},
        storageLocationRef,
        classification: 'internal',
        dataFormat: 'json',
        ownerRef: 'team-ml',
        tags: REQUIRED_TAGS,
      },
      TENANT,
      fabric.ports,
    ),
  );
  return value.cardRef;
}

describe('unit registry', () => {
  it('has a runner for every unit name', () => {
    for (const name of UNIT_NAMES) {
      expect(getUnit(name).name).toBe(name);
    }
    expect(Object.keys(UNIT_RUNNERS)).toHaveLength(UNIT_NAMES.length);
  });
});

describe('LocalitySignalGenerator', () => {
  it('reports local and remote environments', async () => {
    fabric.registerLocation(TENANT, 'loc-eu', utf8ToBytes('[]'), 'env-eu');
    const assetRef = await register('clicks', 'loc-eu');

    const { value, flags } = expectOk(await localitySignalGenerator.invoke({ assetRef }, TENANT, fabric.ports));
    expect(value.signals).toEqual([
      { environmentId: 'env-eu', localityType: 'local', transferCostEstimate: 0, confidence: 1 },
      { environmentId: 'env-us', localityType: 'remote', transferCostEstimate: 1, confidence: 0.9 },
    ]);
    expect(flags.staleSignals).toBe(false);
  });

  it('flags low-confidence signals as stale', async () => {
    const assetRef = await register('clicks', 'loc-unknown');
    const { value, flags } = expectOk(await localitySignalGenerator.invoke({ assetRef }, TENANT, fabric.ports));
    expect(value.signals.map((s) => s.confidence)).toEqual([0.4, 0.4]);
    expect(flags.staleSignals).toBe(true);
  });

  it('returns no signals for an asset without storage', async () => {
    const assetRef = await register('clicks', '');
    const { value, flags } = expectOk(await localitySignalGenerator.invoke({ assetRef }, TENANT, fabric.ports));
    expect(value.signals).toEqual([]);
    expect(flags.staleSignals).toBe(false);
  });

  it('returns a partial result when a location is unreachable', async () => {
    fabric.registerLocation(TENANT, 'loc-eu', utf8ToBytes('[]'), 'env-eu');
    fabric.markUnreachable('loc-eu');
    const assetRef = await register('clicks', 'loc-eu');

    const outcome = expectOk(await localitySignalGenerator.invoke({ assetRef }, TENANT, fabric.ports));
    expect(outcome.value.signals).toEqual([
      { environmentId: 'env-eu', localityType: 'unavailable', transferCostEstimate: -1, confidence: 0 },
    ]);
    expect(outcome.flags.staleSignals).toBe(true);
    expect(outcome.warning).toBe('Partial result: Location unreachable: loc-eu');
  });

  it('fails with stale signals when the locality lookup times out', async () => {
    fabric.registerLocation(TENANT, 'loc-eu', utf8ToBytes('[]'), 'env-eu');
    const assetRef = await register('clicks', 'loc-eu');
    const ports = {
      ...fabric.ports,
      locality: { probe: () => Promise.reject(new PortFailure('timeout', 'no answer from env-us')) },
    };

    const err = expectFail(await localitySignalGenerator.invoke({ assetRef }, TENANT, ports));
    expect(err.code).toBe('PROBE_TIMEOUT');
    expect(err.message).toBe('Locality probe timed out');
    expect(err.flags).toEqual({ staleSignals: true });
  });

  it('fails for an unknown asset', async () => {
    const err = expectFail(await localitySignalGenerator.invoke({ assetRef: 'catalog://nope' }, TENANT, fabric.ports));
    expect(err.code).toBe('ASSET_NOT_FOUND');
    expect(err.message).toBe('Asset not found: catalog://nope');
    expect(err.flags).toEqual({ staleSignals: false });
  });
});

describe('labeling', () => {
  let datasetRef: string;

  beforeEach(async () => {
    fabric.putDataset(TENANT, 'images', [
      { id: 'img-1', split: 'train' },
      { id: 'img-2', split: 'test' },
      { id: 'img-3', split: 'train' },
    ]);
    fabric.registerLabelSchema(TENANT, 'sentiment', {
      type: 'object',
      required: ['label'],
      properties: { label: { enum: ['pos', 'neg'] } },
    });
    datasetRef = await register('images', 'images');
  });

  async function createTask(): Promise<string> {
    const { value } = expectOk(
      await labelTaskCreator.invoke(
        { sourceDatasetRef: datasetRef, sampleCriteria: { split: 'train' }, labelSchemaRef: 'sentiment' },
        TENANT,
        fabric.ports,
      ),
    );
    return value.taskId;
  }

  it('creates a pending task over the selected samples', async () => {
    const { value } = expectOk(
      await labelTaskCreator.invoke(
        { sourceDatasetRef: datasetRef, sampleCriteria: { split: 'train' }, labelSchemaRef: 'sentiment' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.sampleCount).toBe(2);
    expect(value.status).toBe('pending');

    const task = await fabric.ports.labelTasks.get(value.taskId, TENANT);
    expect(task?.sampleIds).toEqual(['img-1', 'img-3']);
  });

  it('honors a sample limit', async () => {
    const { value } = expectOk(
      await labelTaskCreator.invoke(
        { sourceDatasetRef: datasetRef, sampleCriteria: { limit: 1 }, labelSchemaRef: 'sentiment' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.sampleCount).toBe(1);
  });

  it('fails when nothing matches the criteria', async () => {
    const err = expectFail(
      await labelTaskCreator.invoke(
        { sourceDatasetRef: datasetRef, sampleCriteria: { split: 'validation' }, labelSchemaRef: 'sentiment' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err.code).toBe('EMPTY_SELECTION');
  });

  it('fails for an unknown dataset or schema', async () => {
    const dataset = expectFail(
      await labelTaskCreator.invoke({ sourceDatasetRef: 'catalog://nope', labelSchemaRef: 'sentiment' }, TENANT, fabric.ports),
    );
    expect(dataset.code).toBe('DATASET_NOT_FOUND');

    const schema = expectFail(
      await labelTaskCreator.invoke({ sourceDatasetRef: datasetRef, labelSchemaRef: 'nope' }, TENANT, fabric.ports),
    );
    expect(schema.code).toBe('SCHEMA_INVALID');
    expect(schema.message).toBe('Invalid label schema: Label schema not found: nope');
  });

  it('rejects a label schema that does not compile', async () => {
    fabric.registerLabelSchema(TENANT, 'broken', { type: 'nonsense' });
    const err = expectFail(
      await labelTaskCreator.invoke({ sourceDatasetRef: datasetRef, labelSchemaRef: 'broken' }, TENANT, fabric.ports),
    );
    expect(err.code).toBe('SCHEMA_INVALID');
  });

  it('records a valid label', async () => {
    const taskRef = await createTask();
    const { value } = expectOk(
      await labelRecorder.invoke(
        { taskRef, sampleId: 'img-1', labelValue: { label: 'pos' }, annotatorRef: 'annotator-7' },
        TENANT,
        fabric.ports,
      ),
    );

    const stored = fabric.annotations(TENANT, taskRef);
    expect(stored).toHaveLength(1);
    expect(stored[0]).toMatchObject({ annotationId: value.annotationId, sampleId: 'img-1', annotatorRef: 'annotator-7' });
  });

  it('rejects a label that violates the schema', async () => {
    const taskRef = await createTask();
    const err = expectFail(
      await labelRecorder.invoke(
        { taskRef, sampleId: 'img-1', labelValue: { label: 'meh' }, annotatorRef: 'annotator-7' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err.code).toBe('SCHEMA_VIOLATION');
    expect(err.message).toBe('Label violates schema: input/label must be equal to one of the allowed values');
  });

  it('rejects a sample outside the task', async () => {
    const taskRef = await createTask();
    const err = expectFail(
      await labelRecorder.invoke(
        { taskRef, sampleId: 'img-2', labelValue: { label: 'pos' }, annotatorRef: 'annotator-7' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err).toMatchObject({ code: 'SAMPLE_NOT_IN_TASK', message: 'Sample not in task: img-2' });
  });

  it('fails for an unknown task', async () => {
    const err = expectFail(
      await labelRecorder.invoke(
        { taskRef: 't-0', sampleId: 'img-1', labelValue: { label: 'pos' }, annotatorRef: 'annotator-7' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err).toMatchObject({ code: 'TASK_NOT_FOUND', message: 'Task not found: t-0' });
  });
});

describe('LineageEdgeWriter', () => {
  it('links two registered assets', async () => {
    const source = await register('raw_orders', 'raw');
    const target = await register('clean_orders', 'clean');

    const { value } = expectOk(
      await lineageEdgeWriter.invoke({ sourceAssetRef: source, targetAssetRef: target, executionRef: 'exec-1' }, TENANT, fabric.ports),
    );
    expect(fabric.lineageEdges(TENANT)).toEqual([
      {
        edgeId: value.edgeId,
        sourceAssetRef: source,
        targetAssetRef: target,
        relationshipType: 'derived_from',
        executionRef: 'exec-1',
        createdAt: expect.any(String),
      },
    ]);
  });

  it('fails when either end is unknown', async () => {
    const source = await register('raw_orders', 'raw');
    const missingTarget = expectFail(
      await lineageEdgeWriter.invoke(
        { sourceAssetRef: source, targetAssetRef: 'catalog://x', executionRef: 'exec-1' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(missingTarget).toMatchObject({ code: 'TARGET_NOT_FOUND', message: 'Target asset not found: catalog://x' });

    const missingSource = expectFail(
      await lineageEdgeWriter.invoke(
        { sourceAssetRef: 'catalog://x', targetAssetRef: source, executionRef: 'exec-1' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(missingSource.code).toBe('SOURCE_NOT_FOUND');
  });
});
