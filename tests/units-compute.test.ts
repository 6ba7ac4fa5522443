import { describe, it, expect, beforeEach } from 'vitest';
import { createLocalFabric, type LocalFabric } from '../src/local/fabric.js';
import type { FeatureDefinition } from '../src/units/ports.js';
import { transformExecutor, transformationHash } from '../src/units/transform-executor.js';
import { dataJoiner } from '../src/units/data-joiner.js';
import { aggregationComputer } from '../src/units/aggregation-computer.js';
import { featureComputer } from '../src/units/feature-computer.js';
import { featureStoreWriter } from '../src/units/feature-store-writer.js';
import { featureRetriever } from '../src/units/feature-retriever.js';
import { TENANT, expectFail, expectOk } from './helpers.js';

const SALES = [
  { id: 1, region: 'eu', amount: 10 },
  { id: 2, region: 'us', amount: 25 },
  { id: 3, region: 'eu', amount: 40 },
];

let fabric: LocalFabric;

beforeEach(() => {
  fabric = createLocalFabric();
  fabric.stage(TENANT, 'raw', SALES);
});

describe('TransformExecutor', () => {
  const definition = {
    steps: [
      { op: 'filter', column: 'region', operator: 'eq', value: '{{region}}' },
      { op: 'select', columns: ['id', 'amount'] },
      { op: 'rename', from: 'amount', to: 'total' },
    ],
  };

  it('applies the steps with parameters substituted', async () => {
    const { value } = expectOk(
      await transformExecutor.invoke(
        { inputDataRef: 'raw', transformationDefinition: definition, parameters: { region: 'eu' }, outputStagingRef: 'eu' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.rowsProcessed).toBe(3);
    expect(value.rowsOutput).toBe(2);
    expect(value.outputStagingRef).toBe('eu');
    expect(fabric.stagedRows(TENANT, 'eu')).toEqual([
      { id: 1, total: 10 },
      { id: 3, total: 40 },
    ]);
  });

  it('fingerprints the definition together with its parameters', async () => {
    const { value } = expectOk(
      await transformExecutor.invoke(
        { inputDataRef: 'raw', transformationDefinition: definition, parameters: { region: 'eu' }, outputStagingRef: 'eu' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.transformationHash).toMatch(/^[0-9a-f]{16}$/);
    expect(value.transformationHash).toBe(transformationHash(definition, { region: 'eu' }));
    expect(value.transformationHash).not.toBe(transformationHash(definition, { region: 'us' }));
  });

  it('fails when a parameter is missing', async () => {
    const err = expectFail(
      await transformExecutor.invoke(
        { inputDataRef: 'raw', transformationDefinition: definition, outputStagingRef: 'eu' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err.code).toBe('TRANSFORM_ERROR');
    expect(err.message).toBe('Transformation failed: Missing parameter: region');
  });

  it('fails on an unknown step', async () => {
    const err = expectFail(
      await transformExecutor.invoke(
        { inputDataRef: 'raw', transformationDefinition: { steps: [{ op: 'explode' }] }, outputStagingRef: 'out' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err.code).toBe('TRANSFORM_ERROR');
    expect(err.message).toBe(
      'Transformation failed: Transformation definition must be {steps: [...]} of select, filter, rename or limit',
    );
  });

  it('stops when the input exceeds the row limit', async () => {
    fabric = createLocalFabric({ engine: { maxRows: 2 } });
    fabric.stage(TENANT, 'raw', SALES);
    const err = expectFail(
      await transformExecutor.invoke(
        { inputDataRef: 'raw', transformationDefinition: { steps: [] }, outputStagingRef: 'out' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err.code).toBe('RESOURCE_EXHAUSTED');
  });

  it('fails when the input is missing', async () => {
    const err = expectFail(
      await transformExecutor.invoke(
        { inputDataRef: 'nope', transformationDefinition: { steps: [] }, outputStagingRef: 'out' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err.code).toBe('INPUT_READ_FAILURE');
    expect(err.message).toBe('Failed to read input: Staging object not found: nope');
  });
});

describe('DataJoiner', () => {
  beforeEach(() => {
    fabric.stage(TENANT, 'customers', [
      { cid: 1, name: 'ada' },
      { cid: 2, name: 'bob' },
    ]);
    fabric.stage(TENANT, 'orders', [
      { cid: 1, total: 5 },
      { cid: 1, total: 7 },
      { cid: 3, total: 9 },
    ]);
  });

  it('inner joins on the key columns', async () => {
    const { value } = expectOk(
      await dataJoiner.invoke(
        { leftInputRef: 'customers', rightInputRef: 'orders', joinKeys: ['cid'], joinType: 'inner', outputStagingRef: 'joined' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value).toMatchObject({ rowsOutput: 2, matchedCount: 2, unmatchedLeft: 1, unmatchedRight: 1 });
    expect(fabric.stagedRows(TENANT, 'joined')).toEqual([
      { cid: 1, name: 'ada', total: 5 },
      { cid: 1, name: 'ada', total: 7 },
    ]);
  });

  it('keeps unmatched rows from both sides in a full join', async () => {
    const { value } = expectOk(
      await dataJoiner.invoke(
        { leftInputRef: 'customers', rightInputRef: 'orders', joinKeys: ['cid'], joinType: 'full', outputStagingRef: 'joined' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.rowsOutput).toBe(4);
    expect(fabric.stagedRows(TENANT, 'joined').at(-1)).toEqual({ cid: 3, total: 9 });
  });

  it('fails when a key column is missing', async () => {
    const err = expectFail(
      await dataJoiner.invoke(
        { leftInputRef: 'customers', rightInputRef: 'orders', joinKeys: ['customer'], joinType: 'inner', outputStagingRef: 'j' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err.code).toBe('KEY_MISMATCH');
    expect(err.message).toBe("Join key mismatch: Join key 'customer' missing from left input");
  });

  it('names the side that could not be read', async () => {
    const err = expectFail(
      await dataJoiner.invoke(
        { leftInputRef: 'customers', rightInputRef: 'nope', joinKeys: ['cid'], joinType: 'inner', outputStagingRef: 'j' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err.code).toBe('RIGHT_INPUT_READ_FAILURE');
  });
});

describe('AggregationComputer', () => {
  it('aggregates per group in first-seen order', async () => {
    const { value } = expectOk(
      await aggregationComputer.invoke(
        { inputDataRef: 'raw', groupByColumns: ['region'], aggregations: { amount: 'sum' }, outputStagingRef: 'by-region' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.groupsComputed).toBe(2);
    expect(fabric.stagedRows(TENANT, 'by-region')).toEqual([
      { region: 'eu', sum_amount: 50 },
      { region: 'us', sum_amount: 25 },
    ]);
  });

  it('aggregates everything into one group without group-by columns', async () => {
    expectOk(
      await aggregationComputer.invoke(
        { inputDataRef: 'raw', aggregations: { amount: 'avg', id: 'count' }, outputStagingRef: 'totals' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(fabric.stagedRows(TENANT, 'totals')).toEqual([{ avg_amount: 25, count_id: 3 }]);
  });

  it('rejects an unsupported function', async () => {
    const err = expectFail(
      await aggregationComputer.invoke(
        { inputDataRef: 'raw', aggregations: { amount: 'median' }, outputStagingRef: 'x' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err.code).toBe('INVALID_AGGREGATION');
    expect(err.message).toBe("Invalid aggregation: Unsupported aggregation 'median' for column 'amount'");
  });

  it('computes min and max over a column of 200k values', async () => {
    fabric.stage(
      TENANT,
      'big',
      Array.from({ length: 200_000 }, (_, i) => ({ id: i, amount: 200_000 - i })),
    );
    expectOk(
      await aggregationComputer.invoke(
        { inputDataRef: 'big', aggregations: { amount: 'min', id: 'max' }, outputStagingRef: 'extremes' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(fabric.stagedRows(TENANT, 'extremes')).toEqual([{ min_amount: 1, max_id: 199_999 }]);
  });

  it('requires at least one aggregation', async () => {
    const err = expectFail(
      await aggregationComputer.invoke({ inputDataRef: 'raw', aggregations: {}, outputStagingRef: 'x' }, TENANT, fabric.ports),
    );
    expect(err.code).toBe('INVALID_INPUT');
  });
});

const SPEND: FeatureDefinition = {
  name: 'customer_spend',
  timestampColumn: 'ts',
  features: [
    { name: 'spend_7d', column: 'amount', aggregation: 'sum' },
    { name: 'orders_7d', column: 'amount', aggregation: 'count' },
  ],
};

const WINDOW = { timeStart: '2026-03-01T00:00:00Z', timeEnd: '2026-03-08T00:00:00Z' };

describe('FeatureComputer', () => {
  beforeEach(() => {
    fabric.registerFeatureDefinition(TENANT, 'spend', SPEND);
    fabric.stage(TENANT, 'events', [
      { customer: 'c1', ts: '2026-03-01T00:00:00Z', amount: 10 },
      { customer: 'c1', ts: '2026-03-02T00:00:00Z', amount: 15 },
      { customer: 'c2', ts: '2026-03-03T00:00:00Z', amount: 7 },
      { customer: 'c2', ts: '2026-02-01T00:00:00Z', amount: 99 },
    ]);
  });

  it('computes features for rows inside the window', async () => {
    const { value } = expectOk(
      await featureComputer.invoke(
        { sourceDataRef: 'events', featureDefinitionRef: 'spend', entityKeyColumns: ['customer'], ...WINDOW, outputStagingRef: 'f' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.entitiesComputed).toBe(2);
    expect(value.featureValuesCount).toBe(4);
    expect(fabric.stagedRows(TENANT, 'f')).toEqual([
      { customer: 'c1', spend_7d: 25, orders_7d: 2 },
      { customer: 'c2', spend_7d: 7, orders_7d: 1 },
    ]);
  });

  it('rejects a window that ends before it starts', async () => {
    const err = expectFail(
      await featureComputer.invoke(
        {
          sourceDataRef: 'events',
          featureDefinitionRef: 'spend',
          entityKeyColumns: ['customer'],
          timeStart: WINDOW.timeEnd,
          timeEnd: WINDOW.timeStart,
          outputStagingRef: 'f',
        },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err.code).toBe('INVALID_INPUT');
  });

  it('fails for an unknown definition', async () => {
    const err = expectFail(
      await featureComputer.invoke(
        { sourceDataRef: 'events', featureDefinitionRef: 'nope', entityKeyColumns: ['customer'], ...WINDOW, outputStagingRef: 'f' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err.code).toBe('DEFINITION_NOT_FOUND');
  });

  it('fails when the entity key column is absent', async () => {
    const err = expectFail(
      await featureComputer.invoke(
        { sourceDataRef: 'events', featureDefinitionRef: 'spend', entityKeyColumns: ['account'], ...WINDOW, outputStagingRef: 'f' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err.code).toBe('ENTITY_KEY_MISSING');
    expect(err.message).toBe('Entity key column missing: account');
  });
});

describe('feature store', () => {
  let clock: number;

  beforeEach(() => {
    clock = Date.parse('2026-03-08T00:00:00Z');
    fabric = createLocalFabric({ now: () => clock });
    fabric.stage(TENANT, 'features', [
      { customer: 'c1', spend_7d: 25 },
      { customer: 'c2', spend_7d: 7 },
    ]);
  });

  async function load(ttlSeconds = 3600): Promise<void> {
    expectOk(
      await featureStoreWriter.invoke(
        { stagingRef: 'features', featureSetRef: 'customer_spend', storeType: 'online', ttlSeconds },
        TENANT,
        fabric.ports,
      ),
    );
  }

  it('writes staged rows to the chosen store', async () => {
    const { value } = expectOk(
      await featureStoreWriter.invoke(
        { stagingRef: 'features', featureSetRef: 'customer_spend', storeType: 'online', ttlSeconds: 3600 },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.entitiesWritten).toBe(2);
    expect(value.storeLocation).toBe('online://customer_spend');
  });

  it('rejects a TTL outside the allowed range', async () => {
    const err = expectFail(
      await featureStoreWriter.invoke(
        { stagingRef: 'features', featureSetRef: 'customer_spend', storeType: 'online', ttlSeconds: 30 },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err.code).toBe('TTL_INVALID');
    expect(err.message).toBe('TTL must be between 60 and 31536000 seconds');
  });

  it('reports an offline store', async () => {
    fabric.setFeatureStoreAvailable(false);
    const err = expectFail(
      await featureStoreWriter.invoke(
        { stagingRef: 'features', featureSetRef: 'customer_spend', storeType: 'online', ttlSeconds: 3600 },
        TENANT,
        fabric.ports,
      ),
    );
    expect(err.code).toBe('STORE_UNAVAILABLE');

    const read = expectFail(
      await featureRetriever.invoke(
        { featureSetRef: 'customer_spend', entityKeys: [{ customer: 'c1' }], featureNames: ['spend_7d'] },
        TENANT,
        fabric.ports,
      ),
    );
    expect(read.code).toBe('STORE_UNAVAILABLE');
  });

  it('retrieves values with their staleness and marks unknown entities missing', async () => {
    await load();
    clock += 90_000;

    const { value } = expectOk(
      await featureRetriever.invoke(
        { featureSetRef: 'customer_spend', entityKeys: [{ customer: 'c1' }, { customer: 'c9' }], featureNames: ['spend_7d'] },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.values).toEqual([
      { entityKey: { customer: 'c1' }, featureName: 'spend_7d', value: 25, isMissing: false, stalenessSeconds: 90 },
      { entityKey: { customer: 'c9' }, featureName: 'spend_7d', value: null, isMissing: true, stalenessSeconds: 0 },
    ]);
  });

  it('drops values past their TTL', async () => {
    await load(60);
    clock += 61_000;

    const { value } = expectOk(
      await featureRetriever.invoke(
        { featureSetRef: 'customer_spend', entityKeys: [{ customer: 'c1' }], featureNames: ['spend_7d'] },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.values[0]?.isMissing).toBe(true);
  });

  it('answers point-in-time lookups from before the write as missing', async () => {
    await load();
    const { value } = expectOk(
      await featureRetriever.invoke(
        {
          featureSetRef: 'customer_spend',
          entityKeys: [{ customer: 'c1' }],
          featureNames: ['spend_7d'],
          pointInTime: new Date(clock - 1000).toISOString(),
        },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.values[0]?.isMissing).toBe(true);
  });

  it('keeps online and offline stores apart', async () => {
    await load();
    const { value } = expectOk(
      await featureRetriever.invoke(
        { featureSetRef: 'customer_spend', entityKeys: [{ customer: 'c1' }], featureNames: ['spend_7d'], storePreference: 'offline' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.values[0]?.isMissing).toBe(true);
  });
});
