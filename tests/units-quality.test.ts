import { describe, it, expect, beforeEach } from 'vitest';
import { utf8ToBytes } from '@noble/hashes/utils.js';
import { createLocalFabric, type LocalFabric } from '../src/local/fabric.js';
import { dataProfiler } from '../src/units/data-profiler.js';
import { schemaValidator } from '../src/units/schema-validator.js';
import { qualityGateEvaluator } from '../src/units/quality-gate-evaluator.js';
import { TENANT, expectFail, expectOk } from './helpers.js';

const CUSTOMERS = [
  { id: 1, email: 'a@example.com', age: 30 },
  { id: 2, email: 'b@example.com', age: null },
  { id: 3, email: 'c@example.com', age: 40 },
];

let fabric: LocalFabric;

beforeEach(() => {
  fabric = createLocalFabric();
  fabric.putDataset(TENANT, 'customers', CUSTOMERS);
});

describe('DataProfiler', () => {
  it('computes column statistics and quality scores', async () => {
    const { value, flags } = expectOk(await dataProfiler.invoke({ datasetRef: 'customers' }, TENANT, fabric.ports));

    expect(value.columnStats).toEqual([
      { columnName: 'id', nullCount: 0, distinctCount: 3, minValue: 1, maxValue: 3, meanValue: 2 },
      { columnName: 'email', nullCount: 0, distinctCount: 3, minValue: 'a@example.com', maxValue: 'c@example.com', meanValue: null },
      { columnName: 'age', nullCount: 1, distinctCount: 2, minValue: 30, maxValue: 40, meanValue: 35 },
    ]);
    expect(value.qualityScores['completeness']).toBeCloseTo(8 / 9);
    expect(value.qualityScores['uniqueness']).toBe(1);
    expect(value.detectedPatterns).toEqual(['email:email']);
    expect(flags.lowConfidence).toBe(true);
  });

  it('profiles a numeric column of 200k values', async () => {
    fabric.putDataset(
      TENANT,
      'events',
      Array.from({ length: 200_000 }, (_, i) => ({ seq: i - 50 })),
    );
    const { value, flags } = expectOk(
      await dataProfiler.invoke({ datasetRef: 'events', sampleSize: 250_000, profilingDepth: 'basic' }, TENANT, fabric.ports),
    );
    expect(value.columnStats[0]).toMatchObject({ columnName: 'seq', minValue: -50, maxValue: 199_949, nullCount: 0 });
    expect(flags.lowConfidence).toBe(false);
  });

  it('skips pattern detection at basic depth', async () => {
    const { value } = expectOk(
      await dataProfiler.invoke({ datasetRef: 'customers', profilingDepth: 'basic' }, TENANT, fabric.ports),
    );
    expect(value.detectedPatterns).toEqual([]);
  });

  it('is confident with enough rows', async () => {
    fabric.putDataset(TENANT, 'big', Array.from({ length: 30 }, (_, i) => ({ id: i })));
    const { flags } = expectOk(await dataProfiler.invoke({ datasetRef: 'big' }, TENANT, fabric.ports));
    expect(flags.lowConfidence).toBe(false);
  });

  it('rejects content that is not row data', async () => {
    fabric.putDatasetBytes(TENANT, 'broken', utf8ToBytes('not json'));
    const err = expectFail(await dataProfiler.invoke({ datasetRef: 'broken' }, TENANT, fabric.ports));
    expect(err.code).toBe('INVALID_DATASET');
    expect(err.message).toBe('Invalid dataset: Data is not valid UTF-8 JSON');
  });

  it('fails for an unknown dataset', async () => {
    const err = expectFail(await dataProfiler.invoke({ datasetRef: 'nope' }, TENANT, fabric.ports));
    expect(err.code).toBe('DATASET_READ_FAILURE');
    expect(err.message).toBe('Failed to read dataset: Dataset not found: nope');
  });
});

describe('SchemaValidator', () => {
  beforeEach(() => {
    fabric.registerExpectedSchema(TENANT, 'customers-v1', {
      fields: [
        { name: 'id', type: 'integer', nullable: false },
        { name: 'email', type: 'string' },
        { name: 'age', type: 'number', nullable: false },
        { name: 'country', type: 'string', nullable: false },
      ],
    });
    fabric.registerExpectedSchema(TENANT, 'ids-only', { fields: [{ name: 'id', type: 'integer' }] });
  });

  it('reports nulls and missing required fields in compatible mode', async () => {
    const { value, flags } = expectOk(
      await schemaValidator.invoke({ datasetRef: 'customers', expectedSchemaRef: 'customers-v1' }, TENANT, fabric.ports),
    );
    expect(value.isValid).toBe(false);
    expect(value.discrepancies).toEqual([
      { fieldName: 'age', expectedType: 'number', actualType: 'integer', issue: 'unexpected_nulls' },
      { fieldName: 'country', expectedType: 'string', actualType: 'missing', issue: 'missing_field' },
    ]);
    expect(flags.inconclusive).toBe(false);
  });

  it('reports extra columns in exact mode', async () => {
    const { value } = expectOk(
      await schemaValidator.invoke(
        { datasetRef: 'customers', expectedSchemaRef: 'ids-only', validationMode: 'exact' },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.discrepancies).toEqual([
      { fieldName: 'email', expectedType: 'none', actualType: 'string', issue: 'unexpected_field' },
      { fieldName: 'age', expectedType: 'none', actualType: 'integer', issue: 'unexpected_field' },
    ]);
  });

  it('accepts a dataset that matches', async () => {
    const { value } = expectOk(
      await schemaValidator.invoke({ datasetRef: 'customers', expectedSchemaRef: 'ids-only' }, TENANT, fabric.ports),
    );
    expect(value).toMatchObject({ isValid: true, discrepancies: [] });
  });

  it('fails conclusively when the schema is unknown', async () => {
    const err = expectFail(
      await schemaValidator.invoke({ datasetRef: 'customers', expectedSchemaRef: 'nope' }, TENANT, fabric.ports),
    );
    expect(err.code).toBe('SCHEMA_UNAVAILABLE');
    expect(err.flags).toEqual({ inconclusive: false });
  });

  it('is inconclusive when the dataset cannot be read', async () => {
    const err = expectFail(
      await schemaValidator.invoke({ datasetRef: 'nope', expectedSchemaRef: 'ids-only' }, TENANT, fabric.ports),
    );
    expect(err.code).toBe('DATASET_READ_FAILURE');
    expect(err.flags).toEqual({ inconclusive: true });
  });

  it('is inconclusive when types cannot be inferred', async () => {
    fabric.putDataset(TENANT, 'empty', []);
    const err = expectFail(
      await schemaValidator.invoke({ datasetRef: 'empty', expectedSchemaRef: 'ids-only' }, TENANT, fabric.ports),
    );
    expect(err.code).toBe('TYPE_INFERENCE_FAILURE');
    expect(err.flags).toEqual({ inconclusive: true });
  });
});

describe('QualityGateEvaluator', () => {
  beforeEach(() => {
    fabric.registerQualityRules(TENANT, 'customer-rules', [
      { name: 'enough_rows', metric: 'row_count' },
      { name: 'age_filled', metric: 'completeness', column: 'age' },
      { name: 'unique_ids', metric: 'uniqueness', column: 'id' },
    ]);
  });

  it('fails the gate when a metric falls below its threshold', async () => {
    const { value, flags } = expectOk(
      await qualityGateEvaluator.invoke(
        {
          datasetRef: 'customers',
          qualityRulesRef: 'customer-rules',
          thresholds: { enough_rows: 3, age_filled: 0.9, unique_ids: 1 },
        },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.result).toBe('fail');
    expect(value.metricValues).toEqual({ enough_rows: 3, age_filled: 2 / 3, unique_ids: 1 });
    expect(value.violations).toEqual([{ ruleName: 'age_filled', expected: 0.9, actual: 2 / 3 }]);
    expect(flags.inconclusive).toBe(false);
  });

  it('passes when every threshold holds', async () => {
    const { value } = expectOk(
      await qualityGateEvaluator.invoke(
        { datasetRef: 'customers', qualityRulesRef: 'customer-rules', thresholds: { row_count: 2, unique_ids: 1 } },
        TENANT,
        fabric.ports,
      ),
    );
    expect(value.result).toBe('pass');
    expect(value.violations).toEqual([]);
  });

  it('rejects a rule with an unknown metric', async () => {
    fabric.registerQualityRules(TENANT, 'bad-rules', [{ name: 'fresh', metric: 'freshness' }]);
    const err = expectFail(
      await qualityGateEvaluator.invoke({ datasetRef: 'customers', qualityRulesRef: 'bad-rules' }, TENANT, fabric.ports),
    );
    expect(err.code).toBe('RULES_INVALID');
    expect(err.message).toBe('Invalid quality rules: Unknown quality metric: freshness');
    expect(err.flags).toEqual({ inconclusive: false });
  });

  it('is inconclusive when the dataset cannot be read', async () => {
    const err = expectFail(
      await qualityGateEvaluator.invoke({ datasetRef: 'nope', qualityRulesRef: 'customer-rules' }, TENANT, fabric.ports),
    );
    expect(err.code).toBe('DATASET_READ_FAILURE');
    expect(err.flags).toEqual({ inconclusive: true });
  });

  it('fails when the rule set is unknown', async () => {
    const err = expectFail(
      await qualityGateEvaluator.invoke({ datasetRef: 'customers', qualityRulesRef: 'nope' }, TENANT, fabric.ports),
    );
    expect(err.code).toBe('RULES_INVALID');
    expect(err.message).toBe('Invalid quality rules: Quality rules not found: nope');
  });
});
