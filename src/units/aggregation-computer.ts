/**
 * AggregationComputer: grouped aggregates over staged data.
 */

import { isPortFailure } from '../core/errors.js';
import { fail, succeed } from '../core/types.js';
import type { AggregationOutput, StagedData } from './ports.js';
import type { AggregationInput, AggregationResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const aggregationComputer = defineUnit<AggregationInput, AggregationResult, 'staging' | 'aggregations'>({
  name: 'AggregationComputer',
  inputSchema: {
    type: 'object',
    required: ['inputDataRef', 'aggregations', 'outputStagingRef'],
    properties: {
      inputDataRef: { type: 'string', minLength: 1 },
      groupByColumns: { type: 'array', items: { type: 'string' }, default: [] },
      aggregations: { type: 'object', additionalProperties: { type: 'string' }, minProperties: 1 },
      outputStagingRef: { type: 'string', minLength: 1 },
    },
  },

  async execute(input, tenant, ports) {
    let staged: StagedData;
    try {
      staged = await ports.staging.read(input.inputDataRef, tenant);
    } catch (err) {
      if (isPortFailure(err)) return fail('INPUT_READ_FAILURE', `Failed to read input: ${err.message}`);
      throw err;
    }

    let output: AggregationOutput;
    try {
      output = await ports.aggregations.aggregate(staged.data, input.groupByColumns, input.aggregations);
    } catch (err) {
      if (isPortFailure(err, 'exhausted')) return fail('MEMORY_EXHAUSTED', 'Memory limits exceeded, terminated');
      if (isPortFailure(err)) return fail('INVALID_AGGREGATION', `Invalid aggregation: ${err.message}`);
      throw err;
    }

    try {
      await ports.staging.write(input.outputStagingRef, output.data, staged.format, tenant);
    } catch (err) {
      if (isPortFailure(err)) return fail('OUTPUT_WRITE_FAILURE', `Failed to write output: ${err.message}`);
      throw err;
    }

    return succeed({
      groupsComputed: output.groupCount,
      outputStagingRef: input.outputStagingRef,
      aggregatedAt: nowIso(),
    });
  },
});
