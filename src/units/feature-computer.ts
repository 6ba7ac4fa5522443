/**
 * FeatureComputer: materializes feature values per entity over a time window.
 */

import { isPortFailure } from '../core/errors.js';
import { fail, succeed } from '../core/types.js';
import type { FeatureDefinition, FeatureOutput, StagedData } from './ports.js';
import type { FeatureComputeInput, FeatureComputeResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const featureComputer = defineUnit<
  FeatureComputeInput,
  FeatureComputeResult,
  'featureDefinitions' | 'staging' | 'featureEngine'
>({
  name: 'FeatureComputer',
  inputSchema: {
    type: 'object',
    required: ['sourceDataRef', 'featureDefinitionRef', 'entityKeyColumns', 'timeStart', 'timeEnd', 'outputStagingRef'],
    properties: {
      sourceDataRef: { type: 'string', minLength: 1 },
      featureDefinitionRef: { type: 'string', minLength: 1 },
      entityKeyColumns: { type: 'array', items: { type: 'string', minLength: 1 }, minItems: 1 },
      timeStart: { type: 'string', minLength: 1 },
      timeEnd: { type: 'string', minLength: 1 },
      outputStagingRef: { type: 'string', minLength: 1 },
    },
  },

  async execute(input, tenant, ports) {
    const start = Date.parse(input.timeStart);
    const end = Date.parse(input.timeEnd);
    if (Number.isNaN(start) || Number.isNaN(end) || start >= end) {
      return fail('INVALID_INPUT', 'timeStart and timeEnd must be timestamps with timeStart before timeEnd');
    }

    let definition: FeatureDefinition;
    try {
      definition = await ports.featureDefinitions.resolve(input.featureDefinitionRef, tenant);
    } catch (err) {
      if (isPortFailure(err)) return fail('DEFINITION_NOT_FOUND', 'Feature definition not found');
      throw err;
    }

    let source: StagedData;
    try {
      source = await ports.staging.read(input.sourceDataRef, tenant);
    } catch (err) {
      if (isPortFailure(err)) return fail('SOURCE_READ_FAILURE', `Failed to read source: ${err.message}`);
      throw err;
    }

    let output: FeatureOutput;
    try {
      output = await ports.featureEngine.compute(source.data, definition, input.entityKeyColumns, {
        start: input.timeStart,
        end: input.timeEnd,
      });
    } catch (err) {
      if (isPortFailure(err, 'schema_mismatch')) {
        return fail('ENTITY_KEY_MISSING', `Entity key column missing: ${err.message}`);
      }
      if (isPortFailure(err)) return fail('COMPUTATION_ERROR', `Feature computation failed: ${err.message}`);
      throw err;
    }

    try {
      await ports.staging.write(input.outputStagingRef, output.data, source.format, tenant);
    } catch (err) {
      if (isPortFailure(err)) return fail('OUTPUT_WRITE_FAILURE', `Failed to write features: ${err.message}`);
      throw err;
    }

    return succeed({
      entitiesComputed: output.entityCount,
      featureValuesCount: output.featureCount,
      outputStagingRef: input.outputStagingRef,
      computedAt: nowIso(),
    });
  },
});
