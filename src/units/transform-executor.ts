/**
 * TransformExecutor: applies a declarative transformation to staged data.
 */

import { isPortFailure } from '../core/errors.js';
import { hashCanonical } from '../core/hashing.js';
import { fail, succeed } from '../core/types.js';
import type { StagedData, TransformOutput } from './ports.js';
import type { TransformInput, TransformResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

/** Stable fingerprint of a transformation and its parameters (16 hex chars). */
export function transformationHash(definition: unknown, parameters: unknown): string {
  return hashCanonical(definition, parameters).slice(0, 16);
}

export const transformExecutor = defineUnit<TransformInput, TransformResult, 'staging' | 'transforms'>({
  name: 'TransformExecutor',
  inputSchema: {
    type: 'object',
    required: ['inputDataRef', 'transformationDefinition', 'outputStagingRef'],
    properties: {
      inputDataRef: { type: 'string', minLength: 1 },
      transformationDefinition: { type: 'object' },
      parameters: { type: 'object', default: {} },
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

    let output: TransformOutput;
    try {
      output = await ports.transforms.apply(staged.data, input.transformationDefinition, input.parameters);
    } catch (err) {
      if (isPortFailure(err, 'exhausted')) return fail('RESOURCE_EXHAUSTED', 'Resource limits exceeded, terminated');
      if (isPortFailure(err)) return fail('TRANSFORM_ERROR', `Transformation failed: ${err.message}`);
      throw err;
    }

    try {
      await ports.staging.write(input.outputStagingRef, output.data, staged.format, tenant);
    } catch (err) {
      if (isPortFailure(err)) return fail('OUTPUT_WRITE_FAILURE', `Failed to write output: ${err.message}`);
      throw err;
    }

    return succeed({
      rowsProcessed: output.rowsIn,
      rowsOutput: output.rowsOut,
      outputStagingRef: input.outputStagingRef,
      transformationHash: transformationHash(input.transformationDefinition, input.parameters),
      transformedAt: nowIso(),
    });
  },
});
