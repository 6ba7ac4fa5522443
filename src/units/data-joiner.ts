/**
 * DataJoiner: joins two staged inputs on key columns.
 */

import { isPortFailure } from '../core/errors.js';
import { JOIN_TYPES, fail, succeed } from '../core/types.js';
import type { JoinOutput, StagedData } from './ports.js';
import type { JoinInput, JoinResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const dataJoiner = defineUnit<JoinInput, JoinResult, 'staging' | 'joins'>({
  name: 'DataJoiner',
  inputSchema: {
    type: 'object',
    required: ['leftInputRef', 'rightInputRef', 'joinKeys', 'joinType', 'outputStagingRef'],
    properties: {
      leftInputRef: { type: 'string', minLength: 1 },
      rightInputRef: { type: 'string', minLength: 1 },
      joinKeys: { type: 'array', items: { type: 'string', minLength: 1 }, minItems: 1 },
      joinType: { enum: [...JOIN_TYPES] },
      outputStagingRef: { type: 'string', minLength: 1 },
    },
  },

  async execute(input, tenant, ports) {
    let left: StagedData;
    try {
      left = await ports.staging.read(input.leftInputRef, tenant);
    } catch (err) {
      if (isPortFailure(err)) return fail('LEFT_INPUT_READ_FAILURE', `Failed to read left input: ${err.message}`);
      throw err;
    }

    let right: StagedData;
    try {
      right = await ports.staging.read(input.rightInputRef, tenant);
    } catch (err) {
      if (isPortFailure(err)) return fail('RIGHT_INPUT_READ_FAILURE', `Failed to read right input: ${err.message}`);
      throw err;
    }

    let joined: JoinOutput;
    try {
      joined = await ports.joins.join(left.data, right.data, input.joinKeys, input.joinType);
    } catch (err) {
      if (isPortFailure(err, 'exhausted')) return fail('MEMORY_EXHAUSTED', 'Memory limits exceeded, terminated');
      if (isPortFailure(err)) return fail('KEY_MISMATCH', `Join key mismatch: ${err.message}`);
      throw err;
    }

    try {
      await ports.staging.write(input.outputStagingRef, joined.data, left.format, tenant);
    } catch (err) {
      if (isPortFailure(err)) return fail('OUTPUT_WRITE_FAILURE', `Failed to write output: ${err.message}`);
      throw err;
    }

    return succeed({
      rowsOutput: joined.rowsOutput,
      matchedCount: joined.matchedCount,
      unmatchedLeft: joined.unmatchedLeft,
      unmatchedRight: joined.unmatchedRight,
      outputStagingRef: input.outputStagingRef,
      joinedAt: nowIso(),
    });
  },
});
