/**
 * SchemaValidator: checks a dataset against a registered schema.
 * Read and inference failures are inconclusive; an unresolvable schema is not.
 */

import { isPortFailure } from '../core/errors.js';
import { VALIDATION_MODES, fail, succeed } from '../core/types.js';
import type { ExpectedSchema, SchemaCheck } from './ports.js';
import type { SchemaValidationInput, SchemaValidationResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const schemaValidator = defineUnit<
  SchemaValidationInput,
  SchemaValidationResult,
  'schemaRegistry' | 'datasets' | 'schemaValidation'
>({
  name: 'SchemaValidator',
  inputSchema: {
    type: 'object',
    required: ['datasetRef', 'expectedSchemaRef'],
    properties: {
      datasetRef: { type: 'string', minLength: 1 },
      expectedSchemaRef: { type: 'string', minLength: 1 },
      validationMode: { enum: [...VALIDATION_MODES], default: 'compatible' },
    },
  },

  async execute(input, tenant, ports) {
    let schema: ExpectedSchema;
    try {
      schema = await ports.schemaRegistry.resolve(input.expectedSchemaRef, tenant);
    } catch (err) {
      if (isPortFailure(err)) return fail('SCHEMA_UNAVAILABLE', 'Expected schema is unavailable', { inconclusive: false });
      throw err;
    }

    let data: Uint8Array;
    try {
      data = await ports.datasets.read(input.datasetRef, tenant);
    } catch (err) {
      if (isPortFailure(err)) {
        return fail('DATASET_READ_FAILURE', `Failed to read dataset: ${err.message}`, { inconclusive: true });
      }
      throw err;
    }

    let check: SchemaCheck;
    try {
      check = await ports.schemaValidation.validate(data, schema, input.validationMode);
    } catch (err) {
      if (isPortFailure(err)) {
        return fail('TYPE_INFERENCE_FAILURE', 'Could not infer types from dataset', { inconclusive: true });
      }
      throw err;
    }

    return succeed(
      { isValid: check.valid, discrepancies: check.discrepancies, validatedAt: nowIso() },
      { inconclusive: false },
    );
  },
});
