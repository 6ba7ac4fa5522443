/**
 * LabelTaskCreator: selects samples from a dataset and opens a labeling task.
 */

import { isPortFailure } from '../core/errors.js';
import { fail, succeed } from '../core/types.js';
import type { LabelTaskInput, LabelTaskResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const labelTaskCreator = defineUnit<
  LabelTaskInput,
  LabelTaskResult,
  'catalog' | 'labelSchemas' | 'samples' | 'labelTasks'
>({
  name: 'LabelTaskCreator',
  inputSchema: {
    type: 'object',
    required: ['sourceDatasetRef', 'labelSchemaRef'],
    properties: {
      sourceDatasetRef: { type: 'string', minLength: 1 },
      sampleCriteria: { type: 'object', default: {} },
      labelSchemaRef: { type: 'string', minLength: 1 },
      qualityRequirements: { type: 'object', additionalProperties: { type: 'number' }, default: {} },
    },
  },

  async execute(input, tenant, ports) {
    const dataset = await ports.catalog.getAsset(input.sourceDatasetRef, tenant);
    if (dataset === null) {
      return fail('DATASET_NOT_FOUND', `Dataset not found: ${input.sourceDatasetRef}`);
    }

    const schemaCheck = await ports.labelSchemas.validateSchema(input.labelSchemaRef, tenant);
    if (!schemaCheck.ok) {
      return fail('SCHEMA_INVALID', `Invalid label schema: ${schemaCheck.error}`);
    }

    const sampleIds = await ports.samples.select(input.sourceDatasetRef, input.sampleCriteria, tenant);
    if (sampleIds.length === 0) {
      return fail('EMPTY_SELECTION', 'Sample criteria matched no records');
    }

    let taskId: string;
    try {
      taskId = await ports.labelTasks.create(
        {
          datasetRef: input.sourceDatasetRef,
          schemaRef: input.labelSchemaRef,
          sampleIds,
          qualityRequirements: input.qualityRequirements,
        },
        tenant,
      );
    } catch (err) {
      if (isPortFailure(err)) return fail('REGISTRY_FAILURE', `Failed to create task: ${err.message}`);
      throw err;
    }

    const created: LabelTaskResult = { taskId, sampleCount: sampleIds.length, status: 'pending', createdAt: nowIso() };
    return succeed(created);
  },
});
