/**
 * LabelRecorder: stores one annotator's label for one sample of a task.
 */

import { isPortFailure } from '../core/errors.js';
import { fail, succeed } from '../core/types.js';
import type { LabelRecordInput, LabelRecordResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const labelRecorder = defineUnit<LabelRecordInput, LabelRecordResult, 'labelTasks' | 'labelSchemas' | 'annotations'>({
  name: 'LabelRecorder',
  inputSchema: {
    type: 'object',
    required: ['taskRef', 'sampleId', 'labelValue', 'annotatorRef'],
    properties: {
      taskRef: { type: 'string', minLength: 1 },
      sampleId: { type: 'string', minLength: 1 },
      labelValue: {},
      annotatorRef: { type: 'string', minLength: 1 },
    },
  },

  async execute(input, tenant, ports) {
    const task = await ports.labelTasks.get(input.taskRef, tenant);
    if (task === null) {
      return fail('TASK_NOT_FOUND', `Task not found: ${input.taskRef}`);
    }
    if (!task.sampleIds.includes(input.sampleId)) {
      return fail('SAMPLE_NOT_IN_TASK', `Sample not in task: ${input.sampleId}`);
    }

    const labelCheck = await ports.labelSchemas.validateLabel(input.labelValue, task.schemaRef, tenant);
    if (!labelCheck.ok) {
      return fail('SCHEMA_VIOLATION', `Label violates schema: ${labelCheck.error}`);
    }

    let annotationId: string;
    try {
      annotationId = await ports.annotations.store(
        {
          taskRef: input.taskRef,
          sampleId: input.sampleId,
          labelValue: input.labelValue,
          annotatorRef: input.annotatorRef,
        },
        tenant,
      );
    } catch (err) {
      if (isPortFailure(err)) return fail('STORAGE_FAILURE', `Failed to store annotation: ${err.message}`);
      throw err;
    }

    return succeed({ annotationId, recordedAt: nowIso() });
  },
});
