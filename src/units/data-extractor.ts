/**
 * DataExtractor: copies a slice of a source into the staging area.
 */

import { isPortFailure } from '../core/errors.js';
import { DATA_FORMATS, fail, succeed } from '../core/types.js';
import type { SourceBatch } from './ports.js';
import type { DataExtractionInput, DataExtractionResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const dataExtractor = defineUnit<DataExtractionInput, DataExtractionResult, 'sources' | 'staging'>({
  name: 'DataExtractor',
  inputSchema: {
    type: 'object',
    required: ['sourceConnectionRef', 'sourceQueryOrPath', 'outputFormat', 'targetStagingRef'],
    properties: {
      sourceConnectionRef: { type: 'string', minLength: 1 },
      sourceQueryOrPath: { type: 'string', minLength: 1 },
      extractionOffset: { type: 'integer', minimum: 0, default: 0 },
      extractionLimit: { type: 'integer', minimum: 1, default: 100_000 },
      outputFormat: { enum: [...DATA_FORMATS] },
      targetStagingRef: { type: 'string', minLength: 1 },
    },
  },

  async execute(input, tenant, ports) {
    let batch: SourceBatch;
    try {
      batch = await ports.sources.readData(
        input.sourceConnectionRef,
        input.sourceQueryOrPath,
        input.extractionOffset,
        input.extractionLimit,
        tenant,
      );
    } catch (err) {
      if (isPortFailure(err, 'format')) {
        return fail('FORMAT_ERROR', `Data format error: ${err.message}`);
      }
      if (isPortFailure(err)) {
        return fail('SOURCE_READ_FAILURE', `Failed to read from source: ${err.message}`);
      }
      throw err;
    }

    let bytesWritten: number;
    try {
      bytesWritten = await ports.staging.write(input.targetStagingRef, batch.data, input.outputFormat, tenant);
    } catch (err) {
      if (isPortFailure(err, 'quota')) {
        return fail('QUOTA_EXCEEDED', 'Storage quota exceeded');
      }
      if (isPortFailure(err)) {
        return fail('TARGET_WRITE_FAILURE', `Failed to write to staging: ${err.message}`);
      }
      throw err;
    }

    return succeed({
      bytesExtracted: bytesWritten,
      rowsExtracted: batch.rowCount,
      stagingRef: input.targetStagingRef,
      watermarkValue: batch.watermark,
      extractedAt: nowIso(),
    });
  },
});
