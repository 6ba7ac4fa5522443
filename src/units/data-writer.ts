/**
 * DataWriter: persists staged data into a dataset.
 */

import { isPortFailure } from '../core/errors.js';
import { WRITE_MODES, fail, succeed } from '../core/types.js';
import type { DatasetWriteReceipt, StagedData } from './ports.js';
import type { DataWriteInput, DataWriteResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const dataWriter = defineUnit<DataWriteInput, DataWriteResult, 'staging' | 'datasets'>({
  name: 'DataWriter',
  inputSchema: {
    type: 'object',
    required: ['stagingRef', 'targetDatasetRef', 'writeMode'],
    properties: {
      stagingRef: { type: 'string', minLength: 1 },
      targetDatasetRef: { type: 'string', minLength: 1 },
      writeMode: { enum: [...WRITE_MODES] },
      partitionSpec: { type: ['object', 'null'] },
    },
  },

  async execute(input, tenant, ports) {
    let staged: StagedData;
    try {
      staged = await ports.staging.read(input.stagingRef, tenant);
    } catch (err) {
      if (isPortFailure(err)) {
        return fail('STAGING_READ_FAILURE', `Failed to read from staging: ${err.message}`);
      }
      throw err;
    }

    let receipt: DatasetWriteReceipt;
    try {
      receipt = await ports.datasets.write(
        input.targetDatasetRef,
        staged.data,
        input.writeMode,
        input.partitionSpec ?? null,
        tenant,
      );
    } catch (err) {
      if (isPortFailure(err, 'schema_mismatch')) {
        return fail('SCHEMA_MISMATCH', `Schema mismatch: ${err.message}`);
      }
      if (isPortFailure(err, 'quota')) {
        return fail('QUOTA_EXCEEDED', 'Storage quota exceeded');
      }
      if (isPortFailure(err)) {
        return fail('TARGET_WRITE_FAILURE', `Failed to write to dataset: ${err.message}`);
      }
      throw err;
    }

    return succeed({
      bytesWritten: receipt.bytesWritten,
      rowsWritten: receipt.rowsWritten,
      targetLocation: receipt.location,
      writtenAt: nowIso(),
    });
  },
});
