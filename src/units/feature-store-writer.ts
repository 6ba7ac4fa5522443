/**
 * FeatureStoreWriter: loads staged feature values into the online or offline store.
 */

import { isPortFailure } from '../core/errors.js';
import { STORE_TYPES, fail, succeed } from '../core/types.js';
import type { FeatureStoreReceipt, StagedData } from './ports.js';
import type { FeatureStoreWriteInput, FeatureStoreWriteResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const MIN_TTL_SECONDS = 60;
export const MAX_TTL_SECONDS = 31_536_000;

export const featureStoreWriter = defineUnit<
  FeatureStoreWriteInput,
  FeatureStoreWriteResult,
  'staging' | 'featureStore'
>({
  name: 'FeatureStoreWriter',
  inputSchema: {
    type: 'object',
    required: ['stagingRef', 'featureSetRef', 'storeType', 'ttlSeconds'],
    properties: {
      stagingRef: { type: 'string', minLength: 1 },
      featureSetRef: { type: 'string', minLength: 1 },
      storeType: { enum: [...STORE_TYPES] },
      ttlSeconds: { type: 'integer' },
    },
  },

  async execute(input, tenant, ports) {
    if (input.ttlSeconds < MIN_TTL_SECONDS || input.ttlSeconds > MAX_TTL_SECONDS) {
      return fail('TTL_INVALID', `TTL must be between ${MIN_TTL_SECONDS} and ${MAX_TTL_SECONDS} seconds`);
    }

    let staged: StagedData;
    try {
      staged = await ports.staging.read(input.stagingRef, tenant);
    } catch (err) {
      if (isPortFailure(err)) return fail('STAGING_READ_FAILURE', `Failed to read from staging: ${err.message}`);
      throw err;
    }

    let receipt: FeatureStoreReceipt;
    try {
      receipt = await ports.featureStore.write(input.featureSetRef, staged.data, input.storeType, input.ttlSeconds, tenant);
    } catch (err) {
      if (isPortFailure(err, 'unavailable')) return fail('STORE_UNAVAILABLE', 'Feature store is unavailable');
      if (isPortFailure(err)) return fail('STORE_WRITE_FAILURE', `Failed to write to feature store: ${err.message}`);
      throw err;
    }

    return succeed({
      entitiesWritten: receipt.entitiesWritten,
      storeLocation: receipt.storeLocation,
      writtenAt: nowIso(),
    });
  },
});
