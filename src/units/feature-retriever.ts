/**
 * FeatureRetriever: point lookups of feature values, optionally as of a past instant.
 */

import { isPortFailure } from '../core/errors.js';
import { STORE_TYPES, fail, succeed } from '../core/types.js';
import type { RawFeatureValue } from './ports.js';
import type { FeatureRetrieveInput, FeatureRetrieveResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const featureRetriever = defineUnit<FeatureRetrieveInput, FeatureRetrieveResult, 'featureStore'>({
  name: 'FeatureRetriever',
  inputSchema: {
    type: 'object',
    required: ['featureSetRef', 'entityKeys', 'featureNames'],
    properties: {
      featureSetRef: { type: 'string', minLength: 1 },
      entityKeys: { type: 'array', items: { type: 'object' }, minItems: 1 },
      featureNames: { type: 'array', items: { type: 'string', minLength: 1 }, minItems: 1 },
      pointInTime: { type: ['string', 'null'] },
      storePreference: { enum: [...STORE_TYPES], default: 'online' },
    },
  },

  async execute(input, tenant, ports) {
    let raw: RawFeatureValue[];
    try {
      raw = await ports.featureStore.read(
        input.featureSetRef,
        input.entityKeys,
        input.featureNames,
        input.pointInTime ?? null,
        input.storePreference,
        tenant,
      );
    } catch (err) {
      if (isPortFailure(err, 'unavailable')) return fail('STORE_UNAVAILABLE', 'Feature store is unavailable');
      if (isPortFailure(err)) return fail('STORE_READ_FAILURE', `Failed to read from feature store: ${err.message}`);
      throw err;
    }

    return succeed({
      values: raw.map((v) => ({
        entityKey: v.entityKey,
        featureName: v.featureName,
        value: v.value,
        isMissing: v.isMissing ?? false,
        stalenessSeconds: v.stalenessSeconds ?? 0,
      })),
      retrievedAt: nowIso(),
    });
  },
});
