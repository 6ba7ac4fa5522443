/**
 * LineageEdgeWriter: records that one asset was derived from another.
 */

import { isPortFailure } from '../core/errors.js';
import { fail, succeed } from '../core/types.js';
import type { LineageEdgeInput, LineageEdgeResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const lineageEdgeWriter = defineUnit<LineageEdgeInput, LineageEdgeResult, 'catalog' | 'lineage'>({
  name: 'LineageEdgeWriter',
  inputSchema: {
    type: 'object',
    required: ['sourceAssetRef', 'targetAssetRef', 'executionRef'],
    properties: {
      sourceAssetRef: { type: 'string', minLength: 1 },
      targetAssetRef: { type: 'string', minLength: 1 },
      relationshipType: { type: 'string', minLength: 1, default: 'derived_from' },
      executionRef: { type: 'string', minLength: 1 },
    },
  },

  async execute(input, tenant, ports) {
    if ((await ports.catalog.getAsset(input.sourceAssetRef, tenant)) === null) {
      return fail('SOURCE_NOT_FOUND', `Source asset not found: ${input.sourceAssetRef}`);
    }
    if ((await ports.catalog.getAsset(input.targetAssetRef, tenant)) === null) {
      return fail('TARGET_NOT_FOUND', `Target asset not found: ${input.targetAssetRef}`);
    }

    let edgeId: string;
    try {
      edgeId = await ports.lineage.createEdge(
        {
          sourceAssetRef: input.sourceAssetRef,
          targetAssetRef: input.targetAssetRef,
          relationshipType: input.relationshipType,
          executionRef: input.executionRef,
        },
        tenant,
      );
    } catch (err) {
      if (isPortFailure(err)) return fail('REGISTRY_FAILURE', `Failed to create lineage edge: ${err.message}`);
      throw err;
    }

    return succeed({ edgeId, createdAt: nowIso() });
  },
});
