/**
 * DataAssetRegistrar: registers a dataset, feature set or label set in the catalog.
 */

import { randomUUID } from 'node:crypto';
import { isPortFailure } from '../core/errors.js';
import { ASSET_TYPES, DATA_CLASSIFICATIONS, DATA_FORMATS, fail, succeed } from '../core/types.js';
import { stringMap } from '../core/validation.js';
import type { AssetDeclaration, RegistrationResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const dataAssetRegistrar = defineUnit<AssetDeclaration, RegistrationResult, 'catalog'>({
  name: 'DataAssetRegistrar',
  inputSchema: {
    type: 'object',
    required: ['assetType', 'name', 'version', 'schemaDeclaration', 'storageLocationRef', 'classification', 'dataFormat', 'ownerRef'],
    properties: {
      assetType: { enum: [...ASSET_TYPES] },
      name: { type: 'string' },
      version: { type: 'string' },
      schemaDeclaration: { type: 'object' },
      storageLocationRef: { type: 'string' },
      classification: { enum: [...DATA_CLASSIFICATIONS] },
      dataFormat: { enum: [...DATA_FORMATS] },
      ownerRef: { type: 'string' },
      tags: stringMap,
    },
  },

  async execute(declaration, tenant, ports) {
    if (!declaration.name.trim() || !declaration.version.trim()) {
      return fail('INVALID_DECLARATION', 'Asset name and version are required');
    }

    const assetId = randomUUID();
    let cardRef: string;
    try {
      cardRef = await ports.catalog.createCard(tenant, {
        assetId,
        assetType: declaration.assetType,
        name: declaration.name,
        version: declaration.version,
        metadata: {
          schema: declaration.schemaDeclaration,
          location: declaration.storageLocationRef,
          classification: declaration.classification,
          format: declaration.dataFormat,
          owner: declaration.ownerRef,
          tags: declaration.tags ?? {},
        },
      });
    } catch (err) {
      if (isPortFailure(err, 'unavailable')) {
        return fail('REGISTRY_UNAVAILABLE', 'Registry service is unavailable');
      }
      if (isPortFailure(err, 'conflict')) {
        return fail('DUPLICATE_CONFLICT', `Asset ${declaration.name}:${declaration.version} already exists`);
      }
      if (isPortFailure(err, 'access_denied')) {
        return fail('AUTHORIZATION_DENIED', 'Not authorized to register assets in this namespace');
      }
      if (isPortFailure(err, 'invalid')) {
        return fail('INVALID_DECLARATION', err.message);
      }
      throw err;
    }

    return succeed({ assetId, cardRef, registeredAt: nowIso() });
  },
});
