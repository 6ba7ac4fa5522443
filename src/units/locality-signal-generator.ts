/**
 * LocalitySignalGenerator: tells the scheduler where an asset's data sits
 * relative to each execution environment.
 */

import { isPortFailure } from '../core/errors.js';
import { fail, succeed } from '../core/types.js';
import type { AssetRecord, RawLocalitySignal } from './ports.js';
import type { LocalityInput, LocalityResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

/** Signals below this confidence mark the result as stale */
export const STALE_CONFIDENCE = 0.5;

export const localitySignalGenerator = defineUnit<
  LocalityInput,
  LocalityResult,
  'catalog' | 'environments' | 'locality'
>({
  name: 'LocalitySignalGenerator',
  inputSchema: {
    type: 'object',
    required: ['assetRef'],
    properties: {
      assetRef: { type: 'string', minLength: 1 },
    },
  },

  async execute(input, tenant, ports) {
    const asset: AssetRecord | null = await ports.catalog.getAsset(input.assetRef, tenant);
    if (asset === null) {
      return fail('ASSET_NOT_FOUND', `Asset not found: ${input.assetRef}`, { staleSignals: false });
    }

    if (asset.storageLocations.length === 0) {
      return succeed({ signals: [], signalFreshness: nowIso() }, { staleSignals: false });
    }

    const environments = await ports.environments.getEnvironments(tenant);

    let raw: RawLocalitySignal[];
    try {
      raw = await ports.locality.probe(asset.storageLocations, environments);
    } catch (err) {
      if (isPortFailure(err, 'unreachable')) {
        const partial: LocalityResult = {
          signals: [
            {
              environmentId: err.subject ?? 'unknown',
              localityType: 'unavailable',
              transferCostEstimate: -1,
              confidence: 0,
            },
          ],
          signalFreshness: nowIso(),
        };
        return succeed(partial, { staleSignals: true }, `Partial result: ${err.message}`);
      }
      if (isPortFailure(err, 'timeout')) {
        return fail('PROBE_TIMEOUT', 'Locality probe timed out', { staleSignals: true });
      }
      throw err;
    }

    const signals = raw.map((s) => ({
      environmentId: s.environmentId,
      localityType: s.localityType,
      transferCostEstimate: s.transferCost,
      confidence: s.confidence,
    }));

    return succeed(
      { signals, signalFreshness: nowIso() },
      { staleSignals: signals.some((s) => s.confidence < STALE_CONFIDENCE) },
    );
  },
});
