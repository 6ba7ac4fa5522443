/**
 * DataReplicator: copies bytes between storage locations and verifies them.
 * Strong consistency reads the target back and compares SHA-256; eventual
 * consistency trusts the source checksum.
 */

import { isPortFailure } from '../core/errors.js';
import { sha256Hex } from '../core/hashing.js';
import { CONSISTENCY_MODES, fail, succeed } from '../core/types.js';
import type { TenantContext } from '../core/types.js';
import type { FabricPorts } from './ports.js';
import type { ReplicationInput, ReplicationResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const UNVERIFIED_CHECKSUM = 'unverified';

export const dataReplicator = defineUnit<ReplicationInput, ReplicationResult, 'locations'>({
  name: 'DataReplicator',
  inputSchema: {
    type: 'object',
    required: ['sourceLocationRef', 'targetLocationRef'],
    properties: {
      sourceLocationRef: { type: 'string', minLength: 1 },
      targetLocationRef: { type: 'string', minLength: 1 },
      consistencyMode: { enum: [...CONSISTENCY_MODES], default: 'eventual' },
    },
  },

  async execute(input, tenant, ports) {
    let sourceData: Uint8Array;
    try {
      sourceData = await ports.locations.read(input.sourceLocationRef, tenant);
    } catch (err) {
      if (isPortFailure(err, 'network')) return fail('NETWORK_FAILURE', `Network error during read: ${err.message}`);
      if (isPortFailure(err)) return fail('SOURCE_READ_FAILURE', `Failed to read from source: ${err.message}`);
      throw err;
    }

    const sourceChecksum = sha256Hex(sourceData);

    let targetConfirmed: string;
    try {
      targetConfirmed = await ports.locations.write(input.targetLocationRef, sourceData, input.consistencyMode, tenant);
    } catch (err) {
      if (isPortFailure(err, 'network')) return fail('NETWORK_FAILURE', `Network error during write: ${err.message}`);
      if (isPortFailure(err)) return fail('TARGET_WRITE_FAILURE', `Failed to write to target: ${err.message}`);
      throw err;
    }

    let targetChecksum = sourceChecksum;
    if (input.consistencyMode === 'strong') {
      targetChecksum = await readBackChecksum(input.targetLocationRef, tenant, ports);
      if (targetChecksum !== UNVERIFIED_CHECKSUM && targetChecksum !== sourceChecksum) {
        return fail('CHECKSUM_MISMATCH', 'Source and target checksums do not match');
      }
    }

    return succeed({
      bytesReplicated: sourceData.length,
      targetConfirmed,
      checksumMatch: sourceChecksum === targetChecksum,
      replicatedAt: nowIso(),
    });
  },
});

/** A failed verification read leaves the copy in place but unverified. */
async function readBackChecksum(
  locationRef: string,
  tenant: TenantContext,
  ports: Pick<FabricPorts, 'locations'>,
): Promise<string> {
  try {
    return sha256Hex(await ports.locations.read(locationRef, tenant));
  } catch (err) {
    if (isPortFailure(err)) return UNVERIFIED_CHECKSUM;
    throw err;
  }
}
