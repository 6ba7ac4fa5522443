/**
 * DataProfiler: per-column statistics, quality scores and detected value patterns.
 */

import { isPortFailure } from '../core/errors.js';
import { fail, succeed } from '../core/types.js';
import type { RawProfile } from './ports.js';
import type { ProfileInput, ProfileResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const dataProfiler = defineUnit<ProfileInput, ProfileResult, 'datasets' | 'profiler'>({
  name: 'DataProfiler',
  inputSchema: {
    type: 'object',
    required: ['datasetRef'],
    properties: {
      datasetRef: { type: 'string', minLength: 1 },
      sampleSize: { type: 'integer', minimum: 1, default: 10_000 },
      profilingDepth: { enum: ['basic', 'standard', 'deep'], default: 'standard' },
    },
  },

  async execute(input, tenant, ports) {
    let data: Uint8Array;
    try {
      data = await ports.datasets.read(input.datasetRef, tenant);
    } catch (err) {
      if (isPortFailure(err, 'format', 'invalid')) return fail('INVALID_DATASET', `Invalid dataset: ${err.message}`);
      if (isPortFailure(err)) return fail('DATASET_READ_FAILURE', `Failed to read dataset: ${err.message}`);
      throw err;
    }

    let profile: RawProfile;
    try {
      profile = await ports.profiler.profile(data, input.sampleSize, input.profilingDepth);
    } catch (err) {
      if (isPortFailure(err, 'timeout')) return fail('PROFILE_TIMEOUT', 'Profiling timed out');
      if (isPortFailure(err)) return fail('INVALID_DATASET', `Invalid dataset: ${err.message}`);
      throw err;
    }

    return succeed(
      {
        columnStats: profile.columnStats,
        qualityScores: profile.qualityScores,
        detectedPatterns: profile.patterns,
        profiledAt: nowIso(),
      },
      { lowConfidence: profile.lowConfidence },
    );
  },
});
