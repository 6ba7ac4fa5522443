/**
 * BranchCreator: opens a named branch at an existing commit.
 */

import { isPortFailure } from '../core/errors.js';
import { fail, succeed } from '../core/types.js';
import type { BranchInput, BranchResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const branchCreator = defineUnit<BranchInput, BranchResult, 'commits' | 'branches'>({
  name: 'BranchCreator',
  inputSchema: {
    type: 'object',
    required: ['datasetRef', 'sourceCommitRef', 'branchName'],
    properties: {
      datasetRef: { type: 'string', minLength: 1 },
      sourceCommitRef: { type: 'string', minLength: 1 },
      branchName: { type: 'string', pattern: '^[A-Za-z0-9][A-Za-z0-9._/-]*$', maxLength: 128 },
    },
  },

  async execute(input, tenant, ports) {
    const commit = await ports.commits.get(input.sourceCommitRef, tenant);
    if (commit === null) {
      return fail('COMMIT_NOT_FOUND', `Source commit not found: ${input.sourceCommitRef}`);
    }

    if (await ports.branches.exists(input.datasetRef, input.branchName, tenant)) {
      return fail('NAME_CONFLICT', `Branch already exists: ${input.branchName}`);
    }

    let branchId: string;
    try {
      branchId = await ports.branches.create(input.datasetRef, input.branchName, input.sourceCommitRef, tenant);
    } catch (err) {
      if (isPortFailure(err, 'conflict')) return fail('NAME_CONFLICT', `Branch already exists: ${input.branchName}`);
      if (isPortFailure(err)) return fail('REGISTRY_WRITE_FAILURE', `Failed to create branch: ${err.message}`);
      throw err;
    }

    return succeed({ branchId, headCommitRef: input.sourceCommitRef, createdAt: nowIso() });
  },
});
