/**
 * MergeComputer: three-way merge of two commits against their common ancestor.
 */

import { isPortFailure } from '../core/errors.js';
import { fail, succeed } from '../core/types.js';
import type { MergeOutput } from './ports.js';
import type { MergeComputeResult, MergeInput } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const mergeComputer = defineUnit<MergeInput, MergeComputeResult, 'commits' | 'merges'>({
  name: 'MergeComputer',
  inputSchema: {
    type: 'object',
    required: ['sourceCommitRef', 'targetCommitRef', 'commonAncestorRef'],
    properties: {
      sourceCommitRef: { type: 'string', minLength: 1 },
      targetCommitRef: { type: 'string', minLength: 1 },
      commonAncestorRef: { type: 'string', minLength: 1 },
    },
  },

  async execute(input, tenant, ports) {
    if ((await ports.commits.get(input.sourceCommitRef, tenant)) === null) {
      return fail('SOURCE_NOT_FOUND', `Source commit not found: ${input.sourceCommitRef}`);
    }
    if ((await ports.commits.get(input.targetCommitRef, tenant)) === null) {
      return fail('TARGET_NOT_FOUND', `Target commit not found: ${input.targetCommitRef}`);
    }
    if ((await ports.commits.get(input.commonAncestorRef, tenant)) === null) {
      return fail('NO_COMMON_ANCESTOR', 'No common ancestor found for merge');
    }

    let contents: [Uint8Array, Uint8Array, Uint8Array];
    try {
      contents = await Promise.all([
        ports.commits.getContent(input.sourceCommitRef, tenant),
        ports.commits.getContent(input.targetCommitRef, tenant),
        ports.commits.getContent(input.commonAncestorRef, tenant),
      ]);
    } catch (err) {
      if (isPortFailure(err)) return fail('COMMIT_READ_FAILURE', `Failed to read commit content: ${err.message}`);
      throw err;
    }

    const [source, target, ancestor] = contents;
    const merged: MergeOutput = await ports.merges.merge(source, target, ancestor);

    const computed: MergeComputeResult = {
      result: merged.success ? 'success' : 'conflict',
      conflicts: merged.conflicts,
      mergedChangeset: merged.merged,
      computedAt: nowIso(),
    };
    return succeed(computed);
  },
});
