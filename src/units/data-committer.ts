/**
 * DataCommitter: snapshots the current state of a dataset as an immutable commit.
 */

import { isPortFailure } from '../core/errors.js';
import { sha256Hex } from '../core/hashing.js';
import { fail, succeed } from '../core/types.js';
import type { DatasetState } from './ports.js';
import type { CommitInput, CommitResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const dataCommitter = defineUnit<CommitInput, CommitResult, 'commits' | 'datasets'>({
  name: 'DataCommitter',
  inputSchema: {
    type: 'object',
    required: ['datasetRef', 'commitMessage', 'authorRef'],
    properties: {
      datasetRef: { type: 'string', minLength: 1 },
      parentCommitRef: { type: ['string', 'null'] },
      commitMessage: { type: 'string', minLength: 1 },
      authorRef: { type: 'string', minLength: 1 },
    },
  },

  async execute(input, tenant, ports) {
    // An empty reference is a root commit
    const parentRef = input.parentCommitRef || null;
    if (parentRef !== null) {
      const parent = await ports.commits.get(parentRef, tenant);
      if (parent === null) {
        return fail('PARENT_NOT_FOUND', `Parent commit not found: ${parentRef}`);
      }
    }

    let state: DatasetState;
    try {
      state = await ports.datasets.readState(input.datasetRef, parentRef, tenant);
    } catch (err) {
      if (isPortFailure(err)) return fail('DATASET_READ_FAILURE', `Failed to read dataset state: ${err.message}`);
      throw err;
    }

    const contentHash = sha256Hex(state.content);
    let commitId: string;
    try {
      commitId = await ports.commits.create(
        {
          datasetRef: input.datasetRef,
          parentCommitRef: parentRef,
          content: state.content,
          contentHash,
          changeset: state.changeset,
          message: input.commitMessage,
          authorRef: input.authorRef,
        },
        tenant,
      );
    } catch (err) {
      if (isPortFailure(err)) return fail('COMMIT_STORAGE_FAILURE', `Failed to store commit: ${err.message}`);
      throw err;
    }

    return succeed({
      commitId,
      contentHash,
      changesetSummary: state.changeset,
      committedAt: nowIso(),
    });
  },
});
