/**
 * In-memory execution store for tests and single-process use.
 */

import type { Execution, ExecutionFilter, ExecutionStore } from '../mcop/execution.js';
import { cloneExecution } from '../mcop/execution.js';

export const DEFAULT_LIST_LIMIT = 100;

export function matchesExecution(execution: Execution, filter: ExecutionFilter): boolean {
  if (filter.organizationId && execution.tenant.organizationId !== filter.organizationId) return false;
  if (filter.workspaceId && execution.tenant.workspaceId !== filter.workspaceId) return false;
  if (filter.status && execution.status !== filter.status) return false;
  if (filter.intent && execution.intent !== filter.intent) return false;
  return true;
}

export class MemoryExecutionStore implements ExecutionStore {
  private executions = new Map<string, Execution>();

  async save(execution: Execution): Promise<void> {
    this.executions.set(execution.executionId, cloneExecution(execution));
  }

  async get(executionId: string): Promise<Execution | null> {
    const found = this.executions.get(executionId);
    return found ? cloneExecution(found) : null;
  }

  async list(filter: ExecutionFilter = {}): Promise<Execution[]> {
    return Array.from(this.executions.values())
      .filter((e) => matchesExecution(e, filter))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(0, filter.limit ?? DEFAULT_LIST_LIMIT)
      .map(cloneExecution);
  }

  close(): void {
    this.executions.clear();
  }
}
