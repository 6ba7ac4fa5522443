/**
 * SQLite execution store using better-sqlite3.
 */

import Database from 'better-sqlite3';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import { isRecord } from '../core/types.js';
import type { Execution, ExecutionFilter, ExecutionStore } from '../mcop/execution.js';
import { parseExecution } from '../mcop/execution.js';
import { DEFAULT_LIST_LIMIT } from './memory.js';

export class SqliteExecutionStore implements ExecutionStore {
  private db: Database.Database;
  private log: Logger;

  constructor(dbPath: string = ':memory:', logger?: Logger) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.log = logger ?? createLogger('sqlite-store');
    this.createTables();
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS executions (
        execution_id TEXT PRIMARY KEY,
        intent_id TEXT NOT NULL,
        intent TEXT NOT NULL,
        organization_id TEXT NOT NULL,
        workspace_id TEXT NOT NULL,
        status TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        execution_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_executions_tenant ON executions(organization_id, workspace_id);
      CREATE INDEX IF NOT EXISTS idx_executions_status ON executions(status);
      CREATE INDEX IF NOT EXISTS idx_executions_created ON executions(created_at);
    `);
  }

  async save(e: Execution): Promise<void> {
    this.db.prepare(`
      INSERT OR REPLACE INTO executions (execution_id, intent_id, intent, organization_id, workspace_id, status, created_at, updated_at, execution_json)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      e.executionId,
      e.intentId,
      e.intent,
      e.tenant.organizationId,
      e.tenant.workspaceId,
      e.status,
      e.createdAt,
      e.updatedAt,
      JSON.stringify(e),
    );
  }

  async get(executionId: string): Promise<Execution | null> {
    const row: unknown = this.db.prepare('SELECT execution_json FROM executions WHERE execution_id = ?').get(executionId);
    return this.rowToExecution(row);
  }

  async list(filter: ExecutionFilter = {}): Promise<Execution[]> {
    let sql = 'SELECT execution_json FROM executions WHERE 1=1';
    const params: (string | number)[] = [];
    if (filter.organizationId) { sql += ' AND organization_id = ?'; params.push(filter.organizationId); }
    if (filter.workspaceId) { sql += ' AND workspace_id = ?'; params.push(filter.workspaceId); }
    if (filter.status) { sql += ' AND status = ?'; params.push(filter.status); }
    if (filter.intent) { sql += ' AND intent = ?'; params.push(filter.intent); }
    sql += ' ORDER BY created_at DESC LIMIT ?';
    params.push(filter.limit ?? DEFAULT_LIST_LIMIT);

    const rows: unknown[] = this.db.prepare(sql).all(...params);
    const executions: Execution[] = [];
    for (const row of rows) {
      const execution = this.rowToExecution(row);
      if (execution) executions.push(execution);
    }
    return executions;
  }

  close(): void {
    this.db.close();
  }

  /** Rows that fail validation are logged and treated as absent. */
  private rowToExecution(row: unknown): Execution | null {
    if (!isRecord(row) || typeof row['execution_json'] !== 'string') return null;
    const parsed = parseExecution(row['execution_json']);
    if (!parsed.ok) {
      this.log.error('Corrupt execution row', { error: parsed.error });
      return null;
    }
    return parsed.value;
  }
}
