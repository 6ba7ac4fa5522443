/**
 * Catalog namespaces: hierarchy, tenant isolation and entry registration.
 */

import { randomUUID } from 'node:crypto';
import type { TenantContext } from '../core/types.js';

export type NamespaceLevel = 'organization' | 'workspace' | 'project' | 'dataset';
export type IsolationMode = 'strict' | 'shared' | 'hybrid';
export type CatalogEntryStatus = 'active' | 'deprecated' | 'archived';

export interface NamespaceConfig {
  hierarchy: NamespaceLevel[];
  isolationMode: IsolationMode;
  allowCrossWorkspace: boolean;
  allowCrossOrganization: boolean;
  namingPattern: string;
}

export const DEFAULT_NAMESPACE_CONFIG: Readonly<NamespaceConfig> = {
  hierarchy: ['organization', 'workspace', 'project', 'dataset'],
  isolationMode: 'strict',
  allowCrossWorkspace: false,
  allowCrossOrganization: false,
  namingPattern: '{org}/{workspace}/{project}/{dataset}',
};

/** A namespace may be shallower than the hierarchy but never deeper. */
export function validateNamespace(config: NamespaceConfig, namespace: string): boolean {
  return namespace.split('/').length <= config.hierarchy.length;
}

export function isolationScope(config: NamespaceConfig, tenant: TenantContext): string {
  if (config.isolationMode === 'strict') {
    return `${tenant.organizationId}/${tenant.workspaceId}`;
  }
  return tenant.organizationId;
}

export interface CatalogEntry {
  entryId: string;
  namespace: string;
  /** dataset, feature_set, connection, schema */
  entryType: string;
  name: string;
  version: string;
  ownerOrg: string;
  ownerWorkspace: string;
  ownerUser: string;
  tags: Record<string, string>;
  schemaRef: string | null;
  lineageRefs: string[];
  status: CatalogEntryStatus;
  createdAt: string;
  updatedAt: string;
}

export function createCatalogEntry(fields: Partial<CatalogEntry> & Pick<CatalogEntry, 'name'>): CatalogEntry {
  const now = new Date().toISOString();
  return {
    entryId: randomUUID(),
    namespace: '',
    entryType: 'dataset',
    version: '1.0.0',
    ownerOrg: '',
    ownerWorkspace: '',
    ownerUser: '',
    tags: {},
    schemaRef: null,
    lineageRefs: [],
    status: 'active',
    createdAt: now,
    updatedAt: now,
    ...fields,
  };
}

export function fullyQualifiedName(entry: Pick<CatalogEntry, 'namespace' | 'name' | 'version'>): string {
  return `${entry.namespace}/${entry.name}@${entry.version}`;
}

interface NamespaceRecord {
  createdAt: string;
  entries: CatalogEntry[];
}

export class CatalogNamespaceManager {
  private namespaces = new Map<string, NamespaceRecord>();

  constructor(readonly config: NamespaceConfig = DEFAULT_NAMESPACE_CONFIG) {}

  /** Create (or reuse) `org/ws[/project]`. */
  createNamespace(organizationId: string, workspaceId: string, projectId?: string): string {
    const ns = projectId ? `${organizationId}/${workspaceId}/${projectId}` : `${organizationId}/${workspaceId}`;
    if (!this.namespaces.has(ns)) {
      this.namespaces.set(ns, { createdAt: new Date().toISOString(), entries: [] });
    }
    return ns;
  }

  hasNamespace(namespace: string): boolean {
    return this.namespaces.has(namespace);
  }

  registerEntry(namespace: string, entry: CatalogEntry): CatalogEntry {
    const record = this.namespaces.get(namespace);
    if (!record) {
      throw new Error(`Namespace not found: ${namespace}`);
    }
    const placed: CatalogEntry = { ...entry, namespace, updatedAt: new Date().toISOString() };
    record.entries.push(placed);
    return placed;
  }

  entries(namespace: string): CatalogEntry[] {
    return [...(this.namespaces.get(namespace)?.entries ?? [])];
  }

  /** Most recent entry with this name in the namespace, if any. */
  latestEntry(namespace: string, name: string): CatalogEntry | null {
    return this.entries(namespace).filter((e) => e.name === name).at(-1) ?? null;
  }

  canAccess(namespace: string, tenant: TenantContext): boolean {
    const [org, workspace] = namespace.split('/');
    if (org !== undefined && org !== tenant.organizationId && !this.config.allowCrossOrganization) {
      return false;
    }
    if (workspace !== undefined && workspace !== tenant.workspaceId && !this.config.allowCrossWorkspace) {
      return false;
    }
    return true;
  }

  listAccessible(tenant: TenantContext): string[] {
    return Array.from(this.namespaces.keys()).filter((ns) => this.canAccess(ns, tenant));
  }
}
