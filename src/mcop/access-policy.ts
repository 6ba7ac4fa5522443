/**
 * Intent access policy and its audit trail.
 */

import type { CatalogNamespaceManager } from '../catalog/namespacing.js';
import type { JsonValue, TenantContext } from '../core/types.js';
import { CARD_SCHEME } from '../local/catalog.js';

export type PolicyDecision = 'allow' | 'deny';

export interface AccessDecision {
  decision: PolicyDecision;
  reason: string;
}

export interface AccessPolicy {
  evaluate(intent: string, inputs: JsonValue, tenant: TenantContext): AccessDecision;
}

// ── Audit Log ──

export type AuditDecision = 'allowed' | 'denied';

export interface AuditEntry {
  timestamp: string;
  decision: AuditDecision;
  intent: string;
  organizationId: string;
  workspaceId: string;
  userId: string;
  reason: string;
  /** The reference that decided a denial */
  resource?: string;
}

export class IntentAuditLog {
  private entries: AuditEntry[] = [];

  constructor(private maxEntries = 10_000) {}

  allowed(intent: string, tenant: TenantContext, reason: string): void {
    this.append({ decision: 'allowed', intent, ...tenant, reason });
  }

  denied(intent: string, tenant: TenantContext, reason: string, resource?: string): void {
    this.append({ decision: 'denied', intent, ...tenant, reason, ...(resource === undefined ? {} : { resource }) });
  }

  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  getByDecision(decision: AuditDecision): AuditEntry[] {
    return this.entries.filter((e) => e.decision === decision);
  }

  getByOrganization(organizationId: string): AuditEntry[] {
    return this.entries.filter((e) => e.organizationId === organizationId);
  }

  clear(): void {
    this.entries = [];
  }

  toJSON(): string {
    return JSON.stringify(this.entries, null, 2);
  }

  private append(entry: Omit<AuditEntry, 'timestamp'>): void {
    this.entries.push({ timestamp: new Date().toISOString(), ...entry });
    if (this.entries.length > this.maxEntries) this.entries.shift();
  }
}

// ── Policies ──

/** Every `catalog://` string anywhere in the value. */
export function catalogRefs(value: JsonValue): string[] {
  if (typeof value === 'string') return value.startsWith(CARD_SCHEME) ? [value] : [];
  if (Array.isArray(value)) return value.flatMap(catalogRefs);
  if (value !== null && typeof value === 'object') return Object.values(value).flatMap(catalogRefs);
  return [];
}

/** `catalog://org/ws/name@1.0.0` → `org/ws` */
export function namespaceOfRef(ref: string): string {
  const path = ref.slice(CARD_SCHEME.length);
  const cut = path.lastIndexOf('/');
  return cut === -1 ? '' : path.slice(0, cut);
}

/** Denies an intent whose inputs name a catalog namespace the tenant cannot reach. */
export class CatalogAccessPolicy implements AccessPolicy {
  constructor(
    private namespaces: CatalogNamespaceManager,
    private audit: IntentAuditLog,
  ) {}

  evaluate(intent: string, inputs: JsonValue, tenant: TenantContext): AccessDecision {
    for (const ref of catalogRefs(inputs)) {
      const namespace = namespaceOfRef(ref);
      if (!this.namespaces.canAccess(namespace, tenant)) {
        const reason = `Tenant ${tenant.organizationId}/${tenant.workspaceId} cannot access namespace ${namespace}`;
        this.audit.denied(intent, tenant, reason, ref);
        return { decision: 'deny', reason };
      }
    }
    const reason = 'All catalog references within tenant scope';
    this.audit.allowed(intent, tenant, reason);
    return { decision: 'allow', reason };
  }
}

export const allowAllPolicy: AccessPolicy = {
  evaluate: () => ({ decision: 'allow', reason: 'No access policy configured' }),
};
