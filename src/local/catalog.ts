/**
 * In-memory asset catalog.
 *
 * Assets live in the tenant's `org/workspace` namespace. Tags are checked against
 * the tag schema, and registering a new version of a known asset runs schema
 * drift detection against the previous version.
 */

import { PortFailure } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { TenantContext } from '../core/types.js';
import { isJsonObject, isRecord } from '../core/types.js';
import type { CatalogNamespaceManager } from '../catalog/namespacing.js';
import { createCatalogEntry, fullyQualifiedName } from '../catalog/namespacing.js';
import type { TagSchema } from '../catalog/tagging.js';
import type { DriftDetector, DriftEvent } from '../policies/drift-control.js';
import type { AssetCardRequest, AssetCatalog, AssetRecord } from '../units/ports.js';

export const CARD_SCHEME = 'catalog://';

interface StoredAsset {
  record: AssetRecord;
  namespace: string;
  tags: Record<string, string>;
}

function stringTags(value: unknown): Record<string, string> {
  const tags: Record<string, string> = {};
  if (!isRecord(value)) return tags;
  for (const [key, tag] of Object.entries(value)) {
    if (typeof tag === 'string') tags[key] = tag;
  }
  return tags;
}

export class LocalCatalog implements AssetCatalog {
  private assets = new Map<string, StoredAsset>();
  private byCardRef = new Map<string, string>();
  private log: Logger;

  constructor(
    private namespaces: CatalogNamespaceManager,
    private tagSchema: TagSchema | null,
    private drift: DriftDetector,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('local-catalog');
  }

  async createCard(tenant: TenantContext, card: AssetCardRequest): Promise<string> {
    const namespace = this.namespaces.createNamespace(tenant.organizationId, tenant.workspaceId);

    let tags = stringTags(card.metadata['tags']);
    if (this.tagSchema) {
      const check = this.tagSchema.validateTags(tags);
      if (!check.valid) {
        throw new PortFailure('invalid', check.errors.join('; '));
      }
      tags = this.tagSchema.applyDefaults(tags);
    }

    const duplicate = this.namespaces
      .entries(namespace)
      .some((entry) => entry.name === card.name && entry.version === card.version);
    if (duplicate) {
      throw new PortFailure('conflict', `Asset ${card.name}:${card.version} already exists`);
    }

    const previous = this.namespaces.latestEntry(namespace, card.name);
    const location = card.metadata['location'];

    const entry = this.namespaces.registerEntry(
      namespace,
      createCatalogEntry({
        entryId: card.assetId,
        entryType: card.assetType,
        name: card.name,
        version: card.version,
        ownerOrg: tenant.organizationId,
        ownerWorkspace: tenant.workspaceId,
        ownerUser: tenant.userId,
        tags,
      }),
    );

    const cardRef = `${CARD_SCHEME}${fullyQualifiedName(entry)}`;
    const record: AssetRecord = {
      assetId: card.assetId,
      assetType: card.assetType,
      name: card.name,
      version: card.version,
      cardRef,
      metadata: { ...card.metadata, tags },
      storageLocations: typeof location === 'string' && location !== '' ? [location] : [],
      organizationId: tenant.organizationId,
      workspaceId: tenant.workspaceId,
      registeredAt: entry.createdAt,
    };
    this.assets.set(card.assetId, { record, namespace, tags });
    this.byCardRef.set(cardRef, card.assetId);

    if (previous) {
      this.checkSchemaDrift(previous.entryId, record, namespace, tags);
    }

    this.log.info('Asset registered', { assetId: card.assetId, cardRef });
    return cardRef;
  }

  async getAsset(assetRef: string, tenant: TenantContext): Promise<AssetRecord | null> {
    const stored = this.lookup(assetRef);
    if (!stored || !this.namespaces.canAccess(stored.namespace, tenant)) return null;
    return stored.record;
  }

  /** Add a storage location (a replica, say) to an asset. */
  addStorageLocation(assetRef: string, location: string): boolean {
    const stored = this.lookup(assetRef);
    if (!stored) return false;
    if (!stored.record.storageLocations.includes(location)) {
      stored.record.storageLocations.push(location);
    }
    return true;
  }

  private lookup(assetRef: string): StoredAsset | undefined {
    const assetId = this.byCardRef.get(assetRef) ?? assetRef;
    return this.assets.get(assetId);
  }

  private checkSchemaDrift(previousId: string, current: AssetRecord, namespace: string, tags: Record<string, string>): void {
    const previous = this.assets.get(previousId);
    if (!previous) return;

    const before = previous.record.metadata['schema'];
    const after = current.metadata['schema'];
    const event = this.drift.detectSchemaDrift(
      current.assetId,
      isJsonObject(before) ? before : {},
      isJsonObject(after) ? after : {},
    );
    if (!event) return;

    const placed: DriftEvent = { ...event, assetName: current.name, namespace };
    this.drift.recordEvent(placed);

    const policies = this.drift.applicablePolicies('schema', namespace, tags).map((p) => p.name);
    this.log.warn('Schema drift detected', {
      assetId: current.assetId,
      severity: placed.severity,
      description: placed.driftDescription,
      policies,
    });
  }
}
