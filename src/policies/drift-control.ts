/**
 * Catalog drift control: detection of schema, freshness and quality drift,
 * plus the policies that scope it.
 */

import { randomUUID } from 'node:crypto';
import type { JsonObject } from '../core/types.js';
import { isRecord } from '../core/types.js';

export type DriftType = 'schema' | 'data' | 'metadata' | 'lineage' | 'freshness' | 'quality';
export type DriftSeverity = 'info' | 'warning' | 'error' | 'critical';
export type DetectionFrequency = 'realtime' | 'hourly' | 'daily' | 'weekly';
export type DriftEventStatus = 'open' | 'acknowledged' | 'resolved' | 'ignored';

export interface DriftPolicy {
  policyId: string;
  name: string;
  driftType: DriftType;
  detectionEnabled: boolean;
  detectionFrequency: DetectionFrequency;
  warningThreshold: number | null;
  errorThreshold: number | null;
  autoRemediate: boolean;
  notifyOwners: boolean;
  blockDownstream: boolean;
  requireApproval: boolean;
  /** Namespace prefixes; empty applies everywhere */
  applyToNamespaces: string[];
  /** Every listed tag must match exactly */
  applyToTags: Record<string, string>;
}

export function createDriftPolicy(fields: Partial<DriftPolicy> & Pick<DriftPolicy, 'name' | 'driftType'>): DriftPolicy {
  return {
    policyId: randomUUID(),
    detectionEnabled: true,
    detectionFrequency: 'hourly',
    warningThreshold: null,
    errorThreshold: null,
    autoRemediate: false,
    notifyOwners: true,
    blockDownstream: false,
    requireApproval: false,
    applyToNamespaces: [],
    applyToTags: {},
    ...fields,
  };
}

export function policyApplies(policy: DriftPolicy, namespace: string, tags: Record<string, string>): boolean {
  if (policy.applyToNamespaces.length > 0 && !policy.applyToNamespaces.some((ns) => namespace.startsWith(ns))) {
    return false;
  }
  return Object.entries(policy.applyToTags).every(([key, value]) => tags[key] === value);
}

export interface DriftEvent {
  eventId: string;
  driftType: DriftType;
  severity: DriftSeverity;
  assetId: string;
  assetName: string;
  namespace: string;
  previousState: JsonObject;
  currentState: JsonObject;
  driftDescription: string;
  detectedAt: string;
  status: DriftEventStatus;
  resolvedBy: string | null;
  resolvedAt: string | null;
}

function newEvent(
  fields: Pick<DriftEvent, 'driftType' | 'severity' | 'assetId' | 'previousState' | 'currentState' | 'driftDescription'>,
): DriftEvent {
  return {
    eventId: randomUUID(),
    assetName: '',
    namespace: '',
    detectedAt: new Date().toISOString(),
    status: 'open',
    resolvedBy: null,
    resolvedAt: null,
    ...fields,
  };
}

/** Column name → declared type, from `{columns: [{name, type}]}`. */
function columnTypes(schema: JsonObject): Map<string, string | undefined> {
  const columns = new Map<string, string | undefined>();
  const list = schema['columns'];
  if (!Array.isArray(list)) return columns;
  for (const column of list) {
    if (!isRecord(column) || typeof column['name'] !== 'string') continue;
    const type = column['type'];
    columns.set(column['name'], typeof type === 'string' ? type : undefined);
  }
  return columns;
}

export interface DriftEventFilter {
  assetId?: string;
  namespace?: string;
}

export class DriftDetector {
  private policies = new Map<string, DriftPolicy>();
  private events: DriftEvent[] = [];

  registerPolicy(policy: DriftPolicy): void {
    this.policies.set(policy.policyId, policy);
  }

  /** Enabled policies of `driftType` that cover the given scope. */
  applicablePolicies(driftType: DriftType, namespace: string, tags: Record<string, string>): DriftPolicy[] {
    return Array.from(this.policies.values()).filter(
      (p) => p.detectionEnabled && p.driftType === driftType && policyApplies(p, namespace, tags),
    );
  }

  detectSchemaDrift(assetId: string, previousSchema: JsonObject, currentSchema: JsonObject): DriftEvent | null {
    const before = columnTypes(previousSchema);
    const after = columnTypes(currentSchema);
    const details: string[] = [];

    const added = [...after.keys()].filter((name) => !before.has(name));
    if (added.length > 0) details.push(`Added columns: ${added.join(', ')}`);

    const removed = [...before.keys()].filter((name) => !after.has(name));
    if (removed.length > 0) details.push(`Removed columns: ${removed.join(', ')}`);

    for (const [name, previousType] of before) {
      if (!after.has(name)) continue;
      const currentType = after.get(name);
      if (previousType !== currentType) {
        details.push(`Type change for ${name}: ${previousType ?? 'none'} -> ${currentType ?? 'none'}`);
      }
    }

    if (details.length === 0) return null;

    return newEvent({
      driftType: 'schema',
      severity: removed.length > 0 ? 'error' : 'warning',
      assetId,
      previousState: previousSchema,
      currentState: currentSchema,
      driftDescription: details.join('; '),
    });
  }

  detectFreshnessDrift(
    assetId: string,
    lastUpdate: Date,
    expectedFrequencyHours = 24,
    now: Date = new Date(),
  ): DriftEvent | null {
    const ageHours = (now.getTime() - lastUpdate.getTime()) / 3_600_000;
    if (ageHours <= expectedFrequencyHours) return null;

    let severity: DriftSeverity = 'warning';
    if (ageHours > expectedFrequencyHours * 2) severity = 'error';
    if (ageHours > expectedFrequencyHours * 5) severity = 'critical';

    return newEvent({
      driftType: 'freshness',
      severity,
      assetId,
      previousState: { expectedFrequencyHours },
      currentState: { ageHours },
      driftDescription: `Data is ${ageHours.toFixed(1)} hours old, expected refresh every ${expectedFrequencyHours} hours`,
    });
  }

  detectQualityDrift(
    assetId: string,
    baselineMetrics: Record<string, number>,
    currentMetrics: Record<string, number>,
    thresholdPct = 0.1,
  ): DriftEvent | null {
    const details: string[] = [];

    for (const [metric, baseline] of Object.entries(baselineMetrics)) {
      if (baseline <= 0) continue;
      const current = currentMetrics[metric] ?? 0;
      const change = Math.abs(current - baseline) / baseline;
      if (change > thresholdPct) {
        details.push(`${metric}: ${baseline.toFixed(2)} -> ${current.toFixed(2)} (${(change * 100).toFixed(1)}% change)`);
      }
    }

    if (details.length === 0) return null;

    return newEvent({
      driftType: 'quality',
      severity: 'warning',
      assetId,
      previousState: { ...baselineMetrics },
      currentState: { ...currentMetrics },
      driftDescription: details.join('; '),
    });
  }

  recordEvent(event: DriftEvent): void {
    this.events.push(event);
  }

  getOpenEvents(filter: DriftEventFilter = {}): DriftEvent[] {
    return this.events.filter(
      (e) =>
        e.status === 'open' &&
        (filter.assetId === undefined || e.assetId === filter.assetId) &&
        (filter.namespace === undefined || e.namespace.startsWith(filter.namespace)),
    );
  }

  /** Returns false when no event has that id. */
  resolveEvent(eventId: string, resolvedBy: string): boolean {
    const event = this.events.find((e) => e.eventId === eventId);
    if (!event) return false;
    event.status = 'resolved';
    event.resolvedBy = resolvedBy;
    event.resolvedAt = new Date().toISOString();
    return true;
  }
}

export const STANDARD_DRIFT_POLICIES: readonly DriftPolicy[] = [
  createDriftPolicy({
    name: 'schema_drift_production',
    driftType: 'schema',
    detectionFrequency: 'realtime',
    blockDownstream: true,
    requireApproval: true,
    applyToTags: { environment: 'production' },
  }),
  createDriftPolicy({
    name: 'schema_drift_development',
    driftType: 'schema',
    detectionFrequency: 'daily',
    notifyOwners: false,
    applyToTags: { environment: 'development' },
  }),
  createDriftPolicy({
    name: 'freshness_sla',
    driftType: 'freshness',
    warningThreshold: 1.5,
    errorThreshold: 2.0,
    applyToTags: { data_quality: 'gold' },
  }),
  createDriftPolicy({
    name: 'quality_monitoring',
    driftType: 'quality',
    detectionFrequency: 'daily',
    warningThreshold: 0.05,
    errorThreshold: 0.1,
    applyToTags: { data_quality: 'gold' },
  }),
];

export function createStandardDriftDetector(): DriftDetector {
  const detector = new DriftDetector();
  for (const policy of STANDARD_DRIFT_POLICIES) {
    detector.registerPolicy(policy);
  }
  return detector;
}
