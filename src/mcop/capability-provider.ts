/**
 * Capability provider: advertises execution unit profiles and locality
 * signals to the control-plane scheduler.
 */

import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import type { LocalitySignal } from '../units/types.js';
import { isUnitName } from '../units/types.js';
import type { UnitName } from '../units/types.js';
import type { RegistryCard } from './registry-loader.js';

export interface CapabilityProfile {
  capabilityType: string;
  computeClass: string;
  memoryRequirements: string;
  ioPattern: string;
  tags: string[];
}

/** The scheduler side of the control plane. */
export interface McopScheduler {
  provideCapability(unitName: UnitName, profile: CapabilityProfile): Promise<boolean>;
  provideLocalitySignal(intentRef: string, signals: LocalitySignal[]): Promise<boolean>;
}

export interface LocalityReport {
  intentRef: string;
  assetRef: string;
  signals: LocalitySignal[];
  reportedAt: string;
}

export class DataFabricCapabilityProvider {
  private provided = new Set<UnitName>();
  private latestLocality = new Map<string, LocalityReport>();
  private log: Logger;

  constructor(
    private profiles: ReadonlyMap<UnitName, CapabilityProfile>,
    private scheduler: McopScheduler | null = null,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('capability-provider');
  }

  /** Build profiles from the cards that declare scheduling hints. */
  static fromCards(cards: RegistryCard[], scheduler: McopScheduler | null = null, logger?: Logger): DataFabricCapabilityProvider {
    const profiles = new Map<UnitName, CapabilityProfile>();
    for (const card of cards) {
      if (!card.profile || !isUnitName(card.name)) continue;
      profiles.set(card.name, {
        capabilityType: card.capabilityType,
        computeClass: card.profile.computeClass,
        memoryRequirements: card.profile.memoryRequirements,
        ioPattern: card.profile.ioPattern,
        tags: [...card.capabilityTags],
      });
    }
    return new DataFabricCapabilityProvider(profiles, scheduler, logger);
  }

  /** Offer every profile to the scheduler. Without one, every unit reports success. */
  async provideAllCapabilities(): Promise<Record<string, boolean>> {
    const results: Record<string, boolean> = {};
    if (!this.scheduler) {
      for (const name of this.profiles.keys()) results[name] = true;
      return results;
    }

    for (const [name, profile] of this.profiles) {
      try {
        const accepted = await this.scheduler.provideCapability(name, profile);
        results[name] = accepted;
        if (accepted) this.provided.add(name);
      } catch (err) {
        this.log.warn('Failed to provide capability', { unit: name, error: errorMessage(err) });
        results[name] = false;
      }
    }
    return results;
  }

  /** Signals influence placement; they never decide it. */
  async provideLocalitySignals(intentRef: string, assetRef: string, signals: LocalitySignal[]): Promise<boolean> {
    this.latestLocality.set(assetRef, { intentRef, assetRef, signals, reportedAt: new Date().toISOString() });
    if (!this.scheduler) return true;
    try {
      return await this.scheduler.provideLocalitySignal(intentRef, signals);
    } catch (err) {
      this.log.warn('Failed to provide locality signals', { intentRef, assetRef, error: errorMessage(err) });
      return false;
    }
  }

  /** Most recent locality signals reported for an asset. */
  getLocalityReport(assetRef: string): LocalityReport | null {
    return this.latestLocality.get(assetRef) ?? null;
  }

  getCapabilityProfile(unitName: string): CapabilityProfile | null {
    if (!isUnitName(unitName)) return null;
    return this.profiles.get(unitName) ?? null;
  }

  getProvidedCapabilities(): Set<UnitName> {
    return new Set(this.provided);
  }

  getCapabilityCount(): number {
    return this.profiles.size;
  }
}
