/**
 * Capability Registry: registration and discovery of execution unit cards.
 */

import { randomUUID } from 'node:crypto';
import type { JsonObject, Result } from '../core/types.js';
import { normalizeDomain } from '../core/types.js';

export interface CapabilityRegistration {
  name: string;
  version: string;
  domain: string;
  capabilityType: string;
  tags: string[];
  description: string;
  inputContract: JsonObject;
  outputContract: JsonObject;
  consumerIntents: string[];
  metadata: JsonObject;
}

export interface RegisteredCapability extends CapabilityRegistration {
  cardId: string;
}

export interface CapabilityFilter {
  domain?: string;
  tag?: string;
  capabilityType?: string;
  /** Only cards that serve this intent */
  intent?: string;
}

/** What the card loader needs from a registry, local or remote. */
export interface RegistryClient {
  registerCapability(registration: CapabilityRegistration): Promise<string>;
  unregisterCapability(cardId: string): Promise<boolean>;
  getCapabilitiesByDomain(domain: string): Promise<RegisteredCapability[]>;
}

/**
 * In-memory capability registry.
 * A name may be registered once per version and domain.
 */
export class CapabilityRegistry implements RegistryClient {
  private cards: Map<string, RegisteredCapability> = new Map();

  register(registration: CapabilityRegistration): Result<RegisteredCapability> {
    const domain = normalizeDomain(registration.domain);
    const taken = this.listAll().some(
      (c) => c.domain === domain && c.name === registration.name && c.version === registration.version,
    );
    if (taken) {
      return { ok: false, error: new Error(`Capability ${registration.name}@${registration.version} already registered`) };
    }

    const card: RegisteredCapability = { ...registration, domain, cardId: randomUUID() };
    this.cards.set(card.cardId, card);
    return { ok: true, value: card };
  }

  resolve(cardId: string): RegisteredCapability | null {
    return this.cards.get(cardId) ?? null;
  }

  /** Latest registration of a unit by name (the last one registered wins). */
  resolveByName(name: string, domain?: string): RegisteredCapability | null {
    const wanted = domain === undefined ? undefined : normalizeDomain(domain);
    const matches = this.listAll().filter((c) => c.name === name && (wanted === undefined || c.domain === wanted));
    return matches.at(-1) ?? null;
  }

  discover(filter: CapabilityFilter): RegisteredCapability[] {
    let results = this.listAll();

    if (filter.domain !== undefined) {
      const domain = normalizeDomain(filter.domain);
      results = results.filter((c) => c.domain === domain);
    }
    if (filter.tag !== undefined) {
      const tag = filter.tag;
      results = results.filter((c) => c.tags.includes(tag));
    }
    if (filter.capabilityType !== undefined) {
      results = results.filter((c) => c.capabilityType === filter.capabilityType);
    }
    if (filter.intent !== undefined) {
      const intent = filter.intent;
      results = results.filter((c) => c.consumerIntents.includes(intent));
    }

    return results;
  }

  unregister(cardId: string): boolean {
    return this.cards.delete(cardId);
  }

  listAll(): RegisteredCapability[] {
    return Array.from(this.cards.values());
  }

  get size(): number {
    return this.cards.size;
  }

  // ── RegistryClient ──

  async registerCapability(registration: CapabilityRegistration): Promise<string> {
    const result = this.register(registration);
    if (!result.ok) throw result.error;
    return result.value.cardId;
  }

  async unregisterCapability(cardId: string): Promise<boolean> {
    return this.unregister(cardId);
  }

  async getCapabilitiesByDomain(domain: string): Promise<RegisteredCapability[]> {
    return this.discover({ domain });
  }
}
