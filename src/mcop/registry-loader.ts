/**
 * Registry card loader: reads `registry_cards/*.json` and registers each card.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { JsonObject } from '../core/types.js';
import { FABRIC_DOMAIN } from '../core/types.js';
import { errorMessage } from '../core/errors.js';
import { compileSchema, nonEmptyString, validate } from '../core/validation.js';
import type { RegistryClient } from './capability-registry.js';

// ── Card File Format ──

interface CardFile {
  metadata: { name: string; version: string; domain: string };
  capability: {
    type: string;
    tags: string[];
    description: string;
    profile?: { compute_class: string; memory_requirements: string; io_pattern: string };
  };
  input_contract: JsonObject;
  output_contract: JsonObject;
  consumer_intents: string[];
  failure_modes: string[];
}

const stringList = { type: 'array', items: { type: 'string' }, default: [] } as const;

const checkCardFile = compileSchema<CardFile>({
  type: 'object',
  required: ['metadata', 'capability'],
  properties: {
    metadata: {
      type: 'object',
      required: ['name'],
      properties: {
        name: nonEmptyString,
        version: { type: 'string', default: '1.0.0' },
        domain: { type: 'string', default: FABRIC_DOMAIN },
      },
    },
    capability: {
      type: 'object',
      required: ['type'],
      properties: {
        type: nonEmptyString,
        tags: stringList,
        description: { type: 'string', default: '' },
        profile: {
          type: 'object',
          required: ['compute_class', 'memory_requirements', 'io_pattern'],
          properties: {
            compute_class: { type: 'string' },
            memory_requirements: { type: 'string' },
            io_pattern: { type: 'string' },
          },
        },
      },
    },
    input_contract: { type: 'object', default: {} },
    output_contract: { type: 'object', default: {} },
    consumer_intents: stringList,
    failure_modes: stringList,
  },
});

/** A parsed registry card. */
export interface RegistryCard {
  name: string;
  version: string;
  domain: string;
  capabilityType: string;
  capabilityTags: string[];
  description: string;
  /** Scheduling hints, when the card declares them */
  profile: { computeClass: string; memoryRequirements: string; ioPattern: string } | null;
  inputContract: JsonObject;
  outputContract: JsonObject;
  consumerIntents: string[];
  failureModes: string[];
}

export function parseCard(data: unknown): RegistryCard | string {
  const parsed = validate(checkCardFile, data);
  if (!parsed.ok) return parsed.error;
  const { metadata, capability } = parsed.value;
  return {
    name: metadata.name,
    version: metadata.version,
    domain: metadata.domain,
    capabilityType: capability.type,
    capabilityTags: capability.tags,
    description: capability.description,
    profile: capability.profile
      ? {
          computeClass: capability.profile.compute_class,
          memoryRequirements: capability.profile.memory_requirements,
          ioPattern: capability.profile.io_pattern,
        }
      : null,
    inputContract: parsed.value.input_contract,
    outputContract: parsed.value.output_contract,
    consumerIntents: parsed.value.consumer_intents,
    failureModes: parsed.value.failure_modes,
  };
}

// ── Loader ──

export class RegistryCardLoader {
  private registered = new Map<string, string>();
  private log: Logger;

  constructor(
    private client: RegistryClient,
    private cardsDir: string,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('registry-loader');
  }

  /** Read every card in the directory; unreadable or invalid files are logged and skipped. */
  async discoverCards(): Promise<RegistryCard[]> {
    let files: string[];
    try {
      files = (await readdir(this.cardsDir)).filter((f) => f.endsWith('.json')).sort();
    } catch (err) {
      this.log.warn('Registry card directory unreadable', { dir: this.cardsDir, error: errorMessage(err) });
      return [];
    }

    const cards: RegistryCard[] = [];
    for (const file of files) {
      const path = join(this.cardsDir, file);
      let data: unknown;
      try {
        data = JSON.parse(await readFile(path, 'utf8'));
      } catch (err) {
        this.log.warn('Failed to load card', { file: path, error: errorMessage(err) });
        continue;
      }
      const card = parseCard(data);
      if (typeof card === 'string') {
        this.log.warn('Invalid card', { file: path, error: card });
        continue;
      }
      cards.push(card);
    }
    return cards;
  }

  /** Register every discovered card. Returns card name → card id for the ones that registered. */
  async loadAll(cards?: RegistryCard[]): Promise<Record<string, string>> {
    const results: Record<string, string> = {};
    for (const card of cards ?? (await this.discoverCards())) {
      try {
        const cardId = await this.client.registerCapability({
          name: card.name,
          version: card.version,
          domain: card.domain,
          capabilityType: card.capabilityType,
          tags: card.capabilityTags,
          description: card.description,
          inputContract: card.inputContract,
          outputContract: card.outputContract,
          consumerIntents: card.consumerIntents,
          metadata: {
            failureModes: card.failureModes,
            registeredAt: new Date().toISOString(),
          },
        });
        results[card.name] = cardId;
        this.registered.set(card.name, cardId);
      } catch (err) {
        this.log.warn('Failed to register card', { card: card.name, error: errorMessage(err) });
      }
    }
    this.log.info('Registry cards loaded', { count: Object.keys(results).length });
    return results;
  }

  /** Unregister everything this loader registered. Returns card name → success. */
  async unloadAll(): Promise<Record<string, boolean>> {
    const results: Record<string, boolean> = {};
    for (const [name, cardId] of Array.from(this.registered)) {
      try {
        const removed = await this.client.unregisterCapability(cardId);
        results[name] = removed;
        if (removed) this.registered.delete(name);
      } catch (err) {
        this.log.warn('Failed to unregister card', { card: name, error: errorMessage(err) });
        results[name] = false;
      }
    }
    return results;
  }

  getRegisteredCards(): Record<string, string> {
    return Object.fromEntries(this.registered);
  }

  getCardCount(): number {
    return this.registered.size;
  }
}
