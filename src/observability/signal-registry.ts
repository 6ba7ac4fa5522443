/**
 * Feedback signal registry: the metric, outcome and advisor definitions
 * loaded from `feedback_signals/*.json`.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { FABRIC_DOMAIN } from '../core/types.js';
import type { SchemaObject } from '../core/validation.js';
import { compileSchema, nonEmptyString, validate } from '../core/validation.js';

export type SignalType = 'metric' | 'outcome' | 'advisor';
export type EmissionCondition = 'always' | 'on_success' | 'on_failure';

export const SIGNAL_TYPES: readonly SignalType[] = ['metric', 'outcome', 'advisor'];

export interface IntendedConsumer {
  consumer: string;
  purpose: string;
}

export interface SignalDefinition {
  name: string;
  version: string;
  domain: string;
  signalType: SignalType;
  description: string;
  emissionTrigger: { executionUnits: string[]; condition: EmissionCondition };
  /** JSON Schema every emitted payload must satisfy */
  schema: SchemaObject;
  intendedConsumers: IntendedConsumer[];
}

interface SignalFile {
  metadata: { name: string; version: string; domain: string };
  signal_type: SignalType;
  description: string;
  emission_trigger: { execution_units: string[]; condition: EmissionCondition };
  schema: SchemaObject;
  intended_consumers: IntendedConsumer[];
}

const checkSignalFile = compileSchema<SignalFile>({
  type: 'object',
  required: ['metadata', 'signal_type', 'emission_trigger'],
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
    signal_type: { enum: SIGNAL_TYPES },
    description: { type: 'string', default: '' },
    emission_trigger: {
      type: 'object',
      required: ['execution_units'],
      properties: {
        execution_units: { type: 'array', items: { type: 'string' } },
        condition: { enum: ['always', 'on_success', 'on_failure'], default: 'always' },
      },
    },
    schema: { type: 'object', default: {} },
    intended_consumers: {
      type: 'array',
      default: [],
      items: {
        type: 'object',
        required: ['consumer'],
        properties: { consumer: nonEmptyString, purpose: { type: 'string', default: '' } },
      },
    },
  },
});

export function parseSignalDefinition(data: unknown): SignalDefinition | string {
  const parsed = validate(checkSignalFile, data);
  if (!parsed.ok) return parsed.error;
  const file = parsed.value;
  return {
    name: file.metadata.name,
    version: file.metadata.version,
    domain: file.metadata.domain,
    signalType: file.signal_type,
    description: file.description,
    emissionTrigger: {
      executionUnits: file.emission_trigger.execution_units,
      condition: file.emission_trigger.condition,
    },
    schema: file.schema,
    intendedConsumers: file.intended_consumers,
  };
}

export interface SignalCount {
  metrics: number;
  outcomes: number;
  advisors: number;
  total: number;
}

export class FeedbackSignalRegistry {
  private signals = new Map<string, SignalDefinition>();
  private log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger('signal-registry');
  }

  /** Load every definition in `dir`. Invalid files are logged and skipped. Returns how many loaded. */
  async loadFromDirectory(dir: string): Promise<number> {
    let files: string[];
    try {
      files = (await readdir(dir)).filter((f) => f.endsWith('.json')).sort();
    } catch (err) {
      this.log.warn('Signal directory unreadable', { dir, error: errorMessage(err) });
      return 0;
    }

    let loaded = 0;
    for (const file of files) {
      const path = join(dir, file);
      try {
        const definition = parseSignalDefinition(JSON.parse(await readFile(path, 'utf8')));
        if (typeof definition === 'string') {
          this.log.warn('Invalid signal definition', { file: path, error: definition });
          continue;
        }
        this.register(definition);
        loaded++;
      } catch (err) {
        this.log.warn('Failed to load signal definition', { file: path, error: errorMessage(err) });
      }
    }
    return loaded;
  }

  register(definition: SignalDefinition): void {
    this.signals.set(definition.name, definition);
  }

  getSignal(name: string): SignalDefinition | null {
    return this.signals.get(name) ?? null;
  }

  getSignalsByType(signalType: SignalType): SignalDefinition[] {
    return this.getAllSignals().filter((s) => s.signalType === signalType);
  }

  getSignalsForExecutionUnit(unitName: string): SignalDefinition[] {
    return this.getAllSignals().filter((s) => s.emissionTrigger.executionUnits.includes(unitName));
  }

  getAllSignals(): SignalDefinition[] {
    return Array.from(this.signals.values());
  }

  getSignalCount(): SignalCount {
    const metrics = this.getSignalsByType('metric').length;
    const outcomes = this.getSignalsByType('outcome').length;
    const advisors = this.getSignalsByType('advisor').length;
    return { metrics, outcomes, advisors, total: metrics + outcomes + advisors };
  }
}
