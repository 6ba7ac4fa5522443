/**
 * Intent handler: maps data-fabric intents to ordered execution unit steps.
 *
 * The handler only decomposes. Running the steps is the gateway's job, and
 * the control plane's intent engine may be told about the decomposition.
 */

import { errorMessage } from '../core/errors.js';
import { FABRIC_DOMAIN, isRecord } from '../core/types.js';
import type { UnitName } from '../units/types.js';
import { getUnit } from '../units/index.js';

// ── Types ──

export type RateClass = 'read' | 'write' | 'compute';

/** Fills `target` in a step's input, when absent, from an earlier result or the execution context. */
export type StepBinding =
  | { target: string; from: { step: number; field: string } }
  | { target: string; from: { context: 'executionId' | 'intentId' } };

export interface IntentStep {
  unit: UnitName;
  capabilityType: string;
  /** Key of `inputs` that holds this step's input; null takes `inputs` whole */
  inputKey: string | null;
  bindings: StepBinding[];
  /** Stop the execution, successfully, when the step's result field has this value */
  haltWhen?: { field: string; equals: string };
}

export interface IntentDefinition {
  intent: IntentName;
  rateClass: RateClass;
  steps: IntentStep[];
}

export interface ExecutionUnitSpec {
  name: UnitName;
  capabilityType: string;
  inputMapping: Record<string, string>;
  domain: string;
}

/** The control plane's intent engine. */
export interface IntentEngine {
  decomposeIntent(intentId: string, executionUnits: ExecutionUnitSpec[]): Promise<boolean>;
}

export type HandleIntentResult =
  | {
      success: true;
      intentId: string;
      intentType: IntentName;
      domain: string;
      executionUnits: ExecutionUnitSpec[];
      unitCount: number;
    }
  | { success: false; error: string; domain: string };

// ── Intent Table ──

export const INTENT_NAMES = [
  'RegisterDataAsset',
  'IngestData',
  'TransformData',
  'MaterializeFeatures',
  'RetrieveFeatures',
  'ProfileData',
  'CommitDataVersion',
  'BranchDataset',
  'MergeDataBranches',
  'CreateLabelTask',
  'TestConnection',
  'DiscoverSchema',
  'ReplicateData',
  'QueryLocality',
  'ValidateSchema',
  'JoinDatasets',
  'AggregateData',
  'RecordLabel',
  'EvaluateQualityGate',
] as const;

export type IntentName = (typeof INTENT_NAMES)[number];

export function isIntentName(value: string): value is IntentName {
  return INTENT_NAMES.some((name) => name === value);
}

function step(
  unit: UnitName,
  capabilityType: string,
  inputKey: string | null,
  extra: Partial<Pick<IntentStep, 'bindings' | 'haltWhen'>> = {},
): IntentStep {
  return { unit, capabilityType, inputKey, bindings: extra.bindings ?? [], ...(extra.haltWhen ? { haltWhen: extra.haltWhen } : {}) };
}

const lineageStep = step('LineageEdgeWriter', 'lineage-recording', 'edgeInput', {
  bindings: [{ target: 'executionRef', from: { context: 'executionId' } }],
});

export const INTENT_DEFINITIONS: Readonly<Record<IntentName, IntentDefinition>> = {
  RegisterDataAsset: {
    intent: 'RegisterDataAsset',
    rateClass: 'write',
    steps: [step('DataAssetRegistrar', 'data-registration', 'assetDeclaration')],
  },
  IngestData: {
    intent: 'IngestData',
    rateClass: 'write',
    steps: [
      step('DataExtractor', 'data-extraction', 'extractionInput'),
      step('DataWriter', 'data-writing', 'writeInput', {
        bindings: [{ target: 'stagingRef', from: { step: 0, field: 'stagingRef' } }],
      }),
      lineageStep,
    ],
  },
  TransformData: {
    intent: 'TransformData',
    rateClass: 'compute',
    steps: [
      step('TransformExecutor', 'data-transformation', 'transformInput'),
      step('DataWriter', 'data-writing', 'writeInput', {
        bindings: [{ target: 'stagingRef', from: { step: 0, field: 'outputStagingRef' } }],
      }),
      lineageStep,
    ],
  },
  MaterializeFeatures: {
    intent: 'MaterializeFeatures',
    rateClass: 'compute',
    steps: [
      step('FeatureComputer', 'feature-computation', 'computeInput'),
      step('FeatureStoreWriter', 'feature-storage', 'writeInput', {
        bindings: [{ target: 'stagingRef', from: { step: 0, field: 'outputStagingRef' } }],
      }),
    ],
  },
  RetrieveFeatures: {
    intent: 'RetrieveFeatures',
    rateClass: 'read',
    steps: [step('FeatureRetriever', 'feature-retrieval', 'retrieveInput')],
  },
  ProfileData: {
    intent: 'ProfileData',
    rateClass: 'compute',
    steps: [step('DataProfiler', 'data-profiling', 'profileInput')],
  },
  CommitDataVersion: {
    intent: 'CommitDataVersion',
    rateClass: 'write',
    steps: [step('DataCommitter', 'data-versioning', 'commitInput')],
  },
  BranchDataset: {
    intent: 'BranchDataset',
    rateClass: 'write',
    steps: [step('BranchCreator', 'data-branching', 'branchInput')],
  },
  MergeDataBranches: {
    intent: 'MergeDataBranches',
    rateClass: 'compute',
    steps: [
      step('MergeComputer', 'data-merging', 'mergeInput', { haltWhen: { field: 'result', equals: 'conflict' } }),
      step('DataCommitter', 'data-versioning', 'commitInput'),
    ],
  },
  CreateLabelTask: {
    intent: 'CreateLabelTask',
    rateClass: 'write',
    steps: [step('LabelTaskCreator', 'labeling-task', 'taskInput')],
  },
  TestConnection: {
    intent: 'TestConnection',
    rateClass: 'read',
    steps: [step('ConnectionProbe', 'connection-testing', 'probeInput')],
  },
  DiscoverSchema: {
    intent: 'DiscoverSchema',
    rateClass: 'read',
    steps: [step('SchemaIntrospector', 'schema-discovery', 'introspectionInput')],
  },
  ReplicateData: {
    intent: 'ReplicateData',
    rateClass: 'write',
    steps: [step('DataReplicator', 'data-replication', 'replicationInput')],
  },
  QueryLocality: {
    intent: 'QueryLocality',
    rateClass: 'read',
    steps: [step('LocalitySignalGenerator', 'locality-signaling', null)],
  },
  ValidateSchema: {
    intent: 'ValidateSchema',
    rateClass: 'compute',
    steps: [step('SchemaValidator', 'schema-validation', 'validationInput')],
  },
  JoinDatasets: {
    intent: 'JoinDatasets',
    rateClass: 'compute',
    steps: [step('DataJoiner', 'data-joining', 'joinInput')],
  },
  AggregateData: {
    intent: 'AggregateData',
    rateClass: 'compute',
    steps: [step('AggregationComputer', 'data-aggregation', 'aggregationInput')],
  },
  RecordLabel: {
    intent: 'RecordLabel',
    rateClass: 'write',
    steps: [step('LabelRecorder', 'label-recording', 'labelInput')],
  },
  EvaluateQualityGate: {
    intent: 'EvaluateQualityGate',
    rateClass: 'compute',
    steps: [step('QualityGateEvaluator', 'quality-evaluation', 'gateInput')],
  },
};

/** Input field → where its value comes from, as `inputKey.field`, `steps[i].field` or `context.name`. */
export function inputMappingFor(intentStep: IntentStep): Record<string, string> {
  const mapping: Record<string, string> = {};
  const properties: unknown = getUnit(intentStep.unit).inputSchema['properties'];
  if (isRecord(properties)) {
    for (const field of Object.keys(properties)) {
      mapping[field] = intentStep.inputKey === null ? field : `${intentStep.inputKey}.${field}`;
    }
  }
  for (const binding of intentStep.bindings) {
    const source = 'step' in binding.from ? `steps[${binding.from.step}].${binding.from.field}` : `context.${binding.from.context}`;
    mapping[binding.target] = `${mapping[binding.target] ?? binding.target} | ${source}`;
  }
  return mapping;
}

// ── Handler ──

export class DataFabricIntentHandler {
  readonly domain = FABRIC_DOMAIN;

  constructor(
    private engine: IntentEngine | null = null,
    private definitions: Readonly<Record<IntentName, IntentDefinition>> = INTENT_DEFINITIONS,
  ) {}

  getDefinition(intentType: string): IntentDefinition | null {
    return isIntentName(intentType) ? this.definitions[intentType] : null;
  }

  getStepsForIntent(intentType: string): IntentStep[] | null {
    return this.getDefinition(intentType)?.steps ?? null;
  }

  isSupportedIntent(intentType: string): intentType is IntentName {
    return isIntentName(intentType);
  }

  rateClassFor(intentType: string): RateClass | null {
    return this.getDefinition(intentType)?.rateClass ?? null;
  }

  async handleIntent(intentId: string, intentType: string): Promise<HandleIntentResult> {
    if (!isIntentName(intentType)) {
      return { success: false, error: `Unsupported intent type: ${intentType}`, domain: this.domain };
    }

    const steps = this.definitions[intentType].steps;
    if (steps.length === 0) {
      return { success: false, error: `No execution units mapped for intent: ${intentType}`, domain: this.domain };
    }

    const executionUnits: ExecutionUnitSpec[] = steps.map((s) => ({
      name: s.unit,
      capabilityType: s.capabilityType,
      inputMapping: inputMappingFor(s),
      domain: this.domain,
    }));

    if (this.engine) {
      try {
        await this.engine.decomposeIntent(intentId, executionUnits);
      } catch (err) {
        return { success: false, error: `Failed to submit decomposition: ${errorMessage(err)}`, domain: this.domain };
      }
    }

    return {
      success: true,
      intentId,
      intentType,
      domain: this.domain,
      executionUnits,
      unitCount: executionUnits.length,
    };
  }

  getSupportedIntents(): IntentName[] {
    return [...INTENT_NAMES];
  }

  getIntentCount(): number {
    return INTENT_NAMES.length;
  }
}
