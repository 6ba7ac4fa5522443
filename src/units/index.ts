/**
 * Execution unit registry, keyed by unit name.
 */

import type { UnitName } from './types.js';
import type { UnitRunner } from './unit.js';
import { aggregationComputer } from './aggregation-computer.js';
import { branchCreator } from './branch-creator.js';
import { connectionProbe } from './connection-probe.js';
import { dataAssetRegistrar } from './data-asset-registrar.js';
import { dataCommitter } from './data-committer.js';
import { dataExtractor } from './data-extractor.js';
import { dataJoiner } from './data-joiner.js';
import { dataProfiler } from './data-profiler.js';
import { dataReplicator } from './data-replicator.js';
import { dataWriter } from './data-writer.js';
import { featureComputer } from './feature-computer.js';
import { featureRetriever } from './feature-retriever.js';
import { featureStoreWriter } from './feature-store-writer.js';
import { labelRecorder } from './label-recorder.js';
import { labelTaskCreator } from './label-task-creator.js';
import { lineageEdgeWriter } from './lineage-edge-writer.js';
import { localitySignalGenerator } from './locality-signal-generator.js';
import { mergeComputer } from './merge-computer.js';
import { qualityGateEvaluator } from './quality-gate-evaluator.js';
import { schemaIntrospector } from './schema-introspector.js';
import { schemaValidator } from './schema-validator.js';
import { transformExecutor } from './transform-executor.js';

export const UNIT_RUNNERS: Readonly<Record<UnitName, UnitRunner>> = {
  DataAssetRegistrar: dataAssetRegistrar,
  ConnectionProbe: connectionProbe,
  SchemaIntrospector: schemaIntrospector,
  DataExtractor: dataExtractor,
  DataWriter: dataWriter,
  TransformExecutor: transformExecutor,
  DataJoiner: dataJoiner,
  AggregationComputer: aggregationComputer,
  FeatureComputer: featureComputer,
  FeatureStoreWriter: featureStoreWriter,
  FeatureRetriever: featureRetriever,
  DataProfiler: dataProfiler,
  SchemaValidator: schemaValidator,
  DataCommitter: dataCommitter,
  BranchCreator: branchCreator,
  MergeComputer: mergeComputer,
  DataReplicator: dataReplicator,
  LocalitySignalGenerator: localitySignalGenerator,
  LabelTaskCreator: labelTaskCreator,
  LabelRecorder: labelRecorder,
  LineageEdgeWriter: lineageEdgeWriter,
  QualityGateEvaluator: qualityGateEvaluator,
};

export function getUnit(name: UnitName): UnitRunner {
  return UNIT_RUNNERS[name];
}

export {
  aggregationComputer,
  branchCreator,
  connectionProbe,
  dataAssetRegistrar,
  dataCommitter,
  dataExtractor,
  dataJoiner,
  dataProfiler,
  dataReplicator,
  dataWriter,
  featureComputer,
  featureRetriever,
  featureStoreWriter,
  labelRecorder,
  labelTaskCreator,
  lineageEdgeWriter,
  localitySignalGenerator,
  mergeComputer,
  qualityGateEvaluator,
  schemaIntrospector,
  schemaValidator,
  transformExecutor,
};
