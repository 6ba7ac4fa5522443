/**
 * QualityGateEvaluator: pass/fail decision for a dataset against quality rules.
 */

import { isPortFailure } from '../core/errors.js';
import { fail, succeed } from '../core/types.js';
import type { QualityEvaluation, QualityRule } from './ports.js';
import type { QualityGateInput, QualityGateResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const qualityGateEvaluator = defineUnit<
  QualityGateInput,
  QualityGateResult,
  'qualityRules' | 'datasets' | 'quality'
>({
  name: 'QualityGateEvaluator',
  inputSchema: {
    type: 'object',
    required: ['datasetRef', 'qualityRulesRef'],
    properties: {
      datasetRef: { type: 'string', minLength: 1 },
      qualityRulesRef: { type: 'string', minLength: 1 },
      thresholds: { type: 'object', additionalProperties: { type: 'number' }, default: {} },
    },
  },

  async execute(input, tenant, ports) {
    let rules: QualityRule[];
    try {
      rules = await ports.qualityRules.resolve(input.qualityRulesRef, tenant);
    } catch (err) {
      if (isPortFailure(err)) return fail('RULES_INVALID', `Invalid quality rules: ${err.message}`, { inconclusive: false });
      throw err;
    }

    let data: Uint8Array;
    try {
      data = await ports.datasets.read(input.datasetRef, tenant);
    } catch (err) {
      if (isPortFailure(err)) {
        return fail('DATASET_READ_FAILURE', `Failed to read dataset: ${err.message}`, { inconclusive: true });
      }
      throw err;
    }

    let evaluation: QualityEvaluation;
    try {
      evaluation = await ports.quality.evaluate(data, rules, input.thresholds);
    } catch (err) {
      if (isPortFailure(err, 'timeout')) {
        return fail('EVALUATION_TIMEOUT', 'Quality evaluation timed out', { inconclusive: true });
      }
      if (isPortFailure(err)) return fail('RULES_INVALID', `Invalid quality rules: ${err.message}`, { inconclusive: false });
      throw err;
    }

    const gate: QualityGateResult = {
      result: evaluation.passed ? 'pass' : 'fail',
      metricValues: evaluation.metricValues,
      violations: evaluation.violations,
      evaluatedAt: nowIso(),
    };
    return succeed(gate, { inconclusive: false });
  },
});
