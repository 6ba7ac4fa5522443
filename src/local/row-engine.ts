/**
 * In-process engine over JSON rows. Backs the transform, join, aggregation,
 * feature, profile, validation, quality and merge ports for local runs and tests.
 */

import { PortFailure } from '../core/errors.js';
import { canonicalEquals, canonicalize } from '../core/hashing.js';
import type { JoinType, JsonObject, JsonValue, ValidationMode } from '../core/types.js';
import { compileSchema } from '../core/validation.js';
import type { ColumnStatistics, MergeConflict, QualityViolation, SchemaDiscrepancy } from '../units/types.js';
import type {
  AggregationEngine,
  AggregationOutput,
  ExpectedSchema,
  FeatureDefinition,
  FeatureEngine,
  FeatureOutput,
  JoinEngine,
  JoinOutput,
  MergeEngine,
  MergeOutput,
  ProfileEngine,
  QualityEngine,
  QualityEvaluation,
  QualityRule,
  RawProfile,
  SchemaCheck,
  TransformEngine,
  TransformOutput,
  ValidationEngine,
} from '../units/ports.js';
import { columnsOf, decodeRows, encodeRows, rowKey, typeOf } from './rows.js';
import type { Row } from './rows.js';

/** Below this many profiled rows the statistics are flagged low-confidence. */
export const LOW_CONFIDENCE_ROWS = 30;

export interface RowEngineOptions {
  /** Largest row count any single operation may produce */
  maxRows: number;
}

// ── Transform Definitions ──

export type FilterOperator = 'eq' | 'ne' | 'gt' | 'gte' | 'lt' | 'lte';

export type TransformStep =
  | { op: 'select'; columns: string[] }
  | { op: 'filter'; column: string; operator: FilterOperator; value: JsonValue }
  | { op: 'rename'; from: string; to: string }
  | { op: 'limit'; count: number };

export interface TransformDefinition {
  steps: TransformStep[];
}

const isTransformDefinition = compileSchema<TransformDefinition>({
  type: 'object',
  required: ['steps'],
  properties: {
    steps: {
      type: 'array',
      items: {
        oneOf: [
          {
            type: 'object',
            required: ['op', 'columns'],
            properties: { op: { const: 'select' }, columns: { type: 'array', items: { type: 'string' } } },
          },
          {
            type: 'object',
            required: ['op', 'column', 'operator', 'value'],
            properties: {
              op: { const: 'filter' },
              column: { type: 'string' },
              operator: { enum: ['eq', 'ne', 'gt', 'gte', 'lt', 'lte'] },
            },
          },
          {
            type: 'object',
            required: ['op', 'from', 'to'],
            properties: { op: { const: 'rename' }, from: { type: 'string' }, to: { type: 'string' } },
          },
          {
            type: 'object',
            required: ['op', 'count'],
            properties: { op: { const: 'limit' }, count: { type: 'integer', minimum: 0 } },
          },
        ],
      },
    },
  },
});

const PLACEHOLDER = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;
const WHOLE_PLACEHOLDER = /^\{\{\s*([A-Za-z0-9_]+)\s*\}\}$/;

function lookupParameter(parameters: JsonObject, name: string): JsonValue {
  const value = parameters[name];
  if (value === undefined) {
    throw new PortFailure('invalid', `Missing parameter: ${name}`);
  }
  return value;
}

/** Replace `{{name}}` placeholders; a string that is only a placeholder takes the parameter's JSON value. */
export function substituteParameters(value: JsonValue, parameters: JsonObject): JsonValue {
  if (typeof value === 'string') {
    const whole = WHOLE_PLACEHOLDER.exec(value);
    if (whole?.[1] !== undefined) return lookupParameter(parameters, whole[1]);
    return value.replace(PLACEHOLDER, (_match, name: string) => {
      const replacement = lookupParameter(parameters, name);
      return typeof replacement === 'string' ? replacement : JSON.stringify(replacement);
    });
  }
  if (Array.isArray(value)) return value.map((item) => substituteParameters(item, parameters));
  if (value !== null && typeof value === 'object') {
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) out[key] = substituteParameters(item, parameters);
    return out;
  }
  return value;
}

function compare(cell: JsonValue | undefined, operator: FilterOperator, value: JsonValue): boolean {
  if (operator === 'eq') return canonicalEquals(cell ?? null, value);
  if (operator === 'ne') return !canonicalEquals(cell ?? null, value);

  let order: number;
  if (typeof cell === 'number' && typeof value === 'number') {
    order = cell - value;
  } else if (typeof cell === 'string' && typeof value === 'string') {
    order = cell < value ? -1 : cell > value ? 1 : 0;
  } else {
    return false;
  }

  switch (operator) {
    case 'gt':
      return order > 0;
    case 'gte':
      return order >= 0;
    case 'lt':
      return order < 0;
    case 'lte':
      return order <= 0;
  }
}

function applyStep(rows: Row[], step: TransformStep): Row[] {
  switch (step.op) {
    case 'select':
      return rows.map((row) => {
        const picked: Row = {};
        for (const column of step.columns) {
          const cell = row[column];
          if (cell !== undefined) picked[column] = cell;
        }
        return picked;
      });
    case 'filter':
      return rows.filter((row) => compare(row[step.column], step.operator, step.value));
    case 'rename':
      return rows.map((row) => {
        const renamed: Row = {};
        for (const [key, cell] of Object.entries(row)) renamed[key === step.from ? step.to : key] = cell;
        return renamed;
      });
    case 'limit':
      return rows.slice(0, step.count);
  }
}

// ── Aggregation ──

export type AggregateFunction = 'sum' | 'avg' | 'min' | 'max' | 'count';

const AGGREGATE_FUNCTIONS: readonly AggregateFunction[] = ['sum', 'avg', 'min', 'max', 'count'];

function isAggregateFunction(value: string): value is AggregateFunction {
  return AGGREGATE_FUNCTIONS.some((fn) => fn === value);
}

function requireAggregate(fn: string, column: string): AggregateFunction {
  if (!isAggregateFunction(fn)) {
    throw new PortFailure('invalid', `Unsupported aggregation '${fn}' for column '${column}'`);
  }
  return fn;
}

function reduce(rows: Row[], column: string, fn: AggregateFunction): JsonValue {
  const present = rows.map((row) => row[column]).filter((cell) => cell !== undefined && cell !== null);
  if (fn === 'count') return present.length;

  const numbers = present.filter((cell): cell is number => typeof cell === 'number');
  if (fn === 'sum') return numbers.reduce((acc, n) => acc + n, 0);
  if (numbers.length === 0) return null;
  if (fn === 'avg') return numbers.reduce((acc, n) => acc + n, 0) / numbers.length;
  return fn === 'min' ? smallest(numbers) : largest(numbers);
}

/** Callers pass a non-empty array. */
function smallest(numbers: number[]): number {
  return numbers.reduce((acc, n) => (n < acc ? n : acc), Infinity);
}

function largest(numbers: number[]): number {
  return numbers.reduce((acc, n) => (n > acc ? n : acc), -Infinity);
}

/** Group rows by the canonical form of their key columns, keeping first-seen order. */
function groupRows(rows: Row[], keys: string[]): Map<string, Row[]> {
  const groups = new Map<string, Row[]>();
  for (const row of rows) {
    const id = canonicalize(keys.map((key) => row[key] ?? null));
    const group = groups.get(id);
    if (group) group.push(row);
    else groups.set(id, [row]);
  }
  return groups;
}

function keyColumns(row: Row, keys: string[]): Row {
  const out: Row = {};
  for (const key of keys) out[key] = row[key] ?? null;
  return out;
}

// ── Validation ──

function accepts(expected: string, actual: string): boolean {
  return expected === actual || (expected === 'number' && actual === 'integer');
}

function cellTypes(rows: Row[], column: string): { types: string[]; hasNulls: boolean } {
  const types = new Set<string>();
  let hasNulls = false;
  for (const row of rows) {
    const type = typeOf(row[column]);
    if (type === 'null') hasNulls = true;
    else types.add(type);
  }
  return { types: [...types].sort(), hasNulls };
}

// ── Profiling ──

const PATTERNS: ReadonlyArray<[string, RegExp]> = [
  ['email', /^[^@\s]+@[^@\s]+\.[^@\s]+$/],
  ['uuid', /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i],
  ['timestamp', /^\d{4}-\d{2}-\d{2}(T[\d:.]+(Z|[+-]\d{2}:\d{2})?)?$/],
];

function ratio(part: number, whole: number): number {
  return whole === 0 ? 0 : part / whole;
}

function columnStatistics(rows: Row[], column: string): ColumnStatistics {
  const present = rows.map((row) => row[column]).filter((cell): cell is JsonValue => cell !== undefined && cell !== null);
  const distinct = new Set(present.map((cell) => canonicalize(cell)));
  const numbers = present.filter((cell): cell is number => typeof cell === 'number');
  const strings = present.filter((cell): cell is string => typeof cell === 'string');

  let minValue: JsonValue = null;
  let maxValue: JsonValue = null;
  let meanValue: number | null = null;
  if (numbers.length > 0 && numbers.length === present.length) {
    minValue = smallest(numbers);
    maxValue = largest(numbers);
    meanValue = numbers.reduce((acc, n) => acc + n, 0) / numbers.length;
  } else if (strings.length > 0 && strings.length === present.length) {
    const sorted = [...strings].sort();
    minValue = sorted[0] ?? null;
    maxValue = sorted[sorted.length - 1] ?? null;
  }

  return {
    columnName: column,
    nullCount: rows.length - present.length,
    distinctCount: distinct.size,
    minValue,
    maxValue,
    meanValue,
  };
}

function detectPatterns(rows: Row[], columns: string[]): string[] {
  const detected: string[] = [];
  for (const column of columns) {
    const values = rows.map((row) => row[column]).filter((cell) => cell !== undefined && cell !== null);
    if (values.length === 0 || !values.every((cell) => typeof cell === 'string')) continue;
    for (const [name, pattern] of PATTERNS) {
      if (values.every((cell) => typeof cell === 'string' && pattern.test(cell))) {
        detected.push(`${column}:${name}`);
        break;
      }
    }
  }
  return detected;
}

// ── Engine ──

export class RowEngine
  implements
    TransformEngine,
    JoinEngine,
    AggregationEngine,
    FeatureEngine,
    ProfileEngine,
    ValidationEngine,
    QualityEngine,
    MergeEngine
{
  private readonly options: RowEngineOptions;

  constructor(options: Partial<RowEngineOptions> = {}) {
    this.options = { maxRows: options.maxRows ?? 1_000_000 };
  }

  private guardSize(count: number): void {
    if (count > this.options.maxRows) {
      throw new PortFailure('exhausted', `Operation would produce ${count} rows (limit ${this.options.maxRows})`);
    }
  }

  async apply(input: Uint8Array, definition: JsonObject, parameters: JsonObject): Promise<TransformOutput> {
    const rows = decodeRows(input);
    this.guardSize(rows.length);

    const resolved = substituteParameters(definition, parameters);
    if (!isTransformDefinition(resolved)) {
      throw new PortFailure('invalid', 'Transformation definition must be {steps: [...]} of select, filter, rename or limit');
    }

    const out = resolved.steps.reduce(applyStep, rows);
    return { data: encodeRows(out), rowsIn: rows.length, rowsOut: out.length };
  }

  async join(left: Uint8Array, right: Uint8Array, keys: string[], joinType: JoinType): Promise<JoinOutput> {
    const leftRows = decodeRows(left);
    const rightRows = decodeRows(right);

    for (const [side, rows] of [['left', leftRows], ['right', rightRows]] as const) {
      const columns = new Set(columnsOf(rows));
      for (const key of keys) {
        if (rows.length > 0 && !columns.has(key)) {
          throw new PortFailure('invalid', `Join key '${key}' missing from ${side} input`);
        }
      }
    }

    const index = groupRows(rightRows, keys);
    const matchedRight = new Set<string>();
    const output: Row[] = [];
    let matchedCount = 0;
    let unmatchedLeft = 0;

    for (const row of leftRows) {
      const id = canonicalize(keys.map((key) => row[key] ?? null));
      const matches = index.get(id);
      if (matches) {
        matchedRight.add(id);
        for (const other of matches) output.push({ ...row, ...other });
        matchedCount += matches.length;
      } else {
        unmatchedLeft += 1;
        if (joinType === 'left' || joinType === 'full') output.push({ ...row });
      }
      this.guardSize(output.length);
    }

    let unmatchedRight = 0;
    for (const [id, rows] of index) {
      if (matchedRight.has(id)) continue;
      unmatchedRight += rows.length;
      if (joinType === 'right' || joinType === 'full') {
        for (const row of rows) output.push(row);
      }
    }
    this.guardSize(output.length);

    return { data: encodeRows(output), rowsOutput: output.length, matchedCount, unmatchedLeft, unmatchedRight };
  }

  async aggregate(input: Uint8Array, groupBy: string[], aggregations: Record<string, string>): Promise<AggregationOutput> {
    const rows = decodeRows(input);
    const plan = Object.entries(aggregations).map(([column, fn]) => [column, requireAggregate(fn, column)] as const);

    const out: Row[] = [];
    for (const group of groupRows(rows, groupBy).values()) {
      const first = group[0];
      if (first === undefined) continue;
      const row = keyColumns(first, groupBy);
      for (const [column, fn] of plan) row[`${fn}_${column}`] = reduce(group, column, fn);
      out.push(row);
    }
    this.guardSize(out.length);

    return { data: encodeRows(out), groupCount: out.length };
  }

  async compute(
    source: Uint8Array,
    definition: FeatureDefinition,
    entityKeyColumns: string[],
    window: { start: string; end: string },
  ): Promise<FeatureOutput> {
    const rows = decodeRows(source);
    const columns = new Set(columnsOf(rows));
    for (const key of entityKeyColumns) {
      if (rows.length > 0 && !columns.has(key)) {
        throw new PortFailure('schema_mismatch', key);
      }
    }
    const plan = definition.features.map((f) => ({ ...f, fn: requireAggregate(f.aggregation, f.column) }));

    const start = Date.parse(window.start);
    const end = Date.parse(window.end);
    const inWindow = rows.filter((row) => {
      const ts = row[definition.timestampColumn];
      if (typeof ts !== 'string' && typeof ts !== 'number') return false;
      const at = typeof ts === 'number' ? ts : Date.parse(ts);
      return !Number.isNaN(at) && at >= start && at < end;
    });

    const out: Row[] = [];
    for (const group of groupRows(inWindow, entityKeyColumns).values()) {
      const first = group[0];
      if (first === undefined) continue;
      const row = keyColumns(first, entityKeyColumns);
      for (const feature of plan) row[feature.name] = reduce(group, feature.column, feature.fn);
      out.push(row);
    }

    return { data: encodeRows(out), entityCount: out.length, featureCount: out.length * plan.length };
  }

  async profile(data: Uint8Array, sampleSize: number, depth: string): Promise<RawProfile> {
    const rows = decodeRows(data).slice(0, sampleSize);
    const columns = columnsOf(rows);
    const columnStats = columns.map((column) => columnStatistics(rows, column));

    const cells = rows.length * columns.length;
    const nullCells = columnStats.reduce((acc, s) => acc + s.nullCount, 0);
    const uniqueness = columnStats.map((s) => ratio(s.distinctCount, rows.length - s.nullCount));

    return {
      columnStats,
      qualityScores: {
        completeness: ratio(cells - nullCells, cells),
        uniqueness: ratio(uniqueness.reduce((acc, u) => acc + u, 0), uniqueness.length),
      },
      patterns: depth === 'basic' ? [] : detectPatterns(rows, columns),
      lowConfidence: rows.length < LOW_CONFIDENCE_ROWS,
    };
  }

  async validate(data: Uint8Array, schema: ExpectedSchema, mode: ValidationMode): Promise<SchemaCheck> {
    const rows = decodeRows(data);
    if (rows.length === 0) {
      throw new PortFailure('inference', 'Cannot infer column types from an empty dataset');
    }

    const present = new Set(columnsOf(rows));
    const expectedNames = new Set(schema.fields.map((f) => f.name));
    const discrepancies: SchemaDiscrepancy[] = [];

    for (const field of schema.fields) {
      if (!present.has(field.name)) {
        const required = field.nullable === false;
        if (mode === 'exact' || (mode === 'compatible' && required)) {
          discrepancies.push({ fieldName: field.name, expectedType: field.type, actualType: 'missing', issue: 'missing_field' });
        }
        continue;
      }

      const { types, hasNulls } = cellTypes(rows, field.name);
      const actualType = types.length > 0 ? types.join('|') : 'null';
      if (!types.every((t) => accepts(field.type, t))) {
        discrepancies.push({ fieldName: field.name, expectedType: field.type, actualType, issue: 'type_mismatch' });
      } else if (hasNulls && field.nullable === false) {
        discrepancies.push({ fieldName: field.name, expectedType: field.type, actualType, issue: 'unexpected_nulls' });
      }
    }

    if (mode !== 'compatible') {
      for (const column of present) {
        if (expectedNames.has(column)) continue;
        const { types } = cellTypes(rows, column);
        discrepancies.push({
          fieldName: column,
          expectedType: 'none',
          actualType: types.length > 0 ? types.join('|') : 'null',
          issue: 'unexpected_field',
        });
      }
    }

    return { valid: discrepancies.length === 0, discrepancies };
  }

  async evaluate(data: Uint8Array, rules: QualityRule[], thresholds: Record<string, number>): Promise<QualityEvaluation> {
    const rows = decodeRows(data);
    const metricValues: Record<string, number> = {};
    const violations: QualityViolation[] = [];

    for (const rule of rules) {
      const value = this.measure(rows, rule);
      metricValues[rule.name] = value;
      const threshold = thresholds[rule.name] ?? thresholds[rule.metric];
      if (threshold !== undefined && value < threshold) {
        violations.push({ ruleName: rule.name, expected: threshold, actual: value });
      }
    }

    return { passed: violations.length === 0, metricValues, violations };
  }

  private measure(rows: Row[], rule: QualityRule): number {
    switch (rule.metric) {
      case 'row_count':
        return rows.length;
      case 'completeness': {
        const columns = rule.column !== undefined ? [rule.column] : columnsOf(rows);
        let filled = 0;
        for (const row of rows) {
          for (const column of columns) if (row[column] !== undefined && row[column] !== null) filled += 1;
        }
        return ratio(filled, rows.length * columns.length);
      }
      case 'uniqueness': {
        const column = rule.column;
        if (column === undefined) {
          throw new PortFailure('invalid', `Rule '${rule.name}' needs a column for uniqueness`);
        }
        const values = rows.map((row) => row[column]).filter((cell): cell is JsonValue => cell !== undefined && cell !== null);
        return ratio(new Set(values.map((cell) => canonicalize(cell))).size, values.length);
      }
      default:
        throw new PortFailure('invalid', `Unknown quality metric: ${rule.metric}`);
    }
  }

  async merge(source: Uint8Array, target: Uint8Array, ancestor: Uint8Array): Promise<MergeOutput> {
    const keyed = (rows: Row[]): Map<string, Row> => new Map(rows.map((row, i) => [rowKey(row, i), row]));
    const base = keyed(decodeRows(ancestor));
    const ours = keyed(decodeRows(source));
    const theirs = keyed(decodeRows(target));

    const keys = new Set([...base.keys(), ...ours.keys(), ...theirs.keys()]);
    const conflicts: MergeConflict[] = [];
    const changeset: JsonObject = {};

    for (const key of keys) {
      const before = base.get(key);
      const sourceRow = ours.get(key);
      const targetRow = theirs.get(key);
      const sourceChanged = !canonicalEquals(before, sourceRow);
      const targetChanged = !canonicalEquals(before, targetRow);

      if (sourceChanged && targetChanged && !canonicalEquals(sourceRow, targetRow)) {
        conflicts.push({ path: `rows/${key}`, sourceValue: sourceRow ?? null, targetValue: targetRow ?? null });
      } else if (sourceChanged && !targetChanged) {
        changeset[key] = sourceRow ?? null;
      }
    }

    return conflicts.length === 0
      ? { success: true, conflicts, merged: changeset }
      : { success: false, conflicts, merged: null };
  }
}
