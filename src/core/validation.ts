/**
 * JSON Schema validation shared by unit inputs, registry cards, signals and configuration.
 */

import AjvModule from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import type { Result } from './types.js';

const Ajv = AjvModule.default;

const ajv = new Ajv({ strict: false, allErrors: true, useDefaults: true });

export type Validator<T> = ValidateFunction<T>;
export type { SchemaObject };

/** Compile a schema into a type guard for `T`. */
export function compileSchema<T>(schema: SchemaObject): Validator<T> {
  return ajv.compile<T>(schema);
}

export function describeErrors(errors: ErrorObject[] | null | undefined): string {
  return ajv.errorsText(errors ?? [], { dataVar: 'input' });
}

/** Validate `data`, returning the typed value or a readable error. */
export function validate<T>(validator: Validator<T>, data: unknown): Result<T, string> {
  if (validator(data)) {
    return { ok: true, value: data };
  }
  return { ok: false, error: describeErrors(validator.errors) };
}

/** Validate against an ad-hoc schema (signal payloads, label schemas). Compiled schemas are cached by ajv. */
export function validateAgainst(schema: SchemaObject, data: unknown): Result<void, string> {
  const check = ajv.compile(schema);
  if (check(data)) return { ok: true, value: undefined };
  return { ok: false, error: describeErrors(check.errors) };
}

// ── Shared Schema Fragments ──

export const nonEmptyString = { type: 'string', minLength: 1 } as const;
export const stringMap = { type: 'object', additionalProperties: { type: 'string' } } as const;
export const jsonObject = { type: 'object' } as const;
