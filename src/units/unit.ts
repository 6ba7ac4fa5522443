/**
 * Execution unit definition: schema-checked input, injected ports, no retained state.
 */

import type { TenantContext, UnitOutcome } from '../core/types.js';
import { fail } from '../core/types.js';
import { compileSchema, validate } from '../core/validation.js';
import type { SchemaObject } from '../core/validation.js';
import type { FabricPorts } from './ports.js';
import type { UnitName } from './types.js';

export interface ExecutionUnit<I, O, K extends keyof FabricPorts> {
  readonly name: UnitName;
  readonly inputSchema: SchemaObject;
  /** Run with an already-typed input; ports beyond `K` are never touched. */
  execute(input: I, tenant: TenantContext, ports: Pick<FabricPorts, K>): Promise<UnitOutcome<O>>;
  /** Validate untyped input (an intent payload) and run. */
  invoke(raw: unknown, tenant: TenantContext, ports: FabricPorts): Promise<UnitOutcome<O>>;
}

/** Type-erased view used by the intent gateway. */
export interface UnitRunner {
  readonly name: UnitName;
  readonly inputSchema: SchemaObject;
  invoke(raw: unknown, tenant: TenantContext, ports: FabricPorts): Promise<UnitOutcome<unknown>>;
}

export function defineUnit<I, O, K extends keyof FabricPorts>(definition: {
  name: UnitName;
  inputSchema: SchemaObject;
  execute: (input: I, tenant: TenantContext, ports: Pick<FabricPorts, K>) => Promise<UnitOutcome<O>>;
}): ExecutionUnit<I, O, K> {
  const check = compileSchema<I>(definition.inputSchema);
  return {
    name: definition.name,
    inputSchema: definition.inputSchema,
    execute: definition.execute,
    async invoke(raw, tenant, ports) {
      const parsed = validate(check, raw);
      if (!parsed.ok) {
        return fail('INVALID_INPUT', `${definition.name} input rejected: ${parsed.error}`);
      }
      return definition.execute(parsed.value, tenant, ports);
    },
  };
}

export function nowIso(): string {
  return new Date().toISOString();
}
