/**
 * SchemaIntrospector: discovers the field layout of a source.
 */

import { isPortFailure } from '../core/errors.js';
import { fail, succeed } from '../core/types.js';
import type { RawSchema } from './ports.js';
import type { FieldDefinition, SchemaIntrospectionInput, SchemaIntrospectionResult } from './types.js';
import { defineUnit, nowIso } from './unit.js';

export const MAX_FIELDS = 1000;

export const schemaIntrospector = defineUnit<SchemaIntrospectionInput, SchemaIntrospectionResult, 'schemaReader'>({
  name: 'SchemaIntrospector',
  inputSchema: {
    type: 'object',
    required: ['connectionRef', 'sourcePath'],
    properties: {
      connectionRef: { type: 'string', minLength: 1 },
      sourcePath: { type: 'string', minLength: 1 },
      sampleSize: { type: 'integer', minimum: 0, maximum: 10_000, default: 100 },
    },
  },

  async execute(input, tenant, ports) {
    let raw: RawSchema;
    try {
      raw = await ports.schemaReader.readSchema(input.connectionRef, input.sourcePath, input.sampleSize, tenant);
    } catch (err) {
      if (isPortFailure(err, 'access_denied', 'auth')) {
        return fail('ACCESS_DENIED', 'Access denied to source');
      }
      if (isPortFailure(err, 'not_found')) {
        return fail('SOURCE_NOT_FOUND', `Source not found: ${input.sourcePath}`);
      }
      if (isPortFailure(err)) {
        return fail('CONNECTION_FAILURE', 'Failed to connect to data source');
      }
      throw err;
    }

    const keys = new Set(raw.keys);
    const fields: FieldDefinition[] = raw.fields.map((f) => ({
      name: f.name,
      dataType: f.type,
      nullable: f.nullable ?? true,
      isKey: keys.has(f.name),
    }));

    const truncated = fields.length > MAX_FIELDS;
    return succeed(
      {
        fields: truncated ? fields.slice(0, MAX_FIELDS) : fields,
        primaryKeys: raw.keys,
        rowCountEstimate: raw.rowCount,
        sampleValues: raw.samples,
        introspectedAt: nowIso(),
      },
      { truncated },
    );
  },
});
