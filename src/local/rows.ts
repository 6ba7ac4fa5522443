/**
 * Row codec for the local adapters: UTF-8 JSON arrays of objects.
 */

import { utf8ToBytes } from '@noble/hashes/utils.js';
import { PortFailure } from '../core/errors.js';
import type { JsonObject, JsonValue } from '../core/types.js';
import { isJsonObject } from '../core/types.js';

export type Row = JsonObject;

const decoder = new TextDecoder('utf-8', { fatal: true });

export function encodeRows(rows: readonly Row[]): Uint8Array {
  return utf8ToBytes(JSON.stringify(rows));
}

export function decodeRows(data: Uint8Array): Row[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decoder.decode(data));
  } catch {
    throw new PortFailure('format', 'Data is not valid UTF-8 JSON');
  }
  if (!Array.isArray(parsed)) {
    throw new PortFailure('format', 'Expected a JSON array of rows');
  }
  const rows: Row[] = [];
  for (const [index, row] of parsed.entries()) {
    if (!isJsonObject(row)) {
      throw new PortFailure('format', `Row ${index} is not a JSON object`);
    }
    rows.push(row);
  }
  return rows;
}

/** Column names in first-seen order across all rows. */
export function columnsOf(rows: readonly Row[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return [...seen];
}

/** Inferred JSON type of a cell: integer, number, string, boolean, object, array or null. */
export function typeOf(value: JsonValue | undefined): string {
  if (value === null || value === undefined) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
  return typeof value;
}

/** Stable key for a row: its `id` when present, otherwise its position. */
export function rowKey(row: Row, index: number): string {
  const id = row['id'];
  if (typeof id === 'string' || typeof id === 'number') return String(id);
  return `#${index}`;
}
