import { describe, it, expect } from 'vitest';
import { utf8ToBytes } from '@noble/hashes/utils.js';
import { PortFailure } from '../src/core/errors.js';
import type { JsonObject } from '../src/core/types.js';
import { RowEngine, substituteParameters } from '../src/local/row-engine.js';
import { columnsOf, decodeRows, encodeRows, rowKey, typeOf } from '../src/local/rows.js';

describe('row codec', () => {
  it('decodes what it encodes', () => {
    const rows: JsonObject[] = [{ id: 1, tags: ['a'] }, { id: 2, nested: { ok: true } }];
    expect(decodeRows(encodeRows(rows))).toEqual(rows);
  });

  it('rejects content that is not an array of objects', () => {
    expect(() => decodeRows(utf8ToBytes('{"id":1}'))).toThrow('Expected a JSON array of rows');
    expect(() => decodeRows(utf8ToBytes('[{"id":1}, 2]'))).toThrow('Row 1 is not a JSON object');
    expect(() => decodeRows(new Uint8Array([0xff, 0xfe]))).toThrow(PortFailure);
  });

  it('collects columns in first-seen order', () => {
    expect(columnsOf([{ b: 1, a: 2 }, { c: 3, a: 4 }])).toEqual(['b', 'a', 'c']);
  });

  it('infers cell types', () => {
    expect([1, 1.5, 'x', true, null, [1], { a: 1 }, undefined].map(typeOf)).toEqual([
      'integer',
      'number',
      'string',
      'boolean',
      'null',
      'array',
      'object',
      'null',
    ]);
  });

  it('keys rows by id, falling back to position', () => {
    expect(rowKey({ id: 7 }, 0)).toBe('7');
    expect(rowKey({ id: 'a-1' }, 0)).toBe('a-1');
    expect(rowKey({ name: 'x' }, 3)).toBe('#3');
  });
});

describe('substituteParameters', () => {
  it('keeps the JSON type of a whole placeholder', () => {
    expect(substituteParameters({ value: '{{ min }}' }, { min: 10 })).toEqual({ value: 10 });
  });

  it('interpolates placeholders inside a longer string', () => {
    expect(substituteParameters(['region-{{region}}', '{{n}} rows'], { region: 'eu', n: 3 })).toEqual(['region-eu', '3 rows']);
  });

  it('fails on a missing parameter', () => {
    expect(() => substituteParameters('{{missing}}', {})).toThrow('Missing parameter: missing');
  });
});

describe('RowEngine', () => {
  const engine = new RowEngine();
  const orders = encodeRows([
    { id: 1, region: 'eu', total: 10 },
    { id: 2, region: 'us', total: 25 },
    { id: 3, region: 'eu', total: 40 },
    { id: 4, region: 'apac', total: null },
  ]);

  it('applies comparison filters and a limit', async () => {
    const out = await engine.apply(
      orders,
      {
        steps: [
          { op: 'filter', column: 'total', operator: 'gte', value: 20 },
          { op: 'limit', count: 1 },
        ],
      },
      {},
    );
    expect(decodeRows(out.data)).toEqual([{ id: 2, region: 'us', total: 25 }]);
    expect(out).toMatchObject({ rowsIn: 4, rowsOut: 1 });
  });

  it('treats a missing or null cell as unequal under ne', async () => {
    const out = await engine.apply(orders, { steps: [{ op: 'filter', column: 'total', operator: 'ne', value: null }] }, {});
    expect(out.rowsOut).toBe(3);
  });

  it('rejects an unknown transform step', async () => {
    await expect(engine.apply(orders, { steps: [{ op: 'explode' }] }, {})).rejects.toThrow(
      'Transformation definition must be {steps: [...]} of select, filter, rename or limit',
    );
  });

  it('keeps unmatched right rows in a right join', async () => {
    const left = encodeRows([{ cid: 1, name: 'a' }]);
    const right = encodeRows([
      { cid: 1, total: 5 },
      { cid: 2, total: 7 },
    ]);
    const out = await engine.join(left, right, ['cid'], 'right');
    expect(decodeRows(out.data)).toEqual([
      { cid: 1, name: 'a', total: 5 },
      { cid: 2, total: 7 },
    ]);
    expect(out).toMatchObject({ rowsOutput: 2, matchedCount: 1, unmatchedLeft: 0, unmatchedRight: 1 });
  });

  it('computes min and max per group, ignoring nulls', async () => {
    const out = await engine.aggregate(orders, ['region'], { total: 'max' });
    expect(decodeRows(out.data)).toEqual([
      { region: 'eu', max_total: 40 },
      { region: 'us', max_total: 25 },
      { region: 'apac', max_total: null },
    ]);
    expect(out.groupCount).toBe(3);
  });

  it('refuses to produce more rows than allowed', async () => {
    const small = new RowEngine({ maxRows: 2 });
    await expect(small.aggregate(orders, ['id'], { total: 'count' })).rejects.toThrow('Operation would produce 4 rows (limit 2)');
  });
});
