import { describe, it, expect } from 'vitest';

import { columnNames, toRecords } from '../records.js';
import type { GeneratedTable } from '../../types/column.js';

const TABLE: GeneratedTable = {
  rowCount: 3,
  seed: 1,
  columns: [
    { name: 'id', kind: 'int', values: [1, 2, null] },
    { name: 'city', kind: 'categorical', values: ['NY', null, 'LA'] },
    {
      name: 'seen',
      kind: 'datetime',
      values: [new Date('2020-01-01T00:00:00Z'), null, null],
    },
  ],
};

describe('toRecords', () => {
  it('produces one record per row with keys in column order', () => {
    const records = toRecords(TABLE);
    expect(records).toHaveLength(3);
    expect(Object.keys(records[0] ?? {})).toEqual(['id', 'city', 'seen']);
    expect(records[0]).toEqual({
      id: 1,
      city: 'NY',
      seen: new Date('2020-01-01T00:00:00Z'),
    });
    expect(records[1]).toEqual({ id: 2, city: null, seen: null });
    expect(records[2]).toEqual({ id: null, city: 'LA', seen: null });
  });

  it('returns no records for an empty table', () => {
    expect(toRecords({ ...TABLE, rowCount: 0, columns: [] })).toEqual([]);
  });
});

describe('columnNames', () => {
  it('lists headers in declaration order', () => {
    expect(columnNames(TABLE)).toEqual(['id', 'city', 'seen']);
  });
});
