import { describe, it, expect } from 'vitest';
import { ErrorCode, type CLIErrorView, type GeneratedTable } from '@rowforge/core';

import { formatDate, renderCLIView, renderTable, stripAnsi } from './render.js';

describe('renderCLIView', () => {
  const view: CLIErrorView = {
    title: 'Error E003: Column "x" has min (10) greater than max (5)',
    code: ErrorCode.INVERTED_BOUNDS,
    location: 'Column: x (minVal)',
    excerpt: '{"min":10,"max":5}',
    workaround: 'Swap the bounds so that min <= max',
    colors: false,
    terminalWidth: 100,
  };

  it('renders title and sections one per line', () => {
    expect(renderCLIView(view).split('\n')).toEqual([
      '❌ Error E003: Column "x" has min (10) greater than max (5)',
      '📍 Column: x (minVal)',
      'Excerpt: {"min":10,"max":5}',
      '💡 Workaround: Swap the bounds so that min <= max',
    ]);
  });

  it('skips absent sections and wraps long ones', () => {
    const out = renderCLIView({
      title: 'Error E500: boom',
      code: ErrorCode.INTERNAL_ERROR,
      workaround: 'aaa bbb ccc',
      colors: false,
      terminalWidth: 10,
    });
    expect(out).toBe('❌ Error E500: boom\n💡\nWorkaround:\naaa bbb\nccc');
  });

  it('applies ANSI colors when enabled', () => {
    const out = renderCLIView({ ...view, colors: true });
    expect(out).not.toBe(stripAnsi(out));
    expect(stripAnsi(out)).toBe(renderCLIView(view));
  });

  it('wraps colored sections on their visible width', () => {
    const out = renderCLIView({
      title: 'Error E500: boom',
      code: ErrorCode.INTERNAL_ERROR,
      workaround: 'swap them',
      colors: true,
      terminalWidth: 20,
    });
    expect(out.split('\n')[1]).toBe('💡 \u001B[1mWorkaround:\u001B[0m swap');
    expect(stripAnsi(out).split('\n')).toEqual([
      '❌ Error E500: boom',
      '💡 Workaround: swap',
      'them',
    ]);
  });
});

const TABLE: GeneratedTable = {
  rowCount: 2,
  seed: 1,
  columns: [
    { name: 'id', kind: 'int', values: [1, null] },
    { name: 'score', kind: 'float', values: [0.5, 2] },
    { name: 'city', kind: 'categorical', values: ['New York, NY', 'a|b'] },
    {
      name: 'seen',
      kind: 'datetime',
      values: [new Date('2020-01-01T08:30:00Z'), null],
    },
  ],
};

describe('renderTable', () => {
  it('renders markdown with empty missing cells and escaped pipes', () => {
    expect(renderTable(TABLE, 'markdown')).toBe(
      [
        '| id | score | city | seen |',
        '| --- | --- | --- | --- |',
        '| 1 | 0.5 | New York, NY | 2020-01-01T08:30:00Z |',
        '|  | 2 | a\\|b |  |',
        '',
      ].join('\n')
    );
  });

  it('renders CSV with quoting', () => {
    expect(renderTable(TABLE, 'csv')).toBe(
      [
        'id,score,city,seen',
        '1,0.5,"New York, NY",2020-01-01T08:30:00Z',
        ',2,a|b,',
        '',
      ].join('\n')
    );
  });

  it('renders JSON with nulls for missing cells', () => {
    expect(JSON.parse(renderTable(TABLE, 'json'))).toEqual([
      { id: 1, score: 0.5, city: 'New York, NY', seen: '2020-01-01T08:30:00Z' },
      { id: null, score: 2, city: 'a|b', seen: null },
    ]);
  });

  it('renders one JSON object per line for NDJSON', () => {
    expect(renderTable(TABLE, 'ndjson')).toBe(
      '{"id":1,"score":0.5,"city":"New York, NY","seen":"2020-01-01T08:30:00Z"}\n' +
        '{"id":null,"score":2,"city":"a|b","seen":null}\n'
    );
  });

  it('renders headers only for zero rows', () => {
    const empty: GeneratedTable = {
      ...TABLE,
      rowCount: 0,
      columns: TABLE.columns.map((c) => ({ ...c, values: [] })),
    };
    expect(renderTable(empty, 'csv')).toBe('id,score,city,seen\n');
    expect(renderTable(empty, 'ndjson')).toBe('');
    expect(renderTable(empty, 'json')).toBe('[]\n');
  });
});

describe('formatDate', () => {
  it('drops milliseconds', () => {
    expect(formatDate(new Date('2023-02-01T00:00:00.000Z'))).toBe(
      '2023-02-01T00:00:00Z'
    );
  });
});
