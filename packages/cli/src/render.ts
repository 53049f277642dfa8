import {
  type CLIErrorView,
  type Cell,
  type GeneratedRecord,
  type GeneratedTable,
  columnNames,
  toRecords,
} from '@rowforge/core';

import type { OutputFormat } from './flags.js';

const ESC = '\u001B[';
const STYLE = { reset: '0', bold: '1', red: '31' } as const;

const ANSI_SEQUENCE =
  /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g;

export function stripAnsi(input: string): string {
  return input.replace(ANSI_SEQUENCE, '');
}

function paint(text: string, enabled: boolean, ...codes: string[]): string {
  if (!enabled || codes.length === 0) return text;
  return `${ESC}${codes.join(';')}m${text}${ESC}${STYLE.reset}m`;
}

/** Greedy word wrap on visible width; styled words are kept whole. */
function wrap(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = '';
  for (const word of text.split(/\s+/).filter(Boolean)) {
    const candidate = line ? `${line} ${word}` : word;
    if (line && stripAnsi(candidate).length > width) {
      lines.push(line);
      line = word;
    } else {
      line = candidate;
    }
  }
  if (line) lines.push(line);
  return lines;
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const label = (text: string): string => paint(text, view.colors, STYLE.bold);
  const lines = [paint(`❌ ${view.title}`, view.colors, STYLE.bold, STYLE.red)];

  if (view.location) lines.push(...wrap(`📍 ${view.location}`, width));
  if (view.excerpt) lines.push(...wrap(`${label('Excerpt:')} ${view.excerpt}`, width));
  if (view.workaround) {
    lines.push(...wrap(`💡 ${label('Workaround:')} ${view.workaround}`, width));
  }
  return lines.join('\n');
}

type CellValue = Cell | undefined;

/** ISO-8601 UTC, whole seconds */
export function formatDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function formatCell(value: CellValue): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return formatDate(value);
  return String(value);
}

function jsonValue(value: CellValue): string | number | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return formatDate(value);
  return value;
}

function toJsonRecord(
  names: readonly string[],
  record: GeneratedRecord
): Record<string, string | number | null> {
  return Object.fromEntries(
    names.map((name): [string, string | number | null] => [
      name,
      jsonValue(record[name]),
    ])
  );
}

function escapeMarkdown(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function escapeCsv(text: string): string {
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function renderMarkdown(names: readonly string[], records: GeneratedRecord[]): string {
  const row = (cells: string[]): string => `| ${cells.join(' | ')} |`;
  const lines = [
    row(names.map(escapeMarkdown)),
    row(names.map(() => '---')),
    ...records.map((record) =>
      row(names.map((name) => escapeMarkdown(formatCell(record[name]))))
    ),
  ];
  return lines.join('\n') + '\n';
}

function renderCsv(names: readonly string[], records: GeneratedRecord[]): string {
  const lines = [
    names.map(escapeCsv).join(','),
    ...records.map((record) =>
      names.map((name) => escapeCsv(formatCell(record[name]))).join(',')
    ),
  ];
  return lines.join('\n') + '\n';
}

/**
 * Render a generated table as text.
 * Missing cells are empty in markdown and CSV, `null` in JSON.
 */
export function renderTable(table: GeneratedTable, format: OutputFormat): string {
  const names = columnNames(table);
  const records = toRecords(table);
  switch (format) {
    case 'markdown':
      return renderMarkdown(names, records);
    case 'csv':
      return renderCsv(names, records);
    case 'json':
      return (
        JSON.stringify(
          records.map((r) => toJsonRecord(names, r)),
          null,
          2
        ) + '\n'
      );
    case 'ndjson':
      return records
        .map((r) => JSON.stringify(toJsonRecord(names, r)) + '\n')
        .join('');
  }
}

export default renderCLIView;
