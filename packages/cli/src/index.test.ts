import { afterEach, describe, it, expect, vi } from 'vitest';

import { createProgram, main } from './index.js';
import { stripAnsi } from './render.js';

function captureOutput(): { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
    stdout.push(String(chunk));
    return true;
  });
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
    stderr.push(String(chunk));
    return true;
  });
  return { stdout, stderr };
}

function captureExit(): { errors: string[] } {
  const errors: string[] = [];
  vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new Error(`EXIT:${String(code)}`);
  });
  vi.spyOn(console, 'error').mockImplementation((msg: unknown) => {
    errors.push(stripAnsi(String(msg)));
  });
  return { errors };
}

async function run(args: string[]): Promise<void> {
  await createProgram().parseAsync(args, { from: 'user' });
}

describe('rowforge generate', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the requested rows as JSON', async () => {
    const { stdout } = captureOutput();
    await run([
      'generate',
      'age:int:0:99',
      'city:cat:NY,LA',
      '--rows',
      '5',
      '--seed',
      '7',
      '--out',
      'json',
    ]);

    const parsed: unknown = JSON.parse(stdout.join(''));
    expect(Array.isArray(parsed)).toBe(true);
    if (!Array.isArray(parsed)) return;
    expect(parsed).toHaveLength(5);
    for (const row of parsed) {
      expect(Object.keys(row)).toEqual(['age', 'city']);
      expect(row.age).toBeGreaterThanOrEqual(0);
      expect(row.age).toBeLessThanOrEqual(99);
      expect(['NY', 'LA']).toContain(row.city);
    }
  });

  it('prints markdown by default', async () => {
    const { stdout } = captureOutput();
    await run([
      'generate',
      'k:int:4:4',
      'c:cat:X',
      'd:datetime:2020-01-01:2020-01-01',
      '-n',
      '2',
    ]);
    expect(stdout.join('')).toBe(
      [
        '| k | c | d |',
        '| --- | --- | --- |',
        '| 4 | X | 2020-01-01T00:00:00Z |',
        '| 4 | X | 2020-01-01T00:00:00Z |',
        '',
      ].join('\n')
    );
  });

  it('generates ten rows unless told otherwise', async () => {
    const { stdout } = captureOutput();
    await run(['generate', 'k:int:1:1', '--out', 'ndjson']);
    expect(stdout.join('')).toBe('{"k":1}\n'.repeat(10));
  });

  it('renders injected nulls', async () => {
    const { stdout } = captureOutput();
    await run(['generate', 'c:cat:X@100', '-r', '2', '--out', 'csv']);
    expect(stdout.join('')).toBe('c\n\n\n');
  });

  it('is reproducible for a given seed', async () => {
    const first = captureOutput();
    await run(['generate', 'v:float:0:1', '--seed', '99', '--out', 'csv']);
    vi.restoreAllMocks();
    const second = captureOutput();
    await run(['generate', 'v:float:0:1', '--seed', '99', '--out', 'csv']);
    expect(second.stdout.join('')).toBe(first.stdout.join(''));
  });

  it('prints metrics and config to stderr when asked', async () => {
    const { stderr } = captureOutput();
    await run([
      'generate',
      'a:int:0:1',
      '-r',
      '3',
      '--seed',
      '5',
      '--print-metrics',
      '--debug-config',
    ]);
    const lines = stderr.join('').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]?.startsWith('[rowforge] config: ')).toBe(true);
    expect(lines[1]?.startsWith('[rowforge] metrics: ')).toBe(true);

    const config: unknown = JSON.parse(
      (lines[0] ?? '').slice('[rowforge] config: '.length)
    );
    expect(config).toMatchObject({ rows: 3, seed: 5, out: 'markdown' });

    const metrics: unknown = JSON.parse(
      (lines[1] ?? '').slice('[rowforge] metrics: '.length)
    );
    expect(metrics).toMatchObject({
      seed: 5,
      rows: 3,
      cells: 3,
      columns: { a: { nullsInjected: 0 } },
    });
  });

  it('exits with the code of a validation error', async () => {
    captureOutput();
    const { errors } = captureExit();
    await expect(run(['generate', 'x:int:10:5'])).rejects.toThrow('EXIT:12');
    expect(errors[0]).toContain(
      'Error E003: Column "x" has min (10) greater than max (5)'
    );
    expect(errors[0]).toContain('Column: x (minVal)');
  });

  it('exits on duplicate columns', async () => {
    captureOutput();
    const { errors } = captureExit();
    await expect(run(['generate', 'a:int:0:1', 'a:cat:x'])).rejects.toThrow(
      'EXIT:11'
    );
    expect(errors[0]).toContain('Column "a" is already defined');
  });

  it('exits on bad flags', async () => {
    captureOutput();
    captureExit();
    await expect(
      run(['generate', 'a:int:0:1', '--rows', '-2'])
    ).rejects.toThrow('EXIT:20');
    await expect(
      run(['generate', 'a:int:0:1', '--out', 'xml'])
    ).rejects.toThrow('EXIT:50');
    await expect(run(['generate', 'a:uuid'])).rejects.toThrow('EXIT:17');
  });
});

describe('main', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('parses process-style argv', async () => {
    const { stdout } = captureOutput();
    await main(['node', 'rowforge', 'generate', 'k:int:2:2', '-r', '1', '--out', 'csv']);
    expect(stdout.join('')).toBe('k\n2\n');
  });
});
