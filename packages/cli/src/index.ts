#!/usr/bin/env node

// CLI entry point
// - Command name: `rowforge` with the `generate` subcommand.
// - Columns are positional `name:kind:args[@noneProbability]` declarations,
//   applied to a schema builder in order; the table is printed to stdout as
//   markdown, CSV, JSON or NDJSON. Diagnostics go to stderr.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  InternalError,
  type RowforgeError,
  isRowforgeError,
  newSchema,
} from '@rowforge/core';

import { renderCLIView, renderTable } from './render.js';
import {
  type CliOptions,
  applyColumnArg,
  parseColumnArg,
  resolveOutputFormat,
  resolveRowCount,
  resolveSeed,
} from './flags.js';
import { printEffectiveConfig, printMetrics } from './debug.js';

/**
 * Build a fresh program; tests parse against their own instance.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('rowforge')
    .description('Generate synthetic tabular data from column declarations')
    .version('0.1.0');

  program
    .command('generate')
    .description('Generate rows for the given columns')
    .argument(
      '<columns...>',
      'Column declarations name:kind:args[@noneProbability], e.g. age:int:0:99 city:cat:NY,LA@10'
    )
    .option('-r, --rows <number>', 'Number of rows to generate (default 10)')
    .option('-n, --count <number>', 'Alias for --rows')
    .option('--seed <number>', 'Deterministic seed')
    .option('--out <format>', 'Output format: markdown|csv|json|ndjson', 'markdown')
    .option('--print-metrics', 'Print generation metrics as JSON to stderr', false)
    .option('--debug-config', 'Print effective configuration to stderr', false)
    .action(async (columns: string[], options: CliOptions) => {
      try {
        runGenerate(columns, options);
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  return program;
}

function runGenerate(columns: string[], options: CliOptions): void {
  const rows = resolveRowCount(options);
  const seed = resolveSeed(options.seed);
  const out = resolveOutputFormat(options.out);

  const schema = columns
    .map(parseColumnArg)
    .reduce(applyColumnArg, newSchema());

  if (options.debugConfig) {
    printEffectiveConfig({ columns: schema.columns, rows, seed, out });
  }

  const table = schema.generate(rows, {
    seed,
    metrics: options.printMetrics === true,
  });
  process.stdout.write(renderTable(table, out));

  if (options.printMetrics) {
    printMetrics(table.seed, table.metrics);
  }
}

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: RowforgeError;
  if (isRowforgeError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError(
      message || 'Unexpected error',
      err instanceof Error ? err : undefined
    );
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

const program = createProgram();

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program, handleCliError };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
