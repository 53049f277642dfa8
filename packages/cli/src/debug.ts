import type { ColumnSpec, GenerationMetrics } from '@rowforge/core';

import type { OutputFormat } from './flags.js';

export interface EffectiveConfig {
  columns: readonly ColumnSpec[];
  rows: number;
  seed?: number;
  out: OutputFormat;
}

/**
 * Print the resolved column specs and run settings to stderr.
 * Intended to be used behind the --debug-config flag.
 */
export function printEffectiveConfig(config: EffectiveConfig): void {
  process.stderr.write(
    `[rowforge] config: ${JSON.stringify({
      rows: config.rows,
      seed: config.seed ?? null,
      out: config.out,
      columns: config.columns,
    })}\n`
  );
}

/**
 * Print generation metrics to stderr (--print-metrics).
 */
export function printMetrics(
  seed: number,
  metrics: GenerationMetrics | undefined
): void {
  process.stderr.write(
    `[rowforge] metrics: ${JSON.stringify({ seed, ...metrics })}\n`
  );
}
