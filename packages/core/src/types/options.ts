/**
 * Configuration options for table generation
 *
 * All options are optional. Options given to `newSchema()` act as defaults
 * for every generation call; per-call options override them.
 */

import { ConfigurationError } from './errors.js';

export type CategoricalEncoding = 'dictionary' | 'utf8';

/**
 * Apache Arrow adapter settings
 */
export interface ArrowOptions {
  /** Arrow type for categorical columns (default: 'dictionary') */
  categorical?: CategoricalEncoding;
}

export interface GenerateOptions {
  /** Seed for the per-call PRNG; omit for a fresh random seed */
  seed?: number;
  /** Collect generation metrics on the returned table (default: true) */
  metrics?: boolean;
  arrow?: ArrowOptions;
}

export interface ResolvedOptions {
  seed?: number;
  metrics: boolean;
  arrow: Required<ArrowOptions>;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  metrics: true,
  arrow: {
    categorical: 'dictionary',
  },
};

export function resolveOptions(
  userOptions: GenerateOptions = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    ...DEFAULT_OPTIONS,
    ...userOptions,
    metrics: userOptions.metrics ?? DEFAULT_OPTIONS.metrics,
    arrow: { ...DEFAULT_OPTIONS.arrow, ...userOptions.arrow },
  };

  validateOptions(resolved);
  return resolved;
}

/**
 * Layer per-call options over builder-level defaults.
 */
export function mergeOptions(
  base: GenerateOptions,
  override: GenerateOptions = {}
): GenerateOptions {
  return {
    ...base,
    ...override,
    arrow: { ...base.arrow, ...override.arrow },
  };
}

function validateOptions(options: ResolvedOptions): void {
  if (options.seed !== undefined && !Number.isSafeInteger(options.seed)) {
    throw new ConfigurationError({
      message: `seed must be an integer, got ${String(options.seed)}`,
      context: { field: 'seed', value: options.seed },
    });
  }
  if (typeof options.metrics !== 'boolean') {
    throw new ConfigurationError({
      message: 'metrics must be a boolean',
      context: { field: 'metrics', value: options.metrics },
    });
  }
  const encoding: string = options.arrow.categorical;
  if (encoding !== 'dictionary' && encoding !== 'utf8') {
    throw new ConfigurationError({
      message: `arrow.categorical must be 'dictionary' or 'utf8', got '${encoding}'`,
      context: { field: 'arrow.categorical', value: encoding },
    });
  }
}
