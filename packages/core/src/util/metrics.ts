import { performance } from 'node:perf_hooks';

import type { ColumnMetrics, GenerationMetrics } from '../types/column.js';

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

/**
 * Collects timing and null-injection counters for one generation call.
 * When disabled every method is a no-op and `snapshot()` returns undefined.
 */
export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private startedAt: number | undefined;
  private generateMs = 0;
  private rows = 0;
  private cells = 0;
  private readonly columns = new Map<string, ColumnMetrics>();

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  begin(): void {
    if (!this.enabled) return;
    this.startedAt = this.now();
  }

  end(): void {
    if (!this.enabled || this.startedAt === undefined) return;
    this.generateMs += this.now() - this.startedAt;
    this.startedAt = undefined;
  }

  recordColumn(name: string, rows: number, nullsInjected: number): void {
    if (!this.enabled) return;
    this.rows = Math.max(this.rows, rows);
    this.cells += rows;
    this.columns.set(name, { nullsInjected });
  }

  snapshot(): GenerationMetrics | undefined {
    if (!this.enabled) return undefined;
    return {
      generateMs: this.generateMs,
      rows: this.rows,
      cells: this.cells,
      columns: Object.fromEntries(
        [...this.columns].map(([name, entry]): [string, ColumnMetrics] => [
          name,
          { ...entry },
        ])
      ),
    };
  }
}
