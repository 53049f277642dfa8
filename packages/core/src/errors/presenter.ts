/**
 * ErrorPresenter - pure presentation layer for RowforgeError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type {
  ErrorContext,
  RowforgeError,
  SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: RowforgeError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      excerpt: this.#formatExcerpt(error.context),
      workaround: error.suggestion,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout?.columns || 80,
    };
  }

  formatForProduction(error: RowforgeError): SerializedError {
    return error.toJSON('prod');
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx?.column) return undefined;
    return ctx.field
      ? `Column: ${ctx.column} (${ctx.field})`
      : `Column: ${ctx.column}`;
  }

  #formatExcerpt(ctx?: ErrorContext): string | undefined {
    if (this._env === 'prod' || !ctx || !('value' in ctx)) return undefined;
    const raw =
      ctx.value instanceof Date ? ctx.value.toISOString() : ctx.value;
    const text = JSON.stringify(raw) ?? String(raw);
    return text.length > 60 ? `${text.slice(0, 57)}...` : text;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}
