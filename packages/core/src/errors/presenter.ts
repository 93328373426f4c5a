/**
 * ErrorPresenter - turns StrataError instances into view objects
 * - No business logic; the CLI decides how a view is printed
 */

import type { ErrorCode } from './codes.js';
import type { ErrorContext, StrataError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  exitCode: number;
  location?: string;
  source?: string;
  excerpt?: string;
  workaround?: string;
  details: string[];
  colors: boolean;
  terminalWidth: number;
}

function stringField(ctx: ErrorContext | undefined, key: string): string | undefined {
  const value = ctx?.[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: StrataError, details: readonly string[] = []): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      exitCode: error.getExitCode(),
      location: this.#formatLocation(error.context),
      source: stringField(error.context, 'source'),
      excerpt: stringField(error.context, 'valueExcerpt'),
      workaround: error.suggestions?.[0] ?? stringField(error.context, 'suggestion'),
      details: [...details],
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth ?? process.stdout.columns ?? 80,
    };
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    const path = stringField(ctx, 'path');
    const schema = stringField(ctx, 'schema');
    const schemaPath = stringField(ctx, 'schemaPath');
    const parts: string[] = [];
    if (path !== undefined) parts.push(`path ${path}`);
    if (schema !== undefined) parts.push(`schema ${schema}`);
    if (schemaPath !== undefined) parts.push(`at ${schemaPath}`);
    return parts.length > 0 ? `Location: ${parts.join(', ')}` : undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (opt === undefined) return this.env === 'dev';
    return opt;
  }
}
