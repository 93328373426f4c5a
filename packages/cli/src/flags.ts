import { ConfigError, type StrataOptions } from '@jsonstrata/core';

/**
 * Options as commander hands them to an action. `--no-*` flags arrive as
 * their positive name set to false.
 */
export interface CliOptions {
  // merge
  copyMeta?: boolean;
  ignoreOverride?: boolean;
  // assemble
  tagMeta?: boolean;
  failOnInvalid?: boolean;
  root?: string[];
  // schema
  schema?: string;
  schemas?: string;
  scheme?: string;
  formats?: boolean;
  maxRefDepth?: string;
  // output
  compact?: boolean;
  out?: string;
  prune?: boolean;
  verbose?: boolean;
}

export function parseInteger(value: string, setting: string): number {
  const parsed = Number(value);
  if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new ConfigError({
      message: `Invalid value "${value}" for --${setting}: expected an integer`,
      context: { setting },
    });
  }
  return parsed;
}

/**
 * Maps CLI flags onto library options. Flags left unset stay undefined so
 * resolveOptions() fills in the defaults.
 */
export function parseStrataOptions(options: CliOptions): StrataOptions {
  const result: StrataOptions = {};

  if (options.copyMeta !== undefined || options.ignoreOverride !== undefined) {
    result.merge = {};
    if (options.copyMeta !== undefined) result.merge.copyMeta = options.copyMeta;
    if (options.ignoreOverride !== undefined) {
      result.merge.ignoreOverride = options.ignoreOverride;
    }
  }

  if (options.tagMeta !== undefined || options.failOnInvalid !== undefined) {
    result.assemble = {};
    if (options.tagMeta !== undefined) result.assemble.tagMeta = options.tagMeta;
    if (options.failOnInvalid !== undefined) {
      result.assemble.failOnInvalidSyntax = options.failOnInvalid;
    }
  }

  if (
    options.scheme !== undefined ||
    options.formats !== undefined ||
    options.maxRefDepth !== undefined
  ) {
    result.schema = {};
    if (options.scheme !== undefined) result.schema.defaultScheme = options.scheme;
    if (options.formats !== undefined) result.schema.validateFormats = options.formats;
    if (options.maxRefDepth !== undefined) {
      result.schema.maxRefDepth = parseInteger(options.maxRefDepth, 'max-ref-depth');
    }
  }

  return result;
}

export function requireOption(value: string | undefined, flag: string): string {
  if (value === undefined || value === '') {
    throw new ConfigError({
      message: `Missing required option --${flag}`,
      context: { setting: flag },
    });
  }
  return value;
}
