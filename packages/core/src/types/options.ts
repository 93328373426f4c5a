/**
 * Configuration options for jsonstrata
 *
 * All options are optional with conservative defaults. Callers pass a
 * Partial<StrataOptions>; resolveOptions() fills in the rest and rejects
 * inconsistent combinations.
 */

import { ConfigError } from './errors.js';

/**
 * Defaults used when fragments are merged by the assembler and the CLI
 */
export interface MergeOptions {
  /** Treat null as "keep" and ignore override flags (default: false) */
  ignoreOverride?: boolean;
  /** Copy source meta onto replaced or merged destination nodes (default: false) */
  copyMeta?: boolean;
}

/**
 * Schema lookup, validation and normalization
 */
export interface SchemaOptions {
  /** Scheme assumed for schema URIs written without one (default: 'core') */
  defaultScheme?: string;
  /** Report every violation instead of stopping at the first (default: true) */
  allErrors?: boolean;
  /** Check "format" keywords with ajv-formats (default: true) */
  validateFormats?: boolean;
  /** ajv strict mode; schemas often carry domain-specific keywords (default: false) */
  strict?: boolean | 'log';
  /** Maximum chained $ref hops followed by minimize/maximize (default: 32) */
  maxRefDepth?: number;
}

/**
 * Multi-fragment assembly
 */
export interface AssembleOptions {
  /** Stamp each fragment's origin into meta before merging (default: true) */
  tagMeta?: boolean;
  /** Skip fragments whose text is not valid JSON instead of merging a partial tree (default: false) */
  failOnInvalidSyntax?: boolean;
}

export interface StrataOptions {
  merge?: MergeOptions;
  schema?: SchemaOptions;
  assemble?: AssembleOptions;
}

export interface ResolvedOptions {
  merge: Required<MergeOptions>;
  schema: Required<SchemaOptions>;
  assemble: Required<AssembleOptions>;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  merge: {
    ignoreOverride: false,
    copyMeta: false,
  },
  schema: {
    defaultScheme: 'core',
    allErrors: true,
    validateFormats: true,
    strict: false,
    maxRefDepth: 32,
  },
  assemble: {
    tagMeta: true,
    failOnInvalidSyntax: false,
  },
};

const SCHEME_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*$/;

/**
 * Deep-merges user options over DEFAULT_OPTIONS
 *
 * @throws ConfigError when a value is out of range
 */
export function resolveOptions(
  userOptions: Partial<StrataOptions> = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    merge: { ...DEFAULT_OPTIONS.merge, ...userOptions.merge },
    schema: { ...DEFAULT_OPTIONS.schema, ...userOptions.schema },
    assemble: { ...DEFAULT_OPTIONS.assemble, ...userOptions.assemble },
  };

  validateOptions(resolved);
  return resolved;
}

function validateOptions(options: ResolvedOptions): void {
  const { maxRefDepth, defaultScheme } = options.schema;

  if (!Number.isInteger(maxRefDepth) || maxRefDepth < 1) {
    throw new ConfigError({
      message: `schema.maxRefDepth must be a positive integer, got ${String(maxRefDepth)}`,
      context: { setting: 'schema.maxRefDepth', value: maxRefDepth },
    });
  }

  if (!SCHEME_PATTERN.test(defaultScheme)) {
    throw new ConfigError({
      message: `schema.defaultScheme must be a URI scheme name, got "${defaultScheme}"`,
      context: {
        setting: 'schema.defaultScheme',
        value: defaultScheme,
        suggestion: 'Use letters, digits, "+", "." or "-", starting with a letter',
      },
    });
  }
}
