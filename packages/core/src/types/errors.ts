/**
 * Error hierarchy for jsonstrata
 *
 * Two regimes share one base class:
 * - ContractViolationError marks programmer mistakes (wrong accessor for a
 *   node's type). It is thrown and must never be caught to recover.
 * - Every other subclass describes a data-quality problem and is usually
 *   carried inside a Result or a report rather than thrown.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // Pointer into the data tree (e.g., '/items/0/name')
  schemaPath?: string; // Pointer into the schema (e.g., '#/properties/name')
  schema?: string; // Schema URI (e.g., 'core:creature#/definitions/stack')
  source?: string; // Fragment name or file the problem came from
  value?: unknown; // Problematic value (may contain PII)
  valueExcerpt?: string; // Safe excerpt of value
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  path?: string;
  schemaPath?: string;
}

export interface StrataErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/** Parameters accepted by subclasses, where the code has a sensible default */
export type SubclassErrorParams = Omit<StrataErrorParams, 'errorCode'> & {
  errorCode?: ErrorCode;
};

const SENSITIVE_KEYS = new Set(['password', 'apiKey', 'secret', 'token']);

/**
 * Base error class for all jsonstrata errors
 */
export abstract class StrataError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: StrataErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts sensitive keys inside context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      path: this.context?.path,
      schemaPath: this.context?.schemaPath,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;

    const redactValue = (val: unknown): unknown => {
      if (Array.isArray(val)) return val.map(redactValue);
      if (val !== null && typeof val === 'object') {
        return Object.fromEntries(
          Object.entries(val).map(([k, v]) => [
            k,
            SENSITIVE_KEYS.has(k) ? '[REDACTED]' : redactValue(v),
          ])
        );
      }
      return val;
    };

    return { ...context, value: redactValue(context.value) };
  }
}

/**
 * Programmer-contract violation: a read accessor was used on a node whose
 * type tag cannot supply it, or an API was called with an impossible argument.
 */
export class ContractViolationError extends StrataError {
  constructor(params: SubclassErrorParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.TYPE_MISMATCH });
  }
}

/**
 * A path could not be resolved against a tree
 */
export class PointerError extends StrataError {
  constructor(params: SubclassErrorParams & { context: ErrorContext & { path: string } }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.POINTER_UNRESOLVED,
    });
  }

  get pointer(): string {
    return this.context?.path ?? '';
  }
}

/**
 * Schema lookup or compilation problems
 */
export class SchemaError extends StrataError {
  constructor(params: SubclassErrorParams & { context: ErrorContext & { schema: string } }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.SCHEMA_NOT_FOUND,
    });
  }

  get schemaUri(): string {
    return this.context?.schema ?? '';
  }
}

/**
 * Individual validation failure details
 */
export interface ValidationFailure {
  path: string;
  message: string;
  keyword: string;
  schemaPath: string;
  value?: unknown;
  params?: Record<string, unknown>;
}

/**
 * Validation errors: a tree does not comply with its schema
 */
export class ValidationError extends StrataError {
  public readonly failures: ValidationFailure[];

  constructor(params: SubclassErrorParams & { failures: ValidationFailure[] }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.VALIDATION_FAILED,
      context: { failureCount: params.failures.length, ...params.context },
    });
    this.failures = params.failures;
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends StrataError {
  constructor(params: SubclassErrorParams & { context?: ErrorContext & { setting?: string } }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    const setting = this.context?.setting;
    return typeof setting === 'string' ? setting : undefined;
  }
}

/**
 * Malformed source text
 */
export class ParseError extends StrataError {
  constructor(params: SubclassErrorParams & { context?: ErrorContext & { line?: number; col?: number } }) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.PARSE_ERROR });
  }
}

/**
 * A fragment could not be read or assembled
 */
export class FragmentError extends StrataError {
  constructor(params: SubclassErrorParams & { context: ErrorContext & { source: string } }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.FRAGMENT_NOT_FOUND,
    });
  }
}

export function isStrataError(error: unknown): error is StrataError {
  return error instanceof StrataError;
}

export function createValidationFailure(
  path: string,
  message: string,
  keyword: string,
  schemaPath: string,
  value?: unknown,
  params?: Record<string, unknown>
): ValidationFailure {
  return {
    path,
    message,
    keyword,
    schemaPath,
    value,
    params,
  };
}
