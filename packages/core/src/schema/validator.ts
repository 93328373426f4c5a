/**
 * Schema validation backed by AJV.
 *
 * Every registry document is added to one AJV instance under its
 * `<scheme>:<name>` key, so `$ref`s between documents and into fragments
 * (`core:creature#/definitions/stack`) resolve without network access.
 * Bad data never throws: the outcome is a ValidationReport.
 */

import Ajv, {
  type ErrorObject,
  type SchemaObject,
  type ValidateFunction,
} from 'ajv';
import addFormats from 'ajv-formats';

import type { JsonNode } from '../node/json-node.js';
import {
  createValidationFailure,
  type ValidationFailure,
} from '../types/errors.js';
import { resolveOptions, type SchemaOptions } from '../types/options.js';
import { isErr } from '../types/result.js';
import { consoleLogger, type Logger } from '../util/logger.js';
import type { SchemaRegistry } from './registry.js';
import { documentKey, formatSchemaUri, parseSchemaUri } from './schema-uri.js';

export interface ValidationReport {
  valid: boolean;
  dataName: string;
  schemaName: string;
  failures: ValidationFailure[];
}

export interface SchemaValidatorOptions {
  schema?: SchemaOptions;
  logger?: Logger;
}

function toSchema(node: JsonNode): SchemaObject | boolean {
  if (node.isBool()) return node.getBool();
  const schema: SchemaObject = {};
  if (!node.isStruct()) return schema;
  for (const [key, child] of node.getStruct()) {
    schema[key] = child.toPlain();
  }
  return schema;
}

function refFailure(message: string): ValidationFailure {
  return createValidationFailure('', message, '$ref', '#/$ref');
}

function formatErrors(errors: readonly ErrorObject[]): ValidationFailure[] {
  return errors.map((error) =>
    createValidationFailure(
      error.instancePath,
      error.message ?? 'Validation failed',
      error.keyword,
      error.schemaPath,
      error.data,
      error.params
    )
  );
}

/** One log line per failure: `<dataName>: <path> <message>` */
export function formatFailure(dataName: string, failure: ValidationFailure): string {
  const path = failure.path === '' ? '(root)' : failure.path;
  return `${dataName}: ${path} ${failure.message}`;
}

export class SchemaValidator {
  private readonly options: Required<SchemaOptions>;
  private readonly logger: Logger;
  private ajv: Ajv | undefined;
  /** documents AJV refused, with the reason */
  private readonly rejected = new Map<string, string>();

  constructor(
    private readonly registry: SchemaRegistry,
    options: SchemaValidatorOptions = {}
  ) {
    this.options = resolveOptions({ schema: options.schema }).schema;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Validates `node` against the schema at `schemaName`
   * (`<scheme>:<name>#<pointer>`, scheme optional).
   */
  check(node: JsonNode, schemaName: string, dataName = ''): ValidationReport {
    const report = (failures: ValidationFailure[]): ValidationReport => ({
      valid: failures.length === 0,
      dataName,
      schemaName,
      failures,
    });

    const parsed = parseSchemaUri(schemaName, this.options.defaultScheme);
    if (isErr(parsed)) return report([refFailure(parsed.error.message)]);

    const ajv = this.getAjv();
    const uri = formatSchemaUri(parsed.value);
    const document = documentKey(parsed.value);
    const rejection = this.rejected.get(document);
    if (rejection !== undefined) {
      return report([refFailure(`Schema "${document}" is invalid: ${rejection}`)]);
    }

    let compiled: ValidateFunction | undefined;
    try {
      compiled = ajv.getSchema(uri);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return report([refFailure(`Schema "${uri}" cannot be compiled: ${reason}`)]);
    }
    if (compiled === undefined) {
      return report([refFailure(`Schema "${uri}" cannot be resolved`)]);
    }

    if (compiled(node.toPlain())) return report([]);
    return report(formatErrors(compiled.errors ?? []));
  }

  /**
   * Boolean form of check(); each failure is logged as a warning prefixed by
   * `dataName`.
   */
  validate(node: JsonNode, schemaName: string, dataName: string): boolean {
    const result = this.check(node, schemaName, dataName);
    for (const failure of result.failures) {
      this.logger.warn(formatFailure(dataName, failure));
    }
    return result.valid;
  }

  private getAjv(): Ajv {
    if (this.ajv) return this.ajv;

    const ajv = new Ajv({
      allErrors: this.options.allErrors,
      strict: this.options.strict,
      validateFormats: this.options.validateFormats,
      messages: true,
      verbose: true,
      logger: false,
    });
    if (this.options.validateFormats) addFormats(ajv);

    let loaded = 0;
    for (const entry of this.registry.entries()) {
      try {
        ajv.addSchema(toSchema(entry.schema), entry.uri);
        loaded++;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.rejected.set(entry.uri, reason);
        this.logger.warn(`Schema "${entry.uri}" rejected: ${reason}`);
      }
    }

    this.logger.debug(`Loaded ${loaded} schema documents`);
    this.ajv = ajv;
    return ajv;
  }
}

/**
 * One-shot validation; builds a validator for a single call
 */
export function validate(
  node: JsonNode,
  schemaName: string,
  dataName: string,
  registry: SchemaRegistry,
  options: SchemaValidatorOptions = {}
): boolean {
  return new SchemaValidator(registry, options).validate(node, schemaName, dataName);
}
