/**
 * Schema registry: where validators and normalizers look up schema
 * documents. Callers inject one; nothing here is process-wide.
 */

import { ErrorCode } from '../errors/codes.js';
import type { JsonNode } from '../node/json-node.js';
import { SchemaError } from '../types/errors.js';
import { DEFAULT_OPTIONS } from '../types/options.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import { documentKey, parseSchemaUri } from './schema-uri.js';

export interface SchemaEntry {
  /** `<scheme>:<name>` */
  uri: string;
  schema: JsonNode;
}

export interface SchemaRegistry {
  lookup(scheme: string, name: string): JsonNode | undefined;
  entries(): Iterable<SchemaEntry>;
}

/**
 * Registry backed by a Map keyed by `<scheme>:<name>`
 */
export class InMemorySchemaRegistry implements SchemaRegistry {
  private readonly documents = new Map<string, JsonNode>();

  constructor(
    private readonly defaultScheme: string = DEFAULT_OPTIONS.schema.defaultScheme
  ) {}

  /**
   * Registers a whole document; re-registering a URI replaces it.
   *
   * @throws SchemaError when the URI is malformed or carries a fragment
   */
  register(uri: string, schema: JsonNode): this {
    const parsed = parseSchemaUri(uri, this.defaultScheme).unwrap();
    if (parsed.pointer !== '') {
      throw new SchemaError({
        message: `Cannot register "${uri}": documents are registered without a fragment`,
        errorCode: ErrorCode.INVALID_SCHEMA_URI,
        context: { schema: uri },
      });
    }
    this.documents.set(documentKey(parsed), schema);
    return this;
  }

  lookup(scheme: string, name: string): JsonNode | undefined {
    return this.documents.get(documentKey({ scheme, name }));
  }

  entries(): SchemaEntry[] {
    return [...this.documents].map(([uri, schema]) => ({ uri, schema }));
  }

  get size(): number {
    return this.documents.size;
  }
}

export interface LocatedSchema {
  /** Key of the document the schema lives in; `$ref`s starting with '#' are relative to it */
  document: string;
  schema: JsonNode;
}

export function locateSchema(
  registry: SchemaRegistry,
  uri: string,
  defaultScheme: string = DEFAULT_OPTIONS.schema.defaultScheme
): Result<LocatedSchema, SchemaError> {
  const parsed = parseSchemaUri(uri, defaultScheme);
  if (isErr(parsed)) return parsed;

  const { scheme, name, pointer } = parsed.value;
  const document = registry.lookup(scheme, name);
  if (document === undefined) {
    return err(
      new SchemaError({
        message: `Schema "${documentKey(parsed.value)}" is not registered`,
        context: { schema: uri },
      })
    );
  }

  const target = document.tryResolvePointer(pointer);
  if (isErr(target)) {
    return err(
      new SchemaError({
        message: `Schema "${uri}" has no node at "${pointer}"`,
        context: { schema: uri, path: pointer },
        cause: target.error,
      })
    );
  }
  return ok({ document: documentKey(parsed.value), schema: target.value });
}

/**
 * Resolves `<scheme>:<name>#<pointer>` to a schema node
 */
export function getSchema(
  registry: SchemaRegistry,
  uri: string,
  defaultScheme: string = DEFAULT_OPTIONS.schema.defaultScheme
): Result<JsonNode, SchemaError> {
  const located = locateSchema(registry, uri, defaultScheme);
  if (isErr(located)) return located;
  return ok(located.value.schema);
}
