/**
 * Schema-driven normalization.
 *
 * minimize() strips required properties whose value equals the schema
 * default; maximize() puts them back. Only properties listed in `required`
 * of `type: "object"` schemas are touched, and arrays are followed through
 * `items`. `$ref`s are followed (relative ones against the document being
 * walked) up to `maxRefDepth` hops.
 */

import { ErrorCode } from '../errors/codes.js';
import { JsonNode } from '../node/json-node.js';
import { SchemaError } from '../types/errors.js';
import { resolveOptions, type SchemaOptions } from '../types/options.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import { locateSchema, type LocatedSchema, type SchemaRegistry } from './registry.js';

interface WalkContext {
  registry: SchemaRegistry;
  defaultScheme: string;
  maxRefDepth: number;
}

type Step = Result<void, SchemaError>;

const DONE: Step = ok(undefined);

function follow(
  start: LocatedSchema,
  ctx: WalkContext
): Result<LocatedSchema, SchemaError> {
  let current = start;
  for (let hops = 0; ; hops++) {
    if (!current.schema.isStruct()) return ok(current);
    const ref = current.schema.at('$ref');
    if (!ref.isString()) return ok(current);

    const target = ref.getString();
    if (hops >= ctx.maxRefDepth) {
      return err(
        new SchemaError({
          message: `Gave up following "${target}" after ${ctx.maxRefDepth} $ref hops`,
          errorCode: ErrorCode.SCHEMA_REF_DEPTH_EXCEEDED,
          context: { schema: target, maxRefDepth: ctx.maxRefDepth },
        })
      );
    }

    const uri = target.startsWith('#') ? `${current.document}${target}` : target;
    const next = locateSchema(ctx.registry, uri, ctx.defaultScheme);
    if (isErr(next)) return next;
    current = next.value;
  }
}

function hasType(schema: JsonNode, type: string): boolean {
  if (!schema.isStruct()) return false;
  const declared = schema.at('type');
  if (declared.isString()) return declared.getString() === type;
  if (declared.isVector()) {
    return declared.getVector().some((t) => t.isString() && t.getString() === type);
  }
  return false;
}

function requiredNames(schema: JsonNode): string[] {
  const required = schema.at('required');
  if (!required.isVector()) return [];
  return required
    .getVector()
    .filter((name) => name.isString())
    .map((name) => name.getString());
}

interface PropertySchema {
  located: LocatedSchema;
  defaultValue: JsonNode | undefined;
}

/** Schema of a declared property with its `$ref`s followed, plus its default */
function propertySchema(
  owner: LocatedSchema,
  name: string,
  ctx: WalkContext
): Result<PropertySchema | undefined, SchemaError> {
  const properties = owner.schema.at('properties');
  if (!properties.isStruct()) return ok(undefined);
  const declared = properties.getStruct().get(name);
  if (declared === undefined) return ok(undefined);

  const located = follow({ document: owner.document, schema: declared }, ctx);
  if (isErr(located)) return located;

  const pick = (schema: JsonNode): JsonNode | undefined =>
    schema.isStruct() ? schema.getStruct().get('default') : undefined;

  return ok({
    located: located.value,
    defaultValue: pick(declared) ?? pick(located.value.schema),
  });
}

function itemsSchema(owner: LocatedSchema): LocatedSchema | undefined {
  const items = owner.schema.at('items');
  return items.isStruct() ? { document: owner.document, schema: items } : undefined;
}

function minimizeNode(node: JsonNode, at: LocatedSchema, ctx: WalkContext): Step {
  const resolved = follow(at, ctx);
  if (isErr(resolved)) return resolved;
  const schema = resolved.value;

  if (hasType(schema.schema, 'array') && node.isVector()) {
    const items = itemsSchema(schema);
    if (items === undefined) return DONE;
    for (const element of node.getVector()) {
      const step = minimizeNode(element, items, ctx);
      if (isErr(step)) return step;
    }
    return DONE;
  }

  if (!hasType(schema.schema, 'object') || !node.isStruct()) return DONE;

  for (const name of requiredNames(schema.schema)) {
    const child = node.getStruct().get(name);
    if (child === undefined) continue;

    const property = propertySchema(schema, name, ctx);
    if (isErr(property)) return property;
    if (property.value === undefined) continue;
    const { located, defaultValue } = property.value;

    if (defaultValue !== undefined && child.equals(defaultValue)) {
      node.remove(name);
      continue;
    }

    const step = minimizeNode(child, located, ctx);
    if (isErr(step)) return step;

    if (defaultValue !== undefined && child.equals(defaultValue)) {
      node.remove(name);
    }
  }
  return DONE;
}

function maximizeNode(node: JsonNode, at: LocatedSchema, ctx: WalkContext): Step {
  const resolved = follow(at, ctx);
  if (isErr(resolved)) return resolved;
  const schema = resolved.value;

  if (hasType(schema.schema, 'array') && node.isVector()) {
    const items = itemsSchema(schema);
    if (items === undefined) return DONE;
    for (const element of node.getVector()) {
      const step = maximizeNode(element, items, ctx);
      if (isErr(step)) return step;
    }
    return DONE;
  }

  if (!hasType(schema.schema, 'object')) return DONE;
  if (node.isNull()) node.struct();
  if (!node.isStruct()) return DONE;

  for (const name of requiredNames(schema.schema)) {
    const property = propertySchema(schema, name, ctx);
    if (isErr(property)) return property;
    if (property.value === undefined) continue;
    const { located, defaultValue } = property.value;

    let child = node.getStruct().get(name);
    if (child === undefined || child.isNull()) {
      if (defaultValue === undefined) {
        const candidate = new JsonNode();
        const step = maximizeNode(candidate, located, ctx);
        if (isErr(step)) return step;
        if (candidate.isStruct() && candidate.getStruct().size > 0) {
          node.set(name, candidate);
        }
        continue;
      }
      child = defaultValue.clone();
      node.set(name, child);
    }

    const step = maximizeNode(child, located, ctx);
    if (isErr(step)) return step;
  }
  return DONE;
}

function run(
  walker: (node: JsonNode, at: LocatedSchema, ctx: WalkContext) => Step,
  node: JsonNode,
  schemaName: string,
  registry: SchemaRegistry,
  options: SchemaOptions
): Step {
  const { defaultScheme, maxRefDepth } = resolveOptions({ schema: options }).schema;
  const ctx: WalkContext = { registry, defaultScheme, maxRefDepth };

  const root = locateSchema(registry, schemaName, defaultScheme);
  if (isErr(root)) return root;
  return walker(node, root.value, ctx);
}

/**
 * Removes required properties that equal their schema default, in place
 */
export function minimize(
  node: JsonNode,
  schemaName: string,
  registry: SchemaRegistry,
  options: SchemaOptions = {}
): Result<void, SchemaError> {
  return run(minimizeNode, node, schemaName, registry, options);
}

/**
 * Inserts schema defaults for required properties that are missing or null,
 * in place
 */
export function maximize(
  node: JsonNode,
  schemaName: string,
  registry: SchemaRegistry,
  options: SchemaOptions = {}
): Result<void, SchemaError> {
  return run(maximizeNode, node, schemaName, registry, options);
}
