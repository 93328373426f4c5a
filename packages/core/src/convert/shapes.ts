/**
 * Conversion strategies from a tree to native values.
 *
 * The strategy is picked by the requested shape, not by the node's tag, and
 * container shapes recurse through the shape of their elements. Tag
 * mismatches surface as ContractViolationError from the read accessors.
 */

import type { JsonNode } from '../node/json-node.js';

export interface Shape<T> {
  readonly kind: string;
  convert(node: JsonNode): T;
}

function shape<T>(kind: string, convert: (node: JsonNode) => T): Shape<T> {
  return { kind, convert };
}

const number: Shape<number> = shape('number', (node) => node.getFloat());

const integer: Shape<number> = shape(
  'integer',
  (node) => Math.trunc(node.getFloat()) || 0
);

const string: Shape<string> = shape('string', (node) => node.getString());

const bool: Shape<boolean> = shape('bool', (node) => node.getBool());

function map<T>(inner: Shape<T>): Shape<Map<string, T>> {
  return shape(`map<${inner.kind}>`, (node) => {
    const out = new Map<string, T>();
    for (const [key, child] of node.getStruct()) {
      out.set(key, inner.convert(child));
    }
    return out;
  });
}

function record<T>(inner: Shape<T>): Shape<Record<string, T>> {
  return shape(`record<${inner.kind}>`, (node) => {
    const out: Record<string, T> = {};
    for (const [key, child] of node.getStruct()) {
      out[key] = inner.convert(child);
    }
    return out;
  });
}

function array<T>(inner: Shape<T>): Shape<T[]> {
  return shape(`array<${inner.kind}>`, (node) =>
    node.getVector().map((child) => inner.convert(child))
  );
}

function set<T>(inner: Shape<T>): Shape<Set<T>> {
  return shape(
    `set<${inner.kind}>`,
    (node) => new Set(node.getVector().map((child) => inner.convert(child)))
  );
}

/** Numeric payload (Integer or Float) passed through `build` */
function fromNumber<T>(build: (value: number) => T): Shape<T> {
  return shape('fromNumber', (node) => build(node.getFloat()));
}

/** Numeric payload truncated toward zero, then passed through `build` */
function fromInteger<T>(build: (value: number) => T): Shape<T> {
  return shape('fromInteger', (node) => build(integer.convert(node)));
}

export const Shapes = {
  number,
  integer,
  string,
  bool,
  map,
  record,
  array,
  set,
  fromNumber,
  fromInteger,
} as const;
