import { JsonNode } from './json-node.js';
import type { JsonValue } from './json-value.js';

export function boolNode(value: boolean): JsonNode {
  return new JsonNode().setBool(value);
}

export function floatNode(value: number): JsonNode {
  return new JsonNode().setFloat(value);
}

export function intNode(value: number): JsonNode {
  return new JsonNode().setInteger(value);
}

export function stringNode(value: string): JsonNode {
  return new JsonNode().setString(value);
}

/**
 * Builds a tree from a plain value. Integral numbers within ±(2^53 - 1)
 * become Integer nodes, every other number a Float node.
 */
export function fromJsonValue(value: JsonValue): JsonNode {
  if (value === null) return new JsonNode();
  if (typeof value === 'boolean') return boolNode(value);
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? intNode(value) : floatNode(value);
  }
  if (typeof value === 'string') return stringNode(value);

  const node = new JsonNode();
  if (Array.isArray(value)) {
    const items = node.vector();
    for (const item of value) items.push(fromJsonValue(item));
    return node;
  }

  const map = node.struct();
  for (const [key, item] of Object.entries(value)) {
    map.set(key, fromJsonValue(item));
  }
  return node;
}
