import type { JsonNode } from '../node/json-node.js';
import { JsonType } from '../node/json-type.js';

const INDENT = '  ';

/**
 * Floats always carry a fraction so the Integer/Float tag survives a round
 * trip through text. JSON has no NaN/Infinity: those are written as null.
 */
function formatFloat(value: number): string {
  if (!Number.isFinite(value)) return 'null';
  if (Object.is(value, -0)) return '0.0';
  const text = JSON.stringify(value);
  return Number.isInteger(value) && !/[e.]/i.test(text) ? `${text}.0` : text;
}

function writeScalar(node: JsonNode): string {
  switch (node.getType()) {
    case JsonType.Null:
      return 'null';
    case JsonType.Bool:
      return node.getBool() ? 'true' : 'false';
    case JsonType.Integer:
      return String(node.getInteger());
    case JsonType.Float:
      return formatFloat(node.getFloat());
    case JsonType.String:
      return JSON.stringify(node.getString());
    case JsonType.Vector:
      return '[]';
    case JsonType.Struct:
      return '{}';
  }
}

function writeCompact(node: JsonNode): string {
  if (node.isVector()) {
    return `[${node.getVector().map(writeCompact).join(',')}]`;
  }
  if (node.isStruct()) {
    const members = node
      .getStruct()
      .entries()
      .map(([key, child]) => `${JSON.stringify(key)}:${writeCompact(child)}`);
    return `{${members.join(',')}}`;
  }
  return writeScalar(node);
}

function writePretty(node: JsonNode, depth: number): string {
  if (node.isCompact()) return writeScalar(node);

  const inner = INDENT.repeat(depth + 1);
  const outer = INDENT.repeat(depth);

  if (node.isVector()) {
    const items = node
      .getVector()
      .map((child) => `${inner}${writePretty(child, depth + 1)}`);
    return `[\n${items.join(',\n')}\n${outer}]`;
  }

  const members = node
    .getStruct()
    .entries()
    .map(
      ([key, child]) =>
        `${inner}${JSON.stringify(key)}: ${writePretty(child, depth + 1)}`
    );
  return `{\n${members.join(',\n')}\n${outer}}`;
}

/**
 * Serializes a tree to JSON text. Compact output has no whitespace; otherwise
 * containers are indented by two spaces and compact nodes stay on one line.
 * Struct members are written in key order. Meta and flags are not written.
 */
export function writeJson(node: JsonNode, compact = false): string {
  return compact ? writeCompact(node) : writePretty(node, 0);
}
