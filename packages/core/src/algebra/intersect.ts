import { JsonNode } from '../node/json-node.js';

/**
 * Common part of two trees.
 *
 * Leaves and vectors must be equal, tag included, so Integer 1 and Float 1.0
 * have no common part. Structs keep the keys present in both
 * whose values intersect; with `pruneEmpty` the keys left without base data
 * are dropped. Anything that does not match yields Null.
 */
export function intersect(a: JsonNode, b: JsonNode, pruneEmpty?: boolean): JsonNode;
/**
 * Left fold over `nodes`, stopping early once the running result is Null.
 * An empty list yields Null.
 */
export function intersect(nodes: readonly JsonNode[], pruneEmpty?: boolean): JsonNode;
export function intersect(
  first: JsonNode | readonly JsonNode[],
  second?: JsonNode | boolean,
  third?: boolean
): JsonNode {
  if (!(first instanceof JsonNode)) {
    return intersectAll(first, typeof second === 'boolean' ? second : true);
  }
  if (!(second instanceof JsonNode)) return new JsonNode();
  return intersectPair(first, second, third ?? true);
}

function intersectAll(nodes: readonly JsonNode[], pruneEmpty: boolean): JsonNode {
  const [head, ...rest] = nodes;
  if (head === undefined) return new JsonNode();

  let result = head.clone();
  for (const node of rest) {
    if (result.isNull()) break;
    result = intersectPair(result, node, pruneEmpty);
  }
  return result;
}

function intersectPair(a: JsonNode, b: JsonNode, pruneEmpty: boolean): JsonNode {
  if (a.getType() !== b.getType()) return new JsonNode();

  if (a.isStruct()) {
    const result = new JsonNode();
    const map = result.struct();
    const other = b.getStruct();
    for (const [key, child] of a.getStruct()) {
      const peer = other.get(key);
      if (peer === undefined) continue;
      const common = intersectPair(child, peer, pruneEmpty);
      if (pruneEmpty && !common.containsBaseData()) continue;
      map.set(key, common);
    }
    return result;
  }

  return a.equals(b) ? a.clone() : new JsonNode();
}
