import { JsonNode, OVERRIDE_FLAG } from '../node/json-node.js';

/**
 * Patch that turns `base` into `node` when merged onto a copy of `base`.
 *
 * Struct keys only in `node` are copied, keys whose values differ recurse,
 * and keys only in `base` become null tombstones. A vector that differs is
 * copied whole and flagged "override" so the merge replaces it.
 */
export function difference(node: JsonNode, base: JsonNode): JsonNode {
  if (node.isStruct() && base.isStruct()) {
    const result = new JsonNode();
    const map = result.struct();
    const baseMap = base.getStruct();

    for (const [key, child] of node.getStruct()) {
      const previous = baseMap.get(key);
      if (previous === undefined) {
        map.set(key, child.clone());
      } else if (!child.equals(previous)) {
        map.set(key, difference(child, previous));
      }
    }

    for (const key of baseMap.keys()) {
      if (!node.getStruct().has(key)) map.set(key, new JsonNode());
    }
    return result;
  }

  if (node.equals(base)) return new JsonNode();

  const copy = node.clone();
  if (copy.isVector()) copy.addFlag(OVERRIDE_FLAG);
  return copy;
}
