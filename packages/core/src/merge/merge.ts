/**
 * Layered merging of fragments into a destination tree.
 *
 * Rules, applied at every level:
 * - null in the source is a tombstone: the destination is cleared, and a
 *   struct key holding null is deleted. `ignoreOverride` turns nulls into
 *   no-ops instead.
 * - a null (or missing) destination adopts the source node unchanged
 * - a source flagged "override" replaces the destination wholesale
 * - struct into struct and vector into vector combine recursively; vectors
 *   merge by position and extra source items are appended
 * - anything else replaces the destination
 */

import { JsonNode, OVERRIDE_FLAG } from '../node/json-node.js';
import type { MergeOptions } from '../types/options.js';

type MergeFlags = Required<MergeOptions>;

function replace(dest: JsonNode, source: JsonNode, copyMeta: boolean): void {
  const meta = dest.meta;
  dest.swap(source);
  if (!copyMeta) dest.meta = meta;
}

function mergeStruct(dest: JsonNode, source: JsonNode, flags: MergeFlags): void {
  for (const [key, child] of source.getStruct()) {
    if (child.isNull()) {
      if (!flags.ignoreOverride) dest.remove(key);
      continue;
    }
    const existing = dest.getStruct().get(key);
    if (existing === undefined) {
      dest.set(key, child);
    } else {
      mergeNode(existing, child, flags);
    }
  }
}

function mergeVector(dest: JsonNode, source: JsonNode, flags: MergeFlags): void {
  const items = dest.vector();
  source.getVector().forEach((child, index) => {
    const existing = items[index];
    if (existing === undefined) {
      items.push(child);
    } else {
      mergeNode(existing, child, flags);
    }
  });
}

function mergeNode(dest: JsonNode, source: JsonNode, flags: MergeFlags): void {
  if (source.isNull()) {
    if (!flags.ignoreOverride) dest.clear();
    return;
  }

  if (dest.isNull()) {
    dest.swap(source);
    return;
  }

  if (source.hasFlag(OVERRIDE_FLAG) && !flags.ignoreOverride) {
    replace(dest, source, flags.copyMeta);
    return;
  }

  if (dest.isStruct() && source.isStruct()) {
    mergeStruct(dest, source, flags);
  } else if (dest.isVector() && source.isVector()) {
    mergeVector(dest, source, flags);
  } else {
    replace(dest, source, flags.copyMeta);
    return;
  }

  if (flags.copyMeta) dest.meta = source.meta;
}

/**
 * Folds `source` into `dest`.
 *
 * Consumes `source`: its children may be moved into `dest`, and it is reset
 * to an empty Null node afterwards. Use mergeCopy to keep the source.
 */
export function merge(
  dest: JsonNode,
  source: JsonNode,
  options: MergeOptions = {}
): void {
  mergeNode(dest, source, {
    ignoreOverride: options.ignoreOverride ?? false,
    copyMeta: options.copyMeta ?? false,
  });

  if (!Object.isFrozen(source)) {
    source.clear();
    source.meta = '';
    source.flags = [];
  }
}

/** Non-destructive merge: `source` is cloned first and left untouched */
export function mergeCopy(
  dest: JsonNode,
  source: JsonNode,
  options: MergeOptions = {}
): void {
  merge(dest, source.clone(), options);
}

/**
 * Rebuilds `descendant` on top of a copy of `base`: fields set in the
 * descendant win, the rest is inherited, and nulls in the descendant delete
 * inherited fields. Meta follows the descendant.
 */
export function inherit(descendant: JsonNode, base: JsonNode): void {
  const result = base.clone();
  mergeCopy(result, descendant, { copyMeta: true });
  descendant.swap(result);
}
