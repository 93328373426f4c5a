/**
 * Slash-delimited path resolution ("/items/0/name").
 *
 * Segments are struct keys or base-10 vector indexes; a numeric-looking
 * segment is an index on a Vector and an ordinary key on a Struct. There is
 * no escaping, so keys containing "/" cannot be addressed.
 */

import { ErrorCode } from '../errors/codes.js';
import { PointerError } from '../types/errors.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import type { JsonNode } from '../node/json-node.js';
import { JsonType } from '../node/json-type.js';

const INDEX_PATTERN = /^(0|[1-9][0-9]*)$/;

/**
 * Splits a pointer into segments. '' addresses the root; any other pointer
 * must start with '/'.
 */
export function splitPointer(path: string): Result<string[], PointerError> {
  if (path === '') return ok([]);
  if (!path.startsWith('/')) {
    return err(
      new PointerError({
        message: `Pointer "${path}" must be empty or start with "/"`,
        errorCode: ErrorCode.INVALID_POINTER,
        context: { path },
      })
    );
  }
  return ok(path.slice(1).split('/'));
}

export function joinPointer(segments: readonly (string | number)[]): string {
  return segments.map((segment) => `/${segment}`).join('');
}

function parseIndex(segment: string): number | undefined {
  return INDEX_PATTERN.test(segment) ? Number(segment) : undefined;
}

function unresolved(
  path: string,
  segments: readonly string[],
  depth: number,
  reason: string
): PointerError {
  const segment = segments[depth] ?? '';
  return new PointerError({
    message: `Cannot resolve "${path}" at "${joinPointer(segments.slice(0, depth + 1))}": ${reason}`,
    context: { path, segment, depth },
  });
}

function step(
  current: JsonNode,
  path: string,
  segments: readonly string[],
  depth: number,
  mutable: boolean
): Result<JsonNode, PointerError> {
  const segment = segments[depth] ?? '';
  const type = current.getType();

  if (type === JsonType.Vector) {
    const index = parseIndex(segment);
    if (index === undefined) {
      return err(unresolved(path, segments, depth, 'not a vector index'));
    }
    const child = current.getVector()[index];
    if (child === undefined) {
      return err(unresolved(path, segments, depth, `index ${index} is out of range`));
    }
    return ok(child);
  }

  if (type === JsonType.Struct || (mutable && type === JsonType.Null)) {
    if (mutable) return ok(current.get(segment));
    const child = current.getStruct().get(segment);
    if (child === undefined) {
      return err(unresolved(path, segments, depth, 'no such key'));
    }
    return ok(child);
  }

  return err(unresolved(path, segments, depth, `cannot index into a ${type} node`));
}

function walk(
  root: JsonNode,
  path: string,
  mutable: boolean
): Result<JsonNode, PointerError> {
  const split = splitPointer(path);
  if (isErr(split)) return split;
  const segments = split.value;

  let current = root;
  for (let depth = 0; depth < segments.length; depth++) {
    const next = step(current, path, segments, depth, mutable);
    if (isErr(next)) return next;
    current = next.value;
  }
  return ok(current);
}

export function tryResolvePointer(
  root: JsonNode,
  path: string
): Result<JsonNode, PointerError> {
  return walk(root, path, false);
}

/**
 * @throws PointerError when a segment is missing, out of range or not indexable
 */
export function resolvePointer(root: JsonNode, path: string): JsonNode {
  return walk(root, path, false).unwrap();
}

/**
 * Like resolvePointer, but Null nodes become Structs and missing struct keys
 * are created as Null children. Vector slots are never created.
 *
 * @throws PointerError when a segment cannot be resolved
 */
export function resolveMutablePointer(root: JsonNode, path: string): JsonNode {
  return walk(root, path, true).unwrap();
}
