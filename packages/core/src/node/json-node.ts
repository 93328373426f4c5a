/**
 * JsonNode - tagged-value document tree
 *
 * A node holds exactly one payload matching its JsonType tag, plus free-form
 * `meta` (provenance) and `flags` (merge markers such as "override").
 *
 * Two accessor families:
 * - get*() read the payload and throw ContractViolationError when the tag
 *   does not match. getFloat() also accepts Integer nodes.
 * - set*() / vector() / struct() retype the node when needed, clearing the
 *   old payload. This is how trees are built up programmatically.
 *
 * Struct children iterate in ascending key order. Ownership is strictly
 * tree-shaped: never insert the same node instance in two places.
 */

import { ErrorCode } from '../errors/codes.js';
import { ContractViolationError, type PointerError } from '../types/errors.js';
import type { Result } from '../types/result.js';
import type { Shape } from '../convert/shapes.js';
import {
  resolveMutablePointer as resolveMutableIn,
  resolvePointer as resolveIn,
  tryResolvePointer as tryResolveIn,
} from '../pointer/json-pointer.js';
import { writeJson } from '../serializer/json-writer.js';
import { JsonType, isNumericType } from './json-type.js';
import type { JsonValue } from './json-value.js';
import { SortedMap, type ReadonlySortedMap } from './sorted-map.js';

export type JsonMap = SortedMap<JsonNode>;
export type ReadonlyJsonMap = ReadonlySortedMap<JsonNode>;

/** Flag that makes merge replace a subtree instead of combining into it */
export const OVERRIDE_FLAG = 'override';

type JsonData =
  | { type: JsonType.Null }
  | { type: JsonType.Bool; value: boolean }
  | { type: JsonType.Float; value: number }
  | { type: JsonType.Integer; value: number }
  | { type: JsonType.String; value: string }
  | { type: JsonType.Vector; value: JsonNode[] }
  | { type: JsonType.Struct; value: JsonMap };

export interface BoolFromString {
  success: boolean;
  value: boolean;
}

function emptyData(type: JsonType): JsonData {
  switch (type) {
    case JsonType.Null:
      return { type };
    case JsonType.Bool:
      return { type, value: false };
    case JsonType.Float:
    case JsonType.Integer:
      return { type, value: 0 };
    case JsonType.String:
      return { type, value: '' };
    case JsonType.Vector:
      return { type, value: [] };
    case JsonType.Struct:
      return { type, value: new SortedMap<JsonNode>() };
  }
}

export class JsonNode {
  /** Shared null returned by read-only lookups of missing children. Frozen. */
  static readonly NULL: JsonNode = JsonNode.createFrozenNull();

  private data: JsonData;

  /** free to use provenance field */
  meta = '';
  /** merge markers such as "override" */
  flags: string[] = [];

  constructor(type: JsonType = JsonType.Null) {
    this.data = emptyData(type);
  }

  private static createFrozenNull(): JsonNode {
    const node = new JsonNode();
    Object.freeze(node.flags);
    Object.freeze(node);
    return node;
  }

  getType(): JsonType {
    return this.data.type;
  }

  isNull(): boolean {
    return this.data.type === JsonType.Null;
  }

  isBool(): boolean {
    return this.data.type === JsonType.Bool;
  }

  /** Float or Integer */
  isNumber(): boolean {
    return isNumericType(this.data.type);
  }

  isString(): boolean {
    return this.data.type === JsonType.String;
  }

  isVector(): boolean {
    return this.data.type === JsonType.Vector;
  }

  isStruct(): boolean {
    return this.data.type === JsonType.Struct;
  }

  /** Convert node to another type. Converting to Null clears all data */
  setType(type: JsonType): void {
    if (this.data.type === type) return;
    this.data = emptyData(type);
  }

  clear(): void {
    this.setType(JsonType.Null);
  }

  setMeta(meta: string, recursive = true): void {
    this.meta = meta;
    if (!recursive) return;
    const data = this.data;
    if (data.type === JsonType.Vector) {
      for (const child of data.value) child.setMeta(meta, true);
    } else if (data.type === JsonType.Struct) {
      for (const child of data.value.values()) child.setMeta(meta, true);
    }
  }

  hasFlag(flag: string): boolean {
    return this.flags.includes(flag);
  }

  addFlag(flag: string): this {
    if (!this.flags.includes(flag)) this.flags.push(flag);
    return this;
  }

  /**
   * True if the node holds non-null data that merging cannot extend further.
   * Used when seeding a common base out of many similar fragments.
   */
  containsBaseData(): boolean {
    const data = this.data;
    switch (data.type) {
      case JsonType.Null:
        return false;
      case JsonType.Struct:
        return data.value.values().some((child) => child.containsBaseData());
      default:
        return true;
    }
  }

  /** Leaves and empty containers; drives single-line layout in toJson */
  isCompact(): boolean {
    const data = this.data;
    switch (data.type) {
      case JsonType.Vector:
        return data.value.length === 0;
      case JsonType.Struct:
        return data.value.size === 0;
      default:
        return true;
    }
  }

  /**
   * Bool nodes succeed with their value; String nodes succeed when their
   * trimmed, lower-cased text is "true" or "false".
   */
  tryBoolFromString(): BoolFromString {
    const data = this.data;
    if (data.type === JsonType.Bool) {
      return { success: true, value: data.value };
    }
    if (data.type === JsonType.String) {
      const text = data.value.trim().toLowerCase();
      if (text === 'true') return { success: true, value: true };
      if (text === 'false') return { success: true, value: false };
    }
    return { success: false, value: false };
  }

  // ---------------------------------------------------------------------------
  // Read accessors: contract violation on tag mismatch
  // ---------------------------------------------------------------------------

  getBool(): boolean {
    const data = this.data;
    if (data.type === JsonType.Bool) return data.value;
    throw this.mismatch(JsonType.Bool);
  }

  /** Float and Integer nodes are both accepted */
  getFloat(): number {
    const data = this.data;
    if (data.type === JsonType.Float || data.type === JsonType.Integer) {
      return data.value;
    }
    throw this.mismatch(JsonType.Float);
  }

  /** Only Integer nodes are accepted */
  getInteger(): number {
    const data = this.data;
    if (data.type === JsonType.Integer) return data.value;
    throw this.mismatch(JsonType.Integer);
  }

  getString(): string {
    const data = this.data;
    if (data.type === JsonType.String) return data.value;
    throw this.mismatch(JsonType.String);
  }

  getVector(): readonly JsonNode[] {
    const data = this.data;
    if (data.type === JsonType.Vector) return data.value;
    throw this.mismatch(JsonType.Vector);
  }

  getStruct(): ReadonlyJsonMap {
    const data = this.data;
    if (data.type === JsonType.Struct) return data.value;
    throw this.mismatch(JsonType.Struct);
  }

  // ---------------------------------------------------------------------------
  // Mutating accessors: retype on mismatch
  // ---------------------------------------------------------------------------

  setBool(value: boolean): this {
    this.data = { type: JsonType.Bool, value };
    return this;
  }

  setFloat(value: number): this {
    this.data = { type: JsonType.Float, value };
    return this;
  }

  /** Stores the value truncated toward zero; it must fit in ±(2^53 - 1) */
  setInteger(value: number): this {
    const truncated = Math.trunc(value) || 0;
    if (!Number.isFinite(value) || !Number.isSafeInteger(truncated)) {
      throw new ContractViolationError({
        message: `Integer nodes cannot hold ${String(value)} exactly`,
        errorCode: ErrorCode.INVALID_ARGUMENT,
        context: { value },
      });
    }
    this.data = { type: JsonType.Integer, value: truncated };
    return this;
  }

  setString(value: string): this {
    this.data = { type: JsonType.String, value };
    return this;
  }

  /** Live element array; a node of any other type is cleared and retyped */
  vector(): JsonNode[] {
    const data = this.data;
    if (data.type === JsonType.Vector) return data.value;
    const value: JsonNode[] = [];
    this.data = { type: JsonType.Vector, value };
    return value;
  }

  /** Live key map; a node of any other type is cleared and retyped */
  struct(): JsonMap {
    const data = this.data;
    if (data.type === JsonType.Struct) return data.value;
    const value = new SortedMap<JsonNode>();
    this.data = { type: JsonType.Struct, value };
    return value;
  }

  // ---------------------------------------------------------------------------
  // Indexing
  // ---------------------------------------------------------------------------

  /** Child by key, creating a Null child (and retyping to Struct) when absent */
  get(key: string): JsonNode {
    const map = this.struct();
    let child = map.get(key);
    if (child === undefined) {
      child = new JsonNode();
      map.set(key, child);
    }
    return child;
  }

  /**
   * Read-only lookup by struct key or vector index. Missing children, and any
   * lookup on a Null node, yield JsonNode.NULL.
   */
  at(key: string | number): JsonNode {
    const data = this.data;
    if (data.type === JsonType.Null) return JsonNode.NULL;
    if (typeof key === 'number') {
      if (data.type !== JsonType.Vector) throw this.mismatch(JsonType.Vector);
      return data.value[key] ?? JsonNode.NULL;
    }
    if (data.type !== JsonType.Struct) throw this.mismatch(JsonType.Struct);
    return data.value.get(key) ?? JsonNode.NULL;
  }

  set(key: string, value: JsonNode): this {
    this.struct().set(key, value);
    return this;
  }

  /** Deletes a struct key; false when absent or when the node is not a Struct */
  remove(key: string): boolean {
    const data = this.data;
    if (data.type !== JsonType.Struct) return false;
    return data.value.delete(key);
  }

  push(value: JsonNode): this {
    this.vector().push(value);
    return this;
  }

  // ---------------------------------------------------------------------------
  // Whole-node operations
  // ---------------------------------------------------------------------------

  /** Exchanges payload, meta and flags with another node */
  swap(other: JsonNode): void {
    const { data, meta, flags } = this;
    this.data = other.data;
    this.meta = other.meta;
    this.flags = other.flags;
    other.data = data;
    other.meta = meta;
    other.flags = flags;
  }

  /** Deep copy, meta and flags included */
  clone(): JsonNode {
    const copy = new JsonNode();
    copy.meta = this.meta;
    copy.flags = [...this.flags];
    const data = this.data;
    switch (data.type) {
      case JsonType.Vector:
        copy.data = {
          type: JsonType.Vector,
          value: data.value.map((child) => child.clone()),
        };
        break;
      case JsonType.Struct:
        copy.data = {
          type: JsonType.Struct,
          value: new SortedMap(
            data.value
              .entries()
              .map(([key, child]): [string, JsonNode] => [key, child.clone()])
          ),
        };
        break;
      default:
        copy.data = { ...data };
    }
    return copy;
  }

  /** Deep structural equality of tag and payload; meta and flags are ignored */
  equals(other: JsonNode): boolean {
    if (this === other) return true;
    const a = this.data;
    const b = other.data;
    switch (a.type) {
      case JsonType.Null:
        return b.type === JsonType.Null;
      case JsonType.Bool:
        return b.type === JsonType.Bool && b.value === a.value;
      case JsonType.Float:
        return b.type === JsonType.Float && b.value === a.value;
      case JsonType.Integer:
        return b.type === JsonType.Integer && b.value === a.value;
      case JsonType.String:
        return b.type === JsonType.String && b.value === a.value;
      case JsonType.Vector: {
        if (b.type !== JsonType.Vector) return false;
        if (a.value.length !== b.value.length) return false;
        return a.value.every((child, index) => {
          const peer = b.value[index];
          return peer !== undefined && child.equals(peer);
        });
      }
      case JsonType.Struct: {
        if (b.type !== JsonType.Struct) return false;
        if (a.value.size !== b.value.size) return false;
        for (const [key, child] of a.value) {
          const peer = b.value.get(key);
          if (peer === undefined || !child.equals(peer)) return false;
        }
        return true;
      }
    }
  }

  /** Plain JavaScript value; Integer and Float both become numbers */
  toPlain(): JsonValue {
    const data = this.data;
    switch (data.type) {
      case JsonType.Null:
        return null;
      case JsonType.Bool:
      case JsonType.Float:
      case JsonType.Integer:
      case JsonType.String:
        return data.value;
      case JsonType.Vector:
        return data.value.map((child) => child.toPlain());
      case JsonType.Struct:
        return Object.fromEntries(
          data.value.entries().map(([key, child]) => [key, child.toPlain()])
        );
    }
  }

  // ---------------------------------------------------------------------------
  // Delegates
  // ---------------------------------------------------------------------------

  /** @throws PointerError when a segment cannot be resolved */
  resolvePointer(path: string): JsonNode {
    return resolveIn(this, path);
  }

  tryResolvePointer(path: string): Result<JsonNode, PointerError> {
    return tryResolveIn(this, path);
  }

  /** Creates missing struct children along the way, never vector slots */
  resolveMutablePointer(path: string): JsonNode {
    return resolveMutableIn(this, path);
  }

  convertTo<T>(shape: Shape<T>): T {
    return shape.convert(this);
  }

  toJson(compact = false): string {
    return writeJson(this, compact);
  }

  private mismatch(expected: JsonType): ContractViolationError {
    return new ContractViolationError({
      message: `Cannot read ${expected} from a ${this.data.type} node`,
      context: { expected, actual: this.data.type, meta: this.meta },
    });
  }
}
