import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import {
  InMemorySchemaRegistry,
  JsonNode,
  OVERRIDE_FLAG,
  difference,
  fromJsonValue,
  intersect,
  isOk,
  maximize,
  merge,
  minimize,
} from '../../src/index.js';
import {
  keySubset,
  nullFreeDocument,
  smallDocument,
  UNIT_SCHEMA,
  unitDocument,
} from '../arbitraries/json-node.js';

const RUN = { seed: 202_610, numRuns: 100 } as const;

function nullTree(keys: readonly string[]): JsonNode {
  const node = new JsonNode();
  const map = node.struct();
  for (const key of keys) map.set(key, new JsonNode());
  return node;
}

describe('merge laws', () => {
  it('a tree of nulls deletes exactly its keys', () => {
    fc.assert(
      fc.property(nullFreeDocument, keySubset, (value, keys) => {
        const dest = fromJsonValue(value);
        merge(dest, nullTree(keys));

        const expected = { ...value };
        for (const key of keys) delete expected[key];
        expect(dest.equals(fromJsonValue(expected))).toBe(true);
      }),
      RUN
    );
  });

  it('with ignoreOverride a tree of nulls changes nothing', () => {
    fc.assert(
      fc.property(nullFreeDocument, keySubset, (value, keys) => {
        const dest = fromJsonValue(value);
        merge(dest, nullTree(keys), { ignoreOverride: true });
        expect(dest.equals(fromJsonValue(value))).toBe(true);
      }),
      RUN
    );
  });

  it('merging a document into Null yields the document', () => {
    fc.assert(
      fc.property(nullFreeDocument, (value) => {
        const dest = new JsonNode();
        merge(dest, fromJsonValue(value));
        expect(dest.equals(fromJsonValue(value))).toBe(true);
      }),
      RUN
    );
  });
});

describe('difference laws', () => {
  it('base merged with difference(node, base) rebuilds node', () => {
    fc.assert(
      fc.property(nullFreeDocument, nullFreeDocument, (nodeValue, baseValue) => {
        const node = fromJsonValue(nodeValue);
        const base = fromJsonValue(baseValue);

        const patch = difference(node, base);
        const rebuilt = base.clone();
        merge(rebuilt, patch);

        expect(rebuilt.equals(node)).toBe(true);
      }),
      RUN
    );
  });

  it('a node differs from itself by nothing', () => {
    fc.assert(
      fc.property(nullFreeDocument, (value) => {
        const node = fromJsonValue(value);
        expect(difference(node, node.clone()).toPlain()).toEqual({});
      }),
      RUN
    );
  });
});

describe('intersect laws', () => {
  it('is idempotent without pruning', () => {
    fc.assert(
      fc.property(smallDocument, (node) => {
        expect(intersect(node, node.clone(), false).equals(node)).toBe(true);
      }),
      RUN
    );
  });

  it('is commutative', () => {
    fc.assert(
      fc.property(smallDocument, smallDocument, fc.boolean(), (a, b, prune) => {
        const left = intersect(a, b, prune);
        const right = intersect(b, a, prune);
        expect(left.equals(right)).toBe(true);
      }),
      RUN
    );
  });

  it('leaves its inputs untouched', () => {
    fc.assert(
      fc.property(smallDocument, smallDocument, (a, b) => {
        const left = a.clone();
        const right = b.clone();
        intersect(left, right);
        expect(left.equals(a)).toBe(true);
        expect(right.equals(b)).toBe(true);
      }),
      RUN
    );
  });
});

describe('normalization laws', () => {
  const registry = new InMemorySchemaRegistry().register(
    'core:unit',
    fromJsonValue(UNIT_SCHEMA)
  );

  it('maximize undoes minimize on complete documents', () => {
    fc.assert(
      fc.property(unitDocument, (value) => {
        const node = fromJsonValue(value);

        expect(isOk(minimize(node, 'core:unit', registry))).toBe(true);
        expect(isOk(maximize(node, 'core:unit', registry))).toBe(true);
        expect(node.equals(fromJsonValue(value))).toBe(true);
      }),
      RUN
    );
  });

  it('minimize is stable', () => {
    fc.assert(
      fc.property(unitDocument, (value) => {
        const once = fromJsonValue(value);
        minimize(once, 'core:unit', registry);
        const twice = once.clone();
        minimize(twice, 'core:unit', registry);
        expect(twice.equals(once)).toBe(true);
      }),
      RUN
    );
  });
});

describe('equality', () => {
  it('ignores meta and flags', () => {
    fc.assert(
      fc.property(smallDocument, fc.string({ maxLength: 6 }), (node, origin) => {
        const tagged = node.clone();
        tagged.setMeta(origin);
        tagged.addFlag(OVERRIDE_FLAG);
        expect(tagged.equals(node)).toBe(true);
      }),
      RUN
    );
  });
});
