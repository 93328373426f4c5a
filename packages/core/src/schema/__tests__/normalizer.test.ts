import { describe, expect, test } from 'vitest';

import { fromJsonValue } from '../../node/builders';
import { JsonNode } from '../../node/json-node';
import { ErrorCode } from '../../errors/codes';
import { isErr, isOk } from '../../types/result';
import { maximize, minimize } from '../normalizer';
import { createRegistry } from './schemas';

const fullUnit = () =>
  fromJsonValue({
    name: 'imp',
    hp: 10,
    speed: 4,
    stats: { attack: 1, defense: 3 },
    tags: [{ weight: 1, id: 'a' }],
    optional: 0,
  });

describe('minimize', () => {
  test('removes required properties equal to their default', () => {
    const node = fullUnit();
    const result = minimize(node, 'core:unit', createRegistry());

    expect(isOk(result)).toBe(true);
    expect(node.toPlain()).toEqual({
      name: 'imp',
      optional: 0,
      stats: { defense: 3 },
      tags: [{ id: 'a' }],
    });
  });

  test('a property that becomes its default after recursion is removed', () => {
    const registry = createRegistry().register(
      'core:nested',
      fromJsonValue({
        type: 'object',
        required: ['inner'],
        properties: {
          inner: {
            type: 'object',
            default: {},
            required: ['x'],
            properties: { x: { type: 'integer', default: 1 } },
          },
        },
      })
    );
    const node = fromJsonValue({ inner: { x: 1 } });

    minimize(node, 'nested', registry);
    expect(node.toPlain()).toEqual({});
  });
});

describe('maximize', () => {
  test('restores what minimize removed', () => {
    const registry = createRegistry();
    const node = fullUnit();

    minimize(node, 'core:unit', registry);
    const result = maximize(node, 'core:unit', registry);

    expect(isOk(result)).toBe(true);
    expect(node.equals(fullUnit())).toBe(true);
  });

  test('turns a Null node into a struct of defaults', () => {
    const node = new JsonNode();
    maximize(node, 'core:unit', createRegistry());

    expect(node.toPlain()).toEqual({
      hp: 10,
      speed: 4,
      stats: { attack: 1, defense: 1 },
      tags: [],
    });
  });

  test('null values are replaced by defaults', () => {
    const node = fromJsonValue({ name: 'imp', hp: null, stats: { attack: 5 } });
    maximize(node, 'core:unit', createRegistry());

    expect(node.at('hp').getInteger()).toBe(10);
    expect(node.at('stats').toPlain()).toEqual({ attack: 5, defense: 1 });
  });

  test('inserted defaults are copies', () => {
    const registry = createRegistry();
    const node = new JsonNode();
    maximize(node, 'core:unit', registry);
    node.get('tags').push(fromJsonValue({ weight: 2 }));

    const schemaDefault = registry.lookup('core', 'unit')?.resolvePointer('/properties/tags/default');
    expect(schemaDefault?.toPlain()).toEqual([]);
  });
});

describe('schema resolution failures', () => {
  test('an unknown schema is an error result', () => {
    const result = maximize(new JsonNode(), 'core:dragon', createRegistry());
    expect(isErr(result) && result.error.errorCode).toBe(ErrorCode.SCHEMA_NOT_FOUND);
  });

  test('a dangling $ref under a required property is an error result', () => {
    const result = minimize(fromJsonValue({ a: 1 }), 'core:dangling', createRegistry());
    expect(isErr(result) && result.error.schemaUri).toBe('core:nowhere');
  });

  test('$ref chains longer than maxRefDepth are cut off', () => {
    const result = minimize(fromJsonValue({}), 'core:loop', createRegistry(), {
      maxRefDepth: 3,
    });
    expect(isErr(result) && result.error.errorCode).toBe(
      ErrorCode.SCHEMA_REF_DEPTH_EXCEEDED
    );
  });
});
