import { fromJsonValue } from '../../node/builders';
import { InMemorySchemaRegistry } from '../registry';

export const creatureSchema = {
  type: 'object',
  required: ['name', 'hp'],
  properties: {
    name: { type: 'string' },
    hp: { type: 'integer', minimum: 1 },
    contact: { type: 'string', format: 'email' },
    stack: { $ref: '#/definitions/stack' },
  },
  definitions: {
    stack: {
      type: 'object',
      required: ['count'],
      properties: { count: { type: 'integer' } },
    },
  },
};

export const unitSchema = {
  type: 'object',
  required: ['name', 'hp', 'speed', 'stats', 'tags'],
  properties: {
    name: { type: 'string' },
    hp: { type: 'integer', default: 10 },
    speed: { $ref: '#/definitions/speed' },
    stats: {
      type: 'object',
      required: ['attack', 'defense'],
      properties: {
        attack: { type: 'integer', default: 1 },
        defense: { type: 'integer', default: 1 },
      },
    },
    tags: {
      type: 'array',
      default: [],
      items: {
        type: 'object',
        required: ['weight'],
        properties: { weight: { type: 'integer', default: 1 } },
      },
    },
    optional: { type: 'integer', default: 0 },
  },
  definitions: {
    speed: { type: 'integer', default: 4 },
  },
};

export function createRegistry(): InMemorySchemaRegistry {
  return new InMemorySchemaRegistry()
    .register('core:creature', fromJsonValue(creatureSchema))
    .register('core:unit', fromJsonValue(unitSchema))
    .register(
      'mod:artifact',
      fromJsonValue({
        type: 'object',
        properties: { guard: { $ref: 'core:creature#/definitions/stack' } },
      })
    )
    .register('core:loop', fromJsonValue({ $ref: '#' }))
    .register(
      'core:dangling',
      fromJsonValue({
        type: 'object',
        required: ['a'],
        properties: { a: { $ref: 'core:nowhere' } },
      })
    );
}
