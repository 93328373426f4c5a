/**
 * Type tags of a JsonNode. Exactly one payload is live per tag.
 */
export enum JsonType {
  Null = 'null',
  Bool = 'bool',
  Float = 'float',
  Integer = 'integer',
  String = 'string',
  Vector = 'vector',
  Struct = 'struct',
}

export function isNumericType(type: JsonType): boolean {
  return type === JsonType.Float || type === JsonType.Integer;
}
