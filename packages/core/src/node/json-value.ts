/**
 * Plain JavaScript shape of a JSON document, as produced by JSON.parse
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };
