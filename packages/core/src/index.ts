// @jsonstrata/core entry point
//
// Public API:
// - JsonNode, the tagged-value tree, with builders and conversion shapes
// - merge / mergeCopy / inherit, intersect / difference
// - schema registry, validator and minimize / maximize
// - parseJsonNode and fragment assembly; toJson lives on the node
// - the error model, Result type, options and logger used by all of the above

// Tree
export {
  JsonNode,
  OVERRIDE_FLAG,
  type BoolFromString,
  type JsonMap,
  type ReadonlyJsonMap,
} from './node/json-node.js';
export { JsonType, isNumericType } from './node/json-type.js';
export type { JsonValue } from './node/json-value.js';
export { SortedMap, type ReadonlySortedMap } from './node/sorted-map.js';
export {
  boolNode,
  floatNode,
  intNode,
  stringNode,
  fromJsonValue,
} from './node/builders.js';
export {
  splitPointer,
  joinPointer,
  resolvePointer,
  tryResolvePointer,
  resolveMutablePointer,
} from './pointer/json-pointer.js';
export { Shapes, type Shape } from './convert/shapes.js';
export { writeJson } from './serializer/json-writer.js';

// Algorithms
export { merge, mergeCopy, inherit } from './merge/merge.js';
export { intersect } from './algebra/intersect.js';
export { difference } from './algebra/difference.js';

// Schemas
export {
  parseSchemaUri,
  formatSchemaUri,
  documentKey,
  type SchemaUri,
} from './schema/schema-uri.js';
export {
  InMemorySchemaRegistry,
  getSchema,
  locateSchema,
  type LocatedSchema,
  type SchemaEntry,
  type SchemaRegistry,
} from './schema/registry.js';
export {
  SchemaValidator,
  validate,
  formatFailure,
  type SchemaValidatorOptions,
  type ValidationReport,
} from './schema/validator.js';
export { minimize, maximize } from './schema/normalizer.js';

// Text input and assembly
export {
  parseJsonNode,
  type ParseOptions,
  type ParseResult,
} from './parser/json-parser.js';
export {
  assembleFromFiles,
  assembleFromAllSources,
  type AssembleCallOptions,
  type AssembleResult,
  type Fragment,
  type FragmentSource,
} from './assemble/assemble.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  StrataError,
  ContractViolationError,
  PointerError,
  SchemaError,
  ValidationError,
  ConfigError,
  ParseError,
  FragmentError,
  isStrataError,
  createValidationFailure,
  type ErrorContext,
  type SerializedError,
  type UserError,
  type StrataErrorParams,
  type ValidationFailure,
} from './types/errors.js';
export {
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  type Result,
} from './types/result.js';
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  type AssembleOptions,
  type MergeOptions,
  type ResolvedOptions,
  type SchemaOptions,
  type StrataOptions,
} from './types/options.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  MemoryLogger,
  type Logger,
} from './util/logger.js';
