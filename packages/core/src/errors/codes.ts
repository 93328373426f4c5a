/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Contract violations (E001–E099): programmer errors, never handled at runtime
  TYPE_MISMATCH = 'E001',
  INVALID_ARGUMENT = 'E002',

  // Parse Errors (E100–E199)
  PARSE_ERROR = 'E100',

  // Pointer Errors (E200–E299)
  POINTER_UNRESOLVED = 'E200',
  INVALID_POINTER = 'E201',

  // Schema Errors (E300–E399)
  SCHEMA_NOT_FOUND = 'E300',
  INVALID_SCHEMA_URI = 'E301',
  SCHEMA_COMPILE_FAILED = 'E302',
  SCHEMA_REF_DEPTH_EXCEEDED = 'E303',

  // Validation Errors (E400–E499)
  VALIDATION_FAILED = 'E400',

  // Configuration Errors (E500–E599)
  CONFIGURATION_ERROR = 'E500',

  // Fragment Errors (E600–E699)
  FRAGMENT_NOT_FOUND = 'E600',
  FRAGMENT_INVALID = 'E601',

  // Internal Errors (E900–E999)
  INTERNAL_ERROR = 'E900',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.TYPE_MISMATCH]: 70,
  [ErrorCode.INVALID_ARGUMENT]: 70,
  [ErrorCode.PARSE_ERROR]: 10,
  [ErrorCode.POINTER_UNRESOLVED]: 20,
  [ErrorCode.INVALID_POINTER]: 21,
  [ErrorCode.SCHEMA_NOT_FOUND]: 30,
  [ErrorCode.INVALID_SCHEMA_URI]: 31,
  [ErrorCode.SCHEMA_COMPILE_FAILED]: 32,
  [ErrorCode.SCHEMA_REF_DEPTH_EXCEEDED]: 33,
  [ErrorCode.VALIDATION_FAILED]: 40,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.FRAGMENT_NOT_FOUND]: 60,
  [ErrorCode.FRAGMENT_INVALID]: 61,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
