import { ErrorCode } from '../errors/codes.js';
import { SchemaError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

/**
 * Parsed form of `<scheme>:<name>#<pointer>`
 */
export interface SchemaUri {
  scheme: string;
  name: string;
  /** '' addresses the whole document */
  pointer: string;
}

const SCHEME_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*$/;

function invalid(uri: string, reason: string): SchemaError {
  return new SchemaError({
    message: `Invalid schema URI "${uri}": ${reason}`,
    errorCode: ErrorCode.INVALID_SCHEMA_URI,
    context: { schema: uri },
  });
}

/**
 * Splits a schema URI. Without a scheme, `defaultScheme` is assumed.
 */
export function parseSchemaUri(
  uri: string,
  defaultScheme: string
): Result<SchemaUri, SchemaError> {
  const hash = uri.indexOf('#');
  const reference = hash >= 0 ? uri.slice(0, hash) : uri;
  const pointer = hash >= 0 ? uri.slice(hash + 1) : '';

  if (pointer !== '' && !pointer.startsWith('/')) {
    return err(invalid(uri, 'the fragment must be empty or start with "/"'));
  }

  const colon = reference.indexOf(':');
  const scheme = colon >= 0 ? reference.slice(0, colon) : defaultScheme;
  const name = colon >= 0 ? reference.slice(colon + 1) : reference;

  if (!SCHEME_PATTERN.test(scheme)) {
    return err(invalid(uri, `"${scheme}" is not a scheme name`));
  }
  if (name === '') {
    return err(invalid(uri, 'the schema name is empty'));
  }
  return ok({ scheme, name, pointer });
}

/** Document key, `<scheme>:<name>` */
export function documentKey(uri: Pick<SchemaUri, 'scheme' | 'name'>): string {
  return `${uri.scheme}:${uri.name}`;
}

export function formatSchemaUri(uri: SchemaUri): string {
  return uri.pointer === '' ? documentKey(uri) : `${documentKey(uri)}#${uri.pointer}`;
}
