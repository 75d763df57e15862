// ============================================================================
// AQL Helpers
// ============================================================================
// Collection and attribute names cannot be bind parameters in every position
// (edge collection lists, attribute paths), so they are checked before being
// written into query text. Values always travel as bind parameters.
// ============================================================================

import { InvalidArgumentError } from '../../errors.js';

const COLLECTION_NAME = /^[A-Za-z_][A-Za-z0-9_-]{0,255}$/;
const FIELD_PATH = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

export function assertCollectionName(name: string, label = 'collection'): string {
  if (!COLLECTION_NAME.test(name)) {
    throw new InvalidArgumentError(`Invalid ${label} name: '${name}'`);
  }
  return name;
}

export function assertFieldPath(path: string): string {
  if (!FIELD_PATH.test(path)) {
    throw new InvalidArgumentError(`Invalid field path: '${path}'`);
  }
  return path;
}

/** `doc.a.b` for the field path `a.b` */
export function fieldRef(variable: string, path: string): string {
  return `${variable}.${assertFieldPath(path)}`;
}
