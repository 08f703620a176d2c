import { readFileSync } from 'node:fs';

import { TypedCsvDocument } from './document';
import { resolveOptions } from './options';
import { parseDocument } from './parser';
import type { DocumentOptions } from './types';

// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  JsonValue,
  ArrayItem,
  HighValue,
  HighValueOf,
  TypeKind,
  TypeVariant,
  Annotations,
  EncodedRow,
  DecodedRow,
  WritableRow,
  LogLevel,
  Logger,
  DocumentOptions,
  ResolvedOptions,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  HEADER_SEPARATOR,
  ANNOTATION_SEPARATOR,
  GRID_DELIMITER,
  ARRAY_TAG_SEPARATOR,
  ARRAY_RECORD_TERMINATOR,
  LOCK_SUFFIX,
} from './constants';

// ─── Type registry ────────────────────────────────────────────────────────────
export { VARIANTS, ALIAS_TABLE, lookupType, EncodeError, DecodeError } from './datatype';

// ─── Parsing ──────────────────────────────────────────────────────────────────
export { parseHeader, ParseError } from './header';
export { parseDocument, ensureCoverage, CoverageError } from './parser';
export type { ParsedDocument } from './parser';
export { readGrid, writeGrid } from './grid';
export type { Grid } from './grid';

// ─── Row store ────────────────────────────────────────────────────────────────
export { TypedCsvDocument, UpdateError, RowIndexError } from './document';
export { withFileLock, lockPathFor, LockTimeoutError } from './lock';
export { createLogger } from './logger';
export { resolveOptions } from './options';

// ─── Entry points ─────────────────────────────────────────────────────────────

/** Parse document text. Mutations stay in memory. */
export function parseString(content: string, options?: DocumentOptions): TypedCsvDocument {
  return new TypedCsvDocument(parseDocument(content), null, resolveOptions(options));
}

/** Parse a file; every later mutation rewrites it under `<path>.lock`. */
export function useFile(path: string, options?: DocumentOptions): TypedCsvDocument {
  const resolved = resolveOptions(options);
  const content  = readFileSync(path, 'utf8');
  return new TypedCsvDocument(parseDocument(content), path, resolved);
}

/** Document text as it would be written to disk. */
export function serializeDocument(doc: TypedCsvDocument): string {
  return doc.serialize();
}
