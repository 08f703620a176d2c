/**
 * tcsv — format constants
 *
 * These constants define the on-disk contract of a typed CSV document.
 * Changing any token breaks every document written by an earlier build.
 *
 *   <column>: <type-alias>      ← header block, kept verbatim
 *   ...
 *   @@                          ← HEADER_SEPARATOR (first occurrence only)
 *   <field1>,<field2>,...       ← grid block, GRID_DELIMITER between cells
 *   <value1>,<value2>,...
 */

import type { LogLevel } from './types';

// ─── Document layout ──────────────────────────────────────────────────────────

/** Divides the header block from the grid block. */
export const HEADER_SEPARATOR = '@@';

/** Separates a column name from its type alias on a header line. */
export const ANNOTATION_SEPARATOR = ':';

export const GRID_DELIMITER = ',';
export const GRID_NEWLINE   = '\n';

// ─── Array cells ──────────────────────────────────────────────────────────────

/**
 * Array cell wire format: one record per element,
 *
 *   [tag: 1 char]["::"][literal][NUL]
 *
 * NUL is reserved; string elements containing it are rejected on encode.
 */
export const ARRAY_TAG_SEPARATOR     = '::';
export const ARRAY_RECORD_TERMINATOR = '\u0000';

export type ArrayItemTag = 'B' | 'S' | 'I' | 'F';

export const ARRAY_TAG_BOOLEAN: ArrayItemTag = 'B';
export const ARRAY_TAG_STRING:  ArrayItemTag = 'S';
export const ARRAY_TAG_INTEGER: ArrayItemTag = 'I';
export const ARRAY_TAG_FLOAT:   ArrayItemTag = 'F';

export const ARRAY_TAGS: ReadonlySet<string> = new Set<ArrayItemTag>(['B', 'S', 'I', 'F']);

// ─── Boolean cells ────────────────────────────────────────────────────────────

export const BOOLEAN_TRUE  = '1';
export const BOOLEAN_FALSE = '0';

// ─── Locking ──────────────────────────────────────────────────────────────────

/** Suffix appended to the backing path to name its lock marker. */
export const LOCK_SUFFIX = '.lock';

export const DEFAULT_LOCK_RETRY_MS   = 25;
export const DEFAULT_LOCK_TIMEOUT_MS = 10_000;

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';
