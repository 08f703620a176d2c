/**
 * tcsv — document parsing and annotation coverage
 *
 * A document is split at the FIRST occurrence of HEADER_SEPARATOR:
 *
 *   header block  → parseHeader()  → annotations
 *   grid block    → readGrid()     → fields + encoded rows
 *
 * Coverage is then checked in both directions, once. A returned
 * ParsedDocument always satisfies: set(fields) === set(annotations.keys()).
 */

import { HEADER_SEPARATOR } from './constants';
import { readGrid } from './grid';
import { parseHeader, ParseError } from './header';
import type { Annotations, EncodedRow } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** Declared columns and grid columns disagree. `column` is the offender. */
export class CoverageError extends Error {
  readonly column: string;

  constructor(column: string, message: string) {
    super(message);
    this.name = 'CoverageError';
    this.column = column;
  }
}

// ─── Public types ─────────────────────────────────────────────────────────────

export interface ParsedDocument {
  readonly annotations: Annotations;
  readonly fields:      readonly string[];
  readonly rows:        EncodedRow[];
  /** Header block exactly as it appeared before the separator. */
  readonly rawHeader:   string;
}

// ─── Internal helpers ─────────────────────────────────────────────────────────

/** Drop leading and trailing blank lines; interior text is untouched. */
function stripBlankLines(text: string): string {
  return text
    .replace(/^(?:[ \t]*\r?\n)+/, '')
    .replace(/(?:\r?\n[ \t]*)+$/, '');
}

// ─── ensureCoverage ───────────────────────────────────────────────────────────

/**
 * Check that every grid field is annotated and every annotation names a grid
 * field. Throws CoverageError naming the first offending column.
 */
export function ensureCoverage(fields: readonly string[], annotations: Annotations): void {
  for (const field of fields) {
    if (!annotations.has(field)) {
      throw new CoverageError(field, `Not annotated field: "${field}"`);
    }
  }

  const fieldSet = new Set(fields);
  for (const column of annotations.keys()) {
    if (!fieldSet.has(column)) {
      throw new CoverageError(column, `Annotated invalid field: "${column}"`);
    }
  }
}

// ─── parseDocument ────────────────────────────────────────────────────────────

/**
 * Parse full document text.
 *
 * Throws ParseError when the separator is missing or the header/grid is
 * malformed, CoverageError when annotations and fields disagree.
 */
export function parseDocument(text: string): ParsedDocument {
  const sep = text.indexOf(HEADER_SEPARATOR);
  if (sep === -1) {
    throw new ParseError(`Header separator not found "${HEADER_SEPARATOR}"`);
  }

  const rawHeader = text.slice(0, sep);
  const gridBlock = stripBlankLines(text.slice(sep + HEADER_SEPARATOR.length));

  const annotations      = parseHeader(rawHeader);
  const { fields, rows } = readGrid(gridBlock);

  ensureCoverage(fields, annotations);

  return { annotations, fields, rows, rawHeader };
}
