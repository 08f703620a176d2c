/**
 * tcsv — header block parsing
 *
 * The header block is everything before the first HEADER_SEPARATOR. Each
 * non-blank line declares one column:
 *
 *   <column> ':' <type-alias>
 *
 * Whitespace around both parts is ignored and the alias is case-insensitive.
 * parseHeader() never returns a partial result: the first bad line throws.
 */

import { ANNOTATION_SEPARATOR } from './constants';
import { lookupType } from './datatype';
import type { TypeVariant } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** Malformed document structure: separator, header line, alias or grid. */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

// ─── parseHeader ──────────────────────────────────────────────────────────────

/**
 * Parse the declaration block into column → variant, in line order.
 *
 * Throws ParseError on a line without ':', an empty column name, an unknown
 * type alias, or a column declared twice.
 */
export function parseHeader(block: string): Map<string, TypeVariant> {
  const annotations = new Map<string, TypeVariant>();

  for (const line of block.split('\n')) {
    if (line.trim() === '') continue;

    const sep = line.indexOf(ANNOTATION_SEPARATOR);
    if (sep === -1) {
      throw new ParseError(
        `Invalid annotation for: "${line.trim()}" (""). ` +
        `Expected "<column>${ANNOTATION_SEPARATOR} <type>".`,
      );
    }

    const column   = line.slice(0, sep).trim();
    const rawAlias = line.slice(sep + 1).trim();

    if (column === '') {
      throw new ParseError(`Annotation has no column name: "${line.trim()}" ("${rawAlias}").`);
    }

    const variant = lookupType(rawAlias);
    if (variant === undefined) {
      throw new ParseError(`Invalid data type found for: ${column} ("${rawAlias}")`);
    }

    if (annotations.has(column)) {
      throw new ParseError(`Column annotated twice: ${column} ("${rawAlias}")`);
    }

    annotations.set(column, variant);
  }

  return annotations;
}
