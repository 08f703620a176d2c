/**
 * tcsv — grid block reader/writer
 *
 * Thin adapter over papaparse. The grid is conventional comma-delimited text
 * with RFC 4180 quoting; the first record names the fields. Cells are kept as
 * raw text here: no type coercion happens at this layer.
 */

import Papa from 'papaparse';

import { GRID_DELIMITER, GRID_NEWLINE } from './constants';
import { ParseError } from './header';
import type { EncodedRow } from './types';

/** Cell text of `field`, or '' when the row has no own cell for it. */
export function cellOf(row: EncodedRow, field: string): string {
  return Object.hasOwn(row, field) ? row[field] ?? '' : '';
}

export interface Grid {
  readonly fields: readonly string[];
  readonly rows:   EncodedRow[];
}

/**
 * Read a grid block. Throws ParseError on malformed quoting, duplicate field
 * names, or a data line whose cell count differs from the field count.
 */
export function readGrid(text: string): Grid {
  const parsed = Papa.parse<string[]>(text, {
    delimiter:      GRID_DELIMITER,
    skipEmptyLines: true,
  });

  const firstError = parsed.errors[0];
  if (firstError !== undefined) {
    const where = firstError.row !== undefined ? ` (grid record ${firstError.row + 1})` : '';
    throw new ParseError(`Malformed grid${where}: ${firstError.message}`);
  }

  const [fieldRecord, ...records] = parsed.data;
  if (fieldRecord === undefined) {
    return { fields: [], rows: [] };
  }

  const seen = new Set<string>();
  for (const field of fieldRecord) {
    if (seen.has(field)) {
      throw new ParseError(`Duplicate field name in grid: "${field}"`);
    }
    seen.add(field);
  }

  const rows = records.map((record, i) => {
    if (record.length !== fieldRecord.length) {
      throw new ParseError(
        `Grid record ${i + 2} has ${record.length} cells; ` +
        `the field line declares ${fieldRecord.length}.`,
      );
    }
    return Object.fromEntries(
      fieldRecord.map((field, col): [string, string] => [field, record[col] ?? '']),
    );
  });

  return { fields: fieldRecord, rows };
}

/**
 * Write fields and rows as a grid block: the field line, then one line per
 * row in field order. No trailing newline. A row missing a field writes an
 * empty cell.
 */
export function writeGrid(fields: readonly string[], rows: readonly EncodedRow[]): string {
  return Papa.unparse(
    {
      fields: [...fields],
      data:   rows.map(row => fields.map(field => cellOf(row, field))),
    },
    {
      delimiter: GRID_DELIMITER,
      newline:   GRID_NEWLINE,
    },
  );
}
