/**
 * tcsv — TypedCsvDocument (row store)
 *
 * Holds a parsed document: annotations and field order (fixed after parse),
 * the verbatim header text, and the rows in their encoded (textual) form.
 * Values are decoded on read and encoded on write; nothing is cached.
 *
 * ── Mutation cycle ───────────────────────────────────────────────────────────
 *
 *   1. validate    — index in range (RowIndexError), columns declared (UpdateError)
 *   2. encode      — every supplied value through its column's variant
 *   3. swap        — replace the row object in memory
 *   4. persist     — when bound to a path: lock, rewrite the whole file, unlock
 *
 * A failure in 1 or 2 leaves memory and disk untouched. A failure in 4 (lock
 * timeout, I/O error) propagates after memory has already changed; the file
 * keeps its previous content.
 *
 * ── Read asymmetry ───────────────────────────────────────────────────────────
 *
 * read() with an out-of-range index returns undefined. Every mutation with an
 * out-of-range index throws RowIndexError.
 *
 * Instances are not safe for concurrent mutation from several threads; the
 * file lock only serializes writers across processes.
 */

import { writeFileSync } from 'node:fs';

import { HEADER_SEPARATOR, GRID_NEWLINE } from './constants';
import { cellOf, writeGrid } from './grid';
import { withFileLock } from './lock';
import type { ParsedDocument } from './parser';
import type {
  Annotations,
  DecodedRow,
  EncodedRow,
  HighValue,
  ResolvedOptions,
  TypeVariant,
  WritableRow,
} from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** A mutation referenced a column that is not annotated. Nothing changed. */
export class UpdateError extends Error {
  readonly column: string;

  constructor(column: string) {
    super(`Invalid column: "${column}"`);
    this.name = 'UpdateError';
    this.column = column;
  }
}

/** A mutation was given an out-of-range or non-integral row index. */
export class RowIndexError extends RangeError {
  readonly index: number;

  constructor(index: number, rowCount: number) {
    super(
      Number.isInteger(index)
        ? `Invalid row index: ${index}. Total rows in document = ${rowCount}`
        : `Invalid index: ${index} is not an integer.`,
    );
    this.name = 'RowIndexError';
    this.index = index;
  }
}

// ─── TypedCsvDocument ─────────────────────────────────────────────────────────

export class TypedCsvDocument implements Iterable<DecodedRow> {
  private readonly _annotations: Annotations;
  private readonly _fields:      readonly string[];
  private readonly _rows:        EncodedRow[];
  private readonly _rawHeader:   string;
  private readonly _path:        string | null;
  private readonly _options:     ResolvedOptions;

  /** @internal — use parseString() or useFile() */
  constructor(parsed: ParsedDocument, path: string | null, options: ResolvedOptions) {
    this._annotations = parsed.annotations;
    this._fields      = parsed.fields;
    this._rows        = parsed.rows;
    this._rawHeader   = parsed.rawHeader;
    this._path        = path;
    this._options     = options;
  }

  // ── Accessors ─────────────────────────────────────────────────────────────

  get annotations(): Annotations {
    return this._annotations;
  }

  /** Column names in grid order. */
  get fields(): readonly string[] {
    return this._fields;
  }

  get rowCount(): number {
    return this._rows.length;
  }

  /** Backing file, or null for a document parsed from a string. */
  get path(): string | null {
    return this._path;
  }

  get rawHeader(): string {
    return this._rawHeader;
  }

  // ── Reads ─────────────────────────────────────────────────────────────────

  /**
   * Decode the row at `index`. Returns undefined when there is no such row
   * (including a non-integral index). Throws DecodeError when a stored cell
   * does not decode.
   */
  read(index: number): DecodedRow | undefined {
    if (!this.isValidIndex(index)) return undefined;
    return this.decodeRow(this.rowAt(index));
  }

  /**
   * Lazily decode every row. The row list is snapshotted when readAll() is
   * called; mutations made during the traversal are not observed by it.
   */
  readAll(): Generator<DecodedRow, void, undefined> {
    return this.decodeRows(this._rows.slice());
  }

  [Symbol.iterator](): Iterator<DecodedRow> {
    return this.readAll();
  }

  // ── Mutations ─────────────────────────────────────────────────────────────

  /**
   * Replace the row at `index` with the encoded values of `row`. Columns
   * omitted from `row` keep their stored value.
   */
  updateRow(index: number, row: WritableRow): void {
    this.validateIndex(index);
    const encoded = this.encodeRow(row);

    this._rows[index] = Object.fromEntries([
      ...Object.entries(this.rowAt(index)),
      ...Object.entries(encoded),
    ]);
    this.save();
  }

  /** Update a single column of the row at `index`. */
  updateField(index: number, column: string, value: HighValue): void {
    this.validateIndex(index);
    const encoded = this.variantFor(column).encode(value);

    const cells: Array<[string, string]> = [...Object.entries(this.rowAt(index)), [column, encoded]];
    this._rows[index] = Object.fromEntries(cells);
    this.save();
  }

  /** Remove the row at `index`; later rows shift down by one. */
  removeRow(index: number): void {
    this.validateIndex(index);

    this._rows.splice(index, 1);
    this.save();
  }

  /** Append a row. Columns omitted from `row` are stored as empty cells. */
  insertRow(row: WritableRow): void {
    const encoded = this.encodeRow(row);

    this._rows.push(Object.fromEntries(
      this._fields.map((field): [string, string] => [field, cellOf(encoded, field)]),
    ));
    this.save();
  }

  // ── Persistence ───────────────────────────────────────────────────────────

  /** Full document text: verbatim header, separator, grid. */
  serialize(): string {
    return (
      this._rawHeader +
      HEADER_SEPARATOR + GRID_NEWLINE +
      writeGrid(this._fields, this._rows) + GRID_NEWLINE
    );
  }

  /**
   * Rewrite the backing file under its lock. No-op for an unbound document.
   * Every mutation calls this; call it directly to restore a file edited
   * behind the document's back.
   */
  save(): void {
    const path = this._path;
    if (path === null) return;

    const { lockRetryMs, lockTimeoutMs, logger } = this._options;
    const content = this.serialize();

    withFileLock(path, { retryMs: lockRetryMs, timeoutMs: lockTimeoutMs, logger }, () => {
      writeFileSync(path, content, 'utf8');
    });
    logger.debug(`rewrote ${path} (${this._rows.length} rows)`);
  }

  // ── Internal helpers ──────────────────────────────────────────────────────

  private isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this._rows.length;
  }

  private validateIndex(index: number): void {
    if (!this.isValidIndex(index)) {
      throw new RowIndexError(index, this._rows.length);
    }
  }

  private rowAt(index: number): EncodedRow {
    const row = this._rows[index];
    if (row === undefined) {
      throw new RowIndexError(index, this._rows.length);
    }
    return row;
  }

  private variantFor(column: string): TypeVariant {
    const variant = this._annotations.get(column);
    if (variant === undefined) {
      throw new UpdateError(column);
    }
    return variant;
  }

  /** Check every column, then encode every value. */
  private encodeRow(row: WritableRow): EncodedRow {
    const entries = Object.entries(row);
    const variants = entries.map(([column]) => this.variantFor(column));

    return Object.fromEntries(
      entries.map(([column, value], i): [string, string] => {
        const variant = variants[i] ?? this.variantFor(column);
        return [column, variant.encode(value)];
      }),
    );
  }

  private decodeRow(row: EncodedRow): DecodedRow {
    return Object.fromEntries(
      this._fields.map((field): [string, HighValue] => [
        field,
        this.variantFor(field).decode(cellOf(row, field)),
      ]),
    );
  }

  private *decodeRows(rows: readonly EncodedRow[]): Generator<DecodedRow, void, undefined> {
    for (const row of rows) {
      yield this.decodeRow(row);
    }
  }
}
