/**
 * tcsv — header and document parsing
 *
 * parseHeader() line rules, separator handling, grid reading, and the
 * two-way coverage check between annotations and grid fields.
 */

import { describe, it, expect } from 'vitest';
import {
  parseHeader,
  parseDocument,
  ensureCoverage,
  readGrid,
  writeGrid,
  ParseError,
  CoverageError,
  VARIANTS,
} from '../src/index';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

// ─── parseHeader ──────────────────────────────────────────────────────────────

describe('parseHeader', () => {
  it('maps columns to variants in line order', () => {
    const annotations = parseHeader('id: int\nname: str\nactive: bool\n');

    expect([...annotations.keys()]).toEqual(['id', 'name', 'active']);
    expect(annotations.get('id')).toBe(VARIANTS.integer);
    expect(annotations.get('name')).toBe(VARIANTS.string);
    expect(annotations.get('active')).toBe(VARIANTS.boolean);
  });

  it('strips whitespace, folds alias case and skips blank lines', () => {
    const annotations = parseHeader('\n   score :   FLOAT  \r\n\n  tags:Arr\n');

    expect([...annotations.entries()].map(([k, v]) => [k, v.kind])).toEqual([
      ['score', 'float'],
      ['tags', 'array'],
    ]);
  });

  it('returns an empty map for an empty block', () => {
    expect(parseHeader('').size).toBe(0);
  });

  it('names the column and raw alias when the alias is unknown', () => {
    const err = thrownBy(() => parseHeader('id: int\nprice: Decimal\n'));

    expect(err).toBeInstanceOf(ParseError);
    expect(err).toMatchObject({ message: 'Invalid data type found for: price ("Decimal")' });
  });

  it('rejects a line without a separator', () => {
    expect(() => parseHeader('id int\n')).toThrow(ParseError);
  });

  it('rejects an empty column name', () => {
    expect(() => parseHeader(': int\n')).toThrow(ParseError);
  });

  it('rejects a column declared twice', () => {
    expect(() => parseHeader('a: int\na: str\n')).toThrow(/annotated twice: a/);
  });
});

// ─── readGrid / writeGrid ─────────────────────────────────────────────────────

describe('grid', () => {
  it('keeps cell text raw and honours quoting', () => {
    const grid = readGrid('a,b\n1,"x, y"\n"2",""');

    expect(grid.fields).toEqual(['a', 'b']);
    expect(grid.rows).toEqual([
      { a: '1', b: 'x, y' },
      { a: '2', b: '' },
    ]);
  });

  it('rejects a data line with the wrong number of cells', () => {
    expect(() => readGrid('a,b\n1,2,3')).toThrow(/Grid record 2 has 3 cells/);
  });

  it('rejects duplicate field names', () => {
    expect(() => readGrid('a,a\n1,2')).toThrow(ParseError);
  });

  it('keeps a __proto__ field as an own cell', () => {
    const grid = readGrid('__proto__,b\n1,2');

    expect(Object.entries(grid.rows[0] ?? {})).toEqual([['__proto__', '1'], ['b', '2']]);
    expect(writeGrid(grid.fields, grid.rows)).toBe('__proto__,b\n1,2');
  });

  it('writes an empty cell for a field the row only inherits', () => {
    expect(writeGrid(['constructor'], [{}])).toBe('constructor\n');
  });

  it('quotes cells only where needed when writing', () => {
    const text = writeGrid(['a', 'b'], [{ a: '1', b: 'x' }, { a: '2', b: '{"k":1}' }]);

    expect(text).toBe('a,b\n1,x\n2,"{""k"":1}"');
    expect(readGrid(text).rows[1]).toEqual({ a: '2', b: '{"k":1}' });
  });
});

// ─── parseDocument ────────────────────────────────────────────────────────────

describe('parseDocument', () => {
  const text = 'a: int\nb: str\n@@\na,b\n1,x\n2,y\n';

  it('splits header from grid and keeps rows encoded', () => {
    const parsed = parseDocument(text);

    expect(parsed.rawHeader).toBe('a: int\nb: str\n');
    expect(parsed.fields).toEqual(['a', 'b']);
    expect(parsed.rows).toEqual([
      { a: '1', b: 'x' },
      { a: '2', b: 'y' },
    ]);
  });

  it('fails when the separator is missing', () => {
    expect(() => parseDocument('a: int\na\n1\n')).toThrow(ParseError);
  });

  it('splits at the first separator only', () => {
    const parsed = parseDocument('note: str\n@@\nnote\nmail@@example\n');

    expect(parsed.rows).toEqual([{ note: 'mail@@example' }]);
  });

  it('ignores blank lines around the grid', () => {
    const parsed = parseDocument('a: int\n@@\n\n\na\n5\n\n\n');

    expect(parsed.fields).toEqual(['a']);
    expect(parsed.rows).toEqual([{ a: '5' }]);
  });

  it('accepts CRLF line endings', () => {
    const parsed = parseDocument('a: int\r\nb: str\r\n@@\r\na,b\r\n1,x\r\n');

    expect(parsed.fields).toEqual(['a', 'b']);
    expect(parsed.rows).toEqual([{ a: '1', b: 'x' }]);
  });
});

// ─── Coverage ─────────────────────────────────────────────────────────────────

describe('coverage', () => {
  it('fails on a grid field that is not annotated', () => {
    const err = thrownBy(() => parseDocument('a: int\n@@\na,extra\n1,2\n'));

    expect(err).toBeInstanceOf(CoverageError);
    expect(err).toMatchObject({ column: 'extra' });
  });

  it('fails on an annotation with no grid field', () => {
    const err = thrownBy(() => parseDocument('a: int\nghost: str\n@@\na\n1\n'));

    expect(err).toBeInstanceOf(CoverageError);
    expect(err).toMatchObject({ column: 'ghost' });
  });

  it('fails when annotations exist but the grid is empty', () => {
    expect(() => parseDocument('a: int\n@@\n')).toThrow(CoverageError);
  });

  it('ensureCoverage accepts the same set in a different order', () => {
    const annotations = parseHeader('b: str\na: int\n');
    expect(() => ensureCoverage(['a', 'b'], annotations)).not.toThrow();
  });
});
