/**
 * tcsv — type registry
 *
 * The seven variants are fixed. Each one is a frozen object implementing
 * TypeVariant<K>; VARIANTS maps every TypeKind to its instance, so adding a
 * kind without a variant fails to compile.
 *
 * The alias table is built once at module load and never mutated:
 *
 *   integer | int | i     → integer
 *   float   | flt | f     → float
 *   string  | str | s     → string
 *   boolean | bool | b    → boolean
 *   array   | arr | a     → array
 *   datetime | dt | d     → datetime
 *   object  | obj | o     → object
 *
 * Empty cells: null encodes to '' everywhere except object (JSON 'null').
 * '' decodes to null, except string ('') and array ([]).
 */

import { z } from 'zod';

import {
  ARRAY_RECORD_TERMINATOR,
  ARRAY_TAG_SEPARATOR,
  ARRAY_TAG_BOOLEAN,
  ARRAY_TAG_STRING,
  ARRAY_TAG_INTEGER,
  ARRAY_TAG_FLOAT,
  ARRAY_TAGS,
  BOOLEAN_TRUE,
  BOOLEAN_FALSE,
} from './constants';
import type {
  ArrayItem,
  HighValue,
  JsonValue,
  TypeKind,
  TypeVariant,
} from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

export class EncodeError extends Error {
  readonly kind: TypeKind;

  constructor(kind: TypeKind, message: string) {
    super(message);
    this.name = 'EncodeError';
    this.kind = kind;
  }
}

export class DecodeError extends Error {
  readonly kind: TypeKind;

  constructor(kind: TypeKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
    this.kind = kind;
  }
}

// ─── Internal helpers ─────────────────────────────────────────────────────────

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'Date';
  return typeof value;
}

/**
 * Parse a decimal cell. Number('') and Number('  ') are 0, so blank text is
 * rejected before conversion rather than read as zero.
 */
function parseNumeric(kind: TypeKind, text: string): number {
  const n = Number(text);
  if (text.trim() === '' || (Number.isNaN(n) && text.trim() !== 'NaN')) {
    throw new DecodeError(kind, `Cannot decode ${kind}: '${text}' is not numeric.`);
  }
  return n;
}

// ─── Scalar variants ──────────────────────────────────────────────────────────

const IntegerType: TypeVariant<'integer'> = Object.freeze({
  kind: 'integer' as const,

  encode(value: HighValue): string {
    if (value === null) return '';
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new EncodeError('integer', `Cannot encode ${describe(value)} (${String(value)}) as integer.`);
    }
    // Math.trunc(-0.5) is -0, which String() renders as '0'.
    return String(Math.trunc(value));
  },

  decode(text: string): number | null {
    if (text === '') return null;
    const n = parseNumeric('integer', text);
    if (!Number.isFinite(n)) {
      throw new DecodeError('integer', `Cannot decode integer: '${text}' is not finite.`);
    }
    return Math.trunc(n);
  },
});

const FloatType: TypeVariant<'float'> = Object.freeze({
  kind: 'float' as const,

  encode(value: HighValue): string {
    if (value === null) return '';
    if (typeof value !== 'number') {
      throw new EncodeError('float', `Cannot encode ${describe(value)} (${String(value)}) as float.`);
    }
    return String(value);
  },

  decode(text: string): number | null {
    if (text === '') return null;
    return parseNumeric('float', text);
  },
});

const StringType: TypeVariant<'string'> = Object.freeze({
  kind: 'string' as const,

  encode(value: HighValue): string {
    if (value === null) return '';
    if (typeof value !== 'string') {
      throw new EncodeError('string', `Cannot encode ${describe(value)} as string.`);
    }
    return value;
  },

  decode(text: string): string {
    return text;
  },
});

const BooleanType: TypeVariant<'boolean'> = Object.freeze({
  kind: 'boolean' as const,

  encode(value: HighValue): string {
    if (value === null) return '';
    if (typeof value !== 'boolean') {
      throw new EncodeError('boolean', `Cannot encode ${describe(value)} (${String(value)}) as boolean.`);
    }
    return value ? BOOLEAN_TRUE : BOOLEAN_FALSE;
  },

  decode(text: string): boolean | null {
    if (text === '') return null;
    return text === BOOLEAN_TRUE;
  },
});

const DateTimeType: TypeVariant<'datetime'> = Object.freeze({
  kind: 'datetime' as const,

  encode(value: HighValue): string {
    if (value === null) return '';
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      throw new EncodeError('datetime', `Cannot encode ${describe(value)} as datetime: expected a valid Date.`);
    }
    return String(value.getTime() / 1000);
  },

  decode(text: string): Date | null {
    if (text === '') return null;
    const seconds = parseNumeric('datetime', text);
    const date    = new Date(Math.round(seconds * 1000));
    if (Number.isNaN(date.getTime())) {
      throw new DecodeError('datetime', `Cannot decode datetime: '${text}' is out of range.`);
    }
    return date;
  },
});

// ─── Object variant ───────────────────────────────────────────────────────────

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

const ObjectType: TypeVariant<'object'> = Object.freeze({
  kind: 'object' as const,

  encode(value: HighValue): string {
    const result = jsonValueSchema.safeParse(value);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new EncodeError('object', `Cannot encode object: value is not JSON-representable${where}.`);
    }
    return JSON.stringify(result.data);
  },

  decode(text: string): JsonValue {
    if (text === '') return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new DecodeError('object', `Cannot decode object: malformed JSON '${text}'.`, { cause: err });
    }
    const result = jsonValueSchema.safeParse(parsed);
    if (!result.success) {
      throw new DecodeError('object', `Cannot decode object: '${text}' is not a JSON value.`);
    }
    return result.data;
  },
});

// ─── Array variant ────────────────────────────────────────────────────────────

function tagFor(item: unknown): string | null {
  switch (typeof item) {
    case 'boolean': return ARRAY_TAG_BOOLEAN;
    case 'string':  return ARRAY_TAG_STRING;
    case 'number':
      if (!Number.isFinite(item)) return null;
      return Number.isInteger(item) ? ARRAY_TAG_INTEGER : ARRAY_TAG_FLOAT;
    default:
      return null;
  }
}

function decodeItem(tag: string, literal: string, record: string): ArrayItem {
  switch (tag) {
    case ARRAY_TAG_BOOLEAN:
      if (literal === 'true')  return true;
      if (literal === 'false') return false;
      break;
    case ARRAY_TAG_STRING:
      return literal;
    case ARRAY_TAG_INTEGER: {
      const n = Number(literal);
      if (literal.trim() !== '' && Number.isInteger(n)) return n;
      break;
    }
    case ARRAY_TAG_FLOAT: {
      const n = Number(literal);
      if (literal.trim() !== '' && Number.isFinite(n)) return n;
      break;
    }
  }
  throw new DecodeError('array', `Cannot decode item: '${record}' has an invalid ${tag} literal.`);
}

const ArrayType: TypeVariant<'array'> = Object.freeze({
  kind: 'array' as const,

  encode(value: HighValue): string {
    if (value === null) return '';
    if (!Array.isArray(value)) {
      throw new EncodeError('array', `Cannot encode ${describe(value)} as array.`);
    }
    const items: readonly unknown[] = value;

    // Validate every element before emitting anything: no partial output.
    const tags: string[] = [];
    for (const item of items) {
      const tag = tagFor(item);
      if (tag === null) {
        throw new EncodeError(
          'array',
          `Cannot encode item: <${describe(item)}> (${String(item)}). Data type not supported.`,
        );
      }
      if (typeof item === 'string' && item.includes(ARRAY_RECORD_TERMINATOR)) {
        throw new EncodeError('array', 'Cannot encode item: string contains the reserved NUL terminator.');
      }
      tags.push(tag);
    }

    let chain = '';
    items.forEach((item, i) => {
      chain += `${tags[i]}${ARRAY_TAG_SEPARATOR}${String(item)}${ARRAY_RECORD_TERMINATOR}`;
    });
    return chain;
  },

  decode(text: string): ArrayItem[] {
    const items: ArrayItem[] = [];

    for (const record of text.split(ARRAY_RECORD_TERMINATOR)) {
      if (record === '') continue;

      const sep = record.indexOf(ARRAY_TAG_SEPARATOR);
      if (sep === -1) {
        throw new DecodeError('array', `Cannot decode item: '${record}' has no type tag.`);
      }
      const tag     = record.slice(0, sep);
      const literal = record.slice(sep + ARRAY_TAG_SEPARATOR.length);
      if (!ARRAY_TAGS.has(tag)) {
        throw new DecodeError('array', `Cannot decode item: '${record}' invalid type: ${tag}`);
      }
      items.push(decodeItem(tag, literal, record));
    }

    return items;
  },
});

// ─── Registry ─────────────────────────────────────────────────────────────────

export const VARIANTS: { readonly [K in TypeKind]: TypeVariant<K> } = Object.freeze({
  integer:  IntegerType,
  float:    FloatType,
  string:   StringType,
  boolean:  BooleanType,
  array:    ArrayType,
  datetime: DateTimeType,
  object:   ObjectType,
});

export const ALIAS_TABLE: ReadonlyMap<string, TypeKind> = new Map<string, TypeKind>([
  ['integer',  'integer'],  ['int',  'integer'],  ['i', 'integer'],
  ['float',    'float'],    ['flt',  'float'],    ['f', 'float'],
  ['string',   'string'],   ['str',  'string'],   ['s', 'string'],
  ['boolean',  'boolean'],  ['bool', 'boolean'],  ['b', 'boolean'],
  ['array',    'array'],    ['arr',  'array'],    ['a', 'array'],
  ['datetime', 'datetime'], ['dt',   'datetime'], ['d', 'datetime'],
  ['object',   'object'],   ['obj',  'object'],   ['o', 'object'],
]);

/** Case-insensitive alias lookup. Returns undefined for an unknown alias. */
export function lookupType(alias: string): TypeVariant | undefined {
  const kind = ALIAS_TABLE.get(alias.trim().toLowerCase());
  return kind === undefined ? undefined : VARIANTS[kind];
}
