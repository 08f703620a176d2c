/**
 * tcsv — type definitions
 *
 * A cell is always text on disk (the low-level value). The header binds each
 * column to a TypeVariant that turns that text into a high-level value and
 * back.
 */

// ─── Values ───────────────────────────────────────────────────────────────────

/** Explicit recursive JSON model used by the object variant. */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Element types an array cell can carry. No nesting. */
export type ArrayItem = boolean | string | number;

/**
 * Decoded value exposed to callers. `null` is the absent value: it is what an
 * empty cell decodes to for the scalar variants.
 */
export type HighValue =
  | number
  | string
  | boolean
  | Date
  | ArrayItem[]
  | JsonValue
  | null;

// ─── Type kinds ───────────────────────────────────────────────────────────────

/**
 * The closed set of column types.
 *
 * integer:  decimal text, truncated toward zero on both sides.
 * float:    decimal text as produced by String(n).
 * string:   stored verbatim.
 * boolean:  '1' or '0'.
 * array:    tagged records, see ARRAY_* in constants.ts.
 * datetime: POSIX seconds, fractional part allowed.
 * object:   a single JSON text.
 */
export type TypeKind =
  | 'integer'
  | 'float'
  | 'string'
  | 'boolean'
  | 'array'
  | 'datetime'
  | 'object';

/** Decoded value type for each kind. */
export interface HighValueOf {
  integer:  number | null;
  float:    number | null;
  string:   string;
  boolean:  boolean | null;
  array:    ArrayItem[];
  datetime: Date | null;
  object:   JsonValue;
}

/**
 * Encode/decode pair bound to one kind.
 *
 * encode() takes any HighValue because rows arrive from callers untyped per
 * column; a value of the wrong runtime type is an EncodeError, not a silent
 * coercion. For every value encode() accepts, decode(encode(x)) equals x,
 * with one exception: the integer variant truncates a fractional number
 * toward zero, so decode(encode(1.5)) is 1.
 */
export interface TypeVariant<K extends TypeKind = TypeKind> {
  readonly kind: K;
  encode(value: HighValue): string;
  decode(text: string): HighValueOf[K];
}

// ─── Rows ─────────────────────────────────────────────────────────────────────

/** Column name → variant. Key set equals the grid's field set. */
export type Annotations = ReadonlyMap<string, TypeVariant>;

/**
 * A row as stored: column name → raw cell text. Rows are keyed by arbitrary
 * column names (`constructor`, `__proto__` ...), so they are built with
 * Object.fromEntries and read through own-property checks only.
 */
export type EncodedRow = Readonly<Record<string, string>>;

/** A row as read: column name → decoded value. */
export type DecodedRow = Record<string, HighValue>;

/** Input to insertRow / updateRow. Keys must be declared columns. */
export type WritableRow = Readonly<Record<string, HighValue>>;

// ─── Logging & options ────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface DocumentOptions {
  /** Sleep between attempts to create the lock marker. */
  readonly lockRetryMs?:   number;
  /** Give up with LockTimeoutError after waiting this long. */
  readonly lockTimeoutMs?: number;
  /** Minimum level for the built-in logger. Ignored when `logger` is given. */
  readonly logLevel?:      LogLevel;
  readonly logger?:        Logger;
}

export interface ResolvedOptions {
  readonly lockRetryMs:   number;
  readonly lockTimeoutMs: number;
  readonly logger:        Logger;
}
