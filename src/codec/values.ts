import { Decimal } from 'decimal.js';
import type { CompositeValue } from './composite-value';
import { formatBox, formatPoint, type PgBox, type PgPoint } from './geometry';
import { formatDate, formatTime, formatTimestamp, type TemporalCalendar } from './temporal';

/**
 * Generic wrapper pairing a type label with its string form
 * Used for types without a dedicated in-memory representation (json, bit strings)
 */
export interface PgObject {
  readonly type: string;
  readonly value: string | null;
}

/**
 * In-memory field value, discriminated by kind
 */
export type Value =
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'int2'; readonly value: number }
  | { readonly kind: 'int4'; readonly value: number }
  | { readonly kind: 'int8'; readonly value: bigint }
  | { readonly kind: 'float4'; readonly value: number }
  | { readonly kind: 'float8'; readonly value: number }
  | { readonly kind: 'decimal'; readonly value: Decimal }
  | { readonly kind: 'char'; readonly value: string }
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'bytes'; readonly value: Uint8Array }
  | { readonly kind: 'point'; readonly value: PgPoint }
  | { readonly kind: 'box'; readonly value: PgBox }
  | { readonly kind: 'object'; readonly value: PgObject }
  | { readonly kind: 'date'; readonly value: Date }
  | { readonly kind: 'time'; readonly value: Date }
  | { readonly kind: 'timestamp'; readonly value: Date }
  | { readonly kind: 'composite'; readonly value: CompositeValue };

export type ValueKind = Value['kind'];

export type ValueOf<K extends ValueKind> = Extract<Value, { kind: K }>;

/**
 * A field slot: a value or SQL NULL
 */
export type Attribute = Value | null;

const VALUE_KINDS: ReadonlySet<string> = new Set<ValueKind>([
  'bool', 'int2', 'int4', 'int8', 'float4', 'float8', 'decimal', 'char', 'text',
  'bytes', 'point', 'box', 'object', 'date', 'time', 'timestamp', 'composite',
]);

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

export const Values = {
  bool: (value: boolean): ValueOf<'bool'> => ({ kind: 'bool', value }),
  int2: (value: number): ValueOf<'int2'> => ({ kind: 'int2', value }),
  int4: (value: number): ValueOf<'int4'> => ({ kind: 'int4', value }),
  int8: (value: bigint): ValueOf<'int8'> => ({ kind: 'int8', value }),
  float4: (value: number): ValueOf<'float4'> => ({ kind: 'float4', value: Math.fround(value) }),
  float8: (value: number): ValueOf<'float8'> => ({ kind: 'float8', value }),
  decimal: (value: Decimal.Value): ValueOf<'decimal'> => ({ kind: 'decimal', value: new Decimal(value) }),
  char: (value: string): ValueOf<'char'> => ({ kind: 'char', value }),
  text: (value: string): ValueOf<'text'> => ({ kind: 'text', value }),
  bytes: (value: Uint8Array): ValueOf<'bytes'> => ({ kind: 'bytes', value }),
  point: (value: PgPoint): ValueOf<'point'> => ({ kind: 'point', value }),
  box: (value: PgBox): ValueOf<'box'> => ({ kind: 'box', value }),
  object: (type: string, value: string | null): ValueOf<'object'> => ({ kind: 'object', value: { type, value } }),
  date: (value: Date): ValueOf<'date'> => ({ kind: 'date', value }),
  time: (value: Date): ValueOf<'time'> => ({ kind: 'time', value }),
  timestamp: (value: Date): ValueOf<'timestamp'> => ({ kind: 'timestamp', value }),
  composite: (value: CompositeValue): ValueOf<'composite'> => ({ kind: 'composite', value }),
};

export function isValue(candidate: unknown): candidate is Value {
  return (
    typeof candidate === 'object' &&
    candidate !== null &&
    'kind' in candidate &&
    'value' in candidate &&
    typeof candidate.kind === 'string' &&
    VALUE_KINDS.has(candidate.kind)
  );
}

function isCompositeValue(candidate: object): candidate is CompositeValue {
  return 'render' in candidate && 'descriptor' in candidate && 'getAttributes' in candidate;
}

/**
 * Adapt a plain JavaScript value to a Value
 * Integers become int4 when they fit in 32 bits, int8 when they are otherwise safe, float8 beyond that
 */
export function toValue(input: unknown): Attribute {
  if (input === null || input === undefined) {
    return null;
  }
  if (isValue(input)) {
    return input;
  }
  switch (typeof input) {
    case 'boolean':
      return Values.bool(input);
    case 'bigint':
      return Values.int8(input);
    case 'string':
      return Values.text(input);
    case 'number':
      if (Number.isInteger(input) && input >= INT32_MIN && input <= INT32_MAX) {
        return Values.int4(input);
      }
      if (Number.isSafeInteger(input)) {
        return Values.int8(BigInt(input));
      }
      return Values.float8(input);
    case 'object':
      if (input instanceof Uint8Array) {
        return Values.bytes(input);
      }
      if (input instanceof Date) {
        return Values.timestamp(input);
      }
      if (input instanceof Decimal) {
        return Values.decimal(input);
      }
      if (isCompositeValue(input)) {
        return Values.composite(input);
      }
      break;
  }
  throw new TypeError(`Unsupported attribute value: ${Object.prototype.toString.call(input)}`);
}

function formatBytes(bytes: Uint8Array): string {
  let hex = '\\x';
  for (const byte of bytes) {
    hex += byte.toString(16).padStart(2, '0');
  }
  return hex;
}

/**
 * String form of a value, or null for an opaque object that carries no value
 * Temporal values are formatted in the calendar's zone (local when omitted)
 */
export function stringify(value: Value, calendar?: TemporalCalendar): string | null {
  switch (value.kind) {
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'int2':
    case 'int4':
    case 'float4':
    case 'float8':
      return String(value.value);
    case 'int8':
      return value.value.toString();
    case 'decimal':
      return value.value.toString();
    case 'char':
    case 'text':
      return value.value;
    case 'bytes':
      return formatBytes(value.value);
    case 'point':
      return formatPoint(value.value);
    case 'box':
      return formatBox(value.value);
    case 'object':
      return value.value.value;
    case 'date':
      return formatDate(value.value, calendar);
    case 'time':
      return formatTime(value.value, calendar);
    case 'timestamp':
      return formatTimestamp(value.value, calendar);
    case 'composite':
      return value.value.render();
  }
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

function samePoint(a: PgPoint, b: PgPoint): boolean {
  return Object.is(a.x, b.x) && Object.is(a.y, b.y);
}

/**
 * Structural equality: same kind and equal contents
 */
export function valueEquals(a: Attribute, b: Attribute): boolean {
  if (a === b) {
    return true;
  }
  if (a === null || b === null || a.kind !== b.kind) {
    return false;
  }
  switch (a.kind) {
    case 'decimal':
      return b.kind === 'decimal' && a.value.equals(b.value);
    case 'bytes':
      return b.kind === 'bytes' && sameBytes(a.value, b.value);
    case 'point':
      return b.kind === 'point' && samePoint(a.value, b.value);
    case 'box':
      return (
        b.kind === 'box' &&
        samePoint(a.value.corners[0], b.value.corners[0]) &&
        samePoint(a.value.corners[1], b.value.corners[1])
      );
    case 'object':
      return b.kind === 'object' && a.value.type === b.value.type && a.value.value === b.value.value;
    case 'date':
    case 'time':
    case 'timestamp':
      return b.value instanceof Date && Object.is(a.value.getTime(), b.value.getTime());
    case 'composite':
      return b.kind === 'composite' && a.value.equals(b.value);
    default:
      return Object.is(a.value, b.value);
  }
}

/**
 * 32-bit string hash (s[0]*31^(n-1) + ... + s[n-1])
 */
export function hashString(text: string): number {
  let hash = 0;
  for (let i = 0; i < text.length; i++) {
    hash = (Math.imul(hash, 31) + text.charCodeAt(i)) | 0;
  }
  return hash;
}

function hashBytes(bytes: Uint8Array): number {
  let hash = 1;
  for (const byte of bytes) {
    hash = (Math.imul(hash, 31) + byte) | 0;
  }
  return hash;
}

function hashContents(value: Value): number {
  switch (value.kind) {
    case 'bytes':
      return hashBytes(value.value);
    case 'object':
      return hashString(`${value.value.type}:${value.value.value ?? ''}`);
    case 'date':
    case 'time':
    case 'timestamp':
      return hashString(String(value.value.getTime()));
    case 'composite':
      return value.value.hashCode();
    default:
      return hashString(stringify(value) ?? '');
  }
}

/**
 * Hash consistent with valueEquals
 */
export function valueHash(value: Attribute): number {
  if (value === null) {
    return 0;
  }
  return (Math.imul(hashString(value.kind), 31) + hashContents(value)) | 0;
}
