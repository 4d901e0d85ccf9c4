import { Logger } from '@nestjs/common';
import { Decimal } from 'decimal.js';
import { PgType, type TypeId } from '../common/type-map';
import { parseBox, parsePoint } from './geometry';
import { stringify, Values, type Value } from './values';

const logger = new Logger('Coercion');

/**
 * Values handed to the codec are often wider or narrower than the declared
 * column: an integer literal arrives as int4 for a bigint column, a geometry
 * or json value arrives as plain text because callers cannot build the
 * dedicated types. Coercion reshapes such values to the declared type's
 * native representation. Values already in that shape come back unchanged
 * (same reference), and so does anything the rules below cannot convert.
 */
export function coerce(value: Value, typeId: TypeId): Value {
  try {
    return coerceByType(value, typeId);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.debug(`Leaving ${value.kind} value unchanged for type ${typeId}: ${message}`);
    return value;
  }
}

function coerceByType(value: Value, typeId: TypeId): Value {
  switch (typeId) {
    case PgType.INT2:
      return toInt2(value);
    case PgType.INT4:
      return toInt4(value);
    case PgType.OID:
    case PgType.INT8:
      return toInt8(value);
    case PgType.FLOAT4:
      return toFloat4(value);
    case PgType.FLOAT8:
      return toFloat8(value);
    case PgType.NUMERIC:
      return toDecimal(value);
    case PgType.BOOL:
    case PgType.BIT:
      return toBoolean(value);
    case PgType.CHAR:
    case PgType.BPCHAR:
      return toChar(value);
    case PgType.TEXT:
      return toText(value);
    case PgType.POINT:
      return toPoint(value);
    case PgType.BOX:
      return toBox(value);
    case PgType.VARBIT:
    case PgType.JSON:
      return toObject(value, typeId === PgType.JSON ? 'json' : 'unknown');
    default:
      return value;
  }
}

function toInt2(value: Value): Value {
  switch (value.kind) {
    case 'int4':
      return Values.int2((value.value << 16) >> 16);
    case 'int8':
      return Values.int2(Number(BigInt.asIntN(16, value.value)));
    default:
      return value;
  }
}

function toInt4(value: Value): Value {
  if (value.kind === 'int8') {
    return Values.int4(Number(BigInt.asIntN(32, value.value)));
  }
  return value;
}

function toInt8(value: Value): Value {
  if (value.kind === 'int4') {
    return Values.int8(BigInt(value.value));
  }
  return value;
}

function toFloat4(value: Value): Value {
  switch (value.kind) {
    case 'float8':
    case 'int4':
      return Values.float4(value.value);
    case 'int8':
      return Values.float4(Number(value.value));
    default:
      return value;
  }
}

function toFloat8(value: Value): Value {
  switch (value.kind) {
    case 'float4':
    case 'int4':
      return Values.float8(value.value);
    case 'int8':
      return Values.float8(Number(value.value));
    default:
      return value;
  }
}

function toDecimal(value: Value): Value {
  switch (value.kind) {
    case 'int4':
    case 'float4':
    case 'float8':
      return Number.isFinite(value.value) ? Values.decimal(new Decimal(value.value)) : value;
    default:
      return value;
  }
}

const TRUE_STRINGS = new Set(['1', 'true', 't', 'yes', 'y', 'on']);
const FALSE_STRINGS = new Set(['0', 'false', 'f', 'no', 'n', 'off']);
const TRUE_CHARS = new Set(['1', 't', 'T', 'y', 'Y']);
const FALSE_CHARS = new Set(['0', 'f', 'F', 'n', 'N']);

/**
 * Read a value as a boolean the way the server accepts boolean input
 * Returns null when the value has no boolean reading
 */
export function castToBoolean(value: Value): boolean | null {
  switch (value.kind) {
    case 'bool':
      return value.value;
    case 'text':
      return booleanFromString(value.value);
    case 'char':
      if (TRUE_CHARS.has(value.value)) return true;
      if (FALSE_CHARS.has(value.value)) return false;
      return null;
    case 'int2':
    case 'int4':
    case 'float4':
    case 'float8':
      return booleanFromNumber(value.value);
    case 'int8':
      return booleanFromNumber(Number(value.value));
    case 'decimal':
      return booleanFromNumber(value.value.toNumber());
    default:
      return null;
  }
}

export function booleanFromString(text: string): boolean | null {
  const normalized = text.trim().toLowerCase();
  if (TRUE_STRINGS.has(normalized)) return true;
  if (FALSE_STRINGS.has(normalized)) return false;
  return null;
}

function booleanFromNumber(value: number): boolean | null {
  if (value === 1) return true;
  if (value === 0) return false;
  return null;
}

function toBoolean(value: Value): Value {
  if (value.kind === 'bool') {
    return value;
  }
  const cast = castToBoolean(value);
  return cast === null ? value : Values.bool(cast);
}

function toChar(value: Value): Value {
  if (value.kind === 'text' && value.value.length === 1) {
    return Values.char(value.value);
  }
  return value;
}

function toText(value: Value): Value {
  if (value.kind === 'char' && value.value.length === 1) {
    return value;
  }
  const text = stringify(value);
  if (text === null) {
    return value;
  }
  if (text.length === 1) {
    return Values.char(text);
  }
  return value.kind === 'text' ? value : Values.text(text);
}

function toPoint(value: Value): Value {
  if (value.kind !== 'text') {
    return value;
  }
  const point = parsePoint(value.value);
  return point ? Values.point(point) : value;
}

function toBox(value: Value): Value {
  if (value.kind !== 'text') {
    return value;
  }
  const box = parseBox(value.value);
  return box ? Values.box(box) : value;
}

function toObject(value: Value, type: string): Value {
  if (value.kind === 'text' || value.kind === 'char') {
    return Values.object(type, value.value);
  }
  return value;
}
