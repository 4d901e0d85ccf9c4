import { booleanFromString } from './coercion';
import { InvalidValueError, TemporalParseError, UnsupportedConversionError } from './errors';
import { parseDecimal, parseDouble, parseInt32, parseInt64 } from './numeric-text';
import type { TemporalCalendar, TemporalParser } from './temporal';
import { Values, type Value, type ValueKind } from './values';

/**
 * Representation kinds a caller can ask a field to be converted to
 */
export type TargetKind = 'integer' | 'long' | 'double' | 'decimal' | 'string' | 'boolean' | 'timestamp';

const TARGET_KINDS: ReadonlySet<string> = new Set<TargetKind>([
  'integer', 'long', 'double', 'decimal', 'string', 'boolean', 'timestamp',
]);

// Value kinds that already satisfy each target
const MATCHING_KINDS: Readonly<Record<TargetKind, readonly ValueKind[]>> = {
  integer: ['int4'],
  long: ['int8'],
  double: ['float8'],
  decimal: ['decimal'],
  string: ['text'],
  boolean: ['bool'],
  timestamp: ['date', 'time', 'timestamp'],
};

export function isTargetKind(kind: string): kind is TargetKind {
  return TARGET_KINDS.has(kind);
}

export function matchesTargetKind(value: Value, kind: TargetKind): boolean {
  return MATCHING_KINDS[kind].includes(value.kind);
}

/**
 * Temporal context for timestamp conversions
 */
export interface ConversionContext {
  temporal: TemporalParser;
  calendar?: TemporalCalendar;
}

/**
 * Convert a value's string form to the requested kind
 * Throws UnsupportedConversionError for kinds outside TargetKind and InvalidValueError for unreadable text
 */
export function convertText(text: string, kind: string, context: ConversionContext): Value {
  if (!isTargetKind(kind)) {
    throw new UnsupportedConversionError(kind);
  }
  switch (kind) {
    case 'integer': {
      const parsed = parseInt32(text);
      if (parsed === null) throw new InvalidValueError(kind, text);
      return Values.int4(parsed);
    }
    case 'long': {
      const parsed = parseInt64(text);
      if (parsed === null) throw new InvalidValueError(kind, text);
      return Values.int8(parsed);
    }
    case 'double': {
      const parsed = parseDouble(text);
      if (parsed === null) throw new InvalidValueError(kind, text);
      return Values.float8(parsed);
    }
    case 'decimal': {
      const parsed = parseDecimal(text);
      if (parsed === null) throw new InvalidValueError(kind, text);
      return Values.decimal(parsed);
    }
    case 'string':
      return Values.text(text);
    case 'boolean': {
      const parsed = booleanFromString(text);
      if (parsed === null) throw new InvalidValueError(kind, text);
      return Values.bool(parsed);
    }
    case 'timestamp':
      try {
        return Values.timestamp(context.temporal.toTimestamp(text, context.calendar));
      } catch (error) {
        if (error instanceof TemporalParseError) {
          throw new InvalidValueError(kind, text);
        }
        throw error;
      }
    default: {
      const unreachable: never = kind;
      throw new UnsupportedConversionError(unreachable);
    }
  }
}
