import { Logger } from '@nestjs/common';
import { PgType } from '../common/type-map';
import { truncateForLog } from '../common/logging.utils';
import { coerce } from './coercion';
import { convertText, isTargetKind, matchesTargetKind } from './conversions';
import type { StructDescriptor, FieldDescriptor } from './descriptor';
import type { CharacterEncoding } from './encoding';
import { UnsupportedConversionError } from './errors';
import type { TemporalCalendar, TemporalParser } from './temporal';
import { hashString, stringify, valueEquals, valueHash, Values, type Attribute, type Value } from './values';

const logger = new Logger('CompositeValue');

// An attribute containing any of \ " ( ) , or whitespace must be quoted
const NEEDS_QUOTING = /[\\"() \t\n\u000B\f\r,]/;

/**
 * Per-session collaborators a composite value needs
 */
export interface CodecSession {
  encoding: CharacterEncoding;
  temporal: TemporalParser;
  calendar?: TemporalCalendar;
}

/**
 * A materialized row value: a shared type descriptor plus one attribute per field
 */
export class CompositeValue {
  private constructor(
    readonly descriptor: StructDescriptor,
    private readonly attributes: readonly Attribute[],
    private readonly session: CodecSession,
  ) {}

  /**
   * Build a composite value from raw attributes, parsing temporal fields and
   * coercing the rest to their declared types
   * The raw array is left untouched; the new value owns a frozen copy
   */
  static materialize(
    descriptor: StructDescriptor,
    rawAttributes: readonly Attribute[],
    session: CodecSession,
  ): CompositeValue {
    const { fields } = descriptor;
    if (rawAttributes.length !== fields.length) {
      logger.warn(
        `${descriptor.sqlTypeName} expects ${fields.length} attributes, got ${rawAttributes.length}`,
      );
    }

    const attributes = fields.map((field, index) => {
      const raw = index < rawAttributes.length ? rawAttributes[index] : null;
      return raw === null ? null : resolveAttribute(raw, field, session);
    });

    return new CompositeValue(descriptor, Object.freeze(attributes), session);
  }

  get sqlTypeName(): string {
    return this.descriptor.sqlTypeName;
  }

  getAttributes(): readonly Attribute[] {
    return this.attributes;
  }

  /**
   * Attributes keyed by field name
   */
  toRecord(): Record<string, Attribute> {
    const record: Record<string, Attribute> = {};
    this.descriptor.fields.forEach((field, index) => {
      record[field.name] = this.attributes[index];
    });
    return record;
  }

  /**
   * Attributes with caller-directed conversions applied
   * @param targetTypes declared type name → requested kind (integer, long, double, decimal, string, boolean, timestamp)
   */
  attributesAs(targetTypes: ReadonlyMap<string, string>): Attribute[] {
    return this.attributes.map((attribute, index) => {
      const kind = targetTypes.get(this.descriptor.fields[index].declaredTypeName);
      if (kind === undefined || attribute === null) {
        return attribute;
      }
      if (!isTargetKind(kind)) {
        throw new UnsupportedConversionError(kind);
      }
      if (matchesTargetKind(attribute, kind)) {
        return attribute;
      }
      return convertText(stringify(attribute, this.session.calendar) ?? 'null', kind, this.session);
    });
  }

  /**
   * Render as a composite literal in the server's text format
   */
  render(): string {
    const parts = this.descriptor.fields.map((field, index) => this.renderAttribute(field, this.attributes[index]));
    return `(${parts.join(',')})`;
  }

  toString(): string {
    return this.render();
  }

  equals(other: unknown): boolean {
    if (this === other) {
      return true;
    }
    if (!(other instanceof CompositeValue) || this.sqlTypeName !== other.sqlTypeName) {
      return false;
    }
    if (this.attributes.length !== other.attributes.length) {
      return false;
    }
    return this.attributes.every((attribute, index) => valueEquals(attribute, other.attributes[index]));
  }

  hashCode(): number {
    let attributesHash = 1;
    for (const attribute of this.attributes) {
      attributesHash = (Math.imul(attributesHash, 31) + valueHash(attribute)) | 0;
    }
    return (Math.imul(31 + hashString(this.sqlTypeName), 31) + attributesHash) | 0;
  }

  private renderAttribute(field: FieldDescriptor, attribute: Attribute): string {
    if (attribute === null) {
      return '';
    }

    let text: string | null;
    if (attribute.kind === 'bytes') {
      text = this.session.encoding.decode(attribute.value);
    } else if (attribute.kind === 'bool' && field.typeId === PgType.BIT) {
      text = attribute.value ? '1' : '0';
    } else {
      text = stringify(attribute, this.session.calendar);
    }
    if (text === null) {
      return '';
    }

    if (attribute.kind === 'composite') {
      text = doubleQuotesAndBackslashes(text);
    } else if (attribute.kind === 'object' && attribute.value.type === 'json') {
      text = text.replace(/"/g, '\\"');
    }

    return NEEDS_QUOTING.test(text) ? `"${doubleQuotesAndBackslashes(text)}"` : text;
  }
}

function doubleQuotesAndBackslashes(text: string): string {
  return text.replace(/["\\]/g, '$&$&');
}

function resolveAttribute(raw: Value, field: FieldDescriptor, session: CodecSession): Value {
  const { temporal, calendar } = session;
  try {
    switch (field.typeId) {
      case PgType.DATE:
        return raw.kind === 'date' ? raw : Values.date(temporal.toDate(temporalText(raw, calendar), calendar));
      case PgType.TIME:
      case PgType.TIMETZ:
        return raw.kind === 'time' ? raw : Values.time(temporal.toTime(temporalText(raw, calendar), calendar));
      case PgType.TIMESTAMP:
      case PgType.TIMESTAMPTZ:
        return raw.kind === 'timestamp' ? raw : Values.timestamp(temporal.toTimestamp(temporalText(raw, calendar), calendar));
      default:
        return coerce(raw, field.typeId);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.debug(`Keeping raw value ${truncateForLog(stringify(raw))} for ${field.name}: ${message}`);
    return raw;
  }
}

function temporalText(raw: Value, calendar: TemporalCalendar | undefined): string {
  return stringify(raw, calendar) ?? '';
}
