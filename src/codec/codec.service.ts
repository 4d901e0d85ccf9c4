import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { CodecConfig } from '../config/codec.config';
import type { CompositeTypeDefinition } from '../config/types.config';
import { PgType } from '../common/type-map';
import { truncateForLog } from '../common/logging.utils';
import { CompositeValue, type CodecSession } from './composite-value';
import { StructDescriptorRegistry, type FieldDefinition, type StructDescriptor } from './descriptor';
import { createCharacterEncoding } from './encoding';
import { parseArrayLiteral, parseCompositeLiteral } from './literal-scanner';
import { PgTemporalParser } from './temporal';
import { toValue, Values, type Attribute } from './values';

/**
 * Composite codec bound to the session settings from configuration
 * Owns the registry of composite types loaded from the type definitions file
 */
@Injectable()
export class CompositeCodecService {
  private readonly logger = new Logger(CompositeCodecService.name);
  private readonly registry = new StructDescriptorRegistry();
  readonly session: CodecSession;

  constructor(private readonly configService: ConfigService) {
    const config = this.configService.get<CodecConfig>('codec');
    if (!config) {
      throw new Error('Codec configuration not found');
    }

    this.session = {
      encoding: createCharacterEncoding(config.clientEncoding),
      temporal: new PgTemporalParser(),
      calendar: { timeZone: config.timeZone },
    };

    const types = this.configService.get<Map<string, CompositeTypeDefinition>>('types');
    if (types) {
      for (const type of types.values()) {
        this.registry.define(type.name, type.fields);
      }
    }

    this.logger.log(
      `Codec ready (encoding ${this.session.encoding.name}, time zone ${config.timeZone}, ${this.registry.typeNames.length} composite types)`,
    );
  }

  /**
   * Register a composite type at runtime
   */
  defineType(sqlTypeName: string, fields: readonly FieldDefinition[]): StructDescriptor {
    return this.registry.define(sqlTypeName, fields);
  }

  /**
   * Descriptor of a registered composite type
   */
  getDescriptor(sqlTypeName: string): StructDescriptor {
    const descriptor = this.registry.get(sqlTypeName);
    if (!descriptor) {
      throw new Error(`Unknown composite type: ${sqlTypeName}`);
    }
    return descriptor;
  }

  /**
   * Parse a composite literal into a typed value
   * Fields whose declared type is a registered composite type are parsed recursively
   */
  parseComposite(literal: string, type: string | StructDescriptor): CompositeValue {
    const descriptor = typeof type === 'string' ? this.getDescriptor(type) : type;
    const tokens = parseCompositeLiteral(literal);

    const raw = tokens.map((token, index): Attribute => {
      if (token === null) {
        return null;
      }
      const field = descriptor.fields[index];
      if (field && field.typeId === PgType.RECORD && this.registry.has(field.declaredTypeName)) {
        return Values.composite(this.parseComposite(token, field.declaredTypeName));
      }
      return Values.text(token);
    });

    this.logger.debug(`Parsed ${descriptor.sqlTypeName} from ${truncateForLog(literal)}`);
    return CompositeValue.materialize(descriptor, raw, this.session);
  }

  /**
   * Split an array literal ({a,b,c}) into its raw elements
   */
  parseArray(literal: string): (string | null)[] {
    return parseArrayLiteral(literal);
  }

  /**
   * Build a composite value from plain JavaScript values or Values
   */
  materialize(type: string | StructDescriptor, attributes: readonly unknown[]): CompositeValue {
    const descriptor = typeof type === 'string' ? this.getDescriptor(type) : type;
    return CompositeValue.materialize(descriptor, attributes.map(toValue), this.session);
  }

  render(value: CompositeValue): string {
    return value.render();
  }

  /**
   * Parse a composite literal into a field name → value record
   */
  readRecord(literal: string, type: string | StructDescriptor): Record<string, Attribute> {
    return this.parseComposite(literal, type).toRecord();
  }
}
