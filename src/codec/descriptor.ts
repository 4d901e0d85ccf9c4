import { Logger } from '@nestjs/common';
import { BuiltinTypeCatalog, PgType, type TypeCatalog, type TypeId } from '../common/type-map';

/**
 * One attribute position of a composite type
 */
export interface FieldDescriptor {
  readonly name: string;
  readonly declaredTypeName: string;
  readonly typeId: TypeId;
}

/**
 * Shape of a composite type, shared by every value of that type
 */
export interface StructDescriptor {
  readonly sqlTypeName: string;
  readonly fields: readonly FieldDescriptor[];
}

/**
 * Field definition before type resolution
 * Give either the declared type name, the type identifier, or both
 */
export interface FieldDefinition {
  name: string;
  typeName?: string;
  typeId?: TypeId;
}

export function createStructDescriptor(sqlTypeName: string, fields: readonly FieldDescriptor[]): StructDescriptor {
  return Object.freeze({
    sqlTypeName,
    fields: Object.freeze(fields.map(field => Object.freeze({ ...field }))),
  });
}

/**
 * Creates struct descriptors and hands out one shared instance per type name
 * Field types resolve through the type catalog; names of registered composite types resolve to record
 */
export class StructDescriptorRegistry {
  private readonly logger = new Logger(StructDescriptorRegistry.name);
  private readonly descriptors = new Map<string, StructDescriptor>();

  constructor(private readonly catalog: TypeCatalog = new BuiltinTypeCatalog()) {}

  /**
   * Register a composite type, or return the existing descriptor of that name
   */
  define(sqlTypeName: string, fields: readonly FieldDefinition[]): StructDescriptor {
    const existing = this.descriptors.get(sqlTypeName);
    if (existing) {
      return existing;
    }
    if (fields.length === 0) {
      throw new Error(`Composite type '${sqlTypeName}' must have at least one field`);
    }

    const descriptor = createStructDescriptor(
      sqlTypeName,
      fields.map(field => this.resolveField(sqlTypeName, field)),
    );
    this.descriptors.set(sqlTypeName, descriptor);
    this.logger.debug(`Registered composite type ${sqlTypeName} (${descriptor.fields.map(f => `${f.name} ${f.declaredTypeName}`).join(', ')})`);
    return descriptor;
  }

  get(sqlTypeName: string): StructDescriptor | undefined {
    return this.descriptors.get(sqlTypeName);
  }

  has(sqlTypeName: string): boolean {
    return this.descriptors.has(sqlTypeName);
  }

  get typeNames(): string[] {
    return Array.from(this.descriptors.keys());
  }

  private resolveField(sqlTypeName: string, field: FieldDefinition): FieldDescriptor {
    if (field.typeName !== undefined) {
      const typeId = field.typeId ?? this.lookupTypeId(field.typeName);
      if (typeId === undefined) {
        throw new Error(`Unknown type '${field.typeName}' for field '${field.name}' of '${sqlTypeName}'`);
      }
      return { name: field.name, declaredTypeName: field.typeName, typeId };
    }

    if (field.typeId !== undefined) {
      const declaredTypeName = this.catalog.getTypeName(field.typeId);
      if (declaredTypeName === undefined) {
        throw new Error(`Unknown type identifier ${field.typeId} for field '${field.name}' of '${sqlTypeName}'`);
      }
      return { name: field.name, declaredTypeName, typeId: field.typeId };
    }

    throw new Error(`Field '${field.name}' of '${sqlTypeName}' needs a type name or a type identifier`);
  }

  private lookupTypeId(typeName: string): TypeId | undefined {
    if (this.descriptors.has(typeName)) {
      return PgType.RECORD;
    }
    return this.catalog.getTypeId(typeName);
  }
}
