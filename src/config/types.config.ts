import { registerAs } from '@nestjs/config';
import { readFileSync } from 'fs';
import { load } from 'js-yaml';
import { Logger } from '@nestjs/common';
import { getPostgresType, PgType } from '../common/type-map';
import type { FieldDefinition } from '../codec/descriptor';

const logger = new Logger('TypesConfig');

/**
 * A composite type as declared in the type definitions file
 */
export interface CompositeTypeDefinition {
  name: string;
  fields: FieldDefinition[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Loads composite type definitions from the YAML file at TYPES_PATH
 * Field types are PostgreSQL type names or names of other types in the same file
 * Fails fast when the file is missing or a definition is invalid
 */
export default registerAs('types', (): Map<string, CompositeTypeDefinition> => {
  const types = new Map<string, CompositeTypeDefinition>();
  const typesPath = process.env.TYPES_PATH || './types.yaml';

  try {
    logger.log(`Loading composite type definitions from: ${typesPath}`);

    const yamlData: unknown = load(readFileSync(typesPath, 'utf-8'));
    if (!isRecord(yamlData) || !isRecord(yamlData.types)) {
      throw new Error('Invalid type definitions file: must contain a "types" mapping');
    }

    const typeNames = new Set(Object.keys(yamlData.types));
    for (const [typeName, columns] of Object.entries(yamlData.types)) {
      if (!isRecord(columns) || Object.keys(columns).length === 0) {
        throw new Error(`Composite type '${typeName}' must define at least one field`);
      }
      const fields = Object.entries(columns).map(([fieldName, fieldType]) =>
        resolveFieldDefinition(typeName, fieldName, fieldType, typeNames),
      );
      types.set(typeName, { name: typeName, fields });
    }

    if (types.size === 0) {
      throw new Error('No composite types found in type definitions file. At least one type must be defined.');
    }

    logger.log(`Loaded ${types.size} composite types: ${Array.from(types.keys()).join(', ')}`);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.error(`Type definitions file not found at ${typesPath}`);
      throw new Error(`Type definitions file not found: ${typesPath}. Please ensure the file exists or set TYPES_PATH environment variable.`);
    }
    logger.error('Failed to load composite type definitions');
    throw error;
  }

  return types;
});

function resolveFieldDefinition(
  typeName: string,
  fieldName: string,
  fieldType: unknown,
  compositeTypeNames: ReadonlySet<string>,
): FieldDefinition {
  if (typeof fieldType !== 'string' || fieldType.trim() === '') {
    throw new Error(`Field '${fieldName}' in type '${typeName}' must name a type`);
  }
  if (compositeTypeNames.has(fieldType)) {
    return { name: fieldName, typeName: fieldType, typeId: PgType.RECORD };
  }
  try {
    return { name: fieldName, typeName: fieldType, typeId: getPostgresType(fieldType) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid type '${fieldType}' for field '${fieldName}' in type '${typeName}': ${message}`);
  }
}
