import * as pgTypes from 'pg-types';
import typeNameTable from './type-names.json';

/**
 * PostgreSQL type identifier (pg_type OID)
 */
export type TypeId = number;

/**
 * OIDs the codec dispatches on
 * Geometry and record OIDs are not part of pg-types' builtins
 */
export const PgType = {
  BOOL: pgTypes.builtins.BOOL,
  BYTEA: pgTypes.builtins.BYTEA,
  CHAR: pgTypes.builtins.CHAR,
  INT8: pgTypes.builtins.INT8,
  INT2: pgTypes.builtins.INT2,
  INT4: pgTypes.builtins.INT4,
  TEXT: pgTypes.builtins.TEXT,
  OID: pgTypes.builtins.OID,
  JSON: pgTypes.builtins.JSON,
  POINT: 600,
  BOX: 603,
  FLOAT4: pgTypes.builtins.FLOAT4,
  FLOAT8: pgTypes.builtins.FLOAT8,
  BPCHAR: pgTypes.builtins.BPCHAR,
  VARCHAR: pgTypes.builtins.VARCHAR,
  DATE: pgTypes.builtins.DATE,
  TIME: pgTypes.builtins.TIME,
  TIMESTAMP: pgTypes.builtins.TIMESTAMP,
  TIMESTAMPTZ: pgTypes.builtins.TIMESTAMPTZ,
  TIMETZ: pgTypes.builtins.TIMETZ,
  BIT: pgTypes.builtins.BIT,
  VARBIT: pgTypes.builtins.VARBIT,
  NUMERIC: pgTypes.builtins.NUMERIC,
  RECORD: 2249,
} as const;

/**
 * Resolves type identifiers to type names and back
 */
export interface TypeCatalog {
  getTypeName(typeId: TypeId): string | undefined;
  getTypeId(typeName: string): TypeId | undefined;
}

interface TypeNameEntry {
  oid: number;
  name: string;
  aliases: string[];
}

/**
 * Catalog of the built-in PostgreSQL types
 * Names match format_type() output; aliases are the short spellings accepted by the parser
 */
export class BuiltinTypeCatalog implements TypeCatalog {
  private readonly namesById = new Map<TypeId, string>();
  private readonly idsByName = new Map<string, TypeId>();

  constructor(entries: readonly TypeNameEntry[] = typeNameTable.types) {
    for (const entry of entries) {
      this.namesById.set(entry.oid, entry.name);
      this.idsByName.set(entry.name, entry.oid);
      for (const alias of entry.aliases) {
        this.idsByName.set(alias, entry.oid);
      }
    }
  }

  getTypeName(typeId: TypeId): string | undefined {
    return this.namesById.get(typeId);
  }

  getTypeId(typeName: string): TypeId | undefined {
    return this.idsByName.get(typeName);
  }
}

const builtinCatalog = new BuiltinTypeCatalog();

/**
 * Get PostgreSQL type OID from type name
 * Throws error for unknown types
 */
export function getPostgresType(typeName: string): TypeId {
  const oid = builtinCatalog.getTypeId(typeName);
  if (oid === undefined) {
    throw new Error(`Unsupported PostgreSQL type: ${typeName}`);
  }
  return oid;
}

/**
 * Get the canonical type name for an OID, or undefined when the OID is not built in
 */
export function getPostgresTypeName(typeId: TypeId): string | undefined {
  return builtinCatalog.getTypeName(typeId);
}
