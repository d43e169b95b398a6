/**
 * Loading Arrow IPC files into DuckDB tables.
 *
 * The file is decoded with flechette, its schema mapped to DuckDB column
 * types, and the rows written through an appender.
 */

import {
  BIGINT,
  BLOB,
  BOOLEAN,
  DATE,
  DECIMAL,
  DOUBLE,
  DuckDBDecimalType,
  DuckDBListType,
  DuckDBStructType,
  type DuckDBType,
  DuckDBTypeId,
  type DuckDBValue,
  FLOAT,
  INTEGER,
  LIST,
  SMALLINT,
  STRUCT,
  TIMESTAMP,
  TIMESTAMPTZ,
  TINYINT,
  UBIGINT,
  UINTEGER,
  USMALLINT,
  UTINYINT,
  VARCHAR,
  blobValue,
  dateValue,
  decimalValue,
  listValue,
  structValue,
  timestampTZValue,
  timestampValue,
} from "@duckdb/node-api";
import { type DataType, Precision, type Table, Type, tableFromIPC } from "@uwdata/flechette";

export interface ArrowColumn {
  name: string;
  type: DuckDBType;
}

const MS_PER_DAY = 86_400_000;

/** Decode an Arrow IPC file (or stream) with exact 64-bit and decimal values. */
export function decodeArrowFile(bytes: Uint8Array): Table {
  return tableFromIPC(bytes, { useBigInt: true, useDecimalBigInt: true });
}

/** DuckDB type for an Arrow field type. Unsupported types become VARCHAR. */
export function duckdbTypeFor(type: DataType): DuckDBType {
  switch (type.typeId) {
    case Type.Int:
      switch (type.bitWidth) {
        case 8:
          return type.signed ? TINYINT : UTINYINT;
        case 16:
          return type.signed ? SMALLINT : USMALLINT;
        case 32:
          return type.signed ? INTEGER : UINTEGER;
        default:
          return type.signed ? BIGINT : UBIGINT;
      }
    case Type.Float:
      return type.precision === Precision.DOUBLE ? DOUBLE : FLOAT;
    case Type.Bool:
      return BOOLEAN;
    case Type.Decimal:
      if (type.precision > 38) {
        throw new Error(`Decimal precision ${type.precision} is not supported`);
      }
      return DECIMAL(type.precision, type.scale);
    case Type.Date:
      return DATE;
    case Type.Timestamp:
      return type.timezone ? TIMESTAMPTZ : TIMESTAMP;
    case Type.Binary:
    case Type.LargeBinary:
    case Type.BinaryView:
    case Type.FixedSizeBinary:
      return BLOB;
    case Type.List:
    case Type.LargeList:
    case Type.FixedSizeList:
    case Type.ListView:
    case Type.LargeListView:
      return LIST(duckdbTypeFor(type.children[0].type));
    case Type.Struct: {
      const entries: Record<string, DuckDBType> = {};
      for (const child of type.children) {
        entries[child.name] = duckdbTypeFor(child.type);
      }
      return STRUCT(entries);
    }
    case Type.Dictionary:
      return duckdbTypeFor(type.dictionary);
    default:
      return VARCHAR;
  }
}

export function arrowColumns(table: Table): ArrowColumn[] {
  return table.schema.fields.map((field) => ({
    name: field.name,
    type: duckdbTypeFor(field.type),
  }));
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, Symbol.iterator) === "function"
  );
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "bigint" || typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v));
}

function toBigInt(value: unknown): bigint {
  return typeof value === "bigint" ? value : BigInt(Math.trunc(Number(value)));
}

/**
 * Convert a value decoded by flechette into the value the appender takes for
 * `type`. Dates and timestamps arrive as epoch milliseconds.
 */
export function toDuckDBValue(value: unknown, type: DuckDBType): DuckDBValue {
  if (value === null || value === undefined) {
    return null;
  }

  switch (type.typeId) {
    case DuckDBTypeId.BOOLEAN:
      return Boolean(value);
    case DuckDBTypeId.TINYINT:
    case DuckDBTypeId.SMALLINT:
    case DuckDBTypeId.INTEGER:
    case DuckDBTypeId.UTINYINT:
    case DuckDBTypeId.USMALLINT:
    case DuckDBTypeId.UINTEGER:
    case DuckDBTypeId.FLOAT:
    case DuckDBTypeId.DOUBLE:
      return Number(value);
    case DuckDBTypeId.BIGINT:
    case DuckDBTypeId.UBIGINT:
      return toBigInt(value);
    case DuckDBTypeId.DECIMAL:
      if (type instanceof DuckDBDecimalType) {
        return decimalValue(toBigInt(value), type.width, type.scale);
      }
      return Number(value);
    case DuckDBTypeId.DATE:
      return dateValue(Math.floor(Number(value) / MS_PER_DAY));
    case DuckDBTypeId.TIMESTAMP:
      return timestampValue(BigInt(Math.round(Number(value) * 1000)));
    case DuckDBTypeId.TIMESTAMP_TZ:
      return timestampTZValue(BigInt(Math.round(Number(value) * 1000)));
    case DuckDBTypeId.BLOB:
      return value instanceof Uint8Array ? blobValue(value) : blobValue(toText(value));
    case DuckDBTypeId.LIST:
      if (type instanceof DuckDBListType && isIterable(value)) {
        return listValue(Array.from(value, (item) => toDuckDBValue(item, type.valueType)));
      }
      return null;
    case DuckDBTypeId.STRUCT:
      if (type instanceof DuckDBStructType && typeof value === "object") {
        const entries: Record<string, DuckDBValue> = {};
        type.entryNames.forEach((name, index) => {
          entries[name] = toDuckDBValue(Reflect.get(value, name), type.entryTypes[index]);
        });
        return structValue(entries);
      }
      return null;
    default:
      return toText(value);
  }
}
