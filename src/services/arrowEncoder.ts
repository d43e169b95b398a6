/**
 * Arrow IPC encoding for query results.
 *
 * DuckDB column vectors are converted to JS values by the driver and then
 * rebuilt into an Arrow table typed from the DuckDB column types. Types
 * without an Arrow counterpart here (INTERVAL, TIME, MAP, UNION, ...) are
 * sent as UTF-8 strings.
 */

import {
  DuckDBDecimalType,
  DuckDBListType,
  DuckDBStructType,
  type DuckDBType,
  DuckDBTypeId,
} from "@duckdb/node-api";
import {
  binary,
  bool,
  type DataType,
  dateDay,
  decimal,
  float32,
  float64,
  int8,
  int16,
  int32,
  int64,
  list,
  struct,
  tableFromArrays,
  tableToIPC,
  TimeUnit,
  timestamp,
  uint8,
  uint16,
  uint32,
  uint64,
  utf8,
} from "@uwdata/flechette";

export interface ColumnarResult {
  names: string[];
  types: DuckDBType[];
  /**
   * One array of JS values per column. Top-level DECIMAL columns hold the
   * unscaled bigint; everything else is as the driver converts it.
   */
  columns: unknown[][];
}

type ValueConverter = (value: unknown) => unknown;

interface ArrowColumnType {
  type: DataType;
  convert: ValueConverter;
}

/** Widest decimal Arrow's 128-bit layout (and DuckDB) can hold */
const MAX_DECIMAL_PRECISION = 38;

const toNumber: ValueConverter = (value) => Number(value);

const toBigInt: ValueConverter = (value) =>
  typeof value === "bigint" ? value : BigInt(Math.trunc(Number(value)));

const toEpochMillis: ValueConverter = (value) =>
  value instanceof Date ? value.getTime() : Number(value);

const toText: ValueConverter = (value) => {
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "bigint") return value.toString();
  return JSON.stringify(value, (_key, v: unknown) =>
    typeof v === "bigint" ? v.toString() : v
  );
};

const toBytes: ValueConverter = (value) =>
  value instanceof Uint8Array ? value : Buffer.from(String(value), "utf8");

function nullable(convert: ValueConverter): ValueConverter {
  return (value) => (value === null || value === undefined ? null : convert(value));
}

/**
 * @param nested inside a LIST or STRUCT, where the driver hands DECIMAL over
 *  as a double rather than the unscaled bigint
 */
function arrowColumnType(duckType: DuckDBType, nested = false): ArrowColumnType {
  switch (duckType.typeId) {
    case DuckDBTypeId.BOOLEAN:
      return { type: bool(), convert: (v) => Boolean(v) };
    case DuckDBTypeId.TINYINT:
      return { type: int8(), convert: toNumber };
    case DuckDBTypeId.SMALLINT:
      return { type: int16(), convert: toNumber };
    case DuckDBTypeId.INTEGER:
      return { type: int32(), convert: toNumber };
    case DuckDBTypeId.BIGINT:
      return { type: int64(), convert: toBigInt };
    case DuckDBTypeId.UTINYINT:
      return { type: uint8(), convert: toNumber };
    case DuckDBTypeId.USMALLINT:
      return { type: uint16(), convert: toNumber };
    case DuckDBTypeId.UINTEGER:
      return { type: uint32(), convert: toNumber };
    case DuckDBTypeId.UBIGINT:
      return { type: uint64(), convert: toBigInt };
    case DuckDBTypeId.HUGEINT:
    case DuckDBTypeId.UHUGEINT:
      return { type: decimal(MAX_DECIMAL_PRECISION, 0), convert: toBigInt };
    case DuckDBTypeId.FLOAT:
      return { type: float32(), convert: toNumber };
    case DuckDBTypeId.DOUBLE:
      return { type: float64(), convert: toNumber };
    case DuckDBTypeId.DECIMAL:
      if (nested || !(duckType instanceof DuckDBDecimalType)) {
        return { type: float64(), convert: toNumber };
      }
      return { type: decimal(duckType.width, duckType.scale), convert: toBigInt };
    case DuckDBTypeId.DATE:
      return { type: dateDay(), convert: toEpochMillis };
    // Sub-millisecond precision is dropped by the driver's Date conversion
    case DuckDBTypeId.TIMESTAMP:
    case DuckDBTypeId.TIMESTAMP_S:
    case DuckDBTypeId.TIMESTAMP_MS:
    case DuckDBTypeId.TIMESTAMP_NS:
      return { type: timestamp(TimeUnit.MILLISECOND), convert: toEpochMillis };
    case DuckDBTypeId.TIMESTAMP_TZ:
      return { type: timestamp(TimeUnit.MILLISECOND, "UTC"), convert: toEpochMillis };
    case DuckDBTypeId.BLOB:
      return { type: binary(), convert: toBytes };
    case DuckDBTypeId.LIST:
      if (duckType instanceof DuckDBListType) {
        return listColumnType(duckType);
      }
      return { type: utf8(), convert: toText };
    case DuckDBTypeId.STRUCT:
      if (duckType instanceof DuckDBStructType) {
        return structColumnType(duckType);
      }
      return { type: utf8(), convert: toText };
    default:
      return { type: utf8(), convert: toText };
  }
}

function listColumnType(duckType: DuckDBListType): ArrowColumnType {
  const child = arrowColumnType(duckType.valueType, true);
  const convertItem = nullable(child.convert);
  return {
    type: list(child.type),
    convert: (value) => (Array.isArray(value) ? value.map(convertItem) : [convertItem(value)]),
  };
}

function structColumnType(duckType: DuckDBStructType): ArrowColumnType {
  const entries = duckType.entryNames.map((name, index) => ({
    name,
    column: arrowColumnType(duckType.entryTypes[index], true),
  }));

  const children: Record<string, DataType> = {};
  for (const { name, column } of entries) {
    children[name] = column.type;
  }

  return {
    type: struct(children),
    convert: (value) => {
      const result: Record<string, unknown> = {};
      for (const { name, column } of entries) {
        const entry: unknown =
          typeof value === "object" && value !== null ? Reflect.get(value, name) : null;
        result[name] = nullable(column.convert)(entry);
      }
      return result;
    },
  };
}

/**
 * Encode a result set as an Arrow IPC stream.
 */
export function encodeArrow(result: ColumnarResult): Uint8Array {
  const arrays: Record<string, unknown[]> = {};
  const types: Record<string, DataType> = {};

  result.names.forEach((name, index) => {
    const { type, convert } = arrowColumnType(result.types[index]);
    const values = result.columns[index] ?? [];
    arrays[name] = values.map(nullable(convert));
    types[name] = type;
  });

  const table = tableFromArrays(arrays, { types });
  const ipc = tableToIPC(table, { format: "stream" });
  if (!ipc) {
    throw new Error("Failed to serialize Arrow table to IPC");
  }
  return ipc;
}
