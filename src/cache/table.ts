/**
 * In-memory table model shared by the codec, the store and the client
 *
 * Mirrors the parts of a VOTable TABLE the cache needs: FIELD
 * declarations, table-level PARAMs and TABLEDATA rows.
 */

import { DecodeError } from './errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * VOTable primitive datatypes
 */
export const DATATYPES = [
  'boolean',
  'bit',
  'unsignedByte',
  'short',
  'int',
  'long',
  'char',
  'unicodeChar',
  'float',
  'double',
  'floatComplex',
  'doubleComplex',
] as const;

export type Datatype = (typeof DATATYPES)[number];

/**
 * Column declaration (VOTable FIELD)
 */
export interface TableField {
  name: string;
  datatype: Datatype;
  /** VOTable arraysize, e.g. `*` for variable-length text */
  arraysize?: string;
  unit?: string;
  ucd?: string;
  utype?: string;
  description?: string;
}

/**
 * Table-level metadata (VOTable PARAM)
 */
export interface TableParam extends TableField {
  value: string;
}

/**
 * A single cell.
 *
 * `Uint8Array` only appears in text columns of tables built in memory,
 * where a producer handed over encoded bytes instead of text. Both the
 * codec's write and read paths turn those into strings.
 */
export type CellValue = string | number | boolean | number[] | Uint8Array | null;

/**
 * Tabular data: ordered fields and rows of cells in field order
 */
export interface Table {
  name?: string;
  description?: string;
  fields: TableField[];
  params: TableParam[];
  rows: CellValue[][];
}

// =============================================================================
// Datatype helpers
// =============================================================================

/**
 * Check whether a string names a VOTable datatype
 */
export function isDatatype(value: string): value is Datatype {
  return DATATYPES.some((datatype) => datatype === value);
}

/**
 * Text-bearing datatypes
 */
export function isTextDatatype(datatype: Datatype): boolean {
  return datatype === 'char' || datatype === 'unicodeChar';
}

/**
 * Numeric datatypes whose cells are JS numbers
 */
export function isNumericDatatype(datatype: Datatype): boolean {
  return (
    datatype === 'unsignedByte' ||
    datatype === 'short' ||
    datatype === 'int' ||
    datatype === 'long' ||
    datatype === 'float' ||
    datatype === 'double'
  );
}

// =============================================================================
// Construction and access
// =============================================================================

/**
 * Create a table from fields and rows
 */
export function createTable(
  fields: TableField[],
  rows: CellValue[][] = [],
  params: TableParam[] = []
): Table {
  return { fields, params, rows };
}

/**
 * Column index by name, or -1 when absent
 */
export function fieldIndex(table: Table, name: string): number {
  return table.fields.findIndex((field) => field.name === name);
}

/**
 * All values of one column
 *
 * @throws DecodeError if the column does not exist
 */
export function columnValues(table: Table, name: string): CellValue[] {
  const index = fieldIndex(table, name);
  if (index === -1) {
    throw new DecodeError(table.name ?? 'table', `missing column "${name}"`);
  }
  return table.rows.map((row) => row[index] ?? null);
}

/**
 * All values of a text column as strings (bytes decoded, nulls dropped)
 */
export function textColumn(table: Table, name: string): string[] {
  const values: string[] = [];
  for (const value of columnValues(table, name)) {
    const text = cellToText(value);
    if (text !== null) {
      values.push(text);
    }
  }
  return values;
}

// =============================================================================
// Text normalization
// =============================================================================

const utf8 = new TextDecoder('utf-8');

/**
 * Literal text of a cell, or null for an empty cell
 */
export function cellToText(value: CellValue): string | null {
  if (value === null) return null;
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array) return utf8.decode(value);
  if (Array.isArray(value)) return value.join(' ');
  return String(value);
}

/**
 * Return a copy of the table whose text columns hold literal strings only
 */
export function normalizeTextColumns(table: Table): Table {
  const textIndexes = table.fields
    .map((field, index) => (isTextDatatype(field.datatype) ? index : -1))
    .filter((index) => index !== -1);

  if (textIndexes.length === 0) {
    return table;
  }

  const rows = table.rows.map((row) => {
    const copy = row.slice();
    for (const index of textIndexes) {
      copy[index] = cellToText(copy[index] ?? null);
    }
    return copy;
  });

  return { ...table, rows };
}
