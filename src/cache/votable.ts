/**
 * VOTable codec
 *
 * Encodes tables as VOTable documents with TABLEDATA serialization and
 * decodes them back. Only the first TABLE of a document is read; BINARY,
 * BINARY2 and FITS streams are rejected.
 */

import * as fs from 'node:fs/promises';
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { DecodeError } from './errors.js';
import { atomicWrite } from './io.js';
import { TABLE_EXTENSION } from './identifier.js';
import {
  isDatatype,
  isNumericDatatype,
  isTextDatatype,
  normalizeTextColumns,
  cellToText,
  type CellValue,
  type Table,
  type TableField,
  type TableParam,
} from './table.js';

// =============================================================================
// Types
// =============================================================================

/**
 * VOTable INFO element
 */
export interface VOTableInfo {
  name: string;
  value: string;
  text: string;
}

/**
 * Decoded document: INFO elements plus the first table, if any
 */
export interface VOTableDocument {
  infos: VOTableInfo[];
  table: Table | null;
}

type XmlNode = Record<string, unknown>;

// =============================================================================
// Constants
// =============================================================================

const VOTABLE_VERSION = '1.4';
const VOTABLE_NAMESPACE = 'http://www.ivoa.net/xml/VOTable/v1.3';
const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

const ARRAY_TAGS = new Set(['RESOURCE', 'TABLE', 'FIELD', 'PARAM', 'INFO', 'TR', 'TD']);
const UNSUPPORTED_STREAMS = ['BINARY', 'BINARY2', 'FITS'];

const FIELD_ATTRIBUTES = ['name', 'datatype', 'arraysize', 'unit', 'ucd', 'utype'] as const;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  removeNSPrefix: true,
  isArray: (tagName: string) => ARRAY_TAGS.has(tagName),
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: false,
});

// =============================================================================
// Node helpers
// =============================================================================

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nodes(value: unknown): XmlNode[] {
  if (Array.isArray(value)) {
    return value.filter(isNode);
  }
  return isNode(value) ? [value] : [];
}

function textOf(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isNode(value)) return textOf(value['#text']);
  return '';
}

function attr(node: XmlNode, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

// =============================================================================
// Cell encoding
// =============================================================================

function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  return String(value);
}

function encodeCell(value: CellValue): string {
  if (value === null) return '';
  if (typeof value === 'boolean') return value ? 'T' : 'F';
  if (typeof value === 'number') return formatNumber(value);
  if (Array.isArray(value)) return value.map(formatNumber).join(' ');
  return cellToText(value) ?? '';
}

function parseNumber(token: string, source: string, field: TableField): number {
  if (/^[+-]?inf(inity)?$/i.test(token)) {
    return token.startsWith('-') ? -Infinity : Infinity;
  }
  if (/^nan$/i.test(token)) {
    return NaN;
  }
  const value = Number(token);
  if (Number.isNaN(value)) {
    throw new DecodeError(source, `invalid ${field.datatype} value "${token}" in column "${field.name}"`);
  }
  return value;
}

function isArrayField(field: TableField): boolean {
  return field.arraysize !== undefined && field.arraysize !== '1';
}

function decodeCell(raw: string, field: TableField, source: string): CellValue {
  if (isTextDatatype(field.datatype)) {
    // An empty TD is a null cell; empty strings are written the same way
    return raw === '' ? null : raw;
  }

  const token = raw.trim();

  if (field.datatype === 'boolean') {
    if (token === '' || token === '?') return null;
    if (/^(t|true|1)$/i.test(token)) return true;
    if (/^(f|false|0)$/i.test(token)) return false;
    throw new DecodeError(source, `invalid boolean value "${token}" in column "${field.name}"`);
  }

  if (isNumericDatatype(field.datatype)) {
    if (token === '') return null;
    if (isArrayField(field)) {
      return token.split(/\s+/).map((part) => parseNumber(part, source, field));
    }
    return parseNumber(token, source, field);
  }

  // bit and complex values stay in their textual form
  return token === '' ? null : token;
}

// =============================================================================
// Encoding
// =============================================================================

function encodeField(field: TableField): XmlNode {
  const node: XmlNode = {};
  for (const name of FIELD_ATTRIBUTES) {
    const value = field[name];
    if (value !== undefined) {
      node[`@_${name}`] = value;
    }
  }
  if (field.description !== undefined) {
    node.DESCRIPTION = field.description;
  }
  return node;
}

function encodeParam(param: TableParam): XmlNode {
  return { ...encodeField(param), '@_value': param.value };
}

/**
 * Encode a table as a VOTable document
 */
export function encodeVOTable(table: Table): string {
  const tableNode: XmlNode = {};
  if (table.name !== undefined) {
    tableNode['@_name'] = table.name;
  }
  if (table.description !== undefined) {
    tableNode.DESCRIPTION = table.description;
  }
  if (table.params.length > 0) {
    tableNode.PARAM = table.params.map(encodeParam);
  }
  tableNode.FIELD = table.fields.map(encodeField);
  tableNode.DATA = {
    TABLEDATA: {
      TR: table.rows.map((row) => ({ TD: row.map(encodeCell) })),
    },
  };

  const document = {
    VOTABLE: {
      '@_version': VOTABLE_VERSION,
      '@_xmlns': VOTABLE_NAMESPACE,
      RESOURCE: { TABLE: tableNode },
    },
  };

  const xml: string = builder.build(document);
  return XML_DECLARATION + xml;
}

// =============================================================================
// Decoding
// =============================================================================

function decodeField(node: XmlNode, source: string): TableField {
  const name = attr(node, 'name');
  const datatype = attr(node, 'datatype');
  if (name === undefined) {
    throw new DecodeError(source, 'FIELD without a name');
  }
  if (datatype === undefined || !isDatatype(datatype)) {
    throw new DecodeError(source, `unsupported datatype "${datatype ?? ''}" for "${name}"`);
  }

  const field: TableField = { name, datatype };
  const arraysize = attr(node, 'arraysize');
  const unit = attr(node, 'unit');
  const ucd = attr(node, 'ucd');
  const utype = attr(node, 'utype');
  if (arraysize !== undefined) field.arraysize = arraysize;
  if (unit !== undefined) field.unit = unit;
  if (ucd !== undefined) field.ucd = ucd;
  if (utype !== undefined) field.utype = utype;
  if (node.DESCRIPTION !== undefined) field.description = textOf(node.DESCRIPTION).trim();
  return field;
}

function decodeParam(node: XmlNode, source: string): TableParam {
  return { ...decodeField(node, source), value: attr(node, 'value') ?? '' };
}

function decodeInfos(parent: XmlNode): VOTableInfo[] {
  return nodes(parent.INFO).map((info) => ({
    name: attr(info, 'name') ?? '',
    value: attr(info, 'value') ?? '',
    text: textOf(info).trim(),
  }));
}

function findFirstTable(resources: XmlNode[], infos: VOTableInfo[]): XmlNode | null {
  for (const resource of resources) {
    infos.push(...decodeInfos(resource));
    const [table] = nodes(resource.TABLE);
    if (table) {
      return table;
    }
    const nested = findFirstTable(nodes(resource.RESOURCE), infos);
    if (nested) {
      return nested;
    }
  }
  return null;
}

function decodeRows(tableNode: XmlNode, fields: TableField[], source: string): CellValue[][] {
  const data = tableNode.DATA;
  if (!isNode(data)) {
    return [];
  }

  for (const stream of UNSUPPORTED_STREAMS) {
    if (stream in data) {
      throw new DecodeError(source, `${stream} serialization is not supported`);
    }
  }

  const tabledata = data.TABLEDATA;
  if (!isNode(tabledata)) {
    return [];
  }

  return nodes(tabledata.TR).map((tr, rowIndex) => {
    const cells = Array.isArray(tr.TD) ? tr.TD : [];
    if (cells.length !== fields.length) {
      throw new DecodeError(
        source,
        `row ${rowIndex + 1} has ${cells.length} cells, expected ${fields.length}`
      );
    }
    return cells.map((cell, index) => decodeCell(textOf(cell), fields[index], source));
  });
}

/**
 * Decode a VOTable document, keeping its INFO elements
 *
 * @param xml - Document text
 * @param source - Name used in error messages (file path or URL)
 * @throws DecodeError on malformed XML or table content
 */
export function parseVOTableDocument(xml: string, source: string): VOTableDocument {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new DecodeError(source, `${msg} (line ${line})`);
  }

  let parsed: unknown;
  try {
    parsed = parser.parse(xml);
  } catch (err) {
    throw new DecodeError(source, err instanceof Error ? err.message : String(err), { cause: err });
  }

  const root = isNode(parsed) ? parsed.VOTABLE : undefined;
  if (!isNode(root)) {
    throw new DecodeError(source, 'missing VOTABLE root element');
  }

  const infos = decodeInfos(root);
  const tableNode = findFirstTable(nodes(root.RESOURCE), infos);
  if (!tableNode) {
    return { infos, table: null };
  }

  const fields = nodes(tableNode.FIELD).map((node) => decodeField(node, source));
  const params = nodes(tableNode.PARAM).map((node) => decodeParam(node, source));
  const table: Table = {
    fields,
    params,
    rows: decodeRows(tableNode, fields, source),
  };

  const name = attr(tableNode, 'name');
  if (name !== undefined) table.name = name;
  if (tableNode.DESCRIPTION !== undefined) table.description = textOf(tableNode.DESCRIPTION).trim();

  return { infos, table: normalizeTextColumns(table) };
}

/**
 * Decode the first table of a VOTable document
 *
 * @throws DecodeError if the document is malformed or holds no table
 */
export function decodeVOTable(xml: string, source: string): Table {
  const { table } = parseVOTableDocument(xml, source);
  if (!table) {
    throw new DecodeError(source, 'document contains no TABLE');
  }
  return table;
}

// =============================================================================
// Files
// =============================================================================

/**
 * Append the table extension unless the path already ends with it
 */
export function withTableExtension(filePath: string): string {
  const suffix = `.${TABLE_EXTENSION}`;
  return filePath.endsWith(suffix) ? filePath : filePath + suffix;
}

/**
 * Write a table to disk, replacing any existing file
 *
 * Parent directories are created as needed.
 *
 * @returns The path actually written (with extension)
 */
export async function serializeTable(table: Table, filePath: string): Promise<string> {
  const target = withTableExtension(filePath);
  await atomicWrite(target, encodeVOTable(normalizeTextColumns(table)));
  return target;
}

/**
 * Read a table from disk
 *
 * @throws DecodeError on malformed file contents
 */
export async function parseTable(filePath: string): Promise<Table> {
  const xml = await fs.readFile(filePath, 'utf-8');
  return decodeVOTable(xml, filePath);
}
