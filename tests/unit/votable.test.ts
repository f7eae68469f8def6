/**
 * Unit Tests: VOTable codec
 *
 * Tests encoding and decoding of tables, text normalization of byte
 * cells, and rejection of documents the cache cannot read.
 */

import * as fs from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  decodeVOTable,
  encodeVOTable,
  parseTable,
  parseVOTableDocument,
  serializeTable,
  withTableExtension,
} from '../../src/cache/votable.js';
import { createTable, textColumn, type Table } from '../../src/cache/table.js';
import { DecodeError } from '../../src/cache/errors.js';
import { createTempDir, removeTempDir } from './helpers.js';

// =============================================================================
// Fixtures
// =============================================================================

function mixedTable(): Table {
  return {
    name: 'sample',
    description: 'Mixed column types',
    params: [{ name: 'Facility', datatype: 'char', arraysize: '*', value: 'Generic' }],
    fields: [
      { name: 'filterID', datatype: 'char', arraysize: '*' },
      { name: 'WavelengthEff', datatype: 'double', unit: 'Angstrom' },
      { name: 'DetectorType', datatype: 'int' },
      { name: 'Public', datatype: 'boolean' },
      { name: 'Range', datatype: 'float', arraysize: '*' },
    ],
    rows: [
      ['Generic/Bessell.V', 5512.1, 0, true, [4700, 7000]],
      [new TextEncoder().encode('Generic/Bessell.B'), 4380.7, 1, false, [3600, 5600]],
      ['Generic/Bessell.U', null, null, null, null],
    ],
  };
}

function votable(body: string): string {
  return `<?xml version="1.0"?>
<VOTABLE version="1.4" xmlns="http://www.ivoa.net/xml/VOTable/v1.3">
  <RESOURCE>${body}</RESOURCE>
</VOTABLE>`;
}

// =============================================================================
// Encoding and decoding
// =============================================================================

describe('encodeVOTable / decodeVOTable', () => {
  it('preserves fields, params and cell values', () => {
    const decoded = decodeVOTable(encodeVOTable(mixedTable()), 'memory');

    expect(decoded.name).toBe('sample');
    expect(decoded.description).toBe('Mixed column types');
    expect(decoded.params).toEqual([
      { name: 'Facility', datatype: 'char', arraysize: '*', value: 'Generic' },
    ]);
    expect(decoded.fields.map((field) => field.name)).toEqual([
      'filterID',
      'WavelengthEff',
      'DetectorType',
      'Public',
      'Range',
    ]);
    expect(decoded.fields[1].unit).toBe('Angstrom');
    expect(decoded.rows[0]).toEqual(['Generic/Bessell.V', 5512.1, 0, true, [4700, 7000]]);
    expect(decoded.rows[2]).toEqual(['Generic/Bessell.U', null, null, null, null]);
  });

  it('reads a null text cell back as null', () => {
    const table = createTable(
      [
        { name: 'Comments', datatype: 'char', arraysize: '*' },
        { name: 'Count', datatype: 'int' },
      ],
      [
        [null, 1],
        ['note', 2],
      ]
    );

    expect(decodeVOTable(encodeVOTable(table), 'memory').rows).toEqual([
      [null, 1],
      ['note', 2],
    ]);
  });

  it('stores byte-valued text cells as literal text', () => {
    const xml = encodeVOTable(mixedTable());

    expect(xml).toContain('<TD>Generic/Bessell.B</TD>');
    expect(decodeVOTable(xml, 'memory').rows[1][0]).toBe('Generic/Bessell.B');
  });

  it('writes booleans as T and F', () => {
    const xml = encodeVOTable(mixedTable());

    expect(xml).toContain('<TD>T</TD>');
    expect(xml).toContain('<TD>F</TD>');
  });

  it('keeps non-finite numbers', () => {
    const table = createTable(
      [{ name: 'Value', datatype: 'double' }],
      [[Infinity], [-Infinity], [NaN]]
    );
    const rows = decodeVOTable(encodeVOTable(table), 'memory').rows;

    expect(rows[0][0]).toBe(Infinity);
    expect(rows[1][0]).toBe(-Infinity);
    expect(rows[2][0]).toBeNaN();
  });

  it('escapes markup characters in text cells', () => {
    const table = createTable(
      [{ name: 'Comments', datatype: 'char', arraysize: '*' }],
      [['a < b & c']]
    );
    const xml = encodeVOTable(table);

    expect(xml).not.toContain('a < b & c');
    expect(decodeVOTable(xml, 'memory').rows[0][0]).toBe('a < b & c');
  });

  it('starts with an XML declaration', () => {
    const xml = encodeVOTable(createTable([{ name: 'x', datatype: 'int' }]));
    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n')).toBe(true);
  });
});

// =============================================================================
// Rejected documents
// =============================================================================

describe('decoding errors', () => {
  it('rejects malformed XML', () => {
    expect(() => decodeVOTable('<VOTABLE><RESOURCE>', 'broken.vot')).toThrow(DecodeError);
  });

  it('rejects documents without a VOTABLE root', () => {
    expect(() => decodeVOTable('<TABLE></TABLE>', 'other.xml')).toThrow(
      'Failed to decode table other.xml: missing VOTABLE root element'
    );
  });

  it('rejects documents without a table', () => {
    expect(() => decodeVOTable(votable(''), 'empty.vot')).toThrow(
      'Failed to decode table empty.vot: document contains no TABLE'
    );
  });

  it('rejects binary serialization', () => {
    const xml = votable(`<TABLE><FIELD name="x" datatype="int"/><DATA><BINARY><STREAM encoding="base64">AAAA</STREAM></BINARY></DATA></TABLE>`);
    expect(() => decodeVOTable(xml, 'binary.vot')).toThrow(
      'Failed to decode table binary.vot: BINARY serialization is not supported'
    );
  });

  it('rejects rows with the wrong number of cells', () => {
    const xml = votable(
      `<TABLE><FIELD name="a" datatype="int"/><FIELD name="b" datatype="int"/><DATA><TABLEDATA><TR><TD>1</TD></TR></TABLEDATA></DATA></TABLE>`
    );
    expect(() => decodeVOTable(xml, 'short.vot')).toThrow('row 1 has 1 cells, expected 2');
  });

  it('rejects non-numeric values in numeric columns', () => {
    const xml = votable(
      `<TABLE><FIELD name="a" datatype="double"/><DATA><TABLEDATA><TR><TD>abc</TD></TR></TABLEDATA></DATA></TABLE>`
    );
    expect(() => decodeVOTable(xml, 'bad.vot')).toThrow('invalid double value "abc" in column "a"');
  });

  it('rejects unknown datatypes', () => {
    const xml = votable(`<TABLE><FIELD name="a" datatype="quaternion"/></TABLE>`);
    expect(() => decodeVOTable(xml, 'odd.vot')).toThrow('unsupported datatype "quaternion" for "a"');
  });
});

// =============================================================================
// Document metadata
// =============================================================================

describe('parseVOTableDocument', () => {
  it('collects INFO elements from the root and resources', () => {
    const xml = `<?xml version="1.0"?>
<VOTABLE version="1.4">
  <INFO name="QUERY_STATUS" value="ERROR">Filter not found</INFO>
  <RESOURCE>
    <INFO name="Service" value="test"/>
  </RESOURCE>
</VOTABLE>`;
    const document = parseVOTableDocument(xml, 'response');

    expect(document.table).toBeNull();
    expect(document.infos).toEqual([
      { name: 'QUERY_STATUS', value: 'ERROR', text: 'Filter not found' },
      { name: 'Service', value: 'test', text: '' },
    ]);
  });

  it('finds a table in a nested resource', () => {
    const xml = votable(
      `<RESOURCE><TABLE><FIELD name="filterID" datatype="char" arraysize="*"/><DATA><TABLEDATA><TR><TD>Generic/Bessell.V</TD></TR></TABLEDATA></DATA></TABLE></RESOURCE>`
    );
    const document = parseVOTableDocument(xml, 'nested');

    expect(document.table).not.toBeNull();
    expect(document.table?.rows).toEqual([['Generic/Bessell.V']]);
  });
});

// =============================================================================
// Files
// =============================================================================

describe('serializeTable / parseTable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('appends the extension and creates parent directories', async () => {
    const written = await serializeTable(mixedTable(), join(dir, 'Generic', 'Bessell', 'V'));

    expect(written).toBe(join(dir, 'Generic', 'Bessell', 'V.vot'));
    const table = await parseTable(written);
    expect(textColumn(table, 'filterID')).toEqual([
      'Generic/Bessell.V',
      'Generic/Bessell.B',
      'Generic/Bessell.U',
    ]);
  });

  it('replaces an existing file without leaving temporary files', async () => {
    const target = join(dir, 'index.vot');
    await serializeTable(mixedTable(), target);
    await serializeTable(createTable([{ name: 'filterID', datatype: 'char' }], [['X/Y.Z']]), target);

    expect(await fs.readdir(dir)).toEqual(['index.vot']);
    expect((await parseTable(target)).rows).toEqual([['X/Y.Z']]);
  });

  it('does not append the extension twice', () => {
    expect(withTableExtension('/tmp/index.vot')).toBe('/tmp/index.vot');
    expect(withTableExtension('/tmp/index')).toBe('/tmp/index.vot');
  });
});
