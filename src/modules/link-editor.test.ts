/**
 * @file Tests for link patching, canonical ordering and link id reassignment.
 */

import * as fs from 'fs';
import * as path from 'path';
import { applyAndRenumber, compareCells, rewriteLinkFile } from './link-editor';
import { readTable } from './table-io';
import { Table } from '../types';
import { SchemaError, TableIOError } from '../utils/error-handling';
import { cleanupTempDirectory, createTempDirectory, createTestFile, readLines } from '../../tests/helpers/test-utils';

function sampleLinks(): Table {
  return {
    columns: ['link_id', 'from_node_id', 'to_node_id', 'lanes', 'free_speed'],
    rows: [
      { link_id: 10, from_node_id: 3, to_node_id: 2, lanes: 1, free_speed: 40 },
      { link_id: 11, from_node_id: 1, to_node_id: 4, lanes: 2, free_speed: 60 },
      { link_id: 12, from_node_id: 1, to_node_id: 2, lanes: 2, free_speed: 50 },
      { link_id: 13, from_node_id: 2, to_node_id: 3, lanes: 1, free_speed: 30 },
    ],
  };
}

describe('applyAndRenumber', () => {
  it('sorts by from_node_id then to_node_id', () => {
    const { table } = applyAndRenumber(sampleLinks(), []);

    expect(table.rows.map((row) => [row.from_node_id, row.to_node_id])).toEqual([
      [1, 2],
      [1, 4],
      [2, 3],
      [3, 2],
    ]);
  });

  it('reassigns link ids 1..N in sorted order', () => {
    const { table } = applyAndRenumber(sampleLinks(), []);

    expect(table.rows.map((row) => row.link_id)).toEqual([1, 2, 3, 4]);
  });

  it('leaves attribute values unchanged with an empty patch list', () => {
    const { table, applied, warnings } = applyAndRenumber(sampleLinks(), []);

    expect(applied).toBe(0);
    expect(warnings).toEqual([]);
    expect(table.columns).toEqual(['link_id', 'from_node_id', 'to_node_id', 'lanes', 'free_speed']);
    expect(table.rows.map((row) => [row.lanes, row.free_speed])).toEqual([
      [2, 50],
      [2, 60],
      [1, 30],
      [1, 40],
    ]);
  });

  it('is idempotent for sorting and renumbering', () => {
    const once = applyAndRenumber(sampleLinks(), []).table;
    const twice = applyAndRenumber(once, []).table;

    expect(twice).toEqual(once);
  });

  it('sets patched attributes and keeps the other attributes of the link', () => {
    const { table, applied, updatedRows } = applyAndRenumber(sampleLinks(), [
      { from_node_id: 1, to_node_id: 4, lanes: 3 },
    ]);

    const link = table.rows.find((row) => row.from_node_id === 1 && row.to_node_id === 4);
    expect(link).toEqual({ link_id: 2, from_node_id: 1, to_node_id: 4, lanes: 3, free_speed: 60 });
    expect(applied).toBe(1);
    expect(updatedRows).toBe(1);
  });

  it('adds a new attribute column with null on unmatched links', () => {
    const { table } = applyAndRenumber(sampleLinks(), [
      { from_node_id: 3, to_node_id: 2, free_speed: 50, capacity: 1500 },
    ]);

    expect(table.columns).toEqual(['link_id', 'from_node_id', 'to_node_id', 'lanes', 'free_speed', 'capacity']);
    expect(table.rows.map((row) => row.capacity)).toEqual([null, null, null, 1500]);
    expect(table.rows[3].free_speed).toBe(50);
  });

  it('applies a patch to every link sharing the node pair', () => {
    const input: Table = {
      columns: ['from_node_id', 'to_node_id', 'lanes'],
      rows: [
        { from_node_id: 5, to_node_id: 6, lanes: 1 },
        { from_node_id: 1, to_node_id: 2, lanes: 1 },
        { from_node_id: 5, to_node_id: 6, lanes: 2 },
      ],
    };

    const { table, updatedRows } = applyAndRenumber(input, [{ from_node_id: 5, to_node_id: 6, lanes: 4 }]);

    expect(updatedRows).toBe(2);
    expect(table.rows.map((row) => row.lanes)).toEqual([1, 4, 4]);
  });

  it('keeps the input order of links with the same node pair', () => {
    const input: Table = {
      columns: ['from_node_id', 'to_node_id', 'name'],
      rows: [
        { from_node_id: 2, to_node_id: 1, name: 'first' },
        { from_node_id: 1, to_node_id: 1, name: 'other' },
        { from_node_id: 2, to_node_id: 1, name: 'second' },
        { from_node_id: 2, to_node_id: 1, name: 'third' },
      ],
    };

    const { table } = applyAndRenumber(input, []);

    expect(table.rows.map((row) => row.name)).toEqual(['other', 'first', 'second', 'third']);
  });

  it('appends a link_id column when the input has none', () => {
    const input: Table = {
      columns: ['from_node_id', 'to_node_id'],
      rows: [
        { from_node_id: 2, to_node_id: 1 },
        { from_node_id: 1, to_node_id: 2 },
      ],
    };

    const { table } = applyAndRenumber(input, []);

    expect(table.columns).toEqual(['from_node_id', 'to_node_id', 'link_id']);
    expect(table.rows).toEqual([
      { from_node_id: 1, to_node_id: 2, link_id: 1 },
      { from_node_id: 2, to_node_id: 1, link_id: 2 },
    ]);
  });

  it('skips a patch for a node pair that is not in the table', () => {
    const { table, applied, warnings } = applyAndRenumber(sampleLinks(), [
      { from_node_id: 9, to_node_id: 8, lanes: 5 },
    ]);

    expect(applied).toBe(0);
    expect(table.rows.map((row) => row.lanes)).toEqual([2, 2, 1, 1]);
    expect(warnings).toEqual([
      {
        kind: 'patch-mismatch',
        reason: 'no-match',
        patchIndex: 0,
        message: 'No link found with from_node_id 9 and to_node_id 8. Skipping patch #1.',
      },
    ]);
  });

  it('does not add columns for a patch that matches nothing', () => {
    const { table } = applyAndRenumber(sampleLinks(), [{ from_node_id: 9, to_node_id: 8, capacity: 900 }]);

    expect(table.columns).not.toContain('capacity');
  });

  it('skips patches without node keys and continues with the rest', () => {
    const { table, applied, warnings } = applyAndRenumber(sampleLinks(), [
      { to_node_id: 4, lanes: 9 },
      { from_node_id: null, to_node_id: 4, lanes: 9 },
      { from_node_id: 2, to_node_id: 3, lanes: 2 },
    ]);

    expect(applied).toBe(1);
    expect(warnings.map((warning) => [warning.reason, warning.patchIndex])).toEqual([
      ['missing-key', 0],
      ['missing-key', 1],
    ]);
    expect(table.rows.map((row) => row.lanes)).toEqual([2, 2, 2, 1]);
  });

  it('matches patches against the original node pair of each link', () => {
    const { table } = applyAndRenumber(sampleLinks(), [
      { from_node_id: 1, to_node_id: 2, free_speed: 55 },
      { from_node_id: 1, to_node_id: 2, lanes: 3 },
    ]);

    expect(table.rows[0]).toEqual({ link_id: 1, from_node_id: 1, to_node_id: 2, lanes: 3, free_speed: 55 });
  });

  it('does not mutate the input table', () => {
    const input = sampleLinks();
    applyAndRenumber(input, [{ from_node_id: 1, to_node_id: 4, lanes: 3, capacity: 1800 }]);

    expect(input).toEqual(sampleLinks());
  });

  it('throws SchemaError when a node key column is missing', () => {
    const input: Table = { columns: ['link_id', 'from_node_id'], rows: [{ link_id: 1, from_node_id: 1 }] };

    expect(() => applyAndRenumber(input, [])).toThrow(SchemaError);
    expect(() => applyAndRenumber(input, [])).toThrow('link table is missing required column(s): to_node_id');
  });
});

describe('compareCells', () => {
  it('orders numbers numerically and nulls last', () => {
    const values = [10, null, 2, 33];
    expect([...values].sort(compareCells)).toEqual([2, 10, 33, null]);
  });

  it('falls back to text ordering for non-numeric values', () => {
    expect(compareCells('b', 'a')).toBe(1);
    expect(compareCells('a', 'b')).toBe(-1);
    expect(compareCells('a', 'a')).toBe(0);
  });
});

describe('rewriteLinkFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDirectory();
  });

  afterEach(() => {
    cleanupTempDirectory(tempDir);
  });

  it('overwrites the link file with the patched, sorted and renumbered links', () => {
    const filePath = path.join(tempDir, 'link.csv');
    createTestFile(
      filePath,
      [
        'link_id,from_node_id,to_node_id,lanes,free_speed',
        '7,3,2,1,40',
        '8,1,4,2,60',
        '9,1,2,2,50',
      ].join('\n') + '\n'
    );

    const result = rewriteLinkFile(filePath, [
      { from_node_id: 1, to_node_id: 4, lanes: 3, free_speed: 70 },
      { from_node_id: 3, to_node_id: 2, free_speed: 50, capacity: 1500 },
    ]);

    expect(result.applied).toBe(2);
    expect(readLines(filePath)).toEqual([
      'link_id,from_node_id,to_node_id,lanes,free_speed,capacity',
      '1,1,2,2,50,',
      '2,1,4,3,70,',
      '3,3,2,1,50,1500',
    ]);
  });

  it('leaves the file untouched when the schema is invalid', () => {
    const filePath = path.join(tempDir, 'link.csv');
    const content = 'link_id,from_node_id\n1,1\n';
    createTestFile(filePath, content);

    expect(() => rewriteLinkFile(filePath, [])).toThrow(SchemaError);
    expect(fs.readFileSync(filePath, 'utf8')).toBe(content);
  });

  it('throws TableIOError for a missing file', () => {
    expect(() => rewriteLinkFile(path.join(tempDir, 'missing.csv'), [])).toThrow(TableIOError);
  });

  it('round-trips through readTable', () => {
    const filePath = path.join(tempDir, 'link.csv');
    createTestFile(filePath, 'from_node_id,to_node_id,name\n2,1,b\n1,3,a\n');

    rewriteLinkFile(filePath, []);

    expect(readTable(filePath)).toEqual({
      columns: ['from_node_id', 'to_node_id', 'name', 'link_id'],
      rows: [
        { from_node_id: 1, to_node_id: 3, name: 'a', link_id: 1 },
        { from_node_id: 2, to_node_id: 1, name: 'b', link_id: 2 },
      ],
    });
  });
});
