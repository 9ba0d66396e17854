/**
 * @file CSV table reading and writing for network and performance files.
 */

import * as fs from 'fs';
import * as path from 'path';
import Papa from 'papaparse';
import { CellValue, Row, Table } from '../types';
import { getErrorMessage, TableIOError } from '../utils/error-handling';

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Converts a raw CSV cell: empty becomes null, numeric literals become numbers.
 */
export function coerceCell(raw: string): CellValue {
  const value = raw.trim();
  if (value === '') {
    return null;
  }
  if (NUMERIC_PATTERN.test(value)) {
    return Number(value);
  }
  return raw;
}

export function parseTable(text: string, source = '<memory>'): Table {
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  // Short rows read as trailing nulls.
  const fatal = parsed.errors.filter((error) => error.code !== 'TooFewFields');
  if (fatal.length > 0) {
    const first = fatal[0];
    throw new TableIOError(source, 'read', `${first.message} (row ${first.row ?? 'n/a'})`);
  }

  const columns = parsed.meta.fields ?? [];
  const rows = parsed.data.map((record) => {
    const row: Row = {};
    for (const column of columns) {
      const raw = record[column];
      row[column] = raw === undefined ? null : coerceCell(raw);
    }
    return row;
  });

  return { columns, rows };
}

export function readTable(filePath: string): Table {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new TableIOError(filePath, 'read', getErrorMessage(error), error);
  }
  return parseTable(text, filePath);
}

/**
 * Keeps the listed columns that exist in the table, in the listed order.
 */
export function projectTable(table: Table, columns: string[]): Table {
  const kept = columns.filter((column) => table.columns.includes(column));
  return {
    columns: kept,
    rows: table.rows.map((row) => {
      const projected: Row = {};
      for (const column of kept) {
        projected[column] = row[column] ?? null;
      }
      return projected;
    }),
  };
}

export function formatTable(table: Table): string {
  const body = Papa.unparse(
    {
      fields: table.columns,
      data: table.rows.map((row) => table.columns.map((column) => row[column] ?? null)),
    },
    { newline: '\n' }
  );
  return body + '\n';
}

/**
 * Writes the table as CSV, overwriting the file. With `columns`, only that projection is written.
 */
export function writeTable(filePath: string, table: Table, columns?: string[]): void {
  const output = columns ? projectTable(table, columns) : table;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, formatTable(output), 'utf8');
  } catch (error) {
    throw new TableIOError(filePath, 'write', getErrorMessage(error), error);
  }
}
