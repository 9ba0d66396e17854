/**
 * @file Link Editor: applies attribute patches to GMNS link records, re-sorts them by
 *       (from_node_id, to_node_id) and reassigns sequential link ids.
 */

import {
  CellValue,
  FROM_NODE_COLUMN,
  LINK_ID_COLUMN,
  LinkEditResult,
  LinkPatch,
  Row,
  Table,
  TO_NODE_COLUMN,
} from '../types';
import { PatchMismatchWarning, SchemaError } from '../utils/error-handling';
import { getLogger } from '../utils/logger';
import { readTable, writeTable } from './table-io';

const KEY_COLUMNS = [FROM_NODE_COLUMN, TO_NODE_COLUMN];

/**
 * Orders cells for sorting: numbers numerically, null last, anything else as text.
 */
export function compareCells(a: CellValue, b: CellValue): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function hasKey(value: number | null | undefined): value is number {
  return value !== null && value !== undefined;
}

export function applyAndRenumber(input: Table, patches: LinkPatch[]): LinkEditResult {
  const logger = getLogger('LinkEditor');

  const missing = KEY_COLUMNS.filter((column) => !input.columns.includes(column));
  if (missing.length > 0) {
    throw new SchemaError('link table', missing);
  }

  const columns = [...input.columns];
  const rows: Row[] = input.rows.map((row) => ({ ...row }));
  const warnings: PatchMismatchWarning[] = [];
  let applied = 0;
  let updatedRows = 0;

  patches.forEach((patch, patchIndex) => {
    const from = patch[FROM_NODE_COLUMN];
    const to = patch[TO_NODE_COLUMN];

    if (!hasKey(from) || !hasKey(to)) {
      const warning: PatchMismatchWarning = {
        kind: 'patch-mismatch',
        reason: 'missing-key',
        patchIndex,
        message: `Skipping patch #${patchIndex + 1} because it lacks '${FROM_NODE_COLUMN}' or '${TO_NODE_COLUMN}'.`,
      };
      logger.warn(warning.message, { patch });
      warnings.push(warning);
      return;
    }

    const matches = rows.filter((row) => row[FROM_NODE_COLUMN] === from && row[TO_NODE_COLUMN] === to);
    if (matches.length === 0) {
      const warning: PatchMismatchWarning = {
        kind: 'patch-mismatch',
        reason: 'no-match',
        patchIndex,
        message: `No link found with ${FROM_NODE_COLUMN} ${from} and ${TO_NODE_COLUMN} ${to}. Skipping patch #${patchIndex + 1}.`,
      };
      logger.warn(warning.message);
      warnings.push(warning);
      return;
    }

    for (const [attribute, value] of Object.entries(patch)) {
      if (KEY_COLUMNS.includes(attribute) || value === undefined) {
        continue;
      }
      if (!columns.includes(attribute)) {
        columns.push(attribute);
        for (const row of rows) {
          row[attribute] = null;
        }
      }
      for (const row of matches) {
        row[attribute] = value;
      }
    }

    applied++;
    updatedRows += matches.length;
    logger.debug('Applied link patch', { from, to, matchedLinks: matches.length });
  });

  // Array.prototype.sort is stable, so links sharing a node pair keep their input order.
  rows.sort(
    (a, b) =>
      compareCells(a[FROM_NODE_COLUMN], b[FROM_NODE_COLUMN]) ||
      compareCells(a[TO_NODE_COLUMN], b[TO_NODE_COLUMN])
  );

  if (!columns.includes(LINK_ID_COLUMN)) {
    columns.push(LINK_ID_COLUMN);
  }
  rows.forEach((row, index) => {
    row[LINK_ID_COLUMN] = index + 1;
  });

  return {
    table: { columns, rows },
    applied,
    updatedRows,
    warnings,
  };
}

/**
 * Reads the link file, applies the patches and overwrites the same file with the
 * sorted, renumbered result. The edit is not reversible.
 */
export function rewriteLinkFile(filePath: string, patches: LinkPatch[]): LinkEditResult {
  const logger = getLogger('LinkEditor');
  const table = readTable(filePath);
  const result = applyAndRenumber(table, patches);
  writeTable(filePath, result.table);

  logger.info(`Updated '${filePath}' with link patches and sorted with new link ids`, {
    links: result.table.rows.length,
    patches: patches.length,
    applied: result.applied,
    skipped: result.warnings.length,
  });
  return result;
}
