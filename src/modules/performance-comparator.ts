/**
 * @file Performance Comparator: joins baseline and modified performance tables on key
 *       columns, computes `<metric>_diff = after - before` and keeps the rows whose change
 *       meets a threshold. Link and OD comparisons share this single algorithm.
 *
 *       The join is an inner join. Rows present in only one snapshot cannot be measured and
 *       are left out of the result on purpose; only their count is reported.
 */

import { CellValue, ComparisonOptions, ComparisonResult, Row, Table } from '../types';
import { MissingMetricWarning, SchemaError } from '../utils/error-handling';
import { getLogger } from '../utils/logger';
import { readTable } from './table-io';

export const BEFORE_SUFFIX = '_before';
export const AFTER_SUFFIX = '_after';
export const DIFF_SUFFIX = '_diff';

export const LINK_KEY_COLUMNS = ['from_node_id', 'to_node_id'];
export const LINK_METRICS = ['travel_time', 'volume'];

export const OD_KEY_COLUMNS = ['mode', 'o_zone_id', 'd_zone_id'];
export const OD_METRICS = ['total_free_flow_travel_time', 'total_congestion_travel_time', 'volume'];

export type ComparisonKind = 'link' | 'od';

export function comparisonPreset(kind: ComparisonKind, keyColumns?: string[]): Omit<ComparisonOptions, 'threshold'> {
  if (kind === 'od') {
    return { keyColumns: keyColumns ?? OD_KEY_COLUMNS, metrics: OD_METRICS };
  }
  return { keyColumns: keyColumns ?? LINK_KEY_COLUMNS, metrics: LINK_METRICS };
}

function joinKey(row: Row, keyColumns: string[]): string {
  return JSON.stringify(keyColumns.map((column) => row[column] ?? null));
}

function difference(after: CellValue | undefined, before: CellValue | undefined): number | null {
  if (typeof after !== 'number' || typeof before !== 'number') {
    return null;
  }
  const diff = after - before;
  return Number.isFinite(diff) ? diff : null;
}

/**
 * Maps each non-key column of one side to its name in the joined table.
 */
function renameColumns(own: string[], other: string[], keyColumns: string[], suffix: string): Map<string, string> {
  const names = new Map<string, string>();
  for (const column of own) {
    if (keyColumns.includes(column)) continue;
    names.set(column, other.includes(column) ? `${column}${suffix}` : column);
  }
  return names;
}

export function isSignificant(row: Row, diffColumns: string[], threshold: number): boolean {
  return diffColumns.some((column) => {
    const value = row[column];
    return typeof value === 'number' && Math.abs(value) >= threshold;
  });
}

export function compare(baseline: Table, modified: Table, options: ComparisonOptions): ComparisonResult {
  const logger = getLogger('PerformanceComparator');
  const { keyColumns, metrics, threshold } = options;

  const missingBaseline = keyColumns.filter((column) => !baseline.columns.includes(column));
  if (missingBaseline.length > 0) {
    throw new SchemaError('baseline performance table', missingBaseline);
  }
  const missingModified = keyColumns.filter((column) => !modified.columns.includes(column));
  if (missingModified.length > 0) {
    throw new SchemaError('modified performance table', missingModified);
  }

  const beforeNames = renameColumns(baseline.columns, modified.columns, keyColumns, BEFORE_SUFFIX);
  const afterNames = renameColumns(modified.columns, baseline.columns, keyColumns, AFTER_SUFFIX);
  const columns = [...keyColumns, ...beforeNames.values(), ...afterNames.values()];

  const modifiedByKey = new Map<string, Row[]>();
  for (const row of modified.rows) {
    const key = joinKey(row, keyColumns);
    const bucket = modifiedByKey.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      modifiedByKey.set(key, [row]);
    }
  }

  const matchedModifiedKeys = new Set<string>();
  let unmatchedBaseline = 0;
  const rows: Row[] = [];

  for (const before of baseline.rows) {
    const key = joinKey(before, keyColumns);
    const partners = modifiedByKey.get(key);
    if (!partners) {
      unmatchedBaseline++;
      continue;
    }
    matchedModifiedKeys.add(key);
    for (const after of partners) {
      const joined: Row = {};
      for (const column of keyColumns) {
        joined[column] = before[column] ?? null;
      }
      for (const [column, name] of beforeNames) {
        joined[name] = before[column] ?? null;
      }
      for (const [column, name] of afterNames) {
        joined[name] = after[column] ?? null;
      }
      rows.push(joined);
    }
  }

  let unmatchedModified = 0;
  for (const [key, bucket] of modifiedByKey) {
    if (!matchedModifiedKeys.has(key)) {
      unmatchedModified += bucket.length;
    }
  }

  const warnings: MissingMetricWarning[] = [];
  const diffColumns: string[] = [];
  const outputColumns = [...keyColumns];

  for (const metric of metrics) {
    const beforeColumn = `${metric}${BEFORE_SUFFIX}`;
    const afterColumn = `${metric}${AFTER_SUFFIX}`;
    const diffColumn = `${metric}${DIFF_SUFFIX}`;
    const hasBefore = columns.includes(beforeColumn);
    const hasAfter = columns.includes(afterColumn);

    if (hasBefore) outputColumns.push(beforeColumn);
    if (hasAfter) outputColumns.push(afterColumn);

    if (!hasBefore || !hasAfter) {
      const missingFrom: MissingMetricWarning['missingFrom'] = [];
      if (!baseline.columns.includes(metric)) missingFrom.push('baseline');
      if (!modified.columns.includes(metric)) missingFrom.push('modified');
      const warning: MissingMetricWarning = {
        kind: 'missing-metric',
        metric,
        missingFrom,
        message: `Expected '${metric}' columns not found after merge; '${diffColumn}' not computed.`,
      };
      logger.warn(warning.message, { missingFrom });
      warnings.push(warning);
      continue;
    }

    for (const row of rows) {
      row[diffColumn] = difference(row[afterColumn], row[beforeColumn]);
    }
    columns.push(diffColumn);
    diffColumns.push(diffColumn);
    outputColumns.push(diffColumn);
  }

  const significant = rows.filter((row) => isSignificant(row, diffColumns, threshold));

  logger.debug('Compared performance snapshots', {
    baselineRows: baseline.rows.length,
    modifiedRows: modified.rows.length,
    joinedRows: rows.length,
    unmatchedBaseline,
    unmatchedModified,
    significant: significant.length,
    threshold,
  });

  return {
    table: { columns, rows },
    significant,
    diffColumns,
    outputColumns,
    warnings,
    unmatched: {
      baseline: unmatchedBaseline,
      modified: unmatchedModified,
    },
  };
}

export function compareFiles(baselineFile: string, modifiedFile: string, options: ComparisonOptions): ComparisonResult {
  const logger = getLogger('PerformanceComparator');
  const baseline = readTable(baselineFile);
  const modified = readTable(modifiedFile);

  logger.info(`Baseline file '${baselineFile}' loaded`, { rows: baseline.rows.length, columns: baseline.columns });
  logger.info(`Modified file '${modifiedFile}' loaded`, { rows: modified.rows.length, columns: modified.columns });

  const result = compare(baseline, modified, options);
  logger.info('Significant changes identified', {
    significant: result.significant.length,
    compared: result.table.rows.length,
    threshold: options.threshold,
  });
  return result;
}
