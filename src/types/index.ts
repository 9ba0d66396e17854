/**
 * @file Shared table, link and comparison types.
 */

import type { AnalysisWarning, MissingMetricWarning, PatchMismatchWarning } from '../utils/error-handling';

export type CellValue = string | number | boolean | null;

export type Row = Record<string, CellValue>;

/**
 * A rectangular table: every row carries every column in `columns`.
 */
export interface Table {
  columns: string[];
  rows: Row[];
}

export const FROM_NODE_COLUMN = 'from_node_id';
export const TO_NODE_COLUMN = 'to_node_id';
export const LINK_ID_COLUMN = 'link_id';

/**
 * Attribute overrides for every link whose (from_node_id, to_node_id) equals the patch key.
 * The key fields are optional so that incomplete patches can be reported instead of rejected.
 */
export interface LinkPatch {
  from_node_id?: number | null;
  to_node_id?: number | null;
  [attribute: string]: CellValue | undefined;
}

export interface LinkEditResult {
  table: Table;
  /** Number of patches that matched at least one link. */
  applied: number;
  /** Number of link rows touched, counted once per matching patch. */
  updatedRows: number;
  warnings: PatchMismatchWarning[];
}

export interface ComparisonOptions {
  keyColumns: string[];
  metrics: string[];
  threshold: number;
}

export interface ComparisonResult {
  /** Inner join of both snapshots with `<metric>_diff` columns appended. */
  table: Table;
  /** Rows of `table` where any diff meets the threshold. */
  significant: Row[];
  diffColumns: string[];
  /** Key columns, then `<metric>_before/_after/_diff` for each metric, where present. */
  outputColumns: string[];
  warnings: MissingMetricWarning[];
  /** Rows that found no partner on the other side and were left out of the join. */
  unmatched: {
    baseline: number;
    modified: number;
  };
}

export interface PipelineInput {
  networkFile: string;
  patches: LinkPatch[];
  baselineDir: string;
  modifiedDir: string;
  keyColumns: string[];
  threshold: number;
  outputDir: string;
}

export interface PipelineResult {
  link: ComparisonResult;
  od: ComparisonResult;
  linkEdit: LinkEditResult;
  outputs: {
    linkComparison: string;
    odComparison: string;
  };
  warnings: AnalysisWarning[];
  duration: number;
}
