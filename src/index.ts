/**
 * @file Public API of dta-sensitivity.
 */

export * from './types';
export { ConfigManager, initializeConfig, getConfig, directoriesOverlap } from './config';
export type { AppConfig, AnalysisConfig, EngineConfig, FilesConfig, LoggingConfig, ConfigOverrides } from './config';
export { applyAndRenumber, rewriteLinkFile, compareCells } from './modules/link-editor';
export {
  compare,
  compareFiles,
  comparisonPreset,
  isSignificant,
  LINK_KEY_COLUMNS,
  LINK_METRICS,
  OD_KEY_COLUMNS,
  OD_METRICS,
} from './modules/performance-comparator';
export type { ComparisonKind } from './modules/performance-comparator';
export { DTALiteEngine } from './modules/simulation-engine';
export type { SimulationEngine } from './modules/simulation-engine';
export { loadPatches, parsePatches } from './modules/patch-loader';
export { readTable, writeTable, parseTable, formatTable, projectTable } from './modules/table-io';
export { SensitivityPipeline } from './core/sensitivity-pipeline';
export {
  SchemaError,
  TableIOError,
  EngineError,
  PatchFileError,
} from './utils/error-handling';
export type { AnalysisWarning, PatchMismatchWarning, MissingMetricWarning } from './utils/error-handling';
export { Logger, getLogger, initializeLogger } from './utils/logger';
