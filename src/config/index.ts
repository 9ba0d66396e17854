/**
 * @file Centralized configuration management for dta-sensitivity.
 *       Manages simulation directories, file names, the comparison threshold, the
 *       DTALite engine command and logging, with environment-specific overrides.
 */

import * as path from 'path';
import { LogLevel } from '../utils/logger';

export interface AnalysisConfig {
  networkFile: string;
  baselineDir: string;
  modifiedDir: string;
  outputDir: string;
  keyColumns: string[];
  threshold: number;
}

export interface FilesConfig {
  linkPerformance: string;
  odPerformance: string;
  linkComparison: string;
  odComparison: string;
}

export interface EngineConfig {
  pythonCommand: string;
  module: string;
  entryPoint: string;
}

export interface LoggingConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logFilePath?: string;
}

export interface AppConfig {
  analysis: AnalysisConfig;
  files: FilesConfig;
  engine: EngineConfig;
  logging: LoggingConfig;
}

export interface ConfigOverrides {
  analysis?: Partial<AnalysisConfig>;
  files?: Partial<FilesConfig>;
  engine?: Partial<EngineConfig>;
  logging?: Partial<LoggingConfig>;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Shallow merge that ignores undefined override values.
 */
function mergeDefined<T extends object>(base: T, updates?: Partial<T>): T {
  const merged = { ...base };
  if (updates) {
    for (const key in updates) {
      const value: T[typeof key] | undefined = updates[key];
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

export function parseColumnList(value: string): string[] {
  return value
    .split(',')
    .map((column) => column.trim())
    .filter((column) => column.length > 0);
}

function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  if (relative === '') return true;
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

/**
 * True when both paths name the same directory or one contains the other.
 */
export function directoriesOverlap(first: string, second: string): boolean {
  const a = path.resolve(first);
  const b = path.resolve(second);
  return isWithin(a, b) || isWithin(b, a);
}

/**
 * Default configuration: the Before/After layout of a DTALite sensitivity run.
 */
const defaultConfig: AppConfig = {
  analysis: {
    networkFile: 'link.csv',
    baselineDir: 'Before',
    modifiedDir: 'After',
    outputDir: '.',
    keyColumns: ['from_node_id', 'to_node_id'],
    threshold: 0,
  },
  files: {
    linkPerformance: 'link_performance.csv',
    odPerformance: 'od_performance.csv',
    linkComparison: 'link_performance_comparison.csv',
    odComparison: 'od_performance_comparison.csv',
  },
  engine: {
    pythonCommand: 'python3',
    module: 'DTALite',
    entryPoint: 'assignment',
  },
  logging: {
    level: 'info',
    enableConsole: true,
    enableFile: false,
  },
};

/**
 * Configuration manager class that handles loading and merging configurations
 * from defaults, environment variables and runtime overrides.
 */
export class ConfigManager {
  private config: AppConfig;
  private projectRoot: string;

  constructor(projectRoot: string) {
    this.projectRoot = projectRoot;
    this.config = this.loadConfig();
  }

  /**
   * Priority: Environment variables > Defaults. Directories resolve against the project root.
   */
  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);
    const env = process.env;

    if (env.DTA_SENS_NETWORK_FILE) {
      config.analysis.networkFile = env.DTA_SENS_NETWORK_FILE;
    }
    if (env.DTA_SENS_BASELINE_DIR) {
      config.analysis.baselineDir = env.DTA_SENS_BASELINE_DIR;
    }
    if (env.DTA_SENS_MODIFIED_DIR) {
      config.analysis.modifiedDir = env.DTA_SENS_MODIFIED_DIR;
    }
    if (env.DTA_SENS_OUTPUT_DIR) {
      config.analysis.outputDir = env.DTA_SENS_OUTPUT_DIR;
    }
    if (env.DTA_SENS_KEY_COLUMNS) {
      const keyColumns = parseColumnList(env.DTA_SENS_KEY_COLUMNS);
      if (keyColumns.length > 0) {
        config.analysis.keyColumns = keyColumns;
      }
    }
    if (env.DTA_SENS_THRESHOLD) {
      const threshold = parseFloat(env.DTA_SENS_THRESHOLD);
      if (Number.isFinite(threshold) && threshold >= 0) {
        config.analysis.threshold = threshold;
      }
    }

    if (env.DTA_SENS_PYTHON) {
      config.engine.pythonCommand = env.DTA_SENS_PYTHON;
    }
    if (env.DTA_SENS_ENGINE_MODULE) {
      config.engine.module = env.DTA_SENS_ENGINE_MODULE;
    }

    if (env.DTA_SENS_LOG_LEVEL && isLogLevel(env.DTA_SENS_LOG_LEVEL)) {
      config.logging.level = env.DTA_SENS_LOG_LEVEL;
    }
    if (env.DTA_SENS_LOG_FILE) {
      config.logging.enableFile = true;
      config.logging.logFilePath = path.resolve(this.projectRoot, env.DTA_SENS_LOG_FILE);
    }

    config.analysis.baselineDir = path.resolve(this.projectRoot, config.analysis.baselineDir);
    config.analysis.modifiedDir = path.resolve(this.projectRoot, config.analysis.modifiedDir);
    config.analysis.outputDir = path.resolve(this.projectRoot, config.analysis.outputDir);

    return config;
  }

  public getProjectRoot(): string {
    return this.projectRoot;
  }

  public getConfig(): AppConfig {
    return this.config;
  }

  public getAnalysisConfig(): AnalysisConfig {
    return this.config.analysis;
  }

  public getFilesConfig(): FilesConfig {
    return this.config.files;
  }

  public getEngineConfig(): EngineConfig {
    return this.config.engine;
  }

  public getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  /**
   * Applies runtime overrides (CLI flags). Directory overrides resolve against the project root.
   */
  public updateConfig(updates: ConfigOverrides): void {
    const analysis = mergeDefined(this.config.analysis, updates.analysis);
    if (updates.analysis?.baselineDir) {
      analysis.baselineDir = path.resolve(this.projectRoot, updates.analysis.baselineDir);
    }
    if (updates.analysis?.modifiedDir) {
      analysis.modifiedDir = path.resolve(this.projectRoot, updates.analysis.modifiedDir);
    }
    if (updates.analysis?.outputDir) {
      analysis.outputDir = path.resolve(this.projectRoot, updates.analysis.outputDir);
    }

    this.config = {
      analysis,
      files: mergeDefined(this.config.files, updates.files),
      engine: mergeDefined(this.config.engine, updates.engine),
      logging: mergeDefined(this.config.logging, updates.logging),
    };
  }

  /**
   * Validates the analysis configuration.
   * @throws Error if configuration is invalid
   */
  public validate(): void {
    const { analysis, files, engine } = this.config;

    if (typeof analysis.threshold !== 'number' || !Number.isFinite(analysis.threshold) || analysis.threshold < 0) {
      throw new Error('Threshold must be a non-negative finite number');
    }

    if (analysis.keyColumns.length === 0) {
      throw new Error('At least one key column is required for link comparison');
    }

    if (directoriesOverlap(analysis.baselineDir, analysis.modifiedDir)) {
      throw new Error(
        `Baseline and modified directories must not overlap: '${analysis.baselineDir}' and '${analysis.modifiedDir}'`
      );
    }

    if (!analysis.networkFile) {
      throw new Error('Network file name is required');
    }

    for (const [name, value] of Object.entries(files)) {
      if (!value) {
        throw new Error(`File name for '${name}' must not be empty`);
      }
    }

    if (!engine.pythonCommand || !engine.module || !engine.entryPoint) {
      throw new Error('Engine python command, module and entry point are required');
    }
  }
}

let globalConfigManager: ConfigManager | null = null;

/**
 * Initializes the global configuration manager.
 */
export function initializeConfig(projectRoot: string): ConfigManager {
  globalConfigManager = new ConfigManager(projectRoot);
  return globalConfigManager;
}

/**
 * Gets the global configuration manager instance.
 * Throws an error if not initialized.
 */
export function getConfig(): ConfigManager {
  if (!globalConfigManager) {
    throw new Error('Configuration not initialized. Call initializeConfig() first.');
  }
  return globalConfigManager;
}
