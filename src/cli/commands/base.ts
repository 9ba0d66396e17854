import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigManager, initializeConfig, parseColumnList } from '../../config';
import { initializeLogger } from '../../utils/logger';
import { getErrorMessage, PatchFileError } from '../../utils/error-handling';

export abstract class BaseCommand {
  protected readonly program: Command;

  constructor(program: Command) {
    this.program = program;
  }

  abstract register(): Command;

  protected resolveProjectRoot(projectPath?: string): string {
    const resolved = path.resolve(projectPath || process.cwd());
    if (!fs.existsSync(resolved)) {
      throw new Error(`Project path does not exist: ${resolved}`);
    }
    return resolved;
  }

  protected initConfigAndLogger(projectRoot: string, verbose = false): ConfigManager {
    const config = initializeConfig(projectRoot);
    if (verbose) {
      config.updateConfig({ logging: { level: 'debug' } });
    }
    const loggingConfig = config.getLoggingConfig();
    initializeLogger({
      level: loggingConfig.level,
      enableConsole: loggingConfig.enableConsole,
      enableFile: loggingConfig.enableFile,
      logFilePath: loggingConfig.logFilePath,
    });
    return config;
  }

  protected parseThreshold(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const threshold = Number(value);
    if (!Number.isFinite(threshold) || threshold < 0) {
      throw new Error(`Threshold must be a non-negative number, got '${value}'`);
    }
    return threshold;
  }

  protected parseKeyColumns(value: string | undefined): string[] | undefined {
    if (value === undefined) return undefined;
    const columns = parseColumnList(value);
    if (columns.length === 0) {
      throw new Error('--key-columns must name at least one column');
    }
    return columns;
  }

  protected handleError(error: unknown, context: string): never {
    console.error(chalk.red(`❌ ${context}: ${getErrorMessage(error)}`));
    if (error instanceof PatchFileError) {
      error.validationErrors.forEach((issue) => console.error(chalk.red(`   - ${issue}`)));
    }
    if (process.env.NODE_ENV === 'development' && error instanceof Error && error.stack) {
      console.error(chalk.gray(error.stack));
    }
    process.exit(1);
  }
}
