/**
 * Python environment checker for the DTALite engine.
 * Confirms the interpreter runs and the engine module imports before a pipeline run.
 */

import { execFile } from 'child_process';
import chalk from 'chalk';
import { EngineConfig } from '../config';
import { getLogger } from './logger';

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[], timeout: number) => Promise<CommandResult>;

export interface PythonEnvironmentInfo {
  pythonAvailable: boolean;
  pythonVersion?: string;
  engineAvailable: boolean;
  engineModule: string;
}

export const runCommand: CommandRunner = (command, args, timeout) =>
  new Promise((resolve) => {
    execFile(command, args, { timeout, encoding: 'utf8' }, (error, stdout, stderr) => {
      if (error) {
        resolve({ success: false, stdout: stdout || '', stderr: stderr || error.message });
      } else {
        resolve({ success: true, stdout: stdout || '', stderr: stderr || '' });
      }
    });
  });

export class PythonEnvironmentChecker {
  private cachedEnvironmentInfo: PythonEnvironmentInfo | null = null;

  constructor(
    private readonly config: EngineConfig,
    private readonly runner: CommandRunner = runCommand
  ) {}

  /**
   * Check if Python and the engine module are available
   */
  async checkEnvironment(useCache: boolean = true): Promise<PythonEnvironmentInfo> {
    if (useCache && this.cachedEnvironmentInfo) {
      return this.cachedEnvironmentInfo;
    }

    const logger = getLogger('PythonEnvironmentChecker');
    const { pythonCommand, module } = this.config;
    logger.info('Checking Python environment...', { pythonCommand });

    const envInfo: PythonEnvironmentInfo = {
      pythonAvailable: false,
      engineAvailable: false,
      engineModule: module,
    };

    const versionResult = await this.runner(pythonCommand, ['--version'], 30000);
    // Python 2 prints its version on stderr
    const version = (versionResult.stdout || versionResult.stderr).trim();
    if (versionResult.success && version.startsWith('Python 3')) {
      envInfo.pythonAvailable = true;
      envInfo.pythonVersion = version;
      logger.info('Python found', { version });
    } else {
      logger.warn('Python 3 not found', { pythonCommand, output: version });
      this.cachedEnvironmentInfo = envInfo;
      return envInfo;
    }

    const importResult = await this.runner(pythonCommand, ['-c', `import ${module}`], 60000);
    envInfo.engineAvailable = importResult.success;
    if (envInfo.engineAvailable) {
      logger.info('Engine module importable', { module });
    } else {
      logger.warn('Engine module not importable', { module, stderr: importResult.stderr.trim() });
    }

    this.cachedEnvironmentInfo = envInfo;
    return envInfo;
  }

  displaySetupInstructions(): void {
    const { pythonCommand, module } = this.config;
    console.log(chalk.blue('\n🐍 Python Setup Instructions for the DTALite engine'));
    console.log(chalk.gray('='.repeat(50)));
    console.log(chalk.white('\n1. Install Python 3.8 or later and make it available as:'));
    console.log(chalk.cyan(`   ${pythonCommand}`));
    console.log(chalk.white('\n2. Install the engine package:'));
    console.log(chalk.cyan(`   ${pythonCommand} -m pip install ${module}`));
    console.log(chalk.white('\n3. Verify installation:'));
    console.log(chalk.cyan(`   ${pythonCommand} -c "import ${module}"`));
    console.log(chalk.white('\n4. Point dta-sensitivity at another interpreter if needed:'));
    console.log(chalk.cyan('   export DTA_SENS_PYTHON=/path/to/python3'));
  }
}

/**
 * Throws when the engine cannot be run with the configured interpreter.
 */
export async function ensureEngineAvailable(checker: PythonEnvironmentChecker): Promise<PythonEnvironmentInfo> {
  const envInfo = await checker.checkEnvironment();
  if (!envInfo.pythonAvailable) {
    throw new Error('Python 3 is required to run the DTALite engine but was not found');
  }
  if (!envInfo.engineAvailable) {
    throw new Error(`Python module '${envInfo.engineModule}' is not installed`);
  }
  return envInfo;
}
