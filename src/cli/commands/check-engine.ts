import chalk from 'chalk';
import { Command } from 'commander';
import { BaseCommand } from './base';
import { PythonEnvironmentChecker } from '../../utils/python-dependency-checker';
import { displayCommandHeader, displaySuccess } from '../ui';

interface CheckEngineOptions {
  python?: string;
}

export class CheckEngineCommand extends BaseCommand {
  register(): Command {
    return this.program
      .command('check-engine')
      .description('Check that Python and the DTALite engine module are available')
      .option('--python <command>', 'Python interpreter used to run DTALite')
      .action(async (options: CheckEngineOptions) => {
        try {
          const config = this.initConfigAndLogger(this.resolveProjectRoot());
          config.updateConfig({ engine: { pythonCommand: options.python } });
          const engineConfig = config.getEngineConfig();

          displayCommandHeader('Check Engine', `Interpreter: ${engineConfig.pythonCommand}`);
          const checker = new PythonEnvironmentChecker(engineConfig);
          const info = await checker.checkEnvironment(false);

          if (info.pythonAvailable && info.engineAvailable) {
            displaySuccess('DTALite engine is ready', {
              Python: info.pythonVersion ?? 'unknown',
              Module: info.engineModule,
            });
            return;
          }

          console.log(chalk.red(info.pythonAvailable
            ? `❌ Python module '${info.engineModule}' is not installed`
            : '❌ Python 3 was not found'));
          checker.displaySetupInstructions();
          process.exitCode = 1;
        } catch (error) {
          this.handleError(error, 'Engine check failed');
        }
      });
  }
}
