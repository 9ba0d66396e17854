import * as path from 'path';
import { Command } from 'commander';
import { BaseCommand } from './base';
import { SensitivityPipeline } from '../../core/sensitivity-pipeline';
import { loadPatches } from '../../modules/patch-loader';
import { DTALiteEngine } from '../../modules/simulation-engine';
import { ensureEngineAvailable, PythonEnvironmentChecker } from '../../utils/python-dependency-checker';
import {
  displayCommandHeader,
  displayComparison,
  displayProgress,
  displaySuccess,
  displayWarnings,
} from '../ui';

interface RunCommandOptions {
  patches: string;
  networkFile?: string;
  baselineDir?: string;
  modifiedDir?: string;
  outputDir?: string;
  keyColumns?: string;
  threshold?: string;
  python?: string;
  skipEngineCheck?: boolean;
  verbose?: boolean;
}

export class RunCommand extends BaseCommand {
  register(): Command {
    return this.program
      .command('run [project-path]')
      .description('Run baseline and modified simulations and report significant link and OD changes')
      .requiredOption('-p, --patches <file>', 'JSON file with the list of link patches')
      .option('--network-file <name>', 'Link file name inside the modified directory (default: link.csv)')
      .option('--baseline-dir <path>', 'Baseline simulation directory (default: Before)')
      .option('--modified-dir <path>', 'Modified simulation directory (default: After)')
      .option('--output-dir <path>', 'Directory for the comparison CSV files (default: project path)')
      .option('--key-columns <columns>', 'Comma-separated link performance key columns')
      .option('-t, --threshold <number>', 'Minimum absolute change counted as significant')
      .option('--python <command>', 'Python interpreter used to run DTALite')
      .option('--skip-engine-check', 'Do not verify the Python environment before running')
      .option('-v, --verbose', 'Enable debug logging')
      .action(async (projectPath: string | undefined, options: RunCommandOptions) => {
        try {
          const projectRoot = this.resolveProjectRoot(projectPath);
          const config = this.initConfigAndLogger(projectRoot, options.verbose);
          config.updateConfig({
            analysis: {
              networkFile: options.networkFile,
              baselineDir: options.baselineDir,
              modifiedDir: options.modifiedDir,
              outputDir: options.outputDir,
              keyColumns: this.parseKeyColumns(options.keyColumns),
              threshold: this.parseThreshold(options.threshold),
            },
            engine: { pythonCommand: options.python },
          });
          config.validate();

          displayCommandHeader('DTA Sensitivity Analysis', `Project: ${projectRoot}`);

          const engineConfig = config.getEngineConfig();
          if (!options.skipEngineCheck) {
            displayProgress('Checking Python environment...');
            const checker = new PythonEnvironmentChecker(engineConfig);
            try {
              await ensureEngineAvailable(checker);
            } catch (error) {
              checker.displaySetupInstructions();
              throw error;
            }
          }

          const patches = loadPatches(path.resolve(options.patches));
          const pipeline = new SensitivityPipeline(config, new DTALiteEngine(engineConfig));
          const input = pipeline.inputFromConfig(patches);

          displayProgress('Running sensitivity pipeline...');
          const result = await pipeline.run(input);

          displayComparison('Links with significant changes', result.link, result.outputs.linkComparison);
          displayComparison('Affected OD pairs', result.od, result.outputs.odComparison);
          displaySuccess('Sensitivity analysis completed successfully!', {
            'Patches applied': `${result.linkEdit.applied}/${patches.length}`,
            'Links compared': result.link.table.rows.length,
            'Affected links': result.link.significant.length,
            'OD pairs compared': result.od.table.rows.length,
            'Affected OD pairs': result.od.significant.length,
            Threshold: input.threshold,
            'Link comparison': result.outputs.linkComparison,
            'OD comparison': result.outputs.odComparison,
            Duration: `${result.duration}ms`,
          });
          displayWarnings(result.warnings);
        } catch (error) {
          this.handleError(error, 'Sensitivity analysis failed');
        }
      });
  }
}
