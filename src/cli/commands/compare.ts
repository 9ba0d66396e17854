import * as path from 'path';
import { Command } from 'commander';
import { BaseCommand } from './base';
import { ComparisonKind, compareFiles, comparisonPreset } from '../../modules/performance-comparator';
import { writeTable } from '../../modules/table-io';
import { displayCommandHeader, displayComparison, displaySuccess, displayWarnings } from '../ui';

interface CompareCommandOptions {
  kind: string;
  keyColumns?: string;
  threshold?: string;
  output?: string;
  verbose?: boolean;
}

function parseKind(value: string): ComparisonKind {
  if (value === 'link' || value === 'od') {
    return value;
  }
  throw new Error(`Unknown comparison kind '${value}', expected link or od`);
}

export class CompareCommand extends BaseCommand {
  register(): Command {
    return this.program
      .command('compare <baseline-file> <modified-file>')
      .description('Compare two link or OD performance files and list significant changes')
      .option('-k, --kind <kind>', 'Performance table kind: link|od', 'link')
      .option('--key-columns <columns>', 'Comma-separated key columns (defaults depend on --kind)')
      .option('-t, --threshold <number>', 'Minimum absolute change counted as significant')
      .option('-o, --output <file>', 'Write the significant rows to this CSV file')
      .option('-v, --verbose', 'Enable debug logging')
      .action(async (baselineFile: string, modifiedFile: string, options: CompareCommandOptions) => {
        try {
          const config = this.initConfigAndLogger(this.resolveProjectRoot(), options.verbose);
          const kind = parseKind(options.kind);
          const threshold = this.parseThreshold(options.threshold) ?? config.getAnalysisConfig().threshold;
          const preset = comparisonPreset(kind, this.parseKeyColumns(options.keyColumns));

          displayCommandHeader('Compare Performance', `${baselineFile} → ${modifiedFile}`);
          const result = compareFiles(path.resolve(baselineFile), path.resolve(modifiedFile), { ...preset, threshold });

          const outputPath = options.output ? path.resolve(options.output) : undefined;
          if (outputPath) {
            writeTable(outputPath, { columns: result.table.columns, rows: result.significant }, result.outputColumns);
          }
          displayComparison(kind === 'od' ? 'Affected OD pairs' : 'Links with significant changes', result, outputPath);

          const metrics: Record<string, string | number> = {
            'Rows compared': result.table.rows.length,
            'Significant rows': result.significant.length,
            Threshold: threshold,
          };
          if (outputPath) {
            metrics.Output = outputPath;
          }
          displaySuccess('Comparison completed', metrics);
          displayWarnings(result.warnings);
        } catch (error) {
          this.handleError(error, 'Comparison failed');
        }
      });
  }
}
