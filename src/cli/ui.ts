import chalk from 'chalk';
import Table from 'cli-table3';
import { CellValue, ComparisonResult } from '../types';
import { AnalysisWarning } from '../utils/error-handling';

const MAX_TABLE_ROWS = 50;

export function displaySuccess(message: string, metrics?: Record<string, string | number>): void {
  console.log(chalk.green(`\n✅ ${message}`));
  if (metrics) {
    console.log(chalk.gray('='.repeat(Math.min(message.length + 3, 50))));
    Object.entries(metrics).forEach(([key, value]) => {
      const formattedKey = chalk.cyan(key);
      const formattedValue = typeof value === 'number'
        ? chalk.yellow(value.toLocaleString())
        : chalk.white(value);
      console.log(`${formattedKey}: ${formattedValue}`);
    });
  }
}

export function displayCommandHeader(command: string, description: string): void {
  console.log(chalk.blue(`\n🚀 ${command}`));
  console.log(chalk.gray(description));
  console.log(chalk.gray('-'.repeat(50)));
}

export function displayProgress(message: string): void {
  console.log(chalk.blue(`🔄 ${message}`));
}

export function displayWarnings(warnings: AnalysisWarning[]): void {
  if (warnings.length === 0) return;
  console.log(chalk.yellow(`\nWarnings: ${warnings.length}`));
  warnings.forEach((warning) => console.log(chalk.yellow(`  - ${warning.message}`)));
}

export function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number' && !Number.isInteger(value)) {
    return String(Number(value.toFixed(4)));
  }
  return String(value);
}

/**
 * Prints the significant rows of a comparison, projected to its output columns.
 * Rows beyond the table limit are pointed to `outputPath` when one was written.
 */
export function displayComparison(title: string, comparison: ComparisonResult, outputPath?: string): void {
  console.log(chalk.green(`\n📋 ${title}`));
  console.log(chalk.gray('='.repeat(title.length + 3)));

  if (comparison.significant.length === 0) {
    console.log(chalk.yellow('\n📭 No significant changes at this threshold.'));
    return;
  }

  const table = new Table({
    head: comparison.outputColumns.map((column) => chalk.bold(column)),
    style: { head: ['cyan'], border: ['gray'] },
  });

  comparison.significant.slice(0, MAX_TABLE_ROWS).forEach((row) => {
    table.push(
      comparison.outputColumns.map((column) => {
        const text = formatCell(row[column]);
        if (!comparison.diffColumns.includes(column) || text === '') return text;
        const value = row[column];
        return typeof value === 'number' && value < 0 ? chalk.red(text) : chalk.green(text);
      })
    );
  });

  console.log(table.toString());
  const hidden = comparison.significant.length - MAX_TABLE_ROWS;
  if (hidden > 0) {
    const rest = `… ${hidden} more row${hidden === 1 ? '' : 's'}`;
    console.log(chalk.gray(outputPath ? `${rest} in ${outputPath}` : `${rest} not shown`));
  }
  console.log(chalk.green(`\n📊 ${comparison.significant.length} of ${comparison.table.rows.length} compared row${comparison.table.rows.length === 1 ? '' : 's'} changed significantly`));
  if (comparison.unmatched.baseline > 0 || comparison.unmatched.modified > 0) {
    console.log(chalk.gray(
      `Rows without a counterpart (not compared): baseline ${comparison.unmatched.baseline}, modified ${comparison.unmatched.modified}`
    ));
  }
}
