import * as path from 'path';
import { ConfigManager, directoriesOverlap } from '../config';
import { rewriteLinkFile } from '../modules/link-editor';
import { compareFiles, LINK_METRICS, OD_KEY_COLUMNS, OD_METRICS } from '../modules/performance-comparator';
import { SimulationEngine } from '../modules/simulation-engine';
import { writeTable } from '../modules/table-io';
import { AnalysisWarning, logError } from '../utils/error-handling';
import { getLogger, Logger } from '../utils/logger';
import { PipelineInput, PipelineResult } from '../types';

/**
 * Runs a sensitivity analysis:
 *   1. baseline simulation
 *   2. link patches on the modified network file
 *   3. modified simulation
 *   4. link performance comparison
 *   5. OD performance comparison
 *   6. significant rows of both comparisons written to CSV
 *
 * Steps run strictly in order and any failure aborts the rest. Completed steps are not
 * undone, so a failed modified run leaves the patched link file in place.
 */
export class SensitivityPipeline {
  private config: ConfigManager;
  private engine: SimulationEngine;
  private logger: Logger;

  constructor(config: ConfigManager, engine: SimulationEngine) {
    this.config = config;
    this.engine = engine;
    this.logger = getLogger('SensitivityPipeline');
  }

  /**
   * Builds the pipeline input from configuration, with the given patches.
   */
  inputFromConfig(patches: PipelineInput['patches']): PipelineInput {
    const analysis = this.config.getAnalysisConfig();
    return {
      networkFile: analysis.networkFile,
      patches,
      baselineDir: analysis.baselineDir,
      modifiedDir: analysis.modifiedDir,
      keyColumns: analysis.keyColumns,
      threshold: analysis.threshold,
      outputDir: analysis.outputDir,
    };
  }

  async run(input: PipelineInput): Promise<PipelineResult> {
    const startTime = Date.now();
    const files = this.config.getFilesConfig();
    const warnings: AnalysisWarning[] = [];

    this.logger.info('Starting sensitivity analysis pipeline', {
      engine: this.engine.name,
      baselineDir: input.baselineDir,
      modifiedDir: input.modifiedDir,
      networkFile: input.networkFile,
      patches: input.patches.length,
      threshold: input.threshold,
    });

    try {
      // The two runs must not share a directory tree.
      if (directoriesOverlap(input.baselineDir, input.modifiedDir)) {
        throw new Error(
          `Baseline and modified directories must not overlap: '${input.baselineDir}' and '${input.modifiedDir}'`
        );
      }

      await this.logger.track('baseline simulation', () => this.engine.run(input.baselineDir));

      const linkEdit = await this.logger.track(
        'network modifications',
        () => rewriteLinkFile(path.join(input.modifiedDir, input.networkFile), input.patches),
        (edit) => ({ applied: edit.applied, links: edit.table.rows.length })
      );
      warnings.push(...linkEdit.warnings);

      await this.logger.track('modified simulation', () => this.engine.run(input.modifiedDir));

      const link = await this.logger.track(
        'link performance comparison',
        () => compareFiles(
          path.join(input.baselineDir, files.linkPerformance),
          path.join(input.modifiedDir, files.linkPerformance),
          { keyColumns: input.keyColumns, metrics: LINK_METRICS, threshold: input.threshold }
        ),
        (comparison) => ({ significant: comparison.significant.length })
      );
      warnings.push(...link.warnings);

      const od = await this.logger.track(
        'OD performance comparison',
        () => compareFiles(
          path.join(input.baselineDir, files.odPerformance),
          path.join(input.modifiedDir, files.odPerformance),
          { keyColumns: OD_KEY_COLUMNS, metrics: OD_METRICS, threshold: input.threshold }
        ),
        (comparison) => ({ significant: comparison.significant.length })
      );
      warnings.push(...od.warnings);

      const outputs = {
        linkComparison: path.join(input.outputDir, files.linkComparison),
        odComparison: path.join(input.outputDir, files.odComparison),
      };
      writeTable(outputs.linkComparison, { columns: link.table.columns, rows: link.significant }, link.outputColumns);
      writeTable(outputs.odComparison, { columns: od.table.columns, rows: od.significant }, od.outputColumns);
      this.logger.info('Comparison files saved', outputs);

      const result: PipelineResult = {
        link,
        od,
        linkEdit,
        outputs,
        warnings,
        duration: Date.now() - startTime,
      };

      this.logger.info('Sensitivity analysis pipeline completed', {
        affectedLinks: link.significant.length,
        affectedODPairs: od.significant.length,
        warnings: warnings.length,
        duration: `${result.duration}ms`,
      });
      return result;
    } catch (error) {
      logError(this.logger, 'Sensitivity analysis pipeline failed', error);
      throw error;
    }
  }
}
