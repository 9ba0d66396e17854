import * as path from 'path';
import { Command } from 'commander';
import { BaseCommand } from './base';
import { rewriteLinkFile } from '../../modules/link-editor';
import { loadPatches } from '../../modules/patch-loader';
import { displayCommandHeader, displaySuccess, displayWarnings } from '../ui';

interface EditLinksOptions {
  patches: string;
  verbose?: boolean;
}

export class EditLinksCommand extends BaseCommand {
  register(): Command {
    return this.program
      .command('edit-links <link-file>')
      .description('Patch link attributes, sort links by node pair and renumber link ids (overwrites the file)')
      .requiredOption('-p, --patches <file>', 'JSON file with the list of link patches')
      .option('-v, --verbose', 'Enable debug logging')
      .action(async (linkFile: string, options: EditLinksOptions) => {
        try {
          this.initConfigAndLogger(this.resolveProjectRoot(), options.verbose);
          const filePath = path.resolve(linkFile);
          const patches = loadPatches(path.resolve(options.patches));

          displayCommandHeader('Edit Links', `Link file: ${filePath}`);
          const result = rewriteLinkFile(filePath, patches);

          displaySuccess('Link file updated and renumbered', {
            Links: result.table.rows.length,
            'Patches applied': `${result.applied}/${patches.length}`,
            'Link rows updated': result.updatedRows,
          });
          displayWarnings(result.warnings);
        } catch (error) {
          this.handleError(error, 'Link edit failed');
        }
      });
  }
}
