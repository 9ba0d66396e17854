#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { RunCommand } from './commands/run';
import { EditLinksCommand } from './commands/edit-links';
import { CompareCommand } from './commands/compare';
import { CheckEngineCommand } from './commands/check-engine';

function createProgram(): Command {
  const program = new Command();

  program
    .name('dta-sensitivity')
    .description('Sensitivity analysis for DTALite runs: patch links, rerun, and report significant changes')
    .version('1.0.0');

  new RunCommand(program).register();
  new EditLinksCommand(program).register();
  new CompareCommand(program).register();
  new CheckEngineCommand(program).register();

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error);
      process.exit(1);
    });
}

export { createProgram };
