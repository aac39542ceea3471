#!/usr/bin/env node

import 'dotenv/config';
import { Command, CommanderError } from 'commander';
import { createBackupCommand } from './commands/backup.js';
import { createCheckCommand } from './commands/check.js';
import { createCronCommand } from './commands/cron.js';
import { createDashboardCommand } from './commands/dashboard.js';
import { createRefreshCommand } from './commands/refresh.js';
import { createServeCommand } from './commands/serve.js';
import { createStatusCommand } from './commands/status.js';
import { errorMessage } from './utils/errors.js';

const program = new Command();

program
  .name('hnm')
  .description('Local mirror of the HackerNews front page, with a read API and terminal dashboard')
  .version('1.0.0');

// Data
program.addCommand(createRefreshCommand());
program.addCommand(createCronCommand());
program.addCommand(createBackupCommand());

// Browse
program.addCommand(createServeCommand());
program.addCommand(createDashboardCommand());

// Diagnostics
program.addCommand(createStatusCommand());
program.addCommand(createCheckCommand());

program.addHelpText('after', `
Command groups:
  Data          refresh, cron, backup
  Browse        serve, dashboard
  Diagnostics   status, check
`);

program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
  } else {
    console.error('Error:', errorMessage(error));
    process.exit(1);
  }
}
