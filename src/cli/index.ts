#!/usr/bin/env node

import { Command } from 'commander';
import { createLintCommand } from './commands/lint.js';
import { createFixCommand } from './commands/fix.js';
import { createScaffoldCommand } from './commands/scaffold.js';
import { createCleanBackupsCommand } from './commands/cleanBackups.js';
import { createWatchCommand } from './commands/watch.js';

// Suppress noisy debug logs in non-debug CLI mode
if (!process.env.DEBUG) {
  console.debug = () => {};
}

const program = new Command();

program
  .name('docs-keeper')
  .description('Lint, fix and scaffold a Markdown documentation site')
  .version('0.1.0')
  .option('--root <dir>', 'documentation root (defaults to DOCS_ROOT or the current directory)')
  .option('--no-color', 'disable colored output');

program.addCommand(createLintCommand());
program.addCommand(createFixCommand());
program.addCommand(createScaffoldCommand());
program.addCommand(createCleanBackupsCommand());
program.addCommand(createWatchCommand());

await program.parseAsync(process.argv);
