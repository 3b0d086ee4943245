#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { checkCommand } from './commands/check.js';
import { fontsCommand } from './commands/fonts.js';
import { showCommand } from './commands/show.js';

const program = new Command();

program
  .name('chanfront')
  .description('Inspect and check imageboard front-end settings')
  .version('0.1.0', '-v, --version');

// Register commands
checkCommand(program);
showCommand(program);
fontsCommand(program);

// Global error handler
program.on('command:*', () => {
  console.error(
    chalk.red(
      `\nInvalid command: ${program.args.join(' ')}\nSee --help for a list of available commands.\n`
    )
  );
  process.exitCode = 1;
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
});
