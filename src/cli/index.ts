#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { buildCommand } from '../commands/build';
import { packageCommand } from '../commands/package';
import { infoCommand } from '../commands/info';
import { version, description } from '../../package.json';

const program = new Command();

program
  .name('ue-buildkit')
  .description(description)
  .version(version)
  .configureOutput({
    outputError: (str, write) => write(chalk.red(str))
  });

// Register commands
buildCommand(program);
packageCommand(program);
infoCommand(program);

program.configureHelp({
  sortSubcommands: true,
  subcommandTerm: (cmd) => cmd.name()
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
