#!/usr/bin/env node

/**
 * Dotr CLI
 * Deploy dotfiles from a repository to their destinations
 */

import { Command } from 'commander';
import { VERSION, BRAND } from './constants.js';

// Import commands
import { initCommand } from './commands/init.js';
import { importCommand } from './commands/import.js';
import { deployCommand, updateCommand, diffCommand, type TransferOptions } from './commands/deploy.js';
import { printVarsCommand } from './commands/print-vars.js';

const program = new Command();

program
  .name('dotr')
  .description(`${BRAND.prefix} ${BRAND.name} - ${BRAND.tagline}`)
  .version(VERSION)
  .option('-w, --working-dir <path>', 'Repository directory (default: current directory)');

function finish(ok: boolean): void {
  if (!ok) {
    process.exitCode = 1;
  }
}

// ============================================================================
// REPOSITORY COMMANDS
// ============================================================================

program
  .command('init')
  .description('Create config.toml and the dotfiles directory')
  .option('--no-git', 'Do not run git init')
  .action(async (_options: unknown, command: Command) => {
    finish(await initCommand(command.optsWithGlobals<{ workingDir?: string; git?: boolean }>()));
  });

program
  .command('import <path>')
  .description('Copy an existing file or directory into the repository as a package')
  .option('-n, --name <name>', 'Package name (default: derived from the path)')
  .option('--profile <name>', 'Deploy the package only with this profile')
  .action(async (target: string, _options: unknown, command: Command) => {
    finish(await importCommand(target, command.optsWithGlobals<{ workingDir?: string; name?: string; profile?: string }>()));
  });

// ============================================================================
// TRANSFER COMMANDS
// ============================================================================

function transferOptions(command: Command): Command {
  return command
    .option('-p, --packages <names...>', 'Only these packages (and their dependencies)')
    .option('--profile <name>', 'Profile to apply (default: $DOTR_PROFILE)')
    .option('-v, --verbose', 'Also report unchanged and skipped files');
}

transferOptions(program.command('deploy'))
  .description('Copy package sources to their destinations, rendering templates')
  .option('--dry-run', 'Report what would be written without writing')
  .action(async (_options: unknown, command: Command) => {
    finish(await deployCommand(command.optsWithGlobals<TransferOptions>()));
  });

transferOptions(program.command('update'))
  .description('Copy destination files back into the repository')
  .action(async (_options: unknown, command: Command) => {
    finish(await updateCommand(command.optsWithGlobals<TransferOptions>()));
  });

transferOptions(program.command('diff'))
  .description('Show what deploy would change')
  .action(async (_options: unknown, command: Command) => {
    finish(await diffCommand(command.optsWithGlobals<TransferOptions>()));
  });

program
  .command('print-vars')
  .description('Print the variables available to templates')
  .option('--profile <name>', 'Profile to apply')
  .option('--env', 'Include environment variables')
  .action(async (_options: unknown, command: Command) => {
    finish(await printVarsCommand(command.optsWithGlobals<{ workingDir?: string; profile?: string; env?: boolean }>()));
  });

// ============================================================================
// RUN
// ============================================================================

program.parse();
