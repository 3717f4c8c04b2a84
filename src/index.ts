#!/usr/bin/env node

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { Command } from 'commander';

import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

// Import command setup functions
import { setupInstallCommand } from './commands/install.js';
import { setupRemoveCommand } from './commands/remove.js';
import { setupUpdateCommand } from './commands/update.js';
import { setupListCommand } from './commands/list.js';

/**
 * venvbox CLI - Main entry point
 *
 * Installs command-line programs published as interpreter packages, each into
 * its own isolated environment, and links their executables onto PATH.
 */

const program = new Command();

program
  .name('venvbox')
  .description('Install packaged command-line programs into isolated environments')
  .version(getVersion())
  .configureHelp({ sortSubcommands: true });

setupInstallCommand(program);
setupRemoveCommand(program);
setupUpdateCommand(program);
setupListCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  // With no arguments, show help and exit successfully
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    // npm installs the binary as a symlink to this file
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch (error) {
    logger.debug('Could not resolve the entry script', { entry, error });
    return false;
  }
}

if (isMainModule()) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
