import { Command } from 'commander';

import { createCliExecutionContext } from '../cli/context.js';
import { Dispatcher } from '../core/dispatcher.js';
import { printPackageList } from '../core/list/list-printers.js';
import type { InstallScope } from '../types/index.js';
import { INSTALL_SCOPES } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';

interface ListCommandOptions {
  verbose?: boolean;
  user?: boolean;
  system?: boolean;
}

/**
 * Scopes selected by --user and --system; neither (or both) means every scope.
 */
export function selectListScopes(options: ListCommandOptions): readonly InstallScope[] {
  const selected = INSTALL_SCOPES.filter(scope => options[scope] === true);
  return selected.length > 0 ? selected : INSTALL_SCOPES;
}

async function listCommand(options: ListCommandOptions): Promise<void> {
  const ctx = await createCliExecutionContext({ verbose: options.verbose });
  const dispatcher = new Dispatcher({ scopeEnv: ctx.scopeEnv });
  const outcome = await dispatcher.list({ scopes: selectListScopes(options) });
  printPackageList(outcome, ctx.output);
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List installed packages with their versions and executables')
    .option('-v, --verbose', 'show debug logs')
    .option('--user', 'only packages installed for the current user')
    .option('--system', 'only system-wide packages')
    .action(withErrorHandling(async (options: ListCommandOptions) => {
      await listCommand(options);
    }));
}
