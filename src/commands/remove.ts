import { Command } from 'commander';

import { createCliExecutionContext, confirmOrAssume } from '../cli/context.js';
import { Dispatcher } from '../core/dispatcher.js';
import { resolveScope } from '../core/scope-resolution.js';
import type { ExecutionOptions } from '../types/index.js';
import { NotInstalledError, withErrorHandling } from '../utils/errors.js';
import { formatPathForDisplay, formatScopeTag, pluralize } from '../utils/formatters.js';
import { parsePackageSpec } from '../utils/package-spec.js';

async function removeCommand(nameArg: string, options: ExecutionOptions): Promise<void> {
  const ctx = await createCliExecutionContext(options);
  const { name } = parsePackageSpec(nameArg);
  const roots = resolveScope(ctx.scope, ctx.scopeEnv);
  const dispatcher = new Dispatcher({ scopeEnv: ctx.scopeEnv });

  if (!(await dispatcher.registry.exists(name, ctx.scope))) {
    throw new NotInstalledError(name, ctx.scope);
  }
  if (!(await confirmOrAssume(ctx, `Remove '${name}'${formatScopeTag(ctx.scope)} and its executables?`, true))) {
    ctx.output.info('Nothing changed.');
    return;
  }

  const outcome = await dispatcher.remove(name, { scope: ctx.scope });
  ctx.output.success(`Removed ${outcome.name}`);
  if (outcome.linksRemoved.length > 0) {
    ctx.output.info(
      `Unlinked ${pluralize(outcome.linksRemoved.length, 'executable')} from ` +
      `${formatPathForDisplay(roots.linkDir, ctx.scopeEnv.homeDir)}: ${outcome.linksRemoved.join(', ')}`
    );
  }
}

export function setupRemoveCommand(program: Command): void {
  program
    .command('remove')
    .aliases(['uninstall', 'rm'])
    .description('Remove a package, its environment and its executable links')
    .argument('<name>', 'name of the installed package')
    .option('-v, --verbose', 'show debug logs')
    .option('-y, --assumeyes', 'do not ask for confirmation')
    .option('--system', 'remove a system-wide package (needs root)')
    .action(withErrorHandling(async (nameArg: string, options: ExecutionOptions) => {
      await removeCommand(nameArg, options);
    }));
}
