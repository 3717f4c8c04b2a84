import { Command } from 'commander';

import { createCliExecutionContext } from '../cli/context.js';
import { offerRemovalWithoutExecutables, reportLinks, warnIfNotOnPath } from '../cli/install-reporting.js';
import { Dispatcher } from '../core/dispatcher.js';
import { resolveScope } from '../core/scope-resolution.js';
import type { ExecutionOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { parsePackageSpec } from '../utils/package-spec.js';

interface UpdateCommandOptions extends ExecutionOptions {
  force?: boolean;
}

async function updateCommand(specArg: string, options: UpdateCommandOptions): Promise<void> {
  const ctx = await createCliExecutionContext(options);
  const spec = parsePackageSpec(specArg);
  resolveScope(ctx.scope, ctx.scopeEnv);
  const dispatcher = new Dispatcher({ scopeEnv: ctx.scopeEnv });

  const spinner = ctx.output.spinner();
  spinner.start(`Updating ${spec.raw}`);
  const outcome = await dispatcher.update(spec, { scope: ctx.scope, forceLinks: options.force }).catch((error: unknown) => {
    spinner.stop(`Failed to update ${spec.raw}`);
    throw error;
  });
  const version = outcome.version ? ` (now ${outcome.version})` : '';
  spinner.stop(`Updated ${outcome.name}${version}`);

  if (outcome.executables.length === 0) {
    reportLinks(ctx, outcome.linkDir, [], outcome.linksRemoved);
    await offerRemovalWithoutExecutables(ctx, dispatcher, outcome.name);
    return;
  }

  reportLinks(ctx, outcome.linkDir, outcome.linksAdded, outcome.linksRemoved);
  if (outcome.linksAdded.length > 0) {
    warnIfNotOnPath(ctx, outcome);
  }
}

export function setupUpdateCommand(program: Command): void {
  program
    .command('update')
    .alias('upgrade')
    .description('Upgrade an installed package in place and refresh its links')
    .argument('<spec>', 'package name or the spec it was installed from')
    .option('-v, --verbose', 'show debug logs and complete tool output')
    .option('-y, --assumeyes', 'answer yes to every confirmation')
    .option('--system', 'update a system-wide package (needs root)')
    .option('--force', 'replace stale links left by removed environments')
    .action(withErrorHandling(async (specArg: string, options: UpdateCommandOptions) => {
      await updateCommand(specArg, options);
    }));
}
