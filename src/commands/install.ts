import { Command } from 'commander';

import { createCliExecutionContext, confirmOrAssume } from '../cli/context.js';
import { offerRemovalWithoutExecutables, reportLinks, warnIfNotOnPath } from '../cli/install-reporting.js';
import { Dispatcher } from '../core/dispatcher.js';
import { resolveScope } from '../core/scope-resolution.js';
import type { ExecutionContext, ExecutionOptions } from '../types/index.js';
import { AlreadyInstalledError, withErrorHandling } from '../utils/errors.js';
import { parsePackageSpec } from '../utils/package-spec.js';

interface InstallCommandOptions extends ExecutionOptions {
  force?: boolean;
}

export async function installCommand(specArg: string, options: InstallCommandOptions, ctx: ExecutionContext): Promise<void> {
  const spec = parsePackageSpec(specArg);
  // Fail on privilege before asking anything
  resolveScope(ctx.scope, ctx.scopeEnv);

  const dispatcher = new Dispatcher({ scopeEnv: ctx.scopeEnv });

  let reinstall = false;
  if (await dispatcher.registry.exists(spec.name, ctx.scope)) {
    // Without a terminal only --assumeyes permits a reinstall
    if (!ctx.assumeYes && !ctx.interactive) {
      throw new AlreadyInstalledError(spec.name, ctx.scope);
    }
    reinstall = await confirmOrAssume(ctx, `'${spec.name}' is already installed. Reinstall it?`);
    if (!reinstall) {
      throw new AlreadyInstalledError(spec.name, ctx.scope);
    }
  }

  const spinner = ctx.output.spinner();
  spinner.start(`Installing ${spec.raw}`);
  const outcome = await dispatcher.install(spec, { scope: ctx.scope, reinstall, forceLinks: options.force }).catch((error: unknown) => {
    spinner.stop(`Failed to install ${spec.raw}`);
    throw error;
  });
  const version = outcome.version ? ` ${outcome.version}` : '';
  spinner.stop(`${outcome.reinstalled ? 'Reinstalled' : 'Installed'} ${outcome.name}${version}`);

  if (outcome.executables.length === 0) {
    await offerRemovalWithoutExecutables(ctx, dispatcher, outcome.name);
    return;
  }

  reportLinks(ctx, outcome.linkDir, outcome.linksAdded);
  warnIfNotOnPath(ctx, outcome);
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .alias('i')
    .description('Install a package into its own environment and link its executables')
    .argument('<spec>', 'package name, name==version, VCS URL, or local path')
    .option('-v, --verbose', 'show debug logs and complete tool output')
    .option('-y, --assumeyes', 'answer yes to every confirmation')
    .option('--system', 'install for every user of this host (needs root)')
    .option('--force', 'replace stale links left by removed environments')
    .action(withErrorHandling(async (specArg: string, options: InstallCommandOptions) => {
      const ctx = await createCliExecutionContext(options);
      await installCommand(specArg, options, ctx);
    }));
}
