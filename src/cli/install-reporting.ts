/**
 * Output shared by the install and update commands.
 */

import type { Dispatcher, LinkTarget } from '../core/dispatcher.js';
import type { ExecutionContext } from '../types/execution-context.js';
import { formatPathForDisplay, pluralize } from '../utils/formatters.js';
import { confirmOrAssume } from './context.js';

export function reportLinks(ctx: ExecutionContext, linkDir: string, added: string[], removed: string[] = []): void {
  const dir = formatPathForDisplay(linkDir, ctx.scopeEnv.homeDir);
  if (added.length > 0) {
    ctx.output.info(`Linked ${pluralize(added.length, 'executable')} into ${dir}: ${added.join(', ')}`);
  }
  if (removed.length > 0) {
    ctx.output.info(`Unlinked ${pluralize(removed.length, 'executable')} from ${dir}: ${removed.join(', ')}`);
  }
}

/**
 * Tell the user how to reach links in a directory their shell does not search.
 */
export function warnIfNotOnPath(ctx: ExecutionContext, target: LinkTarget): void {
  if (target.onPath) {
    return;
  }
  ctx.output.warn(
    `${formatPathForDisplay(target.linkDir, ctx.scopeEnv.homeDir)} is not on your PATH. ` +
    `Add this line to your shell profile:\n  export PATH="${target.linkDir}:$PATH"`
  );
}

/**
 * A package without executables is of no use to venvbox: offer to remove it.
 * Without a terminal and without --assumeyes the package is kept.
 */
export async function offerRemovalWithoutExecutables(
  ctx: ExecutionContext,
  dispatcher: Dispatcher,
  name: string
): Promise<void> {
  ctx.output.warn(`'${name}' provides no executables, so nothing was linked.`);
  if (!ctx.assumeYes && !ctx.interactive) {
    ctx.output.info(`Kept '${name}'. Remove it with: venvbox remove ${name}`);
    return;
  }
  if (!(await confirmOrAssume(ctx, `Remove '${name}' again?`, true))) {
    return;
  }
  await dispatcher.remove(name, { scope: ctx.scope });
  ctx.output.success(`Removed ${name}`);
}
