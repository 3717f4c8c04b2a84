import type { ListedPackage, ListOutcome } from '../dispatcher.js';
import type { OutputPort } from '../ports/output.js';
import { formatTable, pluralize, type TableColumn } from '../../utils/formatters.js';

const SHADOW_MARK = '*';

function formatVersion(pkg: ListedPackage): string {
  return pkg.status === 'ok' ? pkg.version : `(${pkg.reason})`;
}

function formatScope(pkg: ListedPackage): string {
  return pkg.shadowed ? `${pkg.scope}${SHADOW_MARK}` : pkg.scope;
}

function formatExecutables(pkg: ListedPackage): string {
  return pkg.links.length > 0 ? pkg.links.join(', ') : '-';
}

const COLUMNS: Array<TableColumn<ListedPackage>> = [
  { header: 'PACKAGE', accessor: pkg => pkg.name },
  { header: 'VERSION', accessor: formatVersion },
  { header: 'SCOPE', accessor: formatScope },
  { header: 'EXECUTABLES', accessor: formatExecutables }
];

/**
 * Render the list outcome as table lines, without the warnings.
 */
export function renderPackageTable(outcome: ListOutcome): string[] {
  const { packages } = outcome;
  if (packages.length === 0) {
    return ['No packages installed.'];
  }

  const lines = formatTable(packages, COLUMNS);
  lines.push('');
  if (packages.some(pkg => pkg.shadowed)) {
    lines.push(`${SHADOW_MARK} installed in both scopes; the first link directory on PATH wins`);
  }
  const degraded = packages.filter(pkg => pkg.status === 'degraded').length;
  const summary = degraded > 0
    ? `Total: ${pluralize(packages.length, 'package')} (${degraded} degraded)`
    : `Total: ${pluralize(packages.length, 'package')}`;
  lines.push(summary);
  return lines;
}

export function printPackageList(outcome: ListOutcome, output: OutputPort): void {
  for (const warning of outcome.warnings) {
    output.warn(warning);
  }
  output.message(renderPackageTable(outcome).join('\n'));
}
