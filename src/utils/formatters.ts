import type { InstallScope } from '../types/index.js';
import { normalizePathWithTilde } from './home-directory.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display, using tilde notation under the home directory.
 *
 * @example
 * formatPathForDisplay('/home/alex/.local/bin', '/home/alex') // => '~/.local/bin'
 */
export function formatPathForDisplay(path: string, homeDir: string): string {
  return normalizePathWithTilde(path, homeDir);
}

/**
 * Format a scope as a tag (e.g., " [system]"); the user scope goes untagged.
 */
export function formatScopeTag(scope: InstallScope): string {
  return scope === 'system' ? ' [system]' : '';
}

export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export interface TableColumn<T> {
  header: string;
  accessor: (item: T) => string;
}

/**
 * Lay out rows under their headers, each column as wide as its widest cell.
 * The last column is never padded.
 */
export function formatTable<T>(items: T[], columns: Array<TableColumn<T>>): string[] {
  const cells = items.map(item => columns.map(col => col.accessor(item)));
  const widths = columns.map((col, index) =>
    Math.max(col.header.length, ...cells.map(row => row[index].length))
  );

  const renderRow = (row: string[]): string =>
    row
      .map((cell, index) => (index === row.length - 1 ? cell : cell.padEnd(widths[index] + 2)))
      .join('');

  return [
    renderRow(columns.map(col => col.header)),
    renderRow(columns.map(col => '-'.repeat(col.header.length))),
    ...cells.map(renderRow)
  ];
}
