/**
 * Package spec parsing.
 * Supports:
 * - Index names, optionally pinned (httpie, httpie==3.2.2)
 * - Version-control URLs (git+https://host/owner/repo.git@v1#egg=name, git@host:owner/repo.git)
 * - Local project directories (., ./tool, /src/tool)
 */

import { basename, resolve } from 'path';

import type { PackageSpec, VcsPackageSpec } from '../types/index.js';
import { ValidationError } from './errors.js';

const INDEX_SPEC_REGEX = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)(?:==([A-Za-z0-9.+!_-]+))?$/;
const VCS_PREFIX_REGEX = /^(git|hg|svn|bzr)\+/i;
const URL_SCHEME_REGEX = /^[a-z][a-z0-9+.-]*:\/\//i;
const SCP_LIKE_REGEX = /^[\w.-]+@[\w.-]+:/;
const VCS_SUFFIX_REGEX = /\.(git|hg)$/i;
const EGG_FRAGMENT_REGEX = /(?:^|&)egg=([^&]+)/;
const NORMALIZED_NAME_REGEX = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;

/**
 * Normalize a distribution name: lowercase, runs of '-', '_' and '.' collapse to '-'.
 */
export function normalizePackageName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, '-');
}

/**
 * Validate an already-normalized package name.
 */
export function validatePackageName(name: string): void {
  if (name.length === 0) {
    throw new ValidationError('Package name cannot be empty');
  }
  if (!NORMALIZED_NAME_REGEX.test(name)) {
    throw new ValidationError(`Package name '${name}' is not a valid distribution name`);
  }
}

export function isVcsUrl(input: string): boolean {
  return VCS_PREFIX_REGEX.test(input) || URL_SCHEME_REGEX.test(input) || SCP_LIKE_REGEX.test(input);
}

function isLocalPath(input: string): boolean {
  return input === '.' || input === '..' || input.startsWith('./') || input.startsWith('../') || input.startsWith('/');
}

/**
 * Derive the package name from a version-control URL: the egg fragment when present,
 * otherwise the last path segment without its ref and version-control suffix.
 */
export function deriveNameFromVcsUrl(url: string): string {
  const hashIndex = url.indexOf('#');
  const fragment = hashIndex >= 0 ? url.slice(hashIndex + 1) : '';
  const egg = fragment.match(EGG_FRAGMENT_REGEX);
  if (egg) {
    return normalizePackageName(egg[1]);
  }

  let location = hashIndex >= 0 ? url.slice(0, hashIndex) : url;
  const queryIndex = location.indexOf('?');
  if (queryIndex >= 0) {
    location = location.slice(0, queryIndex);
  }
  location = location.replace(/\/+$/, '');

  const segments = location.split(/[/:]/);
  let segment = segments[segments.length - 1] ?? '';
  // git+https://host/owner/repo.git@v1.0 pins a ref after the last segment
  const atIndex = segment.indexOf('@');
  if (atIndex >= 0) {
    segment = segment.slice(0, atIndex);
  }
  return normalizePackageName(segment.replace(VCS_SUFFIX_REGEX, ''));
}

function parseVcsSpec(raw: string): VcsPackageSpec {
  const name = deriveNameFromVcsUrl(raw);
  if (!name) {
    throw new ValidationError(`Cannot derive a package name from '${raw}'`);
  }
  validatePackageName(name);
  return { kind: 'vcs', raw, name, url: raw };
}

/**
 * Classify user input into a PackageSpec.
 *
 * @param input - Raw user input
 * @param cwd - Directory local paths are resolved against
 */
export function parsePackageSpec(input: string, cwd: string = process.cwd()): PackageSpec {
  const raw = input.trim();
  if (!raw) {
    throw new ValidationError('Package spec cannot be empty');
  }

  if (isLocalPath(raw)) {
    const path = resolve(cwd, raw);
    const name = normalizePackageName(basename(path));
    validatePackageName(name);
    return { kind: 'path', raw, name, path };
  }

  if (isVcsUrl(raw)) {
    return parseVcsSpec(raw);
  }

  const match = raw.match(INDEX_SPEC_REGEX);
  if (!match) {
    throw new ValidationError(
      `'${raw}' is not a package name, a name==version pin, a version-control URL or a local path`
    );
  }

  const name = normalizePackageName(match[1]);
  validatePackageName(name);
  return match[2] !== undefined
    ? { kind: 'index', raw, name, version: match[2] }
    : { kind: 'index', raw, name };
}

/**
 * The argument handed to the package installer for this spec.
 */
export function toInstallerArgument(spec: PackageSpec): string {
  switch (spec.kind) {
    case 'index':
      return spec.version !== undefined ? `${spec.name}==${spec.version}` : spec.name;
    case 'vcs':
      return spec.url;
    case 'path':
      return spec.path;
  }
}
