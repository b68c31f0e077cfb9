/**
 * Version selectors
 *
 * A selector is either `latest` (resolved through a metadata provider) or a
 * declared, already concrete version string.
 */

import { ValidationError } from '../errors.js';

export interface LatestVersion {
  readonly kind: 'latest';
}

export interface DeclaredVersion {
  readonly kind: 'declared';
  readonly value: string;
}

export type Version = LatestVersion | DeclaredVersion;

export const LATEST_VERSION_LABEL = 'latest';

const latest: LatestVersion = { kind: 'latest' };

export const LATEST: LatestVersion = Object.freeze(latest);

export function declaredVersion(value: string): DeclaredVersion {
  const version: DeclaredVersion = { kind: 'declared', value };
  return Object.freeze(version);
}

export function isLatest(version: Version): version is LatestVersion {
  return version.kind === 'latest';
}

/**
 * Display form: the declared string, or `latest`.
 */
export function formatVersion(version: Version): string {
  return version.kind === 'latest' ? LATEST_VERSION_LABEL : version.value;
}

/**
 * Parse user input into a selector. Exactly `latest` selects the latest
 * release; any other non-empty text is taken as a declared version.
 */
export function parseVersion(input: string): Version {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Version must not be empty', { input });
  }
  return trimmed === LATEST_VERSION_LABEL ? LATEST : declaredVersion(trimmed);
}
