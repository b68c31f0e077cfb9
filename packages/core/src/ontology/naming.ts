/**
 * Naming Scheme
 *
 * Deterministic file names for registry entries. Ids and versions are used
 * verbatim: callers must pass filesystem-safe strings.
 */

import { fileSuffix, type FileType } from './file-type.js';

export const TEMP_FILE_SUFFIX = '.tmp';

/**
 * Canonical registry name: `{id}_{version}{suffix}`.
 */
export function registryFileName(ontologyId: string, resolvedVersion: string, fileType: FileType): string {
  return `${ontologyId}_${resolvedVersion}${fileSuffix(fileType)}`;
}

/**
 * Name the remote source uses inside a release directory: `{id}{suffix}`.
 */
export function providerFileName(ontologyId: string, fileType: FileType): string {
  return `${ontologyId}${fileSuffix(fileType)}`;
}

/**
 * Sibling file an entry is written to before it is renamed into place.
 */
export function tempFileName(registryName: string): string {
  return `${registryName}${TEMP_FILE_SUFFIX}`;
}
