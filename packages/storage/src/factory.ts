/**
 * Registry factory
 *
 * Wires a FileSystemOntologyRegistry from configuration, defaulting to the
 * BioRegistry metadata provider and the OBO Library content provider.
 */

import type { OntologyContentProvider, OntologyMetadataProvider } from '@ontocache/core';
import { BioRegistryMetadataProvider, OboLibraryOntologyProvider } from '@ontocache/api-clients';
import { getRegistryConfig, type RegistryConfig } from '@ontocache/utils';
import { FileSystemOntologyRegistry } from './registry/file-system-ontology-registry.js';

export interface CreateOntologyRegistryOptions extends Partial<RegistryConfig> {
  metadataProvider?: OntologyMetadataProvider;
  contentProvider?: OntologyContentProvider;
}

export function createOntologyRegistry(
  options: CreateOntologyRegistryOptions = {}
): FileSystemOntologyRegistry {
  const { metadataProvider, contentProvider, ...overrides } = options;
  const config = getRegistryConfig(overrides);

  return new FileSystemOntologyRegistry({
    registryPath: config.registryPath,
    lockScope: config.lockScope,
    metadataProvider:
      metadataProvider ??
      new BioRegistryMetadataProvider({
        apiUrl: config.bioRegistryUrl,
        timeout: config.httpTimeoutMs,
        userAgent: config.userAgent,
      }),
    contentProvider:
      contentProvider ??
      new OboLibraryOntologyProvider({
        baseUrl: config.oboLibraryUrl,
        timeout: config.httpTimeoutMs,
        userAgent: config.userAgent,
      }),
  });
}
