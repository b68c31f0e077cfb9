/**
 * @ontocache/api-clients - API Client Package
 *
 * Public API exports for the remote providers
 */

export { BaseApiClient } from './base-client.js';
export type { BaseApiClientConfig } from './base-client.js';

export { BioRegistryMetadataProvider } from './bioregistry-metadata-provider.js';
export type {
  BioRegistryMetadataProviderConfig,
  BioRegistryResource,
} from './bioregistry-metadata-provider.js';

export { OboLibraryOntologyProvider } from './obo-library-ontology-provider.js';
export type { OboLibraryOntologyProviderConfig } from './obo-library-ontology-provider.js';
