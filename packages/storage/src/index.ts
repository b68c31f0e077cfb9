/**
 * @ontocache/storage - Ontology cache store
 *
 * Public API exports for the filesystem registry, its version resolver,
 * the in-memory providers and the configuration-driven factory.
 */

export { FileSystemOntologyRegistry } from './registry/file-system-ontology-registry.js';
export type { FileSystemOntologyRegistryConfig } from './registry/file-system-ontology-registry.js';
export { resolveVersion } from './registry/version-resolver.js';

export { StaticMetadataProvider } from './providers/static-metadata-provider.js';
export { StaticOntologyProvider } from './providers/static-ontology-provider.js';
export type { OntologyRequest } from './providers/static-ontology-provider.js';

export { createOntologyRegistry } from './factory.js';
export type { CreateOntologyRegistryOptions } from './factory.js';
