/**
 * Ports Barrel Export
 *
 * Providers and registries depend on these interfaces, never on each other.
 */

export type { OntologyMetadataProvider } from './ontology-metadata-provider-port.js';
export type { OntologyContentProvider, OntologyContent } from './ontology-content-provider-port.js';
export type { OntologyRegistry } from './ontology-registry-port.js';
