/**
 * Ontology Metadata Provider Port
 *
 * Resolves descriptive metadata (most importantly the current version) for an
 * ontology id. The registry only calls it when `latest` is requested.
 *
 * @packageDocumentation
 */

import type { OntologyMetadata } from '../schemas/ontology-metadata.js';

export interface OntologyMetadataProvider {
  /**
   * Must resolve with a concrete version. An upstream record without a
   * version is a failure, not an empty string.
   */
  provideMetadata(ontologyId: string): Promise<OntologyMetadata>;
}
