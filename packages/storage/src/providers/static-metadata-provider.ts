/**
 * Static Metadata Provider
 *
 * Lookup-table implementation of OntologyMetadataProvider for offline use
 * and tests. Unknown ids fail the same way an upstream without a version does.
 */

import type { OntologyMetadata, OntologyMetadataProvider } from '@ontocache/core';
import { MetadataResolutionError } from '@ontocache/utils';

export class StaticMetadataProvider implements OntologyMetadataProvider {
  private readonly entries = new Map<string, OntologyMetadata>();
  private readonly requested: string[] = [];

  /**
   * @param versions - ontology id to current version
   */
  constructor(versions: Record<string, string> = {}) {
    for (const [ontologyId, version] of Object.entries(versions)) {
      this.entries.set(ontologyId, { ontologyId, version });
    }
  }

  /**
   * Add or replace the full metadata record for an ontology.
   */
  setMetadata(metadata: OntologyMetadata): this {
    this.entries.set(metadata.ontologyId, metadata);
    return this;
  }

  async provideMetadata(ontologyId: string): Promise<OntologyMetadata> {
    this.requested.push(ontologyId);

    const metadata = this.entries.get(ontologyId);
    if (!metadata) {
      throw new MetadataResolutionError(ontologyId, `No metadata known for ${ontologyId}`);
    }
    return metadata;
  }

  get callCount(): number {
    return this.requested.length;
  }

  get calls(): readonly string[] {
    return this.requested;
  }
}
