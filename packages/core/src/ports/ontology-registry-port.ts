/**
 * Ontology Registry Port
 *
 * Local store of ontology artifacts keyed by (id, resolved version, file type).
 *
 * @packageDocumentation
 */

import type { FileType } from '../ontology/file-type.js';
import type { Version } from '../ontology/version.js';

export interface OntologyRegistry<Entry> {
  /**
   * Ensure the artifact is stored locally, fetching it on a miss.
   */
  register(ontologyId: string, version: Version, fileType: FileType): Promise<Entry>;

  /**
   * Remove the artifact. Removing an absent entry is a no-op.
   */
  unregister(ontologyId: string, version: Version, fileType: FileType): Promise<void>;

  /**
   * Look up a stored artifact without fetching. Never rejects.
   */
  get(ontologyId: string, version: Version, fileType: FileType): Promise<Entry | undefined>;

  /**
   * Every stored file. Never rejects.
   */
  list(): Promise<string[]>;
}
