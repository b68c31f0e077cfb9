/**
 * Ontology Content Provider Port
 *
 * Fetches the raw artifact for an ontology release.
 *
 * @packageDocumentation
 */

export type OntologyContent = string | Uint8Array;

export interface OntologyContentProvider {
  /**
   * @param fileName - remote name without the version, e.g. `uo.json`
   * @param version - concrete release the provider must locate
   */
  provideOntology(ontologyId: string, fileName: string, version: string): Promise<OntologyContent>;
}
