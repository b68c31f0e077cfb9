/**
 * Ontology metadata schema
 *
 * What a metadata provider hands back. Only `version` drives the cache; the
 * download locations and title are informational.
 */

import { z } from 'zod';

export const OntologyMetadataSchema = z
  .object({
    ontologyId: z.string().min(1),
    version: z.string().min(1),
    jsonFileLocation: z.string().optional(),
    owlFileLocation: z.string().optional(),
    oboFileLocation: z.string().optional(),
    title: z.string().optional(),
  })
  .readonly();

export type OntologyMetadata = z.infer<typeof OntologyMetadataSchema>;
