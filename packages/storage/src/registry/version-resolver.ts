/**
 * Version Resolver
 *
 * Turns a version selector into the concrete version string used for file
 * naming. Only `latest` touches the metadata provider, whose answer must
 * carry a non-empty version.
 */

import { OntologyMetadataSchema, type OntologyMetadataProvider, type Version } from '@ontocache/core';
import { MetadataResolutionError } from '@ontocache/utils';

const ResolvedVersionSchema = OntologyMetadataSchema.unwrap().shape.version;

export async function resolveVersion(
  ontologyId: string,
  version: Version,
  metadataProvider: OntologyMetadataProvider
): Promise<string> {
  if (version.kind === 'declared') {
    return version.value;
  }

  let provided: unknown;
  try {
    const metadata = await metadataProvider.provideMetadata(ontologyId);
    provided = metadata.version;
  } catch (error: unknown) {
    if (error instanceof MetadataResolutionError) {
      throw error;
    }
    throw new MetadataResolutionError(
      ontologyId,
      error instanceof Error ? error.message : String(error),
      error
    );
  }

  const parsed = ResolvedVersionSchema.safeParse(provided);
  if (!parsed.success) {
    throw new MetadataResolutionError(ontologyId, `Version not found for ${ontologyId}`, parsed.error);
  }
  return parsed.data;
}
