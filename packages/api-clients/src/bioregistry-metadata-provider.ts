/**
 * BioRegistry Metadata Provider
 * =============================
 * Resolves ontology metadata (current version, download locations, title)
 * from the BioRegistry REST API: `GET {apiUrl}registry/{prefix}`.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import {
  OntologyMetadataSchema,
  type OntologyMetadata,
  type OntologyMetadataProvider,
} from '@ontocache/core';
import { createLogger, DEFAULT_REGISTRY_CONFIG, MetadataResolutionError } from '@ontocache/utils';
import { BaseApiClient } from './base-client.js';

const logger = createLogger('@ontocache/api-clients');

/**
 * The subset of a BioRegistry resource record the cache reads.
 */
const BioRegistryResourceSchema = z
  .object({
    prefix: z.string(),
    name: z.string().nullish(),
    version: z.string().nullish(),
    download_owl: z.string().nullish(),
    download_obo: z.string().nullish(),
    download_json: z.string().nullish(),
  })
  .passthrough();

export type BioRegistryResource = z.infer<typeof BioRegistryResourceSchema>;

export interface BioRegistryMetadataProviderConfig {
  apiUrl?: string;
  timeout?: number;
  userAgent?: string;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

export class BioRegistryMetadataProvider extends BaseApiClient implements OntologyMetadataProvider {
  private readonly apiUrl: string;

  constructor(config: BioRegistryMetadataProviderConfig = {}) {
    const apiUrl = withTrailingSlash(config.apiUrl ?? DEFAULT_REGISTRY_CONFIG.bioRegistryUrl);

    super({
      baseURL: apiUrl,
      apiName: 'BioRegistry',
      timeout: config.timeout ?? DEFAULT_REGISTRY_CONFIG.httpTimeoutMs,
      axiosInstance: config.axiosInstance,
    });

    this.apiUrl = apiUrl;
    this.axiosInstance.defaults.headers.common['User-Agent'] =
      config.userAgent ?? DEFAULT_REGISTRY_CONFIG.userAgent;
  }

  getApiUrl(): string {
    return this.apiUrl;
  }

  async provideMetadata(ontologyId: string): Promise<OntologyMetadata> {
    let body: unknown;
    try {
      body = await this.get<unknown>(`registry/${encodeURIComponent(ontologyId)}`);
    } catch (error: unknown) {
      logger.warn('BioRegistry lookup failed', {
        ontologyId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new MetadataResolutionError(
        ontologyId,
        error instanceof Error ? error.message : String(error),
        error
      );
    }

    const parsed = BioRegistryResourceSchema.safeParse(body);
    if (!parsed.success) {
      throw new MetadataResolutionError(ontologyId, `Unable to parse metadata for ${ontologyId}`, parsed.error);
    }

    const resource = parsed.data;
    if (!resource.version) {
      throw new MetadataResolutionError(ontologyId, `Version not found for ${ontologyId}`);
    }

    logger.debug('Resolved ontology metadata', { ontologyId, version: resource.version });

    const metadata = OntologyMetadataSchema.safeParse({
      ontologyId: resource.prefix,
      version: resource.version,
      jsonFileLocation: resource.download_json ?? undefined,
      owlFileLocation: resource.download_owl ?? undefined,
      oboFileLocation: resource.download_obo ?? undefined,
      title: resource.name ?? undefined,
    });
    if (!metadata.success) {
      throw new MetadataResolutionError(ontologyId, `Unable to parse metadata for ${ontologyId}`, metadata.error);
    }

    return metadata.data;
  }
}
