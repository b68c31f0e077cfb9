/**
 * OBO Library Ontology Provider
 * =============================
 * Downloads release artifacts from the OBO PURL server:
 * `GET {baseUrl}/{id}/releases/{version}/{fileName}`.
 */

import type { AxiosInstance } from 'axios';
import type { OntologyContentProvider } from '@ontocache/core';
import { createLogger, ContentFetchError, DEFAULT_REGISTRY_CONFIG } from '@ontocache/utils';
import { BaseApiClient } from './base-client.js';

const logger = createLogger('@ontocache/api-clients');

export interface OboLibraryOntologyProviderConfig {
  baseUrl?: string;
  timeout?: number;
  userAgent?: string;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
}

export class OboLibraryOntologyProvider extends BaseApiClient implements OntologyContentProvider {
  constructor(config: OboLibraryOntologyProviderConfig = {}) {
    super({
      baseURL: config.baseUrl ?? DEFAULT_REGISTRY_CONFIG.oboLibraryUrl,
      apiName: 'OBO Library',
      timeout: config.timeout ?? DEFAULT_REGISTRY_CONFIG.httpTimeoutMs,
      axiosInstance: config.axiosInstance,
    });

    this.axiosInstance.defaults.headers.common['User-Agent'] =
      config.userAgent ?? DEFAULT_REGISTRY_CONFIG.userAgent;
  }

  /**
   * Relative URL of a release artifact
   */
  releasePath(ontologyId: string, fileName: string, version: string): string {
    return `${ontologyId}/releases/${version}/${fileName}`;
  }

  async provideOntology(ontologyId: string, fileName: string, version: string): Promise<string> {
    try {
      const content = await this.getText(this.releasePath(ontologyId, fileName, version));

      logger.debug(`Got file '${fileName}' for ontology '${ontologyId}' and version '${version}'`, {
        ontologyId,
        version,
        bytes: Buffer.byteLength(content),
      });

      return content;
    } catch (error: unknown) {
      throw new ContentFetchError(
        ontologyId,
        error instanceof Error ? error.message : String(error),
        { fileName, version },
        error
      );
    }
  }
}
