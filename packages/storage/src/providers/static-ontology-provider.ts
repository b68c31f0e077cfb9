/**
 * Static Ontology Provider
 *
 * In-memory OntologyContentProvider. Content is looked up by exact release
 * (id, version, file name) first, then by id alone.
 */

import type { OntologyContent, OntologyContentProvider } from '@ontocache/core';
import { ContentFetchError } from '@ontocache/utils';

export interface OntologyRequest {
  ontologyId: string;
  fileName: string;
  version: string;
}

function releaseKey(ontologyId: string, version: string, fileName: string): string {
  return `${ontologyId}/${version}/${fileName}`;
}

export class StaticOntologyProvider implements OntologyContentProvider {
  private readonly byId = new Map<string, OntologyContent>();
  private readonly byRelease = new Map<string, OntologyContent>();
  private readonly requested: OntologyRequest[] = [];

  /**
   * @param contents - ontology id to content served for every version and format
   */
  constructor(contents: Record<string, OntologyContent> = {}) {
    for (const [ontologyId, content] of Object.entries(contents)) {
      this.byId.set(ontologyId, content);
    }
  }

  /**
   * Serve `content` only for one exact release file.
   */
  setRelease(ontologyId: string, version: string, fileName: string, content: OntologyContent): this {
    this.byRelease.set(releaseKey(ontologyId, version, fileName), content);
    return this;
  }

  async provideOntology(ontologyId: string, fileName: string, version: string): Promise<OntologyContent> {
    this.requested.push({ ontologyId, fileName, version });

    const content =
      this.byRelease.get(releaseKey(ontologyId, version, fileName)) ?? this.byId.get(ontologyId);
    if (content === undefined) {
      throw new ContentFetchError(ontologyId, `No content for '${fileName}' at version '${version}'`, {
        fileName,
        version,
      });
    }
    return content;
  }

  get callCount(): number {
    return this.requested.length;
  }

  get calls(): readonly OntologyRequest[] {
    return this.requested;
  }
}
