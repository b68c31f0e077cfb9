/**
 * File System Ontology Registry
 * =============================
 * On-disk cache of ontology artifacts. One flat directory, one file per
 * (id, resolved version, file type) named `{id}_{version}{suffix}`.
 *
 * Writes go to `{name}.tmp` and are published with a rename, so a file under
 * a canonical name is always complete. Fetching happens outside the lock;
 * only the re-check/write/rename and the unregister delete are serialized.
 */

import { access, mkdir, readdir, rename, rm, stat, unlink, writeFile } from 'fs/promises';
import type { Dirent } from 'fs';
import { join, resolve } from 'path';
import {
  formatVersion,
  providerFileName,
  registryFileName,
  tempFileName,
  type FileType,
  type OntologyContent,
  type OntologyContentProvider,
  type OntologyMetadataProvider,
  type OntologyRegistry,
  type Version,
} from '@ontocache/core';
import {
  AsyncMutex,
  ContentFetchError,
  KeyedAsyncMutex,
  RegistryRemovalError,
  RegistryRenameError,
  RegistryUnavailableError,
  RegistryWriteError,
  createLogger,
  handleError,
  type LockScope,
} from '@ontocache/utils';
import { resolveVersion } from './version-resolver.js';

const logger = createLogger('@ontocache/storage');

export interface FileSystemOntologyRegistryConfig {
  registryPath: string;
  metadataProvider: OntologyMetadataProvider;
  contentProvider: OntologyContentProvider;
  /** Defaults to `registry` (one lock for the whole store) */
  lockScope?: LockScope;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class FileSystemOntologyRegistry implements OntologyRegistry<string> {
  private readonly root: string;
  private readonly metadataProvider: OntologyMetadataProvider;
  private readonly contentProvider: OntologyContentProvider;
  private readonly lockScope: LockScope;
  private readonly registryLock = new AsyncMutex();
  private readonly entryLocks = new KeyedAsyncMutex();

  constructor(config: FileSystemOntologyRegistryConfig) {
    this.root = resolve(config.registryPath);
    this.metadataProvider = config.metadataProvider;
    this.contentProvider = config.contentProvider;
    this.lockScope = config.lockScope ?? 'registry';
  }

  get registryPath(): string {
    return this.root;
  }

  async register(ontologyId: string, version: Version, fileType: FileType): Promise<string> {
    const resolvedVersion = await resolveVersion(ontologyId, version, this.metadataProvider);
    const fileName = registryFileName(ontologyId, resolvedVersion, fileType);
    const target = join(this.root, fileName);

    if (await pathExists(target)) {
      logger.debug('Ontology already registered', { ontologyId, version: resolvedVersion, path: target });
      return target;
    }

    try {
      await mkdir(this.root, { recursive: true });
    } catch (error: unknown) {
      throw new RegistryUnavailableError(this.root, error);
    }

    const content = await this.fetchContent(ontologyId, resolvedVersion, fileType);

    return this.withLock(fileName, async () => {
      if (await pathExists(target)) {
        logger.debug('Ontology registered concurrently, discarding download', {
          ontologyId,
          version: resolvedVersion,
          path: target,
        });
        return target;
      }

      const tempPath = tempFileName(target);

      try {
        await writeFile(tempPath, content);
      } catch (error: unknown) {
        await this.discardTempFile(tempPath);
        throw new RegistryWriteError(tempPath, error);
      }

      try {
        await rename(tempPath, target);
      } catch (error: unknown) {
        await this.discardTempFile(tempPath);
        throw new RegistryRenameError(tempPath, target, error);
      }

      logger.debug('Registered ontology', {
        ontologyId,
        version: resolvedVersion,
        fileType,
        path: target,
      });
      return target;
    });
  }

  async unregister(ontologyId: string, version: Version, fileType: FileType): Promise<void> {
    const resolvedVersion = await resolveVersion(ontologyId, version, this.metadataProvider);
    const fileName = registryFileName(ontologyId, resolvedVersion, fileType);
    const target = join(this.root, fileName);

    await this.withLock(fileName, async () => {
      if (!(await pathExists(target))) {
        return;
      }

      try {
        await unlink(target);
      } catch (error: unknown) {
        throw new RegistryRemovalError(target, error);
      }

      logger.debug('Unregistered ontology', { ontologyId, version: resolvedVersion, path: target });
    });
  }

  async get(ontologyId: string, version: Version, fileType: FileType): Promise<string | undefined> {
    let resolvedVersion: string;
    try {
      resolvedVersion = await resolveVersion(ontologyId, version, this.metadataProvider);
    } catch (error: unknown) {
      handleError(error, { ontologyId, version: formatVersion(version), operation: 'get' });
      return undefined;
    }

    const target = join(this.root, registryFileName(ontologyId, resolvedVersion, fileType));
    return (await pathExists(target)) ? target : undefined;
  }

  async list(): Promise<string[]> {
    try {
      const entries = await readdir(this.root, { withFileTypes: true });
      const fileNames: string[] = [];
      for (const entry of entries) {
        if (await this.isRegularFile(entry)) {
          fileNames.push(entry.name);
        }
      }
      return fileNames.sort().map((name) => join(this.root, name));
    } catch (error: unknown) {
      logger.debug('Registry directory not readable', {
        path: this.root,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  private async fetchContent(
    ontologyId: string,
    resolvedVersion: string,
    fileType: FileType
  ): Promise<OntologyContent> {
    const fileName = providerFileName(ontologyId, fileType);
    try {
      return await this.contentProvider.provideOntology(ontologyId, fileName, resolvedVersion);
    } catch (error: unknown) {
      if (error instanceof ContentFetchError) {
        throw error;
      }
      throw new ContentFetchError(
        ontologyId,
        error instanceof Error ? error.message : String(error),
        { fileName, version: resolvedVersion },
        error
      );
    }
  }

  /**
   * Symlinks count by what they point at, matching the existence check `get` uses.
   */
  private async isRegularFile(entry: Dirent): Promise<boolean> {
    if (entry.isFile()) {
      return true;
    }
    if (!entry.isSymbolicLink()) {
      return false;
    }
    try {
      return (await stat(join(this.root, entry.name))).isFile();
    } catch {
      return false;
    }
  }

  private withLock<T>(fileName: string, fn: () => Promise<T>): Promise<T> {
    return this.lockScope === 'entry'
      ? this.entryLocks.runExclusive(fileName, fn)
      : this.registryLock.runExclusive(fn);
  }

  private async discardTempFile(tempPath: string): Promise<void> {
    try {
      await rm(tempPath, { force: true });
    } catch (error: unknown) {
      logger.warn('Failed to remove temporary file', {
        path: tempPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
