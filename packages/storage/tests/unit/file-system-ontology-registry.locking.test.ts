/**
 * Tests for the write path of file-system-ontology-registry.ts with a
 * partially mocked filesystem: rename failures, temp cleanup and the two
 * lock scopes.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readdir, rename, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { FileType, declaredVersion } from '@ontocache/core';
import { RegistryRenameError, RegistryWriteError } from '@ontocache/utils';
import { StaticMetadataProvider } from '../../src/providers/static-metadata-provider.js';
import { StaticOntologyProvider } from '../../src/providers/static-ontology-provider.js';
import { createRegistry, createTempDir, removeTempDir } from '../helpers/temp-registry.js';

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return {
    ...actual,
    writeFile: vi.fn(actual.writeFile),
    rename: vi.fn(actual.rename),
    rm: vi.fn(actual.rm),
  };
});

const actualFs = await vi.importActual<typeof import('fs/promises')>('fs/promises');

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('FileSystemOntologyRegistry write path', () => {
  let baseDir: string;
  let registryPath: string;

  beforeEach(async () => {
    baseDir = await createTempDir();
    registryPath = join(baseDir, 'registry');
  });

  afterEach(async () => {
    await removeTempDir(baseDir);
  });

  it('should remove the temp file and report a failed rename', async () => {
    vi.mocked(rename).mockRejectedValueOnce(new Error('EXDEV: cross-device link not permitted'));
    const registry = createRegistry(baseDir, new StaticMetadataProvider(), new StaticOntologyProvider({ uo: '<rdf/>' }));
    const target = join(registryPath, 'uo_1.json');

    const error = await registry.register('uo', declaredVersion('1'), FileType.Json).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RegistryRenameError);
    expect(error).toMatchObject({
      message: `Unable to rename temporary file '${target}.tmp'`,
      context: { tempPath: `${target}.tmp`, targetPath: target },
    });
    expect(rm).toHaveBeenCalledWith(`${target}.tmp`, { force: true });
    expect(await readdir(registryPath)).toEqual([]);
  });

  it('should remove the temp file and report a failed write', async () => {
    vi.mocked(writeFile).mockRejectedValueOnce(new Error('ENOSPC: no space left on device'));
    const registry = createRegistry(baseDir, new StaticMetadataProvider(), new StaticOntologyProvider({ uo: '<rdf/>' }));
    const target = join(registryPath, 'uo_1.json');

    const error = await registry.register('uo', declaredVersion('1'), FileType.Json).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RegistryWriteError);
    expect(error instanceof Error ? error.cause : undefined).toMatchObject({
      message: 'ENOSPC: no space left on device',
    });
    expect(rm).toHaveBeenCalledWith(`${target}.tmp`, { force: true });
    expect(rename).not.toHaveBeenCalled();
  });

  it('should still report the write failure when cleanup fails too', async () => {
    vi.mocked(writeFile).mockRejectedValueOnce(new Error('EIO: i/o error'));
    vi.mocked(rm).mockRejectedValueOnce(new Error('EIO: i/o error'));
    const registry = createRegistry(baseDir, new StaticMetadataProvider(), new StaticOntologyProvider({ uo: '<rdf/>' }));

    await expect(registry.register('uo', declaredVersion('1'), FileType.Json)).rejects.toBeInstanceOf(
      RegistryWriteError
    );
  });

  it('should serialize writes to different entries with the registry lock', async () => {
    const gate = deferred();
    vi.mocked(writeFile).mockImplementationOnce(async (file, data, options) => {
      await gate.promise;
      return actualFs.writeFile(file, data, options);
    });
    const registry = createRegistry(
      baseDir,
      new StaticMetadataProvider(),
      new StaticOntologyProvider({ go: 'go', uo: 'uo' }),
      'registry'
    );

    const slow = registry.register('go', declaredVersion('1'), FileType.Owl);
    await vi.waitFor(() => expect(writeFile).toHaveBeenCalledTimes(1));

    let fastDone = false;
    const fast = registry.register('uo', declaredVersion('1'), FileType.Owl).then((path) => {
      fastDone = true;
      return path;
    });
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(fastDone).toBe(false);

    gate.resolve();
    await expect(slow).resolves.toBe(join(registryPath, 'go_1.owl'));
    await expect(fast).resolves.toBe(join(registryPath, 'uo_1.owl'));
  });

  it('should let different entries proceed independently with per-entry locks', async () => {
    const gate = deferred();
    vi.mocked(writeFile).mockImplementationOnce(async (file, data, options) => {
      await gate.promise;
      return actualFs.writeFile(file, data, options);
    });
    const registry = createRegistry(
      baseDir,
      new StaticMetadataProvider(),
      new StaticOntologyProvider({ go: 'go', uo: 'uo' }),
      'entry'
    );

    const slow = registry.register('go', declaredVersion('1'), FileType.Owl);
    await vi.waitFor(() => expect(writeFile).toHaveBeenCalledTimes(1));

    await expect(registry.register('uo', declaredVersion('1'), FileType.Owl)).resolves.toBe(
      join(registryPath, 'uo_1.owl')
    );

    gate.resolve();
    await expect(slow).resolves.toBe(join(registryPath, 'go_1.owl'));
    expect(await readdir(registryPath)).toEqual(['go_1.owl', 'uo_1.owl']);
  });

  it('should still exclude same-entry writers with per-entry locks', async () => {
    const registry = createRegistry(
      baseDir,
      new StaticMetadataProvider(),
      new StaticOntologyProvider({ uo: '<rdf/>' }),
      'entry'
    );

    const paths = await Promise.all(
      Array.from({ length: 5 }, () => registry.register('uo', declaredVersion('1'), FileType.Json))
    );

    expect(new Set(paths)).toEqual(new Set([join(registryPath, 'uo_1.json')]));
    expect(writeFile).toHaveBeenCalledTimes(1);
    expect(await readdir(registryPath)).toEqual(['uo_1.json']);
  });
});
