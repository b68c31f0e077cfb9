/**
 * Property Tests for concurrent registration
 * ==========================================
 *
 * Whatever the number of concurrent callers and the lock scope, one entry
 * ends up as exactly one complete file and no temp file survives.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { readFile, readdir } from 'fs/promises';
import { join } from 'path';
import { FILE_TYPES, declaredVersion, registryFileName } from '@ontocache/core';
import { StaticMetadataProvider } from '../../src/providers/static-metadata-provider.js';
import { StaticOntologyProvider } from '../../src/providers/static-ontology-provider.js';
import { createRegistry, createTempDir, removeTempDir } from '../helpers/temp-registry.js';

describe('FileSystemOntologyRegistry - Property Tests', () => {
  it('should persist one complete file for N concurrent registrations', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 8 }),
        fc.constantFrom('registry' as const, 'entry' as const),
        fc.constantFrom(...FILE_TYPES),
        fc.string({ minLength: 1, maxLength: 2000 }),
        async (callers, lockScope, fileType, body) => {
          const baseDir = await createTempDir();
          try {
            const registry = createRegistry(
              baseDir,
              new StaticMetadataProvider(),
              new StaticOntologyProvider({ ro: body }),
              lockScope
            );

            const paths = await Promise.all(
              Array.from({ length: callers }, () => registry.register('ro', declaredVersion('7'), fileType))
            );

            const fileName = registryFileName('ro', '7', fileType);
            expect(new Set(paths)).toEqual(new Set([join(baseDir, 'registry', fileName)]));
            expect(await readdir(join(baseDir, 'registry'))).toEqual([fileName]);
            expect(await readFile(paths[0], 'utf8')).toBe(body);
          } finally {
            await removeTempDir(baseDir);
          }
        }
      ),
      { numRuns: 25 }
    );
  });
});
