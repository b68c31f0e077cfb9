/**
 * YAML Configuration Loader
 * ==========================
 * Loads configuration from ontocache.yaml with fallback to environment variables
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { logger } from '../logger.js';

const YamlConfigSchema = z
  .object({
    registry: z
      .object({
        path: z.string().optional(),
        lockScope: z.string().optional(),
      })
      .optional(),
    providers: z
      .object({
        bioregistryUrl: z.string().optional(),
        oboLibraryUrl: z.string().optional(),
      })
      .optional(),
    http: z
      .object({
        timeoutMs: z.number().optional(),
        userAgent: z.string().optional(),
      })
      .optional(),
  })
  .passthrough();

export type YamlConfig = z.infer<typeof YamlConfigSchema>;

let cachedConfig: YamlConfig | null = null;

/**
 * Resolve the config file location: explicit argument > ONTOCACHE_CONFIG > ./ontocache.yaml
 */
export function getYamlConfigPath(configPath?: string): string {
  return configPath || process.env.ONTOCACHE_CONFIG || join(process.cwd(), 'ontocache.yaml');
}

/**
 * Load configuration from the YAML file. A missing file yields `{}`; an
 * unreadable or malformed one is logged and ignored.
 */
export function loadConfigFromYaml(configPath?: string): YamlConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const resolvedPath = getYamlConfigPath(configPath);

  if (!existsSync(resolvedPath)) {
    logger.debug('ontocache.yaml not found, using environment variables only', {
      path: resolvedPath,
    });
    cachedConfig = {};
    return cachedConfig;
  }

  try {
    const content = readFileSync(resolvedPath, 'utf-8');
    const parsed = YamlConfigSchema.safeParse(load(content) ?? {});
    if (!parsed.success) {
      logger.warn('Ignoring malformed ontocache.yaml', {
        path: resolvedPath,
        error: parsed.error.message,
      });
      cachedConfig = {};
      return cachedConfig;
    }

    logger.info('Loaded configuration from ontocache.yaml', { path: resolvedPath });
    cachedConfig = parsed.data;
    return cachedConfig;
  } catch (error) {
    logger.warn('Failed to load ontocache.yaml, using environment variables only', {
      path: resolvedPath,
      error: error instanceof Error ? error.message : String(error),
    });
    cachedConfig = {};
    return cachedConfig;
  }
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
