/**
 * Configuration loading
 *
 * Builds the typed registry configuration from ontocache.yaml, environment
 * variables (a local .env is honoured) and defaults, in that order.
 */

import { resolve } from 'path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { loadConfigFromYaml } from './yaml-config.js';

export { loadConfigFromYaml, clearConfigCache, getYamlConfigPath } from './yaml-config.js';
export type { YamlConfig } from './yaml-config.js';

export const LOCK_SCOPES = ['registry', 'entry'] as const;

/**
 * `registry` serialises every write behind one lock; `entry` locks per canonical file name.
 */
export type LockScope = (typeof LOCK_SCOPES)[number];

export interface RegistryConfig {
  registryPath: string;
  bioRegistryUrl: string;
  oboLibraryUrl: string;
  httpTimeoutMs: number;
  userAgent: string;
  lockScope: LockScope;
}

export const DEFAULT_REGISTRY_CONFIG: RegistryConfig = {
  registryPath: 'ontologies',
  bioRegistryUrl: 'https://bioregistry.io/api/',
  oboLibraryUrl: 'https://purl.obolibrary.org/obo',
  httpTimeoutMs: 30_000,
  userAgent: 'ontocache',
  lockScope: 'registry',
};

const RegistryConfigSchema = z.object({
  registryPath: z.string().min(1),
  bioRegistryUrl: z.string().url(),
  oboLibraryUrl: z.string().url(),
  httpTimeoutMs: z.coerce.number().int().positive(),
  userAgent: z.string().min(1),
  lockScope: z.enum(LOCK_SCOPES),
});

let envLoaded = false;

function ensureEnvLoaded(): void {
  if (!envLoaded) {
    loadDotenv();
    envLoaded = true;
  }
}

/**
 * Load the registry configuration.
 *
 * Priority per key: explicit override > ontocache.yaml > environment > default.
 * The registry path is returned absolute.
 */
export function getRegistryConfig(overrides: Partial<RegistryConfig> = {}): RegistryConfig {
  ensureEnvLoaded();

  const yaml = loadConfigFromYaml();
  const {
    ONTOCACHE_REGISTRY_PATH,
    BIOREGISTRY_API_URL,
    OBO_LIBRARY_URL,
    ONTOCACHE_HTTP_TIMEOUT_MS,
    ONTOCACHE_USER_AGENT,
    ONTOCACHE_LOCK_SCOPE,
  } = process.env;

  const candidate = {
    registryPath:
      overrides.registryPath ??
      yaml.registry?.path ??
      (ONTOCACHE_REGISTRY_PATH || DEFAULT_REGISTRY_CONFIG.registryPath),
    bioRegistryUrl:
      overrides.bioRegistryUrl ??
      yaml.providers?.bioregistryUrl ??
      (BIOREGISTRY_API_URL || DEFAULT_REGISTRY_CONFIG.bioRegistryUrl),
    oboLibraryUrl:
      overrides.oboLibraryUrl ??
      yaml.providers?.oboLibraryUrl ??
      (OBO_LIBRARY_URL || DEFAULT_REGISTRY_CONFIG.oboLibraryUrl),
    httpTimeoutMs:
      overrides.httpTimeoutMs ??
      yaml.http?.timeoutMs ??
      (ONTOCACHE_HTTP_TIMEOUT_MS || DEFAULT_REGISTRY_CONFIG.httpTimeoutMs),
    userAgent:
      overrides.userAgent ??
      yaml.http?.userAgent ??
      (ONTOCACHE_USER_AGENT || DEFAULT_REGISTRY_CONFIG.userAgent),
    lockScope:
      overrides.lockScope ??
      yaml.registry?.lockScope ??
      (ONTOCACHE_LOCK_SCOPE || DEFAULT_REGISTRY_CONFIG.lockScope),
  };

  const parsed = RegistryConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const configKey = issue ? String(issue.path[0]) : 'config';
    throw new ConfigurationError(
      `Invalid value for ${configKey}: ${issue ? issue.message : parsed.error.message}`,
      configKey
    );
  }

  return {
    ...parsed.data,
    registryPath: resolve(parsed.data.registryPath),
  };
}
