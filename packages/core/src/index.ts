/**
 * @ontocache/core - Domain types and ports
 *
 * No dependencies on other @ontocache packages.
 */

export { ValidationError } from './errors.js';

export {
  LATEST,
  LATEST_VERSION_LABEL,
  declaredVersion,
  isLatest,
  formatVersion,
  parseVersion,
} from './ontology/version.js';
export type { Version, LatestVersion, DeclaredVersion } from './ontology/version.js';

export { FileType, FILE_TYPES, fileSuffix, parseFileType } from './ontology/file-type.js';

export { TEMP_FILE_SUFFIX, registryFileName, providerFileName, tempFileName } from './ontology/naming.js';

export { OntologyMetadataSchema } from './schemas/ontology-metadata.js';
export type { OntologyMetadata } from './schemas/ontology-metadata.js';

export type {
  OntologyMetadataProvider,
  OntologyContentProvider,
  OntologyContent,
  OntologyRegistry,
} from './ports/index.js';
