import { ValidationError } from '../errors.js';

/**
 * Artifact formats the cache stores. Adding one is a code change.
 */
export enum FileType {
  Json = 'json',
  Obo = 'obo',
  Owl = 'owl',
}

const FILE_SUFFIXES: Record<FileType, string> = {
  [FileType.Json]: '.json',
  [FileType.Obo]: '.obo',
  [FileType.Owl]: '.owl',
};

export const FILE_TYPES: readonly FileType[] = [FileType.Json, FileType.Obo, FileType.Owl];

export function fileSuffix(fileType: FileType): string {
  return FILE_SUFFIXES[fileType];
}

/**
 * Accepts `json`, `.OWL`, `obo` and similar; rejects anything outside the enum.
 */
export function parseFileType(input: string): FileType {
  const normalized = input.trim().toLowerCase().replace(/^\./, '');
  const match = FILE_TYPES.find((fileType) => fileType === normalized);
  if (!match) {
    throw new ValidationError(`Unsupported file type '${input}'`, {
      input,
      supported: [...FILE_TYPES],
    });
  }
  return match;
}
