import { NO_EXTENSION_CATEGORY, type CategoryKey } from './fileTypes';

export interface FilenameParts {
  stem: string;
  /** Extension without the dot, original case; empty when there is none */
  extension: string;
}

export const splitFilename = (name: string): FilenameParts => {
  const dotIndex = name.lastIndexOf('.');
  if (dotIndex <= 0 || dotIndex === name.length - 1) {
    return { stem: name, extension: '' };
  }
  return {
    stem: name.slice(0, dotIndex),
    extension: name.slice(dotIndex + 1),
  };
};

/**
 * Maps a filename to the folder it belongs in. Only the segment after the
 * last dot counts, so `archive.backup.tar` is a `tar`.
 */
export const classifyFilename = (name: string): CategoryKey => {
  const { extension } = splitFilename(name);
  return extension ? extension.toLowerCase() : NO_EXTENSION_CATEGORY;
};
