export type CategoryKey = string;

export const NO_EXTENSION_CATEGORY: CategoryKey = 'no_extension';

export interface DirectoryEntry {
  /** File or directory name */
  name: string;
  /** Absolute path on disk */
  path: string;
  /** True for regular files; directories, symlinks and sockets are false */
  isFile: boolean;
  /** Name starts with a dot */
  isHidden: boolean;
  /** File size in bytes */
  size: number;
  /** ISO timestamp of the last modification; null for entries that are not read */
  lastModified: string | null;
  /** MIME type inferred from the file extension (files only) */
  mimeType: string | null;
}

export interface DirectoryScan {
  /** Directory that was scanned */
  rootPath: string;
  /** Entries in the order the file system listed them */
  entries: DirectoryEntry[];
}
