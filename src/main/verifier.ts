import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import { classifyFilename } from '../common/classifier';
import { errorCodeOf, errorMessageOf, toScanError } from '../common/errors';
import type { CategoryKey } from '../common/fileTypes';
import type { VerificationReport, VerificationViolation } from '../types/organize';
import { scopedLogger } from '../utils/logger';
import { isRunLogName } from './runLogger';

const logger = scopedLogger('verifier');

type EntryKind = 'file' | 'directory' | 'other';

const unorganized = (fileName: string, expectedFolder: CategoryKey): VerificationViolation => ({
  kind: 'unorganized',
  fileName,
  folder: '.',
  expectedFolder,
  description: `Top level: ${fileName}`,
});

const misplaced = (fileName: string, folder: string, expectedFolder: CategoryKey): VerificationViolation => ({
  kind: 'misplaced',
  fileName,
  folder,
  expectedFolder,
  description: `${fileName} in ${folder}/ (should be in ${expectedFolder}/)`,
});

const unreadable = (folder: string, error: unknown): VerificationViolation => ({
  kind: 'unreadable',
  folder,
  description: `${folder}/ could not be read (${errorCodeOf(error) ?? errorMessageOf(error)})`,
});

// Links count as files unless they point at a folder; folder links are not followed.
const entryKind = async (entryPath: string, dirent: Dirent): Promise<EntryKind> => {
  if (dirent.isDirectory()) return 'directory';
  if (dirent.isFile()) return 'file';
  if (!dirent.isSymbolicLink()) return 'other';
  try {
    const stats = await fs.stat(entryPath);
    return stats.isDirectory() ? 'other' : 'file';
  } catch (error: unknown) {
    logger.debug(`Dangling link ${entryPath}: ${errorMessageOf(error)}`);
    return 'file';
  }
};

const walk = async (
  rootPath: string,
  currentPath: string,
  violations: VerificationViolation[],
): Promise<void> => {
  const isRoot = currentPath === rootPath;
  const relativeFolder = isRoot ? '.' : path.relative(rootPath, currentPath);

  let dirents: Dirent[];
  try {
    dirents = await fs.readdir(currentPath, { withFileTypes: true });
  } catch (error: unknown) {
    if (isRoot) throw toScanError(error, rootPath);
    logger.debug(`Cannot list ${currentPath}: ${errorMessageOf(error)}`);
    violations.push(unreadable(relativeFolder, error));
    return;
  }

  const folderName = path.basename(currentPath);
  for (const dirent of dirents) {
    const entryPath = path.join(currentPath, dirent.name);
    const kind = await entryKind(entryPath, dirent);
    if (kind === 'directory') {
      await walk(rootPath, entryPath, violations);
      continue;
    }
    if (kind === 'other') continue;

    const expectedFolder = classifyFilename(dirent.name);
    if (isRoot) {
      if (!isRunLogName(dirent.name)) {
        violations.push(unorganized(dirent.name, expectedFolder));
      }
    } else if (expectedFolder !== folderName) {
      violations.push(misplaced(dirent.name, relativeFolder, expectedFolder));
    }
  }
};

/**
 * Walks `directory` and reports every file that does not sit in the folder
 * named after its category, hidden ones included. Only the run log may stay
 * at the top. Works on any tree, not only on one this package produced.
 *
 * A subfolder that cannot be listed is reported as a violation; only a root
 * that cannot be listed rejects.
 */
export const verifyOrganization = async (directory: string): Promise<VerificationReport> => {
  const rootPath = path.resolve(directory);
  const violations: VerificationViolation[] = [];
  await walk(rootPath, rootPath, violations);
  if (violations.length) {
    logger.debug(`${violations.length} violation(s) under ${rootPath}`);
  }
  return { organized: violations.length === 0, violations };
};
