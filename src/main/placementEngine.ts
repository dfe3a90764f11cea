import fs from 'fs/promises';
import path from 'path';
import { splitFilename } from '../common/classifier';
import { MoveFailureError, errorCodeOf, toFileSystemError } from '../common/errors';
import type { CategoryKey, DirectoryEntry } from '../common/fileTypes';
import type {
  DuplicateConflict,
  DuplicateDecision,
  FolderStatus,
  MoveRecord,
  PlacementOptions,
  PlacementResult,
} from '../types/organize';
import { scopedLogger } from '../utils/logger';
import { planPlacement } from './scanner';

const logger = scopedLogger('placement');

export const pathExists = async (targetPath: string) => {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
};

export const copyName = (fileName: string, copyNumber: number) => {
  const { stem, extension } = splitFilename(fileName);
  return extension ? `${stem}_copy${copyNumber}.${extension}` : `${stem}_copy${copyNumber}`;
};

/** First `stem_copyN.ext` that does not exist yet in `folderPath`. */
export const findCopyPath = async (folderPath: string, fileName: string) => {
  let copyNumber = 1;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    const candidate = path.join(folderPath, copyName(fileName, copyNumber));
    if (!(await pathExists(candidate))) {
      return candidate;
    }
    copyNumber += 1;
  }
};

const ensureCategoryFolder = async (folderPath: string): Promise<boolean> => {
  try {
    const stats = await fs.stat(folderPath);
    if (!stats.isDirectory()) {
      throw new MoveFailureError(folderPath, folderPath, 'a file already uses the folder name');
    }
    return true;
  } catch (error: unknown) {
    if (errorCodeOf(error) !== 'ENOENT') {
      throw toFileSystemError(error, folderPath, folderPath);
    }
  }
  try {
    await fs.mkdir(folderPath);
  } catch (error: unknown) {
    throw toFileSystemError(error, folderPath, folderPath);
  }
  return false;
};

const decideDuplicate = async (
  conflict: DuplicateConflict,
  options: PlacementOptions,
): Promise<DuplicateDecision> => {
  switch (options.policy) {
    case 'auto-overwrite':
      return 'overwrite';
    case 'auto-copy':
      return 'copy';
    case 'interactive': {
      if (!options.onDuplicate) return 'copy';
      const answer = await options.onDuplicate(conflict);
      return answer === 'overwrite' ? 'overwrite' : 'copy';
    }
    default: {
      const exhaustive: never = options.policy;
      throw new Error(`Unsupported duplicate policy ${String(exhaustive)}`);
    }
  }
};

const resolveDestination = async (
  category: CategoryKey,
  folderPath: string,
  entry: DirectoryEntry,
  options: PlacementOptions,
): Promise<string> => {
  const destinationPath = path.join(folderPath, entry.name);
  if (!(await pathExists(destinationPath))) {
    return destinationPath;
  }
  const decision = await decideDuplicate(
    { category, fileName: entry.name, sourcePath: entry.path, destinationPath },
    options,
  );
  if (decision === 'overwrite') {
    logger.debug(`Overwriting ${destinationPath}`);
    return destinationPath;
  }
  const copyPath = await findCopyPath(folderPath, entry.name);
  logger.debug(`Duplicate ${entry.name} placed as ${path.basename(copyPath)}`);
  return copyPath;
};

const moveFile = async (sourcePath: string, destinationPath: string) => {
  try {
    await fs.rename(sourcePath, destinationPath);
  } catch (error: unknown) {
    throw toFileSystemError(error, sourcePath, destinationPath);
  }
};

/**
 * Moves every visible top-level file of `directory` into a folder named
 * after its category. Stops at the first failed move; files already moved
 * stay where they are.
 */
export const placeFiles = async (
  directory: string,
  options: PlacementOptions,
): Promise<PlacementResult> => {
  const plan = await planPlacement(directory);
  const moveRecord: MoveRecord = new Map();
  const folderStatus: FolderStatus = new Map();

  for (const [category, entries] of plan) {
    const folderPath = path.join(directory, category);
    const existed = await ensureCategoryFolder(folderPath);
    folderStatus.set(category, existed);
    logger.debug(`${existed ? 'Using' : 'Created'} ${category}/`);

    const placed: string[] = [];
    moveRecord.set(category, placed);
    for (const entry of entries) {
      const destinationPath = await resolveDestination(category, folderPath, entry, options);
      await moveFile(entry.path, destinationPath);
      placed.push(path.basename(destinationPath));
    }
  }

  return { moveRecord, folderStatus };
};
