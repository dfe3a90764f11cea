import fs from 'fs/promises';
import path from 'path';
import { InvalidDirectoryError, LogWriteFailureError } from '../common/errors';
import type { MoveRecord, PlacementOptions, RunResult } from '../types/organize';
import { scopedLogger } from '../utils/logger';
import { placeFiles } from './placementEngine';
import { appendRunLog, runLogPath, type RunLogOptions } from './runLogger';
import { verifyOrganization } from './verifier';

const logger = scopedLogger('organizer');

export interface OrganizeOptions extends PlacementOptions, RunLogOptions {}

export const assertDirectory = async (directory: string): Promise<string> => {
  const resolved = path.resolve(directory);
  try {
    const stats = await fs.stat(resolved);
    if (!stats.isDirectory()) {
      throw new InvalidDirectoryError(directory);
    }
  } catch (error: unknown) {
    if (error instanceof InvalidDirectoryError) throw error;
    throw new InvalidDirectoryError(directory);
  }
  return resolved;
};

export const countPlacedFiles = (moveRecord: MoveRecord) =>
  [...moveRecord.values()].reduce((total, files) => total + files.length, 0);

/**
 * Runs placement, verification and logging for one directory. Each call is
 * independent; a second run over an organized tree reports `empty`.
 */
export const organizeDirectory = async (
  directory: string,
  options: OrganizeOptions,
): Promise<RunResult> => {
  const resolved = await assertDirectory(directory);
  const { moveRecord, folderStatus } = await placeFiles(resolved, options);
  const fileCount = countPlacedFiles(moveRecord);

  if (fileCount === 0) {
    logger.info(`Nothing to organize in ${resolved}`);
    return { status: 'empty', directory: resolved };
  }

  const { organized, violations } = await verifyOrganization(resolved);

  let logPath = runLogPath(resolved);
  let logError: string | undefined;
  try {
    logPath = await appendRunLog(resolved, moveRecord, folderStatus, { now: options.now });
  } catch (error: unknown) {
    if (!(error instanceof LogWriteFailureError)) throw error;
    logger.verbose(`Run log not written: ${error.message}`);
    logError = error.message;
  }

  logger.info(`Organized ${fileCount} file(s) into ${moveRecord.size} folder(s) in ${resolved}`);

  return {
    status: 'organized',
    directory: resolved,
    moveRecord,
    folderStatus,
    verified: organized,
    violations,
    fileCount,
    folderCount: moveRecord.size,
    logPath,
    ...(logError ? { logError } : {}),
    finishedAt: new Date().toISOString(),
  };
};

export { classifyFilename, splitFilename } from '../common/classifier';
export * from '../common/errors';
export type { CategoryKey, DirectoryEntry } from '../common/fileTypes';
export type * from '../types/organize';
export { planPlacement, scanDirectory } from './scanner';
export { placeFiles } from './placementEngine';
export { verifyOrganization } from './verifier';
export { appendRunLog, formatRunBlock, readRunLog, RUN_LOG_FILE_NAME } from './runLogger';
