import fs from 'fs/promises';
import path from 'path';
import { LogWriteFailureError, errorCodeOf, errorMessageOf } from '../common/errors';
import type { FolderStatus, MoveRecord } from '../types/organize';

export const RUN_LOG_FILE_NAME = 'organization_log.txt';

/** Top-level files starting with this are never treated as unorganized. */
export const RUN_LOG_PREFIX = 'organization_log';

export const isRunLogName = (name: string) => name.startsWith(RUN_LOG_PREFIX);

const SEPARATOR = '='.repeat(60);

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const pad = (value: number) => value.toString().padStart(2, '0');

/** `14 Nov 2025` */
export const formatLogDate = (date: Date) =>
  `${pad(date.getDate())} ${MONTHS[date.getMonth()]} ${date.getFullYear()}`;

/** `09:05:03` */
export const formatLogTime = (date: Date) =>
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

const byCodeUnit = (a: string, b: string) => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

export const runLogPath = (directory: string) => path.join(directory, RUN_LOG_FILE_NAME);

export interface RunLogOptions {
  now?: Date;
}

/**
 * Renders one run block. Categories and file names are sorted so that two
 * runs over the same input produce the same text apart from the header.
 */
export const formatRunBlock = (
  directory: string,
  moveRecord: MoveRecord,
  folderStatus: FolderStatus,
  options: RunLogOptions = {},
) => {
  const now = options.now ?? new Date();
  const lines = [
    '',
    SEPARATOR,
    `[${formatLogDate(now)} @ ${formatLogTime(now)}] ${path.basename(path.resolve(directory))}/`,
    SEPARATOR,
  ];

  const categories = [...moveRecord.keys()].sort(byCodeUnit);
  for (const category of categories) {
    const files = [...(moveRecord.get(category) ?? [])].sort(byCodeUnit);
    const status = folderStatus.get(category) ? 'EXISTING' : 'NEW';
    lines.push('', `[${category}/] ${status} • ${files.length} file(s)`);
    files.forEach((file) => lines.push(`  → ${file}`));
  }

  return `${lines.join('\n')}\n`;
};

export const appendRunLog = async (
  directory: string,
  moveRecord: MoveRecord,
  folderStatus: FolderStatus,
  options: RunLogOptions = {},
): Promise<string> => {
  const logPath = runLogPath(directory);
  const block = formatRunBlock(directory, moveRecord, folderStatus, options);
  try {
    await fs.appendFile(logPath, block, { encoding: 'utf8' });
  } catch (error: unknown) {
    throw new LogWriteFailureError(logPath, errorMessageOf(error), error);
  }
  return logPath;
};

export interface RunLogContents {
  exists: boolean;
  path: string;
  content: string;
}

export const readRunLog = async (directory: string): Promise<RunLogContents> => {
  const logPath = runLogPath(directory);
  try {
    const content = await fs.readFile(logPath, 'utf8');
    return { exists: true, path: logPath, content };
  } catch (error: unknown) {
    if (errorCodeOf(error) === 'ENOENT') {
      return { exists: false, path: logPath, content: '' };
    }
    throw error;
  }
};
