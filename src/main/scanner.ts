import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import mime from 'mime-types';
import { classifyFilename } from '../common/classifier';
import { errorCodeOf, toEntryScanError, toScanError } from '../common/errors';
import type { CategoryKey, DirectoryEntry, DirectoryScan } from '../common/fileTypes';
import type { PlacementPlan } from '../types/organize';
import { scopedLogger } from '../utils/logger';
import { isRunLogName } from './runLogger';

const logger = scopedLogger('scanner');

const toIsoString = (date: Date) => date.toISOString();

export const isHiddenName = (name: string) => name.startsWith('.');

const statEntry = async (entryPath: string) => {
  try {
    return await fs.stat(entryPath);
  } catch (error: unknown) {
    throw toEntryScanError(error, entryPath);
  }
};

// A link counts as a file when its target is one; dangling links do not.
const isLinkToFile = async (entryPath: string) => {
  try {
    const stats = await fs.stat(entryPath);
    return stats.isFile();
  } catch (error: unknown) {
    const code = errorCodeOf(error);
    if (code === 'ENOENT' || code === 'ELOOP') return false;
    throw toEntryScanError(error, entryPath);
  }
};

const buildEntry = async (directory: string, dirent: Dirent): Promise<DirectoryEntry> => {
  const entryPath = path.join(directory, dirent.name);
  const isHidden = isHiddenName(dirent.name);
  const isFile = !isHidden && dirent.isSymbolicLink() ? await isLinkToFile(entryPath) : dirent.isFile();

  // Hidden entries and folders are listed but never read.
  if (isHidden || !isFile) {
    return {
      name: dirent.name,
      path: entryPath,
      isFile,
      isHidden,
      size: 0,
      lastModified: null,
      mimeType: null,
    };
  }

  const stats = await statEntry(entryPath);
  return {
    name: dirent.name,
    path: entryPath,
    isFile,
    isHidden,
    size: stats.size,
    lastModified: toIsoString(stats.mtime),
    mimeType: mime.lookup(dirent.name) || null,
  };
};

/**
 * Lists the direct children of `directory` in the order the file system
 * returns them. Nothing below the first level is visited.
 */
export const scanDirectory = async (directory: string): Promise<DirectoryScan> => {
  const rootPath = path.resolve(directory);
  try {
    const dirents = await fs.readdir(rootPath, { withFileTypes: true });
    const entries: DirectoryEntry[] = [];
    for (const dirent of dirents) {
      entries.push(await buildEntry(rootPath, dirent));
    }
    logger.debug(`Scanned ${rootPath}: ${entries.length} entries`);
    return { rootPath, entries };
  } catch (error: unknown) {
    throw toScanError(error, rootPath);
  }
};

/** Visible regular files other than the run log. */
export const isEligible = (entry: DirectoryEntry) =>
  entry.isFile && !entry.isHidden && !isRunLogName(entry.name);

/** Groups eligible entries by category, keeping first-seen category order. */
export const buildPlacementPlan = (entries: readonly DirectoryEntry[]): PlacementPlan => {
  const plan = new Map<CategoryKey, DirectoryEntry[]>();
  for (const entry of entries) {
    if (!isEligible(entry)) continue;
    const category = classifyFilename(entry.name);
    const group = plan.get(category);
    if (group) {
      group.push(entry);
    } else {
      plan.set(category, [entry]);
    }
  }
  return plan;
};

export const planPlacement = async (directory: string): Promise<PlacementPlan> => {
  const scan = await scanDirectory(directory);
  return buildPlacementPlan(scan.entries);
};

export type { DirectoryEntry, DirectoryScan } from '../common/fileTypes';
