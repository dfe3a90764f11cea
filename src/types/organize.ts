import type { CategoryKey, DirectoryEntry } from '../common/fileTypes';

export type DuplicatePolicy = 'interactive' | 'auto-copy' | 'auto-overwrite';

export const DUPLICATE_POLICIES: readonly DuplicatePolicy[] = [
  'interactive',
  'auto-copy',
  'auto-overwrite',
];

export type DuplicateDecision = 'overwrite' | 'copy';

export interface DuplicateConflict {
  category: CategoryKey;
  fileName: string;
  sourcePath: string;
  destinationPath: string;
}

export type PlacementPlan = ReadonlyMap<CategoryKey, readonly DirectoryEntry[]>;

/** true when the category folder existed before the run */
export type FolderStatus = Map<CategoryKey, boolean>;

export type MoveRecord = Map<CategoryKey, string[]>;

export interface PlacementOptions {
  policy: DuplicatePolicy;
  /**
   * Asked for every collision under the `interactive` policy. Any answer
   * other than `overwrite`, or a missing callback, creates a copy.
   */
  onDuplicate?: (conflict: DuplicateConflict) => Promise<DuplicateDecision>;
}

export interface PlacementResult {
  moveRecord: MoveRecord;
  folderStatus: FolderStatus;
}

export type VerificationViolationKind = 'unorganized' | 'misplaced' | 'unreadable';

export interface FileViolation {
  kind: 'unorganized' | 'misplaced';
  fileName: string;
  /** Folder holding the file, relative to the verified root ('.' for the root) */
  folder: string;
  expectedFolder: CategoryKey;
  description: string;
}

/** A folder below the root that could not be listed. */
export interface UnreadableFolderViolation {
  kind: 'unreadable';
  folder: string;
  description: string;
}

export type VerificationViolation = FileViolation | UnreadableFolderViolation;

export interface VerificationReport {
  organized: boolean;
  violations: VerificationViolation[];
}

export interface EmptyRunResult {
  status: 'empty';
  directory: string;
}

export interface OrganizedRunResult {
  status: 'organized';
  directory: string;
  moveRecord: MoveRecord;
  folderStatus: FolderStatus;
  verified: boolean;
  violations: VerificationViolation[];
  fileCount: number;
  folderCount: number;
  logPath: string;
  /** Set when the run log could not be written; the placement still stands */
  logError?: string;
  finishedAt: string;
}

export type RunResult = EmptyRunResult | OrganizedRunResult;
