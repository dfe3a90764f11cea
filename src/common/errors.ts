export type TidyErrorCode =
  | 'INVALID_DIRECTORY'
  | 'PERMISSION_DENIED'
  | 'SCAN_FAILURE'
  | 'MOVE_FAILURE'
  | 'LOG_WRITE_FAILURE'
  | 'USAGE'
  | 'CANCELLED';

export class TidyError extends Error {
  readonly code: TidyErrorCode;

  constructor(code: TidyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidDirectoryError extends TidyError {
  readonly directory: string;

  constructor(directory: string, reason = 'is not a valid directory') {
    super('INVALID_DIRECTORY', `'${directory}' ${reason}`);
    this.directory = directory;
  }
}

export class PermissionDeniedError extends TidyError {
  readonly targetPath: string;

  constructor(targetPath: string, cause?: unknown) {
    super('PERMISSION_DENIED', `Permission denied: ${targetPath}`, { cause });
    this.targetPath = targetPath;
  }
}

export class MoveFailureError extends TidyError {
  readonly sourcePath: string;

  readonly destinationPath: string;

  constructor(sourcePath: string, destinationPath: string, detail: string, cause?: unknown) {
    super('MOVE_FAILURE', `Failed to move ${sourcePath} to ${destinationPath}: ${detail}`, { cause });
    this.sourcePath = sourcePath;
    this.destinationPath = destinationPath;
  }
}

export class LogWriteFailureError extends TidyError {
  readonly logPath: string;

  constructor(logPath: string, detail: string, cause?: unknown) {
    super('LOG_WRITE_FAILURE', `Failed to write log ${logPath}: ${detail}`, { cause });
    this.logPath = logPath;
  }
}

export class UsageError extends TidyError {
  constructor(message: string) {
    super('USAGE', message);
  }
}

export class CancelledError extends TidyError {
  constructor() {
    super('CANCELLED', 'Cancelled by user');
  }
}

export const errorCodeOf = (error: unknown): string | undefined => {
  if (error && typeof error === 'object' && 'code' in error) {
    const { code } = error as { code?: unknown };
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

export const errorMessageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const isPermissionCode = (code: string | undefined) => code === 'EACCES' || code === 'EPERM';

/**
 * Wraps a low-level fs error raised while moving `sourcePath`. Permission
 * codes become `PermissionDeniedError`, everything else `MoveFailureError`.
 */
export const toFileSystemError = (
  error: unknown,
  sourcePath: string,
  destinationPath: string,
): TidyError => {
  if (error instanceof TidyError) {
    return error;
  }
  if (isPermissionCode(errorCodeOf(error))) {
    return new PermissionDeniedError(sourcePath, error);
  }
  return new MoveFailureError(sourcePath, destinationPath, errorMessageOf(error), error);
};

export const toScanError = (error: unknown, directory: string): TidyError => {
  if (error instanceof TidyError) {
    return error;
  }
  const code = errorCodeOf(error);
  if (isPermissionCode(code)) {
    return new PermissionDeniedError(directory, error);
  }
  if (code === 'ENOENT' || code === 'ENOTDIR') {
    return new InvalidDirectoryError(directory);
  }
  return new TidyError('SCAN_FAILURE', `Failed to scan ${directory}: ${errorMessageOf(error)}`, {
    cause: error,
  });
};

/** Wraps an error raised while reading one entry of a scanned directory. */
export const toEntryScanError = (error: unknown, entryPath: string): TidyError => {
  if (error instanceof TidyError) {
    return error;
  }
  if (isPermissionCode(errorCodeOf(error))) {
    return new PermissionDeniedError(entryPath, error);
  }
  return new TidyError('SCAN_FAILURE', `Failed to read ${entryPath}: ${errorMessageOf(error)}`, {
    cause: error,
  });
};
