import log from 'electron-log/node';
import { DUPLICATE_POLICIES, type DuplicatePolicy } from '../types/organize';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface TidyConfig {
  duplicatePolicy: DuplicatePolicy;
  logLevel: LogLevel;
  /** Diagnostic log file; the file transport stays off without one */
  logFile?: string;
  quiet: boolean;
}

const logger = log.scope?.('config') ?? log;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

const DEFAULT_CONFIG: TidyConfig = {
  duplicatePolicy: 'interactive',
  logLevel: 'warn',
  quiet: false,
};

export const coerceBoolean = (value: unknown): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase();
    return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
  }
  return false;
};

export const isDuplicatePolicy = (value: string): value is DuplicatePolicy =>
  (DUPLICATE_POLICIES as readonly string[]).includes(value);

const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value);

const readPolicy = (value: string | undefined): DuplicatePolicy => {
  if (!value) return DEFAULT_CONFIG.duplicatePolicy;
  const normalised = value.trim().toLowerCase();
  if (isDuplicatePolicy(normalised)) return normalised;
  logger.warn(`Unknown FOLDER_TIDY_DUPLICATE_POLICY "${value}"; using ${DEFAULT_CONFIG.duplicatePolicy}.`);
  return DEFAULT_CONFIG.duplicatePolicy;
};

const readLogLevel = (value: string | undefined): LogLevel => {
  if (!value) return DEFAULT_CONFIG.logLevel;
  const normalised = value.trim().toLowerCase();
  if (isLogLevel(normalised)) return normalised;
  logger.warn(`Unknown FOLDER_TIDY_LOG_LEVEL "${value}"; using ${DEFAULT_CONFIG.logLevel}.`);
  return DEFAULT_CONFIG.logLevel;
};

export const resolveTidyConfig = (
  overrides?: Partial<TidyConfig>,
  env: NodeJS.ProcessEnv = process.env,
): TidyConfig => {
  const base: TidyConfig = {
    duplicatePolicy: readPolicy(env.FOLDER_TIDY_DUPLICATE_POLICY),
    logLevel: readLogLevel(env.FOLDER_TIDY_LOG_LEVEL),
    quiet: coerceBoolean(env.FOLDER_TIDY_QUIET),
  };
  const logFile = env.FOLDER_TIDY_LOG_FILE?.trim();
  if (logFile) {
    base.logFile = logFile;
  }
  return { ...base, ...overrides };
};

export const fileTransportLevel = (config: TidyConfig): LogLevel | false =>
  config.logFile ? 'info' : false;
