import log from 'electron-log/node';
import { fileTransportLevel, resolveTidyConfig, type TidyConfig } from '../main/config';

/** Applies console and file levels to electron-log. Left to the entry point. */
export const configureLogging = (config: TidyConfig = resolveTidyConfig()) => {
  log.transports.console.level = config.logLevel;
  log.transports.file.level = fileTransportLevel(config);
  const { logFile } = config;
  if (logFile) {
    log.transports.file.resolvePathFn = () => logFile;
  }
  return log;
};

export const scopedLogger = (scope: string) => log.scope?.(scope) ?? log;
