import { coerceBoolean, fileTransportLevel, isDuplicatePolicy, resolveTidyConfig } from '../main/config';

describe('resolveTidyConfig', () => {
  it('uses defaults without environment', () => {
    expect(resolveTidyConfig(undefined, {})).toEqual({
      duplicatePolicy: 'interactive',
      logLevel: 'warn',
      quiet: false,
    });
  });

  it('reads and normalises environment values', () => {
    const config = resolveTidyConfig(undefined, {
      FOLDER_TIDY_DUPLICATE_POLICY: ' AUTO-COPY ',
      FOLDER_TIDY_LOG_LEVEL: 'Debug',
      FOLDER_TIDY_LOG_FILE: '/var/log/folder-tidy.log',
      FOLDER_TIDY_QUIET: 'yes',
    });

    expect(config).toEqual({
      duplicatePolicy: 'auto-copy',
      logLevel: 'debug',
      logFile: '/var/log/folder-tidy.log',
      quiet: true,
    });
  });

  it('falls back on unknown values', () => {
    const config = resolveTidyConfig(undefined, {
      FOLDER_TIDY_DUPLICATE_POLICY: 'shred',
      FOLDER_TIDY_LOG_LEVEL: 'loud',
    });

    expect(config.duplicatePolicy).toBe('interactive');
    expect(config.logLevel).toBe('warn');
  });

  it('lets overrides win over the environment', () => {
    const config = resolveTidyConfig(
      { duplicatePolicy: 'auto-overwrite', quiet: false },
      { FOLDER_TIDY_DUPLICATE_POLICY: 'auto-copy', FOLDER_TIDY_QUIET: '1' },
    );

    expect(config.duplicatePolicy).toBe('auto-overwrite');
    expect(config.quiet).toBe(false);
  });

  it('enables the file transport only with a log file', () => {
    expect(fileTransportLevel({ duplicatePolicy: 'interactive', logLevel: 'warn', quiet: false })).toBe(false);
    expect(
      fileTransportLevel({ duplicatePolicy: 'interactive', logLevel: 'warn', quiet: false, logFile: '/tmp/x.log' }),
    ).toBe('info');
  });
});

describe('config helpers', () => {
  it('coerces boolean-ish values', () => {
    expect(['1', 'true', 'ON', 'y'].map(coerceBoolean)).toEqual([true, true, true, true]);
    expect(['0', 'off', '', 'nope'].map(coerceBoolean)).toEqual([false, false, false, false]);
    expect(coerceBoolean(undefined)).toBe(false);
  });

  it('recognises duplicate policies', () => {
    expect(isDuplicatePolicy('auto-overwrite')).toBe(true);
    expect(isDuplicatePolicy('overwrite')).toBe(false);
  });
});
