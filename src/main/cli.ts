import os from 'os';
import path from 'path';
import readline from 'readline/promises';
import { CancelledError, UsageError } from '../common/errors';
import type { DuplicateConflict, DuplicateDecision, DuplicatePolicy } from '../types/organize';
import { createReporter, serializeRunResult } from '../utils/consoleReporter';
import { configureLogging } from '../utils/logger';
import { resolveTidyConfig, type TidyConfig } from './config';
import { assertDirectory, organizeDirectory } from './organizer';
import { readRunLog } from './runLogger';
import { planPlacement } from './scanner';
import { verifyOrganization } from './verifier';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export type CliMode = 'organize' | 'dry-run' | 'verify-only' | 'show-log' | 'help';

export interface CliOptions {
  directory?: string;
  mode: CliMode;
  /** Set only by --yes or --overwrite */
  policy?: Exclude<DuplicatePolicy, 'interactive'>;
  quiet: boolean;
  json: boolean;
}

export interface CliPrompt {
  ask: (question: string) => Promise<string>;
  close: () => void;
}

export const USAGE = `Usage: folder-tidy [directory] [options]

Sorts the files of a directory into folders named after their extension.

Options:
  -y, --yes        Keep both files on a name clash (creates name_copyN.ext)
      --overwrite  Replace the existing file on a name clash
  -q, --quiet      Print errors only
      --dry-run    Show where files would go without moving anything
      --verify-only
                   Check an existing tree without moving anything
      --show-log   Print the directory's organization log
      --json       Print the result as JSON
  -h, --help       Show this help

Without a directory the path is asked for on the terminal.
Exit codes: 0 success, 1 error, 130 cancelled.`;

const MODE_FLAGS = new Map<string, CliMode>([
  ['--dry-run', 'dry-run'],
  ['--verify-only', 'verify-only'],
  ['--show-log', 'show-log'],
]);

export const parseCliArgs = (argv: readonly string[]): CliOptions => {
  const options: CliOptions = { mode: 'organize', quiet: false, json: false };
  let copyFlag = false;
  let overwriteFlag = false;
  let explicitMode: CliMode | undefined;

  for (const arg of argv) {
    const mode = MODE_FLAGS.get(arg);
    if (arg === '-h' || arg === '--help') {
      return { ...options, mode: 'help' };
    }
    if (arg === '-y' || arg === '--yes') {
      copyFlag = true;
    } else if (arg === '--overwrite') {
      overwriteFlag = true;
    } else if (arg === '-q' || arg === '--quiet') {
      options.quiet = true;
    } else if (arg === '--json') {
      options.json = true;
    } else if (mode) {
      if (explicitMode && explicitMode !== mode) {
        throw new UsageError(`${arg} cannot be combined with --${explicitMode}`);
      }
      explicitMode = mode;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option ${arg}`);
    } else if (options.directory === undefined) {
      options.directory = arg;
    } else {
      throw new UsageError(`Unexpected argument ${arg}`);
    }
  }

  if (copyFlag && overwriteFlag) {
    throw new UsageError('--yes and --overwrite cannot be used together');
  }
  if ((copyFlag || overwriteFlag) && options.directory === undefined) {
    throw new UsageError('--yes and --overwrite need a directory argument');
  }
  if (copyFlag) options.policy = 'auto-copy';
  if (overwriteFlag) options.policy = 'auto-overwrite';
  if (explicitMode) options.mode = explicitMode;
  return options;
};

export const expandHome = (input: string) => {
  if (input === '~') return os.homedir();
  if (input.startsWith(`~${path.sep}`) || input.startsWith('~/')) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
};

const isAbortError = (error: unknown) => error instanceof Error && error.name === 'AbortError';

/** Line prompt on stdin; Ctrl-C or a closed input rejects with `CancelledError`. */
export const createTerminalPrompt = (): CliPrompt => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const controller = new AbortController();
  rl.on('SIGINT', () => controller.abort());
  rl.on('close', () => controller.abort());
  return {
    ask: async (question) => {
      try {
        return await rl.question(question, { signal: controller.signal });
      } catch (error: unknown) {
        if (isAbortError(error)) throw new CancelledError();
        throw error;
      }
    },
    close: () => rl.close(),
  };
};

const askForDirectory = async (prompt: CliPrompt) => {
  const answer = (await prompt.ask('Enter directory path: ')).trim();
  if (!answer) {
    throw new CancelledError();
  }
  return answer;
};

const askDuplicate =
  (prompt: CliPrompt) =>
  async (conflict: DuplicateConflict): Promise<DuplicateDecision> => {
    const answer = await prompt.ask(
      `\n⚠ '${conflict.fileName}' exists in ${conflict.category}/. Overwrite? (y/n): `,
    );
    return answer.trim().toLowerCase() === 'y' ? 'overwrite' : 'copy';
  };

export interface CliDependencies {
  /** Created on first use so non-interactive runs never touch stdin */
  createPrompt?: () => CliPrompt;
  config?: TidyConfig;
}

const execute = async (
  options: CliOptions,
  config: TidyConfig,
  getPrompt: () => CliPrompt,
): Promise<number> => {
  const reporter = createReporter({ quiet: options.quiet || config.quiet || options.json });
  const rawDirectory = options.directory ?? (await askForDirectory(getPrompt()));
  const directory = await assertDirectory(expandHome(rawDirectory));

  if (options.mode === 'show-log') {
    const contents = await readRunLog(directory);
    if (options.json) reporter.reportJson(contents);
    else reporter.reportRunLog(contents);
    return contents.exists ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  if (options.mode === 'verify-only') {
    const report = await verifyOrganization(directory);
    if (options.json) reporter.reportJson(report);
    else reporter.reportVerification(directory, report);
    return report.organized ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  if (options.mode === 'dry-run') {
    const plan = await planPlacement(directory);
    if (options.json) {
      reporter.reportJson(
        Object.fromEntries([...plan].map(([category, entries]) => [category, entries.map((entry) => entry.name)])),
      );
    } else {
      reporter.reportPlan(directory, plan);
    }
    return plan.size > 0 ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  const policy = options.policy ?? config.duplicatePolicy;
  reporter.reportStart(directory);
  const result = await organizeDirectory(directory, {
    policy,
    onDuplicate: policy === 'interactive' ? askDuplicate(getPrompt()) : undefined,
  });
  if (options.json) reporter.reportJson(serializeRunResult(result));
  else reporter.reportRun(result);

  if (result.status === 'empty' || !result.verified || result.logError) {
    return EXIT_FAILURE;
  }
  return EXIT_SUCCESS;
};

/** Parses `argv`, runs the requested mode and returns the process exit code. */
export const runCli = async (
  argv: readonly string[],
  dependencies: CliDependencies = {},
): Promise<number> => {
  const config = dependencies.config ?? resolveTidyConfig();
  configureLogging(config);
  let prompt: CliPrompt | undefined;
  const getPrompt = () => {
    prompt ??= (dependencies.createPrompt ?? createTerminalPrompt)();
    return prompt;
  };

  try {
    const options = parseCliArgs(argv);
    if (options.mode === 'help') {
      console.log(USAGE);
      return EXIT_SUCCESS;
    }
    return await execute(options, config, getPrompt);
  } catch (error: unknown) {
    const reporter = createReporter();
    if (error instanceof CancelledError) {
      reporter.reportCancelled();
      return EXIT_CANCELLED;
    }
    reporter.reportError(error);
    return EXIT_FAILURE;
  } finally {
    prompt?.close();
  }
};
