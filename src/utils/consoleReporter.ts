import path from 'path';
import chalk from 'chalk';
import { bold, cyan, dim, green, red, yellow } from 'colorette';
import { errorMessageOf, TidyError } from '../common/errors';
import type { RunLogContents } from '../main/runLogger';
import type {
  OrganizedRunResult,
  PlacementPlan,
  RunResult,
  VerificationReport,
} from '../types/organize';

const numberFormatter = new Intl.NumberFormat('en-US');

const formatNumber = (value: number) => numberFormatter.format(value);

const timestamp = () => dim(new Date().toISOString());

const folderLabel = (directory: string) => `${path.basename(directory)}/`;

const emit = (header: string, details: string[] = []) => {
  console.log(`${timestamp()} ${header}`);
  details.forEach((detail) => console.log(`   ${detail}`));
};

const emitError = (header: string, details: string[] = []) => {
  console.error(`${timestamp()} ${header}`);
  details.forEach((detail) => console.error(`   ${detail}`));
};

const describePlacement = (result: OrganizedRunResult) => {
  const details: string[] = [];
  result.moveRecord.forEach((files, category) => {
    const existed = result.folderStatus.get(category) ?? false;
    details.push(`${existed ? 'Using' : 'Created'} ${cyan(`${category}/`)} • ${formatNumber(files.length)} file(s)`);
    files.forEach((file) => details.push(`  → ${file}`));
  });
  return details;
};

const describeViolations = (report: Pick<VerificationReport, 'violations'>) =>
  report.violations.map((violation) => `  • ${violation.description}`);

/** Plain-object form of a run result, with the ordered maps turned into records. */
export const serializeRunResult = (result: RunResult) => {
  if (result.status === 'empty') {
    return { status: result.status, directory: result.directory, fileCount: 0 };
  }
  return {
    ...result,
    moveRecord: Object.fromEntries(result.moveRecord),
    folderStatus: Object.fromEntries(
      [...result.folderStatus].map(([category, existed]) => [category, existed ? 'EXISTING' : 'NEW']),
    ),
  };
};

export interface ReporterOptions {
  quiet?: boolean;
}

export const createReporter = ({ quiet = false }: ReporterOptions = {}) => {
  const info = (header: string, details: string[] = []) => {
    if (!quiet) emit(header, details);
  };

  const reportStart = (directory: string) => {
    info(`${bold('Organizing')} ${folderLabel(directory)}`);
  };

  const reportPlan = (directory: string, plan: PlacementPlan) => {
    if (plan.size === 0) {
      info(yellow('→ No files to organize'), [directory]);
      return;
    }
    const details: string[] = [];
    plan.forEach((entries, category) => {
      details.push(`${cyan(`${category}/`)} • ${formatNumber(entries.length)} file(s)`);
      entries.forEach((entry) => details.push(`  → ${entry.name}${entry.mimeType ? ` ${dim(`(${entry.mimeType})`)}` : ''}`));
    });
    info(`${bold('Dry run')} ${folderLabel(directory)}`, details);
  };

  const reportVerification = (directory: string, report: VerificationReport) => {
    if (report.organized) {
      info(green('✓ All files organized correctly'), [directory]);
      return;
    }
    emitError(red('✗ Issues found'), describeViolations(report));
  };

  const reportRun = (result: RunResult) => {
    if (result.status === 'empty') {
      info(yellow('→ No files to organize'), [result.directory]);
      return;
    }
    info(`${green('✓ Organization complete')} ${folderLabel(result.directory)}`, [
      ...describePlacement(result),
      `Files organized: ${formatNumber(result.fileCount)} in ${formatNumber(result.folderCount)} folder(s)`,
    ]);
    if (result.verified) {
      info(green('✓ All files organized correctly'));
    } else {
      emitError(red('✗ Issues found'), describeViolations(result));
    }
    if (result.logError) {
      emitError(red('✗ Log not written'), [result.logError]);
    } else {
      info(`${green('✓ Log updated:')} ${path.basename(result.logPath)}`);
    }
  };

  const reportRunLog = (contents: RunLogContents) => {
    if (!contents.exists) {
      info(yellow('No log file found for this directory.'), [contents.path]);
      return;
    }
    console.log(contents.content);
  };

  const reportJson = (value: unknown) => {
    console.log(JSON.stringify(value, null, 2));
  };

  const reportCancelled = () => {
    emitError(yellow('⚠ Cancelled by user'));
  };

  const reportError = (error: unknown) => {
    const label = error instanceof TidyError ? error.code : 'ERROR';
    emitError(`${chalk.whiteBright.bgRed.bold(` ${label} `)} ${red(`✗ ${errorMessageOf(error)}`)}`);
  };

  return {
    reportStart,
    reportPlan,
    reportVerification,
    reportRun,
    reportRunLog,
    reportJson,
    reportCancelled,
    reportError,
  };
};

export type ConsoleReporter = ReturnType<typeof createReporter>;
