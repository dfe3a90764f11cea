import { InvalidDirectoryError } from '../common/errors';
import type { OrganizedRunResult } from '../types/organize';
import { createReporter, serializeRunResult } from '../utils/consoleReporter';

// eslint-disable-next-line no-control-regex
const stripAnsi = (value: string) => value.replace(/\u001b\[[0-9;]*m/g, '');

const collect = (spy: jest.SpyInstance) =>
  stripAnsi(spy.mock.calls.map((call: unknown[]) => call.join(' ')).join('\n'));

const organizedResult = (overrides: Partial<OrganizedRunResult> = {}): OrganizedRunResult => ({
  status: 'organized',
  directory: '/data/Downloads',
  moveRecord: new Map([
    ['pdf', ['doc1.pdf', 'doc1_copy1.pdf']],
    ['jpg', ['image1.jpg']],
  ]),
  folderStatus: new Map([
    ['pdf', true],
    ['jpg', false],
  ]),
  verified: true,
  violations: [],
  fileCount: 3,
  folderCount: 2,
  logPath: '/data/Downloads/organization_log.txt',
  finishedAt: '2025-11-14T09:05:03.000Z',
  ...overrides,
});

describe('consoleReporter', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('prints folders, files and the log file for a completed run', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});

    createReporter().reportRun(organizedResult());

    const output = collect(logSpy);
    expect(output).toContain('✓ Organization complete Downloads/');
    expect(output).toContain('   Using pdf/ • 2 file(s)');
    expect(output).toContain('   Created jpg/ • 1 file(s)');
    expect(output).toContain('     → doc1_copy1.pdf');
    expect(output).toContain('Files organized: 3 in 2 folder(s)');
    expect(output).toContain('✓ All files organized correctly');
    expect(output).toContain('✓ Log updated: organization_log.txt');
  });

  it('sends verification issues and log failures to stderr even when quiet', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});

    createReporter({ quiet: true }).reportRun(
      organizedResult({
        verified: false,
        violations: [
          {
            kind: 'misplaced',
            fileName: 'photo.jpg',
            folder: 'pdf',
            expectedFolder: 'jpg',
            description: 'photo.jpg in pdf/ (should be in jpg/)',
          },
        ],
        logError: 'Failed to write log /data/Downloads/organization_log.txt: disk full',
      }),
    );

    expect(logSpy).not.toHaveBeenCalled();
    const output = collect(errorSpy);
    expect(output).toContain('✗ Issues found');
    expect(output).toContain('     • photo.jpg in pdf/ (should be in jpg/)');
    expect(output).toContain('✗ Log not written');
  });

  it('reports an empty run', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});

    createReporter().reportRun({ status: 'empty', directory: '/data/Empty' });

    expect(collect(logSpy)).toContain('→ No files to organize');
  });

  it('labels errors with their code', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});

    createReporter({ quiet: true }).reportError(new InvalidDirectoryError('/nowhere'));

    expect(collect(errorSpy)).toContain(" INVALID_DIRECTORY  ✗ '/nowhere' is not a valid directory");
  });

  it('serializes the ordered maps as plain records', () => {
    const serialized = serializeRunResult(organizedResult());

    expect(serialized).toMatchObject({
      status: 'organized',
      fileCount: 3,
      moveRecord: { pdf: ['doc1.pdf', 'doc1_copy1.pdf'], jpg: ['image1.jpg'] },
      folderStatus: { pdf: 'EXISTING', jpg: 'NEW' },
    });
    expect(JSON.parse(JSON.stringify(serialized)).moveRecord.jpg).toEqual(['image1.jpg']);
    expect(serializeRunResult({ status: 'empty', directory: '/data/Empty' })).toEqual({
      status: 'empty',
      directory: '/data/Empty',
      fileCount: 0,
    });
  });
});
