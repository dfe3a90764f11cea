import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { organizeDirectory } from '../src/main/organizer';
import { formatRunBlock, RUN_LOG_FILE_NAME } from '../src/main/runLogger';
import { verifyOrganization } from '../src/main/verifier';

describe('organize workflow', () => {
  const makeTempDir = async () => fs.mkdtemp(path.join(os.tmpdir(), 'organize-workflow-'));

  const cleanupTempDir = async (dirPath: string | null) => {
    if (dirPath) {
      await fs.rm(dirPath, { recursive: true, force: true });
    }
  };

  it('sorts a download folder, resolves a duplicate and logs both runs', async () => {
    let workspace: string | null = null;
    try {
      workspace = await makeTempDir();
      await fs.writeFile(path.join(workspace, 'doc1.pdf'), 'first doc');
      await fs.writeFile(path.join(workspace, 'doc2.pdf'), 'second doc');
      await fs.writeFile(path.join(workspace, 'image1.jpg'), 'jpeg bytes');
      await fs.writeFile(path.join(workspace, '.env'), 'TOKEN=test-secret');

      const firstRun = new Date(2025, 10, 14, 9, 5, 3);
      const first = await organizeDirectory(workspace, { policy: 'auto-copy', now: firstRun });
      if (first.status !== 'organized') {
        throw new Error('first run should organize files');
      }
      expect(first.verified).toBe(false);
      expect(first.violations.map((violation) => violation.description)).toEqual(['Top level: .env']);
      expect(first.fileCount).toBe(3);
      expect(await fs.readdir(path.join(workspace, 'pdf'))).toEqual(
        expect.arrayContaining(['doc1.pdf', 'doc2.pdf']),
      );
      expect(await fs.readFile(path.join(workspace, '.env'), 'utf8')).toBe('TOKEN=test-secret');

      const logPath = path.join(workspace, RUN_LOG_FILE_NAME);
      const afterFirst = await fs.readFile(logPath, 'utf8');

      await fs.writeFile(path.join(workspace, 'doc1.pdf'), 'a newer doc');
      const secondRun = new Date(2025, 10, 15, 10, 0, 0);
      const second = await organizeDirectory(workspace, { policy: 'auto-copy', now: secondRun });
      if (second.status !== 'organized') {
        throw new Error('second run should organize the new file');
      }
      expect([...second.moveRecord.entries()]).toEqual([['pdf', ['doc1_copy1.pdf']]]);
      expect(second.folderStatus.get('pdf')).toBe(true);
      expect(await fs.readFile(path.join(workspace, 'pdf', 'doc1.pdf'), 'utf8')).toBe('first doc');
      expect(await fs.readFile(path.join(workspace, 'pdf', 'doc1_copy1.pdf'), 'utf8')).toBe('a newer doc');

      const afterSecond = await fs.readFile(logPath, 'utf8');
      expect(afterSecond.startsWith(afterFirst)).toBe(true);
      expect(afterSecond.slice(afterFirst.length)).toBe(
        formatRunBlock(workspace, second.moveRecord, second.folderStatus, { now: secondRun }),
      );
      expect(afterSecond).toContain('[14 Nov 2025 @ 09:05:03]');
      expect(afterSecond).toContain('[pdf/] EXISTING • 1 file(s)');

      const third = await organizeDirectory(workspace, { policy: 'auto-copy' });
      expect(third.status).toBe('empty');
    } finally {
      await cleanupTempDir(workspace);
    }
  });

  it('notices a hand-edited tree afterwards', async () => {
    let workspace: string | null = null;
    try {
      workspace = await makeTempDir();
      await fs.writeFile(path.join(workspace, 'report.pdf'), 'r');
      await fs.writeFile(path.join(workspace, 'photo.jpg'), 'p');
      await organizeDirectory(workspace, { policy: 'auto-copy' });

      await expect(verifyOrganization(workspace)).resolves.toEqual({ organized: true, violations: [] });

      await fs.rename(path.join(workspace, 'jpg', 'photo.jpg'), path.join(workspace, 'pdf', 'photo.jpg'));
      const report = await verifyOrganization(workspace);

      expect(report.organized).toBe(false);
      expect(report.violations.map((violation) => violation.description)).toEqual([
        'photo.jpg in pdf/ (should be in jpg/)',
      ]);
    } finally {
      await cleanupTempDir(workspace);
    }
  });
});
