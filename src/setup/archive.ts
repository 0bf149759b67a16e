import { execFile } from 'node:child_process';
import { stat } from 'node:fs/promises';
import { promisify } from 'node:util';

import { ArchiveError, isErrnoException } from '@/setup/errors';
import { ensureDirectory } from '@/setup/tree';
import type { ArchiveExpander } from '@/setup/types';

const execFileAsync = promisify(execFile);

export type ArchiveCommand = {
  command: string;
  args: string[];
};

const summarizeArchiveError = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return 'unknown archive error';
  }

  if (isErrnoException(error) && error.code === 'ENOENT') {
    return 'the extraction tool is not installed or not on PATH';
  }

  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
  if (stderr) {
    return stderr.split(/\r?\n/).slice(0, 6).join('\n');
  }

  return error.message || 'unknown archive error';
};

export const archiveCommandFor = (archivePath: string, destDir: string): ArchiveCommand => {
  const lower = archivePath.toLowerCase();
  if (lower.endsWith('.zip')) {
    return { command: 'unzip', args: ['-q', '-o', archivePath, '-d', destDir] };
  }
  return { command: 'tar', args: ['-xf', archivePath, '-C', destDir] };
};

export const expandArchive: ArchiveExpander = async (archivePath, destDir) => {
  const archiveStats = await stat(archivePath).catch(() => null);
  if (!archiveStats || !archiveStats.isFile()) {
    throw new ArchiveError(archivePath, `Archive not found: ${archivePath}`);
  }

  await ensureDirectory(destDir);
  const { command, args } = archiveCommandFor(archivePath, destDir);

  try {
    await execFileAsync(command, args, { maxBuffer: 16 * 1024 * 1024 });
  } catch (error) {
    throw new ArchiveError(
      archivePath,
      `Bad archive: ${archivePath}\n${summarizeArchiveError(error)}`,
      { cause: error },
    );
  }
};
