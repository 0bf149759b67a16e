import { chmod, cp, lstat, mkdir, readdir, rename, rm, rmdir, stat, unlink } from 'node:fs/promises';
import path from 'node:path';

import { errorMessage, TreeOperationError } from '@/setup/errors';
import type { Reporter } from '@/setup/reporter';
import type { EntryKind } from '@/setup/types';

export const entryKind = async (target: string): Promise<EntryKind> => {
  const stats = await lstat(target).catch(() => null);
  if (!stats) {
    return 'missing';
  }
  if (stats.isSymbolicLink()) {
    return 'symlink';
  }
  return stats.isDirectory() ? 'directory' : 'file';
};

export const isDirectory = async (target: string): Promise<boolean> => {
  const stats = await stat(target).catch(() => null);
  return Boolean(stats?.isDirectory());
};

export const isFile = async (target: string): Promise<boolean> => {
  const stats = await stat(target).catch(() => null);
  return Boolean(stats?.isFile());
};

export const ensureDirectory = async (target: string): Promise<void> => {
  await mkdir(target, { recursive: true });
};

export const childNames = async (dir: string): Promise<string[]> => {
  const names = await readdir(dir);
  return names.sort((left, right) => left.localeCompare(right));
};

export const isSameOrInside = (parent: string, candidate: string): boolean => {
  const relative = path.relative(path.resolve(parent), path.resolve(candidate));
  if (relative === '') {
    return true;
  }
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
};

const assertDistinctTarget = (src: string, dst: string, operation: 'move' | 'copy') => {
  if (isSameOrInside(src, dst)) {
    throw new TreeOperationError(`Cannot ${operation} ${src} into itself or its own descendant: ${dst}`);
  }
};

const warnCleanup = (reporter: Reporter | undefined, message: string, target: string, error: unknown) => {
  reporter?.warn({ kind: 'cleanup', message: `${message}: ${errorMessage(error)}`, path: target });
};

const removeDirectory = async (dir: string, reporter?: Reporter): Promise<void> => {
  await chmod(dir, 0o755).catch(() => undefined);

  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    warnCleanup(reporter, 'Could not list directory for removal', dir, error);
    return;
  }

  for (const name of names) {
    await removePath(path.join(dir, name), reporter);
  }

  try {
    await rmdir(dir);
  } catch (error) {
    warnCleanup(reporter, 'Could not remove directory', dir, error);
  }
};

/**
 * Best-effort removal of a file, symlink or directory tree. A missing path is a no-op and
 * removal failures are reported as cleanup warnings instead of being thrown.
 */
export const removePath = async (target: string, reporter?: Reporter): Promise<void> => {
  const kind = await entryKind(target);
  if (kind === 'missing') {
    return;
  }

  if (kind === 'directory') {
    await removeDirectory(target, reporter);
    return;
  }

  // chmod follows links, so only regular files get their read-only bits cleared.
  if (kind === 'file') {
    await chmod(target, 0o666).catch(() => undefined);
  }

  const unlinked = await unlink(target).then(
    () => true,
    () => false,
  );
  if (unlinked) {
    return;
  }

  try {
    await rm(target, { force: true });
  } catch (error) {
    warnCleanup(reporter, 'Could not remove file', target, error);
  }
};

const copyEntry = async (src: string, dst: string): Promise<void> => {
  await cp(src, dst, {
    force: true,
    errorOnExist: false,
    preserveTimestamps: true,
    verbatimSymlinks: true,
  });
};

const prepareDirectoryTarget = async (dst: string, reporter?: Reporter): Promise<void> => {
  const kind = await entryKind(dst);
  if (kind === 'file' || kind === 'symlink') {
    await removePath(dst, reporter);
  }
  await ensureDirectory(dst);
};

/**
 * Moves `src` onto `dst`. Directories merge child by child into an existing destination;
 * files replace whatever sits at `dst`.
 */
export const movePath = async (src: string, dst: string, reporter?: Reporter): Promise<void> => {
  const kind = await entryKind(src);
  if (kind === 'missing') {
    return;
  }
  assertDistinctTarget(src, dst, 'move');

  if (kind !== 'directory') {
    await ensureDirectory(path.dirname(dst));
    await removePath(dst, reporter);
    try {
      await rename(src, dst);
    } catch {
      // cross-device or locked: copy then drop the source
      await copyEntry(src, dst);
      await removePath(src, reporter);
    }
    return;
  }

  await prepareDirectoryTarget(dst, reporter);
  for (const name of await childNames(src)) {
    await movePath(path.join(src, name), path.join(dst, name), reporter);
  }

  try {
    await rmdir(src);
  } catch (error) {
    warnCleanup(reporter, 'Could not remove emptied source directory', src, error);
  }
};

export const copyPath = async (src: string, dst: string, reporter?: Reporter): Promise<void> => {
  const kind = await entryKind(src);
  if (kind === 'missing') {
    return;
  }
  assertDistinctTarget(src, dst, 'copy');

  if (kind !== 'directory') {
    await ensureDirectory(path.dirname(dst));
    await removePath(dst, reporter);
    await copyEntry(src, dst);
    return;
  }

  await prepareDirectoryTarget(dst, reporter);
  for (const name of await childNames(src)) {
    await copyPath(path.join(src, name), path.join(dst, name), reporter);
  }
};
