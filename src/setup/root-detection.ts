import { readdir, rename } from 'node:fs/promises';
import path from 'node:path';

import type { Reporter } from '@/setup/reporter';
import { childNames, isDirectory, movePath, removePath } from '@/setup/tree';
import type { RootDetectionResult } from '@/setup/types';

export const DEFAULT_ROOT_MARKERS = ['include', 'src', 'res'] as const;

const UNWRAP_LIMIT = 10;
const FIRST_LEVEL_LIMIT = 32;
const FALLBACK_FLATTEN_LIMIT = 6;
const MARKER_THRESHOLD = 2;

const WRAPPER_SUFFIX = '.__unwrap__';

export type ChildSummary = {
  directories: number;
  files: number;
  onlyDirectory?: string;
};

export const summarizeChildren = async (dir: string): Promise<ChildSummary> => {
  const entries = await readdir(dir, { withFileTypes: true }).catch(() => null);
  if (!entries) {
    return { directories: 0, files: 0 };
  }

  const directories = entries.filter((entry) => entry.isDirectory());
  const files = entries.length - directories.length;
  const onlyDirectory = directories.length === 1 && files === 0 ? directories[0]?.name : undefined;

  return { directories: directories.length, files, onlyDirectory };
};

export const childDirectories = async (dir: string): Promise<string[]> => {
  const entries = await readdir(dir, { withFileTypes: true }).catch(() => null);
  if (!entries) {
    return [];
  }

  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort((left, right) => left.localeCompare(right))
    .map((name) => path.join(dir, name));
};

export const looksLikeProjectRoot = async (
  dir: string,
  markers: readonly string[],
): Promise<boolean> => {
  let hits = 0;
  for (const marker of new Set(markers)) {
    if (await isDirectory(path.join(dir, marker))) {
      hits += 1;
      if (hits >= MARKER_THRESHOLD) {
        return true;
      }
    }
  }

  return false;
};

/**
 * Pulls the children of a lone wrapper directory up into `dir` and drops the wrapper.
 * The wrapper is renamed aside first so a child sharing its name can land in place.
 */
export const flattenSingleDirectoryWrapper = async (
  dir: string,
  reporter?: Reporter,
): Promise<boolean> => {
  const { onlyDirectory } = await summarizeChildren(dir);
  if (!onlyDirectory) {
    return false;
  }

  const wrapper = path.join(dir, onlyDirectory);
  const aside = path.join(dir, `${onlyDirectory}${WRAPPER_SUFFIX}`);
  await rename(wrapper, aside);

  for (const child of await childNames(aside)) {
    await movePath(path.join(aside, child), path.join(dir, child), reporter);
  }
  await removePath(aside, reporter);

  return true;
};

export const findProjectRoot = async (
  startDir: string,
  markers: readonly string[],
  reporter?: Reporter,
): Promise<RootDetectionResult> => {
  let current = startDir;

  for (let iteration = 0; iteration < UNWRAP_LIMIT; iteration += 1) {
    if (await looksLikeProjectRoot(current, markers)) {
      return { root: current, strategy: current === startDir ? 'direct' : 'unwrapped' };
    }

    const { onlyDirectory } = await summarizeChildren(current);
    if (!onlyDirectory) {
      break;
    }
    current = path.join(current, onlyDirectory);
  }

  if (await looksLikeProjectRoot(current, markers)) {
    return { root: current, strategy: current === startDir ? 'direct' : 'unwrapped' };
  }

  const firstLevel = await childDirectories(current);
  for (const candidate of firstLevel) {
    if (await looksLikeProjectRoot(candidate, markers)) {
      return { root: candidate, strategy: 'child' };
    }
  }

  for (const candidate of firstLevel.slice(0, FIRST_LEVEL_LIMIT)) {
    for (const nested of await childDirectories(candidate)) {
      if (await looksLikeProjectRoot(nested, markers)) {
        return { root: nested, strategy: 'grandchild' };
      }
    }
  }

  for (let iteration = 0; iteration < FALLBACK_FLATTEN_LIMIT; iteration += 1) {
    if (!(await flattenSingleDirectoryWrapper(current, reporter))) {
      break;
    }
  }

  reporter?.warn({
    kind: 'advisory',
    message: `No directory matched root markers [${markers.join(', ')}]; using fallback root`,
    path: current,
  });

  return { root: current, strategy: 'fallback' };
};
