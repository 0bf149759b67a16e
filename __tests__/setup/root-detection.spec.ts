import { mkdtemp, mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, expect, it } from 'vitest';

import { createReporter } from '@/setup/reporter';
import {
  DEFAULT_ROOT_MARKERS,
  findProjectRoot,
  flattenSingleDirectoryWrapper,
  looksLikeProjectRoot,
} from '@/setup/root-detection';

const tempRoots: string[] = [];

afterEach(async () => {
  while (tempRoots.length > 0) {
    const root = tempRoots.pop();
    if (root) {
      await rm(root, { recursive: true, force: true });
    }
  }
});

const createRoot = async (prefix: string): Promise<string> => {
  const root = await mkdtemp(path.join(os.tmpdir(), prefix));
  tempRoots.push(root);
  return root;
};

const makeDirs = async (root: string, relativePaths: string[]) => {
  for (const relativePath of relativePaths) {
    await mkdir(path.join(root, relativePath), { recursive: true });
  }
};

it('needs two marker directories, not files', async () => {
  const root = await createRoot('root-markers-');
  await makeDirs(root, ['include']);
  await writeFile(path.join(root, 'src'), 'not a directory', 'utf8');

  expect(await looksLikeProjectRoot(root, DEFAULT_ROOT_MARKERS)).toBe(false);

  await makeDirs(root, ['res']);
  expect(await looksLikeProjectRoot(root, DEFAULT_ROOT_MARKERS)).toBe(true);
});

it('never matches on a single configured or repeated marker', async () => {
  const root = await createRoot('root-single-');
  await makeDirs(root, ['pkg/src', 'pkg/docs/a']);
  await writeFile(path.join(root, 'README'), 'readme', 'utf8');

  expect(await looksLikeProjectRoot(path.join(root, 'pkg'), ['src'])).toBe(false);
  expect(await looksLikeProjectRoot(path.join(root, 'pkg'), ['src', 'src'])).toBe(false);
  expect(await looksLikeProjectRoot(path.join(root, 'pkg'), [])).toBe(false);
  expect(await findProjectRoot(root, ['src'])).toEqual({ root, strategy: 'fallback' });
});

it('returns the start directory when it already looks like a project root', async () => {
  const root = await createRoot('root-direct-');
  await makeDirs(root, ['src', 'res', 'wrapper/include']);

  const result = await findProjectRoot(root, DEFAULT_ROOT_MARKERS);

  expect(result).toEqual({ root, strategy: 'direct' });
});

it('unwraps a single wrapper directory', async () => {
  const root = await createRoot('root-unwrap-');
  await makeDirs(root, ['wrapper/innerProject/include', 'wrapper/innerProject/src', 'wrapper/innerProject/res']);

  const result = await findProjectRoot(root, DEFAULT_ROOT_MARKERS);

  expect(result).toEqual({ root: path.join(root, 'wrapper', 'innerProject'), strategy: 'unwrapped' });
});

it('finds a project root among several children', async () => {
  const root = await createRoot('root-child-');
  await makeDirs(root, ['docs', 'project/include', 'project/src']);
  await writeFile(path.join(root, 'README.md'), 'readme', 'utf8');

  const result = await findProjectRoot(root, DEFAULT_ROOT_MARKERS);

  expect(result).toEqual({ root: path.join(root, 'project'), strategy: 'child' });
});

it('finds a project root two levels down', async () => {
  const root = await createRoot('root-grandchild-');
  await makeDirs(root, ['alpha/notes', 'beta/engine/src', 'beta/engine/res', 'gamma']);

  const result = await findProjectRoot(root, DEFAULT_ROOT_MARKERS);

  expect(result).toEqual({ root: path.join(root, 'beta', 'engine'), strategy: 'grandchild' });
});

it('falls back without throwing when no markers exist anywhere', async () => {
  const root = await createRoot('root-fallback-');
  await makeDirs(root, ['one/two/three', 'other']);
  await writeFile(path.join(root, 'one', 'two', 'three', 'file.txt'), 'data', 'utf8');

  const reporter = createReporter();
  const result = await findProjectRoot(root, DEFAULT_ROOT_MARKERS, reporter);

  expect(result).toEqual({ root, strategy: 'fallback' });
  expect(reporter.warnings.map((warning) => warning.kind)).toEqual(['advisory']);
});

it('terminates on wrapper chains deeper than the unwrap bound', async () => {
  const root = await createRoot('root-deep-');
  const chain = Array.from({ length: 14 }, (_, index) => `w${index}`).join('/');
  await makeDirs(root, [chain]);
  await writeFile(path.join(root, chain, 'payload.txt'), 'deep', 'utf8');

  const result = await findProjectRoot(root, DEFAULT_ROOT_MARKERS);

  expect(result.strategy).toBe('fallback');
  expect(result.root).toBe(path.join(root, 'w0', 'w1', 'w2', 'w3', 'w4', 'w5', 'w6', 'w7', 'w8', 'w9'));
});

it('flattens a wrapper whose child shares its name', async () => {
  const root = await createRoot('root-flatten-');
  await makeDirs(root, ['pkg/pkg/inner']);
  await writeFile(path.join(root, 'pkg', 'pkg', 'inner', 'file.txt'), 'x', 'utf8');
  await writeFile(path.join(root, 'pkg', 'top.txt'), 'top', 'utf8');

  expect(await flattenSingleDirectoryWrapper(root)).toBe(true);

  expect((await readdir(root)).sort()).toEqual(['pkg', 'top.txt']);
  expect(await readFile(path.join(root, 'pkg', 'inner', 'file.txt'), 'utf8')).toBe('x');
});

it('does not flatten when files sit next to the only directory', async () => {
  const root = await createRoot('root-noflatten-');
  await makeDirs(root, ['wrapper/inner']);
  await writeFile(path.join(root, 'LICENSE'), 'license', 'utf8');

  expect(await flattenSingleDirectoryWrapper(root)).toBe(false);
  expect((await readdir(root)).sort()).toEqual(['LICENSE', 'wrapper']);
});
