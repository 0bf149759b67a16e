import { mkdtemp, mkdir, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, expect, it } from 'vitest';

import {
  DEFAULT_PAYLOAD_LAYOUT,
  hasPayloadShape,
  locatePayloadRoot,
  TOOLCHAIN_NAME,
  unwrapPayloadWrappers,
} from '@/setup/payload';
import { createReporter } from '@/setup/reporter';

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

const toolchainTree = (prefix: string) =>
  ['include', 'lib', 'bin'].map((name) => path.join(prefix, TOOLCHAIN_NAME, name));

it('returns the extraction root when the toolchain folder sits at the top', async () => {
  const root = await createRoot('payload-toolchain-');
  await makeDirs(root, toolchainTree(''));

  expect(await locatePayloadRoot(root, DEFAULT_PAYLOAD_LAYOUT)).toEqual({ root, matched: true });
});

it('returns the extraction root when include, lib and bin sit at the top', async () => {
  const root = await createRoot('payload-flat-');
  await makeDirs(root, ['include', 'lib', 'bin']);

  expect(await locatePayloadRoot(root, DEFAULT_PAYLOAD_LAYOUT)).toEqual({ root, matched: true });
});

it('needs all three payload folders when no toolchain folder is present', async () => {
  const root = await createRoot('payload-partial-');
  await makeDirs(root, ['include', 'lib']);

  expect(await hasPayloadShape(root, DEFAULT_PAYLOAD_LAYOUT)).toBe(false);
});

it('pre-unwraps a wrapper so the toolchain folder lands at the extraction root', async () => {
  const root = await createRoot('payload-wrapper-');
  await makeDirs(root, toolchainTree('SDL2-2.32.10'));

  const flattened = await unwrapPayloadWrappers(root, DEFAULT_PAYLOAD_LAYOUT);

  expect(flattened).toBe(1);
  expect(await readdir(root)).toEqual([TOOLCHAIN_NAME]);
  expect(await locatePayloadRoot(root, DEFAULT_PAYLOAD_LAYOUT)).toEqual({ root, matched: true });
});

it('stops unwrapping once the toolchain folder is visible', async () => {
  const root = await createRoot('payload-stop-');
  await makeDirs(root, toolchainTree(''));

  expect(await unwrapPayloadWrappers(root, DEFAULT_PAYLOAD_LAYOUT)).toBe(0);
  expect(await readdir(root)).toEqual([TOOLCHAIN_NAME]);
});

it('finds the payload one level down next to sibling folders', async () => {
  const root = await createRoot('payload-child-');
  await makeDirs(root, ['docs', ...toolchainTree('SDL2-2.32.10')]);
  await writeFile(path.join(root, 'README.txt'), 'readme', 'utf8');

  expect(await locatePayloadRoot(root, DEFAULT_PAYLOAD_LAYOUT)).toEqual({
    root: path.join(root, 'SDL2-2.32.10'),
    matched: true,
  });
});

it('finds the payload two levels down', async () => {
  const root = await createRoot('payload-grandchild-');
  await makeDirs(root, ['docs', 'dist/x64/include', 'dist/x64/lib', 'dist/x64/bin', 'dist/x86']);

  expect(await locatePayloadRoot(root, DEFAULT_PAYLOAD_LAYOUT)).toEqual({
    root: path.join(root, 'dist', 'x64'),
    matched: true,
  });
});

it('falls back to the extraction root with an advisory warning', async () => {
  const root = await createRoot('payload-none-');
  await makeDirs(root, ['docs', 'licenses']);

  const reporter = createReporter();
  const location = await locatePayloadRoot(root, DEFAULT_PAYLOAD_LAYOUT, reporter);

  expect(location).toEqual({ root, matched: false });
  expect(reporter.warnings).toEqual([
    {
      kind: 'advisory',
      message: 'Could not confidently detect the payload root; using the extracted root',
      path: root,
    },
  ]);
});
