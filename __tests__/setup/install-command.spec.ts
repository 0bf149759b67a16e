import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, expect, it, vi } from 'vitest';

import { installCommandHandler, runPlainInstall } from '@/setup/install.command';
import { TOOLCHAIN_NAME } from '@/setup/payload';
import { createReporter } from '@/setup/reporter';
import type { ArchiveExpander, Downloader, InstallContext } from '@/setup/types';

const tempRoots: string[] = [];

afterEach(async () => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
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

const download: Downloader = async (request) => {
  await mkdir(path.dirname(request.destination), { recursive: true });
  await writeFile(request.destination, 'archive', 'utf8');
};

const expand: ArchiveExpander = async (archivePath, destDir) => {
  const files: string[] =
    path.basename(archivePath) === 'repo.zip'
      ? ['include/game.h', 'src/main.c', 'res/logo.png']
      : ['include/SDL2/SDL.h', 'lib/libSDL2.a', 'bin/SDL2.dll'].map((file) => `${TOOLCHAIN_NAME}/${file}`);

  for (const file of files) {
    const target = path.join(destDir, file);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, file, 'utf8');
  }
};

it('prints the install path and the warning count after a plain run', async () => {
  const parentDir = await createRoot('command-plain-');
  const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  const context: InstallContext = {
    parentDir,
    subfolder: 'Game',
    repoUrl: 'https://example.test/repo.zip',
    dependencies: [{ name: 'SDL2', url: 'https://example.test/sdl2.zip' }],
    preferCopy: false,
    keepDownloads: false,
    keepTemp: false,
    plain: true,
    cwd: parentDir,
    env: {},
  };

  const code = await runPlainInstall(context, { download, expand, reporter: createReporter() });

  // The default layout also audits SDL2_image, which this run never installs.
  expect(code).toBe(0);
  expect(log.mock.calls).toEqual([
    [`Install path: ${path.join(parentDir, 'Game')}`],
    ['Completed with 1 warning(s).'],
  ]);
});

it('reports a failed install and sets a non-zero exit code', async () => {
  const parentDir = await createRoot('command-failed-');
  const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

  const code = await installCommandHandler(
    { dir: parentDir, structure: '{"createDirs": []}', plain: true },
    { cwd: parentDir, env: {} },
  );

  expect(code).toBe(1);
  expect(process.exitCode).toBe(1);
  expect(error).toHaveBeenCalledWith(
    'devkit-setup install failed: Load structure failed: inline structure validation failed: markers: Required',
  );
});
