import { expect, it } from 'vitest';

import {
  dependencyArchiveName,
  dependencyTempDirName,
  isWorkingDirectoryName,
  resolveExternalDirectory,
  resolveInstallDirectory,
  resolveInstallLayout,
  resolveParentDirectory,
} from '@/setup/paths';

it('prefers an explicit parent directory over DEVKIT_SETUP_DIR', () => {
  expect(resolveParentDirectory('games', '/repo', { DEVKIT_SETUP_DIR: '/opt/dev' })).toBe('/repo/games');
});

it('falls back to DEVKIT_SETUP_DIR, then cwd', () => {
  expect(resolveParentDirectory(undefined, '/repo', { DEVKIT_SETUP_DIR: '/opt/dev' })).toBe('/opt/dev');
  expect(resolveParentDirectory(undefined, '/repo', {})).toBe('/repo');
});

it('resolves the install directory and falls back to the default subfolder', () => {
  expect(resolveInstallDirectory('/opt/dev', 'Game')).toBe('/opt/dev/Game');
  expect(resolveInstallDirectory('/opt/dev', ' ')).toBe('/opt/dev/SDLite');
});

it('lays out working folders inside the install directory', () => {
  expect(resolveInstallLayout('/opt/dev/SDLite')).toEqual({
    installDir: '/opt/dev/SDLite',
    downloadsDir: '/opt/dev/SDLite/.downloads',
    projectTempDir: '/opt/dev/SDLite/.tmp_repo',
    projectArchive: '/opt/dev/SDLite/.downloads/repo.zip',
  });
  expect(resolveExternalDirectory('/opt/dev/SDLite')).toBe('/opt/dev/SDLite/external');
});

it('names per-dependency archives and temp folders', () => {
  expect(dependencyTempDirName('SDL2_image')).toBe('.tmp_sdl2_image');
  expect(dependencyArchiveName('SDL2')).toBe('sdl2.zip');
  expect(isWorkingDirectoryName('.tmp_sdl2')).toBe(true);
  expect(isWorkingDirectoryName('.downloads')).toBe(true);
  expect(isWorkingDirectoryName('src')).toBe(false);
});
