import { DEFAULT_INSTALL_SUBFOLDER, resolveParentDirectory } from '@/setup/paths';
import type { DependencySource, InstallContext } from '@/setup/types';

export const DEFAULT_REPO_ZIP_URL =
  'https://github.com/therealpixeles/SDLite/archive/refs/heads/main.zip';

export const DEFAULT_SDL2_ZIP_URL =
  'https://github.com/libsdl-org/SDL/releases/download/release-2.32.10/SDL2-devel-2.32.10-mingw.zip';

export const DEFAULT_SDL2_IMAGE_ZIP_URL =
  'https://github.com/libsdl-org/SDL_image/releases/download/release-2.8.8/SDL2_image-devel-2.8.8-mingw.zip';

export type InstallCliOptionsInput = {
  dir?: string;
  subfolder?: string;
  repoUrl?: string;
  sdl2Url?: string;
  sdl2ImageUrl?: string;
  structure?: string;
  preferCopy?: boolean;
  keepDownloads?: boolean;
  keepTemp?: boolean;
  plain?: boolean;
};

export type InstallCliOptions = {
  dir?: string;
  subfolder: string;
  repoUrl: string;
  sdl2Url: string;
  sdl2ImageUrl: string;
  structure?: string;
  preferCopy: boolean;
  keepDownloads: boolean;
  keepTemp: boolean;
  plain: boolean;
};

export const normalizeInstallCliOptions = (options: InstallCliOptionsInput): InstallCliOptions => ({
  dir: options.dir?.trim() || undefined,
  subfolder: options.subfolder?.trim() || DEFAULT_INSTALL_SUBFOLDER,
  repoUrl: options.repoUrl?.trim() || DEFAULT_REPO_ZIP_URL,
  sdl2Url: options.sdl2Url?.trim() || DEFAULT_SDL2_ZIP_URL,
  sdl2ImageUrl: options.sdl2ImageUrl?.trim() || DEFAULT_SDL2_IMAGE_ZIP_URL,
  structure: options.structure?.trim() || undefined,
  preferCopy: Boolean(options.preferCopy),
  keepDownloads: Boolean(options.keepDownloads),
  keepTemp: Boolean(options.keepTemp),
  plain: Boolean(options.plain),
});

export const toDependencySources = (options: InstallCliOptions): DependencySource[] => [
  { name: 'SDL2', url: options.sdl2Url },
  { name: 'SDL2_image', url: options.sdl2ImageUrl },
];

export const toInstallContext = (
  options: InstallCliOptions,
  cwd: string,
  env: NodeJS.ProcessEnv,
): InstallContext => ({
  parentDir: resolveParentDirectory(options.dir, cwd, env),
  subfolder: options.subfolder,
  repoUrl: options.repoUrl,
  dependencies: toDependencySources(options),
  structure: options.structure,
  preferCopy: options.preferCopy,
  keepDownloads: options.keepDownloads,
  keepTemp: options.keepTemp,
  plain: options.plain,
  cwd,
  env,
});
