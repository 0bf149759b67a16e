import path from 'node:path';

export const DEFAULT_INSTALL_SUBFOLDER = 'SDLite';

export const DOWNLOADS_DIR_NAME = '.downloads';
export const PROJECT_TEMP_DIR_NAME = '.tmp_repo';
export const EXTERNAL_DIR_NAME = 'external';

export type InstallLayout = {
  installDir: string;
  downloadsDir: string;
  projectTempDir: string;
  projectArchive: string;
};

export const resolveParentDirectory = (
  explicit: string | undefined,
  cwd: string,
  env: NodeJS.ProcessEnv,
): string => {
  const value = explicit?.trim() || env.DEVKIT_SETUP_DIR?.trim();
  return value ? path.resolve(cwd, value) : path.resolve(cwd);
};

export const resolveInstallDirectory = (parentDir: string, subfolder: string): string => {
  const name = subfolder.trim() || DEFAULT_INSTALL_SUBFOLDER;
  return path.resolve(parentDir, name);
};

export const resolveExternalDirectory = (installDir: string): string =>
  path.join(installDir, EXTERNAL_DIR_NAME);

export const dependencyTempDirName = (name: string): string => `.tmp_${name.toLowerCase()}`;

export const dependencyArchiveName = (name: string): string => `${name.toLowerCase()}.zip`;

export const resolveInstallLayout = (installDir: string): InstallLayout => {
  const downloadsDir = path.join(installDir, DOWNLOADS_DIR_NAME);

  return {
    installDir,
    downloadsDir,
    projectTempDir: path.join(installDir, PROJECT_TEMP_DIR_NAME),
    projectArchive: path.join(downloadsDir, 'repo.zip'),
  };
};

export const isWorkingDirectoryName = (name: string): boolean =>
  name === DOWNLOADS_DIR_NAME || name === PROJECT_TEMP_DIR_NAME || name.startsWith('.tmp_');
