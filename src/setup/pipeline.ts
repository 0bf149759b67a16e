import path from 'node:path';

import {
  ConfigurationError,
  InstallAbortedError,
  InstallBusyError,
  InstallStepError,
} from '@/setup/errors';
import { TOOLCHAIN_NAME } from '@/setup/payload';
import {
  dependencyArchiveName,
  dependencyTempDirName,
  isWorkingDirectoryName,
  resolveInstallDirectory,
  resolveInstallLayout,
} from '@/setup/paths';
import type { Reporter } from '@/setup/reporter';
import { findProjectRoot } from '@/setup/root-detection';
import { installDependency } from '@/setup/staging';
import { applyStructure, auditMarkers, loadStructureSpec } from '@/setup/structure';
import { childNames, ensureDirectory, isDirectory, movePath, removePath } from '@/setup/tree';
import type {
  ArchiveExpander,
  DependencyInstallResult,
  Downloader,
  DownloadProgress,
  InstallContext,
  InstallSummary,
} from '@/setup/types';

export type InstallServices = {
  download: Downloader;
  expand: ArchiveExpander;
  reporter: Reporter;
  signal?: AbortSignal;
};

type DependencyPlan = {
  name: string;
  url: string;
  archive: string;
  tempDir: string;
};

const activeInstalls = new Set<string>();

const DOWNLOAD_BAND_END = 30;
const DEPENDENCY_BAND_START = 60;
const DEPENDENCY_BAND_END = 94;

const createStepRunner =
  (signal: AbortSignal | undefined) =>
  async <T>(name: string, action: () => Promise<T>, dependencyName?: string): Promise<T> => {
    if (signal?.aborted) {
      throw new InstallAbortedError(name);
    }

    try {
      return await action();
    } catch (error) {
      if (error instanceof InstallAbortedError || error instanceof InstallStepError) {
        throw error;
      }
      throw new InstallStepError(name, error, dependencyName);
    }
  };

const downloadProgressHandler =
  (reporter: Reporter, bandStart: number, bandEnd: number) => (progress: DownloadProgress) => {
    if (progress.totalBytes && progress.totalBytes > 0) {
      const percent = Math.floor((progress.bytesReceived * 100) / progress.totalBytes);
      reporter.status(`${progress.label} (${percent}%)`);
      reporter.progress(bandStart + ((bandEnd - bandStart) * percent) / 100);
      return;
    }

    reporter.status(`${progress.label} (downloading...)`);
    reporter.progress(null);
  };

const executeInstall = async (
  installDir: string,
  context: InstallContext,
  services: InstallServices,
): Promise<InstallSummary> => {
  const { reporter } = services;
  const step = createStepRunner(services.signal);
  const layout = resolveInstallLayout(installDir);

  const structure = await step('Load structure', () => loadStructureSpec(context.structure, context.cwd));

  const urls = [context.repoUrl, ...context.dependencies.map((dependency) => dependency.url)];
  if (urls.some((url) => !url.trim())) {
    throw new ConfigurationError('Missing one or more download URLs.');
  }

  const plans: DependencyPlan[] = context.dependencies.map((dependency) => ({
    name: dependency.name,
    url: dependency.url,
    archive: path.join(layout.downloadsDir, dependencyArchiveName(dependency.name)),
    tempDir: path.join(installDir, dependencyTempDirName(dependency.name)),
  }));

  reporter.status('Preparing...');
  reporter.progress(0);
  reporter.log(`Install directory: ${installDir}`);

  await step('Prepare working folders', async () => {
    await ensureDirectory(installDir);
    for (const dir of [layout.downloadsDir, layout.projectTempDir, ...plans.map((plan) => plan.tempDir)]) {
      await removePath(dir, reporter);
      await ensureDirectory(dir);
    }
  });

  reporter.status('Downloading files...');
  const downloads = [
    { name: 'project', label: 'Downloading project archive...', url: context.repoUrl, archive: layout.projectArchive },
    ...plans.map((plan) => ({
      name: plan.name,
      label: `Downloading ${plan.name}...`,
      url: plan.url,
      archive: plan.archive,
    })),
  ];
  const bandWidth = DOWNLOAD_BAND_END / downloads.length;

  for (const [index, download] of downloads.entries()) {
    const bandStart = bandWidth * index;
    reporter.log(`Downloading: ${download.url}`);
    await step(
      'Download',
      () =>
        services.download(
          { url: download.url, destination: download.archive, label: download.label },
          downloadProgressHandler(reporter, bandStart, bandStart + bandWidth),
        ),
      download.name,
    );
    reporter.progress(bandStart + bandWidth);
  }

  reporter.status('Extracting project archive...');
  reporter.progress(35);
  reporter.log(`Extracting project archive -> ${layout.projectTempDir}`);
  await step('Extract project archive', () => services.expand(layout.projectArchive, layout.projectTempDir));

  const projectRoot = await step('Detect project root', () =>
    findProjectRoot(layout.projectTempDir, structure.repoRootMarkers, reporter),
  );
  reporter.log(`Project root selected: ${projectRoot.root} (${projectRoot.strategy})`);
  reporter.progress(42);

  reporter.status('Applying project layout...');
  reporter.progress(45);
  await step('Apply project layout', async () => {
    for (const name of await childNames(projectRoot.root)) {
      if (isWorkingDirectoryName(name)) {
        continue;
      }
      await movePath(path.join(projectRoot.root, name), path.join(installDir, name), reporter);
    }
    await applyStructure(installDir, structure);
  });
  reporter.log('Project files moved into install directory.');
  reporter.progress(55);

  const dependencyResults: DependencyInstallResult[] = [];
  const dependencyBand = (DEPENDENCY_BAND_END - DEPENDENCY_BAND_START) / Math.max(plans.length, 1);

  for (const [index, plan] of plans.entries()) {
    const bandStart = DEPENDENCY_BAND_START + dependencyBand * index;

    reporter.status(`Extracting ${plan.name}...`);
    reporter.progress(bandStart);
    reporter.log(`Extracting ${plan.name} archive -> ${plan.tempDir}`);
    await step('Extract archive', () => services.expand(plan.archive, plan.tempDir), plan.name);

    reporter.status(`Installing ${plan.name} (staging)...`);
    reporter.progress(bandStart + dependencyBand / 2);
    const result = await step(
      'Stage install',
      () =>
        installDependency({
          name: plan.name,
          extractedRoot: plan.tempDir,
          installRoot: installDir,
          preferCopy: context.preferCopy,
          reporter,
        }),
      plan.name,
    );
    dependencyResults.push(result);
  }
  reporter.progress(DEPENDENCY_BAND_END);

  await step('Apply structure', () => applyStructure(installDir, structure));

  reporter.status('Cleaning up...');
  reporter.progress(96);
  if (context.keepTemp) {
    reporter.log('Keeping temp folders (.tmp_*) for debugging.');
  } else {
    for (const dir of [layout.projectTempDir, ...plans.map((plan) => plan.tempDir)]) {
      await removePath(dir, reporter);
    }
  }
  if (context.keepDownloads) {
    reporter.log('Keeping downloads (.downloads).');
  } else {
    await removePath(layout.downloadsDir, reporter);
  }

  reporter.status('Validating install...');
  const markers = await auditMarkers(installDir, structure);
  for (const marker of markers) {
    if (marker.ok) {
      reporter.log(`OK: ${marker.name} marker -> ${marker.relativePath}`);
    } else {
      reporter.warn({
        kind: 'advisory',
        message: `${marker.name} marker missing -> ${marker.relativePath}`,
        path: path.join(installDir, marker.relativePath),
      });
    }
  }

  for (const result of dependencyResults) {
    const toolchainDir = path.join(result.finalDir, TOOLCHAIN_NAME);
    if (await isDirectory(toolchainDir)) {
      reporter.log(`OK: ${result.name} toolchain folder -> ${toolchainDir}`);
    }
  }
  reporter.progress(100);
  reporter.status('Done.');

  return {
    installDir,
    projectRoot,
    dependencies: dependencyResults,
    markers,
    warnings: [...reporter.warnings],
  };
};

/**
 * Runs one full install: download, extract, detect the project root, move it into place,
 * then stage every dependency. Only one run per install directory may be active.
 */
export const runInstall = async (
  context: InstallContext,
  services: InstallServices,
): Promise<InstallSummary> => {
  const installDir = resolveInstallDirectory(context.parentDir, context.subfolder);
  if (activeInstalls.has(installDir)) {
    throw new InstallBusyError(installDir);
  }

  activeInstalls.add(installDir);
  try {
    return await executeInstall(installDir, context, services);
  } finally {
    activeInstalls.delete(installDir);
  }
};
