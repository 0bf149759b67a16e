import { rename } from 'node:fs/promises';
import path from 'node:path';

import { errorMessage, PayloadNotFoundError, TreeOperationError } from '@/setup/errors';
import { DEFAULT_PAYLOAD_LAYOUT, locatePayloadRoot, unwrapPayloadWrappers } from '@/setup/payload';
import { resolveExternalDirectory } from '@/setup/paths';
import { createReporter, type Reporter } from '@/setup/reporter';
import {
  childNames,
  copyPath,
  ensureDirectory,
  entryKind,
  isDirectory,
  movePath,
  removePath,
} from '@/setup/tree';
import type {
  CommitMode,
  DependencyInstallResult,
  PayloadLayout,
  StagingOperation,
} from '@/setup/types';

export const STAGING_SUFFIX = '.__staging__';
export const PREVIOUS_SUFFIX = '.__previous__';

export type DependencyInstallRequest = {
  name: string;
  extractedRoot: string;
  installRoot: string;
  layout?: PayloadLayout;
  preferCopy?: boolean;
  reporter?: Reporter;
};

export const createStagingOperation = (
  name: string,
  extractedRoot: string,
  installRoot: string,
  layout: PayloadLayout,
): StagingOperation => {
  const externalDir = resolveExternalDirectory(installRoot);

  return {
    dependencyName: name,
    extractedRoot,
    stagingDir: path.join(externalDir, `${name}${STAGING_SUFFIX}`),
    finalDir: path.join(externalDir, name),
    toolchainDirName: layout.toolchainName,
    requiredSubdirs: layout.payloadDirs,
  };
};

const stagePayload = async (
  operation: StagingOperation,
  layout: PayloadLayout,
  preferCopy: boolean,
  reporter: Reporter,
): Promise<{ staged: string[]; missing: string[] }> => {
  const { dependencyName, extractedRoot, stagingDir, toolchainDirName } = operation;

  await unwrapPayloadWrappers(extractedRoot, layout, reporter);
  const location = await locatePayloadRoot(extractedRoot, layout, reporter);

  const toolchainDir = path.join(location.root, toolchainDirName);
  const source = (await isDirectory(toolchainDir)) ? toolchainDir : location.root;
  const stageToolchain = path.join(stagingDir, toolchainDirName);

  const staged: string[] = [];
  const missing: string[] = [];

  for (const name of operation.requiredSubdirs) {
    const src = path.join(source, name);
    if ((await entryKind(src)) === 'missing') {
      missing.push(name);
      reporter.warn({
        kind: 'advisory',
        message: `${dependencyName} payload missing '${name}/'`,
        path: source,
      });
      continue;
    }

    const dst = path.join(stageToolchain, name);
    reporter.log(`Staging ${dependencyName}: ${name}/ -> ${dst}`);
    if (preferCopy) {
      await copyPath(src, dst, reporter);
    } else {
      await movePath(src, dst, reporter);
    }
    staged.push(name);
  }

  if (staged.length === 0) {
    throw new PayloadNotFoundError(dependencyName, source, operation.requiredSubdirs);
  }

  return { staged, missing };
};

const mergeStagingInto = async (
  operation: StagingOperation,
  reporter: Reporter,
): Promise<void> => {
  const { stagingDir, finalDir } = operation;

  try {
    await ensureDirectory(finalDir);
    for (const name of await childNames(stagingDir)) {
      await movePath(path.join(stagingDir, name), path.join(finalDir, name), reporter);
    }
  } catch (error) {
    reporter.warn({
      kind: 'partial-commit',
      message: `${operation.dependencyName} was only partly moved into place: ${errorMessage(error)}`,
      path: finalDir,
    });
  }

  await removePath(stagingDir, reporter);
};

/**
 * Swaps the staging directory in for the live one. The live directory is renamed aside
 * first so it is only deleted once the new tree is in place. When the staging rename
 * fails the children are merged in one by one, which is the one non-atomic window.
 */
const commitStaging = async (operation: StagingOperation, reporter: Reporter): Promise<CommitMode> => {
  const { stagingDir, finalDir } = operation;
  const previousDir = `${finalDir}${PREVIOUS_SUFFIX}`;

  reporter.log(`Replacing ${finalDir} using staging folder...`);
  await removePath(previousDir, reporter);

  if ((await entryKind(finalDir)) !== 'missing') {
    const setAside = await rename(finalDir, previousDir).then(
      () => true,
      () => false,
    );
    if (!setAside) {
      await removePath(finalDir, reporter);
    }
  }

  let mode: CommitMode = 'rename';
  try {
    await rename(stagingDir, finalDir);
  } catch (error) {
    mode = 'merge';
    reporter.log(`Could not rename ${stagingDir} into place (${errorMessage(error)}); merging instead.`);
    await mergeStagingInto(operation, reporter);
  }

  await removePath(previousDir, reporter);
  return mode;
};

export const installDependency = async (
  request: DependencyInstallRequest,
): Promise<DependencyInstallResult> => {
  const layout = request.layout ?? DEFAULT_PAYLOAD_LAYOUT;
  const reporter = request.reporter ?? createReporter();
  const operation = createStagingOperation(
    request.name,
    request.extractedRoot,
    request.installRoot,
    layout,
  );

  await removePath(operation.stagingDir, reporter);
  if ((await entryKind(operation.stagingDir)) !== 'missing') {
    throw new TreeOperationError(
      `Could not clear leftover staging folder ${operation.stagingDir}; remove it and run the install again.`,
    );
  }
  await ensureDirectory(path.join(operation.stagingDir, operation.toolchainDirName));

  let payload: { staged: string[]; missing: string[] };
  try {
    payload = await stagePayload(operation, layout, Boolean(request.preferCopy), reporter);
  } catch (error) {
    await removePath(operation.stagingDir, reporter);
    throw error;
  }

  const commit = await commitStaging(operation, reporter);

  const finalToolchain = path.join(operation.finalDir, operation.toolchainDirName);
  if (!(await isDirectory(finalToolchain))) {
    reporter.warn({
      kind: 'advisory',
      message: `${operation.dependencyName} final toolchain folder missing`,
      path: finalToolchain,
    });
  }

  return {
    name: operation.dependencyName,
    finalDir: operation.finalDir,
    staged: payload.staged,
    missing: payload.missing,
    commit,
  };
};
