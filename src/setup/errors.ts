export type SetupErrorCode =
  | 'configuration'
  | 'archive'
  | 'payload-not-found'
  | 'download'
  | 'tree-operation'
  | 'aborted'
  | 'busy'
  | 'install-step';

export class SetupError extends Error {
  readonly code: SetupErrorCode;

  constructor(code: SetupErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends SetupError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration', message, options);
  }
}

export class ArchiveError extends SetupError {
  readonly archivePath: string;

  constructor(archivePath: string, message: string, options?: { cause?: unknown }) {
    super('archive', message, options);
    this.archivePath = archivePath;
  }
}

export class PayloadNotFoundError extends SetupError {
  readonly dependencyName: string;
  readonly searchedDir: string;

  constructor(dependencyName: string, searchedDir: string, payloadDirs: readonly string[]) {
    super(
      'payload-not-found',
      `${dependencyName} install failed: could not find any of ${payloadDirs.join('/')} in the extracted archive.\n` +
        `Looked in: ${searchedDir}`,
    );
    this.dependencyName = dependencyName;
    this.searchedDir = searchedDir;
  }
}

export class DownloadError extends SetupError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super('download', message, options);
    this.url = url;
  }
}

export class TreeOperationError extends SetupError {
  constructor(message: string) {
    super('tree-operation', message);
  }
}

export class InstallAbortedError extends SetupError {
  constructor(step: string) {
    super('aborted', `Install aborted before step: ${step}`);
  }
}

export class InstallBusyError extends SetupError {
  constructor(installDir: string) {
    super('busy', `Another install is already running for ${installDir}`);
  }
}

export class InstallStepError extends SetupError {
  readonly step: string;
  readonly dependencyName?: string;

  constructor(step: string, cause: unknown, dependencyName?: string) {
    const target = dependencyName ? ` (${dependencyName})` : '';
    super('install-step', `${step}${target} failed: ${errorMessage(cause)}`, { cause });
    this.step = step;
    this.dependencyName = dependencyName;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;
