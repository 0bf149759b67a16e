export type EntryKind = 'file' | 'directory' | 'symlink' | 'missing';

export type StructureSpec = {
  readonly createDirs: readonly string[];
  readonly markers: Readonly<Record<string, string>>;
  readonly repoRootMarkers: readonly string[];
};

export type PayloadLayout = {
  toolchainName: string;
  payloadDirs: readonly string[];
};

export type StagingOperation = {
  dependencyName: string;
  extractedRoot: string;
  stagingDir: string;
  finalDir: string;
  toolchainDirName: string;
  requiredSubdirs: readonly string[];
};

export type RootDetectionStrategy = 'direct' | 'unwrapped' | 'child' | 'grandchild' | 'fallback';

export type RootDetectionResult = {
  root: string;
  strategy: RootDetectionStrategy;
};

export type PayloadLocation = {
  root: string;
  matched: boolean;
};

export type CommitMode = 'rename' | 'merge';

export type DependencyInstallResult = {
  name: string;
  finalDir: string;
  staged: string[];
  missing: string[];
  commit: CommitMode;
};

export type DependencySource = {
  name: string;
  url: string;
};

export type InstallWarningKind = 'advisory' | 'partial-commit' | 'cleanup';

export type InstallWarning = {
  kind: InstallWarningKind;
  message: string;
  path?: string;
};

export type InstallEvent =
  | { type: 'status'; text: string }
  | { type: 'progress'; percent: number | null }
  | { type: 'log'; text: string }
  | { type: 'warning'; warning: InstallWarning };

export type InstallEventSink = (event: InstallEvent) => void;

export type DownloadProgress = {
  label: string;
  bytesReceived: number;
  totalBytes: number | null;
};

export type DownloadRequest = {
  url: string;
  destination: string;
  label: string;
};

export type Downloader = (
  request: DownloadRequest,
  onProgress: (progress: DownloadProgress) => void,
) => Promise<void>;

export type ArchiveExpander = (archivePath: string, destDir: string) => Promise<void>;

export type InstallContext = {
  parentDir: string;
  subfolder: string;
  repoUrl: string;
  dependencies: DependencySource[];
  structure?: string;
  preferCopy: boolean;
  keepDownloads: boolean;
  keepTemp: boolean;
  plain: boolean;
  cwd: string;
  env: NodeJS.ProcessEnv;
};

export type MarkerAuditEntry = {
  name: string;
  relativePath: string;
  ok: boolean;
};

export type InstallSummary = {
  installDir: string;
  projectRoot: RootDetectionResult;
  dependencies: DependencyInstallResult[];
  markers: MarkerAuditEntry[];
  warnings: InstallWarning[];
};
