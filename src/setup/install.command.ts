import { expandArchive } from '@/setup/archive';
import { createConsoleSink } from '@/setup/console-sink';
import { createFetchDownloader } from '@/setup/download';
import { errorMessage } from '@/setup/errors';
import {
  type InstallCliOptionsInput,
  normalizeInstallCliOptions,
  toInstallContext,
} from '@/setup/options';
import { runInstall, type InstallServices } from '@/setup/pipeline';
import { createReporter } from '@/setup/reporter';
import type { InstallContext } from '@/setup/types';
import { runInstallInkApplication } from '@/setup/ui';

export const runPlainInstall = async (
  context: InstallContext,
  services?: Partial<InstallServices>,
): Promise<number> => {
  const reporter = services?.reporter ?? createReporter(createConsoleSink());
  const summary = await runInstall(context, {
    download: services?.download ?? createFetchDownloader(),
    expand: services?.expand ?? expandArchive,
    reporter,
    signal: services?.signal,
  });

  console.log(`Install path: ${summary.installDir}`);
  if (summary.warnings.length > 0) {
    console.log(`Completed with ${summary.warnings.length} warning(s).`);
  }
  return 0;
};

export const installCommandHandler = async (
  rawOptions: InstallCliOptionsInput,
  runtime?: { cwd?: string; env?: NodeJS.ProcessEnv },
): Promise<number> => {
  const options = normalizeInstallCliOptions(rawOptions);
  const context = toInstallContext(
    options,
    runtime?.cwd ?? process.cwd(),
    runtime?.env ?? process.env,
  );

  try {
    const code = context.plain
      ? await runPlainInstall(context)
      : await runInstallInkApplication(context);
    if (code !== 0) {
      process.exitCode = code;
    }
    return code;
  } catch (error) {
    console.error(`devkit-setup install failed: ${errorMessage(error)}`);
    process.exitCode = 1;
    return 1;
  }
};
