import { Command } from 'commander';

import type { InstallCliOptionsInput } from '@/setup/options';
import { DEFAULT_INSTALL_SUBFOLDER } from '@/setup/paths';
import { installCommandHandler } from '@/setup/install.command';

export type PackageInfo = {
  name: string;
  version: string;
  description: string;
};

export const parse = ({ argv, pkg }: { argv: string[]; pkg: PackageInfo }): (() => Promise<void>) => {
  const program = new Command();

  program
    .name('devkit-setup')
    .description(pkg.description)
    .version(pkg.version, '-v, --version', 'output the current version')
    .showSuggestionAfterError()
    .showHelpAfterError();

  program
    .command('install')
    .description('Download the project and its SDL2 payloads and lay out a ready-to-build tree')
    .option('--dir <path>', 'parent directory for the install (defaults to $DEVKIT_SETUP_DIR or cwd)')
    .option('--subfolder <name>', 'install subfolder name', DEFAULT_INSTALL_SUBFOLDER)
    .option('--repo-url <url>', 'project archive URL')
    .option('--sdl2-url <url>', 'SDL2 development archive URL')
    .option('--sdl2-image-url <url>', 'SDL2_image development archive URL')
    .option('--structure <json|path>', 'custom structure spec as inline JSON or a JSON file')
    .option('--prefer-copy', 'copy dependency payloads instead of moving them')
    .option('--keep-downloads', 'keep downloaded archives in .downloads')
    .option('--keep-temp', 'keep extracted .tmp_* folders for debugging')
    .option('--plain', 'print progress as plain lines instead of the interactive board')
    .action(async (rawOptions: InstallCliOptionsInput) => {
      await installCommandHandler(rawOptions);
    });

  return async () => {
    if (argv.length <= 2) {
      program.outputHelp();
      return;
    }

    await program.parseAsync(argv);
  };
};
