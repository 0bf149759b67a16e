import { render } from 'ink';

import type { InstallContext } from '@/setup/types';
import { InstallApplication } from '@/setup/ui/install.application';

export const runInstallInkApplication = async (context: InstallContext): Promise<number> => {
  let exitCode = 0;

  const { waitUntilExit } = render(
    <InstallApplication
      context={context}
      onComplete={(code) => {
        exitCode = code;
      }}
    />,
    { exitOnCtrlC: false },
  );

  await waitUntilExit();
  return exitCode;
};
