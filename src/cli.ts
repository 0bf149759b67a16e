import { readFile } from 'node:fs/promises';

import { parse, type PackageInfo } from '@/parser';

const loadPackageInfo = async (): Promise<PackageInfo> => {
  const raw = await readFile(new URL('../package.json', import.meta.url), 'utf8');
  const parsed: Partial<PackageInfo> = JSON.parse(raw);

  return {
    name: parsed.name ?? 'devkit-setup',
    version: parsed.version ?? '0.0.0',
    description: parsed.description ?? '',
  };
};

const main = async () => {
  const pkg = await loadPackageInfo();
  const run = parse({ argv: process.argv, pkg });
  await run();
};

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
