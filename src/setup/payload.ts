import path from 'node:path';

import type { Reporter } from '@/setup/reporter';
import { childDirectories, flattenSingleDirectoryWrapper } from '@/setup/root-detection';
import { isDirectory } from '@/setup/tree';
import type { PayloadLayout, PayloadLocation } from '@/setup/types';

export const TOOLCHAIN_NAME = 'x86_64-w64-mingw32';
export const TOOLCHAIN_PAYLOAD_DIRS = ['include', 'lib', 'bin'] as const;

export const DEFAULT_PAYLOAD_LAYOUT: PayloadLayout = {
  toolchainName: TOOLCHAIN_NAME,
  payloadDirs: TOOLCHAIN_PAYLOAD_DIRS,
};

const PRE_UNWRAP_LIMIT = 12;
const CHILD_LIMIT = 32;
const GRANDCHILD_LIMIT = 64;

export const hasToolchainDir = (dir: string, layout: PayloadLayout): Promise<boolean> =>
  isDirectory(path.join(dir, layout.toolchainName));

export const hasAllPayloadDirs = async (dir: string, layout: PayloadLayout): Promise<boolean> => {
  for (const name of layout.payloadDirs) {
    if (!(await isDirectory(path.join(dir, name)))) {
      return false;
    }
  }
  return layout.payloadDirs.length > 0;
};

export const hasPayloadShape = async (dir: string, layout: PayloadLayout): Promise<boolean> =>
  (await hasToolchainDir(dir, layout)) || (await hasAllPayloadDirs(dir, layout));

/**
 * Flattens lone wrapper directories at the extraction root until the toolchain folder
 * or the payload folders show up there.
 */
export const unwrapPayloadWrappers = async (
  root: string,
  layout: PayloadLayout,
  reporter?: Reporter,
): Promise<number> => {
  let flattened = 0;

  for (let iteration = 0; iteration < PRE_UNWRAP_LIMIT; iteration += 1) {
    if (await hasPayloadShape(root, layout)) {
      break;
    }
    if (!(await flattenSingleDirectoryWrapper(root, reporter))) {
      break;
    }
    flattened += 1;
  }

  return flattened;
};

export const locatePayloadRoot = async (
  root: string,
  layout: PayloadLayout,
  reporter?: Reporter,
): Promise<PayloadLocation> => {
  if (await hasPayloadShape(root, layout)) {
    return { root, matched: true };
  }

  const children = await childDirectories(root);
  for (const child of children) {
    if (await hasPayloadShape(child, layout)) {
      return { root: child, matched: true };
    }
  }

  for (const child of children.slice(0, CHILD_LIMIT)) {
    const grandchildren = await childDirectories(child);
    for (const grandchild of grandchildren.slice(0, GRANDCHILD_LIMIT)) {
      if (await hasPayloadShape(grandchild, layout)) {
        return { root: grandchild, matched: true };
      }
    }
  }

  reporter?.warn({
    kind: 'advisory',
    message: 'Could not confidently detect the payload root; using the extracted root',
    path: root,
  });

  return { root, matched: false };
};
