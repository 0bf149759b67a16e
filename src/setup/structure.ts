import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { ConfigurationError, errorMessage } from '@/setup/errors';
import { DEFAULT_ROOT_MARKERS } from '@/setup/root-detection';
import { ensureDirectory, isFile } from '@/setup/tree';
import type { MarkerAuditEntry, StructureSpec } from '@/setup/types';

export const DEFAULT_STRUCTURE: StructureSpec = Object.freeze({
  createDirs: Object.freeze([
    'include',
    'src',
    'res',
    'external/SDL2',
    'external/SDL2_image',
    'bin/debug',
    'bin/release',
  ]),
  markers: Object.freeze({
    SDL2: 'external/SDL2/x86_64-w64-mingw32/include/SDL2/SDL.h',
    SDL2_image: 'external/SDL2_image/x86_64-w64-mingw32/include/SDL2/SDL_image.h',
  }),
  repoRootMarkers: Object.freeze([...DEFAULT_ROOT_MARKERS]),
});

const isContainedRelativePath = (value: string): boolean => {
  if (path.isAbsolute(value) || path.win32.isAbsolute(value)) {
    return false;
  }
  const normalized = path.normalize(value.replace(/\\/g, '/'));
  return normalized !== '..' && !normalized.startsWith(`..${path.sep}`);
};

const RelativePathSchema = z
  .string()
  .trim()
  .min(1)
  .refine(isContainedRelativePath, { message: 'must be a relative path inside the install root' });

const StructureSpecSchema = z.object({
  createDirs: z.array(RelativePathSchema),
  markers: z.record(z.string().min(1), RelativePathSchema),
  repoRootMarkers: z.array(z.string().trim().min(1)).optional(),
});

const freezeSpec = (input: z.infer<typeof StructureSpecSchema>): StructureSpec =>
  Object.freeze({
    createDirs: Object.freeze([...input.createDirs]),
    markers: Object.freeze({ ...input.markers }),
    repoRootMarkers: Object.freeze([...(input.repoRootMarkers ?? DEFAULT_ROOT_MARKERS)]),
  });

export const validateStructureSpec = (input: unknown, sourceName = 'structure'): StructureSpec => {
  const result = StructureSpecSchema.safeParse(input);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`${sourceName} validation failed: ${message}`);
  }

  return freezeSpec(result.data);
};

export const parseStructureSpec = (text: string, sourceName = 'structure'): StructureSpec => {
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`${sourceName} is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  return validateStructureSpec(input, sourceName);
};

/**
 * Accepts inline JSON or a path to a JSON file. No value means the default layout.
 */
export const loadStructureSpec = async (
  raw: string | undefined,
  cwd: string,
): Promise<StructureSpec> => {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return DEFAULT_STRUCTURE;
  }

  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    return parseStructureSpec(trimmed, 'inline structure');
  }

  const configPath = path.resolve(cwd, trimmed);
  let text: string;
  try {
    text = await readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Unable to read structure file ${configPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  return parseStructureSpec(text, configPath);
};

export const applyStructure = async (installRoot: string, spec: StructureSpec): Promise<void> => {
  for (const dir of spec.createDirs) {
    await ensureDirectory(path.join(installRoot, dir));
  }
};

export const auditMarkers = async (
  installRoot: string,
  spec: StructureSpec,
): Promise<MarkerAuditEntry[]> => {
  const entries: MarkerAuditEntry[] = [];

  for (const [name, relativePath] of Object.entries(spec.markers)) {
    entries.push({
      name,
      relativePath,
      ok: await isFile(path.join(installRoot, relativePath)),
    });
  }

  return entries;
};
