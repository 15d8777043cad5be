/* src/config/load.ts
 * Locate batch.config.* (walking up from cwd), parse it and validate the
 * "batch-exec" node. A missing file or node yields empty settings.
 */
import { existsSync, readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { ZodError } from 'zod';

import { parseConfigText } from './parse';
import {
  type BatchConfig,
  batchConfigSchema,
  type BatchSettings,
  CONFIG_KEY,
} from './schema';

export const CONFIG_FILES = [
  'batch.config.yml',
  'batch.config.yaml',
  'batch.config.json',
] as const;

export type LoadedConfig = {
  /** Absolute path of the file read, or null when none was found. */
  path: string | null;
  settings: BatchSettings;
  lov: BatchConfig['lov'];
};

const EMPTY: LoadedConfig = { path: null, settings: {}, lov: {} };

/** Nearest batch.config.* at or above cwd. */
export const findConfigPathSync = (cwd: string): string | null => {
  let dir = path.resolve(cwd);
  for (;;) {
    for (const name of CONFIG_FILES) {
      const candidate = path.join(dir, name);
      if (existsSync(candidate)) return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
};

const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n')
    : String(e);

const toLoaded = (cfgPath: string, text: string): LoadedConfig => {
  const rel = cfgPath.replace(/\\/g, '/');
  let node: unknown;
  try {
    const root = parseConfigText(cfgPath, text);
    node =
      root && typeof root === 'object' && CONFIG_KEY in root
        ? root[CONFIG_KEY]
        : undefined;
  } catch (e) {
    throw new Error(`batch-exec: unable to parse ${rel}\n${String(e)}`, {
      cause: e,
    });
  }
  if (node === undefined || node === null) return { ...EMPTY, path: cfgPath };

  try {
    const { lov, ...settings } = batchConfigSchema.parse(node);
    return { path: cfgPath, settings, lov };
  } catch (e) {
    throw new Error(`batch-exec: invalid config in ${rel}\n${formatZodError(e)}`, {
      cause: e,
    });
  }
};

export const loadConfig = async (cwd: string): Promise<LoadedConfig> => {
  const cfgPath = findConfigPathSync(cwd);
  if (!cfgPath) return { ...EMPTY };
  return toLoaded(cfgPath, await readFile(cfgPath, 'utf8'));
};

/** Synchronous variant for CLI construction. */
export const loadConfigSync = (cwd: string): LoadedConfig => {
  const cfgPath = findConfigPathSync(cwd);
  if (!cfgPath) return { ...EMPTY };
  return toLoaded(cfgPath, readFileSync(cfgPath, 'utf8'));
};
