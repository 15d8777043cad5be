/* src/exec/create.ts
 * Build an executive from batch.config.* : register configured LoV classes
 * into the (shared) registry and apply settings as attribute defaults.
 */
import type { BatchSettings } from '@/config/schema';
import { type LoadedConfig, loadConfig, loadConfigSync } from '@/config/load';
import { createLogger } from '@/log/logger';
import { sharedLovRegistry } from '@/lov/registry';

import { BatchExecutive, type ExecutiveOptions } from './executive';

/** `cwd` is both the starting directory and where batch.config.* is searched from. */
export type CreateExecutiveOptions = ExecutiveOptions;

const bit = (v: boolean | undefined): 0 | 1 | undefined =>
  v === undefined ? undefined : v ? 1 : 0;

/** Attribute overrides derived from config settings (unset keys omitted). */
export const settingsToAttributes = (
  settings: BatchSettings,
): Record<string, unknown> => {
  const out: Record<string, unknown> = {
    fatal: bit(settings.fatal),
    echo: bit(settings.echo),
    autoheader: bit(settings.autoheader),
    leader: settings.leader,
    maxlen: settings.maxlen,
  };
  for (const key of Object.keys(out)) if (out[key] === undefined) delete out[key];
  return out;
};

export const executiveFromConfig = (
  config: LoadedConfig,
  opts: CreateExecutiveOptions = {},
): BatchExecutive => {
  const logger = opts.logger ?? createLogger({ level: config.settings.logLevel });
  const lov = opts.lov ?? sharedLovRegistry();
  for (const [lovClass, mapping] of Object.entries(config.lov))
    lov.register(lovClass, mapping);

  return new BatchExecutive({
    ...opts,
    logger,
    lov,
    attributes: { ...settingsToAttributes(config.settings), ...opts.attributes },
  });
};

export const createExecutive = async (
  opts: CreateExecutiveOptions = {},
): Promise<BatchExecutive> =>
  executiveFromConfig(await loadConfig(opts.cwd ?? process.cwd()), opts);

export const createExecutiveSync = (
  opts: CreateExecutiveOptions = {},
): BatchExecutive =>
  executiveFromConfig(loadConfigSync(opts.cwd ?? process.cwd()), opts);
