/* src/cli/index.ts
 * Root CLI factory for "bexec": inspect attributes, list LoV classes,
 * capture command output and report platform facts.
 */
import {
  Command,
  CommanderError,
  InvalidArgumentError,
  Option,
} from 'commander';

import { FatalError } from '@/errors';
import { createExecutiveSync } from '@/exec/create';
import type { BatchExecutive } from '@/exec/executive';
import { isCoughed } from '@/exec/host';
import { paint } from '@/util/color';
import { tabulate } from '@/util/tabulate';

import { applyCliSafety } from './cli-utils';

type RootOptions = { debug?: boolean; boring?: boolean; keepGoing?: boolean };
type AttrsOptions = { verbose?: boolean };
type ExecOptions = { tokens?: boolean; strip?: boolean; timeout?: number };

const executive = (cmd: Command): BatchExecutive => {
  const { keepGoing } = cmd.optsWithGlobals<RootOptions>();
  return createExecutiveSync({
    attributes: keepGoing ? { fatal: 0 } : undefined,
  });
};

const print = (lines: readonly string[]): void => {
  for (const line of lines) console.log(line);
};

const parseTimeout = (raw: string): number => {
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0)
    throw new InvalidArgumentError('expected a positive integer');
  return n;
};

const registerAttrs = (cli: Command): void => {
  cli
    .command('attrs')
    .description('list the executive attributes')
    .option('-v, --verbose', 'log the full attribute table')
    .action((opts: AttrsOptions, cmd: Command) => {
      const ex = executive(cmd);
      const names = ex.attributes(Boolean(opts.verbose));
      if (!opts.verbose) print(names.map((n) => `${paint('heading', n)} ${ex.text(n)}`));
    });
};

const registerLov = (cli: Command): void => {
  cli
    .command('lov')
    .description('list LoV classes, or the values of one class')
    .argument('[class]', 'LoV class name')
    .action((lovClass: string | undefined, _opts: unknown, cmd: Command) => {
      const ex = executive(cmd);
      if (lovClass === undefined) {
        print(ex.lov.classes());
        return;
      }
      const entries = ex.guard(() => ex.lov.entries(lovClass));
      if (isCoughed(entries)) return;
      print(
        tabulate(
          entries.map(([key, description]) => ({ key, description })),
          { sort: 'key', maxlen: ex.maxlen },
        ),
      );
    });
};

const registerExec = (cli: Command): void => {
  cli
    .command('exec')
    .description('run a command and print its captured output')
    .argument('<command...>', 'command and arguments')
    .option('-t, --tokens', 'print whitespace-delimited tokens')
    .option('-s, --strip', 'drop blank lines')
    .addOption(
      new Option('--timeout <ms>', 'kill the command after <ms>').argParser(
        parseTimeout,
      ),
    )
    .action(async (words: string[], opts: ExecOptions, cmd: Command) => {
      const ex = executive(cmd);
      const timeoutMs = opts.timeout;
      const line = words.join(' ');
      const out = opts.tokens
        ? await ex.shell.c2t(line, { timeoutMs })
        : await ex.shell.c2l(line, { strip: Boolean(opts.strip), timeoutMs });
      if (isCoughed(out)) return;
      print(out);
    });
};

const registerOs = (cli: Command): void => {
  cli
    .command('os')
    .description('report platform, OS version and user')
    .action(async (_opts: unknown, cmd: Command) => {
      const ex = executive(cmd);
      const likeWindows = await ex.os.likeWindows();
      const rows: Array<{ name: string; value: unknown }> = [
        { name: 'platform', value: ex.platform },
        { name: 'likeUnix', value: ex.os.likeUnix() ? 1 : 0 },
        { name: 'likeWindows', value: likeWindows ? 1 : 0 },
        { name: 'osVersion', value: (await ex.os.osVersion()).join(' ') },
        { name: 'user', value: await ex.os.whoami() },
      ];
      if (likeWindows) rows.push({ name: 'wslDist', value: await ex.os.wslDist() });
      print(tabulate(rows, { sort: 'name', maxlen: ex.maxlen }));
    });
};

export const makeCli = (): Command => {
  const cli = new Command();
  cli
    .name('bexec')
    .description('Batch executive: attributes, lists of values and command capture')
    .option('-d, --debug', 'enable debug logging')
    .option('-b, --boring', 'disable colorized output')
    .option('-k, --keep-going', 'warn instead of failing on errors')
    .hook('preAction', (thisCommand) => {
      const { debug, boring } = thisCommand.opts<RootOptions>();
      if (debug) process.env.BATCH_DEBUG = '1';
      if (boring) {
        process.env.BATCH_BORING = '1';
        process.env.FORCE_COLOR = '0';
        process.env.NO_COLOR = '1';
      }
    });

  // Before subcommands so they inherit the exit override.
  applyCliSafety(cli);

  registerAttrs(cli);
  registerLov(cli);
  registerExec(cli);
  registerOs(cli);
  return cli;
};

/**
 * Parse and run; resolves to the process exit code. FatalError has already
 * been logged by the executive.
 */
export const runCli = async (argv?: readonly string[]): Promise<number> => {
  try {
    await makeCli().parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    if (e instanceof FatalError) return 1;
    console.error(
      paint('error', `bexec: ${e instanceof Error ? e.message : String(e)}`),
    );
    return 1;
  }
};
