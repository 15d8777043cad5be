/** Shared Commander helpers for the bexec CLI. */
import type { Command } from 'commander';

const isStringArray = (v: unknown): v is readonly string[] =>
  Array.isArray(v) && v.every((t) => typeof t === 'string');

/** Normalize argv from unit tests like ["node","bexec", ...] -> [...] */
export const normalizeArgv = (
  argv?: readonly string[],
): readonly string[] | undefined => {
  if (!isStringArray(argv)) return undefined;
  if (argv.length >= 2 && argv[0] === 'node' && argv[1] === 'bexec') {
    return argv.slice(2);
  }
  return argv;
};

/** Patch parseAsync() to normalize argv before Commander parses. */
export const patchParseAsync = (cli: Command): void => {
  const original = cli.parseAsync.bind(cli);
  cli.parseAsync = async (argv, opts) => {
    const normalized = normalizeArgv(argv);
    // argv given: user args; none: process.argv.
    await original(normalized, normalized === undefined ? opts : { from: 'user' });
    return cli;
  };
};

/**
 * Throw CommanderError instead of calling process.exit(); runCli maps it to
 * an exit code. Subcommands registered afterwards inherit the override.
 */
export const installExitOverride = (cmd: Command): void => {
  cmd.exitOverride();
};

export function applyCliSafety(cmd: Command): void {
  installExitOverride(cmd);
  patchParseAsync(cmd);
}
