/* src/exec/shell.ts
 * Shell invocation: run a command through the platform shell and return its
 * stdout as lines or whitespace tokens. Empty output and timeouts cough.
 */
import { spawn } from 'node:child_process';

import treeKill from 'tree-kill';

import { BatchSyntaxError } from '@/errors';
import { crlf, stripNul } from '@/util/text';

import type { Coughed, ExecHost } from './host';

export type CaptureResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
};

export type ShellOptions = {
  /** Drop empty lines (c2l only). */
  strip?: boolean;
  /** Kill the process tree after this many milliseconds. */
  timeoutMs?: number;
};

/** Run cmd through the shell, collecting stdout/stderr. */
export const capture = (
  cmd: string,
  timeoutMs?: number,
): Promise<CaptureResult> =>
  new Promise<CaptureResult>((resolveP, rejectP) => {
    const child = spawn(cmd, { shell: true, windowsHide: true });
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    if (typeof timeoutMs === 'number' && timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        if (typeof child.pid === 'number') treeKill(child.pid, 'SIGKILL');
      }, timeoutMs);
    }
    child.stdout.on('data', (d: Buffer) => {
      stdout += d.toString('utf8');
    });
    child.stderr.on('data', (d: Buffer) => {
      stderr += d.toString('utf8');
    });
    child.on('error', (e) => {
      if (timer) clearTimeout(timer);
      rejectP(e);
    });
    child.on('close', (code) => {
      if (timer) clearTimeout(timer);
      resolveP({ stdout, stderr, exitCode: code ?? 0, timedOut });
    });
  });

/** Split command output into lines (CR and NUL removed, final newline dropped). */
export const toLines = (output: string, strip = false): string[] => {
  const lines = stripNul(output).split('\n').map(crlf);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return strip ? lines.filter((l) => l.length > 0) : lines;
};

/** Split command output into whitespace-delimited tokens. */
export const toTokens = (output: string): string[] =>
  stripNul(output)
    .split(/\s+/)
    .filter((t) => t.length > 0);

export class Shell {
  constructor(private readonly host: ExecHost) {}

  private async run(cmd: string, timeoutMs?: number): Promise<string | Coughed> {
    if (!cmd) throw new BatchSyntaxError('c2l(COMMAND)');
    const { log, echo } = this.host;
    if (echo) log.info(`executing [${cmd}]`);

    let result: CaptureResult;
    try {
      result = await capture(cmd, timeoutMs);
    } catch (e) {
      return this.host.cough(`unable to execute [${cmd}]: ${String(e)}`, e);
    }
    if (result.timedOut)
      return this.host.cough(`command timed out after ${timeoutMs}ms [${cmd}]`);
    if (result.stderr) log.debug(`stderr [${result.stderr.trimEnd()}]`);
    if (result.exitCode !== 0)
      log.debug(`command exited ${result.exitCode} [${cmd}]`);
    if (stripNul(result.stdout).length === 0)
      return this.host.cough('command returned no output');
    return result.stdout;
  }

  /** Command output as lines; `strip` drops blank lines. */
  async c2l(cmd: string, opts: ShellOptions = {}): Promise<string[] | Coughed> {
    const out = await this.run(cmd, opts.timeoutMs);
    if (typeof out !== 'string') return out;

    const all = toLines(out);
    const lines = opts.strip ? toLines(out, true) : all;
    const { log, echo } = this.host;
    if (echo) log.info(`command returned ${all.length} lines`);
    if (echo && lines.length < all.length)
      log.info(`stripped ${all.length - lines.length} lines`);
    log.debug(`output [${lines.join(', ')}]`);
    return lines;
  }

  /** Command output as whitespace-delimited tokens. */
  async c2t(cmd: string, opts: Omit<ShellOptions, 'strip'> = {}): Promise<string[] | Coughed> {
    const out = await this.run(cmd, opts.timeoutMs);
    if (typeof out !== 'string') return out;

    const tokens = toTokens(out);
    if (tokens.length > 0 && this.host.echo)
      this.host.log.info(`command returned ${tokens.length} tokens`);
    this.host.log.debug(`output [${tokens.join(', ')}]`);
    return tokens;
  }

  /** Locate an executable on the search path (which/where). */
  where(exe: string): Promise<string[] | Coughed> {
    return this.c2l(`${this.host.text('cmdOsWhere')} ${exe}`, { strip: true });
  }
}
