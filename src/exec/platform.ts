/* src/exec/platform.ts
 * Platform predicates and OS/user/WSL introspection.
 * WSL is detected from WSL_DISTRO_NAME or a "microsoft" kernel release string.
 */
import os from 'node:os';

import fse from 'fs-extra';

import { type Coughed, type ExecHost, isCoughed } from './host';
import type { Shell } from './shell';

/** Platforms treated as Unix-like besides Linux and Cygwin. */
export const UNIX_LIKE: readonly NodeJS.Platform[] = [
  'aix',
  'android',
  'darwin',
  'freebsd',
  'haiku',
  'netbsd',
  'openbsd',
  'sunos',
];

/** Command string launching PowerShell, optionally for a script file. */
export const powershellCommand = (windowsLike: boolean, script?: string): string => {
  const exe = windowsLike ? 'powershell.exe' : 'pwsh';
  if (script === undefined) return `${exe} -Command`;
  const policy = windowsLike ? '-ExecutionPolicy ByPass ' : '';
  return `${exe} ${policy}-File ${script}`;
};

/**
 * Distribution name from `wsl --status` tokens (WSL 2), or undefined when
 * the output does not name one.
 */
export const parseWslStatus = (tokens: readonly string[]): string | undefined =>
  tokens[0] === 'Default' && tokens[1] === 'Distribution:' ? tokens[2] : undefined;

/** WSL 2 installed with no distribution: `wsl --status` prints usage. */
export const isWslWithoutDistribution = (tokens: readonly string[]): boolean =>
  tokens[0] === 'Copyright' && tokens[7] === 'Usage:';

/** True when `wsl --status` is not understood (WSL 1). */
export const isLegacyWslStatus = (tokens: readonly string[]): boolean =>
  tokens[1] === 'Invalid' && tokens[6] === 'Invalid';

/** Default distribution from `wslconfig /l` tokens. */
export const parseWslConfigList = (
  tokens: readonly string[],
): string | undefined =>
  tokens[2] === 'Subsystem' && tokens[6] === '(Default)' ? tokens[5] : undefined;

export class Platform {
  constructor(
    private readonly host: ExecHost,
    private readonly shell: Shell,
  ) {}

  onLinux(): boolean {
    return this.host.platform === 'linux';
  }

  onWindows(): boolean {
    return this.host.platform === 'win32';
  }

  onCygwin(): boolean {
    return this.host.platform === 'cygwin';
  }

  likeUnix(): boolean {
    return this.onLinux() || this.onCygwin() || UNIX_LIKE.includes(this.host.platform);
  }

  /** Linux running under the Windows Subsystem for Linux. */
  async onWsl(): Promise<boolean> {
    if (!this.onLinux()) return false;
    if (this.host.text('wslEnv')) return true;

    let pn: string | undefined;
    for (const name of ['pnRelease', 'pnVersion']) {
      const candidate = this.host.text(name);
      if (candidate && (await fse.pathExists(candidate))) {
        pn = candidate;
        break;
      }
    }
    if (!pn) {
      this.host.cough(`unable to determine platform [${this.host.platform}]`);
      return false;
    }
    let body: string;
    try {
      body = await fse.readFile(pn, 'utf8');
    } catch (e) {
      this.host.cough(`open(${pn}) failed`, e);
      return false;
    }
    const wsl = /microsoft/i.test(body);
    this.host.log.trace(`pn [${pn}] wsl [${wsl ? 1 : 0}]`);
    return wsl;
  }

  /** Windows, Cygwin or WSL. */
  async likeWindows(): Promise<boolean> {
    if (this.onWindows() || this.onCygwin()) return true;
    return this.onWsl();
  }

  async powershell(script?: string): Promise<string> {
    const cmd = powershellCommand(await this.likeWindows(), script);
    this.host.log.debug(`cmd [${cmd}]`);
    return cmd;
  }

  /**
   * OS version tokens: the WSL distro from the environment when set,
   * otherwise the output of the version command (or the issue file on WSL).
   */
  async osVersion(): Promise<string[]> {
    const wslEnv = this.host.text('wslEnv');
    if (wslEnv) {
      this.host.log.info('retrieving WSL distro from environment');
      return [wslEnv];
    }
    const cmd = (await this.onWsl())
      ? `cat ${this.host.text('pnIssue')}`
      : this.host.text('cmdOsVersion');
    this.host.log.info(`retrieving OS version via [${cmd}]`);
    const out = await this.shell.c2t(cmd);
    const lines = isCoughed(out) || out.length === 0 ? [''] : out;
    if (this.onWindows()) lines.shift();
    return lines;
  }

  async whoami(): Promise<string | undefined> {
    if (this.onWindows()) return this.winuser();
    const name = os.userInfo().username;
    this.host.log.debug(`whoami [${name}]`);
    return name;
  }

  /** Current Windows user via PowerShell (Windows-like platforms only). */
  async winuser(): Promise<string | undefined> {
    if (!(await this.likeWindows())) return undefined;
    const cmd = `${await this.powershell()} '$env:UserName'`;
    const result = await this.shell.c2t(cmd);
    if (isCoughed(result) || result.length === 0) {
      this.host.log.warn(`[${cmd}] produced no result`);
      return undefined;
    }
    return result[0];
  }

  /** WSL distribution name, when one can be determined. */
  async wslDist(): Promise<string | undefined> {
    if (!(await this.likeWindows())) {
      this.host.log.warn('WSL not applicable to this platform');
      return undefined;
    }
    if (await this.onWsl()) {
      const [dist] = await this.osVersion();
      this.host.attrs.set('wslActive', 1);
      if (dist) return dist;
    }

    const status = await this.tokens('wsl --status');
    const dist = parseWslStatus(status);
    if (dist) {
      if (this.host.echo) this.host.log.info(`WSL distro is [${dist}]`);
      this.host.attrs.set('wslActive', 1);
      return dist;
    }
    if (isWslWithoutDistribution(status)) {
      if (this.host.echo) this.host.log.info('WSL available but no distribution');
    } else if (isLegacyWslStatus(status)) {
      if (this.host.echo) this.host.log.info('trying alternative WSL method');
      const legacy = parseWslConfigList(await this.tokens('wslconfig /l'));
      if (legacy) {
        this.host.attrs.set('wslActive', 1);
        return legacy;
      }
    }
    if (this.host.echo)
      this.host.log.info('WSL distribution unable to be determined');
    return undefined;
  }

  private async tokens(cmd: string): Promise<string[]> {
    const out: string[] | Coughed = await this.shell.c2t(cmd);
    return isCoughed(out) ? [] : out;
  }
}
