/* src/exec/executive.ts
 * The batch executive: configuration lives in an AttributeRegistry, values
 * are validated against an injected LovRegistry, and every failure is routed
 * through cough() according to the "fatal" attribute.
 */
import path from 'node:path';

import { AttributeRegistry } from '@/attribute/registry';
import { ALL, type AttributeTarget } from '@/attribute/types';
import { clone, type ClonePolicy, inherit } from '@/clone/engine';
import { BatchSyntaxError, FatalError, isBatchError } from '@/errors';
import { createLogger, type Logger } from '@/log/logger';
import { LovRegistry, sharedLovRegistry } from '@/lov/registry';
import { tabulate } from '@/util/tabulate';
import { crlf, trim, trunc } from '@/util/text';

import { Files } from './files';
import { COUGHED, type Coughed, type ExecHost } from './host';
import { Platform } from './platform';
import { Shell } from './shell';

export const PN_OS_ISSUE = '/etc/issue';
export const PN_OS_RELEASE = '/proc/version';
export const PN_OS_VERSION = '/proc/sys/kernel/osrelease';
export const RE_WHITESPACE = '\\s+';
export const FD_MAX = 2;
export const MAXLEN = 30;

export type ExecutiveOptions = {
  logger?: Logger;
  /** LoV registry to share; defaults to the application-wide instance. */
  lov?: LovRegistry;
  /** Attribute overrides, applied as both value and default. */
  attributes?: Record<string, unknown>;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  /** Starting directory (default: process.cwd()). */
  cwd?: string;
  /** Path of the running program (default: process.argv[1]). */
  program?: string;
};

export class BatchExecutive implements ExecHost {
  readonly attrs: AttributeRegistry;
  readonly lov: LovRegistry;
  readonly platform: NodeJS.Platform;
  readonly env: NodeJS.ProcessEnv;
  readonly shell: Shell;
  readonly files: Files;
  readonly os: Platform;
  private readonly logger: Logger;

  constructor(opts: ExecutiveOptions = {}) {
    this.logger = opts.logger ?? createLogger();
    this.lov = opts.lov ?? sharedLovRegistry();
    this.platform = opts.platform ?? process.platform;
    this.env = opts.env ?? process.env;
    this.attrs = new AttributeRegistry({
      owner: new.target.name,
      logger: this.logger,
    });

    const program = opts.program ?? process.argv[1] ?? 'batch-exec';
    const windows = this.platform === 'win32';
    const a = this.attrs;
    a.define('log', 'handle', this.logger);
    a.define('leader', 'any', '#');
    a.define('autoheader', 'bool', 0, 0);
    a.define('cmdOsVersion', 'any', windows ? 'ver' : 'uname');
    a.define('cmdOsWhere', 'any', windows ? 'where' : 'which');
    a.define('dnStart', 'any', opts.cwd ?? process.cwd());
    a.define('echo', 'bool', 0, 0);
    a.define('fatal', 'bool', 1, 1);
    a.define('maxlen', 'any', MAXLEN);
    a.define('prefix', 'any', path.basename(program).replace(/\..*$/, ''));
    a.define('pnIssue', 'any', PN_OS_ISSUE);
    a.define('pnRelease', 'any', PN_OS_RELEASE);
    a.define('pnVersion', 'any', PN_OS_VERSION);
    a.define('reWhitespace', 'any', RE_WHITESPACE);
    a.define('stdfd', 'any', FD_MAX);
    a.define('program', 'any', path.basename(program));
    a.define('wslActive', 'bool', 0, 0);
    a.define('wslEnv', 'any', this.env.WSL_DISTRO_NAME);

    a.sync(ALL);
    a.ro('log');

    for (const [name, value] of Object.entries(opts.attributes ?? {})) {
      if (value === undefined)
        throw new BatchSyntaxError(`new({ ${name} }) value not specified`);
      this.logger.debug(`attribute [${name}] = [${String(value)}]`);
      a.set(name, value, value);
    }
    a.capture();

    this.shell = new Shell(this);
    this.files = new Files(this);
    this.os = new Platform(this, this.shell);
  }

  get log(): Logger {
    return this.logger;
  }

  get echo(): boolean {
    return this.attrs.get('echo') === 1;
  }

  get fatal(): boolean {
    return this.attrs.get('fatal') === 1;
  }

  get maxlen(): number {
    const v = this.attrs.get('maxlen');
    return typeof v === 'number' && v > 3 ? v : MAXLEN;
  }

  text(name: string): string {
    const v = this.attrs.get(name);
    return v === undefined || v === null ? '' : String(v);
  }

  /**
   * The central failure policy. Fatal: log and throw FatalError.
   * Otherwise: log a warning and return -1.
   */
  cough(msg: string, cause?: unknown): Coughed {
    if (this.fatal) {
      this.logger.error(`FATAL ${msg}`);
      throw new FatalError(msg, cause);
    }
    this.logger.warn(`WARNING ${msg}`);
    return COUGHED;
  }

  /**
   * Run a registry operation under the fatal policy: BatchErrors cough,
   * anything else propagates.
   */
  guard<T>(fn: () => T): T | Coughed {
    try {
      return fn();
    } catch (e) {
      if (isBatchError(e) && !(e instanceof FatalError))
        return this.cough(e.message, e);
      throw e;
    }
  }

  has(name: string): boolean {
    return this.attrs.has(name);
  }

  /** Sorted public attribute names; `verbose` also logs the descriptor table. */
  attributes(verbose = false): string[] {
    const names = this.attrs.list(verbose, this.maxlen);
    if (this.echo)
      this.logger.info(`am [${this.attrs.owner}] have [${names.join(', ')}]`);
    return names;
  }

  /** Copy the inheritable attributes of another executive. */
  inherit(source: BatchExecutive | AttributeTarget): number {
    return inherit(this.attrs, toTarget(source), this.logger);
  }

  /** Copy all public attributes of another executive under a policy. */
  clone(source: BatchExecutive | AttributeTarget, policy: ClonePolicy = 'normal'): number {
    return clone(this.attrs, toTarget(source), policy, this.logger);
  }

  /** Log records as a table; returns the record count. */
  tabulate(records: ReadonlyArray<Record<string, unknown>>, sort = 'name'): number {
    for (const line of tabulate(records, { sort, maxlen: this.maxlen }))
      this.logger.info(line);
    return records.length;
  }

  crlf(s: string): string {
    const out = crlf(s);
    if (out.length !== s.length) this.logger.trace(`string truncated [${out}]`);
    return out;
  }

  trim(s: string, re: string | RegExp): string {
    return trim(s, re);
  }

  /** Trim the reWhitespace pattern from both ends. */
  trimWs(s: string): string {
    return trim(s, this.text('reWhitespace'));
  }

  trunc(s: string, max: number = this.maxlen): string {
    return trunc(s, max);
  }
}

const toTarget = (source: BatchExecutive | AttributeTarget): AttributeTarget =>
  source instanceof BatchExecutive ? source.attrs : source;
