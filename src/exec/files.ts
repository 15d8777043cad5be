/* src/exec/files.ts
 * Fail-safe directory and file handling. Every failure is routed through the
 * host's cough, so callers get either an escalation or the -1 sentinel.
 */
import { constants } from 'node:fs';

import fse from 'fs-extra';

import { BatchSyntaxError } from '@/errors';

import { type Coughed, type ExecHost, isCoughed } from './host';

export type EntryType = 'd' | 'e' | 'f';

const ENTRY_TYPES: readonly EntryType[] = ['d', 'e', 'f'];

const isDir = async (p: string): Promise<boolean> => {
  try {
    return (await fse.stat(p)).isDirectory();
  } catch {
    return false;
  }
};

const isFile = async (p: string): Promise<boolean> => {
  try {
    return (await fse.stat(p)).isFile();
  } catch {
    return false;
  }
};

const canAccess = async (p: string, mode: number): Promise<boolean> => {
  try {
    await fse.access(p, mode);
    return true;
  } catch {
    return false;
  }
};

const WHO_SHIFT: Record<string, number> = { u: 6, g: 3, o: 0 };

/**
 * Apply a symbolic mode ("a+x", "u+w", "go=r", comma-separated clauses) to
 * an existing mode. Omitted "who" means all.
 */
export const applySymbolicMode = (mode: number, spec: string): number => {
  let out = mode & 0o7777;
  for (const clause of spec.split(',')) {
    const m = /^([ugoa]*)([+\-=])([rwx]*)$/.exec(clause);
    if (!m) throw new BatchSyntaxError(`chmod(PERMS) invalid mode [${spec}]`);
    const [, whoRaw, op, permRaw] = m;
    const who = !whoRaw || whoRaw.includes('a') ? 'ugo' : whoRaw;
    const perm =
      (permRaw.includes('r') ? 4 : 0) |
      (permRaw.includes('w') ? 2 : 0) |
      (permRaw.includes('x') ? 1 : 0);
    let mask = 0;
    let bits = 0;
    for (const w of who) {
      const shift = WHO_SHIFT[w] ?? 0;
      mask |= 7 << shift;
      bits |= perm << shift;
    }
    if (op === '+') out |= bits;
    else if (op === '-') out &= ~bits;
    else out = (out & ~mask) | bits;
  }
  return out;
};

/** Resolve octal (number or "755") or symbolic permissions against a mode. */
export const resolveMode = (perms: number | string, current: number): number => {
  if (typeof perms === 'number') return perms;
  if (/^[0-7]{3,4}$/.test(perms)) return parseInt(perms, 8);
  return applySymbolicMode(current, perms);
};

export class Files {
  constructor(
    private readonly host: ExecHost,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Apply permissions to each path.
   *
   * @returns Number of paths changed; missing and failed paths are warned about.
   */
  async chmod(perms: number | string, ...paths: string[]): Promise<number> {
    if (paths.length === 0) throw new BatchSyntaxError('chmod(PERMS, PATH, ...)');
    if (typeof perms === 'string') resolveMode(perms, 0); // validate up front

    const dne: string[] = [];
    const fail: string[] = [];
    let count = 0;
    for (const p of paths) {
      if (!(await fse.pathExists(p))) {
        dne.push(p);
        continue;
      }
      try {
        await fse.chmod(p, resolveMode(perms, (await fse.stat(p)).mode));
        count++;
      } catch (e) {
        this.host.log.debug(`chmod(${String(perms)}) on [${p}]: ${String(e)}`);
        fail.push(p);
      }
    }
    if (dne.length)
      this.host.log.warn(`pathname(s) do not exist: ${dne.join(', ')}`);
    if (fail.length)
      this.host.log.warn(
        `chmod(${String(perms)}) failed on the following path(s): ${fail.join(', ')}`,
      );
    return count;
  }

  /** Enable all executable bits. */
  mkexec(...paths: string[]): Promise<number> {
    return this.chmod('a+x', ...paths);
  }

  /** Disable all writable bits. */
  mkro(...paths: string[]): Promise<number> {
    return this.chmod('a-w', ...paths);
  }

  /** Enable the user writable bit. */
  mkwrite(...paths: string[]): Promise<number> {
    return this.chmod('u+w', ...paths);
  }

  /** Create a directory (and parents) unless it exists. */
  async mkdir(dn: string): Promise<0 | Coughed> {
    if (await isDir(dn)) return 0;
    this.host.log.info(`creating directory [${dn}]`);
    try {
      await fse.ensureDir(dn);
    } catch (e) {
      return this.host.cough(`mkpath(${dn}) failed`, e);
    }
    if (!(await isDir(dn)))
      return this.host.cough(`could not create directory [${dn}]`);
    return 0;
  }

  /** Remove a directory tree. */
  async rmdir(dn: string): Promise<0 | Coughed> {
    if (!(await isDir(dn)))
      return this.host.cough(`directory does not exist [${dn}]`);
    if (this.host.echo) this.host.log.info(`pruning directory [${dn}]`);
    try {
      await fse.remove(dn);
    } catch (e) {
      return this.host.cough(`remove_tree(${dn}) failed`, e);
    }
    if (await isDir(dn))
      return this.host.cough(`could not prune directory [${dn}]`);
    return 0;
  }

  /** Remove files and directories; paths that do not exist are ignored. */
  async remove(...paths: string[]): Promise<0 | Coughed> {
    if (paths.length === 0) throw new BatchSyntaxError('remove(PATH, ...)');
    let fail = 0;
    for (const pn of paths) {
      if (await isDir(pn)) {
        if (isCoughed(await this.rmdir(pn))) fail++;
      } else if (await isFile(pn)) {
        if (this.host.echo) this.host.log.info(`removing file [${pn}]`);
        try {
          await fse.remove(pn);
        } catch (e) {
          this.host.cough(`unlink(${pn}) failed`, e);
        }
        if (await isFile(pn)) {
          this.host.cough(`could not remove file [${pn}]`);
          fail++;
        }
      }
    }
    if (fail) return this.host.cough(`${fail} files could not be removed`);
    return 0;
  }

  /**
   * True when the path exists as the given type ('d' directory, 'f' file,
   * 'e' anything); otherwise coughs and returns false.
   */
  async extant(pn: string, type: EntryType = 'd'): Promise<boolean> {
    if (!ENTRY_TYPES.includes(type)) {
      this.host.cough(`invalid type [${String(type)}]`);
      return false;
    }
    const ok =
      type === 'd'
        ? await isDir(pn)
        : type === 'f'
          ? await isFile(pn)
          : await fse.pathExists(pn);
    if (ok) return true;
    this.host.cough(`does not exist [${pn}]`);
    return false;
  }

  /** Readable and executable (searchable, for directories). */
  async isRx(pn: string, type: EntryType = 'd'): Promise<boolean> {
    return (
      (await this.extant(pn, type)) &&
      (await canAccess(pn, constants.R_OK | constants.X_OK))
    );
  }

  async isRwx(pn: string, type: EntryType = 'd'): Promise<boolean> {
    return (await this.isRx(pn, type)) && (await canAccess(pn, constants.W_OK));
  }

  async ckdir(dn: string): Promise<0 | Coughed> {
    if (await this.isRx(dn)) return 0;
    return this.host.cough(`directory [${dn}] not accessible`);
  }

  /** Change directory (default: the starting directory). */
  async godir(dn: string = this.host.text('dnStart')): Promise<0 | Coughed> {
    if (!(await this.isRx(dn))) return this.host.cough(`invalid directory [${dn}]`);
    try {
      process.chdir(dn);
    } catch (e) {
      return this.host.cough(`chdir(${dn}) failed`, e);
    }
    this.pwd();
    return 0;
  }

  pwd(): string {
    const cwd = process.cwd();
    this.host.log.info(`now in directory [${cwd}]`);
    return cwd;
  }

  /**
   * Write the automatic header (two leader-prefixed lines) when the
   * autoheader attribute is on.
   *
   * @returns Whether a header was written.
   */
  header(out: { write: (chunk: string) => unknown }): boolean {
    if (this.host.attrs.get('autoheader') !== 1) {
      if (this.host.echo) this.host.log.info('skipping automatic header');
      return false;
    }
    const leader = this.host.text('leader');
    out.write(
      `${leader} ---- automatically generated by ${this.host.text('program')} ----\n`,
    );
    out.write(`${leader} ---- timestamp ${this.now().toString()} ---- \n`);
    return true;
  }

  /**
   * 1 when fd is a standard descriptor (<= stdfd), 0 when not,
   * -1 when it cannot be determined.
   */
  isStdio(fd: number | undefined): -1 | 0 | 1 {
    if (typeof fd !== 'number') return -1;
    this.host.log.trace(`fileno [${fd}]`);
    const stdfd = this.host.attrs.get('stdfd');
    return fd > (typeof stdfd === 'number' ? stdfd : 2) ? 0 : 1;
  }
}
