import { describe, expect, it } from 'vitest';

import {
  BatchSyntaxError,
  FatalError,
  ReadOnlyViolationError,
} from '@/errors';
import { LovRegistry } from '@/lov/registry';
import { recordingLogger } from '@/test/logger';

import { BatchExecutive, type ExecutiveOptions } from './executive';
import { COUGHED } from './host';

const make = (opts: ExecutiveOptions = {}) => {
  const rec = recordingLogger();
  const ex = new BatchExecutive({
    logger: rec.logger,
    lov: new LovRegistry({ logger: rec.logger }),
    platform: 'linux',
    env: {},
    cwd: '/work',
    program: '/usr/local/bin/nightly.job',
    ...opts,
  });
  return { ex, rec };
};

const PUBLIC = [
  'autoheader',
  'cmdOsVersion',
  'cmdOsWhere',
  'dnStart',
  'echo',
  'fatal',
  'leader',
  'log',
  'maxlen',
  'pnIssue',
  'pnRelease',
  'pnVersion',
  'prefix',
  'program',
  'reWhitespace',
  'stdfd',
  'wslActive',
  'wslEnv',
];

describe('BatchExecutive construction', () => {
  it('defines the standard attributes', () => {
    const { ex } = make();
    expect(ex.attributes()).toEqual(PUBLIC);
    expect(ex.attrs.get('leader')).toBe('#');
    expect(ex.attrs.get('cmdOsWhere')).toBe('which');
    expect(ex.attrs.get('dnStart')).toBe('/work');
    expect(ex.attrs.get('prefix')).toBe('nightly');
    expect(ex.attrs.get('program')).toBe('nightly.job');
    expect(ex.text('wslEnv')).toBe('');
    expect(ex.fatal).toBe(true);
    expect(ex.echo).toBe(false);
    expect(ex.maxlen).toBe(30);
  });

  it('uses Windows commands on win32', () => {
    const { ex } = make({ platform: 'win32' });
    expect(ex.attrs.get('cmdOsVersion')).toBe('ver');
    expect(ex.attrs.get('cmdOsWhere')).toBe('where');
  });

  it('applies overrides as value and default', () => {
    const { ex } = make({ attributes: { leader: '//', echo: true } });
    expect(ex.attrs.get('leader')).toBe('//');
    expect(ex.attrs.default('leader')).toBe('//');
    expect(ex.attrs.get('echo')).toBe(1);
  });

  it('rejects an override without a value', () => {
    expect(() => make({ attributes: { leader: undefined } })).toThrow(
      new BatchSyntaxError('new({ leader }) value not specified'),
    );
  });

  it('keeps the log handle read-only', () => {
    const { ex } = make();
    expect(() => ex.attrs.set('log', null)).toThrow(ReadOnlyViolationError);
  });

  it('records the subclass name as owner', () => {
    class NightlyJob extends BatchExecutive {}
    const ex = new NightlyJob({ logger: recordingLogger().logger, platform: 'linux' });
    expect(ex.attrs.describe()[0]).toBe('NightlyJob');
    expect(ex.attrs.prop('leader', 'ownerClass')).toBe('NightlyJob');
  });

  it('announces its attributes when echo is on', () => {
    const { ex, rec } = make({ attributes: { echo: 1 } });
    ex.attributes();
    expect(rec.lines('info')).toEqual([`bexec: am [BatchExecutive] have [${PUBLIC.join(', ')}]`]);
  });
});

describe('BatchExecutive failure policy', () => {
  it('escalates under fatal', () => {
    const { ex, rec } = make();
    expect(() => ex.guard(() => ex.attrs.get('missing'))).toThrow(
      'FATAL attribute [missing] does not exist',
    );
    expect(() => ex.cough('disk full')).toThrow(FatalError);
    expect(rec.lines('error')).toEqual([
      'bexec: FATAL attribute [missing] does not exist',
      'bexec: FATAL disk full',
    ]);
  });

  it('warns and returns the sentinel otherwise', () => {
    const { ex, rec } = make({ attributes: { fatal: 0 } });
    expect(ex.guard(() => ex.attrs.get('missing'))).toBe(COUGHED);
    expect(ex.cough('disk full')).toBe(-1);
    expect(rec.lines('warn')).toEqual([
      'bexec: WARNING attribute [missing] does not exist',
      'bexec: WARNING disk full',
    ]);
  });

  it('passes results through and rethrows foreign errors', () => {
    const { ex } = make({ attributes: { fatal: 0 } });
    expect(ex.guard(() => 42)).toBe(42);
    expect(() =>
      ex.guard(() => {
        throw new TypeError('boom');
      }),
    ).toThrow(TypeError);
  });
});

describe('BatchExecutive copying', () => {
  it('clones and inherits from another executive', () => {
    const { ex: source } = make({ attributes: { leader: '//', maxlen: 50 } });
    const { ex: target } = make();
    expect(target.clone(source)).toBe(PUBLIC.length - 1);
    expect(target.attrs.get('leader')).toBe('//');
    expect(target.maxlen).toBe(50);

    const { ex: heir } = make();
    expect(heir.inherit(source)).toBe(PUBLIC.length - 1);
    expect(heir.attrs.get('leader')).toBe('//');
    expect(heir.log).not.toBe(source.log);
  });
});

describe('BatchExecutive text helpers', () => {
  it('trims, truncates and strips carriage returns', () => {
    const { ex } = make();
    expect(ex.trimWs('  padded \t')).toBe('padded');
    expect(ex.trim('--name--', '-+')).toBe('name');
    expect(ex.trunc('abcdefghij', 6)).toBe('abc...');
    expect(ex.trunc('x'.repeat(31))).toBe(`${'x'.repeat(27)}...`);
    expect(ex.crlf('line\r\n')).toBe('line\n');
  });

  it('logs a table and returns the record count', () => {
    const { ex, rec } = make();
    expect(ex.tabulate([{ name: 'b' }, { name: 'a' }])).toBe(2);
    expect(rec.lines('info').map((l) => l.trim().split(/\s+/))).toEqual([
      ['bexec:', 'name'],
      ['bexec:', 'a'],
      ['bexec:', 'b'],
    ]);
  });
});
