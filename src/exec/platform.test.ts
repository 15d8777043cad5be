import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import fse from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { LovRegistry } from '@/lov/registry';
import { fakeChild } from '@/test/fake-child';
import { recordingLogger } from '@/test/logger';

const mocks = vi.hoisted(() => ({ spawn: vi.fn() }));

vi.mock('node:child_process', () => ({ spawn: mocks.spawn }));

import { BatchExecutive } from './executive';
import {
  isLegacyWslStatus,
  isWslWithoutDistribution,
  parseWslConfigList,
  parseWslStatus,
  powershellCommand,
} from './platform';

const make = (
  platform: NodeJS.Platform,
  opts: { env?: NodeJS.ProcessEnv; attributes?: Record<string, unknown> } = {},
) => {
  const rec = recordingLogger();
  const ex = new BatchExecutive({
    logger: rec.logger,
    lov: new LovRegistry({ logger: rec.logger }),
    platform,
    env: opts.env ?? {},
    attributes: { fatal: 0, ...opts.attributes },
  });
  return { ex, rec };
};

describe('platform parsers', () => {
  it('builds PowerShell command lines', () => {
    expect(powershellCommand(true)).toBe('powershell.exe -Command');
    expect(powershellCommand(false)).toBe('pwsh -Command');
    expect(powershellCommand(true, 'setup.ps1')).toBe(
      'powershell.exe -ExecutionPolicy ByPass -File setup.ps1',
    );
    expect(powershellCommand(false, 'setup.ps1')).toBe('pwsh -File setup.ps1');
  });

  it('reads the distribution from wsl --status', () => {
    expect(
      parseWslStatus(['Default', 'Distribution:', 'Ubuntu', 'Default', 'Version:', '2']),
    ).toBe('Ubuntu');
    expect(parseWslStatus(['Default', 'Version:', '2'])).toBeUndefined();
  });

  it('recognises the no-distribution and legacy outputs', () => {
    expect(
      isWslWithoutDistribution([
        'Copyright',
        '(c)',
        'Microsoft',
        'Corporation.',
        'All',
        'rights',
        'reserved.',
        'Usage:',
      ]),
    ).toBe(true);
    const legacy = ['', 'Invalid', 'command', 'line', 'option:', '--status', 'Invalid'];
    expect(isLegacyWslStatus(legacy)).toBe(true);
    expect(isLegacyWslStatus(['Default', 'Distribution:'])).toBe(false);
    expect(
      parseWslConfigList(['', '', 'Subsystem', 'for', 'Linux', 'Debian', '(Default)']),
    ).toBe('Debian');
    expect(parseWslConfigList(['Windows', 'Subsystem'])).toBeUndefined();
  });
});

describe('Platform predicates', () => {
  it('classifies platforms', () => {
    expect(make('linux').ex.os.likeUnix()).toBe(true);
    expect(make('darwin').ex.os.likeUnix()).toBe(true);
    expect(make('cygwin').ex.os.likeUnix()).toBe(true);
    expect(make('win32').ex.os.likeUnix()).toBe(false);
    expect(make('win32').ex.os.onWindows()).toBe(true);
  });

  it('treats Windows and Cygwin as Windows-like without probing WSL', async () => {
    expect(await make('win32').ex.os.likeWindows()).toBe(true);
    expect(await make('cygwin').ex.os.likeWindows()).toBe(true);
    expect(await make('darwin').ex.os.likeWindows()).toBe(false);
    expect(await make('darwin').ex.os.powershell('job.ps1')).toBe('pwsh -File job.ps1');
  });
});

describe('Platform WSL detection', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'bexec-platform-'));
    mocks.spawn.mockReset();
  });

  afterEach(async () => {
    await fse.remove(dir);
  });

  it('trusts WSL_DISTRO_NAME', async () => {
    const { ex } = make('linux', { env: { WSL_DISTRO_NAME: 'Ubuntu' } });
    expect(await ex.os.onWsl()).toBe(true);
    expect(await ex.os.osVersion()).toEqual(['Ubuntu']);
    expect(await ex.os.wslDist()).toBe('Ubuntu');
    expect(ex.attrs.get('wslActive')).toBe(1);
    expect(mocks.spawn).not.toHaveBeenCalled();
  });

  it('detects a Microsoft kernel release', async () => {
    const release = path.join(dir, 'version');
    await writeFile(release, 'Linux version 5.15.90.1-microsoft-standard-WSL2\n');
    const { ex } = make('linux', { attributes: { pnRelease: release } });
    expect(await ex.os.onWsl()).toBe(true);
    expect(await ex.os.powershell()).toBe('powershell.exe -Command');
  });

  it('reports plain Linux', async () => {
    const release = path.join(dir, 'version');
    await writeFile(release, 'Linux version 6.1.0-generic\n');
    const { ex, rec } = make('linux', { attributes: { pnRelease: release } });
    expect(await ex.os.onWsl()).toBe(false);
    expect(await ex.os.wslDist()).toBeUndefined();
    expect(rec.lines('warn')).toEqual(['bexec: WSL not applicable to this platform']);
  });

  it('coughs when no kernel release file exists', async () => {
    const { ex, rec } = make('linux', {
      attributes: {
        pnRelease: path.join(dir, 'none-a'),
        pnVersion: path.join(dir, 'none-b'),
      },
    });
    expect(await ex.os.onWsl()).toBe(false);
    expect(rec.lines('warn')).toEqual([
      'bexec: WARNING unable to determine platform [linux]',
    ]);
  });

  it('reads the OS version from the version command', async () => {
    const release = path.join(dir, 'version');
    await writeFile(release, 'Linux version 6.1.0-generic\n');
    mocks.spawn.mockReturnValue(fakeChild('Linux\n'));
    const { ex } = make('linux', { attributes: { pnRelease: release } });
    expect(await ex.os.osVersion()).toEqual(['Linux']);
    expect(mocks.spawn.mock.calls[0]?.[0]).toBe('uname');
  });

  it('drops the vendor token on Windows', async () => {
    mocks.spawn.mockReturnValue(
      fakeChild('\r\nMicrosoft Windows [Version 10.0.19045.1]\r\n'),
    );
    const { ex } = make('win32');
    expect(await ex.os.osVersion()).toEqual(['Windows', '[Version', '10.0.19045.1]']);
  });

  it('asks wsl for the default distribution on Windows', async () => {
    mocks.spawn.mockReturnValue(
      fakeChild('Default Distribution: Ubuntu-22.04\r\nDefault Version: 2\r\n'),
    );
    const { ex } = make('win32');
    expect(await ex.os.wslDist()).toBe('Ubuntu-22.04');
    expect(ex.attrs.get('wslActive')).toBe(1);
  });

  it('asks PowerShell for the Windows user', async () => {
    mocks.spawn.mockReturnValue(fakeChild('tester\r\n'));
    const { ex } = make('win32');
    expect(await ex.os.whoami()).toBe('tester');
    expect(mocks.spawn.mock.calls[0]?.[0]).toBe("powershell.exe -Command '$env:UserName'");
  });

  it('reads the local user elsewhere', async () => {
    const { ex } = make('linux');
    expect(await ex.os.whoami()).toBe(os.userInfo().username);
  });
});
