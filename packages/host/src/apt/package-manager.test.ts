import { describe, expect, it } from 'vitest';
import type { ExecFn, ExecOptions } from '../types.js';
import { createAptPackageManager, parseAptCacheSearch, parseDpkgList } from './package-manager.js';

const DPKG_OUTPUT = `Desired=Unknown/Install/Remove/Purge/Hold
| Status=Not/Inst/Conf-files/Unpacked/halF-conf/Half-inst/trig-aWait/Trig-pend
|/ Err?=(none)/Reinst-required (Status,Err: uppercase=bad)
||/ Name                 Version             Architecture Description
+++-====================-===================-============-==================================
ii  libc6:amd64          2.35-0ubuntu3.6     amd64        GNU C Library: Shared libraries
ii  mysql-server         8.0.36-0ubuntu0.22  all          MySQL database server (metapackage)
ii  mysql-server-8.0     8.0.36-0ubuntu0.22  amd64        MySQL database server binaries
rc  mysql-server-5.7     5.7.42-0ubuntu0.18  amd64        MySQL database server binaries`;

const APT_SEARCH_OUTPUT = `default-mysql-server - MySQL database server binaries and system database setup (metapackage)
mysql-server - MySQL database server (metapackage depending on the latest version)
mysql-server-8.0 - MySQL database server binaries and system database setup
mysql-server-core-8.0 - MySQL database server binaries`;

describe('parseDpkgList', () => {
  it('skips headers and parses entries', () => {
    const entries = parseDpkgList(DPKG_OUTPUT);
    expect(entries).toHaveLength(4);
    expect(entries[1]).toEqual({
      state: 'ii',
      name: 'mysql-server',
      version: '8.0.36-0ubuntu0.22',
      architecture: 'all',
      description: 'MySQL database server (metapackage)',
    });
  });

  it('drops the architecture qualifier from names', () => {
    expect(parseDpkgList(DPKG_OUTPUT)[0]?.name).toBe('libc6');
  });

  it('handles empty output', () => {
    expect(parseDpkgList('')).toEqual([]);
  });
});

describe('parseAptCacheSearch', () => {
  it('splits name and description', () => {
    const results = parseAptCacheSearch(APT_SEARCH_OUTPUT);
    expect(results).toHaveLength(4);
    expect(results[2]).toEqual({
      name: 'mysql-server-8.0',
      description: 'MySQL database server binaries and system database setup',
    });
  });
});

describe('createAptPackageManager', () => {
  it('queryInstalled returns entries mentioning the name', async () => {
    const mockExec: ExecFn = async (cmd, args) => {
      expect(cmd).toBe('dpkg');
      expect(args).toEqual(['-l']);
      return DPKG_OUTPUT;
    };

    const entries = await createAptPackageManager(mockExec).queryInstalled('mysql-server');
    expect(entries.map((e) => e.name)).toEqual([
      'mysql-server',
      'mysql-server-8.0',
      'mysql-server-5.7',
    ]);
  });

  it('isInstalled requires an exact name in an installed state', async () => {
    const mockExec: ExecFn = async () => DPKG_OUTPUT;
    const packages = createAptPackageManager(mockExec);

    expect(await packages.isInstalled('mysql-server')).toBe(true);
    expect(await packages.isInstalled('mysql-server-5.7')).toBe(false);
    expect(await packages.isInstalled('mysql')).toBe(false);
  });

  it('installs non-interactively', async () => {
    const calls: Array<{ cmd: string; args: string[]; options?: ExecOptions }> = [];
    const mockExec: ExecFn = async (cmd, args, options) => {
      calls.push({ cmd, args, options });
      return '';
    };

    await createAptPackageManager(mockExec).install('percona-toolkit');

    expect(calls).toEqual([
      {
        cmd: 'apt-get',
        args: ['install', '-y', '--no-install-recommends', 'percona-toolkit'],
        options: { env: { DEBIAN_FRONTEND: 'noninteractive' } },
      },
    ]);
  });

  it('refreshIndex runs apt-get update', async () => {
    const calls: string[][] = [];
    const mockExec: ExecFn = async (cmd, args) => {
      calls.push([cmd, ...args]);
      return '';
    };

    await createAptPackageManager(mockExec).refreshIndex();
    expect(calls).toEqual([['apt-get', 'update']]);
  });

  it('propagates install failures', async () => {
    const mockExec: ExecFn = async () => {
      throw new Error('E: Unable to locate package nope');
    };

    await expect(createAptPackageManager(mockExec).install('nope')).rejects.toThrow(
      'Unable to locate package nope',
    );
  });

  it('search passes the pattern to apt-cache', async () => {
    const mockExec: ExecFn = async (cmd, args) => {
      expect(cmd).toBe('apt-cache');
      expect(args).toEqual(['search', 'mysql-server']);
      return APT_SEARCH_OUTPUT;
    };

    const results = await createAptPackageManager(mockExec).search('mysql-server');
    expect(results.map((r) => r.name)).toContain('mysql-server-8.0');
  });
});
