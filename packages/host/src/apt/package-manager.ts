import type { AptSearchResult, DpkgEntry, ExecFn, PackageManager } from '../types.js';

const NONINTERACTIVE = { DEBIAN_FRONTEND: 'noninteractive' };

/** Mirrors `dpkg -l | grep <name> | head -10` */
const QUERY_LIMIT = 10;

/** States in which a package's files are on disk and configured */
const INSTALLED_STATES = new Set(['ii', 'hi']);

export function createAptPackageManager(exec: ExecFn): PackageManager {
  const queryInstalled = async (name: string): Promise<DpkgEntry[]> => {
    const stdout = await exec('dpkg', ['-l']);
    return parseDpkgList(stdout)
      .filter((entry) => entry.name.includes(name))
      .slice(0, QUERY_LIMIT);
  };

  return {
    async refreshIndex() {
      await exec('apt-get', ['update'], { env: NONINTERACTIVE });
    },

    queryInstalled,

    async isInstalled(name) {
      const entries = await queryInstalled(name);
      return entries.some((entry) => entry.name === name && INSTALLED_STATES.has(entry.state));
    },

    async install(name) {
      await exec('apt-get', ['install', '-y', '--no-install-recommends', name], {
        env: NONINTERACTIVE,
      });
    },

    async search(pattern) {
      const stdout = await exec('apt-cache', ['search', pattern]);
      return parseAptCacheSearch(stdout);
    },
  };
}

/**
 * Parses `dpkg -l` output. Header and ruler lines are skipped and the
 * `:arch` suffix of multi-arch package names is dropped.
 */
export function parseDpkgList(stdout: string): DpkgEntry[] {
  const entries: DpkgEntry[] = [];

  for (const line of stdout.split('\n')) {
    if (!/^[uihrp][ncuhfwti]/.test(line)) continue;

    const [state, rawName, version, architecture, ...rest] = line.trim().split(/\s+/);
    if (!state || !rawName || !version || !architecture) continue;

    entries.push({
      state,
      name: rawName.split(':')[0] ?? rawName,
      version,
      architecture,
      description: rest.join(' '),
    });
  }

  return entries;
}

/** Parses `apt-cache search` lines of the form `name - description` */
export function parseAptCacheSearch(stdout: string): AptSearchResult[] {
  const results: AptSearchResult[] = [];

  for (const line of stdout.split('\n')) {
    const idx = line.indexOf(' - ');
    if (idx === -1) continue;
    results.push({ name: line.slice(0, idx).trim(), description: line.slice(idx + 3).trim() });
  }

  return results;
}
