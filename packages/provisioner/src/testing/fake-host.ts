import type { DatabaseUser, DebconfValueType } from '@dbprovision/shared';
import {
  type AptSearchResult,
  type DatabaseClient,
  type DpkgEntry,
  type FileSystem,
  type Host,
  type PackageManager,
  type Preseeder,
  type ServiceManager,
  ensureLineInContent,
  replaceText,
} from '@dbprovision/host';

export interface FakeFile {
  content: string;
  mode: number;
  owner: string;
}

export interface DebconfAnswer {
  pkg: string;
  question: string;
  value: string;
  vtype: DebconfValueType;
}

function normalize(path: string): string {
  return path.length > 1 ? path.replace(/\/+$/, '') : path;
}

function isWithin(path: string, root: string): boolean {
  return path === root || path.startsWith(`${root}/`);
}

/**
 * In-memory host for workflow tests. Every mutating call is appended to
 * `calls` so tests can assert ordering across collaborators.
 */
export class FakeHost implements Host {
  readonly calls: string[] = [];
  readonly files = new Map<string, FakeFile>();
  readonly dirs = new Set<string>();
  readonly installed = new Set<string>();
  readonly available: AptSearchResult[] = [];
  readonly answers: DebconfAnswer[] = [];
  readonly databases = new Set<string>(['information_schema', 'mysql', 'test']);
  readonly users: DatabaseUser[] = [{ user: 'root', host: 'localhost' }];

  failCopy: Error | undefined;
  failInstall = new Set<string>();
  /** Runs after a successful install, e.g. to lay down the default data directory */
  onInstall: ((name: string) => void) | undefined;

  addDir(path: string): this {
    this.dirs.add(normalize(path));
    return this;
  }

  addFile(path: string, content: string, mode = 0o644, owner = 'root'): this {
    this.files.set(normalize(path), { content, mode, owner });
    return this;
  }

  readText(path: string): string | undefined {
    return this.files.get(normalize(path))?.content;
  }

  exists(path: string): boolean {
    const p = normalize(path);
    return this.dirs.has(p) || this.files.has(p);
  }

  count(prefix: string): number {
    return this.calls.filter((c) => c.startsWith(prefix)).length;
  }

  readonly packages: PackageManager = {
    refreshIndex: async () => {
      this.calls.push('packages.refreshIndex');
    },
    queryInstalled: async (name) =>
      [...this.installed]
        .filter((pkg) => pkg.includes(name))
        .map(
          (pkg): DpkgEntry => ({
            state: 'ii',
            name: pkg,
            version: '8.0.36',
            architecture: 'amd64',
            description: '',
          }),
        ),
    isInstalled: async (name) => this.installed.has(name),
    install: async (name) => {
      this.calls.push(`packages.install ${name}`);
      if (this.failInstall.has(name)) {
        throw new Error(`E: Unable to locate package ${name}`);
      }
      this.installed.add(name);
      this.onInstall?.(name);
    },
    search: async (pattern) => this.available.filter((r) => r.name.includes(pattern)),
  };

  readonly preseed: Preseeder = {
    setAnswer: async (pkg, question, value, vtype) => {
      this.calls.push(`preseed.setAnswer ${question} ${vtype}`);
      this.answers.push({ pkg, question, value, vtype });
    },
  };

  readonly services: ServiceManager = {
    stop: async (name) => {
      this.calls.push(`services.stop ${name}`);
    },
    start: async (name) => {
      this.calls.push(`services.start ${name}`);
    },
    restart: async (name) => {
      this.calls.push(`services.restart ${name}`);
    },
    reloadUnitCache: async () => {
      this.calls.push('services.reloadUnitCache');
    },
    status: async () => 'active',
  };

  readonly fs: FileSystem = {
    stat: async (path) => {
      const p = normalize(path);
      if (this.dirs.has(p)) return { exists: true, isDir: true };
      if (this.files.has(p)) return { exists: true, isDir: false };
      return { exists: false, isDir: false };
    },

    readFile: async (path) => {
      const file = this.files.get(normalize(path));
      if (!file) throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      return file.content;
    },

    copyRecursivePreserve: async (source, destination) => {
      this.calls.push(`fs.copy ${source} ${destination}`);
      if (this.failCopy) throw this.failCopy;
      const src = normalize(source);
      const dst = normalize(destination);
      for (const dir of [...this.dirs]) {
        if (isWithin(dir, src)) this.dirs.add(dst + dir.slice(src.length));
      }
      for (const [path, file] of [...this.files]) {
        if (isWithin(path, src)) this.files.set(dst + path.slice(src.length), { ...file });
      }
    },

    remove: async (path) => {
      this.calls.push(`fs.remove ${path}`);
      const root = normalize(path);
      for (const dir of [...this.dirs]) {
        if (isWithin(dir, root)) this.dirs.delete(dir);
      }
      for (const file of [...this.files.keys()]) {
        if (isWithin(file, root)) this.files.delete(file);
      }
    },

    setOwnerGroup: async (path, owner, group, recursive) => {
      this.calls.push(`fs.chown ${owner}:${group} ${path}${recursive ? ' -R' : ''}`);
      const root = normalize(path);
      for (const [file, entry] of this.files) {
        if (isWithin(file, root)) entry.owner = owner;
      }
    },

    setMode: async (path, mode, recursive) => {
      this.calls.push(`fs.chmod ${mode} ${path}${recursive ? ' -R' : ''}`);
    },

    replaceTextInFile: async (path, pattern, replacement) => {
      const file = this.files.get(normalize(path));
      if (!file) throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      const edit = replaceText(file.content, pattern, replacement);
      file.content = edit.content;
      if (edit.changed) this.calls.push(`fs.replace ${path}`);
      return edit.changed;
    },

    ensureLine: async (path, options) => {
      const p = normalize(path);
      const existing = this.files.get(p);
      if (!existing && !options.create) throw new Error(`${path} does not exist`);
      const edit = ensureLineInContent(existing?.content ?? '', options);
      if (edit.changed) {
        this.calls.push(`fs.ensureLine ${path}`);
        this.files.set(p, {
          content: edit.content,
          mode: existing?.mode ?? options.mode ?? 0o644,
          owner: existing?.owner ?? 'root',
        });
      }
      return edit.changed;
    },
  };

  readonly database: DatabaseClient = {
    listDatabases: async (like) =>
      [...this.databases].filter((db) => like === undefined || db === like),
    dropDatabase: async (name) => {
      this.calls.push(`database.drop ${name}`);
      this.databases.delete(name);
    },
    listUsers: async () => [...this.users],
  };
}
