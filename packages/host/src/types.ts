import type { DatabaseUser, DebconfValueType } from '@dbprovision/shared';

export interface ExecOptions {
  /** Written to the command's stdin */
  input?: string;
  /** Merged over the current process environment */
  env?: Record<string, string>;
  timeoutMs?: number;
}

/** Function that executes a command and returns stdout */
export type ExecFn = (command: string, args: string[], options?: ExecOptions) => Promise<string>;

// --- Package manager ---

export interface DpkgEntry {
  state: string;
  name: string;
  version: string;
  architecture: string;
  description: string;
}

export interface AptSearchResult {
  name: string;
  description: string;
}

export interface PackageManager {
  refreshIndex(): Promise<void>;
  /** dpkg entries whose package name contains `name` */
  queryInstalled(name: string): Promise<DpkgEntry[]>;
  isInstalled(name: string): Promise<boolean>;
  install(name: string): Promise<void>;
  search(pattern: string): Promise<AptSearchResult[]>;
}

// --- Installer pre-seed ---

export interface Preseeder {
  setAnswer(pkg: string, question: string, value: string, vtype: DebconfValueType): Promise<void>;
}

// --- Service manager ---

export interface ServiceManager {
  stop(name: string): Promise<void>;
  start(name: string): Promise<void>;
  restart(name: string): Promise<void>;
  reloadUnitCache(): Promise<void>;
  /** `systemctl is-active` state, `inactive` when the query fails */
  status(name: string): Promise<string>;
}

// --- Filesystem ---

export interface FileStat {
  exists: boolean;
  isDir: boolean;
}

export interface EnsureLineOptions {
  line: string;
  /** Regexp of the line to replace; the last matching line wins */
  match?: string;
  /** Regexp of the line to insert before; the first matching line wins */
  insertBefore?: string;
  /** Regexp of the line to insert after; the last matching line wins */
  insertAfter?: string;
  /** Create the file when it is missing */
  create?: boolean;
  /** Mode for a newly created file */
  mode?: number;
}

export interface FileSystem {
  stat(path: string): Promise<FileStat>;
  readFile(path: string): Promise<string>;
  /** Archival copy of the contents of `source` into `destination` */
  copyRecursivePreserve(source: string, destination: string): Promise<void>;
  remove(path: string): Promise<void>;
  setOwnerGroup(path: string, owner: string, group: string, recursive: boolean): Promise<void>;
  setMode(path: string, mode: string, recursive: boolean): Promise<void>;
  /** Replace every literal occurrence of `pattern`. Returns whether the file changed. */
  replaceTextInFile(path: string, pattern: string, replacement: string): Promise<boolean>;
  /** Returns whether the file changed */
  ensureLine(path: string, options: EnsureLineOptions): Promise<boolean>;
}

// --- Database client ---

export interface DatabaseClient {
  listDatabases(like?: string): Promise<string[]>;
  dropDatabase(name: string): Promise<void>;
  listUsers(): Promise<DatabaseUser[]>;
}

/** Every collaborator a provisioning run talks to */
export interface Host {
  packages: PackageManager;
  preseed: Preseeder;
  services: ServiceManager;
  fs: FileSystem;
  database: DatabaseClient;
}
