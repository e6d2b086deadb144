import { createAptPackageManager } from './apt/package-manager.js';
import { createDebconfPreseeder } from './debconf/preseeder.js';
import { defaultExec } from './exec.js';
import { createHostFileSystem } from './fs/filesystem.js';
import { createMysqlClient } from './mysql/client.js';
import { createSystemdServiceManager } from './systemd/service-manager.js';
import type { ExecFn, Host } from './types.js';

export type {
  AptSearchResult,
  DatabaseClient,
  DpkgEntry,
  EnsureLineOptions,
  ExecFn,
  ExecOptions,
  FileStat,
  FileSystem,
  Host,
  PackageManager,
  Preseeder,
  ServiceManager,
} from './types.js';
export { defaultExec } from './exec.js';
export { createAptPackageManager, parseAptCacheSearch, parseDpkgList } from './apt/package-manager.js';
export { createDebconfPreseeder, formatSelection } from './debconf/preseeder.js';
export { createSystemdServiceManager } from './systemd/service-manager.js';
export { createHostFileSystem } from './fs/filesystem.js';
export { ensureLineInContent, replaceText } from './fs/text.js';
export type { TextEdit } from './fs/text.js';
export { createMysqlClient, parseUsers } from './mysql/client.js';
export type { MysqlClientOptions } from './mysql/client.js';

export interface HostOptions {
  credentialFile: string;
  exec?: ExecFn;
}

/** Wires every collaborator to the same exec function */
export function createHost(options: HostOptions): Host {
  const exec = options.exec ?? defaultExec;
  return {
    packages: createAptPackageManager(exec),
    preseed: createDebconfPreseeder(exec),
    services: createSystemdServiceManager(exec),
    fs: createHostFileSystem(exec),
    database: createMysqlClient(exec, { credentialFile: options.credentialFile }),
  };
}
