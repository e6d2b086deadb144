import type { InstallOutcome, RelocationOutcome } from './common.js';

export interface DatabaseUser {
  user: string;
  host: string;
}

/**
 * Facts gathered while a provisioning run executes. Created once per run and
 * filled in step by step; nothing resets it before the run ends.
 */
export interface RunFacts {
  credentialFileExists: boolean;
  rootPassword?: string;
  packageInstalled: boolean;
  installedPackages: string[];
  availableVersions: string[];
  defaultDataDirExists: boolean;
  targetDataDir: string;
  configFileExists: Record<string, boolean>;
  apparmorEdited: boolean;
  unitEdited: boolean;
  installOutcome?: InstallOutcome;
  relocationOutcome?: RelocationOutcome;
  auxiliaryInstalled: string[];
  testDatabaseDropped: boolean;
  users: DatabaseUser[];
}

export function createRunFacts(targetDataDir: string): RunFacts {
  return {
    credentialFileExists: false,
    packageInstalled: false,
    installedPackages: [],
    availableVersions: [],
    defaultDataDirExists: false,
    targetDataDir,
    configFileExists: {},
    apparmorEdited: false,
    unitEdited: false,
    auxiliaryInstalled: [],
    testDatabaseDropped: false,
    users: [],
  };
}
