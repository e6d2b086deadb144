import fs from 'node:fs';
import { RunLockedError } from '@dbprovision/shared';

export interface RunLock {
  path: string;
  release(): void;
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && 'code' in err ? err.code : undefined;
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(err) === 'EPERM';
  }
}

function readHolder(lockPath: string): number | undefined {
  let raw: string;
  try {
    raw = fs.readFileSync(lockPath, 'utf-8').trim();
  } catch {
    return undefined;
  }
  const pid = Number.parseInt(raw, 10);
  return Number.isNaN(pid) ? undefined : pid;
}

/**
 * Host-wide mutual exclusion for provisioning runs. The lock file holds the
 * owner's PID; a lock left behind by a dead process is taken over.
 */
export function acquireRunLock(lockPath: string, pid: number = process.pid): RunLock {
  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      fs.writeFileSync(lockPath, String(pid), { flag: 'wx', encoding: 'utf-8' });
      return {
        path: lockPath,
        release: () => {
          if (readHolder(lockPath) === pid) fs.rmSync(lockPath, { force: true });
        },
      };
    } catch (err: unknown) {
      if (errorCode(err) !== 'EEXIST') throw err;
    }

    const holder = readHolder(lockPath);
    if (holder !== undefined && isAlive(holder)) {
      throw new RunLockedError(lockPath, holder);
    }
    // Stale lock from a dead run
    fs.rmSync(lockPath, { force: true });
  }

  throw new RunLockedError(lockPath, readHolder(lockPath) ?? 0);
}
