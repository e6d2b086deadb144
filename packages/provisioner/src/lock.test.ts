import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { RunLockedError } from '@dbprovision/shared';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { acquireRunLock } from './lock.js';

/** Above the kernel's pid_max ceiling, so never a live process */
const DEAD_PID = 4_194_305;

describe('acquireRunLock', () => {
  let dir: string;
  let lockPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dbprovision-lock-'));
    lockPath = path.join(dir, 'run.lock');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the owner pid and removes the file on release', () => {
    const lock = acquireRunLock(lockPath);
    expect(fs.readFileSync(lockPath, 'utf-8')).toBe(String(process.pid));

    lock.release();
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('rejects a second run while the holder is alive', () => {
    acquireRunLock(lockPath);
    expect(() => acquireRunLock(lockPath, DEAD_PID)).toThrow(RunLockedError);
  });

  it('takes over a lock left by a dead process', () => {
    fs.writeFileSync(lockPath, String(DEAD_PID));

    const lock = acquireRunLock(lockPath);
    expect(fs.readFileSync(lockPath, 'utf-8')).toBe(String(process.pid));
    lock.release();
  });

  it('does not remove a lock it no longer owns', () => {
    const lock = acquireRunLock(lockPath);
    fs.writeFileSync(lockPath, String(DEAD_PID));

    lock.release();
    expect(fs.existsSync(lockPath)).toBe(true);
  });
});
