import { execFile } from 'node:child_process';
import { CommandError } from '@dbprovision/shared';
import type { ExecFn } from './types.js';

const DEFAULT_TIMEOUT_MS = 600_000;

/** Default exec function that shells out to real commands */
export const defaultExec: ExecFn = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = execFile(
      command,
      args,
      {
        timeout: options?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        maxBuffer: 4 * 1024 * 1024,
        env: options?.env ? { ...process.env, ...options.env } : process.env,
      },
      (error, stdout, stderr) => {
        if (error) {
          const exitCode = typeof error.code === 'number' ? error.code : undefined;
          reject(new CommandError(command, args, exitCode, stderr));
          return;
        }
        resolve(stdout);
      },
    );

    if (options?.input !== undefined) {
      child.stdin?.end(options.input);
    }
  });
