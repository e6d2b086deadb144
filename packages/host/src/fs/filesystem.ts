import fs from 'node:fs/promises';
import { ProvisionError } from '@dbprovision/shared';
import type { ExecFn, FileSystem } from '../types.js';
import { ensureLineInContent, replaceText } from './text.js';

// ENOTDIR: a path component is a regular file
function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')
  );
}

/**
 * Host filesystem. Text edits go through node:fs; archival copies and
 * ownership changes shell out so owners, modes and timestamps survive.
 */
export function createHostFileSystem(exec: ExecFn): FileSystem {
  return {
    async stat(path) {
      try {
        const stats = await fs.stat(path);
        return { exists: true, isDir: stats.isDirectory() };
      } catch (err: unknown) {
        if (isNotFound(err)) return { exists: false, isDir: false };
        throw err;
      }
    },

    readFile: (path) => fs.readFile(path, 'utf-8'),

    async copyRecursivePreserve(source, destination) {
      // "<src>/." copies the directory's contents rather than the directory itself
      await exec('cp', ['-a', `${source.replace(/\/+$/, '')}/.`, destination]);
    },

    async remove(path) {
      await fs.rm(path, { recursive: true, force: true });
    },

    async setOwnerGroup(path, owner, group, recursive) {
      await exec('chown', [...(recursive ? ['-R'] : []), `${owner}:${group}`, path]);
    },

    async setMode(path, mode, recursive) {
      await exec('chmod', [...(recursive ? ['-R'] : []), mode, path]);
    },

    async replaceTextInFile(path, pattern, replacement) {
      const content = await fs.readFile(path, 'utf-8');
      const edit = replaceText(content, pattern, replacement);
      if (edit.changed) {
        await fs.writeFile(path, edit.content, 'utf-8');
      }
      return edit.changed;
    },

    async ensureLine(path, options) {
      let content: string;
      let created = false;
      try {
        content = await fs.readFile(path, 'utf-8');
      } catch (err: unknown) {
        if (!isNotFound(err)) throw err;
        if (!options.create) {
          throw new ProvisionError(`${path} does not exist`, { cause: err });
        }
        content = '';
        created = true;
      }

      const edit = ensureLineInContent(content, options);
      if (edit.changed) {
        await fs.writeFile(path, edit.content, {
          encoding: 'utf-8',
          ...(created && options.mode !== undefined ? { mode: options.mode } : {}),
        });
      }
      return edit.changed;
    },
  };
}
