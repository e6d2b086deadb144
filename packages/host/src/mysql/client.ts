import type { DatabaseUser } from '@dbprovision/shared';
import type { DatabaseClient, ExecFn } from '../types.js';

export interface MysqlClientOptions {
  /** Option file holding the root password, as written by the credential step */
  credentialFile: string;
}

function quoteString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function quoteIdentifier(value: string): string {
  return `\`${value.replace(/`/g, '``')}\``;
}

export function createMysqlClient(exec: ExecFn, options: MysqlClientOptions): DatabaseClient {
  const query = (sql: string): Promise<string> =>
    exec('mysql', [
      `--defaults-extra-file=${options.credentialFile}`,
      '-u', 'root',
      '--batch', '--skip-column-names',
      '-e', sql,
    ]);

  return {
    async listDatabases(like) {
      const sql = like === undefined ? 'SHOW DATABASES' : `SHOW DATABASES LIKE ${quoteString(like)}`;
      return parseLines(await query(sql));
    },

    async dropDatabase(name) {
      await query(`DROP DATABASE IF EXISTS ${quoteIdentifier(name)}`);
    },

    async listUsers() {
      return parseUsers(await query('SELECT User, Host FROM mysql.user ORDER BY User, Host'));
    },
  };
}

function parseLines(stdout: string): string[] {
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** Parses tab-separated `User\tHost` rows */
export function parseUsers(stdout: string): DatabaseUser[] {
  const users: DatabaseUser[] = [];
  for (const line of stdout.split('\n')) {
    const parts = line.split('\t');
    if (parts.length < 2) continue;
    users.push({ user: parts[0] ?? '', host: (parts[1] ?? '').trim() });
  }
  return users;
}
