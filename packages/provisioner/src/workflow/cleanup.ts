import type { DatabaseUser } from '@dbprovision/shared';
import type { DatabaseClient } from '@dbprovision/host';

export const TEST_DATABASE = 'test';

/** Drops the anonymous-access `test` database. Returns whether it existed. */
export async function dropTestDatabase(database: DatabaseClient): Promise<boolean> {
  const matches = await database.listDatabases(TEST_DATABASE);
  if (!matches.includes(TEST_DATABASE)) return false;
  await database.dropDatabase(TEST_DATABASE);
  return true;
}

export function listUsers(database: DatabaseClient): Promise<DatabaseUser[]> {
  return database.listUsers();
}
