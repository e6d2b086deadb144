import { posix } from 'node:path';
import { z } from 'zod';
import {
  APPARMOR_PROFILE,
  AUXILIARY_PACKAGES,
  DEFAULT_CREDENTIAL_FILE,
  DEFAULT_DATA_DIR,
  DEFAULT_PASSWORD_LENGTH,
  MIN_PASSWORD_LENGTH,
  SERVER_PACKAGE,
  SERVICE_NAME,
  SYSTEMD_UNIT_PATH,
} from '../types/common.js';

/** Collapses `.`, `..`, doubled and trailing slashes so equal directories compare equal */
export function normalizePath(path: string): string {
  return posix.normalize(path).replace(/\/+$/, '') || '/';
}

const absolutePath = z
  .string()
  .startsWith('/', 'must be an absolute path')
  .transform(normalizePath);

/** A configuration file that may reference the default data directory */
export const PathRewriteTarget = z.object({
  path: absolutePath,
  /** Text to look for; `{default}` expands to the default data directory */
  replace: z.string().default('{default}'),
  /** Replacement; `{target}` expands to the target data directory */
  with: z.string().default('{target}'),
  /** Edits to this file require an apparmor restart */
  apparmor: z.boolean().default(false),
});
export type PathRewriteTarget = z.infer<typeof PathRewriteTarget>;

export const DEFAULT_REWRITE_TARGETS: PathRewriteTarget[] = [
  { path: '/etc/my.cnf', replace: '{default}', with: '{target}', apparmor: false },
  {
    path: '/etc/mysql/mysql.conf.d/mysqld.cnf',
    replace: '{default}',
    with: '{target}',
    apparmor: false,
  },
  { path: APPARMOR_PROFILE, replace: '{default}/', with: '{target}/', apparmor: true },
];

export const CleanupConfig = z.object({
  dropTestDatabase: z.boolean().default(true),
  listUsers: z.boolean().default(true),
});
export type CleanupConfig = z.infer<typeof CleanupConfig>;

export const ProvisionConfig = z.object({
  /** Where the data directory should live. Empty keeps the default. */
  targetDataDir: z.union([absolutePath, z.literal('')]).default(DEFAULT_DATA_DIR),
  defaultDataDir: absolutePath.default(DEFAULT_DATA_DIR),
  credentialFile: absolutePath.default(DEFAULT_CREDENTIAL_FILE),
  passwordLength: z.number().int().min(MIN_PASSWORD_LENGTH).max(256).default(DEFAULT_PASSWORD_LENGTH),
  packageName: z.string().min(1).default(SERVER_PACKAGE),
  serviceName: z.string().min(1).default(SERVICE_NAME),
  owner: z.string().min(1).default('mysql'),
  group: z.string().min(1).default('mysql'),
  dataDirMode: z.string().min(1).default('u=rwX,g=rwX,o-rwx'),
  systemdUnitPath: absolutePath.default(SYSTEMD_UNIT_PATH),
  rewriteTargets: z.array(PathRewriteTarget).default(DEFAULT_REWRITE_TARGETS),
  auxiliaryPackages: z.array(z.string().min(1)).default([...AUXILIARY_PACKAGES]),
  cleanup: CleanupConfig.default({}),
});
export type ProvisionConfig = z.infer<typeof ProvisionConfig>;
export type ProvisionConfigInput = z.input<typeof ProvisionConfig>;
