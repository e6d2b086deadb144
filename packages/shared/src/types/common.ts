import { z } from 'zod';

export const InstallOutcome = z.enum(['already_present', 'newly_installed']);
export type InstallOutcome = z.infer<typeof InstallOutcome>;

export const RelocationOutcome = z.enum(['skipped', 'moved']);
export type RelocationOutcome = z.infer<typeof RelocationOutcome>;

export const DebconfValueType = z.enum(['password', 'text', 'boolean', 'select', 'string']);
export type DebconfValueType = z.infer<typeof DebconfValueType>;

/** Platform default data directory of the Debian mysql-server package */
export const DEFAULT_DATA_DIR = '/var/lib/mysql';

/** Client option file that grants root passwordless access */
export const DEFAULT_CREDENTIAL_FILE = '/root/.my.cnf';

export const DEFAULT_CONFIG_PATH = '/etc/dbprovision/config.json';

export const DEFAULT_LOCK_PATH = '/run/dbprovision.lock';

export const SERVER_PACKAGE = 'mysql-server';

export const SERVICE_NAME = 'mysql';

export const APPARMOR_SERVICE = 'apparmor';

export const APPARMOR_PROFILE = '/etc/apparmor.d/usr.sbin.mysqld';

export const SYSTEMD_UNIT_PATH = '/lib/systemd/system/mysql.service';

export const AUXILIARY_PACKAGES = [
  'libdbd-mysql-perl',
  'libmysqlclient-dev',
  'percona-toolkit',
  'python-mysqldb',
] as const;

/** debconf questions asked by mysql-server for the root password */
export const ROOT_PASSWORD_QUESTIONS = [
  'mysql-server/root_password',
  'mysql-server/root_password_again',
] as const;

export const MIN_PASSWORD_LENGTH = 20;

export const DEFAULT_PASSWORD_LENGTH = 24;
