// Types
export {
  InstallOutcome,
  RelocationOutcome,
  DebconfValueType,
  DEFAULT_DATA_DIR,
  DEFAULT_CREDENTIAL_FILE,
  DEFAULT_CONFIG_PATH,
  DEFAULT_LOCK_PATH,
  SERVER_PACKAGE,
  SERVICE_NAME,
  APPARMOR_SERVICE,
  APPARMOR_PROFILE,
  SYSTEMD_UNIT_PATH,
  AUXILIARY_PACKAGES,
  ROOT_PASSWORD_QUESTIONS,
  MIN_PASSWORD_LENGTH,
  DEFAULT_PASSWORD_LENGTH,
} from './types/common.js';
export type { DatabaseUser, RunFacts } from './types/facts.js';
export { createRunFacts } from './types/facts.js';

// Schemas — Config
export {
  PathRewriteTarget,
  CleanupConfig,
  ProvisionConfig,
  DEFAULT_REWRITE_TARGETS,
  normalizePath,
} from './schemas/config.js';
export type { ProvisionConfigInput } from './schemas/config.js';

// Errors
export {
  ProvisionError,
  CredentialRecoveryError,
  MissingTargetDirectoryError,
  RelocationCopyError,
  ConfigError,
  RunLockedError,
  CommandError,
} from './errors.js';
