import fs from 'node:fs';
import {
  ConfigError,
  DEFAULT_CONFIG_PATH,
  ProvisionConfig,
  type ProvisionConfigInput,
} from '@dbprovision/shared';
import type { ZodError } from 'zod';

export interface LoadConfigOptions {
  /** Explicit config file path; falls back to DBPROVISION_CONFIG, then the default */
  path?: string;
  env?: NodeJS.ProcessEnv;
  /** Applied last, e.g. from CLI flags */
  overrides?: ProvisionConfigInput;
}

export function getConfigPath(options: LoadConfigOptions = {}): string {
  const env = options.env ?? process.env;
  return options.path ?? env.DBPROVISION_CONFIG ?? DEFAULT_CONFIG_PATH;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function readConfigFile(configPath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    throw new ConfigError(`Cannot read config at ${configPath}. Check file permissions.`, {
      cause: err,
    });
  }

  try {
    return JSON.parse(raw);
  } catch (err: unknown) {
    throw new ConfigError(`Config file corrupted at ${configPath}: not valid JSON.`, {
      cause: err,
    });
  }
}

function envOverrides(env: NodeJS.ProcessEnv): ProvisionConfigInput {
  const overrides: ProvisionConfigInput = {};
  if (env.DBPROVISION_DATA_DIR !== undefined) overrides.targetDataDir = env.DBPROVISION_DATA_DIR;
  if (env.DBPROVISION_CREDENTIAL_FILE !== undefined) {
    overrides.credentialFile = env.DBPROVISION_CREDENTIAL_FILE;
  }
  return overrides;
}

/**
 * Loads the JSON config file, layers environment and explicit overrides on
 * top, and validates the result. A missing file means "all defaults".
 */
export function loadConfig(options: LoadConfigOptions = {}): ProvisionConfig {
  const env = options.env ?? process.env;
  const configPath = getConfigPath(options);
  const fromFile = readConfigFile(configPath);

  if (typeof fromFile !== 'object' || fromFile === null || Array.isArray(fromFile)) {
    throw new ConfigError(`Config at ${configPath} must be a JSON object.`);
  }

  const result = ProvisionConfig.safeParse({
    ...fromFile,
    ...envOverrides(env),
    ...options.overrides,
  });
  if (!result.success) {
    throw new ConfigError(`Invalid config at ${configPath}: ${formatIssues(result.error)}`);
  }
  return result.data;
}
