import { randomInt } from 'node:crypto';
import {
  CredentialRecoveryError,
  DEFAULT_PASSWORD_LENGTH,
  MIN_PASSWORD_LENGTH,
  type RunFacts,
} from '@dbprovision/shared';
import type { FileSystem } from '@dbprovision/host';
import type { Logger } from '../logger.js';

const ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const HEADER_LINE = '[client]';
const HEADER_PATTERN = '^.client.$';
const PASSWORD_PREFIX = 'password = ';

export interface CredentialDeps {
  fs: FileSystem;
  logger: Logger;
  facts: RunFacts;
  passwordLength?: number;
}

export interface ResolvedCredential {
  password: string;
  source: 'generated' | 'recovered';
}

/** Random password drawn from ASCII letters and digits */
export function generatePassword(length: number = DEFAULT_PASSWORD_LENGTH): string {
  if (!Number.isInteger(length) || length < MIN_PASSWORD_LENGTH) {
    throw new RangeError(`Password length must be an integer >= ${MIN_PASSWORD_LENGTH}`);
  }
  let password = '';
  for (let i = 0; i < length; i++) {
    password += ALPHABET.charAt(randomInt(ALPHABET.length));
  }
  return password;
}

/** Value of the first `password = ` line, or undefined when there is none */
export function parseCredentialFile(content: string): string | undefined {
  for (const rawLine of content.split('\n')) {
    const line = rawLine.replace(/\r$/, '');
    if (line.startsWith(PASSWORD_PREFIX)) {
      const value = line.slice(PASSWORD_PREFIX.length).trim();
      return value === '' ? undefined : value;
    }
  }
  return undefined;
}

/**
 * Returns the root password kept in the client option file. A missing file
 * gets a freshly generated password; an existing one is only read.
 */
export async function resolveCredential(
  credentialFile: string,
  deps: CredentialDeps,
): Promise<ResolvedCredential> {
  const { fs, logger, facts } = deps;
  if (facts.rootPassword !== undefined) {
    throw new Error('Root credential already resolved for this run');
  }

  const stat = await fs.stat(credentialFile);
  facts.credentialFileExists = stat.exists;

  if (!stat.exists) {
    const password = generatePassword(deps.passwordLength);
    await fs.ensureLine(credentialFile, {
      line: HEADER_LINE,
      match: HEADER_PATTERN,
      create: true,
      mode: 0o600,
    });
    await fs.ensureLine(credentialFile, {
      line: `${PASSWORD_PREFIX}${password}`,
      match: `^${PASSWORD_PREFIX}`,
      insertAfter: HEADER_PATTERN,
    });
    logger.info({ credentialFile }, 'Generated root password');
    facts.rootPassword = password;
    return { password, source: 'generated' };
  }

  let content: string;
  try {
    content = await fs.readFile(credentialFile);
  } catch (err: unknown) {
    throw new CredentialRecoveryError(credentialFile, { cause: err });
  }

  const password = parseCredentialFile(content);
  if (password === undefined) {
    throw new CredentialRecoveryError(credentialFile);
  }
  logger.info({ credentialFile }, 'Recovered root password from existing file');
  facts.rootPassword = password;
  return { password, source: 'recovered' };
}
