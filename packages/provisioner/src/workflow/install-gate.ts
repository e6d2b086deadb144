import {
  type InstallOutcome,
  ROOT_PASSWORD_QUESTIONS,
  type RunFacts,
} from '@dbprovision/shared';
import type { PackageManager, Preseeder } from '@dbprovision/host';
import type { Logger } from '../logger.js';

export interface InstallGateDeps {
  packages: PackageManager;
  preseed: Preseeder;
  logger: Logger;
  /** `packageInstalled` must already hold the result of the package query */
  facts: RunFacts;
}

/** Seeds the root password and installs, unless the package is already present */
export async function seedAndInstall(
  packageName: string,
  credential: string,
  deps: InstallGateDeps,
): Promise<InstallOutcome> {
  if (deps.facts.packageInstalled) {
    deps.logger.info({ packageName }, 'Package already installed, skipping');
    return 'already_present';
  }

  for (const question of ROOT_PASSWORD_QUESTIONS) {
    await deps.preseed.setAnswer(packageName, question, credential, 'password');
  }
  deps.logger.info({ packageName }, 'Installing package');
  await deps.packages.install(packageName);
  return 'newly_installed';
}

/** Overwrites the seeded password answers with empty text */
export async function clearSeededPassword(packageName: string, preseed: Preseeder): Promise<void> {
  for (const question of ROOT_PASSWORD_QUESTIONS) {
    await preseed.setAnswer(packageName, question, '', 'text');
  }
}

/**
 * Installs the server package if needed. The seeded answers are cleared on
 * every path, including the already-installed one and a failed install.
 */
export async function ensureInstalled(
  packageName: string,
  credential: string,
  deps: InstallGateDeps,
): Promise<InstallOutcome> {
  let installFailed = false;
  try {
    const outcome = await seedAndInstall(packageName, credential, deps);
    deps.facts.installOutcome = outcome;
    return outcome;
  } catch (err: unknown) {
    installFailed = true;
    throw err;
  } finally {
    try {
      await clearSeededPassword(packageName, deps.preseed);
    } catch (clearErr: unknown) {
      // the install error is the one that propagates
      if (!installFailed) throw clearErr;
      deps.logger.error({ err: clearErr, packageName }, 'Failed to clear seeded root password');
    }
  }
}
