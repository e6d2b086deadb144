import { type ProvisionConfig, type RunFacts, createRunFacts } from '@dbprovision/shared';
import type { Host } from '@dbprovision/host';
import type { Logger } from '../logger.js';
import { installAuxiliaryPackages } from './auxiliary.js';
import { dropTestDatabase, listUsers } from './cleanup.js';
import { resolveCredential } from './credential.js';
import { ensureInstalled } from './install-gate.js';
import { assertTargetDirectory, relocateIfNeeded, removeLostAndFound } from './relocator.js';

export interface StepTiming {
  name: string;
  durationMs: number;
}

export interface ProvisionReport {
  facts: RunFacts;
  steps: StepTiming[];
  durationMs: number;
}

/** Matches versioned server packages such as `mysql-server-8.0` */
export function versionedPackagePattern(packageName: string): RegExp {
  const escaped = packageName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`^${escaped}-[0-9]`);
}

/** Runs every provisioning step in order. Any failure aborts the rest of the run. */
export async function runProvision(
  config: ProvisionConfig,
  host: Host,
  logger: Logger,
): Promise<ProvisionReport> {
  const start = Date.now();
  const facts = createRunFacts(config.targetDataDir);
  const steps: StepTiming[] = [];

  const step = async <T>(name: string, fn: () => Promise<T>): Promise<T> => {
    const stepStart = Date.now();
    logger.debug({ step: name }, 'Step started');
    try {
      return await fn();
    } finally {
      steps.push({ name, durationMs: Date.now() - stepStart });
    }
  };

  await step('refresh-index', () => host.packages.refreshIndex());

  await step('query-installed', async () => {
    const entries = await host.packages.queryInstalled(config.packageName);
    facts.installedPackages = entries.map((e) => `${e.state} ${e.name} ${e.version}`);
    facts.packageInstalled = await host.packages.isInstalled(config.packageName);
    logger.info(
      { packageName: config.packageName, installed: facts.installedPackages },
      'Installed server packages',
    );
  });

  await step('query-available', async () => {
    const pattern = versionedPackagePattern(config.packageName);
    const results = await host.packages.search(config.packageName);
    facts.availableVersions = results.filter((r) => pattern.test(r.name)).map((r) => r.name);
    logger.info({ available: facts.availableVersions }, 'Server packages available through APT');
  });

  await step('remove-lost-and-found', async () => {
    if (config.targetDataDir === '') return;
    await assertTargetDirectory(config.targetDataDir, host.fs);
    if (await removeLostAndFound(config.targetDataDir, host.fs)) {
      logger.info({ targetDir: config.targetDataDir }, 'Removed lost+found from data directory');
    }
  });

  const credential = await step('resolve-credential', () =>
    resolveCredential(config.credentialFile, {
      fs: host.fs,
      logger,
      facts,
      passwordLength: config.passwordLength,
    }),
  );

  await step('install', () =>
    ensureInstalled(config.packageName, credential.password, {
      packages: host.packages,
      preseed: host.preseed,
      logger,
      facts,
    }),
  );

  await step('relocate', () =>
    relocateIfNeeded(config.targetDataDir, config.defaultDataDir, {
      fs: host.fs,
      services: host.services,
      logger,
      facts,
      settings: config,
    }),
  );

  await step('start-service', () => host.services.start(config.serviceName));

  facts.auxiliaryInstalled = await step('auxiliary-packages', () =>
    installAuxiliaryPackages(config.auxiliaryPackages, host.packages, logger),
  );

  if (config.cleanup.dropTestDatabase) {
    facts.testDatabaseDropped = await step('drop-test-database', () =>
      dropTestDatabase(host.database),
    );
  }

  if (config.cleanup.listUsers) {
    facts.users = await step('list-users', () => listUsers(host.database));
    logger.info({ users: facts.users }, 'Users on this server');
  }

  const durationMs = Date.now() - start;
  logger.info(
    {
      installOutcome: facts.installOutcome,
      relocationOutcome: facts.relocationOutcome,
      durationMs,
    },
    'Provisioning complete',
  );
  return { facts, steps, durationMs };
}
