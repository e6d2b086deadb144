#!/usr/bin/env node

import {
  DEFAULT_LOCK_PATH,
  type ProvisionConfig,
  type ProvisionConfigInput,
} from '@dbprovision/shared';
import { createHost } from '@dbprovision/host';
import { getConfigPath, loadConfig } from './config.js';
import { acquireRunLock } from './lock.js';
import { logger } from './logger.js';
import { VERSION } from './version.js';
import { planProvision } from './workflow/plan.js';
import { runProvision } from './workflow/run.js';

const args = process.argv.slice(2);
const command = args[0];

function hasFlag(flag: string): boolean {
  return args.includes(flag);
}

function getArg(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

function printUsage(): void {
  console.log('Usage: dbprovision <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  run       Install and configure the MySQL server on this host');
  console.log('  plan      Show what "run" would do without changing anything');
  console.log('  users     List database users');
  console.log('  help      Show this message');
  console.log('');
  console.log('Options:');
  console.log(`  --config <path>    Config file (default: ${getConfigPath()})`);
  console.log('  --data-dir <path>  Target data directory (overrides the config file)');
  console.log(`  --lock <path>      Run lock file (default: ${DEFAULT_LOCK_PATH})`);
  console.log('  --json             Print machine-readable output');
  console.log('  --version          Print the version');
}

function configFromArgs(): ProvisionConfig {
  const overrides: ProvisionConfigInput = {};
  const dataDir = getArg('--data-dir');
  if (dataDir !== undefined) overrides.targetDataDir = dataDir;
  return loadConfig({ path: getArg('--config'), overrides });
}

async function cmdRun(): Promise<void> {
  const config = configFromArgs();
  const host = createHost({ credentialFile: config.credentialFile });
  const lock = acquireRunLock(getArg('--lock') ?? DEFAULT_LOCK_PATH);

  try {
    const report = await runProvision(config, host, logger);
    const { facts } = report;

    if (hasFlag('--json')) {
      const { rootPassword: _secret, ...publicFacts } = facts;
      console.log(JSON.stringify({ ...report, facts: publicFacts }, null, 2));
      return;
    }

    console.log('Provisioning complete.');
    console.log(`  Package:    ${config.packageName} (${facts.installOutcome ?? 'unknown'})`);
    console.log(
      `  Data dir:   ${config.targetDataDir || config.defaultDataDir} (${facts.relocationOutcome ?? 'unknown'})`,
    );
    console.log(`  Credential: ${config.credentialFile}`);
    if (facts.auxiliaryInstalled.length > 0) {
      console.log(`  Installed:  ${facts.auxiliaryInstalled.join(', ')}`);
    }
    if (facts.testDatabaseDropped) {
      console.log('  Dropped the test database');
    }
    if (facts.users.length > 0) {
      console.log('');
      console.log('Users:');
      for (const user of facts.users) {
        console.log(`  ${user.user}@${user.host}`);
      }
    }
    console.log(`Done in ${report.durationMs}ms.`);
  } finally {
    lock.release();
  }
}

async function cmdPlan(): Promise<void> {
  const config = configFromArgs();
  const plan = await planProvision(config, createHost({ credentialFile: config.credentialFile }));

  if (hasFlag('--json')) {
    console.log(JSON.stringify(plan, null, 2));
    return;
  }

  const mark = (value: boolean): string => (value ? '✓' : '✗');
  console.log(`${mark(plan.packageInstalled)} ${config.packageName} installed`);
  console.log(`${mark(plan.credentialFileExists)} credential file ${config.credentialFile}`);
  console.log(`${mark(plan.targetDirExists)} data directory ${plan.targetDataDir || '(default)'}`);
  console.log(`  service ${config.serviceName}: ${plan.serviceStatus}`);
  console.log('');
  console.log('Planned:');
  if (plan.installNeeded) console.log(`  install ${config.packageName}`);
  if (plan.relocate) {
    console.log(`  move ${config.defaultDataDir} -> ${config.targetDataDir}`);
    for (const file of plan.rewrites) {
      console.log(`  rewrite ${file}`);
    }
  }
  if (!plan.installNeeded && !plan.relocate) console.log('  nothing to change');
}

async function cmdUsers(): Promise<void> {
  const config = configFromArgs();
  const users = await createHost({ credentialFile: config.credentialFile }).database.listUsers();

  if (hasFlag('--json')) {
    console.log(JSON.stringify(users, null, 2));
    return;
  }
  for (const user of users) {
    console.log(`${user.user}@${user.host}`);
  }
}

async function main(): Promise<void> {
  if (hasFlag('--version')) {
    console.log(VERSION);
    return;
  }

  switch (command) {
    case 'run':
      await cmdRun();
      break;
    case 'plan':
      await cmdPlan();
      break;
    case 'users':
      await cmdUsers();
      break;
    case 'help':
    case '--help':
    case undefined:
      printUsage();
      break;
    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Provisioning failed');
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exit(1);
});
