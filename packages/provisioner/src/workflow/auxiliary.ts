import type { PackageManager } from '@dbprovision/host';
import type { Logger } from '../logger.js';

/** Installs each missing package in order; returns the ones newly installed */
export async function installAuxiliaryPackages(
  names: readonly string[],
  packages: PackageManager,
  logger: Logger,
): Promise<string[]> {
  const installed: string[] = [];
  for (const name of names) {
    if (await packages.isInstalled(name)) continue;
    logger.info({ packageName: name }, 'Installing auxiliary package');
    await packages.install(name);
    installed.push(name);
  }
  return installed;
}
