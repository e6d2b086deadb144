import type { ProvisionConfig } from '@dbprovision/shared';
import type { Host } from '@dbprovision/host';
import { expandRewrite, shouldRelocate } from './relocator.js';

export interface ProvisionPlan {
  packageInstalled: boolean;
  installNeeded: boolean;
  credentialFileExists: boolean;
  targetDataDir: string;
  targetDirExists: boolean;
  relocate: boolean;
  /** Config files that would be rewritten by a relocation */
  rewrites: string[];
  serviceStatus: string;
}

/** Reports what a run would do without touching the host */
export async function planProvision(config: ProvisionConfig, host: Host): Promise<ProvisionPlan> {
  const packageInstalled = await host.packages.isInstalled(config.packageName);
  const credentialFileExists = (await host.fs.stat(config.credentialFile)).exists;
  const targetDirExists =
    config.targetDataDir !== '' && (await host.fs.stat(config.targetDataDir)).isDir;
  const relocate = await shouldRelocate(config.targetDataDir, config.defaultDataDir, host.fs);

  const rewrites: string[] = [];
  if (relocate) {
    for (const target of config.rewriteTargets) {
      if (!(await host.fs.stat(target.path)).exists) continue;
      const { pattern } = expandRewrite(target, config.defaultDataDir, config.targetDataDir);
      const content = await host.fs.readFile(target.path);
      if (content.includes(pattern)) rewrites.push(target.path);
    }
  }

  return {
    packageInstalled,
    installNeeded: !packageInstalled,
    credentialFileExists,
    targetDataDir: config.targetDataDir,
    targetDirExists,
    relocate,
    rewrites,
    serviceStatus: await host.services.status(config.serviceName),
  };
}
