import {
  APPARMOR_SERVICE,
  MissingTargetDirectoryError,
  type PathRewriteTarget,
  type ProvisionConfig,
  RelocationCopyError,
  type RelocationOutcome,
  type RunFacts,
  normalizePath,
} from '@dbprovision/shared';
import type { FileSystem, ServiceManager } from '@dbprovision/host';
import type { Logger } from '../logger.js';

export type RelocationSettings = Pick<
  ProvisionConfig,
  'serviceName' | 'owner' | 'group' | 'dataDirMode' | 'systemdUnitPath' | 'rewriteTargets'
>;

export interface RelocatorDeps {
  fs: FileSystem;
  services: ServiceManager;
  logger: Logger;
  facts: RunFacts;
  settings: RelocationSettings;
}

export interface RewriteResult {
  path: string;
  exists: boolean;
  changed: boolean;
  apparmor: boolean;
}

/** Expands `{default}` and `{target}` in a rewrite target */
export function expandRewrite(
  target: PathRewriteTarget,
  defaultDir: string,
  targetDir: string,
): { pattern: string; replacement: string } {
  const expand = (text: string): string =>
    text.replaceAll('{default}', defaultDir).replaceAll('{target}', targetDir);
  return { pattern: expand(target.replace), replacement: expand(target.with) };
}

/** Fails unless the operator-supplied data directory exists as a directory */
export async function assertTargetDirectory(targetDir: string, fs: FileSystem): Promise<void> {
  const stat = await fs.stat(targetDir);
  if (!stat.isDir) {
    throw new MissingTargetDirectoryError(targetDir);
  }
}

/**
 * A `lost+found` left by mkfs at the root of a mounted data directory makes
 * mysqld treat it as a database, so it goes.
 */
export async function removeLostAndFound(targetDir: string, fs: FileSystem): Promise<boolean> {
  if (targetDir === '') return false;
  const lostAndFound = `${targetDir.replace(/\/+$/, '')}/lost+found`;
  const stat = await fs.stat(lostAndFound);
  if (!stat.exists) return false;
  await fs.remove(lostAndFound);
  return true;
}

/** Relocation decision, computed from a fresh stat every time */
export async function shouldRelocate(
  targetDir: string,
  defaultDir: string,
  fs: FileSystem,
): Promise<boolean> {
  if (targetDir === '' || normalizePath(targetDir) === normalizePath(defaultDir)) return false;
  const stat = await fs.stat(defaultDir);
  return stat.isDir;
}

async function rewriteConfigFiles(
  targetDir: string,
  defaultDir: string,
  deps: RelocatorDeps,
): Promise<RewriteResult[]> {
  const results: RewriteResult[] = [];

  for (const target of deps.settings.rewriteTargets) {
    const stat = await deps.fs.stat(target.path);
    deps.facts.configFileExists[target.path] = stat.exists;
    if (!stat.exists) {
      results.push({ path: target.path, exists: false, changed: false, apparmor: target.apparmor });
      continue;
    }

    const { pattern, replacement } = expandRewrite(target, defaultDir, targetDir);
    const changed = await deps.fs.replaceTextInFile(target.path, pattern, replacement);
    if (changed) {
      deps.logger.info({ path: target.path, pattern, replacement }, 'Rewrote data directory path');
    }
    results.push({ path: target.path, exists: true, changed, apparmor: target.apparmor });
  }

  return results;
}

/**
 * Moves the data directory from `defaultDir` to `targetDir` when the target
 * differs and the default still holds data. The source is deleted only after
 * the archival copy has succeeded.
 */
export async function relocateIfNeeded(
  targetDir: string,
  defaultDir: string,
  deps: RelocatorDeps,
): Promise<RelocationOutcome> {
  const { fs, services, logger, facts, settings } = deps;

  if (targetDir !== '') {
    await assertTargetDirectory(targetDir, fs);
  }

  facts.defaultDataDirExists = (await fs.stat(defaultDir)).isDir;
  if (!(await shouldRelocate(targetDir, defaultDir, fs))) {
    logger.info({ targetDir, defaultDir }, 'Data directory relocation not needed');
    facts.relocationOutcome = 'skipped';
    return 'skipped';
  }

  logger.info({ from: defaultDir, to: targetDir }, 'Relocating data directory');
  await services.stop(settings.serviceName);

  try {
    await fs.copyRecursivePreserve(defaultDir, targetDir);
  } catch (err: unknown) {
    throw new RelocationCopyError(defaultDir, targetDir, err);
  }

  const rewrites = await rewriteConfigFiles(targetDir, defaultDir, deps);
  facts.apparmorEdited = rewrites.some((r) => r.apparmor && r.changed);
  if (facts.apparmorEdited) {
    await services.restart(APPARMOR_SERVICE);
  }

  await fs.remove(defaultDir);

  await fs.setOwnerGroup(targetDir, settings.owner, settings.group, true);
  await fs.setMode(targetDir, settings.dataDirMode, true);

  facts.unitEdited = await fs.ensureLine(settings.systemdUnitPath, {
    line: `ConditionPathExists=${targetDir}`,
    match: '^ConditionPathExists=',
    insertBefore: '^ExecStartPre=',
  });
  if (facts.unitEdited) {
    await services.reloadUnitCache();
  }

  facts.relocationOutcome = 'moved';
  return 'moved';
}
