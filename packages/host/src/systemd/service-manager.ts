import type { ExecFn, ServiceManager } from '../types.js';

export function createSystemdServiceManager(exec: ExecFn): ServiceManager {
  const systemctl = async (...args: string[]): Promise<void> => {
    await exec('systemctl', args);
  };

  return {
    stop: (name) => systemctl('stop', name),
    start: (name) => systemctl('start', name),
    restart: (name) => systemctl('restart', name),
    reloadUnitCache: () => systemctl('daemon-reload'),

    async status(name) {
      try {
        const stdout = await exec('systemctl', ['is-active', name]);
        return stdout.trim();
      } catch {
        // is-active exits non-zero for every state but "active"
        return 'inactive';
      }
    },
  };
}
