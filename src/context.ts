import type { AppDescriptor } from './types/canonical.js';
import type { Config } from './types/config.js';
import { resolveApps, currentPlatform } from './apps/registry.js';
import type { PlatformInfo } from './apps/paths.js';
import { ConfigSynchronizer } from './sync/synchronizer.js';
import { createLogger, type Logger } from './utils/logger.js';

/**
 * Everything an entry point needs, built once at process start
 */
export interface SyncContext {
  config: Config;
  logger: Logger;
  apps: AppDescriptor[];
  synchronizer: ConfigSynchronizer;
}

export function createContext(
  config: Config,
  logger: Logger = createLogger(config),
  platform: PlatformInfo = currentPlatform()
): SyncContext {
  const apps = resolveApps(config.appPaths, platform);
  const synchronizer = new ConfigSynchronizer({
    apps,
    logger,
    backups: config.backups,
  });

  return { config, logger, apps, synchronizer };
}
