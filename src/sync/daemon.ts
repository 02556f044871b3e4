import { access } from 'node:fs/promises';
import type { SyncContext } from '../context.js';
import { selectApps } from '../apps/registry.js';
import type { SyncRun } from './synchronizer.js';
import { ConfigWatcher, type SettleNotification } from './watcher.js';

export interface DaemonOptions {
  /** App names to watch and keep in sync; defaults to every known app */
  watch?: string[];
  debounceMs?: number;
  selfWriteWindowMs?: number;
  force?: boolean;
  /** Stop after the first settled change has been handled */
  once?: boolean;
  timeoutMs?: number;
  onSync?: (notification: SettleNotification, run: SyncRun) => void;
}

export interface DaemonHandle {
  watcher: ConfigWatcher;
  /** Closes the watcher, then waits for an in-flight sync to finish */
  stop(): Promise<void>;
  /** Resolves once the daemon has stopped for any reason */
  done: Promise<void>;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Watch the selected apps and, on every settled change, push the changed app's
 * servers to the other watched apps. Syncs run one at a time, in settle order.
 */
export async function runDaemon(context: SyncContext, options: DaemonOptions = {}): Promise<DaemonHandle> {
  const { logger, synchronizer } = context;
  const watchNames = options.watch && options.watch.length > 0 ? options.watch : context.config.watch;
  const apps = watchNames.length > 0 ? selectApps(context.apps, watchNames) : context.apps;

  const watcher = new ConfigWatcher(apps, {
    debounceMs: options.debounceMs ?? context.config.debounceMs,
    selfWriteWindowMs: options.selfWriteWindowMs ?? context.config.selfWriteWindowMs,
    logger,
  });
  const removeListener = synchronizer.addWriteListener(filePath => watcher.markSelfWrite(filePath));

  const handle = async (notification: SettleNotification) => {
    try {
      if (!(await fileExists(notification.path))) {
        logger.warn({ app: notification.appName }, 'Changed config no longer exists, nothing to propagate');
        return;
      }

      const run = await synchronizer.syncFrom(notification.appName, {
        targets: apps.filter(app => app.name !== notification.appName).map(app => app.name),
        force: options.force,
      });
      logger.info({
        source: notification.appName,
        succeeded: run.report.succeeded,
        skipped: run.report.skipped,
        failed: run.report.failed,
      }, 'Sync after change completed');
      options.onSync?.(notification, run);
    } catch (error) {
      // One failed sync must never stop monitoring
      logger.error({ app: notification.appName, err: error }, 'Sync after change failed');
    }
  };

  await watcher.start();

  const worker = (async () => {
    for await (const notification of watcher.notifications()) {
      await handle(notification);
      if (options.once) {
        break;
      }
    }
  })();

  let timeout: NodeJS.Timeout | undefined;
  let stopping: Promise<void> | undefined;

  const stop = (): Promise<void> => {
    if (!stopping) {
      stopping = (async () => {
        if (timeout) {
          clearTimeout(timeout);
        }
        removeListener();
        logger.info({ pending: watcher.pendingCount, queued: watcher.queuedCount }, 'Stopping watcher, dropping unsynced changes');
        await watcher.close();
        await worker;
        logger.info('Watcher stopped');
      })();
    }
    return stopping;
  };

  if (options.timeoutMs !== undefined) {
    timeout = setTimeout(() => {
      logger.info({ timeoutMs: options.timeoutMs }, 'Watch timeout reached');
      stop().catch(error => logger.error({ err: error }, 'Failed to stop watcher'));
    }, options.timeoutMs);
  }

  const done = worker.then(() => stop());

  return { watcher, stop, done };
}
