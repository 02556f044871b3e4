import path from 'path';
import { watch, type FSWatcher } from 'chokidar';
import type { AppDescriptor } from '../types/canonical.js';
import type { Logger } from '../utils/logger.js';
import { SettleChannel } from './channel.js';

export interface SettleNotification {
  appName: string;
  path: string;
}

export interface WatcherOptions {
  debounceMs: number;
  selfWriteWindowMs: number;
  logger: Logger;
}

// Editors that save by delete + recreate produce unlink/add pairs
const RELEVANT_EVENTS = new Set(['add', 'change', 'unlink']);

/**
 * Watches the parent directories of the given apps' config files and emits one
 * settle notification per file once its events stop for `debounceMs`.
 */
export class ConfigWatcher {
  private readonly targets = new Map<string, AppDescriptor>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly selfWrites = new Map<string, number>();
  private readonly channel = new SettleChannel<SettleNotification>();
  private fsWatcher: FSWatcher | null = null;

  constructor(
    apps: readonly AppDescriptor[],
    private readonly options: WatcherOptions
  ) {
    for (const app of apps) {
      this.targets.set(path.resolve(app.path), app);
    }
  }

  get watchedPaths(): string[] {
    return [...this.targets.keys()];
  }

  get directories(): string[] {
    return [...new Set(this.watchedPaths.map(filePath => path.dirname(filePath)))];
  }

  /** Files with a debounce timer running */
  get pendingCount(): number {
    return this.timers.size;
  }

  /** Settled notifications not yet taken by the consumer */
  get queuedCount(): number {
    return this.channel.size;
  }

  async start(): Promise<void> {
    if (this.fsWatcher) {
      return;
    }

    const fsWatcher = watch(this.directories, {
      ignoreInitial: true,
      depth: 0,
      persistent: true,
    });
    this.fsWatcher = fsWatcher;

    fsWatcher.on('all', (eventName, filePath) => this.handleEvent(eventName, filePath));
    fsWatcher.on('error', (error) => {
      this.options.logger.error({ err: error }, 'Filesystem watcher error');
    });

    await new Promise<void>(resolve => {
      fsWatcher.once('ready', () => resolve());
    });

    this.options.logger.info({
      directories: this.directories,
      files: this.watchedPaths,
      debounceMs: this.options.debounceMs,
    }, 'Watching config files');
  }

  /**
   * Feed one raw filesystem event through filter, self-write suppression and debounce
   */
  handleEvent(eventName: string, filePath: string): void {
    if (this.channel.isClosed || !RELEVANT_EVENTS.has(eventName)) {
      return;
    }

    const resolved = path.resolve(filePath);
    const app = this.targets.get(resolved);
    if (!app) {
      return;
    }

    const suppressUntil = this.selfWrites.get(resolved);
    if (suppressUntil !== undefined) {
      if (Date.now() < suppressUntil) {
        this.options.logger.debug({ app: app.name, event: eventName }, 'Ignoring event caused by our own write');
        return;
      }
      this.selfWrites.delete(resolved);
    }

    const pending = this.timers.get(resolved);
    if (pending) {
      clearTimeout(pending);
    }

    this.options.logger.debug({ app: app.name, event: eventName }, 'Config change detected');
    this.timers.set(resolved, setTimeout(() => {
      this.timers.delete(resolved);
      this.options.logger.info({ app: app.name, path: resolved }, 'Config change settled');
      this.channel.push({ appName: app.name, path: resolved });
    }, this.options.debounceMs));
  }

  /**
   * Suppress events for `filePath` for the self-write window
   */
  markSelfWrite(filePath: string): void {
    this.selfWrites.set(path.resolve(filePath), Date.now() + this.options.selfWriteWindowMs);
  }

  notifications(): AsyncIterable<SettleNotification> {
    return this.channel;
  }

  async close(): Promise<void> {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.channel.close();

    if (this.fsWatcher) {
      const fsWatcher = this.fsWatcher;
      this.fsWatcher = null;
      await fsWatcher.close();
    }
  }
}
