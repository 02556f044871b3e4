export * from './types/canonical.js';
export { ConfigSchema, type Config } from './types/config.js';
export { FORMAT_HANDLERS, DETECTION_ORDER, detectFormat, getHandler, type FormatHandler } from './formats/index.js';
export { KNOWN_APPS, resolveApps, findApp, selectApps } from './apps/registry.js';
export { loadConfig, createDefaultConfig } from './config/loader.js';
export { createContext, type SyncContext } from './context.js';
export {
  ConfigSynchronizer,
  type ApplyOptions,
  type ConfirmDestructive,
  type SyncFromOptions,
  type SyncRun,
} from './sync/synchronizer.js';
export { ConfigWatcher, type SettleNotification, type WatcherOptions } from './sync/watcher.js';
export { SettleChannel } from './sync/channel.js';
export { runDaemon, type DaemonHandle, type DaemonOptions } from './sync/daemon.js';
export { formatReport, formatValidation, formatDestructiveOperation, isFullSuccess } from './sync/report.js';
export {
  diffConfigs,
  emptyCanonical,
  findDestructiveOperation,
  selectServers,
  serversEqual,
} from './sync/canonical.js';
export {
  SyncError,
  ConfigReadError,
  MalformedConfigError,
  UnrecognizedFormatError,
  WriteError,
} from './utils/errors.js';
