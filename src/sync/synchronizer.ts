import path from 'path';
import type {
  AppDescriptor,
  CanonicalConfig,
  CanonicalServer,
  DestructiveOperation,
  JsonObject,
  SyncReport,
  TargetOutcome,
  ValidationResult,
  WritePlan,
} from '../types/canonical.js';
import type { FormatHandler } from '../formats/types.js';
import { detectFormat, getHandler, sharesCollection } from '../formats/index.js';
import { removeAt } from '../formats/shared.js';
import { findApp, selectApps } from '../apps/registry.js';
import { MalformedConfigError, SyncError, WriteError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { AsyncLock } from '../utils/lock.js';
import {
  describeDiff,
  diffConfigs,
  emptyCanonical,
  findDestructiveOperation,
  isEmptyDiff,
  selectServers,
  serverNames,
  withTargetExtras,
} from './canonical.js';
import { createBackup, readDocument, serializeDocument, writeFileAtomic } from './files.js';

export interface SynchronizerOptions {
  apps: AppDescriptor[];
  logger: Logger;
  backups?: { enabled: boolean; keep: number };
}

/** Called with the target path just before each write lands */
export type WriteListener = (path: string) => void;

/**
 * Gate for destructive writes. Return true to let the write proceed.
 * The core never prompts; the CLI wires this to a terminal question.
 */
export type ConfirmDestructive = (op: DestructiveOperation) => Promise<boolean> | boolean;

export interface ApplyOptions {
  force?: boolean;
  confirm?: ConfirmDestructive;
}

export interface SyncFromOptions extends ApplyOptions {
  /** App names to write; defaults to every known app except the source */
  targets?: string[];
  /** Only propagate these servers */
  servers?: string[];
  validate?: boolean;
}

export interface SyncRun {
  canonical: CanonicalConfig;
  report: SyncReport;
  validation?: Map<string, ValidationResult>;
}

export interface ResolvedSource {
  path: string;
  label: string;
  app?: AppDescriptor;
}

export interface AppSnapshot {
  app: AppDescriptor;
  exists: boolean;
  format: FormatHandler;
  config: CanonicalConfig;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function extractAt(handler: FormatHandler, doc: JsonObject, filePath: string): CanonicalConfig {
  try {
    return handler.extract(doc);
  } catch (error) {
    if (error instanceof MalformedConfigError && error.path === undefined) {
      throw new MalformedConfigError(`${filePath}: ${error.message}`, filePath);
    }
    throw error;
  }
}

export function buildReport(
  outcomes: TargetOutcome[],
  destructiveOps: DestructiveOperation[],
  source?: string
): SyncReport {
  return {
    timestamp: new Date(),
    source,
    outcomes,
    succeeded: outcomes.filter(o => o.status === 'written' || o.status === 'unchanged').length,
    skipped: outcomes.filter(o => o.status === 'skipped').length,
    failed: outcomes.filter(o => o.status === 'failed').length,
    destructiveOps,
  };
}

/**
 * Load → detect → extract → [plan → confirm? → write]* → validate.
 * Every target is handled independently; one failing app never stops the rest.
 * Runs that write hold one lock, so a plan is never made against a file
 * another run is about to replace.
 */
export class ConfigSynchronizer {
  readonly apps: AppDescriptor[];
  private readonly logger: Logger;
  private readonly backups: { enabled: boolean; keep: number };
  private readonly writeListeners = new Set<WriteListener>();
  private readonly lock = new AsyncLock();

  constructor(options: SynchronizerOptions) {
    this.apps = options.apps;
    this.logger = options.logger;
    this.backups = options.backups ?? { enabled: false, keep: 1 };
  }

  /**
   * Returns a function that removes the listener again
   */
  addWriteListener(listener: WriteListener): () => void {
    this.writeListeners.add(listener);
    return () => {
      this.writeListeners.delete(listener);
    };
  }

  /**
   * A known app name, or else a path to any config file
   */
  resolveSource(sourceRef: string): ResolvedSource {
    const app = findApp(this.apps, sourceRef);
    if (app) {
      return { path: app.path, label: app.name, app };
    }
    const resolved = path.resolve(sourceRef);
    const byPath = this.apps.find(candidate => candidate.path === resolved);
    return byPath
      ? { path: resolved, label: byPath.name, app: byPath }
      : { path: resolved, label: `Custom (${resolved})` };
  }

  async loadCanonical(sourceRef: string): Promise<CanonicalConfig> {
    const source = this.resolveSource(sourceRef);
    const { doc, raw, exists } = await readDocument(source.path);

    if (!exists || raw.trim().length === 0) {
      this.logger.warn({ source: source.label, path: source.path }, 'Source config missing or empty, using no servers');
      return emptyCanonical();
    }

    const handler = detectFormat(doc);
    const canonical = extractAt(handler, doc, source.path);

    this.logger.info({
      source: source.label,
      format: handler.kind,
      servers: [...canonical.servers.keys()],
    }, 'Loaded canonical configuration');

    return canonical;
  }

  async readApp(app: AppDescriptor): Promise<AppSnapshot> {
    const { doc, exists } = await readDocument(app.path);
    const format = detectFormat(doc);
    return { app, exists, format, config: extractAt(format, doc, app.path) };
  }

  async planWrite(app: AppDescriptor, canonical: CanonicalConfig): Promise<WritePlan> {
    const { doc, raw, exists } = await readDocument(app.path);
    const detected = detectFormat(doc);
    const current = extractAt(detected, doc, app.path);
    const preferred = getHandler(app.preferredFormat);

    // Writing always normalizes to the app's own schema
    const base = sharesCollection(detected, preferred) ? doc : removeAt(doc, detected.collection);
    const document = preferred.merge(base, withTargetExtras(canonical, current, preferred.kind));
    const content = serializeDocument(document);

    return {
      app,
      document,
      content,
      currentFormat: detected.kind,
      changed: content !== raw,
      fileExists: exists,
      destructiveOp: findDestructiveOperation(app.name, current, canonical),
    };
  }

  applySync(
    canonical: CanonicalConfig,
    targets: AppDescriptor[],
    options: ApplyOptions = {}
  ): Promise<SyncReport> {
    return this.lock.run(() => this.applyLocked(canonical, targets, options));
  }

  private async applyLocked(
    canonical: CanonicalConfig,
    targets: AppDescriptor[],
    options: ApplyOptions
  ): Promise<SyncReport> {
    const outcomes: TargetOutcome[] = [];
    const destructiveOps: DestructiveOperation[] = [];

    for (const app of targets) {
      const base = { appName: app.name, path: app.path };
      try {
        const plan = await this.planWrite(app, canonical);

        if (plan.destructiveOp) {
          destructiveOps.push(plan.destructiveOp);
          const confirmed = options.force || (options.confirm ? await options.confirm(plan.destructiveOp) : false);
          if (!confirmed) {
            this.logger.warn({
              app: app.name,
              serversToRemove: [...plan.destructiveOp.serversToRemove],
            }, 'Destructive sync not confirmed, skipping target');
            outcomes.push({ ...base, status: 'skipped' });
            continue;
          }
        }

        if (!plan.changed) {
          this.logger.debug({ app: app.name }, 'Target already up to date');
          outcomes.push({ ...base, status: 'unchanged' });
          continue;
        }

        const backupPath = plan.fileExists ? await this.backup(app.path) : undefined;
        for (const listener of this.writeListeners) {
          listener(app.path);
        }
        await writeFileAtomic(app.path, plan.content);

        const action = plan.fileExists ? 'updated' : 'created';
        this.logger.info({ app: app.name, path: app.path, action, servers: canonical.servers.size }, 'Target config written');
        outcomes.push({ ...base, status: 'written', action, backupPath });
      } catch (error) {
        const errorKind = error instanceof SyncError ? error.kind : 'unknown';
        this.logger.error({ app: app.name, path: app.path, errorKind, err: error }, 'Failed to sync target');
        outcomes.push({ ...base, status: 'failed', errorKind, error: errorMessage(error) });
      }
    }

    return buildReport(outcomes, destructiveOps);
  }

  async validateAll(
    canonical: CanonicalConfig,
    apps: AppDescriptor[] = this.apps
  ): Promise<Map<string, ValidationResult>> {
    const results = new Map<string, ValidationResult>();

    for (const app of apps) {
      try {
        const snapshot = await this.readApp(app);
        const diff = diffConfigs(canonical, snapshot.config);
        const result: ValidationResult = {
          inSync: isEmptyDiff(diff),
          format: snapshot.exists ? snapshot.format.label : 'missing',
          serverNames: serverNames(snapshot.config),
        };
        if (!result.inSync) {
          result.reason = snapshot.exists ? describeDiff(diff) : `config file not found (${describeDiff(diff)})`;
          this.logger.warn({ app: app.name, reason: result.reason }, 'Config mismatch detected');
        }
        results.set(app.name, result);
      } catch (error) {
        this.logger.warn({ app: app.name, err: error }, 'Could not validate config');
        results.set(app.name, {
          inSync: false,
          format: 'unknown',
          reason: errorMessage(error),
          serverNames: new Set(),
        });
      }
    }

    return results;
  }

  /**
   * One full run: the source's servers are written to every target, then checked
   */
  syncFrom(sourceRef: string, options: SyncFromOptions = {}): Promise<SyncRun> {
    return this.lock.run(() => this.syncFromLocked(sourceRef, options));
  }

  private async syncFromLocked(sourceRef: string, options: SyncFromOptions): Promise<SyncRun> {
    const source = this.resolveSource(sourceRef);
    let canonical = await this.loadCanonical(sourceRef);
    if (options.servers && options.servers.length > 0) {
      canonical = selectServers(canonical, options.servers);
    }

    const targets = options.targets
      ? selectApps(this.apps, options.targets).filter(app => app.path !== source.path)
      : this.apps.filter(app => app.path !== source.path);

    const report = await this.applyLocked(canonical, targets, options);
    report.source = source.label;

    const validation = options.validate === false
      ? undefined
      : await this.validateAll(canonical, targets);

    return { canonical, report, validation };
  }

  async upsertServer(appName: string, server: CanonicalServer): Promise<TargetOutcome> {
    const [app] = selectApps(this.apps, [appName]);
    return this.lock.run(async () => {
      const { config } = await this.readApp(app);
      const servers = new Map(config.servers);
      servers.set(server.name, server);
      const report = await this.applyLocked({ servers, format: app.preferredFormat }, [app], {});
      return report.outcomes[0];
    });
  }

  /**
   * Removing by name is itself the confirmation, so the destructive gate is bypassed
   */
  async removeServer(appName: string, serverName: string): Promise<TargetOutcome> {
    const [app] = selectApps(this.apps, [appName]);
    return this.lock.run(async () => {
      const { config } = await this.readApp(app);
      if (!config.servers.has(serverName)) {
        throw new MalformedConfigError(`Server "${serverName}" not found in ${app.name}`, app.path);
      }
      const servers = new Map(config.servers);
      servers.delete(serverName);
      const report = await this.applyLocked({ servers, format: app.preferredFormat }, [app], { force: true });
      return report.outcomes[0];
    });
  }

  private async backup(filePath: string): Promise<string | undefined> {
    if (!this.backups.enabled) {
      return undefined;
    }
    try {
      return await createBackup(filePath, this.backups.keep);
    } catch (error) {
      throw new WriteError(`Failed to back up ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
    }
  }
}
