#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig } from '../config/loader.js';
import { createContext, type SyncContext } from '../context.js';
import { runDaemon } from '../sync/daemon.js';
import { formatEditOutcome, formatReport, formatValidation, allInSync, isFullSuccess } from '../sync/report.js';
import type { TargetOutcome } from '../types/canonical.js';
import { SERVER_VERSION } from '../version.js';
import { confirmDestructive } from './prompts.js';
import { parseEnv, parseList, parseSeconds } from './options.js';

interface SyncOptions {
  source?: string;
  daemon?: boolean;
  watch?: string[];
  watchOnce?: boolean;
  timeout?: number;
  debounce?: number;
  targets?: string[];
  servers?: string[];
  force?: boolean;
  config?: string;
}

interface StatusOptions {
  source: string;
  config?: string;
}

interface AddOptions {
  env: Record<string, string>;
  config?: string;
}

function buildContext(configPath?: string): SyncContext {
  return createContext(loadConfig(configPath));
}

async function syncOnce(context: SyncContext, source: string, options: SyncOptions): Promise<boolean> {
  const run = await context.synchronizer.syncFrom(source, {
    targets: options.targets,
    servers: options.servers,
    force: options.force,
    confirm: process.stdin.isTTY ? confirmDestructive : undefined,
  });
  console.log(formatReport(run.report, run.validation));
  return isFullSuccess(run.report, run.validation);
}

async function watchMode(context: SyncContext, options: SyncOptions): Promise<number> {
  let exitCode = 0;
  if (options.source && !(await syncOnce(context, options.source, options))) {
    exitCode = 1;
  }

  const handle = await runDaemon(context, {
    watch: options.watch,
    debounceMs: options.debounce,
    once: options.watchOnce,
    timeoutMs: options.timeout,
    force: options.force,
    onSync: (_notification, run) => {
      console.log(formatReport(run.report, run.validation));
      if (!isFullSuccess(run.report, run.validation)) {
        exitCode = 1;
      }
    },
  });

  const shutdown = (signal: NodeJS.Signals) => {
    context.logger.info({ signal }, 'Shutting down watcher...');
    handle.stop().catch(error => {
      context.logger.error({ err: error }, 'Error while stopping watcher');
      exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await handle.done;
  return exitCode;
}

async function runSync(options: SyncOptions): Promise<number> {
  const context = buildContext(options.config);

  if (options.daemon || options.watchOnce) {
    return watchMode(context, options);
  }
  if (!options.source) {
    console.error('error: --source is required unless --daemon or --watch-once is given');
    return 1;
  }
  return (await syncOnce(context, options.source, options)) ? 0 : 1;
}

async function runStatus(options: StatusOptions): Promise<number> {
  const { synchronizer } = buildContext(options.config);
  const canonical = await synchronizer.loadCanonical(options.source);
  const validation = await synchronizer.validateAll(canonical);

  console.log(`Reference: ${options.source} (${canonical.servers.size} servers)\n`);
  console.log(formatValidation(validation));
  return allInSync(validation) ? 0 : 1;
}

async function runList(options: { config?: string }): Promise<number> {
  const { apps, synchronizer } = buildContext(options.config);
  let exitCode = 0;

  for (const app of apps) {
    try {
      const snapshot = await synchronizer.readApp(app);
      const format = snapshot.exists ? snapshot.format.label : 'missing';
      const names = [...snapshot.config.servers.keys()];
      console.log(`${app.name.padEnd(18)} ${format.padEnd(13)} ${names.length} server(s)  ${app.path}`);
      if (names.length > 0) {
        console.log(`${' '.repeat(19)}${names.join(', ')}`);
      }
    } catch (error) {
      exitCode = 1;
      const message = error instanceof Error ? error.message : String(error);
      console.log(`${app.name.padEnd(18)} error         ${message}`);
    }
  }
  return exitCode;
}

function editExitCode(outcome: TargetOutcome): number {
  return outcome.status === 'written' || outcome.status === 'unchanged' ? 0 : 1;
}

async function runAdd(appName: string, name: string, command: string, args: string[], options: AddOptions): Promise<number> {
  const { synchronizer } = buildContext(options.config);
  const outcome = await synchronizer.upsertServer(appName, { name, command, args, env: options.env, extra: {} });
  console.log(formatEditOutcome(outcome, name, 'saved'));
  return editExitCode(outcome);
}

async function runRemove(appName: string, name: string, options: { config?: string }): Promise<number> {
  const { synchronizer } = buildContext(options.config);
  const outcome = await synchronizer.removeServer(appName, name);
  console.log(formatEditOutcome(outcome, name, 'removed'));
  return editExitCode(outcome);
}

async function main() {
  const program = new Command();

  program
    .name('mcp-config-sync')
    .description('Keep MCP server configuration in sync across desktop applications')
    .version(SERVER_VERSION)
    .enablePositionalOptions()
    .option('-s, --source <name|path>', 'application name or config file to sync from')
    .option('--daemon', 'keep running and sync whenever a watched config changes')
    .option('--watch <apps>', 'comma-separated applications to watch', parseList)
    .option('--watch-once', 'exit after the first change has been synced')
    .option('--timeout <seconds>', 'stop watching after this many seconds', parseSeconds)
    .option('--debounce <seconds>', 'quiet period before a change is synced (default: 2.0)', parseSeconds)
    .option('--targets <apps>', 'comma-separated applications to write', parseList)
    .option('--servers <names>', 'only sync these servers', parseList)
    .option('-f, --force', 'remove servers missing from the source without asking')
    .option('-c, --config <path>', 'settings file')
    .action(async (options: SyncOptions) => {
      process.exitCode = await runSync(options);
    });

  program
    .command('status')
    .description('check every application against a reference configuration')
    .option('-s, --source <name|path>', 'reference application or file', 'Claude')
    .option('-c, --config <path>', 'settings file')
    .action(async (options: StatusOptions) => {
      process.exitCode = await runStatus(options);
    });

  program
    .command('list')
    .description('show each application with its detected format and servers')
    .option('-c, --config <path>', 'settings file')
    .action(async (options: { config?: string }) => {
      process.exitCode = await runList(options);
    });

  program
    .command('add')
    .description('add or replace one server in one application (options go before <app>)')
    .argument('<app>', 'application to edit')
    .argument('<name>', 'server name')
    .argument('<command>', 'executable that starts the server')
    .argument('[args...]', 'command arguments')
    .option('-e, --env <KEY=VALUE>', 'environment variable for the server, repeatable', parseEnv, {})
    .option('-c, --config <path>', 'settings file')
    .passThroughOptions()
    .action(async (appName: string, name: string, command: string, args: string[], options: AddOptions) => {
      process.exitCode = await runAdd(appName, name, command, args, options);
    });

  program
    .command('remove')
    .description('remove one server from one application')
    .argument('<app>', 'application to edit')
    .argument('<name>', 'server name')
    .option('-c, --config <path>', 'settings file')
    .action(async (appName: string, name: string, options: { config?: string }) => {
      process.exitCode = await runRemove(appName, name, options);
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error('Fatal error:', message);
  process.exit(1);
});
