import pino from 'pino';
import { mkdirSync, realpathSync, rmSync, writeFileSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { CanonicalConfig, CanonicalServer, FormatKind } from '../src/types/canonical.js';
import type { Logger } from '../src/utils/logger.js';

export function createTestLogger(): Logger {
  return pino({ level: 'silent' });
}

export function server(
  name: string,
  command: string,
  args: string[] = [],
  env: Record<string, string> = {}
): CanonicalServer {
  return { name, command, args, env, extra: {} };
}

export function canonicalOf(servers: CanonicalServer[], format?: FormatKind): CanonicalConfig {
  return { servers: new Map(servers.map(s => [s.name, s])), format };
}

export function makeTempDir(label: string): string {
  const dir = join(tmpdir(), `mcp-config-sync-${label}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  // Resolve symlinks AFTER directory creation (macOS /tmp -> /private/var/folders)
  return realpathSync(dir);
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function writeJson(path: string, value: unknown): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(value, null, 2));
}

export function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}
