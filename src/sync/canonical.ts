import type {
  CanonicalConfig,
  CanonicalServer,
  DestructiveOperation,
  FormatKind,
} from '../types/canonical.js';
import { getHandler, sharesCollection } from '../formats/index.js';
import { MalformedConfigError } from '../utils/errors.js';

export function emptyCanonical(): CanonicalConfig {
  return { servers: new Map() };
}

export function serverNames(config: CanonicalConfig): Set<string> {
  return new Set(config.servers.keys());
}

/**
 * Two entries describe the same server iff command, args (in order) and the env
 * key/value set match. Passthrough fields never take part.
 */
export function serversEqual(a: CanonicalServer, b: CanonicalServer): boolean {
  if (a.command !== b.command) {
    return false;
  }
  if (a.args.length !== b.args.length || a.args.some((arg, i) => arg !== b.args[i])) {
    return false;
  }
  const aKeys = Object.keys(a.env);
  if (aKeys.length !== Object.keys(b.env).length) {
    return false;
  }
  return aKeys.every(key => Object.hasOwn(b.env, key) && b.env[key] === a.env[key]);
}

export interface ConfigDiff {
  /** In the reference, absent from the other side */
  missing: string[];
  /** Present on the other side only */
  extra: string[];
  differing: string[];
}

export function diffConfigs(reference: CanonicalConfig, other: CanonicalConfig): ConfigDiff {
  const diff: ConfigDiff = { missing: [], extra: [], differing: [] };

  for (const [name, server] of reference.servers) {
    const candidate = other.servers.get(name);
    if (!candidate) {
      diff.missing.push(name);
    } else if (!serversEqual(server, candidate)) {
      diff.differing.push(name);
    }
  }
  for (const name of other.servers.keys()) {
    if (!reference.servers.has(name)) {
      diff.extra.push(name);
    }
  }

  return diff;
}

export function isEmptyDiff(diff: ConfigDiff): boolean {
  return diff.missing.length === 0 && diff.extra.length === 0 && diff.differing.length === 0;
}

export function describeDiff(diff: ConfigDiff): string {
  const parts: string[] = [];
  if (diff.missing.length > 0) {
    parts.push(`missing: ${diff.missing.join(', ')}`);
  }
  if (diff.extra.length > 0) {
    parts.push(`extra: ${diff.extra.join(', ')}`);
  }
  if (diff.differing.length > 0) {
    parts.push(`differs: ${diff.differing.join(', ')}`);
  }
  return parts.join('; ');
}

/**
 * Record for a write that would drop servers the target has today, or undefined
 * when nothing would be lost.
 */
export function findDestructiveOperation(
  appName: string,
  current: CanonicalConfig,
  next: CanonicalConfig
): DestructiveOperation | undefined {
  const existingServers = serverNames(current);
  const serversToRemove = new Set<string>();
  const remainingServers = new Set<string>();

  for (const name of existingServers) {
    if (next.servers.has(name)) {
      remainingServers.add(name);
    } else {
      serversToRemove.add(name);
    }
  }

  if (serversToRemove.size === 0) {
    return undefined;
  }
  return { appName, existingServers, serversToRemove, remainingServers };
}

/**
 * Narrow a config to the named servers, keeping the config's own order
 */
export function selectServers(config: CanonicalConfig, names: readonly string[]): CanonicalConfig {
  const unknown = names.filter(name => !config.servers.has(name));
  if (unknown.length > 0) {
    throw new MalformedConfigError(`Unknown server(s): ${unknown.join(', ')}`);
  }

  const wanted = new Set(names);
  const servers = new Map<string, CanonicalServer>();
  for (const [name, server] of config.servers) {
    if (wanted.has(name)) {
      servers.set(name, server);
    }
  }
  return { servers, format: config.format };
}

/**
 * Re-key passthrough fields for a write into `targetKind`: a config read from another
 * schema brings no extras, so each server keeps the ones the target already stores.
 */
export function withTargetExtras(
  canonical: CanonicalConfig,
  current: CanonicalConfig,
  targetKind: FormatKind
): CanonicalConfig {
  if (canonical.format === targetKind) {
    return canonical;
  }

  // Extras found at the target's own collection path belong to the target
  const borrow = current.format !== undefined &&
    sharesCollection(getHandler(current.format), getHandler(targetKind));

  const servers = new Map<string, CanonicalServer>();
  for (const [name, server] of canonical.servers) {
    const existing = borrow ? current.servers.get(name) : undefined;
    servers.set(name, { ...server, extra: existing ? existing.extra : {} });
  }
  return { servers, format: targetKind };
}
