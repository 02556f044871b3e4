import { z } from 'zod';
import { LosslessNumber } from 'lossless-json';
import type { CanonicalConfig, CanonicalServer, FormatKind, JsonObject, JsonValue } from '../types/canonical.js';
import { MalformedConfigError } from '../utils/errors.js';

/**
 * A single server entry as every supported schema stores it.
 * Permissive: unknown fields pass through and become `extra`.
 */
export const ServerEntrySchema = z
  .object({
    command: z.string().min(1, 'command must be a non-empty string'),
    args: z.array(z.string()).optional(),
    env: z.record(z.string()).optional(),
  })
  .passthrough();

const CANONICAL_KEYS = new Set(['command', 'args', 'env']);

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) &&
    !(value instanceof LosslessNumber);
}

export function hasKey(value: JsonValue | undefined, key: string): boolean {
  return isJsonObject(value) && Object.hasOwn(value, key);
}

export function getAt(doc: JsonObject, path: readonly string[]): JsonValue | undefined {
  let current: JsonValue | undefined = doc;
  for (const key of path) {
    if (!isJsonObject(current) || !Object.hasOwn(current, key)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

/**
 * Copy of `doc` with `value` stored at `path`. Existing keys keep their position;
 * intermediate objects that are missing (or not objects) are created.
 */
export function setAt(doc: JsonObject, path: readonly string[], value: JsonValue): JsonObject {
  const [head, ...rest] = path;
  if (head === undefined) {
    return doc;
  }
  if (rest.length === 0) {
    return { ...doc, [head]: value };
  }
  const existing = Object.hasOwn(doc, head) ? doc[head] : undefined;
  return { ...doc, [head]: setAt(isJsonObject(existing) ? existing : {}, rest, value) };
}

/**
 * Copy of `doc` without `path`. Parent objects left empty by the removal go too.
 */
export function removeAt(doc: JsonObject, path: readonly string[]): JsonObject {
  const [head, ...rest] = path;
  if (head === undefined || !Object.hasOwn(doc, head)) {
    return doc;
  }
  const { [head]: removed, ...others } = doc;
  if (rest.length === 0) {
    return others;
  }
  if (!isJsonObject(removed)) {
    return doc;
  }
  const child = removeAt(removed, rest);
  if (Object.keys(child).length === 0) {
    return others;
  }
  return { ...doc, [head]: child };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'entry'}: ${issue.message}`)
    .join('; ');
}

export function extractCollection(
  doc: JsonObject,
  collection: readonly string[],
  kind: FormatKind
): CanonicalConfig {
  const servers = new Map<string, CanonicalServer>();
  const raw = getAt(doc, collection);
  if (raw === undefined) {
    return { servers, format: kind };
  }

  const location = collection.join('.');
  if (!isJsonObject(raw)) {
    throw new MalformedConfigError(`"${location}" must be an object of server entries`);
  }

  for (const [name, entry] of Object.entries(raw)) {
    if (name.length === 0) {
      throw new MalformedConfigError(`"${location}" contains a server with an empty name`);
    }
    if (!isJsonObject(entry)) {
      throw new MalformedConfigError(`Server "${name}" in "${location}" must be an object`);
    }
    const parsed = ServerEntrySchema.safeParse(entry);
    if (!parsed.success) {
      throw new MalformedConfigError(`Server "${name}" in "${location}": ${describeIssues(parsed.error)}`);
    }

    const extra: JsonObject = {};
    for (const [key, value] of Object.entries(entry)) {
      if (!CANONICAL_KEYS.has(key)) {
        extra[key] = value;
      }
    }

    servers.set(name, {
      name,
      command: parsed.data.command,
      args: parsed.data.args ?? [],
      env: parsed.data.env ?? {},
      extra,
    });
  }

  return { servers, format: kind };
}

/**
 * Server map as written by handler `kind`. Empty args/env are omitted;
 * passthrough fields are only re-emitted into the schema they were read from.
 */
export function serializeServers(canonical: CanonicalConfig, kind: FormatKind): JsonObject {
  const out: JsonObject = {};
  for (const server of canonical.servers.values()) {
    const entry: JsonObject = { command: server.command };
    if (server.args.length > 0) {
      entry.args = [...server.args];
    }
    if (Object.keys(server.env).length > 0) {
      entry.env = { ...server.env };
    }
    if (canonical.format === kind) {
      for (const [key, value] of Object.entries(server.extra)) {
        if (!CANONICAL_KEYS.has(key)) {
          entry[key] = value;
        }
      }
    }
    out[server.name] = entry;
  }
  return out;
}
