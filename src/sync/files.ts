import { chmod, copyFile, mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { LosslessNumber, isSafeNumber, parse, stringify } from 'lossless-json';
import type { JsonObject } from '../types/canonical.js';
import { isJsonObject } from '../formats/shared.js';
import { ConfigReadError, WriteError, isNodeError, withRetry } from '../utils/errors.js';

export interface LoadedDocument {
  doc: JsonObject;
  /** Bytes on disk, empty string when the file does not exist */
  raw: string;
  exists: boolean;
}

function parseNumber(value: string): number | LosslessNumber {
  return isSafeNumber(value) ? parseFloat(value) : new LosslessNumber(value);
}

/**
 * Read and parse a JSON config file. Missing or blank files load as `{}`.
 */
export async function readDocument(path: string): Promise<LoadedDocument> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return { doc: {}, raw: '', exists: false };
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigReadError(`Cannot read ${path}: ${message}`, path, { cause: error });
  }

  if (raw.trim().length === 0) {
    return { doc: {}, raw, exists: true };
  }

  let parsed: unknown;
  try {
    parsed = parse(raw, null, parseNumber);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigReadError(`Invalid JSON in ${path}: ${message}`, path, { cause: error });
  }

  if (!isJsonObject(parsed)) {
    throw new ConfigReadError(`Expected a JSON object at the top level of ${path}`, path);
  }
  return { doc: parsed, raw, exists: true };
}

/**
 * Two-space JSON with a trailing newline. Big integers are written back digit for digit.
 */
export function serializeDocument(doc: JsonObject): string {
  return `${stringify(doc, undefined, 2) ?? '{}'}\n`;
}

async function existingMode(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).mode & 0o7777;
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

// Windows reports these while another process holds the file open
const TRANSIENT_RENAME_CODES = new Set(['EPERM', 'EBUSY', 'EACCES']);

/**
 * Write temp file in the target's directory, then rename over the target,
 * so readers never see a partial file. The temp file never outlives a failure.
 * A replaced file keeps its permission bits.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);

  try {
    await mkdir(dirname(path), { recursive: true });
    const mode = await existingMode(path);
    await writeFile(tempPath, content, 'utf-8');
    if (mode !== undefined) {
      await chmod(tempPath, mode);
    }
    await withRetry(
      () => rename(tempPath, path),
      3,
      50,
      (error) => isNodeError(error) && TRANSIENT_RENAME_CODES.has(error.code ?? '')
    );
  } catch (error) {
    await rm(tempPath, { force: true }).catch(() => undefined);
    const message = error instanceof Error ? error.message : String(error);
    throw new WriteError(`Failed to write ${path}: ${message}`, path, { cause: error });
  }
}

/**
 * Copy `path` to `<path>.backup-<timestamp>` and prune all but the newest `keep` copies
 */
export async function createBackup(path: string, keep: number): Promise<string> {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  const backupPath = `${path}.backup-${timestamp}`;
  await copyFile(path, backupPath);

  const prefix = `${basename(path)}.backup-`;
  const backups = (await readdir(dirname(path)))
    .filter(name => name.startsWith(prefix))
    .sort();
  const stale = backups.slice(0, Math.max(0, backups.length - keep));
  await Promise.all(stale.map(name => rm(join(dirname(path), name), { force: true })));

  return backupPath;
}
