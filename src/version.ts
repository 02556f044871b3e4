import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

// src/version.ts in development, dist/src/version.js once built
const candidates = ['../package.json', '../../package.json'].map(rel => fileURLToPath(new URL(rel, import.meta.url)));

function readVersion(): string {
  for (const candidate of candidates) {
    if (!existsSync(candidate)) {
      continue;
    }
    const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  }
  return '0.0.0';
}

export const SERVER_VERSION = readVersion();
