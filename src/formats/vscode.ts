import type { FormatHandler } from './types.js';
import { extractCollection, hasKey, serializeServers, setAt } from './shared.js';

const COLLECTION = ['mcp', 'servers'] as const;

/**
 * VSCode user settings.json: `mcp.servers` living among unrelated editor settings.
 * A bare `{ "mcp": { "servers": ... } }` file is the standard format instead.
 */
export const vscodeFormat: FormatHandler = {
  kind: 'vscode',
  label: 'VSCode',
  collection: COLLECTION,
  detect: (doc) =>
    hasKey(doc.mcp, 'servers') && Object.keys(doc).some(key => key !== 'mcp'),
  extract: (doc) => extractCollection(doc, COLLECTION, 'vscode'),
  merge: (doc, canonical) => setAt(doc, COLLECTION, serializeServers(canonical, 'vscode')),
};
