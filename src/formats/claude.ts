import type { FormatHandler } from './types.js';
import { extractCollection, hasKey, serializeServers, setAt } from './shared.js';

const COLLECTION = ['mcpServers'] as const;

/**
 * Claude Desktop: `{ "mcpServers": { "<name>": { command, args, env } } }`
 * next to window and preference keys.
 */
export const claudeFormat: FormatHandler = {
  kind: 'claude',
  label: 'Claude',
  collection: COLLECTION,
  detect: (doc) => hasKey(doc, 'mcpServers'),
  extract: (doc) => extractCollection(doc, COLLECTION, 'claude'),
  merge: (doc, canonical) => setAt(doc, COLLECTION, serializeServers(canonical, 'claude')),
};
