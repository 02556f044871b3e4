import type { FormatHandler } from './types.js';
import { extractCollection, hasKey, serializeServers, setAt } from './shared.js';

const COLLECTION = ['mcp', 'servers'] as const;

export const standardFormat: FormatHandler = {
  kind: 'standard',
  label: 'Standard MCP',
  collection: COLLECTION,
  detect: (doc) => hasKey(doc.mcp, 'servers'),
  extract: (doc) => extractCollection(doc, COLLECTION, 'standard'),
  merge: (doc, canonical) => setAt(doc, COLLECTION, serializeServers(canonical, 'standard')),
};
