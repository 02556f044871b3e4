import type { FormatHandler } from './types.js';
import { extractCollection, serializeServers, setAt } from './shared.js';

const COLLECTION = ['mcp', 'servers'] as const;

/**
 * Catch-all for empty, missing and unrecognized documents, including the old
 * endpoint-style `{ "mcp": { "server_endpoint": ... } }` block. Matches everything,
 * so it must stay last in the detection order.
 */
export const legacyFormat: FormatHandler = {
  kind: 'legacy',
  label: 'Legacy',
  collection: COLLECTION,
  detect: () => true,
  extract: (doc) => extractCollection(doc, COLLECTION, 'legacy'),
  merge: (doc, canonical) => setAt(doc, COLLECTION, serializeServers(canonical, 'legacy')),
};
