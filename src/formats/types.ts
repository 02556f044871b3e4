import type { CanonicalConfig, FormatKind, JsonObject } from '../types/canonical.js';

/**
 * One entry of the tagged-variant handler table.
 * `collection` is the key path under which the schema keeps its server map.
 */
export interface FormatHandler {
  kind: FormatKind;
  label: string;
  collection: readonly string[];
  detect(doc: JsonObject): boolean;
  extract(doc: JsonObject): CanonicalConfig;
  merge(doc: JsonObject, canonical: CanonicalConfig): JsonObject;
}
