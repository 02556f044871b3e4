import type { FormatKind, JsonObject } from '../types/canonical.js';
import { UnrecognizedFormatError } from '../utils/errors.js';
import { claudeFormat } from './claude.js';
import { legacyFormat } from './legacy.js';
import { standardFormat } from './standard.js';
import type { FormatHandler } from './types.js';
import { vscodeFormat } from './vscode.js';

export type { FormatHandler } from './types.js';

export const FORMAT_HANDLERS: Record<FormatKind, FormatHandler> = {
  claude: claudeFormat,
  vscode: vscodeFormat,
  standard: standardFormat,
  legacy: legacyFormat,
};

// Most structurally specific first; legacy matches anything and must stay last
export const DETECTION_ORDER: readonly FormatKind[] = ['claude', 'vscode', 'standard', 'legacy'];

export function getHandler(kind: FormatKind): FormatHandler {
  return FORMAT_HANDLERS[kind];
}

export function detectFormat(doc: JsonObject): FormatHandler {
  for (const kind of DETECTION_ORDER) {
    const handler = FORMAT_HANDLERS[kind];
    if (handler.detect(doc)) {
      return handler;
    }
  }
  throw new UnrecognizedFormatError();
}

/**
 * Both handlers keep their servers at the same key path
 */
export function sharesCollection(a: FormatHandler, b: FormatHandler): boolean {
  return a.collection.length === b.collection.length &&
    a.collection.every((key, index) => b.collection[index] === key);
}
