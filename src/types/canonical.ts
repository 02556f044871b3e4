/**
 * Application-agnostic view of "a set of named MCP servers".
 * Every format handler extracts into and merges from these types.
 */

import type { LosslessNumber } from 'lossless-json';

export type FormatKind = 'claude' | 'vscode' | 'standard' | 'legacy';

/** Numbers a double cannot hold exactly stay `LosslessNumber` */
export type JsonValue =
  | string
  | number
  | LosslessNumber
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface CanonicalServer {
  name: string;
  command: string;
  args: string[];
  env: Record<string, string>;
  /** Fields of the source entry the canonical model does not interpret */
  extra: JsonObject;
}

export interface CanonicalConfig {
  /** Insertion order is kept so output stays deterministic */
  servers: Map<string, CanonicalServer>;
  /** Kind of the handler this config was extracted from */
  format?: FormatKind;
}

export interface AppDescriptor {
  name: string;
  path: string;
  preferredFormat: FormatKind;
}

export interface ValidationResult {
  inSync: boolean;
  format: string;
  reason?: string;
  serverNames: Set<string>;
}

export interface DestructiveOperation {
  appName: string;
  existingServers: Set<string>;
  serversToRemove: Set<string>;
  remainingServers: Set<string>;
}

export interface WritePlan {
  app: AppDescriptor;
  document: JsonObject;
  /** Serialized form of `document`, exactly as it would land on disk */
  content: string;
  currentFormat: FormatKind;
  changed: boolean;
  fileExists: boolean;
  destructiveOp?: DestructiveOperation;
}

export type TargetStatus = 'written' | 'unchanged' | 'skipped' | 'failed';

export interface TargetOutcome {
  appName: string;
  path: string;
  status: TargetStatus;
  action?: 'created' | 'updated';
  backupPath?: string;
  errorKind?: string;
  error?: string;
}

export interface SyncReport {
  timestamp: Date;
  source?: string;
  outcomes: TargetOutcome[];
  succeeded: number;
  skipped: number;
  failed: number;
  destructiveOps: DestructiveOperation[];
}
