import type { DestructiveOperation, SyncReport, TargetOutcome, ValidationResult } from '../types/canonical.js';

const RULE = '='.repeat(80);

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Itemized list shown before any confirmation is asked for
 */
export function formatDestructiveOperation(op: DestructiveOperation): string {
  const lines = [`${op.appName}: ${op.serversToRemove.size} server(s) would be removed`];
  for (const name of op.serversToRemove) {
    lines.push(`  - ${name}`);
  }
  lines.push(`  remaining: ${op.remainingServers.size > 0 ? [...op.remainingServers].join(', ') : '(none)'}`);
  return lines.join('\n');
}

/**
 * One line (plus backup or error detail) for a single-server edit
 */
export function formatEditOutcome(outcome: TargetOutcome, serverName: string, verb: 'saved' | 'removed'): string {
  switch (outcome.status) {
    case 'written': {
      const lines = [`${outcome.appName}: server "${serverName}" ${verb} (${outcome.action ?? 'updated'} ${outcome.path})`];
      if (outcome.backupPath) {
        lines.push(`Backup: ${outcome.backupPath}`);
      }
      return lines.join('\n');
    }
    case 'unchanged':
      return `${outcome.appName}: server "${serverName}" already up to date`;
    case 'skipped':
      return `${outcome.appName}: skipped, nothing written`;
    case 'failed':
      return `${outcome.appName}: failed (${outcome.errorKind}): ${outcome.error}`;
  }
}

export function allInSync(validation: Map<string, ValidationResult>): boolean {
  return [...validation.values()].every(result => result.inSync);
}

/**
 * Exit status 0 only when no target failed and nothing validated out of sync
 */
export function isFullSuccess(report: SyncReport, validation?: Map<string, ValidationResult>): boolean {
  return report.failed === 0 && (validation === undefined || allInSync(validation));
}

export function formatReport(report: SyncReport, validation?: Map<string, ValidationResult>): string {
  const status = report.failed === 0 ? 'SUCCESS' : 'PARTIAL_FAILURE';
  const lines = [
    RULE,
    `MCP CONFIGURATION SYNCHRONIZATION REPORT - ${formatTimestamp(report.timestamp)}`,
    RULE,
    `Status: ${status}`,
  ];

  if (report.source) {
    lines.push(`Source: ${report.source}`);
  }
  lines.push(`Apps configured: ${report.succeeded}/${report.outcomes.length}`);
  if (report.skipped > 0) {
    lines.push(`Skipped: ${report.skipped}`);
  }
  lines.push('-'.repeat(80), 'DETAILS:');

  for (const outcome of report.outcomes) {
    const symbol = outcome.status === 'failed' ? '✗' : outcome.status === 'skipped' ? '-' : '✓';
    lines.push(`${symbol} ${outcome.appName}: ${outcome.action ?? outcome.status}`);
    lines.push(`   Path: ${outcome.path}`);
    if (outcome.backupPath) {
      lines.push(`   Backup: ${outcome.backupPath}`);
    }
    if (outcome.error) {
      lines.push(`   Error (${outcome.errorKind}): ${outcome.error}`);
    }
    const result = validation?.get(outcome.appName);
    if (result) {
      lines.push(`   Validation: ${result.inSync ? '✓ in_sync' : `✗ out_of_sync (${result.reason})`}`);
    }
  }

  if (report.destructiveOps.length > 0) {
    lines.push('-'.repeat(80), 'DESTRUCTIVE OPERATIONS:');
    for (const op of report.destructiveOps) {
      lines.push(formatDestructiveOperation(op));
    }
  }

  lines.push(RULE);
  return lines.join('\n');
}

export function formatValidation(validation: Map<string, ValidationResult>): string {
  const lines: string[] = [];
  for (const [appName, result] of validation) {
    const status = result.inSync ? '✓ in_sync' : '✗ out_of_sync';
    lines.push(`${status.padEnd(14)} ${appName.padEnd(18)} ${result.format.padEnd(13)} servers: ${result.serverNames.size}`);
    if (result.reason) {
      lines.push(`               ${result.reason}`);
    }
  }
  return lines.join('\n');
}
