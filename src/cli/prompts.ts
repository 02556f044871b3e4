import { createInterface } from 'readline/promises';
import { stdin as input, stdout as output } from 'process';
import type { DestructiveOperation } from '../types/canonical.js';
import { formatDestructiveOperation } from '../sync/report.js';

/**
 * Ask a yes/no question and return true for yes, false for no.
 * TTY-safe: only works in interactive terminal.
 *
 * @param question The question to ask (will append " (y/N): ")
 * @returns Promise resolving to true for 'y'/'yes', false otherwise
 */
export async function askYesNo(question: string): Promise<boolean> {
  const rl = createInterface({ input, output });

  try {
    const answer = await rl.question(`${question} (y/N): `);
    return answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes';
  } finally {
    rl.close();
  }
}

/**
 * Confirmation gate for the CLI: show what would be removed, then ask
 */
export async function confirmDestructive(op: DestructiveOperation): Promise<boolean> {
  console.log(`\n⚠️  ${formatDestructiveOperation(op)}`);
  return askYesNo(`Remove ${op.serversToRemove.size} server(s) from ${op.appName}?`);
}
