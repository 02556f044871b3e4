import pino from 'pino';
import type { Config } from '../types/config.js';

/**
 * Create a configured logger instance
 * CRITICAL: the MCP server uses stdout for JSON-RPC and the CLI prints its report there
 * ALL logs MUST go to stderr
 */
export function createLogger(config: Pick<Config, 'logLevel'>) {
  return pino(
    {
      level: config.logLevel,
    },
    pino.destination({ dest: 2, sync: false }) // fd 2 = stderr
  );
}

export type Logger = ReturnType<typeof createLogger>;
