import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';

export type SyncErrorKind = 'config_read' | 'malformed_config' | 'unrecognized_format' | 'write';

/**
 * Base class for every failure the sync engine reports per application
 */
export class SyncError extends Error {
  constructor(
    readonly kind: SyncErrorKind,
    message: string,
    readonly path?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * File missing, unreadable, or not a JSON object
 */
export class ConfigReadError extends SyncError {
  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super('config_read', message, path, options);
  }
}

/**
 * Schema recognized, but its server collection is not shaped as expected
 */
export class MalformedConfigError extends SyncError {
  constructor(message: string, path?: string) {
    super('malformed_config', message, path);
  }
}

/**
 * No handler matched. Unreachable while the legacy handler stays last in the detection order.
 */
export class UnrecognizedFormatError extends SyncError {
  constructor(message = 'No format handler matched the document') {
    super('unrecognized_format', message);
  }
}

export class WriteError extends SyncError {
  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super('write', message, path, options);
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Wrap any error into an McpError
 */
export function wrapError(error: unknown, context: string): McpError {
  if (error instanceof McpError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const data: Record<string, unknown> = { originalError: message };
  if (error instanceof SyncError) {
    data.kind = error.kind;
    data.path = error.path;
  }

  return new McpError(
    ErrorCode.InternalError,
    `${context}: ${message}`,
    data
  );
}

/**
 * Retry an operation with exponential backoff
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  maxAttempts = 3,
  baseDelay = 1000,
  shouldRetry: (error: unknown) => boolean = () => true
): Promise<T> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt === maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      // Exponential backoff with jitter
      const delay = baseDelay * Math.pow(2, attempt - 1) + Math.random() * baseDelay;
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  throw new Error('Unreachable'); // TypeScript exhaustiveness check
}
