import { z } from 'zod';

export const ConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  debounceMs: z.number().nonnegative().default(2000),
  // Events for a path we just wrote are ignored for this long
  selfWriteWindowMs: z.number().nonnegative().default(3000),
  backups: z
    .object({
      enabled: z.boolean().default(true),
      keep: z.number().int().positive().default(5),
    })
    .default({}),
  // Per-app overrides of the platform default path, keyed by app name
  appPaths: z.record(z.string()).default({}),
  // Apps the daemon watches; empty means every known app
  watch: z.array(z.string()).default([]),
});

export type Config = z.infer<typeof ConfigSchema>;

// Content types for MCP tool results
const TextContentSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export const ToolResultSchema = z.object({
  content: z.array(TextContentSchema),
  isError: z.boolean().optional(),
});

export type ToolResult = z.infer<typeof ToolResultSchema>;
