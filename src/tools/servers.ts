import { z } from 'zod';
import type { SyncContext } from '../context.js';
import type { ToolResult } from '../types/config.js';
import type { TargetOutcome } from '../types/canonical.js';
import { formatEditOutcome } from '../sync/report.js';

export const AddServerSchema = z.object({
  app: z.string().min(1, 'app is required'),
  name: z.string().min(1, 'name is required'),
  command: z.string().min(1, 'command is required'),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
});

export const RemoveServerSchema = z.object({
  app: z.string().min(1, 'app is required'),
  name: z.string().min(1, 'name is required'),
});

export type AddServerArgs = z.infer<typeof AddServerSchema>;
export type RemoveServerArgs = z.infer<typeof RemoveServerSchema>;

export const addServerToolDefinition = {
  name: 'add_server',
  description: 'Add an MCP server to one application, or replace the server of the same name. ' +
               'Other servers and unrelated settings are left as they are.',
  inputSchema: {
    type: 'object',
    properties: {
      app: {
        type: 'string',
        description: 'Application to edit (see list_apps)',
      },
      name: {
        type: 'string',
        description: 'Server name',
      },
      command: {
        type: 'string',
        description: 'Executable that starts the server',
      },
      args: {
        type: 'array',
        items: { type: 'string' },
        description: 'Command arguments (default: none)',
      },
      env: {
        type: 'object',
        additionalProperties: { type: 'string' },
        description: 'Environment variables for the server (default: none)',
      },
    },
    required: ['app', 'name', 'command'],
  },
};

export const removeServerToolDefinition = {
  name: 'remove_server',
  description: 'Remove one MCP server from one application. Naming the server is the confirmation.',
  inputSchema: {
    type: 'object',
    properties: {
      app: {
        type: 'string',
        description: 'Application to edit (see list_apps)',
      },
      name: {
        type: 'string',
        description: 'Server name to remove',
      },
    },
    required: ['app', 'name'],
  },
};

function toResult(text: string, outcome: TargetOutcome): ToolResult {
  return {
    content: [{ type: 'text', text }],
    isError: outcome.status === 'failed' || outcome.status === 'skipped',
  };
}

export async function addServerTool(args: AddServerArgs, context: SyncContext): Promise<ToolResult> {
  const outcome = await context.synchronizer.upsertServer(args.app, {
    name: args.name,
    command: args.command,
    args: args.args,
    env: args.env,
    extra: {},
  });
  return toResult(formatEditOutcome(outcome, args.name, 'saved'), outcome);
}

export async function removeServerTool(args: RemoveServerArgs, context: SyncContext): Promise<ToolResult> {
  const outcome = await context.synchronizer.removeServer(args.app, args.name);
  return toResult(formatEditOutcome(outcome, args.name, 'removed'), outcome);
}
