import { z } from 'zod';
import type { SyncContext } from '../context.js';
import type { ToolResult } from '../types/config.js';
import { formatReport, isFullSuccess } from '../sync/report.js';

export const SyncConfigsSchema = z.object({
  source: z.string().min(1, 'source is required'),
  targets: z.array(z.string()).optional(),
  servers: z.array(z.string()).optional(),
  force: z.boolean().default(false),
});

export type SyncConfigsArgs = z.infer<typeof SyncConfigsSchema>;

export const syncConfigsToolDefinition = {
  name: 'sync_configs',
  description: 'Copy the MCP servers of one application (or config file) to the other applications, ' +
               'preserving their unrelated settings. Targets that would lose servers are skipped ' +
               'and listed unless force is true.',
  inputSchema: {
    type: 'object',
    properties: {
      source: {
        type: 'string',
        description: 'Application name or absolute path of the config to copy from',
      },
      targets: {
        type: 'array',
        items: { type: 'string' },
        description: 'Applications to write (default: all except the source)',
      },
      servers: {
        type: 'array',
        items: { type: 'string' },
        description: 'Only sync these server names',
      },
      force: {
        type: 'boolean',
        description: 'Remove servers missing from the source without confirmation (default: false)',
      },
    },
    required: ['source'],
  },
};

export async function syncConfigsTool(args: SyncConfigsArgs, context: SyncContext): Promise<ToolResult> {
  const run = await context.synchronizer.syncFrom(args.source, {
    targets: args.targets,
    servers: args.servers,
    force: args.force,
  });

  const skippedNote = run.report.skipped > 0 && !args.force
    ? '\n\nSkipped targets would lose the servers listed above. Re-run with force: true to remove them.'
    : '';

  return {
    content: [{
      type: 'text',
      text: formatReport(run.report, run.validation) + skippedNote,
    }],
    isError: !isFullSuccess(run.report, run.validation),
  };
}
