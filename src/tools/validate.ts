import { z } from 'zod';
import type { SyncContext } from '../context.js';
import type { ToolResult } from '../types/config.js';
import { allInSync, formatValidation } from '../sync/report.js';

export const ValidateConfigsSchema = z.object({
  source: z.string().min(1).default('Claude'),
});

export type ValidateConfigsArgs = z.infer<typeof ValidateConfigsSchema>;

export const validateConfigsToolDefinition = {
  name: 'validate_configs',
  description: 'Compare every application against a reference configuration and report which ' +
               'servers are missing, extra or different. Format metadata is ignored.',
  inputSchema: {
    type: 'object',
    properties: {
      source: {
        type: 'string',
        description: 'Reference application name or config path (default: Claude)',
      },
    },
  },
};

export async function validateConfigsTool(args: ValidateConfigsArgs, context: SyncContext): Promise<ToolResult> {
  const canonical = await context.synchronizer.loadCanonical(args.source);
  const validation = await context.synchronizer.validateAll(canonical);
  const inSync = allInSync(validation);

  return {
    content: [{
      type: 'text',
      text: `Reference: ${args.source} (${canonical.servers.size} servers)\n` +
        `Overall: ${inSync ? 'IN SYNC' : 'OUT OF SYNC'}\n\n` +
        formatValidation(validation),
    }],
  };
}
