import { z } from 'zod';
import type { SyncContext } from '../context.js';
import { selectApps } from '../apps/registry.js';
import type { ToolResult } from '../types/config.js';

export const ListServersSchema = z.object({
  app: z.string().min(1, 'app is required'),
});

export type ListServersArgs = z.infer<typeof ListServersSchema>;

export const listAppsToolDefinition = {
  name: 'list_apps',
  description: 'List every supported application with its config path, preferred write format, ' +
               'detected on-disk format and number of MCP servers.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export const listServersToolDefinition = {
  name: 'list_servers',
  description: 'Show the MCP servers configured for one application (command, args, env keys).',
  inputSchema: {
    type: 'object',
    properties: {
      app: {
        type: 'string',
        description: 'Application name, e.g. Claude, VSCode, Cursor, Windsurf, Roocode-VSCode, Roocode-Windsurf',
      },
    },
    required: ['app'],
  },
};

export interface AppStatus {
  name: string;
  path: string;
  preferredFormat: string;
  detectedFormat: string;
  servers: number;
  error?: string;
}

/**
 * Snapshot of every app; unreadable files are reported, not thrown
 */
export async function collectAppStatus(context: SyncContext): Promise<AppStatus[]> {
  const statuses: AppStatus[] = [];
  for (const app of context.apps) {
    const base = { name: app.name, path: app.path, preferredFormat: app.preferredFormat };
    try {
      const snapshot = await context.synchronizer.readApp(app);
      statuses.push({
        ...base,
        detectedFormat: snapshot.exists ? snapshot.format.kind : 'missing',
        servers: snapshot.config.servers.size,
      });
    } catch (error) {
      statuses.push({
        ...base,
        detectedFormat: 'unknown',
        servers: 0,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return statuses;
}

export async function listAppsTool(context: SyncContext): Promise<ToolResult> {
  const statuses = await collectAppStatus(context);
  context.logger.debug({ apps: statuses.length }, 'Listed applications');

  return {
    content: [{
      type: 'text',
      text: JSON.stringify(statuses, null, 2),
    }],
  };
}

export async function listServersTool(args: ListServersArgs, context: SyncContext): Promise<ToolResult> {
  const [app] = selectApps(context.apps, [args.app]);
  const snapshot = await context.synchronizer.readApp(app);

  const servers = [...snapshot.config.servers.values()].map(server => ({
    name: server.name,
    command: server.command,
    args: server.args,
    // Values may hold secrets; only names leave the process
    envKeys: Object.keys(server.env),
  }));

  return {
    content: [{
      type: 'text',
      text: `${app.name} (${snapshot.exists ? snapshot.format.label : 'missing'}): ${servers.length} server(s)\n\n` +
        JSON.stringify(servers, null, 2),
    }],
  };
}
