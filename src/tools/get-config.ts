import type { SyncContext } from '../context.js';
import type { ToolResult } from '../types/config.js';
import { SERVER_VERSION } from '../version.js';

export const getConfigToolDefinition = {
  name: 'get_config',
  description: 'Get the sync settings and resolved application paths as JSON (read-only).',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

/**
 * Get current settings (read-only)
 */
export async function getConfigTool(context: SyncContext): Promise<ToolResult> {
  const { config, apps } = context;

  const configData = {
    logLevel: config.logLevel,
    debounceMs: config.debounceMs,
    selfWriteWindowMs: config.selfWriteWindowMs,
    backups: config.backups,
    watch: config.watch.length > 0 ? config.watch : apps.map(app => app.name),
    apps: apps.map(app => ({ name: app.name, path: app.path, preferredFormat: app.preferredFormat })),
    version: SERVER_VERSION,
    platform: process.platform,
    nodeVersion: process.version,
  };

  return {
    content: [
      {
        type: 'text',
        text:
          '=== MCP Config Sync Settings ===\n\n' +
          JSON.stringify(configData, null, 2) +
          '\n\n⚠️  Settings are read-only. To modify, update the config file and restart the server.',
      },
    ],
  };
}
