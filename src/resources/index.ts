import type { SyncContext } from '../context.js';
import { collectAppStatus } from '../tools/apps.js';

/**
 * MCP Resources - Expose sync settings and per-app state
 */

export interface ResourceDefinition {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export const APPS_RESOURCE_URI = 'state://mcp-config-sync/apps';
export const SETTINGS_RESOURCE_URI = 'config://mcp-config-sync/settings';

export function getResourceDefinitions(): ResourceDefinition[] {
  return [
    {
      uri: SETTINGS_RESOURCE_URI,
      name: 'Sync Settings',
      description: 'Debounce, backup and path settings in effect',
      mimeType: 'application/json',
    },
    {
      uri: APPS_RESOURCE_URI,
      name: 'Application Status',
      description: 'Every supported application with its detected config format and server count',
      mimeType: 'application/json',
    },
  ];
}

export async function getResourceContent(
  uri: string,
  context: SyncContext
): Promise<{ mimeType: string; text: string } | null> {
  switch (uri) {
    case SETTINGS_RESOURCE_URI:
      return {
        mimeType: 'application/json',
        text: JSON.stringify(context.config, null, 2),
      };

    case APPS_RESOURCE_URI:
      return {
        mimeType: 'application/json',
        text: JSON.stringify(await collectAppStatus(context), null, 2),
      };

    default:
      return null;
  }
}
