import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { loadConfig } from './config/loader.js';
import { createContext, type SyncContext } from './context.js';
import type { ToolResult } from './types/config.js';
import { createLogger } from './utils/logger.js';
import { wrapError } from './utils/errors.js';
import { SERVER_VERSION } from './version.js';

// Import resources
import { getResourceDefinitions, getResourceContent } from './resources/index.js';

// Import tools
import { getConfigTool, getConfigToolDefinition } from './tools/get-config.js';
import {
  listAppsTool,
  listAppsToolDefinition,
  listServersTool,
  listServersToolDefinition,
  ListServersSchema,
} from './tools/apps.js';
import {
  addServerTool,
  addServerToolDefinition,
  AddServerSchema,
  removeServerTool,
  removeServerToolDefinition,
  RemoveServerSchema,
} from './tools/servers.js';
import { syncConfigsTool, syncConfigsToolDefinition, SyncConfigsSchema } from './tools/sync.js';
import { validateConfigsTool, validateConfigsToolDefinition, ValidateConfigsSchema } from './tools/validate.js';

export function createServer(configPath?: string) {
  // Load configuration
  const config = loadConfig(configPath);
  const logger = createLogger(config);
  const context = createContext(config, logger);

  return { ...createServerFromContext(context), logger };
}

export function createServerFromContext(context: SyncContext) {
  const { logger } = context;

  // Create server
  const server = new Server(
    {
      name: 'mcp-config-sync',
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  // Register list tools handler
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    logger.debug('ListTools requested');

    return {
      tools: [
        getConfigToolDefinition,
        listAppsToolDefinition,
        listServersToolDefinition,
        addServerToolDefinition,
        removeServerToolDefinition,
        syncConfigsToolDefinition,
        validateConfigsToolDefinition,
      ],
    };
  });

  // Register call tool handler
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    logger.info({ tool: name, args }, 'Tool called');

    try {
      let result: ToolResult;

      switch (name) {
        case 'get_config':
          result = await getConfigTool(context);
          break;

        case 'list_apps':
          result = await listAppsTool(context);
          break;

        case 'list_servers':
          result = await listServersTool(ListServersSchema.parse(args), context);
          break;

        case 'add_server':
          result = await addServerTool(AddServerSchema.parse(args), context);
          break;

        case 'remove_server':
          result = await removeServerTool(RemoveServerSchema.parse(args), context);
          break;

        case 'sync_configs':
          result = await syncConfigsTool(SyncConfigsSchema.parse(args), context);
          break;

        case 'validate_configs':
          result = await validateConfigsTool(ValidateConfigsSchema.parse(args ?? {}), context);
          break;

        default:
          throw new Error(`Unknown tool: ${name}`);
      }

      return result;
    } catch (error) {
      const mcpError = wrapError(error, `Tool ${name}`);
      logger.error({ error: mcpError, tool: name, args }, 'Tool execution failed');

      return {
        content: [{
          type: 'text' as const,
          text: `Error: ${mcpError.message}`,
        }],
        isError: true,
      };
    }
  });

  // Register resources handlers
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    logger.debug('ListResources requested');
    return {
      resources: getResourceDefinitions(),
    };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    logger.info({ uri }, 'ReadResource requested');

    const content = await getResourceContent(uri, context);
    if (!content) {
      throw new Error(`Resource not found: ${uri}`);
    }

    return {
      contents: [{
        uri,
        mimeType: content.mimeType,
        text: content.text,
      }],
    };
  });

  logger.info({
    apps: context.apps.map(app => app.name),
    logLevel: context.config.logLevel,
  }, 'Server initialized');

  return { server, context };
}
