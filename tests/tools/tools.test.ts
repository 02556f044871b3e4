import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'node:fs';
import { createContext, type SyncContext } from '../../src/context.js';
import { createDefaultConfig } from '../../src/config/loader.js';
import { findApp } from '../../src/apps/registry.js';
import { listAppsTool, listServersTool } from '../../src/tools/apps.js';
import { AddServerSchema, RemoveServerSchema, addServerTool, removeServerTool } from '../../src/tools/servers.js';
import { SyncConfigsSchema, syncConfigsTool } from '../../src/tools/sync.js';
import { ValidateConfigsSchema, validateConfigsTool } from '../../src/tools/validate.js';
import { getConfigTool } from '../../src/tools/get-config.js';
import { APPS_RESOURCE_URI, SETTINGS_RESOURCE_URI, getResourceContent } from '../../src/resources/index.js';
import { SERVER_VERSION } from '../../src/version.js';
import { createTestLogger, makeTempDir, readJson, removeTempDir, writeJson } from '../helpers.js';

const GIT = { command: 'uvx', args: ['mcp-server-git'] };

describe('MCP tools', () => {
  let home: string;
  let context: SyncContext;

  const pathOf = (name: string): string => {
    const app = findApp(context.apps, name);
    if (!app) {
      throw new Error(`no app ${name}`);
    }
    return app.path;
  };

  const textOf = (result: { content: Array<{ text: string }> }): string => result.content[0].text;

  beforeEach(() => {
    home = makeTempDir('tools');
    const config = createDefaultConfig({ backups: { enabled: false, keep: 1 } });
    context = createContext(config, createTestLogger(), { platform: 'linux', homeDir: home });
  });

  afterEach(() => {
    removeTempDir(home);
  });

  describe('sync_configs', () => {
    it('should default force to false', () => {
      expect(SyncConfigsSchema.parse({ source: 'Claude' })).toEqual({ source: 'Claude', force: false });
      expect(() => SyncConfigsSchema.parse({})).toThrow();
    });

    it('should write the targets and report success', async () => {
      writeJson(pathOf('Claude'), { mcpServers: { git: GIT } });

      const result = await syncConfigsTool(SyncConfigsSchema.parse({ source: 'Claude', targets: ['Cursor'] }), context);

      expect(result.isError).toBe(false);
      expect(textOf(result)).toContain('Status: SUCCESS');
      expect(textOf(result)).toContain('✓ Cursor: created');
      expect(readJson(pathOf('Cursor'))).toEqual({ mcp: { servers: { git: GIT } } });
    });

    it('should explain skipped targets and flag the run', async () => {
      writeJson(pathOf('Claude'), { mcpServers: { git: GIT } });
      writeJson(pathOf('Cursor'), { mcp: { servers: { git: GIT, old: { command: 'old-server' } } } });

      const result = await syncConfigsTool(SyncConfigsSchema.parse({ source: 'Claude', targets: ['Cursor'] }), context);

      expect(result.isError).toBe(true);
      expect(textOf(result)).toContain('Cursor: 1 server(s) would be removed\n  - old\n  remaining: git');
      expect(textOf(result).endsWith('Re-run with force: true to remove them.')).toBe(true);
    });

    it('should remove servers when forced', async () => {
      writeJson(pathOf('Claude'), { mcpServers: { git: GIT } });
      writeJson(pathOf('Cursor'), { mcp: { servers: { git: GIT, old: { command: 'old-server' } } } });

      const result = await syncConfigsTool(
        SyncConfigsSchema.parse({ source: 'Claude', targets: ['Cursor'], force: true }),
        context
      );

      expect(result.isError).toBe(false);
      expect(readJson(pathOf('Cursor'))).toEqual({ mcp: { servers: { git: GIT } } });
    });
  });

  describe('add_server', () => {
    it('should default args and env to empty', () => {
      expect(AddServerSchema.parse({ app: 'Cursor', name: 'git', command: 'uvx' }))
        .toEqual({ app: 'Cursor', name: 'git', command: 'uvx', args: [], env: {} });
      expect(() => AddServerSchema.parse({ app: 'Cursor', name: 'git' })).toThrow();
    });

    it('should add a server to one app and keep the rest', async () => {
      writeJson(pathOf('Claude'), { globalShortcut: 'Ctrl+Space', mcpServers: { git: GIT } });

      const result = await addServerTool(
        AddServerSchema.parse({ app: 'Claude', name: 'time', command: 'npx', args: ['-y', 'mcp-time'], env: { TZ: 'UTC' } }),
        context
      );

      expect(result.isError).toBe(false);
      expect(textOf(result)).toBe(`Claude: server "time" saved (updated ${pathOf('Claude')})`);
      expect(readJson(pathOf('Claude'))).toEqual({
        globalShortcut: 'Ctrl+Space',
        mcpServers: { git: GIT, time: { command: 'npx', args: ['-y', 'mcp-time'], env: { TZ: 'UTC' } } },
      });
    });

    it('should create the config of an app that has none', async () => {
      const result = await addServerTool(AddServerSchema.parse({ app: 'Windsurf', name: 'git', ...GIT }), context);

      expect(textOf(result)).toBe(`Windsurf: server "git" saved (created ${pathOf('Windsurf')})`);
      expect(readJson(pathOf('Windsurf'))).toEqual({ mcp: { servers: { git: GIT } } });
    });
  });

  describe('remove_server', () => {
    it('should remove one server', async () => {
      writeJson(pathOf('Cursor'), { mcp: { servers: { git: GIT, old: { command: 'old-server' } } } });

      const result = await removeServerTool(RemoveServerSchema.parse({ app: 'Cursor', name: 'old' }), context);

      expect(result.isError).toBe(false);
      expect(textOf(result)).toBe(`Cursor: server "old" removed (updated ${pathOf('Cursor')})`);
      expect(readJson(pathOf('Cursor'))).toEqual({ mcp: { servers: { git: GIT } } });
    });

    it('should reject a server the app does not have', async () => {
      writeJson(pathOf('Cursor'), { mcp: { servers: { git: GIT } } });

      await expect(removeServerTool({ app: 'Cursor', name: 'nope' }, context))
        .rejects.toThrow('Server "nope" not found in Cursor');
    });
  });

  describe('validate_configs', () => {
    it('should compare every app against Claude by default', async () => {
      writeJson(pathOf('Claude'), { mcpServers: { git: GIT } });
      writeJson(pathOf('Cursor'), { mcp: { servers: { git: GIT } } });

      const result = await validateConfigsTool(ValidateConfigsSchema.parse({}), context);
      const lines = textOf(result).split('\n');

      expect(lines.slice(0, 3)).toEqual(['Reference: Claude (1 servers)', 'Overall: OUT OF SYNC', '']);
      expect(lines).toContain('✓ in_sync' + ' '.repeat(6) + 'Cursor' + ' '.repeat(13) + 'Standard MCP' + ' '.repeat(2) + 'servers: 1');
      expect(lines).toContain(' '.repeat(15) + 'config file not found (missing: git)');
    });

    it('should report in sync when every app matches', async () => {
      const result = await validateConfigsTool({ source: 'Claude' }, context);
      expect(textOf(result).split('\n')[1]).toBe('Overall: IN SYNC');
    });
  });

  describe('list_servers', () => {
    it('should list servers without revealing env values', async () => {
      writeJson(pathOf('Claude'), {
        mcpServers: { api: { command: 'node', args: ['server.js'], env: { API_KEY: 'test-secret' } } },
      });

      const result = await listServersTool({ app: 'Claude' }, context);
      const [header, body] = textOf(result).split('\n\n');

      expect(header).toBe('Claude (Claude): 1 server(s)');
      expect(JSON.parse(body)).toEqual([{ name: 'api', command: 'node', args: ['server.js'], envKeys: ['API_KEY'] }]);
    });

    it('should reject unknown apps', async () => {
      await expect(listServersTool({ app: 'Zed' }, context)).rejects.toThrow('Unknown application: Zed');
    });
  });

  describe('list_apps', () => {
    it('should report each app, including unreadable ones', async () => {
      writeJson(pathOf('Claude'), { mcpServers: { git: GIT } });
      writeJson(pathOf('Cursor'), {});
      writeFileSync(pathOf('Cursor'), 'not json');

      const statuses = JSON.parse(textOf(await listAppsTool(context)));

      expect(statuses).toHaveLength(6);
      expect(statuses[0]).toEqual({
        name: 'Claude',
        path: pathOf('Claude'),
        preferredFormat: 'claude',
        detectedFormat: 'claude',
        servers: 1,
      });
      expect(statuses[1]).toMatchObject({ name: 'VSCode', detectedFormat: 'missing', servers: 0 });
      expect(statuses[2]).toMatchObject({ name: 'Cursor', detectedFormat: 'unknown', servers: 0 });
      expect(statuses[2].error).toContain(`Invalid JSON in ${pathOf('Cursor')}`);
    });
  });

  describe('get_config', () => {
    it('should show settings and resolved paths', async () => {
      const [title, body] = textOf(await getConfigTool(context)).split('\n\n');
      const settings = JSON.parse(body);

      expect(title).toBe('=== MCP Config Sync Settings ===');
      expect(settings.debounceMs).toBe(2000);
      expect(settings.backups).toEqual({ enabled: false, keep: 1 });
      expect(settings.watch).toEqual(['Claude', 'VSCode', 'Cursor', 'Windsurf', 'Roocode-VSCode', 'Roocode-Windsurf']);
      expect(settings.apps[2]).toEqual({ name: 'Cursor', path: pathOf('Cursor'), preferredFormat: 'standard' });
      expect(settings.version).toBe(SERVER_VERSION);
    });
  });

  describe('resources', () => {
    it('should serve settings and app state', async () => {
      const settings = await getResourceContent(SETTINGS_RESOURCE_URI, context);
      const apps = await getResourceContent(APPS_RESOURCE_URI, context);

      expect(settings?.mimeType).toBe('application/json');
      expect(JSON.parse(settings?.text ?? '{}')).toEqual(context.config);
      expect(JSON.parse(apps?.text ?? '[]')).toHaveLength(6);
    });

    it('should return null for unknown resources', async () => {
      expect(await getResourceContent('state://mcp-config-sync/other', context)).toBeNull();
    });
  });
});
