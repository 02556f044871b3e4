import { readFileSync } from 'node:fs';
import os from 'node:os';
import { ConfigSchema, type Config } from '../types/config.js';
import { getDefaultConfigPath } from '../apps/paths.js';
import { ConfigReadError, isNodeError } from '../utils/errors.js';

export const CONFIG_ENV_VAR = 'MCP_CONFIG_SYNC_CONFIG';

/**
 * Load settings from the explicit path, $MCP_CONFIG_SYNC_CONFIG, or
 * ~/.mcp-config-sync/config.json. Only the default location may be absent.
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): Config {
  const explicit = configPath || env[CONFIG_ENV_VAR];
  const path = explicit || getDefaultConfigPath(homeDir);

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    if (!explicit && isNodeError(error) && error.code === 'ENOENT') {
      return createDefaultConfig();
    }
    throw new ConfigReadError(
      `Config file not found or unreadable: ${path}\n` +
      `Create it or set ${CONFIG_ENV_VAR}`,
      path,
      { cause: error }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigReadError(`Invalid JSON in config file ${path}`, path, { cause: error });
  }
  return ConfigSchema.parse(parsed);
}

export function createDefaultConfig(overrides: Partial<Config> = {}): Config {
  return ConfigSchema.parse(overrides);
}
